/**
 * ChunkWriter - emits a Proto tree in the Lua 5.4 binary chunk format
 *
 * The inverse of readChunk: a chunk read and written back unchanged is
 * byte-identical to what luac produced.
 */

import type { LuaConstant, Proto } from '@luaprobe/types';
import {
  CONSTANT_TAG,
  INSTRUCTION_SIZE,
  INTEGER_SIZE,
  LUAC_DATA,
  LUAC_FORMAT,
  LUAC_INT,
  LUAC_NUM,
  LUAC_VERSION,
  LUA_SIGNATURE,
  MAX_SHORT_STRING,
  NUMBER_SIZE,
} from './format.js';

export interface WriteChunkOptions {
  /** Drop sources, line info, local and upvalue names (luac -s) */
  stripDebug?: boolean;
}

export function writeChunk(proto: Proto, options: WriteChunkOptions = {}): Uint8Array {
  const writer = new ChunkWriter(options.stripDebug ?? false);
  writer.header();
  writer.byte(proto.upvalues.length);
  writer.func(proto, null);
  return writer.finish();
}

const textEncoder = new TextEncoder();

class ChunkWriter {
  private readonly out: number[] = [];
  private readonly scratch = new DataView(new ArrayBuffer(8));

  constructor(private readonly strip: boolean) {}

  header(): void {
    this.bytes(LUA_SIGNATURE);
    this.byte(LUAC_VERSION);
    this.byte(LUAC_FORMAT);
    this.bytes(LUAC_DATA);
    this.byte(INSTRUCTION_SIZE);
    this.byte(INTEGER_SIZE);
    this.byte(NUMBER_SIZE);
    this.int64(LUAC_INT);
    this.float64(LUAC_NUM);
  }

  func(proto: Proto, parentSource: string | null): void {
    // nested functions from the same file omit the source
    const source = this.strip || proto.source === parentSource ? null : proto.source;
    this.string(source);
    this.varint(proto.lineDefined);
    this.varint(proto.lastLineDefined);
    this.byte(proto.numParams);
    this.byte(proto.isVararg ? 1 : 0);
    this.byte(proto.maxStackSize);

    this.list(proto.code, (ins) => this.uint32(ins));
    this.list(proto.constants, (k) => this.constant(k));
    this.list(proto.upvalues, (upv) => {
      this.byte(upv.inStack ? 1 : 0);
      this.byte(upv.index);
      this.byte(upv.kind);
    });
    this.list(proto.protos, (child) => this.func(child, proto.source));

    if (this.strip) {
      for (let i = 0; i < 4; i++) this.varint(0);
      return;
    }

    this.list(proto.lineInfo, (delta) => this.byte(delta & 0xff));
    this.list(proto.absLineInfo, (abs) => {
      this.varint(abs.pc);
      this.varint(abs.line);
    });
    this.list(proto.locVars, (local) => {
      this.string(local.varName);
      this.varint(local.startPc);
      this.varint(local.endPc);
    });

    // names are all-or-nothing, like luac's
    const named = proto.upvalues.some((upv) => upv.name !== null);
    this.list(named ? proto.upvalues : [], (upv) => this.string(upv.name));
  }

  finish(): Uint8Array {
    return Uint8Array.from(this.out);
  }

  private constant(k: LuaConstant): void {
    switch (k.type) {
      case 'nil':
        this.byte(CONSTANT_TAG.NIL);
        break;
      case 'boolean':
        this.byte(k.value ? CONSTANT_TAG.TRUE : CONSTANT_TAG.FALSE);
        break;
      case 'integer':
        this.byte(CONSTANT_TAG.INTEGER);
        this.int64(k.value);
        break;
      case 'float':
        this.byte(CONSTANT_TAG.FLOAT);
        this.float64(k.value);
        break;
      case 'string': {
        const encoded = textEncoder.encode(k.value);
        this.byte(encoded.length <= MAX_SHORT_STRING ? CONSTANT_TAG.SHORT_STRING : CONSTANT_TAG.LONG_STRING);
        this.varint(encoded.length + 1);
        this.bytes(encoded);
        break;
      }
    }
  }

  private list<T>(items: readonly T[], writeItem: (item: T) => void): void {
    this.varint(items.length);
    for (const item of items) writeItem(item);
  }

  /** 7-bit groups, most significant first, stop bit on the last */
  private varint(value: number): void {
    const groups = [value % 0x80];
    let rest = Math.floor(value / 0x80);
    while (rest > 0) {
      groups.unshift(rest % 0x80);
      rest = Math.floor(rest / 0x80);
    }
    groups[groups.length - 1] |= 0x80;
    this.bytes(groups);
  }

  private string(value: string | null): void {
    if (value === null) {
      this.varint(0);
      return;
    }
    const encoded = textEncoder.encode(value);
    this.varint(encoded.length + 1);
    this.bytes(encoded);
  }

  byte(value: number): void {
    this.out.push(value & 0xff);
  }

  private bytes(values: ArrayLike<number>): void {
    for (let i = 0; i < values.length; i++) this.out.push(values[i]);
  }

  private uint32(value: number): void {
    this.scratch.setUint32(0, value >>> 0, true);
    this.copyScratch(4);
  }

  private int64(value: bigint): void {
    this.scratch.setBigInt64(0, value, true);
    this.copyScratch(8);
  }

  private float64(value: number): void {
    this.scratch.setFloat64(0, value, true);
    this.copyScratch(8);
  }

  private copyScratch(length: number): void {
    for (let i = 0; i < length; i++) this.out.push(this.scratch.getUint8(i));
  }
}
