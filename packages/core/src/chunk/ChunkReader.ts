/**
 * ChunkReader - parses a precompiled Lua 5.4 chunk into a Proto tree
 *
 * Layout (all multi-byte scalars little-endian):
 *   header       signature, version, format, LUAC_DATA, type sizes,
 *                LUAC_INT, LUAC_NUM
 *   byte         upvalue count of the main closure
 *   function     source, lines, params, vararg, stack size, code,
 *                constants, upvalues, nested functions, debug info
 *
 * Sizes and counts are varints: 7 bits per byte, most significant group
 * first, high bit set on the last byte.
 */

import type { AbsLineInfo, LocalVariable, LuaConstant, Proto, UpvalueDesc } from '@luaprobe/types';
import { ChunkFormatError } from '../errors/LuaProbeError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
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
  NUMBER_SIZE,
} from './format.js';

export interface ReadChunkOptions {
  /** Receives a debug line for every string that is not valid UTF-8 */
  logger?: Logger;
}

/**
 * Parse a binary chunk.
 *
 * Lua strings are raw bytes; invalid UTF-8 sequences come out as U+FFFD.
 *
 * @throws ChunkFormatError when the bytes are not a loadable 5.4 chunk
 */
export function readChunk(bytes: Uint8Array, options: ReadChunkOptions = {}): Proto {
  return new ChunkReader(bytes, options.logger ?? silentLogger).read();
}

/**
 * True when `bytes` start with the binary chunk signature.
 */
export function isBinaryChunk(bytes: Uint8Array): boolean {
  return LUA_SIGNATURE.every((b, i) => bytes[i] === b);
}

const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

class ChunkReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly logger: Logger
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  read(): Proto {
    this.checkHeader();

    const upvalueCount = this.byte();
    const main = this.func(null);

    if (main.upvalues.length !== upvalueCount) {
      this.fail(
        'ERR_CHUNK_FORMAT',
        `Main function declares ${main.upvalues.length} upvalues, header says ${upvalueCount}`
      );
    }

    return main;
  }

  // === HEADER ===

  private checkHeader(): void {
    if (!isBinaryChunk(this.bytes)) {
      this.fail('ERR_CHUNK_SIGNATURE', 'Not a precompiled Lua chunk', 'Compile the script with luac first');
    }
    this.offset = LUA_SIGNATURE.length;

    const version = this.byte();
    if (version !== LUAC_VERSION) {
      const found = `${version >> 4}.${version & 0xf}`;
      this.fail('ERR_CHUNK_VERSION', `Chunk was compiled for Lua ${found}, expected 5.4`, 'Recompile with luac 5.4');
    }

    if (this.byte() !== LUAC_FORMAT) this.fail('ERR_CHUNK_FORMAT', 'Unsupported chunk format');

    for (const expected of LUAC_DATA) {
      if (this.byte() !== expected) this.fail('ERR_CHUNK_FORMAT', 'Chunk data is corrupted');
    }

    this.checkSize(INSTRUCTION_SIZE, 'Instruction');
    this.checkSize(INTEGER_SIZE, 'lua_Integer');
    this.checkSize(NUMBER_SIZE, 'lua_Number');

    if (this.int64() !== LUAC_INT) this.fail('ERR_CHUNK_FORMAT', 'Integer format mismatch');
    if (this.float64() !== LUAC_NUM) this.fail('ERR_CHUNK_FORMAT', 'Float format mismatch');
  }

  private checkSize(expected: number, what: string): void {
    const size = this.byte();
    if (size !== expected) {
      this.fail('ERR_CHUNK_FORMAT', `${what} size is ${size}, expected ${expected}`);
    }
  }

  // === FUNCTIONS ===

  private func(parentSource: string | null): Proto {
    const source = this.string() ?? parentSource;
    const lineDefined = this.varint();
    const lastLineDefined = this.varint();
    const numParams = this.byte();
    const isVararg = this.byte() !== 0;
    const maxStackSize = this.byte();

    const code = this.list(() => this.uint32());
    const constants = this.list(() => this.constant());
    const upvalues: UpvalueDesc[] = this.list(() => ({
      name: null,
      inStack: this.byte() !== 0,
      index: this.byte(),
      kind: this.byte(),
    }));
    const protos = this.list(() => this.func(source));

    const lineInfo = this.list(() => this.int8());
    const absLineInfo: AbsLineInfo[] = this.list(() => ({ pc: this.varint(), line: this.varint() }));
    const locVars: LocalVariable[] = this.list(() => ({
      varName: this.string(),
      startPc: this.varint(),
      endPc: this.varint(),
    }));

    const upvalueNames = this.list(() => this.string());
    if (upvalueNames.length > upvalues.length) {
      this.fail('ERR_CHUNK_FORMAT', 'More upvalue names than upvalues');
    }

    return {
      source,
      lineDefined,
      lastLineDefined,
      numParams,
      isVararg,
      maxStackSize,
      code,
      constants,
      upvalues: upvalues.map((upv, i) => ({ ...upv, name: upvalueNames[i] ?? null })),
      protos,
      lineInfo,
      absLineInfo,
      locVars,
    };
  }

  private constant(): LuaConstant {
    const at = this.offset;
    const tag = this.byte();

    switch (tag) {
      case CONSTANT_TAG.NIL:
        return { type: 'nil' };
      case CONSTANT_TAG.FALSE:
        return { type: 'boolean', value: false };
      case CONSTANT_TAG.TRUE:
        return { type: 'boolean', value: true };
      case CONSTANT_TAG.INTEGER:
        return { type: 'integer', value: this.int64() };
      case CONSTANT_TAG.FLOAT:
        return { type: 'float', value: this.float64() };
      case CONSTANT_TAG.SHORT_STRING:
      case CONSTANT_TAG.LONG_STRING: {
        const value = this.string();
        if (value === null) this.fail('ERR_CHUNK_CONSTANT', 'Missing string constant', undefined, at);
        return { type: 'string', value };
      }
      default:
        return this.fail('ERR_CHUNK_CONSTANT', `Unknown constant tag 0x${tag.toString(16)}`, undefined, at);
    }
  }

  // === PRIMITIVES ===

  private list<T>(readItem: () => T): T[] {
    const count = this.varint();
    const items: T[] = [];
    for (let i = 0; i < count; i++) items.push(readItem());
    return items;
  }

  private varint(): number {
    let value = 0;
    for (;;) {
      const b = this.byte();
      value = value * 0x80 + (b & 0x7f);
      if (value > Number.MAX_SAFE_INTEGER) this.fail('ERR_CHUNK_FORMAT', 'Integer overflow in size field');
      if (b & 0x80) return value;
    }
  }

  /** Size-prefixed string; size 0 means no string, otherwise size - 1 bytes follow */
  private string(): string | null {
    const size = this.varint();
    if (size === 0) return null;

    const length = size - 1;
    this.need(length);
    const text = this.decode(this.bytes.subarray(this.offset, this.offset + length));
    this.offset += length;
    return text;
  }

  private decode(raw: Uint8Array): string {
    try {
      return strictDecoder.decode(raw);
    } catch (err) {
      if (!(err instanceof TypeError)) throw err;
      this.logger.debug('String is not valid UTF-8, decoded with replacements', {
        offset: this.offset,
        bytes: raw.length,
      });
      return lenientDecoder.decode(raw);
    }
  }

  private byte(): number {
    this.need(1);
    return this.view.getUint8(this.offset++);
  }

  private int8(): number {
    this.need(1);
    return this.view.getInt8(this.offset++);
  }

  private uint32(): number {
    this.need(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  private int64(): bigint {
    this.need(8);
    const value = this.view.getBigInt64(this.offset, true);
    this.offset += 8;
    return value;
  }

  private float64(): number {
    this.need(8);
    const value = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return value;
  }

  private need(count: number): void {
    if (this.offset + count > this.bytes.length) {
      this.fail('ERR_CHUNK_TRUNCATED', 'Chunk ends unexpectedly', 'The file may be incomplete');
    }
  }

  private fail(code: string, message: string, suggestion?: string, offset = this.offset): never {
    throw new ChunkFormatError(message, code, { offset }, suggestion);
  }
}
