/**
 * Return-site classification and the per-function merge of return verdicts.
 */

import type { Proto, ReturnKind, TableInfo } from '@luaprobe/types';
import { RETURN_KIND } from '@luaprobe/types';
import { decodeArraySize, decodeHashSize, getA, getB, getOpcode } from '../bytecode/instruction.js';
import { OP, writesRegisterA } from '../bytecode/opcodes.js';
import { RETURN_SCAN_HORIZON, findTableOrigin, scanLimit } from './provenance.js';

export interface ReturnSite {
  kind: ReturnKind;
  /** pc of the matched NEWTABLE when kind is TABLE, otherwise -1 */
  tablePc: number;
}

/** Fixed table header cost used in size estimates */
export const TABLE_BASE_BYTES = 32;
export const ARRAY_SLOT_BYTES = 16;
export const HASH_SLOT_BYTES = 32;

export function estimateTableBytes(arraySize: number, hashSize: number): number {
  return TABLE_BASE_BYTES + arraySize * ARRAY_SLOT_BYTES + hashSize * HASH_SLOT_BYTES;
}

export function emptyTableInfo(): TableInfo {
  return { arraySize: 0, hashSize: 0, estimatedBytes: 0, containsClosures: false };
}

/**
 * Classify what the return instruction at `pc` hands back.
 */
export function classifyReturn(proto: Proto, pc: number): ReturnSite {
  const ins = proto.code[pc];
  const op = getOpcode(ins);

  if (op === OP.RETURN0) return site(RETURN_KIND.VOID);
  if (op === OP.RETURN1) return classifySingleValue(proto, pc, getA(ins));

  // RETURN: B is value count + 1, 0 means "up to the stack top"
  const b = getB(ins);
  if (b === 1) return site(RETURN_KIND.VOID);
  if (b === 2) return classifySingleValue(proto, pc, getA(ins));
  return site(RETURN_KIND.MULTI);
}

function classifySingleValue(proto: Proto, pc: number, reg: number): ReturnSite {
  const tablePc = findTableOrigin(proto, pc, reg);
  if (tablePc >= 0) return { kind: RETURN_KIND.TABLE, tablePc };

  const limit = scanLimit(pc, RETURN_SCAN_HORIZON);
  for (let i = pc - 1; i >= limit; i--) {
    const prev = proto.code[i];
    if (getA(prev) !== reg) continue;

    const op = getOpcode(prev);
    if (!writesRegisterA(op)) continue;

    return site(kindOfWriter(op));
  }

  return site(RETURN_KIND.UNKNOWN);
}

function kindOfWriter(op: number): ReturnKind {
  switch (op) {
    case OP.CALL:
    case OP.TAILCALL:
      return RETURN_KIND.CALL;
    case OP.GETUPVAL:
    case OP.GETTABUP:
    case OP.GETTABLE:
    case OP.GETFIELD:
    case OP.GETI:
      return RETURN_KIND.UPVALUE;
    case OP.LOADK:
    case OP.LOADKX:
    case OP.LOADI:
    case OP.LOADF:
    case OP.LOADTRUE:
    case OP.LOADFALSE:
      return RETURN_KIND.CONSTANT;
    default:
      // CLOSURE lands here too: a fresh function is not a terminal value kind
      return RETURN_KIND.UNKNOWN;
  }
}

function site(kind: ReturnKind): ReturnSite {
  return { kind, tablePc: -1 };
}

function isWeak(kind: ReturnKind): boolean {
  return kind === RETURN_KIND.UNKNOWN || kind === RETURN_KIND.VOID;
}

/**
 * Accumulates return sites of one function into a single verdict.
 *
 * UNKNOWN and VOID are weak and give way to any other kind. Two different
 * strong kinds make the verdict MIXED for good. VOID only replaces UNKNOWN
 * while no strong site has been seen, so a trailing RETURN0 cannot erase a
 * real verdict.
 */
export class ReturnVerdict {
  private current: ReturnKind = RETURN_KIND.UNKNOWN;
  private hadRealReturn = false;
  private table: TableInfo = emptyTableInfo();
  private lastConstructorPc = -1;

  get kind(): ReturnKind {
    return this.current;
  }

  /** Remember the most recent NEWTABLE, the fallback shape for TABLE sites */
  noteConstructor(pc: number): void {
    this.lastConstructorPc = pc;
  }

  /** The function allocates a capturing closure somewhere in its body */
  noteCapturingClosure(): void {
    this.table.containsClosures = true;
  }

  record(proto: Proto, returnSite: ReturnSite): void {
    const kind = returnSite.kind;

    if (this.current !== RETURN_KIND.MIXED) {
      const curWeak = isWeak(this.current);
      const newWeak = isWeak(kind);

      if (curWeak && !newWeak) {
        this.current = kind;
      } else if (!curWeak && !newWeak && kind !== this.current) {
        this.current = RETURN_KIND.MIXED;
      } else if (this.current === RETURN_KIND.UNKNOWN && kind === RETURN_KIND.VOID && !this.hadRealReturn) {
        this.current = RETURN_KIND.VOID;
      }
    }

    if (!isWeak(kind)) this.hadRealReturn = true;

    if (kind === RETURN_KIND.TABLE) {
      const ctorPc = returnSite.tablePc >= 0 ? returnSite.tablePc : this.lastConstructorPc;
      this.applyShape(proto, ctorPc);
    }
  }

  /** Table summary for the record; zeroed unless the verdict is TABLE */
  tableInfo(): TableInfo {
    if (this.current !== RETURN_KIND.TABLE) return emptyTableInfo();
    return { ...this.table };
  }

  private applyShape(proto: Proto, ctorPc: number): void {
    if (ctorPc < 0) return;

    const ctor = proto.code[ctorPc];
    const arraySize = decodeArraySize(proto.code, ctorPc);
    const hashSize = decodeHashSize(getB(ctor));

    this.table.arraySize = arraySize;
    this.table.hashSize = hashSize;
    this.table.estimatedBytes = estimateTableBytes(arraySize, hashSize);
  }
}
