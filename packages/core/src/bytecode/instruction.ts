/**
 * Instruction decoding for Lua 5.4 32-bit instruction words
 *
 *   iABC   C(8) | B(8) | k(1) | A(8) | Op(7)
 *   iABx        Bx(17)      | A(8) | Op(7)
 *   iAsBx      sBx(17)      | A(8) | Op(7)
 *   iAx             Ax(25)         | Op(7)
 *   isJ             sJ(25)         | Op(7)
 */

import { OP } from './opcodes.js';

const POS_A = 7;
const POS_K = 15;
const POS_B = 16;
const POS_C = 24;
const POS_BX = POS_K;
const POS_AX = POS_A;

const MASK_OP = 0x7f;
const MASK_8 = 0xff;
const MASK_BX = 0x1ffff;
const MASK_AX = 0x1ffffff;

export const OFFSET_SBX = MASK_BX >>> 1;
export const OFFSET_SJ = MASK_AX >>> 1;
export const OFFSET_SC = MASK_8 >>> 1;

export function getOpcode(i: number): number {
  return i & MASK_OP;
}

export function getA(i: number): number {
  return (i >>> POS_A) & MASK_8;
}

export function getK(i: number): boolean {
  return ((i >>> POS_K) & 1) === 1;
}

export function getB(i: number): number {
  return (i >>> POS_B) & MASK_8;
}

export function getC(i: number): number {
  return (i >>> POS_C) & MASK_8;
}

/** Signed C, used by the immediate arithmetic (ADDI, SHRI, ...) */
export function getSC(i: number): number {
  return getC(i) - OFFSET_SC;
}

export function getBx(i: number): number {
  return (i >>> POS_BX) & MASK_BX;
}

export function getSBx(i: number): number {
  return getBx(i) - OFFSET_SBX;
}

export function getAx(i: number): number {
  return (i >>> POS_AX) & MASK_AX;
}

export function getSJ(i: number): number {
  return getAx(i) - OFFSET_SJ;
}

export function encodeABC(op: number, a: number, b: number, c: number, k = false): number {
  return (
    ((c & MASK_8) << POS_C)
    | ((b & MASK_8) << POS_B)
    | ((k ? 1 : 0) << POS_K)
    | ((a & MASK_8) << POS_A)
    | (op & MASK_OP)
  ) >>> 0;
}

export function encodeABx(op: number, a: number, bx: number): number {
  return (((bx & MASK_BX) << POS_BX) | ((a & MASK_8) << POS_A) | (op & MASK_OP)) >>> 0;
}

export function encodeAsBx(op: number, a: number, sbx: number): number {
  return encodeABx(op, a, sbx + OFFSET_SBX);
}

export function encodeAx(op: number, ax: number): number {
  return (((ax & MASK_AX) << POS_AX) | (op & MASK_OP)) >>> 0;
}

export function encodeSJ(op: number, sj: number): number {
  return encodeAx(op, sj + OFFSET_SJ);
}

/**
 * Hash part size of a NEWTABLE: B is log2(size) + 1, or 0 for no hash part.
 */
export function decodeHashSize(b: number): number {
  return b === 0 ? 0 : 1 << (b - 1);
}

/**
 * Array part size of the NEWTABLE at `pc`.
 *
 * With k set, C only holds the low 8 bits and the rest lives in the
 * EXTRAARG that must follow. A missing EXTRAARG falls back to C.
 */
export function decodeArraySize(code: readonly number[], pc: number): number {
  const instr = code[pc];
  const c = getC(instr);

  if (!getK(instr)) return c;

  if (pc + 1 < code.length) {
    const extra = code[pc + 1];
    if (getOpcode(extra) === OP.EXTRAARG) {
      return getAx(extra) * 256 + c;
    }
  }
  return c;
}
