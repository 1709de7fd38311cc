/**
 * Lua 5.4 opcode table
 *
 * Numbering matches lopcodes.h of the stock 5.4 virtual machine; the values
 * are read straight out of instruction words, so order matters.
 */

export const OP = {
  MOVE: 0,
  LOADI: 1,
  LOADF: 2,
  LOADK: 3,
  LOADKX: 4,
  LOADFALSE: 5,
  LFALSESKIP: 6,
  LOADTRUE: 7,
  LOADNIL: 8,
  GETUPVAL: 9,
  SETUPVAL: 10,
  GETTABUP: 11,
  GETTABLE: 12,
  GETI: 13,
  GETFIELD: 14,
  SETTABUP: 15,
  SETTABLE: 16,
  SETI: 17,
  SETFIELD: 18,
  NEWTABLE: 19,
  SELF: 20,
  ADDI: 21,
  ADDK: 22,
  SUBK: 23,
  MULK: 24,
  MODK: 25,
  POWK: 26,
  DIVK: 27,
  IDIVK: 28,
  BANDK: 29,
  BORK: 30,
  BXORK: 31,
  SHRI: 32,
  SHLI: 33,
  ADD: 34,
  SUB: 35,
  MUL: 36,
  MOD: 37,
  POW: 38,
  DIV: 39,
  IDIV: 40,
  BAND: 41,
  BOR: 42,
  BXOR: 43,
  SHL: 44,
  SHR: 45,
  MMBIN: 46,
  MMBINI: 47,
  MMBINK: 48,
  UNM: 49,
  BNOT: 50,
  NOT: 51,
  LEN: 52,
  CONCAT: 53,
  CLOSE: 54,
  TBC: 55,
  JMP: 56,
  EQ: 57,
  LT: 58,
  LE: 59,
  EQK: 60,
  EQI: 61,
  LTI: 62,
  LEI: 63,
  GTI: 64,
  GEI: 65,
  TEST: 66,
  TESTSET: 67,
  CALL: 68,
  TAILCALL: 69,
  RETURN: 70,
  RETURN0: 71,
  RETURN1: 72,
  FORLOOP: 73,
  FORPREP: 74,
  TFORPREP: 75,
  TFORCALL: 76,
  TFORLOOP: 77,
  SETLIST: 78,
  CLOSURE: 79,
  VARARG: 80,
  VARARGPREP: 81,
  EXTRAARG: 82,
} as const;

export type OpName = keyof typeof OP;
export type OpCode = typeof OP[OpName];

export const NUM_OPCODES = 83;

const opcodeNames: string[] = [];
for (const [name, code] of Object.entries(OP)) opcodeNames[code] = name;

export const OPCODE_NAMES: readonly string[] = opcodeNames;

/**
 * Operand layout of an instruction word.
 */
export type OpFormat = 'iABC' | 'iABx' | 'iAsBx' | 'iAx' | 'isJ';

const FORMAT_OVERRIDES: Partial<Record<number, OpFormat>> = {
  [OP.LOADI]: 'iAsBx',
  [OP.LOADF]: 'iAsBx',
  [OP.LOADK]: 'iABx',
  [OP.LOADKX]: 'iABx',
  [OP.CLOSURE]: 'iABx',
  [OP.FORLOOP]: 'iABx',
  [OP.FORPREP]: 'iABx',
  [OP.TFORPREP]: 'iABx',
  [OP.TFORLOOP]: 'iABx',
  [OP.JMP]: 'isJ',
  [OP.EXTRAARG]: 'iAx',
};

export function opFormat(op: number): OpFormat {
  return FORMAT_OVERRIDES[op] ?? 'iABC';
}

export function isValidOpcode(op: number): op is OpCode {
  return Number.isInteger(op) && op >= 0 && op < NUM_OPCODES;
}

export function opName(op: number): string {
  return OPCODE_NAMES[op] ?? `OP_${op}`;
}

/**
 * Opcodes that assign R[A].
 *
 * Multi-register writers (LOADNIL, CALL results, VARARG) are listed by their
 * first register only; the backward scans never look past R[A].
 */
const REGISTER_WRITERS: ReadonlySet<number> = new Set<number>([
  OP.MOVE, OP.LOADI, OP.LOADF, OP.LOADK, OP.LOADKX, OP.LOADFALSE,
  OP.LFALSESKIP, OP.LOADTRUE, OP.LOADNIL,
  OP.GETUPVAL, OP.GETTABUP, OP.GETTABLE, OP.GETI, OP.GETFIELD,
  OP.NEWTABLE, OP.SELF,
  OP.ADDI, OP.ADDK, OP.SUBK, OP.MULK, OP.MODK, OP.POWK, OP.DIVK, OP.IDIVK,
  OP.BANDK, OP.BORK, OP.BXORK, OP.SHRI, OP.SHLI,
  OP.ADD, OP.SUB, OP.MUL, OP.DIV, OP.IDIV, OP.MOD, OP.POW,
  OP.BAND, OP.BOR, OP.BXOR, OP.SHL, OP.SHR,
  OP.MMBIN, OP.MMBINI, OP.MMBINK,
  OP.UNM, OP.BNOT, OP.NOT, OP.LEN, OP.CONCAT,
  OP.CALL, OP.TAILCALL,
  OP.CLOSURE, OP.VARARG,
]);

export function writesRegisterA(op: number): boolean {
  return REGISTER_WRITERS.has(op);
}

/**
 * Table mutations that name the table in A without reassigning it.
 */
const TABLE_MUTATIONS: ReadonlySet<number> = new Set<number>([
  OP.SETFIELD, OP.SETTABLE, OP.SETI, OP.SETLIST,
]);

export function mutatesTableA(op: number): boolean {
  return TABLE_MUTATIONS.has(op);
}

export function isReturn(op: number): boolean {
  return op === OP.RETURN || op === OP.RETURN0 || op === OP.RETURN1;
}

export function isCall(op: number): boolean {
  return op === OP.CALL || op === OP.TAILCALL;
}
