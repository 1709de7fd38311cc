/**
 * Test helpers for building prototypes in-process.
 *
 * Instruction words come from the encoders in @luaprobe/core, so fixtures
 * read like a `luac -l` listing:
 *
 *   proto({ code: [ABC(OP.GETTABUP, 0, 0, 0), ABC(OP.CALL, 0, 1, 1)] })
 */

import type { LuaConstant, Proto, UpvalueDesc } from '@luaprobe/types';
import { encodeABC, encodeABx, encodeAsBx, encodeAx, encodeSJ } from '@luaprobe/core';

export { OP } from '@luaprobe/core';

export const ABC = encodeABC;
export const ABx = encodeABx;
export const AsBx = encodeAsBx;
export const Ax = encodeAx;
export const sJ = encodeSJ;

/** Writable version of Proto for fixtures */
export type ProtoInit = Partial<{ -readonly [K in keyof Proto]: Proto[K] }>;

export function proto(init: ProtoInit = {}): Proto {
  return {
    source: '@test.lua',
    lineDefined: 0,
    lastLineDefined: 0,
    numParams: 0,
    isVararg: false,
    maxStackSize: 2,
    code: [],
    constants: [],
    upvalues: [],
    protos: [],
    lineInfo: [],
    absLineInfo: [],
    locVars: [],
    ...init,
  };
}

/** Main-chunk shape: vararg, one `_ENV` upvalue */
export function mainProto(init: ProtoInit = {}): Proto {
  return proto({ isVararg: true, upvalues: [env()], ...init });
}

export function env(inStack = true): UpvalueDesc {
  return upvalue('_ENV', inStack, 0);
}

export function upvalue(name: string | null, inStack = false, index = 0): UpvalueDesc {
  return { name, inStack, index, kind: 0 };
}

export function str(value: string): LuaConstant {
  return { type: 'string', value };
}

export function int(value: bigint): LuaConstant {
  return { type: 'integer', value };
}

export function flt(value: number): LuaConstant {
  return { type: 'float', value };
}

export function bool(value: boolean): LuaConstant {
  return { type: 'boolean', value };
}

export const nil: LuaConstant = { type: 'nil' };

/** Local variable entries naming the parameters */
export function params(...names: string[]): Proto['locVars'] {
  return names.map((varName) => ({ varName, startPc: 0, endPc: 1 }));
}
