/**
 * Call-site resolution: recover a readable callee name for CALL/TAILCALL by
 * walking back to the instruction that loaded the callee register.
 *
 * Recognized load patterns:
 *   GETTABUP  upvalue 0, K[C] string   -> GLOBAL  "name"
 *   GETTABUP  upvalue n, K[C] string   -> FIELD   "upvalue.name"
 *   GETFIELD  R[B], K[C] string        -> FIELD   "source.name"
 *   SELF      R[B], K[C] string        -> METHOD  "name"
 *   MOVE / GETUPVAL / CLOSURE          -> LOCAL
 *   anything else                      -> UNKNOWN
 */

import type { CallKind, CallSite, Proto } from '@luaprobe/types';
import { CALL_KIND, VARIABLE_ARG_COUNT } from '@luaprobe/types';
import { getA, getB, getC, getK, getOpcode } from '../bytecode/instruction.js';
import { getInstructionLine } from '../bytecode/lineInfo.js';
import { OP, writesRegisterA } from '../bytecode/opcodes.js';
import { CALL_SCAN_HORIZON, SOURCE_SCAN_HORIZON, scanLimit } from './provenance.js';

/** Stand-in for a name that could not be recovered */
export const UNNAMED = '?';

export interface ResolvedCallee {
  kind: CallKind;
  /** null when the callee has no recoverable name */
  name: string | null;
}

const UNRESOLVED: ResolvedCallee = { kind: CALL_KIND.UNKNOWN, name: null };

/**
 * String constant at `index`, or null when out of range or not a string.
 */
export function stringConstant(proto: Proto, index: number): string | null {
  const k = proto.constants[index];
  return k !== undefined && k.type === 'string' ? k.value : null;
}

export function upvalueName(proto: Proto, index: number): string | null {
  return proto.upvalues[index]?.name ?? null;
}

/**
 * Build the call-site record for the CALL/TAILCALL at `pc`.
 */
export function analyzeCallSite(proto: Proto, pc: number): CallSite {
  const ins = proto.code[pc];
  const b = getB(ins);
  const callee = resolveCallee(proto, pc, getA(ins));

  return {
    line: getInstructionLine(proto, pc),
    kind: callee.kind,
    callee: callee.name ?? '',
    argCount: b === 0 ? VARIABLE_ARG_COUNT : b - 1,
    isTail: getOpcode(ins) === OP.TAILCALL,
  };
}

export function resolveCallee(proto: Proto, callPc: number, calleeReg: number): ResolvedCallee {
  const code = proto.code;
  const limit = scanLimit(callPc, CALL_SCAN_HORIZON);

  for (let i = callPc - 1; i >= limit; i--) {
    const ins = code[i];
    if (getA(ins) !== calleeReg) continue;

    const op = getOpcode(ins);
    if (!writesRegisterA(op)) continue;

    switch (op) {
      case OP.GETTABUP: {
        const field = stringConstant(proto, getC(ins));
        if (field === null) return UNRESOLVED;

        const upv = getB(ins);
        if (upv === 0) return { kind: CALL_KIND.GLOBAL, name: field };

        return { kind: CALL_KIND.FIELD, name: `${upvalueName(proto, upv) ?? UNNAMED}.${field}` };
      }

      case OP.GETFIELD: {
        const field = stringConstant(proto, getC(ins));
        if (field === null) return UNRESOLVED;

        return { kind: CALL_KIND.FIELD, name: `${resolveFieldSource(proto, i, getB(ins))}.${field}` };
      }

      case OP.SELF: {
        if (!getK(ins)) return UNRESOLVED;

        const method = stringConstant(proto, getC(ins));
        if (method === null) return UNRESOLVED;

        return { kind: CALL_KIND.METHOD, name: method };
      }

      case OP.MOVE:
      case OP.GETUPVAL:
      case OP.CLOSURE:
        return { kind: CALL_KIND.LOCAL, name: null };

      default:
        return UNRESOLVED;
    }
  }

  return UNRESOLVED;
}

/**
 * Name of the table a GETFIELD at `fieldPc` reads from: the key of the
 * GETTABUP that loaded `srcReg`, when one is found before the register is
 * overwritten.
 */
function resolveFieldSource(proto: Proto, fieldPc: number, srcReg: number): string {
  const limit = scanLimit(fieldPc, SOURCE_SCAN_HORIZON);

  for (let j = fieldPc - 1; j >= limit; j--) {
    const prev = proto.code[j];
    if (getA(prev) !== srcReg) continue;

    const op = getOpcode(prev);
    if (op === OP.GETTABUP) return stringConstant(proto, getC(prev)) ?? UNNAMED;
    if (writesRegisterA(op)) return UNNAMED;
  }

  return UNNAMED;
}
