/**
 * Register provenance - bounded backward scans answering
 * "what last wrote register R before program point P".
 */

import type { Proto } from '@luaprobe/types';
import { getA, getOpcode } from '../bytecode/instruction.js';
import { OP, mutatesTableA, writesRegisterA } from '../bytecode/opcodes.js';

/** Lookback used when staging global assignments and resolving field sources */
export const SOURCE_SCAN_HORIZON = 16;
/** Lookback used when classifying a single returned value */
export const RETURN_SCAN_HORIZON = 24;
/** Lookback used when resolving a callee register */
export const CALL_SCAN_HORIZON = 32;

export type RegisterSource =
  | { kind: 'closure'; pc: number }
  | { kind: 'other'; pc: number }
  | { kind: 'indeterminate' };

/**
 * Lowest pc a scan starting at `pc` may visit.
 */
export function scanLimit(pc: number, horizon: number): number {
  return Math.max(0, pc - horizon);
}

/**
 * Find the nearest writer of `reg` before `pc`, looking back at most
 * `horizon` instructions.
 */
export function findRegisterSource(
  proto: Proto,
  pc: number,
  reg: number,
  horizon = SOURCE_SCAN_HORIZON
): RegisterSource {
  const code = proto.code;
  const limit = scanLimit(pc, horizon);

  for (let i = pc - 1; i >= limit; i--) {
    const ins = code[i];
    if (getA(ins) !== reg) continue;

    const op = getOpcode(ins);
    if (op === OP.CLOSURE) return { kind: 'closure', pc: i };
    if (writesRegisterA(op)) return { kind: 'other', pc: i };
  }

  return { kind: 'indeterminate' };
}

/**
 * Find the NEWTABLE that produced the table held in `reg` at `pc`.
 *
 * Field/index/list stores into `reg` keep the same table and are skipped;
 * any other write means the register was reassigned. Unbounded: scans to
 * the start of the function.
 *
 * @returns pc of the constructor, or -1
 */
export function findTableOrigin(proto: Proto, pc: number, reg: number): number {
  const code = proto.code;

  for (let i = pc - 1; i >= 0; i--) {
    const ins = code[i];
    if (getA(ins) !== reg) continue;

    const op = getOpcode(ins);
    if (op === OP.NEWTABLE) return i;
    if (mutatesTableA(op)) continue;
    if (writesRegisterA(op)) return -1;
  }

  return -1;
}
