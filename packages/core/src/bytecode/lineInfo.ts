import type { Proto } from '@luaprobe/types';

/**
 * Best-effort source line of instruction `pc`.
 *
 * Uses the absolute checkpoints when the prototype has any (last checkpoint
 * at or before `pc`), otherwise walks the per-instruction deltas from
 * `lineDefined`. Stripped prototypes yield 0.
 */
export function getInstructionLine(proto: Proto, pc: number): number {
  const abs = proto.absLineInfo;

  if (abs.length > 0) {
    let lo = 0;
    let hi = abs.length - 1;
    let best = 0;

    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (abs[mid].pc <= pc) {
        best = abs[mid].line;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return best;
  }

  if (proto.lineInfo.length > 0 && pc < proto.code.length) {
    let line = proto.lineDefined;
    const end = Math.min(pc, proto.lineInfo.length - 1);
    for (let i = 0; i <= end; i++) line += proto.lineInfo[i];
    return line;
  }

  return 0;
}
