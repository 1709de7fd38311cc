/**
 * Line reconstruction tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { getInstructionLine } from '@luaprobe/core';
import { proto, ABC, OP } from '../../helpers/protoBuilder.js';

const fourInstructions = [0, 1, 2, 3].map(() => ABC(OP.MOVE, 0, 0, 0));

describe('getInstructionLine', () => {
  it('should prefer absolute checkpoints', () => {
    const p = proto({
      lineDefined: 1,
      code: [...fourInstructions, ...fourInstructions],
      lineInfo: [0, 0, 0, 0, 0, 0, 0, 0],
      absLineInfo: [{ pc: 0, line: 10 }, { pc: 5, line: 20 }],
    });

    assert.strictEqual(getInstructionLine(p, 0), 10);
    assert.strictEqual(getInstructionLine(p, 3), 10);
    assert.strictEqual(getInstructionLine(p, 5), 20);
    assert.strictEqual(getInstructionLine(p, 7), 20);
  });

  it('should return 0 when no checkpoint precedes the pc', () => {
    const p = proto({ code: fourInstructions, absLineInfo: [{ pc: 2, line: 9 }] });
    assert.strictEqual(getInstructionLine(p, 1), 0);
  });

  it('should sum deltas from lineDefined without checkpoints', () => {
    const p = proto({ lineDefined: 5, code: fourInstructions, lineInfo: [1, 0, 2, -1] });

    assert.strictEqual(getInstructionLine(p, 0), 6);
    assert.strictEqual(getInstructionLine(p, 2), 8);
    assert.strictEqual(getInstructionLine(p, 3), 7);
  });

  it('should return 0 for stripped prototypes', () => {
    const p = proto({ lineDefined: 5, code: fourInstructions });
    assert.strictEqual(getInstructionLine(p, 2), 0);
  });
});
