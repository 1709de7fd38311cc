/**
 * Register provenance tests
 *
 * Nearest-writer scans with a horizon, and the unbounded table origin scan.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { findRegisterSource, findTableOrigin, scanLimit, SOURCE_SCAN_HORIZON } from '@luaprobe/core';
import { proto, ABC, ABx, AsBx, Ax, OP } from '../../helpers/protoBuilder.js';

/** `count` writes to a register nobody asks about */
function filler(count: number): number[] {
  return Array.from({ length: count }, () => AsBx(OP.LOADI, 5, 0));
}

describe('findRegisterSource', () => {
  it('should find a closure written to the register', () => {
    const p = proto({
      code: [ABx(OP.CLOSURE, 0, 0), ABC(OP.SETTABUP, 0, 0, 0)],
    });

    assert.deepStrictEqual(findRegisterSource(p, 1, 0), { kind: 'closure', pc: 0 });
  });

  it('should report other writers', () => {
    const p = proto({
      code: [ABx(OP.CLOSURE, 0, 0), ABC(OP.MOVE, 0, 1, 0), ABC(OP.SETTABUP, 0, 0, 0)],
    });

    assert.deepStrictEqual(findRegisterSource(p, 2, 0), { kind: 'other', pc: 1 });
  });

  it('should skip instructions that name the register without writing it', () => {
    const p = proto({
      code: [ABx(OP.CLOSURE, 0, 0), ABC(OP.SETFIELD, 0, 0, 0), ABC(OP.SETTABUP, 0, 0, 0)],
    });

    assert.deepStrictEqual(findRegisterSource(p, 2, 0), { kind: 'closure', pc: 0 });
  });

  it('should stop at the horizon', () => {
    const within = proto({
      code: [ABx(OP.CLOSURE, 0, 0), ...filler(SOURCE_SCAN_HORIZON - 1), ABC(OP.SETTABUP, 0, 0, 0)],
    });
    const beyond = proto({
      code: [ABx(OP.CLOSURE, 0, 0), ...filler(SOURCE_SCAN_HORIZON), ABC(OP.SETTABUP, 0, 0, 0)],
    });

    assert.deepStrictEqual(findRegisterSource(within, SOURCE_SCAN_HORIZON, 0), { kind: 'closure', pc: 0 });
    assert.deepStrictEqual(findRegisterSource(beyond, SOURCE_SCAN_HORIZON + 1, 0), { kind: 'indeterminate' });
  });

  it('should be indeterminate at the start of the function', () => {
    const p = proto({ code: [ABC(OP.SETTABUP, 0, 0, 0)] });
    assert.deepStrictEqual(findRegisterSource(p, 0, 0), { kind: 'indeterminate' });
  });

  it('should clamp the scan limit at 0', () => {
    assert.strictEqual(scanLimit(3, 16), 0);
    assert.strictEqual(scanLimit(40, 16), 24);
  });
});

describe('findTableOrigin', () => {
  it('should see through stores into the table', () => {
    const p = proto({
      code: [
        ABC(OP.NEWTABLE, 0, 0, 3),
        Ax(OP.EXTRAARG, 0),
        AsBx(OP.LOADI, 1, 1),
        ABC(OP.SETFIELD, 0, 0, 1),
        ABC(OP.SETI, 0, 1, 1),
        ABC(OP.SETLIST, 0, 1, 0),
        ABC(OP.RETURN1, 0, 0, 0),
      ],
    });

    assert.strictEqual(findTableOrigin(p, 6, 0), 0);
  });

  it('should give up when the register is reassigned', () => {
    const p = proto({
      code: [ABC(OP.NEWTABLE, 0, 0, 0), Ax(OP.EXTRAARG, 0), ABC(OP.MOVE, 0, 1, 0), ABC(OP.RETURN1, 0, 0, 0)],
    });

    assert.strictEqual(findTableOrigin(p, 3, 0), -1);
  });

  it('should scan past any horizon', () => {
    const p = proto({
      code: [ABC(OP.NEWTABLE, 0, 0, 0), Ax(OP.EXTRAARG, 0), ...filler(40), ABC(OP.RETURN1, 0, 0, 0)],
    });

    assert.strictEqual(findTableOrigin(p, 42, 0), 0);
  });

  it('should return -1 without a constructor', () => {
    const p = proto({ code: [ABC(OP.RETURN1, 0, 0, 0)] });
    assert.strictEqual(findTableOrigin(p, 0, 0), -1);
  });
});
