/**
 * Disassembly listing tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { disassemble, formatConstant, formatOperands } from '@luaprobe/core';
import { proto, mainProto, str, int, flt, bool, nil, ABC, ABx, AsBx, sJ, OP } from '../../helpers/protoBuilder.js';

describe('disassemble', () => {
  it('should list every function in pre-order', () => {
    const listing = disassemble(mainProto({
      code: [
        ABC(OP.VARARGPREP, 0, 0, 0),
        ABx(OP.CLOSURE, 0, 0),
        ABC(OP.SETTABUP, 0, 0, 0),
        ABC(OP.RETURN, 0, 1, 1),
      ],
      constants: [str('onReady')],
      lineInfo: [1, 0, 0, 0],
      protos: [proto({ lineDefined: 1, lastLineDefined: 1, code: [ABC(OP.RETURN0, 0, 0, 0)] })],
    }));

    assert.strictEqual(listing, [
      'function <@test.lua:0,0> (4 instructions)',
      '\t1\t[1]\tVARARGPREP\t0 0 0',
      '\t2\t[1]\tCLOSURE   \t0 0\t; function <1>',
      '\t3\t[1]\tSETTABUP  \t0 0 0\t; _ENV "onReady"',
      '\t4\t[1]\tRETURN    \t0 1 1',
      'function <@test.lua:1,1> (1 instruction)',
      '\t1\t[0]\tRETURN0   \t0 0 0',
      '',
    ].join('\n'));
  });

  it('should annotate jumps and constant loads', () => {
    const listing = disassemble(proto({
      code: [sJ(OP.JMP, 1), ABx(OP.LOADK, 0, 0), ABC(OP.RETURN1, 0, 0, 0)],
      constants: [str('x')],
    }));
    const lines = listing.split('\n');

    assert.strictEqual(lines[1], '\t1\t[0]\tJMP       \t1\t; to 3');
    assert.strictEqual(lines[2], '\t2\t[0]\tLOADK     \t0 0\t; "x"');
  });

  it('should annotate SELF keys only when they are constants', () => {
    const listing = disassemble(proto({
      code: [ABC(OP.SELF, 0, 1, 0, true), ABC(OP.SELF, 0, 1, 0), ABC(OP.RETURN0, 0, 0, 0)],
      constants: [str('method')],
    }));
    const lines = listing.split('\n');

    assert.strictEqual(lines[1], '\t1\t[0]\tSELF      \t0 1 0k\t; "method"');
    assert.strictEqual(lines[2], '\t2\t[0]\tSELF      \t0 1 0');
  });
});

describe('formatOperands', () => {
  it('should follow the operand format', () => {
    assert.strictEqual(formatOperands(ABC(OP.SETFIELD, 1, 0, 2, true)), '1 0 2k');
    assert.strictEqual(formatOperands(AsBx(OP.LOADI, 1, -4)), '1 -4');
    assert.strictEqual(formatOperands(sJ(OP.JMP, -2)), '-2');
  });
});

describe('formatConstant', () => {
  it('should render every constant type', () => {
    assert.deepStrictEqual(
      [str('a\tb'), int(-7n), flt(1), bool(false), nil, undefined].map(formatConstant),
      ['"a\\tb"', '-7', '1.0', 'false', 'nil', '?']
    );
  });
});
