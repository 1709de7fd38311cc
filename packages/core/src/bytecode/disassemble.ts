/**
 * Disassembly listing, in the spirit of `luac -l`.
 *
 *   function <@main.lua:0,0> (4 instructions)
 *   	1	[1]	VARARGPREP	0 0 0
 *   	2	[1]	CLOSURE   	0 0	; function <1>
 *   	3	[1]	SETTABUP  	0 0 0	; _ENV "onReady"
 *   	4	[1]	RETURN    	0 1 1
 *
 * Functions are listed in pre-order, the same numbering the report uses.
 */

import type { LuaConstant, Proto } from '@luaprobe/types';
import { formatFloat } from '../report/serialize.js';
import {
  getA,
  getAx,
  getB,
  getBx,
  getC,
  getK,
  getOpcode,
  getSBx,
  getSJ,
} from './instruction.js';
import { getInstructionLine } from './lineInfo.js';
import { OP, opFormat, opName } from './opcodes.js';

const NAME_WIDTH = 10;

export function disassemble(proto: Proto): string {
  const lines: string[] = [];
  const visit = (fn: Proto): void => {
    listFunction(fn, lines);
    for (const child of fn.protos) visit(child);
  };
  visit(proto);
  return lines.join('\n') + '\n';
}

function listFunction(proto: Proto, lines: string[]): void {
  const count = proto.code.length;
  const source = proto.source ?? '?';
  lines.push(
    `function <${source}:${proto.lineDefined},${proto.lastLineDefined}> (${count} instruction${count === 1 ? '' : 's'})`
  );

  proto.code.forEach((ins, pc) => {
    const line = getInstructionLine(proto, pc);
    const name = opName(getOpcode(ins)).padEnd(NAME_WIDTH);
    const notes = describe(proto, pc);
    const text = `\t${pc + 1}\t[${line}]\t${name}\t${formatOperands(ins)}`;
    lines.push(notes ? `${text}\t; ${notes}` : text);
  });
}

export function formatOperands(ins: number): string {
  switch (opFormat(getOpcode(ins))) {
    case 'iABx':
      return `${getA(ins)} ${getBx(ins)}`;
    case 'iAsBx':
      return `${getA(ins)} ${getSBx(ins)}`;
    case 'iAx':
      return `${getAx(ins)}`;
    case 'isJ':
      return `${getSJ(ins)}`;
    case 'iABC':
      return `${getA(ins)} ${getB(ins)} ${getC(ins)}${getK(ins) ? 'k' : ''}`;
  }
}

export function formatConstant(k: LuaConstant | undefined): string {
  if (k === undefined) return '?';

  switch (k.type) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return String(k.value);
    case 'integer':
      return k.value.toString();
    case 'float':
      return formatFloat(k.value);
    case 'string':
      return JSON.stringify(k.value);
  }
}

function upvalueLabel(proto: Proto, index: number): string {
  return proto.upvalues[index]?.name ?? '-';
}

/**
 * Trailing comment: constants, upvalue names, jump targets, closures.
 */
function describe(proto: Proto, pc: number): string {
  const ins = proto.code[pc];
  const K = (index: number): string => formatConstant(proto.constants[index]);

  switch (getOpcode(ins)) {
    case OP.LOADK:
      return K(getBx(ins));
    case OP.GETUPVAL:
    case OP.SETUPVAL:
      return upvalueLabel(proto, getB(ins));
    case OP.GETTABUP:
      return `${upvalueLabel(proto, getB(ins))} ${K(getC(ins))}`;
    case OP.SETTABUP:
      return `${upvalueLabel(proto, getA(ins))} ${K(getB(ins))}${getK(ins) ? ` ${K(getC(ins))}` : ''}`;
    case OP.GETFIELD:
      return K(getC(ins));
    case OP.SELF:
      // without k the key is in R[C]
      return getK(ins) ? K(getC(ins)) : '';
    case OP.SETFIELD:
      return `${K(getB(ins))}${getK(ins) ? ` ${K(getC(ins))}` : ''}`;
    case OP.JMP:
      return `to ${pc + getSJ(ins) + 2}`;
    case OP.CLOSURE: {
      const child = proto.protos[getBx(ins)];
      return child ? `function <${child.lineDefined}>` : 'function <?>';
    }
    default:
      return '';
  }
}
