/**
 * FunctionAnalyzer - one linear pass over a single prototype
 *
 * Produces the function's record (children not yet attached) together with
 * the global assignments found in its body, in program order. Wiring those
 * assignments to function indices needs the children's records, so that is
 * left to the ReportBuilder.
 */

import type {
  ClosureRecord,
  ConstantEntry,
  FieldRead,
  FunctionRecord,
  LuaConstant,
  Proto,
} from '@luaprobe/types';
import { CONSTANT_KIND } from '@luaprobe/types';
import { getA, getB, getBx, getC, getK, getOpcode } from '../bytecode/instruction.js';
import { OP, isCall, isReturn } from '../bytecode/opcodes.js';
import { UNNAMED, analyzeCallSite, stringConstant, upvalueName } from './calls.js';
import { SOURCE_SCAN_HORIZON, findRegisterSource } from './provenance.js';
import { ReturnVerdict, classifyReturn } from './returns.js';

/** Table name recorded for reads through the global environment */
export const ENV_NAME = '_ENV';
/** Placeholder for parameters and upvalues without debug names */
export const MISSING_NAME = '(?)';

/**
 * A nested function assigned to a global, waiting for its record index.
 */
export interface StagedClosure {
  /** Position of the child in the parent's `protos` (CLOSURE's Bx) */
  childOrdinal: number;
  lineDefined: number;
}

export interface GlobalAssignment {
  name: string;
  pc: number;
  isFunction: boolean;
  closure: StagedClosure | null;
}

export interface FunctionAnalysis {
  record: FunctionRecord;
  assignments: GlobalAssignment[];
}

export function analyzeFunction(proto: Proto): FunctionAnalysis {
  const paramNames = describeParams(proto);
  const verdict = new ReturnVerdict();
  const closures: ClosureRecord[] = [];
  const reads = new ReadSet();
  const assignments: GlobalAssignment[] = [];

  const record: FunctionRecord = {
    source: proto.source ?? UNNAMED,
    lineDefined: proto.lineDefined,
    lastLine: proto.lastLineDefined,
    paramCount: proto.numParams,
    isVararg: proto.isVararg,
    isVarargUsed: false,
    isMethod: paramNames[0] === 'self',
    paramNames,
    upvalueNames: proto.upvalues.map((upv) => upv.name ?? MISSING_NAME),
    returnKind: verdict.kind,
    tableInfo: verdict.tableInfo(),
    closures,
    constants: proto.constants.map(toConstantEntry),
    childProtoIndices: [],
    callSites: [],
    reads: reads.entries,
  };

  const code = proto.code;
  for (let pc = 0; pc < code.length; pc++) {
    const ins = code[pc];
    const op = getOpcode(ins);

    if (isReturn(op)) {
      verdict.record(proto, classifyReturn(proto, pc));
      continue;
    }

    if (isCall(op)) {
      record.callSites.push(analyzeCallSite(proto, pc));
      continue;
    }

    switch (op) {
      case OP.NEWTABLE:
        verdict.noteConstructor(pc);
        break;

      case OP.CLOSURE: {
        const child = proto.protos[getBx(ins)];
        if (child !== undefined && child.upvalues.length > 0) {
          closures.push({ lineDefined: child.lineDefined, upvalueCount: child.upvalues.length });
          verdict.noteCapturingClosure();
        }
        break;
      }

      case OP.SETTABUP: {
        const assignment = readGlobalAssignment(proto, pc);
        if (assignment) assignments.push(assignment);
        break;
      }

      case OP.VARARG:
        record.isVarargUsed = true;
        break;

      case OP.GETTABUP: {
        const field = stringConstant(proto, getC(ins));
        if (field !== null) {
          const upv = getB(ins);
          const table = upv === 0 ? ENV_NAME : upvalueName(proto, upv) ?? ENV_NAME;
          reads.add(table, field);
        }
        break;
      }

      case OP.GETFIELD: {
        const field = stringConstant(proto, getC(ins));
        if (field !== null) reads.add(UNNAMED, field);
        break;
      }
    }
  }

  record.returnKind = verdict.kind;
  record.tableInfo = verdict.tableInfo();

  return { record, assignments };
}

function describeParams(proto: Proto): string[] {
  return Array.from({ length: proto.numParams }, (_, i) => proto.locVars[i]?.varName ?? MISSING_NAME);
}

/**
 * `_ENV[K[B]] = RK(C)` through upvalue 0 with a string key.
 *
 * With k set the value is a constant and never a function; otherwise the
 * writer of R[C] decides whether a nested function is being published.
 */
function readGlobalAssignment(proto: Proto, pc: number): GlobalAssignment | null {
  const ins = proto.code[pc];
  if (getA(ins) !== 0) return null;

  const name = stringConstant(proto, getB(ins));
  if (name === null) return null;

  const assignment: GlobalAssignment = { name, pc, isFunction: false, closure: null };
  if (getK(ins)) return assignment;

  const source = findRegisterSource(proto, pc, getC(ins), SOURCE_SCAN_HORIZON);
  if (source.kind !== 'closure') return assignment;

  assignment.isFunction = true;

  const childOrdinal = getBx(proto.code[source.pc]);
  const child = proto.protos[childOrdinal];
  if (child !== undefined) {
    assignment.closure = { childOrdinal, lineDefined: child.lineDefined };
  }

  return assignment;
}

export function toConstantEntry(k: LuaConstant): ConstantEntry {
  const entry: ConstantEntry = { kind: CONSTANT_KIND.NULL, sVal: null, iVal: 0n, fVal: 0, bVal: false };

  switch (k.type) {
    case 'string':
      entry.kind = CONSTANT_KIND.STRING;
      entry.sVal = k.value;
      break;
    case 'integer':
      entry.kind = CONSTANT_KIND.INTEGER;
      entry.iVal = k.value;
      break;
    case 'float':
      entry.kind = CONSTANT_KIND.FLOAT;
      entry.fVal = k.value;
      break;
    case 'boolean':
      entry.kind = CONSTANT_KIND.BOOL;
      entry.bVal = k.value;
      break;
    case 'nil':
      break;
  }

  return entry;
}

/**
 * Field reads in first-seen order, each (table, field) pair once.
 */
class ReadSet {
  readonly entries: FieldRead[] = [];
  private readonly seen = new Set<string>();

  add(tableName: string, fieldName: string): void {
    const key = `${tableName}\u0000${fieldName}`;
    if (this.seen.has(key)) return;

    this.seen.add(key);
    this.entries.push({ tableName, fieldName });
  }
}
