/**
 * Report serialization - the snake_case wire document and its JSON text
 *
 * Every field is always present and emitted in a fixed order, so the same
 * report always serializes to the same bytes. Integers in the constant pool
 * are 64-bit and printed from the bigint; floats always carry a decimal
 * point so consumers can tell them from integers.
 */

import type {
  CallSite,
  ConstantEntry,
  FunctionRecord,
  GlobalEntry,
  InterfaceReport,
} from '@luaprobe/types';

// === DOCUMENT TYPES ===

export interface TableInfoDocument {
  array_size: number;
  hash_size: number;
  estimated_bytes: number;
  contains_closures: boolean;
}

export interface ClosureDocument {
  line_defined: number;
  upvalue_count: number;
}

export interface ConstantDocument {
  kind: number;
  s_val: string | null;
  i_val: bigint;
  f_val: number;
  b_val: boolean;
}

export interface CallSiteDocument {
  line: number;
  kind: number;
  callee: string;
  arg_count: number;
  is_tail: boolean;
}

export interface FieldReadDocument {
  table_name: string;
  field_name: string;
}

export interface FunctionDocument {
  source: string;
  line_defined: number;
  last_line: number;
  param_count: number;
  is_vararg: boolean;
  is_vararg_used: boolean;
  is_method: boolean;
  param_names: string[];
  upvalue_names: string[];
  return_kind: number;
  table_info: TableInfoDocument;
  closures: ClosureDocument[];
  constants: ConstantDocument[];
  child_proto_indices: number[];
  call_sites: CallSiteDocument[];
  reads: FieldReadDocument[];
}

export interface GlobalDocument {
  name: string;
  is_function: boolean;
  function_index: number;
}

export interface ReportDocument {
  lua_version: string;
  functions: FunctionDocument[];
  globals: GlobalDocument[];
}

// === DOCUMENT CONVERSION ===

export function reportToDocument(report: InterfaceReport): ReportDocument {
  return {
    lua_version: report.luaVersion,
    functions: report.functions.map(functionToDocument),
    globals: report.globals.map(globalToDocument),
  };
}

function functionToDocument(fn: FunctionRecord): FunctionDocument {
  return {
    source: fn.source,
    line_defined: fn.lineDefined,
    last_line: fn.lastLine,
    param_count: fn.paramCount,
    is_vararg: fn.isVararg,
    is_vararg_used: fn.isVarargUsed,
    is_method: fn.isMethod,
    param_names: [...fn.paramNames],
    upvalue_names: [...fn.upvalueNames],
    return_kind: fn.returnKind,
    table_info: {
      array_size: fn.tableInfo.arraySize,
      hash_size: fn.tableInfo.hashSize,
      estimated_bytes: fn.tableInfo.estimatedBytes,
      contains_closures: fn.tableInfo.containsClosures,
    },
    closures: fn.closures.map((c) => ({ line_defined: c.lineDefined, upvalue_count: c.upvalueCount })),
    constants: fn.constants.map(constantToDocument),
    child_proto_indices: [...fn.childProtoIndices],
    call_sites: fn.callSites.map(callSiteToDocument),
    reads: fn.reads.map((r) => ({ table_name: r.tableName, field_name: r.fieldName })),
  };
}

function constantToDocument(k: ConstantEntry): ConstantDocument {
  return { kind: k.kind, s_val: k.sVal, i_val: k.iVal, f_val: k.fVal, b_val: k.bVal };
}

function callSiteToDocument(site: CallSite): CallSiteDocument {
  return {
    line: site.line,
    kind: site.kind,
    callee: site.callee,
    arg_count: site.argCount,
    is_tail: site.isTail,
  };
}

function globalToDocument(g: GlobalEntry): GlobalDocument {
  return { name: g.name, is_function: g.isFunction, function_index: g.functionIndex };
}

// === JSON TEXT ===

export interface SerializeOptions {
  /** Spaces per nesting level; 0 for compact output. Default 2. */
  indent?: number;
}

export const DEFAULT_INDENT = 2;

/** A number already rendered to its JSON text */
class JsonLiteral {
  constructor(readonly text: string) {}
}

type JsonValue = null | boolean | number | string | JsonLiteral | JsonValue[] | JsonObject;
interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * JSON text for a float: integral values get a trailing `.0`, non-finite
 * values use the strings "NaN", "Infinity" and "-Infinity".
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return '"NaN"';
  if (value === Infinity) return '"Infinity"';
  if (value === -Infinity) return '"-Infinity"';

  if (Object.is(value, -0)) return '-0.0';

  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

export function serializeReport(report: InterfaceReport, options: SerializeOptions = {}): string {
  const indent = options.indent ?? DEFAULT_INDENT;
  if (!Number.isInteger(indent) || indent < 0) {
    throw new RangeError(`indent must be a non-negative integer, got ${indent}`);
  }

  const doc = reportToDocument(report);
  return render(toJsonValue(doc), indent, 0);
}

/**
 * The document as a renderable tree. Key order of the document objects is
 * the emission order.
 */
function toJsonValue(doc: ReportDocument): JsonValue {
  return {
    lua_version: doc.lua_version,
    functions: doc.functions.map((fn): JsonObject => ({
      source: fn.source,
      line_defined: fn.line_defined,
      last_line: fn.last_line,
      param_count: fn.param_count,
      is_vararg: fn.is_vararg,
      is_vararg_used: fn.is_vararg_used,
      is_method: fn.is_method,
      param_names: fn.param_names,
      upvalue_names: fn.upvalue_names,
      return_kind: fn.return_kind,
      table_info: { ...fn.table_info },
      closures: fn.closures.map((c): JsonObject => ({ ...c })),
      constants: fn.constants.map((k): JsonObject => ({
        kind: k.kind,
        s_val: k.s_val,
        i_val: new JsonLiteral(k.i_val.toString()),
        f_val: new JsonLiteral(formatFloat(k.f_val)),
        b_val: k.b_val,
      })),
      child_proto_indices: fn.child_proto_indices,
      call_sites: fn.call_sites.map((s): JsonObject => ({ ...s })),
      reads: fn.reads.map((r): JsonObject => ({ ...r })),
    })),
    globals: doc.globals.map((g): JsonObject => ({ ...g })),
  };
}

/**
 * Layout matches JSON.stringify(value, null, indent).
 */
function render(value: JsonValue, indent: number, depth: number): string {
  if (value === null) return 'null';
  if (value instanceof JsonLiteral) return value.text;

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return String(value);
    case 'string':
      return JSON.stringify(value);
  }

  const items: string[] = Array.isArray(value)
    ? value.map((item) => render(item, indent, depth + 1))
    : Object.entries(value).map(
      ([key, item]) => `${JSON.stringify(key)}:${indent > 0 ? ' ' : ''}${render(item, indent, depth + 1)}`
    );

  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (items.length === 0) return open + close;
  if (indent === 0) return open + items.join(',') + close;

  const inner = '\n' + ' '.repeat(indent * (depth + 1));
  const outer = '\n' + ' '.repeat(indent * depth);
  return open + inner + items.join(',' + inner) + outer + close;
}
