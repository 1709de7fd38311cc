/**
 * Report Types - the interface report produced by the analyzer
 *
 * Enum values are part of the wire format and must never be renumbered.
 */

// === RETURN KINDS ===
export const RETURN_KIND = {
  UNKNOWN: 0,
  VOID: 1,
  TABLE: 2,
  /** result of a function call */
  CALL: 3,
  /** upvalue or table-field load */
  UPVALUE: 4,
  CONSTANT: 5,
  /** several values or a variable count */
  MULTI: 6,
  /** return sites disagree */
  MIXED: 7,
} as const;

export type ReturnKind = typeof RETURN_KIND[keyof typeof RETURN_KIND];

// === CONSTANT KINDS ===
export const CONSTANT_KIND = {
  STRING: 0,
  INTEGER: 1,
  FLOAT: 2,
  BOOL: 3,
  NULL: 4,
} as const;

export type ConstantKind = typeof CONSTANT_KIND[keyof typeof CONSTANT_KIND];

// === CALL KINDS ===
export const CALL_KIND = {
  /** callee could not be resolved */
  UNKNOWN: 0,
  /** _ENV.name */
  GLOBAL: 1,
  /** table.name, one level */
  FIELD: 2,
  /** obj:name */
  METHOD: 3,
  /** local register, upvalue or fresh closure */
  LOCAL: 4,
} as const;

export type CallKind = typeof CALL_KIND[keyof typeof CALL_KIND];

/** Sentinel for `CallSite.argCount` when the call passes all values up to the stack top */
export const VARIABLE_ARG_COUNT = -1;

/** Sentinel for `GlobalEntry.functionIndex` before resolution */
export const UNRESOLVED_FUNCTION_INDEX = -1;

export interface ConstantEntry {
  kind: ConstantKind;
  sVal: string | null;
  iVal: bigint;
  fVal: number;
  bVal: boolean;
}

export interface TableInfo {
  arraySize: number;
  hashSize: number;
  estimatedBytes: number;
  containsClosures: boolean;
}

export interface ClosureRecord {
  lineDefined: number;
  upvalueCount: number;
}

export interface CallSite {
  line: number;
  kind: CallKind;
  /** Reconstructed callee name, empty when unknown */
  callee: string;
  argCount: number;
  isTail: boolean;
}

export interface FieldRead {
  tableName: string;
  fieldName: string;
}

export interface FunctionRecord {
  // identity
  source: string;
  lineDefined: number;
  lastLine: number;

  // signature
  paramCount: number;
  isVararg: boolean;
  isVarargUsed: boolean;
  isMethod: boolean;
  paramNames: string[];
  upvalueNames: string[];

  // return analysis
  returnKind: ReturnKind;
  tableInfo: TableInfo;

  closures: ClosureRecord[];
  constants: ConstantEntry[];
  /** Indices into `InterfaceReport.functions` of the direct children */
  childProtoIndices: number[];
  callSites: CallSite[];
  reads: FieldRead[];
}

export interface GlobalEntry {
  name: string;
  isFunction: boolean;
  functionIndex: number;
}

export interface InterfaceReport {
  luaVersion: string;
  /** Pre-order; index 0 is the main chunk */
  functions: FunctionRecord[];
  /** First-seen order, unique by name */
  globals: GlobalEntry[];
}
