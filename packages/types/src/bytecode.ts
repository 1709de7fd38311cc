/**
 * Bytecode Types - the prototype graph handed to the analyzer
 *
 * Shapes follow the Lua 5.4 `Proto` layout as it comes out of a binary chunk.
 * Everything is readonly: the analyzer never mutates its input.
 */

/**
 * One slot of a function's constant pool.
 *
 * Integers are 64-bit in Lua, so they are carried as bigint.
 */
export type LuaConstant =
  | { readonly type: 'nil' }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'string'; readonly value: string };

/**
 * Upvalue descriptor: where a captured variable comes from in the
 * enclosing function, plus its debug name when present.
 */
export interface UpvalueDesc {
  readonly name: string | null;
  /** true when captured from the enclosing function's registers */
  readonly inStack: boolean;
  readonly index: number;
  readonly kind: number;
}

/** Local variable debug entry; the first `numParams` entries are the parameters. */
export interface LocalVariable {
  readonly varName: string | null;
  readonly startPc: number;
  readonly endPc: number;
}

/** Absolute line checkpoint: instruction `pc` lies on source line `line`. */
export interface AbsLineInfo {
  readonly pc: number;
  readonly line: number;
}

/**
 * Compiled function prototype.
 */
export interface Proto {
  /** Chunk name, e.g. "@main.lua" or "=stdin"; null when stripped */
  readonly source: string | null;
  readonly lineDefined: number;
  readonly lastLineDefined: number;
  readonly numParams: number;
  readonly isVararg: boolean;
  readonly maxStackSize: number;
  /** Unsigned 32-bit instruction words */
  readonly code: readonly number[];
  readonly constants: readonly LuaConstant[];
  readonly upvalues: readonly UpvalueDesc[];
  /** Nested prototypes in declaration order (indexed by CLOSURE's Bx) */
  readonly protos: readonly Proto[];
  /** Signed per-instruction line deltas */
  readonly lineInfo: readonly number[];
  readonly absLineInfo: readonly AbsLineInfo[];
  readonly locVars: readonly LocalVariable[];
}
