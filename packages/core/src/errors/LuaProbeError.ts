/**
 * LuaProbeError - error hierarchy for luaprobe
 *
 * Input decoding and configuration throw. The analysis engine degrades to
 * "unknown" on odd bytecode; anything else that escapes it is wrapped in
 * AnalysisError.
 *
 * Error types:
 * - ConfigError: invalid configuration values (fatal)
 * - FileAccessError: unreadable input, unwritable output (error)
 * - ChunkFormatError: not a loadable Lua 5.4 binary chunk (fatal)
 * - AnalysisError: unexpected failure while walking the prototype tree (error)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  /** Byte offset into a binary chunk */
  offset?: number;
  [key: string]: unknown;
}

export interface LuaProbeErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

export abstract class LuaProbeError extends Error {
  abstract readonly severity: ErrorSeverity;
  readonly code: string;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): LuaProbeErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends LuaProbeError {
  readonly severity = 'fatal' as const;
}

/**
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE
 */
export class FileAccessError extends LuaProbeError {
  readonly severity = 'error' as const;
}

/**
 * Codes: ERR_CHUNK_SIGNATURE, ERR_CHUNK_VERSION, ERR_CHUNK_FORMAT,
 * ERR_CHUNK_TRUNCATED, ERR_CHUNK_CONSTANT
 */
export class ChunkFormatError extends LuaProbeError {
  readonly severity = 'fatal' as const;
}

/**
 * Codes: ERR_ANALYSIS_INTERNAL
 */
export class AnalysisError extends LuaProbeError {
  readonly severity = 'error' as const;
}
