/**
 * @luaprobe/core - static analysis of compiled Lua 5.4 bytecode
 */

// Error types
export {
  LuaProbeError,
  ConfigError,
  FileAccessError,
  ChunkFormatError,
  AnalysisError,
} from './errors/LuaProbeError.js';
export type { ErrorContext, ErrorSeverity, LuaProbeErrorJSON } from './errors/LuaProbeError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  silentLogger,
  createLogger,
  closeLogger,
  isLogLevel,
  formatLogLine,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Config
export { loadConfig, validateConfig, mergeConfig, isIndent, DEFAULT_CONFIG, CONFIG_DIR } from './config/index.js';
export type { LuaProbeConfig, PartialConfig } from './config/index.js';

// Version
export { LUAPROBE_VERSION } from './version.js';

// Bytecode
export * from './bytecode/opcodes.js';
export * from './bytecode/instruction.js';
export { getInstructionLine } from './bytecode/lineInfo.js';
export { disassemble, formatOperands, formatConstant } from './bytecode/disassemble.js';

// Binary chunks
export { readChunk, isBinaryChunk } from './chunk/ChunkReader.js';
export type { ReadChunkOptions } from './chunk/ChunkReader.js';
export { writeChunk } from './chunk/ChunkWriter.js';
export type { WriteChunkOptions } from './chunk/ChunkWriter.js';

// Analysis
export { analyzeProto, ReportBuilder, DEFAULT_LUA_VERSION } from './analysis/ReportBuilder.js';
export type { AnalyzeOptions } from './analysis/ReportBuilder.js';
export { analyzeFunction, toConstantEntry, ENV_NAME, MISSING_NAME } from './analysis/FunctionAnalyzer.js';
export type { FunctionAnalysis, GlobalAssignment, StagedClosure } from './analysis/FunctionAnalyzer.js';
export {
  findRegisterSource,
  findTableOrigin,
  scanLimit,
  SOURCE_SCAN_HORIZON,
  RETURN_SCAN_HORIZON,
  CALL_SCAN_HORIZON,
} from './analysis/provenance.js';
export type { RegisterSource } from './analysis/provenance.js';
export {
  classifyReturn,
  estimateTableBytes,
  emptyTableInfo,
  ReturnVerdict,
  TABLE_BASE_BYTES,
  ARRAY_SLOT_BYTES,
  HASH_SLOT_BYTES,
} from './analysis/returns.js';
export type { ReturnSite } from './analysis/returns.js';
export { analyzeCallSite, resolveCallee, stringConstant, upvalueName, UNNAMED } from './analysis/calls.js';
export type { ResolvedCallee } from './analysis/calls.js';

// Report
export { serializeReport, reportToDocument, formatFloat, DEFAULT_INDENT } from './report/serialize.js';
export type {
  SerializeOptions,
  ReportDocument,
  FunctionDocument,
  GlobalDocument,
  ConstantDocument,
  CallSiteDocument,
  ClosureDocument,
  FieldReadDocument,
  TableInfoDocument,
} from './report/serialize.js';
