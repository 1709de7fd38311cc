/**
 * Analyze command action - reads a chunk, runs the analyzer, writes JSON.
 *
 * Kept apart from the command definition so it can be driven in-process.
 */

import { resolve, isAbsolute, join, dirname } from 'path';
import { mkdirSync, writeFileSync } from 'fs';
import {
  ConfigError,
  FileAccessError,
  analyzeProto,
  closeLogger,
  createLogger,
  isIndent,
  isLogLevel,
  loadConfig,
  serializeReport,
  type LogLevel,
  type Logger,
  type LuaProbeConfig,
} from '@luaprobe/core';
import { loadChunkFile } from '../utils/chunkFile.js';
import { defaultIO, type CommandIO } from '../utils/io.js';

export interface AnalyzeOptions {
  project: string;
  output?: string;
  indent?: string;
  luaVersion?: string;
  logLevel?: string;
  logFile?: string;
}

export interface ResolvedAnalyzeSettings {
  luaVersion: string;
  logLevel: LogLevel;
  logFile?: string;
  indent: number;
}

/**
 * Merge command-line flags over the project config.
 * Priority: flag > .luaprobe/config.yaml > defaults
 */
export function resolveSettings(options: AnalyzeOptions, config: LuaProbeConfig, projectPath: string): ResolvedAnalyzeSettings {
  let logLevel = config.logLevel;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigError(
        `Invalid log level: ${options.logLevel}`,
        'ERR_CONFIG_INVALID',
        {},
        'Use one of: silent, errors, warnings, info, debug'
      );
    }
    logLevel = options.logLevel;
  }

  let indent = config.output.indent;
  if (options.indent !== undefined) {
    const parsed = Number(options.indent);
    if (options.indent.trim() === '' || !isIndent(parsed)) {
      throw new ConfigError(
        `Invalid indent: ${options.indent}`,
        'ERR_CONFIG_INVALID',
        {},
        'Use a non-negative integer, 0 for compact output'
      );
    }
    indent = parsed;
  }

  // config-relative log files live under the project, flag paths under cwd
  const configLogFile = config.logFile === undefined || isAbsolute(config.logFile)
    ? config.logFile
    : join(projectPath, config.logFile);

  return {
    luaVersion: options.luaVersion ?? config.luaVersion,
    logLevel,
    logFile: options.logFile !== undefined ? resolve(options.logFile) : configLogFile,
    indent,
  };
}

export async function analyzeAction(chunkPath: string, options: AnalyzeOptions, io: CommandIO = defaultIO): Promise<void> {
  const projectPath = resolve(options.project);
  const config = loadConfig(projectPath, { warn: (msg) => io.stderr(msg) });
  const settings = resolveSettings(options, config, projectPath);

  const logger = openLogger(settings);

  try {
    const proto = loadChunkFile(chunkPath, logger);
    const report = analyzeProto(proto, { luaVersion: settings.luaVersion, logger });
    const json = serializeReport(report, { indent: settings.indent }) + '\n';

    if (options.output === undefined) {
      io.stdout(json);
    } else {
      writeReport(resolve(options.output), json);
    }

    logger.info('Analysis finished', {
      chunk: chunkPath,
      functions: report.functions.length,
      globals: report.globals.length,
      output: options.output ?? 'stdout',
    });
  } finally {
    await closeLogger(logger);
  }
}

function openLogger(settings: ResolvedAnalyzeSettings): Logger {
  try {
    return createLogger(settings.logLevel, { logFile: settings.logFile });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      reason,
      'ERR_FILE_UNWRITABLE',
      { filePath: settings.logFile },
      'Point --log-file at a writable file path'
    );
  }
}

function writeReport(outputPath: string, json: string): void {
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot write report: ${reason}`,
      'ERR_FILE_UNWRITABLE',
      { filePath: outputPath },
      'Check that the output directory is writable'
    );
  }
}
