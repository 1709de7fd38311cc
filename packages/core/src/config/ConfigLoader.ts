import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/LuaProbeError.js';
import { isLogLevel, type LogLevel } from '../logging/Logger.js';
import { DEFAULT_LUA_VERSION } from '../analysis/ReportBuilder.js';
import { DEFAULT_INDENT } from '../report/serialize.js';

/**
 * luaprobe configuration schema.
 *
 * YAML Location: .luaprobe/config.yaml (preferred) or .luaprobe/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * # Version tag written into every report
 * luaVersion: "5.4.6"
 *
 * # silent | errors | warnings | info | debug
 * logLevel: warnings
 * logFile: .luaprobe/luaprobe.log
 *
 * output:
 *   indent: 0   # compact JSON
 * ```
 *
 * Command-line flags override every value here.
 */
export interface LuaProbeConfig {
  luaVersion: string;
  logLevel: LogLevel;
  /** Relative paths resolve against the project directory */
  logFile?: string;
  output: {
    indent: number;
  };
}

export const CONFIG_DIR = '.luaprobe';

export const DEFAULT_CONFIG: LuaProbeConfig = {
  luaVersion: DEFAULT_LUA_VERSION,
  logLevel: 'warnings',
  output: {
    indent: DEFAULT_INDENT,
  },
};

/**
 * Load config from .luaprobe/config.yaml, falling back to config.json.
 *
 * A missing file or unparseable text yields the defaults (with a warning for
 * the latter). Values of the wrong type throw ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): LuaProbeConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  // 1. YAML (preferred)
  if (existsSync(yamlPath)) {
    let parsed: unknown;
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
    return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, yamlPath));
  }

  // 2. JSON (deprecated)
  if (existsSync(jsonPath)) {
    logger.warn('⚠ config.json is deprecated. Move its settings to .luaprobe/config.yaml');

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
    return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, jsonPath));
  }

  // 3. No config file
  return DEFAULT_CONFIG;
}

export interface PartialConfig {
  luaVersion?: string;
  logLevel?: LogLevel;
  logFile?: string;
  output?: { indent?: number };
}

/**
 * Check the shape of a parsed config document.
 *
 * An empty file parses to null and counts as an empty config.
 *
 * @throws ConfigError when a field has the wrong type
 */
export function validateConfig(raw: unknown, filePath: string): PartialConfig {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw invalid('Config must be a mapping', filePath);
  }

  const config: PartialConfig = {};

  if (raw.luaVersion !== undefined) {
    if (typeof raw.luaVersion !== 'string' || raw.luaVersion.trim() === '') {
      throw invalid('luaVersion must be a non-empty string', filePath);
    }
    config.luaVersion = raw.luaVersion;
  }

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw invalid(
        `logLevel must be one of silent, errors, warnings, info, debug; got ${JSON.stringify(raw.logLevel)}`,
        filePath
      );
    }
    config.logLevel = raw.logLevel;
  }

  if (raw.logFile !== undefined) {
    if (typeof raw.logFile !== 'string') {
      throw invalid('logFile must be a string', filePath);
    }
    config.logFile = raw.logFile;
  }

  if (raw.output !== undefined && raw.output !== null) {
    if (!isRecord(raw.output)) {
      throw invalid('output must be a mapping', filePath);
    }
    const indent = raw.output.indent;
    if (indent !== undefined) {
      if (!isIndent(indent)) {
        throw invalid('output.indent must be a non-negative integer', filePath);
      }
      config.output = { indent };
    }
  }

  return config;
}

export function isIndent(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Merge user config with defaults; user values take precedence.
 */
export function mergeConfig(defaults: LuaProbeConfig, user: PartialConfig): LuaProbeConfig {
  return {
    luaVersion: user.luaVersion ?? defaults.luaVersion,
    logLevel: user.logLevel ?? defaults.logLevel,
    logFile: user.logFile ?? defaults.logFile,
    output: {
      indent: user.output?.indent ?? defaults.output.indent,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, filePath: string): ConfigError {
  return new ConfigError(message, 'ERR_CONFIG_INVALID', { filePath }, 'Fix the value or remove it to use the default');
}
