/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  validateConfig,
  mergeConfig,
  isIndent,
  DEFAULT_CONFIG,
  CONFIG_DIR,
} from './ConfigLoader.js';
export type { LuaProbeConfig, PartialConfig } from './ConfigLoader.js';
