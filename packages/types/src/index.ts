/**
 * @luaprobe/types - Type definitions for the luaprobe bytecode analyzer
 */

// Input prototype graph
export * from './bytecode.js';

// Interface report
export * from './report.js';
