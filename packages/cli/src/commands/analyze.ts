/**
 * Analyze command - produce the interface report of a compiled chunk
 */

import { Command } from 'commander';
import { analyzeAction, type AnalyzeOptions } from './analyzeAction.js';
import { runOrExit } from '../utils/errorFormatter.js';

export const analyzeCommand = new Command('analyze')
  .description('Analyze a compiled Lua 5.4 chunk and print its interface report as JSON')
  .argument('<chunk>', 'Path to a luac output file')
  .option('-o, --output <file>', 'Write the report to a file instead of stdout')
  .option('--indent <n>', 'Spaces per indent level, 0 for compact JSON')
  .option('--lua-version <version>', 'Version tag written to the report')
  .option('--log-level <level>', 'Log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Also write a debug log to this file')
  .option('-p, --project <path>', 'Project path (where .luaprobe/config.yaml lives)', '.')
  .addHelpText('after', `
Examples:
  luac -o init.luac init.lua
  luaprobe analyze init.luac                  Report to stdout
  luaprobe analyze init.luac -o report.json   Report to a file
  luaprobe analyze init.luac --indent 0       Compact JSON
`)
  .action(async (chunk: string, options: AnalyzeOptions) => {
    await runOrExit(() => analyzeAction(chunk, options));
  });
