#!/usr/bin/env node
/**
 * @luaprobe/cli - command line interface for the luaprobe bytecode analyzer
 */

import { Command } from 'commander';
import { LUAPROBE_VERSION } from '@luaprobe/core';
import { analyzeCommand } from './commands/analyze.js';
import { listCommand } from './commands/list.js';

const program = new Command();

program
  .name('luaprobe')
  .description('Static interface analysis for compiled Lua 5.4 bytecode')
  .version(LUAPROBE_VERSION);

program.addCommand(analyzeCommand);
program.addCommand(listCommand);

await program.parseAsync();
