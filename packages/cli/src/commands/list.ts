/**
 * List command - disassembly listing of a compiled chunk
 */

import { Command } from 'commander';
import { createLogger, closeLogger, disassemble } from '@luaprobe/core';
import { loadChunkFile } from '../utils/chunkFile.js';
import { runOrExit } from '../utils/errorFormatter.js';
import { defaultIO, type CommandIO } from '../utils/io.js';

export async function listAction(chunkPath: string, io: CommandIO = defaultIO): Promise<void> {
  const logger = createLogger('warnings');
  try {
    io.stdout(disassemble(loadChunkFile(chunkPath, logger)));
  } finally {
    await closeLogger(logger);
  }
}

export const listCommand = new Command('list')
  .description('Print the instructions of every function in a compiled chunk')
  .argument('<chunk>', 'Path to a luac output file')
  .addHelpText('after', `
Examples:
  luaprobe list init.luac
`)
  .action(async (chunk: string) => {
    await runOrExit(() => listAction(chunk));
  });
