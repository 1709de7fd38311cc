import { readFileSync } from 'fs';
import { resolve } from 'path';
import { FileAccessError, readChunk, type Logger } from '@luaprobe/core';
import type { Proto } from '@luaprobe/types';

/**
 * Read and decode a luac output file.
 *
 * @throws FileAccessError when the file cannot be read
 * @throws ChunkFormatError when it is not a Lua 5.4 binary chunk
 */
export function loadChunkFile(chunkPath: string, logger: Logger): Proto {
  const filePath = resolve(chunkPath);

  let bytes: Uint8Array;
  try {
    bytes = readFileSync(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot read chunk: ${reason}`,
      'ERR_FILE_UNREADABLE',
      { filePath },
      'Check the path; compile sources first with: luac -o out.luac script.lua'
    );
  }

  logger.debug('Loaded chunk', { filePath, bytes: bytes.length });
  return readChunk(bytes, { logger });
}
