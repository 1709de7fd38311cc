/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { LuaProbeError } from '@luaprobe/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 *
 * @example
 * exitWithError('Not a precompiled Lua chunk', [
 *   'Compile the script with luac first'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * Title and next steps for a luaprobe error.
 */
export function describeError(error: LuaProbeError): { title: string; nextSteps: string[] } {
  const nextSteps: string[] = [];
  if (error.context.filePath !== undefined) nextSteps.push(`File: ${error.context.filePath}`);
  if (error.context.offset !== undefined) nextSteps.push(`At byte offset ${error.context.offset}`);
  if (error.suggestion) nextSteps.push(error.suggestion);
  return { title: `${error.message} (${error.code})`, nextSteps };
}

/**
 * Run a command action, turning luaprobe errors into a formatted exit.
 * Anything else propagates.
 */
export async function runOrExit(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof LuaProbeError) {
      const { title, nextSteps } = describeError(err);
      exitWithError(title, nextSteps);
    }
    throw err;
  }
}
