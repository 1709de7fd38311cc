/**
 * Version of the installed @luaprobe/core, taken from its manifest.
 */
import { readFileSync } from 'fs';

const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));

function versionOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'version' in value && typeof value.version === 'string') {
    return value.version;
  }
  throw new Error('@luaprobe/core package.json has no version');
}

export const LUAPROBE_VERSION: string = versionOf(manifest);
