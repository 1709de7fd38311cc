/**
 * Package version tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { readFileSync } from 'fs';
import { LUAPROBE_VERSION } from '@luaprobe/core';

describe('LUAPROBE_VERSION', () => {
  it('should match the core package manifest', () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL('../../packages/core/package.json', import.meta.url), 'utf-8')
    );

    assert.ok(typeof manifest === 'object' && manifest !== null && 'version' in manifest);
    assert.strictEqual(LUAPROBE_VERSION, manifest.version);
    assert.strictEqual(LUAPROBE_VERSION, '0.1.0');
  });
});
