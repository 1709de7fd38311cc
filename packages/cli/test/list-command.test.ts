/**
 * Tests for `luaprobe list`
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileAccessError, writeChunk } from '@luaprobe/core';
import { listAction } from '../src/commands/list.js';
import { mainProto, str, ABC, ABx, OP } from '../../../test/helpers/protoBuilder.js';

describe('luaprobe list', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'luaprobe-list-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should print the listing of a chunk', async () => {
    const chunkPath = join(tempDir, 'hello.luac');
    writeFileSync(chunkPath, writeChunk(mainProto({
      code: [ABC(OP.GETTABUP, 0, 0, 0), ABx(OP.LOADK, 1, 1), ABC(OP.CALL, 0, 2, 1), ABC(OP.RETURN, 0, 1, 1)],
      constants: [str('print'), str('hi')],
      lineInfo: [1, 0, 0, 0],
    })));

    const out: string[] = [];
    await listAction(chunkPath, { stdout: (text) => out.push(text), stderr: () => undefined });

    assert.deepStrictEqual(out[0].split('\n'), [
      'function <@test.lua:0,0> (4 instructions)',
      '\t1\t[1]\tGETTABUP  \t0 0 0\t; _ENV "print"',
      '\t2\t[1]\tLOADK     \t1 1\t; "hi"',
      '\t3\t[1]\tCALL      \t0 2 1',
      '\t4\t[1]\tRETURN    \t0 1 1',
      '',
    ]);
  });

  it('should fail on missing files', async () => {
    await assert.rejects(
      listAction(join(tempDir, 'nope.luac'), { stdout: () => undefined, stderr: () => undefined }),
      FileAccessError
    );
  });
});
