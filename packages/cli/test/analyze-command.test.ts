/**
 * Tests for `luaprobe analyze`
 *
 * The action runs in-process against chunks written to a temp directory;
 * output is captured through the CommandIO sinks.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ChunkFormatError, ConfigError, DEFAULT_CONFIG, FileAccessError, writeChunk } from '@luaprobe/core';
import { analyzeAction, resolveSettings } from '../src/commands/analyzeAction.js';
import { describeError } from '../src/utils/errorFormatter.js';
import type { CommandIO } from '../src/utils/io.js';
import { mainProto, proto, str, ABC, ABx, OP } from '../../../test/helpers/protoBuilder.js';

// =============================================================================
// Helpers
// =============================================================================

interface CapturedIO extends CommandIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** function onReady() end */
function onReadyChunk(): Uint8Array {
  return writeChunk(mainProto({
    code: [ABC(OP.VARARGPREP, 0, 0, 0), ABx(OP.CLOSURE, 0, 0), ABC(OP.SETTABUP, 0, 0, 0), ABC(OP.RETURN, 0, 1, 1)],
    constants: [str('onReady')],
    protos: [proto({ lineDefined: 1, lastLineDefined: 1, code: [ABC(OP.RETURN0, 0, 0, 0)] })],
  }));
}

// =============================================================================
// TESTS
// =============================================================================

describe('luaprobe analyze', () => {
  let tempDir: string;
  let chunkPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'luaprobe-analyze-test-'));
    chunkPath = join(tempDir, 'init.luac');
    writeFileSync(chunkPath, onReadyChunk());
  });

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('should print the report to stdout', async () => {
    const io = captureIO();
    await analyzeAction(chunkPath, { project: tempDir, indent: '0' }, io);

    assert.strictEqual(io.out.length, 1);
    const text = io.out[0];
    assert.ok(text.endsWith('}\n'));
    assert.strictEqual(text.indexOf('\n'), text.length - 1);

    const doc: unknown = JSON.parse(text);
    assert.ok(isRecord(doc));
    assert.strictEqual(doc.lua_version, '5.4.7');
    assert.ok(Array.isArray(doc.functions));
    assert.strictEqual(doc.functions.length, 2);
    assert.deepStrictEqual(doc.globals, [{ name: 'onReady', is_function: true, function_index: 1 }]);
  });

  it('should take settings from the project config', async () => {
    mkdirSync(join(tempDir, '.luaprobe'));
    writeFileSync(join(tempDir, '.luaprobe', 'config.yaml'), 'luaVersion: "5.4.6"\noutput:\n  indent: 0\n');

    const io = captureIO();
    await analyzeAction(chunkPath, { project: tempDir }, io);

    assert.ok(io.out[0].startsWith('{"lua_version":"5.4.6","functions":['));
  });

  it('should let flags override the project config', async () => {
    mkdirSync(join(tempDir, '.luaprobe'));
    writeFileSync(join(tempDir, '.luaprobe', 'config.yaml'), 'luaVersion: "5.4.6"\n');

    const io = captureIO();
    await analyzeAction(chunkPath, { project: tempDir, luaVersion: '5.4.0', indent: '4' }, io);

    assert.ok(io.out[0].startsWith('{\n    "lua_version": "5.4.0",\n'));
  });

  it('should write the report to a file', async () => {
    const outputPath = join(tempDir, 'out', 'report.json');
    const io = captureIO();
    await analyzeAction(chunkPath, { project: tempDir, output: outputPath }, io);

    assert.deepStrictEqual(io.out, []);
    const doc: unknown = JSON.parse(readFileSync(outputPath, 'utf-8'));
    assert.ok(isRecord(doc));
    assert.deepStrictEqual(doc.globals, [{ name: 'onReady', is_function: true, function_index: 1 }]);
  });

  it('should write a debug log file when asked', async () => {
    const logPath = join(tempDir, 'run.log');
    await analyzeAction(chunkPath, { project: tempDir, logFile: logPath }, captureIO());

    const log = readFileSync(logPath, 'utf-8');
    assert.match(log, /\[DEBUG\] Loaded chunk/);
    assert.match(log, /\[INFO\] Analysis finished \{"chunk":".*init\.luac","functions":2,"globals":1,"output":"stdout"\}/);
  });

  it('should fail with a file error when the log file is a directory', async () => {
    const logDir = join(tempDir, 'logs');
    mkdirSync(logDir);

    await assert.rejects(
      analyzeAction(chunkPath, { project: tempDir, logFile: logDir }, captureIO()),
      (err: unknown) =>
        err instanceof FileAccessError &&
        err.code === 'ERR_FILE_UNWRITABLE' &&
        err.context.filePath === logDir &&
        err.message === `Cannot write log file: '${logDir}' is a directory`
    );
  });

  it('should fail on missing files', async () => {
    await assert.rejects(
      analyzeAction(join(tempDir, 'missing.luac'), { project: tempDir }, captureIO()),
      (err: unknown) => err instanceof FileAccessError && err.code === 'ERR_FILE_UNREADABLE'
    );
  });

  it('should fail on source text', async () => {
    const sourcePath = join(tempDir, 'init.lua');
    writeFileSync(sourcePath, 'function onReady() end\n');

    await assert.rejects(
      analyzeAction(sourcePath, { project: tempDir }, captureIO()),
      (err: unknown) => err instanceof ChunkFormatError && err.code === 'ERR_CHUNK_SIGNATURE'
    );
  });

  it('should fail on an invalid log level flag', async () => {
    await assert.rejects(
      analyzeAction(chunkPath, { project: tempDir, logLevel: 'loud' }, captureIO()),
      (err: unknown) => err instanceof ConfigError
    );
  });

  it('should report config warnings on stderr', async () => {
    mkdirSync(join(tempDir, '.luaprobe'));
    writeFileSync(join(tempDir, '.luaprobe', 'config.json'), '{}');

    const io = captureIO();
    await analyzeAction(chunkPath, { project: tempDir }, io);

    assert.strictEqual(io.err.length, 1);
    assert.ok(io.err[0].includes('config.json is deprecated'));
  });
});

describe('resolveSettings', () => {
  it('should resolve config log files against the project', () => {
    const settings = resolveSettings({ project: '/work' }, { ...DEFAULT_CONFIG, logFile: 'logs/a.log' }, '/work');
    assert.strictEqual(settings.logFile, join('/work', 'logs/a.log'));
  });

  it('should reject non-numeric indents', () => {
    assert.throws(() => resolveSettings({ project: '.', indent: 'wide' }, DEFAULT_CONFIG, '.'), ConfigError);
    assert.throws(() => resolveSettings({ project: '.', indent: '' }, DEFAULT_CONFIG, '.'), ConfigError);
  });

  it('should keep defaults without flags', () => {
    assert.deepStrictEqual(resolveSettings({ project: '.' }, DEFAULT_CONFIG, '.'), {
      luaVersion: DEFAULT_CONFIG.luaVersion,
      logLevel: DEFAULT_CONFIG.logLevel,
      logFile: undefined,
      indent: DEFAULT_CONFIG.output.indent,
    });
  });
});

describe('describeError', () => {
  it('should list file, offset and suggestion as next steps', () => {
    const error = new ChunkFormatError('Chunk ends unexpectedly', 'ERR_CHUNK_TRUNCATED', { offset: 7, filePath: 'a.luac' }, 'The file may be incomplete');

    assert.deepStrictEqual(describeError(error), {
      title: 'Chunk ends unexpectedly (ERR_CHUNK_TRUNCATED)',
      nextSteps: ['File: a.luac', 'At byte offset 7', 'The file may be incomplete'],
    });
  });
});
