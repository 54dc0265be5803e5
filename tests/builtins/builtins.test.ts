import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

vi.mock('../../src/process/pty.js', () => ({
  spawnShell: vi.fn(),
}));

import {
  type BuiltinContext,
  parseCommand,
  runBuiltin,
  unquote,
} from '../../src/builtins/index.js';
import { ScriptSyntaxError, UnknownBuiltinError } from '../../src/errors.js';
import { spawnShell } from '../../src/process/pty.js';
import { createMockLogger } from '../helpers/mocks.js';

describe('parseCommand', () => {
  it('parses name and arguments', () => {
    expect(parseCommand('writefile(filename=out.txt,content=hello)')).toEqual({
      name: 'writefile',
      args: { filename: 'out.txt', content: 'hello' },
    });
  });

  it('splits on the first equals sign only', () => {
    expect(parseCommand('wwwget(url=https://x.test/?a=1)')).toEqual({
      name: 'wwwget',
      args: { url: 'https://x.test/?a=1' },
    });
  });

  it('accepts an empty argument list', () => {
    expect(parseCommand('noargs()')).toEqual({ name: 'noargs', args: {} });
  });

  it('rejects malformed calls', () => {
    expect(() => parseCommand('readfile')).toThrow(ScriptSyntaxError);
    expect(() => parseCommand('(a=1)')).toThrow(ScriptSyntaxError);
    expect(() => parseCommand('readfile(name)')).toThrow(
      ".cmd readfile: argument 'name' has no '='"
    );
  });
});

describe('unquote', () => {
  it('strips one pair of matching quotes', () => {
    expect(unquote('"ls -la"')).toBe('ls -la');
    expect(unquote("'x'")).toBe('x');
    expect(unquote('"mismatch\'')).toBe('"mismatch\'');
    expect(unquote('plain')).toBe('plain');
  });
});

describe('runBuiltin', () => {
  let tmpDir: string;
  let ctx: BuiltinContext;

  beforeEach(() => {
    vi.clearAllMocks();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'builtins-'));
    ctx = {
      cwd: tmpDir,
      logger: createMockLogger(),
      prompter: vi.fn(async () => 'blue'),
    };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes and reads files relative to cwd', async () => {
    const written = await runBuiltin(
      'writefile',
      { filename: 'out/notes.txt', content: 'hello' },
      ctx
    );
    const read = await runBuiltin('readfile', { filename: 'out/notes.txt' }, ctx);

    expect(written).toBe("Content written to file 'out/notes.txt'");
    expect(read).toBe('hello');
    expect(fs.readFileSync(path.join(tmpDir, 'out', 'notes.txt'), 'utf-8')).toBe('hello');
  });

  it('requires named arguments', async () => {
    await expect(runBuiltin('readfile', {}, ctx)).rejects.toThrow(
      "readfile requires argument 'filename'"
    );
  });

  it('asks the operator through the prompter', async () => {
    const answer = await runBuiltin('askuser', { question: 'Favourite colour?' }, ctx);

    expect(answer).toBe('blue');
    expect(ctx.prompter).toHaveBeenCalledWith('Favourite colour?');
  });

  it('runs shell commands and reports failures', async () => {
    vi.mocked(spawnShell)
      .mockResolvedValueOnce({ exitCode: 0, duration: 0, output: 'ok\n' })
      .mockResolvedValueOnce({ exitCode: 1, duration: 0, output: 'nope\n' });

    expect(await runBuiltin('execcmd', { cmd: '"echo ok"' }, ctx)).toBe('ok\n');
    expect(spawnShell).toHaveBeenCalledWith({
      command: 'echo ok',
      cwd: tmpDir,
      logger: ctx.logger,
    });
    expect(await runBuiltin('execcmd', { cmd: 'false' }, ctx)).toBe(
      'Error: exit code 1\nnope\n'
    );
  });

  it('fetches urls and reports failures as text', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(new Response('page body', { status: 200 }))
        .mockResolvedValueOnce(new Response('', { status: 404 }))
    );

    expect(await runBuiltin('wwwget', { url: 'https://x.test/a' }, ctx)).toBe('page body');
    expect(await runBuiltin('wwwget', { url: 'https://x.test/b' }, ctx)).toBe(
      'ERROR url not returned: https://x.test/b'
    );
  });

  it('throws for unknown builtins', async () => {
    await expect(runBuiltin('format_disk', {}, ctx)).rejects.toThrow(UnknownBuiltinError);
    await expect(runBuiltin('toString', {}, ctx)).rejects.toThrow('toString is not defined');
  });
});
