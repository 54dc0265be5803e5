import { describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { runProcess } from '../../src/process/exec.js';

const node = process.execPath;

describe('runProcess', () => {
  it('passes stdin and collects stdout', async () => {
    const result = await runProcess(
      node,
      ['-e', 'process.stdin.pipe(process.stdout)'],
      { cwd: os.tmpdir(), input: '{"a":1}', timeoutMs: 10000 }
    );

    expect(result).toEqual({
      exitCode: 0,
      stdout: '{"a":1}',
      stderr: '',
      timedOut: false,
    });
  });

  it('collects stderr and the exit code', async () => {
    const result = await runProcess(
      node,
      ['-e', 'process.stderr.write("bad"); process.exit(3)'],
      { cwd: os.tmpdir(), timeoutMs: 10000 }
    );

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('bad');
  });

  it('kills processes that exceed the timeout', async () => {
    const result = await runProcess(node, ['-e', 'setTimeout(() => {}, 60000)'], {
      cwd: os.tmpdir(),
      timeoutMs: 200,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('returns at the timeout even when the tool forked a child', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exec-'));
    const script = path.join(dir, 'slow.sh');
    fs.writeFileSync(script, '#!/bin/sh\nsleep 5\necho done\n', { mode: 0o755 });

    try {
      const started = Date.now();
      const result = await runProcess(script, ['x'], { cwd: dir, timeoutMs: 300 });

      expect(Date.now() - started).toBeLessThan(2000);
      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBeNull();
      expect(result.stdout).toBe('');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects when the executable cannot be started', async () => {
    await expect(
      runProcess('/nonexistent/tool', [], { cwd: os.tmpdir(), timeoutMs: 1000 })
    ).rejects.toThrow();
  });
});
