/**
 * Subprocess execution with stdin, captured output, and a hard timeout
 */

import { spawn } from 'child_process';

export interface ProcessOptions {
  cwd: string;
  /** Written to stdin, then stdin is closed */
  input?: string | undefined;
  timeoutMs: number;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Run an executable and collect its output
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: ProcessOptions
) => Promise<ProcessResult>;

/**
 * Default runner over child_process.spawn (no shell)
 * Resolves on exit or timeout; rejects only if the process cannot be started.
 * The child leads its own process group so a timeout also kills anything it forked.
 */
export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      killGroup(child.pid);
      child.kill('SIGKILL');
      // Grandchildren may still hold the pipes open, so 'close' cannot be awaited
      child.stdout.destroy();
      child.stderr.destroy();
      finish({ exitCode: null, stdout, stderr, timedOut: true });
    }, options.timeoutMs);

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (exitCode) => {
      finish({ exitCode, stdout, stderr, timedOut: false });
    });

    // Tools that exit without reading stdin raise EPIPE here
    child.stdin.on('error', () => undefined);
    child.stdin.end(options.input ?? '');
  });
};

function killGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group already exited
    if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
  }
}
