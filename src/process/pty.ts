/**
 * PTY process management for shell commands
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import { stripAnsi } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { PTY_COLS, PTY_ROWS } from '../utils/constants.js';

export interface ShellProcessOptions {
  command: string;
  cwd: string;
  logger: Logger;
}

export interface ShellResult {
  exitCode: number;
  duration: number;
  output: string;
}

/**
 * Run a shell command under a PTY and capture what it prints
 */
export function spawnShell(options: ShellProcessOptions): Promise<ShellResult> {
  const { command, cwd, logger } = options;

  return new Promise((resolve) => {
    const runStart = Date.now();
    let output = '';

    const ptyProcess: IPty = pty.spawn('/bin/sh', ['-c', command], {
      name: 'xterm-256color',
      cols: PTY_COLS,
      rows: PTY_ROWS,
      cwd,
      env: { ...process.env },
    });

    ptyProcess.onData((data: string) => {
      output += data;
    });

    ptyProcess.onExit(({ exitCode }) => {
      const duration = Math.round((Date.now() - runStart) / 1000);
      const clean = stripAnsi(output).replace(/\r\n/g, '\n');
      logger.log(`$ ${command}\n${clean}`);
      resolve({ exitCode, duration, output: clean });
    });
  });
}
