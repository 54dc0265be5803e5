/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

export type RunnerEventName =
  | 'statement'
  | 'llm_request'
  | 'llm_response'
  | 'function_call'
  | 'function_result'
  | 'tool_loop_limit'
  | 'transcript'
  | 'script_complete'
  | 'script_error';

/**
 * Runner event for structured logging
 */
export interface RunnerEvent {
  type: 'runner';
  event: RunnerEventName;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<RunnerEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Logger that discards everything (--no-log, tests)
 */
export const nullLogger: Logger = {
  log: () => undefined,
  logEvent: () => undefined,
  close: () => undefined,
  filePath: null,
};

/**
 * Log directory of a run; relative paths hang off the project directory,
 * shared by the log file and the conversation transcript
 */
export function resolveLogDir(projectDir: string, logDir: string): string {
  return path.resolve(projectDir, logDir);
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  scriptName: string
): Logger {
  if (!enabled) {
    return nullLogger;
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const logFile = path.join(logDir, `${scriptBaseName(scriptName)}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<RunnerEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'runner' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}

/**
 * Script file name without directory and .prompt extension
 */
export function scriptBaseName(scriptFile: string): string {
  return path.basename(scriptFile, path.extname(scriptFile));
}
