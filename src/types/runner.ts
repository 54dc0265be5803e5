/**
 * Runner configuration and CLI types
 */

import {
  DEFAULT_FUNCTIONS_DIR,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_TOOL_ITERATIONS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SESSION_DIR,
} from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export type Subcommand = 'run' | 'code' | 'models' | 'functions' | 'show';

/**
 * Runner configuration
 */
export interface RunnerConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  functionsDir: string;
  /** Extra model catalog merged over the bundled one */
  modelsFile: string | null;
  sessionDir: string;
  maxToolIterations: number;
  requestTimeoutMs: number;
}

/**
 * Default runner configuration
 */
export const DEFAULT_CONFIG: RunnerConfig = {
  verbosity: 'normal',
  enableLog: true,
  logDir: DEFAULT_LOG_DIR,
  functionsDir: DEFAULT_FUNCTIONS_DIR,
  modelsFile: null,
  sessionDir: DEFAULT_SESSION_DIR,
  maxToolIterations: DEFAULT_MAX_TOOL_ITERATIONS,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  subcommand: Subcommand;
  /** Script file (run, code), filter (models) or session id (show) */
  target: string | null;
  /** name=value pairs seeded into script variables */
  variables: Record<string, string>;
  config: Partial<RunnerConfig>;
}
