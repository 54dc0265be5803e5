/**
 * Centralized constants for the runner codebase
 */

// === Size Thresholds ===
/** Threshold for displaying size in K (1000 chars) */
export const SIZE_THRESHOLD_K = 1000;
/** Threshold for displaying size in M (1000000 chars) */
export const SIZE_THRESHOLD_M = 1000000;

// === Display Limits ===
/** Truncation length for function arguments and results in normal mode */
export const TRUNCATE_TOOL_IO = 100;
/** Truncation length for terminal output lines (model text, runner messages) */
export const TRUNCATE_TERMINAL_LINE = 150;
/** Truncation length for statement lines in normal mode */
export const TRUNCATE_STATEMENT = 80;

// === PTY Configuration ===
/** Terminal column width */
export const PTY_COLS = 200;
/** Terminal row count */
export const PTY_ROWS = 50;

// === Subprocess Protocol ===
/** Flag asking a tool executable to print its definitions */
export const LIST_FUNCTIONS_FLAG = '--list-functions';
/** Timeout for `--list-functions` */
export const DISCOVERY_TIMEOUT_MS = 10000;
/** Timeout for one tool invocation */
export const FUNCTION_TIMEOUT_MS = 30000;
/** Environment variable naming the directory tools run in */
export const PROJECT_DIR_ENV = 'PROMPT_RUNNER_PROJECT_DIR';

// === Default Configuration ===
/** Default model-request limit for one tool loop */
export const DEFAULT_MAX_TOOL_ITERATIONS = 20;
/** Default provider request timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;
/** Default output token budget when a model entry gives none */
export const DEFAULT_MAX_TOKENS = 4096;
/** Default directory of tool executables */
export const DEFAULT_FUNCTIONS_DIR = 'prompts/functions';
/** Default directory for log files and transcripts */
export const DEFAULT_LOG_DIR = 'logs';
/** Default directory for saved sessions */
export const DEFAULT_SESSION_DIR = 'sessions';
