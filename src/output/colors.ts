/**
 * Terminal colours and the tagged line printers used for run output
 */

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
} as const;

export type ColorName = Exclude<keyof typeof colors, 'reset'>;

/** Source of an output line: the runner itself, model text, or tool traffic */
export type OutputTag = 'RUNNER' | 'LLM' | 'TOOL';

const TAG_COLORS: Record<OutputTag, ColorName> = {
  RUNNER: 'magenta',
  LLM: 'green',
  TOOL: 'cyan',
};

// eslint-disable-next-line no-control-regex -- escape sequences start with ESC
const ANSI_PATTERN = /\x1b\[[0-9;?]*[a-zA-Z]/g;

/**
 * Remove colour and cursor escapes, e.g. from pty output or before logging
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Cut text to `max` characters, marking the cut with `...`
 */
export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max)}...`;
}

/**
 * Run duration for the summary line: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const whole = Math.round(seconds);
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;
  return h > 0 ? `${h}h${m}m${s}s` : `${m}m${s}s`;
}

/**
 * Local wall-clock time, HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number, width = 2): string => String(n).padStart(width, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * `HH:MM:SS.mmm [TAG] message` with the timestamp dimmed and the tag coloured
 */
export function formatTagged(tag: OutputTag, message: string, date?: Date): string {
  const color = colors[TAG_COLORS[tag]];
  return `${colors.dim}${formatTimestamp(date)}${colors.reset} ${color}[${tag}]${colors.reset} ${message}`;
}

export function printRunner(message: string): void {
  console.log(formatTagged('RUNNER', message));
}

export function printLlm(message: string): void {
  console.log(formatTagged('LLM', message));
}

export function printTool(message: string): void {
  console.log(formatTagged('TOOL', message));
}

/**
 * Runner line on stderr with the message in red
 */
export function printError(message: string): void {
  console.error(formatTagged('RUNNER', `${colors.red}${message}${colors.reset}`));
}
