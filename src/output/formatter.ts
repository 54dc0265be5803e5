/**
 * Console output for script execution
 */

import type { LoopState, ToolLoopObserver, ToolLoopStatus } from '../core/tool-loop.js';
import { formatStatement } from '../script/parser.js';
import type { Statement } from '../script/types.js';
import type { CallPart, Message, ResultPart } from '../types/conversation.js';
import type { Verbosity } from '../types/runner.js';
import {
  TRUNCATE_STATEMENT,
  TRUNCATE_TERMINAL_LINE,
  TRUNCATE_TOOL_IO,
} from '../utils/constants.js';
import { formatCost, formatJsonInline, formatSize } from '../utils/formatting.js';
import { colors, printLlm, printRunner, printTool, truncate } from './colors.js';

/**
 * Totals reported after one `.exec`
 */
export interface ExecSummary {
  status: ToolLoopStatus;
  iterations: number;
  tokensIn: number;
  tokensOut: number;
  cost: number;
  totalCost: number;
}

/**
 * Everything the VM shows the operator
 */
export interface Display extends ToolLoopObserver {
  statement(statement: Statement): void;
  info(message: string): void;
  warning(message: string): void;
  execComplete(summary: ExecSummary): void;
  debug(title: string, body: string): void;
}

/**
 * Display that prints nothing (tests, embedding)
 */
export const silentDisplay: Display = {
  statement: () => undefined,
  info: () => undefined,
  warning: () => undefined,
  execComplete: () => undefined,
  debug: () => undefined,
};

/**
 * Text parts of a message joined into one string
 */
export function messageText(message: Message): string {
  return message.content
    .flatMap((p) => (p.type === 'text' ? [p.text] : []))
    .join('\n');
}

/**
 * One-line form of a tool call: name({"a":1})
 */
export function formatCall(call: CallPart, maxLength?: number): string {
  const args = formatJsonInline(call.arguments);
  return `${call.name}(${maxLength === undefined ? args : truncate(args, maxLength)})`;
}

/**
 * One-line summary of a tool result for normal verbosity
 */
export function formatResultSummary(result: ResultPart): string {
  const firstLine = result.result.split('\n')[0] ?? '';
  return `${result.name} -> ${truncate(firstLine, TRUNCATE_TOOL_IO)} (${formatSize(result.result.length)})`;
}

/**
 * Statement echo: first line only, truncated, unless verbose
 */
export function formatStatementLine(statement: Statement, verbose: boolean): string {
  const line = formatStatement(statement);
  if (verbose) {
    return line;
  }
  const [first = ''] = line.split('\n');
  return truncate(first, TRUNCATE_STATEMENT);
}

/**
 * Display writing timestamped, coloured lines to the console
 */
export function createConsoleDisplay(verbosity: Verbosity): Display {
  const quiet = verbosity === 'quiet';
  const verbose = verbosity === 'verbose';

  const printLines = (text: string): void => {
    for (const line of text.split('\n')) {
      printLlm(verbosity === 'normal' ? truncate(line, TRUNCATE_TERMINAL_LINE) : line);
    }
  };

  return {
    statement(statement: Statement): void {
      if (quiet) return;
      printRunner(
        `${colors.cyan}${formatStatementLine(statement, verbose)}${colors.reset}`
      );
    },

    info(message: string): void {
      if (quiet) return;
      printRunner(message);
    },

    warning(message: string): void {
      printRunner(`${colors.yellow}${message}${colors.reset}`);
    },

    execComplete(summary: ExecSummary): void {
      if (quiet) return;
      const limit =
        summary.status === 'max_iterations' ? ' (stopped at request limit)' : '';
      printRunner(
        `${colors.dim}${summary.iterations} request(s), ${summary.tokensIn} in / ${summary.tokensOut} out, ` +
          `${formatCost(summary.cost)} (total ${formatCost(summary.totalCost)})${limit}${colors.reset}`
      );
    },

    debug(title: string, body: string): void {
      console.log(`${colors.bold}── ${title} ──${colors.reset}`);
      console.log(body);
    },

    onStateChange(state: LoopState): void {
      if (verbose) {
        printRunner(`${colors.dim}${state}${colors.reset}`);
      }
    },

    onAssistantMessage(message: Message): void {
      const text = messageText(message);
      if (text) {
        // Shown at every verbosity; only normal truncates
        printLines(text);
      }
    },

    onToolCall(call: CallPart): void {
      if (quiet) return;
      printTool(verbose ? formatCall(call) : formatCall(call, TRUNCATE_TOOL_IO));
    },

    onToolResult(result: ResultPart, failed: boolean): void {
      if (quiet) return;
      const color = failed ? colors.red : colors.dim;
      const text = verbose ? `${result.name} -> ${result.result}` : formatResultSummary(result);
      printTool(`${color}${text}${colors.reset}`);
    },
  };
}
