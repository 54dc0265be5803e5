/**
 * Host primitives available to `.cmd name(arg=value,...)`
 *
 * These run inside the runner process, unlike the external tools offered
 * to the model.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline/promises';

import { errorMessage, ScriptSyntaxError, UnknownBuiltinError } from '../errors.js';
import type { Logger } from '../output/logger.js';
import { spawnShell } from '../process/pty.js';

/**
 * Asks the operator a question and returns the answer
 */
export type Prompter = (question: string) => Promise<string>;

export interface BuiltinContext {
  /** Directory relative paths resolve against */
  cwd: string;
  logger: Logger;
  prompter: Prompter;
}

export type Builtin = (
  args: Readonly<Record<string, string>>,
  ctx: BuiltinContext
) => Promise<string>;

/**
 * A parsed `.cmd` value
 */
export interface CommandCall {
  name: string;
  /** Raw argument values, in declaration order */
  args: Record<string, string>;
}

/**
 * Parse `name(a=1,b=two)`. Values are split on commas and the first `=`;
 * they are taken verbatim.
 */
export function parseCommand(value: string): CommandCall {
  const trimmed = value.trim();
  const open = trimmed.indexOf('(');
  if (open <= 0 || !trimmed.endsWith(')')) {
    throw new ScriptSyntaxError(
      `.cmd expects name(arg=value,...), got: ${value}`
    );
  }

  const name = trimmed.slice(0, open).trim();
  const inner = trimmed.slice(open + 1, -1);
  const args: Record<string, string> = {};
  if (inner.trim() === '') {
    return { name, args };
  }

  for (const pair of inner.split(',')) {
    const eq = pair.indexOf('=');
    if (eq === -1) {
      throw new ScriptSyntaxError(`.cmd ${name}: argument '${pair}' has no '='`);
    }
    args[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  return { name, args };
}

function requireArg(
  builtin: string,
  args: Readonly<Record<string, string>>,
  name: string
): string {
  const value = args[name];
  if (value === undefined) {
    throw new ScriptSyntaxError(`${builtin} requires argument '${name}'`);
  }
  return value;
}

/**
 * Drop one pair of matching surrounding quotes
 */
export function unquote(value: string): string {
  const first = value[0];
  if ((first === '"' || first === "'") && value.length >= 2 && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}

const readfile: Builtin = async (args, ctx) => {
  const filename = path.resolve(ctx.cwd, requireArg('readfile', args, 'filename'));
  return fs.promises.readFile(filename, 'utf-8');
};

const writefile: Builtin = async (args, ctx) => {
  const filename = requireArg('writefile', args, 'filename');
  const content = requireArg('writefile', args, 'content');
  const target = path.resolve(ctx.cwd, filename);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, content, 'utf-8');
  return `Content written to file '${filename}'`;
};

const execcmd: Builtin = async (args, ctx) => {
  const command = unquote(requireArg('execcmd', args, 'cmd'));
  const result = await spawnShell({ command, cwd: ctx.cwd, logger: ctx.logger });
  if (result.exitCode !== 0) {
    return `Error: exit code ${result.exitCode}\n${result.output}`;
  }
  return result.output;
};

const askuser: Builtin = async (args, ctx) => {
  return ctx.prompter(requireArg('askuser', args, 'question'));
};

const wwwget: Builtin = async (args, ctx) => {
  const url = requireArg('wwwget', args, 'url');
  try {
    const response = await fetch(url);
    if (!response.ok) {
      ctx.logger.log(`wwwget ${url}: HTTP ${response.status}`);
      return `ERROR url not returned: ${url}`;
    }
    return await response.text();
  } catch (error) {
    ctx.logger.log(`wwwget ${url}: ${errorMessage(error)}`);
    return `ERROR url not returned: ${url}`;
  }
};

export const BUILTINS: Readonly<Record<string, Builtin>> = {
  readfile,
  writefile,
  execcmd,
  askuser,
  wwwget,
};

/**
 * Run a builtin by name
 */
export async function runBuiltin(
  name: string,
  args: Readonly<Record<string, string>>,
  ctx: BuiltinContext
): Promise<string> {
  const builtin = Object.hasOwn(BUILTINS, name) ? BUILTINS[name] : undefined;
  if (!builtin) {
    throw new UnknownBuiltinError(name);
  }
  return builtin(args, ctx);
}

/**
 * Prompter reading one line from the terminal
 */
export const terminalPrompter: Prompter = async (question) => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    return await rl.question(`${question} `);
  } finally {
    rl.close();
  }
};
