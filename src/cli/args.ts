/**
 * CLI argument parsing
 */

import { createRequire } from 'module';
import { z } from 'zod';

import type {
  ParsedArgs,
  RunnerConfig,
  Subcommand,
  Verbosity,
} from '../types/runner.js';

const require = createRequire(import.meta.url);
const pkg = z
  .object({ version: z.string() })
  .parse(require('../../package.json'));

const USAGE = 'Usage: prompt-runner [options] <run|code|models|functions|show> [args...]';

interface RawArgs {
  positionalArgs: string[];
  config: Partial<RunnerConfig>;
}

function fail(message: string, usage: string = USAGE): never {
  console.error(`Error: ${message}`);
  console.error(usage);
  process.exit(1);
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n <= 0) {
    fail(`${flag} expects a positive integer, got '${value ?? ''}'`);
  }
  return n;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    fail(`${flag} requires a value`);
  }
  return value;
}

/**
 * Extract options from raw args, returning positional args and config
 */
function extractOptions(args: string[]): RawArgs {
  // Handle --version and --help early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let verbosity: Verbosity = 'normal';
  const config: Partial<RunnerConfig> = {};
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--quiet') {
      verbosity = 'quiet';
    } else if (arg === '--normal') {
      verbosity = 'normal';
    } else if (arg === '--verbose') {
      verbosity = 'verbose';
    } else if (arg === '--no-log') {
      config.enableLog = false;
    } else if (arg === '--functions-dir') {
      config.functionsDir = requireValue(arg, args[++i]);
    } else if (arg === '--models') {
      config.modelsFile = requireValue(arg, args[++i]);
    } else if (arg === '--max-iterations') {
      config.maxToolIterations = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--timeout') {
      config.requestTimeoutMs = parsePositiveInt(arg, args[++i]);
    } else if (arg.startsWith('--')) {
      fail(`unknown option '${arg}'`);
    } else {
      positionalArgs.push(arg);
    }
  }

  config.verbosity = verbosity;
  return { positionalArgs, config };
}

/**
 * Split name=value pairs into a variable map
 */
export function parseVariableArgs(args: string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const arg of args) {
    const eq = arg.indexOf('=');
    if (eq <= 0) {
      fail(`variable '${arg}' must be written name=value`);
    }
    variables[arg.slice(0, eq)] = arg.slice(eq + 1);
  }
  return variables;
}

const VALID_SUBCOMMANDS = ['run', 'code', 'models', 'functions', 'show'] as const;

function isValidSubcommand(value: string): value is Subcommand {
  return VALID_SUBCOMMANDS.some((s) => s === value);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const { positionalArgs, config } = extractOptions(args);

  const firstArg = positionalArgs[0];
  if (!firstArg) {
    fail('subcommand required');
  }
  if (!isValidSubcommand(firstArg)) {
    fail(
      `unknown subcommand '${firstArg}'`,
      `Valid subcommands: ${VALID_SUBCOMMANDS.join(', ')}\n${USAGE}`
    );
  }

  const subcommand = firstArg;
  const second = positionalArgs[1] ?? null;
  let variables: Record<string, string> = {};

  switch (subcommand) {
    case 'run':
      if (!second) {
        fail('script file required', 'Usage: prompt-runner run <file> [name=value...]');
      }
      variables = parseVariableArgs(positionalArgs.slice(2));
      break;
    case 'code':
      if (!second) {
        fail('script file required', 'Usage: prompt-runner code <file>');
      }
      break;
    case 'show':
      if (!second) {
        fail('session id required', 'Usage: prompt-runner show <session-id>');
      }
      break;
    case 'models':
    case 'functions':
      break;
  }

  return { subcommand, target: second, variables, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
Prompt Runner - executes prompt scripts against LLM providers

Usage:
  prompt-runner [options] run <file> [name=value...]
  prompt-runner [options] code <file>
  prompt-runner [options] models [filter]
  prompt-runner [options] functions
  prompt-runner [options] show <session-id>

Subcommands:
  run <file> [vars]     Execute a prompt script; name=value pairs become variables
  code <file>           List the parsed statements of a script
  models [filter]       List known models, optionally filtered by id or company
  functions             List tools discovered in the functions directory
  show <session-id>     Print a saved session

Options:
  --quiet                  Model answers and errors only
  --normal                 Default output level
  --verbose                Full output with all details
  --no-log                 Disable log file and transcript (enabled by default)
  --functions-dir <dir>    Tool executables (default: prompts/functions)
  --models <file>          Extra model catalog merged over the bundled one
  --max-iterations <n>     Model requests allowed per .exec (default: 20)
  --timeout <ms>           Provider request timeout (default: 120000)
  --version, -V            Print version

API keys are read from <PROVIDER>_API_KEY, e.g. ANTHROPIC_API_KEY.
`);
}
