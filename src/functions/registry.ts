/**
 * Function registry: tools provided by external executables
 *
 * Discovery: every executable in the functions directory is run with
 * `--list-functions` and prints a JSON array of {name, description,
 * parameters}. Invocation: `<executable> <name>` with the JSON arguments
 * on stdin, run from the project directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { FunctionExecutionError, UnknownFunctionError } from '../errors.js';
import type { Logger } from '../output/logger.js';
import { type ProcessResult, type ProcessRunner, runProcess } from '../process/exec.js';
import type {
  FunctionCaller,
  FunctionDefinition,
  ToolDeclaration,
} from '../types/functions.js';
import {
  DISCOVERY_TIMEOUT_MS,
  FUNCTION_TIMEOUT_MS,
  LIST_FUNCTIONS_FLAG,
} from '../utils/constants.js';

const SKIPPED_EXTENSIONS = new Set(['.json', '.backup']);

const RESERVED_FILENAMES = new Set([
  'functions.json',
  'model_prices_and_context_window.json',
  'model_prices_and_context_window.json.backup',
]);

const definitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  parameters: z
    .object({
      type: z.literal('object'),
      properties: z.record(z.unknown()).default({}),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
});

const definitionListSchema = z.array(definitionSchema);

export interface FunctionRegistryOptions {
  /** Directory holding tool executables */
  directory: string;
  /** Working directory for tool invocations */
  projectDir: string;
  logger: Logger;
  runner?: ProcessRunner | undefined;
  discoveryTimeoutMs?: number | undefined;
  callTimeoutMs?: number | undefined;
}

export class FunctionRegistry implements FunctionCaller {
  private readonly definitions = new Map<string, FunctionDefinition>();
  private readonly runner: ProcessRunner;
  private readonly discoveryTimeoutMs: number;
  private readonly callTimeoutMs: number;

  constructor(private readonly options: FunctionRegistryOptions) {
    this.runner = options.runner ?? runProcess;
    this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS;
    this.callTimeoutMs = options.callTimeoutMs ?? FUNCTION_TIMEOUT_MS;
  }

  /**
   * Build a registry and run discovery once
   */
  static async discover(
    options: FunctionRegistryOptions
  ): Promise<FunctionRegistry> {
    const registry = new FunctionRegistry(options);
    await registry.load();
    return registry;
  }

  /**
   * Discover definitions from every provider executable.
   * First definition of a name wins; later duplicates are dropped.
   */
  async load(): Promise<FunctionDefinition[]> {
    this.definitions.clear();
    const providers = listProviderExecutables(this.options.directory, (entry, reason) =>
      this.options.logger.log(`Skipping ${entry}: ${reason}`)
    );

    for (const executable of providers) {
      const defs = await this.listFunctions(executable);
      for (const def of defs) {
        if (this.definitions.has(def.name)) {
          this.options.logger.log(
            `Function ${def.name} from ${executable} ignored: already defined`
          );
          continue;
        }
        this.definitions.set(def.name, def);
      }
    }

    return this.list();
  }

  list(): FunctionDefinition[] {
    return [...this.definitions.values()];
  }

  get(name: string): FunctionDefinition | undefined {
    return this.definitions.get(name);
  }

  toolDeclarations(): ToolDeclaration[] {
    return this.list().map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  /**
   * Invoke a tool and return its trimmed stdout
   */
  async call(name: string, args: Record<string, unknown>): Promise<string> {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownFunctionError(name);
    }

    let result: ProcessResult;
    try {
      result = await this.runner(definition.executable, [name], {
        cwd: this.options.projectDir,
        input: JSON.stringify(args),
        timeoutMs: this.callTimeoutMs,
      });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new FunctionExecutionError(name, msg);
    }

    if (result.timedOut) {
      throw new FunctionExecutionError(
        name,
        `timed out after ${this.callTimeoutMs / 1000}s`
      );
    }
    if (result.exitCode !== 0) {
      throw new FunctionExecutionError(
        name,
        result.stderr.trim() || 'Unknown error'
      );
    }
    return result.stdout.trim();
  }

  private async listFunctions(executable: string): Promise<FunctionDefinition[]> {
    const { logger } = this.options;
    try {
      const result = await this.runner(executable, [LIST_FUNCTIONS_FLAG], {
        cwd: this.options.directory,
        timeoutMs: this.discoveryTimeoutMs,
      });
      if (result.timedOut || result.exitCode !== 0) {
        logger.log(`Skipping ${executable}: --list-functions failed`);
        return [];
      }
      const defs = definitionListSchema.parse(JSON.parse(result.stdout));
      return defs.map((d) => ({ ...d, executable }));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.log(`Skipping ${executable}: ${msg}`);
      return [];
    }
  }
}

/**
 * Executable files of a functions directory, sorted by name
 */
export function listProviderExecutables(
  directory: string,
  onSkip?: (entry: string, reason: string) => void
): string[] {
  if (!fs.existsSync(directory)) {
    return [];
  }

  const providers: string[] = [];
  for (const name of fs.readdirSync(directory).sort()) {
    if (SKIPPED_EXTENSIONS.has(path.extname(name))) continue;
    if (RESERVED_FILENAMES.has(name)) continue;

    const fullPath = path.resolve(directory, name);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(fullPath);
    } catch (error) {
      onSkip?.(fullPath, error instanceof Error ? error.message : String(error));
      continue;
    }
    if (!stat.isFile()) continue;
    if (!isExecutable(fullPath)) continue;
    providers.push(fullPath);
  }
  return providers;
}

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
