#!/usr/bin/env node
/**
 * Prompt Runner - executes prompt scripts against LLM providers
 * Shows statements, model output and tool calls in real-time
 */

import * as path from 'path';

import { parseArgs } from './cli/args.js';
import { VM } from './core/vm.js';
import { EnvCredentialStore } from './credentials/index.js';
import { errorMessage } from './errors.js';
import { FunctionRegistry } from './functions/index.js';
import { DEFAULT_MODELS_FILE, ModelRegistry, registerModelFiles } from './models/index.js';
import { colors, formatDuration, printError, printRunner } from './output/colors.js';
import { createConsoleDisplay, messageText } from './output/formatter.js';
import { createLogger, type Logger, nullLogger, resolveLogDir } from './output/logger.js';
import { createDefaultAdapters, postJson } from './providers/index.js';
import { formatStatement, loadScript } from './script/index.js';
import { FileSessionStore } from './sessions/index.js';
import { DEFAULT_CONFIG, type RunnerConfig } from './types/runner.js';
import { PROJECT_DIR_ENV } from './utils/constants.js';
import { formatCost } from './utils/formatting.js';

/**
 * Directory tools run in and relative script paths resolve against
 */
function projectDir(): string {
  return process.env[PROJECT_DIR_ENV] ?? process.cwd();
}

function loadModels(config: RunnerConfig): ModelRegistry {
  const registry = new ModelRegistry();
  const files = [DEFAULT_MODELS_FILE];
  if (config.modelsFile) {
    files.push(path.resolve(config.modelsFile));
  }
  registerModelFiles(registry, files);
  return registry;
}

function discoverFunctions(
  config: RunnerConfig,
  logger: Logger
): Promise<FunctionRegistry> {
  return FunctionRegistry.discover({
    directory: path.resolve(config.functionsDir),
    projectDir: projectDir(),
    logger,
  });
}

async function runCommand(
  file: string,
  variables: Record<string, string>,
  config: RunnerConfig
): Promise<boolean> {
  const start = Date.now();
  const logger = createLogger(
    config.enableLog,
    resolveLogDir(projectDir(), config.logDir),
    file
  );
  const display = createConsoleDisplay(config.verbosity);

  try {
    const script = loadScript(file);
    const models = loadModels(config);
    const functions = await discoverFunctions(config, logger);

    display.info(
      `Script: ${file} | ${script.statements.length} statements | ${functions.list().length} tools`
    );
    if (logger.filePath) {
      display.info(`Log: ${logger.filePath}`);
    }

    const vm = new VM({
      filename: file,
      statements: script.statements,
      models,
      adapters: createDefaultAdapters(),
      functions,
      credentials: new EnvCredentialStore(),
      transport: postJson,
      logger,
      config,
      variables,
      display,
      cwd: projectDir(),
    });

    try {
      const result = await vm.run();
      display.info(
        `Done in ${formatDuration(Date.now() - start)}: ${result.tokensIn} in / ${result.tokensOut} out, ${formatCost(result.cost)}`
      );
      return true;
    } finally {
      // Saved whether or not the script finished, so a failed run can be inspected
      if (config.enableLog) {
        const sessionId = new FileSessionStore(config.sessionDir).save(vm.snapshot());
        display.info(`Session: ${sessionId}`);
      }
    }
  } catch (err) {
    printError(errorMessage(err));
    return false;
  } finally {
    logger.close();
  }
}

function codeCommand(file: string): boolean {
  const script = loadScript(file);
  for (const statement of script.statements) {
    console.log(formatStatement(statement));
  }
  return true;
}

function modelsCommand(filter: string | null, config: RunnerConfig): boolean {
  const models = loadModels(config).list(filter ?? undefined);
  for (const m of models) {
    const price = `${formatCost(m.inputCostPerToken * 1e6)}/${formatCost(m.outputCostPerToken * 1e6)} per 1M`;
    console.log(
      `${m.provider.padEnd(10)} ${colors.cyan}${m.modelId.padEnd(32)}${colors.reset} ${price.padEnd(24)} ${colors.dim}${m.description}${colors.reset}`
    );
  }
  printRunner(`${models.length} model(s)`);
  return true;
}

async function functionsCommand(config: RunnerConfig): Promise<boolean> {
  const registry = await discoverFunctions(config, nullLogger);
  for (const fn of registry.list()) {
    console.log(
      `${colors.cyan}${fn.name.padEnd(24)}${colors.reset} ${fn.description} ${colors.dim}(${path.basename(fn.executable)})${colors.reset}`
    );
  }
  printRunner(`${registry.list().length} function(s) in ${path.resolve(config.functionsDir)}`);
  return true;
}

function showCommand(sessionId: string, config: RunnerConfig): boolean {
  const session = new FileSessionStore(config.sessionDir).load(sessionId);
  const { conversation, vmState, totals } = session;
  printRunner(
    `Session ${session.sessionId} (${session.savedAt}): ${vmState.filename}, model ${vmState.modelId ?? 'none'}, statement ${vmState.ip}`
  );
  for (const message of conversation.messages) {
    console.log(`${colors.bold}${message.role}${colors.reset}`);
    const text = messageText(message);
    if (text) console.log(text);
    for (const part of message.content) {
      if (part.type === 'call') {
        console.log(`${colors.cyan}call ${part.name}(${JSON.stringify(part.arguments)})${colors.reset}`);
      } else if (part.type === 'result') {
        console.log(`${colors.dim}result ${part.name}: ${part.result}${colors.reset}`);
      } else if (part.type === 'image') {
        console.log(`${colors.dim}image ${part.filename}${colors.reset}`);
      }
    }
  }
  printRunner(
    `${totals.tokensIn} in / ${totals.tokensOut} out, ${formatCost(totals.cost)}`
  );
  return true;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  const config: RunnerConfig = { ...DEFAULT_CONFIG, ...parsed.config };
  const target = parsed.target;

  let success: boolean;
  switch (parsed.subcommand) {
    case 'run':
      success = await runCommand(target ?? '', parsed.variables, config);
      break;
    case 'code':
      success = codeCommand(target ?? '');
      break;
    case 'models':
      success = modelsCommand(target, config);
      break;
    case 'functions':
      success = await functionsCommand(config);
      break;
    case 'show':
      success = showCommand(target ?? '', config);
      break;
  }
  process.exit(success ? 0 : 1);
}

// Run main
main().catch((err: unknown) => {
  printError(errorMessage(err));
  process.exit(1);
});
