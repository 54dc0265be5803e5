/**
 * Statement handlers, one per keyword
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import { z } from 'zod';

import { parseCommand, runBuiltin } from '../builtins/index.js';
import { conversationToJson } from '../conversation/json.js';
import { loadImagePart, textPart } from '../conversation/parts.js';
import {
  DuplicateModelDeclarationError,
  NoMessageError,
  NoModelDeclaredError,
  ScriptSyntaxError,
} from '../errors.js';
import { serializeConversation } from '../providers/shared.js';
import { formatStatement } from '../script/parser.js';
import type { Keyword, Statement } from '../script/types.js';
import { setVariable } from '../script/variables.js';
import type { Message, Role } from '../types/conversation.js';
import { callLlm } from './tool-loop.js';
import type { VM } from './vm.js';

type StatementHandler = (vm: VM, statement: Statement) => Promise<void> | void;

const llmParamsSchema = z
  .object({
    model: z.string().min(1),
    max_tokens: z.number().int().positive().optional(),
  })
  .passthrough();

const stringListSchema = z.array(z.string());

const DEBUG_SECTIONS = ['header', 'llm', 'messages', 'statements', 'variables'] as const;

/**
 * Parse a JSON statement argument, reporting the keyword on failure
 */
function parseJsonValue(keyword: Keyword, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ScriptSyntaxError(`${keyword}: invalid JSON (${msg}): ${text}`);
  }
}

function parseStringList(keyword: Keyword, text: string): string[] {
  const parsed = stringListSchema.safeParse(parseJsonValue(keyword, text));
  if (!parsed.success) {
    throw new ScriptSyntaxError(`${keyword}: expected a JSON list of strings: ${text}`);
  }
  return parsed.data;
}

function requireLastMessage(vm: VM, keyword: Keyword): Message {
  const last = vm.conversation.lastMessage();
  if (!last) {
    throw new NoMessageError(keyword);
  }
  return last;
}

function addText(vm: VM, role: Role, value: string): void {
  vm.conversation.addMessage(role, value ? [textPart(value)] : []);
}

// === Handlers ===

const declareModel: StatementHandler = (vm, statement) => {
  if (vm.model) {
    throw new DuplicateModelDeclarationError();
  }

  const raw = statement.value.trim();
  const json = vm.substitute(raw.startsWith('{') ? raw : `{${raw}}`);
  const parsed = llmParamsSchema.safeParse(parseJsonValue('.llm', json));
  if (!parsed.success) {
    throw new ScriptSyntaxError(
      `.llm: expected an object with a "model" name: ${statement.value}`
    );
  }
  const params = parsed.data;

  const definition = vm.models.lookup(params.model);
  const adapter = vm.adapters.get(definition.provider);
  const apiKey = vm.credentials.getApiKey(definition.provider);

  vm.model = {
    definition,
    adapter,
    apiKey,
    params,
    maxTokens: params.max_tokens,
  };
  vm.conversation.provider = definition.provider;
  vm.conversation.model = definition.modelId;

  for (const [name, value] of Object.entries(params)) {
    setVariable(vm.variables, name, value);
  }
  setVariable(vm.variables, 'provider', definition.provider);
  setVariable(vm.variables, 'company', definition.company);
  setVariable(vm.variables, 'filename', vm.filename);
  setVariable(vm.variables, 'llm', definition);
};

const appendText: StatementHandler = (vm, statement) => {
  const last = vm.conversation.lastMessage();
  if (last && last.role !== 'tool') {
    vm.conversation.addMessage(last.role, [textPart(statement.value)]);
  } else {
    vm.conversation.addMessage('user', [textPart(statement.value)]);
  }
};

const includeFile: StatementHandler = async (vm, statement) => {
  const last = requireLastMessage(vm, '.include');
  const filename = path.resolve(vm.cwd, vm.substitute(statement.value.trim()));
  const content = await fs.promises.readFile(filename, 'utf-8');
  vm.conversation.addMessage(last.role, [textPart(content)]);
};

const includeImage: StatementHandler = (vm, statement) => {
  const last = requireLastMessage(vm, '.image');
  const filename = path.resolve(vm.cwd, vm.substitute(statement.value.trim()));
  vm.conversation.addMessage(last.role, [loadImagePart(filename)]);
};

const runCommand: StatementHandler = async (vm, statement) => {
  const last = requireLastMessage(vm, '.cmd');
  const { name, args } = parseCommand(statement.value);

  const expanded: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    expanded[key] = vm.substitute(value);
  }

  const output = await runBuiltin(name, expanded, {
    cwd: vm.cwd,
    logger: vm.logger,
    prompter: vm.prompter,
  });
  vm.conversation.addMessage(last.role, [textPart(output)]);
};

const executeTurn: StatementHandler = async (vm) => {
  const active = vm.model;
  if (!active) {
    throw new NoModelDeclaredError();
  }

  // Prices and capabilities are fixed once the first request goes out
  vm.models.lock();

  // Totals grow per response so a failed loop still reports what it spent
  let cost = 0;
  const result = await callLlm({
    conversation: vm.conversation,
    adapter: active.adapter,
    model: active.definition,
    apiKey: active.apiKey,
    functions: vm.functions,
    transport: vm.transport,
    render: vm.substitute,
    logger: vm.logger,
    timeoutMs: vm.config.requestTimeoutMs,
    maxIterations: vm.config.maxToolIterations,
    maxTokens: active.maxTokens,
    observer: vm.display,
    onUsage: (usage) => {
      const spent = vm.models.cost(active.definition.modelId, usage.tokensIn, usage.tokensOut);
      vm.tokensIn += usage.tokensIn;
      vm.tokensOut += usage.tokensOut;
      vm.cost += spent;
      cost += spent;
    },
  });

  if (result.status === 'max_iterations') {
    vm.display.warning(
      `Tool loop stopped after ${result.iterations} model requests (limit ${vm.config.maxToolIterations})`
    );
  }
  vm.display.execComplete({
    status: result.status,
    iterations: result.iterations,
    tokensIn: result.tokensIn,
    tokensOut: result.tokensOut,
    cost,
    totalCost: vm.cost,
  });

  vm.writeTranscript();
};

const clearFiles: StatementHandler = (vm, statement) => {
  const patterns = parseStringList('.clear', statement.value.trim());
  for (const pattern of patterns) {
    const files = fg.sync(vm.substitute(pattern), {
      cwd: vm.cwd,
      onlyFiles: true,
      absolute: true,
    });
    for (const file of files) {
      fs.unlinkSync(file);
      vm.display.info(`Deleted ${path.relative(vm.cwd, file)}`);
    }
  }
};

const debugDump: StatementHandler = (vm, statement) => {
  let value = statement.value.trim() || '["all"]';
  if (!value.startsWith('[')) {
    value = `[${value}]`;
  }
  const requested = parseStringList('.debug', value);
  const sections = requested.includes('all') ? [...DEBUG_SECTIONS] : requested;

  for (const section of sections) {
    vm.display.debug(section, renderDebugSection(vm, section));
  }
};

/**
 * Text of one `.debug` section
 */
export function renderDebugSection(vm: VM, section: string): string {
  switch (section) {
    case 'header':
      return [
        `file: ${vm.filename}`,
        `statement: ${vm.ip}/${vm.statements.length}`,
        `tokens: ${vm.tokensIn} in / ${vm.tokensOut} out`,
        `cost: ${vm.cost}`,
      ].join('\n');
    case 'llm':
      return vm.model
        ? JSON.stringify({ ...vm.model.definition, params: vm.model.params }, null, 2)
        : 'no model declared';
    case 'messages': {
      if (vm.model) {
        const wire = serializeConversation(vm.conversation, vm.model.adapter, vm.substitute);
        return JSON.stringify(wire, null, 2);
      }
      return JSON.stringify(
        conversationToJson(vm.conversation, { omitImageData: true }).messages,
        null,
        2
      );
    }
    case 'statements':
      return vm.statements.map(formatStatement).join('\n');
    case 'variables':
      return JSON.stringify(vm.variables.values, null, 2);
    default:
      throw new ScriptSyntaxError(
        `.debug: unknown section '${section}' (expected ${DEBUG_SECTIONS.join(', ')} or all)`
      );
  }
}

const HANDLERS: Readonly<Record<Keyword, StatementHandler>> = {
  '.#': () => undefined,
  '.assistant': (vm, s) => addText(vm, 'assistant', s.value),
  '.clear': clearFiles,
  '.cmd': runCommand,
  '.debug': debugDump,
  '.exec': executeTurn,
  '.exit': (vm) => vm.halt(),
  '.image': includeImage,
  '.include': includeFile,
  '.llm': declareModel,
  '.system': (vm, s) => addText(vm, 'system', s.value),
  '.text': appendText,
  '.user': (vm, s) => addText(vm, 'user', s.value),
};

/**
 * Execute one statement against the VM
 */
export async function executeStatement(vm: VM, statement: Statement): Promise<void> {
  await HANDLERS[statement.keyword](vm, statement);
}
