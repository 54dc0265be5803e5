/**
 * Statement interpreter
 *
 * Executes parsed statements strictly in order against one conversation.
 * Any failure stops the script and surfaces as a StatementError; tool
 * failures inside `.exec` are handled by the tool loop instead.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { Prompter } from '../builtins/index.js';
import { terminalPrompter } from '../builtins/index.js';
import { Conversation } from '../conversation/conversation.js';
import { conversationToJson } from '../conversation/json.js';
import type { CredentialStore } from '../credentials/index.js';
import { StatementError } from '../errors.js';
import type { ModelRegistry } from '../models/registry.js';
import { type Display, silentDisplay } from '../output/formatter.js';
import { type Logger, resolveLogDir, scriptBaseName } from '../output/logger.js';
import type { AdapterRegistry } from '../providers/registry.js';
import type { ProviderAdapter, Transport } from '../providers/types.js';
import { createVariableStore, substituteVariables } from '../script/variables.js';
import type { Statement, VariableStore } from '../script/types.js';
import type { NewSession } from '../sessions/index.js';
import type { FunctionCaller } from '../types/functions.js';
import type { ModelDefinition } from '../types/models.js';
import { DEFAULT_CONFIG, type RunnerConfig } from '../types/runner.js';
import { executeStatement } from './statements.js';

/**
 * Model bound by `.llm`
 */
export interface ActiveModel {
  definition: ModelDefinition;
  adapter: ProviderAdapter;
  apiKey: string;
  /** Parameters given on the `.llm` line */
  params: Record<string, unknown>;
  /** Output token budget from `max_tokens`, if given */
  maxTokens: number | undefined;
}

export interface VmOptions {
  filename: string;
  statements: readonly Statement[];
  models: ModelRegistry;
  adapters: AdapterRegistry;
  functions: FunctionCaller;
  credentials: CredentialStore;
  transport: Transport;
  logger: Logger;
  config?: Partial<RunnerConfig> | undefined;
  /** Initial variables, e.g. name=value pairs from the command line */
  variables?: Record<string, unknown> | undefined;
  display?: Display | undefined;
  prompter?: Prompter | undefined;
  /** Directory relative file names resolve against */
  cwd?: string | undefined;
}

export type VmStatus = 'completed' | 'exited';

export interface VmResult {
  status: VmStatus;
  conversation: Conversation;
  tokensIn: number;
  tokensOut: number;
  cost: number;
  /** Path of the last transcript written, if any */
  transcriptPath: string | null;
}

export class VM {
  readonly filename: string;
  readonly statements: readonly Statement[];
  readonly conversation = new Conversation();
  readonly variables: VariableStore;
  readonly config: RunnerConfig;
  readonly models: ModelRegistry;
  readonly adapters: AdapterRegistry;
  readonly functions: FunctionCaller;
  readonly credentials: CredentialStore;
  readonly transport: Transport;
  readonly logger: Logger;
  readonly display: Display;
  readonly prompter: Prompter;
  readonly cwd: string;

  /** Index of the statement being executed */
  ip = 0;
  model: ActiveModel | null = null;
  tokensIn = 0;
  tokensOut = 0;
  cost = 0;
  transcriptPath: string | null = null;
  private halted = false;

  constructor(options: VmOptions) {
    this.filename = options.filename;
    this.statements = options.statements;
    this.models = options.models;
    this.adapters = options.adapters;
    this.functions = options.functions;
    this.credentials = options.credentials;
    this.transport = options.transport;
    this.logger = options.logger;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.variables = createVariableStore(options.variables);
    this.display = options.display ?? silentDisplay;
    this.prompter = options.prompter ?? terminalPrompter;
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Expand placeholders against the current variables
   */
  readonly substitute = (text: string): string =>
    substituteVariables(text, this.variables);

  /**
   * Stop after the current statement
   */
  halt(): void {
    this.halted = true;
  }

  /**
   * Run from the current instruction pointer to the end or `.exit`
   */
  async run(): Promise<VmResult> {
    while (this.ip < this.statements.length && !this.halted) {
      const statement = this.statements[this.ip];
      if (statement === undefined) break;

      this.logger.logEvent({
        event: 'statement',
        sequenceNo: statement.sequenceNo,
        keyword: statement.keyword,
        value: statement.value,
      });
      this.display.statement(statement);

      try {
        await executeStatement(this, statement);
      } catch (error) {
        const wrapped =
          error instanceof StatementError
            ? error
            : new StatementError(statement.sequenceNo, statement.keyword, error);
        this.logger.logEvent({
          event: 'script_error',
          sequenceNo: statement.sequenceNo,
          keyword: statement.keyword,
          message: wrapped.message,
        });
        throw wrapped;
      }
      this.ip += 1;
    }

    const status: VmStatus = this.halted ? 'exited' : 'completed';
    this.logger.logEvent({
      event: 'script_complete',
      status,
      tokensIn: this.tokensIn,
      tokensOut: this.tokensOut,
      cost: this.cost,
    });

    return {
      status,
      conversation: this.conversation,
      tokensIn: this.tokensIn,
      tokensOut: this.tokensOut,
      cost: this.cost,
      transcriptPath: this.transcriptPath,
    };
  }

  /**
   * Write the conversation to `<logDir>/<script>-messages.json`
   */
  writeTranscript(): string | null {
    if (!this.config.enableLog) {
      return null;
    }
    const logDir = resolveLogDir(this.cwd, this.config.logDir);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const file = path.join(logDir, `${scriptBaseName(this.filename)}-messages.json`);
    const transcript = conversationToJson(this.conversation, { omitImageData: true });
    fs.writeFileSync(file, JSON.stringify(transcript, null, 2));
    this.transcriptPath = file;
    this.logger.logEvent({ event: 'transcript', path: file });
    return file;
  }

  /**
   * State needed to save and later resume this run
   */
  snapshot(): NewSession {
    return {
      conversation: conversationToJson(this.conversation),
      vmState: {
        filename: this.filename,
        ip: this.ip,
        modelId: this.model?.definition.modelId ?? null,
      },
      variables: { ...this.variables.values },
      totals: {
        tokensIn: this.tokensIn,
        tokensOut: this.tokensOut,
        cost: this.cost,
      },
    };
  }
}
