/**
 * Tool-invocation loop
 *
 * AwaitingModel -> ExecutingTools -> (AwaitingModel | Done)
 *
 * Sends the conversation, executes every call in the reply in emission
 * order, feeds the results back, and repeats until the model answers
 * without calls or the request limit is reached.
 */

import type { Conversation } from '../conversation/conversation.js';
import { resultPart } from '../conversation/parts.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../output/logger.js';
import type { ProviderAdapter, Transport } from '../providers/types.js';
import {
  type CallPart,
  isCallPart,
  type Message,
  type ResultPart,
  type TextRenderer,
  type TokenUsage,
} from '../types/conversation.js';
import type { FunctionCaller } from '../types/functions.js';
import type { ModelDefinition } from '../types/models.js';
import { DEFAULT_MAX_TOOL_ITERATIONS } from '../utils/constants.js';

export type LoopState = 'AwaitingModel' | 'ExecutingTools' | 'Done';

/** Prefix of a result produced by a failed tool invocation */
export const TOOL_ERROR_PREFIX = 'Error: ';

export interface ToolLoopObserver {
  onStateChange?(state: LoopState): void;
  onAssistantMessage?(message: Message): void;
  onToolCall?(call: CallPart): void;
  onToolResult?(result: ResultPart, failed: boolean): void;
}

export interface ToolLoopContext {
  conversation: Conversation;
  adapter: ProviderAdapter;
  model: ModelDefinition;
  apiKey: string;
  functions: FunctionCaller;
  transport: Transport;
  render: TextRenderer;
  logger: Logger;
  timeoutMs: number;
  /** Model requests allowed in one loop */
  maxIterations?: number | undefined;
  maxTokens?: number | undefined;
  observer?: ToolLoopObserver | undefined;
  /** Called with each response's usage as soon as it is parsed */
  onUsage?: ((usage: TokenUsage) => void) | undefined;
}

export type ToolLoopStatus = 'done' | 'max_iterations';

export interface ToolLoopResult {
  status: ToolLoopStatus;
  /** Messages appended during this loop, in order */
  messages: Message[];
  tokensIn: number;
  tokensOut: number;
  /** Model requests issued */
  iterations: number;
}

/**
 * Run the loop against the conversation, mutating it in place
 */
export async function callLlm(ctx: ToolLoopContext): Promise<ToolLoopResult> {
  const { conversation, adapter, model, logger, observer } = ctx;
  const maxIterations = ctx.maxIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;

  const appended: Message[] = [];
  let tokensIn = 0;
  let tokensOut = 0;
  let iterations = 0;

  const transition = (state: LoopState): void => {
    observer?.onStateChange?.(state);
  };
  const finish = (status: ToolLoopStatus): ToolLoopResult => {
    transition('Done');
    return { status, messages: appended, tokensIn, tokensOut, iterations };
  };

  transition('AwaitingModel');

  while (iterations < maxIterations) {
    iterations += 1;

    const request = adapter.buildRequest(conversation.messages, model, {
      apiKey: ctx.apiKey,
      tools: ctx.functions.toolDeclarations(),
      render: ctx.render,
      maxTokens: ctx.maxTokens,
    });
    logger.logEvent({
      event: 'llm_request',
      provider: adapter.provider,
      model: model.modelId,
      iteration: iterations,
      messages: conversation.length,
    });

    const response = await ctx.transport(request, ctx.timeoutMs);
    const { message, usage } = adapter.fromWire(response);

    tokensIn += usage.tokensIn;
    tokensOut += usage.tokensOut;
    conversation.addUsage(usage.tokensIn, usage.tokensOut);
    ctx.onUsage?.(usage);

    const assistant = conversation.addMessage('assistant', message.content);
    appended.push(assistant);
    observer?.onAssistantMessage?.(message);

    const calls = message.content.filter(isCallPart);
    logger.logEvent({
      event: 'llm_response',
      tokensIn: usage.tokensIn,
      tokensOut: usage.tokensOut,
      calls: calls.map((c) => c.name),
    });

    if (calls.length === 0) {
      return finish('done');
    }

    transition('ExecutingTools');
    const results: ResultPart[] = [];
    for (const call of calls) {
      results.push(await executeCall(ctx, call));
    }
    appended.push(conversation.addMessage('tool', results));

    transition('AwaitingModel');
  }

  logger.logEvent({ event: 'tool_loop_limit', iterations });
  return finish('max_iterations');
}

/**
 * Invoke one call; any failure becomes an error result for the model
 */
async function executeCall(
  ctx: ToolLoopContext,
  call: CallPart
): Promise<ResultPart> {
  const { logger, observer } = ctx;
  observer?.onToolCall?.(call);
  logger.logEvent({
    event: 'function_call',
    name: call.name,
    id: call.id,
    arguments: call.arguments,
  });

  let output: string;
  let failed = false;
  try {
    output = await ctx.functions.call(call.name, call.arguments);
  } catch (error) {
    failed = true;
    output = `${TOOL_ERROR_PREFIX}${errorMessage(error)}`;
  }

  const result = resultPart(call.name, call.id, output);
  logger.logEvent({
    event: 'function_result',
    name: call.name,
    id: call.id,
    failed,
    result: output,
  });
  observer?.onToolResult?.(result, failed);
  return result;
}
