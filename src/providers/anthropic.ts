/**
 * Anthropic Messages API adapter
 */

import { z } from 'zod';

import { callPart, textPart } from '../conversation/parts.js';
import type {
  Message,
  MessagePart,
  TextRenderer,
} from '../types/conversation.js';
import { DEFAULT_MAX_TOKENS } from '../utils/constants.js';
import { parseVendorResponse, splitSystem } from './shared.js';
import type {
  ParsedResponse,
  ProviderAdapter,
  ProviderRequest,
  RequestOptions,
  WireConversation,
} from './types.js';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';

// --- Wire types ---

export type AnthropicBlock =
  | { type: 'text'; text: string }
  | {
      type: 'image';
      source: { type: 'base64'; media_type: string; data: string };
    }
  | {
      type: 'tool_use';
      id: string;
      name: string;
      input: Record<string, unknown>;
    }
  | { type: 'tool_result'; tool_use_id: string; content: string };

export interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: AnthropicBlock[];
}

const responseSchema = z.object({
  content: z.array(
    z.discriminatedUnion('type', [
      z.object({ type: z.literal('text'), text: z.string() }),
      z.object({
        type: z.literal('tool_use'),
        id: z.string(),
        name: z.string(),
        input: z.record(z.unknown()),
      }),
    ])
  ),
  usage: z
    .object({ input_tokens: z.number(), output_tokens: z.number() })
    .optional(),
});

function toBlock(part: MessagePart, render: TextRenderer): AnthropicBlock {
  switch (part.type) {
    case 'text':
      return { type: 'text', text: render(part.text) };
    case 'image':
      return {
        type: 'image',
        source: { type: 'base64', media_type: part.mediaType, data: part.data },
      };
    case 'call':
      return {
        type: 'tool_use',
        id: part.id,
        name: part.name,
        input: part.arguments,
      };
    case 'result':
      return { type: 'tool_result', tool_use_id: part.id, content: part.result };
  }
}

function toMessages(
  messages: readonly Message[],
  render: TextRenderer
): AnthropicMessage[] {
  const wire: AnthropicMessage[] = [];
  for (const message of messages) {
    // Only user/assistant exist on the wire; tool results ride in user turns
    const role = message.role === 'assistant' ? 'assistant' : 'user';
    const blocks = message.content.map((p) => toBlock(p, render));
    const last = wire[wire.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      wire.push({ role, content: blocks });
    }
  }
  return wire;
}

function toWire(
  messages: readonly Message[],
  render: TextRenderer
): WireConversation<AnthropicMessage> {
  const { system, rest } = splitSystem(messages, render);
  return { system, messages: toMessages(rest, render) };
}

export const anthropicAdapter: ProviderAdapter = {
  provider: 'anthropic',

  toWire,

  buildRequest(messages, model, options: RequestOptions): ProviderRequest {
    const { system, messages: wire } = toWire(messages, options.render);
    const body: Record<string, unknown> = {
      model: model.modelId,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: wire,
    };
    if (system !== undefined) {
      body['system'] = system;
    }
    if (options.tools.length > 0) {
      body['tools'] = options.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters,
      }));
    }
    return {
      url: API_URL,
      headers: {
        'x-api-key': options.apiKey,
        'anthropic-version': API_VERSION,
      },
      body,
    };
  },

  fromWire(response: unknown): ParsedResponse {
    const data = parseVendorResponse(responseSchema, response, 'anthropic');
    const content: MessagePart[] = data.content.map((block) =>
      block.type === 'text'
        ? textPart(block.text)
        : callPart(block.name, block.input, block.id)
    );
    return {
      message: { role: 'assistant', content },
      usage: {
        tokensIn: data.usage?.input_tokens ?? 0,
        tokensOut: data.usage?.output_tokens ?? 0,
      },
    };
  },
};
