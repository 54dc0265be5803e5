/**
 * Adapter for vendors speaking the OpenAI chat-completions dialect
 * (OpenAI, Mistral, DeepSeek, xAI, Groq)
 */

import { z } from 'zod';

import { callPart, textPart } from '../conversation/parts.js';
import { MalformedResponseError } from '../errors.js';
import type {
  Message,
  MessagePart,
  TextRenderer,
} from '../types/conversation.js';
import { parseVendorResponse } from './shared.js';
import type {
  ParsedResponse,
  ProviderAdapter,
  ProviderRequest,
  WireConversation,
} from './types.js';

// --- Wire types ---

export type OpenAiContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface OpenAiToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export interface OpenAiAssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: OpenAiToolCall[];
}

export type OpenAiMessage =
  | { role: 'system' | 'user'; content: string | OpenAiContentPart[] }
  | OpenAiAssistantMessage
  | { role: 'tool'; tool_call_id: string; content: string };

const toolCallSchema = z.object({
  id: z.string(),
  function: z.object({
    name: z.string(),
    // Some vendors send an object instead of a JSON string
    arguments: z.union([z.string(), z.record(z.unknown())]),
  }),
});

const responseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(toolCallSchema).nullish(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number() })
    .optional(),
});

export interface OpenAiCompatibleConfig {
  provider: string;
  /** API root without trailing slash, e.g. https://api.openai.com/v1 */
  baseUrl: string;
}

/** Base URLs of the vendors served by this dialect */
export const OPENAI_COMPATIBLE_VENDORS: readonly OpenAiCompatibleConfig[] = [
  { provider: 'openai', baseUrl: 'https://api.openai.com/v1' },
  { provider: 'mistral', baseUrl: 'https://api.mistral.ai/v1' },
  { provider: 'deepseek', baseUrl: 'https://api.deepseek.com/v1' },
  { provider: 'xai', baseUrl: 'https://api.x.ai/v1' },
  { provider: 'groq', baseUrl: 'https://api.groq.com/openai/v1' },
];

/**
 * Decode tool-call arguments into a plain object
 */
export function parseToolArguments(
  name: string,
  raw: string | Record<string, unknown>
): Record<string, unknown> {
  if (typeof raw !== 'string') {
    return raw;
  }
  if (raw.trim() === '') {
    return {};
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new MalformedResponseError(
      `Arguments for tool call ${name} are not valid JSON`,
      { cause: error }
    );
  }
  const parsed = z.record(z.unknown()).safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Arguments for tool call ${name} are not a JSON object`
    );
  }
  return parsed.data;
}

function userContent(
  parts: readonly MessagePart[],
  render: TextRenderer
): string | OpenAiContentPart[] {
  const hasImage = parts.some((p) => p.type === 'image');
  if (!hasImage) {
    return parts
      .flatMap((p) => (p.type === 'text' ? [render(p.text)] : []))
      .join('\n');
  }
  return parts.flatMap((p): OpenAiContentPart[] => {
    if (p.type === 'text') return [{ type: 'text', text: render(p.text) }];
    if (p.type === 'image') {
      return [
        {
          type: 'image_url',
          image_url: { url: `data:${p.mediaType};base64,${p.data}` },
        },
      ];
    }
    return [];
  });
}

function toMessages(
  message: Message,
  render: TextRenderer
): OpenAiMessage[] {
  const { role, content } = message;

  if (role === 'assistant') {
    const text = content
      .flatMap((p) => (p.type === 'text' ? [render(p.text)] : []))
      .join('\n');
    const toolCalls = content.flatMap((p): OpenAiToolCall[] =>
      p.type === 'call'
        ? [
            {
              id: p.id,
              type: 'function',
              function: { name: p.name, arguments: JSON.stringify(p.arguments) },
            },
          ]
        : []
    );
    const wire: OpenAiAssistantMessage = {
      role,
      content: text === '' ? null : text,
    };
    if (toolCalls.length > 0) {
      wire.tool_calls = toolCalls;
    }
    return [wire];
  }

  if (role === 'tool') {
    // One wire message per result; stray text follows as a user turn
    const results = content.flatMap((p): OpenAiMessage[] =>
      p.type === 'result'
        ? [{ role: 'tool', tool_call_id: p.id, content: p.result }]
        : []
    );
    const rest = content.filter((p) => p.type !== 'result');
    if (rest.length > 0) {
      results.push({ role: 'user', content: userContent(rest, render) });
    }
    return results;
  }

  return [{ role, content: userContent(content, render) }];
}

function toWire(
  messages: readonly Message[],
  render: TextRenderer
): WireConversation<OpenAiMessage> {
  return { messages: messages.flatMap((m) => toMessages(m, render)) };
}

/**
 * Build an adapter for one vendor of the chat-completions dialect
 */
export function createOpenAiCompatibleAdapter(
  config: OpenAiCompatibleConfig
): ProviderAdapter {
  return {
    provider: config.provider,

    toWire,

    buildRequest(messages, model, options): ProviderRequest {
      const body: Record<string, unknown> = {
        model: model.modelId,
        messages: toWire(messages, options.render).messages,
      };
      if (options.tools.length > 0) {
        body['tools'] = options.tools.map((tool) => ({
          type: 'function',
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          },
        }));
        body['tool_choice'] = 'auto';
      }
      if (options.maxTokens !== undefined) {
        body['max_tokens'] = options.maxTokens;
      }
      return {
        url: `${config.baseUrl}/chat/completions`,
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body,
      };
    },

    fromWire(response: unknown): ParsedResponse {
      const data = parseVendorResponse(responseSchema, response, config.provider);
      const [choice] = data.choices;
      const content: MessagePart[] = [];

      const text = choice?.message.content;
      if (text) {
        content.push(textPart(text));
      }
      for (const call of choice?.message.tool_calls ?? []) {
        content.push(
          callPart(
            call.function.name,
            parseToolArguments(call.function.name, call.function.arguments),
            call.id
          )
        );
      }

      return {
        message: { role: 'assistant', content },
        usage: {
          tokensIn: data.usage?.prompt_tokens ?? 0,
          tokensOut: data.usage?.completion_tokens ?? 0,
        },
      };
    },
  };
}
