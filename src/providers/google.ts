/**
 * Google Gemini generateContent adapter
 */

import { z } from 'zod';

import { callPart, textPart } from '../conversation/parts.js';
import type {
  Message,
  MessagePart,
  TextRenderer,
} from '../types/conversation.js';
import { parseVendorResponse, splitSystem } from './shared.js';
import type {
  ParsedResponse,
  ProviderAdapter,
  ProviderRequest,
  WireConversation,
} from './types.js';

const API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';

// --- Wire types ---

export type GooglePart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } }
  | {
      functionCall: {
        name: string;
        args: Record<string, unknown>;
        id: string;
      };
    }
  | {
      functionResponse: {
        name: string;
        id: string;
        response: { result: string };
      };
    };

export interface GoogleContent {
  role: 'user' | 'model';
  parts: GooglePart[];
}

const partSchema = z.union([
  z.object({ text: z.string() }),
  z.object({
    functionCall: z.object({
      name: z.string(),
      args: z.record(z.unknown()).default({}),
      id: z.string().optional(),
    }),
  }),
]);

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(partSchema).default([]) }),
      })
    )
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
    })
    .optional(),
});

function toPart(part: MessagePart, render: TextRenderer): GooglePart {
  switch (part.type) {
    case 'text':
      return { text: render(part.text) };
    case 'image':
      return { inlineData: { mimeType: part.mediaType, data: part.data } };
    case 'call':
      return {
        functionCall: { name: part.name, args: part.arguments, id: part.id },
      };
    case 'result':
      return {
        functionResponse: {
          name: part.name,
          id: part.id,
          response: { result: part.result },
        },
      };
  }
}

function toWire(
  messages: readonly Message[],
  render: TextRenderer
): WireConversation<GoogleContent> {
  const { system, rest } = splitSystem(messages, render);
  const contents: GoogleContent[] = [];
  for (const message of rest) {
    const role = message.role === 'assistant' ? 'model' : 'user';
    const parts = message.content.map((p) => toPart(p, render));
    const last = contents[contents.length - 1];
    if (last && last.role === role) {
      last.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  }
  return { system, messages: contents };
}

/**
 * Gemini rejects JSON-Schema `additionalProperties` at any depth
 */
export function withoutAdditionalProperties(schema: unknown): unknown {
  if (Array.isArray(schema)) {
    return schema.map(withoutAdditionalProperties);
  }
  if (schema === null || typeof schema !== 'object') {
    return schema;
  }
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(schema)) {
    if (key === 'additionalProperties') continue;
    cleaned[key] = withoutAdditionalProperties(value);
  }
  return cleaned;
}

export const googleAdapter: ProviderAdapter = {
  provider: 'google',

  toWire,

  buildRequest(messages, model, options): ProviderRequest {
    const { system, messages: contents } = toWire(messages, options.render);
    const body: Record<string, unknown> = { contents };
    if (system !== undefined) {
      body['system_instruction'] = { parts: [{ text: system }] };
    }
    if (options.tools.length > 0) {
      body['tools'] = [
        {
          functionDeclarations: options.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: withoutAdditionalProperties(tool.parameters),
          })),
        },
      ];
    }
    if (options.maxTokens !== undefined) {
      body['generationConfig'] = { maxOutputTokens: options.maxTokens };
    }
    const url = `${API_BASE}/${encodeURIComponent(model.modelId)}:generateContent?key=${encodeURIComponent(options.apiKey)}`;
    return { url, headers: {}, body };
  },

  fromWire(response: unknown): ParsedResponse {
    const data = parseVendorResponse(responseSchema, response, 'google');
    const [candidate] = data.candidates;
    const parts = candidate?.content.parts ?? [];

    let callIndex = 0;
    const content: MessagePart[] = parts.map((part) => {
      if ('text' in part) {
        return textPart(part.text);
      }
      const { name, args, id } = part.functionCall;
      // Gemini often omits call ids; derive a stable one from position
      const callId = id ?? `${name}_${callIndex}`;
      callIndex += 1;
      return callPart(name, args, callId);
    });

    return {
      message: { role: 'assistant', content },
      usage: {
        tokensIn: data.usageMetadata?.promptTokenCount ?? 0,
        tokensOut: data.usageMetadata?.candidatesTokenCount ?? 0,
      },
    };
  },
};
