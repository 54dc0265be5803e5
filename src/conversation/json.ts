/**
 * Provider-neutral JSON form of a conversation (transcripts, sessions)
 */

import { z } from 'zod';

import type { Message, MessagePart } from '../types/conversation.js';
import { Conversation } from './conversation.js';

export const messagePartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image'),
    filename: z.string(),
    mediaType: z.string(),
    data: z.string(),
  }),
  z.object({
    type: z.literal('call'),
    name: z.string(),
    arguments: z.record(z.unknown()),
    id: z.string(),
  }),
  z.object({
    type: z.literal('result'),
    name: z.string(),
    id: z.string(),
    result: z.string(),
  }),
]);

export const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.array(messagePartSchema),
});

export const conversationSchema = z.object({
  provider: z.string().nullable(),
  model: z.string().nullable(),
  tokensIn: z.number().int().nonnegative(),
  tokensOut: z.number().int().nonnegative(),
  messages: z.array(messageSchema),
});

export type ConversationJson = z.infer<typeof conversationSchema>;

export interface ConversationJsonOptions {
  /** Replace image payloads with a size marker */
  omitImageData?: boolean | undefined;
}

function partToJson(part: MessagePart, options: ConversationJsonOptions): MessagePart {
  if (part.type === 'image' && options.omitImageData) {
    return { ...part, data: `<${part.data.length} base64 chars>` };
  }
  return part;
}

export function conversationToJson(
  conversation: Conversation,
  options: ConversationJsonOptions = {}
): ConversationJson {
  return {
    provider: conversation.provider,
    model: conversation.model,
    tokensIn: conversation.tokensIn,
    tokensOut: conversation.tokensOut,
    messages: conversation.messages.map((m) => ({
      role: m.role,
      content: m.content.map((p) => partToJson(p, options)),
    })),
  };
}

/**
 * Rebuild a conversation from its JSON form
 * Throws a ZodError when the document does not match
 */
export function conversationFromJson(data: unknown): Conversation {
  const parsed = conversationSchema.parse(data);
  const conversation = new Conversation();
  conversation.provider = parsed.provider;
  conversation.model = parsed.model;
  conversation.tokensIn = parsed.tokensIn;
  conversation.tokensOut = parsed.tokensOut;
  for (const message of parsed.messages) {
    const restored: Message = { role: message.role, content: message.content };
    conversation.messages.push(restored);
  }
  return conversation;
}
