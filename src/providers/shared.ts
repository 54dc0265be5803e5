/**
 * Helpers shared by provider adapters
 */

import type { z } from 'zod';

import type { Conversation } from '../conversation/conversation.js';
import { MalformedResponseError } from '../errors.js';
import type {
  Message,
  MessagePart,
  TextRenderer,
} from '../types/conversation.js';
import type { ProviderAdapter, WireConversation } from './types.js';

/**
 * Separate a leading system message from the rest.
 * Returns a new list; the input is left untouched.
 */
export function splitSystem(
  messages: readonly Message[],
  render: TextRenderer
): { system: string | undefined; rest: readonly Message[] } {
  const [first, ...rest] = messages;
  if (first?.role !== 'system') {
    return { system: undefined, rest: messages };
  }
  return { system: renderedText(first.content, render), rest };
}

/**
 * Text parts of a message, rendered and joined by newlines
 */
export function renderedText(
  parts: readonly MessagePart[],
  render: TextRenderer
): string {
  return parts
    .flatMap((p) => (p.type === 'text' ? [render(p.text)] : []))
    .join('\n');
}

/**
 * Validate a vendor response against its schema
 */
export function parseVendorResponse<T extends z.ZodTypeAny>(
  schema: T,
  response: unknown,
  provider: string
): z.infer<T> {
  const result = schema.safeParse(response);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MalformedResponseError(
      `Unexpected ${provider} response${where}: ${issue?.message ?? 'invalid shape'}`
    );
  }
  return result.data;
}

/**
 * Vendor form of a whole conversation
 */
export function serializeConversation(
  conversation: Conversation,
  adapter: ProviderAdapter,
  render: TextRenderer
): WireConversation {
  return adapter.toWire(conversation.messages, render);
}
