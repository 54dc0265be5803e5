/**
 * Provider adapter contract
 *
 * An adapter converts the provider-neutral conversation into one vendor's
 * request JSON and parses that vendor's reply back into a Message.
 */

import type {
  Message,
  TextRenderer,
  TokenUsage,
} from '../types/conversation.js';
import type { ToolDeclaration } from '../types/functions.js';
import type { ModelDefinition } from '../types/models.js';

/**
 * A fully assembled HTTP request, ready for the transport
 */
export interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface RequestOptions {
  apiKey: string;
  tools: readonly ToolDeclaration[];
  render: TextRenderer;
  /** Output token budget for vendors that require one */
  maxTokens?: number | undefined;
}

/**
 * Vendor messages plus the system text lifted out of them
 */
export interface WireConversation<TMessage = unknown> {
  system?: string | undefined;
  messages: TMessage[];
}

export interface ParsedResponse {
  message: Message;
  usage: TokenUsage;
}

export interface ProviderAdapter {
  readonly provider: string;

  buildRequest(
    messages: readonly Message[],
    model: ModelDefinition,
    options: RequestOptions
  ): ProviderRequest;

  /**
   * Map messages to vendor shape. Pure: the input list is never mutated,
   * so calling it twice yields the same result.
   */
  toWire(messages: readonly Message[], render: TextRenderer): WireConversation;

  /**
   * Parse one assistant turn. Unknown content kinds are an error.
   */
  fromWire(response: unknown): ParsedResponse;
}

/**
 * Sends a request and returns the decoded JSON body
 */
export type Transport = (
  request: ProviderRequest,
  timeoutMs: number
) => Promise<unknown>;
