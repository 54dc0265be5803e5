/**
 * Provider-neutral conversation types
 */

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Literal text, expanded for variables only when rendered for a provider
 */
export interface TextPart {
  type: 'text';
  text: string;
}

/**
 * Image loaded from disk, base64 encoded
 */
export interface ImagePart {
  type: 'image';
  filename: string;
  mediaType: string;
  data: string;
}

/**
 * Tool invocation requested by the model
 */
export interface CallPart {
  type: 'call';
  name: string;
  arguments: Record<string, unknown>;
  id: string;
}

/**
 * Outcome of executing a CallPart, correlated by id
 */
export interface ResultPart {
  type: 'result';
  name: string;
  id: string;
  result: string;
}

export type MessagePart = TextPart | ImagePart | CallPart | ResultPart;

export interface Message {
  role: Role;
  content: MessagePart[];
}

/**
 * Expands variable placeholders in text parts at serialization time
 */
export type TextRenderer = (text: string) => string;

/**
 * Token usage reported for one provider response
 */
export interface TokenUsage {
  tokensIn: number;
  tokensOut: number;
}

export function isCallPart(part: MessagePart): part is CallPart {
  return part.type === 'call';
}
