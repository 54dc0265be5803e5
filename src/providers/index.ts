/**
 * Provider adapters
 */

export { anthropicAdapter } from './anthropic.js';
export { googleAdapter } from './google.js';
export { postJson } from './http.js';
export { serializeConversation } from './shared.js';
export {
  createOpenAiCompatibleAdapter,
  OPENAI_COMPATIBLE_VENDORS,
} from './openai-compatible.js';
export { AdapterRegistry, createDefaultAdapters } from './registry.js';
export type {
  ParsedResponse,
  ProviderAdapter,
  ProviderRequest,
  RequestOptions,
  Transport,
  WireConversation,
} from './types.js';
