/**
 * Conversation module - universal message model and its JSON form
 */

export { Conversation } from './conversation.js';
export type { ConversationJson, ConversationJsonOptions } from './json.js';
export { conversationFromJson, conversationToJson } from './json.js';
export {
  callPart,
  imageMediaType,
  loadImagePart,
  resultPart,
  textPart,
} from './parts.js';
