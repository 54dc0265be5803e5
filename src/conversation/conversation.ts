/**
 * Conversation state owned by one VM run
 */

import type { Message, MessagePart, Role } from '../types/conversation.js';

export class Conversation {
  readonly messages: Message[] = [];
  tokensIn = 0;
  tokensOut = 0;
  provider: string | null = null;
  model: string | null = null;

  /**
   * Append parts under a role. Parts merge into the last message when it has
   * the same role, so adjacent messages never share a role.
   *
   * @returns the message that received the parts
   */
  addMessage(role: Role, parts: MessagePart[] = []): Message {
    const last = this.lastMessage();
    if (last && last.role === role) {
      last.content.push(...parts);
      return last;
    }
    const message: Message = { role, content: [...parts] };
    this.messages.push(message);
    return message;
  }

  lastMessage(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  addUsage(tokensIn: number, tokensOut: number): void {
    this.tokensIn += tokensIn;
    this.tokensOut += tokensOut;
  }

  get length(): number {
    return this.messages.length;
  }
}
