/**
 * Message entity - a single turn in a conversation
 */

import type { ConversationMessage, MessageRole } from './types.js';

export class MessageEntity implements ConversationMessage {
  public readonly role: MessageRole;
  public readonly content: string;
  public readonly timestamp: Date;

  constructor(role: MessageRole, content: string, timestamp: Date = new Date()) {
    this.role = role;
    this.content = content;
    this.timestamp = timestamp;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return {
      role: this.role,
      content: this.content,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
