/**
 * @file src/agents/session-store.ts
 * @description In-memory conversation storage
 *
 * Conversations live for the lifetime of the process. Each holds the full
 * message list the model sees, including tool calls and tool results.
 */

import { v4 as uuidv4 } from 'uuid';
import { ConversationNotFoundError } from '../shared/errors';
import { ConversationMessage } from './llm-client';

export interface Conversation {
  id: string;
  userId: string;
  createdAt: Date;
  messages: ConversationMessage[];
}

export interface TranscriptMessage {
  role: 'user' | 'assistant';
  content: string;
}

export class InMemorySessionStore {
  private conversations = new Map<string, Conversation>();

  /**
   * Return the conversation with this id, creating it when absent.
   * A fresh uuid is issued when no id is supplied.
   */
  getOrCreate(conversationId: string | undefined, userId: string): Conversation {
    const id = conversationId || uuidv4();
    const existing = this.conversations.get(id);
    if (existing) {
      return existing;
    }

    const conversation: Conversation = { id, userId, createdAt: new Date(), messages: [] };
    this.conversations.set(id, conversation);
    return conversation;
  }

  get(conversationId: string): Conversation | undefined {
    return this.conversations.get(conversationId);
  }

  append(conversationId: string, ...messages: ConversationMessage[]): void {
    this.require(conversationId).messages.push(...messages);
  }

  /** Snapshot of everything the model has seen */
  messages(conversationId: string): ConversationMessage[] {
    return [...this.require(conversationId).messages];
  }

  /**
   * User and assistant text only; tool traffic is omitted.
   */
  history(conversationId: string): TranscriptMessage[] {
    const transcript: TranscriptMessage[] = [];
    for (const message of this.require(conversationId).messages) {
      if ((message.role === 'user' || message.role === 'assistant') && message.content) {
        transcript.push({ role: message.role, content: message.content });
      }
    }
    return transcript;
  }

  size(): number {
    return this.conversations.size;
  }

  private require(conversationId: string): Conversation {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }
}
