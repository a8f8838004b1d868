/**
 * Per-thread conversation memory
 */

import { ChatMessageSchema, type ChatMessage } from './models.js';

/**
 * Stores the message history of each conversation thread.
 * System messages are never stored; the agent adds its own on every turn.
 */
export interface Checkpointer {
  get(threadId: string): Promise<ChatMessage[]>;
  put(threadId: string, messages: ChatMessage[]): Promise<void>;
  delete(threadId: string): Promise<void>;
  list(): Promise<string[]>;
}

export interface InMemoryCheckpointerOptions {
  /** Keep at most this many messages per thread, dropping the oldest */
  maxMessages?: number;
}

/**
 * Map-backed checkpointer living for the lifetime of the process
 */
export class InMemoryCheckpointer implements Checkpointer {
  private threads = new Map<string, ChatMessage[]>();
  private maxMessages?: number;

  constructor(options: InMemoryCheckpointerOptions = {}) {
    if (options.maxMessages !== undefined && options.maxMessages < 1) {
      throw new RangeError('maxMessages must be at least 1');
    }
    this.maxMessages = options.maxMessages;
  }

  async get(threadId: string): Promise<ChatMessage[]> {
    return [...(this.threads.get(threadId) ?? [])];
  }

  async put(threadId: string, messages: ChatMessage[]): Promise<void> {
    const stored = messages.filter((m) => m.role !== 'system').map((m) => ChatMessageSchema.parse(m));
    this.threads.set(threadId, this.window(stored));
  }

  async delete(threadId: string): Promise<void> {
    this.threads.delete(threadId);
  }

  async list(): Promise<string[]> {
    return [...this.threads.keys()];
  }

  /**
   * Trim to the newest `maxMessages`, then advance to a user message so no
   * tool result is kept without the assistant call that produced it
   */
  private window(messages: ChatMessage[]): ChatMessage[] {
    if (this.maxMessages === undefined || messages.length <= this.maxMessages) {
      return messages;
    }

    const recent = messages.slice(messages.length - this.maxMessages);
    const userStart = recent.findIndex((m) => m.role === 'user');
    if (userStart !== -1) {
      return recent.slice(userStart);
    }
    const firstNonTool = recent.findIndex((m) => m.role !== 'tool');
    return firstNonTool === -1 ? [] : recent.slice(firstNonTool);
  }
}
