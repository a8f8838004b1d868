/**
 * In-process model client that replays scripted replies
 */

import type { AssistantMessage, ChatMessage, GenerateOptions, LLMClient, Tool } from '../../src/core/models.js';

export type ScriptedReply = AssistantMessage | Error | ((messages: ChatMessage[]) => AssistantMessage);

export interface RecordedCall {
  messages: ChatMessage[];
  toolNames: string[];
  streamed: boolean;
}

export class ScriptedClient implements LLMClient {
  readonly modelSlug = 'scripted-model';
  readonly maxTokens = 8192;
  readonly calls: RecordedCall[] = [];

  constructor(private replies: ScriptedReply[]) {}

  async generate(messages: ChatMessage[], tools: Map<string, Tool>, options: GenerateOptions = {}): Promise<AssistantMessage> {
    options.signal?.throwIfAborted();
    this.calls.push({ messages: [...messages], toolNames: [...tools.keys()], streamed: options.onTextDelta !== undefined });

    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const message = typeof reply === 'function' ? reply(messages) : reply;
    if (options.onTextDelta && message.content) {
      // Split into two fragments
      const middle = Math.ceil(message.content.length / 2);
      options.onTextDelta(message.content.slice(0, middle));
      options.onTextDelta(message.content.slice(middle));
    }
    return message;
  }
}

export const answer = (content: string): AssistantMessage => ({
  role: 'assistant',
  content,
  tokenUsage: { input: 10, output: 5, reasoning: 0 },
});

export const callTool = (name: string, args: unknown, toolCallId = 'call_1'): AssistantMessage => ({
  role: 'assistant',
  content: '',
  toolCalls: [{ name, arguments: typeof args === 'string' ? args : JSON.stringify(args), toolCallId }],
  tokenUsage: { input: 20, output: 8, reasoning: 0 },
});
