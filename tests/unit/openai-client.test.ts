/**
 * Unit tests for the chat-completions client
 * The SDK's create() is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import OpenAI from 'openai';
import { Stream } from 'openai/streaming';
import { ChatCompletionsClient } from '../../src/clients/openai-client.js';
import { ContextOverflowError, type Tool } from '../../src/core/models.js';
import { BUILTIN_TOOLS } from '../../src/tools/index.js';

const NO_TOOLS = new Map<string, Tool>();

function completion(message: Partial<OpenAI.ChatCompletionMessage>): OpenAI.ChatCompletion {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-test',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content: null, refusal: null, ...message },
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
  };
}

function chunk(delta: OpenAI.ChatCompletionChunk.Choice.Delta, usage?: OpenAI.CompletionUsage): OpenAI.ChatCompletionChunk {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'gpt-test',
    choices: usage ? [] : [{ index: 0, delta, finish_reason: null }],
    usage,
  };
}

function stream(chunks: OpenAI.ChatCompletionChunk[]): Stream<OpenAI.ChatCompletionChunk> {
  return new Stream(async function* () {
    yield* chunks;
  }, new AbortController());
}

function setup(maxRetries = 0) {
  const sdk = new OpenAI({ apiKey: 'test-secret', maxRetries: 0 });
  const create = vi.spyOn(sdk.chat.completions, 'create');
  const client = new ChatCompletionsClient({ model: 'gpt-test', client: sdk, maxRetries });
  return { client, create };
}

describe('ChatCompletionsClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('should require an OpenAI key', () => {
      vi.stubEnv('OPENAI_API_KEY', '');
      expect(() => new ChatCompletionsClient({ model: 'gpt-test' })).toThrow(
        'API key is required. Set OPENAI_API_KEY environment variable.'
      );
    });

    it('should require an Azure key for Azure deployments', () => {
      vi.stubEnv('AZURE_OPENAI_API_KEY', '');
      expect(
        () =>
          new ChatCompletionsClient({
            model: 'gpt-test',
            azure: { endpoint: 'https://example.openai.azure.com', deployment: 'chat' },
          })
      ).toThrow('API key is required. Set AZURE_OPENAI_API_KEY environment variable.');
    });

    it('should address Azure requests to the deployment', () => {
      const client = new ChatCompletionsClient({
        model: 'gpt-4.1',
        apiKey: 'test-secret',
        azure: { endpoint: 'https://example.openai.azure.com', deployment: 'chat-prod' },
      });

      expect(client.modelSlug).toBe('chat-prod');
    });

    it('should use the model name otherwise', () => {
      const client = new ChatCompletionsClient({ model: 'gpt-4.1', apiKey: 'test-secret', maxTokens: 1000 });

      expect(client.modelSlug).toBe('gpt-4.1');
      expect(client.maxTokens).toBe(1000);
    });
  });

  describe('generate', () => {
    it('should parse content and token usage', async () => {
      const { client, create } = setup();
      create.mockResolvedValue(completion({ content: 'Hello!' }));

      const message = await client.generate([{ role: 'user', content: 'Hi' }], NO_TOOLS);

      expect(message).toEqual({
        role: 'assistant',
        content: 'Hello!',
        toolCalls: undefined,
        tokenUsage: { input: 12, output: 4, reasoning: 0 },
      });
      expect(create.mock.calls[0]?.[0]).toEqual({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'Hi' }],
        temperature: 0,
      });
    });

    it('should offer tools and parse tool calls', async () => {
      const { client, create } = setup();
      create.mockResolvedValue(
        completion({
          tool_calls: [
            { id: 'call_1', type: 'function', function: { name: 'calculate', arguments: '{"expression":"1+1"}' } },
          ],
        })
      );
      const tools = new Map<string, Tool>(BUILTIN_TOOLS.map((tool) => [tool.name, tool]));

      const message = await client.generate([{ role: 'user', content: '1+1?' }], tools);

      expect(message.content).toBe('');
      expect(message.toolCalls).toEqual([
        { name: 'calculate', arguments: '{"expression":"1+1"}', toolCallId: 'call_1' },
      ]);
      expect(create.mock.calls[0]?.[0]).toMatchObject({ tool_choice: 'auto', tools: [{}, {}] });
    });

    it('should map context overflow without retrying', async () => {
      const { client, create } = setup(3);
      create.mockRejectedValue(new OpenAI.APIError(400, { code: 'context_length_exceeded' }, 'too long', undefined));

      await expect(client.generate([{ role: 'user', content: 'Hi' }], NO_TOOLS)).rejects.toThrow(ContextOverflowError);
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('should not retry client errors', async () => {
      const { client, create } = setup(3);
      const error = new OpenAI.APIError(401, { message: 'bad key' }, 'bad key', undefined);
      create.mockRejectedValue(error);

      await expect(client.generate([{ role: 'user', content: 'Hi' }], NO_TOOLS)).rejects.toBe(error);
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('should retry server errors', async () => {
      const { client, create } = setup(1);
      create
        .mockRejectedValueOnce(new OpenAI.APIError(503, { message: 'busy' }, 'busy', undefined))
        .mockResolvedValueOnce(completion({ content: 'recovered' }));

      const message = await client.generate([{ role: 'user', content: 'Hi' }], NO_TOOLS);

      expect(message.content).toBe('recovered');
      expect(create).toHaveBeenCalledTimes(2);
    });
  });

  describe('streaming', () => {
    it('should report deltas and assemble the answer', async () => {
      const { client, create } = setup();
      create.mockResolvedValue(
        stream([
          chunk({ role: 'assistant', content: 'The answer ' }),
          chunk({ content: 'is 14.' }),
          chunk({}, { prompt_tokens: 20, completion_tokens: 6, total_tokens: 26 }),
        ])
      );
      const deltas: string[] = [];

      const message = await client.generate([{ role: 'user', content: '2 + 3 * 4?' }], NO_TOOLS, {
        onTextDelta: (delta) => deltas.push(delta),
      });

      expect(deltas).toEqual(['The answer ', 'is 14.']);
      expect(message).toEqual({
        role: 'assistant',
        content: 'The answer is 14.',
        toolCalls: undefined,
        tokenUsage: { input: 20, output: 6, reasoning: 0 },
      });
      expect(create.mock.calls[0]?.[0]).toMatchObject({ stream: true, stream_options: { include_usage: true } });
    });

    it('should join tool call fragments by index', async () => {
      const { client, create } = setup();
      create.mockResolvedValue(
        stream([
          chunk({ tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'calc', arguments: '' } }] }),
          chunk({ tool_calls: [{ index: 0, function: { name: 'ulate', arguments: '{"expression":' } }] }),
          chunk({ tool_calls: [{ index: 1, id: 'call_2', function: { name: 'get_current_time', arguments: '{}' } }] }),
          chunk({ tool_calls: [{ index: 0, function: { arguments: '"7 % 3"}' } }] }),
        ])
      );

      const message = await client.generate([{ role: 'user', content: 'go' }], NO_TOOLS, { onTextDelta: () => {} });

      expect(message.toolCalls).toEqual([
        { name: 'calculate', arguments: '{"expression":"7 % 3"}', toolCallId: 'call_1' },
        { name: 'get_current_time', arguments: '{}', toolCallId: 'call_2' },
      ]);
      expect(message.tokenUsage).toBeUndefined();
    });
  });
});
