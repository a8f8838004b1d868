/**
 * OpenAI-compatible LLM client implementation
 * Supports the OpenAI API, compatible endpoints and Azure OpenAI deployments
 */

import OpenAI, { AzureOpenAI } from 'openai';
import retry from 'async-retry';
import type {
  LLMClient,
  ChatMessage,
  AssistantMessage,
  GenerateOptions,
  Tool,
  ToolCall,
  TokenUsage,
} from '../core/models.js';
import { ContextOverflowError } from '../core/models.js';
import { logger } from '../utils/logging/logger.js';
import { toOpenAIMessages, toOpenAITools } from './utils.js';
import {
  DEFAULT_AZURE_API_VERSION,
  MAX_RETRY_ATTEMPTS,
  RETRY_MIN_TIMEOUT,
  RETRY_MAX_TIMEOUT,
} from '../constants.js';

/** Azure OpenAI deployment coordinates */
export interface AzureDeploymentConfig {
  /** e.g. https://my-resource.openai.azure.com */
  endpoint: string;

  /** Deployment name; requests are routed by deployment rather than model */
  deployment: string;

  /** API version (default 2024-02-01) */
  apiVersion?: string;
}

export interface ChatCompletionsClientConfig {
  /** Model identifier (e.g., 'gpt-4.1'); informational for Azure deployments */
  model: string;

  /** Maximum tokens in context window */
  maxTokens?: number;

  /** API key for authentication */
  apiKey?: string;

  /** Base URL for OpenAI-compatible endpoints */
  baseURL?: string;

  /** Route requests to an Azure OpenAI deployment */
  azure?: AzureDeploymentConfig;

  /** Maximum number of retry attempts */
  maxRetries?: number;

  /** Temperature for sampling (0-2) */
  temperature?: number;

  /** Whether to include reasoning tokens (for o1/o3 models) */
  includeReasoningTokens?: boolean;

  /** Injected SDK client (tests) */
  client?: OpenAI;
}

/** Tool call assembled from streamed fragments */
interface PartialToolCall {
  id?: string;
  name: string;
  arguments: string;
}

/**
 * OpenAI-compatible LLM client
 * Works with OpenAI API, compatible endpoints and Azure OpenAI
 */
export class ChatCompletionsClient implements LLMClient {
  private client: OpenAI;
  private config: Required<
    Pick<ChatCompletionsClientConfig, 'model' | 'maxTokens' | 'maxRetries' | 'temperature' | 'includeReasoningTokens'>
  >;
  private isAzure: boolean;

  constructor(config: ChatCompletionsClientConfig) {
    const {
      model,
      maxTokens = 128_000,
      apiKey = config.azure ? process.env.AZURE_OPENAI_API_KEY : process.env.OPENAI_API_KEY,
      baseURL,
      azure,
      maxRetries = MAX_RETRY_ATTEMPTS,
      temperature = 0,
      includeReasoningTokens = false,
    } = config;

    this.isAzure = azure !== undefined;

    if (config.client) {
      this.client = config.client;
    } else if (!apiKey) {
      throw new Error(
        azure
          ? 'API key is required. Set AZURE_OPENAI_API_KEY environment variable.'
          : 'API key is required. Set OPENAI_API_KEY environment variable.'
      );
    } else if (azure) {
      this.client = new AzureOpenAI({
        apiKey,
        endpoint: azure.endpoint,
        deployment: azure.deployment,
        apiVersion: azure.apiVersion ?? DEFAULT_AZURE_API_VERSION,
        maxRetries: 0, // We handle retries ourselves
      });
    } else {
      this.client = new OpenAI({
        apiKey,
        baseURL,
        maxRetries: 0, // We handle retries ourselves
      });
    }

    this.config = {
      model: azure?.deployment ?? model,
      maxTokens,
      maxRetries,
      temperature,
      includeReasoningTokens,
    };
  }

  get modelSlug(): string {
    return this.config.model;
  }

  get maxTokens(): number {
    return this.config.maxTokens;
  }

  async generate(
    messages: ChatMessage[],
    tools: Map<string, Tool>,
    options: GenerateOptions = {}
  ): Promise<AssistantMessage> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: toOpenAIMessages(messages),
      temperature: this.config.temperature,
    };

    if (tools.size > 0) {
      params.tools = toOpenAITools(tools);
      params.tool_choice = 'auto';
    }

    const { onTextDelta, signal } = options;
    // Once text has reached the caller a retry would repeat it
    let streamed = false;

    try {
      return await retry(
        async (bail) => {
          try {
            if (onTextDelta) {
              return await this.generateStreaming(params, signal, (delta) => {
                streamed = true;
                onTextDelta(delta);
              });
            }
            const response = await this.client.chat.completions.create(params, { signal });
            return this.parseResponse(response);
          } catch (error) {
            if (streamed || signal?.aborted || !isRetryable(error)) {
              bail(error instanceof Error ? error : new Error(String(error)));
              // bail() settles the retry; this return value is discarded
              return emptyAssistantMessage();
            }
            throw error;
          }
        },
        {
          retries: this.config.maxRetries,
          minTimeout: RETRY_MIN_TIMEOUT,
          maxTimeout: RETRY_MAX_TIMEOUT,
          onRetry: (error: Error, attempt: number) => {
            logger.warn({ attempt, err: error }, `Retry attempt ${attempt} after error: ${error.message}`);
          },
        }
      );
    } catch (error) {
      // Check for context overflow errors
      if (isContextOverflow(error)) {
        throw new ContextOverflowError('Context window exceeded');
      }
      throw error;
    }
  }

  private async generateStreaming(
    params: OpenAI.ChatCompletionCreateParamsNonStreaming,
    signal: AbortSignal | undefined,
    onTextDelta: (delta: string) => void
  ): Promise<AssistantMessage> {
    const stream = await this.client.chat.completions.create(
      {
        ...params,
        stream: true,
        // Older Azure API versions reject stream_options
        ...(this.isAzure ? {} : { stream_options: { include_usage: true } }),
      },
      { signal }
    );

    let content = '';
    const partialCalls = new Map<number, PartialToolCall>();
    let usage: OpenAI.CompletionUsage | undefined;

    for await (const chunk of stream) {
      if (chunk.usage) {
        usage = chunk.usage;
      }

      const delta = chunk.choices[0]?.delta;
      if (!delta) continue;

      if (delta.content) {
        content += delta.content;
        onTextDelta(delta.content);
      }

      // Tool calls arrive in fragments keyed by index
      for (const fragment of delta.tool_calls ?? []) {
        const partial = partialCalls.get(fragment.index) ?? { name: '', arguments: '' };
        if (fragment.id) partial.id = fragment.id;
        if (fragment.function?.name) partial.name += fragment.function.name;
        if (fragment.function?.arguments) partial.arguments += fragment.function.arguments;
        partialCalls.set(fragment.index, partial);
      }
    }

    const toolCalls: ToolCall[] = [...partialCalls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, call]) => ({ name: call.name, arguments: call.arguments, toolCallId: call.id }));

    return {
      role: 'assistant',
      content,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      tokenUsage: usage ? this.toTokenUsage(usage) : undefined,
    };
  }

  private parseResponse(response: OpenAI.ChatCompletion): AssistantMessage {
    const choice = response.choices[0];
    if (!choice) {
      throw new Error('No choices in response');
    }

    const message = choice.message;

    const content = message.content ?? '';

    const toolCalls: ToolCall[] = [];
    if (message.tool_calls) {
      for (const tc of message.tool_calls) {
        toolCalls.push({
          name: tc.function.name,
          arguments: tc.function.arguments,
          toolCallId: tc.id,
        });
      }
    }

    return {
      role: 'assistant',
      content,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      tokenUsage: response.usage ? this.toTokenUsage(response.usage) : undefined,
    };
  }

  private toTokenUsage(usage: OpenAI.CompletionUsage): TokenUsage {
    return {
      input: usage.prompt_tokens,
      output: usage.completion_tokens,
      reasoning: this.config.includeReasoningTokens
        ? (usage.completion_tokens_details?.reasoning_tokens ?? 0)
        : 0,
    };
  }
}

function emptyAssistantMessage(): AssistantMessage {
  return { role: 'assistant', content: '' };
}

function isContextOverflow(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.code === 'context_length_exceeded') {
    return true;
  }
  return error instanceof Error && error.message.includes('context_length_exceeded');
}

/** Client errors other than rate limiting will fail the same way again */
function isRetryable(error: unknown): boolean {
  if (isContextOverflow(error)) {
    return false;
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return error.status === 408 || error.status === 409 || error.status === 429 || error.status >= 500;
  }
  return true;
}
