/**
 * Core Agent class - runs a ReAct loop between the model and the tools
 */

import { EventEmitter } from 'events';
import { AGENT_MAX_TURNS, DEFAULT_THREAD_ID } from '../constants.js';
import { BASE_SYSTEM_PROMPT } from '../prompts/index.js';
import { AsyncDisposableStack } from '../utils/async-stack.js';
import { createStructuredLogger, type StructuredLoggerOptions } from '../utils/logging/structured-logger.js';
import { InMemoryCheckpointer, type Checkpointer } from './checkpoint.js';
import type {
  AssistantMessage,
  ChatMessage,
  GenerateOptions,
  LLMClient,
  TokenUsage,
  Tool,
  ToolCall,
  ToolMessage,
  ToolProvider,
  ToolResult,
} from './models.js';
import { AgentValidationError, TokenUsageMetadata, TurnLimitError, aggregateMetadata } from './models.js';

/**
 * Typed events emitted by the Agent
 * Enables real-time monitoring and progress tracking
 */
export interface AgentEvents {
  'run:start': (data: { input: string; threadId: string }) => void;
  'run:complete': (data: { result: AgentRunResult; duration: number }) => void;
  'run:error': (data: { error: Error; duration: number }) => void;

  'turn:start': (data: { turn: number; maxTurns: number }) => void;
  'turn:complete': (data: { turn: number; tokenUsage?: TokenUsage }) => void;

  'text:delta': (data: { turn: number; delta: string }) => void;
  'message:assistant': (data: { content: string; toolCalls?: ToolCall[] }) => void;
  'message:tool': (data: { name: string; content: string; success: boolean }) => void;

  'tool:start': (data: { name: string; arguments: unknown }) => void;
  'tool:complete': (data: { name: string; result: string; success: boolean }) => void;
  'tool:error': (data: { name: string; error: Error }) => void;
}

/**
 * Options for agent run method
 */
export interface AgentRunOptions {
  /** Conversation thread; its history is loaded from and saved to the checkpointer */
  threadId?: string;

  /** AbortSignal for cancellation support */
  signal?: AbortSignal;

  /** Receives the final answer token by token as the model streams it */
  onTextDelta?: (delta: string) => void;
}

/**
 * Streaming event types for runStream()
 */
export type AgentStreamEvent =
  | { type: 'start'; input: string; threadId: string; timestamp: number }
  | { type: 'turn:start'; turn: number; maxTurns: number; timestamp: number }
  | { type: 'text:delta'; turn: number; delta: string; timestamp: number }
  | { type: 'message'; message: ChatMessage; turn: number; timestamp: number }
  | { type: 'tool:result'; toolName: string; result: string; success: boolean; timestamp: number }
  | { type: 'turn:complete'; turn: number; tokenUsage?: TokenUsage; timestamp: number }
  | { type: 'complete'; result: AgentRunResult; timestamp: number }
  | { type: 'error'; error: Error; timestamp: number };

/**
 * Configuration for agent session
 */
export interface SessionConfig {
  /** Disable default structured logger */
  noLogger?: boolean;

  /** Options for the default structured logger */
  loggerOptions?: StructuredLoggerOptions;
}

/**
 * Configuration for agent construction
 */
export interface AgentConfig {
  /** LLM client for generation */
  client: LLMClient;

  /** Agent name (alphanumeric, 1-128 chars) */
  name: string;

  /** Maximum number of model turns per run */
  maxTurns?: number;

  /** Custom system prompt (appended to base prompt) */
  systemPrompt?: string;

  /** Tools available to the agent */
  tools?: Array<Tool | ToolProvider>;

  /** Thread memory; defaults to a private in-memory store */
  checkpointer?: Checkpointer;
}

/**
 * Result of agent run
 */
export interface AgentRunResult {
  threadId: string;

  /** Content of the last assistant message */
  finalMessage: string;

  /** Thread history after the run, without the system prompt */
  messages: ChatMessage[];

  /** Aggregated metadata from all tool calls */
  runMetadata: Record<string, unknown>;
}

type StreamObserver = (event: AgentStreamEvent) => void;

/**
 * Typed event interface for Agent class
 * Enables TypeScript to infer event types
 */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export declare interface Agent {
  on<E extends keyof AgentEvents>(event: E, listener: AgentEvents[E]): this;
  once<E extends keyof AgentEvents>(event: E, listener: AgentEvents[E]): this;
  emit<E extends keyof AgentEvents>(event: E, ...args: Parameters<AgentEvents[E]>): boolean;
  off<E extends keyof AgentEvents>(event: E, listener: AgentEvents[E]): this;
}

/**
 * Core Agent class
 * Orchestrates LLM interactions with tool execution
 * Extends EventEmitter for real-time progress monitoring
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class Agent extends EventEmitter {
  /**
   * Tool call arguments arrive as a JSON string from the model.
   * Some providers/models occasionally emit an empty string for arguments; treat that as an empty object.
   */
  private parseToolCallArguments(raw: string): unknown {
    const trimmed = raw.trim();
    if (trimmed === '') return {};
    return JSON.parse(trimmed);
  }

  private client: LLMClient;
  private name: string;
  private maxTurns: number;
  private systemPrompt?: string;
  private tools: Array<Tool | ToolProvider>;
  private checkpointer: Checkpointer;
  private activeTools: Map<string, Tool> = new Map();
  private exitStack = new AsyncDisposableStack();
  private initializing?: Promise<void>;
  // Logger cleanup function
  private loggerCleanup?: () => void;

  constructor(config: AgentConfig) {
    super(); // Initialize EventEmitter

    const { client, name, maxTurns = AGENT_MAX_TURNS, systemPrompt, tools = [], checkpointer } = config;

    // Validate agent name
    if (!/^[a-zA-Z0-9_-]{1,128}$/.test(name)) {
      throw new AgentValidationError('Agent name must be alphanumeric (with _ or -) and 1-128 characters long');
    }
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new AgentValidationError('maxTurns must be a positive integer');
    }

    this.client = client;
    this.name = name;
    this.maxTurns = maxTurns;
    this.systemPrompt = systemPrompt;
    this.tools = tools;
    this.checkpointer = checkpointer ?? new InMemoryCheckpointer();
  }

  /**
   * Configure a session and return self for use as async context manager
   *
   * @returns Self, for use with `await using agent.session(...)`
   *
   * @example
   * ```typescript
   * await using session = agent.session();
   * await session.run('What is 2 + 3 * 4?');
   * // Tool providers are closed on disposal
   * ```
   */
  session(config: SessionConfig = {}): this {
    if (!config.noLogger && !this.loggerCleanup) {
      this.loggerCleanup = createStructuredLogger(this, config.loggerOptions);
    }

    return this;
  }

  /**
   * Answer one user message within a conversation thread
   * @param input - The user's message
   * @param options - Thread id, cancellation and streaming callback
   * @returns Promise resolving to agent run result
   * @throws TurnLimitError when the model keeps calling tools past `maxTurns`
   */
  async run(input: string, options: AgentRunOptions = {}): Promise<AgentRunResult> {
    return this.execute(input, options);
  }

  /**
   * Run the agent with streaming events
   * Yields events as they occur for real-time monitoring
   * @param input - The user's message
   * @param options - Run options including thread id and AbortSignal
   * @returns AsyncGenerator yielding agent events
   */
  async *runStream(input: string, options: AgentRunOptions = {}): AsyncGenerator<AgentStreamEvent> {
    const pending: AgentStreamEvent[] = [];
    let wake: (() => void) | undefined;
    let done = false;
    let failure: unknown;

    const push = (event: AgentStreamEvent): void => {
      pending.push(event);
      wake?.();
    };

    // Stops the run if the consumer leaves early
    const controller = new AbortController();
    const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;

    const execution = this.execute(input, { ...options, signal }, push)
      .then(
        (result) => push({ type: 'complete', result, timestamp: Date.now() }),
        (error: unknown) => {
          failure = error;
          push({ type: 'error', error: toError(error), timestamp: Date.now() });
        }
      )
      .finally(() => {
        done = true;
        wake?.();
      });

    try {
      for (;;) {
        const event = pending.shift();
        if (event) {
          yield event;
          continue;
        }
        if (done) {
          break;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
      }
    } finally {
      if (!done) {
        controller.abort(new Error('Stream consumer stopped'));
      }
      await execution;
    }

    if (failure !== undefined) {
      throw failure;
    }
  }

  /**
   * The ReAct loop shared by run() and runStream()
   */
  private async execute(input: string, options: AgentRunOptions, observe?: StreamObserver): Promise<AgentRunResult> {
    const { threadId = DEFAULT_THREAD_ID, signal, onTextDelta } = options;

    // Track timing
    const startTime = Date.now();

    this.emit('run:start', { input, threadId });
    observe?.({ type: 'start', input, threadId, timestamp: startTime });

    try {
      await this.initialize();

      signal?.throwIfAborted();

      const messages: ChatMessage[] = [...(await this.checkpointer.get(threadId)), { role: 'user', content: input }];

      const runMetadata: Record<string, unknown[]> = {
        token_usage: [],
      };

      for (const toolName of this.activeTools.keys()) {
        runMetadata[toolName] = [];
      }

      for (let turn = 0; turn < this.maxTurns; turn++) {
        signal?.throwIfAborted();

        this.emit('turn:start', { turn, maxTurns: this.maxTurns });
        observe?.({ type: 'turn:start', turn, maxTurns: this.maxTurns, timestamp: Date.now() });

        const wantsDeltas = onTextDelta !== undefined || observe !== undefined || this.listenerCount('text:delta') > 0;
        const generateOptions: GenerateOptions = {
          signal,
          onTextDelta: wantsDeltas
            ? (delta) => {
                this.emit('text:delta', { turn, delta });
                observe?.({ type: 'text:delta', turn, delta, timestamp: Date.now() });
                onTextDelta?.(delta);
              }
            : undefined,
        };

        const { assistantMessage, toolMessages } = await this.step(messages, runMetadata, generateOptions);

        observe?.({ type: 'message', message: assistantMessage, turn, timestamp: Date.now() });

        for (const toolMsg of toolMessages) {
          this.emit('message:tool', { name: toolMsg.name, content: toolMsg.content, success: !toolMsg.isError });
          observe?.({
            type: 'tool:result',
            toolName: toolMsg.name,
            result: toolMsg.content,
            success: !toolMsg.isError,
            timestamp: Date.now(),
          });
          observe?.({ type: 'message', message: toolMsg, turn, timestamp: Date.now() });
        }

        messages.push(assistantMessage, ...toolMessages);
        await this.checkpointer.put(threadId, messages);

        this.emit('turn:complete', { turn, tokenUsage: assistantMessage.tokenUsage });
        observe?.({ type: 'turn:complete', turn, tokenUsage: assistantMessage.tokenUsage, timestamp: Date.now() });

        if (toolMessages.length === 0) {
          const result: AgentRunResult = {
            threadId,
            finalMessage: assistantMessage.content,
            messages: await this.checkpointer.get(threadId),
            runMetadata: aggregateMetadata(runMetadata),
          };

          const duration = Date.now() - startTime;
          this.emit('run:complete', { result, duration });

          return result;
        }
      }

      throw new TurnLimitError(this.maxTurns);
    } catch (error) {
      const duration = Date.now() - startTime;
      this.emit('run:error', { error: toError(error), duration });
      throw error;
    }
  }

  /**
   * Execute a single agent step
   */
  private async step(
    messages: ChatMessage[],
    runMetadata: Record<string, unknown[]>,
    options: GenerateOptions
  ): Promise<{ assistantMessage: AssistantMessage; toolMessages: ToolMessage[] }> {
    const assistantMessage = await this.client.generate(
      [{ role: 'system', content: this.buildSystemPrompt() }, ...messages],
      this.activeTools,
      options
    );

    if (assistantMessage.tokenUsage) {
      runMetadata['token_usage']?.push(TokenUsageMetadata.fromTokenUsage(assistantMessage.tokenUsage));
    }

    // Emit assistant message BEFORE tool execution so logs appear in correct order
    if (assistantMessage.content || assistantMessage.toolCalls?.length) {
      this.emit('message:assistant', {
        content: assistantMessage.content,
        toolCalls: assistantMessage.toolCalls,
      });
    }

    const toolMessages: ToolMessage[] = [];
    for (const toolCall of assistantMessage.toolCalls ?? []) {
      options.signal?.throwIfAborted();
      toolMessages.push(await this.runTool(toolCall, runMetadata));
    }

    return { assistantMessage, toolMessages };
  }

  /**
   * Execute a single tool call; every failure becomes an error tool message
   */
  private async runTool(toolCall: ToolCall, runMetadata: Record<string, unknown[]>): Promise<ToolMessage> {
    const tool = this.activeTools.get(toolCall.name);
    const toolCallId = toolCall.toolCallId ?? '';

    if (!tool) {
      return {
        role: 'tool',
        content: `Error: '${toolCall.name}' is not a valid tool`,
        toolCallId,
        name: toolCall.name,
        argsWasValid: false,
        isError: true,
      };
    }

    let params: unknown;
    try {
      params = tool.parameters ? tool.parameters.parse(this.parseToolCallArguments(toolCall.arguments)) : undefined;
    } catch (error) {
      const errorMsg = 'Tool arguments are not valid';
      this.emit('tool:error', {
        name: toolCall.name,
        error: error instanceof Error ? error : new Error(errorMsg),
      });
      return {
        role: 'tool',
        content: errorMsg,
        toolCallId,
        name: toolCall.name,
        argsWasValid: false,
        isError: true,
      };
    }

    this.emit('tool:start', { name: toolCall.name, arguments: params });

    let result: ToolResult;
    try {
      result = await tool.executor(params);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.emit('tool:error', {
        name: toolCall.name,
        error: toError(error),
      });
      return {
        role: 'tool',
        content: `Error executing tool: ${errorMessage}`,
        toolCallId,
        name: toolCall.name,
        argsWasValid: true,
        isError: true,
      };
    }

    const isError = result.isError ?? false;
    this.emit('tool:complete', { name: toolCall.name, result: result.content, success: !isError });

    if (result.metadata) {
      (runMetadata[toolCall.name] ??= []).push(result.metadata);
    }

    return {
      role: 'tool',
      content: result.content,
      toolCallId,
      name: toolCall.name,
      argsWasValid: true,
      isError,
    };
  }

  /**
   * Build complete system prompt
   */
  private buildSystemPrompt(): string {
    let prompt = BASE_SYSTEM_PROMPT;

    if (this.systemPrompt) {
      prompt += '\n\n' + this.systemPrompt;
    }

    return prompt;
  }

  /**
   * Resolve tools once; providers connect on first use
   */
  private initialize(): Promise<void> {
    this.initializing ??= (async () => {
      for (const tool of this.tools) {
        await this.initializeTool(tool);
      }
    })().catch((error: unknown) => {
      // Allow a later run to retry
      this.initializing = undefined;
      throw error;
    });
    return this.initializing;
  }

  /**
   * Initialize a single tool or tool provider
   */
  private async initializeTool(tool: Tool | ToolProvider): Promise<void> {
    if (isToolProvider(tool)) {
      const tools = await tool.getTools();
      const toolsArray = Array.isArray(tools) ? tools : [tools];

      for (const t of toolsArray) {
        this.activeTools.set(t.name, t);
      }

      this.exitStack.use(tool);
    } else {
      this.activeTools.set(tool.name, tool);
    }
  }

  /**
   * Tools the model can call, after providers have been resolved
   */
  async listTools(): Promise<Tool[]> {
    await this.initialize();
    return [...this.activeTools.values()];
  }

  /**
   * Detach the logger and close tool providers in reverse order
   */
  async [Symbol.asyncDispose](): Promise<void> {
    if (this.loggerCleanup) {
      this.loggerCleanup();
      this.loggerCleanup = undefined;
    }
    await this.exitStack.dispose();
  }

  /**
   * Get agent name
   */
  getName(): string {
    return this.name;
  }

  /**
   * Get max turns
   */
  getMaxTurns(): number {
    return this.maxTurns;
  }
}

/**
 * Check if an object is a ToolProvider
 */
function isToolProvider(obj: Tool | ToolProvider): obj is ToolProvider {
  return Symbol.asyncDispose in obj && 'getTools' in obj;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
