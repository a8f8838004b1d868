/**
 * Ponder - a conversational ReAct agent with a safe calculator, a clock and MCP tools
 *
 * @packageDocumentation
 */

// Core types and models
export type {
  // Messages
  ChatMessage,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,

  // Tool system
  Tool,
  ToolProvider,
  ToolResult,
  ToolCall,

  // Token usage and metadata
  TokenUsage,
  Addable,

  // LLM client
  LLMClient,
  GenerateOptions,
} from './core/models.js';

// Core classes and utilities
export {
  TokenUsageMetadata,
  ToolUseCountMetadata,
  aggregateMetadata,
  ContextOverflowError,
  ToolExecutionError,
  TurnLimitError,
  AgentValidationError,
} from './core/models.js';

// Zod schemas for validation
export {
  SystemMessageSchema,
  UserMessageSchema,
  AssistantMessageSchema,
  ToolMessageSchema,
  ChatMessageSchema,
  ToolCallSchema,
  TokenUsageSchema,
} from './core/models.js';

// Agent
export {
  Agent,
  type AgentConfig,
  type SessionConfig,
  type AgentRunResult,
  type AgentEvents,
  type AgentRunOptions,
  type AgentStreamEvent,
} from './core/agent.js';

// Thread memory
export { InMemoryCheckpointer, type Checkpointer, type InMemoryCheckpointerOptions } from './core/checkpoint.js';

// Model clients
export {
  ChatCompletionsClient,
  type ChatCompletionsClientConfig,
  type AzureDeploymentConfig,
} from './clients/openai-client.js';

// Async utilities
export { AsyncDisposableStack, type AsyncDisposeFn } from './utils/async-stack.js';

// Constants
export {
  AGENT_MAX_TURNS,
  DEFAULT_THREAD_ID,
  DEFAULT_MODEL,
  EXIT_COMMANDS,
  MAX_EXPRESSION_LENGTH,
  MAX_NESTING_DEPTH,
  MAX_INTEGER_BITS,
  MAX_RETRY_ATTEMPTS,
  RETRY_MIN_TIMEOUT,
  RETRY_MAX_TIMEOUT,
} from './constants.js';

// Tools
export {
  BUILTIN_TOOLS,
  CALCULATE_TOOL,
  CalculateParamsSchema,
  type CalculateParams,
  calculate,
  evaluate,
  type EvaluationResult,
  type EvaluationErrorKind,
  CURRENT_TIME_TOOL,
  CurrentTimeParamsSchema,
  formatLocalTimestamp,
} from './tools/index.js';
export {
  CalculatorError,
  ExpressionSyntaxError,
  ExpressionArithmeticError,
  ExpressionLimitError,
  DEFAULT_LIMITS,
  type CalculatorLimits,
  type Value,
} from './tools/calculator/index.js';
export {
  MCPToolProvider,
  McpConfigSchema,
  type McpConfig,
  type McpServerConfig,
  type McpServerStatus,
  type McpToolDescription,
} from './tools/mcp/index.js';

// Configuration
export { ConfigError, loadConfig, parseConfig, requireModelBackend, type PonderConfig } from './config.js';

// Responder
export {
  buildUserPrompt,
  invokeAgent,
  getAgentResponse,
  createAgent,
  createClient,
  createMcpProvider,
  NO_RESPONSE_TEXT,
  type CreateAgentOptions,
  type CreatedAgent,
  type InvokeOutcome,
  type ResponseOptions,
} from './chat/responder.js';

// Web chat
export { ChatServer, type ChatServerConfig, type ClientMessage, type ServerMessage } from './server/index.js';

// Logging
export {
  createLogger,
  logger,
  createStructuredLogger,
  type LoggerOptions,
  type LogLevel,
  type StructuredLoggerOptions,
} from './utils/logging/index.js';

// Prompts
export { BASE_SYSTEM_PROMPT, SITE_CONTEXT_PROMPT } from './prompts/index.js';
