/**
 * Responder - turns one user question into one answer
 *
 * Shared by the terminal chat and the web chat. Model and tool failures are
 * turned into text here.
 */

import { ChatCompletionsClient } from '../clients/openai-client.js';
import { requireModelBackend, type PonderConfig } from '../config.js';
import { DEFAULT_THREAD_ID } from '../constants.js';
import { Agent, type AgentRunResult } from '../core/agent.js';
import { InMemoryCheckpointer, type Checkpointer } from '../core/checkpoint.js';
import type { LLMClient, Tool, ToolProvider } from '../core/models.js';
import { SITE_CONTEXT_PROMPT } from '../prompts/index.js';
import { BUILTIN_TOOLS } from '../tools/index.js';
import { MCPToolProvider } from '../tools/mcp/index.js';

export const NO_RESPONSE_TEXT = 'No response generated.';

export type InvokeOutcome = { result: AgentRunResult } | { error: Error };

export interface ResponseOptions {
  threadId?: string;

  /** Page the question was asked from, sent by the web widget */
  site?: string;

  /** Receives the answer as it streams */
  onTextDelta?: (delta: string) => void;

  signal?: AbortSignal;
}

/**
 * Prefix the question with the site it was asked from, when known
 */
export function buildUserPrompt(input: string, site?: string): string {
  return site ? `Site: ${site}\n\nUser Question: ${input}` : input;
}

/**
 * Run the agent once; failures are returned, not thrown
 */
export async function invokeAgent(
  agent: Agent,
  input: string,
  threadId: string = DEFAULT_THREAD_ID,
  options: Pick<ResponseOptions, 'onTextDelta' | 'signal'> = {}
): Promise<InvokeOutcome> {
  try {
    const result = await agent.run(input, { threadId, ...options });
    return { result };
  } catch (error) {
    return { error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Ask the agent and return the answer text
 * @returns The final answer, `Error: <message>` on failure, or NO_RESPONSE_TEXT
 */
export async function getAgentResponse(agent: Agent, input: string, options: ResponseOptions = {}): Promise<string> {
  const { threadId = DEFAULT_THREAD_ID, site, onTextDelta, signal } = options;

  const outcome = await invokeAgent(agent, buildUserPrompt(input, site), threadId, { onTextDelta, signal });
  if ('error' in outcome) {
    return `Error: ${outcome.error.message}`;
  }

  const answer = outcome.result.finalMessage.trim();
  return answer.length > 0 ? outcome.result.finalMessage : NO_RESPONSE_TEXT;
}

export interface CreateAgentOptions {
  /** Model client; built from the configuration when omitted */
  client?: LLMClient;

  /** Memory shared between agents serving the same users */
  checkpointer?: Checkpointer;

  /** Connect to the configured MCP server (default: config.mcp.enabled) */
  mcp?: boolean;

  name?: string;
}

/**
 * Build a chat-completions client from the configured backend
 * Azure wins when both backends are configured.
 */
export function createClient(config: PonderConfig): ChatCompletionsClient {
  requireModelBackend(config);

  if (config.azure) {
    return new ChatCompletionsClient({
      model: config.model,
      apiKey: config.azure.apiKey,
      azure: {
        endpoint: config.azure.endpoint,
        deployment: config.azure.deployment,
        apiVersion: config.azure.apiVersion,
      },
    });
  }

  return new ChatCompletionsClient({
    model: config.model,
    apiKey: config.openai?.apiKey,
    baseURL: config.openai?.baseURL,
  });
}

/**
 * The agent and the MCP provider it was given, if any
 */
export interface CreatedAgent {
  agent: Agent;
  mcp?: MCPToolProvider;
}

/**
 * MCP provider for the configured servers: the config file when one is set, the single URL otherwise
 */
export function createMcpProvider(mcp: PonderConfig['mcp']): MCPToolProvider {
  if (mcp.configPath) {
    return MCPToolProvider.fromConfig(mcp.configPath, mcp.serverNames);
  }
  return MCPToolProvider.fromUrl(mcp.url, mcp.headers);
}

/**
 * Assemble a ReAct agent with the built-in tools and, when enabled, the MCP server's tools
 */
export function createAgent(config: PonderConfig, options: CreateAgentOptions = {}): CreatedAgent {
  const { client = createClient(config), checkpointer = new InMemoryCheckpointer(), name = 'ponder' } = options;
  const useMcp = options.mcp ?? config.mcp.enabled;

  const tools: Array<Tool | ToolProvider> = [...BUILTIN_TOOLS];
  const mcp = useMcp ? createMcpProvider(config.mcp) : undefined;
  if (mcp) {
    tools.push(mcp);
  }

  const agent = new Agent({
    client,
    name,
    maxTurns: config.maxTurns,
    systemPrompt: SITE_CONTEXT_PROMPT,
    tools,
    checkpointer,
  });

  return { agent, mcp };
}
