/**
 * MCP Tool Provider
 * Connects to Model Context Protocol servers and exposes their tools
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { WebSocketClientTransport } from '@modelcontextprotocol/sdk/client/websocket.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, type CallToolResult, type Tool as McpTool } from '@modelcontextprotocol/sdk/types.js';
import { readFile } from 'fs/promises';
import type { Tool, ToolProvider, ToolResult } from '../../core/models.js';
import { ToolUseCountMetadata } from '../../core/models.js';
import { logger } from '../../utils/logging/logger.js';
import { configFromUrl, McpConfigSchema, type McpConfig, type McpServerConfig } from './config.js';
import { objectSchemaToZod } from './schema.js';

const CLIENT_INFO = { name: 'ponder-client', version: '0.1.0' };

/**
 * MCP client wrapper with cleanup
 */
interface McpClientWrapper {
  client: Client;
  serverName: string;
}

/** Outcome of connecting to one configured server */
export interface McpServerStatus {
  serverName: string;
  connected: boolean;
  toolCount: number;
  error?: string;
}

/** A discovered tool, for startup reporting */
export interface McpToolDescription {
  serverName: string;
  name: string;
  description: string;
}

/**
 * MCP Tool Provider
 * Connects to MCP servers and exposes their tools as Ponder tools named `<server>__<tool>`.
 * A server that cannot be reached is logged and skipped.
 */
export class MCPToolProvider implements ToolProvider {
  private clients: McpClientWrapper[] = [];
  private source: () => Promise<McpConfig>;
  private sourceName: string;
  private serverNames?: string[];
  private statuses: McpServerStatus[] = [];
  private descriptions: McpToolDescription[] = [];

  private constructor(source: () => Promise<McpConfig>, sourceName: string, serverNames?: string[]) {
    this.source = source;
    this.sourceName = sourceName;
    this.serverNames = serverNames;
  }

  /**
   * Create MCP provider from a config file (`{ "mcpServers": { ... } }`)
   * The file is read when tools are first requested.
   * @param serverNames - Only connect to these servers
   */
  static fromConfig(configPath: string, serverNames?: string[]): MCPToolProvider {
    return new MCPToolProvider(() => readMcpConfig(configPath), configPath, serverNames);
  }

  /**
   * Create MCP provider from config object
   */
  static fromConfigObject(config: McpConfig, serverNames?: string[]): MCPToolProvider {
    return new MCPToolProvider(async () => config, 'config', serverNames);
  }

  /**
   * Create MCP provider for a single server reached by URL
   * The transport follows the URL: `/sse` suffix means SSE, ws(s):// WebSocket, anything else streamable HTTP
   */
  static fromUrl(url: string, headers: Record<string, string> = {}, serverName: string = 'mcp'): MCPToolProvider {
    const config = configFromUrl(serverName, url, headers);
    return new MCPToolProvider(async () => config, url);
  }

  async [Symbol.asyncDispose](): Promise<void> {
    // Close all clients
    for (const wrapper of this.clients) {
      try {
        await wrapper.client.close();
      } catch (error) {
        logger.warn({ err: error, server: wrapper.serverName }, 'Failed to close MCP client');
      }
    }
    this.clients = [];
  }

  async getTools(): Promise<Tool[]> {
    const tools: Tool[] = [];

    let config: McpConfig;
    try {
      config = await this.source();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.statuses.push({ serverName: this.sourceName, connected: false, toolCount: 0, error: message });
      logger.warn({ source: this.sourceName, err: error }, 'Failed to load MCP configuration');
      return tools;
    }

    // Determine which servers to connect to
    const serverNames = this.serverNames;
    const serverEntries = Object.entries(config.mcpServers).filter(
      ([name]) => serverNames === undefined || serverNames.includes(name)
    );

    for (const [serverName, serverConfig] of serverEntries) {
      try {
        const client = new Client(CLIENT_INFO, { capabilities: {} });
        await client.connect(createTransport(serverConfig));

        // Store for cleanup
        this.clients.push({ client, serverName });

        const response = await client.listTools();
        for (const mcpTool of response.tools) {
          tools.push(this.createToolFromMcp(mcpTool, client, serverName));
          this.descriptions.push({ serverName, name: mcpTool.name, description: mcpTool.description ?? '' });
        }

        this.statuses.push({ serverName, connected: true, toolCount: response.tools.length });
        logger.info({ server: serverName, tools: response.tools.length }, 'Connected to MCP server');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.statuses.push({ serverName, connected: false, toolCount: 0, error: message });
        logger.warn({ server: serverName, err: error }, 'Failed to connect to MCP server');
      }
    }

    return tools;
  }

  /**
   * Connection outcome per server, once getTools() has run
   */
  getStatus(): McpServerStatus[] {
    return [...this.statuses];
  }

  /**
   * Tools discovered on the connected servers
   */
  describeTools(): McpToolDescription[] {
    return [...this.descriptions];
  }

  /**
   * Create a Ponder Tool from an MCP tool definition
   */
  private createToolFromMcp(
    mcpTool: McpTool,
    client: Client,
    serverName: string
  ): Tool<ReturnType<typeof objectSchemaToZod>, ToolUseCountMetadata> {
    return {
      name: `${serverName}__${mcpTool.name}`,
      description: mcpTool.description || `MCP tool: ${mcpTool.name}`,
      parameters: objectSchemaToZod(mcpTool.inputSchema),
      executor: async (params): Promise<ToolResult<ToolUseCountMetadata>> => {
        try {
          const raw = await client.callTool({ name: mcpTool.name, arguments: params });
          const result = CallToolResultSchema.parse(raw);

          return {
            content: formatCallToolResult(result),
            isError: result.isError ?? false,
            metadata: new ToolUseCountMetadata(1),
          };
        } catch (error) {
          const errorMsg = error instanceof Error ? error.message : String(error);
          return {
            content: `<mcp_error>${errorMsg}</mcp_error>`,
            isError: true,
            metadata: new ToolUseCountMetadata(1),
          };
        }
      },
    };
  }
}

function createTransport(serverConfig: McpServerConfig): Transport {
  switch (serverConfig.type) {
    case 'stdio': {
      const { command, args, env } = serverConfig.config;
      return new StdioClientTransport({
        command,
        args,
        env: env ? { ...getDefaultEnvironment(), ...env } : undefined,
      });
    }
    case 'sse':
      return new SSEClientTransport(new URL(serverConfig.config.url), {
        requestInit: { headers: serverConfig.config.headers },
      });
    case 'http':
      return new StreamableHTTPClientTransport(new URL(serverConfig.config.url), {
        requestInit: { headers: serverConfig.config.headers },
      });
    case 'websocket':
      if (!('WebSocket' in globalThis)) {
        throw new Error('WebSocket transport needs a runtime with a global WebSocket');
      }
      return new WebSocketClientTransport(new URL(serverConfig.config.url));
  }
}

async function readMcpConfig(configPath: string): Promise<McpConfig> {
  const configJson = await readFile(configPath, 'utf-8');
  const parsed = McpConfigSchema.safeParse(JSON.parse(configJson));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid MCP config ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Format an MCP tool result as XML for the model
 */
export function formatCallToolResult(result: CallToolResult): string {
  let content = '<mcp_result>\n';

  for (const item of result.content) {
    if (item.type === 'text') {
      content += `  <text><![CDATA[\n${item.text}\n]]></text>\n`;
    } else if (item.type === 'image' || item.type === 'audio') {
      content += `  <${item.type} mimeType="${item.mimeType}" />\n`;
    } else if (item.type === 'resource') {
      const text = 'text' in item.resource ? item.resource.text : '';
      content += `  <resource uri="${item.resource.uri}">${text}</resource>\n`;
    }
  }

  content += '</mcp_result>';
  return content;
}
