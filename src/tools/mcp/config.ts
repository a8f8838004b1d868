/**
 * MCP configuration schemas and types
 */

import { z } from 'zod';

/**
 * Stdio server configuration (local process)
 */
export const StdioServerConfigSchema = z.object({
  command: z.string().describe('Command to execute'),
  args: z.array(z.string()).default([]).describe('Command arguments'),
  env: z.record(z.string()).optional().describe('Environment variables'),
});

export type StdioServerConfig = z.infer<typeof StdioServerConfigSchema>;

/**
 * SSE server configuration (Server-Sent Events)
 */
export const SseServerConfigSchema = z.object({
  url: z.string().url().describe('SSE endpoint URL (must end with /sse)'),
  headers: z.record(z.string()).optional().describe('HTTP headers'),
});

export type SseServerConfig = z.infer<typeof SseServerConfigSchema>;

/**
 * HTTP server configuration (Streamable HTTP)
 */
export const HttpServerConfigSchema = z.object({
  url: z.string().url().describe('HTTP endpoint URL'),
  headers: z.record(z.string()).optional().describe('HTTP headers'),
});

export type HttpServerConfig = z.infer<typeof HttpServerConfigSchema>;

/**
 * WebSocket server configuration
 */
export const WebSocketServerConfigSchema = z.object({
  url: z.string().url().describe('WebSocket URL (ws:// or wss://)'),
});

export type WebSocketServerConfig = z.infer<typeof WebSocketServerConfigSchema>;

export type TransportType = 'stdio' | 'sse' | 'http' | 'websocket';

/**
 * Auto-detect transport type from a bare server entry
 */
export function detectTransportType(config: { command?: unknown; url?: unknown }): TransportType {
  if (typeof config.command === 'string') {
    return 'stdio';
  }

  if (typeof config.url === 'string') {
    const url = config.url;
    if (url.endsWith('/sse')) {
      return 'sse';
    }
    if (url.startsWith('ws://') || url.startsWith('wss://')) {
      return 'websocket';
    }
    return 'http';
  }

  throw new Error('Unable to detect transport type from config');
}

/**
 * Accept `{ type, config }` entries as well as the common bare form
 * (`{ command, args }` or `{ url, headers }`), whose transport is detected
 */
function normalizeServerEntry(entry: unknown): unknown {
  if (typeof entry !== 'object' || entry === null || 'type' in entry) {
    return entry;
  }
  if ('command' in entry || 'url' in entry) {
    return { type: detectTransportType(entry), config: entry };
  }
  return entry;
}

/**
 * MCP server configuration (discriminated union)
 */
export const McpServerConfigSchema = z.preprocess(
  normalizeServerEntry,
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('stdio'), config: StdioServerConfigSchema }),
    z.object({ type: z.literal('sse'), config: SseServerConfigSchema }),
    z.object({ type: z.literal('http'), config: HttpServerConfigSchema }),
    z.object({ type: z.literal('websocket'), config: WebSocketServerConfigSchema }),
  ])
);

export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

/**
 * MCP configuration file format
 */
export const McpConfigSchema = z.object({
  mcpServers: z.record(McpServerConfigSchema),
});

export type McpConfig = z.infer<typeof McpConfigSchema>;

/**
 * Configuration for a single server reached by URL
 */
export function configFromUrl(serverName: string, url: string, headers: Record<string, string> = {}): McpConfig {
  const type = detectTransportType({ url });
  if (type === 'stdio') {
    throw new Error(`Not a network MCP endpoint: ${url}`);
  }
  const entry: McpServerConfig =
    type === 'websocket' ? { type, config: { url } } : { type, config: { url, headers } };
  return { mcpServers: { [serverName]: entry } };
}
