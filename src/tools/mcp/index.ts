/**
 * MCP exports
 */

export { MCPToolProvider, formatCallToolResult, type McpServerStatus, type McpToolDescription } from './provider.js';
export { jsonSchemaToZod, objectSchemaToZod } from './schema.js';
export {
  type McpConfig,
  type McpServerConfig,
  type StdioServerConfig,
  type SseServerConfig,
  type HttpServerConfig,
  type WebSocketServerConfig,
  type TransportType,
  McpConfigSchema,
  configFromUrl,
  detectTransportType,
} from './config.js';
