/**
 * tools command - list what the agent can call
 */

import { Command } from 'commander';
import { loadConfig } from '../../config.js';
import type { Tool } from '../../core/models.js';
import { BUILTIN_TOOLS } from '../../tools/index.js';
import { createMcpProvider } from '../../chat/responder.js';
import { reportFailure } from '../report.js';
import { printTools } from './chat.js';

interface ToolsOptions {
  mcp: boolean;
}

export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd
    .description('List built-in tools and the tools of the MCP server')
    .option('--no-mcp', 'Only list built-in tools')
    .action(async (options: ToolsOptions) => {
      await listTools(options).catch(reportFailure);
    });

  return cmd;
}

async function listTools(options: ToolsOptions): Promise<void> {
  const config = loadConfig();
  const tools: Tool[] = [...BUILTIN_TOOLS];

  if (options.mcp && config.mcp.enabled) {
    await using provider = createMcpProvider(config.mcp);
    tools.push(...(await provider.getTools()));
    for (const status of provider.getStatus()) {
      if (!status.connected) {
        console.log(`⚠️  MCP server '${status.serverName}' unavailable: ${status.error ?? 'unknown error'}`);
      }
    }
  }

  printTools(tools);
}
