/**
 * chat command - interactive conversation in the terminal
 */

import boxen from 'boxen';
import chalk from 'chalk';
import { Command } from 'commander';
import { createAgent } from '../../chat/responder.js';
import { loadConfig } from '../../config.js';
import { DEFAULT_THREAD_ID } from '../../constants.js';
import type { Tool } from '../../core/models.js';
import type { MCPToolProvider } from '../../tools/mcp/index.js';
import { runChatLoop } from '../chat-loop.js';
import { reportFailure } from '../report.js';

const EXIT_HINT = `'quit', 'exit' or 'q'`;

interface ChatOptions {
  thread: string;
  verbose?: boolean;
  mcp: boolean;
}

export function chatCommand(): Command {
  const cmd = new Command('chat');

  cmd
    .description('Chat with the agent in the terminal')
    .option('-t, --thread <id>', 'Conversation thread id', DEFAULT_THREAD_ID)
    .option('--verbose', 'Show every model turn and tool call')
    .option('--no-mcp', 'Do not connect to the MCP server')
    .action(async (options: ChatOptions) => {
      await runChat(options).catch(reportFailure);
    });

  return cmd;
}

async function runChat(options: ChatOptions): Promise<void> {
  const config = loadConfig();

  console.log(
    boxen(
      [
        'Welcome to Ponder, a ReAct agent with calculator, clock and MCP tools.',
        config.mcp.enabled && options.mcp ? `MCP server: ${config.mcp.url}` : 'MCP server: disabled',
        `Type ${EXIT_HINT} to exit.`,
      ].join('\n'),
      { padding: { top: 0, bottom: 0, left: 1, right: 1 }, borderStyle: 'round', borderColor: 'cyan', title: 'Ponder' }
    )
  );

  const { agent, mcp } = createAgent(config, { mcp: options.mcp && config.mcp.enabled });

  console.log('\nInitializing agent...');
  const tools = await agent.listTools();
  if (mcp) {
    printMcpStatus(mcp);
  }
  printTools(tools);
  console.log(chalk.green('✅ Agent initialized successfully!\n'));

  if (options.verbose) {
    agent.session({ loggerOptions: { level: 'debug' } });
  }

  try {
    await runChatLoop({ agent, threadId: options.thread });
  } finally {
    await agent[Symbol.asyncDispose]();
  }
}

function printMcpStatus(mcp: MCPToolProvider): void {
  for (const status of mcp.getStatus()) {
    if (status.connected) {
      console.log(chalk.green(`✅ Connected to MCP server '${status.serverName}'! Available tools: ${status.toolCount}`));
    } else {
      console.log(chalk.yellow(`⚠️  MCP server connection failed: ${status.error ?? 'unknown error'}`));
      console.log(chalk.yellow('   Local tools will still be available'));
    }
  }
}

export function printTools(tools: Tool[]): void {
  console.log(chalk.bold(`Tools (${tools.length}):`));
  for (const tool of tools) {
    console.log(`  - ${chalk.yellow(tool.name)}: ${tool.description}`);
  }
}
