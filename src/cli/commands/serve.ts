/**
 * serve command - start the web chat
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { createAgent, createClient } from '../../chat/responder.js';
import { loadConfig } from '../../config.js';
import { InMemoryCheckpointer } from '../../core/checkpoint.js';
import { ChatServer } from '../../server/index.js';
import { reportFailure } from '../report.js';

interface ServeOptions {
  port?: number;
  host?: string;
  mcp: boolean;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function serveCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the web chat server')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('-H, --host <host>', 'Address to bind')
    .option('--no-mcp', 'Do not connect to the MCP server')
    .action(async (options: ServeOptions) => {
      await runServe(options).catch(reportFailure);
    });

  return cmd;
}

async function runServe(options: ServeOptions): Promise<void> {
  const config = loadConfig();
  // One client and one memory shared by every connection
  const client = createClient(config);
  const checkpointer = new InMemoryCheckpointer();

  const server = new ChatServer({
    host: options.host ?? config.server.host,
    port: options.port ?? config.server.port,
    createAgent: () =>
      createAgent(config, { client, checkpointer, mcp: options.mcp && config.mcp.enabled }).agent,
  });

  const { host, port } = await server.start();
  console.log(chalk.green(`Ponder web chat listening on http://${host}:${port}`));

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      resolve();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

  console.log('\nShutting down...');
  await server.stop();
}
