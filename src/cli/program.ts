/**
 * Ponder command-line interface
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { calcCommand } from './commands/calc.js';
import { chatCommand } from './commands/chat.js';
import { serveCommand } from './commands/serve.js';
import { toolsCommand } from './commands/tools.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running outside the package layout
  }
  return '0.0.0';
}

/**
 * Creates and configures the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ponder')
    .description('Conversational ReAct agent with a safe calculator, a clock and MCP tools')
    .version(readVersion(), '-v, --version', 'Display version number');

  program.addCommand(chatCommand(), { isDefault: true });
  program.addCommand(calcCommand());
  program.addCommand(toolsCommand());
  program.addCommand(serveCommand());

  return program;
}
