/**
 * Interactive terminal conversation with an agent
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import chalk from 'chalk';
import { DEFAULT_THREAD_ID, EXIT_COMMANDS } from '../constants.js';
import type { Agent } from '../core/agent.js';
import { NO_RESPONSE_TEXT } from '../chat/responder.js';

export interface ChatLoopOptions {
  agent: Agent;
  input?: Readable;
  output?: Writable;
  threadId?: string;
}

export function isExitCommand(line: string): boolean {
  const word = line.trim().toLowerCase();
  return EXIT_COMMANDS.some((command) => command === word);
}

/**
 * Read questions line by line until an exit word, end of input or Ctrl-C
 * A failed turn is reported and the loop carries on.
 */
export async function runChatLoop(options: ChatLoopOptions): Promise<void> {
  const { agent, input = process.stdin, output = process.stdout, threadId = DEFAULT_THREAD_ID } = options;
  const terminal = 'isTTY' in output && output.isTTY === true;

  const rl = createInterface({ input, output, terminal, prompt: 'User: ' });
  let saidGoodbye = false;
  const goodbye = (): void => {
    if (!saidGoodbye) {
      saidGoodbye = true;
      output.write('Goodbye!\n');
    }
  };

  rl.on('SIGINT', () => {
    output.write('\n');
    goodbye();
    rl.close();
  });

  rl.prompt();
  try {
    for await (const line of rl) {
      if (isExitCommand(line)) {
        goodbye();
        break;
      }
      if (line.trim() === '') {
        rl.prompt();
        continue;
      }

      await answer(agent, line, threadId, output);
      output.write('\n');
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  goodbye();
}

async function answer(agent: Agent, question: string, threadId: string, output: Writable): Promise<void> {
  output.write(chalk.cyan('Assistant: '));
  let streamed = false;

  try {
    const result = await agent.run(question, {
      threadId,
      onTextDelta: (delta) => {
        streamed = true;
        output.write(delta);
      },
    });

    if (!streamed) {
      output.write(result.finalMessage.trim() === '' ? NO_RESPONSE_TEXT : result.finalMessage);
    }
    output.write('\n');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.write('\n' + chalk.red(`Error getting response: ${message}`) + '\n');
  }
}
