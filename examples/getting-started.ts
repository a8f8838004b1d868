/**
 * Getting Started with Ponder
 *
 * Creates an agent with the built-in calculator and clock tools and asks it
 * two questions on the same thread, so the second can refer to the first.
 *
 * To run this example:
 *   1. Create a .env file (see .env.example)
 *   2. Run: npx tsx examples/getting-started.ts
 */

import { Agent, BUILTIN_TOOLS } from '../src/index.js';
import { loadExampleConfig } from './_helpers.js';

async function main() {
  // 1. Build the model client from .env
  const { client } = loadExampleConfig();

  // 2. Create the agent with the built-in tools
  const agent = new Agent({
    client,
    name: 'assistant',
    maxTurns: 10,
    tools: BUILTIN_TOOLS,
  });

  // 3. The session attaches the console logger and disposes tool providers at the end
  await using session = agent.session({
    // Optional: Configure logging
    // loggerOptions: { level: 'debug' }
  });

  // 4. Ask on one thread; the checkpointer keeps the history between runs
  const first = await session.run('What is 2 + 3 * 4, and what is 7 divided into 2 with remainder?', {
    threadId: 'getting-started',
  });
  console.log(first.finalMessage);

  const second = await session.run('Multiply the first result by the current hour of the day.', {
    threadId: 'getting-started',
  });
  console.log(second.finalMessage);
}

main().catch(console.error);
