/**
 * Events Example
 * Demonstrates how to work with agent events for monitoring and control
 *
 * To run this example:
 *   1. Create a .env file (see .env.example)
 *   2. Run: npx tsx examples/events-example.ts
 */

import { Agent, BUILTIN_TOOLS, type AgentRunResult } from '../src/index.js';
import { loadExampleConfig } from './_helpers.js';

// ============================================================================
// Example 1: Basic Event Monitoring
// ============================================================================

async function example1_BasicEvents() {
  console.log('\n========================================');
  console.log('Example 1: Basic Event Monitoring');
  console.log('========================================\n');

  const { client } = loadExampleConfig();

  const agent = new Agent({
    client,
    name: 'event-agent',
    maxTurns: 5,
    tools: BUILTIN_TOOLS,
  });

  agent.on('run:start', ({ input, threadId }) => {
    console.log(`🚀 Agent started on thread ${threadId}`);
    console.log('   Input:', input);
  });

  agent.on('turn:start', ({ turn, maxTurns }) => {
    console.log(`\n📍 Turn ${turn + 1}/${maxTurns}`);
  });

  agent.on('message:assistant', ({ content, toolCalls }) => {
    if (content) {
      console.log('💬 Assistant:', content.substring(0, 100));
    }
    if (toolCalls && toolCalls.length > 0) {
      console.log('🔧 Tool calls:', toolCalls.map((tc) => tc.name).join(', '));
    }
  });

  agent.on('tool:complete', ({ name, result, success }) => {
    console.log(`   ${success ? '✅' : '❌'} ${name}: ${result}`);
  });

  agent.on('turn:complete', ({ tokenUsage }) => {
    if (tokenUsage) {
      console.log(`   📊 Tokens: ${tokenUsage.input + tokenUsage.output} total`);
    }
  });

  agent.on('run:complete', ({ result, duration }) => {
    console.log(`\n✅ Agent completed in ${duration}ms`);
    console.log('   Messages in thread:', result.messages.length);
  });

  agent.on('run:error', ({ error, duration }) => {
    console.log(`\n❌ Agent failed after ${duration}ms: ${error.message}`);
  });

  // The default logger is disabled to avoid duplicate output
  await using session = agent.session({ noLogger: true });
  await session.run('What is divmod(2**20, 1000)?');
}

// ============================================================================
// Example 2: Streaming with Async Generators
// ============================================================================

async function example2_Streaming() {
  console.log('\n========================================');
  console.log('Example 2: Streaming with runStream()');
  console.log('========================================\n');

  const { client } = loadExampleConfig();

  const agent = new Agent({
    client,
    name: 'streaming-agent',
    maxTurns: 5,
    tools: BUILTIN_TOOLS,
  });

  let result: AgentRunResult | undefined;
  for await (const event of agent.runStream('What time is it, and how many minutes remain until midnight?')) {
    switch (event.type) {
      case 'turn:start':
        console.log(`\n📍 Turn ${event.turn + 1}/${event.maxTurns}`);
        break;

      case 'text:delta':
        process.stdout.write(event.delta);
        break;

      case 'tool:result':
        console.log(`   ${event.success ? '✅' : '❌'} ${event.toolName}: ${event.result}`);
        break;

      case 'complete':
        console.log('\n\n✅ Stream complete');
        result = event.result;
        break;

      case 'error':
        console.log('\n❌ Stream error:', event.error.message);
        break;
    }
  }

  console.log('Final answer:', result?.finalMessage);
  await agent[Symbol.asyncDispose]();
}

// ============================================================================
// Example 3: Cancellation with AbortController
// ============================================================================

async function example3_Cancellation() {
  console.log('\n========================================');
  console.log('Example 3: Cancellation with AbortController');
  console.log('========================================\n');

  const { client } = loadExampleConfig();

  const agent = new Agent({
    client,
    name: 'cancellable-agent',
    tools: BUILTIN_TOOLS,
  });

  const controller = new AbortController();
  setTimeout(() => controller.abort(new Error('Took longer than 2 seconds')), 2000);

  try {
    await agent.run('Compute the sum of the first twenty powers of two, one call at a time.', {
      signal: controller.signal,
    });
  } catch (error) {
    console.log('⛔ Run cancelled:', error instanceof Error ? error.message : String(error));
  } finally {
    await agent[Symbol.asyncDispose]();
  }
}

async function main() {
  await example1_BasicEvents();
  await example2_Streaming();
  await example3_Cancellation();
}

main().catch(console.error);
