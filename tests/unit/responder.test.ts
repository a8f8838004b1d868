/**
 * Unit tests for the shared responder
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  NO_RESPONSE_TEXT,
  buildUserPrompt,
  createAgent,
  createClient,
  createMcpProvider,
  getAgentResponse,
  invokeAgent,
} from '../../src/chat/responder.js';
import { ConfigError, parseConfig } from '../../src/config.js';
import { BASE_SYSTEM_PROMPT, SITE_CONTEXT_PROMPT } from '../../src/prompts/index.js';
import { MCPToolProvider } from '../../src/tools/mcp/index.js';
import { ScriptedClient, answer } from '../helpers/scripted-client.js';

const CONFIG = parseConfig({ OPENAI_API_KEY: 'test-secret', MCP_ENABLED: 'false', PONDER_MAX_TURNS: '3' });

describe('buildUserPrompt', () => {
  it('should leave questions without a site unchanged', () => {
    expect(buildUserPrompt('What is 2 + 2?')).toBe('What is 2 + 2?');
  });

  it('should prefix the site', () => {
    expect(buildUserPrompt('What is 2 + 2?', 'https://example.com/docs')).toBe(
      'Site: https://example.com/docs\n\nUser Question: What is 2 + 2?'
    );
  });
});

describe('invokeAgent', () => {
  it('should return the run result', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([answer('4')]) });

    const outcome = await invokeAgent(agent, 'What is 2 + 2?', 'thread-1');

    expect('result' in outcome && outcome.result.finalMessage).toBe('4');
    expect('result' in outcome && outcome.result.threadId).toBe('thread-1');
  });

  it('should return failures instead of throwing', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([new Error('model unavailable')]) });

    const outcome = await invokeAgent(agent, 'Hi');

    expect('error' in outcome && outcome.error.message).toBe('model unavailable');
  });
});

describe('getAgentResponse', () => {
  it('should return the answer', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([answer('Hello!')]) });

    expect(await getAgentResponse(agent, 'Hi')).toBe('Hello!');
  });

  it('should send the site with the question', async () => {
    const client = new ScriptedClient([answer('It is a docs page.')]);
    const { agent } = createAgent(CONFIG, { client });

    await getAgentResponse(agent, 'Where am I?', { site: 'https://example.com' });

    expect(client.calls[0]?.messages.at(-1)).toEqual({
      role: 'user',
      content: 'Site: https://example.com\n\nUser Question: Where am I?',
    });
  });

  it('should format failures as text', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([new Error('model unavailable')]) });

    expect(await getAgentResponse(agent, 'Hi')).toBe('Error: model unavailable');
  });

  it('should report the turn limit as text', async () => {
    const loop = { role: 'assistant' as const, content: '', toolCalls: [{ name: 'calculate', arguments: '{"expression":"1"}' }] };
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([loop, loop, loop]) });

    expect(await getAgentResponse(agent, 'Loop')).toBe('Error: Agent stopped after reaching the limit of 3 turns');
  });

  it('should replace a blank answer', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([answer('   ')]) });

    expect(await getAgentResponse(agent, 'Hi')).toBe(NO_RESPONSE_TEXT);
  });

  it('should stream the answer', async () => {
    const { agent } = createAgent(CONFIG, { client: new ScriptedClient([answer('Hello!')]) });
    const deltas: string[] = [];

    await getAgentResponse(agent, 'Hi', { onTextDelta: (delta) => deltas.push(delta) });

    expect(deltas.join('')).toBe('Hello!');
  });
});

describe('createAgent', () => {
  it('should offer the built-in tools and the site prompt', async () => {
    const client = new ScriptedClient([answer('ok')]);
    const { agent, mcp } = createAgent(CONFIG, { client });

    expect(mcp).toBeUndefined();
    expect(agent.getName()).toBe('ponder');
    expect(agent.getMaxTurns()).toBe(3);
    expect((await agent.listTools()).map((t) => t.name)).toEqual(['calculate', 'get_current_time']);

    await agent.run('Hi');
    expect(client.calls[0]?.messages[0]).toEqual({
      role: 'system',
      content: `${BASE_SYSTEM_PROMPT}\n\n${SITE_CONTEXT_PROMPT}`,
    });
  });

  it('should attach an MCP provider when enabled', async () => {
    const config = parseConfig({ OPENAI_API_KEY: 'test-secret' });
    const { agent, mcp } = createAgent(config, { client: new ScriptedClient([]) });

    expect(mcp).toBeInstanceOf(MCPToolProvider);
    await agent[Symbol.asyncDispose]();
  });

  it('should skip MCP when asked', () => {
    const config = parseConfig({ OPENAI_API_KEY: 'test-secret' });
    expect(createAgent(config, { client: new ScriptedClient([]), mcp: false }).mcp).toBeUndefined();
  });
});

describe('createMcpProvider', () => {
  it('should read the config file when one is set', async () => {
    const configPath = join(tmpdir(), 'ponder-missing-mcp-config.json');
    const config = parseConfig({ MCP_CONFIG: configPath, MCP_SERVERS: 'math' });

    await using provider = createMcpProvider(config.mcp);

    expect(await provider.getTools()).toEqual([]);
    expect(provider.getStatus()).toMatchObject([{ serverName: configPath, connected: false }]);
  });
});

describe('createClient', () => {
  it('should prefer Azure when both backends are set', () => {
    const config = parseConfig({
      OPENAI_API_KEY: 'test-secret',
      AZURE_OPENAI_API_KEY: 'test-secret',
      AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
      AZURE_OPENAI_DEPLOYMENT_NAME: 'chat-prod',
    });

    expect(createClient(config).modelSlug).toBe('chat-prod');
  });

  it('should use the OpenAI model otherwise', () => {
    expect(createClient(CONFIG).modelSlug).toBe('gpt-4.1');
  });

  it('should fail without a backend', () => {
    expect(() => createClient(parseConfig({}))).toThrow(ConfigError);
  });
});
