/**
 * Integration tests for the web chat server
 * The server listens on a random local port; agents use a scripted model client.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { WebSocket } from 'ws';
import { z } from 'zod';
import { Agent } from '../../src/core/agent.js';
import type {
  AssistantMessage,
  ChatMessage,
  GenerateOptions,
  LLMClient,
  Tool,
  ToolProvider,
} from '../../src/core/models.js';
import { ChatServer } from '../../src/server/chat-server.js';
import { SYSTEM_TEXT } from '../../src/server/protocol.js';
import { BUILTIN_TOOLS } from '../../src/tools/index.js';
import { ScriptedClient, answer, type ScriptedReply } from '../helpers/scripted-client.js';

const FrameSchema = z.object({
  type: z.string(),
  id: z.string().optional(),
  content: z.string().optional(),
});
type Frame = z.infer<typeof FrameSchema>;

class TestClient {
  readonly frames: Frame[] = [];
  private waiters: Array<() => void> = [];

  private constructor(private ws: WebSocket) {
    ws.on('message', (data) => {
      this.frames.push(FrameSchema.parse(JSON.parse(String(data))));
      for (const wake of this.waiters.splice(0)) {
        wake();
      }
    });
  }

  static async connect(url: string): Promise<TestClient> {
    const ws = new WebSocket(url);
    const client = new TestClient(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    return client;
  }

  send(message: unknown): void {
    this.ws.send(typeof message === 'string' ? message : JSON.stringify(message));
  }

  /** Resolve once `count` frames have arrived */
  async waitForFrames(count: number, timeoutMs = 2000): Promise<Frame[]> {
    const deadline = Date.now() + timeoutMs;
    while (this.frames.length < count) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error(`Timed out waiting for ${count} frames, got ${JSON.stringify(this.frames)}`);
      }
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
    return this.frames.slice(0, count);
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.ws.once('close', () => resolve());
      this.ws.close();
    });
  }
}

/** Model client whose replies never arrive; it only settles when aborted */
class StalledClient implements LLMClient {
  readonly modelSlug = 'stalled-model';
  readonly maxTokens = 8192;

  generate(_messages: ChatMessage[], _tools: Map<string, Tool>, options: GenerateOptions = {}): Promise<AssistantMessage> {
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(options.signal?.reason), { once: true });
    });
  }
}

describe('ChatServer', () => {
  let tempDir: string;
  let indexFile: string;
  let server: ChatServer | undefined;
  const clients: TestClient[] = [];

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'ponder-chat-test-'));
    indexFile = join(tempDir, 'index.html');
    await writeFile(indexFile, '<!doctype html><title>Chat</title>');
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.close();
    }
    await server?.stop();
    server = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  async function start(createAgent: () => Agent | Promise<Agent>): Promise<{ http: string; ws: string }> {
    server = new ChatServer({ host: '127.0.0.1', port: 0, createAgent, indexFile });
    const { port } = await server.start();
    return { http: `http://127.0.0.1:${port}`, ws: `ws://127.0.0.1:${port}/ws` };
  }

  function scriptedAgent(replies: ScriptedReply[], client = new ScriptedClient(replies)): Agent {
    return new Agent({ client, name: 'web-test', tools: BUILTIN_TOOLS });
  }

  async function connect(url: string): Promise<TestClient> {
    const client = await TestClient.connect(url);
    clients.push(client);
    return client;
  }

  describe('start/stop', () => {
    it('should start on a free port and stop', async () => {
      await start(() => scriptedAgent([]));

      expect(server?.isRunning).toBe(true);
      expect(server?.address.port).toBeGreaterThan(0);

      await server?.stop();
      expect(server?.isRunning).toBe(false);
    });

    it('should refuse to start twice', async () => {
      await start(() => scriptedAgent([]));

      await expect(server?.start()).rejects.toThrow('Chat server is already running');
    });

    it('should dispose connected agents on stop', async () => {
      let disposed = 0;
      const provider: ToolProvider = {
        async getTools() {
          return [];
        },
        async [Symbol.asyncDispose]() {
          disposed++;
        },
      };
      const { ws } = await start(
        () => new Agent({ client: new ScriptedClient([]), name: 'web-test', tools: [provider] })
      );
      const client = await connect(ws);
      await client.waitForFrames(2);

      await server?.stop();

      expect(disposed).toBe(1);
      expect(server?.clientCount).toBe(0);
    });

    it('should abort an in-flight turn on stop', async () => {
      const errors: Error[] = [];
      const { ws } = await start(() => {
        const agent = new Agent({ client: new StalledClient(), name: 'web-test' });
        agent.on('run:error', ({ error }) => errors.push(error));
        return agent;
      });
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'message', content: 'Hi' });
      expect((await client.waitForFrames(3))[2]?.type).toBe('message:start');

      await server?.stop();

      expect(errors.map((error) => error.name)).toEqual(['AbortError']);
      expect(server?.clientCount).toBe(0);
    });
  });

  describe('http', () => {
    it('should serve the chat page', async () => {
      const { http } = await start(() => scriptedAgent([]));

      const response = await fetch(`${http}/`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
      expect(await response.text()).toBe('<!doctype html><title>Chat</title>');
    });

    it('should report health', async () => {
      const { http } = await start(() => scriptedAgent([]));

      const response = await fetch(`${http}/health`);

      expect(await response.json()).toEqual({ status: 'ok', clients: 0 });
    });

    it('should answer unknown paths with 404 and other methods with 405', async () => {
      const { http } = await start(() => scriptedAgent([]));

      const missing = await fetch(`${http}/missing`);
      const post = await fetch(`${http}/`, { method: 'POST' });

      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'Not found' });
      expect(post.status).toBe(405);
    });
  });

  describe('websocket', () => {
    it('should announce initialization', async () => {
      const { ws } = await start(() => scriptedAgent([]));
      const client = await connect(ws);

      expect(await client.waitForFrames(2)).toEqual([
        { type: 'system', content: SYSTEM_TEXT.initializing },
        { type: 'system', content: SYSTEM_TEXT.initialized },
      ]);
    });

    it('should stream an answer', async () => {
      const { ws } = await start(() => scriptedAgent([answer('Hello!')]));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'message', content: 'Hi' });
      const frames = (await client.waitForFrames(6)).slice(2);

      const id = frames[0]?.id;
      expect(id).toEqual(expect.any(String));
      expect(frames).toEqual([
        { type: 'message:start', id },
        { type: 'token', id, content: 'Hel' },
        { type: 'token', id, content: 'lo!' },
        { type: 'message:end', id, content: 'Hello!' },
      ]);
    });

    it('should keep history per connection', async () => {
      const model = new ScriptedClient([answer('Hi Ada.'), answer('Ada.')]);
      const { ws } = await start(() => scriptedAgent([], model));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'message', content: 'My name is Ada.' });
      client.send({ type: 'message', content: 'What is my name?' });
      await client.waitForFrames(2 + 4 + 4);

      expect(model.calls[1]?.messages.slice(1).map((m) => m.content)).toEqual([
        'My name is Ada.',
        'Hi Ada.',
        'What is my name?',
      ]);
    });

    it('should store the site and prefix later questions', async () => {
      const model = new ScriptedClient([answer('A docs page.')]);
      const { ws } = await start(() => scriptedAgent([], model));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'window_message', data: { site: ' https://example.com/docs ' } });
      client.send({ type: 'message', content: 'Where am I?' });
      const frames = await client.waitForFrames(3 + 4);

      expect(frames[2]).toEqual({ type: 'system', content: SYSTEM_TEXT.siteStored('https://example.com/docs') });
      expect(model.calls[0]?.messages.at(-1)?.content).toBe(
        'Site: https://example.com/docs\n\nUser Question: Where am I?'
      );
    });

    it('should warn when a window message has no site', async () => {
      const { ws } = await start(() => scriptedAgent([]));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'window_message', data: { theme: 'dark' } });

      expect((await client.waitForFrames(3))[2]).toEqual({ type: 'system', content: SYSTEM_TEXT.noSite });
    });

    it('should reject invalid frames', async () => {
      const { ws } = await start(() => scriptedAgent([]));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send('{not json');
      client.send({ type: 'message' });

      expect((await client.waitForFrames(4)).slice(2)).toEqual([
        { type: 'error', content: 'Invalid JSON message' },
        { type: 'error', content: 'Invalid message: content: Required' },
      ]);
    });

    it('should end the message and report a failed turn', async () => {
      const { ws } = await start(() => scriptedAgent([new Error('model unavailable')]));
      const client = await connect(ws);
      await client.waitForFrames(2);

      client.send({ type: 'message', content: 'Hi' });
      const frames = (await client.waitForFrames(5)).slice(2);

      expect(frames.map((f) => f.type)).toEqual(['message:start', 'message:end', 'error']);
      expect(frames[1]?.content).toBe('');
      expect(frames[2]?.content).toBe('❌ Error: model unavailable');
    });

    it('should report a failed initialization and refuse questions', async () => {
      const { ws } = await start(() => {
        throw new Error('No model backend configured');
      });
      const client = await connect(ws);

      expect((await client.waitForFrames(2))[1]).toEqual({
        type: 'system',
        content: SYSTEM_TEXT.initFailed('No model backend configured'),
      });

      client.send({ type: 'message', content: 'Hi' });
      expect((await client.waitForFrames(3))[2]).toEqual({ type: 'system', content: SYSTEM_TEXT.notInitialized });
    });
  });
});
