/**
 * Web chat server
 *
 * Serves the chat page over HTTP and talks to it over a WebSocket at /ws.
 * Each connection gets its own agent and conversation thread; frames from
 * one connection are handled strictly in arrival order.
 */

import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { NO_RESPONSE_TEXT, buildUserPrompt, invokeAgent } from '../chat/responder.js';
import { DEFAULT_HOST, DEFAULT_PORT } from '../constants.js';
import type { Agent } from '../core/agent.js';
import { logger } from '../utils/logging/logger.js';
import { SYSTEM_TEXT, parseClientMessage, type ServerMessage } from './protocol.js';

export interface ChatServerConfig {
  host?: string;

  /** 0 picks a free port */
  port?: number;

  /** Builds the agent for a new connection */
  createAgent: () => Agent | Promise<Agent>;

  /** Page served at / */
  indexFile?: URL | string;
}

interface ClientConnection {
  id: string;
  ws: WebSocket;
  threadId: string;
  agent?: Agent;
  site?: string;
  /** Tail of the per-connection work queue */
  queue: Promise<void>;
  /** Aborted when the connection goes away */
  abort: AbortController;
}

const DEFAULT_INDEX_FILE = new URL('../../public/index.html', import.meta.url);

export class ChatServer {
  private host: string;
  private port: number;
  private createAgent: ChatServerConfig['createAgent'];
  private indexFile: URL | string;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();

  constructor(config: ChatServerConfig) {
    this.host = config.host ?? DEFAULT_HOST;
    this.port = config.port ?? DEFAULT_PORT;
    this.createAgent = config.createAgent;
    this.indexFile = config.indexFile ?? DEFAULT_INDEX_FILE;
  }

  get isRunning(): boolean {
    return this.httpServer !== null && this.httpServer.listening;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Bound address; only meaningful while running
   */
  get address(): { host: string; port: number } {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return { host: address.address, port: address.port };
    }
    return { host: this.host, port: this.port };
  }

  async start(): Promise<{ host: string; port: number }> {
    if (this.isRunning) {
      throw new Error('Chat server is already running');
    }

    const httpServer = createServer((req, res) => {
      this.handleHttp(req, res).catch((error: unknown) => {
        logger.error({ err: error, url: req.url }, 'HTTP request failed');
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'Internal server error' });
        } else {
          res.end();
        }
      });
    });

    const wss = new WebSocketServer({ server: httpServer, path: '/ws', clientTracking: true });
    wss.on('connection', (ws) => this.handleConnection(ws));
    wss.on('error', (error) => logger.error({ err: error }, 'WebSocket server error'));

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.port, this.host, () => {
        httpServer.removeListener('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;

    const { port } = this.address;
    logger.info({ host: this.host, port }, 'Chat server started');
    return { host: this.host, port };
  }

  /**
   * Close every socket, dispose every agent and stop listening
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer;
    const wss = this.wss;
    if (!httpServer || !wss) {
      return;
    }
    this.httpServer = null;
    this.wss = null;

    const connections = [...this.clients.values()];
    for (const connection of connections) {
      connection.ws.close(1001, 'Server shutting down');
    }
    await Promise.all(connections.map((connection) => this.release(connection)));

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    httpServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });

    logger.info('Chat server stopped');
  }

  private async handleHttp(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    if (path === '/health') {
      sendJson(res, 200, { status: 'ok', clients: this.clients.size });
      return;
    }

    if (path === '/' || path === '/index.html') {
      const page = await readFile(this.indexFile, 'utf-8');
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(req.method === 'HEAD' ? undefined : page);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  }

  private handleConnection(ws: WebSocket): void {
    const connection: ClientConnection = {
      id: randomUUID(),
      ws,
      threadId: randomUUID(),
      queue: Promise.resolve(),
      abort: new AbortController(),
    };
    this.clients.set(connection.id, connection);
    logger.info({ clientId: connection.id }, 'Client connected');

    ws.on('message', (data) => this.enqueue(connection, () => this.handleMessage(connection, data)));
    ws.on('close', () => {
      this.release(connection).catch((error: unknown) => {
        logger.warn({ err: error, clientId: connection.id }, 'Failed to release connection');
      });
    });
    ws.on('error', (error) => logger.warn({ err: error, clientId: connection.id }, 'Client socket error'));

    this.send(connection, { type: 'system', content: SYSTEM_TEXT.initializing });
    this.enqueue(connection, () => this.initializeAgent(connection));
  }

  /**
   * Chain work so a connection's frames run one at a time
   */
  private enqueue(connection: ClientConnection, task: () => Promise<void>): void {
    connection.queue = connection.queue.then(task).catch((error: unknown) => {
      logger.error({ err: error, clientId: connection.id }, 'Unhandled error while serving client');
    });
  }

  private async initializeAgent(connection: ClientConnection): Promise<void> {
    let agent: Agent | undefined;
    try {
      agent = await this.createAgent();
      // Connect tool providers now so failures surface at chat start
      await agent.listTools();
      connection.agent = agent;
      this.send(connection, { type: 'system', content: SYSTEM_TEXT.initialized });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, clientId: connection.id }, 'Agent initialization failed');
      this.send(connection, { type: 'system', content: SYSTEM_TEXT.initFailed(message) });
      if (agent) {
        await agent[Symbol.asyncDispose]();
      }
    }
  }

  private async handleMessage(connection: ClientConnection, data: RawData): Promise<void> {
    const parsed = parseClientMessage(rawDataToString(data));
    if (!parsed.ok) {
      this.send(connection, { type: 'error', content: parsed.error });
      return;
    }

    const message = parsed.message;
    switch (message.type) {
      case 'window_message': {
        const site = message.data.site?.trim();
        if (site) {
          connection.site = site;
          this.send(connection, { type: 'system', content: SYSTEM_TEXT.siteStored(site) });
        } else {
          this.send(connection, { type: 'system', content: SYSTEM_TEXT.noSite });
        }
        return;
      }
      case 'message':
        await this.handleUserMessage(connection, message.content);
        return;
    }
  }

  private async handleUserMessage(connection: ClientConnection, content: string): Promise<void> {
    const agent = connection.agent;
    if (!agent) {
      this.send(connection, { type: 'system', content: SYSTEM_TEXT.notInitialized });
      return;
    }

    const id = randomUUID();
    let streamed = '';
    this.send(connection, { type: 'message:start', id });

    const outcome = await invokeAgent(agent, buildUserPrompt(content, connection.site), connection.threadId, {
      onTextDelta: (delta) => {
        streamed += delta;
        this.send(connection, { type: 'token', id, content: delta });
      },
      signal: connection.abort.signal,
    });

    if ('error' in outcome) {
      if (connection.abort.signal.aborted) {
        logger.info({ clientId: connection.id }, 'Agent turn aborted');
        return;
      }
      logger.warn({ err: outcome.error, clientId: connection.id }, 'Agent turn failed');
      this.send(connection, { type: 'message:end', id, content: streamed });
      this.send(connection, { type: 'error', content: `❌ Error: ${outcome.error.message}` });
      return;
    }

    const answer = outcome.result.finalMessage;
    this.send(connection, { type: 'message:end', id, content: answer.trim() === '' ? NO_RESPONSE_TEXT : answer });
  }

  private async release(connection: ClientConnection): Promise<void> {
    if (!this.clients.delete(connection.id)) {
      return;
    }
    logger.info({ clientId: connection.id }, 'Client disconnected');

    // Abort the in-flight turn, then wait for it to unwind before closing the agent's tools
    connection.abort.abort();
    await connection.queue;
    const agent = connection.agent;
    connection.agent = undefined;
    if (agent) {
      await agent[Symbol.asyncDispose]();
    }
  }

  private send(connection: ClientConnection, message: ServerMessage): void {
    if (connection.ws.readyState === WebSocket.OPEN) {
      connection.ws.send(JSON.stringify(message));
    }
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}
