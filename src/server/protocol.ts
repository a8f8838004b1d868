/**
 * Web chat wire protocol (JSON over WebSocket)
 */

import { z } from 'zod';

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message'),
    content: z.string(),
  }),
  z.object({
    type: z.literal('window_message'),
    // The embedding page may send anything; only `site` is read
    data: z.object({ site: z.string().optional() }).passthrough().default({}),
  }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessage =
  | { type: 'system'; content: string }
  | { type: 'message:start'; id: string }
  | { type: 'token'; id: string; content: string }
  | { type: 'message:end'; id: string; content: string }
  | { type: 'error'; content: string };

export const SYSTEM_TEXT = {
  initializing: 'Initializing the ReAct agent...',
  initialized:
    "✅ Agent initialized successfully! I'm ready to help you with reasoning tasks and can use tools including the calculator, the clock and MCP server tools.",
  initFailed: (message: string) => `❌ Failed to initialize agent: ${message}`,
  notInitialized: '❌ Agent not initialized. Please refresh the page and try again.',
  siteStored: (site: string) => `✅ Site information received and stored: ${site}`,
  noSite: '⚠️ No site information found in window message',
} as const;

/**
 * Validate one raw frame
 */
export function parseClientMessage(raw: string): { ok: true; message: ClientMessage } | { ok: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid JSON message' };
  }

  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`);
    return { ok: false, error: `Invalid message: ${detail.join('; ')}` };
  }
  return { ok: true, message: parsed.data };
}
