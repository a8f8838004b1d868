/**
 * Web chat exports
 */

export { ChatServer, type ChatServerConfig } from './chat-server.js';
export {
  ClientMessageSchema,
  SYSTEM_TEXT,
  parseClientMessage,
  type ClientMessage,
  type ServerMessage,
} from './protocol.js';
