/**
 * Conversation Server
 *
 * Binds a ConversationHandler to a ws server. Each incoming frame is
 * handled on its own, so an interrupt reaches the session while a text
 * response is still streaming.
 *
 * @example
 * ```typescript
 * const generator = new CloudTextGenerator({ baseUrl, model, apiKey });
 * const wss = createConversationServer(new ConversationHandler(generator), { port: 8000 });
 * ```
 */

import WebSocket, { WebSocketServer } from 'ws';
import { decodeClientMessage, encodeServerMessage, type ClientMessage, type ServerMessage } from '../client/protocol';
import { rawDataToString } from '../client/transport-client';
import { toError } from '../errors';
import { getDefaultLogger, type DialogueLogger } from '../services/dialogue-logger';
import type { ConversationHandler } from './handler';

export const CONVERSATION_PATH = '/api/ws/conversation';

export interface ConversationServerOptions {
  port?: number;
  host?: string;
  path?: string;
  logger?: DialogueLogger;
}

async function pump(messages: AsyncGenerator<ServerMessage>, ws: WebSocket): Promise<void> {
  for await (const message of messages) {
    if (ws.readyState !== WebSocket.OPEN) break;
    ws.send(encodeServerMessage(message));
  }
}

/**
 * Serve the conversation protocol on every connection of an existing server.
 */
export function attachConversationServer(
  wss: WebSocketServer,
  handler: ConversationHandler,
  logger: DialogueLogger = getDefaultLogger()
): void {
  wss.on('connection', (ws) => {
    const session = handler.createSession();
    logger.log({ type: 'transport', message: 'client connected' });

    ws.on('message', (data) => {
      let message: ClientMessage;
      try {
        message = decodeClientMessage(rawDataToString(data));
      } catch (error) {
        const reason = toError(error).message;
        logger.log({ type: 'protocol_violation', message: reason });
        ws.send(encodeServerMessage({ type: 'error', message: reason, recoverable: true }));
        return;
      }

      const kind = message.type;
      pump(session.handle(message), ws).catch((error: unknown) => {
        logger.log({ type: 'error', message: `Failed to answer ${kind}: ${toError(error).message}` });
      });
    });

    ws.on('close', () => {
      session.destroy();
      logger.log({ type: 'transport', message: 'client disconnected' });
    });

    ws.on('error', (error) => {
      logger.log({ type: 'warning', message: `socket error: ${error.message}` });
    });
  });
}

/**
 * Start a ws server on `port` serving the conversation protocol at `path`.
 */
export function createConversationServer(
  handler: ConversationHandler,
  options: ConversationServerOptions = {}
): WebSocketServer {
  const wss = new WebSocketServer({
    port: options.port ?? 8000,
    host: options.host,
    path: options.path ?? CONVERSATION_PATH,
  });
  attachConversationServer(wss, handler, options.logger);
  return wss;
}

export { ConversationHandler, ConversationSession, createConversationHandler } from './handler';
export type { ChatMessage, ChatRole, ConversationHandlerConfig, TextGenerator } from './handler';
export { SentenceSplitter } from './sentence-splitter';
