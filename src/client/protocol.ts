/**
 * Conversation Protocol Types
 *
 * JSON messages exchanged with the conversation server, one object per
 * WebSocket frame.
 */

import { TransportError } from '../errors';

// ============ Client → Server ============

/** A finalized user utterance */
export type TextMessage = {
  type: 'text';
  content: string;
  session_id: string;
};

export type InterruptMessage = {
  type: 'interrupt';
};

/** Reset history server-side */
export type ClearMessage = {
  type: 'clear';
  session_id: string;
};

export type PingMessage = {
  type: 'ping';
};

export type ClientMessage = TextMessage | InterruptMessage | ClearMessage | PingMessage;

// ============ Server → Client ============

export type TextStartMessage = {
  type: 'text_start';
};

export type TextDeltaMessage = {
  type: 'text_delta';
  content: string;
};

/** A complete sentence ready for synthesis */
export type SentenceEndMessage = {
  type: 'sentence_end';
  sentence: string;
};

export type TextDoneMessage = {
  type: 'text_done';
  full_text: string;
};

export type InterruptedMessage = {
  type: 'interrupted';
};

export type ErrorMessage = {
  type: 'error';
  message: string;
  recoverable?: boolean;
};

export type PongMessage = {
  type: 'pong';
};

export type ClearedMessage = {
  type: 'cleared';
};

export type ServerMessage =
  | TextStartMessage
  | TextDeltaMessage
  | SentenceEndMessage
  | TextDoneMessage
  | InterruptedMessage
  | ErrorMessage
  | PongMessage
  | ClearedMessage;

// ============ Encoding ============

export function encodeClientMessage(message: ClientMessage): string {
  return JSON.stringify(message);
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, field: string, type: string): string {
  const value = record[field];
  if (typeof value !== 'string') {
    throw new TransportError('protocol', `Invalid ${type} message: "${field}" must be a string`);
  }
  return value;
}

function parseObject(raw: string): { type: string; record: Record<string, unknown> } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new TransportError('protocol', 'Message is not valid JSON', { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new TransportError('protocol', 'Message must be a JSON object');
  }
  const type = parsed.type;
  if (typeof type !== 'string') {
    throw new TransportError('protocol', 'Message must have a string "type"');
  }
  return { type, record: parsed };
}

/**
 * Decode and validate one server frame.
 * Throws TransportError('protocol') on anything malformed or unknown.
 */
export function decodeServerMessage(raw: string): ServerMessage {
  const { type, record } = parseObject(raw);

  switch (type) {
    case 'text_start':
    case 'interrupted':
    case 'pong':
    case 'cleared':
      return { type };

    case 'text_delta':
      return { type: 'text_delta', content: requireString(record, 'content', 'text_delta') };

    case 'sentence_end':
      return { type: 'sentence_end', sentence: requireString(record, 'sentence', 'sentence_end') };

    case 'text_done':
      return { type: 'text_done', full_text: requireString(record, 'full_text', 'text_done') };

    case 'error': {
      // Servers put the description under either key
      const text = typeof record.message === 'string' ? record.message : record.error;
      if (typeof text !== 'string') {
        throw new TransportError('protocol', 'Invalid error message: missing description');
      }
      const message: ErrorMessage = { type: 'error', message: text };
      if (typeof record.recoverable === 'boolean') {
        message.recoverable = record.recoverable;
      }
      return message;
    }

    default:
      throw new TransportError('protocol', `Unknown server message type: ${type}`);
  }
}

/**
 * Decode and validate one client frame (server side).
 */
export function decodeClientMessage(raw: string): ClientMessage {
  const { type, record } = parseObject(raw);

  switch (type) {
    case 'text':
      return {
        type: 'text',
        content: requireString(record, 'content', 'text'),
        session_id: requireString(record, 'session_id', 'text'),
      };

    case 'clear':
      return { type: 'clear', session_id: requireString(record, 'session_id', 'clear') };

    case 'interrupt':
    case 'ping':
      return { type };

    default:
      throw new TransportError('protocol', `Unknown client message type: ${type}`);
  }
}
