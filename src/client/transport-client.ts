/**
 * Transport Client
 *
 * One long-lived WebSocket to the conversation server, with a ping
 * heartbeat and bounded reconnection. Sockets come from a factory so tests
 * can substitute an in-process fake.
 */

import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import { TransportError, toError } from '../errors';
import { getDefaultLogger, type DialogueLogger } from '../services/dialogue-logger';
import { decodeServerMessage, encodeClientMessage, type ClientMessage, type ServerMessage } from './protocol';

// ============ Socket Abstraction ============

export interface SocketHandlers {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onClose: () => void;
  onError: (error: Error) => void;
}

export interface TransportSocket {
  send(data: string): void;
  /** Graceful close */
  close(): void;
  /** Drop the connection immediately */
  terminate(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => TransportSocket;

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/** Default factory backed by the ws package */
export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('close', () => handlers.onClose());
  ws.on('error', (error) => handlers.onError(error));

  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    terminate: () => ws.terminate(),
  };
};

// ============ Client ============

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'error';

export interface TransportClientConfig {
  url: string;
  heartbeatIntervalMs?: number;
  maxReconnectAttempts?: number;
  /** Reconnect attempt n waits n × this */
  reconnectBaseDelayMs?: number;
  socketFactory?: SocketFactory;
  createSessionId?: () => string;
  logger?: DialogueLogger;
}

export interface TransportClientCallbacks {
  onMessage?: (message: ServerMessage) => void;
  onStateChange?: (state: ConnectionState) => void;
  /** Retries exhausted; reported once per outage */
  onConnectionLost?: (error: TransportError) => void;
  /** Open again after an unexpected drop; nothing sent before it survives */
  onReconnected?: () => void;
  /** A frame that could not be decoded; the connection stays up */
  onProtocolError?: (error: TransportError) => void;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class TransportClient {
  private config: Required<Omit<TransportClientConfig, 'logger'>>;
  private callbacks: TransportClientCallbacks;
  private logger: DialogueLogger;

  private socket: TransportSocket | null = null;
  private _state: ConnectionState = 'disconnected';
  private _sessionId: string;

  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private receivedSinceLastPing = true;
  private waiters: Waiter[] = [];
  private lastError: TransportError | null = null;
  /** Why the current outage started; the cause of retries_exhausted */
  private lastDrop: TransportError | null = null;

  constructor(config: TransportClientConfig, callbacks: TransportClientCallbacks = {}) {
    this.config = {
      heartbeatIntervalMs: 30_000,
      maxReconnectAttempts: 5,
      reconnectBaseDelayMs: 500,
      socketFactory: wsSocketFactory,
      createSessionId: randomUUID,
      ...config,
    };
    this.callbacks = callbacks;
    this.logger = config.logger ?? getDefaultLogger();
    this._sessionId = this.config.createSessionId();
  }

  setCallbacks(callbacks: TransportClientCallbacks): void {
    this.callbacks = callbacks;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get sessionId(): string {
    return this._sessionId;
  }

  isConnected(): boolean {
    return this._state === 'connected';
  }

  /**
   * Open the connection. Resolves once connected; an initial failure is
   * retried like any other drop.
   */
  connect(): Promise<void> {
    if (this._state === 'connected') return Promise.resolve();

    if (this._state === 'disconnected' || this._state === 'error') {
      this.reconnectAttempts = 0;
      this.lastError = null;
      this.lastDrop = null;
      this.setState('connecting');
      this.openSocket();
    }

    return this.waitForConnection();
  }

  /** Close for good; no reconnection follows */
  disconnect(): void {
    this.clearReconnectTimer();
    this.stopHeartbeat();

    const socket = this.socket;
    this.socket = null;
    socket?.close();

    this.setState('disconnected');
    this.rejectWaiters(new TransportError('not_connected', 'Transport disconnected'));
  }

  /** Resolves when connected; rejects if the connection is given up */
  waitForConnection(): Promise<void> {
    if (this._state === 'connected') return Promise.resolve();
    if (this._state === 'disconnected') {
      return Promise.reject(new TransportError('not_connected', 'Transport is not connected'));
    }
    if (this._state === 'error') {
      return Promise.reject(
        this.lastError ?? new TransportError('retries_exhausted', 'Transport gave up reconnecting')
      );
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Send a message on the open connection.
   * Throws TransportError('not_connected' | 'send_failed').
   */
  send(message: ClientMessage): void {
    const socket = this.socket;
    if (this._state !== 'connected' || !socket) {
      throw new TransportError('not_connected', `Cannot send ${message.type}: transport is ${this._state}`);
    }
    try {
      socket.send(encodeClientMessage(message));
    } catch (error) {
      throw new TransportError('send_failed', `Failed to send ${message.type}`, { cause: error });
    }
  }

  async sendWhenConnected(message: ClientMessage): Promise<void> {
    await this.waitForConnection();
    this.send(message);
  }

  /** Submit a finalized utterance under the current session id */
  sendText(content: string): Promise<void> {
    return this.sendWhenConnected({ type: 'text', content, session_id: this._sessionId });
  }

  /** Best-effort; returns whether the message went out */
  interrupt(): boolean {
    return this.trySend({ type: 'interrupt' });
  }

  ping(): boolean {
    return this.trySend({ type: 'ping' });
  }

  /**
   * Ask the server to drop history for the current session, then start a
   * new one. Never throws.
   */
  clear(): void {
    this.trySend({ type: 'clear', session_id: this._sessionId });
    this.newSession();
  }

  newSession(): string {
    this._sessionId = this.config.createSessionId();
    return this._sessionId;
  }

  // ============ Connection Lifecycle ============

  private openSocket(): void {
    const handlers: SocketHandlers = {
      onOpen: () => {
        if (this.socket === socket) this.handleOpen();
      },
      onMessage: (data) => {
        if (this.socket === socket) this.handleMessage(data);
      },
      onClose: () => {
        if (this.socket === socket) this.handleClose();
      },
      onError: (error) => {
        if (this.socket === socket) {
          this.logger.log({ type: 'transport', message: `socket error: ${error.message}` });
        }
      },
    };

    let socket: TransportSocket | null = null;
    try {
      socket = this.config.socketFactory(this.config.url, handlers);
      this.socket = socket;
    } catch (error) {
      this.lastDrop = new TransportError('connection_lost', `connect failed: ${toError(error).message}`, {
        cause: error,
      });
      this.logger.log({ type: 'transport', message: this.lastDrop.message });
      this.scheduleReconnect();
    }
  }

  private handleOpen(): void {
    const reconnected = this._state === 'reconnecting';
    this.reconnectAttempts = 0;
    this.lastError = null;
    this.lastDrop = null;
    this.receivedSinceLastPing = true;
    this.setState('connected');
    this.logger.log({ type: 'transport', message: `connected to ${this.config.url}` });
    this.startHeartbeat();

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve();

    if (reconnected) {
      this.callbacks.onReconnected?.();
    }
  }

  private handleMessage(data: string): void {
    this.receivedSinceLastPing = true;

    let message: ServerMessage;
    try {
      message = decodeServerMessage(data);
    } catch (error) {
      const protocolError =
        error instanceof TransportError ? error : new TransportError('protocol', toError(error).message);
      this.logger.log({ type: 'warning', message: `Dropped server frame: ${protocolError.message}` });
      this.callbacks.onProtocolError?.(protocolError);
      return;
    }

    this.callbacks.onMessage?.(message);
  }

  private handleClose(): void {
    this.socket = null;
    this.stopHeartbeat();
    if (!this.lastDrop) {
      this.lastDrop = new TransportError('connection_lost', 'connection closed');
    }
    this.logger.log({ type: 'transport', message: 'connection closed' });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
      this.giveUp();
      return;
    }

    this.reconnectAttempts++;
    const delayMs = this.reconnectAttempts * this.config.reconnectBaseDelayMs;
    this.setState('reconnecting');
    this.logger.log({ type: 'reconnect', attempt: this.reconnectAttempts, delayMs });

    this.clearReconnectTimer();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openSocket();
    }, delayMs);
  }

  private giveUp(): void {
    const error = new TransportError(
      'retries_exhausted',
      `Connection lost after ${this.config.maxReconnectAttempts} reconnect attempts`,
      this.lastDrop ? { cause: this.lastDrop } : undefined
    );
    this.lastError = error;
    this.setState('error');
    this.logger.log({ type: 'error', message: error.message });
    this.rejectWaiters(error);
    this.callbacks.onConnectionLost?.(error);
  }

  // ============ Heartbeat ============

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private heartbeat(): void {
    if (!this.receivedSinceLastPing) {
      // Nothing since the previous ping: treat the connection as dead
      this.lastDrop = new TransportError(
        'heartbeat_timeout',
        `no message within ${this.config.heartbeatIntervalMs}ms of a ping`
      );
      this.logger.log({ type: 'transport', message: `heartbeat timeout: ${this.lastDrop.message}` });
      const socket = this.socket;
      this.socket = null;
      this.stopHeartbeat();
      socket?.terminate();
      this.scheduleReconnect();
      return;
    }

    this.receivedSinceLastPing = false;
    this.ping();
  }

  // ============ Helpers ============

  private trySend(message: ClientMessage): boolean {
    try {
      this.send(message);
      return true;
    } catch (error) {
      this.logger.log({ type: 'transport', message: `${message.type} not sent: ${toError(error).message}` });
      return false;
    }
  }

  private setState(state: ConnectionState): void {
    if (this._state === state) return;
    this._state = state;
    this.callbacks.onStateChange?.(state);
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
