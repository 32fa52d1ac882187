/**
 * Conversation Handler
 *
 * Framework-agnostic server side of the conversation protocol. One
 * ConversationSession per connection; histories are kept per session id so
 * a reconnecting client picks up where it left off.
 */

import type { ClientMessage, ServerMessage } from '../client/protocol';
import { toError } from '../errors';
import { SentenceSplitter } from './sentence-splitter';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Streams the assistant's answer for a history. Must stop promptly once
 * the signal is aborted.
 */
export interface TextGenerator {
  generate(history: ChatMessage[], signal: AbortSignal): AsyncIterable<string>;
}

export interface ConversationHandlerConfig {
  systemPrompt?: string;
  /** Messages kept per session, system prompt excluded (default: 20) */
  maxHistory?: number;
  /** Sent as full_text when the generator produced nothing */
  fallbackText?: string;
}

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful voice assistant. Answer in short, natural spoken sentences without markdown or lists.';

/**
 * A single client connection.
 */
export class ConversationSession {
  private controller: AbortController | null = null;
  private destroyed = false;

  constructor(private handler: ConversationHandler) {}

  /**
   * Handle an incoming message and yield response messages.
   * An interrupt handled concurrently ends an in-flight text response
   * without text_done.
   */
  async *handle(message: ClientMessage): AsyncGenerator<ServerMessage> {
    if (this.destroyed) return;

    switch (message.type) {
      case 'ping':
        yield { type: 'pong' };
        break;

      case 'interrupt':
        this.abort();
        yield { type: 'interrupted' };
        break;

      case 'clear':
        this.abort();
        this.handler.clearHistory(message.session_id);
        yield { type: 'cleared' };
        break;

      case 'text':
        yield* this.respond(message.content, message.session_id);
        break;
    }
  }

  /** True while a response is being generated */
  get generating(): boolean {
    return this.controller !== null;
  }

  destroy(): void {
    this.destroyed = true;
    this.abort();
  }

  private abort(): void {
    this.controller?.abort();
    this.controller = null;
  }

  private async *respond(content: string, sessionId: string): AsyncGenerator<ServerMessage> {
    this.abort();
    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;

    this.handler.appendHistory(sessionId, { role: 'user', content });
    yield { type: 'text_start' };

    const splitter = new SentenceSplitter();
    let fullText = '';

    try {
      for await (const delta of this.handler.generator.generate(this.handler.promptFor(sessionId), signal)) {
        if (signal.aborted) return;
        fullText += delta;
        yield { type: 'text_delta', content: delta };
        for (const sentence of splitter.push(delta)) {
          yield { type: 'sentence_end', sentence };
        }
      }
      if (signal.aborted) return;

      const rest = splitter.flush();
      if (rest) {
        yield { type: 'sentence_end', sentence: rest };
      }

      if (fullText) {
        this.handler.appendHistory(sessionId, { role: 'assistant', content: fullText });
      }
      yield { type: 'text_done', full_text: fullText || this.handler.fallbackText };
    } catch (error) {
      // The generator throws once aborted; the interrupt already answered
      if (signal.aborted) return;
      yield { type: 'error', message: `I encountered an error: ${toError(error).message}`, recoverable: true };
    } finally {
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }
}

/**
 * Session factory and history store
 */
export class ConversationHandler {
  readonly generator: TextGenerator;
  readonly fallbackText: string;
  private systemPrompt: string;
  private maxHistory: number;
  private histories = new Map<string, ChatMessage[]>();

  constructor(generator: TextGenerator, config: ConversationHandlerConfig = {}) {
    this.generator = generator;
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.maxHistory = config.maxHistory ?? 20;
    this.fallbackText = config.fallbackText ?? "I'm listening.";
  }

  createSession(): ConversationSession {
    return new ConversationSession(this);
  }

  getHistory(sessionId: string): ChatMessage[] {
    return [...(this.histories.get(sessionId) ?? [])];
  }

  /** Appends and keeps only the most recent messages */
  appendHistory(sessionId: string, message: ChatMessage): void {
    const history = [...(this.histories.get(sessionId) ?? []), message];
    this.histories.set(sessionId, history.slice(-this.maxHistory));
  }

  clearHistory(sessionId: string): void {
    this.histories.delete(sessionId);
  }

  /** History with the system prompt in front */
  promptFor(sessionId: string): ChatMessage[] {
    return [{ role: 'system', content: this.systemPrompt }, ...this.getHistory(sessionId)];
  }
}

export function createConversationHandler(
  generator: TextGenerator,
  config?: ConversationHandlerConfig
): ConversationHandler {
  return new ConversationHandler(generator, config);
}
