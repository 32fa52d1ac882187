import { describe, it, expect, vi } from 'vitest';
import type { ServerMessage } from '../src/client/protocol';
import { ConversationHandler, type ChatMessage, type TextGenerator } from '../src/server/handler';
import { SentenceSplitter } from '../src/server/sentence-splitter';
import { settle } from './helpers/fakes';

// ============ Helpers ============

async function collect(messages: AsyncIterable<ServerMessage>): Promise<ServerMessage[]> {
  const result: ServerMessage[] = [];
  for await (const message of messages) result.push(message);
  return result;
}

/** Yields the given deltas and records the history it was asked about */
class ScriptedGenerator implements TextGenerator {
  calls: ChatMessage[][] = [];

  constructor(private deltas: string[]) {}

  async *generate(history: ChatMessage[]): AsyncGenerator<string> {
    this.calls.push(history);
    for (const delta of this.deltas) yield delta;
  }
}

const text = (content: string, sessionId = 's1') => ({ type: 'text' as const, content, session_id: sessionId });

// ============ Sentence splitting ============

describe('SentenceSplitter', () => {
  it('cuts at terminal punctuation followed by a space', () => {
    const splitter = new SentenceSplitter();
    expect(splitter.push('Hello there. How')).toEqual(['Hello there.']);
    expect(splitter.push(' are you? Fine')).toEqual(['How are you?']);
    expect(splitter.flush()).toBe('Fine');
  });

  it('waits for the character after the punctuation', () => {
    const splitter = new SentenceSplitter();
    expect(splitter.push('It is 3.')).toEqual([]);
    expect(splitter.push('5 degrees.')).toEqual([]);
    expect(splitter.flush()).toBe('It is 3.5 degrees.');
  });

  it('keeps a closing quote with its sentence', () => {
    const splitter = new SentenceSplitter();
    expect(splitter.push('She said "stop." Then')).toEqual(['She said "stop."']);
  });

  it('splits on newlines and returns every finished sentence', () => {
    const splitter = new SentenceSplitter();
    expect(splitter.push('One!\nTwo. Three? ')).toEqual(['One!', 'Two.', 'Three?']);
    expect(splitter.flush()).toBeNull();
  });
});

// ============ Handler ============

describe('ConversationHandler', () => {
  it('streams an answer as deltas, sentences and the full text', async () => {
    const handler = new ConversationHandler(new ScriptedGenerator(['Hello there. ', 'How are', ' you?']));
    const messages = await collect(handler.createSession().handle(text('Hi')));

    expect(messages).toEqual([
      { type: 'text_start' },
      { type: 'text_delta', content: 'Hello there. ' },
      { type: 'sentence_end', sentence: 'Hello there.' },
      { type: 'text_delta', content: 'How are' },
      { type: 'text_delta', content: ' you?' },
      { type: 'sentence_end', sentence: 'How are you?' },
      { type: 'text_done', full_text: 'Hello there. How are you?' },
    ]);
  });

  it('keeps history per session behind the system prompt', async () => {
    const generator = new ScriptedGenerator(['Sure.']);
    const handler = new ConversationHandler(generator, { systemPrompt: 'Be brief.' });
    const session = handler.createSession();

    await collect(session.handle(text('Hi')));
    await collect(session.handle(text('Again')));

    expect(generator.calls[1]).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Sure.' },
      { role: 'user', content: 'Again' },
    ]);
    expect(handler.getHistory('other')).toEqual([]);
  });

  it('keeps only the most recent messages', async () => {
    const handler = new ConversationHandler(new ScriptedGenerator(['Ok.']), { maxHistory: 3 });
    const session = handler.createSession();
    await collect(session.handle(text('one')));
    await collect(session.handle(text('two')));

    expect(handler.getHistory('s1')).toEqual([
      { role: 'assistant', content: 'Ok.' },
      { role: 'user', content: 'two' },
      { role: 'assistant', content: 'Ok.' },
    ]);
  });

  it('falls back to a short answer when nothing was generated', async () => {
    const handler = new ConversationHandler(new ScriptedGenerator([]));
    const messages = await collect(handler.createSession().handle(text('Hi')));

    expect(messages).toEqual([{ type: 'text_start' }, { type: 'text_done', full_text: "I'm listening." }]);
    expect(handler.getHistory('s1')).toEqual([{ role: 'user', content: 'Hi' }]);
  });

  it('turns a generator failure into a recoverable error', async () => {
    const failing: TextGenerator = {
      async *generate() {
        yield 'Let me';
        throw new Error('upstream timeout');
      },
    };
    const messages = await collect(new ConversationHandler(failing).createSession().handle(text('Hi')));

    expect(messages[messages.length - 1]).toEqual({
      type: 'error',
      message: 'I encountered an error: upstream timeout',
      recoverable: true,
    });
    expect(messages.some((m) => m.type === 'text_done')).toBe(false);
  });

  it('stops a response when interrupted', async () => {
    const aborted = vi.fn();
    const slow: TextGenerator = {
      async *generate(_history, signal) {
        yield 'Once upon ';
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
        aborted();
        yield 'a time.';
      },
    };
    const session = new ConversationHandler(slow).createSession();

    const answering = collect(session.handle(text('Tell me a story')));
    await settle();
    expect(session.generating).toBe(true);

    expect(await collect(session.handle({ type: 'interrupt' }))).toEqual([{ type: 'interrupted' }]);
    expect(await answering).toEqual([{ type: 'text_start' }, { type: 'text_delta', content: 'Once upon ' }]);
    expect(aborted).toHaveBeenCalledTimes(1);
    expect(session.generating).toBe(false);
  });

  it('answers pings and clears history', async () => {
    const handler = new ConversationHandler(new ScriptedGenerator(['Ok.']));
    const session = handler.createSession();
    await collect(session.handle(text('Remember this')));

    expect(await collect(session.handle({ type: 'ping' }))).toEqual([{ type: 'pong' }]);
    expect(await collect(session.handle({ type: 'clear', session_id: 's1' }))).toEqual([{ type: 'cleared' }]);
    expect(handler.getHistory('s1')).toEqual([]);
  });

  it('ignores messages after the connection closed', async () => {
    const session = new ConversationHandler(new ScriptedGenerator(['Ok.'])).createSession();
    session.destroy();
    expect(await collect(session.handle(text('Hi')))).toEqual([]);
  });
});
