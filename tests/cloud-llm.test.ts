import { describe, it, expect, vi } from 'vitest';
import { CloudTextGenerator, parseStreamChunk } from '../src/backends/cloud/llm';

function sseResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

async function drain(stream: AsyncIterable<string>): Promise<string[]> {
  const deltas: string[] = [];
  for await (const delta of stream) deltas.push(delta);
  return deltas;
}

describe('parseStreamChunk', () => {
  it('reads the content delta', () => {
    expect(parseStreamChunk('{"choices":[{"delta":{"content":"Hi"}}]}')).toBe('Hi');
  });

  it('returns null for anything without content', () => {
    expect(parseStreamChunk('{"choices":[{"delta":{"role":"assistant"}}]}')).toBeNull();
    expect(parseStreamChunk('{"choices":[]}')).toBeNull();
    expect(parseStreamChunk('{not json')).toBeNull();
  });
});

describe('CloudTextGenerator', () => {
  it('streams deltas split across network chunks', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      sseResponse([
        'data: {"choices":[{"delta":{"content":"Hel"}}]}\n\ndata: {"choi',
        'ces":[{"delta":{"content":"lo."}}]}\n\n',
        ': keep-alive\n\ndata: [DONE]\n\n',
      ])
    );
    const generator = new CloudTextGenerator({
      baseUrl: 'http://llm.test/v1/',
      model: 'test-model',
      apiKey: 'test-secret',
      fetch: fetchMock,
    });

    const deltas = await drain(generator.generate([{ role: 'user', content: 'Hi' }], new AbortController().signal));
    expect(deltas).toEqual(['Hel', 'lo.']);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'Hi' }],
      max_tokens: 256,
      temperature: 0.7,
      stream: true,
    });
  });

  it('passes the abort signal to the request', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => sseResponse(['data: [DONE]\n\n']));
    const generator = new CloudTextGenerator({ baseUrl: 'http://llm.test/v1', model: 'test-model', fetch: fetchMock });
    const controller = new AbortController();

    await drain(generator.generate([], controller.signal));
    expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('fails on an error status', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('overloaded', { status: 503 }));
    const generator = new CloudTextGenerator({ baseUrl: 'http://llm.test/v1', model: 'test-model', fetch: fetchMock });

    await expect(drain(generator.generate([], new AbortController().signal))).rejects.toThrow(
      'Cloud LLM API error (503): overloaded'
    );
  });
});
