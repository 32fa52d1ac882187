/**
 * Cloud Text Generator (OpenAI-compatible API)
 * Works with: OpenAI, Ollama, vLLM, LMStudio, and any OpenAI-compatible endpoint
 *
 * Uses native fetch with streaming. Deltas are yielded as they arrive and
 * the request is aborted with the caller's signal.
 */

import type { ChatMessage, TextGenerator } from '../../server/handler';

export interface CloudTextGeneratorConfig {
  /** e.g. https://api.openai.com/v1 or http://localhost:11434/v1 */
  baseUrl: string;
  model: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the content delta out of one `data:` payload.
 * Returns null for malformed lines, which some providers send.
 */
export function parseStreamChunk(json: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.choices)) return null;

  const choice: unknown = parsed.choices[0];
  if (!isRecord(choice) || !isRecord(choice.delta)) return null;

  const content = choice.delta.content;
  return typeof content === 'string' && content ? content : null;
}

export class CloudTextGenerator implements TextGenerator {
  private config: Required<Omit<CloudTextGeneratorConfig, 'apiKey' | 'fetch'>> & { apiKey?: string };
  private fetchImpl: typeof fetch;

  constructor(config: CloudTextGeneratorConfig) {
    const { fetch: fetchImpl, ...rest } = config;
    this.config = {
      maxTokens: 256,
      temperature: 0.7,
      ...rest,
      baseUrl: rest.baseUrl.replace(/\/+$/, ''),
    };
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async *generate(history: ChatMessage[], signal: AbortSignal): AsyncGenerator<string> {
    const response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        ...this.getHeaders(),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: history.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        stream: true,
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Cloud LLM API error (${response.status}): ${errorText}`);
    }

    if (!response.body) {
      throw new Error('No response body received');
    }

    // Parse SSE stream
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          const trimmed = line.trim();
          if (!trimmed.startsWith('data: ') || trimmed === 'data: [DONE]') continue;

          const content = parseStreamChunk(trimmed.slice(6));
          if (content) yield content;
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    return headers;
  }
}
