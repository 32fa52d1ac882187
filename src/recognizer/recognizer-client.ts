/**
 * Recognizer Client
 *
 * Wraps a Recognizer engine with one rule: every started recognition ends
 * in exactly one final transcript or one error, and nothing arrives for a
 * recognition after it has ended or been cancelled.
 */

import { RecognitionError, toError } from '../errors';
import type { Recognizer } from '../types';

export interface RecognizerClientCallbacks {
  onPartial?: (text: string) => void;
  onFinal?: (text: string) => void;
  onError?: (error: RecognitionError) => void;
}

export class RecognizerClient {
  private engine: Recognizer;
  private callbacks: RecognizerClientCallbacks;

  /** Bumped per recognition; results tagged with an older value are stale */
  private generation = 0;
  private active = false;
  private stopping = false;

  constructor(engine: Recognizer, callbacks: RecognizerClientCallbacks = {}) {
    this.engine = engine;
    this.callbacks = callbacks;
  }

  setCallbacks(callbacks: RecognizerClientCallbacks): void {
    this.callbacks = callbacks;
  }

  get isActive(): boolean {
    return this.active;
  }

  async initialize(): Promise<void> {
    try {
      await this.engine.initialize?.();
    } catch (error) {
      throw this.asRecognitionError(error);
    }
  }

  async startRecognition(): Promise<void> {
    if (this.active) {
      this.cancelRecognition();
    }

    const generation = ++this.generation;
    this.active = true;
    this.stopping = false;

    try {
      await this.engine.start({
        onPartial: (text) => {
          if (generation === this.generation && this.active) {
            this.callbacks.onPartial?.(text);
          }
        },
        onFinal: (text) => this.deliverFinal(generation, text),
        onError: (error) => this.deliverError(generation, error),
      });
    } catch (error) {
      this.deliverError(generation, error);
    }
  }

  /** Audio outside an active recognition is dropped */
  appendAudioBuffer(buffer: Float32Array): void {
    if (!this.active || this.stopping) return;
    this.engine.append(buffer);
  }

  /** Ask the engine for the final transcript of the current recognition */
  async stopRecognition(): Promise<void> {
    if (!this.active || this.stopping) return;

    const generation = this.generation;
    this.stopping = true;

    try {
      const text = await this.engine.stop();
      this.deliverFinal(generation, text);
    } catch (error) {
      this.deliverError(generation, error);
    }
  }

  /** Abandon the current recognition without a final result */
  cancelRecognition(): void {
    if (!this.active) return;
    this.active = false;
    this.stopping = false;
    this.generation++;
    this.engine.cancel();
  }

  private deliverFinal(generation: number, text: string): void {
    if (generation !== this.generation || !this.active) return;
    this.active = false;
    this.stopping = false;
    this.callbacks.onFinal?.(text.trim());
  }

  private deliverError(generation: number, error: unknown): void {
    if (generation !== this.generation || !this.active) return;

    const recognitionError = this.asRecognitionError(error);
    if (recognitionError.isCancellation()) {
      // A cancelled engine during a requested stop counts as silence
      if (this.stopping) {
        this.deliverFinal(generation, '');
      }
      return;
    }

    this.active = false;
    this.stopping = false;
    this.callbacks.onError?.(recognitionError);
  }

  private asRecognitionError(error: unknown): RecognitionError {
    if (error instanceof RecognitionError) return error;
    const cause = toError(error);
    return new RecognitionError('engine', cause.message, { cause });
  }
}
