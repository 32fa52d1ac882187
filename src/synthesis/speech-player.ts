/**
 * Speech Player
 * Queued synthesis and playback of assistant text, one utterance audible
 * at a time.
 */

import { SynthesisError, toError } from '../errors';
import type { AudioPlayable, Synthesizer } from '../types';
import { normalizeForSpeech } from './text-normalizer';

export interface SpeechPlayerCallbacks {
  onSpeakingStart?: () => void;
  /** Queue drained naturally; not called after stop() */
  onSpeakingEnd?: () => void;
  onError?: (error: SynthesisError) => void;
}

export interface SpeechPlayerConfig {
  /** Fragments are coalesced until a sentence boundary or this length */
  maxFragmentLength?: number;
  /** Rewrite numbers, symbols and abbreviations before synthesis (default: true) */
  normalizeText?: boolean;
}

const SENTENCE_BOUNDARY = /[.!?]["')\]]?\s*$/;

export class SpeechPlayer {
  private synthesizer: Synthesizer;
  private callbacks: SpeechPlayerCallbacks;
  private config: Required<SpeechPlayerConfig>;

  private queue: string[] = [];
  private fragments = '';
  private current: AudioPlayable | null = null;
  private playing = false;
  /** Bumped by stop(); a playback loop from an older generation exits quietly */
  private generation = 0;

  constructor(synthesizer: Synthesizer, callbacks: SpeechPlayerCallbacks = {}, config: SpeechPlayerConfig = {}) {
    this.synthesizer = synthesizer;
    this.callbacks = callbacks;
    this.config = {
      maxFragmentLength: 100,
      normalizeText: true,
      ...config,
    };
  }

  setCallbacks(callbacks: SpeechPlayerCallbacks): void {
    this.callbacks = callbacks;
  }

  /** Playing, synthesizing or holding queued text */
  get isSpeaking(): boolean {
    return this.playing || this.queue.length > 0;
  }

  /** Cancel anything in flight and speak this instead */
  speak(text: string): void {
    this.stop();
    this.enqueue(text);
  }

  /**
   * Queue a complete sentence behind whatever is playing.
   * Returns false when the text had nothing speakable.
   */
  speakSentence(text: string): boolean {
    return this.enqueue(text);
  }

  /**
   * Queue a fragment of streamed text. Fragments are held until they end a
   * sentence or grow past the length cap.
   */
  speakStreaming(fragment: string): void {
    this.fragments += fragment;
    if (SENTENCE_BOUNDARY.test(this.fragments) || this.fragments.length > this.config.maxFragmentLength) {
      this.flush();
    }
  }

  /** Speak held fragments now */
  flush(): void {
    const text = this.fragments;
    this.fragments = '';
    this.enqueue(text);
  }

  /**
   * Silence current and queued audio. Synchronous and safe to call at any
   * time, including when nothing is playing.
   */
  stop(): void {
    this.generation++;
    this.queue = [];
    this.fragments = '';
    this.playing = false;

    const current = this.current;
    this.current = null;
    current?.stop();
  }

  private enqueue(text: string): boolean {
    const prepared = (this.config.normalizeText ? normalizeForSpeech(text) : text).trim();
    if (!prepared) return false;

    this.queue.push(prepared);
    if (!this.playing) {
      this.playing = true;
      const generation = this.generation;
      this.playQueue(generation).catch((error) => this.fail(generation, error));
    }
    return true;
  }

  private async playQueue(generation: number): Promise<void> {
    let started = false;

    while (generation === this.generation) {
      const text = this.queue.shift();
      if (text === undefined) break;

      let playable: AudioPlayable;
      try {
        playable = await this.synthesizer.synthesize(text);
      } catch (error) {
        this.fail(generation, error);
        return;
      }

      // Stopped while synthesizing
      if (generation !== this.generation) return;

      if (!started) {
        started = true;
        this.callbacks.onSpeakingStart?.();
      }

      this.current = playable;
      await playable.play();
      if (generation !== this.generation) return;
      this.current = null;
    }

    if (generation !== this.generation) return;
    this.playing = false;
    if (started) {
      this.callbacks.onSpeakingEnd?.();
    }
  }

  private fail(generation: number, error: unknown): void {
    if (generation !== this.generation) return;
    this.queue = [];
    this.playing = false;
    this.current = null;

    const synthesisError =
      error instanceof SynthesisError
        ? error
        : new SynthesisError('engine', toError(error).message, { cause: error });
    this.callbacks.onError?.(synthesisError);
  }
}
