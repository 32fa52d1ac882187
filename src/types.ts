/**
 * Dialogue Runtime - Type Definitions
 */

// ============ Conversation Types ============

export type ConversationStatus =
  | 'idle'
  | 'listening'
  | 'processing'
  | 'speaking'
  | 'interrupted'
  | 'error';

/**
 * Authoritative conversation state. Exactly one copy exists per session and
 * only the dialogue session mutates it.
 */
export type ConversationState =
  | { status: 'idle' }
  | { status: 'listening' }
  | { status: 'processing' }
  | { status: 'speaking' }
  /** Listening again after the user cut the assistant off */
  | { status: 'interrupted' }
  | { status: 'error'; reason: string };

/** Who triggers the idle → listening edge */
export type InputMode = 'handsFree' | 'pushToTalk';

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
  timestamp: number;
  /** Set on assistant messages that were cut off by barge-in */
  interrupted?: boolean;
}

export interface Utterance {
  partialText: string;
  finalText: string;
  isFinal: boolean;
}

/** Normalized input level in [0, 1]. Display only. */
export type AudioLevel = number;

// ============ Capability Interfaces ============

export type AudioChunkCallback = (chunk: Float32Array) => void;

/**
 * Continuous microphone capture.
 */
export interface AudioSource {
  readonly sampleRate: number;
  start(onChunk: AudioChunkCallback, onError?: (error: Error) => void): Promise<void>;
  stop(): Promise<void>;
  readonly capturing: boolean;
}

export interface RecognizerCallbacks {
  onPartial: (text: string) => void;
  /** End of utterance detected by the engine itself */
  onFinal: (text: string) => void;
  onError: (error: Error) => void;
}

/**
 * Speech recognition engine. One recognition runs between start() and
 * stop()/cancel().
 */
export interface Recognizer {
  initialize?(): Promise<void>;
  start(callbacks: RecognizerCallbacks): Promise<void>;
  append(audio: Float32Array): void;
  /** Finish the recognition and resolve with the final transcript */
  stop(): Promise<string>;
  /** Abandon the recognition; no final result is produced */
  cancel(): void;
}

/**
 * AudioPlayable - uniform handle on synthesized speech
 */
export interface AudioPlayable {
  /** Resolves when playback ends, naturally or through stop() */
  play(): Promise<void>;
  stop(): void;
}

export interface Synthesizer {
  initialize?(): Promise<void>;
  synthesize(text: string): Promise<AudioPlayable>;
  /** Switch voice; rejects with a SynthesisError if the voice is unknown */
  setVoice?(voice: string): Promise<void>;
}

// ============ Progress Types ============

/** Calibration progress in [0, 1] */
export type ProgressCallback = (progress: number) => void;
