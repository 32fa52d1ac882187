/**
 * In-process stand-ins for the microphone, the engines and the socket
 */

import type { ClientMessage, ServerMessage } from '../../src/client/protocol';
import type { SocketFactory, SocketHandlers, TransportSocket } from '../../src/client/transport-client';
import type {
  AudioChunkCallback,
  AudioPlayable,
  AudioSource,
  Recognizer,
  RecognizerCallbacks,
  Synthesizer,
} from '../../src/types';

// ============ Audio ============

export const SAMPLE_RATE = 16000;
/** 50ms at 16kHz */
export const CHUNK_SAMPLES = 800;

export function tone(amplitude: number, samples = CHUNK_SAMPLES): Float32Array {
  return new Float32Array(samples).fill(amplitude);
}

export function silence(samples = CHUNK_SAMPLES): Float32Array {
  return new Float32Array(samples);
}

/** Shared view of what is audible and what is being captured */
export class AudioMonitor {
  playing = 0;
  recognizing = false;
  /** Moments where recognition capture and playback were both live */
  overlaps: string[] = [];

  check(where: string): void {
    if (this.playing > 0 && this.recognizing) {
      this.overlaps.push(where);
    }
  }
}

export class FakeAudioSource implements AudioSource {
  readonly sampleRate = SAMPLE_RATE;
  starts = 0;
  stops = 0;
  private onChunk: AudioChunkCallback | null = null;
  private onError: ((error: Error) => void) | null = null;

  get capturing(): boolean {
    return this.onChunk !== null;
  }

  async start(onChunk: AudioChunkCallback, onError?: (error: Error) => void): Promise<void> {
    this.starts++;
    this.onChunk = onChunk;
    this.onError = onError ?? null;
  }

  async stop(): Promise<void> {
    this.stops++;
    this.onChunk = null;
  }

  emit(chunk: Float32Array): void {
    this.onChunk?.(chunk);
  }

  emitMany(chunk: Float32Array, count: number): void {
    for (let i = 0; i < count; i++) this.emit(chunk);
  }

  fail(error: Error): void {
    this.onError?.(error);
  }
}

// ============ Recognizer ============

export class FakeRecognizer implements Recognizer {
  transcripts: string[] = [];
  appended = 0;
  starts = 0;
  cancels = 0;
  callbacks: RecognizerCallbacks | null = null;
  stopError: Error | null = null;
  initialize?: () => Promise<void>;

  constructor(private monitor?: AudioMonitor) {}

  async start(callbacks: RecognizerCallbacks): Promise<void> {
    this.starts++;
    this.callbacks = callbacks;
    if (this.monitor) {
      this.monitor.recognizing = true;
      this.monitor.check('recognition started');
    }
  }

  append(_audio: Float32Array): void {
    this.appended++;
    this.monitor?.check('audio appended');
  }

  async stop(): Promise<string> {
    if (this.monitor) this.monitor.recognizing = false;
    if (this.stopError) throw this.stopError;
    return this.transcripts.shift() ?? '';
  }

  cancel(): void {
    this.cancels++;
    if (this.monitor) this.monitor.recognizing = false;
  }
}

// ============ Synthesizer ============

export class FakePlayable implements AudioPlayable {
  started = false;
  stopped = false;
  finished = false;
  private resolve: (() => void) | null = null;

  constructor(
    readonly text: string,
    private monitor?: AudioMonitor
  ) {}

  play(): Promise<void> {
    this.started = true;
    if (this.monitor) {
      this.monitor.playing++;
      this.monitor.check(`playing "${this.text}"`);
    }
    return new Promise<void>((resolve) => {
      this.resolve = resolve;
    });
  }

  /** Playback reaches its natural end */
  finish(): void {
    this.end();
    this.finished = true;
  }

  stop(): void {
    this.stopped = true;
    this.end();
  }

  private end(): void {
    const resolve = this.resolve;
    if (!resolve) return;
    this.resolve = null;
    if (this.monitor) this.monitor.playing--;
    resolve();
  }
}

export class FakeSynthesizer implements Synthesizer {
  texts: string[] = [];
  playables: FakePlayable[] = [];
  failWith: Error | null = null;
  voices: string[] = [];

  constructor(private monitor?: AudioMonitor) {}

  async synthesize(text: string): Promise<AudioPlayable> {
    if (this.failWith) throw this.failWith;
    this.texts.push(text);
    const playable = new FakePlayable(text, this.monitor);
    this.playables.push(playable);
    return playable;
  }

  async setVoice(voice: string): Promise<void> {
    this.voices.push(voice);
  }

  /** The playable currently started and not yet ended */
  get current(): FakePlayable | undefined {
    return this.playables.find((p) => p.started && !p.stopped && !p.finished);
  }
}

// ============ Socket ============

export class FakeSocket implements TransportSocket {
  sent: ClientMessage[] = [];
  closed = false;
  terminated = false;

  constructor(
    readonly url: string,
    readonly handlers: SocketHandlers
  ) {}

  send(data: string): void {
    if (this.closed || this.terminated) throw new Error('socket is closed');
    const parsed: ClientMessage = JSON.parse(data);
    this.sent.push(parsed);
  }

  close(): void {
    this.closed = true;
  }

  terminate(): void {
    this.terminated = true;
  }
}

/**
 * Plays the server side: every socket the transport opens lands here.
 * With autoOpen, a new socket connects on the next microtask.
 */
export class FakeServer {
  sockets: FakeSocket[] = [];

  constructor(private autoOpen = true) {}

  readonly factory: SocketFactory = (url, handlers) => {
    const socket = new FakeSocket(url, handlers);
    this.sockets.push(socket);
    if (this.autoOpen) {
      queueMicrotask(() => handlers.onOpen());
    }
    return socket;
  };

  get latest(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  }

  /** Every message the client sent, across reconnects */
  get received(): ClientMessage[] {
    return this.sockets.flatMap((socket) => socket.sent);
  }

  open(): void {
    this.latest.handlers.onOpen();
  }

  /** Remote side drops the connection */
  drop(): void {
    this.latest.handlers.onClose();
  }

  send(message: ServerMessage): void {
    this.latest.handlers.onMessage(JSON.stringify(message));
  }

  sendRaw(data: string): void {
    this.latest.handlers.onMessage(data);
  }
}

/** Predictable session ids: session-1, session-2, ... */
export function sequentialIds(prefix = 'session'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/** Let pending promise callbacks and zero-delay timers run */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
