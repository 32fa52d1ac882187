/**
 * Dialogue Session
 *
 * Owns one conversation: the single ConversationState, the message
 * history, and the components that feed them. Every producer callback is
 * turned into a DialogueEvent and pushed through one FIFO queue; the pure
 * transition function decides, this class carries out the effects.
 *
 * Lifecycle belongs to the caller:
 *   const session = new DialogueSession({ audioSource, recognizer, synthesizer });
 *   session.on('message', (m) => console.log(m.role, m.content));
 *   await session.start();
 *   ...
 *   await session.stop();
 */

import { resolveConfig, type DialogueConfig, type DialogueConfigInput } from '../config';
import { toError, type ProtocolOrderingError } from '../errors';
import { VoiceActivityDetector, type CalibrationOptions } from '../audio/vad';
import { RecognizerClient } from '../recognizer/recognizer-client';
import { SpeechPlayer } from '../synthesis/speech-player';
import { TransportClient } from '../client/transport-client';
import type { ServerMessage } from '../client/protocol';
import { getDefaultLogger, type DialogueLogger } from '../services/dialogue-logger';
import type {
  AudioLevel,
  AudioSource,
  ConversationState,
  InputMode,
  Message,
  Recognizer,
  Synthesizer,
  Utterance,
} from '../types';
import { createDialogueContext, type DialogueContext, type DialogueEffect, type DialogueEvent } from './events';
import { transition } from './transitions';

// ============ Types ============

export interface DialogueSessionOptions {
  audioSource: AudioSource;
  recognizer: Recognizer;
  synthesizer: Synthesizer;
  config?: DialogueConfigInput;
  /** Defaults to a ws client for config.serverUrl */
  transport?: TransportClient;
  logger?: DialogueLogger;
  /** Message timestamps (default: Date.now) */
  clock?: () => number;
}

export interface StateChange {
  state: ConversationState;
  previous: ConversationState;
}

export interface DialogueSessionEventMap {
  state: StateChange;
  message: Message;
  utterance: Utterance;
  /** Assistant text received so far for the current turn */
  response: string;
  audioLevel: AudioLevel;
  protocolViolation: ProtocolOrderingError;
  error: Error;
  /** New session id after clear() */
  cleared: string;
}

export type DialogueSessionEventName = keyof DialogueSessionEventMap;

export type DialogueSessionListener<K extends DialogueSessionEventName> = (payload: DialogueSessionEventMap[K]) => void;

type ListenerSets = { [K in DialogueSessionEventName]: Set<DialogueSessionListener<K>> };

function eventError(event: DialogueEvent, reason: string): Error {
  switch (event.type) {
    case 'captureFailed':
    case 'recognitionError':
    case 'synthesisError':
    case 'connectionLost':
    case 'sendFailed':
    case 'restartFailed':
      return event.error;
    default:
      return new Error(reason);
  }
}

// ============ Session ============

export class DialogueSession {
  readonly config: DialogueConfig;

  private audioSource: AudioSource;
  private synthesizer: Synthesizer;
  private vad: VoiceActivityDetector;
  private recognizer: RecognizerClient;
  private player: SpeechPlayer;
  private transport: TransportClient;
  private logger: DialogueLogger;
  private clock: () => number;

  private context: DialogueContext;
  private messages: Message[] = [];
  private audioLevel: AudioLevel = 0;
  private running = false;

  private eventQueue: DialogueEvent[] = [];
  private draining = false;
  private resumeTimer: ReturnType<typeof setTimeout> | null = null;

  private listeners: ListenerSets = {
    state: new Set(),
    message: new Set(),
    utterance: new Set(),
    response: new Set(),
    audioLevel: new Set(),
    protocolViolation: new Set(),
    error: new Set(),
    cleared: new Set(),
  };

  constructor(options: DialogueSessionOptions) {
    this.config = resolveConfig(options.config);
    this.audioSource = options.audioSource;
    this.synthesizer = options.synthesizer;
    this.logger = options.logger ?? getDefaultLogger();
    this.clock = options.clock ?? Date.now;

    this.context = createDialogueContext({
      inputMode: this.config.inputMode,
      minInterruptedResponseLength: this.config.minInterruptedResponseLength,
    });

    this.vad = new VoiceActivityDetector(
      {
        sampleRate: this.audioSource.sampleRate,
        silenceTimeoutMs: this.config.vad.silenceTimeoutMs,
        minSpeechMs: this.config.vad.minSpeechMs,
        threshold: this.config.vad.threshold,
        calibrationMs: this.config.vad.calibrationMs,
      },
      {
        onSpeechStart: () => this.dispatch({ type: 'speechStart' }),
        onSpeechEnd: () => this.dispatch({ type: 'speechEnd' }),
        onSpeechCancelled: () => this.dispatch({ type: 'speechCancelled' }),
        onLevel: (level) => {
          this.audioLevel = level;
          this.emit('audioLevel', level);
        },
      }
    );

    this.recognizer = new RecognizerClient(options.recognizer, {
      onPartial: (text) => this.dispatch({ type: 'transcriptPartial', text }),
      onFinal: (text) => this.dispatch({ type: 'transcriptFinal', text }),
      onError: (error) => this.dispatch({ type: 'recognitionError', error }),
    });

    this.player = new SpeechPlayer(this.synthesizer, {
      onSpeakingStart: () => this.dispatch({ type: 'playbackStarted' }),
      onSpeakingEnd: () => this.dispatch({ type: 'playbackFinished' }),
      onError: (error) => this.dispatch({ type: 'synthesisError', error }),
    });

    this.transport =
      options.transport ??
      new TransportClient({
        url: this.config.serverUrl,
        heartbeatIntervalMs: this.config.heartbeatIntervalMs,
        maxReconnectAttempts: this.config.maxReconnectAttempts,
        reconnectBaseDelayMs: this.config.reconnectBaseDelayMs,
        logger: this.logger,
      });
    this.transport.setCallbacks({
      onMessage: (message) => this.handleServerMessage(message),
      onConnectionLost: (error) => this.dispatch({ type: 'connectionLost', error }),
      onReconnected: () => this.dispatch({ type: 'connectionRestored' }),
    });
  }

  // ============ Lifecycle ============

  /**
   * Initialize engines, connect, and open the microphone.
   * Rejects if an engine cannot start or the server stays unreachable.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    try {
      await this.recognizer.initialize();
      await this.synthesizer.initialize?.();
      if (this.config.synthesis.voice) {
        await this.synthesizer.setVoice?.(this.config.synthesis.voice);
      }
      await this.transport.connect();
      await this.openMicrophone();
    } catch (error) {
      this.running = false;
      this.transport.disconnect();
      throw toError(error);
    }

    this.logger.log({ type: 'info', message: `Session ready (${this.context.inputMode})` });
  }

  /** Release the microphone, silence playback and close the connection */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.clearResumeTimer();
    this.player.stop();
    this.recognizer.cancelRecognition();
    this.vad.cancelCalibration();
    this.vad.setPlaybackActive(false);
    this.transport.disconnect();
    await this.audioSource.stop();

    const previous = this.context;
    this.context = createDialogueContext({
      inputMode: previous.inputMode,
      minInterruptedResponseLength: this.config.minInterruptedResponseLength,
    });
    this.announceChanges(previous, 'stop');
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ============ Controls ============

  pressToTalk(): void {
    this.dispatch({ type: 'pttPress' });
  }

  releaseToTalk(): void {
    this.dispatch({ type: 'pttRelease' });
  }

  /** Stop the assistant mid-answer; not an error */
  interrupt(): void {
    this.dispatch({ type: 'interrupt' });
  }

  /** Leave the error state */
  restart(): void {
    this.dispatch({ type: 'restart' });
  }

  /** Empty the history and start a new server session. Never throws. */
  clear(): void {
    this.dispatch({ type: 'clear' });
  }

  setInputMode(mode: InputMode): void {
    this.dispatch({ type: 'setInputMode', mode });
  }

  /**
   * Sample ambient noise to set the speech threshold.
   * The session must be started so the microphone is open.
   */
  calibrate(options: Omit<CalibrationOptions, 'durationMs'> = {}): Promise<number> {
    if (!this.running) {
      return Promise.reject(new Error('Cannot calibrate: session is not started'));
    }
    return this.vad.calibrate({ ...options, durationMs: this.config.vad.calibrationMs });
  }

  cancelCalibration(): void {
    this.vad.cancelCalibration();
  }

  // ============ Queries ============

  getState(): ConversationState {
    return this.context.state;
  }

  getMessages(): Message[] {
    return [...this.messages];
  }

  getUtterance(): Utterance {
    return this.context.utterance;
  }

  getResponse(): string {
    return this.context.turn.response;
  }

  /** Display only; never drives a transition */
  getAudioLevel(): AudioLevel {
    return this.audioLevel;
  }

  getSessionId(): string {
    return this.transport.sessionId;
  }

  getInputMode(): InputMode {
    return this.context.inputMode;
  }

  // ============ Events ============

  on<K extends DialogueSessionEventName>(event: K, listener: DialogueSessionListener<K>): void {
    this.listeners[event].add(listener);
  }

  off<K extends DialogueSessionEventName>(event: K, listener: DialogueSessionListener<K>): void {
    this.listeners[event].delete(listener);
  }

  private emit<K extends DialogueSessionEventName>(event: K, payload: DialogueSessionEventMap[K]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.log({ type: 'error', message: `Error in ${event} listener: ${toError(error).message}` });
      }
    }
  }

  // ============ Event Queue ============

  private dispatch(event: DialogueEvent): void {
    this.eventQueue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.eventQueue.shift();
      while (next) {
        this.apply(next);
        next = this.eventQueue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private apply(event: DialogueEvent): void {
    const previous = this.context;
    const { context, effects } = transition(previous, event);
    this.context = context;

    this.announceChanges(previous, event.type);

    if (context.state.status === 'error' && previous.state.status !== 'error') {
      const error = eventError(event, context.state.reason);
      this.logger.log({ type: 'error', message: error.message });
      this.emit('error', error);
    }

    for (const effect of effects) {
      this.execute(effect);
    }
  }

  private announceChanges(previous: DialogueContext, trigger: string): void {
    const context = this.context;

    if (previous.state.status !== context.state.status) {
      this.logger.log({ type: 'state', from: previous.state.status, to: context.state.status, trigger });
      this.emit('state', { state: context.state, previous: previous.state });
    }

    if (previous.utterance !== context.utterance) {
      if (!context.utterance.isFinal && context.utterance.partialText) {
        this.logger.log({ type: 'partial', content: context.utterance.partialText });
      }
      this.emit('utterance', context.utterance);
    }

    if (previous.turn.response !== context.turn.response) {
      this.emit('response', context.turn.response);
    }
  }

  // ============ Effects ============

  private execute(effect: DialogueEffect): void {
    switch (effect.type) {
      case 'startRecognition':
        this.recognizer
          .startRecognition()
          .catch((error) => this.dispatch({ type: 'recognitionError', error: toError(error) }));
        break;

      case 'finishRecognition':
        this.recognizer
          .stopRecognition()
          .catch((error) => this.dispatch({ type: 'recognitionError', error: toError(error) }));
        break;

      case 'cancelRecognition':
        this.recognizer.cancelRecognition();
        break;

      case 'sendText':
        this.transport
          .sendText(effect.text)
          .catch((error) => this.dispatch({ type: 'sendFailed', error: toError(error) }));
        break;

      case 'sendInterrupt':
        this.transport.interrupt();
        break;

      case 'enqueueSentence':
        // Nothing speakable: report the (empty) playback as finished
        if (!this.player.speakSentence(effect.text) && !this.player.isSpeaking) {
          this.dispatch({ type: 'playbackFinished' });
        }
        break;

      case 'stopPlayback':
        this.player.stop();
        break;

      case 'releaseMicrophone':
        this.audioSource
          .stop()
          .catch((error) => this.logger.log({ type: 'warning', message: `Microphone stop failed: ${toError(error).message}` }));
        break;

      case 'setPlaybackGuard':
        this.vad.setPlaybackActive(effect.active);
        break;

      case 'scheduleResume':
        this.clearResumeTimer();
        this.resumeTimer = setTimeout(() => {
          this.resumeTimer = null;
          this.dispatch({ type: 'resumeListening' });
        }, this.config.resumeDelayMs);
        break;

      case 'armDetector':
        this.vad.reset();
        break;

      case 'appendMessage': {
        const message: Message = { ...effect.message, timestamp: this.clock() };
        this.messages.push(message);
        if (message.role === 'user') {
          this.logger.log({ type: 'user', content: message.content });
        } else {
          this.logger.log({ type: 'assistant', content: message.content, interrupted: message.interrupted });
        }
        this.emit('message', message);
        break;
      }

      case 'clearSession': {
        this.messages = [];
        this.transport.clear();
        this.logger.log({ type: 'info', message: 'History cleared' });
        this.emit('cleared', this.transport.sessionId);
        break;
      }

      case 'reinitialize':
        this.reinitialize().catch((error) => this.dispatch({ type: 'restartFailed', error: toError(error) }));
        break;

      case 'reportProtocolViolation':
        this.logger.log({ type: 'protocol_violation', message: effect.error.message });
        this.emit('protocolViolation', effect.error);
        break;
    }
  }

  private async reinitialize(): Promise<void> {
    this.player.stop();
    this.recognizer.cancelRecognition();
    this.vad.reset();
    if (!this.running) return;

    await this.transport.connect();
    if (!this.audioSource.capturing) {
      await this.openMicrophone();
    }
  }

  // ============ Producers ============

  private async openMicrophone(): Promise<void> {
    await this.audioSource.start(
      (chunk) => this.handleAudio(chunk),
      (error) => this.dispatch({ type: 'captureFailed', error })
    );
  }

  private handleAudio(chunk: Float32Array): void {
    // Level and endpointing always run; barge-in depends on it
    this.vad.process(chunk);

    const status = this.context.state.status;
    if (status === 'listening' || status === 'interrupted') {
      this.recognizer.appendAudioBuffer(chunk);
    }
  }

  private handleServerMessage(message: ServerMessage): void {
    switch (message.type) {
      case 'text_start':
        this.dispatch({ type: 'textStart' });
        break;
      case 'text_delta':
        this.dispatch({ type: 'textDelta', content: message.content });
        break;
      case 'sentence_end':
        this.dispatch({ type: 'sentenceEnd', sentence: message.sentence });
        break;
      case 'text_done':
        this.dispatch({ type: 'textDone', fullText: message.full_text });
        break;
      case 'interrupted':
        this.dispatch({ type: 'remoteInterrupted' });
        break;
      case 'error':
        if (message.recoverable) {
          this.logger.log({ type: 'warning', message: `Server: ${message.message}` });
        }
        this.dispatch({ type: 'remoteError', message: message.message });
        break;
      case 'pong':
        break;
      case 'cleared':
        this.logger.log({ type: 'transport', message: 'server history cleared' });
        break;
    }
  }

  private clearResumeTimer(): void {
    if (this.resumeTimer) {
      clearTimeout(this.resumeTimer);
      this.resumeTimer = null;
    }
  }
}
