/**
 * Dialogue Runtime Library
 * Spoken dialogue over a duplex connection: endpointing, recognition,
 * streamed replies, sentence-level synthesis and barge-in
 */

// Main orchestrator
export { DialogueSession } from './dialogue/dialogue-session';
export type {
  DialogueSessionOptions,
  DialogueSessionEventMap,
  DialogueSessionEventName,
  DialogueSessionListener,
  StateChange,
} from './dialogue/dialogue-session';

// State machine
export { transition, replay } from './dialogue/transitions';
export { createDialogueContext, emptyTurn, emptyUtterance } from './dialogue/events';
export type { DialogueContext, DialogueEffect, DialogueEvent, MessageDraft, TransitionResult, TurnState } from './dialogue/events';

// Types
export * from './types';

// Errors
export * from './errors';

// Configuration
export {
  defaultConfig,
  resolveConfig,
  configFromEnv,
  getCacheDir,
  getModelsDir,
  getBinDir,
  defaultPaths,
} from './config';
export type { DialogueConfig, DialogueConfigInput, RecognitionConfig, SynthesisConfig, VadConfig } from './config';

// Audio
export { VoiceActivityDetector, thresholdFromNoise, DEFAULT_THRESHOLD } from './audio/vad';
export type { VadOptions, VadCallbacks, CalibrationOptions } from './audio/vad';
export { LevelMeter, computeRms } from './audio/level-meter';

// Recognition
export { RecognizerClient } from './recognizer/recognizer-client';

// Synthesis
export { SpeechPlayer } from './synthesis/speech-player';
export { normalizeForSpeech } from './synthesis/text-normalizer';

// Transport
export { TransportClient, wsSocketFactory } from './client/transport-client';
export type {
  ConnectionState,
  SocketFactory,
  SocketHandlers,
  TransportClientCallbacks,
  TransportClientConfig,
  TransportSocket,
} from './client/transport-client';
export * from './client/protocol';

// Services
export { DialogueLogger, getDefaultLogger, createSilentLogger } from './services/dialogue-logger';
export type { DialogueLogEvent, LogSink } from './services/dialogue-logger';

// Backends
export * from './backends/native';
export * from './backends/cloud';

// Reference server
export * from './server';
