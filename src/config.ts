/**
 * Runtime configuration
 * Centralized defaults for all dialogue components
 */

import { homedir } from 'os';
import { join } from 'path';
import type { InputMode } from './types';

export interface RecognitionConfig {
  /** Language code passed to the recognition engine */
  language: string;
  /** Engine-specific model selector (null = engine default) */
  model: string | null;
}

export interface VadConfig {
  /** End of speech after this much silence */
  silenceTimeoutMs: number;
  /** Segments shorter than this never produce speechEnd */
  minSpeechMs: number;
  /** Fixed energy threshold, or 'calibrated' to use the calibrated one */
  threshold: number | 'calibrated';
  /** Length of the ambient noise sampling window */
  calibrationMs: number;
}

export interface SynthesisConfig {
  /** Voice identifier (null = engine default) */
  voice: string | null;
}

export interface DialogueConfig {
  serverUrl: string;
  sampleRate: number;
  inputMode: InputMode;
  recognition: RecognitionConfig;
  vad: VadConfig;
  synthesis: SynthesisConfig;
  heartbeatIntervalMs: number;
  maxReconnectAttempts: number;
  /** Reconnect attempt n waits n × this */
  reconnectBaseDelayMs: number;
  /** Pause before hands-free listening resumes after a turn */
  resumeDelayMs: number;
  /** Partial responses longer than this are kept when interrupted */
  minInterruptedResponseLength: number;
}

export type DialogueConfigInput = Partial<
  Omit<DialogueConfig, 'recognition' | 'vad' | 'synthesis'>
> & {
  recognition?: Partial<RecognitionConfig>;
  vad?: Partial<VadConfig>;
  synthesis?: Partial<SynthesisConfig>;
};

/** Default configuration */
export const defaultConfig: DialogueConfig = {
  serverUrl: 'ws://127.0.0.1:8000/api/ws/conversation',
  sampleRate: 16000,
  inputMode: 'handsFree',

  recognition: {
    language: 'en',
    model: null,
  },

  vad: {
    silenceTimeoutMs: 800,
    minSpeechMs: 200,
    threshold: 'calibrated',
    calibrationMs: 2000,
  },

  synthesis: {
    voice: null,
  },

  heartbeatIntervalMs: 30_000,
  maxReconnectAttempts: 5,
  reconnectBaseDelayMs: 500,
  resumeDelayMs: 200,
  minInterruptedResponseLength: 10,
};

export function resolveConfig(input: DialogueConfigInput = {}): DialogueConfig {
  const config: DialogueConfig = {
    ...defaultConfig,
    ...input,
    recognition: { ...defaultConfig.recognition, ...input.recognition },
    vad: { ...defaultConfig.vad, ...input.vad },
    synthesis: { ...defaultConfig.synthesis, ...input.synthesis },
  };
  validateConfig(config);
  return config;
}

function validateConfig(config: DialogueConfig): void {
  const positive: Array<[string, number]> = [
    ['sampleRate', config.sampleRate],
    ['vad.silenceTimeoutMs', config.vad.silenceTimeoutMs],
    ['vad.calibrationMs', config.vad.calibrationMs],
    ['heartbeatIntervalMs', config.heartbeatIntervalMs],
    ['reconnectBaseDelayMs', config.reconnectBaseDelayMs],
  ];
  for (const [key, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid config: ${key} must be a positive number (got ${value})`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['vad.minSpeechMs', config.vad.minSpeechMs],
    ['resumeDelayMs', config.resumeDelayMs],
    ['minInterruptedResponseLength', config.minInterruptedResponseLength],
  ];
  for (const [key, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid config: ${key} must not be negative (got ${value})`);
    }
  }

  if (!Number.isInteger(config.maxReconnectAttempts) || config.maxReconnectAttempts < 0) {
    throw new Error(
      `Invalid config: maxReconnectAttempts must be a non-negative integer (got ${config.maxReconnectAttempts})`
    );
  }

  const threshold = config.vad.threshold;
  if (threshold !== 'calibrated' && (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1)) {
    throw new Error(`Invalid config: vad.threshold must be in (0, 1] or 'calibrated' (got ${threshold})`);
  }

  if (config.inputMode !== 'handsFree' && config.inputMode !== 'pushToTalk') {
    throw new Error(`Invalid config: inputMode must be 'handsFree' or 'pushToTalk' (got ${config.inputMode})`);
  }

  if (!/^wss?:\/\//.test(config.serverUrl)) {
    throw new Error(`Invalid config: serverUrl must be a ws:// or wss:// URL (got ${config.serverUrl})`);
  }
}

// ============ Environment ============

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid environment: ${name} must be a number (got ${raw})`);
  }
  return value;
}

function readInputMode(env: NodeJS.ProcessEnv): InputMode | undefined {
  const raw = env.DIALOGUE_INPUT_MODE;
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'handsFree' || raw === 'pushToTalk') return raw;
  throw new Error(`Invalid environment: DIALOGUE_INPUT_MODE must be handsFree or pushToTalk (got ${raw})`);
}

/**
 * Build config overrides from DIALOGUE_* environment variables.
 * Unset variables leave the defaults in place.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DialogueConfigInput {
  const input: DialogueConfigInput = {};

  if (env.DIALOGUE_SERVER_URL) input.serverUrl = env.DIALOGUE_SERVER_URL;

  const inputMode = readInputMode(env);
  if (inputMode) input.inputMode = inputMode;

  if (env.DIALOGUE_LANGUAGE) input.recognition = { language: env.DIALOGUE_LANGUAGE };
  if (env.DIALOGUE_VOICE) input.synthesis = { voice: env.DIALOGUE_VOICE };

  const vad: Partial<VadConfig> = {};
  const threshold = env.DIALOGUE_VAD_THRESHOLD;
  if (threshold === 'calibrated') {
    vad.threshold = 'calibrated';
  } else {
    const value = readNumber(env, 'DIALOGUE_VAD_THRESHOLD');
    if (value !== undefined) vad.threshold = value;
  }
  const silence = readNumber(env, 'DIALOGUE_SILENCE_TIMEOUT_MS');
  if (silence !== undefined) vad.silenceTimeoutMs = silence;
  if (Object.keys(vad).length > 0) input.vad = vad;

  const heartbeat = readNumber(env, 'DIALOGUE_HEARTBEAT_MS');
  if (heartbeat !== undefined) input.heartbeatIntervalMs = heartbeat;

  const reconnects = readNumber(env, 'DIALOGUE_MAX_RECONNECTS');
  if (reconnects !== undefined) input.maxReconnectAttempts = reconnects;

  return input;
}

// ============ Cache Paths ============

/**
 * Cache directory for native engine binaries and models.
 * Default: ~/.cache/dialogue-runtime
 * Override with DIALOGUE_RUNTIME_CACHE environment variable.
 */
export function getCacheDir(): string {
  return process.env.DIALOGUE_RUNTIME_CACHE || join(homedir(), '.cache', 'dialogue-runtime');
}

export function getModelsDir(): string {
  return join(getCacheDir(), 'models');
}

export function getBinDir(): string {
  return join(getCacheDir(), 'bin');
}

/**
 * Default paths for the native engines.
 */
export const defaultPaths = {
  get whisper() {
    return {
      binaryPath: join(getBinDir(), 'whisper-cli'),
      modelPath: join(getModelsDir(), 'whisper-base.en-q8.bin'),
    };
  },
  get sherpaOnnxTts() {
    return {
      binaryPath: join(getBinDir(), 'sherpa-onnx-offline-tts'),
      modelDir: join(getModelsDir(), 'vits-piper-en_US-lessac-medium'),
    };
  },
};
