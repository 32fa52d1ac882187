/**
 * Voice Activity Detector / Endpointer
 *
 * Consumes capture buffers and decides where speech starts and ends.
 * Durations come from buffer lengths, so the same audio always yields the
 * same events. The detector only emits events; it never touches the
 * microphone.
 */

import { computeRms, LevelMeter } from './level-meter';
import type { AudioLevel, ProgressCallback } from '../types';

/** Used until a calibration has completed */
export const DEFAULT_THRESHOLD = 0.02;

const ABSOLUTE_MIN_THRESHOLD = 0.008;
const ABSOLUTE_MAX_THRESHOLD = 0.15;
const SPEECH_MULTIPLIER = 1.8;
const CONTINUE_MULTIPLIER = 1.3;
const INTERRUPTION_MULTIPLIER = 2.0;

export interface VadOptions {
  sampleRate: number;
  /** Silence that ends an utterance (default: 800) */
  silenceTimeoutMs?: number;
  /** Voiced time an utterance needs before it can end (default: 200) */
  minSpeechMs?: number;
  /** Fixed threshold, or 'calibrated' (default) */
  threshold?: number | 'calibrated';
  /** Calibration window when calibrate() gets no duration (default: 2000) */
  calibrationMs?: number;
  /** Consecutive loud buffers needed to start speech (default: 2) */
  minSpeechFrames?: number;
  /** Hard cap on one utterance (default: 30000) */
  maxSpeechMs?: number;
  /** Buffers averaged for the smoothed level (default: 8) */
  smoothingWindow?: number;
  /** Minimum gap between two barge-in triggers (default: 300) */
  interruptionCooldownMs?: number;
}

export interface VadCallbacks {
  onSpeechStart?: () => void;
  /** Utterance ended after the silence timeout */
  onSpeechEnd?: (speechMs: number) => void;
  /** Segment too short to count; started speech is withdrawn */
  onSpeechCancelled?: () => void;
  onLevel?: (level: AudioLevel) => void;
}

export interface CalibrationOptions {
  durationMs?: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

interface Calibration {
  durationMs: number;
  elapsedMs: number;
  samples: number[];
  onProgress?: ProgressCallback;
  resolve: (threshold: number) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

function abortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * Derive a speech threshold from ambient noise samples:
 * 25th percentile as noise floor, scaled and clamped.
 */
export function thresholdFromNoise(samples: number[]): number {
  if (samples.length === 0) return DEFAULT_THRESHOLD;
  const sorted = [...samples].sort((a, b) => a - b);
  const floor = sorted[Math.min(Math.floor(sorted.length / 4), sorted.length - 1)];
  const noiseFloor = Math.max(ABSOLUTE_MIN_THRESHOLD / SPEECH_MULTIPLIER, floor);
  return Math.min(ABSOLUTE_MAX_THRESHOLD, Math.max(ABSOLUTE_MIN_THRESHOLD, noiseFloor * SPEECH_MULTIPLIER));
}

export class VoiceActivityDetector {
  private readonly options: Required<VadOptions>;
  private callbacks: VadCallbacks;
  private meter: LevelMeter;

  private calibratedThreshold: number | null = null;
  private calibration: Calibration | null = null;

  private inSpeech = false;
  private consecutiveSpeechFrames = 0;
  private voicedMs = 0;
  private segmentMs = 0;
  private silenceMs = 0;
  private playbackActive = false;
  private cooldownMs = 0;

  constructor(options: VadOptions, callbacks: VadCallbacks = {}) {
    this.options = {
      silenceTimeoutMs: 800,
      minSpeechMs: 200,
      threshold: 'calibrated',
      calibrationMs: 2000,
      minSpeechFrames: 2,
      maxSpeechMs: 30_000,
      smoothingWindow: 8,
      interruptionCooldownMs: 300,
      ...options,
    };
    this.callbacks = callbacks;
    this.meter = new LevelMeter(this.options.smoothingWindow);
  }

  /** Replace the event callbacks */
  setCallbacks(callbacks: VadCallbacks): void {
    this.callbacks = callbacks;
  }

  /** Threshold currently used to start speech */
  get threshold(): number {
    if (typeof this.options.threshold === 'number') return this.options.threshold;
    return this.calibratedThreshold ?? DEFAULT_THRESHOLD;
  }

  get isCalibrated(): boolean {
    return this.calibratedThreshold !== null;
  }

  get isCalibrating(): boolean {
    return this.calibration !== null;
  }

  get speechDetected(): boolean {
    return this.inSpeech;
  }

  get level(): AudioLevel {
    return this.meter.level;
  }

  /**
   * While synthesized speech is audible, starting speech needs a louder
   * signal so the assistant's own voice does not trigger barge-in.
   */
  setPlaybackActive(active: boolean): void {
    this.playbackActive = active;
  }

  /** Feed one capture buffer */
  process(chunk: Float32Array): void {
    if (chunk.length === 0) return;

    const frameMs = (chunk.length / this.options.sampleRate) * 1000;
    const smoothed = this.meter.push(computeRms(chunk));
    this.callbacks.onLevel?.(this.meter.level);

    if (this.calibration) {
      this.processCalibration(this.calibration, smoothed, frameMs);
      return;
    }

    if (this.cooldownMs > 0) {
      this.cooldownMs = Math.max(0, this.cooldownMs - frameMs);
    }

    const isSpeechFrame = smoothed > this.currentThreshold();

    if (isSpeechFrame) {
      this.consecutiveSpeechFrames++;
      this.silenceMs = 0;

      if (!this.inSpeech && this.consecutiveSpeechFrames >= this.options.minSpeechFrames) {
        if (this.playbackActive && this.cooldownMs > 0) return;

        this.inSpeech = true;
        this.voicedMs = 0;
        this.segmentMs = 0;
        if (this.playbackActive) {
          this.cooldownMs = this.options.interruptionCooldownMs;
        }
        this.callbacks.onSpeechStart?.();
      }

      if (this.inSpeech) {
        this.voicedMs += frameMs;
      }
    } else {
      this.consecutiveSpeechFrames = 0;
      if (this.inSpeech) {
        this.silenceMs += frameMs;
      }
    }

    if (!this.inSpeech) return;

    this.segmentMs += frameMs;

    if (this.silenceMs >= this.options.silenceTimeoutMs) {
      if (this.voicedMs >= this.options.minSpeechMs) {
        this.endSegment(true);
      } else {
        this.endSegment(false);
      }
    } else if (this.segmentMs >= this.options.maxSpeechMs) {
      this.endSegment(true);
    }
  }

  /**
   * Sample ambient noise for a fixed window and derive the threshold.
   * Re-running replaces a calibration in progress; cancelling keeps the
   * previous result.
   */
  calibrate(options: CalibrationOptions = {}): Promise<number> {
    if (this.calibration) {
      this.finishCalibration(abortError('Calibration restarted'));
    }

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(abortError('Calibration cancelled'));
    }

    // Any detection in progress is abandoned without events
    this.resetSegment();

    return new Promise<number>((resolve, reject) => {
      const onAbort = () => this.cancelCalibration();
      signal?.addEventListener('abort', onAbort, { once: true });

      this.calibration = {
        durationMs: options.durationMs ?? this.options.calibrationMs,
        elapsedMs: 0,
        samples: [],
        onProgress: options.onProgress,
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      options.onProgress?.(0);
    });
  }

  cancelCalibration(): void {
    if (!this.calibration) return;
    this.finishCalibration(abortError('Calibration cancelled'));
  }

  /** Forget the calibration and fall back to the default threshold */
  resetCalibration(): void {
    this.calibratedThreshold = null;
  }

  /** Drop any segment in progress without emitting events */
  reset(): void {
    this.resetSegment();
    this.cooldownMs = 0;
  }

  private currentThreshold(): number {
    const threshold = this.threshold;
    if (this.inSpeech) {
      return threshold * (CONTINUE_MULTIPLIER / SPEECH_MULTIPLIER);
    }
    if (this.playbackActive) {
      return threshold * (INTERRUPTION_MULTIPLIER / SPEECH_MULTIPLIER);
    }
    return threshold;
  }

  private processCalibration(calibration: Calibration, smoothed: number, frameMs: number): void {
    calibration.samples.push(smoothed);
    calibration.elapsedMs += frameMs;
    calibration.onProgress?.(Math.min(1, calibration.elapsedMs / calibration.durationMs));

    if (calibration.elapsedMs >= calibration.durationMs) {
      this.calibratedThreshold = thresholdFromNoise(calibration.samples);
      this.finishCalibration(null);
    }
  }

  private finishCalibration(error: Error | null): void {
    const calibration = this.calibration;
    if (!calibration) return;
    this.calibration = null;
    calibration.cleanup();

    if (error) {
      calibration.reject(error);
    } else {
      calibration.resolve(this.threshold);
    }
  }

  private endSegment(accepted: boolean): void {
    const voicedMs = this.voicedMs;
    this.resetSegment();
    if (accepted) {
      this.callbacks.onSpeechEnd?.(voicedMs);
    } else {
      this.callbacks.onSpeechCancelled?.();
    }
  }

  private resetSegment(): void {
    this.inSpeech = false;
    this.consecutiveSpeechFrames = 0;
    this.voicedMs = 0;
    this.segmentMs = 0;
    this.silenceMs = 0;
  }
}
