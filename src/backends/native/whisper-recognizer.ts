/**
 * Whisper Recognizer (Native - whisper.cpp)
 *
 * Buffers the utterance and transcribes it in one pass when the
 * recognition is stopped. No partial results.
 */

import { execFile, type ChildProcess } from 'child_process';
import { existsSync } from 'fs';
import { unlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultPaths } from '../../config';
import { RecognitionError } from '../../errors';
import type { Recognizer, RecognizerCallbacks } from '../../types';
import { encodeWav } from './wav';

export interface NativeWhisperConfig {
  binaryPath?: string;
  modelPath?: string;
  /** Language code (default: en) */
  language?: string;
  sampleRate?: number;
  /** Shorter recordings are treated as silence (default: 100) */
  minAudioMs?: number;
}

/** whisper.cpp marks silence and noise with bracketed tags */
const NON_SPEECH = /\[[^\]]*\]|\([^)]*\)/g;

export function cleanTranscript(output: string): string {
  return output
    .split('\n')
    .map((line) => line.replace(NON_SPEECH, '').trim())
    .filter(Boolean)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class NativeWhisperRecognizer implements Recognizer {
  private config: Required<NativeWhisperConfig>;
  private ready = false;

  private chunks: Float32Array[] = [];
  private active = false;
  private child: ChildProcess | null = null;
  private cancelled = false;

  constructor(config: NativeWhisperConfig = {}) {
    const paths = defaultPaths.whisper;
    this.config = {
      binaryPath: paths.binaryPath,
      modelPath: paths.modelPath,
      language: 'en',
      sampleRate: 16000,
      minAudioMs: 100,
      ...config,
    };
  }

  async initialize(): Promise<void> {
    if (!existsSync(this.config.binaryPath)) {
      throw new RecognitionError('engine', `whisper.cpp binary not found at: ${this.config.binaryPath}`);
    }
    if (!existsSync(this.config.modelPath)) {
      throw new RecognitionError('engine', `Whisper model not found at: ${this.config.modelPath}`);
    }
    this.ready = true;
  }

  async start(_callbacks: RecognizerCallbacks): Promise<void> {
    if (!this.ready) {
      throw new RecognitionError('engine', 'Recognizer not initialized');
    }
    this.chunks = [];
    this.active = true;
    this.cancelled = false;
  }

  append(audio: Float32Array): void {
    if (this.active) this.chunks.push(audio);
  }

  async stop(): Promise<string> {
    this.active = false;
    const audio = this.takeAudio();

    if ((audio.length / this.config.sampleRate) * 1000 < this.config.minAudioMs) {
      return '';
    }

    const wavPath = join(tmpdir(), `whisper-${Date.now()}-${Math.random().toString(36).slice(2)}.wav`);
    try {
      await writeFile(wavPath, encodeWav(audio, this.config.sampleRate));
      const output = await this.run([
        '-m', this.config.modelPath,
        '-l', this.config.language,
        '--no-timestamps',
        '--suppress-nst',
        '-np',
        '-f', wavPath,
      ]);
      return cleanTranscript(output);
    } finally {
      if (existsSync(wavPath)) {
        await unlink(wavPath);
      }
    }
  }

  cancel(): void {
    this.active = false;
    this.cancelled = true;
    this.chunks = [];
    this.child?.kill('SIGTERM');
  }

  private takeAudio(): Float32Array {
    const length = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const audio = new Float32Array(length);
    let offset = 0;
    for (const chunk of this.chunks) {
      audio.set(chunk, offset);
      offset += chunk.length;
    }
    this.chunks = [];
    return audio;
  }

  private run(args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      this.child = execFile(this.config.binaryPath, args, { encoding: 'utf8' }, (error, stdout, stderr) => {
        this.child = null;
        if (this.cancelled) {
          reject(new RecognitionError('cancelled', 'Recognition cancelled'));
        } else if (error) {
          reject(new RecognitionError('engine', `whisper.cpp failed: ${stderr.trim() || error.message}`, { cause: error }));
        } else {
          resolve(stdout);
        }
      });
    });
  }
}
