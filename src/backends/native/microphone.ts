/**
 * Native Microphone (sox)
 *
 * Streams raw 16-bit mono PCM from a recorder process and hands it out as
 * Float32Array chunks. The default command is sox's `rec`.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { RecognitionError } from '../../errors';
import type { AudioChunkCallback, AudioSource } from '../../types';
import { pcm16ToFloat32 } from './wav';

export interface NativeMicrophoneConfig {
  sampleRate?: number;
  /** Recorder binary (default: rec) */
  command?: string;
  /** Full argument list; replaces the default rec arguments */
  args?: string[];
  /** Samples per delivered chunk (default: sampleRate / 20, i.e. 50ms) */
  chunkSamples?: number;
}

const PERMISSION_PATTERN = /permission|denied|not allowed/i;

export class NativeMicrophone implements AudioSource {
  readonly sampleRate: number;
  private command: string;
  private args: string[];
  private chunkBytes: number;

  private process: ChildProcessWithoutNullStreams | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private stopping = false;

  constructor(config: NativeMicrophoneConfig = {}) {
    this.sampleRate = config.sampleRate ?? 16000;
    this.command = config.command ?? 'rec';
    this.args = config.args ?? [
      '-q',
      '-t', 'raw',
      '-b', '16',
      '-e', 'signed-integer',
      '-c', '1',
      '-r', String(this.sampleRate),
      '-',
    ];
    this.chunkBytes = (config.chunkSamples ?? Math.round(this.sampleRate / 20)) * 2;
  }

  get capturing(): boolean {
    return this.process !== null;
  }

  start(onChunk: AudioChunkCallback, onError?: (error: Error) => void): Promise<void> {
    if (this.process) return Promise.resolve();

    this.stopping = false;
    this.pending = Buffer.alloc(0);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, this.args, { stdio: ['pipe', 'pipe', 'pipe'] });
      this.process = child;

      let started = false;
      let stderr = '';

      const fail = (error: RecognitionError) => {
        this.process = null;
        if (!started) {
          started = true;
          reject(error);
        } else {
          onError?.(error);
        }
      };

      child.once('spawn', () => {
        started = true;
        resolve();
      });

      child.once('error', (error) => {
        fail(new RecognitionError('engine', `Failed to start recorder "${this.command}": ${error.message}`, { cause: error }));
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString('utf8');
      });

      child.stdout.on('data', (data: Buffer) => {
        this.pending = Buffer.concat([this.pending, data]);
        while (this.pending.length >= this.chunkBytes) {
          onChunk(pcm16ToFloat32(this.pending.subarray(0, this.chunkBytes)));
          this.pending = this.pending.subarray(this.chunkBytes);
        }
      });

      child.once('exit', (code, signal) => {
        if (this.stopping || this.process !== child) return;
        const detail = stderr.trim() || `exit code ${code ?? signal ?? 'unknown'}`;
        const kind = PERMISSION_PATTERN.test(stderr) ? 'permission' : 'engine';
        fail(new RecognitionError(kind, `Recorder stopped unexpectedly: ${detail}`));
      });
    });
  }

  async stop(): Promise<void> {
    const child = this.process;
    if (!child) return;

    this.stopping = true;
    this.process = null;
    this.pending = Buffer.alloc(0);

    await new Promise<void>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }
      child.once('exit', () => resolve());
      child.kill('SIGTERM');
    });
  }
}
