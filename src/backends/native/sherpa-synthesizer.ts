/**
 * Sherpa-ONNX Synthesizer (Native)
 *
 * Runs sherpa-onnx-offline-tts with a Piper VITS model into a temporary
 * WAV, then plays it through a system player (aplay on Linux, afplay on
 * macOS). Voices are model directories named vits-piper-<voice>.
 */

import { execFile, spawn, type ChildProcess } from 'child_process';
import { existsSync, readdirSync, unlinkSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { defaultPaths } from '../../config';
import { SynthesisError } from '../../errors';
import type { AudioPlayable, Synthesizer } from '../../types';

export interface NativeSherpaConfig {
  binaryPath?: string;
  /** Directory of the initial voice */
  modelDir?: string;
  speakerId?: number;
  /** Player binary; default depends on the platform */
  playerCommand?: string;
}

interface VoiceFiles {
  model: string;
  tokens: string;
  dataDir: string;
}

function defaultPlayer(): string {
  return process.platform === 'darwin' ? 'afplay' : 'aplay';
}

function removeFile(path: string): void {
  if (existsSync(path)) {
    unlinkSync(path);
  }
}

/**
 * A synthesized WAV on disk. The file is removed once playback ends or is
 * stopped.
 */
export class WavFilePlayable implements AudioPlayable {
  private child: ChildProcess | null = null;
  private stopped = false;

  constructor(
    readonly path: string,
    private readonly playerCommand: string
  ) {}

  play(): Promise<void> {
    if (this.stopped) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const args = this.playerCommand === 'aplay' ? ['-q', this.path] : [this.path];
      const child = spawn(this.playerCommand, args, { stdio: 'ignore' });
      this.child = child;

      child.once('error', (error) => {
        this.child = null;
        reject(new SynthesisError('engine', `Failed to start player "${this.playerCommand}": ${error.message}`, { cause: error }));
      });

      child.once('exit', (code) => {
        this.child = null;
        removeFile(this.path);
        if (code === 0 || this.stopped) {
          resolve();
        } else {
          reject(new SynthesisError('engine', `${this.playerCommand} exited with code ${code}`));
        }
      });
    });
  }

  stop(): void {
    this.stopped = true;
    if (this.child) {
      this.child.kill('SIGTERM');
    } else {
      removeFile(this.path);
    }
  }
}

export class NativeSherpaSynthesizer implements Synthesizer {
  private binaryPath: string;
  private modelDir: string;
  private speakerId: number;
  private playerCommand: string;
  private voice: VoiceFiles | null = null;

  constructor(config: NativeSherpaConfig = {}) {
    const paths = defaultPaths.sherpaOnnxTts;
    this.binaryPath = config.binaryPath ?? paths.binaryPath;
    this.modelDir = config.modelDir ?? paths.modelDir;
    this.speakerId = config.speakerId ?? 0;
    this.playerCommand = config.playerCommand ?? defaultPlayer();
  }

  async initialize(): Promise<void> {
    if (!existsSync(this.binaryPath)) {
      throw new SynthesisError('engine', `sherpa-onnx-offline-tts binary not found at: ${this.binaryPath}`);
    }
    this.voice = this.loadVoice(this.modelDir);
  }

  /** Switch to the model directory vits-piper-<voice> next to the current one */
  async setVoice(voice: string): Promise<void> {
    const modelDir = join(dirname(this.modelDir), `vits-piper-${voice}`);
    this.voice = this.loadVoice(modelDir);
    this.modelDir = modelDir;
  }

  async synthesize(text: string): Promise<AudioPlayable> {
    const voice = this.voice;
    if (!voice) {
      throw new SynthesisError('engine', 'Synthesizer not initialized');
    }

    const wavPath = join(tmpdir(), `sherpa-tts-${Date.now()}-${Math.random().toString(36).slice(2)}.wav`);
    const args = [
      `--vits-model=${voice.model}`,
      `--vits-tokens=${voice.tokens}`,
      `--vits-data-dir=${voice.dataDir}`,
      `--sid=${this.speakerId}`,
      `--output-filename=${wavPath}`,
      text,
    ];

    await new Promise<void>((resolve, reject) => {
      execFile(this.binaryPath, args, { maxBuffer: 10 * 1024 * 1024 }, (error, _stdout, stderr) => {
        if (error) {
          reject(new SynthesisError('engine', `sherpa-onnx failed: ${String(stderr).trim() || error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });

    return new WavFilePlayable(wavPath, this.playerCommand);
  }

  private loadVoice(modelDir: string): VoiceFiles {
    if (!existsSync(modelDir)) {
      throw new SynthesisError('voice_unavailable', `Voice model directory not found: ${modelDir}`);
    }

    const model = readdirSync(modelDir).find((file) => file.endsWith('.onnx'));
    if (!model) {
      throw new SynthesisError('voice_unavailable', `No .onnx model file found in: ${modelDir}`);
    }

    const tokens = join(modelDir, 'tokens.txt');
    const dataDir = join(modelDir, 'espeak-ng-data');
    if (!existsSync(tokens) || !existsSync(dataDir)) {
      throw new SynthesisError('voice_unavailable', `Incomplete voice model in: ${modelDir}`);
    }

    return { model: join(modelDir, model), tokens, dataDir };
  }
}
