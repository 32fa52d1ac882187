#!/usr/bin/env node
/**
 * Dialogue Runtime CLI
 *
 * Usage:
 *   dialogue-runtime talk [--push-to-talk] [--server <url>]  - Talk through the microphone
 *   dialogue-runtime serve [--port <n>]                      - Run the reference conversation server
 *   dialogue-runtime calibrate                               - Measure ambient noise and print the threshold
 *   dialogue-runtime help                                    - Show help
 */

import { emitKeypressEvents } from 'readline';
import { join } from 'path';
import { VoiceActivityDetector } from './audio/vad';
import { CloudTextGenerator } from './backends/cloud/llm';
import { NativeMicrophone, NativeSherpaSynthesizer, NativeWhisperRecognizer } from './backends/native';
import { configFromEnv, getCacheDir, getModelsDir, resolveConfig, type DialogueConfigInput } from './config';
import { DialogueSession } from './dialogue/dialogue-session';
import { isTerminal, toError } from './errors';
import { ConversationHandler } from './server/handler';
import { CONVERSATION_PATH, createConversationServer } from './server';
import { getDefaultLogger } from './services/dialogue-logger';

// ============ Arguments ============

interface CliOptions {
  pushToTalk: boolean;
  server?: string;
  port?: number;
  model?: string;
  verbose: boolean;
}

function parseOptions(args: string[]): CliOptions {
  const options: CliOptions = { pushToTalk: false, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string => {
      const next = args[++i];
      if (next === undefined) {
        throw new Error(`${arg} requires a value`);
      }
      return next;
    };

    switch (arg) {
      case '--push-to-talk':
        options.pushToTalk = true;
        break;
      case '--server':
        options.server = value();
        break;
      case '--port': {
        const port = Number(value());
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new Error(`--port must be a port number (got ${args[i]})`);
        }
        options.port = port;
        break;
      }
      case '--model':
        options.model = value();
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function sessionConfig(options: CliOptions): DialogueConfigInput {
  const input = configFromEnv();
  if (options.server) input.serverUrl = options.server;
  if (options.pushToTalk) input.inputMode = 'pushToTalk';
  if (options.model) input.recognition = { ...input.recognition, model: options.model };
  return input;
}

// ============ Commands ============

async function talk(options: CliOptions): Promise<void> {
  const config = resolveConfig(sessionConfig(options));
  const logger = getDefaultLogger();
  logger.setVerbose(options.verbose);

  const audioSource = new NativeMicrophone({ sampleRate: config.sampleRate });
  const recognizer = new NativeWhisperRecognizer({
    language: config.recognition.language,
    sampleRate: config.sampleRate,
    ...(config.recognition.model ? { modelPath: join(getModelsDir(), `whisper-${config.recognition.model}.bin`) } : {}),
  });
  const synthesizer = new NativeSherpaSynthesizer();

  const session = new DialogueSession({ audioSource, recognizer, synthesizer, config, logger });
  session.on('error', (error) => {
    console.log(
      isTerminal(error)
        ? 'Retrying will not help: check microphone permission and the configured voice.'
        : 'Press [r] to restart.'
    );
  });

  await session.start();

  const pushToTalk = session.getInputMode() === 'pushToTalk';
  console.log(`Connected to ${config.serverUrl} (session ${session.getSessionId()})`);
  console.log(
    pushToTalk
      ? 'Press space to start talking, space again to send.'
      : 'Listening. Speak any time; talking over the assistant interrupts it.'
  );
  console.log('Keys: [i] interrupt  [c] clear  [r] restart  [m] switch mode  [q] quit\n');

  await new Promise<void>((resolve) => {
    let holding = false;

    const quit = () => {
      process.stdin.off('keypress', onKey);
      if (process.stdin.isTTY) process.stdin.setRawMode(false);
      process.stdin.pause();
      resolve();
    };

    const onKey = (_text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
      if (!key) return;
      if (key.ctrl && key.name === 'c') {
        quit();
        return;
      }

      switch (key.name) {
        case 'space':
          if (session.getInputMode() !== 'pushToTalk') break;
          if (holding) {
            session.releaseToTalk();
          } else {
            session.pressToTalk();
          }
          holding = !holding;
          break;
        case 'i':
          session.interrupt();
          break;
        case 'c':
          session.clear();
          break;
        case 'r':
          session.restart();
          break;
        case 'm':
          holding = false;
          session.setInputMode(session.getInputMode() === 'handsFree' ? 'pushToTalk' : 'handsFree');
          console.log(`Input mode: ${session.getInputMode()}`);
          break;
        case 'q':
          quit();
          break;
      }
    };

    emitKeypressEvents(process.stdin);
    if (process.stdin.isTTY) process.stdin.setRawMode(true);
    process.stdin.on('keypress', onKey);
    process.stdin.resume();
  });

  await session.stop();
}

async function serve(options: CliOptions): Promise<void> {
  const baseUrl = process.env.DIALOGUE_LLM_BASE_URL || 'https://api.openai.com/v1';
  const model = process.env.DIALOGUE_LLM_MODEL || 'gpt-4o-mini';
  const apiKey = process.env.DIALOGUE_LLM_API_KEY || process.env.OPENAI_API_KEY;

  const generator = new CloudTextGenerator({ baseUrl, model, apiKey });
  const handler = new ConversationHandler(generator, {
    systemPrompt: process.env.DIALOGUE_SYSTEM_PROMPT || undefined,
  });

  const port = options.port ?? 8000;
  const wss = createConversationServer(handler, { port });

  await new Promise<void>((resolve, reject) => {
    wss.once('listening', () => resolve());
    wss.once('error', reject);
  });

  console.log(`Conversation server listening on ws://localhost:${port}${CONVERSATION_PATH}`);
  console.log(`  Model: ${model} (${baseUrl})`);

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  await new Promise<void>((resolve, reject) => {
    wss.close((error) => (error ? reject(error) : resolve()));
  });
}

async function calibrate(options: CliOptions): Promise<void> {
  const config = resolveConfig(sessionConfig(options));
  const microphone = new NativeMicrophone({ sampleRate: config.sampleRate });
  const vad = new VoiceActivityDetector({
    sampleRate: config.sampleRate,
    calibrationMs: config.vad.calibrationMs,
  });

  console.log(`Stay quiet for ${config.vad.calibrationMs / 1000}s while ambient noise is measured...`);

  await microphone.start((chunk) => vad.process(chunk));
  try {
    const threshold = await vad.calibrate({
      onProgress: (progress) => process.stdout.write(`\r  ${Math.round(progress * 100)}%`),
    });
    console.log(`\nThreshold: ${threshold.toFixed(4)}`);
    console.log(`Use it with: export DIALOGUE_VAD_THRESHOLD=${threshold.toFixed(4)}`);
  } finally {
    await microphone.stop();
  }
}

// ============ Help ============

function printHelp(): void {
  console.log(`
dialogue-runtime - Spoken-dialogue runtime with barge-in

Commands:
  talk                    Talk to the conversation server through the microphone
    --push-to-talk          Start in push-to-talk mode (space starts and ends a turn)
    --server <url>          Server URL (default: ${resolveConfig().serverUrl})
    --model <name>          Whisper model, loaded from whisper-<name>.bin
    --verbose, -v           Log partial transcripts
  serve                   Run the reference conversation server
    --port <n>              Port to listen on (default: 8000)
  calibrate               Measure ambient noise and print a VAD threshold
  help                    Show this help message

Environment:
  DIALOGUE_SERVER_URL, DIALOGUE_INPUT_MODE, DIALOGUE_LANGUAGE, DIALOGUE_VOICE,
  DIALOGUE_VAD_THRESHOLD, DIALOGUE_SILENCE_TIMEOUT_MS, DIALOGUE_HEARTBEAT_MS,
  DIALOGUE_MAX_RECONNECTS
  DIALOGUE_LLM_BASE_URL, DIALOGUE_LLM_MODEL, DIALOGUE_LLM_API_KEY, DIALOGUE_SYSTEM_PROMPT (serve)

Native engines (whisper-cli, sherpa-onnx-offline-tts) and models are looked up in:
  ${getCacheDir()}
  Override with: export DIALOGUE_RUNTIME_CACHE=/path/to/cache
Recording uses sox's rec; playback uses aplay (Linux) or afplay (macOS).
`);
}

// ============ Main ============

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'talk':
      await talk(parseOptions(args.slice(1)));
      break;

    case 'serve':
      await serve(parseOptions(args.slice(1)));
      break;

    case 'calibrate':
      await calibrate(parseOptions(args.slice(1)));
      break;

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      printHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Error:', toError(err).message);
  process.exit(1);
});
