/**
 * Native backends: child-process engines for Node.js
 */

export { NativeMicrophone } from './microphone';
export type { NativeMicrophoneConfig } from './microphone';
export { NativeWhisperRecognizer, cleanTranscript } from './whisper-recognizer';
export type { NativeWhisperConfig } from './whisper-recognizer';
export { NativeSherpaSynthesizer, WavFilePlayable } from './sherpa-synthesizer';
export type { NativeSherpaConfig } from './sherpa-synthesizer';
export { encodeWav, decodeWav, float32ToPcm16, pcm16ToFloat32 } from './wav';
