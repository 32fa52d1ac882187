/**
 * 16-bit PCM WAV helpers for the native engines
 */

export interface DecodedAudio {
  audio: Float32Array;
  sampleRate: number;
}

const HEADER_SIZE = 44;

export function float32ToPcm16(audio: Float32Array): Buffer {
  const buffer = Buffer.alloc(audio.length * 2);
  for (let i = 0; i < audio.length; i++) {
    const sample = Math.max(-1, Math.min(1, audio[i]));
    buffer.writeInt16LE(Math.round(sample < 0 ? sample * 32768 : sample * 32767), i * 2);
  }
  return buffer;
}

/** Trailing odd bytes are ignored */
export function pcm16ToFloat32(pcm: Buffer): Float32Array {
  const samples = Math.floor(pcm.length / 2);
  const audio = new Float32Array(samples);
  for (let i = 0; i < samples; i++) {
    audio[i] = pcm.readInt16LE(i * 2) / 32768;
  }
  return audio;
}

/** Mono 16-bit WAV */
export function encodeWav(audio: Float32Array, sampleRate: number): Buffer {
  const data = float32ToPcm16(audio);
  const header = Buffer.alloc(HEADER_SIZE);

  header.write('RIFF', 0);
  header.writeUInt32LE(36 + data.length, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36);
  header.writeUInt32LE(data.length, 40);

  return Buffer.concat([header, data]);
}

/**
 * Read a 16-bit PCM WAV. Walks the chunk list, so extra chunks before
 * "data" (LIST, fact) are skipped.
 */
export function decodeWav(buffer: Buffer): DecodedAudio {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a WAV file');
  }

  let sampleRate = 0;
  let bitsPerSample = 0;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      sampleRate = buffer.readUInt32LE(body + 4);
      bitsPerSample = buffer.readUInt16LE(body + 14);
    } else if (id === 'data') {
      if (bitsPerSample !== 16) {
        throw new Error(`Unsupported bits per sample: ${bitsPerSample}`);
      }
      const end = Math.min(buffer.length, body + size);
      return { audio: pcm16ToFloat32(buffer.subarray(body, end)), sampleRate };
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw new Error('WAV file has no data chunk');
}
