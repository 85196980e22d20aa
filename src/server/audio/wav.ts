import type { AudioBuffer } from '../../shared/types/game';

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

/** Wraps mono PCM16 samples in a canonical 44-byte RIFF/WAVE header. */
export function encodeWav(audio: AudioBuffer): Buffer {
  const dataBytes = audio.pcm.length;
  const header = Buffer.alloc(HEADER_BYTES);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // PCM fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(audio.sampleRate, 24);
  header.writeUInt32LE(audio.sampleRate * BYTES_PER_SAMPLE, 28);
  header.writeUInt16LE(BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataBytes, 40);

  return Buffer.concat([header, audio.pcm]);
}

export interface WavInfo {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  /** Offset and length of the data chunk. */
  dataOffset: number;
  dataLength: number;
}

/**
 * Reads the fmt and data chunks of a RIFF/WAVE file. Returns null when the
 * buffer is not a WAV file.
 */
export function readWavInfo(wav: Buffer): WavInfo | null {
  if (wav.length < 12 || wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
    return null;
  }

  let offset = 12;
  let format: Omit<WavInfo, 'dataOffset' | 'dataLength'> | null = null;

  while (offset + 8 <= wav.length) {
    const id = wav.toString('ascii', offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ' && body + 16 <= wav.length) {
      format = {
        channels: wav.readUInt16LE(body + 2),
        sampleRate: wav.readUInt32LE(body + 4),
        bitsPerSample: wav.readUInt16LE(body + 14),
      };
    } else if (id === 'data' && format) {
      return { ...format, dataOffset: body, dataLength: Math.min(size, wav.length - body) };
    }

    offset = body + size + (size % 2);
  }

  return null;
}
