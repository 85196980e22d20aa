/** Root-mean-square amplitude of little-endian PCM16 samples. */
export function rms16(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / 2);
  if (samples === 0) {
    return 0;
  }

  let sum = 0;
  for (let i = 0; i < samples; i++) {
    const sample = pcm.readInt16LE(i * 2);
    sum += sample * sample;
  }
  return Math.sqrt(sum / samples);
}

export function frameBytes(sampleRate: number, frameMs: number): number {
  return Math.round((sampleRate * frameMs) / 1000) * 2;
}
