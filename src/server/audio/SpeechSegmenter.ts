import { frameBytes, rms16 } from './pcm';

export interface SpeechSegmenterOptions {
  sampleRate: number;
  frameMs: number;
  /** Ring buffer that must be mostly voiced before an utterance starts. */
  preRollMs: number;
  /** Trailing window that must be mostly unvoiced for the utterance to end. */
  silenceTimeoutMs: number;
  maxUtteranceMs: number;
  minUtteranceMs: number;
  /** Frames at or above this RMS count as voiced. */
  voicedFrameRms: number;
  /** Utterances quieter than this overall are dropped. */
  minUtteranceRms: number;
  startVoicedRatio: number;
  endUnvoicedRatio: number;
}

export const DEFAULT_SEGMENTER_OPTIONS: SpeechSegmenterOptions = {
  sampleRate: 16_000,
  frameMs: 30,
  preRollMs: 800,
  silenceTimeoutMs: 1200,
  maxUtteranceMs: 5000,
  minUtteranceMs: 500,
  voicedFrameRms: 400,
  minUtteranceRms: 300,
  startVoicedRatio: 0.55,
  endUnvoicedRatio: 0.8,
};

export type SegmenterEvent =
  | { kind: 'none' }
  | { kind: 'started' }
  | { kind: 'utterance'; pcm: Buffer; durationMs: number }
  | { kind: 'discarded'; reason: 'too_short' | 'too_quiet'; durationMs: number };

/**
 * Energy-based endpointing over fixed-size PCM16 frames.
 *
 * Time is counted in frames, not wall clock, so the same input always
 * segments the same way.
 */
export class SpeechSegmenter {
  readonly options: SpeechSegmenterOptions;
  readonly frameBytes: number;

  private readonly preRollFrames: number;
  private readonly endWindowFrames: number;
  private readonly maxFrames: number;

  private ring: Array<{ frame: Buffer; voiced: boolean }> = [];
  private utterance: Buffer[] = [];
  private endWindow: boolean[] = [];
  private triggered = false;

  constructor(options: Partial<SpeechSegmenterOptions> = {}) {
    this.options = { ...DEFAULT_SEGMENTER_OPTIONS, ...options };
    const { sampleRate, frameMs, preRollMs, silenceTimeoutMs, maxUtteranceMs } = this.options;
    this.frameBytes = frameBytes(sampleRate, frameMs);
    this.preRollFrames = Math.max(1, Math.round(preRollMs / frameMs));
    this.endWindowFrames = Math.max(1, Math.round(silenceTimeoutMs / frameMs));
    this.maxFrames = Math.max(1, Math.floor(maxUtteranceMs / frameMs));
  }

  get isTriggered(): boolean {
    return this.triggered;
  }

  /** Feeds one frame of exactly `frameBytes` bytes. */
  push(frame: Buffer): SegmenterEvent {
    const voiced = rms16(frame) >= this.options.voicedFrameRms;

    if (!this.triggered) {
      this.ring.push({ frame, voiced });
      if (this.ring.length > this.preRollFrames) {
        this.ring.shift();
      }
      if (this.ring.length === this.preRollFrames) {
        const voicedCount = this.ring.filter((entry) => entry.voiced).length;
        if (voicedCount > this.options.startVoicedRatio * this.preRollFrames) {
          this.triggered = true;
          this.utterance = this.ring.map((entry) => entry.frame);
          this.ring = [];
          this.endWindow = [];
          return { kind: 'started' };
        }
      }
      return { kind: 'none' };
    }

    this.utterance.push(frame);
    this.endWindow.push(voiced);
    if (this.endWindow.length > this.endWindowFrames) {
      this.endWindow.shift();
    }

    const unvoiced = this.endWindow.filter((v) => !v).length;
    const silenceReached =
      this.endWindow.length === this.endWindowFrames &&
      unvoiced > this.options.endUnvoicedRatio * this.endWindowFrames;

    if (silenceReached || this.utterance.length >= this.maxFrames) {
      return this.finish();
    }
    return { kind: 'none' };
  }

  /** Closes the current utterance, if any, when the listening window ends. */
  flush(): SegmenterEvent {
    return this.triggered ? this.finish() : { kind: 'none' };
  }

  reset(): void {
    this.ring = [];
    this.utterance = [];
    this.endWindow = [];
    this.triggered = false;
  }

  private finish(): SegmenterEvent {
    const pcm = Buffer.concat(this.utterance);
    const durationMs = this.utterance.length * this.options.frameMs;
    this.reset();

    if (durationMs < this.options.minUtteranceMs) {
      return { kind: 'discarded', reason: 'too_short', durationMs };
    }
    if (rms16(pcm) < this.options.minUtteranceRms) {
      return { kind: 'discarded', reason: 'too_quiet', durationMs };
    }
    return { kind: 'utterance', pcm, durationMs };
  }
}
