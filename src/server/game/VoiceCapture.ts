import type { AudioBuffer } from '../../shared/types/game';
import { CaptureError } from '../../shared/errors';
import { type CancellationToken, createCanceledError } from '../../shared/utils/cancellation';
import type { AudioInputDevice, AudioInputHandle } from '../audio/devices';
import { SpeechSegmenter, type SpeechSegmenterOptions } from '../audio/SpeechSegmenter';
import { logger } from '../utils/logger';

export interface VoiceCaptureOptions {
  sampleRate?: number;
  /** Endpointing overrides; the silence timeout comes from each listen call. */
  segmenter?: Partial<Omit<SpeechSegmenterOptions, 'sampleRate' | 'silenceTimeoutMs'>>;
}

/**
 * Records one utterance from the microphone.
 *
 * The listening window is measured in captured audio, with a wall-clock
 * timer of the same length as a backstop for a device that stops
 * delivering frames.
 */
export class VoiceCapture {
  private readonly sampleRate: number;

  constructor(
    private readonly device: AudioInputDevice,
    private readonly options: VoiceCaptureOptions = {}
  ) {
    this.sampleRate = options.sampleRate ?? 16_000;
  }

  /**
   * @throws CaptureError `no_speech_detected` when the window closes without
   *   a usable utterance, `device_error` when the microphone fails.
   */
  listen(maxDurationMs: number, silenceTimeoutMs: number, token?: CancellationToken): Promise<AudioBuffer> {
    if (token?.isCanceled) {
      return Promise.reject(createCanceledError(token.reason, 'capture'));
    }

    const segmenter = new SpeechSegmenter({
      ...this.options.segmenter,
      sampleRate: this.sampleRate,
      silenceTimeoutMs,
    });
    const windowFrames = Math.max(1, Math.floor(maxDurationMs / segmenter.options.frameMs));

    let handle: AudioInputHandle;
    try {
      handle = this.device.open({ sampleRate: this.sampleRate });
    } catch (error) {
      return Promise.reject(new CaptureError('device_error', { cause: error }));
    }

    return new Promise<AudioBuffer>((resolve, reject) => {
      let pending: Buffer = Buffer.alloc(0);
      let frames = 0;
      let done = false;
      let windowTimer: ReturnType<typeof setTimeout> | undefined;
      let unsubscribe: () => void = () => undefined;

      const finish = (outcome: { audio: AudioBuffer } | { error: Error }): void => {
        if (done) return;
        done = true;
        clearTimeout(windowTimer);
        unsubscribe();
        handle.stream.removeListener('data', onData);
        handle.close();
        if ('audio' in outcome) {
          logger.debug('Utterance captured', { durationMs: outcome.audio.durationMs });
          resolve(outcome.audio);
        } else {
          reject(outcome.error);
        }
      };

      const closeWindow = (): void => {
        const event = segmenter.flush();
        if (event.kind === 'utterance') {
          finish({ audio: { pcm: event.pcm, sampleRate: this.sampleRate, durationMs: event.durationMs } });
        } else {
          finish({ error: new CaptureError('no_speech_detected', { details: { maxDurationMs } }) });
        }
      };

      const onData = (chunk: Buffer): void => {
        pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;

        while (!done && pending.length >= segmenter.frameBytes) {
          const frame = pending.subarray(0, segmenter.frameBytes);
          pending = pending.subarray(segmenter.frameBytes);
          frames++;

          const event = segmenter.push(frame);
          if (event.kind === 'utterance') {
            finish({ audio: { pcm: event.pcm, sampleRate: this.sampleRate, durationMs: event.durationMs } });
            return;
          }
          if (event.kind === 'discarded') {
            logger.debug('Utterance discarded', { reason: event.reason, durationMs: event.durationMs });
          }
          if (frames >= windowFrames) {
            closeWindow();
            return;
          }
        }
      };

      windowTimer = setTimeout(closeWindow, maxDurationMs);
      if (token) {
        unsubscribe = token.onCanceled((reason) =>
          finish({ error: createCanceledError(reason, 'capture') })
        );
      }

      handle.stream.on('data', onData);
      handle.stream.once('error', (error: Error) => {
        logger.error('Audio input failed', { error });
        finish({ error: new CaptureError('device_error', { cause: error }) });
      });
      handle.stream.once('end', () => {
        if (!done) {
          finish({
            error: new CaptureError('device_error', { message: 'Audio input ended unexpectedly' }),
          });
        }
      });
    });
  }
}
