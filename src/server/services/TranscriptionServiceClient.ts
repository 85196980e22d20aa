/**
 * Client for the speech-to-move transcription service.
 *
 * Uploads one utterance as a WAV file (multipart field `audio`) and returns
 * the text the service heard, usually SAN or one of the session words
 * (resign, draw, accept, decline).
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import type { AudioBuffer } from '../../shared/types/game';
import { TranscriptionError } from '../../shared/errors';
import { type CancellationToken, createCanceledError } from '../../shared/utils/cancellation';
import { encodeWav } from '../audio/wav';
import { logger } from '../utils/logger';
import { transcriptionLatencyHistogram } from '../utils/voiceMetrics';
import { categorizeHttpError, httpErrorSummary } from './httpErrors';
import { signalFromToken } from './requestSignal';

export interface TranscriptionClient {
  transcribe(audio: AudioBuffer, token?: CancellationToken): Promise<string>;
}

const TranscriptionResponseSchema = z.union([
  z.object({ transcription: z.string() }).transform((body) => body.transcription),
  z.object({ text: z.string() }).transform((body) => body.text),
]);

export interface TranscriptionServiceClientOptions {
  url?: string;
  timeoutMs?: number;
}

export class TranscriptionServiceClient implements TranscriptionClient {
  private readonly client: AxiosInstance;
  private readonly url: string;

  constructor(options: TranscriptionServiceClientOptions = {}) {
    this.url = options.url ?? config.transcription.url;
    this.client = axios.create({
      timeout: options.timeoutMs ?? config.transcription.timeoutMs,
    });
  }

  /**
   * @throws TranscriptionError `timeout` when the service does not answer in
   *   time, `service_unavailable` for every other failure.
   */
  async transcribe(audio: AudioBuffer, token?: CancellationToken): Promise<string> {
    token?.throwIfCanceled('transcription');

    const form = new FormData();
    form.append('audio', new Blob([encodeWav(audio)], { type: 'audio/wav' }), 'utterance.wav');

    const { signal, dispose } = signalFromToken(token);
    const startTime = performance.now();

    try {
      logger.info('Requesting transcription', { durationMs: audio.durationMs });
      const response = await this.client.post<unknown>(this.url, form, { signal });
      const latencyMs = Math.round(performance.now() - startTime);

      const parsed = TranscriptionResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        transcriptionLatencyHistogram.labels('malformed').observe(latencyMs);
        throw new TranscriptionError('service_unavailable', {
          message: 'Transcription response has no text',
          details: { latencyMs },
        });
      }

      const text = parsed.data.trim();
      transcriptionLatencyHistogram.labels('ok').observe(latencyMs);
      logger.info('Transcription received', { text, latencyMs });
      return text;
    } catch (error) {
      if (error instanceof TranscriptionError) {
        throw error;
      }
      if (token?.isCanceled) {
        throw createCanceledError(token.reason, 'transcription');
      }

      const latencyMs = Math.round(performance.now() - startTime);
      const type = categorizeHttpError(error);
      transcriptionLatencyHistogram.labels(type).observe(latencyMs);
      logger.warn('Transcription failed', { ...httpErrorSummary(error), latencyMs });

      throw new TranscriptionError(type === 'timeout' ? 'timeout' : 'service_unavailable', {
        cause: error,
        details: { type },
      });
    } finally {
      dispose();
    }
  }
}
