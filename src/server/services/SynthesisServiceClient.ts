import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import { PlaybackError } from '../../shared/errors';
import { type CancellationToken, createCanceledError } from '../../shared/utils/cancellation';
import { logger } from '../utils/logger';
import { synthesisFailuresCounter } from '../utils/voiceMetrics';
import { categorizeHttpError, httpErrorSummary } from './httpErrors';
import { signalFromToken } from './requestSignal';

export interface SynthesizedAudio {
  id: string;
  /** WAV file bytes. */
  wav: Buffer;
  sampleRate: number;
}

export interface SynthesisRequest {
  text: string;
  voiceRef: string;
  seed?: number;
}

export interface SynthesisClient {
  synthesize(request: SynthesisRequest, token?: CancellationToken): Promise<SynthesizedAudio>;
}

interface GenerateRequestPayload {
  transcript: string;
  ref_audio: string;
  return_audio: 'base64';
  seed?: number;
}

const GenerateResponseSchema = z.object({
  id: z.string(),
  audio_base64: z.string().min(1),
  sample_rate: z.number().int().positive(),
});

export interface SynthesisServiceClientOptions {
  baseURL?: string;
  timeoutMs?: number;
}

/**
 * Client for the voice-cloning synthesis service (`POST /generate`).
 */
export class SynthesisServiceClient implements SynthesisClient {
  private readonly client: AxiosInstance;

  constructor(options: SynthesisServiceClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.baseURL ?? config.synthesis.url,
      timeout: options.timeoutMs ?? config.synthesis.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * @throws PlaybackError `synthesis_unavailable` on any failure.
   */
  async synthesize(request: SynthesisRequest, token?: CancellationToken): Promise<SynthesizedAudio> {
    token?.throwIfCanceled('synthesis');

    const payload: GenerateRequestPayload = {
      transcript: request.text,
      ref_audio: request.voiceRef,
      return_audio: 'base64',
      ...(request.seed !== undefined && { seed: request.seed }),
    };

    const { signal, dispose } = signalFromToken(token);
    const startTime = performance.now();

    try {
      const response = await this.client.post<unknown>('/generate', payload, { signal });
      const parsed = GenerateResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        synthesisFailuresCounter.labels('malformed').inc();
        throw new PlaybackError('synthesis_unavailable', {
          message: 'Synthesis response has no audio',
        });
      }

      const wav = Buffer.from(parsed.data.audio_base64, 'base64');
      logger.info('Speech synthesized', {
        id: parsed.data.id,
        bytes: wav.length,
        latencyMs: Math.round(performance.now() - startTime),
      });
      return { id: parsed.data.id, wav, sampleRate: parsed.data.sample_rate };
    } catch (error) {
      if (error instanceof PlaybackError) {
        throw error;
      }
      if (token?.isCanceled) {
        throw createCanceledError(token.reason, 'synthesis');
      }

      const type = categorizeHttpError(error);
      synthesisFailuresCounter.labels(type).inc();
      logger.warn('Speech synthesis failed', httpErrorSummary(error));
      throw new PlaybackError('synthesis_unavailable', { cause: error, details: { type } });
    } finally {
      dispose();
    }
  }
}
