import type { SpeakerRole } from '../../shared/types/game';
import { PlaybackError } from '../../shared/errors';
import type { CancellationToken } from '../../shared/utils/cancellation';
import type { AudioPlayer } from '../audio/devices';
import { readWavInfo } from '../audio/wav';
import type { SynthesisClient } from '../services/SynthesisServiceClient';
import { logger } from '../utils/logger';
import { synthesisFailuresCounter } from '../utils/voiceMetrics';

export type VoiceRefs = Readonly<Record<SpeakerRole, string>>;

export interface SpeechOutputOptions {
  voiceRefs: VoiceRefs;
  /** Forwarded to the synthesis service so a seeded session sounds the same. */
  seed?: number;
}

/**
 * Speaks text in the voice assigned to a role. Never touches game state.
 */
export class SpeechOutput {
  constructor(
    private readonly synthesis: SynthesisClient,
    private readonly player: AudioPlayer,
    private readonly options: SpeechOutputOptions
  ) {}

  /**
   * @throws PlaybackError `synthesis_unavailable` when no audio could be
   *   produced, `device_error` when it could not be played.
   */
  async speak(text: string, role: SpeakerRole, token?: CancellationToken): Promise<void> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return;
    }

    const audio = await this.synthesis.synthesize(
      {
        text: trimmed,
        voiceRef: this.options.voiceRefs[role],
        ...(this.options.seed !== undefined && { seed: this.options.seed }),
      },
      token
    );

    if (!readWavInfo(audio.wav)) {
      synthesisFailuresCounter.labels('not_wav').inc();
      throw new PlaybackError('synthesis_unavailable', {
        message: 'Synthesis returned audio that is not a WAV file',
        details: { id: audio.id },
      });
    }

    try {
      await this.player.play(audio.wav, token);
    } catch (error) {
      if (error instanceof PlaybackError) {
        synthesisFailuresCounter.labels(error.kind).inc();
      }
      throw error;
    }

    logger.debug('Utterance spoken', { role, id: audio.id, characters: trimmed.length });
  }
}
