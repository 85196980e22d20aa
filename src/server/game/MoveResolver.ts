import type {
  AppliedMove,
  AudioBuffer,
  MoveInput,
  PlayerColor,
  SessionCommand,
} from '../../shared/types/game';
import {
  MoveParseError,
  TranscriptionError,
  VoiceChessError,
  IllegalMoveError,
} from '../../shared/errors';
import type { ChessGameState } from '../../shared/engine/ChessGameState';
import { parseMoveText } from '../../shared/engine/moveParser';
import type { InputExpectation } from '../../shared/stateMachines/turn';
import type { CancellationToken } from '../../shared/utils/cancellation';
import type { TranscriptionClient } from '../services/TranscriptionServiceClient';
import { logger } from '../utils/logger';
import { type ResolutionOutcome as MetricOutcome, recordResolutionAttempt } from '../utils/voiceMetrics';

export type Resolution =
  | { kind: 'move'; move: AppliedMove; input: MoveInput; transcription: string }
  | { kind: 'command'; command: SessionCommand; transcription: string }
  | { kind: 'failed'; error: VoiceChessError; transcription?: string };

export interface ResolutionContext {
  player: PlayerColor;
  expecting: InputExpectation;
}

const DRAW_RESPONSES: ReadonlySet<SessionCommand> = new Set(['accept_draw', 'decline_draw']);

function metricOutcomeOf(resolution: Resolution): MetricOutcome {
  if (resolution.kind !== 'failed') {
    return resolution.kind;
  }
  const { error } = resolution;
  if (error instanceof TranscriptionError) return 'transcription_failed';
  if (error instanceof IllegalMoveError) return 'illegal';
  if (error instanceof MoveParseError && error.kind === 'ambiguous') return 'ambiguous';
  return 'unrecognized';
}

/**
 * Turns one utterance into a validated move or a session command. Each call
 * is a single attempt; retrying is the coordinator's job.
 *
 * Validation goes through GameState without mutating it; the coordinator
 * applies the move afterwards.
 */
export class MoveResolver {
  constructor(
    private readonly transcriber: TranscriptionClient,
    private readonly game: ChessGameState
  ) {}

  async resolveAudio(
    audio: AudioBuffer,
    context: ResolutionContext,
    token?: CancellationToken
  ): Promise<Resolution> {
    let transcription: string;
    try {
      transcription = await this.transcriber.transcribe(audio, token);
    } catch (error) {
      if (error instanceof TranscriptionError) {
        return this.record({ kind: 'failed', error }, context);
      }
      throw error;
    }
    return this.resolveText(transcription, context);
  }

  /** Resolves typed or already-transcribed text. */
  resolveText(text: string, context: ResolutionContext): Resolution {
    return this.record(this.interpret(text, context), context);
  }

  private interpret(text: string, context: ResolutionContext): Resolution {
    const parsed = parseMoveText(text, this.game.legalMoves());

    if (parsed.kind === 'error') {
      return { kind: 'failed', error: parsed.error, transcription: text };
    }

    if (context.expecting === 'draw_response') {
      if (parsed.kind === 'command' && DRAW_RESPONSES.has(parsed.command)) {
        return { kind: 'command', command: parsed.command, transcription: text };
      }
      return { kind: 'failed', error: new MoveParseError('unrecognized', text), transcription: text };
    }

    if (parsed.kind === 'command') {
      if (DRAW_RESPONSES.has(parsed.command)) {
        // Nothing to accept or decline.
        return { kind: 'failed', error: new MoveParseError('unrecognized', text), transcription: text };
      }
      return { kind: 'command', command: parsed.command, transcription: text };
    }

    const validation = this.game.validate(parsed.input);
    if (!validation.success) {
      return { kind: 'failed', error: validation.error, transcription: text };
    }
    return { kind: 'move', move: validation.move, input: parsed.input, transcription: text };
  }

  private record(resolution: Resolution, context: ResolutionContext): Resolution {
    recordResolutionAttempt(metricOutcomeOf(resolution));
    if (resolution.kind === 'failed') {
      logger.warn('Move resolution failed', {
        player: context.player,
        code: resolution.error.code,
        transcription: resolution.transcription,
      });
    } else {
      logger.debug('Move resolved', {
        player: context.player,
        kind: resolution.kind,
        transcription: resolution.transcription,
      });
    }
    return resolution;
  }
}
