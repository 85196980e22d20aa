import type {
  AppliedMove,
  BoardSnapshot,
  GameMode,
  GameOutcome,
  PlayerColor,
  SpeakerRole,
  TurnRecordEntry,
} from '../../shared/types/game';
import type { VoiceChessError } from '../../shared/errors';
import { describeMove } from '../../shared/engine/moveDescription';
import {
  budgetExhaustedLine,
  drawDeclinedLine,
  drawOfferLine,
  drawResponseExpectedLine,
  gameEndLine,
  retryPrompt,
  welcomeLine,
} from '../../shared/engine/personaLines';
import { type CancellationToken, createCanceledError } from '../../shared/utils/cancellation';
import type { SeededRNG } from '../../shared/utils/rng';
import { type TimedOperationResult, runWithTimeout } from '../../shared/utils/timeout';
import type { CommentaryClient } from '../services/CommentaryServiceClient';
import { logger } from '../utils/logger';
import { commentaryDroppedCounter } from '../utils/voiceMetrics';

export interface ResponseComposerOptions {
  mode: GameMode;
  humanColor: PlayerColor;
  personaName: string;
  commentaryEnabled: boolean;
  commentaryProbability: number;
  commentaryTimeoutMs: number;
  rng: SeededRNG;
  /** How many recent SAN moves the commentator sees. */
  recentMoveCount?: number;
}

/**
 * Builds everything the session says: move descriptions, optional
 * commentary and the persona's fixed lines.
 */
export class ResponseComposer {
  constructor(
    private readonly commentary: CommentaryClient | null,
    private readonly options: ResponseComposerOptions
  ) {}

  /** Pure template rendering; the same arguments always give the same text. */
  describe(move: AppliedMove, board: BoardSnapshot, role: SpeakerRole): string {
    return describeMove(move, board, role);
  }

  /**
   * The description, followed by one sentence of commentary when it is
   * enabled, the probability roll passes and the service answers in time.
   * Commentary failures only cost the sentence.
   */
  async compose(
    move: AppliedMove,
    board: BoardSnapshot,
    role: SpeakerRole,
    record: readonly TurnRecordEntry[],
    token?: CancellationToken
  ): Promise<string> {
    const description = this.describe(move, board, role);
    const { commentary } = this;

    if (
      !commentary ||
      !this.options.commentaryEnabled ||
      !this.options.rng.chance(this.options.commentaryProbability)
    ) {
      return description;
    }

    const recentMoves = record.slice(-(this.options.recentMoveCount ?? 6)).map((entry) => entry.san);

    let result: TimedOperationResult<string | null>;
    try {
      result = await runWithTimeout(
        () => commentary.comment({ fen: board.fen, recentMoves, lastMove: move.san }, token),
        {
          timeoutMs: this.options.commentaryTimeoutMs,
          ...(token && { token }),
          onDiscarded: () => logger.debug('Late commentary discarded', { san: move.san }),
        }
      );
    } catch (error) {
      commentaryDroppedCounter.labels('error').inc();
      logger.debug('Commentary dropped', { san: move.san, error });
      return description;
    }

    switch (result.kind) {
      case 'ok':
        if (result.value === null) {
          commentaryDroppedCounter.labels('empty').inc();
          return description;
        }
        return `${description} ${result.value}`;
      case 'timeout':
        commentaryDroppedCounter.labels('timeout').inc();
        logger.debug('Commentary timed out', { san: move.san, durationMs: result.durationMs });
        return description;
      case 'canceled':
        throw createCanceledError(result.cancellationReason, 'commentary');
    }
  }

  welcome(): string {
    return welcomeLine(this.options.mode, this.options.humanColor, this.options.personaName);
  }

  gameEnd(outcome: GameOutcome): string {
    return gameEndLine(this.options.mode, outcome, this.options.humanColor);
  }

  retryPrompt(error: VoiceChessError): string {
    return retryPrompt(error);
  }

  budgetExhausted(manualFallback: boolean): string {
    return budgetExhaustedLine(manualFallback);
  }

  drawOffered(offerer: PlayerColor): string {
    return drawOfferLine(offerer);
  }

  drawDeclined(): string {
    return drawDeclinedLine(this.options.mode);
  }

  drawResponseExpected(): string {
    return drawResponseExpectedLine();
  }
}
