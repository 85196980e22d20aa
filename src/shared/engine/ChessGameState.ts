import { createHash } from 'crypto';
import { Chess, type Move as ChessJsMove } from 'chess.js';
import type {
  AppliedMove,
  BoardSnapshot,
  GameOutcome,
  MoveInput,
  PlayerColor,
  Square,
  TerminalStatus,
  TurnRecordEntry,
} from '../types/game';
import { opponentOf } from '../types/game';
import { IllegalMoveError } from '../errors';
import { matchSanShape, parseSanShape, sameSan, stripSanDecorations } from './sanMatching';

export type ValidationResult =
  | { success: true; move: AppliedMove }
  | { success: false; error: IllegalMoveError };

export type ApplyResult =
  | { success: true; board: BoardSnapshot; applied: AppliedMove }
  | { success: false; error: IllegalMoveError };

export interface ChessGameStateOptions {
  /** Starting position; defaults to the standard initial position. */
  fen?: string;
}

function toColor(color: 'w' | 'b'): PlayerColor {
  return color === 'w' ? 'white' : 'black';
}

function toAppliedMove(move: ChessJsMove): AppliedMove {
  return {
    color: toColor(move.color),
    piece: move.piece,
    from: move.from,
    to: move.to,
    ...(move.captured && { captured: move.captured }),
    ...(move.promotion && { promotion: move.promotion }),
    san: move.san,
    uci: `${move.from}${move.to}${move.promotion ?? ''}`,
    flags: move.flags,
  };
}

function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

/** FEN without halfmove and fullmove counters. */
export function positionKeyOf(fen: string): string {
  return fen.split(' ').slice(0, 4).join(' ');
}

export function hashPosition(positionKey: string): string {
  return createHash('sha256').update(positionKey).digest('hex');
}

export function describeMoveInput(input: MoveInput): string {
  return typeof input === 'string'
    ? input.trim()
    : `${input.from}${input.to}${input.promotion ?? ''}`;
}

/**
 * Authoritative board and turn record for one session.
 *
 * Wraps chess.js as the rules oracle. The board only changes through
 * {@link ChessGameState.apply}, and only with a member of the current
 * legal-move set; the TurnRecord entry is appended in the same step.
 */
export class ChessGameState {
  private readonly chess: Chess;
  private readonly record: TurnRecordEntry[] = [];
  private readonly positionCounts = new Map<string, number>();
  private readonly startingFullmove: number;
  private resignedBy: PlayerColor | null = null;
  private drawAgreed = false;
  private drawOfferBy: PlayerColor | null = null;

  constructor(options: ChessGameStateOptions = {}) {
    this.chess = options.fen ? new Chess(options.fen) : new Chess();
    const board = this.board();
    this.startingFullmove = board.fullmoveNumber;
    this.countPosition(positionKeyOf(board.fen));
  }

  board(): BoardSnapshot {
    const fen = this.chess.fen();
    const [, side, castling, enPassant, halfmove, fullmove] = fen.split(' ');
    return {
      fen,
      sideToMove: side === 'b' ? 'black' : 'white',
      castling,
      enPassant: isSquare(enPassant) ? enPassant : null,
      halfmoveClock: Number(halfmove),
      fullmoveNumber: Number(fullmove),
      inCheck: this.chess.inCheck(),
      checkmate: this.chess.isCheckmate(),
    };
  }

  sideToMove(): PlayerColor {
    return toColor(this.chess.turn());
  }

  /**
   * Legal moves for the side to move. Empty once the game is over, including
   * by resignation or agreement.
   */
  legalMoves(): AppliedMove[] {
    if (this.resignedBy || this.drawAgreed) {
      return [];
    }
    return this.chess.moves({ verbose: true }).map(toAppliedMove);
  }

  /**
   * Checks a move against the legal-move set without changing anything.
   */
  validate(input: MoveInput): ValidationResult {
    const text = describeMoveInput(input);
    const legal = this.legalMoves();

    let matches: AppliedMove[];
    if (typeof input === 'string') {
      if (stripSanDecorations(input).length === 0) {
        return { success: false, error: new IllegalMoveError(text, 'malformed') };
      }
      const exact = legal.filter((move) => sameSan(move.san, input));
      if (exact.length === 1) {
        return { success: true, move: exact[0] };
      }
      const shape = parseSanShape(input);
      if (!shape) {
        return { success: false, error: new IllegalMoveError(text, 'malformed') };
      }
      matches = matchSanShape(shape, legal);
    } else {
      matches = legal.filter(
        (move) =>
          move.from === input.from &&
          move.to === input.to &&
          (input.promotion === undefined || move.promotion === input.promotion)
      );
    }

    if (matches.length === 0) {
      return { success: false, error: new IllegalMoveError(text, 'not_legal') };
    }
    if (matches.length > 1) {
      return { success: false, error: new IllegalMoveError(text, 'ambiguous') };
    }
    return { success: true, move: matches[0] };
  }

  /**
   * Applies a legal move. On failure the board and record are untouched.
   */
  apply(input: MoveInput): ApplyResult {
    const validation = this.validate(input);
    if (!validation.success) {
      return validation;
    }

    const { from, to, promotion } = validation.move;
    let played: ChessJsMove;
    try {
      played = this.chess.move({ from, to, ...(promotion && { promotion }) });
    } catch {
      // chess.js leaves the position unchanged when it rejects a move.
      return {
        success: false,
        error: new IllegalMoveError(describeMoveInput(input), 'not_legal'),
      };
    }

    const applied = toAppliedMove(played);
    const board = this.board();
    const positionKey = positionKeyOf(board.fen);

    this.record.push({
      ply: this.record.length + 1,
      mover: applied.color,
      san: applied.san,
      uci: applied.uci,
      positionKey,
      positionHash: hashPosition(positionKey),
    });
    this.countPosition(positionKey);
    this.drawOfferBy = null;

    return { success: true, board, applied };
  }

  isTerminal(): TerminalStatus {
    const outcome = this.outcome();
    return { terminal: outcome.kind !== 'ongoing', outcome };
  }

  private outcome(): GameOutcome {
    if (this.resignedBy) {
      return { kind: 'resigned', player: this.resignedBy };
    }
    if (this.drawAgreed) {
      return { kind: 'draw', reason: 'agreement' };
    }
    if (this.chess.isCheckmate()) {
      return { kind: 'checkmate', winner: opponentOf(this.sideToMove()) };
    }
    if (this.chess.isStalemate()) {
      return { kind: 'stalemate' };
    }
    if (this.chess.isInsufficientMaterial()) {
      return { kind: 'draw', reason: 'insufficient_material' };
    }
    const board = this.board();
    if ((this.positionCounts.get(positionKeyOf(board.fen)) ?? 0) >= 3) {
      return { kind: 'draw', reason: 'threefold_repetition' };
    }
    if (board.halfmoveClock >= 100) {
      return { kind: 'draw', reason: 'fifty_move_rule' };
    }
    return { kind: 'ongoing' };
  }

  resign(player: PlayerColor): void {
    if (this.isTerminal().terminal) {
      return;
    }
    this.resignedBy = player;
    this.drawOfferBy = null;
  }

  pendingDrawOffer(): PlayerColor | null {
    return this.drawOfferBy;
  }

  /** Records a draw offer. Returns false when the game is already over. */
  offerDraw(player: PlayerColor): boolean {
    if (this.isTerminal().terminal) {
      return false;
    }
    this.drawOfferBy = player;
    return true;
  }

  /** Accepts a pending offer made by the other player. */
  acceptDraw(player: PlayerColor): boolean {
    if (this.drawOfferBy === null || this.drawOfferBy === player) {
      return false;
    }
    this.drawOfferBy = null;
    this.drawAgreed = true;
    return true;
  }

  declineDraw(player: PlayerColor): boolean {
    if (this.drawOfferBy === null || this.drawOfferBy === player) {
      return false;
    }
    this.drawOfferBy = null;
    return true;
  }

  turnRecord(): readonly TurnRecordEntry[] {
    return [...this.record];
  }

  /**
   * Numbered move list, e.g. "1. e4 e5 2. Nf3". Starts from the configured
   * position's move number.
   */
  moveList(): string {
    const parts: string[] = [];
    let fullmove = this.startingFullmove;

    this.record.forEach((entry, index) => {
      if (entry.mover === 'white') {
        parts.push(`${fullmove}. ${entry.san}`);
      } else {
        if (index === 0) {
          parts.push(`${fullmove}... ${entry.san}`);
        } else {
          parts.push(entry.san);
        }
        fullmove++;
      }
    });

    return parts.join(' ');
  }

  ascii(): string {
    return this.chess.ascii();
  }

  private countPosition(positionKey: string): void {
    this.positionCounts.set(positionKey, (this.positionCounts.get(positionKey) ?? 0) + 1);
  }
}
