import type { PieceSymbol, Square } from 'chess.js';

export type { PieceSymbol, Square };

export type PlayerColor = 'white' | 'black';

export type GameMode = 'pve' | 'pvp';

/**
 * Who an utterance belongs to. The engine speaks as the configured persona
 * (Magnus by default); the commentator voice narrates PvP games.
 */
export type SpeakerRole = 'player' | 'engine' | 'commentator';

export function opponentOf(color: PlayerColor): PlayerColor {
  return color === 'white' ? 'black' : 'white';
}

export function colorName(color: PlayerColor): string {
  return color === 'white' ? 'White' : 'Black';
}

/** A move as a (from, to, promotion) triple. */
export interface MoveTriple {
  from: Square;
  to: Square;
  promotion?: PieceSymbol;
}

/** SAN text or an explicit triple; both are checked against the legal-move set. */
export type MoveInput = string | MoveTriple;

/**
 * A legal move in the context of the position it was generated from.
 * Produced by GameState only.
 */
export interface AppliedMove {
  color: PlayerColor;
  piece: PieceSymbol;
  from: Square;
  to: Square;
  captured?: PieceSymbol;
  promotion?: PieceSymbol;
  /** Standard algebraic notation, including any +/# suffix. */
  san: string;
  /** Long algebraic (UCI) notation, e.g. e2e4 or e7e8q. */
  uci: string;
  /** chess.js flag string: n, b, e, c, p, k, q. */
  flags: string;
}

export interface BoardSnapshot {
  fen: string;
  sideToMove: PlayerColor;
  /** Castling availability field of the FEN ("KQkq", "-", ...). */
  castling: string;
  /** En-passant target square, or null. */
  enPassant: Square | null;
  halfmoveClock: number;
  fullmoveNumber: number;
  inCheck: boolean;
  checkmate: boolean;
}

export interface TurnRecordEntry {
  /** 1-based half-move index. */
  ply: number;
  mover: PlayerColor;
  san: string;
  uci: string;
  /** FEN without the move counters; equal keys mean the same position. */
  positionKey: string;
  /** sha256 of positionKey. */
  positionHash: string;
}

export type DrawReason =
  | 'threefold_repetition'
  | 'fifty_move_rule'
  | 'insufficient_material'
  | 'agreement';

export type GameOutcome =
  | { kind: 'ongoing' }
  | { kind: 'checkmate'; winner: PlayerColor }
  | { kind: 'stalemate' }
  | { kind: 'draw'; reason: DrawReason }
  | { kind: 'resigned'; player: PlayerColor };

export interface TerminalStatus {
  terminal: boolean;
  outcome: GameOutcome;
}

/** Spoken session commands recognised alongside moves. */
export type SessionCommand = 'resign' | 'offer_draw' | 'accept_draw' | 'decline_draw';

export interface AudioBuffer {
  /** Raw little-endian PCM16 mono samples. */
  pcm: Buffer;
  sampleRate: number;
  durationMs: number;
}

export type Utterance =
  | {
      kind: 'audio';
      direction: 'input' | 'output';
      role: SpeakerRole;
      audio: AudioBuffer;
    }
  | {
      kind: 'text';
      direction: 'input' | 'output';
      role: SpeakerRole;
      text: string;
    };
