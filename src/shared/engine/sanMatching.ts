import type { AppliedMove, PieceSymbol, Square } from '../types/game';

/**
 * Structural reading of SAN text, before it is checked against a position.
 * Castling is carried separately because it has no destination in SAN.
 */
export type SanShape =
  | { kind: 'castle'; side: 'kingside' | 'queenside' }
  | {
      kind: 'piece_move';
      piece: PieceSymbol;
      fromFile?: string;
      fromRank?: string;
      capture: boolean;
      to: Square;
      promotion?: PieceSymbol;
    };

const SAN_PATTERN = /^([KQRBN])?([a-h])?([1-8])?(x|:)?([a-h][1-8])(?:=?([QRBNqrbn]))?$/;
const CASTLE_PATTERN = /^([O0])-\1(-\1)?$/;

/** Strips check/mate markers, annotation glyphs and an "e.p." suffix. */
export function stripSanDecorations(text: string): string {
  return text
    .trim()
    .replace(/\s*e\.?p\.?$/i, '')
    .replace(/[+#!?]+$/, '')
    .trim();
}

function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

function toPieceSymbol(letter: string): PieceSymbol | undefined {
  switch (letter.toLowerCase()) {
    case 'p':
      return 'p';
    case 'n':
      return 'n';
    case 'b':
      return 'b';
    case 'r':
      return 'r';
    case 'q':
      return 'q';
    case 'k':
      return 'k';
    default:
      return undefined;
  }
}

/**
 * Reads case-exact SAN. Returns null when the text is not SAN-shaped.
 */
export function parseSanShape(text: string): SanShape | null {
  const san = stripSanDecorations(text);

  const castle = CASTLE_PATTERN.exec(san);
  if (castle) {
    return { kind: 'castle', side: castle[2] ? 'queenside' : 'kingside' };
  }

  const match = SAN_PATTERN.exec(san);
  if (!match) {
    return null;
  }

  const [, pieceLetter, fromFile, fromRank, captureMark, to, promotionLetter] = match;
  if (!isSquare(to)) {
    return null;
  }

  const piece = pieceLetter ? toPieceSymbol(pieceLetter) : 'p';
  if (!piece) {
    return null;
  }

  const promotion = promotionLetter ? toPieceSymbol(promotionLetter) : undefined;
  // Promotion only exists for pawns.
  if (promotion && piece !== 'p') {
    return null;
  }

  return {
    kind: 'piece_move',
    piece,
    ...(fromFile !== undefined && { fromFile }),
    ...(fromRank !== undefined && { fromRank }),
    capture: captureMark !== undefined,
    to,
    ...(promotion && { promotion }),
  };
}

export function isCastle(move: AppliedMove, side?: 'kingside' | 'queenside'): boolean {
  if (side === 'kingside') return move.flags.includes('k');
  if (side === 'queenside') return move.flags.includes('q');
  return move.flags.includes('k') || move.flags.includes('q');
}

export function isCapture(move: AppliedMove): boolean {
  return move.captured !== undefined;
}

/**
 * Every legal move consistent with the shape. A shape without a promotion
 * piece matches all four promotions of a pawn reaching the last rank.
 */
export function matchSanShape(shape: SanShape, legalMoves: readonly AppliedMove[]): AppliedMove[] {
  if (shape.kind === 'castle') {
    return legalMoves.filter((move) => isCastle(move, shape.side));
  }

  return legalMoves.filter((move) => {
    if (move.piece !== shape.piece || move.to !== shape.to) return false;
    if (shape.fromFile && move.from[0] !== shape.fromFile) return false;
    if (shape.fromRank && move.from[1] !== shape.fromRank) return false;
    if (shape.capture && !isCapture(move)) return false;
    if (shape.promotion && move.promotion !== shape.promotion) return false;
    return true;
  });
}

/** SAN equality ignoring check/mate markers and annotations. */
export function sameSan(a: string, b: string): boolean {
  return stripSanDecorations(a).replace(/0/g, 'O') === stripSanDecorations(b).replace(/0/g, 'O');
}
