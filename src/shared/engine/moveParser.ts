import type {
  AppliedMove,
  MoveInput,
  PieceSymbol,
  SessionCommand,
  Square,
} from '../types/game';
import { MoveParseError } from '../errors';
import { isCastle, isCapture, matchSanShape, parseSanShape } from './sanMatching';

/**
 * Result of reading one transcription.
 *
 * `san` moves still have to pass GameState validation (an illegal SAN move is
 * an IllegalMoveError there). `colloquial` moves were already matched to
 * exactly one legal move and carry it as a triple.
 */
export type ParsedUtterance =
  | { kind: 'command'; command: SessionCommand; text: string }
  | { kind: 'move'; input: MoveInput; notation: 'san' | 'colloquial'; text: string }
  | { kind: 'error'; error: MoveParseError };

const COMMAND_PATTERNS: ReadonlyArray<[SessionCommand, RegExp]> = [
  ['resign', /^(i )?(resign|resigns|give up)( the game)?$/],
  ['offer_draw', /^(i )?(draw|offer (a )?draw|propose (a )?draw|draw offer)$/],
  ['accept_draw', /^(i )?(accept|accepts|accept (the )?draw|yes)$/],
  ['decline_draw', /^(i )?(decline|declines|decline (the )?draw|no|reject)$/],
];

const PIECE_WORDS: Readonly<Record<string, PieceSymbol>> = {
  pawn: 'p',
  pawns: 'p',
  knight: 'n',
  knights: 'n',
  night: 'n',
  horse: 'n',
  bishop: 'b',
  bishops: 'b',
  rook: 'r',
  rooks: 'r',
  tower: 'r',
  queen: 'q',
  king: 'k',
};

const NUMBER_WORDS: Readonly<Record<string, string>> = {
  one: '1',
  two: '2',
  three: '3',
  four: '4',
  five: '5',
  six: '6',
  seven: '7',
  eight: '8',
};

const ORDINAL_WORDS: Readonly<Record<string, string>> = {
  first: '1',
  second: '2',
  third: '3',
  fourth: '4',
  fifth: '5',
  sixth: '6',
  seventh: '7',
  eighth: '8',
};

const PROMOTION_LETTERS: Readonly<Record<string, PieceSymbol>> = {
  q: 'q',
  r: 'r',
  b: 'b',
  n: 'n',
};

const CAPTURE_WORDS = new Set(['takes', 'take', 'captures', 'capture', 'capturing', 'x']);
const PROMOTION_WORDS = new Set(['promote', 'promotes', 'promoting', 'promotion', 'equals', '=']);
const CASTLE_WORDS = /\bcastl(e|es|ing)\b/;
const COORDINATE_PATTERN = /^([a-h][1-8])[-x]?([a-h][1-8])=?([qrbn])?$/;

function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

function isLastRank(square: Square | undefined): boolean {
  return square !== undefined && (square[1] === '1' || square[1] === '8');
}

function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[,;:!?"]/g, ' ')
    .replace(/\.(\s|$)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function parseCommand(phrase: string): SessionCommand | null {
  for (const [command, pattern] of COMMAND_PATTERNS) {
    if (pattern.test(phrase)) {
      return command;
    }
  }
  return null;
}

function uniqueMoves(moves: AppliedMove[]): AppliedMove[] {
  const seen = new Map<string, AppliedMove>();
  for (const move of moves) {
    seen.set(move.uci, move);
  }
  return Array.from(seen.values());
}

function ambiguous(text: string, matches: AppliedMove[]): ParsedUtterance {
  return {
    kind: 'error',
    error: new MoveParseError(
      'ambiguous',
      text,
      matches.map((move) => move.san)
    ),
  };
}

function unrecognized(text: string): ParsedUtterance {
  return { kind: 'error', error: new MoveParseError('unrecognized', text) };
}

/**
 * Single-token SAN, tolerating the casing a transcriber tends to produce:
 * "nf3" is read as Nf3, "E4" as e4, and a leading lowercase "b" is tried as
 * both a bishop and a pawn file.
 */
function parseSanToken(
  token: string,
  text: string,
  legalMoves: readonly AppliedMove[]
): ParsedUtterance | null {
  const castleToken = token.replace(/o/g, 'O');
  if (/^[O0]-[O0](-[O0])?[+#]?$/.test(castleToken)) {
    return { kind: 'move', input: castleToken.replace(/0/g, 'O'), notation: 'san', text };
  }

  const interpretations: string[] = [];
  if (/^[kqrn]/.test(token)) {
    interpretations.push(token[0].toUpperCase() + token.slice(1));
  } else if (/^b./.test(token) && token.length > 2) {
    interpretations.push('B' + token.slice(1), token);
  } else if (/^[A-H][1-8]/.test(token)) {
    interpretations.push(token[0].toLowerCase() + token.slice(1));
  } else {
    interpretations.push(token);
  }

  const readable = interpretations.filter((candidate) => parseSanShape(candidate) !== null);
  if (readable.length === 0) {
    return null;
  }
  if (readable.length === 1) {
    return { kind: 'move', input: readable[0], notation: 'san', text };
  }

  const matches = uniqueMoves(
    readable.flatMap((candidate) => {
      const shape = parseSanShape(candidate);
      return shape ? matchSanShape(shape, legalMoves) : [];
    })
  );
  if (matches.length > 1) {
    return ambiguous(text, matches);
  }
  if (matches.length === 1) {
    return { kind: 'move', input: matches[0].san, notation: 'san', text };
  }
  return { kind: 'move', input: readable[0], notation: 'san', text };
}

/**
 * Splits a phrase into tokens, joining spelled squares ("e four", "e 4") and
 * breaking coordinate tokens ("e2e4", "e2-e4") into squares.
 */
function tokenize(phrase: string): string[] {
  const raw = phrase.split(' ').flatMap((word) => {
    const squares = word.match(/[a-h][1-8]/g);
    if (squares && squares.join('') === word.replace(/[-x]/g, '')) {
      const pieces = word.includes('x') ? [squares[0], 'x', ...squares.slice(1)] : squares;
      return pieces;
    }
    return [word.replace(/[^a-z0-9=-]/g, '')].filter((token) => token.length > 0);
  });

  const tokens: string[] = [];
  for (let i = 0; i < raw.length; i++) {
    const word = raw[i];
    const next = raw[i + 1];
    if (/^[a-h]$/.test(word) && next !== undefined) {
      const digit = NUMBER_WORDS[next] ?? (/^[1-8]$/.test(next) ? next : undefined);
      if (digit) {
        tokens.push(word + digit);
        i++;
        continue;
      }
    }
    tokens.push(word);
  }
  return tokens;
}

interface MoveIntent {
  piece?: PieceSymbol;
  from?: Square;
  to?: Square;
  fromFile?: string;
  fromRank?: string;
  capture: boolean;
  promotion?: PieceSymbol;
}

function readIntent(tokens: string[]): MoveIntent {
  const intent: MoveIntent = { capture: false };
  const squares: Square[] = [];
  let expectPromotion = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];

    if (isSquare(token)) {
      squares.push(token);
      continue;
    }

    const piece = PIECE_WORDS[token];
    if (piece) {
      if (expectPromotion || (isLastRank(squares[squares.length - 1]) && (intent.piece ?? 'p') === 'p')) {
        intent.promotion = piece;
        expectPromotion = false;
      } else if (!intent.piece) {
        intent.piece = piece;
      }
      continue;
    }

    if (CAPTURE_WORDS.has(token)) {
      intent.capture = true;
      continue;
    }

    if (PROMOTION_WORDS.has(token)) {
      expectPromotion = true;
      continue;
    }

    const fileWord = /^([a-h])-?file$/.exec(token);
    if (fileWord) {
      intent.fromFile = fileWord[1];
      continue;
    }
    // "e takes d5": a bare file ahead of the capture or destination is the origin.
    const leadsMove = squares.length === 0 && next !== undefined && (CAPTURE_WORDS.has(next) || isSquare(next));
    if (/^[a-h]$/.test(token) && (next === 'file' || tokens[i - 1] === 'from' || leadsMove)) {
      intent.fromFile = token;
      continue;
    }

    const rank = ORDINAL_WORDS[token];
    if (rank && next === 'rank') {
      intent.fromRank = rank;
    }
  }

  if (squares.length >= 2) {
    intent.from = squares[0];
    intent.to = squares[squares.length - 1];
  } else if (squares.length === 1) {
    intent.to = squares[0];
  }
  return intent;
}

function matchIntent(intent: MoveIntent, legalMoves: readonly AppliedMove[]): AppliedMove[] {
  return legalMoves.filter((move) => {
    if (intent.to === undefined || move.to !== intent.to) return false;
    if (intent.from && move.from !== intent.from) return false;
    if (intent.piece && move.piece !== intent.piece) return false;
    if (intent.fromFile && move.from[0] !== intent.fromFile) return false;
    if (intent.fromRank && move.from[1] !== intent.fromRank) return false;
    if (intent.capture && !isCapture(move)) return false;
    if (intent.promotion && move.promotion !== intent.promotion) return false;
    return true;
  });
}

function resolveIntent(
  intent: MoveIntent,
  text: string,
  legalMoves: readonly AppliedMove[]
): ParsedUtterance {
  if (intent.to === undefined) {
    return unrecognized(text);
  }

  const matches = matchIntent(intent, legalMoves);
  if (matches.length === 0) {
    return unrecognized(text);
  }
  if (matches.length > 1) {
    return ambiguous(text, matches);
  }

  const [move] = matches;
  return {
    kind: 'move',
    input: {
      from: move.from,
      to: move.to,
      ...(move.promotion && { promotion: move.promotion }),
    },
    notation: 'colloquial',
    text,
  };
}

function parseCastling(
  phrase: string,
  text: string,
  legalMoves: readonly AppliedMove[]
): ParsedUtterance {
  let side: 'kingside' | 'queenside' | undefined;
  if (/king ?side|short/.test(phrase)) side = 'kingside';
  else if (/queen ?side|long/.test(phrase)) side = 'queenside';

  const matches = legalMoves.filter((move) => isCastle(move, side));
  if (matches.length === 0) return unrecognized(text);
  if (matches.length > 1) return ambiguous(text, matches);
  const [move] = matches;
  return { kind: 'move', input: { from: move.from, to: move.to }, notation: 'colloquial', text };
}

/**
 * Reads a transcription as a session command or a move for the side to move.
 *
 * Colloquial phrasing is resolved against `legalMoves`: exactly one match is
 * returned as a triple, several matches are `ambiguous`, none is
 * `unrecognized`.
 */
export function parseMoveText(text: string, legalMoves: readonly AppliedMove[]): ParsedUtterance {
  const trimmed = text.trim();
  const phrase = normalizePhrase(trimmed);
  if (phrase.length === 0) {
    return unrecognized(trimmed);
  }

  const command = parseCommand(phrase);
  if (command) {
    return { kind: 'command', command, text: trimmed };
  }

  const compact = trimmed.replace(/[.!]+$/, '');
  const coordinate = COORDINATE_PATTERN.exec(compact.toLowerCase());
  if (coordinate) {
    const [, from, to, promotion] = coordinate;
    if (isSquare(from) && isSquare(to)) {
      return resolveIntent(
        {
          from,
          to,
          capture: false,
          ...(promotion !== undefined && { promotion: PROMOTION_LETTERS[promotion] }),
        },
        trimmed,
        legalMoves
      );
    }
  }

  if (!/\s/.test(compact)) {
    const san = parseSanToken(compact, trimmed, legalMoves);
    if (san) {
      return san;
    }
  }

  if (CASTLE_WORDS.test(phrase)) {
    return parseCastling(phrase, trimmed, legalMoves);
  }

  return resolveIntent(readIntent(tokenize(phrase)), trimmed, legalMoves);
}
