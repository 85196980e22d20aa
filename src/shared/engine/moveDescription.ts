import type { AppliedMove, BoardSnapshot, MoveInput, PieceSymbol, SpeakerRole } from '../types/game';
import { colorName } from '../types/game';
import { parseSanShape } from './sanMatching';

const PIECE_NAMES: Readonly<Record<PieceSymbol, string>> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

const RANK_ORDINALS: Readonly<Record<string, string>> = {
  '1': 'first',
  '2': 'second',
  '3': 'third',
  '4': 'fourth',
  '5': 'fifth',
  '6': 'sixth',
  '7': 'seventh',
  '8': 'eighth',
};

/**
 * " from the b-file", " from the first rank" or " from e2" when the SAN
 * carries a disambiguator; pawn captures always name their file.
 */
function originPhrase(move: AppliedMove): string {
  if (move.piece === 'p') {
    return move.flags.includes('c') || move.flags.includes('e')
      ? ` from the ${move.from[0]}-file`
      : '';
  }

  const body = move.san.replace(/[+#]$/, '');
  const match = /^[KQRBN]([a-h])?([1-8])?x?[a-h][1-8]/.exec(body);
  const file = match?.[1];
  const rank = match?.[2];
  if (file && rank) return ` from ${file}${rank}`;
  if (file) return ` from the ${file}-file`;
  if (rank) return ` from the ${RANK_ORDINALS[rank]} rank`;
  return '';
}

function endingOf(board: BoardSnapshot): string {
  if (board.checkmate) return ', checkmate.';
  if (board.inCheck) return ', with check.';
  return '.';
}

interface Voice {
  subject: string;
  possessive: string;
  castle: string;
  capture: string;
  advance: string;
  move: string;
  promote: string;
}

function voiceFor(role: SpeakerRole, move: AppliedMove): Voice {
  switch (role) {
    case 'engine':
      return {
        subject: 'I will',
        possessive: 'my',
        castle: 'castle',
        capture: 'capture',
        advance: 'advance',
        move: 'move',
        promote: 'and I will promote',
      };
    case 'player':
      return {
        subject: 'You',
        possessive: 'your',
        castle: 'castled',
        capture: 'captured',
        advance: 'advanced',
        move: 'moved',
        promote: 'and promoted',
      };
    case 'commentator':
      return {
        subject: colorName(move.color),
        possessive: 'the',
        castle: 'castled',
        capture: 'captured',
        advance: 'advanced',
        move: 'moved',
        promote: 'and promoted',
      };
  }
}

/**
 * Spoken description of an applied move. `board` is the position after the
 * move and only supplies the check/checkmate ending.
 *
 * @example
 * describeMove(nf3, board, 'engine')   // "I will move my knight to f3."
 * describeMove(nf3, board, 'player')   // "You moved your knight to f3."
 */
export function describeMove(move: AppliedMove, board: BoardSnapshot, role: SpeakerRole): string {
  const voice = voiceFor(role, move);
  const piece = `${voice.possessive} ${PIECE_NAMES[move.piece]}`;
  let text: string;

  if (move.flags.includes('k') || move.flags.includes('q')) {
    const side = move.flags.includes('k') ? 'kingside' : 'queenside';
    text = `${voice.subject} ${voice.castle} ${side} to ${move.to}`;
  } else if (move.flags.includes('e')) {
    text = `${voice.subject} ${voice.capture} en passant on ${move.to} with ${piece}${originPhrase(move)}`;
  } else if (move.captured) {
    text =
      `${voice.subject} ${voice.capture} the ${PIECE_NAMES[move.captured]} on ${move.to}` +
      ` with ${piece}${originPhrase(move)}`;
  } else if (move.piece === 'p') {
    text = `${voice.subject} ${voice.advance} ${piece} to ${move.to}`;
  } else {
    text = `${voice.subject} ${voice.move} ${piece}${originPhrase(move)} to ${move.to}`;
  }

  if (move.promotion) {
    text += `, ${voice.promote} to a ${PIECE_NAMES[move.promotion]}`;
  }

  return text + endingOf(board);
}

/**
 * Short phrase for a candidate that may not be legal, e.g. "knight to f3"
 * or "castle kingside". Used in retry prompts.
 */
export function describeMoveInputPhrase(input: MoveInput): string {
  if (typeof input !== 'string') {
    return `${input.from} to ${input.to}`;
  }

  const shape = parseSanShape(input);
  if (!shape) {
    return input.trim();
  }
  if (shape.kind === 'castle') {
    return `castle ${shape.side}`;
  }

  const phrase = `${PIECE_NAMES[shape.piece]} ${shape.capture ? 'takes' : 'to'} ${shape.to}`;
  return shape.promotion ? `${phrase} promoting to a ${PIECE_NAMES[shape.promotion]}` : phrase;
}
