import type { GameMode, GameOutcome, MoveInput, PlayerColor } from '../types/game';
import { colorName, opponentOf } from '../types/game';
import {
  CaptureError,
  IllegalMoveError,
  MoveParseError,
  TranscriptionError,
  type VoiceChessError,
} from '../errors';
import { describeMoveInputPhrase } from './moveDescription';

// Fixed lines spoken by the persona outside of move descriptions.

export function welcomeLine(mode: GameMode, humanColor: PlayerColor, personaName: string): string {
  const greeting = `Welcome to Voice Chess! This is ${personaName} speaking.`;
  if (mode === 'pvp') {
    return `${greeting} You guys can start playing your game by saying your moves out loud.`;
  }
  const opener = humanColor === 'white' ? "I'll let you go first." : "I'll go first.";
  return `${greeting} Do you want to play a game? Begin by saying your moves out loud. ${opener}`;
}

const DRAW_REASON_PREFIX: Readonly<Record<string, string>> = {
  stalemate: 'Stalemate! ',
  threefold_repetition: 'Threefold repetition! ',
  fifty_move_rule: 'Fifty moves without a capture or pawn move! ',
  insufficient_material: 'Neither side can checkmate! ',
};

const NEUTRAL_DRAW = 'The game ended in a draw. Well played!';

/**
 * Announcement for a finished game. In PvE, `humanColor` decides who "you"
 * is; in PvP both players are addressed by colour.
 */
export function gameEndLine(mode: GameMode, outcome: GameOutcome, humanColor: PlayerColor): string {
  switch (outcome.kind) {
    case 'ongoing':
      return '';
    case 'checkmate':
      if (mode === 'pvp') {
        return outcome.winner === 'white'
          ? 'White wins! That was a great game.'
          : 'Black wins! Well played guys.';
      }
      return outcome.winner === humanColor
        ? 'Congratulations, you win!'
        : 'I win! Better luck next time.';
    case 'stalemate':
      return DRAW_REASON_PREFIX.stalemate + NEUTRAL_DRAW;
    case 'draw':
      if (outcome.reason === 'agreement') {
        return mode === 'pvp'
          ? "I'm surprised you accepted the draw. There was so much life left in the game!"
          : "I'll accept a draw. Good game!";
      }
      return DRAW_REASON_PREFIX[outcome.reason] + NEUTRAL_DRAW;
    case 'resigned':
      if (mode === 'pvp') {
        return outcome.player === 'white'
          ? 'White resigned! That was pathetic.'
          : 'Black resigned! You should have kept on fighting.';
      }
      return outcome.player === humanColor
        ? 'You resigned. I win!'
        : 'I resign. Congratulations, you win!';
  }
}

export function drawOfferLine(offerer: PlayerColor): string {
  return `${colorName(offerer)} offers a draw. ${colorName(opponentOf(offerer))}, do you accept?`;
}

export function drawDeclinedLine(mode: GameMode): string {
  return mode === 'pve'
    ? "I decline your draw offer. Let's continue."
    : "The draw offer was declined. Let's continue.";
}

export function drawResponseExpectedLine(): string {
  return 'Please say accept or decline.';
}

export function illegalMovePrompt(input: MoveInput): string {
  return `Did you try to play ${describeMoveInputPhrase(input)}? That isn't a legal move. Please try again.`;
}

/** Prompt spoken after a failed attempt, before listening again. */
export function retryPrompt(error: VoiceChessError): string {
  if (error instanceof IllegalMoveError) {
    return error.reason === 'ambiguous'
      ? `More than one piece can play ${describeMoveInputPhrase(error.input)}. Please say which one.`
      : illegalMovePrompt(error.input);
  }
  if (error instanceof MoveParseError) {
    return error.kind === 'ambiguous'
      ? 'That could be more than one move. Please say which piece you want to move.'
      : "Sorry, I didn't catch a move. Please try again.";
  }
  if (error instanceof CaptureError) {
    return "I didn't hear anything. Please say your move.";
  }
  if (error instanceof TranscriptionError) {
    return "I couldn't understand that. Please repeat your move.";
  }
  return 'Something went wrong. Please try again.';
}

export function budgetExhaustedLine(manualFallback: boolean): string {
  const line = "I still couldn't understand your move. Let's start this turn over.";
  return manualFallback ? `${line} Please type your move instead.` : line;
}
