import {
  budgetExhaustedLine,
  drawDeclinedLine,
  drawOfferLine,
  gameEndLine,
  illegalMovePrompt,
  retryPrompt,
  welcomeLine,
} from '../../../src/shared/engine/personaLines';
import {
  CaptureError,
  EngineError,
  IllegalMoveError,
  MoveParseError,
  TranscriptionError,
} from '../../../src/shared/errors';

describe('personaLines', () => {
  describe('welcomeLine', () => {
    it('invites the human to move first when they play white', () => {
      expect(welcomeLine('pve', 'white', 'Magnus')).toBe(
        'Welcome to Voice Chess! This is Magnus speaking. Do you want to play a game? ' +
          "Begin by saying your moves out loud. I'll let you go first."
      );
    });

    it('announces the engine moves first when the human plays black', () => {
      expect(welcomeLine('pve', 'black', 'Judit')).toMatch(/This is Judit speaking\..*I'll go first\.$/);
    });

    it('addresses both players in PvP', () => {
      expect(welcomeLine('pvp', 'white', 'Magnus')).toBe(
        'Welcome to Voice Chess! This is Magnus speaking. ' +
          'You guys can start playing your game by saying your moves out loud.'
      );
    });
  });

  describe('gameEndLine', () => {
    it('is empty while the game continues', () => {
      expect(gameEndLine('pve', { kind: 'ongoing' }, 'white')).toBe('');
    });

    it('congratulates or gloats in PvE', () => {
      expect(gameEndLine('pve', { kind: 'checkmate', winner: 'white' }, 'white')).toBe(
        'Congratulations, you win!'
      );
      expect(gameEndLine('pve', { kind: 'checkmate', winner: 'white' }, 'black')).toBe(
        'I win! Better luck next time.'
      );
    });

    it('names the winning colour in PvP', () => {
      expect(gameEndLine('pvp', { kind: 'checkmate', winner: 'white' }, 'white')).toBe(
        'White wins! That was a great game.'
      );
      expect(gameEndLine('pvp', { kind: 'checkmate', winner: 'black' }, 'white')).toBe(
        'Black wins! Well played guys.'
      );
    });

    it('names the draw rule', () => {
      expect(gameEndLine('pve', { kind: 'stalemate' }, 'white')).toBe(
        'Stalemate! The game ended in a draw. Well played!'
      );
      expect(gameEndLine('pvp', { kind: 'draw', reason: 'threefold_repetition' }, 'white')).toBe(
        'Threefold repetition! The game ended in a draw. Well played!'
      );
      expect(gameEndLine('pve', { kind: 'draw', reason: 'insufficient_material' }, 'white')).toBe(
        'Neither side can checkmate! The game ended in a draw. Well played!'
      );
    });

    it('reacts to a draw by agreement', () => {
      expect(gameEndLine('pve', { kind: 'draw', reason: 'agreement' }, 'white')).toBe(
        "I'll accept a draw. Good game!"
      );
      expect(gameEndLine('pvp', { kind: 'draw', reason: 'agreement' }, 'white')).toBe(
        "I'm surprised you accepted the draw. There was so much life left in the game!"
      );
    });

    it('reacts to resignation', () => {
      expect(gameEndLine('pve', { kind: 'resigned', player: 'black' }, 'black')).toBe(
        'You resigned. I win!'
      );
      expect(gameEndLine('pvp', { kind: 'resigned', player: 'black' }, 'white')).toBe(
        'Black resigned! You should have kept on fighting.'
      );
    });
  });

  describe('draw lines', () => {
    it('asks the other player to respond to an offer', () => {
      expect(drawOfferLine('black')).toBe('Black offers a draw. White, do you accept?');
    });

    it('speaks a declined offer per mode', () => {
      expect(drawDeclinedLine('pve')).toBe("I decline your draw offer. Let's continue.");
      expect(drawDeclinedLine('pvp')).toBe("The draw offer was declined. Let's continue.");
    });
  });

  describe('retryPrompt', () => {
    it('repeats an illegal move back to the player', () => {
      expect(retryPrompt(new IllegalMoveError('Qh5'))).toBe(
        "Did you try to play queen to h5? That isn't a legal move. Please try again."
      );
      expect(illegalMovePrompt({ from: 'e2', to: 'e5' })).toBe(
        "Did you try to play e2 to e5? That isn't a legal move. Please try again."
      );
    });

    it('asks which piece for an ambiguous SAN move', () => {
      expect(retryPrompt(new IllegalMoveError('Nd2', 'ambiguous'))).toBe(
        'More than one piece can play knight to d2. Please say which one.'
      );
    });

    it('covers parse, capture and transcription failures', () => {
      expect(retryPrompt(new MoveParseError('ambiguous', 'knight to d2', ['Nbd2', 'Nfd2']))).toBe(
        'That could be more than one move. Please say which piece you want to move.'
      );
      expect(retryPrompt(new MoveParseError('unrecognized', 'banana'))).toBe(
        "Sorry, I didn't catch a move. Please try again."
      );
      expect(retryPrompt(new CaptureError('no_speech_detected'))).toBe(
        "I didn't hear anything. Please say your move."
      );
      expect(retryPrompt(new TranscriptionError('timeout'))).toBe(
        "I couldn't understand that. Please repeat your move."
      );
      expect(retryPrompt(new EngineError('no_move'))).toBe('Something went wrong. Please try again.');
    });
  });

  describe('budgetExhaustedLine', () => {
    it('mentions typing only when manual entry is on', () => {
      expect(budgetExhaustedLine(false)).toBe(
        "I still couldn't understand your move. Let's start this turn over."
      );
      expect(budgetExhaustedLine(true)).toBe(
        "I still couldn't understand your move. Let's start this turn over. Please type your move instead."
      );
    });
  });
});
