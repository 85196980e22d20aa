import type {
  AppliedMove,
  AudioBuffer,
  GameOutcome,
  PlayerColor,
  SessionCommand,
  SpeakerRole,
  Utterance,
} from '../../shared/types/game';
import { colorName, opponentOf } from '../../shared/types/game';
import {
  CaptureError,
  EngineError,
  PlaybackError,
  VoiceChessError,
  isDeviceError,
} from '../../shared/errors';
import type { ChessGameState } from '../../shared/engine/ChessGameState';
import {
  type AbortReason,
  type InputChannel,
  type ResolvingMoveState,
  type TurnEvent,
  TurnMachine,
  type TurnState,
  awaitPlayerInput,
  isTerminalTurnState,
  queryEngine,
} from '../../shared/stateMachines/turn';
import {
  type CancellationToken,
  createCancellationSource,
  isCanceledError,
  raceWithCancellation,
} from '../../shared/utils/cancellation';
import { SeededRNG } from '../../shared/utils/rng';
import { logger } from '../utils/logger';
import { recordResolutionAttempt, recordTurn } from '../utils/voiceMetrics';
import { type ChessEngine, uciToMoveTriple } from './ai/UciEngine';
import type { MoveResolver, Resolution } from './MoveResolver';
import type { ResponseComposer } from './ResponseComposer';
import type { SessionConfig } from './SessionConfig';

export interface UtteranceSource {
  listen(maxDurationMs: number, silenceTimeoutMs: number, token?: CancellationToken): Promise<AudioBuffer>;
}

export interface Speaker {
  speak(text: string, role: SpeakerRole, token?: CancellationToken): Promise<void>;
}

/** Typed input, used instead of the microphone after a turn runs out of attempts. */
export interface ManualInput {
  readLine(prompt: string, token?: CancellationToken): Promise<string>;
}

export interface TurnCoordinatorHooks {
  onTransition?: (from: TurnState, to: TurnState, event: TurnEvent) => void;
  onUtterance?: (utterance: Utterance) => void;
  onBoardChanged?: (applied: AppliedMove) => void;
}

export interface TurnCoordinatorDeps {
  config: SessionConfig;
  game: ChessGameState;
  capture: UtteranceSource;
  resolver: MoveResolver;
  composer: ResponseComposer;
  speech: Speaker;
  engine?: ChessEngine;
  manualInput?: ManualInput;
  rng?: SeededRNG;
  hooks?: TurnCoordinatorHooks;
}

export type TurnOutcome =
  | { kind: 'turn_complete'; applied: AppliedMove }
  | { kind: 'game_over'; outcome: GameOutcome }
  | { kind: 'aborted'; reason: AbortReason };

export type SessionResult =
  | { kind: 'game_over'; outcome: GameOutcome; moves: string }
  | { kind: 'aborted'; reason: AbortReason; moves: string };

const USER_ABORT: AbortReason = { kind: 'user_abort' };

/**
 * Drives a PvE or PvP session turn by turn.
 *
 * Each turn runs its own {@link TurnMachine}; this class performs the side
 * effects each state asks for (listening, resolving, engine search, applying,
 * composing, speaking) and reports the results back as events. Every
 * awaited stage observes the session's cancellation token, so `abort()`
 * abandons whatever is in flight and its late result is discarded.
 */
export class TurnCoordinator {
  private readonly cancellation = createCancellationSource();
  private readonly rng: SeededRNG;
  private machine: TurnMachine | null = null;

  constructor(private readonly deps: TurnCoordinatorDeps) {
    this.rng = deps.rng ?? new SeededRNG(deps.config.seed);
  }

  get token(): CancellationToken {
    return this.cancellation.token;
  }

  /** State of the turn in progress, or null between turns. */
  get currentState(): TurnState | null {
    return this.machine?.state ?? null;
  }

  abort(): void {
    if (!this.cancellation.token.isCanceled) {
      logger.info('Session abort requested');
    }
    this.cancellation.cancel(USER_ABORT);
  }

  /**
   * Plays turns until the game ends or the session is aborted. A turn that
   * runs out of attempts is restarted for the same player.
   */
  async run(): Promise<SessionResult> {
    const { game, composer, config } = this.deps;

    const welcome = await this.speakLine(composer.welcome());
    if (welcome) {
      return this.finishAborted(welcome);
    }

    let channel: InputChannel = 'voice';
    for (;;) {
      const status = game.isTerminal();
      if (status.terminal) {
        return this.finishGame(status.outcome);
      }

      const player = game.sideToMove();
      const outcome = await this.playTurn(this.initialState(player, channel));
      channel = 'voice';

      if (outcome.kind === 'turn_complete') {
        recordTurn('completed');
        continue;
      }
      if (outcome.kind === 'game_over') {
        recordTurn('game_over');
        return this.finishGame(outcome.outcome);
      }

      const { reason } = outcome;
      if (reason.kind !== 'budget_exhausted') {
        recordTurn('aborted');
        return this.finishAborted(reason);
      }

      recordTurn('budget_exhausted');
      logger.warn('Turn abandoned after exhausting its attempts', {
        player: reason.player,
        attempts: reason.error.attempts,
        lastError: reason.error.lastError?.code,
      });

      const offerer = game.pendingDrawOffer();
      if (offerer !== null) {
        // An unanswered offer lapses and the offerer is still to move.
        game.declineDraw(opponentOf(offerer));
      }

      const useText = config.manualEntryFallback && this.deps.manualInput !== undefined;
      const interrupted = await this.speakLine(composer.budgetExhausted(useText));
      if (interrupted) {
        return this.finishAborted(interrupted);
      }
      channel = useText ? 'text' : 'voice';
    }
  }

  /** Runs one turn from `initial` to a terminal turn state. */
  async playTurn(initial: TurnState): Promise<TurnOutcome> {
    const machine = new TurnMachine(initial, (from, to, event) => {
      logger.debug('Turn transition', { from: from.kind, to: to.kind, event: event.type });
      this.deps.hooks?.onTransition?.(from, to, event);
    });
    this.machine = machine;

    try {
      while (!isTerminalTurnState(machine.state)) {
        if (this.token.isCanceled) {
          machine.send({ type: 'ABORT', reason: USER_ABORT });
          break;
        }
        try {
          await this.step(machine);
        } catch (error) {
          const reason = this.abortReasonFor(error);
          if (!reason) {
            throw error;
          }
          if (!isTerminalTurnState(machine.state)) {
            machine.send({ type: 'ABORT', reason });
          }
        }
      }
      return this.outcomeOf(machine.state);
    } finally {
      this.machine = null;
    }
  }

  initialState(player: PlayerColor, channel: InputChannel = 'voice'): TurnState {
    const { config } = this.deps;
    if (config.mode === 'pve' && player !== config.humanColor) {
      return queryEngine(player);
    }
    return awaitPlayerInput(player, config.retryBudget, { channel });
  }

  private abortReasonFor(error: unknown): AbortReason | null {
    if (this.token.isCanceled || isCanceledError(error)) {
      return USER_ABORT;
    }
    if (error instanceof VoiceChessError && isDeviceError(error)) {
      logger.error('Audio device failure', { error: error.toReport() });
      return { kind: 'device_error', error };
    }
    if (error instanceof EngineError) {
      logger.error('Engine failure', { error: error.toReport() });
      return { kind: 'engine_failure', error };
    }
    return null;
  }

  private outcomeOf(state: TurnState): TurnOutcome {
    switch (state.kind) {
      case 'turn_complete':
        return { kind: 'turn_complete', applied: state.applied };
      case 'game_over':
        return { kind: 'game_over', outcome: state.outcome };
      case 'aborted':
        return { kind: 'aborted', reason: state.reason };
      default:
        throw new Error(`Turn ended in non-terminal state ${state.kind}`);
    }
  }

  private async step(machine: TurnMachine): Promise<void> {
    const { game, composer, resolver, config } = this.deps;
    const state = machine.state;

    switch (state.kind) {
      case 'awaiting_input': {
        if (state.prompt) {
          await this.speak(state.prompt, this.personaRole());
        }
        if (state.channel === 'text' && this.deps.manualInput) {
          const text = await this.stage(
            'manual_input',
            this.deps.manualInput.readLine(`${colorName(state.player)} move: `, this.token)
          );
          machine.send({ type: 'CAPTURED', utterance: this.inputUtterance({ kind: 'text', text }) });
          return;
        }

        let audio: AudioBuffer;
        try {
          audio = await this.stage(
            'capture',
            this.deps.capture.listen(config.maxCaptureMs, config.silenceTimeoutMs, this.token)
          );
        } catch (error) {
          if (error instanceof CaptureError && error.kind === 'no_speech_detected') {
            recordResolutionAttempt('no_speech');
            machine.send({ type: 'ATTEMPT_FAILED', error, prompt: composer.retryPrompt(error) });
            return;
          }
          throw error;
        }
        machine.send({ type: 'CAPTURED', utterance: this.inputUtterance({ kind: 'audio', audio }) });
        return;
      }

      case 'resolving_move': {
        const context = { player: state.player, expecting: state.expecting };
        const { utterance } = state;
        const resolution =
          utterance.kind === 'audio'
            ? await this.stage('resolving', resolver.resolveAudio(utterance.audio, context, this.token))
            : resolver.resolveText(utterance.text, context);
        this.token.throwIfCanceled('resolving');
        this.onResolution(machine, state, resolution);
        return;
      }

      case 'querying_engine': {
        const { engine } = this.deps;
        if (!engine) {
          throw new EngineError('unavailable', { message: 'No engine configured for PvE' });
        }
        const uci = await this.stage(
          'engine',
          engine.bestMove(game.board().fen, { movetimeMs: config.engineMovetimeMs }, this.token)
        );
        const move = uciToMoveTriple(uci);
        if (!move) {
          throw new EngineError('no_move', { details: { uci } });
        }
        machine.send({ type: 'ENGINE_MOVE', move });
        return;
      }

      case 'applying': {
        const result = game.apply(state.move);
        if (!result.success) {
          logger.warn('Move rejected at apply', { player: state.player, code: result.error.code });
          machine.send({
            type: 'APPLY_REJECTED',
            error: result.error,
            prompt: composer.retryPrompt(result.error),
          });
          return;
        }
        logger.info('Move applied', {
          player: state.player,
          san: result.applied.san,
          fen: result.board.fen,
        });
        this.deps.hooks?.onBoardChanged?.(result.applied);
        machine.send({
          type: 'MOVE_APPLIED',
          applied: result.applied,
          board: result.board,
          role: this.describeRole(state.source),
        });
        return;
      }

      case 'composing': {
        const text = await this.stage(
          'composing',
          composer.compose(state.applied, state.board, state.role, game.turnRecord(), this.token)
        );
        machine.send({ type: 'COMPOSED', text, role: state.role });
        return;
      }

      case 'speaking': {
        await this.speak(state.text, state.role);
        const status = game.isTerminal();
        machine.send(status.terminal ? { type: 'SPOKEN', outcome: status.outcome } : { type: 'SPOKEN' });
        return;
      }

      default:
        return;
    }
  }

  private onResolution(machine: TurnMachine, state: ResolvingMoveState, resolution: Resolution): void {
    const { composer } = this.deps;

    switch (resolution.kind) {
      case 'failed':
        machine.send({
          type: 'ATTEMPT_FAILED',
          error: resolution.error,
          ...(resolution.transcription !== undefined && { transcription: resolution.transcription }),
          prompt:
            state.expecting === 'draw_response'
              ? composer.drawResponseExpected()
              : composer.retryPrompt(resolution.error),
        });
        return;
      case 'move':
        machine.send({ type: 'MOVE_RESOLVED', move: resolution.input });
        return;
      case 'command':
        machine.send(this.applyCommand(state.player, resolution.command));
        return;
    }
  }

  /** Applies a session command to the game and returns the event it produces. */
  private applyCommand(player: PlayerColor, command: SessionCommand): TurnEvent {
    const { game, composer, config } = this.deps;

    switch (command) {
      case 'resign':
        game.resign(player);
        logger.info('Player resigned', { player });
        return { type: 'GAME_ENDED', outcome: game.isTerminal().outcome };

      case 'offer_draw': {
        game.offerDraw(player);
        logger.info('Draw offered', { player });
        if (config.mode === 'pvp') {
          return {
            type: 'DRAW_OFFERED',
            respondent: opponentOf(player),
            prompt: composer.drawOffered(player),
          };
        }
        const engineColor = opponentOf(player);
        if (this.rng.chance(config.drawAcceptProbability)) {
          game.acceptDraw(engineColor);
          return { type: 'GAME_ENDED', outcome: game.isTerminal().outcome };
        }
        game.declineDraw(engineColor);
        return { type: 'DRAW_DECLINED', player, prompt: composer.drawDeclined() };
      }

      case 'accept_draw':
        game.acceptDraw(player);
        logger.info('Draw accepted', { player });
        return { type: 'GAME_ENDED', outcome: game.isTerminal().outcome };

      case 'decline_draw':
        game.declineDraw(player);
        logger.info('Draw declined', { player });
        return {
          type: 'DRAW_DECLINED',
          player: opponentOf(player),
          prompt: composer.drawDeclined(),
        };
    }
  }

  /**
   * Awaits one stage, giving up as soon as the session is canceled. A result
   * that arrives afterwards is logged and dropped.
   */
  private stage<T>(name: string, promise: Promise<T>): Promise<T> {
    return raceWithCancellation(promise, this.token, (late) => {
      logger.debug('Discarded late stage result', {
        stage: name,
        failed: late.error !== undefined,
      });
    });
  }

  /**
   * Speaks through the output stage. Synthesis failures are logged and the
   * turn carries on; device failures and cancellation propagate.
   */
  private async speak(text: string, role: SpeakerRole): Promise<void> {
    this.deps.hooks?.onUtterance?.({ kind: 'text', direction: 'output', role, text });
    try {
      await this.stage('speaking', this.deps.speech.speak(text, role, this.token));
    } catch (error) {
      if (error instanceof PlaybackError && error.kind === 'synthesis_unavailable') {
        logger.warn('Speech synthesis unavailable, continuing without audio', {
          role,
          error: error.toReport(),
        });
        return;
      }
      throw error;
    }
  }

  /** Speaks a session-level line. Returns the abort reason when the line could not be spoken. */
  private async speakLine(text: string): Promise<AbortReason | null> {
    try {
      await this.speak(text, this.personaRole());
      return null;
    } catch (error) {
      const reason = this.abortReasonFor(error);
      if (!reason) {
        throw error;
      }
      return reason;
    }
  }

  private async finishGame(outcome: GameOutcome): Promise<SessionResult> {
    logger.info('Game over', { outcome, moves: this.deps.game.moveList() });
    const interrupted = await this.speakLine(this.deps.composer.gameEnd(outcome));
    if (interrupted) {
      return this.finishAborted(interrupted);
    }
    return { kind: 'game_over', outcome, moves: this.deps.game.moveList() };
  }

  private finishAborted(reason: AbortReason): SessionResult {
    if (reason.kind === 'user_abort') {
      logger.info('Session stopped by the user');
    } else {
      logger.error('Session aborted', { reason: reason.kind });
    }
    return { kind: 'aborted', reason, moves: this.deps.game.moveList() };
  }

  private inputUtterance(
    content: { kind: 'audio'; audio: AudioBuffer } | { kind: 'text'; text: string }
  ): Utterance {
    const utterance: Utterance =
      content.kind === 'audio'
        ? { kind: 'audio', direction: 'input', role: 'player', audio: content.audio }
        : { kind: 'text', direction: 'input', role: 'player', text: content.text };
    this.deps.hooks?.onUtterance?.(utterance);
    return utterance;
  }

  private personaRole(): SpeakerRole {
    return this.deps.config.mode === 'pvp' ? 'commentator' : 'engine';
  }

  private describeRole(source: 'player' | 'engine'): SpeakerRole {
    if (source === 'engine') return 'engine';
    return this.deps.config.mode === 'pvp' ? 'commentator' : 'player';
  }
}
