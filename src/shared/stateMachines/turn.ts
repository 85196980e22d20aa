/**
 * Per-turn state machine for the voice pipeline.
 *
 * A machine is created at the start of each turn (player or engine) and
 * ends in `turn_complete`, `game_over` or `aborted`. The coordinator performs
 * the side effects of each state and reports what happened as an event;
 * {@link transition} is pure and never touches GameState.
 *
 *   awaiting_input ─CAPTURED→ resolving_move ─MOVE_RESOLVED→ applying
 *   querying_engine ─ENGINE_MOVE→ applying ─MOVE_APPLIED→ composing
 *   composing ─COMPOSED→ speaking ─SPOKEN→ turn_complete | game_over
 *
 * `SPOKEN` carries the outcome when the applied move ended the game.
 * Failed attempts loop back to `awaiting_input` until the budget is used,
 * then end in `aborted{budget_exhausted}`.
 */

import type {
  AppliedMove,
  BoardSnapshot,
  GameOutcome,
  MoveInput,
  PlayerColor,
  SpeakerRole,
  Utterance,
} from '../types/game';
import { TurnResolutionError, type VoiceChessError } from '../errors';

export type InputChannel = 'voice' | 'text';

/** What the awaited player may say: a move, or only accept/decline. */
export type InputExpectation = 'move' | 'draw_response';

export interface TurnAttempt {
  /** Failed attempts so far. */
  readonly attempts: number;
  readonly budget: number;
  readonly lastTranscription?: string;
  readonly lastError?: VoiceChessError;
}

export function startTurnAttempt(budget: number): TurnAttempt {
  return { attempts: 0, budget };
}

export function recordAttemptFailure(
  attempt: TurnAttempt,
  error: VoiceChessError,
  transcription?: string
): TurnAttempt {
  const lastTranscription = transcription ?? attempt.lastTranscription;
  return {
    attempts: attempt.attempts + 1,
    budget: attempt.budget,
    lastError: error,
    ...(lastTranscription !== undefined && { lastTranscription }),
  };
}

export function isBudgetExhausted(attempt: TurnAttempt): boolean {
  return attempt.attempts >= attempt.budget;
}

export type AbortReason =
  | { kind: 'budget_exhausted'; player: PlayerColor; error: TurnResolutionError }
  | { kind: 'user_abort' }
  | { kind: 'device_error'; error: VoiceChessError }
  | { kind: 'engine_failure'; error: VoiceChessError };

export interface AwaitingInputState {
  kind: 'awaiting_input';
  player: PlayerColor;
  expecting: InputExpectation;
  channel: InputChannel;
  attempt: TurnAttempt;
  /** Spoken before listening: a retry prompt or a draw-offer line. */
  prompt?: string;
}

export interface ResolvingMoveState {
  kind: 'resolving_move';
  player: PlayerColor;
  expecting: InputExpectation;
  channel: InputChannel;
  attempt: TurnAttempt;
  utterance: Utterance;
}

export interface QueryingEngineState {
  kind: 'querying_engine';
  player: PlayerColor;
}

export type ApplyingState =
  | {
      kind: 'applying';
      source: 'player';
      player: PlayerColor;
      move: MoveInput;
      channel: InputChannel;
      attempt: TurnAttempt;
    }
  | { kind: 'applying'; source: 'engine'; player: PlayerColor; move: MoveInput };

export interface ComposingState {
  kind: 'composing';
  player: PlayerColor;
  applied: AppliedMove;
  board: BoardSnapshot;
  role: SpeakerRole;
}

export interface SpeakingState {
  kind: 'speaking';
  player: PlayerColor;
  applied: AppliedMove;
  text: string;
  role: SpeakerRole;
}

export interface TurnCompleteState {
  kind: 'turn_complete';
  player: PlayerColor;
  applied: AppliedMove;
}

export interface GameOverState {
  kind: 'game_over';
  outcome: GameOutcome;
}

export interface AbortedState {
  kind: 'aborted';
  reason: AbortReason;
}

export type TurnState =
  | AwaitingInputState
  | ResolvingMoveState
  | QueryingEngineState
  | ApplyingState
  | ComposingState
  | SpeakingState
  | TurnCompleteState
  | GameOverState
  | AbortedState;

export type TurnEvent =
  | { type: 'CAPTURED'; utterance: Utterance }
  | { type: 'ATTEMPT_FAILED'; error: VoiceChessError; transcription?: string; prompt: string }
  | { type: 'MOVE_RESOLVED'; move: MoveInput }
  | { type: 'ENGINE_MOVE'; move: MoveInput }
  | { type: 'MOVE_APPLIED'; applied: AppliedMove; board: BoardSnapshot; role: SpeakerRole }
  | { type: 'APPLY_REJECTED'; error: VoiceChessError; prompt: string }
  | { type: 'COMPOSED'; text: string; role: SpeakerRole }
  | { type: 'SPOKEN'; outcome?: GameOutcome }
  | { type: 'GAME_ENDED'; outcome: GameOutcome }
  | { type: 'DRAW_OFFERED'; respondent: PlayerColor; prompt: string }
  | { type: 'DRAW_DECLINED'; player: PlayerColor; prompt: string }
  | { type: 'ABORT'; reason: AbortReason };

export type TransitionErrorCode = 'INVALID_EVENT' | 'TERMINAL_STATE';

export interface TransitionError {
  code: TransitionErrorCode;
  message: string;
  currentState: TurnState['kind'];
  eventType: TurnEvent['type'];
}

export type TransitionResult =
  | { ok: true; state: TurnState }
  | { ok: false; error: TransitionError };

export function awaitPlayerInput(
  player: PlayerColor,
  budget: number,
  options: { channel?: InputChannel; expecting?: InputExpectation; prompt?: string } = {}
): AwaitingInputState {
  return {
    kind: 'awaiting_input',
    player,
    expecting: options.expecting ?? 'move',
    channel: options.channel ?? 'voice',
    attempt: startTurnAttempt(budget),
    ...(options.prompt !== undefined && { prompt: options.prompt }),
  };
}

export function queryEngine(player: PlayerColor): QueryingEngineState {
  return { kind: 'querying_engine', player };
}

export function isTerminalTurnState(
  state: TurnState
): state is TurnCompleteState | GameOverState | AbortedState {
  return (
    state.kind === 'turn_complete' || state.kind === 'game_over' || state.kind === 'aborted'
  );
}

function ok(state: TurnState): TransitionResult {
  return { ok: true, state };
}

function invalid(state: TurnState, event: TurnEvent): TransitionResult {
  return {
    ok: false,
    error: {
      code: isTerminalTurnState(state) ? 'TERMINAL_STATE' : 'INVALID_EVENT',
      message: `Event ${event.type} is not valid in state ${state.kind}`,
      currentState: state.kind,
      eventType: event.type,
    },
  };
}

/**
 * Records a failed attempt and either re-prompts the same player or, with
 * the budget used, aborts the turn with the last error attached.
 */
function failAttempt(
  state: { player: PlayerColor; expecting: InputExpectation; channel: InputChannel; attempt: TurnAttempt },
  error: VoiceChessError,
  prompt: string,
  transcription?: string
): TurnState {
  const attempt = recordAttemptFailure(state.attempt, error, transcription);
  if (isBudgetExhausted(attempt)) {
    return {
      kind: 'aborted',
      reason: {
        kind: 'budget_exhausted',
        player: state.player,
        error: new TurnResolutionError(attempt.attempts, error),
      },
    };
  }
  return {
    kind: 'awaiting_input',
    player: state.player,
    expecting: state.expecting,
    channel: state.channel,
    attempt,
    prompt,
  };
}

export function transition(state: TurnState, event: TurnEvent): TransitionResult {
  if (isTerminalTurnState(state)) {
    return invalid(state, event);
  }

  if (event.type === 'ABORT') {
    return ok({ kind: 'aborted', reason: event.reason });
  }

  switch (state.kind) {
    case 'awaiting_input':
      if (event.type === 'CAPTURED') {
        return ok({
          kind: 'resolving_move',
          player: state.player,
          expecting: state.expecting,
          channel: state.channel,
          attempt: state.attempt,
          utterance: event.utterance,
        });
      }
      if (event.type === 'ATTEMPT_FAILED') {
        return ok(failAttempt(state, event.error, event.prompt, event.transcription));
      }
      return invalid(state, event);

    case 'resolving_move':
      switch (event.type) {
        case 'MOVE_RESOLVED':
          if (state.expecting !== 'move') return invalid(state, event);
          return ok({
            kind: 'applying',
            source: 'player',
            player: state.player,
            move: event.move,
            channel: state.channel,
            attempt: state.attempt,
          });
        case 'ATTEMPT_FAILED':
          return ok(failAttempt(state, event.error, event.prompt, event.transcription));
        case 'GAME_ENDED':
          return ok({ kind: 'game_over', outcome: event.outcome });
        case 'DRAW_OFFERED':
          return ok({
            ...awaitPlayerInput(event.respondent, state.attempt.budget, {
              channel: state.channel,
              expecting: 'draw_response',
            }),
            prompt: event.prompt,
          });
        case 'DRAW_DECLINED':
          return ok(
            awaitPlayerInput(event.player, state.attempt.budget, {
              channel: state.channel,
              prompt: event.prompt,
            })
          );
        default:
          return invalid(state, event);
      }

    case 'querying_engine':
      if (event.type === 'ENGINE_MOVE') {
        return ok({ kind: 'applying', source: 'engine', player: state.player, move: event.move });
      }
      return invalid(state, event);

    case 'applying':
      if (event.type === 'MOVE_APPLIED') {
        return ok({
          kind: 'composing',
          player: state.player,
          applied: event.applied,
          board: event.board,
          role: event.role,
        });
      }
      if (event.type === 'APPLY_REJECTED') {
        if (state.source === 'engine') {
          return ok({ kind: 'aborted', reason: { kind: 'engine_failure', error: event.error } });
        }
        return ok(
          failAttempt(
            { player: state.player, expecting: 'move', channel: state.channel, attempt: state.attempt },
            event.error,
            event.prompt
          )
        );
      }
      return invalid(state, event);

    case 'composing':
      if (event.type === 'COMPOSED') {
        return ok({
          kind: 'speaking',
          player: state.player,
          applied: state.applied,
          text: event.text,
          role: event.role,
        });
      }
      return invalid(state, event);

    case 'speaking':
      if (event.type === 'SPOKEN') {
        if (event.outcome && event.outcome.kind !== 'ongoing') {
          return ok({ kind: 'game_over', outcome: event.outcome });
        }
        return ok({ kind: 'turn_complete', player: state.player, applied: state.applied });
      }
      return invalid(state, event);
  }
}

/**
 * Holds the current state of one turn and applies events through
 * {@link transition}. Invalid events throw: they indicate a coordinator bug.
 */
export class TurnMachine {
  private current: TurnState;

  constructor(
    initial: TurnState,
    private readonly onTransition?: (from: TurnState, to: TurnState, event: TurnEvent) => void
  ) {
    this.current = initial;
  }

  get state(): TurnState {
    return this.current;
  }

  send(event: TurnEvent): TurnState {
    const result = transition(this.current, event);
    if (!result.ok) {
      throw new Error(result.error.message);
    }
    const from = this.current;
    this.current = result.state;
    this.onTransition?.(from, result.state, event);
    return result.state;
  }
}
