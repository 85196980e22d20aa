import { ErrorCode, ErrorCodes, ErrorCodeMessages, isRecoverableCode } from './errorCodes';

/**
 * Structured error report, suitable for logging and for the CLI status line.
 */
export interface VoiceChessErrorReport {
  code: ErrorCode;
  message: string;
  recoverable: boolean;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface VoiceChessErrorOptions {
  code: ErrorCode;
  /** Human-readable message (optional, defaults to message from errorCodes) */
  message?: string;
  details?: Record<string, unknown>;
  /** Original error for internal logging */
  cause?: unknown;
}

/**
 * Base class for every failure the voice-turn pipeline reports.
 *
 * @example
 * ```ts
 * throw new CaptureError('no_speech_detected');
 *
 * try {
 *   await client.post('/transcribe', form);
 * } catch (err) {
 *   throw new TranscriptionError('service_unavailable', { cause: err });
 * }
 * ```
 */
export class VoiceChessError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;

  public readonly details: Record<string, unknown> | undefined;

  /** Whether the turn loop re-prompts instead of giving up */
  public readonly recoverable: boolean;

  public readonly timestamp: Date;

  constructor(options: VoiceChessErrorOptions) {
    super(options.message || ErrorCodeMessages[options.code], { cause: options.cause });

    this.name = 'VoiceChessError';
    this.code = options.code;
    this.details = options.details;
    this.recoverable = isRecoverableCode(options.code);
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toReport(): VoiceChessErrorReport {
    return {
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
    };
  }

  static isVoiceChessError(error: unknown): error is VoiceChessError {
    return error instanceof VoiceChessError;
  }
}

interface SubclassOptions {
  message?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export type CaptureErrorKind = 'no_speech_detected' | 'device_error';

export class CaptureError extends VoiceChessError {
  constructor(
    public readonly kind: CaptureErrorKind,
    options: SubclassOptions = {}
  ) {
    super({
      code:
        kind === 'no_speech_detected'
          ? ErrorCodes.CAPTURE_NO_SPEECH_DETECTED
          : ErrorCodes.CAPTURE_DEVICE_ERROR,
      ...options,
    });
    this.name = 'CaptureError';
  }
}

export type TranscriptionErrorKind = 'service_unavailable' | 'timeout';

export class TranscriptionError extends VoiceChessError {
  constructor(
    public readonly kind: TranscriptionErrorKind,
    options: SubclassOptions = {}
  ) {
    super({
      code:
        kind === 'timeout'
          ? ErrorCodes.TRANSCRIPTION_TIMEOUT
          : ErrorCodes.TRANSCRIPTION_SERVICE_UNAVAILABLE,
      ...options,
    });
    this.name = 'TranscriptionError';
  }
}

export type MoveParseErrorKind = 'unrecognized' | 'ambiguous';

export class MoveParseError extends VoiceChessError {
  constructor(
    public readonly kind: MoveParseErrorKind,
    /** The candidate text that failed to parse. */
    public readonly text: string,
    /** SAN of every legal move that matched, for ambiguous phrasing. */
    public readonly candidates: readonly string[] = []
  ) {
    super({
      code: kind === 'ambiguous' ? ErrorCodes.MOVE_AMBIGUOUS : ErrorCodes.MOVE_UNRECOGNIZED,
      details: { text, ...(candidates.length > 0 && { candidates: [...candidates] }) },
    });
    this.name = 'MoveParseError';
  }
}

/**
 * not_legal: no legal move matches. ambiguous: several legal moves match and
 * the input does not disambiguate. malformed: the input is not a move at all.
 */
export type IllegalMoveReason = 'not_legal' | 'ambiguous' | 'malformed';

export class IllegalMoveError extends VoiceChessError {
  constructor(
    /** The rejected input, rendered as text (SAN or from-to). */
    public readonly input: string,
    public readonly reason: IllegalMoveReason = 'not_legal'
  ) {
    super({
      code: ErrorCodes.MOVE_ILLEGAL,
      message: `Illegal move: ${input}`,
      details: { input, reason },
    });
    this.name = 'IllegalMoveError';
  }
}

export class TurnResolutionError extends VoiceChessError {
  public readonly kind = 'budget_exhausted' as const;

  constructor(
    public readonly attempts: number,
    public readonly lastError: VoiceChessError | undefined
  ) {
    super({
      code: ErrorCodes.TURN_BUDGET_EXHAUSTED,
      details: {
        attempts,
        ...(lastError && { lastErrorCode: lastError.code }),
      },
      cause: lastError,
    });
    this.name = 'TurnResolutionError';
  }
}

export type PlaybackErrorKind = 'synthesis_unavailable' | 'device_error';

export class PlaybackError extends VoiceChessError {
  constructor(
    public readonly kind: PlaybackErrorKind,
    options: SubclassOptions = {}
  ) {
    super({
      code:
        kind === 'synthesis_unavailable'
          ? ErrorCodes.PLAYBACK_SYNTHESIS_UNAVAILABLE
          : ErrorCodes.PLAYBACK_DEVICE_ERROR,
      ...options,
    });
    this.name = 'PlaybackError';
  }
}

export type EngineErrorKind = 'unavailable' | 'no_move';

export class EngineError extends VoiceChessError {
  constructor(
    public readonly kind: EngineErrorKind,
    options: SubclassOptions = {}
  ) {
    super({
      code: kind === 'no_move' ? ErrorCodes.ENGINE_NO_MOVE : ErrorCodes.ENGINE_UNAVAILABLE,
      ...options,
    });
    this.name = 'EngineError';
  }
}

export class ConfigError extends VoiceChessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: ErrorCodes.CONFIG_INVALID, message, ...(details && { details }) });
    this.name = 'ConfigError';
  }
}

/**
 * True for device-level failures, which end the session because no turn can
 * be completed without a microphone or speaker.
 */
export function isDeviceError(error: unknown): boolean {
  return (
    (error instanceof CaptureError && error.kind === 'device_error') ||
    (error instanceof PlaybackError && error.kind === 'device_error')
  );
}
