/**
 * Centralized error code catalog for the voice-turn pipeline.
 * All error codes follow the format: CATEGORY_SPECIFIC_ERROR
 *
 * Categories:
 * - CAPTURE: Microphone / utterance capture
 * - TRANSCRIPTION: Remote speech-to-move service
 * - MOVE: Parsing and legality of candidate moves
 * - TURN: Per-turn resolution budget
 * - PLAYBACK: Remote synthesis and speaker playback
 * - ENGINE: Chess-playing engine process
 * - CONFIG: Session and environment configuration
 */

export const ErrorCodes = {
  // ============================================================================
  // Capture Errors (CAPTURE_*)
  // ============================================================================
  /** Listening window closed without a voiced segment */
  CAPTURE_NO_SPEECH_DETECTED: 'CAPTURE_NO_SPEECH_DETECTED',
  /** Microphone could not be opened or stopped delivering audio */
  CAPTURE_DEVICE_ERROR: 'CAPTURE_DEVICE_ERROR',

  // ============================================================================
  // Transcription Errors (TRANSCRIPTION_*)
  // ============================================================================
  /** Service unreachable, non-2xx, or malformed response body */
  TRANSCRIPTION_SERVICE_UNAVAILABLE: 'TRANSCRIPTION_SERVICE_UNAVAILABLE',
  /** Service did not answer inside the configured timeout */
  TRANSCRIPTION_TIMEOUT: 'TRANSCRIPTION_TIMEOUT',

  // ============================================================================
  // Move Errors (MOVE_*)
  // ============================================================================
  /** Text does not describe a move or a session command */
  MOVE_UNRECOGNIZED: 'MOVE_UNRECOGNIZED',
  /** Phrasing matches more than one legal move */
  MOVE_AMBIGUOUS: 'MOVE_AMBIGUOUS',
  /** Move is not in the current legal-move set */
  MOVE_ILLEGAL: 'MOVE_ILLEGAL',

  // ============================================================================
  // Turn Errors (TURN_*)
  // ============================================================================
  /** Every attempt of the turn failed */
  TURN_BUDGET_EXHAUSTED: 'TURN_BUDGET_EXHAUSTED',

  // ============================================================================
  // Playback Errors (PLAYBACK_*)
  // ============================================================================
  /** Synthesis service failed or returned no audio */
  PLAYBACK_SYNTHESIS_UNAVAILABLE: 'PLAYBACK_SYNTHESIS_UNAVAILABLE',
  /** Speaker / player process unavailable */
  PLAYBACK_DEVICE_ERROR: 'PLAYBACK_DEVICE_ERROR',

  // ============================================================================
  // Engine Errors (ENGINE_*)
  // ============================================================================
  /** Engine process failed to start or crashed */
  ENGINE_UNAVAILABLE: 'ENGINE_UNAVAILABLE',
  /** Engine returned no move or an unusable one */
  ENGINE_NO_MOVE: 'ENGINE_NO_MOVE',

  // ============================================================================
  // Configuration Errors (CONFIG_*)
  // ============================================================================
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Default human-readable messages, used when an error is raised without one.
 */
export const ErrorCodeMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CAPTURE_NO_SPEECH_DETECTED]: 'No speech was detected',
  [ErrorCodes.CAPTURE_DEVICE_ERROR]: 'The microphone is unavailable',
  [ErrorCodes.TRANSCRIPTION_SERVICE_UNAVAILABLE]: 'The transcription service is unavailable',
  [ErrorCodes.TRANSCRIPTION_TIMEOUT]: 'The transcription service timed out',
  [ErrorCodes.MOVE_UNRECOGNIZED]: 'No move was recognized',
  [ErrorCodes.MOVE_AMBIGUOUS]: 'The move matches more than one legal move',
  [ErrorCodes.MOVE_ILLEGAL]: 'The move is not legal in this position',
  [ErrorCodes.TURN_BUDGET_EXHAUSTED]: 'No legal move was resolved within the attempt budget',
  [ErrorCodes.PLAYBACK_SYNTHESIS_UNAVAILABLE]: 'The speech synthesis service is unavailable',
  [ErrorCodes.PLAYBACK_DEVICE_ERROR]: 'The audio output device is unavailable',
  [ErrorCodes.ENGINE_UNAVAILABLE]: 'The chess engine is unavailable',
  [ErrorCodes.ENGINE_NO_MOVE]: 'The chess engine did not return a move',
  [ErrorCodes.CONFIG_INVALID]: 'Invalid configuration',
};

/**
 * Codes the turn loop recovers from by re-prompting within the budget.
 */
export const RecoverableErrorCodes: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCodes.CAPTURE_NO_SPEECH_DETECTED,
  ErrorCodes.TRANSCRIPTION_SERVICE_UNAVAILABLE,
  ErrorCodes.TRANSCRIPTION_TIMEOUT,
  ErrorCodes.MOVE_UNRECOGNIZED,
  ErrorCodes.MOVE_AMBIGUOUS,
  ErrorCodes.MOVE_ILLEGAL,
]);

export function isRecoverableCode(code: ErrorCode): boolean {
  return RecoverableErrorCodes.has(code);
}
