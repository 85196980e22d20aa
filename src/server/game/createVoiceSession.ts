import { ChessGameState } from '../../shared/engine/ChessGameState';
import { SeededRNG } from '../../shared/utils/rng';
import type { AppConfig } from '../config';
import { CommandAudioInput, CommandAudioPlayer } from '../audio/devices';
import { CommentaryServiceClient } from '../services/CommentaryServiceClient';
import { SynthesisServiceClient } from '../services/SynthesisServiceClient';
import { TranscriptionServiceClient } from '../services/TranscriptionServiceClient';
import { logger } from '../utils/logger';
import { UciEngine } from './ai/UciEngine';
import { MoveResolver } from './MoveResolver';
import { ResponseComposer } from './ResponseComposer';
import type { SessionConfig } from './SessionConfig';
import { SpeechOutput } from './SpeechOutput';
import { type ManualInput, TurnCoordinator, type TurnCoordinatorHooks } from './TurnCoordinator';
import { VoiceCapture } from './VoiceCapture';

export interface VoiceSession {
  game: ChessGameState;
  coordinator: TurnCoordinator;
  /** Releases the engine process. */
  close(): void;
}

export interface VoiceSessionOptions {
  app: Readonly<AppConfig>;
  session: SessionConfig;
  engine?: { path: string; skill: number };
  manualInput?: ManualInput;
  hooks?: TurnCoordinatorHooks;
}

/**
 * Wires the real collaborators (microphone, speaker, HTTP services, UCI
 * engine) into a coordinator for one session.
 */
export function createVoiceSession(options: VoiceSessionOptions): VoiceSession {
  const { app, session } = options;

  const game = new ChessGameState(session.startFen !== undefined ? { fen: session.startFen } : {});
  const rng = new SeededRNG(session.seed);

  const capture = new VoiceCapture(
    new CommandAudioInput(app.capture.inputCommand ? { command: app.capture.inputCommand } : {}),
    { sampleRate: app.capture.sampleRate }
  );

  const speech = new SpeechOutput(
    new SynthesisServiceClient(),
    new CommandAudioPlayer(app.capture.player ? { command: app.capture.player } : {}),
    { voiceRefs: app.synthesis.voiceRefs, seed: session.seed }
  );

  const composer = new ResponseComposer(
    session.commentaryEnabled ? new CommentaryServiceClient() : null,
    {
      mode: session.mode,
      humanColor: session.humanColor,
      personaName: session.personaName,
      commentaryEnabled: session.commentaryEnabled,
      commentaryProbability: session.commentaryProbability,
      commentaryTimeoutMs: app.commentary.timeoutMs,
      rng,
    }
  );

  const engineSettings = options.engine ?? { path: app.engine.path, skill: app.engine.skill };
  const engine = session.mode === 'pve' ? new UciEngine(engineSettings) : undefined;

  const coordinator = new TurnCoordinator({
    config: session,
    game,
    capture,
    resolver: new MoveResolver(new TranscriptionServiceClient(), game),
    composer,
    speech,
    rng,
    ...(engine && { engine }),
    ...(options.manualInput && { manualInput: options.manualInput }),
    ...(options.hooks && { hooks: options.hooks }),
  });

  logger.info('Voice session created', {
    mode: session.mode,
    humanColor: session.humanColor,
    retryBudget: session.retryBudget,
    commentary: session.commentaryEnabled,
    seed: session.seed,
  });

  return {
    game,
    coordinator,
    close: () => engine?.close(),
  };
}
