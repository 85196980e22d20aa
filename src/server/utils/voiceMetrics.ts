import client from 'prom-client';

/**
 * Prometheus metrics for the voice-turn pipeline, on the default registry.
 */

export const moveResolutionAttemptsCounter = new client.Counter({
  name: 'voice_move_resolution_attempts_total',
  help: 'Move resolution attempts by outcome',
  labelNames: ['outcome'] as const,
});

export const turnsCounter = new client.Counter({
  name: 'voice_turns_total',
  help: 'Completed or abandoned turns by result',
  labelNames: ['result'] as const,
});

export const transcriptionLatencyHistogram = new client.Histogram({
  name: 'voice_transcription_latency_ms',
  help: 'Latency of transcription requests in milliseconds',
  labelNames: ['outcome'] as const,
  buckets: [100, 250, 500, 1000, 2000, 4000, 8000, 16000, 32000],
});

export const synthesisFailuresCounter = new client.Counter({
  name: 'voice_synthesis_failures_total',
  help: 'Speech synthesis or playback failures by reason',
  labelNames: ['reason'] as const,
});

export const commentaryDroppedCounter = new client.Counter({
  name: 'voice_commentary_dropped_total',
  help: 'Commentary requests dropped by reason',
  labelNames: ['reason'] as const,
});

export type ResolutionOutcome =
  | 'move'
  | 'command'
  | 'no_speech'
  | 'transcription_failed'
  | 'unrecognized'
  | 'ambiguous'
  | 'illegal';

export function recordResolutionAttempt(outcome: ResolutionOutcome): void {
  moveResolutionAttemptsCounter.labels(outcome).inc();
}

export type TurnResult = 'completed' | 'game_over' | 'budget_exhausted' | 'aborted';

export function recordTurn(result: TurnResult): void {
  turnsCounter.labels(result).inc();
}
