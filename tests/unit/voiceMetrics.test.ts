import client from 'prom-client';
import {
  moveResolutionAttemptsCounter,
  recordResolutionAttempt,
  recordTurn,
  turnsCounter,
} from '../../src/server/utils/voiceMetrics';

interface LabelledMetric {
  get(): Promise<{ values: Array<{ value: number; labels: Partial<Record<string, string | number>> }> }>;
}

async function countFor(
  metric: LabelledMetric,
  label: string,
  value: string
): Promise<number> {
  const snapshot = await metric.get();
  return snapshot.values.find((entry) => entry.labels[label] === value)?.value ?? 0;
}

describe('voiceMetrics', () => {
  beforeEach(() => {
    client.register.resetMetrics();
  });

  it('counts resolution attempts by outcome', async () => {
    recordResolutionAttempt('move');
    recordResolutionAttempt('illegal');
    recordResolutionAttempt('illegal');

    expect(await countFor(moveResolutionAttemptsCounter, 'outcome', 'move')).toBe(1);
    expect(await countFor(moveResolutionAttemptsCounter, 'outcome', 'illegal')).toBe(2);
    expect(await countFor(moveResolutionAttemptsCounter, 'outcome', 'ambiguous')).toBe(0);
  });

  it('counts turns by result', async () => {
    recordTurn('completed');
    recordTurn('budget_exhausted');

    expect(await countFor(turnsCounter, 'result', 'completed')).toBe(1);
    expect(await countFor(turnsCounter, 'result', 'budget_exhausted')).toBe(1);
  });

  it('registers on the default registry', async () => {
    const text = await client.register.metrics();
    expect(text).toContain('voice_move_resolution_attempts_total');
    expect(text).toContain('voice_transcription_latency_ms');
  });
});
