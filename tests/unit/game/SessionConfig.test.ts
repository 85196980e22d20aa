import { createSessionConfig } from '../../../src/server/game/SessionConfig';
import { ConfigError } from '../../../src/shared/errors';

describe('createSessionConfig', () => {
  it('fills in defaults', () => {
    expect(createSessionConfig({ seed: 11 })).toEqual({
      mode: 'pve',
      humanColor: 'white',
      retryBudget: 3,
      commentaryEnabled: false,
      commentaryProbability: 1,
      manualEntryFallback: false,
      drawAcceptProbability: 0.3,
      seed: 11,
      maxCaptureMs: 10000,
      silenceTimeoutMs: 1200,
      engineMovetimeMs: 1000,
      personaName: 'Magnus',
    });
  });

  it('draws a seed when none is given', () => {
    const config = createSessionConfig();
    expect(Number.isInteger(config.seed)).toBe(true);
    expect(config.seed).toBeGreaterThanOrEqual(0);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(createSessionConfig({ seed: 1 }))).toBe(true);
  });

  it('accepts a valid starting position', () => {
    const fen = '4k3/8/8/8/8/8/8/R3K3 w - - 0 1';
    expect(createSessionConfig({ seed: 1, startFen: fen }).startFen).toBe(fen);
  });

  it.each([
    [{ retryBudget: 0 }, /retryBudget/],
    [{ commentaryProbability: 1.5 }, /commentaryProbability/],
    [{ startFen: 'not a fen' }, /startFen/],
    [{ silenceTimeoutMs: 5000, maxCaptureMs: 4000 }, /silenceTimeoutMs must be shorter than maxCaptureMs/],
  ])('rejects %p', (input, message) => {
    expect(() => createSessionConfig(input)).toThrow(ConfigError);
    expect(() => createSessionConfig(input)).toThrow(message);
  });
});
