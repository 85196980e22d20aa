import { parseArgs } from '../../../scripts/play-voice-chess';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const argv = (...args: string[]): string[] => ['node', 'play-voice-chess', ...args];

describe('play-voice-chess parseArgs', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns an empty session for no flags', () => {
    expect(parseArgs(argv())).toEqual({ session: {} });
  });

  it('reads session flags in both --flag value and --flag=value forms', () => {
    expect(
      parseArgs(
        argv('--mode', 'pvp', '--color=black', '--retry-budget', '2', '--commentary', '--seed=7', '--manual-fallback')
      )
    ).toEqual({
      session: {
        mode: 'pvp',
        humanColor: 'black',
        retryBudget: 2,
        commentaryEnabled: true,
        seed: 7,
        manualEntryFallback: true,
      },
    });
  });

  it('reads engine settings and a start position', () => {
    const fen = '4k3/8/8/8/8/8/8/4K2R w K - 0 1';

    expect(
      parseArgs(argv('--engine-path', '/opt/fakefish', '--skill', '10', '--movetime', '500', '--fen', fen))
    ).toEqual({
      session: { engineMovetimeMs: 500, startFen: fen },
      enginePath: '/opt/fakefish',
      skill: 10,
    });
  });

  it('skips unknown flags together with their value', () => {
    expect(parseArgs(argv('--volume', '11', '--no-commentary'))).toEqual({
      session: { commentaryEnabled: false },
    });
    expect(console.warn).toHaveBeenCalledWith('Ignoring unknown flag: --volume');
  });

  it('rejects help and invalid values', () => {
    expect(parseArgs(argv('--help'))).toBeNull();
    expect(parseArgs(argv('--mode', 'blitz'))).toBeNull();
    expect(parseArgs(argv('--seed', 'abc'))).toBeNull();
    expect(parseArgs(argv('--fen'))).toBeNull();
    expect(console.error).toHaveBeenCalledWith('Invalid --seed value: abc');
  });
});
