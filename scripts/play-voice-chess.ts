#!/usr/bin/env node
/**
 * Play chess by voice.
 *
 * Usage:
 *   voice-chess --mode pve --color white
 *   voice-chess --mode pvp --commentary --commentary-probability 0.5
 *   voice-chess --mode pve --manual-fallback --retry-budget 2 --seed 42
 *
 * Service endpoints and device commands come from the environment
 * (TRANSCRIPTION_URL, SYNTHESIS_URL, COMMENTARY_URL, STOCKFISH_PATH, ...).
 */

import { createInterface } from 'readline/promises';
import { colorName } from '../src/shared/types/game';
import { VoiceChessError } from '../src/shared/errors';
import type { CancellationToken } from '../src/shared/utils/cancellation';
import { config } from '../src/server/config';
import { createSessionConfig, type SessionConfigInput } from '../src/server/game/SessionConfig';
import { createVoiceSession } from '../src/server/game/createVoiceSession';
import type { ManualInput } from '../src/server/game/TurnCoordinator';
import { logger } from '../src/server/utils/logger';

interface CliArgs {
  session: SessionConfigInput;
  enginePath?: string;
  skill?: number;
}

function printUsage(): void {
  console.log(
    [
      'Usage: voice-chess [options]',
      '',
      '  --mode pve|pvp                  play the engine or a friend (default pve)',
      '  --color white|black             your colour against the engine (default white)',
      '  --retry-budget N                attempts per turn (default 3)',
      '  --commentary / --no-commentary  add a commentary sentence after moves',
      '  --commentary-probability P      chance of commentary per move (0-1)',
      '  --manual-fallback               type the move after a turn runs out of attempts',
      '  --seed N                        seed for draw and commentary rolls',
      '  --engine-path PATH              UCI engine binary',
      '  --movetime MS                   engine search time per move',
      '  --skill N                       engine skill level (0-20)',
      '  --fen FEN                       start from this position',
    ].join('\n')
  );
}

function parseNumber(flag: string, value: string | undefined): number | null {
  if (value === undefined) {
    console.error(`Missing value for ${flag}`);
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    console.error(`Invalid ${flag} value: ${value}`);
    return null;
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliArgs | null {
  const session: SessionConfigInput = {};
  const args: CliArgs = { session };

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) continue;

    const [flag, valueMaybe] = raw.split('=', 2);
    const next = argv[i + 1];
    const value = valueMaybe ?? (next && !next.startsWith('--') ? next : undefined);
    const consume = (): void => {
      if (valueMaybe === undefined && value !== undefined && next === value) {
        i += 1;
      }
    };

    switch (flag) {
      case '--help':
        return null;
      case '--mode':
        if (value !== 'pve' && value !== 'pvp') {
          console.error(`Invalid --mode value: ${value ?? '(missing)'}`);
          return null;
        }
        session.mode = value;
        consume();
        break;
      case '--color':
        if (value !== 'white' && value !== 'black') {
          console.error(`Invalid --color value: ${value ?? '(missing)'}`);
          return null;
        }
        session.humanColor = value;
        consume();
        break;
      case '--commentary':
        session.commentaryEnabled = true;
        break;
      case '--no-commentary':
        session.commentaryEnabled = false;
        break;
      case '--manual-fallback':
        session.manualEntryFallback = true;
        break;
      case '--fen':
        if (!value) {
          console.error('Missing value for --fen');
          return null;
        }
        session.startFen = value;
        consume();
        break;
      case '--engine-path':
        if (!value) {
          console.error('Missing value for --engine-path');
          return null;
        }
        args.enginePath = value;
        consume();
        break;
      case '--retry-budget':
      case '--commentary-probability':
      case '--seed':
      case '--movetime':
      case '--skill': {
        const parsed = parseNumber(flag, value);
        if (parsed === null) {
          return null;
        }
        consume();
        if (flag === '--retry-budget') session.retryBudget = parsed;
        else if (flag === '--commentary-probability') session.commentaryProbability = parsed;
        else if (flag === '--seed') session.seed = parsed;
        else if (flag === '--movetime') session.engineMovetimeMs = parsed;
        else args.skill = parsed;
        break;
      }
      default:
        console.warn(`Ignoring unknown flag: ${flag}`);
        if (!valueMaybe && next && !next.startsWith('--')) {
          i += 1;
        }
    }
  }

  return args;
}

function createTerminalInput(): { input: ManualInput; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    input: {
      readLine: async (prompt: string, token?: CancellationToken) => {
        const controller = new AbortController();
        const unsubscribe = token ? token.onCanceled(() => controller.abort()) : () => undefined;
        try {
          return await rl.question(prompt, { signal: controller.signal });
        } finally {
          unsubscribe();
        }
      },
    },
    close: () => rl.close(),
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const session = createSessionConfig({
    personaName: config.personaName,
    maxCaptureMs: config.capture.maxDurationMs,
    silenceTimeoutMs: config.capture.silenceTimeoutMs,
    engineMovetimeMs: config.engine.movetimeMs,
    ...args.session,
  });

  const terminal = session.manualEntryFallback ? createTerminalInput() : null;

  const voiceSession = createVoiceSession({
    app: config,
    session,
    engine: { path: args.enginePath ?? config.engine.path, skill: args.skill ?? config.engine.skill },
    ...(terminal && { manualInput: terminal.input }),
    hooks: {
      onUtterance: (utterance) => {
        if (utterance.kind === 'text' && utterance.direction === 'output') {
          console.log(`> ${utterance.text}`);
        }
      },
      onBoardChanged: (applied) => {
        console.log(`\n${colorName(applied.color)} played ${applied.san}\n${voiceSession.game.ascii()}`);
      },
    },
  });

  let interrupts = 0;
  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      process.exit(130);
    }
    console.log('\nStopping...');
    voiceSession.coordinator.abort();
  };
  process.on('SIGINT', onSigint);

  console.log(voiceSession.game.ascii());

  try {
    const result = await voiceSession.coordinator.run();
    console.log(result.moves ? `\nMoves: ${result.moves}` : '');
    if (result.kind === 'aborted') {
      process.exitCode = result.reason.kind === 'user_abort' ? 130 : 1;
    }
  } finally {
    process.off('SIGINT', onSigint);
    voiceSession.close();
    terminal?.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof VoiceChessError) {
      logger.error('voice-chess failed', { error: error.toReport() });
    } else {
      logger.error('voice-chess failed', { error });
    }
    process.exitCode = 1;
  });
}
