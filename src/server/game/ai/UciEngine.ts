/**
 * UCI engine driven over stdio (Stockfish by default).
 *
 * The process is started lazily on the first search and kept for the
 * session. One search runs at a time.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import type { MoveTriple, PieceSymbol, Square } from '../../../shared/types/game';
import { EngineError } from '../../../shared/errors';
import { type CancellationToken, createCanceledError } from '../../../shared/utils/cancellation';
import { logger } from '../../utils/logger';

export interface ChessEngine {
  /** Best move for the side to move in `fen`, in UCI notation. */
  bestMove(fen: string, options: { movetimeMs: number }, token?: CancellationToken): Promise<string>;
  close(): void;
}

export interface UciProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface UciEngineOptions {
  path: string;
  /** Stockfish "Skill Level", 0-20. */
  skill: number;
  /** Budget for the handshake and for a search beyond its movetime. */
  responseTimeoutMs?: number;
  spawnProcess?: (path: string) => UciProcess;
}

const PROMOTION_PIECES: Readonly<Record<string, PieceSymbol>> = { q: 'q', r: 'r', b: 'b', n: 'n' };

function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

export function uciToMoveTriple(uci: string): MoveTriple | null {
  const match = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/.exec(uci.trim());
  if (!match) {
    return null;
  }
  const [, from, to, promotion] = match;
  if (!isSquare(from) || !isSquare(to)) {
    return null;
  }
  return {
    from,
    to,
    ...(promotion !== undefined && { promotion: PROMOTION_PIECES[promotion] }),
  };
}

interface LineWaiter {
  matches: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export class UciEngine implements ChessEngine {
  private process: UciProcess | null = null;
  private starting: Promise<void> | null = null;
  private waiter: LineWaiter | null = null;
  /** bestmove lines still owed by searches that were stopped. */
  private staleBestMoves = 0;
  private readonly responseTimeoutMs: number;

  constructor(private readonly options: UciEngineOptions) {
    this.responseTimeoutMs = options.responseTimeoutMs ?? 10_000;
  }

  async bestMove(
    fen: string,
    { movetimeMs }: { movetimeMs: number },
    token?: CancellationToken
  ): Promise<string> {
    token?.throwIfCanceled('engine');
    await this.ensureStarted();

    this.send(`position fen ${fen}`);
    this.send(`go movetime ${movetimeMs}`);

    let line: string;
    try {
      line = await this.waitFor(
        (text) => text.startsWith('bestmove'),
        movetimeMs + this.responseTimeoutMs,
        token
      );
    } catch (error) {
      if (this.process) {
        this.send('stop');
        this.staleBestMoves++;
      }
      throw error;
    }

    const move = line.split(/\s+/)[1];
    if (!move || move === '(none)' || !uciToMoveTriple(move)) {
      throw new EngineError('no_move', { details: { line } });
    }
    logger.info('Engine move received', { move, movetimeMs });
    return move;
  }

  close(): void {
    const child = this.process;
    if (!child) return;
    this.process = null;
    this.starting = null;
    this.send('quit', child);
    child.kill('SIGTERM');
    this.failWaiter(new EngineError('unavailable', { message: 'Engine closed' }));
  }

  private ensureStarted(): Promise<void> {
    if (!this.starting) {
      this.starting = this.start().catch((error: unknown) => {
        this.starting = null;
        throw error;
      });
    }
    return this.starting;
  }

  private async start(): Promise<void> {
    const spawnProcess =
      this.options.spawnProcess ?? ((path: string) => spawn(path, [], { stdio: 'pipe' }));

    let child: UciProcess;
    try {
      child = spawnProcess(this.options.path);
    } catch (error) {
      throw new EngineError('unavailable', { cause: error });
    }
    this.process = child;

    child.on('error', (error: Error) => {
      logger.error('Engine process error', { error, path: this.options.path });
      this.failWaiter(new EngineError('unavailable', { cause: error }));
    });
    child.stdin.on('error', (error: Error) => {
      logger.error('Engine stdin error', { error, path: this.options.path });
      this.failWaiter(new EngineError('unavailable', { cause: error }));
    });
    child.on('exit', (code: number | null) => {
      if (this.process === child) {
        this.process = null;
        this.starting = null;
      }
      this.failWaiter(new EngineError('unavailable', { message: `Engine exited with code ${code}` }));
    });

    createInterface({ input: child.stdout }).on('line', (line) => this.onLine(line.trim()));

    this.send('uci');
    await this.waitFor((line) => line === 'uciok', this.responseTimeoutMs);
    this.send(`setoption name Skill Level value ${this.options.skill}`);
    this.send('isready');
    await this.waitFor((line) => line === 'readyok', this.responseTimeoutMs);
    this.send('ucinewgame');

    logger.info('Engine ready', { path: this.options.path, skill: this.options.skill });
  }

  private onLine(line: string): void {
    if (line.startsWith('bestmove') && this.staleBestMoves > 0) {
      this.staleBestMoves--;
      return;
    }
    const waiter = this.waiter;
    if (waiter && waiter.matches(line)) {
      this.waiter = null;
      waiter.resolve(line);
    }
  }

  private failWaiter(error: Error): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(error);
  }

  private send(command: string, child: UciProcess | null = this.process): void {
    if (child && child.stdin.writable) {
      child.stdin.write(`${command}\n`);
    }
  }

  private waitFor(
    matches: (line: string) => boolean,
    timeoutMs: number,
    token?: CancellationToken
  ): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let unsubscribe: () => void = () => undefined;

      const timer = setTimeout(() => {
        this.failWaiter(
          new EngineError('unavailable', { message: `Engine did not answer within ${timeoutMs}ms` })
        );
      }, timeoutMs);

      const settle = (): void => {
        clearTimeout(timer);
        unsubscribe();
      };

      this.waiter = {
        matches,
        resolve: (line) => {
          settle();
          resolve(line);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };

      if (token) {
        unsubscribe = token.onCanceled((reason) =>
          this.failWaiter(createCanceledError(reason, 'engine'))
        );
      }
    });
  }
}
