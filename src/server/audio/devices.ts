/**
 * Microphone and speaker adapters backed by command-line audio tools.
 *
 * Capture streams raw PCM16 from `rec` (SoX) on macOS or `arecord` on Linux.
 * Playback writes the WAV to a temp file and runs `afplay` on macOS, else
 * `paplay` with `aplay` as fallback.
 */

import { spawn, type ChildProcess } from 'child_process';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Readable } from 'stream';
import { PlaybackError } from '../../shared/errors';
import { type CancellationToken, createCanceledError } from '../../shared/utils/cancellation';
import { logger } from '../utils/logger';

export type SpawnProcess = (command: string, args: readonly string[]) => ChildProcess;

const defaultSpawn: SpawnProcess = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

export interface AudioInputHandle {
  /** Raw little-endian PCM16 mono. Emits `error` when the device fails. */
  stream: Readable;
  close(): void;
}

export interface AudioInputDevice {
  /** Throws when the device cannot be opened. */
  open(options: { sampleRate: number }): AudioInputHandle;
}

function splitCommand(command: string): [string, string[]] {
  const [program, ...args] = command.trim().split(/\s+/);
  return [program, args];
}

function defaultInputCommand(sampleRate: number): [string, string[]] {
  if (process.platform === 'darwin') {
    return ['rec', ['-q', '-t', 'raw', '-r', String(sampleRate), '-e', 'signed', '-b', '16', '-c', '1', '-']];
  }
  return ['arecord', ['-q', '-f', 'S16_LE', '-r', String(sampleRate), '-c', '1', '-t', 'raw']];
}

export interface CommandAudioInputOptions {
  /** Full command line; replaces the platform default. */
  command?: string;
  spawnProcess?: SpawnProcess;
}

export class CommandAudioInput implements AudioInputDevice {
  private readonly spawnProcess: SpawnProcess;

  constructor(private readonly options: CommandAudioInputOptions = {}) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  open({ sampleRate }: { sampleRate: number }): AudioInputHandle {
    const [program, args] = this.options.command
      ? splitCommand(this.options.command)
      : defaultInputCommand(sampleRate);

    const child = this.spawnProcess(program, args);
    const stream = child.stdout;
    if (!stream) {
      child.kill();
      throw new Error(`${program} has no stdout`);
    }

    child.on('error', (error) => stream.destroy(error));
    child.on('exit', (code, signal) => {
      if (code !== 0 && signal === null) {
        stream.destroy(new Error(`${program} exited with code ${code}`));
      }
    });

    logger.debug('Audio input opened', { program, sampleRate });

    return {
      stream,
      close: () => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGTERM');
        }
        stream.destroy();
      },
    };
  }
}

export interface AudioPlayer {
  /** Plays a WAV file to completion. Cancellation stops playback at once. */
  play(wav: Buffer, token?: CancellationToken): Promise<void>;
}

export interface CommandAudioPlayerOptions {
  /**
   * Player command, or commands tried in order until one exists. The WAV
   * path is appended as the last argument.
   */
  command?: string | readonly string[];
  spawnProcess?: SpawnProcess;
  tmpDir?: string;
}

function defaultPlayerCommands(): string[] {
  return process.platform === 'darwin' ? ['afplay'] : ['paplay', 'aplay'];
}

function isMissingCommand(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CommandAudioPlayer implements AudioPlayer {
  private readonly spawnProcess: SpawnProcess;
  private readonly commands: string[];

  constructor(private readonly options: CommandAudioPlayerOptions = {}) {
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    const { command } = options;
    this.commands = typeof command === 'string' ? [command] : command ? [...command] : defaultPlayerCommands();
  }

  async play(wav: Buffer, token?: CancellationToken): Promise<void> {
    token?.throwIfCanceled('playback');

    const dir = await mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), 'voice-chess-'));
    const file = path.join(dir, 'speech.wav');

    try {
      await writeFile(file, wav);

      let lastError: unknown;
      for (const command of this.commands) {
        try {
          await this.runPlayer(command, file, token);
          return;
        } catch (error) {
          if (!isMissingCommand(error)) {
            throw error;
          }
          lastError = error;
          logger.debug('Audio player not found, trying next', { command });
        }
      }

      throw new PlaybackError('device_error', {
        message: 'No audio player is available',
        cause: lastError,
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private runPlayer(command: string, file: string, token?: CancellationToken): Promise<void> {
    const [program, args] = splitCommand(command);

    return new Promise<void>((resolve, reject) => {
      const child = this.spawnProcess(program, [...args, file]);
      let settled = false;

      const unsubscribe = token
        ? token.onCanceled((reason) => {
            if (settled) return;
            settled = true;
            child.kill('SIGTERM');
            reject(createCanceledError(reason, 'playback'));
          })
        : () => undefined;

      child.on('error', (error) => {
        unsubscribe();
        if (settled) return;
        settled = true;
        reject(isMissingCommand(error) ? error : new PlaybackError('device_error', { cause: error }));
      });

      child.on('exit', (code, signal) => {
        unsubscribe();
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolve();
        } else {
          reject(
            new PlaybackError('device_error', {
              message: `${program} exited with ${code ?? signal}`,
            })
          );
        }
      });
    });
  }
}
