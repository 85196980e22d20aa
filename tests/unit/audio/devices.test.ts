import { ChildProcess } from 'child_process';
import { existsSync, readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import {
  CommandAudioInput,
  CommandAudioPlayer,
  type SpawnProcess,
} from '../../../src/server/audio/devices';
import { PlaybackError } from '../../../src/shared/errors';
import { createCancellationSource, isCanceledError } from '../../../src/shared/utils/cancellation';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function fakeChild(withStdout = true): { child: ChildProcess; kill: jest.SpyInstance } {
  const child = new ChildProcess();
  child.stdout = withStdout ? new PassThrough() : null;
  const kill = jest.spyOn(child, 'kill').mockReturnValue(true);
  return { child, kill };
}

function missingCommand(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

describe('CommandAudioInput', () => {
  it('spawns the configured command and exposes its stdout', () => {
    const { child } = fakeChild();
    const spawnProcess = jest.fn<ChildProcess, Parameters<SpawnProcess>>(() => child);
    const input = new CommandAudioInput({ command: 'fake-rec  -q -r 16000', spawnProcess });

    const handle = input.open({ sampleRate: 16_000 });

    expect(spawnProcess).toHaveBeenCalledWith('fake-rec', ['-q', '-r', '16000']);
    expect(handle.stream).toBe(child.stdout);
  });

  it('fails the stream when the recorder exits with an error', () => {
    const { child } = fakeChild();
    const input = new CommandAudioInput({ command: 'fake-rec', spawnProcess: () => child });
    const handle = input.open({ sampleRate: 16_000 });
    const errors: Error[] = [];
    handle.stream.on('error', (error: Error) => errors.push(error));

    child.emit('exit', 1, null);

    return new Promise<void>((resolve) => setImmediate(resolve)).then(() => {
      expect(errors.map((error) => error.message)).toEqual(['fake-rec exited with code 1']);
    });
  });

  it('kills the recorder on close', () => {
    const { child, kill } = fakeChild();
    const input = new CommandAudioInput({ command: 'fake-rec', spawnProcess: () => child });

    input.open({ sampleRate: 16_000 }).close();

    expect(kill).toHaveBeenCalledWith('SIGTERM');
    expect(child.stdout?.destroyed).toBe(true);
  });

  it('throws when the recorder has no stdout', () => {
    const { child, kill } = fakeChild(false);
    const input = new CommandAudioInput({ command: 'fake-rec', spawnProcess: () => child });

    expect(() => input.open({ sampleRate: 16_000 })).toThrow('fake-rec has no stdout');
    expect(kill).toHaveBeenCalled();
  });
});

describe('CommandAudioPlayer', () => {
  const wav = Buffer.from('RIFF-test-audio');
  const tmpDir = os.tmpdir();

  it('plays the WAV from a temp file and removes it afterwards', async () => {
    let playedPath = '';
    let playedBytes = Buffer.alloc(0);
    const spawnProcess: SpawnProcess = (command, args) => {
      const { child } = fakeChild(false);
      playedPath = args[args.length - 1];
      playedBytes = readFileSync(playedPath);
      expect(command).toBe('fake-play');
      expect(args.slice(0, -1)).toEqual(['-q']);
      setImmediate(() => child.emit('exit', 0, null));
      return child;
    };

    await new CommandAudioPlayer({ command: 'fake-play -q', spawnProcess, tmpDir }).play(wav);

    expect(path.basename(playedPath)).toBe('speech.wav');
    expect(playedBytes).toEqual(wav);
    expect(existsSync(path.dirname(playedPath))).toBe(false);
  });

  it('falls back to the next player when a command is missing', async () => {
    const tried: string[] = [];
    const spawnProcess: SpawnProcess = (command) => {
      const { child } = fakeChild(false);
      tried.push(command);
      setImmediate(() =>
        command === 'first-player' ? child.emit('error', missingCommand(command)) : child.emit('exit', 0, null)
      );
      return child;
    };

    await new CommandAudioPlayer({ command: ['first-player', 'second-player'], spawnProcess, tmpDir }).play(wav);

    expect(tried).toEqual(['first-player', 'second-player']);
  });

  it('reports a device error when no player exists', async () => {
    const spawnProcess: SpawnProcess = (command) => {
      const { child } = fakeChild(false);
      setImmediate(() => child.emit('error', missingCommand(command)));
      return child;
    };
    const player = new CommandAudioPlayer({ command: ['a', 'b'], spawnProcess, tmpDir });

    const error = await player.play(wav).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlaybackError);
    expect(error).toMatchObject({ kind: 'device_error', message: 'No audio player is available' });
  });

  it('reports a device error when the player exits with a failure', async () => {
    const spawnProcess: SpawnProcess = () => {
      const { child } = fakeChild(false);
      setImmediate(() => child.emit('exit', 2, null));
      return child;
    };
    const player = new CommandAudioPlayer({ command: 'fake-play', spawnProcess, tmpDir });

    await expect(player.play(wav)).rejects.toMatchObject({
      kind: 'device_error',
      message: 'fake-play exited with 2',
    });
  });

  it('stops playback when canceled', async () => {
    const source = createCancellationSource();
    let kill: jest.SpyInstance | undefined;
    const spawnProcess: SpawnProcess = () => {
      const fake = fakeChild(false);
      kill = fake.kill;
      setImmediate(() => source.cancel({ kind: 'user_abort' }));
      return fake.child;
    };
    const player = new CommandAudioPlayer({ command: 'fake-play', spawnProcess, tmpDir });

    const error = await player.play(wav, source.token).catch((e: unknown) => e);

    expect(isCanceledError(error)).toBe(true);
    expect(kill).toHaveBeenCalledWith('SIGTERM');
  });
});
