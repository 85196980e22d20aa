import type { AudioPlayer } from '../../../src/server/audio/devices';
import { encodeWav } from '../../../src/server/audio/wav';
import { SpeechOutput } from '../../../src/server/game/SpeechOutput';
import type { SynthesisClient } from '../../../src/server/services/SynthesisServiceClient';
import { PlaybackError } from '../../../src/shared/errors';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const voiceRefs = { player: 'belinda', engine: 'magnus', commentator: 'announcer' };
const wav = encodeWav({ pcm: Buffer.alloc(32), sampleRate: 24_000, durationMs: 0 });

function setup(audio: Buffer = wav, options: { seed?: number } = {}) {
  const synthesis = {
    synthesize: jest.fn<ReturnType<SynthesisClient['synthesize']>, Parameters<SynthesisClient['synthesize']>>(
      async () => ({ id: 'clip-1', wav: audio, sampleRate: 24_000 })
    ),
  };
  const player = {
    play: jest.fn<ReturnType<AudioPlayer['play']>, Parameters<AudioPlayer['play']>>(async () => undefined),
  };
  const output = new SpeechOutput(synthesis, player, { voiceRefs, ...options });
  return { synthesis, player, output };
}

describe('SpeechOutput', () => {
  it('synthesizes in the voice of the role and plays the result', async () => {
    const { synthesis, player, output } = setup(wav, { seed: 5 });

    await output.speak('  Good move.  ', 'commentator');

    expect(synthesis.synthesize).toHaveBeenCalledWith(
      { text: 'Good move.', voiceRef: 'announcer', seed: 5 },
      undefined
    );
    expect(player.play).toHaveBeenCalledWith(wav, undefined);
  });

  it('leaves the seed out when the session has none', async () => {
    const { synthesis, output } = setup();

    await output.speak('Knight to f3.', 'engine');

    expect(synthesis.synthesize.mock.calls[0][0]).toEqual({ text: 'Knight to f3.', voiceRef: 'magnus' });
  });

  it('says nothing for blank text', async () => {
    const { synthesis, player, output } = setup();

    await output.speak('   ', 'engine');

    expect(synthesis.synthesize).not.toHaveBeenCalled();
    expect(player.play).not.toHaveBeenCalled();
  });

  it('rejects audio that is not a WAV file without playing it', async () => {
    const { player, output } = setup(Buffer.from('mp3 bytes'));

    await expect(output.speak('Check.', 'engine')).rejects.toMatchObject({
      kind: 'synthesis_unavailable',
      message: 'Synthesis returned audio that is not a WAV file',
    });
    expect(player.play).not.toHaveBeenCalled();
  });

  it('passes player failures through', async () => {
    const { player, output } = setup();
    player.play.mockRejectedValueOnce(new PlaybackError('device_error', { message: 'speaker unplugged' }));

    await expect(output.speak('Check.', 'engine')).rejects.toMatchObject({
      kind: 'device_error',
      message: 'speaker unplugged',
    });
  });
});
