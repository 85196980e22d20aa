import { PassThrough } from 'stream';
import type { AudioInputDevice } from '../../../src/server/audio/devices';
import { VoiceCapture } from '../../../src/server/game/VoiceCapture';
import { CaptureError } from '../../../src/shared/errors';
import { createCancellationSource, isCanceledError } from '../../../src/shared/utils/cancellation';
import { FRAME_BYTES, SAMPLE_RATE, SILENT, VOICED, pcmFrames } from '../../helpers/audioFixtures';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function fakeDevice(): { device: AudioInputDevice; stream: PassThrough; close: jest.Mock } {
  const stream = new PassThrough();
  const close = jest.fn();
  const device: AudioInputDevice = { open: jest.fn(() => ({ stream, close })) };
  return { device, stream, close };
}

describe('VoiceCapture', () => {
  it('resolves with the first complete utterance and closes the device', async () => {
    const { device, stream, close } = fakeDevice();
    const capture = new VoiceCapture(device);

    const pending = capture.listen(10_000, 300);
    stream.write(Buffer.concat([pcmFrames(27, VOICED), pcmFrames(10, SILENT)]));
    const audio = await pending;

    expect(device.open).toHaveBeenCalledWith({ sampleRate: SAMPLE_RATE });
    expect(audio.sampleRate).toBe(SAMPLE_RATE);
    expect(audio.durationMs).toBe(1110);
    expect(audio.pcm.length).toBe(37 * FRAME_BYTES);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('reassembles frames split across chunks', async () => {
    const { device, stream } = fakeDevice();
    const capture = new VoiceCapture(device);
    const data = Buffer.concat([pcmFrames(27, VOICED), pcmFrames(10, SILENT)]);

    const pending = capture.listen(10_000, 300);
    for (let offset = 0; offset < data.length; offset += 700) {
      stream.write(data.subarray(offset, offset + 700));
    }

    await expect(pending).resolves.toMatchObject({ durationMs: 1110 });
  });

  it('returns the utterance in progress when the window closes', async () => {
    const { device, stream } = fakeDevice();
    const capture = new VoiceCapture(device);

    const pending = capture.listen(900, 300);
    stream.write(pcmFrames(30, VOICED));

    await expect(pending).resolves.toMatchObject({ durationMs: 900 });
  });

  it('fails with no_speech_detected when the window holds only silence', async () => {
    const { device, stream, close } = fakeDevice();
    const capture = new VoiceCapture(device);

    const pending = capture.listen(300, 300);
    stream.write(pcmFrames(10, SILENT));

    await expect(pending).rejects.toMatchObject({ kind: 'no_speech_detected' });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes the window on the wall clock when the device goes quiet', async () => {
    const { device } = fakeDevice();
    const capture = new VoiceCapture(device);

    await expect(capture.listen(50, 300)).rejects.toMatchObject({ kind: 'no_speech_detected' });
  });

  it('reports a device error when the device cannot be opened', async () => {
    const device: AudioInputDevice = {
      open: () => {
        throw new Error('no microphone');
      },
    };

    const error = await new VoiceCapture(device).listen(1000, 300).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CaptureError);
    expect(error).toMatchObject({ kind: 'device_error' });
  });

  it('reports a device error when the stream fails', async () => {
    const { device, stream } = fakeDevice();

    const pending = new VoiceCapture(device).listen(10_000, 300);
    stream.destroy(new Error('input overrun'));

    await expect(pending).rejects.toMatchObject({ kind: 'device_error' });
  });

  it('reports a device error when the stream ends early', async () => {
    const { device, stream } = fakeDevice();

    const pending = new VoiceCapture(device).listen(10_000, 300);
    stream.end(pcmFrames(2, VOICED));

    await expect(pending).rejects.toMatchObject({
      kind: 'device_error',
      message: 'Audio input ended unexpectedly',
    });
  });

  it('stops listening when canceled', async () => {
    const { device, close } = fakeDevice();
    const source = createCancellationSource();

    const pending = new VoiceCapture(device).listen(10_000, 300, source.token);
    source.cancel({ kind: 'user_abort' });
    const error = await pending.catch((e: unknown) => e);

    expect(isCanceledError(error)).toBe(true);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('does not open the device when already canceled', async () => {
    const { device } = fakeDevice();
    const source = createCancellationSource();
    source.cancel('stop');

    const error = await new VoiceCapture(device).listen(1000, 300, source.token).catch((e: unknown) => e);

    expect(isCanceledError(error)).toBe(true);
    expect(device.open).not.toHaveBeenCalled();
  });
});
