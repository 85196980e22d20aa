import { TranscriptionServiceClient } from '../../../src/server/services/TranscriptionServiceClient';
import { TranscriptionError } from '../../../src/shared/errors';
import { createCancellationSource, isCanceledError } from '../../../src/shared/utils/cancellation';
import { type HttpStub, sendJson, startHttpStub } from '../../helpers/httpStub';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const audio = { pcm: Buffer.alloc(64), sampleRate: 16_000, durationMs: 2 };

describe('TranscriptionServiceClient', () => {
  let stub: HttpStub | undefined;

  afterEach(async () => {
    await stub?.close();
    stub = undefined;
  });

  it('uploads the utterance as a WAV file and returns the trimmed text', async () => {
    stub = await startHttpStub((_req, res) => sendJson(res, 200, { transcription: ' Nf3 \n' }));
    const client = new TranscriptionServiceClient({ url: `${stub.baseUrl}/transcribe` });

    await expect(client.transcribe(audio)).resolves.toBe('Nf3');

    const [request] = stub.requests;
    expect(request.method).toBe('POST');
    expect(request.url).toBe('/transcribe');
    expect(request.headers['content-type']).toMatch(/^multipart\/form-data; boundary=/);
    const body = request.body.toString('latin1');
    expect(body).toContain('name="audio"; filename="utterance.wav"');
    expect(body).toContain('Content-Type: audio/wav');
    expect(body).toContain('RIFF');
  });

  it('accepts a text field as well', async () => {
    stub = await startHttpStub((_req, res) => sendJson(res, 200, { text: 'resign' }));
    const client = new TranscriptionServiceClient({ url: stub.baseUrl });

    await expect(client.transcribe(audio)).resolves.toBe('resign');
  });

  it('rejects a response without text', async () => {
    stub = await startHttpStub((_req, res) => sendJson(res, 200, { error: 'No audio file uploaded' }));
    const client = new TranscriptionServiceClient({ url: stub.baseUrl });

    const error = await client.transcribe(audio).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptionError);
    expect(error).toMatchObject({
      kind: 'service_unavailable',
      message: 'Transcription response has no text',
    });
  });

  it('maps server errors to service_unavailable', async () => {
    stub = await startHttpStub((_req, res) => sendJson(res, 500, { error: 'boom' }));
    const client = new TranscriptionServiceClient({ url: stub.baseUrl });

    await expect(client.transcribe(audio)).rejects.toMatchObject({
      kind: 'service_unavailable',
      details: { type: 'server_error' },
    });
  });

  it('maps a slow service to timeout', async () => {
    stub = await startHttpStub(() => undefined);
    const client = new TranscriptionServiceClient({ url: stub.baseUrl, timeoutMs: 50 });

    await expect(client.transcribe(audio)).rejects.toMatchObject({ kind: 'timeout' });
  });

  it('aborts the request when the session is canceled', async () => {
    stub = await startHttpStub(() => undefined);
    const client = new TranscriptionServiceClient({ url: stub.baseUrl, timeoutMs: 5000 });
    const source = createCancellationSource();

    const pending = client.transcribe(audio, source.token);
    setTimeout(() => source.cancel({ kind: 'user_abort' }), 20);
    const error = await pending.catch((e: unknown) => e);

    expect(isCanceledError(error)).toBe(true);
  });
});
