import { describe, it, expect, vi, afterEach } from 'vitest';
import { CoquiTTSProvider } from '../../src/providers/tts/CoquiTTSProvider';

const options = { model: 'tts_models/en/vctk/vits', speaker: 'p230' };

describe('CoquiTTSProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests speech from the server API', async () => {
    const fetchMock = vi.fn(async () => new Response('RIFF', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const audio = await new CoquiTTSProvider('http://tts.local:5002/').synthesize('Hello world', options);

    expect(audio.toString()).toBe('RIFF');
    expect(fetchMock).toHaveBeenCalledWith(
      'http://tts.local:5002/api/tts?text=Hello+world&speaker_id=p230&language_id=',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('reports API errors with status and body', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' }))
    );

    await expect(new CoquiTTSProvider().synthesize('Hi', options)).rejects.toThrow(
      'CoquiTTS API error: 500 Internal Server Error - boom'
    );
  });

  it('reports an unreachable server', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    await expect(new CoquiTTSProvider().synthesize('Hi', options)).rejects.toThrow(
      'CoquiTTS synthesis failed: fetch failed'
    );
  });

  it('waits for the server to answer on start', async () => {
    const fetchMock = vi.fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new CoquiTTSProvider('http://tts.local:5002', { maxAttempts: 3, baseDelayMs: 0 }).start();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock).toHaveBeenCalledWith('http://tts.local:5002/', { method: 'GET' });
  });
});
