import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { ChannelResolutionError } from '../errors';
import { KickApiClient } from './KickApiClient';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function respond(body: unknown, status = 200): void {
  mockFetch.mockResolvedValueOnce({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  });
}

describe('KickApiClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterAll(() => {
    vi.unstubAllGlobals();
  });

  it('resolves the chatroom id and viewer count', async () => {
    respond({ chatroom: { id: 42 }, livestream: { viewer_count: 1500 } });

    const info = await new KickApiClient().resolveChannel('somechannel');

    expect(info).toEqual({ chatroomId: 42, viewerCount: 1500 });
    expect(mockFetch).toHaveBeenCalledWith(
      'https://kick.com/api/v2/channels/somechannel',
      expect.objectContaining({
        headers: expect.objectContaining({ 'Accept': 'application/json' }),
      }),
    );
  });

  it('reads the camelCase viewer count', async () => {
    respond({ livestream: { viewerCount: 88 } });

    await expect(new KickApiClient().fetchViewerCount('somechannel')).resolves.toBe(88);
  });

  it('reports no viewers for an offline channel', async () => {
    respond({ chatroom: { id: 42 }, livestream: null });

    await expect(new KickApiClient().resolveChannel('somechannel'))
      .resolves.toEqual({ chatroomId: 42, viewerCount: null });
  });

  it('treats mistyped fields as missing', async () => {
    respond({ chatroom: { id: 'abc' }, livestream: { viewer_count: 'many' } });

    await expect(new KickApiClient().resolveChannel('somechannel'))
      .resolves.toEqual({ chatroomId: null, viewerCount: null });
  });

  it('treats a non-object body as empty', async () => {
    respond(['unexpected']);

    await expect(new KickApiClient().resolveChannel('somechannel'))
      .resolves.toEqual({ chatroomId: null, viewerCount: null });
  });

  it('asks the proxy when one is configured', async () => {
    respond({ chatroomId: 77 });

    const info = await new KickApiClient({ proxyUrl: 'http://localhost:3456/' }).resolveChannel('some channel');

    expect(info).toEqual({ chatroomId: 77, viewerCount: null });
    expect(mockFetch.mock.calls[0][0]).toBe('http://localhost:3456/channel?name=some%20channel');
  });

  it('accepts a proxy chatroom id sent as a numeric string', async () => {
    respond({ chatroomId: '123' });

    const info = await new KickApiClient({ proxyUrl: 'http://localhost:3456' }).resolveChannel('somechannel');

    expect(info).toEqual({ chatroomId: 123, viewerCount: null });
  });

  it('ignores a proxy chatroom id that is not a number', async () => {
    respond({ chatroomId: 'abc' });

    const info = await new KickApiClient({ proxyUrl: 'http://localhost:3456' }).resolveChannel('somechannel');

    expect(info).toEqual({ chatroomId: null, viewerCount: null });
  });

  it('raises ChannelResolutionError on a non-2xx response', async () => {
    respond({ message: 'Not found' }, 404);

    const attempt = new KickApiClient().resolveChannel('missing');
    await expect(attempt).rejects.toBeInstanceOf(ChannelResolutionError);
    await expect(attempt).rejects.toMatchObject({
      status: 404,
      message: 'https://kick.com/api/v2/channels/missing returned 404',
    });
  });

  describe('resolveStreamUrl', () => {
    it('prefers the livestream playback URL', async () => {
      respond({
        livestream: { playback_url: 'https://hls.example/a.m3u8', hls: 'https://hls.example/b.m3u8' },
        playback_url: 'https://hls.example/c.m3u8',
      });

      await expect(new KickApiClient().resolveStreamUrl('somechannel')).resolves.toBe('https://hls.example/a.m3u8');
    });

    it('falls back through the other fields', async () => {
      respond({ livestream: { playback_url: null, hls: 'https://hls.example/b.m3u8' } });
      respond({ livestream: null, playbackUrl: 'https://hls.example/c.m3u8' });

      const client = new KickApiClient();
      await expect(client.resolveStreamUrl('somechannel')).resolves.toBe('https://hls.example/b.m3u8');
      await expect(client.resolveStreamUrl('somechannel')).resolves.toBe('https://hls.example/c.m3u8');
    });

    it('returns null when no URL is present', async () => {
      respond({ livestream: {} });

      await expect(new KickApiClient().resolveStreamUrl('somechannel')).resolves.toBeNull();
    });
  });
});
