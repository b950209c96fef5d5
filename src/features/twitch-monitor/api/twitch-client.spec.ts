import { AuthError, TransientError } from '../../../shared';
import { chunk, createTwitchClient } from './twitch-client';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function stream(login: string, gameName: string, gameId = '1') {
  return {
    id: `stream-${login}`,
    user_id: `user-${login}`,
    user_login: login,
    user_name: login,
    game_id: gameId,
    game_name: gameName,
    type: 'live',
    title: 'test stream',
  };
}

describe('createTwitchClient', () => {
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  const client = () => createTwitchClient({ clientId: 'test-client' });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fetchStatuses', () => {
    it('reports every login, offline when not returned, in input order', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [stream('alpha', 'Just Chatting')], pagination: {} }));

      const statuses = await client().fetchStatuses(['alpha', 'beta', 'gamma'], 'test-token');

      expect([...statuses.keys()]).toEqual(['alpha', 'beta', 'gamma']);
      expect(statuses.get('alpha')).toEqual({ login: 'alpha', isLive: true, category: 'Just Chatting' });
      expect(statuses.get('beta')).toEqual({ login: 'beta', isLive: false, category: null });
      expect(statuses.get('gamma')).toEqual({ login: 'gamma', isLive: false, category: null });
      expect(fetchSpy).toHaveBeenCalledWith(
        'https://api.twitch.tv/helix/streams?user_login=alpha&user_login=beta&user_login=gamma&first=100',
        expect.objectContaining({
          method: 'GET',
          headers: { 'Client-Id': 'test-client', Authorization: 'Bearer test-token' },
        })
      );
    });

    it('splits logins into batches of 100', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ data: [] }));
      const logins = Array.from({ length: 150 }, (_, i) => `channel${i}`);

      const statuses = await client().fetchStatuses(logins, 'test-token');

      expect(statuses.size).toBe(150);
      expect(fetchSpy).toHaveBeenCalledTimes(2);
      const batchSizes = fetchSpy.mock.calls.map(
        ([input]) => new URL(String(input)).searchParams.getAll('user_login').length
      );
      expect(batchSizes).toEqual([100, 50]);
    });

    it('matches logins case-insensitively', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [stream('Alpha', 'Chess')] }));

      const statuses = await client().fetchStatuses(['alpha'], 'test-token');

      expect(statuses.get('alpha')).toEqual({ login: 'alpha', isLive: true, category: 'Chess' });
    });

    it('resolves missing category names through the games endpoint and caches them', async () => {
      fetchSpy
        .mockResolvedValueOnce(jsonResponse({ data: [stream('alpha', '', '33214')] }))
        .mockResolvedValueOnce(jsonResponse({ data: [{ id: '33214', name: 'Fortnite' }] }))
        .mockResolvedValueOnce(jsonResponse({ data: [stream('alpha', '', '33214')] }));
      const twitch = client();

      const first = await twitch.fetchStatuses(['alpha'], 'test-token');
      const second = await twitch.fetchStatuses(['alpha'], 'test-token');

      expect(first.get('alpha')?.category).toBe('Fortnite');
      expect(second.get('alpha')?.category).toBe('Fortnite');
      expect(fetchSpy).toHaveBeenCalledTimes(3);
      expect(fetchSpy.mock.calls[1][0]).toBe('https://api.twitch.tv/helix/games?id=33214');
    });

    it('reports a live stream without category as Unknown', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [stream('alpha', '', '')] }));

      const statuses = await client().fetchStatuses(['alpha'], 'test-token');

      expect(statuses.get('alpha')).toEqual({ login: 'alpha', isLive: true, category: 'Unknown' });
    });

    it('does not call the API for an empty list', async () => {
      const statuses = await client().fetchStatuses([], 'test-token');

      expect(statuses.size).toBe(0);
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });

  describe('errors', () => {
    it.each([401, 403])('maps HTTP %i to AuthError', async (status) => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ error: 'Unauthorized' }, { status }));

      await expect(client().fetchStatuses(['alpha'], 'stale-token')).rejects.toBeInstanceOf(AuthError);
    });

    it('maps server errors to TransientError', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('oops', { status: 503, statusText: 'Service Unavailable' }));

      const error = await client().fetchStatuses(['alpha'], 'test-token').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({
        status: 503,
        message: 'Fetching streams failed: HTTP 503 Service Unavailable',
      });
    });

    it('carries the retry hint of a rate limited response', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('', { status: 429, headers: { 'Retry-After': '30' } }));

      const error = await client().fetchStatuses(['alpha'], 'test-token').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ status: 429, retryAfterMs: 30_000 });
    });

    it('maps network failures to TransientError', async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

      const error = await client().fetchStatuses(['alpha'], 'test-token').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toHaveProperty('message', 'Fetching streams failed: fetch failed');
    });

    it('rejects an unexpected response shape', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ streams: [] }));

      await expect(client().fetchStatuses(['alpha'], 'test-token')).rejects.toThrow(
        'Fetching streams failed: unexpected response shape'
      );
    });
  });
});

describe('chunk', () => {
  it('splits a list into fixed-size pieces', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 100)).toEqual([]);
  });
});
