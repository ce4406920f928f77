import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SpotifyService } from './SpotifyService.js';
import { SpotifyAPIError, ValidationError } from '../types/errors.js';

function createClient() {
  return {
    searchTracks: vi.fn(),
    createPlaylist: vi.fn(),
    addTracksToPlaylist: vi.fn(),
    getMe: vi.fn(),
  };
}

const spotifyTrack = {
  id: 't1',
  uri: 'spotify:track:t1',
  name: 'One More Time',
  artists: [{ id: 'a1', name: 'Daft Punk' }],
  album: { id: 'al1', name: 'Discovery' },
  duration_ms: 320000,
  external_urls: { spotify: 'https://open.spotify.com/track/t1' },
};

describe('SpotifyService', () => {
  let client: ReturnType<typeof createClient>;
  let auth: { ensureAccessToken: Mock<[], Promise<void>> };
  let service: SpotifyService;

  beforeEach(() => {
    client = createClient();
    auth = { ensureAccessToken: vi.fn().mockResolvedValue(undefined) };
    service = new SpotifyService(client, auth, { minTime: 0, maxConcurrent: 1 });
  });

  describe('searchTrack', () => {
    it('requests a single result and converts it', async () => {
      client.searchTracks.mockResolvedValue({ body: { tracks: { items: [spotifyTrack] } } });

      const match = await service.searchTrack('Daft Punk One More Time');

      expect(client.searchTracks).toHaveBeenCalledWith('Daft Punk One More Time', { limit: 1 });
      expect(auth.ensureAccessToken).toHaveBeenCalledTimes(1);
      expect(match).toEqual({
        id: 't1',
        uri: 'spotify:track:t1',
        name: 'One More Time',
        artists: ['Daft Punk'],
        url: 'https://open.spotify.com/track/t1',
      });
    });

    it('returns null when there are no results', async () => {
      client.searchTracks.mockResolvedValue({ body: { tracks: { items: [] } } });
      expect(await service.searchTrack('nothing at all')).toBeNull();
    });

    it('returns null when the response has no tracks section', async () => {
      client.searchTracks.mockResolvedValue({ body: {} });
      expect(await service.searchTrack('nothing at all')).toBeNull();
    });

    it('wraps client errors once, without retrying', async () => {
      client.searchTracks.mockRejectedValue(
        Object.assign(new Error('Too Many Requests'), { statusCode: 429 })
      );

      const search = service.searchTrack('Daft Punk One More Time');

      await expect(search).rejects.toBeInstanceOf(SpotifyAPIError);
      await expect(search).rejects.toMatchObject({
        message: 'Spotify API Error: searchTrack failed: Too Many Requests',
        context: { operation: 'searchTrack', statusCode: 429 },
      });
      expect(client.searchTracks).toHaveBeenCalledTimes(1);
    });

    it('does not search when the token cannot be refreshed', async () => {
      auth.ensureAccessToken.mockRejectedValue(new Error('expired'));

      await expect(service.searchTrack('anything')).rejects.toThrow('expired');
      expect(client.searchTracks).not.toHaveBeenCalled();
    });
  });

  describe('createPlaylist', () => {
    it('creates a playlist with the given visibility and description', async () => {
      client.createPlaylist.mockResolvedValue({
        body: {
          id: 'p1',
          name: 'Road Trip',
          description: null,
          public: true,
          external_urls: { spotify: 'https://open.spotify.com/playlist/p1' },
        },
      });

      const playlist = await service.createPlaylist('Road Trip', {
        description: 'test playlist',
        public: true,
      });

      expect(client.createPlaylist).toHaveBeenCalledWith('Road Trip', {
        public: true,
        description: 'test playlist',
      });
      expect(playlist).toEqual({
        id: 'p1',
        name: 'Road Trip',
        description: undefined,
        public: true,
        external_urls: { spotify: 'https://open.spotify.com/playlist/p1' },
      });
    });

    it('defaults to a public playlist', async () => {
      client.createPlaylist.mockResolvedValue({
        body: {
          id: 'p2',
          name: 'Defaults',
          description: '',
          public: true,
          external_urls: { spotify: 'https://open.spotify.com/playlist/p2' },
        },
      });

      await service.createPlaylist('Defaults');

      expect(client.createPlaylist).toHaveBeenCalledWith('Defaults', {
        public: true,
        description: '',
      });
    });
  });

  describe('addTracks', () => {
    it('adds up to 100 tracks in one request', async () => {
      client.addTracksToPlaylist.mockResolvedValue({ body: { snapshot_id: 's1' } });
      const uris = Array.from({ length: 100 }, (_, i) => `spotify:track:${i}`);

      await service.addTracks('p1', uris);

      expect(client.addTracksToPlaylist).toHaveBeenCalledTimes(1);
      expect(client.addTracksToPlaylist).toHaveBeenCalledWith('p1', uris);
    });

    it('rejects more than 100 tracks', async () => {
      const uris = Array.from({ length: 101 }, (_, i) => `spotify:track:${i}`);

      await expect(service.addTracks('p1', uris)).rejects.toBeInstanceOf(ValidationError);
      expect(client.addTracksToPlaylist).not.toHaveBeenCalled();
    });

    it('skips the request for an empty list', async () => {
      await service.addTracks('p1', []);
      expect(client.addTracksToPlaylist).not.toHaveBeenCalled();
    });
  });

  describe('getCurrentUser', () => {
    it('falls back to the user id without a display name', async () => {
      client.getMe.mockResolvedValue({ body: { id: 'user-1', display_name: undefined } });
      expect(await service.getCurrentUser()).toEqual({ id: 'user-1', displayName: 'user-1' });
    });
  });
});
