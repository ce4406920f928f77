import type SpotifyWebApi from 'spotify-web-api-node';
import Bottleneck from 'bottleneck';
import { SPOTIFY_MAX_TRACKS_PER_REQUEST } from '../config/schema.js';
import { SpotifyAPIError, ValidationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type {
  MatchedTrack,
  PlaylistOptions,
  PlaylistProvider,
  RateLimitConfig,
  SpotifyPlaylist,
  SpotifyUser,
} from '../types/index.js';

export type SpotifyClient = Pick<
  SpotifyWebApi,
  'searchTracks' | 'createPlaylist' | 'addTracksToPlaylist' | 'getMe'
>;

export interface AccessTokenSource {
  ensureAccessToken(): Promise<void>;
}

export class SpotifyService implements PlaylistProvider {
  private limiter: Bottleneck;

  constructor(
    private readonly api: SpotifyClient,
    private readonly auth: AccessTokenSource,
    rateLimit: RateLimitConfig
  ) {
    this.limiter = new Bottleneck(rateLimit);
  }

  /** Client errors become `SpotifyAPIError`; nothing is retried here. */
  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    await this.auth.ensureAccessToken();

    try {
      return await this.limiter.schedule(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const statusCode =
        error && typeof error === 'object' && 'statusCode' in error ? error.statusCode : undefined;
      throw new SpotifyAPIError(`${operation} failed: ${message}`, { operation, statusCode });
    }
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    const response = await this.call('getCurrentUser', () => this.api.getMe());
    return {
      id: response.body.id,
      displayName: response.body.display_name || response.body.id,
    };
  }

  async searchTrack(query: string): Promise<MatchedTrack | null> {
    Logger.debug('Searching Spotify', { query });
    const response = await this.call('searchTrack', () =>
      this.api.searchTracks(query, { limit: 1 })
    );

    const first = response.body.tracks?.items[0];
    return first ? this.convertSpotifyTrack(first) : null;
  }

  async createPlaylist(name: string, options?: PlaylistOptions): Promise<SpotifyPlaylist> {
    const isPublic = options?.public ?? true;
    Logger.debug('Creating playlist', { name, public: isPublic });

    const response = await this.call('createPlaylist', () =>
      this.api.createPlaylist(name, {
        public: isPublic,
        description: options?.description ?? '',
      })
    );

    return this.convertSpotifyPlaylist(response.body);
  }

  async addTracks(playlistId: string, trackUris: string[]): Promise<void> {
    if (trackUris.length > SPOTIFY_MAX_TRACKS_PER_REQUEST) {
      throw new ValidationError(
        `Cannot add more than ${SPOTIFY_MAX_TRACKS_PER_REQUEST} tracks in one request`,
        { count: trackUris.length }
      );
    }
    if (!trackUris.length) return;

    await this.call('addTracks', () => this.api.addTracksToPlaylist(playlistId, trackUris));
    Logger.debug(`Added ${trackUris.length} tracks to playlist ${playlistId}`);
  }

  private convertSpotifyTrack(track: SpotifyApi.TrackObjectFull): MatchedTrack {
    return {
      id: track.id,
      uri: track.uri,
      name: track.name,
      artists: track.artists.map((artist) => artist.name),
      url: track.external_urls.spotify,
    };
  }

  private convertSpotifyPlaylist(playlist: SpotifyApi.CreatePlaylistResponse): SpotifyPlaylist {
    return {
      id: playlist.id,
      name: playlist.name,
      description: playlist.description ?? undefined,
      public: playlist.public ?? false,
      external_urls: playlist.external_urls,
    };
  }
}
