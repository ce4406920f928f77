import type { MalformedLineError } from './errors.js';
import type { MatchedTrack, MatchResult, SongRequest } from './song.js';

export interface SpotifyPlaylist {
  id: string;
  name: string;
  description?: string;
  public: boolean;
  external_urls: {
    spotify: string;
  };
}

export interface PlaylistOptions {
  description?: string;
  public?: boolean;
}

export interface SpotifyUser {
  id: string;
  displayName: string;
}

/**
 * The remote capabilities the workflow needs. `SpotifyService` is the real
 * implementation; tests supply in-memory fakes.
 */
export interface PlaylistProvider {
  searchTrack(query: string): Promise<MatchedTrack | null>;
  createPlaylist(name: string, options?: PlaylistOptions): Promise<SpotifyPlaylist>;
  addTracks(playlistId: string, trackUris: string[]): Promise<void>;
}

export interface PlaylistBuildReport {
  playlistId: string;
  playlistName: string;
  playlistUrl: string;
  matched: MatchResult[];
  unmatched: SongRequest[];
  malformed: MalformedLineError[];
  /** Size of each chunk submitted to the playlist, in order. */
  batches: number[];
  dryRun: boolean;
}
