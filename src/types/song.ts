import type { MalformedLineError } from './errors.js';

export interface SongRequest {
  readonly artist: string;
  readonly title: string;
  readonly line: number;
  readonly raw: string;
}

export interface ParsedSongList {
  requests: SongRequest[];
  malformed: MalformedLineError[];
}

export interface MatchedTrack {
  id: string;
  uri: string;
  name: string;
  artists: string[];
  url: string;
}

export interface MatchResult {
  request: SongRequest;
  trackId?: string;
  track?: MatchedTrack;
}

export interface ProcessingStats {
  total: number;
  matched: number;
  unmatched: number;
  malformed: number;
  batches: number;
}
