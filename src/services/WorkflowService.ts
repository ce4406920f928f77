import { ReportService, formatSong } from './ReportService.js';
import { Logger } from '../utils/logger.js';
import { chunk } from '../utils/batching.js';
import { SPOTIFY_MAX_TRACKS_PER_REQUEST } from '../config/schema.js';
import { AppError, SpotifyAPIError, ValidationError } from '../types/errors.js';
import type {
  MatchResult,
  ParsedSongList,
  PlaylistBuildReport,
  PlaylistProvider,
  ProcessingStats,
  SongRequest,
  SpotifyPlaylist,
  WorkflowOptions,
} from '../types/index.js';

export const DRY_RUN_PLAYLIST_ID = 'dry-run-playlist';

export function buildSearchQuery(request: SongRequest): string {
  return `${request.artist} ${request.title}`;
}

export function playlistUrlFor(playlist: SpotifyPlaylist): string {
  if (playlist.id === DRY_RUN_PLAYLIST_ID) return '';
  return playlist.external_urls.spotify || `https://open.spotify.com/playlist/${playlist.id}`;
}

export function assertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size < 1 || size > SPOTIFY_MAX_TRACKS_PER_REQUEST) {
    throw new ValidationError(
      `Batch size must be a whole number between 1 and ${SPOTIFY_MAX_TRACKS_PER_REQUEST}`,
      { size }
    );
  }
}

export class WorkflowService {
  constructor(
    private readonly provider: PlaylistProvider,
    private readonly reporter: ReportService = new ReportService()
  ) {}

  async run(songs: ParsedSongList, options: WorkflowOptions): Promise<PlaylistBuildReport> {
    assertBatchSize(options.batchSize);

    Logger.info('🎵 Starting playlist workflow', {
      playlistName: options.playlistName,
      songs: songs.requests.length,
      dryRun: options.dryRun,
    });

    this.reporter.start(songs.requests.length, songs.malformed.length);

    const playlist = await this.createPlaylist(options);
    this.reporter.playlistCreated(playlist.name, options.dryRun);

    const results = await this.matchSongs(songs.requests);
    const matched = results.filter((result) => result.trackId !== undefined);
    const unmatched = results
      .filter((result) => result.trackId === undefined)
      .map((result) => result.request);

    const uris = matched.flatMap((result) => (result.track ? [result.track.uri] : []));
    const batches = await this.submitInBatches(playlist.id, uris, options);

    const report: PlaylistBuildReport = {
      playlistId: playlist.id,
      playlistName: playlist.name,
      playlistUrl: playlistUrlFor(playlist),
      matched,
      unmatched,
      malformed: songs.malformed,
      batches,
      dryRun: options.dryRun,
    };

    this.logFinalStats(report);
    this.reporter.summary(report);
    return report;
  }

  /** One search per request; the first candidate wins. */
  async matchSongs(requests: readonly SongRequest[]): Promise<MatchResult[]> {
    const results: MatchResult[] = [];

    for (const [i, request] of requests.entries()) {
      this.reporter.progress(i + 1, requests.length, request);

      const track = await this.provider.searchTrack(buildSearchQuery(request));
      if (track) {
        const result: MatchResult = { request, trackId: track.id, track };
        this.reporter.found(result);
        results.push(result);
      } else {
        Logger.debug(`No match for: ${formatSong(request)}`);
        this.reporter.notFound(request);
        results.push({ request });
      }
    }

    return results;
  }

  /** Returns the size of each submitted chunk. A failed chunk stops the run. */
  async submitInBatches(
    playlistId: string,
    trackUris: readonly string[],
    options: Pick<WorkflowOptions, 'batchSize' | 'dryRun'>
  ): Promise<number[]> {
    assertBatchSize(options.batchSize);
    const batches = chunk(trackUris, options.batchSize);
    const sizes: number[] = [];

    for (const [i, batch] of batches.entries()) {
      if (!options.dryRun) {
        try {
          await this.provider.addTracks(playlistId, batch);
        } catch (error) {
          Logger.error('Failed to add batch to playlist', {
            playlistId,
            batch: i + 1,
            of: batches.length,
            size: batch.length,
            error: error instanceof Error ? error.message : String(error),
          });
          if (error instanceof AppError) throw error;
          throw new SpotifyAPIError(
            `Failed to add batch ${i + 1}/${batches.length} to playlist`,
            { playlistId, batch: i + 1, size: batch.length }
          );
        }
      }

      this.reporter.batchSubmitted(i + 1, batches.length, batch.length, options.dryRun);
      sizes.push(batch.length);
    }

    return sizes;
  }

  private async createPlaylist(options: WorkflowOptions): Promise<SpotifyPlaylist> {
    if (options.dryRun) {
      return {
        id: DRY_RUN_PLAYLIST_ID,
        name: options.playlistName,
        description: options.description,
        public: options.public,
        external_urls: { spotify: '' },
      };
    }

    Logger.info(`📝 Creating new playlist: '${options.playlistName}'...`);
    return this.provider.createPlaylist(options.playlistName, {
      description: options.description,
      public: options.public,
    });
  }

  private logFinalStats(report: PlaylistBuildReport): void {
    const stats: ProcessingStats = {
      total: report.matched.length + report.unmatched.length,
      matched: report.matched.length,
      unmatched: report.unmatched.length,
      malformed: report.malformed.length,
      batches: report.batches.length,
    };

    Logger.info('📊 Processing completed', {
      ...stats,
      matchRate: stats.total > 0 ? `${((stats.matched / stats.total) * 100).toFixed(1)}%` : '0%',
    });
  }
}
