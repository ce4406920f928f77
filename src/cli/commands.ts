import { Command, InvalidArgumentError } from 'commander';
import SpotifyWebApi from 'spotify-web-api-node';
import dayjs from 'dayjs';
import { getConfig, printConfigSummary } from '../config/index.js';
import { SPOTIFY_MAX_TRACKS_PER_REQUEST } from '../config/schema.js';
import { AuthService } from '../services/AuthService.js';
import { InputService } from '../services/InputService.js';
import { SpotifyService } from '../services/SpotifyService.js';
import { WorkflowService } from '../services/WorkflowService.js';
import { Logger } from '../utils/logger.js';
import { parsePlaylistName, promptPlaylistName } from './prompt.js';
import type { CLIOptions, PlaylistBuildReport } from '../types/index.js';

export const DEFAULT_SONG_FILE = 'songs.txt';

export function parseBatchSize(value: string): number {
  const size = Number(value);
  if (!Number.isInteger(size) || size < 1 || size > SPOTIFY_MAX_TRACKS_PER_REQUEST) {
    throw new InvalidArgumentError(
      `Must be a whole number between 1 and ${SPOTIFY_MAX_TRACKS_PER_REQUEST}.`
    );
  }
  return size;
}

export function defaultDescription(date: Date = new Date()): string {
  return `Created by songs-to-playlist on ${dayjs(date).format('YYYY-MM-DD')}`;
}

export function parseOptions(raw: CLIOptions): CLIOptions {
  return {
    name: raw.name,
    description: raw.description,
    private: raw.private ?? false,
    dryRun: raw.dryRun ?? false,
    verbose: raw.verbose ?? false,
    batchSize: raw.batchSize,
  };
}

export async function createPlaylistFromFile(
  file: string,
  options: CLIOptions
): Promise<PlaylistBuildReport> {
  const config = getConfig();

  if (options.verbose) {
    Logger.setLevel('debug');
    printConfigSummary(config);
  }

  console.log('\n🎵 Welcome to Spotify Playlist Creator! 🎵\n');
  console.log(`📖 Reading songs from ${file}...`);
  const songs = await InputService.readSongFile(file);
  console.log(`✅ Found ${songs.requests.length} songs in file`);

  const api = new SpotifyWebApi({
    clientId: config.spotify.clientId,
    clientSecret: config.spotify.clientSecret,
    redirectUri: config.spotify.redirectUri,
  });
  const auth = new AuthService(api, config.spotify);
  await auth.authenticate();

  const spotify = new SpotifyService(api, auth, config.rateLimit.spotify);
  const user = await spotify.getCurrentUser();
  console.log(`👤 Logged in as ${user.displayName}`);

  const playlistName =
    options.name !== undefined
      ? parsePlaylistName(options.name)
      : await promptPlaylistName();

  const workflow = new WorkflowService(spotify);
  return workflow.run(songs, {
    playlistName,
    description: options.description ?? defaultDescription(),
    public: !options.private,
    dryRun: options.dryRun || config.dryRun,
    batchSize: options.batchSize ?? config.playlist.batchSize,
  });
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('songs-to-playlist')
    .description('Create a Spotify playlist from a list of "Artist - Song" lines')
    .version('1.0.0')
    .argument('[file]', 'Text file with one "Artist - Song" per line', DEFAULT_SONG_FILE)
    .option('-n, --name <name>', 'Playlist name (prompted when omitted)')
    .option('-d, --description <text>', 'Playlist description')
    .option('--private', 'Create a private playlist instead of a public one')
    .option('--dry-run', 'Search for songs without creating or changing a playlist')
    .option('-v, --verbose', 'Enable debug logging')
    .option(
      '-b, --batch-size <n>',
      `Tracks added per request (max ${SPOTIFY_MAX_TRACKS_PER_REQUEST})`,
      parseBatchSize
    )
    .action(async (file: string, raw: CLIOptions) => {
      await createPlaylistFromFile(file, parseOptions(raw));
    });

  return program;
}
