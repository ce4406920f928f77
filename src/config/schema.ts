import { z } from 'zod';

export const SPOTIFY_MAX_TRACKS_PER_REQUEST = 100;

export const SpotifyConfigSchema = z.object({
  clientId: z.string().min(1, 'Spotify Client ID is required'),
  clientSecret: z.string().min(1, 'Spotify Client Secret is required'),
  redirectUri: z.string().url('Spotify Redirect URI must be a valid URL'),
  refreshToken: z.string().min(1).optional(),
  tokenCachePath: z.string().min(1, 'Token cache path is required'),
  authTimeoutMs: z.number().int().min(10000, 'Auth timeout must be at least 10000ms'),
});

export const RateLimitConfigSchema = z.object({
  minTime: z.number().min(0),
  maxConcurrent: z.number().min(1),
});

export const PlaylistConfigSchema = z.object({
  batchSize: z
    .number()
    .int('Batch size must be an integer')
    .min(1, 'Batch size must be at least 1')
    .max(
      SPOTIFY_MAX_TRACKS_PER_REQUEST,
      `Batch size cannot exceed ${SPOTIFY_MAX_TRACKS_PER_REQUEST} tracks per request`
    ),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  spotify: SpotifyConfigSchema,
  rateLimit: z.object({
    spotify: RateLimitConfigSchema,
  }),
  playlist: PlaylistConfigSchema,
  logging: LoggingConfigSchema,
  dryRun: z.boolean(),
});

export const PlaylistNameSchema = z
  .string()
  .trim()
  .min(1, 'Playlist name cannot be empty')
  .max(100, 'Playlist name cannot exceed 100 characters');

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = z.infer<typeof LoggingConfigSchema>['level'];
