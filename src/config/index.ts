import dotenv from 'dotenv';
import { AppConfigSchema, LoggingConfigSchema, type LogLevel, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

type Env = Record<string, string | undefined>;

export function createConfig(env: Env = process.env): ValidatedAppConfig {
  const rawConfig = {
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID || '',
      clientSecret: env.SPOTIFY_CLIENT_SECRET || '',
      redirectUri: env.SPOTIFY_REDIRECT_URI || 'http://127.0.0.1:8888/callback',
      refreshToken: env.SPOTIFY_REFRESH_TOKEN || undefined,
      tokenCachePath: env.SPOTIFY_TOKEN_CACHE_PATH || '.spotify-token-cache.json',
      authTimeoutMs: parseInt(env.SPOTIFY_AUTH_TIMEOUT_MS || '300000', 10),
    },
    rateLimit: {
      spotify: {
        minTime: parseInt(env.SPOTIFY_RATE_LIMIT_MIN_TIME || '100', 10),
        maxConcurrent: parseInt(env.SPOTIFY_RATE_LIMIT_MAX_CONCURRENT || '1', 10),
      },
    },
    playlist: {
      batchSize: parseInt(env.PLAYLIST_BATCH_SIZE || '100', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    dryRun: env.DRY_RUN === 'true',
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

let cached: ValidatedAppConfig | undefined;

export function getConfig(): ValidatedAppConfig {
  if (!cached) {
    cached = createConfig();
  }
  return cached;
}

/** Log level from the environment alone, so logging works before the full config validates. */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const parsed = LoggingConfigSchema.shape.level.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

export function validateEnvironment(env: Env = process.env): string[] {
  const requiredEnvVars = ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'];

  return requiredEnvVars.filter((envVar) => !env[envVar]);
}

export function printConfigSummary(config: ValidatedAppConfig): void {
  console.log('Configuration Summary:');
  console.log(`- Dry Run: ${config.dryRun ? 'YES' : 'NO'}`);
  console.log(`- Batch Size: ${config.playlist.batchSize}`);
  console.log(`- Log Level: ${config.logging.level}`);
  console.log(`- Refresh Token: ${config.spotify.refreshToken ? 'YES' : 'NO'}`);
  console.log(`- Token Cache: ${config.spotify.tokenCachePath}`);
}
