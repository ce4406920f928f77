export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  refreshToken?: string;
  tokenCachePath: string;
  authTimeoutMs: number;
}

export interface RateLimitConfig {
  minTime: number;
  maxConcurrent: number;
}

export interface CLIOptions {
  name?: string;
  description?: string;
  private?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  batchSize?: number;
}

export interface WorkflowOptions {
  playlistName: string;
  description?: string;
  public: boolean;
  dryRun: boolean;
  batchSize: number;
}
