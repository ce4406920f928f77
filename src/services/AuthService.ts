import { createServer } from 'http';
import { randomBytes } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import type SpotifyWebApi from 'spotify-web-api-node';
import { z } from 'zod';
import { AuthenticationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { SpotifyConfig } from '../types/index.js';

export const SPOTIFY_SCOPES = ['playlist-modify-public', 'playlist-modify-private'];

const REFRESH_MARGIN_MS = 60 * 1000;

const TokenSetSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number(),
});

export type TokenSet = z.infer<typeof TokenSetSchema>;

export type SpotifyAuthClient = Pick<
  SpotifyWebApi,
  | 'setAccessToken'
  | 'setRefreshToken'
  | 'refreshAccessToken'
  | 'authorizationCodeGrant'
  | 'createAuthorizeURL'
>;

/** Resolves with the `code` Spotify sends back to the redirect URI. */
export type AuthorizationCodeReceiver = (authorizeUrl: string, state: string) => Promise<string>;

export class AuthService {
  private tokens: TokenSet | null = null;
  private readonly receiveCode: AuthorizationCodeReceiver;

  constructor(
    private readonly api: SpotifyAuthClient,
    private readonly config: SpotifyConfig,
    receiveCode?: AuthorizationCodeReceiver
  ) {
    this.receiveCode =
      receiveCode ?? ((url, state) => this.waitForCallback(url, state));
  }

  async authenticate(): Promise<TokenSet> {
    Logger.info('🔑 Setting up Spotify authentication...');

    const cached = await this.readCache();
    if (cached && cached.expiresAt - REFRESH_MARGIN_MS > Date.now()) {
      Logger.debug('Using cached Spotify access token');
      this.apply(cached);
      return cached;
    }

    if (cached) {
      Logger.debug('Refreshing Spotify access token', { source: 'cache' });
      try {
        return await this.refresh(cached.refreshToken);
      } catch (error) {
        if (!(error instanceof AuthenticationError)) throw error;
        Logger.warn('Cached refresh token was rejected, trying other sources', {
          error: error.message,
        });
      }
    }

    const envToken = this.config.refreshToken;
    if (envToken && envToken !== cached?.refreshToken) {
      Logger.debug('Refreshing Spotify access token', { source: 'env' });
      return this.refresh(envToken);
    }

    return this.authorize();
  }

  async ensureAccessToken(): Promise<void> {
    if (!this.tokens) {
      throw new AuthenticationError('Not authenticated with Spotify');
    }

    if (this.tokens.expiresAt - REFRESH_MARGIN_MS <= Date.now()) {
      await this.refresh(this.tokens.refreshToken);
    }
  }

  private async refresh(refreshToken: string): Promise<TokenSet> {
    this.api.setRefreshToken(refreshToken);

    try {
      const data = await this.api.refreshAccessToken();
      // Spotify may rotate the refresh token; the old one can stop working.
      const rotated = 'refresh_token' in data.body ? data.body.refresh_token : undefined;
      const tokens: TokenSet = {
        accessToken: data.body.access_token,
        refreshToken: typeof rotated === 'string' && rotated ? rotated : refreshToken,
        expiresAt: Date.now() + (data.body.expires_in || 3600) * 1000,
      };
      await this.store(tokens);
      Logger.debug('Spotify access token refreshed successfully');
      return tokens;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new AuthenticationError(`Failed to refresh access token: ${message}`);
    }
  }

  private async authorize(): Promise<TokenSet> {
    const state = randomBytes(8).toString('hex');
    const authorizeUrl = this.api.createAuthorizeURL(SPOTIFY_SCOPES, state);

    const code = await this.receiveCode(authorizeUrl, state);

    try {
      const data = await this.api.authorizationCodeGrant(code);
      const tokens: TokenSet = {
        accessToken: data.body.access_token,
        refreshToken: data.body.refresh_token,
        expiresAt: Date.now() + data.body.expires_in * 1000,
      };
      await this.store(tokens);
      Logger.info('✅ Authentication successful!');
      return tokens;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new AuthenticationError(`Failed to exchange authorization code: ${message}`);
    }
  }

  private waitForCallback(authorizeUrl: string, state: string): Promise<string> {
    const redirect = new URL(this.config.redirectUri);

    console.log('\n🌐 Open this URL in your browser to authorize access:\n');
    console.log(`   ${authorizeUrl}\n`);

    return new Promise<string>((resolve, reject) => {
      const server = createServer((req, res) => {
        const url = new URL(req.url ?? '/', redirect.origin);
        if (url.pathname !== redirect.pathname) {
          res.writeHead(404).end();
          return;
        }

        const error = url.searchParams.get('error');
        const code = url.searchParams.get('code');
        const returnedState = url.searchParams.get('state');

        if (error || !code || returnedState !== state) {
          res.writeHead(400, { 'Content-Type': 'text/plain' }).end('Authorization failed.');
          finish(
            new AuthenticationError(
              error ? `Authorization denied: ${error}` : 'Invalid authorization callback',
              { error, stateMatches: returnedState === state }
            )
          );
          return;
        }

        res
          .writeHead(200, { 'Content-Type': 'text/plain' })
          .end('Authorization complete. You can close this window.');
        finish(null, code);
      });

      const timer = setTimeout(() => {
        finish(
          new AuthenticationError('Timed out waiting for authorization', {
            timeoutMs: this.config.authTimeoutMs,
          })
        );
      }, this.config.authTimeoutMs);

      const finish = (error: Error | null, code?: string): void => {
        clearTimeout(timer);
        server.close();
        if (error || !code) {
          reject(error ?? new AuthenticationError('No authorization code received'));
        } else {
          resolve(code);
        }
      };

      server.on('error', (error) => {
        finish(
          new AuthenticationError(`Could not start callback server: ${error.message}`, {
            redirectUri: this.config.redirectUri,
          })
        );
      });

      server.listen(Number(redirect.port || 80), redirect.hostname, () => {
        Logger.debug(`Waiting for Spotify callback on ${this.config.redirectUri}`);
      });
    });
  }

  private apply(tokens: TokenSet): void {
    this.tokens = tokens;
    this.api.setAccessToken(tokens.accessToken);
    this.api.setRefreshToken(tokens.refreshToken);
  }

  private async store(tokens: TokenSet): Promise<void> {
    this.apply(tokens);
    try {
      await writeFile(this.config.tokenCachePath, JSON.stringify(tokens, null, 2), {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      Logger.warn('Could not write token cache', {
        path: this.config.tokenCachePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async readCache(): Promise<TokenSet | null> {
    let content: string;
    try {
      content = await readFile(this.config.tokenCachePath, 'utf8');
    } catch {
      return null;
    }

    try {
      const parsed = TokenSetSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
    } catch (error) {
      Logger.debug('Token cache is not valid JSON', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    Logger.warn('Ignoring unreadable token cache', { path: this.config.tokenCachePath });
    return null;
  }
}
