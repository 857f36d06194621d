import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { describeHttpError } from './providers/SpotifyLibraryClient';
import { ConfigError, TransportError } from '../utils/errors';
import { logEvent, logError } from '../utils/logger';

export const SPOTIFY_ACCOUNTS_URL = 'https://accounts.spotify.com';

export const LIBRARY_SCOPES = [
  'user-library-read',
  'playlist-modify-private',
  'playlist-modify-public',
  'user-read-private',
] as const;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),  // 'Bearer'
  expires_in: z.number(),  // seconds
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;  // epoch ms
  scope?: string;
}

export interface SpotifyAuthOptions {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

/**
 * Pulls the authorization code out of whatever the user pasted: the full
 * redirect URL, just its query string, or the bare code.
 */
export function extractAuthCode(input: string): string | null {
  const s = input.trim();
  if (!s) return null;
  if (/^[A-Za-z0-9_-]+$/.test(s)) return s;

  const query = s.includes('?') ? s.slice(s.indexOf('?') + 1) : s;
  const code = new URLSearchParams(query.split('#')[0]).get('code');
  return code && code.trim() ? code.trim() : null;
}

/**
 * Authorization-code flow against the accounts service.
 */
export class SpotifyAuth {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUri: string;
  private readonly http: AxiosInstance;

  constructor(opts: SpotifyAuthOptions) {
    if (!opts.clientId || !opts.clientSecret || !opts.redirectUri) {
      const missing: string[] = [];
      if (!opts.clientId) missing.push('SPOTIFY_CLIENT_ID: required');
      if (!opts.clientSecret) missing.push('SPOTIFY_CLIENT_SECRET: required');
      if (!opts.redirectUri) missing.push('SPOTIFY_REDIRECT_URI: required');
      throw new ConfigError(`Missing Spotify credentials (${missing.join('; ')})`, missing);
    }
    this.clientId = opts.clientId;
    this.clientSecret = opts.clientSecret;
    this.redirectUri = opts.redirectUri;
    this.http = axios.create({
      baseURL: SPOTIFY_ACCOUNTS_URL,
      timeout: opts.timeoutMs ?? 12000,
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  authorizeUrl(opts?: { state?: string; showDialog?: boolean }): string {
    const params = new URLSearchParams({
      client_id: this.clientId,
      response_type: 'code',
      redirect_uri: this.redirectUri,
      scope: LIBRARY_SCOPES.join(' '),
    });
    if (opts?.state) params.set('state', opts.state);
    if (opts?.showDialog ?? true) params.set('show_dialog', 'true');
    return `${SPOTIFY_ACCOUNTS_URL}/authorize?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<TokenSet> {
    return this.requestToken(new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.redirectUri,
    }));
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    const tokens = await this.requestToken(new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    }));
    // The service may omit the refresh token when it has not rotated
    return tokens.refreshToken ? tokens : { ...tokens, refreshToken };
  }

  private async requestToken(body: URLSearchParams): Promise<TokenSet> {
    const grantType = body.get('grant_type');
    const auth = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString('base64');
    let data: unknown;
    try {
      const resp = await this.http.post<unknown>('/api/token', body.toString(), {
        headers: {
          Authorization: `Basic ${auth}`,
          'Content-Type': 'application/x-www-form-urlencoded'
        },
      });
      data = resp.data;
    } catch (error) {
      const { message, status } = describeHttpError(error);
      logError('spotify_token_failed', error instanceof Error ? error : undefined, { grantType, status });
      throw new TransportError(message, 'auth', {
        endpoint: 'POST /api/token',
        cause: error,
        ...(status !== undefined ? { status } : {}),
      });
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError('Unexpected token response from Spotify', 'auth', { endpoint: 'POST /api/token' });
    }

    const token = parsed.data;
    logEvent('spotify_token_obtained', { grantType, expiresIn: token.expires_in });
    return {
      accessToken: token.access_token,
      expiresAt: Date.now() + token.expires_in * 1000,
      ...(token.refresh_token ? { refreshToken: token.refresh_token } : {}),
      ...(token.scope ? { scope: token.scope } : {}),
    };
  }
}
