import { AppConfig, UserProfile } from '../types/music';
import { LibraryClient } from './providers/types';
import { SpotifyLibraryClient } from './providers/SpotifyLibraryClient';
import { SpotifyAuth } from './SpotifyAuth';
import { ConfigError } from '../utils/errors';
import { logEvent } from '../utils/logger';

export interface LibrarySession {
  client: LibraryClient;
  user: UserProfile;
}

/**
 * Builds an authenticated client from the configured access token, or
 * from the refresh token when no access token is set, and resolves the
 * current user.
 */
export async function connectLibrary(config: AppConfig): Promise<LibrarySession> {
  let accessToken = config.spotify.accessToken;

  if (!accessToken && config.spotify.refreshToken) {
    const auth = new SpotifyAuth(config.spotify);
    const tokens = await auth.refresh(config.spotify.refreshToken);
    accessToken = tokens.accessToken;
  }

  if (!accessToken) {
    throw new ConfigError(
      'No Spotify token configured. Run `likeflow auth` and set SPOTIFY_ACCESS_TOKEN or SPOTIFY_REFRESH_TOKEN.',
      ['SPOTIFY_ACCESS_TOKEN: required']
    );
  }

  const client = new SpotifyLibraryClient({ accessToken, timeoutMs: config.spotify.timeoutMs });
  const user = await client.currentUser();
  logEvent('library_session_connected', { userId: user.id, displayName: user.displayName });
  return { client, user };
}
