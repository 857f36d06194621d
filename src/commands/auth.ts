import { Command, CommandContext, UsageError } from './shared';
import { SpotifyAuth, extractAuthCode } from '../services/SpotifyAuth';
import { logEvent } from '../utils/logger';

const authCommand: Command = {
  name: 'auth',
  description: 'Connect your Spotify account (authorization-code flow)',
  usage: 'auth [redirected-url-or-code]',

  async execute(args: string[], ctx: CommandContext): Promise<number> {
    const auth = new SpotifyAuth(ctx.config.spotify);
    const input = args.join(' ').trim();

    if (!input) {
      ctx.print('Open this URL, approve access, then run `likeflow auth <redirected-url>`:');
      ctx.print(auth.authorizeUrl());
      return 0;
    }

    const code = extractAuthCode(input);
    if (!code) {
      throw new UsageError('Could not find an authorization code in the given URL (it should contain "?code=...").');
    }

    const tokens = await auth.exchangeCode(code);
    logEvent('auth_command_completed', { scope: tokens.scope });

    ctx.print('Authentication successful. Add these to your .env:');
    ctx.print(`SPOTIFY_ACCESS_TOKEN=${tokens.accessToken}`);
    if (tokens.refreshToken) ctx.print(`SPOTIFY_REFRESH_TOKEN=${tokens.refreshToken}`);
    ctx.print(`Access token expires at ${new Date(tokens.expiresAt).toISOString()}`);
    return 0;
  },
};

export default authCommand;
