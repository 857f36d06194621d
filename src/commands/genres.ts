import { z } from 'zod';
import {
  Command,
  CommandContext,
  UsageError,
  createAndReport,
  parseCommandArgs,
  sharedPlaylistOptions,
  SharedPlaylistSchema,
} from './shared';
import { PlaylistPipeline } from '../services/PlaylistPipeline';
import { formatGenreCounts, formatPreview } from '../utils/format';
import { defaultPlaylistName } from '../utils/tracks';
import { logEvent } from '../utils/logger';

const GENRE_LIST_LIMIT = 30;

const GenreOptionsSchema = SharedPlaylistSchema.extend({
  mode: z.enum(['any', 'all']).default('any'),
  list: z.boolean(),
});

const genresCommand: Command = {
  name: 'genres',
  description: 'Filter saved tracks by artist genre',
  usage: 'genres <genre...> [--mode any|all] [--list] [--name s] [--public] [--create]',

  async execute(args: string[], ctx: CommandContext): Promise<number> {
    const { values, positionals } = parseCommandArgs(args, {
      ...sharedPlaylistOptions,
      mode: { type: 'string' },
      list: { type: 'boolean', default: false },
    }, GenreOptionsSchema);

    // Genres may be given space- or comma-separated
    const genres = positionals
      .flatMap(p => p.split(','))
      .map(g => g.trim())
      .filter(g => g !== '');

    if (genres.length === 0 && !values.list) {
      throw new UsageError('Select at least one genre (or use --list to see the genres in your library).');
    }

    const { client, user } = await ctx.connect();
    ctx.print(`Logged in as: ${user.displayName ?? user.id} (${user.id})`);

    const pipeline = new PlaylistPipeline({
      client,
      userId: user.id,
      pageSize: ctx.config.library.pageSize,
    });
    const result = await pipeline.filterByGenres({ genres, mode: values.mode });

    ctx.print(`Total liked songs: ${result.total}`);

    if (values.list) {
      ctx.print(`Genres in your library (${result.availableGenres.length}):`);
      formatGenreCounts(result.availableGenres, GENRE_LIST_LIMIT).forEach(line => ctx.print(line));
      if (genres.length === 0) return 0;
    }

    ctx.print(`Found ${result.tracks.length} tracks matching ${values.mode} of: ${genres.join(', ')}`);
    logEvent('genres_command_executed', {
      userId: user.id,
      genres,
      mode: values.mode,
      matched: result.tracks.length,
    });

    if (result.tracks.length === 0) {
      ctx.print('No tracks matched your genres. Try --mode any or different genres.');
      return 0;
    }

    formatPreview(result.tracks).forEach(line => ctx.print(line));

    if (!values.create) return 0;
    return createAndReport(pipeline, values.name ?? defaultPlaylistName(genres.join(' + ')), result.tracks, values.public, ctx);
  },
};

export default genresCommand;
