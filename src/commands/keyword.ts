import { z } from 'zod';
import {
  Command,
  CommandContext,
  UsageError,
  createAndReport,
  numberOption,
  parseCommandArgs,
  sharedPlaylistOptions,
  SharedPlaylistSchema,
} from './shared';
import { FilterCriteria } from '../types/music';
import { PlaylistPipeline } from '../services/PlaylistPipeline';
import { formatPreview } from '../utils/format';
import { defaultPlaylistName } from '../utils/tracks';
import { logEvent } from '../utils/logger';

// Range of the tempo control; its end points mean "no bound".
export const MAX_BPM = 220;

const KeywordOptionsSchema = SharedPlaylistSchema.extend({
  'min-bpm': numberOption(0, MAX_BPM),
  'max-bpm': numberOption(0, MAX_BPM),
  'min-dance': numberOption(0, 1),
  'min-valence': numberOption(0, 1),
}).refine((o) => o['min-bpm'] === undefined || o['max-bpm'] === undefined || o['min-bpm'] <= o['max-bpm'], {
  message: 'min-bpm must not exceed max-bpm',
  path: ['min-bpm'],
});

type KeywordOptions = z.infer<typeof KeywordOptionsSchema>;

export function toFilterCriteria(keyword: string, o: KeywordOptions): FilterCriteria {
  const minBpm = o['min-bpm'];
  const maxBpm = o['max-bpm'];
  const minDance = o['min-dance'];
  const minValence = o['min-valence'];
  return {
    keyword,
    ...(minBpm !== undefined && minBpm > 0 ? { minTempo: minBpm } : {}),
    ...(maxBpm !== undefined && maxBpm < MAX_BPM ? { maxTempo: maxBpm } : {}),
    ...(minDance !== undefined && minDance > 0 ? { minDanceability: minDance } : {}),
    ...(minValence !== undefined && minValence > 0 ? { minValence } : {}),
  };
}

const keywordCommand: Command = {
  name: 'keyword',
  description: 'Filter saved tracks by keyword and audio features',
  usage: 'keyword <keyword> [--min-bpm n] [--max-bpm n] [--min-dance x] [--min-valence x] [--name s] [--public] [--create]',

  async execute(args: string[], ctx: CommandContext): Promise<number> {
    const { values, positionals } = parseCommandArgs(args, {
      ...sharedPlaylistOptions,
      'min-bpm': { type: 'string' },
      'max-bpm': { type: 'string' },
      'min-dance': { type: 'string' },
      'min-valence': { type: 'string' },
    }, KeywordOptionsSchema);

    const keyword = positionals.join(' ');
    if (!keyword.trim()) {
      throw new UsageError('Please enter a keyword.');
    }

    const criteria = toFilterCriteria(keyword, values);
    const { client, user } = await ctx.connect();
    ctx.print(`Logged in as: ${user.displayName ?? user.id} (${user.id})`);

    const pipeline = new PlaylistPipeline({
      client,
      userId: user.id,
      pageSize: ctx.config.library.pageSize,
    });
    const result = await pipeline.filterByKeyword(criteria);

    ctx.print(`Total liked songs: ${result.total}`);
    ctx.print(`Found ${result.tracks.length} matching tracks`);
    logEvent('keyword_command_executed', { userId: user.id, keyword, matched: result.tracks.length });

    if (result.tracks.length === 0) {
      ctx.print('No tracks matched your filters. Try relaxing filters or a different keyword.');
      return 0;
    }

    formatPreview(result.tracks).forEach(line => ctx.print(line));

    if (!values.create) return 0;
    return createAndReport(pipeline, values.name ?? defaultPlaylistName(keyword), result.tracks, values.public, ctx);
  },
};

export default keywordCommand;
