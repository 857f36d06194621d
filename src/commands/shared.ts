import { parseArgs, ParseArgsConfig } from 'node:util';
import { z } from 'zod';
import { AppConfig, Track } from '../types/music';
import { LibrarySession } from '../services/session';
import { PlaylistPipeline } from '../services/PlaylistPipeline';
import { errorMessage, PartialPlaylistError } from '../utils/errors';
import { formatPlaylistCreated } from '../utils/format';
import { playlistUrl } from '../utils/tracks';

export interface CommandContext {
  config: AppConfig;
  print: (line: string) => void;
  connect: () => Promise<LibrarySession>;
}

export interface Command {
  name: string;
  description: string;
  usage: string;
  /** Resolves to the process exit code. */
  execute(args: string[], ctx: CommandContext): Promise<number>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type OptionsConfig = NonNullable<ParseArgsConfig['options']>;

/**
 * Parses argv with `parseArgs`, then validates the option values with
 * `schema`. Any problem becomes a {@link UsageError}.
 */
export function parseCommandArgs<S extends z.ZodTypeAny>(
  args: string[],
  options: OptionsConfig,
  schema: S
): { values: z.output<S>; positionals: string[] } {
  const config: ParseArgsConfig = { args, options, allowPositionals: true, strict: true };
  let parsed: { values: unknown; positionals: string[] };
  try {
    parsed = parseArgs(config);
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  const result = schema.safeParse(parsed.values);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join('; ');
    throw new UsageError(issues);
  }
  return { values: result.data, positionals: parsed.positionals };
}

// Shared option schemas
export const numberOption = (min: number, max: number) =>
  z.coerce.number().min(min).max(max).optional();

export const sharedPlaylistOptions = {
  name: { type: 'string' },
  public: { type: 'boolean', default: false },
  create: { type: 'boolean', default: false },
} as const satisfies OptionsConfig;

export const SharedPlaylistSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  public: z.boolean(),
  create: z.boolean(),
});

/**
 * Creates the playlist and prints where to find it. A partially filled
 * playlist is reported with exit code 2.
 */
export async function createAndReport(
  pipeline: PlaylistPipeline,
  name: string,
  tracks: ReadonlyArray<Track>,
  isPublic: boolean,
  ctx: CommandContext
): Promise<number> {
  try {
    const playlist = await pipeline.createPlaylist(name, tracks, isPublic);
    formatPlaylistCreated(playlist).forEach(line => ctx.print(line));
    return 0;
  } catch (error) {
    if (!(error instanceof PartialPlaylistError)) throw error;
    ctx.print(error.details.userMessage);
    ctx.print(`Open in Spotify: ${playlistUrl(error.playlistId)}`);
    return 2;
  }
}
