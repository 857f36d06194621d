import { AppConfig } from '../types/music';
import { ConfigError } from '../utils/errors';
import { z } from 'zod';

// Helpers to coerce and validate env values
const bool = () =>
  z.preprocess((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'string') {
      const s = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'y'].includes(s)) return true;
      if (['false', '0', 'no', 'n'].includes(s)) return false;
    }
    return v;
  }, z.boolean());

const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
      return v;
    }
    return def;
  }, z.number().int().min(min).max(max));

const optionalString = () =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().optional());

const allowedLogLevels = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;
type LogLevel = (typeof allowedLogLevels)[number];

function isLogLevel(value: string): value is LogLevel {
  const levels: ReadonlyArray<string> = allowedLogLevels;
  return levels.includes(value);
}

const EnvSchema = z.object({
  SPOTIFY_CLIENT_ID: optionalString(),
  SPOTIFY_CLIENT_SECRET: optionalString(),
  SPOTIFY_REDIRECT_URI: optionalString().refine((v) => (v ? /^https?:\/\//i.test(v) : true), {
    message: 'SPOTIFY_REDIRECT_URI must start with http/https',
  }),
  SPOTIFY_ACCESS_TOKEN: optionalString(),
  SPOTIFY_REFRESH_TOKEN: optionalString(),
  SPOTIFY_TIMEOUT_SECONDS: intInRange(1, 120, 12),

  // Saved-tracks endpoint accepts at most 50 items per page
  SAVED_TRACKS_PAGE_SIZE: intInRange(1, 50, 50),

  LOG_LEVEL: optionalString(),
  LOG_TO_FILE: bool().optional().default(true),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10),
  LOG_MAX_FILES: intInRange(1, 20, 3),
});

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }
  const data = parsed.data;
  const nodeEnv = (env.NODE_ENV || '').toLowerCase();
  const defaultLogLevel: LogLevel = nodeEnv === 'production' ? 'info' : 'debug';
  const inputLevel = data.LOG_LEVEL ? data.LOG_LEVEL.trim().toLowerCase() : defaultLogLevel;

  return {
    spotify: {
      ...(data.SPOTIFY_CLIENT_ID ? { clientId: data.SPOTIFY_CLIENT_ID } : {}),
      ...(data.SPOTIFY_CLIENT_SECRET ? { clientSecret: data.SPOTIFY_CLIENT_SECRET } : {}),
      ...(data.SPOTIFY_REDIRECT_URI ? { redirectUri: data.SPOTIFY_REDIRECT_URI } : {}),
      ...(data.SPOTIFY_ACCESS_TOKEN ? { accessToken: data.SPOTIFY_ACCESS_TOKEN } : {}),
      ...(data.SPOTIFY_REFRESH_TOKEN ? { refreshToken: data.SPOTIFY_REFRESH_TOKEN } : {}),
      timeoutMs: data.SPOTIFY_TIMEOUT_SECONDS * 1000,
    },
    library: {
      pageSize: data.SAVED_TRACKS_PAGE_SIZE,
    },
    logging: {
      level: isLogLevel(inputLevel) ? inputLevel : defaultLogLevel,
      toFile: data.LOG_TO_FILE,
      maxSizeBytes: data.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: data.LOG_MAX_FILES,
    },
  };
}
