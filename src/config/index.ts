import { config } from 'dotenv';
import { AppConfig } from '../types/music';
import { ConfigError } from '../utils/errors';
import { loadAppConfig } from './schema';

// Load environment variables
config();

export { loadAppConfig };

/**
 * Logging settings for the logger, which is built on import. An invalid
 * environment falls back to the default logging settings here; the CLI
 * reports the problem when it loads the full configuration.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): AppConfig['logging'] {
  try {
    return loadAppConfig(env).logging;
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    return loadAppConfig({ NODE_ENV: env.NODE_ENV, LOG_LEVEL: env.LOG_LEVEL }).logging;
  }
}
