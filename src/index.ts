#!/usr/bin/env node
import { loadAppConfig } from './config';
import { logDebug, logError } from './utils/logger';
import { AppError, ConfigError, errorMessage } from './utils/errors';
import { connectLibrary } from './services/session';
import { Command, CommandContext, UsageError } from './commands/shared';
import authCommand from './commands/auth';
import keywordCommand from './commands/keyword';
import genresCommand from './commands/genres';

export const commands: ReadonlyArray<Command> = [authCommand, keywordCommand, genresCommand];

export function usage(): string[] {
  return [
    'Usage: likeflow <command> [options]',
    '',
    ...commands.map(c => `  ${c.usage}\n      ${c.description}`),
  ];
}

export function createContext(
  print: (line: string) => void = line => console.log(line),
  env: NodeJS.ProcessEnv = process.env
): CommandContext {
  const config = loadAppConfig(env);
  return {
    config,
    print,
    connect: () => connectLibrary(config),
  };
}

/**
 * Runs one command and resolves to the exit code. Errors are reported
 * through `ctx.print` and the logger, never rethrown.
 */
export async function runCli(argv: string[], ctx: CommandContext): Promise<number> {
  const [name, ...args] = argv;
  if (!name || name === 'help' || name === '--help' || name === '-h') {
    usage().forEach(line => ctx.print(line));
    return name ? 0 : 1;
  }

  const command = commands.find(c => c.name === name);
  if (!command) {
    ctx.print(`Unknown command: ${name}`);
    usage().forEach(line => ctx.print(line));
    return 1;
  }

  try {
    logDebug('command_started', { command: name, args });
    return await command.execute(args, ctx);
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.print(`${error.message}`);
      ctx.print(`Usage: likeflow ${command.usage}`);
      return 1;
    }
    if (error instanceof AppError) {
      logError('command_failed', error, { command: name, ...error.toJSON() });
      ctx.print(error.details.userMessage);
      return 1;
    }
    logError('command_crashed', error instanceof Error ? error : undefined, {
      command: name,
      error: errorMessage(error),
    });
    ctx.print(`Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}

/**
 * Loads the configuration, then runs the command. A bad environment is
 * reported like any other command failure.
 */
export async function main(
  argv: string[],
  print: (line: string) => void = line => console.log(line),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let ctx: CommandContext;
  try {
    ctx = createContext(print, env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logError('config_invalid', error, { issues: error.issues });
    print(error.details.userMessage);
    return 1;
  }
  return runCli(argv, ctx);
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
