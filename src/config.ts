/**
 * Configuration
 *
 * Command-line flags win over environment variables, which win over the
 * defaults. Everything is validated once at startup; a bad value stops the
 * program before the terminal is locked.
 */

import { z } from 'zod';
import { DEFAULT_CORNER_THRESHOLD } from './core/corners';
import { LOG_LEVELS } from './logger';
import { THEME_MODES } from './themes';

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export interface CliArgs {
  game?: string;
  theme?: string;
  logFile?: string;
  logLevel?: string;
  yes: boolean;
  list: boolean;
  help: boolean;
}

const VALUE_FLAGS: Record<string, 'theme' | 'logFile' | 'logLevel'> = {
  '--theme': 'theme',
  '--log-file': 'logFile',
  '--log-level': 'logLevel',
};

const configSchema = z.object({
  theme: z.enum(THEME_MODES).default('rainbow'),
  game: z.string().min(1).optional(),
  skipSetup: z.boolean().default(false),
  list: z.boolean().default(false),
  help: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  logFile: z.string().min(1).optional(),
  cornerThreshold: z.coerce.number().int().min(1).max(500).default(DEFAULT_CORNER_THRESHOLD),
});

export type Config = Readonly<z.infer<typeof configSchema>>;

/**
 * Split argv (without node and script) into flags and the optional game.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { yes: false, list: false, help: false };
  const issues: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const valueFlag = VALUE_FLAGS[arg];

    if (valueFlag !== undefined) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        issues.push(`${arg} needs a value`);
        continue;
      }
      args[valueFlag] = value;
      i++;
      continue;
    }

    switch (arg) {
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--list':
      case '-l':
        args.list = true;
        break;
      case '--yes':
      case '-y':
        args.yes = true;
        break;
      default:
        if (arg.startsWith('-')) {
          issues.push(`unknown option ${arg}`);
        } else if (args.game === undefined) {
          args.game = arg;
        } else {
          issues.push(`unexpected argument ${arg}`);
        }
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return args;
}

/** Empty variables count as unset. */
function envValue(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function loadConfig(argv: readonly string[], env: Env = process.env): Config {
  const args = parseArgs(argv);

  const parsed = configSchema.safeParse({
    theme: args.theme ?? envValue(env, 'KEYSPLASH_THEME'),
    game: args.game,
    skipSetup: args.yes,
    list: args.list,
    help: args.help,
    logLevel: args.logLevel ?? envValue(env, 'KEYSPLASH_LOG_LEVEL'),
    logFile: args.logFile ?? envValue(env, 'KEYSPLASH_LOG_FILE'),
    cornerThreshold: envValue(env, 'KEYSPLASH_CORNER_THRESHOLD'),
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
