/**
 * CLI entry point for keysplash
 *
 * Validates configuration, runs the setup prompts, then hands the terminal
 * to a kiosk session until an exit gesture (or SIGTERM) shuts it down.
 */

import { ConfigError, loadConfig, type Config } from './config';
import { DEFAULT_GAME_ID, games, getGame, setTheme } from './games';
import { consoleSink, createLogger, createNoopLogger, fileSink, formatError, type Logger } from './logger';
import { createProcessTerminal } from './platform/terminal';
import { runSetup } from './setup';
import { Kiosk } from './shell/kiosk';
import { getThemeModes } from './themes';

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  keysplash: a keyboard and mouse playground for small children

  Usage:
    keysplash                      Setup prompts, then lock the terminal
    keysplash <game>               Start with a specific game
    keysplash --yes                Skip the setup prompts
    keysplash --theme <theme>      Set color theme
    keysplash --log-file <path>    Write JSON log lines to a file
    keysplash --log-level <level>  trace, debug, info, warn (default), error, silent
    keysplash --list               List all games
    keysplash --help               Show this help

  Games:
    ${games.map(g => `${g.id.padEnd(22)} ${g.description}`).join('\n    ')}

  Themes:
    ${getThemeModes().join(', ')}

  Exiting:
    Press Alt, Ctrl, →, Esc, Q one after another (within 5s of each other),
    or click the corners top-left, top-right, bottom-right, bottom-left
    (within 10s of each other).

  Environment:
    KEYSPLASH_THEME, KEYSPLASH_LOG_LEVEL, KEYSPLASH_LOG_FILE,
    KEYSPLASH_CORNER_THRESHOLD (pixels, default 50)
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/** Resolves an exit code, or null while the kiosk keeps running. */
async function main(): Promise<number | null> {
  let config: Config;
  try {
    config = loadConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  if (config.help) {
    printHelp();
    return 0;
  }

  if (config.list) {
    for (const game of games) {
      console.log(`  ${game.id.padEnd(22)} ${game.description}`);
    }
    return 0;
  }

  // Until the terminal is locked, problems go to the console.
  const startupLogger = createLogger({ level: config.logLevel, sink: consoleSink });

  setTheme(config.theme);

  let gameId = DEFAULT_GAME_ID;
  if (config.game !== undefined) {
    const game = getGame(config.game);
    if (!game) {
      startupLogger.error(`Unknown game: ${config.game}`);
      startupLogger.error(`Available games: ${games.map(g => g.id).join(', ')}`);
      return 1;
    }
    gameId = game.id;
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    startupLogger.error('keysplash needs an interactive terminal');
    return 1;
  }

  if (!config.skipSetup) {
    const chosen = await runSetup(games, gameId);
    if (chosen === null) return 0;
    gameId = chosen;
  }

  const log = config.logFile !== undefined ? fileSink(config.logFile) : null;
  const logger: Logger = log ? createLogger({ level: config.logLevel, sink: log.sink }) : createNoopLogger();
  const closeLog = () => (log ? log.close() : Promise.resolve());

  const exit = (code: number) => {
    if (log?.error) {
      console.error(`Log file ${config.logFile ?? ''} could not be written: ${log.error.message}`);
    }
    process.exit(code);
  };

  const kiosk = new Kiosk({
    terminal: createProcessTerminal(),
    games,
    initialGame: gameId,
    cornerThreshold: config.cornerThreshold,
    logger,
    terminate: code => {
      closeLog().then(() => exit(code), () => exit(code));
    },
    forceTerminate: () => process.kill(process.pid, 'SIGKILL'),
  });

  // SIGTERM is the administrative stop; SIGINT never ends a session.
  process.on('SIGTERM', () => {
    kiosk.stop('SIGTERM').catch((err: unknown) => {
      logger.error('shutdown failed', formatError(err));
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    logger.debug('ignoring SIGINT');
  });

  if (!(await kiosk.start())) {
    startupLogger.error('Could not capture terminal input');
    await closeLog();
    return 1;
  }
  logger.info('kiosk started', { game: gameId, theme: config.theme });
  return null;
}

main().then(
  code => {
    if (code !== null) process.exitCode = code;
  },
  (err: unknown) => {
    console.error(formatError(err).message);
    process.exit(1);
  },
);
