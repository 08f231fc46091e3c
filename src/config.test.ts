import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, parseArgs } from './config';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseArgs', () => {
  it('reads flags and the game', () => {
    expect(parseArgs(['mouse-visualizer', '--theme', 'ocean', '-y'])).toEqual({
      game: 'mouse-visualizer',
      theme: 'ocean',
      yes: true,
      list: false,
      help: false,
    });
  });

  it('reads short flags', () => {
    expect(parseArgs(['-h', '-l'])).toMatchObject({ help: true, list: true });
  });

  it('reports every problem at once', () => {
    const error = configError(() => parseArgs(['x', '--nope', '--theme', 'a', 'b', '--log-file']));
    expect(error.issues).toEqual(['unknown option --nope', 'unexpected argument b', '--log-file needs a value']);
  });

  it('does not take a flag as a value', () => {
    const error = configError(() => parseArgs(['--log-level', '--yes']));
    expect(error.issues).toEqual(['--log-level needs a value']);
  });
});

describe('loadConfig', () => {
  it('uses defaults', () => {
    expect(loadConfig([], {})).toEqual({
      theme: 'rainbow',
      skipSetup: false,
      list: false,
      help: false,
      logLevel: 'warn',
      cornerThreshold: 50,
    });
  });

  it('reads environment variables', () => {
    const config = loadConfig([], {
      KEYSPLASH_THEME: 'forest',
      KEYSPLASH_LOG_LEVEL: 'debug',
      KEYSPLASH_LOG_FILE: '/tmp/keysplash.log',
      KEYSPLASH_CORNER_THRESHOLD: '80',
    });
    expect(config).toMatchObject({
      theme: 'forest',
      logLevel: 'debug',
      logFile: '/tmp/keysplash.log',
      cornerThreshold: 80,
    });
  });

  it('lets flags win over the environment', () => {
    const config = loadConfig(['--theme', 'ocean'], { KEYSPLASH_THEME: 'forest' });
    expect(config.theme).toBe('ocean');
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig([], { KEYSPLASH_LOG_LEVEL: '  ' }).logLevel).toBe('warn');
  });

  it('rejects an unknown theme', () => {
    const error = configError(() => loadConfig(['--theme', 'purple'], {}));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.startsWith('theme: ')).toBe(true);
  });

  it('rejects a bad corner threshold', () => {
    expect(configError(() => loadConfig([], { KEYSPLASH_CORNER_THRESHOLD: 'abc' })).issues[0]?.startsWith('cornerThreshold: ')).toBe(true);
    expect(configError(() => loadConfig([], { KEYSPLASH_CORNER_THRESHOLD: '0' })).issues[0]?.startsWith('cornerThreshold: ')).toBe(true);
  });
});

describe('ConfigError', () => {
  it('lists the issues in its message', () => {
    expect(new ConfigError(['a', 'b']).message).toBe('Invalid configuration:\n  - a\n  - b');
  });
});
