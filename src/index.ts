/**
 * keysplash
 *
 * A keyboard and mouse playground for small children that takes over a
 * terminal and only lets go after a deliberate exit gesture.
 *
 * Library usage:
 *   import { Kiosk, games, createProcessTerminal } from 'keysplash';
 *   const kiosk = new Kiosk({
 *     terminal: createProcessTerminal(),
 *     games,
 *     initialGame: 'exploding-letters',
 *     terminate: code => process.exit(code),
 *   });
 *   await kiosk.start();
 *
 * CLI usage:
 *   npx keysplash
 */

// Exit gesture recognition
export { classifyCorner, DEFAULT_CORNER_THRESHOLD, DEFAULT_SCREEN_GEOMETRY } from './core/corners';
export type { CornerToken, ScreenGeometry } from './core/corners';
export { defineSequence, KEYBOARD_EXIT_SEQUENCE, MOUSE_EXIT_SEQUENCE } from './core/exitSequence';
export type { ExitChannel, SequenceDefinition } from './core/exitSequence';
export { SequenceTracker } from './core/sequenceTracker';
export type { OfferOutcome, TrackerPhase, TrackerSnapshot } from './core/sequenceTracker';
export { ExitCoordinator } from './core/exitCoordinator';
export type { ExitCoordinatorOptions } from './core/exitCoordinator';
export { projectProgress, progressFraction, formatRemaining, describeProgress } from './core/progress';
export type { ExitPhase, ExitProgress } from './core/progress';
export { ShutdownSequencer, ShutdownStepError, DEFAULT_GRACE_MS, DEFAULT_STEP_TIMEOUT_MS } from './core/shutdown';
export type { ShutdownHooks, ShutdownOptions, ShutdownReport, ShutdownStepName } from './core/shutdown';
export { systemScheduler } from './core/scheduler';
export type { Scheduler, TimerHandle } from './core/scheduler';

// Platform
export { keyTransition, buttonTransition, pointerMotion, scrollTransition, describeInputEvent } from './platform/inputEvents';
export type { InputEvent, KeyTransition, ButtonTransition, PointerMotion, ScrollTransition, MouseButton } from './platform/inputEvents';
export { TerminalInputCapture } from './platform/inputCapture';
export { parseTerminalInput } from './platform/terminalInput';
export { PointerSurface } from './platform/surface';
export { WindowControl } from './platform/windowControl';
export type { ScreenSize } from './platform/windowControl';
export { createProcessTerminal } from './platform/terminal';
export type { GameTerminal, TerminalIO } from './platform/terminal';

// Games and shell
export {
  games,
  getGame,
  GameManager,
  setTheme,
  getTheme,
  DEFAULT_GAME_ID,
  runExplodingLettersGame,
  runKeyboardVisualizerGame,
  runMouseVisualizerGame,
} from './games';
export type { GameController, GameInfo, ThemeMode } from './games';
export { Kiosk } from './shell/kiosk';
export type { KioskOptions } from './shell/kiosk';

// Configuration and logging
export { loadConfig, parseArgs, ConfigError } from './config';
export type { Config, CliArgs } from './config';
export { createLogger, createNoopLogger, fileSink } from './logger';
export type { Logger, LogLevel, LogRecord, LogSink } from './logger';
export { getThemeModes, isValidThemeMode } from './themes';
