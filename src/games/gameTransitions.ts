/**
 * Game Transitions
 *
 * Short animations around the session: a boot screen before the first game
 * and a goodbye wipe before the terminal is released. Both assume the
 * alternate screen is already active.
 */

import type { GameTerminal } from '../platform/terminal';
import { sleep as defaultSleep } from '../core/scheduler';
import { getCurrentThemeColor, moveTo, randomPaletteColor } from './utils';

// Transition timing constants
const BOOT_DURATION = 800;  // ms for boot sequence
const EXIT_DURATION = 400;  // ms for exit sequence

const BOOT_MESSAGES = [
  'LET\'S PLAY!',
  'READY, SET, GO!',
  'HELLO THERE!',
  'TIME TO PLAY!',
];

const EXIT_MESSAGE = 'BYE BYE!';

const BAR_WIDTH = 20;

export type Pause = (ms: number) => Promise<void>;

/**
 * Get random message from array
 */
function randomMessage(messages: string[]): string {
  return messages[Math.floor(Math.random() * messages.length)] ?? messages[0] ?? '';
}

function centerColumn(cols: number, text: string): number {
  return Math.max(1, Math.floor(cols / 2) - Math.floor([...text].length / 2));
}

/**
 * Boot transition - plays before the first game starts
 */
export async function playBootTransition(terminal: GameTerminal, pause: Pause = defaultSleep): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const cols = terminal.cols;
  const centerY = Math.floor(terminal.rows / 2);

  terminal.write('\x1b[2J\x1b[H');

  const bootMsg = randomMessage(BOOT_MESSAGES);
  terminal.write(`${moveTo(centerY - 1, centerColumn(cols, bootMsg))}\x1b[1m${themeColor}${bootMsg}\x1b[0m`);

  // Rainbow loading bar
  const barX = Math.max(1, Math.floor(cols / 2) - Math.floor(BAR_WIDTH / 2));
  for (let i = 1; i <= BAR_WIDTH; i++) {
    terminal.write(`${moveTo(centerY + 1, barX + i - 1)}${randomPaletteColor()}█\x1b[0m`);
    await pause(BOOT_DURATION / BAR_WIDTH);
  }

  terminal.write('\x1b[2J\x1b[H');
}

/**
 * Exit transition - plays before the terminal is handed back
 */
export async function playExitTransition(terminal: GameTerminal, pause: Pause = defaultSleep): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const cols = terminal.cols;
  const rows = terminal.rows;
  const centerY = Math.floor(rows / 2);

  terminal.write('\x1b[2J\x1b[H');
  terminal.write(`${moveTo(centerY, centerColumn(cols, EXIT_MESSAGE))}\x1b[1m${themeColor}${EXIT_MESSAGE}\x1b[0m`);
  await pause(EXIT_DURATION / 2);

  // Screen wipe down effect
  const steps = Math.max(1, Math.ceil(rows / 2));
  for (let y = 1; y <= rows; y += 2) {
    terminal.write(`${moveTo(y, 1)}${' '.repeat(cols)}`);
    if (y + 1 <= rows) {
      terminal.write(`${moveTo(y + 1, 1)}${' '.repeat(cols)}`);
    }
    await pause(EXIT_DURATION / 2 / steps);
  }
}
