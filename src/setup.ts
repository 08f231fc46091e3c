/**
 * Interactive setup shown to the adult before the terminal is locked.
 */

import * as p from '@clack/prompts';
import { KEYBOARD_EXIT_SEQUENCE, MOUSE_EXIT_SEQUENCE } from './core/exitSequence';
import type { GameInfo } from './games/gameManager';

const KEY_LABELS: Record<string, string> = {
  Alt: 'Alt',
  Control: 'Ctrl',
  ArrowRight: '→',
  Escape: 'Esc',
};

const CORNER_LABELS: Record<string, string> = {
  top_left: 'top-left',
  top_right: 'top-right',
  bottom_right: 'bottom-right',
  bottom_left: 'bottom-left',
};

export function describeExitGestures(): string {
  const keys = KEYBOARD_EXIT_SEQUENCE.steps.map(step => KEY_LABELS[step] ?? step.toUpperCase()).join(', ');
  const corners = MOUSE_EXIT_SEQUENCE.steps.map(step => CORNER_LABELS[step] ?? step).join(' → ');
  return [
    `Keys, one after another: ${keys}`,
    `  (within ${KEYBOARD_EXIT_SEQUENCE.timeoutMs / 1000}s of each other)`,
    `Or click the corners: ${corners}`,
    `  (within ${MOUSE_EXIT_SEQUENCE.timeoutMs / 1000}s of each other)`,
  ].join('\n');
}

/**
 * Show how to get out, pick the first game and confirm. Resolves the chosen
 * game id, or null if the adult backed out.
 */
export async function runSetup(games: readonly GameInfo[], initialGame: string): Promise<string | null> {
  p.intro('keysplash');
  p.note(describeExitGestures(), 'How to exit');

  const selected = await p.select({
    message: 'Which game first?',
    initialValue: initialGame,
    options: games.map(game => ({ value: game.id, label: game.name, hint: game.description })),
  });
  if (p.isCancel(selected)) {
    p.cancel('Cancelled.');
    return null;
  }

  const confirmed = await p.confirm({
    message: 'Lock this terminal now?',
  });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Cancelled.');
    return null;
  }

  p.outro('Have fun!');
  return selected;
}
