/**
 * Exit progress indicator
 *
 * A small box near the top-right corner that appears while an exit gesture
 * is under way: which gesture, a bar, `Step n/N` and the seconds left. It is
 * drawn on top of every game frame and hidden while both channels are idle.
 */

import type { ExitChannel } from '../core/exitSequence';
import { formatRemaining, progressFraction, type ExitProgress } from '../core/progress';
import { moveTo } from '../games/utils';

export const INDICATOR_WIDTH = 20;
export const INDICATOR_HEIGHT = 5;

const CHANNEL_ORDER: ExitChannel[] = ['keyboard', 'mouse'];

const CHANNEL_TITLES: Record<ExitChannel, string> = {
  keyboard: 'Exit: keys',
  mouse: 'Exit: corners',
};

/**
 * Latest in-progress state per channel, with the countdown continued from
 * the time each progress value arrived.
 */
export class ExitIndicator {
  private readonly latest = new Map<ExitChannel, { progress: ExitProgress; receivedAt: number }>();

  update(progress: ExitProgress, receivedAt: number): void {
    if (progress.phase === 'in_progress') {
      this.latest.set(progress.channel, { progress, receivedAt });
    } else {
      this.latest.delete(progress.channel);
    }
  }

  clear(): void {
    this.latest.clear();
  }

  get isVisible(): boolean {
    return this.latest.size > 0;
  }

  /** Channels to show, keyboard first. */
  visible(now: number): ExitProgress[] {
    const items: ExitProgress[] = [];
    for (const channel of CHANNEL_ORDER) {
      const entry = this.latest.get(channel);
      if (!entry) continue;
      items.push({
        ...entry.progress,
        remainingMs: Math.max(0, entry.progress.remainingMs - (now - entry.receivedAt)),
      });
    }
    return items;
  }
}

function boxLine(text: string, inner: number): string {
  return ` ${text}`.padEnd(inner).slice(0, inner);
}

export function progressBar(progress: ExitProgress, width: number): string {
  const filled = Math.round(progressFraction(progress) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * Boxes for each visible channel, stacked from row 2 and ending two columns
 * short of the right edge so the corner cells stay uncovered.
 */
export function renderExitIndicator(items: readonly ExitProgress[], cols: number, color: string): string {
  const inner = INDICATOR_WIDTH - 2;
  const left = Math.max(1, cols - INDICATOR_WIDTH - 1);
  let out = '';

  items.forEach((progress, i) => {
    const top = 2 + i * INDICATOR_HEIGHT;
    const lines = [
      `┌${'─'.repeat(inner)}┐`,
      `│${boxLine(CHANNEL_TITLES[progress.channel], inner)}│`,
      `│${progressBar(progress, inner)}│`,
      `│${boxLine(`Step ${progress.currentStep}/${progress.totalSteps}  ${formatRemaining(progress.remainingMs)}`, inner)}│`,
      `└${'─'.repeat(inner)}┘`,
    ];
    lines.forEach((line, j) => {
      out += `${moveTo(top + j, left)}\x1b[1m${color}${line}\x1b[0m`;
    });
  });

  return out;
}
