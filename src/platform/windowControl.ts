/**
 * Window control: the alternate screen stands in for fullscreen, and the
 * pixel size query for the display size.
 */

import { firstValueFrom, map, of, take, timeout, type Observable } from 'rxjs';
import { createNoopLogger, type Logger } from '../logger';
import type { GameTerminal } from './terminal';

export interface ScreenSize {
  width: number;
  height: number;
}

export const DEFAULT_SIZE_QUERY_TIMEOUT_MS = 500;

const PIXEL_SIZE_QUERY = '\x1b[14t';

export class WindowControl {
  private fullscreen: { reason: string; enteredAt: number } | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly terminal: GameTerminal,
    private readonly sizeReports$: Observable<ScreenSize>,
    logger?: Logger,
  ) {
    this.logger = logger ?? createNoopLogger();
  }

  get isFullscreen(): boolean {
    return this.fullscreen !== null;
  }

  /**
   * Enter the alternate screen buffer. Returns false if already there.
   */
  enterFullscreen(reason: string): boolean {
    if (this.fullscreen) {
      this.logger.warn('already fullscreen', { enteredBy: this.fullscreen.reason, requestedBy: reason });
      return false;
    }

    this.terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
    this.terminal.write('\x1b[?25l');   // Hide cursor
    this.terminal.write('\x1b[2J\x1b[H'); // Clear screen

    this.fullscreen = { reason, enteredAt: Date.now() };
    return true;
  }

  /**
   * Leave the alternate screen buffer. Returns false if not in it.
   */
  exitFullscreen(reason: string): boolean {
    if (!this.fullscreen) {
      this.logger.warn('not fullscreen', { requestedBy: reason });
      return false;
    }

    this.terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
    this.terminal.write('\x1b[?25h');   // Show cursor
    this.terminal.write('\x1b[0m');

    this.logger.debug('left fullscreen', { reason, heldMs: Date.now() - this.fullscreen.enteredAt });
    this.fullscreen = null;
    return true;
  }

  /**
   * Ask the terminal for its size in pixels. Resolves null when nothing
   * answers in time or the answer has no area.
   */
  getScreenSize(timeoutMs = DEFAULT_SIZE_QUERY_TIMEOUT_MS): Promise<ScreenSize | null> {
    const reply = firstValueFrom(
      this.sizeReports$.pipe(
        take(1),
        map(size => (size.width > 0 && size.height > 0 ? size : null)),
        timeout({ first: timeoutMs, with: () => of(null) }),
      ),
      { defaultValue: null },
    );
    this.terminal.write(PIXEL_SIZE_QUERY);
    return reply;
  }
}
