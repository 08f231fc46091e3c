/**
 * Terminal input capture
 *
 * Puts the controlling terminal into raw mode with mouse reporting and
 * publishes every key and pointer transition on `events$`. All subscribers
 * (coordinator, active game, shell) see the same events in byte order.
 */

import { Subject, type Observable } from 'rxjs';
import { createNoopLogger, formatError, type Logger } from '../logger';
import { systemScheduler, type Scheduler, type TimerHandle } from '../core/scheduler';
import { describeInputEvent, type InputEvent } from './inputEvents';
import { InputTranslator } from './inputTranslator';
import type { PointerSurface } from './surface';
import { parseTerminalInput, scanTerminalInput, type TerminalToken } from './terminalInput';
import type { Disposable, TerminalIO } from './terminal';

export interface PixelSize {
  width: number;
  height: number;
}

/** Button events, any-motion tracking, SGR coordinates. */
export const MOUSE_ON = '\x1b[?1000h\x1b[?1003h\x1b[?1006h';
export const MOUSE_OFF = '\x1b[?1006l\x1b[?1003l\x1b[?1000l';
/** Kitty keyboard: disambiguate (1) + report events (2) + all keys as escapes (8). */
export const KEYBOARD_PUSH = '\x1b[>11u';
export const KEYBOARD_QUERY = '\x1b[?u';
export const KEYBOARD_POP = '\x1b[<u';

/** How long an unfinished escape sequence waits for the rest of its bytes. */
export const ESCAPE_TIMEOUT_MS = 50;
/** Longest unfinished sequence kept between chunks. */
const MAX_PENDING_LENGTH = 256;

export interface InputCaptureOptions {
  surface: PointerSurface;
  scheduler?: Scheduler;
  logger?: Logger;
}

export class TerminalInputCapture {
  private readonly events = new Subject<InputEvent>();
  private readonly pixelSizes = new Subject<PixelSize>();
  private readonly translator: InputTranslator;
  private readonly logger: Logger;
  private readonly scheduler: Scheduler;
  private pending = '';
  private pendingTimer: TimerHandle | null = null;
  private dataListener: Disposable | null = null;
  private forwarding = true;
  private disposed = false;

  readonly events$: Observable<InputEvent> = this.events.asObservable();
  /** Replies to the pixel size query (`CSI 14 t`). */
  readonly pixelSize$: Observable<PixelSize> = this.pixelSizes.asObservable();

  constructor(private readonly terminal: TerminalIO, options: InputCaptureOptions) {
    this.logger = options.logger ?? createNoopLogger();
    this.scheduler = options.scheduler ?? systemScheduler;
    this.translator = new InputTranslator(
      event => this.publish(event),
      { surface: options.surface, scheduler: this.scheduler },
    );
  }

  get isCapturing(): boolean {
    return this.dataListener !== null;
  }

  get enhancedKeyboard(): boolean {
    return this.translator.enhancedKeyboard;
  }

  /**
   * Take over the terminal. Returns false when there is no TTY to capture
   * or raw mode cannot be enabled.
   */
  start(): boolean {
    if (this.disposed) return false;
    if (this.dataListener) return true;

    if (!this.terminal.isTTY) {
      this.logger.error('input capture needs an interactive terminal');
      return false;
    }

    try {
      this.terminal.setRawMode(true);
    } catch (err) {
      this.logger.error('could not enable raw mode', formatError(err));
      return false;
    }

    this.forwarding = true;
    this.dataListener = this.terminal.onData(data => this.handleData(data));
    this.terminal.setReading(true);
    this.terminal.write(MOUSE_ON + KEYBOARD_PUSH + KEYBOARD_QUERY);
    this.logger.info('input capture started');
    return true;
  }

  /** Stop publishing events; the terminal stays captured. */
  pause(): void {
    this.forwarding = false;
  }

  resume(): void {
    this.forwarding = true;
  }

  /** Give the terminal back. Returns false if it was not captured. */
  stop(): boolean {
    if (!this.dataListener) return false;

    this.dataListener.dispose();
    this.dataListener = null;
    this.dropPending();
    this.translator.dispose();
    this.terminal.write(KEYBOARD_POP + MOUSE_OFF);
    this.terminal.setReading(false);
    this.terminal.setRawMode(false);
    this.logger.info('input capture stopped');
    return true;
  }

  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.disposed = true;
    this.events.complete();
    this.pixelSizes.complete();
  }

  /**
   * Feed raw terminal input. Public so tests and replays can drive it.
   * A sequence split across chunks is completed by the next chunk; a lone
   * trailing ESC reads as Escape once `ESCAPE_TIMEOUT_MS` passes without more
   * input.
   */
  handleData(data: string): void {
    const buffered = this.pending + data;
    this.dropPending();

    const { tokens, rest } = scanTerminalInput(buffered);
    for (const token of tokens) {
      this.handleToken(token);
    }

    if (rest === '' || this.disposed) return;
    if (rest.length > MAX_PENDING_LENGTH) {
      this.logger.debug('dropping oversized escape sequence', { length: rest.length });
      return;
    }
    this.pending = rest;
    this.pendingTimer = this.scheduler.schedule(ESCAPE_TIMEOUT_MS, () => this.flushPending());
  }

  private flushPending(): void {
    const rest = this.pending;
    this.pending = '';
    this.pendingTimer = null;
    for (const token of parseTerminalInput(rest)) {
      this.handleToken(token);
    }
  }

  private dropPending(): void {
    this.pendingTimer?.cancel();
    this.pendingTimer = null;
    this.pending = '';
  }

  private handleToken(token: TerminalToken): void {
    switch (token.type) {
      case 'key':
        this.translator.key(token);
        return;
      case 'mouse':
        this.translator.mouse(token);
        return;
      case 'pixel-size':
        this.pixelSizes.next({ width: token.width, height: token.height });
        return;
      case 'keyboard-flags':
        if (token.flags > 0 && !this.translator.enhancedKeyboard) {
          this.logger.debug('terminal reports key releases', { flags: token.flags });
          this.translator.useEnhancedKeyboard();
        }
        return;
    }
  }

  private publish(event: InputEvent): void {
    if (this.forwarding && !this.disposed) {
      this.logger.trace(describeInputEvent(event));
      this.events.next(event);
    }
  }
}
