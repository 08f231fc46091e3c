/**
 * Kiosk session
 *
 * Wires every component together for one locked session:
 *
 *   terminal ──► capture.events$ ─┬─► ExitCoordinator ──► exitRequested$ ──► ShutdownSequencer
 *                                 ├─► active game (via GameManager)
 *                                 └─► game bar clicks
 *
 * Games draw through a proxy terminal that appends the exit indicator and
 * the game bar to every frame and paints it atomically.
 */

import { Subscription } from 'rxjs';
import { ExitCoordinator } from '../core/exitCoordinator';
import { ShutdownSequencer, type ShutdownReport } from '../core/shutdown';
import { DEFAULT_CORNER_THRESHOLD } from '../core/corners';
import { systemScheduler, sleep, type Scheduler } from '../core/scheduler';
import { GameManager, type GameInfo } from '../games/gameManager';
import { playBootTransition, playExitTransition, type Pause } from '../games/gameTransitions';
import { getCurrentThemeColor, getSubtleBackgroundColor } from '../games/utils';
import { createNoopLogger, formatError, type Logger } from '../logger';
import { TerminalInputCapture } from '../platform/inputCapture';
import type { InputEvent } from '../platform/inputEvents';
import { PointerSurface } from '../platform/surface';
import { synchronized, type GameTerminal, type TerminalIO } from '../platform/terminal';
import { WindowControl } from '../platform/windowControl';
import { hitTestGameBar, layoutGameBar, renderGameBar } from './gameBar';
import { ExitIndicator, renderExitIndicator } from './overlay';

/** Logical screen size used until the terminal reports its pixel size. */
export const PROVISIONAL_SCREEN = { width: 1920, height: 1080 };

export interface KioskOptions {
  terminal: TerminalIO;
  games: readonly GameInfo[];
  initialGame: string;
  terminate: (exitCode: number) => void;
  forceTerminate?: () => void;
  cornerThreshold?: number;
  logger?: Logger;
  scheduler?: Scheduler;
  /** Delay used by transitions and the shutdown grace period. */
  pause?: Pause;
  /** Skip the boot and goodbye animations. */
  skipTransitions?: boolean;
}

export class Kiosk {
  readonly surface: PointerSurface;
  readonly capture: TerminalInputCapture;
  readonly window: WindowControl;
  readonly coordinator: ExitCoordinator;
  readonly games: GameManager;
  readonly shutdown: ShutdownSequencer;
  readonly indicator = new ExitIndicator();

  private readonly terminal: TerminalIO;
  private readonly screen: GameTerminal;
  private readonly logger: Logger;
  private readonly scheduler: Scheduler;
  private readonly pause: Pause;
  private readonly subscriptions = new Subscription();
  private started = false;

  constructor(private readonly options: KioskOptions) {
    this.terminal = options.terminal;
    this.logger = options.logger ?? createNoopLogger();
    this.scheduler = options.scheduler ?? systemScheduler;
    this.pause = options.pause ?? sleep;

    this.surface = new PointerSurface({
      cols: this.terminal.cols,
      rows: this.terminal.rows,
      ...PROVISIONAL_SCREEN,
    });
    this.capture = new TerminalInputCapture(this.terminal, {
      surface: this.surface,
      scheduler: this.scheduler,
      logger: this.logger,
    });
    this.window = new WindowControl(this.terminal, this.capture.pixelSize$, this.logger);
    this.coordinator = new ExitCoordinator(this.capture.events$, {
      geometry: { ...PROVISIONAL_SCREEN, cornerThreshold: options.cornerThreshold ?? DEFAULT_CORNER_THRESHOLD },
      scheduler: this.scheduler,
      logger: this.logger,
    });

    this.screen = this.createScreen();
    this.games = new GameManager({
      terminal: this.screen,
      input$: this.capture.events$,
      surface: this.surface,
      logger: this.logger,
    });
    for (const game of options.games) {
      this.games.register(game);
    }

    this.shutdown = new ShutdownSequencer(
      {
        stopInput: () => this.capture.pause(),
        stopCapture: () => this.capture.stop(),
        disposeSession: () => this.disposeSession(),
        releaseWindow: () => this.releaseWindow(),
        terminate: code => options.terminate(code),
        forceTerminate: options.forceTerminate,
      },
      { logger: this.logger, sleep: this.pause },
    );
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Lock the terminal and start the first game. Returns false, touching
   * nothing, when input cannot be captured.
   */
  async start(): Promise<boolean> {
    if (this.started) return true;
    if (!this.capture.start()) return false;
    this.started = true;

    this.subscriptions.add(this.coordinator.progress$.subscribe(progress => {
      this.indicator.update(progress, this.scheduler.now());
    }));
    this.subscriptions.add(this.shutdown.attach(this.coordinator.exitRequested$));
    this.subscriptions.add(this.capture.events$.subscribe(event => this.handleBarClick(event)));

    const resize = this.terminal.onResize(size => {
      this.surface.resizeCells(size.cols, size.rows);
      this.refreshScreenSize().catch((err: unknown) => {
        this.logger.warn('screen size query failed', formatError(err));
      });
    });
    this.subscriptions.add(() => resize.dispose());

    this.window.enterFullscreen('kiosk session');
    await this.refreshScreenSize();
    if (this.shutdown.state !== 'idle') return true;

    if (!this.options.skipTransitions) {
      await playBootTransition(this.terminal, this.pause);
      // An exit gesture may complete while the boot screen plays.
      if (this.shutdown.state !== 'idle') return true;
    }

    if (!this.games.switchGame(this.options.initialGame)) {
      const fallback = this.games.availableGames[0];
      if (fallback) this.games.switchGame(fallback.id);
    }
    return true;
  }

  /** Administrative stop, as if an exit gesture had completed. */
  stop(reason: string): Promise<ShutdownReport> {
    return this.shutdown.run(reason);
  }

  /**
   * Ask the terminal for its pixel size and move the pointer surface and
   * corner geometry to it. Keeps the current size when nothing answers.
   */
  async refreshScreenSize(): Promise<void> {
    const size = await this.window.getScreenSize();
    if (!size) {
      this.logger.debug('no pixel size reported, keeping current geometry', {
        width: this.surface.width,
        height: this.surface.height,
      });
      return;
    }
    this.surface.resizePixels(size.width, size.height);
    this.coordinator.updateScreenSize(size.width, size.height);
  }

  private createScreen(): GameTerminal {
    const terminal = this.terminal;
    const decoder = new TextDecoder();
    return {
      write: (data: string | Uint8Array) => {
        const frame = typeof data === 'string' ? data : decoder.decode(data);
        terminal.write(synchronized(frame + this.renderOverlay()));
      },
      get cols() { return terminal.cols; },
      get rows() { return terminal.rows; },
    };
  }

  private renderOverlay(): string {
    const accent = getCurrentThemeColor();
    const slots = layoutGameBar(this.games.availableGames, this.terminal.cols);
    return renderExitIndicator(this.indicator.visible(this.scheduler.now()), this.terminal.cols, accent)
      + renderGameBar(slots, this.terminal.rows, this.games.currentGame?.id ?? null, {
        active: accent,
        idle: getSubtleBackgroundColor(),
      });
  }

  private handleBarClick(event: InputEvent): void {
    if (event.kind !== 'button' || !event.isDown || event.button !== 'left') return;

    const { col, row } = this.surface.toCell(event.x, event.y);
    if (row !== this.terminal.rows) return;

    const slot = hitTestGameBar(layoutGameBar(this.games.availableGames, this.terminal.cols), col);
    if (slot && slot.id !== this.games.currentGame?.id) {
      this.games.switchGame(slot.id);
    }
  }

  private disposeSession(): void {
    this.subscriptions.unsubscribe();
    this.games.dispose();
    this.coordinator.dispose();
    this.capture.dispose();
    this.indicator.clear();
  }

  private async releaseWindow(): Promise<void> {
    if (!this.window.isFullscreen) return;
    if (!this.options.skipTransitions) {
      await playExitTransition(this.terminal, this.pause);
    }
    this.window.exitFullscreen('shutdown');
  }
}
