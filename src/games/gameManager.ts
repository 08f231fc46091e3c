/**
 * Game Manager
 *
 * Keeps the registry of games and runs at most one of them at a time.
 *
 * Example:
 *   const manager = new GameManager({ terminal, input$: capture.events$, surface });
 *   manager.register(explodingLetters);
 *   manager.switchGame('exploding-letters');
 */

import { BehaviorSubject, type Observable } from 'rxjs';
import type { InputEvent } from '../platform/inputEvents';
import type { PointerSurface } from '../platform/surface';
import type { GameTerminal } from '../platform/terminal';
import { createNoopLogger, type Logger } from '../logger';

/**
 * Game Controller
 */
export interface GameController {
  stop: () => void;
  isRunning: boolean;
}

/**
 * Game registry entry. `run` starts a fresh session of the game.
 */
export interface GameInfo {
  id: string;
  name: string;
  description: string;
  run: (terminal: GameTerminal, input$: Observable<InputEvent>, surface: PointerSurface) => GameController;
}

export interface GameManagerOptions {
  terminal: GameTerminal;
  input$: Observable<InputEvent>;
  surface: PointerSurface;
  logger?: Logger;
}

export class GameManager {
  private readonly registry = new Map<string, GameInfo>();
  private active: { game: GameInfo; controller: GameController } | null = null;
  private readonly current = new BehaviorSubject<GameInfo | null>(null);
  private readonly logger: Logger;

  /** Emits the active game (or null) now and on every change. */
  readonly currentGame$: Observable<GameInfo | null> = this.current.asObservable();

  constructor(private readonly options: GameManagerOptions) {
    this.logger = options.logger ?? createNoopLogger();
  }

  get currentGame(): GameInfo | null {
    return this.active?.game ?? null;
  }

  get availableGames(): GameInfo[] {
    return [...this.registry.values()];
  }

  get gameCount(): number {
    return this.registry.size;
  }

  getGame(id: string): GameInfo | undefined {
    return this.registry.get(id);
  }

  hasGame(id: string): boolean {
    return this.registry.has(id);
  }

  /** Register a game, replacing any game with the same id. */
  register(game: GameInfo): void {
    if (this.active?.game.id === game.id) {
      this.stopCurrentGame();
    }
    this.registry.set(game.id, game);
  }

  /** Returns false if no game has that id. */
  unregister(id: string): boolean {
    if (!this.registry.has(id)) return false;
    if (this.active?.game.id === id) {
      this.stopCurrentGame();
    }
    this.registry.delete(id);
    return true;
  }

  /**
   * Stop the current game and start another. Returns false, leaving the
   * current game running, if no game has that id.
   */
  switchGame(id: string): boolean {
    const game = this.registry.get(id);
    if (!game) {
      this.logger.warn('unknown game', { id });
      return false;
    }

    this.stopCurrentGame();
    const { terminal, input$, surface } = this.options;
    this.active = { game, controller: game.run(terminal, input$, surface) };
    this.logger.info('game started', { id });
    this.current.next(game);
    return true;
  }

  stopCurrentGame(): void {
    const active = this.active;
    if (!active) return;

    this.active = null;
    active.controller.stop();
    this.logger.debug('game stopped', { id: active.game.id });
    this.current.next(null);
  }

  /** Stop the active game and forget every registered game. */
  dispose(): void {
    this.stopCurrentGame();
    this.registry.clear();
    this.current.complete();
  }
}
