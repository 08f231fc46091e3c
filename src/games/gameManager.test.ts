import { describe, it, expect, vi } from 'vitest';
import { Subject } from 'rxjs';
import type { InputEvent } from '../platform/inputEvents';
import { PointerSurface } from '../platform/surface';
import { GameManager, type GameController, type GameInfo } from './gameManager';

function fakeGame(id: string, calls: string[]): GameInfo {
  return {
    id,
    name: id.toUpperCase(),
    description: `${id} game`,
    run: vi.fn((): GameController => {
      calls.push(`run ${id}`);
      const controller: GameController = {
        isRunning: true,
        stop: () => {
          calls.push(`stop ${id}`);
          controller.isRunning = false;
        },
      };
      return controller;
    }),
  };
}

function setup() {
  const calls: string[] = [];
  const terminal = { cols: 80, rows: 24, write: () => {} };
  const input$ = new Subject<InputEvent>();
  const surface = new PointerSurface({ cols: 80, rows: 24, width: 1920, height: 1080 });
  const manager = new GameManager({ terminal, input$, surface });
  const seen: Array<string | null> = [];
  manager.currentGame$.subscribe(game => seen.push(game?.id ?? null));
  const a = fakeGame('a', calls);
  const b = fakeGame('b', calls);
  manager.register(a);
  manager.register(b);
  return { manager, calls, seen, a, b, terminal, input$, surface };
}

describe('GameManager', () => {
  it('starts a game with the shared terminal, input and surface', () => {
    const { manager, a, terminal, input$, surface, seen } = setup();
    expect(manager.switchGame('a')).toBe(true);
    expect(a.run).toHaveBeenCalledWith(terminal, input$, surface);
    expect(manager.currentGame).toBe(a);
    expect(seen).toEqual([null, 'a']);
  });

  it('stops the current game before starting the next', () => {
    const { manager, calls, seen } = setup();
    manager.switchGame('a');
    manager.switchGame('b');
    expect(calls).toEqual(['run a', 'stop a', 'run b']);
    expect(seen).toEqual([null, 'a', null, 'b']);
  });

  it('leaves the current game running for an unknown id', () => {
    const { manager, calls } = setup();
    manager.switchGame('a');
    expect(manager.switchGame('nope')).toBe(false);
    expect(manager.currentGame?.id).toBe('a');
    expect(calls).toEqual(['run a']);
  });

  it('lists and looks up registered games', () => {
    const { manager } = setup();
    expect(manager.gameCount).toBe(2);
    expect(manager.availableGames.map(g => g.id)).toEqual(['a', 'b']);
    expect(manager.hasGame('b')).toBe(true);
    expect(manager.getGame('c')).toBeUndefined();
  });

  it('replaces a game registered under the same id', () => {
    const { manager, calls } = setup();
    manager.switchGame('a');
    const replacement = fakeGame('a', calls);
    manager.register(replacement);
    expect(calls).toEqual(['run a', 'stop a']);
    expect(manager.getGame('a')).toBe(replacement);
    expect(manager.currentGame).toBeNull();
  });

  it('stops a game that is unregistered while running', () => {
    const { manager, calls } = setup();
    manager.switchGame('b');
    expect(manager.unregister('b')).toBe(true);
    expect(calls).toEqual(['run b', 'stop b']);
    expect(manager.unregister('b')).toBe(false);
  });

  it('stops everything on dispose', () => {
    const { manager, calls } = setup();
    let completed = false;
    manager.currentGame$.subscribe({ complete: () => { completed = true; } });
    manager.switchGame('a');
    manager.dispose();
    expect(calls).toEqual(['run a', 'stop a']);
    expect(manager.gameCount).toBe(0);
    expect(completed).toBe(true);
  });
});
