import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { InputEvent } from './inputEvents';
import { InputTranslator, SYNTHETIC_RELEASE_MS } from './inputTranslator';
import { PointerSurface } from './surface';
import type { KeyToken, MouseToken } from './terminalInput';

function setup() {
  const events: InputEvent[] = [];
  const surface = new PointerSurface({ cols: 80, rows: 24, width: 1920, height: 1080 });
  const translator = new InputTranslator(event => events.push(event), { surface });
  const keys = () =>
    events.flatMap(e => (e.kind === 'key' ? [`${e.key} ${e.isDown ? 'down' : 'up'}`] : []));
  return { translator, events, keys };
}

const keyToken = (key: string, modifiers: KeyToken['modifiers'] = [], action: KeyToken['action'] = 'press'): KeyToken =>
  ({ type: 'key', key, modifiers, action });

const mouseToken = (code: number, col: number, row: number, release = false): MouseToken =>
  ({ type: 'mouse', code, col, row, release });

describe('InputTranslator', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('legacy keyboard', () => {
    it('reports each modifier as its own key-down before the key', () => {
      const { translator, events, keys } = setup();
      translator.key(keyToken('ArrowRight', ['alt', 'control']));

      expect(keys()).toEqual(['Alt down', 'Control down', 'ArrowRight down']);
      expect(events[0]).toEqual({ kind: 'key', key: 'Alt', isDown: true, modifiers: ['alt'], timestamp: 0 });

      vi.advanceTimersByTime(SYNTHETIC_RELEASE_MS);
      expect(keys()).toEqual([
        'Alt down', 'Control down', 'ArrowRight down',
        'Alt up', 'Control up', 'ArrowRight up',
      ]);
    });

    it('does not repeat a modifier that is the key itself', () => {
      const { translator, keys } = setup();
      translator.key(keyToken('Alt', ['alt']));
      expect(keys()).toEqual(['Alt down']);
    });

    it('lower-cases single letters', () => {
      const { translator, keys } = setup();
      translator.key(keyToken('Q'));
      expect(keys()).toEqual(['q down']);
    });

    it('ignores release tokens', () => {
      const { translator, events } = setup();
      translator.key(keyToken('a', [], 'release'));
      expect(events).toHaveLength(0);
    });

    it('holds a repeated key until the last press times out', () => {
      const { translator, keys } = setup();
      translator.key(keyToken('a'));
      vi.advanceTimersByTime(50);
      translator.key(keyToken('a'));
      vi.advanceTimersByTime(50);
      expect(keys()).toEqual(['a down', 'a down']);
      vi.advanceTimersByTime(30);
      expect(keys()).toEqual(['a down', 'a down', 'a up']);
    });

    it('drops pending releases on dispose', () => {
      const { translator, keys } = setup();
      translator.key(keyToken('a'));
      translator.dispose();
      vi.advanceTimersByTime(1000);
      expect(keys()).toEqual(['a down']);
    });
  });

  describe('enhanced keyboard', () => {
    it('passes presses and releases through', () => {
      const { translator, keys } = setup();
      translator.useEnhancedKeyboard();
      translator.key(keyToken('Alt', ['alt']));
      translator.key(keyToken('Alt', ['alt'], 'repeat'));
      translator.key(keyToken('Alt', [], 'release'));
      expect(keys()).toEqual(['Alt down', 'Alt down', 'Alt up']);
      expect(translator.enhancedKeyboard).toBe(true);
    });

    it('flushes synthetic releases when switching over', () => {
      const { translator, keys } = setup();
      translator.key(keyToken('a'));
      translator.useEnhancedKeyboard();
      expect(keys()).toEqual(['a down', 'a up']);
      vi.advanceTimersByTime(1000);
      expect(keys()).toEqual(['a down', 'a up']);
    });
  });

  describe('mouse', () => {
    it('reports button presses at the cell centre', () => {
      const { translator, events } = setup();
      translator.mouse(mouseToken(0, 1, 1));
      translator.mouse(mouseToken(0, 1, 1, true));
      expect(events).toEqual([
        { kind: 'button', button: 'left', x: 12, y: 22.5, isDown: true, timestamp: 0 },
        { kind: 'button', button: 'left', x: 12, y: 22.5, isDown: false, timestamp: 0 },
      ]);
    });

    it('attributes an X10 release to the last pressed button', () => {
      const { translator, events } = setup();
      translator.mouse(mouseToken(2, 5, 5));
      translator.mouse(mouseToken(3, 5, 5, true));
      expect(events.map(e => (e.kind === 'button' ? `${e.button} ${e.isDown}` : e.kind))).toEqual([
        'right true',
        'right false',
      ]);
    });

    it('reports motion', () => {
      const { translator, events } = setup();
      translator.mouse(mouseToken(35, 80, 24));
      expect(events).toEqual([{ kind: 'motion', x: 1908, y: 1057.5, timestamp: 0 }]);
    });

    it('reports wheel presses as scrolls', () => {
      const { translator, events } = setup();
      translator.mouse(mouseToken(64, 1, 1));
      translator.mouse(mouseToken(65, 1, 1));
      translator.mouse(mouseToken(66, 1, 1));
      translator.mouse(mouseToken(64, 1, 1, true));
      expect(events).toEqual([
        { kind: 'scroll', dx: 0, dy: -1, timestamp: 0 },
        { kind: 'scroll', dx: 0, dy: 1, timestamp: 0 },
        { kind: 'scroll', dx: -1, dy: 0, timestamp: 0 },
      ]);
    });

    it('reports extra buttons as other', () => {
      const { translator, events } = setup();
      translator.mouse(mouseToken(128, 1, 1));
      expect(events[0]).toMatchObject({ kind: 'button', button: 'other', isDown: true });
    });
  });
});
