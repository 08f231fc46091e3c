import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ExitCoordinator } from '../core/exitCoordinator';
import { FakeTerminal } from '../testing/fakeTerminal';
import type { InputEvent } from './inputEvents';
import {
  ESCAPE_TIMEOUT_MS,
  KEYBOARD_POP,
  KEYBOARD_PUSH,
  KEYBOARD_QUERY,
  MOUSE_OFF,
  MOUSE_ON,
  TerminalInputCapture,
  type PixelSize,
} from './inputCapture';
import { PointerSurface } from './surface';

function setup() {
  const terminal = new FakeTerminal();
  const surface = new PointerSurface({ cols: 80, rows: 24, width: 1920, height: 1080 });
  const capture = new TerminalInputCapture(terminal, { surface });
  const events: InputEvent[] = [];
  const sizes: PixelSize[] = [];
  capture.events$.subscribe(event => events.push(event));
  capture.pixelSize$.subscribe(size => sizes.push(size));
  const keyDowns = () => events.flatMap(e => (e.kind === 'key' && e.isDown ? [e.key] : []));
  return { terminal, capture, events, sizes, keyDowns };
}

describe('TerminalInputCapture', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('refuses to start without a TTY', () => {
    const { terminal, capture } = setup();
    terminal.isTTY = false;
    expect(capture.start()).toBe(false);
    expect(terminal.output).toEqual([]);
    expect(terminal.rawMode).toBe(false);
  });

  it('refuses to start when raw mode fails', () => {
    const { terminal, capture } = setup();
    terminal.setRawMode = () => {
      throw new Error('not a tty');
    };
    expect(capture.start()).toBe(false);
    expect(capture.isCapturing).toBe(false);
  });

  it('enables raw mode, mouse reporting and the keyboard protocol', () => {
    const { terminal, capture } = setup();
    expect(capture.start()).toBe(true);
    expect(terminal.rawMode).toBe(true);
    expect(terminal.reading).toBe(true);
    expect(terminal.output).toEqual([MOUSE_ON + KEYBOARD_PUSH + KEYBOARD_QUERY]);

    expect(capture.start()).toBe(true);
    expect(terminal.output).toHaveLength(1);
  });

  it('publishes keys and clicks from stdin', () => {
    const { terminal, capture, events, keyDowns } = setup();
    capture.start();
    terminal.input('q\x1b[<0;1;1M');
    expect(keyDowns()).toEqual(['q']);
    expect(events[1]).toEqual({ kind: 'button', button: 'left', x: 12, y: 22.5, isDown: true, timestamp: 0 });
  });

  it('completes a sequence split across chunks', () => {
    const { terminal, capture, events } = setup();
    capture.start();
    terminal.input('\x1b[<0;1;');
    expect(events).toEqual([]);
    terminal.input('1M');
    expect(events).toEqual([{ kind: 'button', button: 'left', x: 12, y: 22.5, isDown: true, timestamp: 0 }]);
  });

  it('counts a corner click split across chunks toward the exit gesture', () => {
    const { terminal, capture } = setup();
    const coordinator = new ExitCoordinator(capture.events$);
    capture.start();
    terminal.input('\x1b[<0;1;');
    terminal.input('1M');
    expect(coordinator.mouseStep).toBe(1);
  });

  it('reads a lone escape once no more bytes follow', () => {
    const { terminal, capture, keyDowns } = setup();
    capture.start();
    terminal.input('\x1b');
    vi.advanceTimersByTime(ESCAPE_TIMEOUT_MS - 1);
    expect(keyDowns()).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(keyDowns()).toEqual(['Escape']);
  });

  it('reads escape and a key in separate chunks as Alt plus the key', () => {
    const { terminal, capture, keyDowns } = setup();
    capture.start();
    terminal.input('\x1b');
    terminal.input('x');
    vi.advanceTimersByTime(ESCAPE_TIMEOUT_MS);
    expect(keyDowns()).toEqual(['Alt', 'x']);
  });

  it('forgets a half-read sequence on stop', () => {
    const { terminal, capture, events } = setup();
    capture.start();
    terminal.input('\x1b');
    capture.stop();
    vi.advanceTimersByTime(ESCAPE_TIMEOUT_MS);
    expect(events).toEqual([]);
  });

  it('routes pixel size replies to pixelSize$', () => {
    const { terminal, capture, events, sizes } = setup();
    capture.start();
    terminal.input('\x1b[4;1440;2560t');
    expect(sizes).toEqual([{ width: 2560, height: 1440 }]);
    expect(events).toEqual([]);
  });

  it('switches to real key releases when the terminal confirms the protocol', () => {
    const { terminal, capture, events } = setup();
    capture.start();
    terminal.input('\x1b[?11u');
    expect(capture.enhancedKeyboard).toBe(true);

    terminal.input('\x1b[57443;3u\x1b[57443;3:3u');
    expect(events.map(e => (e.kind === 'key' ? `${e.key} ${e.isDown}` : e.kind))).toEqual(['Alt true', 'Alt false']);
  });

  it('stays in legacy mode when the protocol is off', () => {
    const { terminal, capture } = setup();
    capture.start();
    terminal.input('\x1b[?0u');
    expect(capture.enhancedKeyboard).toBe(false);
  });

  it('holds events back while paused', () => {
    const { terminal, capture, keyDowns } = setup();
    capture.start();
    capture.pause();
    terminal.input('a');
    capture.resume();
    terminal.input('b');
    expect(keyDowns()).toEqual(['b']);
  });

  it('gives the terminal back on stop', () => {
    const { terminal, capture, events } = setup();
    capture.start();
    expect(capture.stop()).toBe(true);
    expect(terminal.output.at(-1)).toBe(KEYBOARD_POP + MOUSE_OFF);
    expect(terminal.rawMode).toBe(false);
    expect(terminal.reading).toBe(false);

    terminal.input('a');
    expect(events).toEqual([]);
    expect(capture.stop()).toBe(false);
  });

  it('completes its streams on dispose', () => {
    const { capture } = setup();
    let completed = false;
    capture.events$.subscribe({ complete: () => { completed = true; } });
    capture.start();
    capture.dispose();
    expect(completed).toBe(true);
    expect(capture.isCapturing).toBe(false);
    expect(capture.start()).toBe(false);
  });
});
