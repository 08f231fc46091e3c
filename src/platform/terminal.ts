/**
 * Node terminal adapter
 *
 * The one place that touches process.stdin/stdout. Everything above it talks
 * to a TerminalIO so tests can drive capture and window control with an
 * in-process fake.
 */

import type { Terminal } from '@xterm/xterm';

export interface Disposable {
  dispose: () => void;
}

export interface TerminalSize {
  cols: number;
  rows: number;
}

/** The subset of an xterm.js Terminal that games draw through. */
export type GameTerminal = Pick<Terminal, 'write' | 'cols' | 'rows'>;

export interface TerminalIO extends GameTerminal {
  readonly isTTY: boolean;
  setRawMode: (enabled: boolean) => void;
  /** Start or stop delivering stdin data. */
  setReading: (reading: boolean) => void;
  onData: (callback: (data: string) => void) => Disposable;
  onResize: (callback: (size: TerminalSize) => void) => Disposable;
}

// Synchronized output: the terminal batches clear + redraw into one paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

/** Wrap a frame so it is painted atomically. */
export function synchronized(data: string): string {
  return SYNC_START + data + SYNC_END;
}

function listenerSet<T>() {
  const listeners: Array<(value: T) => void> = [];
  return {
    add(callback: (value: T) => void): Disposable {
      listeners.push(callback);
      return {
        dispose: () => {
          const idx = listeners.indexOf(callback);
          if (idx !== -1) listeners.splice(idx, 1);
        },
      };
    },
    emit(value: T): void {
      for (const listener of [...listeners]) {
        listener(value);
      }
    },
  };
}

export function createProcessTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout,
): TerminalIO {
  const data = listenerSet<string>();
  const resize = listenerSet<TerminalSize>();
  let attached = false;

  const onStdinData = (chunk: string | Buffer) => {
    data.emit(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  };

  stdout.on('resize', () => {
    resize.emit({ cols: stdout.columns || 80, rows: stdout.rows || 24 });
  });

  return {
    get isTTY() { return stdin.isTTY === true; },
    get cols() { return stdout.columns || 80; },
    get rows() { return stdout.rows || 24; },
    write: (text: string | Uint8Array) => {
      stdout.write(text);
    },
    setRawMode: (enabled: boolean) => {
      if (stdin.isTTY) {
        stdin.setRawMode(enabled);
      }
    },
    setReading: (reading: boolean) => {
      if (reading && !attached) {
        stdin.setEncoding('utf8');
        stdin.on('data', onStdinData);
        stdin.resume();
        attached = true;
      } else if (!reading && attached) {
        stdin.off('data', onStdinData);
        stdin.pause();
        attached = false;
      }
    },
    onData: callback => data.add(callback),
    onResize: callback => resize.add(callback),
  };
}
