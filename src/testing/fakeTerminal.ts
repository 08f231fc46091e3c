/**
 * In-process TerminalIO for tests. Records everything written and can
 * answer queries synchronously, the way a terminal replies on stdin.
 */

import type { Disposable, TerminalIO, TerminalSize } from '../platform/terminal';

export class FakeTerminal implements TerminalIO {
  isTTY = true;
  cols = 80;
  rows = 24;
  rawMode = false;
  reading = false;
  readonly output: string[] = [];
  /** Written trigger -> input sent back. */
  readonly replies = new Map<string, string>();

  private readonly dataListeners = new Set<(data: string) => void>();
  private readonly resizeListeners = new Set<(size: TerminalSize) => void>();

  get written(): string {
    return this.output.join('');
  }

  write(data: string | Uint8Array): void {
    const text = typeof data === 'string' ? data : new TextDecoder().decode(data);
    this.output.push(text);
    for (const [trigger, reply] of this.replies) {
      if (text.includes(trigger)) this.input(reply);
    }
  }

  setRawMode(enabled: boolean): void {
    this.rawMode = enabled;
  }

  setReading(reading: boolean): void {
    this.reading = reading;
  }

  onData(callback: (data: string) => void): Disposable {
    this.dataListeners.add(callback);
    return { dispose: () => this.dataListeners.delete(callback) };
  }

  onResize(callback: (size: TerminalSize) => void): Disposable {
    this.resizeListeners.add(callback);
    return { dispose: () => this.resizeListeners.delete(callback) };
  }

  /** Bytes arriving on stdin. */
  input(data: string): void {
    for (const listener of [...this.dataListeners]) listener(data);
  }

  resize(cols: number, rows: number): void {
    this.cols = cols;
    this.rows = rows;
    for (const listener of [...this.resizeListeners]) listener({ cols, rows });
  }

  count(fragment: string): number {
    return this.written.split(fragment).length - 1;
  }
}
