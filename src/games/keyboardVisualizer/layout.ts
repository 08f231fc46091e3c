/**
 * On-screen keyboard layout and held-key tracking
 * Extracted for testability
 */

import keyboardLayout from './keyboardLayout.json';

/** Keys stay lit at least this long after a press. */
export const KEY_GLOW_MS = 250;

export interface KeyboardLayout {
  /** Terminal columns per key unit */
  unitWidth: number;
  rows: Array<Array<{ keys: string[]; label: string; width: number }>>;
}

export interface KeyCap {
  label: string;
  /** Key names (as delivered in key events) that light this cap */
  keys: string[];
  /** 0-based keyboard row */
  row: number;
  /** 0-based column offset in cells */
  col: number;
  /** Width in cells */
  width: number;
}

export const DEFAULT_LAYOUT: KeyboardLayout = keyboardLayout;

export function buildKeyCaps(layout: KeyboardLayout = DEFAULT_LAYOUT): KeyCap[] {
  const caps: KeyCap[] = [];
  layout.rows.forEach((row, rowIndex) => {
    let offset = 0;
    for (const entry of row) {
      const width = Math.round(entry.width * layout.unitWidth);
      caps.push({ label: entry.label, keys: entry.keys, row: rowIndex, col: offset, width });
      offset += width;
    }
  });
  return caps;
}

/** Width in cells of the widest keyboard row. */
export function keyboardWidth(caps: readonly KeyCap[]): number {
  return caps.reduce((max, cap) => Math.max(max, cap.col + cap.width), 0);
}

export function keyboardRows(caps: readonly KeyCap[]): number {
  return caps.reduce((max, cap) => Math.max(max, cap.row + 1), 0);
}

export class HeldKeys {
  private readonly held = new Set<string>();
  private readonly pressedAt = new Map<string, number>();

  press(key: string, now: number): void {
    this.held.add(key);
    this.pressedAt.set(key, now);
  }

  release(key: string): void {
    this.held.delete(key);
  }

  clear(): void {
    this.held.clear();
    this.pressedAt.clear();
  }

  get size(): number {
    return this.held.size;
  }

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  /** Held now, or pressed within the glow window. */
  isLit(cap: KeyCap, now: number): boolean {
    return cap.keys.some(key => {
      if (this.held.has(key)) return true;
      const at = this.pressedAt.get(key);
      return at !== undefined && now - at < KEY_GLOW_MS;
    });
  }
}
