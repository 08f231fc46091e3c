/**
 * Pointer trail, click ripples and button state for Mouse Visualizer
 * Extracted for testability
 */

import type { MouseButton } from '../../platform/inputEvents';
import type { CellPosition } from '../../platform/surface';

export const TRAIL_LENGTH = 30;
export const RIPPLE_MS = 600;
export const RIPPLE_MAX_RADIUS = 6;

/** Oldest to newest */
const TRAIL_CHARS = ['·', '•', '●'];

export class PointerTrail {
  private readonly points: CellPosition[] = [];

  constructor(private readonly capacity: number = TRAIL_LENGTH) {}

  /** Record a position; repeats of the newest cell are skipped. */
  add(point: CellPosition): void {
    const last = this.points[this.points.length - 1];
    if (last && last.col === point.col && last.row === point.row) return;
    this.points.push(point);
    if (this.points.length > this.capacity) {
      this.points.splice(0, this.points.length - this.capacity);
    }
  }

  get length(): number {
    return this.points.length;
  }

  get head(): CellPosition | undefined {
    return this.points[this.points.length - 1];
  }

  /** Points oldest first, each with the character to draw it with. */
  entries(): Array<CellPosition & { char: string }> {
    const count = this.points.length;
    return this.points.map((point, i) => {
      const band = Math.min(TRAIL_CHARS.length - 1, Math.floor((i / count) * TRAIL_CHARS.length));
      return { ...point, char: TRAIL_CHARS[band] ?? '·' };
    });
  }

  clear(): void {
    this.points.length = 0;
  }
}

export interface Ripple {
  center: CellPosition;
  color: string;
  startedAt: number;
}

export function rippleRadius(ripple: Ripple, now: number): number {
  const progress = Math.min(1, Math.max(0, (now - ripple.startedAt) / RIPPLE_MS));
  return progress * RIPPLE_MAX_RADIUS;
}

export function isRippleDone(ripple: Ripple, now: number): boolean {
  return now - ripple.startedAt >= RIPPLE_MS;
}

/**
 * Cells on a ring around a centre. Columns are stretched 2:1 so the ring
 * looks round in a terminal.
 */
export function ringCells(center: CellPosition, radius: number): CellPosition[] {
  if (radius < 0.5) return [center];

  const cells: CellPosition[] = [];
  const seen = new Set<string>();
  const steps = Math.max(8, Math.ceil(radius * 12));
  for (let i = 0; i < steps; i++) {
    const angle = (Math.PI * 2 * i) / steps;
    const col = Math.round(center.col + Math.cos(angle) * radius * 2);
    const row = Math.round(center.row + Math.sin(angle) * radius);
    const id = `${col},${row}`;
    if (!seen.has(id)) {
      seen.add(id);
      cells.push({ col, row });
    }
  }
  return cells;
}

export type ButtonState = Record<Exclude<MouseButton, 'other'>, boolean>;

export function createButtonState(): ButtonState {
  return { left: false, middle: false, right: false };
}

export function applyButton(state: ButtonState, button: MouseButton, isDown: boolean): void {
  if (button === 'other') return;
  state[button] = isDown;
}
