/**
 * Game bar: the game names along the bottom row. Clicking a name switches
 * to that game. The outer columns are never used so clicks in the bottom
 * corners still reach the exit gesture.
 */

import { cellWidth, moveTo } from '../games/utils';

/** Columns kept free at each end of the bar. */
export const BAR_EDGE_MARGIN = 4;
const GAP = 2;

export interface GameBarSlot {
  id: string;
  label: string;
  /** 1-based first column */
  col: number;
  width: number;
}

/**
 * Lay out labels centred in the usable width. Labels that do not fit are
 * left off.
 */
export function layoutGameBar(entries: ReadonlyArray<{ id: string; name: string }>, cols: number): GameBarSlot[] {
  const first = 1 + BAR_EDGE_MARGIN;
  const last = cols - BAR_EDGE_MARGIN;

  const fitting: Array<{ id: string; label: string; width: number }> = [];
  let total = 0;
  for (const entry of entries) {
    const label = ` ${entry.name} `;
    const width = cellWidth(label);
    const needed = total + (fitting.length > 0 ? GAP : 0) + width;
    if (needed > last - first + 1) break;
    fitting.push({ id: entry.id, label, width });
    total = needed;
  }

  let col = first + Math.floor((last - first + 1 - total) / 2);
  return fitting.map(item => {
    const slot = { ...item, col };
    col += item.width + GAP;
    return slot;
  });
}

/** Slot under a 1-based column, if any. */
export function hitTestGameBar(slots: readonly GameBarSlot[], col: number): GameBarSlot | null {
  return slots.find(slot => col >= slot.col && col < slot.col + slot.width) ?? null;
}

export function renderGameBar(
  slots: readonly GameBarSlot[],
  row: number,
  activeId: string | null,
  colors: { active: string; idle: string },
): string {
  return slots
    .map(slot => {
      const style = slot.id === activeId ? `\x1b[1;7m${colors.active}` : colors.idle;
      return `${moveTo(row, slot.col)}${style}${slot.label}\x1b[0m`;
    })
    .join('');
}
