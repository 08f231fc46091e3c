/**
 * Pure letter logic for Exploding Letters
 * Extracted for testability
 */

import font from './glyphs.json';

/** How long a letter stays on screen. */
export const LETTER_LIFETIME_MS = 3000;

/** Letters younger than this are drawn bold. */
export const LETTER_BRIGHT_MS = 600;

const MODIFIER_KEYS = new Set(['Shift', 'Control', 'Alt', 'Meta', 'Hyper', 'CapsLock', 'NumLock', 'ScrollLock']);

const SPECIAL_KEYS: Record<string, string> = {
  ' ': '␣',
  Enter: '↵',
  Tab: '⇥',
  Backspace: '⌫',
  Delete: '⌦',
  Escape: 'ESC',
  ArrowUp: '↑',
  ArrowDown: '↓',
  ArrowLeft: '←',
  ArrowRight: '→',
};

const GLYPHS: Record<string, string[]> = font.glyphs;

export interface LetterEntity {
  char: string;
  /** Rows of the drawn glyph, all the same width */
  rows: string[];
  /** 1-based top-left cell */
  col: number;
  row: number;
  color: string;
  createdAt: number;
}

/**
 * What to show for a key, or null for keys that show nothing (modifiers).
 */
export function displayCharacter(key: string): string | null {
  if (MODIFIER_KEYS.has(key)) return null;
  const special = SPECIAL_KEYS[key];
  if (special !== undefined) return special;
  if ([...key].length === 1) return key.toUpperCase();
  return key.slice(0, 3);
}

/**
 * Block glyph rows for a character. Characters outside the font are drawn
 * as themselves, in a single row.
 */
export function glyphFor(char: string): string[] {
  return GLYPHS[char] ?? [char];
}

/**
 * Create a letter at a random position that fits entirely on screen,
 * keeping the first and last row free.
 */
export function placeLetter(
  char: string,
  cols: number,
  rows: number,
  color: string,
  now: number,
  random: () => number = Math.random,
): LetterEntity {
  const glyph = glyphFor(char);
  const width = Math.max(...glyph.map(line => [...line].length));
  const height = glyph.length;

  const minRow = 2;
  const maxRow = Math.max(minRow, rows - 1 - height);
  const maxCol = Math.max(1, cols - width + 1);

  return {
    char,
    rows: glyph,
    col: 1 + Math.floor(random() * maxCol),
    row: minRow + Math.floor(random() * (maxRow - minRow + 1)),
    color,
    createdAt: now,
  };
}

export function isExpired(letter: LetterEntity, now: number): boolean {
  return now - letter.createdAt >= LETTER_LIFETIME_MS;
}

/** Centre cell of a letter, where its burst starts. */
export function letterCenter(letter: LetterEntity): { x: number; y: number } {
  const width = Math.max(...letter.rows.map(line => [...line].length));
  return {
    x: letter.col + Math.floor(width / 2),
    y: letter.row + Math.floor(letter.rows.length / 2),
  };
}
