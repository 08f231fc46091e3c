/**
 * Shared utilities for games
 *
 * Theme state and small layout helpers. The theme is configured once by the
 * CLI via setTheme().
 */

import {
  type ThemeMode,
  getAnsiColor,
  getPalette,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: ThemeMode = 'rainbow';

/**
 * Set the current theme mode
 */
export function setTheme(mode: ThemeMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): ThemeMode {
  return currentTheme;
}

// ============================================================================
// Theme Color Utilities
// ============================================================================

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Get a subtle/muted color that blends with the terminal background
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

/**
 * Pick a bright color from the current theme's palette.
 */
export function randomPaletteColor(random: () => number = Math.random): string {
  const palette = getPalette(currentTheme);
  return palette[Math.floor(random() * palette.length)] ?? getCurrentThemeColor();
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

/** Cursor to a 1-based row/column. */
export function moveTo(row: number, col: number): string {
  return `\x1b[${Math.round(row)};${Math.round(col)}H`;
}

/** Display width of a string, counting each code point as one cell. */
export function cellWidth(text: string): number {
  return [...text].length;
}

export type { ThemeMode } from '../themes';
