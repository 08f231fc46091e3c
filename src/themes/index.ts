/**
 * Terminal color themes
 *
 * Each theme has an accent (frames, labels, the exit indicator), a subtle
 * color for background elements, and a palette of bright colors that the
 * games pick from at random.
 */

/**
 * Available theme identifiers
 */
export const THEME_MODES = ['rainbow', 'ocean', 'sunny', 'forest', 'candy', 'night'] as const;

export type ThemeMode = typeof THEME_MODES[number];

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Accent ANSI escape */
  accent: string;
  /** Muted ANSI escape for backgrounds and idle elements */
  subtle: string;
  /** Bright ANSI escapes for letters, particles and ripples */
  palette: readonly string[];
}

export const themes: Record<ThemeMode, ThemeColors> = {
  rainbow: {
    name: 'Rainbow',
    accent: '\x1b[1;96m',
    subtle: '\x1b[38;5;238m',
    palette: ['\x1b[1;91m', '\x1b[1;93m', '\x1b[1;92m', '\x1b[1;96m', '\x1b[1;94m', '\x1b[1;95m'],
  },
  ocean: {
    name: 'Ocean',
    accent: '\x1b[1;94m',
    subtle: '\x1b[38;5;24m',
    palette: ['\x1b[38;5;45m', '\x1b[38;5;51m', '\x1b[38;5;39m', '\x1b[38;5;87m', '\x1b[38;5;123m', '\x1b[1;97m'],
  },
  sunny: {
    name: 'Sunny',
    accent: '\x1b[1;93m',
    subtle: '\x1b[38;5;94m',
    palette: ['\x1b[38;5;226m', '\x1b[38;5;220m', '\x1b[38;5;214m', '\x1b[38;5;208m', '\x1b[38;5;202m', '\x1b[1;97m'],
  },
  forest: {
    name: 'Forest',
    accent: '\x1b[1;92m',
    subtle: '\x1b[38;5;22m',
    palette: ['\x1b[38;5;46m', '\x1b[38;5;82m', '\x1b[38;5;118m', '\x1b[38;5;154m', '\x1b[38;5;190m', '\x1b[38;5;226m'],
  },
  candy: {
    name: 'Candy',
    accent: '\x1b[1;95m',
    subtle: '\x1b[38;5;96m',
    palette: ['\x1b[38;5;213m', '\x1b[38;5;219m', '\x1b[38;5;207m', '\x1b[38;5;159m', '\x1b[38;5;229m', '\x1b[38;5;183m'],
  },
  night: {
    name: 'Night Sky',
    accent: '\x1b[1;97m',
    subtle: '\x1b[38;5;236m',
    palette: ['\x1b[1;97m', '\x1b[38;5;229m', '\x1b[38;5;153m', '\x1b[38;5;189m', '\x1b[38;5;117m', '\x1b[38;5;225m'],
  },
};

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: ThemeMode): string {
  return themes[mode].accent;
}

/**
 * Get subtle background color for game elements
 */
export function getSubtleColor(mode: ThemeMode): string {
  return themes[mode].subtle;
}

export function getPalette(mode: ThemeMode): readonly string[] {
  return themes[mode].palette;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeMode[] {
  return [...THEME_MODES];
}

const VALID_THEME_MODES = new Set<string>(THEME_MODES);

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeMode {
  return VALID_THEME_MODES.has(value);
}
