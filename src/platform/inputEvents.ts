/**
 * Platform-independent input events
 *
 * Everything downstream of the capture layer (exit coordinator, games,
 * shell) sees only these shapes. `kind` is the discriminant; switch on it.
 */

export type MouseButton = 'left' | 'right' | 'middle' | 'other';

export type KeyModifier = 'shift' | 'alt' | 'control' | 'meta';

export interface KeyTransition {
  kind: 'key';
  /** DOM `KeyboardEvent.key` style token: "Alt", "ArrowRight", "q", " " */
  key: string;
  isDown: boolean;
  modifiers: readonly KeyModifier[];
  timestamp: number;
}

export interface ButtonTransition {
  kind: 'button';
  button: MouseButton;
  x: number;
  y: number;
  isDown: boolean;
  timestamp: number;
}

export interface PointerMotion {
  kind: 'motion';
  x: number;
  y: number;
  timestamp: number;
}

export interface ScrollTransition {
  kind: 'scroll';
  dx: number;
  dy: number;
  timestamp: number;
}

export type InputEvent = KeyTransition | ButtonTransition | PointerMotion | ScrollTransition;

/** Modifier keys in the order they are reported for a legacy key sequence. */
export const MODIFIER_KEYS: Record<KeyModifier, string> = {
  shift: 'Shift',
  alt: 'Alt',
  control: 'Control',
  meta: 'Meta',
};

const KEY_ALIASES: Record<string, string> = {
  Left: 'ArrowLeft',
  Right: 'ArrowRight',
  Up: 'ArrowUp',
  Down: 'ArrowDown',
  Esc: 'Escape',
  Ctrl: 'Control',
  Return: 'Enter',
  Space: ' ',
  Super: 'Meta',
  Del: 'Delete',
};

/**
 * Normalize a raw key name to the app's vocabulary.
 * Arrow aliases become `Arrow*`, single ASCII letters are lower-cased.
 */
export function normalizeKeyName(raw: string): string {
  const alias = KEY_ALIASES[raw];
  if (alias !== undefined) return alias;
  if (/^[A-Z]$/.test(raw)) return raw.toLowerCase();
  return raw;
}

export function keyTransition(
  key: string,
  isDown: boolean,
  timestamp: number,
  modifiers: readonly KeyModifier[] = [],
): KeyTransition {
  return { kind: 'key', key: normalizeKeyName(key), isDown, modifiers, timestamp };
}

export function buttonTransition(
  button: MouseButton,
  x: number,
  y: number,
  isDown: boolean,
  timestamp: number,
): ButtonTransition {
  return { kind: 'button', button, x, y, isDown, timestamp };
}

export function pointerMotion(x: number, y: number, timestamp: number): PointerMotion {
  return { kind: 'motion', x, y, timestamp };
}

export function scrollTransition(dx: number, dy: number, timestamp: number): ScrollTransition {
  return { kind: 'scroll', dx, dy, timestamp };
}

/**
 * One-line description for logs.
 */
export function describeInputEvent(event: InputEvent): string {
  switch (event.kind) {
    case 'key': {
      const mods = event.modifiers.length > 0 ? `${event.modifiers.join('+')}+` : '';
      return `key ${event.isDown ? 'down' : 'up'}: ${mods}${JSON.stringify(event.key)}`;
    }
    case 'button':
      return `button ${event.isDown ? 'down' : 'up'}: ${event.button} at (${event.x.toFixed(1)}, ${event.y.toFixed(1)})`;
    case 'motion':
      return `motion to (${event.x.toFixed(1)}, ${event.y.toFixed(1)})`;
    case 'scroll':
      return `scroll by (${event.dx.toFixed(1)}, ${event.dy.toFixed(1)})`;
  }
}
