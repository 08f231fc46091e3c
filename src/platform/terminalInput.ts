/**
 * Terminal input tokenizer
 *
 * Splits one chunk of raw stdin into tokens. Understands:
 * - legacy keys: printable characters, control bytes (Ctrl+letter),
 *   `ESC x` (Alt+x), CSI / SS3 cursor and function keys with `1;mod`
 * - the kitty keyboard protocol: `CSI code[:alt] ; mods[:event] u` and the
 *   functional forms with an event type, which also report modifier keys
 *   on their own and key releases
 * - SGR mouse reports `CSI < b ; col ; row M|m` and X10 `CSI M bxy`
 * - replies to our own queries: pixel size `CSI 4 ; h ; w t` and keyboard
 *   protocol flags `CSI ? flags u`
 *
 * Anything else is dropped. `scanTerminalInput` hands back an escape
 * sequence cut off at the end of a chunk so the caller can complete it.
 */

import type { KeyModifier } from './inputEvents';

export type KeyAction = 'press' | 'repeat' | 'release';

export interface KeyToken {
  type: 'key';
  key: string;
  modifiers: KeyModifier[];
  action: KeyAction;
}

export interface MouseToken {
  type: 'mouse';
  /** Raw button/flag byte: low bits button, 32 motion, 64 wheel, 128 extra */
  code: number;
  col: number;
  row: number;
  release: boolean;
}

export interface PixelSizeToken {
  type: 'pixel-size';
  width: number;
  height: number;
}

export interface KeyboardFlagsToken {
  type: 'keyboard-flags';
  flags: number;
}

export type TerminalToken = KeyToken | MouseToken | PixelSizeToken | KeyboardFlagsToken;

const ESC = '\x1b';

const CSI_FINAL_KEYS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
  H: 'Home',
  F: 'End',
  P: 'F1',
  Q: 'F2',
  S: 'F4',
};

const SS3_KEYS: Record<string, string> = {
  ...CSI_FINAL_KEYS,
  R: 'F3',
};

const TILDE_KEYS: Record<number, string> = {
  1: 'Home', 2: 'Insert', 3: 'Delete', 4: 'End', 5: 'PageUp', 6: 'PageDown',
  7: 'Home', 8: 'End',
  11: 'F1', 12: 'F2', 13: 'F3', 14: 'F4', 15: 'F5',
  17: 'F6', 18: 'F7', 19: 'F8', 20: 'F9', 21: 'F10', 23: 'F11', 24: 'F12',
};

const KITTY_KEYS: Record<number, string> = {
  8: 'Backspace', 9: 'Tab', 13: 'Enter', 27: 'Escape', 32: ' ', 127: 'Backspace',
  57358: 'CapsLock', 57359: 'ScrollLock', 57360: 'NumLock', 57361: 'PrintScreen',
  57362: 'Pause', 57363: 'ContextMenu',
  57399: '0', 57400: '1', 57401: '2', 57402: '3', 57403: '4',
  57404: '5', 57405: '6', 57406: '7', 57407: '8', 57408: '9',
  57441: 'Shift', 57442: 'Control', 57443: 'Alt', 57444: 'Meta', 57445: 'Hyper', 57446: 'Meta',
  57447: 'Shift', 57448: 'Control', 57449: 'Alt', 57450: 'Meta', 57451: 'Hyper', 57452: 'Meta',
};

const PRIVATE_USE_START = 57344;
const PRIVATE_USE_END = 63743;

/**
 * xterm modifier parameter (1 + bitmask) to modifier names, in reporting
 * order. Hyper has no counterpart and is dropped.
 */
export function decodeModifiers(param: number): KeyModifier[] {
  if (!Number.isFinite(param) || param <= 1) return [];
  const bits = param - 1;
  const modifiers: KeyModifier[] = [];
  if (bits & 1) modifiers.push('shift');
  if (bits & 2) modifiers.push('alt');
  if (bits & 4) modifiers.push('control');
  if (bits & (8 | 32)) modifiers.push('meta');
  return modifiers;
}

function decodeAction(param: number): KeyAction {
  if (param === 2) return 'repeat';
  if (param === 3) return 'release';
  return 'press';
}

/** "1;5:3" -> [[1], [5, 3]]; empty fields become NaN */
function parseParams(params: string): number[][] {
  if (params === '') return [];
  return params.split(';').map(field => field.split(':').map(part => (part === '' ? NaN : Number(part))));
}

function key(name: string, modifiers: KeyModifier[] = [], action: KeyAction = 'press'): KeyToken {
  return { type: 'key', key: name, modifiers, action };
}

/** Key name plus the modifiers/event pair from the second CSI field. */
function keyWithModifierField(name: string, fields: number[][]): KeyToken {
  const modField = fields[1] ?? [];
  return key(name, decodeModifiers(modField[0] ?? NaN), decodeAction(modField[1] ?? NaN));
}

/**
 * One character outside an escape sequence.
 */
function decodeLegacyChar(ch: string): KeyToken | null {
  if (ch === '\r' || ch === '\n') return key('Enter');
  if (ch === '\t') return key('Tab');
  if (ch === '\x7f' || ch === '\b') return key('Backspace');
  if (ch === '\x00') return key(' ', ['control']);

  const code = ch.codePointAt(0) ?? 0;
  if (code >= 1 && code <= 26) {
    return key(String.fromCharCode(code + 96), ['control']);
  }
  if (code < 32) return null;
  return key(ch);
}

function decodeCsi(params: string, final: string): TerminalToken | null {
  // SGR mouse
  if (params.startsWith('<') && (final === 'M' || final === 'm')) {
    const [code, col, row] = params.slice(1).split(';').map(Number);
    if (![code, col, row].every(Number.isFinite)) return null;
    return { type: 'mouse', code, col, row, release: final === 'm' };
  }

  if (params.startsWith('?')) {
    if (final === 'u') {
      const flags = Number(params.slice(1));
      return Number.isFinite(flags) ? { type: 'keyboard-flags', flags } : null;
    }
    return null;
  }

  const fields = parseParams(params);

  if (final === 't') {
    const [kind, height, width] = fields.map(field => field[0]);
    if (kind === 4 && Number.isFinite(height) && Number.isFinite(width)) {
      return { type: 'pixel-size', width, height };
    }
    return null;
  }

  if (final === 'u') {
    const code = fields[0]?.[0] ?? NaN;
    if (!Number.isFinite(code)) return null;
    const name = KITTY_KEYS[code]
      ?? (code >= PRIVATE_USE_START && code <= PRIVATE_USE_END ? undefined : String.fromCodePoint(code));
    return name === undefined ? null : keyWithModifierField(name, fields);
  }

  if (final === '~') {
    const name = TILDE_KEYS[fields[0]?.[0] ?? NaN];
    return name === undefined ? null : keyWithModifierField(name, fields);
  }

  if (final === 'Z') {
    return key('Tab', ['shift']);
  }

  const name = CSI_FINAL_KEYS[final];
  return name === undefined ? null : keyWithModifierField(name, fields);
}

function isParamByte(code: number): boolean {
  return code >= 0x30 && code <= 0x3f;
}

function isIntermediateByte(code: number): boolean {
  return code >= 0x20 && code <= 0x2f;
}

function isFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

export interface ScanResult {
  tokens: TerminalToken[];
  /** Incomplete escape sequence at the end of the input, to be prefixed to the next chunk. */
  rest: string;
}

/**
 * Tokenize `data`. An escape sequence cut off by the end of the input is
 * returned as `rest` instead of being decoded, unless `final` is set: then
 * a lone ESC reads as Escape and an unfinished CSI is dropped.
 */
export function scanTerminalInput(data: string, final = false): ScanResult {
  const tokens: TerminalToken[] = [];
  let i = 0;

  const push = (token: TerminalToken | null) => {
    if (token) tokens.push(token);
  };
  const incomplete = (): ScanResult => ({ tokens, rest: final ? '' : data.slice(i) });

  while (i < data.length) {
    const ch = String.fromCodePoint(data.codePointAt(i) ?? 0);

    if (ch !== ESC) {
      push(decodeLegacyChar(ch));
      i += ch.length;
      continue;
    }

    const next = data[i + 1];

    if (next === undefined && !final) {
      return incomplete();
    }

    if (next === undefined || next === ESC) {
      push(key('Escape'));
      i += 1;
      continue;
    }

    if (next === 'O') {
      const ss3 = data[i + 2];
      if (ss3 === undefined) {
        if (!final) return incomplete();
        // Lone "ESC O" is Alt+Shift+o.
        push(key('o', ['shift', 'alt']));
        i += 2;
        continue;
      }
      const name = SS3_KEYS[ss3];
      if (name !== undefined) push(key(name));
      i += 3;
      continue;
    }

    if (next === '[') {
      let j = i + 2;
      while (j < data.length && isParamByte(data.charCodeAt(j))) j++;
      const params = data.slice(i + 2, j);
      while (j < data.length && isIntermediateByte(data.charCodeAt(j))) j++;
      if (j >= data.length) {
        return incomplete();
      }
      if (!isFinalByte(data.charCodeAt(j))) {
        // Malformed sequence: nothing after it can be trusted.
        break;
      }
      const finalByte = data[j];

      // X10 mouse: "CSI M" followed by three raw bytes.
      if (finalByte === 'M' && params === '') {
        if (j + 3 >= data.length) {
          return incomplete();
        }
        const code = data.charCodeAt(j + 1) - 32;
        const col = data.charCodeAt(j + 2) - 32;
        const row = data.charCodeAt(j + 3) - 32;
        const release = (code & 3) === 3 && (code & (32 | 64)) === 0;
        push({ type: 'mouse', code, col, row, release });
        i = j + 4;
        continue;
      }

      push(decodeCsi(params, finalByte));
      i = j + 1;
      continue;
    }

    // ESC followed by a plain character: Alt + that key.
    const alt = String.fromCodePoint(data.codePointAt(i + 1) ?? 0);
    const decoded = decodeLegacyChar(alt);
    if (decoded) {
      push(key(decoded.key, ['alt', ...decoded.modifiers]));
    }
    i += 1 + alt.length;
  }

  return { tokens, rest: '' };
}

/** Tokenize one complete piece of input; anything unfinished at the end is dropped. */
export function parseTerminalInput(data: string): TerminalToken[] {
  return scanTerminalInput(data, true).tokens;
}
