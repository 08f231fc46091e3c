import { describe, it, expect } from 'vitest';
import { displayCharacter, glyphFor, isExpired, letterCenter, placeLetter } from './letters';

describe('displayCharacter', () => {
  it('upper-cases single characters', () => {
    expect(displayCharacter('a')).toBe('A');
    expect(displayCharacter('7')).toBe('7');
    expect(displayCharacter('!')).toBe('!');
  });

  it('shows nothing for modifier keys', () => {
    expect(displayCharacter('Shift')).toBeNull();
    expect(displayCharacter('Alt')).toBeNull();
    expect(displayCharacter('CapsLock')).toBeNull();
  });

  it('uses symbols for special keys', () => {
    expect(displayCharacter(' ')).toBe('␣');
    expect(displayCharacter('Enter')).toBe('↵');
    expect(displayCharacter('ArrowRight')).toBe('→');
    expect(displayCharacter('Escape')).toBe('ESC');
  });

  it('shortens other named keys', () => {
    expect(displayCharacter('F5')).toBe('F5');
    expect(displayCharacter('PageDown')).toBe('Pag');
  });
});

describe('glyphFor', () => {
  it('returns five block rows for letters and digits', () => {
    const glyph = glyphFor('A');
    expect(glyph).toHaveLength(5);
    expect(glyph[0]).toBe(' ███ ');
    expect(glyph.every(row => [...row].length === 5)).toBe(true);
    expect(glyphFor('0')).toHaveLength(5);
  });

  it('draws unknown characters as themselves', () => {
    expect(glyphFor('!')).toEqual(['!']);
  });
});

describe('placeLetter', () => {
  it('places the first possible position at random 0', () => {
    const letter = placeLetter('A', 80, 24, 'C', 100, () => 0);
    expect(letter).toMatchObject({ char: 'A', col: 1, row: 2, color: 'C', createdAt: 100 });
  });

  it('keeps the whole glyph on screen and off the last rows', () => {
    const letter = placeLetter('A', 80, 24, 'C', 0, () => 0.999999);
    expect(letter.col).toBe(76);
    expect(letter.row).toBe(18);
    expect(letter.col + 5 - 1).toBeLessThanOrEqual(80);
    expect(letter.row + 5 - 1).toBeLessThan(24);
  });

  it('still places letters on a tiny screen', () => {
    const letter = placeLetter('A', 3, 4, 'C', 0, () => 0.5);
    expect(letter.col).toBe(1);
    expect(letter.row).toBe(2);
  });
});

describe('letter lifetime', () => {
  it('expires after three seconds', () => {
    const letter = placeLetter('B', 80, 24, 'C', 0, () => 0);
    expect(isExpired(letter, 2999)).toBe(false);
    expect(isExpired(letter, 3000)).toBe(true);
  });

  it('finds the centre cell', () => {
    const letter = placeLetter('B', 80, 24, 'C', 0, () => 0);
    expect(letterCenter(letter)).toEqual({ x: 3, y: 4 });
  });
});
