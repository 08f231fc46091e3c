import { describe, it, expect } from 'vitest';
import {
  buttonTransition,
  describeInputEvent,
  keyTransition,
  normalizeKeyName,
  pointerMotion,
  scrollTransition,
} from './inputEvents';

describe('normalizeKeyName', () => {
  it('maps aliases to the standard names', () => {
    expect(normalizeKeyName('Right')).toBe('ArrowRight');
    expect(normalizeKeyName('Esc')).toBe('Escape');
    expect(normalizeKeyName('Ctrl')).toBe('Control');
  });

  it('lower-cases single letters only', () => {
    expect(normalizeKeyName('Q')).toBe('q');
    expect(normalizeKeyName('Alt')).toBe('Alt');
    expect(normalizeKeyName('!')).toBe('!');
  });
});

describe('describeInputEvent', () => {
  it('describes each kind of event', () => {
    expect(describeInputEvent(keyTransition('Q', true, 0, ['shift']))).toBe('key down: shift+"q"');
    expect(describeInputEvent(buttonTransition('left', 12, 22.5, false, 0))).toBe('button up: left at (12.0, 22.5)');
    expect(describeInputEvent(pointerMotion(1, 2, 0))).toBe('motion to (1.0, 2.0)');
    expect(describeInputEvent(scrollTransition(0, -1, 0))).toBe('scroll by (0.0, -1.0)');
  });
});
