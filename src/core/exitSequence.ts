/**
 * Exit gesture definitions.
 *
 * A definition is an ordered list of step tokens for one channel plus the
 * time allowed between consecutive steps.
 */

export type ExitChannel = 'keyboard' | 'mouse';

export interface SequenceDefinition {
  readonly channel: ExitChannel;
  readonly steps: readonly string[];
  readonly timeoutMs: number;
}

export function defineSequence(
  channel: ExitChannel,
  steps: readonly string[],
  timeoutMs: number,
): SequenceDefinition {
  if (steps.length === 0) {
    throw new RangeError(`${channel} exit sequence needs at least one step`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`${channel} exit sequence timeout must be a positive number of ms, got ${timeoutMs}`);
  }
  return Object.freeze({
    channel,
    steps: Object.freeze([...steps]),
    timeoutMs,
  });
}

/** Alt, Control, Right Arrow, Escape, Q, each within 5 s of the previous. */
export const KEYBOARD_EXIT_SEQUENCE = defineSequence(
  'keyboard',
  ['Alt', 'Control', 'ArrowRight', 'Escape', 'q'],
  5000,
);

/** The four screen corners clockwise from top-left, each within 10 s. */
export const MOUSE_EXIT_SEQUENCE = defineSequence(
  'mouse',
  ['top_left', 'top_right', 'bottom_right', 'bottom_left'],
  10_000,
);
