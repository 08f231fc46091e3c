import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { defineSequence } from './exitSequence';
import { SequenceTracker, type TrackerSnapshot } from './sequenceTracker';

const ABC = defineSequence('keyboard', ['a', 'b', 'c'], 1000);

function track(definition = ABC) {
  const tracker = new SequenceTracker(definition);
  const seen: TrackerSnapshot[] = [];
  tracker.changes$.subscribe(snapshot => seen.push(snapshot));
  const phases = () => seen.map(s => `${s.phase}:${s.currentStep}`);
  return { tracker, seen, phases };
}

describe('SequenceTracker', () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('completes on the exact order and returns to idle', () => {
    const { tracker, phases } = track();
    expect(tracker.offer('a')).toBe('advanced');
    expect(tracker.offer('b')).toBe('advanced');
    expect(tracker.offer('c')).toBe('completed');
    expect(phases()).toEqual(['in_progress:1', 'in_progress:2', 'completed:3', 'idle:0']);
    expect(tracker.currentStep).toBe(0);
    expect(tracker.hasPendingTimer).toBe(false);
  });

  it('resets on a wrong token mid-sequence', () => {
    const { tracker, phases } = track();
    tracker.offer('a');
    expect(tracker.offer('x')).toBe('reset');
    expect(phases()).toEqual(['in_progress:1', 'idle:0']);
    expect(tracker.isIdle).toBe(true);
  });

  it('does not restart when the wrong token is the first step', () => {
    const { tracker } = track();
    tracker.offer('a');
    tracker.offer('b');
    expect(tracker.offer('a')).toBe('reset');
    expect(tracker.currentStep).toBe(0);
  });

  it('ignores wrong tokens while idle', () => {
    const { tracker, seen } = track();
    expect(tracker.offer('x')).toBe('ignored');
    expect(tracker.mismatch()).toBe('ignored');
    expect(seen).toHaveLength(0);
  });

  it('resets on a mismatch without a token', () => {
    const { tracker } = track();
    tracker.offer('a');
    expect(tracker.mismatch()).toBe('reset');
    expect(tracker.currentStep).toBe(0);
  });

  it('measures the timeout from the most recent step', () => {
    const { tracker, phases } = track();
    tracker.offer('a');
    vi.advanceTimersByTime(800);
    tracker.offer('b');
    vi.advanceTimersByTime(900);
    expect(tracker.currentStep).toBe(2);
    vi.advanceTimersByTime(100);
    expect(tracker.currentStep).toBe(0);
    expect(phases()).toEqual(['in_progress:1', 'in_progress:2', 'idle:0']);
  });

  it('accepts a step just before the deadline', () => {
    const { tracker } = track();
    tracker.offer('a');
    vi.setSystemTime(999);
    expect(tracker.offer('b')).toBe('advanced');
  });

  it('treats a step exactly at the deadline as too late', () => {
    const { tracker, phases } = track();
    tracker.offer('a');
    vi.setSystemTime(1000);
    expect(tracker.offer('b')).toBe('ignored');
    expect(phases()).toEqual(['in_progress:1', 'idle:0']);
  });

  it('starts over when the first step arrives after a timeout', () => {
    const { tracker } = track();
    tracker.offer('a');
    vi.setSystemTime(1500);
    expect(tracker.offer('a')).toBe('advanced');
    expect(tracker.sequenceStartedAt).toBe(1500);

    // The timer armed at t=0 must not fire against the new attempt.
    vi.advanceTimersByTime(999);
    expect(tracker.currentStep).toBe(1);
    vi.advanceTimersByTime(1);
    expect(tracker.currentStep).toBe(0);
  });

  it('allows repeated tokens', () => {
    const { tracker } = track(defineSequence('mouse', ['x', 'x'], 1000));
    tracker.offer('x');
    expect(tracker.offer('x')).toBe('completed');
  });

  it('reports the deadline in snapshots', () => {
    const { tracker } = track();
    vi.setSystemTime(200);
    tracker.offer('a');
    vi.setSystemTime(500);
    expect(tracker.snapshot()).toEqual({
      channel: 'keyboard',
      phase: 'in_progress',
      currentStep: 1,
      totalSteps: 3,
      timeoutMs: 1000,
      startedAt: 200,
      lastStepAt: 200,
      deadline: 1200,
      at: 500,
    });
    expect(tracker.expectedToken).toBe('b');
  });

  it('goes quiet after dispose', () => {
    const { tracker, seen } = track();
    let completed = false;
    tracker.changes$.subscribe({ complete: () => { completed = true; } });
    tracker.offer('a');
    tracker.dispose();
    vi.advanceTimersByTime(5000);
    expect(seen).toHaveLength(1);
    expect(completed).toBe(true);
    expect(tracker.offer('b')).toBe('ignored');
    expect(tracker.isDisposed).toBe(true);
    expect(tracker.hasPendingTimer).toBe(false);
  });
});
