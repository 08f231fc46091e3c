/**
 * Exit progress as the presentation layer sees it.
 */

import type { ExitChannel } from './exitSequence';
import type { TrackerPhase, TrackerSnapshot } from './sequenceTracker';

export type ExitPhase = TrackerPhase;

export interface ExitProgress {
  readonly channel: ExitChannel;
  readonly currentStep: number;
  readonly totalSteps: number;
  /** Time left before the attempt is abandoned; never negative. */
  readonly remainingMs: number;
  readonly phase: ExitPhase;
}

export function projectProgress(snapshot: TrackerSnapshot, now: number = snapshot.at): ExitProgress {
  let remainingMs: number;
  if (snapshot.phase === 'completed') {
    remainingMs = 0;
  } else if (snapshot.deadline === null) {
    remainingMs = snapshot.timeoutMs;
  } else {
    remainingMs = Math.max(0, snapshot.deadline - now);
  }

  return Object.freeze({
    channel: snapshot.channel,
    currentStep: snapshot.currentStep,
    totalSteps: snapshot.totalSteps,
    remainingMs,
    phase: snapshot.phase,
  });
}

/** Fraction complete, 0..1. */
export function progressFraction(progress: ExitProgress): number {
  return progress.totalSteps > 0 ? progress.currentStep / progress.totalSteps : 0;
}

export function formatRemaining(remainingMs: number): string {
  return `${(Math.max(0, remainingMs) / 1000).toFixed(1)}s`;
}

export function describeProgress(progress: ExitProgress): string {
  return `${progress.channel} ${progress.phase} ${progress.currentStep}/${progress.totalSteps} (${formatRemaining(progress.remainingMs)} left)`;
}
