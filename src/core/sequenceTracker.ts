/**
 * Sequence Tracker
 *
 * State machine for one exit channel. Tokens are offered one at a time;
 * the tracker advances on the expected token, falls back to idle on any
 * other token or when the step timer runs out, and reports completion as a
 * transient phase immediately followed by idle.
 *
 * The step timer restarts on every successful step, so the deadline is
 * always `timeoutMs` after the most recent step, not after the first one.
 */

import { Subject, type Observable } from 'rxjs';
import type { ExitChannel, SequenceDefinition } from './exitSequence';
import { systemScheduler, type Scheduler, type TimerHandle } from './scheduler';

export type TrackerPhase = 'idle' | 'in_progress' | 'completed';

export type OfferOutcome = 'ignored' | 'advanced' | 'reset' | 'completed';

export interface TrackerSnapshot {
  channel: ExitChannel;
  phase: TrackerPhase;
  currentStep: number;
  totalSteps: number;
  timeoutMs: number;
  startedAt: number | null;
  lastStepAt: number | null;
  /** When the pending timer fires; null while idle. */
  deadline: number | null;
  /** Scheduler time the snapshot was taken. */
  at: number;
}

export class SequenceTracker {
  private step = 0;
  private startedAt: number | null = null;
  private lastStepAt: number | null = null;
  private timer: TimerHandle | null = null;
  private disposed = false;

  private readonly changes = new Subject<TrackerSnapshot>();

  /** One emission per state change: advance, reset, timeout, completion. */
  readonly changes$: Observable<TrackerSnapshot> = this.changes.asObservable();

  constructor(
    readonly definition: SequenceDefinition,
    private readonly scheduler: Scheduler = systemScheduler,
  ) {}

  get channel(): ExitChannel {
    return this.definition.channel;
  }

  get currentStep(): number {
    return this.step;
  }

  get totalSteps(): number {
    return this.definition.steps.length;
  }

  get isIdle(): boolean {
    return this.step === 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get hasPendingTimer(): boolean {
    return this.timer !== null && this.timer.active;
  }

  get sequenceStartedAt(): number | null {
    return this.startedAt;
  }

  /** Token the tracker is waiting for next. */
  get expectedToken(): string {
    return this.definition.steps[this.step];
  }

  snapshot(): TrackerSnapshot {
    return this.buildSnapshot(this.step > 0 ? 'in_progress' : 'idle');
  }

  offer(token: string): OfferOutcome {
    if (this.disposed) return 'ignored';
    this.expireIfDue();

    if (token === this.definition.steps[this.step]) {
      return this.advance();
    }
    return this.rejectStep();
  }

  /**
   * Treat the current input as wrong without a token, e.g. a click that hit
   * no corner. Idle trackers stay as they are.
   */
  mismatch(): OfferOutcome {
    if (this.disposed) return 'ignored';
    this.expireIfDue();
    return this.rejectStep();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelTimer();
    this.changes.complete();
  }

  private advance(): OfferOutcome {
    const now = this.scheduler.now();
    this.step += 1;
    if (this.step === 1) {
      this.startedAt = now;
    }
    this.lastStepAt = now;

    if (this.step >= this.totalSteps) {
      this.cancelTimer();
      this.notify('completed');
      this.clearProgress();
      this.notify('idle');
      return 'completed';
    }

    this.armTimer();
    this.notify('in_progress');
    return 'advanced';
  }

  private rejectStep(): OfferOutcome {
    if (this.step === 0) return 'ignored';
    this.clearProgress();
    this.notify('idle');
    return 'reset';
  }

  private expireIfDue(): void {
    if (this.step === 0 || this.lastStepAt === null) return;
    if (this.scheduler.now() - this.lastStepAt >= this.definition.timeoutMs) {
      this.expire();
    }
  }

  private expire(): void {
    this.cancelTimer();
    if (this.disposed || this.step === 0) return;
    this.clearProgress();
    this.notify('idle');
  }

  private armTimer(): void {
    this.cancelTimer();
    this.timer = this.scheduler.schedule(this.definition.timeoutMs, () => this.expire());
  }

  private cancelTimer(): void {
    this.timer?.cancel();
    this.timer = null;
  }

  private clearProgress(): void {
    this.step = 0;
    this.startedAt = null;
    this.lastStepAt = null;
    this.cancelTimer();
  }

  private buildSnapshot(phase: TrackerPhase): TrackerSnapshot {
    return {
      channel: this.definition.channel,
      phase,
      currentStep: this.step,
      totalSteps: this.totalSteps,
      timeoutMs: this.definition.timeoutMs,
      startedAt: this.startedAt,
      lastStepAt: this.lastStepAt,
      deadline: phase === 'in_progress' && this.lastStepAt !== null
        ? this.lastStepAt + this.definition.timeoutMs
        : null,
      at: this.scheduler.now(),
    };
  }

  private notify(phase: TrackerPhase): void {
    if (this.disposed) return;
    this.changes.next(this.buildSnapshot(phase));
  }
}
