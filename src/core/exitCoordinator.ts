/**
 * Exit Coordinator
 *
 * Subscribes to the shared input stream and routes the events that matter
 * for the exit gestures to one of two trackers: key-downs to the keyboard
 * tracker, left-button presses (classified by corner) to the mouse tracker.
 * Everything else is left alone; the coordinator is one subscriber among
 * several and never filters what the others see.
 *
 * Example:
 *   const coordinator = new ExitCoordinator(capture.events$);
 *   coordinator.progress$.subscribe(p => render(p));
 *   coordinator.exitRequested$.subscribe(() => shutdown.run());
 */

import { Subject, Subscription, type Observable } from 'rxjs';
import type { InputEvent } from '../platform/inputEvents';
import { createNoopLogger, type Logger } from '../logger';
import { classifyCorner, DEFAULT_SCREEN_GEOMETRY, type ScreenGeometry } from './corners';
import { KEYBOARD_EXIT_SEQUENCE, MOUSE_EXIT_SEQUENCE, type ExitChannel, type SequenceDefinition } from './exitSequence';
import { projectProgress, describeProgress, type ExitProgress } from './progress';
import { systemScheduler, type Scheduler } from './scheduler';
import { SequenceTracker, type TrackerSnapshot } from './sequenceTracker';

export interface ExitCoordinatorOptions {
  keyboardSequence?: SequenceDefinition;
  mouseSequence?: SequenceDefinition;
  /** Provisional geometry used until `updateScreenSize` is called. */
  geometry?: Partial<ScreenGeometry>;
  scheduler?: Scheduler;
  logger?: Logger;
}

export class ExitCoordinator {
  private readonly keyboard: SequenceTracker;
  private readonly mouse: SequenceTracker;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private screen: ScreenGeometry;
  private disposed = false;

  private readonly progress = new Subject<ExitProgress>();
  private readonly exitRequested = new Subject<void>();
  private readonly subscriptions = new Subscription();

  readonly progress$: Observable<ExitProgress> = this.progress.asObservable();
  readonly exitRequested$: Observable<void> = this.exitRequested.asObservable();

  constructor(events$: Observable<InputEvent>, options: ExitCoordinatorOptions = {}) {
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? createNoopLogger();
    this.screen = { ...DEFAULT_SCREEN_GEOMETRY, ...options.geometry };

    this.keyboard = new SequenceTracker(options.keyboardSequence ?? KEYBOARD_EXIT_SEQUENCE, this.scheduler);
    this.mouse = new SequenceTracker(options.mouseSequence ?? MOUSE_EXIT_SEQUENCE, this.scheduler);

    this.subscriptions.add(this.keyboard.changes$.subscribe(snapshot => this.onTrackerChange(snapshot)));
    this.subscriptions.add(this.mouse.changes$.subscribe(snapshot => this.onTrackerChange(snapshot)));
    this.subscriptions.add(events$.subscribe(event => this.handleEvent(event)));
  }

  get geometry(): Readonly<ScreenGeometry> {
    return { ...this.screen };
  }

  get keyboardStep(): number {
    return this.keyboard.currentStep;
  }

  get mouseStep(): number {
    return this.mouse.currentStep;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  snapshot(channel: ExitChannel): TrackerSnapshot {
    return this.trackerFor(channel).snapshot();
  }

  /** Progress recomputed at the current time, for countdown displays. */
  currentProgress(channel: ExitChannel): ExitProgress {
    return projectProgress(this.trackerFor(channel).snapshot(), this.scheduler.now());
  }

  /**
   * Set the true screen size once the platform reports it. Only affects
   * clicks classified from now on.
   */
  updateScreenSize(width: number, height: number): void {
    if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
      this.logger.debug('ignoring unusable screen size', { width, height });
      return;
    }
    this.screen = { ...this.screen, width, height };
    this.logger.debug('screen size updated', { width, height });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.subscriptions.unsubscribe();
    this.keyboard.dispose();
    this.mouse.dispose();
    this.progress.complete();
    this.exitRequested.complete();
  }

  private handleEvent(event: InputEvent): void {
    if (this.disposed) return;

    switch (event.kind) {
      case 'key':
        if (event.isDown && typeof event.key === 'string') {
          this.keyboard.offer(event.key);
        }
        return;
      case 'button':
        if (event.isDown && event.button === 'left') {
          this.handleClick(event.x, event.y);
        }
        return;
      case 'motion':
      case 'scroll':
        return;
      default: {
        // New event kinds must be routed (or ignored) explicitly above.
        const unrouted: never = event;
        void unrouted;
      }
    }
  }

  private handleClick(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;

    const corner = classifyCorner(x, y, this.screen);
    if (corner === null) {
      this.mouse.mismatch();
    } else {
      this.mouse.offer(corner);
    }
  }

  private onTrackerChange(snapshot: TrackerSnapshot): void {
    const progress = projectProgress(snapshot);
    this.logger.debug('exit progress', { progress: describeProgress(progress) });
    this.progress.next(progress);

    if (snapshot.phase === 'completed') {
      this.logger.info('exit sequence completed', { channel: snapshot.channel });
      this.exitRequested.next();
    }
  }

  private trackerFor(channel: ExitChannel): SequenceTracker {
    return channel === 'keyboard' ? this.keyboard : this.mouse;
  }
}
