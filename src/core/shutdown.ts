/**
 * Shutdown Sequencer
 *
 * Ordered teardown once an exit gesture completes:
 *   1. stop forwarding input        4. release the window (alternate screen)
 *   2. stop the capture hook        5. grace delay for pending writes
 *   3. dispose games, coordinator   6. terminate the process
 *
 * Every step is isolated: a step that throws, rejects or hangs past
 * `stepTimeoutMs` is logged and the sequence moves on. Termination always
 * runs. The first trigger wins; later ones get the same promise back.
 * Step 1 runs synchronously inside `run()`, so no input is forwarded after
 * the trigger.
 */

import type { Observable, Subscription } from 'rxjs';
import { createNoopLogger, formatError, type Logger } from '../logger';
import { sleep as defaultSleep } from './scheduler';

export type ShutdownStepName = 'stop-input' | 'stop-capture' | 'dispose-session' | 'release-window' | 'grace';

export type ShutdownState = 'idle' | 'running' | 'finished';

export interface ShutdownHooks {
  stopInput: () => void | Promise<void>;
  stopCapture: () => unknown;
  /** Games first, then the coordinator that may still reference them. */
  disposeSession: () => void | Promise<void>;
  releaseWindow: () => unknown;
  terminate: (exitCode: number) => void;
  /** Last resort when `terminate` itself throws. */
  forceTerminate?: () => void;
}

export interface ShutdownOptions {
  graceMs?: number;
  stepTimeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface ShutdownReport {
  reason: string;
  failedSteps: ShutdownStepName[];
  exitCode: number;
}

export class ShutdownStepError extends Error {
  constructor(readonly step: ShutdownStepName, cause: unknown) {
    super(`shutdown step "${step}" failed: ${formatError(cause).message}`, { cause });
    this.name = 'ShutdownStepError';
  }
}

export const DEFAULT_GRACE_MS = 300;
export const DEFAULT_STEP_TIMEOUT_MS = 1500;

export class ShutdownSequencer {
  private pending: Promise<ShutdownReport> | null = null;
  private current: ShutdownState = 'idle';
  private readonly graceMs: number;
  private readonly stepTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly hooks: ShutdownHooks, options: ShutdownOptions = {}) {
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.logger = options.logger ?? createNoopLogger();
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): ShutdownState {
    return this.current;
  }

  /**
   * Run shutdown on every emission of `trigger$`. Only the first one does
   * anything.
   */
  attach(trigger$: Observable<void>, reason = 'exit gesture'): Subscription {
    return trigger$.subscribe(() => {
      void this.run(reason);
    });
  }

  run(reason = 'exit gesture'): Promise<ShutdownReport> {
    if (this.pending) {
      this.logger.debug('shutdown already in progress, ignoring trigger', { reason });
      return this.pending;
    }
    this.current = 'running';
    this.pending = this.execute(reason);
    return this.pending;
  }

  private async execute(reason: string): Promise<ShutdownReport> {
    this.logger.info('shutting down', { reason });

    const steps: Array<[ShutdownStepName, () => unknown]> = [
      ['stop-input', () => this.hooks.stopInput()],
      ['stop-capture', () => this.hooks.stopCapture()],
      ['dispose-session', () => this.hooks.disposeSession()],
      ['release-window', () => this.hooks.releaseWindow()],
      ['grace', () => this.sleep(this.graceMs)],
    ];

    const failedSteps: ShutdownStepName[] = [];
    for (const [name, action] of steps) {
      try {
        await this.runStep(name, action);
        this.logger.debug('shutdown step done', { step: name });
      } catch (err) {
        failedSteps.push(name);
        const error = err instanceof ShutdownStepError ? err : new ShutdownStepError(name, err);
        this.logger.error(error.message, { step: name });
      }
    }

    const exitCode = failedSteps.length === 0 ? 0 : 1;
    this.current = 'finished';
    this.terminate(exitCode);
    return { reason, failedSteps, exitCode };
  }

  private runStep(name: ShutdownStepName, action: () => unknown): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new ShutdownStepError(name, new Error(`timed out after ${this.stepTimeoutMs}ms`)));
      }, this.stepTimeoutMs);

      // Started in the caller's turn: stop-input takes effect before run() returns.
      let result: unknown;
      try {
        result = action();
      } catch (err) {
        clearTimeout(timer);
        reject(err);
        return;
      }

      Promise.resolve(result)
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (err: unknown) => {
            clearTimeout(timer);
            reject(err);
          },
        );
    });
  }

  private terminate(exitCode: number): void {
    try {
      this.hooks.terminate(exitCode);
    } catch (err) {
      this.logger.error('terminate failed, forcing exit', formatError(err));
      this.hooks.forceTerminate?.();
    }
  }
}
