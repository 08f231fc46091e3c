/**
 * Clock and one-shot timers behind handles.
 *
 * A handle that has been cancelled never runs its callback, even when the
 * underlying timeout was already due in the same event-loop turn.
 */

export interface TimerHandle {
  cancel(): void;
  readonly active: boolean;
}

export interface Scheduler {
  now(): number;
  schedule(delayMs: number, callback: () => void): TimerHandle;
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  schedule(delayMs, callback) {
    let active = true;
    const timeout = setTimeout(() => {
      if (!active) return;
      active = false;
      callback();
    }, delayMs);

    return {
      cancel() {
        if (!active) return;
        active = false;
        clearTimeout(timeout);
      },
      get active() { return active; },
    };
  },
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
