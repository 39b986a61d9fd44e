/**
 * A timer paired with its cancellation handle. Once `cancel()` returns the
 * callback is guaranteed not to run again.
 */
export interface ScheduledTask {
  readonly active: boolean;
  cancel(): void;
}

class TimerTask implements ScheduledTask {
  private handle: NodeJS.Timeout | null;
  private readonly repeating: boolean;

  constructor(delayMs: number, repeating: boolean, fn: () => void) {
    this.repeating = repeating;
    const run = () => {
      if (!this.repeating) {
        this.handle = null;
      }
      fn();
    };
    this.handle = repeating ? setInterval(run, delayMs) : setTimeout(run, delayMs);
  }

  get active(): boolean {
    return this.handle !== null;
  }

  cancel(): void {
    if (this.handle === null) {
      return;
    }
    if (this.repeating) {
      clearInterval(this.handle);
    } else {
      clearTimeout(this.handle);
    }
    this.handle = null;
  }
}

export function scheduleAfter(delayMs: number, fn: () => void): ScheduledTask {
  return new TimerTask(Math.max(0, delayMs), false, fn);
}

export function scheduleEvery(intervalMs: number, fn: () => void): ScheduledTask {
  return new TimerTask(intervalMs, true, fn);
}
