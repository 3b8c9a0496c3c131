/**
 * Time source for everything that waits.
 *
 * Loops that hold positions for hours go through `sleep` so tests can run
 * them against a ManualClock without wall-clock waits.
 */
export interface Clock {
  now(): number;
  date(): Date;
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  date(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Clock whose sleeps complete immediately and advance virtual time.
 *
 * Each sleep still yields one macrotask so concurrent loops interleave.
 */
export class ManualClock implements Clock {
  private currentTime: number;
  private sleeps: number[] = [];

  constructor(startTime: number = 0) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  date(): Date {
    return new Date(this.currentTime);
  }

  setTime(time: number): void {
    if (time < this.currentTime) {
      throw new Error('Cannot move time backwards');
    }
    this.currentTime = time;
  }

  advance(ms: number): void {
    this.setTime(this.currentTime + ms);
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (!signal?.aborted && ms > 0) {
      this.advance(ms);
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  /** Durations passed to sleep, in call order */
  getSleeps(): readonly number[] {
    return this.sleeps;
  }

  totalSlept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}
