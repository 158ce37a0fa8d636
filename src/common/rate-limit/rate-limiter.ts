import { Clock, systemClock } from '../time/clock';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RateLimiterOptions {
  /** Minimum spacing between two admitted calls */
  intervalMs: number;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Enforces a minimum interval between outbound calls.
 *
 * Callers are delayed, never rejected. Concurrent callers queue on a promise
 * chain and are admitted one at a time in arrival order; each one re-measures
 * the time since the last admission before deciding how long to wait.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  private lastAdmittedAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolves once at least `intervalMs` has passed since the previous
   * admission, and records this call as the new one.
   */
  wait(): Promise<void> {
    const turn = this.queue.then(() => this.admit());
    // The caller still sees a rejection; the queue itself keeps moving
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  /** Time of the most recent admission, or null before the first call. */
  get lastAdmission(): number | null {
    return this.lastAdmittedAt;
  }

  private async admit(): Promise<void> {
    const previous = this.lastAdmittedAt;
    if (previous !== null) {
      let elapsed = this.clock.now() - previous;
      // setTimeout may fire a hair early, so re-check after every sleep
      while (elapsed < this.intervalMs) {
        await this.sleep(this.intervalMs - elapsed);
        elapsed = this.clock.now() - previous;
      }
    }
    this.lastAdmittedAt = this.clock.now();
  }
}
