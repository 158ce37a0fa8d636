/**
 * Source of the current time in epoch milliseconds.
 * Injected wherever expiry or age is computed so tests can pin the time.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
