/**
 * Time source for breakers and the router. Injectable so tests can move
 * time explicitly; `defaultClock` also follows `vi.useFakeTimers()`.
 */

export interface Clock {
  readonly now: () => number;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
};
