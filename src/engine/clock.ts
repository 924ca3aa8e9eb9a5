import { performance } from "node:perf_hooks";

export interface Clock {
  /** Milliseconds on a monotonic scale; only differences are meaningful. */
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now()
};
