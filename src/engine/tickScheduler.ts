export const DEFAULT_TICK_PERIOD_MS = 100;

export interface TimerHost {
  /** Schedules a one-shot callback and returns a function that cancels it. */
  schedule(callback: () => void, delayMs: number): () => void;
}

export const nodeTimerHost: TimerHost = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    // The background guard decides whether the process stays up, not the tick loop.
    handle.unref();
    return () => clearTimeout(handle);
  }
};

/**
 * Repeats a callback every `periodMs`, measured from the end of the previous firing.
 * Delayed firings are not made up for: one late firing is followed by the next one a
 * full period later.
 */
export class TickScheduler {
  private cancelPending: (() => void) | null = null;
  private generation = 0;

  constructor(
    private readonly periodMs = DEFAULT_TICK_PERIOD_MS,
    private readonly host: TimerHost = nodeTimerHost
  ) {}

  get armed(): boolean {
    return this.cancelPending !== null;
  }

  start(callback: () => void): void {
    this.cancel();
    this.arm(callback, this.generation);
  }

  cancel(): void {
    this.generation += 1;
    if (this.cancelPending) {
      this.cancelPending();
      this.cancelPending = null;
    }
  }

  private arm(callback: () => void, generation: number): void {
    this.cancelPending = this.host.schedule(() => {
      if (generation !== this.generation) {
        return;
      }
      this.cancelPending = null;
      try {
        callback();
      } catch (error) {
        console.error("Tick callback failed", error);
      }
      // start() or cancel() inside the callback moved the generation on.
      if (generation === this.generation) {
        this.arm(callback, generation);
      }
    }, this.periodMs);
  }
}
