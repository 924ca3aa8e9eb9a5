import type {
  BackgroundGuard,
  EngineObserver,
  EngineSnapshot,
  EngineStatus,
  HapticAction,
  IntervalSequence,
  StatusDisplay,
  StatusSnapshot
} from "../types.js";
import { monotonicClock, type Clock } from "./clock.js";
import { DEFAULT_NOTIFY_INTERVAL_MS, shouldRefresh } from "./notificationThrottle.js";
import { TickScheduler } from "./tickScheduler.js";

export interface TimerEngineOptions {
  clock?: Clock;
  scheduler?: TickScheduler;
  notifyIntervalMs?: number;
  haptics?: HapticAction;
  statusDisplay?: StatusDisplay;
  backgroundGuard?: BackgroundGuard;
  observer?: Partial<EngineObserver>;
}

const EMPTY_SEQUENCE: IntervalSequence = Object.freeze({ intervals: Object.freeze([]), circular: false });

function freezeSequence(sequence: IntervalSequence): IntervalSequence {
  const intervals = sequence.intervals.map(interval =>
    Object.freeze({
      durationMs: Math.max(interval.durationMs, 0),
      ...(interval.name !== undefined ? { name: interval.name } : {})
    })
  );
  return Object.freeze({ intervals: Object.freeze(intervals), circular: sequence.circular });
}

/**
 * Runs an {@link IntervalSequence} against a monotonic deadline. Remaining time is
 * always `deadline - now`, so late ticks cost at most one scheduling delay and never
 * accumulate.
 *
 * Operations that are invalid for the current status are silent no-ops.
 */
export class TimerEngine {
  private readonly clock: Clock;
  private readonly scheduler: TickScheduler;
  private readonly notifyIntervalMs: number;
  private readonly haptics?: HapticAction;
  private readonly statusDisplay?: StatusDisplay;
  private readonly backgroundGuard?: BackgroundGuard;
  private observer: Partial<EngineObserver> | null;

  private sequence: IntervalSequence = EMPTY_SEQUENCE;
  private status: EngineStatus = "idle";
  private currentIndex = -1;
  private remainingMs = 0;
  private deadline = 0;
  private lapCount = 0;
  private lastNotifyAt = Number.NEGATIVE_INFINITY;
  private backgroundHeld = false;
  // Bumped on every transition so a tick can tell an observer changed the state under it.
  private run = 0;

  constructor(options: TimerEngineOptions = {}) {
    this.clock = options.clock ?? monotonicClock;
    this.scheduler = options.scheduler ?? new TickScheduler();
    this.notifyIntervalMs = options.notifyIntervalMs ?? DEFAULT_NOTIFY_INTERVAL_MS;
    this.haptics = options.haptics;
    this.statusDisplay = options.statusDisplay;
    this.backgroundGuard = options.backgroundGuard;
    this.observer = options.observer ?? null;
  }

  setObserver(observer: Partial<EngineObserver> | null): void {
    this.observer = observer;
  }

  /**
   * Stores a frozen copy of `sequence`. Ignored (returns `false`) while a sequence is
   * running or paused.
   */
  setSequence(sequence: IntervalSequence): boolean {
    if (this.status === "running" || this.status === "paused") {
      return false;
    }
    this.sequence = freezeSequence(sequence);
    return true;
  }

  getSequence(): IntervalSequence {
    return this.sequence;
  }

  getSnapshot(): EngineSnapshot {
    const remainingMs =
      this.status === "running" ? Math.max(Math.ceil(this.deadline - this.clock.now()), 0) : this.remainingMs;
    const interval = this.currentIndex >= 0 ? this.sequence.intervals[this.currentIndex] : undefined;
    return {
      status: this.status,
      currentIndex: this.currentIndex,
      remainingMs,
      lapCount: this.lapCount,
      intervalCount: this.sequence.intervals.length,
      circular: this.sequence.circular,
      intervalName: interval?.name
    };
  }

  start(): void {
    if (this.status === "running" || this.status === "paused") {
      return;
    }
    if (this.sequence.intervals.length === 0) {
      return;
    }

    this.run += 1;
    this.acquireBackground();
    this.status = "running";
    this.scheduler.start(() => this.tick());
    this.lapCount = 0;
    const run = this.run;
    this.notify(observer => observer.onLapCountChanged?.(0));
    if (run !== this.run) {
      return;
    }
    this.enterInterval(0, this.clock.now());
  }

  pause(): void {
    if (this.status !== "running") {
      return;
    }

    this.run += 1;
    this.scheduler.cancel();
    this.remainingMs = Math.max(Math.ceil(this.deadline - this.clock.now()), 0);
    this.status = "paused";
    this.refreshStatus(true);
    this.notify(observer => observer.onPaused?.());
  }

  resume(): void {
    if (this.status !== "paused" || this.remainingMs <= 0) {
      return;
    }

    this.run += 1;
    this.deadline = this.clock.now() + this.remainingMs;
    this.status = "running";
    this.scheduler.start(() => this.tick());
    this.refreshStatus(true);
    this.notify(observer => observer.onResumed?.());
  }

  stop(): void {
    if (this.status === "idle") {
      return;
    }
    if (this.status === "completed") {
      // Completion already tore everything down and reported it.
      this.status = "idle";
      return;
    }
    this.teardown("idle");
  }

  reset(): void {
    this.stop();
    this.lastNotifyAt = Number.NEGATIVE_INFINITY;
    if (this.lapCount !== 0) {
      this.lapCount = 0;
      this.notify(observer => observer.onLapCountChanged?.(0));
    }
  }

  /** Driven by the scheduler while running; a no-op in any other status. */
  tick(): void {
    if (this.status !== "running") {
      return;
    }

    const run = this.run;
    const now = this.clock.now();
    const remaining = Math.ceil(this.deadline - now);

    if (remaining > 0) {
      this.remainingMs = remaining;
      this.notify(observer => observer.onTick?.(remaining));
      if (run === this.run && shouldRefresh(now, this.lastNotifyAt, this.notifyIntervalMs)) {
        this.refreshStatus(false);
      }
      return;
    }

    this.remainingMs = 0;
    const completedIndex = this.currentIndex;
    this.runEffect("Haptic pulse", () => this.haptics?.pulse());
    this.notify(observer => observer.onIntervalComplete?.(completedIndex));
    if (run !== this.run) {
      return;
    }

    const nextIndex = completedIndex + 1;
    if (nextIndex < this.sequence.intervals.length) {
      this.enterInterval(nextIndex, now);
      return;
    }

    if (this.sequence.circular) {
      this.lapCount += 1;
      const lapCount = this.lapCount;
      this.notify(observer => observer.onLapCountChanged?.(lapCount));
      if (run !== this.run) {
        return;
      }
      this.enterInterval(0, now);
      return;
    }

    this.notify(observer => observer.onSequenceComplete?.());
    if (run !== this.run) {
      return;
    }
    this.teardown("completed");
  }

  private enterInterval(index: number, now: number): void {
    const interval = this.sequence.intervals[index];
    this.currentIndex = index;
    this.remainingMs = interval.durationMs;
    this.deadline = now + interval.durationMs;
    this.refreshStatus(true);
    this.notify(observer => observer.onCurrentIntervalChanged?.(index));
  }

  private teardown(status: "idle" | "completed"): void {
    this.run += 1;
    this.scheduler.cancel();
    const hadInterval = this.currentIndex !== -1;
    this.status = status;
    this.currentIndex = -1;
    this.remainingMs = 0;
    this.deadline = 0;
    this.releaseBackground();
    this.refreshStatus(true);

    const run = this.run;
    if (hadInterval) {
      this.notify(observer => observer.onCurrentIntervalChanged?.(-1));
    }
    if (run === this.run) {
      this.notify(observer => observer.onStopped?.());
    }
  }

  private describeStatus(): StatusSnapshot {
    const interval = this.currentIndex >= 0 ? this.sequence.intervals[this.currentIndex] : undefined;
    return {
      status: this.status,
      intervalIndex: this.currentIndex,
      intervalName: interval?.name,
      remainingMs: this.remainingMs,
      lapCount: this.lapCount
    };
  }

  private refreshStatus(forced: boolean): void {
    this.lastNotifyAt = this.clock.now();
    const display = this.statusDisplay;
    if (!display) {
      return;
    }
    const status = this.describeStatus();
    this.runEffect("Status refresh", () => display.refresh(status, { forced }));
  }

  private acquireBackground(): void {
    const guard = this.backgroundGuard;
    if (!guard || this.backgroundHeld) {
      return;
    }
    this.backgroundHeld = true;
    this.runEffect("Background guard acquire", () => guard.acquire());
  }

  private releaseBackground(): void {
    const guard = this.backgroundGuard;
    if (!guard || !this.backgroundHeld) {
      return;
    }
    this.backgroundHeld = false;
    this.runEffect("Background guard release", () => guard.release());
  }

  private notify(deliver: (observer: Partial<EngineObserver>) => void): void {
    const observer = this.observer;
    if (!observer) {
      return;
    }
    try {
      deliver(observer);
    } catch (error) {
      console.error("TimerEngine observer error", error);
    }
  }

  private runEffect(label: string, effect: () => void | Promise<void>): void {
    try {
      void Promise.resolve(effect()).catch(error => {
        console.error(`${label} failed`, error);
      });
    } catch (error) {
      console.error(`${label} failed`, error);
    }
  }
}
