export type EngineStatus = "idle" | "running" | "paused" | "completed";

export interface Interval {
  readonly durationMs: number;
  readonly name?: string;
}

export interface IntervalSequence {
  readonly intervals: readonly Interval[];
  readonly circular: boolean;
}

export interface EngineSnapshot {
  status: EngineStatus;
  currentIndex: number;
  remainingMs: number;
  lapCount: number;
  intervalCount: number;
  circular: boolean;
  intervalName?: string;
}

export interface StatusSnapshot {
  status: EngineStatus;
  intervalIndex: number;
  intervalName?: string;
  remainingMs: number;
  lapCount: number;
}

/**
 * Receives every observable change of the timer engine. The engine holds at most
 * one observer; attaching another replaces it.
 */
export interface EngineObserver {
  onTick(remainingMs: number): void;
  onIntervalComplete(index: number): void;
  onSequenceComplete(): void;
  onLapCountChanged(lapCount: number): void;
  /** `-1` once no interval is active. */
  onCurrentIntervalChanged(index: number): void;
  onPaused(): void;
  onResumed(): void;
  onStopped(): void;
}

export interface HapticAction {
  pulse(): void | Promise<void>;
}

export interface StatusDisplay {
  refresh(status: StatusSnapshot, options: { forced: boolean }): void | Promise<void>;
}

/**
 * Best-effort aid that keeps the host alive while a sequence runs. Failing to acquire
 * it never stops the countdown.
 */
export interface BackgroundGuard {
  acquire(): void | Promise<void>;
  release(): void | Promise<void>;
}

export interface StoredInterval {
  id: string;
  durationMs: number;
  name?: string;
}

export interface SavedSequence {
  intervals: StoredInterval[];
  circular: boolean;
}

export interface SequenceUpdateResult {
  message: string;
  sequence: SavedSequence;
  interval?: StoredInterval;
}
