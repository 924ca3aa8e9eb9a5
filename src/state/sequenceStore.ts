import { v4 as uuid } from "uuid";
import type { IntervalSequence, SavedSequence, SequenceUpdateResult, StoredInterval } from "../types.js";
import { formatIntervalLabel } from "../ui/builders.js";

interface IntervalListStoreOptions {
  initial?: SavedSequence;
  onChange?: (sequence: SavedSequence) => void | Promise<void>;
}

export class IntervalListStore {
  private intervals: StoredInterval[] = [];
  private circular = false;
  private readonly onChange?: (sequence: SavedSequence) => void | Promise<void>;
  private pendingPersist: Promise<void> = Promise.resolve();
  private lastPersistError: Error | null = null;

  constructor(options: IntervalListStoreOptions = {}) {
    this.onChange = options.onChange;

    if (options.initial) {
      this.intervals = options.initial.intervals.map(interval => ({ ...interval }));
      this.circular = options.initial.circular;
    }
  }

  getSequence(): SavedSequence {
    return {
      intervals: this.intervals.map(interval => ({ ...interval })),
      circular: this.circular
    };
  }

  /** The engine-facing view: durations and names only, in order. */
  toIntervalSequence(): IntervalSequence {
    return {
      intervals: this.intervals.map(({ durationMs, name }) => (name === undefined ? { durationMs } : { durationMs, name })),
      circular: this.circular
    };
  }

  async waitForPersistence(): Promise<void> {
    await this.pendingPersist;

    if (this.lastPersistError) {
      const error = this.lastPersistError;
      this.lastPersistError = null;
      throw error;
    }
  }

  add(input: { durationMs: number; name?: string; position?: number }): SequenceUpdateResult {
    const interval = this.createInterval(input.durationMs, input.name);
    const position = input.position === undefined ? this.intervals.length : this.clampPosition(input.position, this.intervals.length);
    this.intervals.splice(position, 0, interval);
    this.emitChange();

    return this.result(`Added ${formatIntervalLabel(interval)}.`, interval);
  }

  update(id: string, changes: { durationMs?: number; name?: string | null }): SequenceUpdateResult {
    const index = this.requireIndex(id);
    const current = this.intervals[index];
    const name = changes.name === null ? undefined : changes.name ?? current.name;
    const updated: StoredInterval = this.createInterval(changes.durationMs ?? current.durationMs, name, current.id);

    this.intervals[index] = updated;
    this.emitChange();

    return this.result(`Updated ${formatIntervalLabel(updated)}.`, updated);
  }

  remove(id: string): SequenceUpdateResult {
    const index = this.requireIndex(id);
    const [removed] = this.intervals.splice(index, 1);
    this.emitChange();

    return this.result(`Removed ${formatIntervalLabel(removed)}.`, removed);
  }

  /** Inserts a copy right after the original; named intervals get a " (Copy)" suffix. */
  duplicate(id: string): SequenceUpdateResult {
    const index = this.requireIndex(id);
    const original = this.intervals[index];
    const copy = this.createInterval(original.durationMs, original.name ? `${original.name} (Copy)` : undefined);

    this.intervals.splice(index + 1, 0, copy);
    this.emitChange();

    return this.result(`Duplicated ${formatIntervalLabel(original)}.`, copy);
  }

  move(id: string, toIndex: number): SequenceUpdateResult {
    const index = this.requireIndex(id);
    const [moved] = this.intervals.splice(index, 1);
    const target = this.clampPosition(toIndex, this.intervals.length);
    this.intervals.splice(target, 0, moved);
    this.emitChange();

    return this.result(`Moved ${formatIntervalLabel(moved)} to position ${target + 1}.`, moved);
  }

  setCircular(circular: boolean): SequenceUpdateResult {
    this.circular = circular;
    this.emitChange();

    return this.result(circular ? "The sequence will repeat." : "The sequence will stop after the last interval.");
  }

  clear(): SequenceUpdateResult {
    this.intervals = [];
    this.emitChange();

    return this.result("Removed all intervals.");
  }

  private createInterval(durationMs: number, name?: string, id = uuid()): StoredInterval {
    if (!Number.isInteger(durationMs) || durationMs <= 0) {
      throw new Error("Intervals must last at least one millisecond.");
    }
    return name === undefined ? { id, durationMs } : { id, durationMs, name };
  }

  private clampPosition(position: number, length: number): number {
    return Math.min(Math.max(Math.trunc(position), 0), length);
  }

  private requireIndex(id: string): number {
    const index = this.intervals.findIndex(interval => interval.id === id);
    if (index === -1) {
      throw new Error("Interval not found.");
    }
    return index;
  }

  private result(message: string, interval?: StoredInterval): SequenceUpdateResult {
    return {
      message,
      sequence: this.getSequence(),
      interval: interval ? { ...interval } : undefined
    };
  }

  private emitChange(): void {
    if (!this.onChange) {
      return;
    }

    const snapshot = this.getSequence();
    this.lastPersistError = null;
    const result = Promise.resolve(this.onChange(snapshot));
    this.pendingPersist = result.catch(error => {
      this.lastPersistError = error instanceof Error ? error : new Error(String(error));
      console.error("IntervalListStore persistence error", this.lastPersistError);
    });
  }
}
