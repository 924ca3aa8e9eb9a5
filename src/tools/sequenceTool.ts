import { formatISO } from "date-fns";
import { z } from "zod";
import { TimerEngine } from "../engine/timerEngine.js";
import { IntervalListStore } from "../state/sequenceStore.js";
import type { EngineObserver, EngineSnapshot, SequenceUpdateResult } from "../types.js";
import { buildStatusCard, formatTime, type StatusCard } from "../ui/builders.js";
import { MAX_INTERVAL_SECONDS, parseDurationSeconds } from "./duration.js";

const durationObjectSchema = z
  .object({
    minutes: z.number().int().min(0).default(0),
    seconds: z.number().int().min(0).max(59).default(0)
  })
  .refine(value => value.minutes > 0 || value.seconds > 0, {
    message: "Intervals must be at least 1 second long."
  })
  .transform(value => value.minutes * 60 + value.seconds);

const durationTextSchema = z.string().transform((value, ctx) => {
  try {
    return parseDurationSeconds(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error)
    });
    return z.NEVER;
  }
});

/** Accepts `{ minutes, seconds }`, whole seconds, or text such as "1m 30s"; yields milliseconds. */
export const intervalDurationSchema = z
  .union([durationObjectSchema, z.number().int().positive(), durationTextSchema])
  .pipe(z.number().int().positive().max(MAX_INTERVAL_SECONDS, { message: "Intervals can last at most 10 hours." }))
  .transform(seconds => seconds * 1000);

const intervalNameSchema = z.string().trim().min(1).max(48);

export const addIntervalInput = z.object({
  name: intervalNameSchema.optional(),
  duration: intervalDurationSchema,
  position: z.number().int().min(0).optional()
});

export const updateIntervalInput = z
  .object({
    id: z.string().uuid(),
    name: intervalNameSchema.nullable().optional(),
    duration: intervalDurationSchema.optional()
  })
  .refine(value => value.name !== undefined || value.duration !== undefined, {
    message: "Provide a new name or duration."
  });

export const moveIntervalInput = z.object({
  id: z.string().uuid(),
  toIndex: z.number().int().min(0)
});

const MAX_RECENT_EVENTS = 20;

export interface TimerEvent {
  type: "interval_complete" | "interval_changed" | "lap" | "sequence_complete" | "paused" | "resumed" | "stopped";
  at: string;
  index?: number;
  lapCount?: number;
}

export interface TimerCommandResult {
  message: string;
  snapshot: EngineSnapshot;
  statusCard: StatusCard;
  recentEvents: TimerEvent[];
}

/**
 * Facade used by the MCP tools: edits the persisted interval list and drives the
 * engine with a snapshot of it.
 */
export class SequenceToolset {
  private readonly events: TimerEvent[] = [];

  constructor(
    private readonly store: IntervalListStore,
    private readonly engine: TimerEngine
  ) {
    engine.setObserver(this.createObserver());
  }

  listIntervals(): SequenceUpdateResult {
    const sequence = this.store.getSequence();
    const count = sequence.intervals.length;
    return {
      message: count === 0 ? "No intervals added." : `${count} interval${count === 1 ? "" : "s"} in the sequence.`,
      sequence
    };
  }

  async addInterval(input: z.input<typeof addIntervalInput>): Promise<SequenceUpdateResult> {
    const parsed = addIntervalInput.parse(input);
    const result = this.store.add({ durationMs: parsed.duration, name: parsed.name, position: parsed.position });
    await this.store.waitForPersistence();
    return result;
  }

  async updateInterval(input: z.input<typeof updateIntervalInput>): Promise<SequenceUpdateResult> {
    const parsed = updateIntervalInput.parse(input);
    const result = this.store.update(parsed.id, { durationMs: parsed.duration, name: parsed.name });
    await this.store.waitForPersistence();
    return result;
  }

  async removeInterval(id: string): Promise<SequenceUpdateResult> {
    const result = this.store.remove(z.string().uuid().parse(id));
    await this.store.waitForPersistence();
    return result;
  }

  async duplicateInterval(id: string): Promise<SequenceUpdateResult> {
    const result = this.store.duplicate(z.string().uuid().parse(id));
    await this.store.waitForPersistence();
    return result;
  }

  async moveInterval(input: z.input<typeof moveIntervalInput>): Promise<SequenceUpdateResult> {
    const parsed = moveIntervalInput.parse(input);
    const result = this.store.move(parsed.id, parsed.toIndex);
    await this.store.waitForPersistence();
    return result;
  }

  async setCircular(circular: boolean): Promise<SequenceUpdateResult> {
    const result = this.store.setCircular(circular);
    await this.store.waitForPersistence();
    return result;
  }

  /** Stops an active sequence before emptying the list. */
  async clearIntervals(): Promise<SequenceUpdateResult> {
    const status = this.engine.getSnapshot().status;
    if (status === "running" || status === "paused") {
      this.engine.stop();
    }
    const result = this.store.clear();
    await this.store.waitForPersistence();
    return result;
  }

  start(): TimerCommandResult {
    const before = this.engine.getSnapshot().status;
    if (before === "running" || before === "paused") {
      return this.commandResult("A sequence is already active. Stop it before starting again.");
    }

    const sequence = this.store.toIntervalSequence();
    if (sequence.intervals.length === 0) {
      return this.commandResult("Add an interval before starting.");
    }

    this.engine.setSequence(sequence);
    this.engine.start();
    const count = sequence.intervals.length;
    return this.commandResult(
      `Started ${count} interval${count === 1 ? "" : "s"}${sequence.circular ? " on repeat" : ""}.`
    );
  }

  pause(): TimerCommandResult {
    if (this.engine.getSnapshot().status !== "running") {
      return this.commandResult("Nothing is running.");
    }
    this.engine.pause();
    return this.commandResult(`Paused with ${formatTime(this.engine.getSnapshot().remainingMs)} left.`);
  }

  resume(): TimerCommandResult {
    if (this.engine.getSnapshot().status !== "paused") {
      return this.commandResult("Nothing is paused.");
    }
    this.engine.resume();
    return this.commandResult(`Resumed with ${formatTime(this.engine.getSnapshot().remainingMs)} left.`);
  }

  stop(): TimerCommandResult {
    this.engine.stop();
    return this.commandResult("Stopped.");
  }

  reset(): TimerCommandResult {
    this.engine.reset();
    return this.commandResult("Reset.");
  }

  status(): TimerCommandResult {
    const snapshot = this.engine.getSnapshot();
    const message =
      snapshot.status === "idle"
        ? "No sequence running."
        : snapshot.status === "completed"
          ? "Sequence complete."
          : `Interval ${snapshot.currentIndex + 1} of ${snapshot.intervalCount}, ${formatTime(snapshot.remainingMs)} left.`;
    return this.commandResult(message);
  }

  dispose(): void {
    this.engine.setObserver(null);
    this.engine.reset();
  }

  private commandResult(message: string): TimerCommandResult {
    const snapshot = this.engine.getSnapshot();
    return {
      message,
      snapshot,
      statusCard: buildStatusCard({
        status: snapshot.status,
        intervalIndex: snapshot.currentIndex,
        intervalName: snapshot.intervalName,
        remainingMs: snapshot.remainingMs,
        lapCount: snapshot.lapCount
      }),
      recentEvents: [...this.events]
    };
  }

  private record(event: Omit<TimerEvent, "at">): void {
    this.events.push({ ...event, at: formatISO(new Date()) });
    if (this.events.length > MAX_RECENT_EVENTS) {
      this.events.splice(0, this.events.length - MAX_RECENT_EVENTS);
    }
  }

  private createObserver(): Partial<EngineObserver> {
    return {
      onIntervalComplete: index => this.record({ type: "interval_complete", index }),
      onCurrentIntervalChanged: index => {
        if (index >= 0) {
          this.record({ type: "interval_changed", index });
        }
      },
      onLapCountChanged: lapCount => {
        if (lapCount > 0) {
          this.record({ type: "lap", lapCount });
        }
      },
      onSequenceComplete: () => this.record({ type: "sequence_complete" }),
      onPaused: () => this.record({ type: "paused" }),
      onResumed: () => this.record({ type: "resumed" }),
      onStopped: () => this.record({ type: "stopped" })
    };
  }
}
