import { addMilliseconds, formatISO } from "date-fns";
import type { EngineStatus, Interval, SavedSequence, StatusSnapshot } from "../types.js";

export const APP_NAME = "Interval Sequencer";

export type StatusAction = "pause" | "resume" | "stop";

export interface StatusCard {
  surface: "status_card";
  status: EngineStatus;
  heading: string;
  body: string;
  remaining: string;
  badge?: string;
  endsAt?: string;
  actions: StatusAction[];
  accessibilityLabel: string;
}

export interface SequenceRow {
  id: string;
  position: number;
  title: string;
  duration: string;
}

export interface SequenceCard {
  surface: "sequence_list";
  heading: string;
  circular: boolean;
  rows: SequenceRow[];
  totalDuration: string;
  accessibilityLabel: string;
}

/**
 * Renders remaining time as `MM:SS`, rounding to the nearest second.
 */
export function formatTime(ms: number): string {
  const totalSeconds = Math.floor((Math.max(ms, 0) + 500) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(Math.round(ms / 1000), 0);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}m ${seconds}s`;
}

export function formatIntervalLabel(interval: Interval): string {
  const duration = formatDuration(interval.durationMs);
  return interval.name ? `${interval.name} (${duration})` : duration;
}

export function buildStatusCard(status: StatusSnapshot, now = new Date()): StatusCard {
  const remaining = formatTime(status.remainingMs);
  const badge = status.lapCount > 0 ? `Lap ${status.lapCount}` : undefined;

  switch (status.status) {
    case "running":
      return {
        surface: "status_card",
        status: status.status,
        heading: status.intervalName ?? APP_NAME,
        body: `${remaining} remaining`,
        remaining,
        badge,
        endsAt: formatISO(addMilliseconds(now, status.remainingMs)),
        actions: ["pause", "stop"],
        accessibilityLabel: `${status.intervalName ?? `Interval ${status.intervalIndex + 1}`} running, ${remaining} remaining.`
      };
    case "paused":
      return {
        surface: "status_card",
        status: status.status,
        heading: "Timer paused",
        body: remaining,
        remaining,
        badge,
        actions: ["resume", "stop"],
        accessibilityLabel: `Timer paused with ${remaining} remaining.`
      };
    case "completed":
      return {
        surface: "status_card",
        status: status.status,
        heading: APP_NAME,
        body: "Sequence complete.",
        remaining,
        badge,
        actions: [],
        accessibilityLabel: "Sequence complete."
      };
    case "idle":
    default:
      return {
        surface: "status_card",
        status: status.status,
        heading: APP_NAME,
        body: "No sequence running.",
        remaining,
        badge,
        actions: [],
        accessibilityLabel: "No sequence running."
      };
  }
}

export function buildSequenceCard(sequence: SavedSequence): SequenceCard {
  const totalMs = sequence.intervals.reduce((sum, interval) => sum + interval.durationMs, 0);
  const count = sequence.intervals.length;

  return {
    surface: "sequence_list",
    heading: sequence.circular ? "Interval sequence (circular)" : "Interval sequence",
    circular: sequence.circular,
    rows: sequence.intervals.map((interval, position) => ({
      id: interval.id,
      position,
      title: interval.name ?? `Interval ${position + 1}`,
      duration: formatDuration(interval.durationMs)
    })),
    totalDuration: formatDuration(totalMs),
    accessibilityLabel: count === 0 ? "No intervals added." : `${count} interval${count === 1 ? "" : "s"} in the sequence.`
  };
}
