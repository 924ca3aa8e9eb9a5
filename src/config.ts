import { z } from "zod";
import { DEFAULT_NOTIFY_INTERVAL_MS } from "./engine/notificationThrottle.js";
import { DEFAULT_TICK_PERIOD_MS } from "./engine/tickScheduler.js";

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2091),
  SEQUENCE_FILE: z.string().min(1).default("data/sequence.json"),
  TICK_PERIOD_MS: z.coerce.number().int().min(10).max(1000).default(DEFAULT_TICK_PERIOD_MS),
  NOTIFY_INTERVAL_MS: z.coerce.number().int().min(100).default(DEFAULT_NOTIFY_INTERVAL_MS)
});

export interface SequencerConfig {
  port: number;
  sequenceFile: string;
  tickPeriodMs: number;
  notifyIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SequencerConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    sequenceFile: parsed.data.SEQUENCE_FILE,
    tickPeriodMs: parsed.data.TICK_PERIOD_MS,
    notifyIntervalMs: parsed.data.NOTIFY_INTERVAL_MS
  };
}
