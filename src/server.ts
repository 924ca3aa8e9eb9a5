import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import packageJson from "../package.json" with { type: "json" };
import { ProcessKeepAlive } from "./collaborators/keepAlive.js";
import { McpClientNotifier } from "./collaborators/mcpNotifier.js";
import type { SequencerConfig } from "./config.js";
import { TickScheduler } from "./engine/tickScheduler.js";
import { TimerEngine } from "./engine/timerEngine.js";
import { IntervalListStore } from "./state/sequenceStore.js";
import { SequenceFileStorage, type SequenceStorage } from "./state/sequenceStorage.js";
import { StatusBoard } from "./state/statusBoard.js";
import { SequenceToolset, type TimerCommandResult } from "./tools/sequenceTool.js";
import type { SequenceUpdateResult } from "./types.js";
import { APP_NAME, buildSequenceCard } from "./ui/builders.js";

export interface SequencerRuntime {
  engine: TimerEngine;
  toolset: SequenceToolset;
  statusBoard: StatusBoard;
  notifier: McpClientNotifier;
  keepAlive: ProcessKeepAlive;
}

const durationShape = z
  .union([
    z.object({
      minutes: z.number().int().min(0).optional(),
      seconds: z.number().int().min(0).max(59).optional()
    }),
    z.number().int().positive().describe("Whole seconds."),
    z.string().min(1).describe('Examples: "5 minutes", "30s", "1m 30s" or "01:30".')
  ])
  .optional();

const timerInputSchema = z.object({
  action: z.enum(["start", "pause", "resume", "stop", "reset", "status"]).default("status")
});

/**
 * Builds the single engine and interval list shared by every MCP session.
 */
export async function createSequencerRuntime(
  config: SequencerConfig,
  storage: SequenceStorage = new SequenceFileStorage(config.sequenceFile)
): Promise<SequencerRuntime> {
  const notifier = new McpClientNotifier();
  const keepAlive = new ProcessKeepAlive();
  const statusBoard = new StatusBoard({ publish: (card, options) => notifier.publishStatus(card, options) });
  const engine = new TimerEngine({
    scheduler: new TickScheduler(config.tickPeriodMs),
    notifyIntervalMs: config.notifyIntervalMs,
    haptics: notifier,
    statusDisplay: statusBoard,
    backgroundGuard: keepAlive
  });

  const initial = await storage.load();
  const store = new IntervalListStore({
    initial,
    onChange: sequence => storage.save(sequence)
  });

  return {
    engine,
    toolset: new SequenceToolset(store, engine),
    statusBoard,
    notifier,
    keepAlive
  };
}

export function createSequencerServer(runtime: SequencerRuntime): McpServer {
  const { toolset } = runtime;
  const server = new McpServer(
    {
      name: APP_NAME,
      version: packageJson.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "intervals",
    {
      title: "Intervals",
      description:
        "List and edit the interval sequence: add, update, remove, duplicate, move, clear all intervals, or toggle circular mode.",
      inputSchema: {
        action: z.enum(["list", "add", "update", "remove", "duplicate", "move", "clear", "circular"]),
        id: z.string().uuid().optional(),
        name: z.string().max(48).nullable().optional(),
        duration: durationShape,
        position: z.number().int().min(0).optional(),
        toIndex: z.number().int().min(0).optional(),
        circular: z.boolean().optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      switch (input.action) {
        case "add":
          return buildSequenceResult(
            await toolset.addInterval({
              name: input.name ?? undefined,
              duration: requireField(input.duration, "duration"),
              position: input.position
            })
          );
        case "update":
          return buildSequenceResult(
            await toolset.updateInterval({
              id: requireField(input.id, "id"),
              name: input.name,
              duration: input.duration
            })
          );
        case "remove":
          return buildSequenceResult(await toolset.removeInterval(requireField(input.id, "id")));
        case "duplicate":
          return buildSequenceResult(await toolset.duplicateInterval(requireField(input.id, "id")));
        case "move":
          return buildSequenceResult(
            await toolset.moveInterval({
              id: requireField(input.id, "id"),
              toIndex: requireField(input.toIndex, "toIndex")
            })
          );
        case "clear":
          return buildSequenceResult(await toolset.clearIntervals());
        case "circular":
          return buildSequenceResult(await toolset.setCircular(requireField(input.circular, "circular")));
        case "list":
        default:
          return buildSequenceResult(toolset.listIntervals());
      }
    }
  );

  server.registerTool(
    "timer",
    {
      title: "Timer",
      description: "Start, pause, resume, stop, or reset the interval sequence, or report its status.",
      inputSchema: {
        action: z.enum(["start", "pause", "resume", "stop", "reset", "status"]).optional()
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const { action } = timerInputSchema.parse(input);

      switch (action) {
        case "start":
          return buildTimerResult(toolset.start());
        case "pause":
          return buildTimerResult(toolset.pause());
        case "resume":
          return buildTimerResult(toolset.resume());
        case "stop":
          return buildTimerResult(toolset.stop());
        case "reset":
          return buildTimerResult(toolset.reset());
        case "status":
        default:
          return buildTimerResult(toolset.status());
      }
    }
  );

  return server;
}

function requireField<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new Error(`The "${field}" field is required for this action.`);
  }
  return value;
}

function buildSequenceResult(result: SequenceUpdateResult) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: {
      app: APP_NAME,
      sequence: buildSequenceCard(result.sequence)
    }
  };
}

function buildTimerResult(result: TimerCommandResult) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: {
      app: APP_NAME,
      status: result.statusCard,
      snapshot: result.snapshot,
      recentEvents: result.recentEvents
    }
  };
}
