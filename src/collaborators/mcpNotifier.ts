import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { HapticAction } from "../types.js";
import type { StatusCard } from "../ui/builders.js";

type LoggingParams = Parameters<McpServer["server"]["sendLoggingMessage"]>[0];

/**
 * Forwards engine side effects to every connected MCP session as logging
 * notifications. With no session connected the calls do nothing.
 */
export class McpClientNotifier implements HapticAction {
  private readonly servers = new Set<McpServer>();

  attach(server: McpServer): () => void {
    this.servers.add(server);
    return () => {
      this.servers.delete(server);
    };
  }

  get sessionCount(): number {
    return this.servers.size;
  }

  async pulse(): Promise<void> {
    await this.broadcast({
      level: "notice",
      logger: "haptics",
      data: { event: "interval_complete" }
    });
  }

  /** Transitions go out at `info`; periodic countdown updates at `debug`, which clients can filter. */
  async publishStatus(card: StatusCard, options: { forced: boolean }): Promise<void> {
    await this.broadcast({
      level: options.forced ? "info" : "debug",
      logger: "status",
      data: { ...card, forced: options.forced }
    });
  }

  private async broadcast(params: LoggingParams): Promise<void> {
    const connected = [...this.servers].filter(server => server.isConnected());
    const results = await Promise.allSettled(connected.map(server => server.server.sendLoggingMessage(params)));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map(failure => failure.reason),
        `Failed to notify ${failures.length} of ${connected.length} MCP sessions.`
      );
    }
  }
}
