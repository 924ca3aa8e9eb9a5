import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createSequencerServer, type SequencerRuntime } from "./server.js";

interface Session {
  transport: StreamableHTTPServerTransport;
  detach: () => void;
}

function sendError(res: Response, status: number, error: string, message: string): void {
  if (!res.headersSent) {
    res.status(status).json({ error, message });
  }
}

export function createHttpApp(runtime: SequencerRuntime) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const sessions = new Map<string, Session>();

  const closeSession = (sessionId: string) => {
    const session = sessions.get(sessionId);
    if (session) {
      session.detach();
      sessions.delete(sessionId);
    }
  };

  const openSession = async () => {
    const server = createSequencerServer(runtime);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, { transport, detach: runtime.notifier.attach(server) });
      }
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        closeSession(transport.sessionId);
      }
    };

    await server.connect(transport);
    return { server, transport };
  };

  const existingSession = (req: Request, res: Response, action: string): Session | undefined => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      sendError(res, 400, "missing_session", `Provide an MCP-Session-Id header to ${action}.`);
      return undefined;
    }
    const session = sessions.get(sessionId);
    if (!session) {
      sendError(res, 404, "unknown_session", "Session not found. Start a new session to initialize.");
      return undefined;
    }
    return session;
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const session = existingSession(req, res, "continue a session");
        if (session) {
          await session.transport.handleRequest(req, res, req.body);
        }
        return;
      }

      const { server, transport } = await openSession();
      await transport.handleRequest(req, res, req.body);
      if (!transport.sessionId) {
        // Anything but an initialize request is rejected, and no later request can reach this server.
        await server.close();
      }
    } catch (error) {
      console.error("Error handling MCP POST request", error);
      sendError(res, 500, "internal_error", "The interval sequencer encountered an unexpected error.");
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const session = existingSession(req, res, "resume streaming");
    if (!session) {
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      console.error("Error handling MCP GET stream", error);
      sendError(res, 500, "internal_error", "Failed to stream MCP updates.");
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const session = existingSession(req, res, "close a session");
    if (!session) {
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      console.error("Error handling MCP DELETE request", error);
      sendError(res, 500, "internal_error", "Failed to close MCP session.");
    } finally {
      if (session.transport.sessionId) {
        closeSession(session.transport.sessionId);
      }
    }
  });

  const closeAll = async () => {
    await Promise.all(
      [...sessions.values()].map(async ({ transport }) => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
  };

  return {
    app,
    closeAll,
    get sessionCount() {
      return sessions.size;
    }
  };
}
