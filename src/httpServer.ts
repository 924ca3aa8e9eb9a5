import { loadConfig } from "./config.js";
import { createHttpApp } from "./httpApp.js";
import { createSequencerRuntime } from "./server.js";

async function bootstrap() {
  const config = loadConfig();
  const runtime = await createSequencerRuntime(config);
  const { app, closeAll } = createHttpApp(runtime);

  const serverInstance = app.listen(config.port, () => {
    console.log(`Interval sequencer MCP HTTP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log("Shutting down interval sequencer...");
    runtime.toolset.dispose();
    serverInstance.close();
    await closeAll();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

bootstrap().catch(error => {
  console.error("Failed to start interval sequencer HTTP server", error);
  process.exit(1);
});
