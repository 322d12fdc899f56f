import type { ScheduledTask } from "node-cron";
import { loadConfig } from "./config.js";
import { createApp } from "./routes.js";
import { createServices } from "./services.js";
import { createStorage } from "./storage/index.js";
import { startCompletionDispatchScheduler } from "../src/modules/progress/progress.dispatcher.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const { storage, close } = await createStorage(config);
  const services = createServices(storage, config);
  const app = createApp(services, config);

  let dispatchTask: ScheduledTask | null = null;
  if (config.completionDispatch.enabled) {
    dispatchTask = startCompletionDispatchScheduler(services.dispatcher, config.completionDispatch.cron);
  } else {
    console.log("[Server] Completion dispatch scheduler disabled (COMPLETION_DISPATCH_ENABLED=false)");
  }

  const server = app.listen(config.port, () => {
    console.log(`[Server] Listening on port ${config.port} (${config.env})`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);
    dispatchTask?.stop();
    server.close((error) => {
      if (error) console.error("[Server] Error closing HTTP server:", error);
      close()
        .then(() => process.exit(error ? 1 : 0))
        .catch((closeError: unknown) => {
          console.error("[Server] Error closing storage:", closeError);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("[Server] Failed to start:", error);
  process.exit(1);
});
