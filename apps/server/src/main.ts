import { startApp } from "./app";
import { loadConfig } from "./config";
import { configureLogging, serverLog } from "./logger";

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config);
  const app = await startApp(config);

  let isStopping = false;
  const shutdown = (signal: string) => {
    if (isStopping) return;
    isStopping = true;
    serverLog.info(`Received ${signal}, shutting down`);
    app
      .stop()
      .catch((err) => serverLog.error("Shutdown error:", err))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  serverLog.error("Failed to start:", err);
  process.exit(1);
});
