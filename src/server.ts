import "dotenv/config";
import { validateEnv } from "./config/env.js";
import { runtimeConfigFromEnv } from "./config/runtime.js";
import { ClientRuntime } from "./services/api/runtime.js";
import { buildStatusServer } from "./services/monitoring/statusServer.js";
import { clearAllIntervals } from "./utils/intervals.js";
import { logger } from "./utils/logger.js";

const env = validateEnv();

const runtime = new ClientRuntime(runtimeConfigFromEnv(env), {
  isProduction: env.NODE_ENV === "production",
});

const app = await buildStatusServer(runtime, {
  allowedOrigins: env.ALLOWED_ORIGINS,
  logRequests: env.NODE_ENV !== "test",
});

const start = async () => {
  try {
    await runtime.start();

    await app.listen({
      port: env.STATUS_PORT,
      host: "0.0.0.0",
    });
    logger.info("Status server listening", { port: env.STATUS_PORT });
  } catch (err) {
    logger.error("Failed to start application", { error: err });
    process.exit(1);
  }
};

await start();

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    // Stop accepting new requests
    await app.close();
    logger.info("Status server closed");

    await runtime.stop();
    clearAllIntervals();

    logger.info("Shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

// Handle SIGTERM for Docker/Kubernetes
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
