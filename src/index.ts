import { createServer } from "node:http";
import { createApp } from "./app";
import { config } from "./config";
import { checkDatabaseConnection, closeDatabaseConnection } from "./db";
import { logger } from "./lib/logger";

// Log startup environment info (redact sensitive data)
logger.info(
  {
    NODE_ENV: config.NODE_ENV,
    HOST: config.HOST,
    PORT: config.PORT,
    DATABASE_URL: config.DATABASE_URL ? "[SET]" : "[NOT SET]",
  },
  "Starting Ticket Tracker API with configuration",
);

const app = createApp();
const httpServer = createServer(app);

let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, "Shutting down gracefully...");

  // Stop accepting new connections, let in-flight requests finish
  await new Promise<void>((resolve) => {
    httpServer.close(() => resolve());
  });
  logger.info("HTTP server closed");

  await closeDatabaseConnection();
  logger.info("Database connection closed");

  logger.info("Shutdown complete");
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((error: unknown) => {
    logger.fatal({ err: error }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

// Retry with linear backoff; the database may still be starting
async function withRetry<T>(
  fn: () => Promise<T>,
  options: { maxAttempts: number; delayMs: number; name: string },
): Promise<T> {
  const { maxAttempts, delayMs, name } = options;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt === maxAttempts) {
        logger.error({ err: error, attempt }, `${name} failed after ${maxAttempts} attempts`);
        throw error;
      }
      const waitTime = delayMs * attempt;
      logger.warn({ attempt, waitTime }, `${name} failed, retrying in ${waitTime}ms...`);
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }
  }
  throw new Error(`${name} failed after ${maxAttempts} attempts`);
}

async function start() {
  await withRetry(
    async () => {
      const connected = await checkDatabaseConnection();
      if (!connected) throw new Error("Database ping failed");
      return connected;
    },
    { maxAttempts: 5, delayMs: 2000, name: "Database connection" },
  );
  logger.info("Database connected");

  httpServer.listen(config.PORT, config.HOST, () => {
    logger.info(
      { host: config.HOST, port: config.PORT },
      `Ticket Tracker API running at http://${config.HOST}:${config.PORT}`,
    );
  });
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exit(1);
});
