import "dotenv/config";
import type { Express } from "express";
import type { Server } from "node:http";
import { errorMessage } from "./agent/errors.js";
import { closeFeederContext, createFeederContext } from "./agent/feeder.js";
import { createApp } from "./server/app.js";
import { createLogger } from "./tools/logger.js";
import { loadPendingTasks } from "./workflows/scheduleTasks.js";

const startPort = Number(process.env.PORT || 8000);
const host = process.env.HOST || "0.0.0.0";
const logger = createLogger(process.env.FEEDER_LOG_LEVEL, "server");

function startServer(app: Express, port: number, retriesLeft = 10): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Feeder agent running at http://localhost:${port}`);
      resolve(server);
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE" && retriesLeft > 0) {
        logger.warn(`Port ${port} is busy. Trying ${port + 1}...`);
        startServer(app, port + 1, retriesLeft - 1).then(resolve, reject);
        return;
      }

      if (error.code === "EADDRINUSE") {
        reject(new Error(`No available port from ${startPort} to ${port}. Set PORT in .env and retry.`));
        return;
      }

      reject(error);
    });
  });
}

async function main(): Promise<void> {
  const context = await createFeederContext();
  loadPendingTasks(context);
  context.scheduler.start();

  const server = await startServer(createApp(context), startPort);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);
    server.close();
    closeFeederContext(context).then(
      () => process.exit(0),
      (error) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
