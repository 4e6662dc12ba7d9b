import "reflect-metadata";
import { Server } from "http";
import cron, { ScheduledTask } from "node-cron";
import config from "./config/env";
import logger from "./utils/logger";
import { AppDataSource, initializeDatabase } from "./config/database";
import NodeProviderFactory from "./factories/provider.factory";
import TrackerFactory, { TrackerBundle } from "./factories/tracker.factory";
import { QueryService } from "./services/query.service";
import { createServer } from "./server";
import { NodeProvider } from "./utils/types/tracker.types";
import { toError } from "./utils/errors";

let provider: NodeProvider | null = null;
let bundle: TrackerBundle | null = null;
let server: Server | null = null;
let healthCheck: ScheduledTask | null = null;
let loop: Promise<void> | null = null;
let shuttingDown = false;

/**
 * Setup health check job
 */
function setupHealthCheck(trackerBundle: TrackerBundle): ScheduledTask {
  const task = cron.schedule(config.healthCheckCron, () => {
    const status = trackerBundle.tracker.getStatus();
    const subscriptions = trackerBundle.supervisor.getStatus();
    const latest = trackerBundle.status.getLatestHeader();

    logger.debug("Running health check", {
      status,
      subscriptions,
      latestNumber: latest?.number,
    });

    const inactive = subscriptions.filter((entry) => !entry.active);
    if (!status.isRunning || inactive.length > 0) {
      logger.warn("Orphan tracker unhealthy", {
        isRunning: status.isRunning,
        inactive: inactive.map((entry) => entry.kind),
      });
    }
  });

  logger.info("Health check scheduled", { cron: config.healthCheckCron });
  return task;
}

function closeServer(httpServer: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    httpServer.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Tear everything down in dependency order and exit.
 */
async function shutdown(exitCode: number): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.info("Shutting down orphan tracker", { exitCode });

  try {
    healthCheck?.stop();

    if (server) {
      await closeServer(server);
      logger.info("HTTP server closed");
    }

    if (bundle) {
      await bundle.supervisor.stop();
      bundle.tracker.stop();
    }

    if (loop) {
      // a rejected loop has already been reported through fatal()
      await loop.catch(() => undefined);
    }

    if (provider) {
      await provider.destroy();
    }

    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
      logger.info("Database connection closed");
    }
  } catch (error) {
    logger.error("Error during shutdown", { error });
    exitCode = exitCode || 1;
  }

  process.exit(exitCode);
}

function fatal(error: Error): void {
  logger.error("Fatal error, stopping", { error });
  shutdown(1).catch((shutdownError) => {
    logger.error("Shutdown failed", { error: shutdownError });
    process.exit(1);
  });
}

/**
 * Main function to start the application
 */
async function main(): Promise<void> {
  logger.info("Starting orphan tracker service", {
    nodeEnv: config.nodeEnv,
  });

  process.on("SIGTERM", () => {
    logger.info("SIGTERM received, shutting down");
    shutdown(0).catch((error) => logger.error("Shutdown failed", { error }));
  });

  process.on("SIGINT", () => {
    logger.info("SIGINT received, shutting down");
    shutdown(0).catch((error) => logger.error("Shutdown failed", { error }));
  });

  await initializeDatabase();

  provider = NodeProviderFactory.createProvider(config.node);
  bundle = TrackerFactory.createTracker(provider, AppDataSource, config, fatal);

  await bundle.tracker.initialize();

  const app = createServer({
    status: bundle.status,
    tracker: bundle.tracker,
    supervisor: bundle.supervisor,
    queries: new QueryService(AppDataSource),
    allowRawSql: config.api.allowRawSql,
  });

  server = app.listen(config.api.port, config.api.host, () => {
    logger.info(`API server started on ${config.api.host}:${config.api.port}`);
  });

  loop = bundle.tracker.run();
  loop.catch((error) => fatal(toError(error)));

  await bundle.supervisor.start();
  healthCheck = setupHealthCheck(bundle);

  logger.info("Orphan tracker service started successfully");
}

main().catch((error) => {
  logger.error("Failed to start orphan tracker service", { error });
  shutdown(1).catch(() => process.exit(1));
});
