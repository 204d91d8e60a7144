import { loadConfig } from "../config/loader.js";
import { createLogger } from "../logging/logger.js";
import { ApiServer } from "../server/api.js";
import { RebuildScheduler } from "../timeline/scheduler.js";
import { openReadlog, type ReadlogContext } from "./context.js";

export interface ServerContext extends ReadlogContext {
  readonly api: ApiServer;
  readonly scheduler: RebuildScheduler | null;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startServer(configPath?: string): Promise<ServerContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting readlog...");

  // 3. Open database and wire components
  const ctx = openReadlog(config, logger);

  // 4. Optional periodic full rebuild
  const scheduler = config.rebuild.schedule
    ? new RebuildScheduler(
        ctx.runs,
        {
          schedule: config.rebuild.schedule,
          batchSize: config.rebuild.batchSize,
          orphanPolicy: config.rebuild.orphanPolicy,
        },
        logger,
      )
    : null;
  scheduler?.start();

  // 5. Start API server
  const api = new ApiServer(
    { db: ctx.db, facade: ctx.facade, runs: ctx.runs, logger },
    config.server.port,
    config.server.hostname,
  );
  await api.start();

  // 6. Graceful shutdown
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await api.stop();
    await scheduler?.stop();
    // A rebuild started over HTTP stops at its next batch boundary.
    await ctx.runs.close();
    // Pending targeted refreshes are applied before the database closes.
    ctx.invalidator.flush();
    ctx.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      logger.error({ err }, "Error during shutdown");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("readlog started");
  return { ...ctx, api, scheduler, shutdown };
}
