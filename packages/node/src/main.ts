/**
 * @resonance/node — Entry point.
 *
 * load config → logger → key material → reconciler context → HTTP
 * server → watcher loop. SIGINT/SIGTERM close the server, stop the
 * watcher after its in-flight batch and wait for scheduled anchors.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";
import { ReconcilerContext } from "./services/reconciler-context.js";

function createLogger(config: AppConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.length > 0) {
    logger.info({ apiKeyCount: apiKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, control surface is unsecured");
  }

  // Fails closed: a missing or invalid key file aborts startup
  const context = ReconcilerContext.fromConfig(config, logger);

  const { app } = createApp({
    context,
    logFn: pinoRequestLog(logger.child({ component: "http" })),
    apiKeys,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Resonance reconciler started");

  context.watcher.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, "Shutdown signal received");
    server.close();
    logger.info("HTTP server closed");

    await context.watcher.stop();
    logger.info("Watcher stopped");

    await context.publisher.drain();
    logger.info({ anchor: context.publisher.status() }, "Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // Config may be what failed, so no configured logger is guaranteed
  pino().fatal({ err }, "Fatal startup error");
  process.exit(1);
});
