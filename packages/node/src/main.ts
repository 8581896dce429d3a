/**
 * @errmap/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiTokens } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const tokens = parseApiTokens(config.API_TOKENS);
  if (tokens.length > 0) {
    auth = { tokens: new Set(tokens) };
    logger.info({ tokenCount: tokens.length }, "Auth configured");
  } else {
    logger.warn("No API tokens configured — running in unsecured mode");
  }

  const { app } = createApp({
    logFn: (entry) => {
      const suffix = entry.errorCode !== undefined ? ` ${entry.errorCode}` : "";
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}${suffix}`);
    },
    errorLogFn: (entry) => {
      if (entry.status >= 500) {
        logger.error(entry, `${entry.errorName}: ${entry.message}`);
      } else {
        logger.warn(entry, `${entry.errorName}: ${entry.message}`);
      }
    },
    auth,
    exposeInternalErrors: config.EXPOSE_INTERNAL_ERRORS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "errmap example service started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
