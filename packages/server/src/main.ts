/**
 * @oapi-guard/server: Entry point.
 *
 * Loads config, builds the Hono app (which loads the OpenAPI document),
 * starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { errorContentType, loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.size === 0) {
    logger.warn("No API keys configured, secured operations will reject every request");
  }

  const { app } = await createApp({
    spec: config.OPENAPI_SPEC,
    apiKeys,
    validation: {
      multiError: config.MULTI_ERROR,
      excludeRequestBody: config.EXCLUDE_REQUEST_BODY,
      validateResponses: config.VALIDATE_RESPONSES,
      errorResponseContentType: errorContentType(config.ERROR_CONTENT_TYPE),
    },
    logFn: (entry) => {
      const msg = `${entry.method} ${entry.path} ${entry.status}`;
      if (entry.rejection === null) {
        logger.info(entry, msg);
      } else {
        logger.warn(entry, `${msg} rejected: ${entry.rejection.reason}`);
      }
    },
  });

  logger.info({ spec: config.OPENAPI_SPEC }, "OpenAPI document loaded");

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Server started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
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
