/**
 * @bridge-core/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { toHex } from "@bridge-core/types";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { BridgeService } from "./services/bridge-service.js";

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

  const service = new BridgeService({
    programId: config.BRIDGE_PROGRAM_ID,
    adminSeed: config.BRIDGE_ADMIN_SEED,
    derivation: config.ADDRESS_DERIVATION,
    logger,
  });

  if (config.AUTHORITY_PUBLIC_KEY !== undefined) {
    service.initializeAdmin(
      config.AUTHORITY_PUBLIC_KEY,
      config.COMMISSION_PROGRAM_ID,
      service.program.adminAddress,
    );
    logger.info(
      { admin: toHex(service.program.adminAddress) },
      "Bridge admin initialized",
    );
  } else {
    logger.warn("AUTHORITY_PUBLIC_KEY not set; admin record stays uninitialized");
  }

  const { app } = createApp({ service, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, program: toHex(service.program.programId) },
    "Bridge node started",
  );

  // Graceful shutdown
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
