/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { BridgeService } from "./services/bridge-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createWithdrawalRoutes } from "./routes/withdrawals.js";
import { createProofRoutes } from "./routes/proofs.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: BridgeService;
  /** Request and internal-error logging; omitted in most tests */
  readonly logger?: Logger;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BridgeService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service, logger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logger !== undefined) {
    app.use("*", loggerMiddleware(logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    createErrorHandler((err, requestId) => {
      logger?.error({ err, requestId }, "Unhandled error");
    }),
  );
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/withdrawals", createWithdrawalRoutes());
  app.route("/api/v1/proofs", createProofRoutes());

  return { app, service };
}
