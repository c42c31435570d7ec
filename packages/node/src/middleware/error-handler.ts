/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Bridge rejections map to a status by category; their code and message
 * pass through. Anything else is an internal error and its details stay
 * in the log.
 */

import type { Context } from "hono";
import type { BridgeErrorCategory } from "@bridge-core/types";
import { isBridgeError } from "@bridge-core/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Bridge Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 409 | 422;

const CATEGORY_STATUS: Readonly<Record<BridgeErrorCategory, ErrorStatus>> = {
  config: 400,
  data: 400,
  auth: 403,
  state: 409,
  resource: 422,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(
  onInternalError?: (err: Error, requestId: string) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (isBridgeError(err)) {
      const status = CATEGORY_STATUS[err.category];
      return c.json(createErrorEnvelope(err.code, err.message), status);
    }

    onInternalError?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
