/**
 * Tests for the error handler.
 *
 * Bridge errors map to statuses by category; other errors become a
 * generic 500 without leaking their message.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { BridgeError } from "@bridge-core/types";
import type { BridgeErrorCode } from "@bridge-core/types";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import type { AppEnv } from "../../src/types/api-contract.js";

function appThrowing(error: Error, onInternalError?: (err: Error, requestId: string) => void) {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(createErrorHandler(onInternalError));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("error handler", () => {
  const cases: [BridgeErrorCode, number][] = [
    ["WRONG_SEEDS", 400],
    ["MALFORMED_PROOF", 400],
    ["WRONG_SIGNATURE", 403],
    ["WRONG_COMMISSION_PROGRAM", 403],
    ["ALREADY_IN_USE", 409],
    ["NOT_INITIALIZED", 409],
    ["INSUFFICIENT_BALANCE", 422],
  ];

  it.each(cases)("maps %s to %i", async (code, status) => {
    const res = await appThrowing(new BridgeError(code, `failed with ${code}`)).request("/boom");

    expect(res.status).toBe(status);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code, message: `failed with ${code}` });
  });

  it("hides the message of unexpected errors", async () => {
    const onInternalError = vi.fn();
    const error = new Error("database password is test-secret");
    const res = await appThrowing(error, onInternalError).request("/boom", {
      headers: { "X-Request-Id": "req-1" },
    });

    expect(res.status).toBe(500);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(onInternalError).toHaveBeenCalledWith(error, "req-1");
  });
});
