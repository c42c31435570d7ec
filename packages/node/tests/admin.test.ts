/**
 * Tests for GET /api/v1/admin.
 */

import { describe, it, expect } from "vitest";
import { toHex } from "@bridge-core/types";
import { COMMISSION_PROGRAM, createTestApp, signer } from "./setup.js";

describe("GET /api/v1/admin", () => {
  it("returns the admin record", async () => {
    const { app, service } = createTestApp();
    const res = await app.request("/api/v1/admin");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, string> };
    expect(body.data).toEqual({
      address: toHex(service.program.adminAddress),
      authorityKey: toHex(signer.publicKey),
      commissionProgram: toHex(COMMISSION_PROGRAM),
    });
  });

  it("returns 409 NOT_INITIALIZED before initialization", async () => {
    const { app } = createTestApp({ initialize: false });
    const res = await app.request("/api/v1/admin");

    expect(res.status).toBe(409);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "NOT_INITIALIZED",
      message: "Bridge admin is not initialized",
    });
  });
});
