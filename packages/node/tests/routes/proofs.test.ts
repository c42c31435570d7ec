/**
 * Tests for POST /api/v1/proofs/verify.
 */

import { describe, it, expect } from "vitest";
import { AuthoritySigner } from "@bridge-core/authority";
import { hashContentLeaf } from "@bridge-core/proof";
import { toHex } from "@bridge-core/types";
import {
  ORIGIN,
  RECEIVER,
  createTestApp,
  depositNative,
  jsonRequest,
  nativeLeaf,
  signedBatchBody,
  withdrawNative,
} from "../setup.js";

interface VerifyBody {
  data: {
    leafHash: string;
    root: string;
    authorized: boolean;
    redeemed: boolean;
    rejection: { code: string; message: string } | null;
  };
}

const nativeLeafDto = {
  origin: toHex(ORIGIN),
  receiver: toHex(RECEIVER),
  payload: { kind: "native", amount: "100" },
};

describe("POST /api/v1/proofs/verify", () => {
  it("authorizes a leaf signed by the current key", async () => {
    const { app } = createTestApp();
    const leaf = nativeLeaf(100n);

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", { leaf: nativeLeafDto, ...signedBatchBody(leaf) }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as VerifyBody;
    expect(body.data.leafHash).toBe(toHex(hashContentLeaf(leaf)));
    expect(body.data.authorized).toBe(true);
    expect(body.data.redeemed).toBe(false);
    expect(body.data.rejection).toBeNull();
  });

  it("reports redemption alongside authorization", async () => {
    const { app, service } = createTestApp();
    const leaf = nativeLeaf(100n);
    depositNative(service, 100n);
    withdrawNative(service, leaf, 100n);

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", { leaf: nativeLeafDto, ...signedBatchBody(leaf) }),
    );

    const body = (await res.json()) as VerifyBody;
    expect(body.data.authorized).toBe(true);
    expect(body.data.redeemed).toBe(true);
  });

  it("reports a signature from another key", async () => {
    const { app } = createTestApp();
    const other = new AuthoritySigner(new Uint8Array(32).fill(2));

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", {
        leaf: nativeLeafDto,
        ...signedBatchBody(nativeLeaf(100n), other),
      }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as VerifyBody;
    expect(body.data.authorized).toBe(false);
    expect(body.data.rejection).toEqual({
      code: "WRONG_SIGNATURE",
      message: "Signature was not produced by the authority key",
    });
  });

  it("fails closed when the leaf differs from what was signed", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", {
        leaf: { ...nativeLeafDto, payload: { kind: "native", amount: "101" } },
        ...signedBatchBody(nativeLeaf(100n)),
      }),
    );

    const body = (await res.json()) as VerifyBody;
    expect(body.data.authorized).toBe(false);
    expect(["WRONG_SIGNATURE", "INVALID_SIGNATURE"]).toContain(body.data.rejection?.code);
  });

  it("accepts fungible and non-fungible payloads", async () => {
    const { app } = createTestApp();
    const mint = "ab".repeat(32);

    for (const payload of [
      { kind: "fungible", mint, amount: "5", name: "Test", symbol: "TST", uri: "", decimals: 6 },
      { kind: "non_fungible", mint, collection: null, name: "Item", symbol: "ITM", uri: "" },
    ]) {
      const res = await app.request(
        jsonRequest("/api/v1/proofs/verify", "POST", {
          leaf: { ...nativeLeafDto, payload },
          ...signedBatchBody(nativeLeaf(100n)),
        }),
      );
      expect(res.status).toBe(200);
    }
  });

  it("returns 400 MALFORMED_PROOF for an empty path", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", {
        leaf: nativeLeafDto,
        ...signedBatchBody(nativeLeaf(100n)),
        path: [],
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "MALFORMED_PROOF", message: "Merkle path must not be empty" });
  });

  it("returns 400 MALFORMED_PAYLOAD for an amount beyond u64", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", {
        leaf: { ...nativeLeafDto, payload: { kind: "native", amount: "18446744073709551616" } },
        ...signedBatchBody(nativeLeaf(100n)),
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("MALFORMED_PAYLOAD");
  });

  it("returns 400 VALIDATION_ERROR with issues for a malformed body", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", {
        leaf: { ...nativeLeafDto, origin: "abc" },
        path: [],
        signature: "00",
        recoveryId: 9,
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; details: { issues: { path: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues.map((issue) => issue.path)).toEqual([
      "leaf.origin",
      "signature",
      "recoveryId",
    ]);
  });

  it("returns 400 VALIDATION_ERROR for invalid JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/proofs/verify", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "Invalid JSON in request body" });
  });

  it("returns 409 before the admin is initialized", async () => {
    const { app } = createTestApp({ initialize: false });

    const res = await app.request(
      jsonRequest("/api/v1/proofs/verify", "POST", { leaf: nativeLeafDto, ...signedBatchBody(nativeLeaf(100n)) }),
    );

    expect(res.status).toBe(409);
  });
});
