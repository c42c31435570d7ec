/**
 * Tests for BridgeService.
 */

import { describe, it, expect } from "vitest";
import { BridgeError } from "@bridge-core/types";
import { ProgramAddressDeriver } from "@bridge-core/bridge";
import { BridgeService } from "../src/services/bridge-service.js";
import {
  ADMIN_SEED,
  COMMISSION_PROGRAM,
  ORIGIN,
  OWNER,
  PROGRAM_ID,
  createTestService,
  depositNative,
  nativeLeaf,
  signer,
  withdrawNative,
} from "./setup.js";

describe("BridgeService", () => {
  it("uses program-derived addresses by default", () => {
    const service = new BridgeService({ programId: PROGRAM_ID, adminSeed: ADMIN_SEED });
    const expected = new ProgramAddressDeriver().deriveAddress([ADMIN_SEED], PROGRAM_ID);

    expect(service.program.adminAddress).toEqual(expected);
  });

  it("is ready only after initialization", () => {
    const service = createTestService({ initialize: false });
    expect(service.isReady()).toBe(false);

    service.initializeAdmin(signer.publicKey, COMMISSION_PROGRAM, OWNER);
    expect(service.isReady()).toBe(true);
    expect(service.getAdmin().record.authorityKey).toEqual(signer.publicKey);
  });

  it("throws NOT_INITIALIZED from getAdmin before initialization", () => {
    const service = createTestService({ initialize: false });
    expect(() => service.getAdmin()).toThrow(BridgeError);
  });

  it("tracks redemption per origin", () => {
    const service = createTestService();
    depositNative(service, 100n);

    expect(service.getWithdrawal(ORIGIN).record).toBeNull();
    withdrawNative(service, nativeLeaf(100n), 100n);
    expect(service.getWithdrawal(ORIGIN).record?.amount).toBe(100n);
  });
});
