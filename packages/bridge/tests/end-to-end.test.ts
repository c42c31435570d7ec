/**
 * End-to-end: a relayer batches withdrawals, signs the root, and the
 * bridge pays each leaf exactly once.
 */

import { describe, it, expect } from "vitest";
import { MerkleTree, hashContentLeaf } from "@bridge-core/proof";
import { AuthoritySigner } from "@bridge-core/authority";
import { toHex } from "@bridge-core/types";
import {
  ADMIN_SEED,
  OWNER,
  PAYER,
  RECEIVER,
  codeOf,
  createHarness,
  nativeLeaf,
} from "./fixtures.js";

describe("bridge round trip", () => {
  it("deposits with commission, withdraws once, and refuses the replay", () => {
    const h = createHarness();
    h.platform.fund(OWNER, 200n);

    const deposit = {
      seeds: ADMIN_SEED,
      networkTo: "Ethereum",
      receiverAddress: "0x00000000000000000000000000000000000000bb",
      owner: OWNER,
      amount: 100n,
    };

    // Without the commission charge the deposit is rejected outright
    expect(codeOf(() => h.call((unit) => h.program.depositNative(unit, deposit)))).toBe(
      "WRONG_COMMISSION_PROGRAM",
    );
    expect(h.platform.inspect((unit) => unit.ledger.nativeBalance(OWNER))).toBe(200n);

    h.call((unit) => h.program.depositNative(unit, deposit), [h.charge("native", 100n)]);
    expect(h.platform.inspect((unit) => unit.ledger.nativeBalance(h.program.adminAddress))).toBe(
      100n,
    );

    // Relayer side
    const signer = new AuthoritySigner(new Uint8Array(32).fill(1));
    const origins = Array.from({ length: 4 }, (_, i) => new Uint8Array(32).fill(0xa0 + i));
    const leaves = origins.map((origin) => nativeLeaf(25n, origin));
    const tree = MerkleTree.build(leaves.map(hashContentLeaf));
    const root = tree.getRoot();
    if (root === null) throw new Error("empty tree");
    const { signature, recoveryId } = signer.signRoot(root);

    origins.forEach((origin, index) => {
      const proof = tree.getProof(index);
      if (proof === null) throw new Error(`no proof for ${index}`);
      h.call((unit) =>
        h.program.withdrawNative(unit, {
          seeds: ADMIN_SEED,
          signature,
          recoveryId,
          path: proof.path,
          origin,
          receiver: RECEIVER,
          payer: PAYER,
          amount: 25n,
        }),
      );
    });

    expect(h.platform.inspect((unit) => unit.ledger.nativeBalance(RECEIVER))).toBe(100n);
    expect(h.platform.inspect((unit) => unit.ledger.nativeBalance(h.program.adminAddress))).toBe(
      0n,
    );

    const redeemed = h.platform.inspect((unit) =>
      origins.filter((origin) => h.program.replayGuard(unit.accounts).isRedeemed(origin)).map(toHex),
    );
    expect(redeemed).toEqual(origins.map(toHex));

    // With the bridge funded again, resubmitting a paid leaf still fails
    h.call((unit) => h.program.depositNative(unit, deposit), [h.charge("native", 100n)]);
    const first = tree.getProof(0);
    if (first === null) throw new Error("no proof for 0");
    expect(
      codeOf(() =>
        h.call((unit) =>
          h.program.withdrawNative(unit, {
            seeds: ADMIN_SEED,
            signature,
            recoveryId,
            path: first.path,
            origin: origins[0],
            receiver: RECEIVER,
            payer: PAYER,
            amount: 25n,
          }),
        ),
      ),
    ).toBe("ALREADY_IN_USE");
    expect(h.platform.inspect((unit) => unit.ledger.nativeBalance(RECEIVER))).toBe(100n);
  });
});
