/**
 * Shared fixtures for bridge tests.
 */

import type { Address, ContentLeaf, TokenKind } from "@bridge-core/types";
import { BridgeError } from "@bridge-core/types";
import { MerkleTree, hashContentLeaf } from "@bridge-core/proof";
import type { MerklePath } from "@bridge-core/proof";
import { AuthoritySigner } from "@bridge-core/authority";
import { HashAddressDeriver } from "../src/address.js";
import { BridgeProgram } from "../src/bridge-program.js";
import { commissionAccountFor } from "../src/commission.js";
import {
  InMemoryPlatform,
  chargeCommissionOperation,
} from "../src/in-memory-platform.js";
import type { PlatformOperation } from "../src/in-memory-platform.js";
import type { ExecutionUnit } from "../src/types.js";

// =============================================================================
// Identities
// =============================================================================

export const PROGRAM_ID = new Uint8Array(32).fill(0x11);
export const ADMIN_SEED = new Uint8Array(32).fill(0x22);
export const COMMISSION_PROGRAM = new Uint8Array(32).fill(0x33);
export const PAYER = new Uint8Array(32).fill(0x44);
export const OWNER = new Uint8Array(32).fill(0x55);
export const RECEIVER = new Uint8Array(32).fill(0x66);
export const ORIGIN = new Uint8Array(32).fill(0x77);

export const k1 = new AuthoritySigner(new Uint8Array(32).fill(1));
export const k2 = new AuthoritySigner(new Uint8Array(32).fill(2));

// =============================================================================
// Harness
// =============================================================================

export interface Harness {
  readonly platform: InMemoryPlatform;
  readonly program: BridgeProgram;
  readonly commissionAccount: Address;
  /** Run a bridge call as its own atomic unit */
  call<T>(fn: (unit: ExecutionUnit) => T, preceding?: readonly PlatformOperation[]): T;
  /** A matching commission charge for a deposit */
  charge(kind: TokenKind, amount: bigint): PlatformOperation;
}

export function createHarness(options: { initialize?: boolean } = {}): Harness {
  const deriver = new HashAddressDeriver();
  const platform = new InMemoryPlatform({ deriver });
  const program = new BridgeProgram({ programId: PROGRAM_ID, adminSeed: ADMIN_SEED, deriver });
  const commissionAccount = commissionAccountFor(
    deriver,
    program.adminAddress,
    COMMISSION_PROGRAM,
  );

  const harness: Harness = {
    platform,
    program,
    commissionAccount,
    call: (fn, preceding = []) => platform.invoke(PROGRAM_ID, fn, preceding),
    charge: (kind, amount) =>
      chargeCommissionOperation(COMMISSION_PROGRAM, commissionAccount, kind, amount),
  };

  if (options.initialize ?? true) {
    harness.call((unit) =>
      program.initializeAdmin(unit, {
        seeds: ADMIN_SEED,
        authorityKey: k1.publicKey,
        commissionProgram: COMMISSION_PROGRAM,
        payer: PAYER,
      }),
    );
  }
  return harness;
}

// =============================================================================
// Proofs
// =============================================================================

export interface SignedProof {
  readonly path: MerklePath;
  readonly signature: Uint8Array;
  readonly recoveryId: number;
}

/**
 * Batch `leaves` into a tree, sign its root, and return the proof for
 * the leaf at `index`.
 */
export function signBatch(
  leaves: readonly ContentLeaf[],
  index = 0,
  signer: AuthoritySigner = k1,
): SignedProof {
  const tree = MerkleTree.build(leaves.map(hashContentLeaf));
  const proof = tree.getProof(index);
  if (proof === null) throw new Error(`No proof for leaf ${index}`);
  const { signature, recoveryId } = signer.signRoot(proof.root);
  return { path: proof.path, signature, recoveryId };
}

export function nativeLeaf(amount: bigint, origin = ORIGIN, receiver = RECEIVER): ContentLeaf {
  return {
    origin,
    receiver,
    destinationProgram: PROGRAM_ID,
    payload: { kind: "native", amount },
  };
}

// =============================================================================
// Assertions
// =============================================================================

/** The BridgeError code thrown by `fn`, or null if it returned. */
export function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (err instanceof BridgeError) return err.code;
    throw err;
  }
}
