/**
 * BridgeService — the node's view of one bridge deployment.
 *
 * Owns an in-memory platform and the bridge program running on it, and
 * answers the read and preflight questions relayers ask before they
 * submit a withdrawal: what the admin record holds, whether an origin has
 * been redeemed, and whether a leaf, path and signature would authorize.
 */

import type { Logger } from "pino";
import type {
  Address,
  AdminRecord,
  Bytes32,
  ContentLeaf,
  PublicKey64,
  WithdrawRecord,
} from "@bridge-core/types";
import { isBridgeError } from "@bridge-core/types";
import {
  BridgeProgram,
  HashAddressDeriver,
  InMemoryPlatform,
  ProgramAddressDeriver,
  authorizeWithdrawal,
} from "@bridge-core/bridge";
import type { AddressDeriver, WithdrawalProof } from "@bridge-core/bridge";
import { computeMerkleRoot, hashContentLeaf } from "@bridge-core/proof";

// =============================================================================
// Configuration
// =============================================================================

export interface BridgeServiceConfig {
  readonly programId: Address;
  readonly adminSeed: Bytes32;
  readonly derivation?: "program" | "hash";
  readonly logger?: Logger;
}

// =============================================================================
// Results
// =============================================================================

export interface AdminView {
  readonly address: Address;
  readonly record: AdminRecord;
}

export interface WithdrawalView {
  readonly origin: Bytes32;
  /** Derived withdraw record address */
  readonly address: Address;
  readonly record: WithdrawRecord | null;
}

export interface PreflightResult {
  readonly leafHash: Bytes32;
  readonly root: Bytes32;
  /** Whether the current authority key signed this root */
  readonly authorized: boolean;
  readonly redeemed: boolean;
  /** Why authorization failed, when it did */
  readonly rejection: { readonly code: string; readonly message: string } | null;
}

// =============================================================================
// Service
// =============================================================================

export class BridgeService {
  readonly platform: InMemoryPlatform;
  readonly program: BridgeProgram;
  private readonly adminSeed: Bytes32;

  constructor(config: BridgeServiceConfig) {
    this.adminSeed = config.adminSeed;
    const deriver: AddressDeriver =
      config.derivation === "hash" ? new HashAddressDeriver() : new ProgramAddressDeriver();
    this.platform = new InMemoryPlatform({ deriver });
    this.program = new BridgeProgram({
      programId: config.programId,
      adminSeed: config.adminSeed,
      deriver,
      logger: config.logger,
    });
  }

  /**
   * Initialize the admin record. Used at startup when an authority key is
   * configured.
   */
  initializeAdmin(authorityKey: PublicKey64, commissionProgram: Address, payer: Address): AdminRecord {
    return this.platform.invoke(this.program.programId, (unit) =>
      this.program.initializeAdmin(unit, {
        seeds: this.adminSeed,
        authorityKey,
        commissionProgram,
        payer,
      }),
    );
  }

  isReady(): boolean {
    return this.platform.inspect((unit) => this.program.adminStore(unit.accounts).read().initialized);
  }

  /**
   * @throws BridgeError NOT_INITIALIZED
   */
  getAdmin(): AdminView {
    const record = this.platform.inspect((unit) => this.program.adminStore(unit.accounts).load());
    return { address: this.program.adminAddress, record };
  }

  getWithdrawal(origin: Bytes32): WithdrawalView {
    return this.platform.inspect((unit) => {
      const guard = this.program.replayGuard(unit.accounts);
      return { origin, address: guard.addressFor(origin), record: guard.getRecord(origin) };
    });
  }

  /**
   * Check a withdrawal's authorization without executing it. Malformed
   * proofs and an uninitialized admin throw; a signature that does not
   * verify is reported in the result.
   *
   * @throws BridgeError NOT_INITIALIZED | MALFORMED_PROOF | MALFORMED_PAYLOAD
   */
  preflight(leaf: ContentLeaf, proof: WithdrawalProof): PreflightResult {
    const { record } = this.getAdmin();
    const leafHash = hashContentLeaf(leaf);
    const root = computeMerkleRoot(leafHash, proof.path);
    const redeemed = this.getWithdrawal(leaf.origin).record !== null;

    try {
      authorizeWithdrawal(record.authorityKey, leaf, proof);
      return { leafHash, root, authorized: true, redeemed, rejection: null };
    } catch (err) {
      if (!isBridgeError(err) || err.category !== "auth") throw err;
      return {
        leafHash,
        root,
        authorized: false,
        redeemed,
        rejection: { code: err.code, message: err.message },
      };
    }
  }
}
