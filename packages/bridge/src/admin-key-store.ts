/**
 * Admin key store.
 *
 * Holds the singleton admin record: the authority key whose signatures
 * authorize batch roots, and the commission program deposits must pay.
 *
 * Lifecycle: Uninitialized → Initialized. Rotation replaces the key and
 * nothing else; the record is never deleted.
 */

import type { AdminRecord, Address, PublicKey64 } from "@bridge-core/types";
import { BridgeError, assertBytes32, assertPublicKey } from "@bridge-core/types";
import { keyRotationMessage, verifySignature } from "@bridge-core/authority";
import {
  ADMIN_RECORD_SIZE,
  decodeAdminRecord,
  encodeAdminRecord,
} from "./records.js";
import type { AccountStore } from "./types.js";

export class AdminKeyStore {
  constructor(
    private readonly accounts: AccountStore,
    /** Derived admin address */
    readonly address: Address,
    private readonly programId: Address,
  ) {}

  /**
   * Current record; uninitialized when the account does not exist yet.
   */
  read(): AdminRecord {
    const data = this.accounts.readAccount(this.address);
    return decodeAdminRecord(data ?? new Uint8Array(ADMIN_RECORD_SIZE));
  }

  /**
   * @throws BridgeError NOT_INITIALIZED
   */
  load(): AdminRecord {
    const record = this.read();
    if (!record.initialized) {
      throw new BridgeError("NOT_INITIALIZED", "Bridge admin is not initialized");
    }
    return record;
  }

  /**
   * @throws BridgeError ALREADY_IN_USE if the admin account exists
   */
  initialize(
    authorityKey: PublicKey64,
    commissionProgram: Address,
    payer: Address,
  ): AdminRecord {
    assertPublicKey(authorityKey, "authorityKey");
    assertBytes32(commissionProgram, "commissionProgram");

    const created = this.accounts.createAccountAt(
      this.address,
      ADMIN_RECORD_SIZE,
      this.programId,
      payer,
    );
    if (!created || this.read().initialized) {
      throw new BridgeError("ALREADY_IN_USE", "Bridge admin is already initialized");
    }

    const record: AdminRecord = { initialized: true, authorityKey, commissionProgram };
    this.accounts.writeAccount(this.address, encodeAdminRecord(record));
    return record;
  }

  /**
   * Replace the authority key. The current key must sign keccak-256 of
   * the new one.
   *
   * @throws BridgeError NOT_INITIALIZED
   * @throws BridgeError INVALID_SIGNATURE | WRONG_SIGNATURE
   */
  rotateKey(newKey: PublicKey64, signature: Uint8Array, recoveryId: number): AdminRecord {
    const current = this.load();
    verifySignature(keyRotationMessage(newKey), signature, recoveryId, current.authorityKey);

    const record: AdminRecord = { ...current, authorityKey: Uint8Array.from(newKey) };
    this.accounts.writeAccount(this.address, encodeAdminRecord(record));
    return record;
  }
}
