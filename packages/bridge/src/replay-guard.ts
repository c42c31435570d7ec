/**
 * Replay guard.
 *
 * Each source-chain origin owns one withdraw record at an address derived
 * from the origin. Claiming allocates that address exclusively, so a
 * second withdrawal for the same origin fails no matter which token,
 * amount or receiver it names.
 */

import type { Address, Bytes32, WithdrawRecord } from "@bridge-core/types";
import {
  BridgeError,
  assertBytes32,
  bytesEqual,
  toHex,
  utf8ToBytes,
} from "@bridge-core/types";
import {
  WITHDRAW_RECORD_SIZE,
  decodeWithdrawRecord,
  encodeWithdrawRecord,
} from "./records.js";
import type { AccountStore, AddressDeriver } from "./types.js";

export const WITHDRAW_SEED = "withdraw";

export class ReplayGuard {
  constructor(
    private readonly accounts: AccountStore,
    private readonly deriver: AddressDeriver,
    private readonly programId: Address,
  ) {}

  addressFor(origin: Bytes32): Address {
    return this.deriver.deriveAddress(
      [utf8ToBytes(WITHDRAW_SEED), assertBytes32(origin, "origin")],
      this.programId,
    );
  }

  /**
   * Reserve the withdraw record for `origin`.
   *
   * @throws BridgeError ADDRESS_MISMATCH if `supplied` is not the derived address
   * @throws BridgeError ALREADY_IN_USE if the origin was already claimed
   */
  claim(origin: Bytes32, payer: Address, supplied?: Address | null): Address {
    const address = this.addressFor(origin);
    if (supplied != null && !bytesEqual(supplied, address)) {
      throw new BridgeError(
        "ADDRESS_MISMATCH",
        `Withdraw account does not match origin ${toHex(origin)}`,
      );
    }

    if (!this.accounts.createAccountAt(address, WITHDRAW_RECORD_SIZE, this.programId, payer)) {
      throw new BridgeError("ALREADY_IN_USE", `Origin ${toHex(origin)} was already withdrawn`);
    }
    return address;
  }

  /**
   * Write the record into a claimed account.
   *
   * @throws BridgeError ALREADY_IN_USE if the account already holds a record
   */
  finalize(record: WithdrawRecord): void {
    const address = this.addressFor(record.origin);
    const data = this.accounts.readAccount(address);
    if (data === null || decodeWithdrawRecord(data).initialized) {
      throw new BridgeError(
        "ALREADY_IN_USE",
        `Withdraw record for ${toHex(record.origin)} is not claimable`,
      );
    }
    this.accounts.writeAccount(address, encodeWithdrawRecord({ ...record, initialized: true }));
  }

  getRecord(origin: Bytes32): WithdrawRecord | null {
    const data = this.accounts.readAccount(this.addressFor(origin));
    if (data === null) return null;
    const record = decodeWithdrawRecord(data);
    return record.initialized ? record : null;
  }

  isRedeemed(origin: Bytes32): boolean {
    return this.getRecord(origin) !== null;
  }
}
