/**
 * Persisted bridge records.
 *
 * Both records live at deterministically derived addresses. The admin
 * record is a singleton per deployment; a withdraw record exists once per
 * redeemed origin and never changes after it is written.
 */

import type { Address, Bytes32, PublicKey64 } from "./bytes.js";
import type { TokenKind } from "./transfer.js";

export interface AdminRecord {
  readonly initialized: boolean;
  /** Key whose signatures authorize roots and rotations */
  readonly authorityKey: PublicKey64;
  /** External program that must charge the fee before each deposit */
  readonly commissionProgram: Address;
}

export interface WithdrawRecord {
  readonly initialized: boolean;
  readonly tokenKind: TokenKind;
  readonly origin: Bytes32;
  /** Absent for native withdrawals */
  readonly mint: Bytes32 | null;
  readonly amount: bigint;
  readonly receiver: Address;
}
