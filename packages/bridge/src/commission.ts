/**
 * Commission enforcement for deposits.
 *
 * A deposit is only accepted when the operation immediately before it in
 * the same atomic unit charged the bridge fee: it must target the
 * configured commission program, name the commission account derived for
 * this bridge, and carry a ChargeCommission message for exactly the
 * deposited token kind and amount.
 *
 * ChargeCommission wire format (10 bytes):
 *   0  tag        u8 = 0
 *   1  tokenKind  u8
 *   2  amount     u64 little-endian
 */

import type { AdminRecord, Address, TokenKind } from "@bridge-core/types";
import {
  BridgeError,
  TOKEN_KIND_CODES,
  assertU64,
  bytesEqual,
  tokenKindFromCode,
  utf8ToBytes,
} from "@bridge-core/types";
import type { AddressDeriver, CoTransactionInspector } from "./types.js";

export const COMMISSION_ADMIN_SEED = "commission-admin";

const CHARGE_COMMISSION_TAG = 0;
const CHARGE_COMMISSION_SIZE = 10;

export interface ChargeCommission {
  readonly tokenKind: TokenKind;
  readonly amount: bigint;
}

// =============================================================================
// Wire format
// =============================================================================

export function encodeChargeCommission(tokenKind: TokenKind, amount: bigint): Uint8Array {
  const payload = new Uint8Array(CHARGE_COMMISSION_SIZE);
  payload[0] = CHARGE_COMMISSION_TAG;
  payload[1] = TOKEN_KIND_CODES[tokenKind];
  new DataView(payload.buffer).setBigUint64(2, assertU64(amount, "amount"), true);
  return payload;
}

/**
 * Parse a ChargeCommission message. Returns null for any other payload.
 */
export function decodeChargeCommission(payload: Uint8Array): ChargeCommission | null {
  if (payload.length !== CHARGE_COMMISSION_SIZE || payload[0] !== CHARGE_COMMISSION_TAG) {
    return null;
  }
  const tokenKind = tokenKindFromCode(payload[1] ?? -1);
  if (tokenKind === null) return null;

  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return { tokenKind, amount: view.getBigUint64(2, true) };
}

export function commissionAccountFor(
  deriver: AddressDeriver,
  adminAddress: Address,
  commissionProgram: Address,
): Address {
  return deriver.deriveAddress(
    [utf8ToBytes(COMMISSION_ADMIN_SEED), adminAddress],
    commissionProgram,
  );
}

// =============================================================================
// Checker
// =============================================================================

export class CommissionChecker {
  constructor(
    private readonly inspector: CoTransactionInspector,
    private readonly deriver: AddressDeriver,
  ) {}

  /**
   * @throws BridgeError WRONG_COMMISSION_PROGRAM when nothing precedes the
   *   deposit or the preceding operation targets another program
   * @throws BridgeError WRONG_COMMISSION_ACCOUNT when its first account is
   *   not this bridge's commission account
   * @throws BridgeError WRONG_COMMISSION_ARGUMENTS when it charged for a
   *   different token kind or amount, or is not a charge at all
   */
  assertCharged(
    admin: AdminRecord,
    adminAddress: Address,
    tokenKind: TokenKind,
    amount: bigint,
  ): void {
    const preceding = this.inspector.precedingOperation();
    if (preceding === null || !bytesEqual(preceding.programId, admin.commissionProgram)) {
      throw new BridgeError(
        "WRONG_COMMISSION_PROGRAM",
        "Deposit must directly follow a charge by the commission program",
      );
    }

    const expectedAccount = commissionAccountFor(
      this.deriver,
      adminAddress,
      admin.commissionProgram,
    );
    const [target] = preceding.accounts;
    if (target === undefined || !bytesEqual(target, expectedAccount)) {
      throw new BridgeError(
        "WRONG_COMMISSION_ACCOUNT",
        "Commission was charged against the wrong account",
      );
    }

    const charge = decodeChargeCommission(preceding.payload);
    if (charge === null || charge.tokenKind !== tokenKind || charge.amount !== amount) {
      throw new BridgeError(
        "WRONG_COMMISSION_ARGUMENTS",
        `Commission must be charged for ${tokenKind} amount ${amount}`,
      );
    }
  }
}
