/**
 * Fixed-size byte codecs for the persisted bridge records.
 *
 * Accounts are allocated zero-filled, so an all-zero buffer decodes to an
 * uninitialized record. Integers are little-endian.
 *
 * AdminRecord (97 bytes):
 *   0   initialized      u8
 *   1   authorityKey     [64]
 *   65  commissionProgram [32]
 *
 * WithdrawRecord (107 bytes):
 *   0   initialized      u8
 *   1   tokenKind        u8
 *   2   origin           [32]
 *   34  mint tag         u8 (0 none, 1 some)
 *   35  mint             [32]
 *   67  amount           u64
 *   75  receiver         [32]
 */

import type { AdminRecord, WithdrawRecord } from "@bridge-core/types";
import {
  BridgeError,
  TOKEN_KIND_CODES,
  assertBytes32,
  assertPublicKey,
  assertU64,
  tokenKindFromCode,
} from "@bridge-core/types";

export const ADMIN_RECORD_SIZE = 97;
export const WITHDRAW_RECORD_SIZE = 107;

function assertSize(data: Uint8Array, size: number, record: string): void {
  if (data.length !== size) {
    throw new BridgeError(
      "MALFORMED_PAYLOAD",
      `${record} must be ${size} bytes, got ${data.length}`,
    );
  }
}

function readFlag(value: number | undefined, field: string): boolean {
  if (value === 0) return false;
  if (value === 1) return true;
  throw new BridgeError("MALFORMED_PAYLOAD", `Invalid ${field} flag: ${value}`);
}

// =============================================================================
// AdminRecord
// =============================================================================

export function encodeAdminRecord(record: AdminRecord): Uint8Array {
  const data = new Uint8Array(ADMIN_RECORD_SIZE);
  data[0] = record.initialized ? 1 : 0;
  data.set(assertPublicKey(record.authorityKey, "authorityKey"), 1);
  data.set(assertBytes32(record.commissionProgram, "commissionProgram"), 65);
  return data;
}

export function decodeAdminRecord(data: Uint8Array): AdminRecord {
  assertSize(data, ADMIN_RECORD_SIZE, "Admin record");
  return {
    initialized: readFlag(data[0], "initialized"),
    authorityKey: data.slice(1, 65),
    commissionProgram: data.slice(65, 97),
  };
}

// =============================================================================
// WithdrawRecord
// =============================================================================

export function encodeWithdrawRecord(record: WithdrawRecord): Uint8Array {
  const data = new Uint8Array(WITHDRAW_RECORD_SIZE);
  const view = new DataView(data.buffer);

  data[0] = record.initialized ? 1 : 0;
  data[1] = TOKEN_KIND_CODES[record.tokenKind];
  data.set(assertBytes32(record.origin, "origin"), 2);
  if (record.mint !== null) {
    data[34] = 1;
    data.set(assertBytes32(record.mint, "mint"), 35);
  }
  view.setBigUint64(67, assertU64(record.amount, "amount"), true);
  data.set(assertBytes32(record.receiver, "receiver"), 75);
  return data;
}

export function decodeWithdrawRecord(data: Uint8Array): WithdrawRecord {
  assertSize(data, WITHDRAW_RECORD_SIZE, "Withdraw record");
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const kindCode = data[1] ?? 0;
  const tokenKind = tokenKindFromCode(kindCode);
  if (tokenKind === null) {
    throw new BridgeError("MALFORMED_PAYLOAD", `Unknown token kind: ${kindCode}`);
  }

  return {
    initialized: readFlag(data[0], "initialized"),
    tokenKind,
    origin: data.slice(2, 34),
    mint: readFlag(data[34], "mint") ? data.slice(35, 67) : null,
    amount: view.getBigUint64(67, true),
    receiver: data.slice(75, 107),
  };
}
