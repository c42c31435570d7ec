/**
 * Fixed-width byte primitives.
 *
 * Addresses, origins, mints and hashes are all 32-byte values. Public keys
 * are 64-byte uncompressed secp256k1 points without the 0x04 prefix.
 * Amounts are unsigned 64-bit integers carried as bigint.
 */

import {
  bytesToHex,
  concatBytes,
  hexToBytes,
  utf8ToBytes,
} from "@noble/hashes/utils";
import { BridgeError } from "./errors.js";

export { concatBytes, utf8ToBytes };

/** A 32-byte value: address, program id, origin, mint or hash. */
export type Bytes32 = Uint8Array;

/** A 32-byte account or program address. */
export type Address = Bytes32;

/** 64-byte uncompressed secp256k1 public key (x || y). */
export type PublicKey64 = Uint8Array;

export const BYTES32_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 64;
export const SIGNATURE_LENGTH = 64;

export const U64_MAX = (1n << 64n) - 1n;

// =============================================================================
// Validation
// =============================================================================

function assertLength(value: Uint8Array, length: number, field: string): void {
  if (value.length !== length) {
    throw new BridgeError(
      "MALFORMED_PAYLOAD",
      `${field} must be ${length} bytes, got ${value.length}`,
    );
  }
}

export function assertBytes32(value: Uint8Array, field: string): Bytes32 {
  assertLength(value, BYTES32_LENGTH, field);
  return value;
}

export function assertPublicKey(value: Uint8Array, field: string): PublicKey64 {
  assertLength(value, PUBLIC_KEY_LENGTH, field);
  return value;
}

export function assertU64(amount: bigint, field: string): bigint {
  if (amount < 0n || amount > U64_MAX) {
    throw new BridgeError(
      "MALFORMED_PAYLOAD",
      `${field} is outside the u64 range: ${amount}`,
    );
  }
  return amount;
}

// =============================================================================
// Encoding
// =============================================================================

/** Lowercase hex without a prefix. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** Parse hex, with or without a 0x prefix. */
export function fromHex(hex: string): Uint8Array {
  const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  return hexToBytes(body);
}

/**
 * Encode a u64 as a 32-byte big-endian word (left-padded with zeros).
 */
export function u64ToWord(amount: bigint): Bytes32 {
  assertU64(amount, "amount");
  const word = new Uint8Array(BYTES32_LENGTH);
  new DataView(word.buffer).setBigUint64(BYTES32_LENGTH - 8, amount, false);
  return word;
}

export function zeroBytes32(): Bytes32 {
  return new Uint8Array(BYTES32_LENGTH);
}

// =============================================================================
// Comparison
// =============================================================================

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Compare two byte strings lexicographically.
 *
 * For equal-length inputs this is the ordering of the values read as
 * big-endian unsigned integers. Returns -1, 0 or 1.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}
