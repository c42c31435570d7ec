/**
 * @bridge-core/types — Shared domain types for the bridge core.
 *
 * These types are used across all bridge packages:
 * - Fixed-width byte values (addresses, origins, keys)
 * - Transfer payloads and content leaves
 * - Persisted admin and withdraw records
 * - The bridge error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Payload variants are a closed union, handled exhaustively
 * - Amounts are bigint, never number
 */

// Bytes
export type { Bytes32, Address, PublicKey64 } from "./bytes.js";
export {
  BYTES32_LENGTH,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  U64_MAX,
  assertBytes32,
  assertPublicKey,
  assertU64,
  toHex,
  fromHex,
  u64ToWord,
  zeroBytes32,
  bytesEqual,
  compareBytes,
  concatBytes,
  utf8ToBytes,
} from "./bytes.js";

// Transfers
export type {
  TokenKind,
  NativeTransfer,
  FungibleTransfer,
  NonFungibleTransfer,
  TransferPayload,
  ContentLeaf,
} from "./transfer.js";
export {
  TOKEN_KIND_CODES,
  tokenKindFromCode,
  transferAmount,
  transferMint,
} from "./transfer.js";

// Records
export type { AdminRecord, WithdrawRecord } from "./records.js";

// Errors
export type { BridgeErrorCode, BridgeErrorCategory } from "./errors.js";
export { BridgeError, ERROR_CATEGORIES, isBridgeError } from "./errors.js";

// Runtime type guards
export {
  isBytes32,
  isPublicKey64,
  isU64,
  isTokenKind,
  isTransferPayload,
} from "./guards.js";
