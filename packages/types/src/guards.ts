/**
 * Runtime Type Guards
 *
 * Narrowing functions for bridge domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, decoded records, external integrations).
 */

import type { Bytes32, PublicKey64 } from "./bytes.js";
import { BYTES32_LENGTH, PUBLIC_KEY_LENGTH, U64_MAX } from "./bytes.js";
import type { TokenKind, TransferPayload } from "./transfer.js";

// =============================================================================
// Byte guards
// =============================================================================

export function isBytes32(value: unknown): value is Bytes32 {
  return value instanceof Uint8Array && value.length === BYTES32_LENGTH;
}

export function isPublicKey64(value: unknown): value is PublicKey64 {
  return value instanceof Uint8Array && value.length === PUBLIC_KEY_LENGTH;
}

export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

// =============================================================================
// Transfer guards
// =============================================================================

const TOKEN_KINDS = new Set<string>(["native", "fungible", "non_fungible"]);

export function isTokenKind(value: unknown): value is TokenKind {
  return typeof value === "string" && TOKEN_KINDS.has(value);
}

function hasMetadata(v: Record<string, unknown>): boolean {
  return (
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    typeof v.uri === "string"
  );
}

export function isTransferPayload(value: unknown): value is TransferPayload {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  switch (v.kind) {
    case "native":
      return isU64(v.amount);
    case "fungible":
      return (
        isBytes32(v.mint) &&
        isU64(v.amount) &&
        hasMetadata(v) &&
        typeof v.decimals === "number" &&
        Number.isInteger(v.decimals) &&
        v.decimals >= 0 &&
        v.decimals <= 255
      );
    case "non_fungible":
      return (
        isBytes32(v.mint) &&
        (v.collection === null || isBytes32(v.collection)) &&
        hasMetadata(v)
      );
    default:
      return false;
  }
}
