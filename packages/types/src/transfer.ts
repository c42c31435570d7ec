/**
 * Transfer intents.
 *
 * A transfer payload is a closed sum type: every consumer switches on
 * `kind` exhaustively. Non-fungible transfers carry no amount field, so
 * an NFT moving anything other than exactly one unit cannot be expressed.
 */

import type { Address, Bytes32 } from "./bytes.js";

// =============================================================================
// Token kinds
// =============================================================================

export type TokenKind = "native" | "fungible" | "non_fungible";

/** Single-byte wire codes for token kinds. */
export const TOKEN_KIND_CODES: Readonly<Record<TokenKind, number>> = {
  native: 0,
  fungible: 1,
  non_fungible: 2,
};

export function tokenKindFromCode(code: number): TokenKind | null {
  switch (code) {
    case 0:
      return "native";
    case 1:
      return "fungible";
    case 2:
      return "non_fungible";
    default:
      return null;
  }
}

// =============================================================================
// Payload variants
// =============================================================================

export interface NativeTransfer {
  readonly kind: "native";
  readonly amount: bigint;
}

export interface FungibleTransfer {
  readonly kind: "fungible";
  readonly mint: Bytes32;
  readonly amount: bigint;
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
  /** Mint precision. Carried for the receiver; not part of the leaf hash. */
  readonly decimals: number;
}

export interface NonFungibleTransfer {
  readonly kind: "non_fungible";
  readonly mint: Bytes32;
  /** Verified collection the token belongs to, if any */
  readonly collection: Bytes32 | null;
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
}

export type TransferPayload =
  | NativeTransfer
  | FungibleTransfer
  | NonFungibleTransfer;

/**
 * Everything hashed into a content leaf except the network tag,
 * which is fixed by the encoder.
 */
export interface ContentLeaf {
  /** Source-chain event identifier */
  readonly origin: Bytes32;
  readonly receiver: Address;
  /** Bridge program on the destination chain */
  readonly destinationProgram: Address;
  readonly payload: TransferPayload;
}

// =============================================================================
// Accessors
// =============================================================================

export function transferAmount(payload: TransferPayload): bigint {
  switch (payload.kind) {
    case "native":
      return payload.amount;
    case "fungible":
      return payload.amount;
    case "non_fungible":
      return 1n;
  }
}

export function transferMint(payload: TransferPayload): Bytes32 | null {
  switch (payload.kind) {
    case "native":
      return null;
    case "fungible":
      return payload.mint;
    case "non_fungible":
      return payload.mint;
  }
}
