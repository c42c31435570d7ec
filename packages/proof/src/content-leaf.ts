/**
 * @bridge-core/proof — Content leaf encoding.
 *
 * Canonical byte encoding of a transfer intent, hashed with keccak-256.
 *
 * Layout (no separators, no length prefixes):
 *
 *   origin(32) || "Solana" || receiver(32) || destinationProgram(32) || payload
 *
 * Payload per variant:
 * - native:       zero(32) || amount(32, BE)
 * - fungible:     mint(32) || amount(32, BE) || name || symbol || uri
 * - non_fungible: mint(32) || collection-or-zero(32) || 1(32, BE) || name || symbol || uri
 *
 * Strings are raw UTF-8. Field boundaries depend on the fixed-width
 * neighbours and on the strings being the trailing content, so the leaf
 * is only ever compared for exact equality, never parsed back. Relayers
 * hash the same bytes, so this layout must not change.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import type { Bytes32, ContentLeaf, TransferPayload } from "@bridge-core/types";
import {
  assertBytes32,
  concatBytes,
  u64ToWord,
  utf8ToBytes,
  zeroBytes32,
} from "@bridge-core/types";

/** Destination network name hashed into every leaf. */
export const NETWORK_TAG = "Solana";

const NUL_PADDING = /^\u0000+|\u0000+$/g;

/**
 * Remove NUL padding from a metadata string.
 *
 * On-chain metadata stores names, symbols and URIs in fixed-size
 * zero-filled fields; the padding is not part of the signed value.
 */
export function stripNulPadding(value: string): string {
  return value.replace(NUL_PADDING, "");
}

function metadataBytes(name: string, symbol: string, uri: string): Uint8Array {
  return concatBytes(utf8ToBytes(name), utf8ToBytes(symbol), utf8ToBytes(uri));
}

/**
 * Encode the variant-specific tail of a content leaf.
 */
export function encodeTransferPayload(payload: TransferPayload): Uint8Array {
  switch (payload.kind) {
    case "native":
      return concatBytes(zeroBytes32(), u64ToWord(payload.amount));
    case "fungible":
      return concatBytes(
        assertBytes32(payload.mint, "mint"),
        u64ToWord(payload.amount),
        metadataBytes(payload.name, payload.symbol, payload.uri),
      );
    case "non_fungible":
      return concatBytes(
        assertBytes32(payload.mint, "mint"),
        payload.collection === null
          ? zeroBytes32()
          : assertBytes32(payload.collection, "collection"),
        u64ToWord(1n),
        metadataBytes(payload.name, payload.symbol, payload.uri),
      );
  }
}

/**
 * Full pre-image of a content leaf.
 */
export function encodeContentLeaf(leaf: ContentLeaf): Uint8Array {
  return concatBytes(
    assertBytes32(leaf.origin, "origin"),
    utf8ToBytes(NETWORK_TAG),
    assertBytes32(leaf.receiver, "receiver"),
    assertBytes32(leaf.destinationProgram, "destinationProgram"),
    encodeTransferPayload(leaf.payload),
  );
}

/**
 * keccak-256 of the encoded content leaf.
 */
export function hashContentLeaf(leaf: ContentLeaf): Bytes32 {
  return keccak_256(encodeContentLeaf(leaf));
}
