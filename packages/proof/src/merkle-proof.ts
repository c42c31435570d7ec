/**
 * @bridge-core/proof — Merkle proof folding.
 *
 * Recomputes a batch root from a leaf hash and its sibling path.
 *
 * Each step compares the running hash and the sibling as 256-bit
 * big-endian integers and hashes keccak-256(larger || smaller). The
 * result does not depend on which side the sibling sat on in the tree.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import type { Bytes32 } from "@bridge-core/types";
import {
  BYTES32_LENGTH,
  BridgeError,
  bytesEqual,
  compareBytes,
  concatBytes,
} from "@bridge-core/types";
import type { MerklePath } from "./types.js";

/**
 * Hash two nodes in sorted order (larger value first).
 */
export function hashSortedPair(a: Bytes32, b: Bytes32): Bytes32 {
  return compareBytes(a, b) >= 0
    ? keccak_256(concatBytes(a, b))
    : keccak_256(concatBytes(b, a));
}

/**
 * Fold a leaf hash through its sibling path.
 *
 * @throws BridgeError MALFORMED_PROOF if the path is empty or any
 *   sibling is not 32 bytes. Every leaf must pass through at least one
 *   batching step, so a zero-length proof never authorizes anything.
 */
export function computeMerkleRoot(leafHash: Bytes32, path: MerklePath): Bytes32 {
  if (path.length === 0) {
    throw new BridgeError("MALFORMED_PROOF", "Merkle path must not be empty");
  }
  if (leafHash.length !== BYTES32_LENGTH) {
    throw new BridgeError("MALFORMED_PROOF", "Leaf hash must be 32 bytes");
  }

  let hash = leafHash;
  path.forEach((sibling, depth) => {
    if (sibling.length !== BYTES32_LENGTH) {
      throw new BridgeError(
        "MALFORMED_PROOF",
        `Sibling at depth ${depth} must be 32 bytes, got ${sibling.length}`,
      );
    }
    hash = hashSortedPair(sibling, hash);
  });

  return hash;
}

/**
 * Check that a leaf and path fold to the expected root.
 */
export function verifyMerkleProof(
  leafHash: Bytes32,
  path: MerklePath,
  expectedRoot: Bytes32,
): boolean {
  return bytesEqual(computeMerkleRoot(leafHash, path), expectedRoot);
}
