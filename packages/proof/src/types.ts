/**
 * @bridge-core/proof — Core types.
 *
 * Types for sorted-pair merkle trees and inclusion proofs.
 * All hashes are 32-byte keccak-256 digests.
 */

import type { Bytes32 } from "@bridge-core/types";

/**
 * Ordered sibling hashes from a leaf up to the root.
 *
 * No left/right flags: each step hashes the numerically larger value
 * first, so the path alone determines the root.
 */
export type MerklePath = readonly Bytes32[];

/**
 * A merkle inclusion proof: shows that a specific leaf exists
 * in a batch with a given root.
 */
export interface MerkleProof {
  /** Content leaf hash being proven */
  readonly leafHash: Bytes32;
  /** Index of the leaf in the batch (0-based) */
  readonly leafIndex: number;
  /** Sibling hashes, leaf level first */
  readonly path: MerklePath;
  /** Batch root (expected) */
  readonly root: Bytes32;
}
