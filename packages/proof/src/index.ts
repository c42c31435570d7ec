/**
 * @bridge-core/proof — Content leaves and merkle proofs.
 *
 * Canonical leaf hashing for transfer intents, sorted-pair merkle
 * folding, and a tree builder for batching leaves under one root.
 *
 * @packageDocumentation
 */

// Types
export type { MerklePath, MerkleProof } from "./types.js";

// Content leaves
export {
  NETWORK_TAG,
  stripNulPadding,
  encodeTransferPayload,
  encodeContentLeaf,
  hashContentLeaf,
} from "./content-leaf.js";

// Proof folding
export {
  hashSortedPair,
  computeMerkleRoot,
  verifyMerkleProof,
} from "./merkle-proof.js";

// Merkle tree
export { MerkleTree } from "./merkle-tree.js";
