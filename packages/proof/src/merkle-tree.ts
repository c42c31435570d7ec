/**
 * @bridge-core/proof — Merkle Tree.
 *
 * Sorted-pair keccak-256 tree over content leaf hashes. Relayers use it
 * to batch leaves under one signed root and to hand each withdrawal its
 * sibling path.
 *
 * Design:
 * - Internal nodes: keccak-256(max(a, b) || min(a, b))
 * - Odd node count on a level: the last node is paired with itself
 * - A single leaf is also paired with itself, so every proof has at
 *   least one step
 * - Empty tree: null root
 * - Deterministic: same leaves → same root
 * - Immutable: build once, query many times
 */

import type { Bytes32 } from "@bridge-core/types";
import { bytesEqual } from "@bridge-core/types";
import { computeMerkleRoot, hashSortedPair } from "./merkle-proof.js";
import type { MerkleProof } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Build every level of the tree, leaves first, root level last.
 */
function buildLevels(leaves: readonly Bytes32[]): Bytes32[][] {
  const levels: Bytes32[][] = [[...leaves]];
  let current: Bytes32[] = [...leaves];

  do {
    const next: Bytes32[] = [];
    for (let i = 0; i < current.length; i += 2) {
      const left = current[i];
      if (left === undefined) break;
      const right = current[i + 1] ?? left;
      next.push(hashSortedPair(left, right));
    }
    levels.push(next);
    current = next;
  } while (current.length > 1);

  return levels;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Immutable merkle tree built from content leaf hashes.
 *
 * Usage:
 * ```ts
 * const tree = MerkleTree.build([leafA, leafB, leafC]);
 * const root = tree.getRoot();          // 32-byte root or null
 * const proof = tree.getProof(0);       // inclusion proof for leaf 0
 * MerkleTree.verifyProof(proof);        // true/false
 * ```
 */
export class MerkleTree {
  private readonly leaves: readonly Bytes32[];
  private readonly levels: readonly (readonly Bytes32[])[];

  private constructor(leaves: readonly Bytes32[]) {
    this.leaves = leaves;
    this.levels = leaves.length === 0 ? [] : buildLevels(leaves);
  }

  /**
   * Build a tree from pre-hashed leaves (see `hashContentLeaf`).
   */
  static build(leaves: readonly Bytes32[]): MerkleTree {
    return new MerkleTree(leaves);
  }

  /**
   * Get the root hash of the tree.
   * Returns null for an empty tree.
   */
  getRoot(): Bytes32 | null {
    const top = this.levels[this.levels.length - 1];
    return top?.[0] ?? null;
  }

  getLeafCount(): number {
    return this.leaves.length;
  }

  /**
   * Generate an inclusion proof for the leaf at the given index.
   *
   * @returns MerkleProof or null if index is out of range or tree is empty
   */
  getProof(leafIndex: number): MerkleProof | null {
    const root = this.getRoot();
    const leafHash = this.leaves[leafIndex];
    if (root === null || leafHash === undefined || !Number.isInteger(leafIndex)) {
      return null;
    }

    const path: Bytes32[] = [];
    let index = leafIndex;

    // Every level except the root contributes one sibling
    for (let depth = 0; depth < this.levels.length - 1; depth++) {
      const level = this.levels[depth] ?? [];
      const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
      const sibling = level[siblingIndex] ?? level[index];
      if (sibling === undefined) return null;
      path.push(sibling);
      index = Math.floor(index / 2);
    }

    return { leafHash, leafIndex, path, root };
  }

  /**
   * Verify an inclusion proof.
   *
   * Needs only the proof, not the tree. An empty
   * path never verifies.
   */
  static verifyProof(proof: MerkleProof): boolean {
    if (proof.path.length === 0) return false;
    return bytesEqual(computeMerkleRoot(proof.leafHash, proof.path), proof.root);
  }
}
