/**
 * Withdrawal authorization: leaf → root → signature.
 */

import type { Bytes32, ContentLeaf, PublicKey64 } from "@bridge-core/types";
import { computeMerkleRoot, hashContentLeaf } from "@bridge-core/proof";
import type { MerklePath } from "@bridge-core/proof";
import { verifySignature } from "@bridge-core/authority";

export interface WithdrawalProof {
  readonly path: MerklePath;
  readonly signature: Uint8Array;
  readonly recoveryId: number;
}

export interface AuthorizedWithdrawal {
  readonly leafHash: Bytes32;
  readonly root: Bytes32;
}

/**
 * Hash the leaf, fold it to a root, and require the authority's
 * signature over that root.
 *
 * @throws BridgeError MALFORMED_PROOF | MALFORMED_PAYLOAD for bad input
 * @throws BridgeError INVALID_SIGNATURE | WRONG_SIGNATURE
 */
export function authorizeWithdrawal(
  authorityKey: PublicKey64,
  leaf: ContentLeaf,
  proof: WithdrawalProof,
): AuthorizedWithdrawal {
  const leafHash = hashContentLeaf(leaf);
  const root = computeMerkleRoot(leafHash, proof.path);
  verifySignature(root, proof.signature, proof.recoveryId, authorityKey);
  return { leafHash, root };
}
