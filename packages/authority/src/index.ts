/**
 * @bridge-core/authority — Authority key signatures.
 *
 * Verifies that batch roots and key rotations were signed by the single
 * trusted secp256k1 authority, and provides the signer relayers use to
 * produce those signatures.
 *
 * @packageDocumentation
 */

export type { RecoverableSignature } from "./types.js";

export {
  recoverAuthorityKey,
  verifySignature,
  keyRotationMessage,
} from "./signature.js";

export { AuthoritySigner } from "./signer.js";
