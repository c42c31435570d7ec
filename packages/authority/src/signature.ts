/**
 * Authority signature verification.
 *
 * The bridge trusts exactly one secp256k1 key. A batch root or a key
 * rotation is authorized when the public key recovered from
 * (message, signature, recoveryId) equals that key byte for byte.
 *
 * Design:
 * - Keys are 64-byte uncompressed points without the 0x04 prefix
 * - Messages are 32-byte digests, signed as-is (no further hashing)
 * - Any failure to recover a point is INVALID_SIGNATURE; a well-formed
 *   signature from another key is WRONG_SIGNATURE
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { keccak_256 } from "@noble/hashes/sha3";
import type { Bytes32, PublicKey64 } from "@bridge-core/types";
import {
  BYTES32_LENGTH,
  BridgeError,
  SIGNATURE_LENGTH,
  assertPublicKey,
  bytesEqual,
} from "@bridge-core/types";

const MAX_RECOVERY_ID = 3;

/**
 * Recover the 64-byte public key that produced a signature.
 *
 * @returns The key, or null when the inputs do not describe a valid
 *   secp256k1 signature (bad lengths, out-of-range recovery id,
 *   r or s out of range, no curve point for r).
 */
export function recoverAuthorityKey(
  message: Bytes32,
  signature: Uint8Array,
  recoveryId: number,
): PublicKey64 | null {
  if (message.length !== BYTES32_LENGTH || signature.length !== SIGNATURE_LENGTH) {
    return null;
  }
  if (!Number.isInteger(recoveryId) || recoveryId < 0 || recoveryId > MAX_RECOVERY_ID) {
    return null;
  }

  try {
    const point = secp256k1.Signature.fromCompact(signature)
      .addRecoveryBit(recoveryId)
      .recoverPublicKey(message);
    return point.toRawBytes(false).slice(1);
  } catch {
    return null;
  }
}

/**
 * Require that `signature` over `message` recovers to `expectedKey`.
 *
 * @throws BridgeError INVALID_SIGNATURE if no key can be recovered
 * @throws BridgeError WRONG_SIGNATURE if a different key signed
 */
export function verifySignature(
  message: Bytes32,
  signature: Uint8Array,
  recoveryId: number,
  expectedKey: PublicKey64,
): void {
  assertPublicKey(expectedKey, "expectedKey");

  const recovered = recoverAuthorityKey(message, signature, recoveryId);
  if (recovered === null) {
    throw new BridgeError("INVALID_SIGNATURE", "Signature recovery failed");
  }
  if (!bytesEqual(recovered, expectedKey)) {
    throw new BridgeError(
      "WRONG_SIGNATURE",
      "Signature was not produced by the authority key",
    );
  }
}

/**
 * Message the current authority signs to hand over to `newKey`.
 */
export function keyRotationMessage(newKey: PublicKey64): Bytes32 {
  return keccak_256(assertPublicKey(newKey, "newKey"));
}
