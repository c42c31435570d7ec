/**
 * Request argument limits.
 *
 * Sizes are UTF-8 byte lengths. Anything over a limit is rejected with
 * MALFORMED_PAYLOAD before any state is touched.
 */

import { BridgeError, SIGNATURE_LENGTH, utf8ToBytes } from "@bridge-core/types";

export const MAX_NETWORK_SIZE = 20;
export const MAX_ADDRESS_SIZE = 100;
export const MAX_NAME_SIZE = 32;
export const MAX_SYMBOL_SIZE = 10;
export const MAX_URI_SIZE = 200;
export const MAX_DECIMALS = 255;

function assertMaxBytes(value: string, max: number, field: string): void {
  const size = utf8ToBytes(value).length;
  if (size > max) {
    throw new BridgeError(
      "MALFORMED_PAYLOAD",
      `${field} exceeds ${max} bytes: ${size}`,
    );
  }
}

export function validateDepositTarget(networkTo: string, receiverAddress: string): void {
  assertMaxBytes(networkTo, MAX_NETWORK_SIZE, "networkTo");
  assertMaxBytes(receiverAddress, MAX_ADDRESS_SIZE, "receiverAddress");
}

export function validateMetadata(metadata: {
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
}): void {
  assertMaxBytes(metadata.name, MAX_NAME_SIZE, "name");
  assertMaxBytes(metadata.symbol, MAX_SYMBOL_SIZE, "symbol");
  assertMaxBytes(metadata.uri, MAX_URI_SIZE, "uri");
}

export function validateDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new BridgeError("MALFORMED_PAYLOAD", `Invalid decimals: ${decimals}`);
  }
}

export function validateSignature(signature: Uint8Array, recoveryId: number): void {
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new BridgeError(
      "MALFORMED_PAYLOAD",
      `signature must be ${SIGNATURE_LENGTH} bytes, got ${signature.length}`,
    );
  }
  if (!Number.isInteger(recoveryId) || recoveryId < 0 || recoveryId > 255) {
    throw new BridgeError("MALFORMED_PAYLOAD", `Invalid recovery id: ${recoveryId}`);
  }
}
