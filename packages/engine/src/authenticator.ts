/**
 * Signature authenticator — the pool answers signature challenges as if
 * it were a key holder, with the operator's key standing in for it.
 */

import {
  AUTH_INVALID_VALUE,
  AUTH_MAGIC_VALUE,
  recoverAddress,
  SIGNATURE_LENGTH,
  ZERO_ADDRESS,
  type Address,
} from "@stakepool/physics";
import { PoolError } from "./errors.js";

export type AuthMarker = typeof AUTH_MAGIC_VALUE | typeof AUTH_INVALID_VALUE;

/**
 * @returns AUTH_MAGIC_VALUE when `signature` over `hash` recovers to
 *   `operator` (and not to the zero address), AUTH_INVALID_VALUE otherwise
 * @throws InvalidSignatureLength before any recovery is attempted
 */
export function verifyOperatorSignature(
  operator: Address,
  hash: Uint8Array,
  signature: Uint8Array,
): AuthMarker {
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new PoolError(
      "InvalidSignatureLength",
      `Signature must be ${SIGNATURE_LENGTH} bytes`,
      { length: String(signature.length) },
    );
  }
  const signer = recoverAddress(hash, signature);
  return signer !== ZERO_ADDRESS && signer === operator ? AUTH_MAGIC_VALUE : AUTH_INVALID_VALUE;
}

/** Authentication boundary: always answers with a marker. */
export function checkOperatorSignature(
  operator: Address,
  hash: Uint8Array,
  signature: Uint8Array,
): AuthMarker {
  if (signature.length !== SIGNATURE_LENGTH) return AUTH_INVALID_VALUE;
  return verifyOperatorSignature(operator, hash, signature);
}
