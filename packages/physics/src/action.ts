/**
 * ActionV1 operations — construct, sign, recover, verify.
 *
 *   - actionSigningPayload(): the fields that get signed (everything minus sig)
 *   - actionDigest(): keccak256(canonical(signing payload)) → 32 bytes
 *   - signAction(): sign an unsigned action → ActionV1 with sig
 *   - recoverActionSigner(): signer address, ZERO_ADDRESS if the sig is malformed
 *   - verifyAction(): recovered signer == action.from
 */

import type { ActionV1 } from "./schemas/action.js";
import type { Address } from "./address.js";
import { canonicalEncode } from "./canonical.js";
import { SIGNATURE_LENGTH, ZERO_ADDRESS } from "./constants.js";
import { fromHex, keccak256, toHex, type Hex } from "./hash.js";
import { recoverAddress, signDigest } from "./signature.js";

export type UnsignedAction = Omit<ActionV1, "sig">;

export function actionSigningPayload(
  action: ActionV1 | UnsignedAction,
): Record<string, unknown> {
  return {
    v: action.v,
    kind: action.kind,
    from: action.from.toLowerCase(),
    nonce: action.nonce,
    params: action.params,
  };
}

export function actionDigest(action: ActionV1 | UnsignedAction): Uint8Array {
  return keccak256(canonicalEncode(actionSigningPayload(action)));
}

/** Hex action id — the digest, used as the idempotency key in the event log. */
export function computeActionId(action: ActionV1 | UnsignedAction): Hex {
  return toHex(actionDigest(action));
}

/**
 * Sign an unsigned action, producing a complete ActionV1.
 *
 * @param privateKey - 32-byte secp256k1 private key
 */
export async function signAction(
  privateKey: Uint8Array,
  action: UnsignedAction,
): Promise<ActionV1> {
  const sig = await signDigest(privateKey, actionDigest(action));
  return { ...action, sig: toHex(sig) };
}

/** Recover the signer of an action. ZERO_ADDRESS if the sig is malformed. */
export function recoverActionSigner(action: ActionV1): Address {
  let sigBytes: Uint8Array;
  try {
    sigBytes = fromHex(action.sig);
  } catch {
    return ZERO_ADDRESS;
  }
  if (sigBytes.length !== SIGNATURE_LENGTH) return ZERO_ADDRESS;
  return recoverAddress(actionDigest(action), sigBytes);
}

/** True when the action's signature recovers to action.from. */
export function verifyAction(action: ActionV1): boolean {
  const signer = recoverActionSigner(action);
  return signer !== ZERO_ADDRESS && signer === action.from.toLowerCase();
}
