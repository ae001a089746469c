/**
 * secp256k1 recoverable signatures — sign, recover, verify.
 *
 * Wire format is 65 bytes: r (32) ‖ s (32) ‖ v (1), v ∈ {27, 28}.
 * A raw recovery id (0/1) is normalized to 27/28 before use.
 *
 * Identity = last 20 bytes of keccak256(uncompressed pubkey without 0x04).
 * Recovery never throws on malformed input: it yields ZERO_ADDRESS, which
 * can never equal a valid identity.
 */

import * as secp from "@noble/secp256k1";
import { normalizeAddress, type Address } from "./address.js";
import { SIGNATURE_LENGTH, ZERO_ADDRESS } from "./constants.js";
import { keccak256, toHex } from "./hash.js";

const HALF_N = secp.CURVE.n >> 1n;

export interface SignatureParts {
  r: bigint;
  s: bigint;
  /** Normalized to 27 or 28 (other values are passed through and fail recovery). */
  v: number;
}

// ── Keys (client/test helper) ──────────────────────────────────────

/** Generate a random 32-byte secp256k1 private key. */
export function generatePrivateKey(): Uint8Array {
  return secp.utils.randomPrivateKey();
}

/** Address of a 65-byte uncompressed public key (0x04 ‖ X ‖ Y). */
export function addressFromPublicKey(publicKey: Uint8Array): Address {
  if (publicKey.length !== 65 || publicKey[0] !== 0x04) {
    throw new Error("Expected 65-byte uncompressed public key");
  }
  const hash = keccak256(publicKey.subarray(1));
  return normalizeAddress(toHex(hash.subarray(12)));
}

export function addressFromPrivateKey(privateKey: Uint8Array): Address {
  return addressFromPublicKey(secp.getPublicKey(privateKey, false));
}

// ── Encoding ───────────────────────────────────────────────────────

function bytesToBigInt(bytes: Uint8Array): bigint {
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  return n;
}

/** Map a raw recovery id (0/1) onto the canonical {27, 28} domain. */
export function normalizeRecoveryId(v: number): number {
  return v < 27 ? v + 27 : v;
}

/**
 * Split a 65-byte signature into r, s, v.
 * @throws if the signature is not exactly 65 bytes
 */
export function splitSignature(signature: Uint8Array): SignatureParts {
  if (signature.length !== SIGNATURE_LENGTH) {
    throw new Error(
      `Invalid signature length: expected ${SIGNATURE_LENGTH} bytes, got ${signature.length}`,
    );
  }
  return {
    r: bytesToBigInt(signature.subarray(0, 32)),
    s: bytesToBigInt(signature.subarray(32, 64)),
    v: normalizeRecoveryId(signature[64] ?? 0),
  };
}

// ── Signing ────────────────────────────────────────────────────────

/**
 * Sign a 32-byte digest. Returns 65 bytes r ‖ s ‖ v with v ∈ {27, 28}.
 * Signatures are produced in low-s form.
 */
export async function signDigest(
  privateKey: Uint8Array,
  digest: Uint8Array,
): Promise<Uint8Array> {
  const sig = await secp.signAsync(digest, privateKey);
  const out = new Uint8Array(SIGNATURE_LENGTH);
  out.set(sig.toCompactRawBytes(), 0);
  out[64] = 27 + sig.recovery;
  return out;
}

// ── Recovery ───────────────────────────────────────────────────────

/**
 * Recover the signer address of a 32-byte digest.
 *
 * @returns the signer, or ZERO_ADDRESS for any signature that is malformed
 *   (v outside {27, 28}, r/s out of range, high s, no valid point)
 * @throws only when the signature is not exactly 65 bytes
 */
export function recoverAddress(digest: Uint8Array, signature: Uint8Array): Address {
  const { r, s, v } = splitSignature(signature);
  if (digest.length !== 32) return ZERO_ADDRESS;
  if (v !== 27 && v !== 28) return ZERO_ADDRESS;
  if (s > HALF_N) return ZERO_ADDRESS;

  try {
    const sig = new secp.Signature(r, s, v - 27);
    const point = sig.recoverPublicKey(digest);
    return addressFromPublicKey(point.toRawBytes(false));
  } catch {
    return ZERO_ADDRESS;
  }
}

/**
 * True when `signature` over `digest` recovers to `expected`.
 * Never true for the zero address. Never throws.
 */
export function verifyDigestSignature(
  expected: string,
  digest: Uint8Array,
  signature: Uint8Array,
): boolean {
  if (signature.length !== SIGNATURE_LENGTH) return false;
  const recovered = recoverAddress(digest, signature);
  return recovered !== ZERO_ADDRESS && recovered === expected.toLowerCase();
}
