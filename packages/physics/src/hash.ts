/**
 * Hashing and hex codec.
 *
 * All digests in the pool are keccak-256, matching the identity scheme
 * (address = last 20 bytes of keccak256(uncompressed pubkey)).
 * Hex on the wire is always 0x-prefixed lowercase.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** 0x-prefixed hex string. */
export type Hex = `0x${string}`;

const HEX_RE = /^0x([0-9a-fA-F]{2})*$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_RE.test(value);
}

/** Convert 0x-prefixed (or bare) hex string to bytes. */
export function fromHex(hex: string): Uint8Array {
  const bare = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  return hexToBytes(bare);
}

/** Convert bytes to 0x-prefixed lowercase hex. */
export function toHex(bytes: Uint8Array): Hex {
  return `0x${bytesToHex(bytes)}`;
}

/** Raw keccak-256 of bytes → 32 bytes. */
export function keccak256(bytes: Uint8Array): Uint8Array {
  return keccak_256(bytes);
}
