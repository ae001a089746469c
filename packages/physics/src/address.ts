/**
 * Address helpers — 20-byte EVM-style identities.
 *
 * Addresses are normalized to lowercase on entry so map lookups never
 * depend on checksum casing. The zero address is the invalid sentinel.
 */

import { ZERO_ADDRESS } from "./constants.js";

/** 0x + 40 lowercase hex chars. */
export type Address = `0x${string}`;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_RE.test(value);
}

/**
 * Normalize an address to lowercase.
 * @throws if the input is not 0x + 40 hex chars
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new Error(`Invalid address: must be 0x + 40 hex chars. Got: ${value}`);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}
