/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats (integers only for all numeric values)
 *   3. Deterministic encoding (same object → identical bytes, always)
 *   4. CBOR (RFC 8949) with canonical map key ordering
 *
 * Signed actions are hashed over these bytes, never over the JSON wire form.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

/**
 * Sort object keys lexicographically (recursive, depth-first).
 * Rejects non-integer numbers so the encoding never depends on float formatting.
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (obj instanceof Uint8Array) return obj;
  if (typeof obj === "number" && !Number.isInteger(obj)) {
    throw new Error(`Canonical encoding forbids floats: ${obj}`);
  }
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === "object") {
    const record = obj as Record<string, unknown>;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(record).sort()) {
      sorted[key] = sortKeys(record[key]);
    }
    return sorted;
  }
  return obj;
}

/**
 * Canonical encode: sort keys lexicographically, then CBOR encode.
 * This is the ONLY way to serialize objects for hashing.
 */
export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(sortKeys(obj));
}

/** Decode canonical CBOR bytes back to an object. */
export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
