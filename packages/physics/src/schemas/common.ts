/**
 * Shared wire primitives.
 */

import { Type } from "@sinclair/typebox";

/** 0x + 40 hex chars (any case; normalized to lowercase on ingest). */
export const AddressString = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" });

/** Unsigned integer as a decimal string (amounts, epochs). */
export const UintString = Type.String({ pattern: "^(0|[1-9][0-9]*)$" });

/** 32-byte hash, 0x-prefixed. */
export const Hash32 = Type.String({ pattern: "^0x[0-9a-fA-F]{64}$" });

/** Arbitrary 0x-prefixed byte string. */
export const HexBytes = Type.String({ pattern: "^0x([0-9a-fA-F]{2})*$" });
