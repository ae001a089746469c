/**
 * Golden test vectors — canonical serialization.
 * These vectors are FROZEN. If a test breaks, the code is wrong, not the vector.
 */

import { describe, it, expect } from "vitest";
import { canonicalEncode, canonicalDecode } from "../../src/canonical.js";
import { toHex } from "../../src/hash.js";

describe("canonical serialization", () => {
  it("produces deterministic output regardless of key insertion order", () => {
    const obj1 = { z: 1, a: 2, m: 3 };
    const obj2 = { a: 2, m: 3, z: 1 };
    const obj3 = { m: 3, z: 1, a: 2 };

    expect(toHex(canonicalEncode(obj1))).toBe(toHex(canonicalEncode(obj2)));
    expect(toHex(canonicalEncode(obj2))).toBe(toHex(canonicalEncode(obj3)));
  });

  it("round-trips an action-shaped object", () => {
    const action = {
      v: 1,
      kind: "deposit",
      from: "0x" + "ab".repeat(20),
      nonce: 7,
      params: { amount: "1000" },
    };

    const decoded = canonicalDecode(canonicalEncode(action)) as typeof action;

    expect(decoded.v).toBe(1);
    expect(decoded.kind).toBe("deposit");
    expect(decoded.nonce).toBe(7);
    expect(decoded.params.amount).toBe("1000");
  });

  it("sorts nested keys", () => {
    const nested = {
      z: { b: 2, a: 1 },
      a: { z: 26, a: 1 },
    };

    const decoded = canonicalDecode(canonicalEncode(nested)) as typeof nested;

    expect(Object.keys(decoded)).toEqual(["a", "z"]);
    expect(Object.keys(decoded.z)).toEqual(["a", "b"]);
  });

  it("rejects floats", () => {
    expect(() => canonicalEncode({ amount: 1.5 })).toThrow(/forbids floats/);
  });

  it("encodes integers without float representation", () => {
    const obj = { value: 42, big: 1000000 };
    const decoded = canonicalDecode(canonicalEncode(obj)) as typeof obj;
    expect(decoded.value).toBe(42);
    expect(decoded.big).toBe(1000000);
  });
});
