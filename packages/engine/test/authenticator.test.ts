/**
 * Operator signature authentication — success and failure markers.
 */

import { describe, it, expect } from "vitest";
import {
  AUTH_INVALID_VALUE,
  AUTH_MAGIC_VALUE,
  keccak256,
  signDigest,
} from "@stakepool/physics";
import { codeOf, OPERATOR, OPERATOR_KEY, OTHER, OTHER_KEY, setup } from "./helpers.js";

const HASH = keccak256(new TextEncoder().encode("login challenge"));

describe("verifySignature", () => {
  it("accepts the operator's signature", async () => {
    const { pool } = setup();
    const sig = await signDigest(OPERATOR_KEY, HASH);
    expect(pool.verifySignature(HASH, sig)).toBe(AUTH_MAGIC_VALUE);
    expect(pool.isValidSignature(HASH, sig)).toBe(AUTH_MAGIC_VALUE);
  });

  it("rejects any other key", async () => {
    const { pool } = setup();
    const sig = await signDigest(OTHER_KEY, HASH);
    expect(pool.verifySignature(HASH, sig)).toBe(AUTH_INVALID_VALUE);
  });

  it("rejects the operator's signature over a different hash", async () => {
    const { pool } = setup();
    const sig = await signDigest(OPERATOR_KEY, HASH);
    const other = keccak256(new TextEncoder().encode("another challenge"));
    expect(pool.verifySignature(other, sig)).toBe(AUTH_INVALID_VALUE);
  });

  it("a 64-byte signature fails with the length error", () => {
    const { pool } = setup();
    expect(codeOf(() => pool.verifySignature(HASH, new Uint8Array(64)))).toBe(
      "InvalidSignatureLength",
    );
  });

  it("an all-zero signature never authenticates", () => {
    const { pool } = setup();
    expect(pool.verifySignature(HASH, new Uint8Array(65))).toBe(AUTH_INVALID_VALUE);
  });

  it("accepts a raw 0/1 recovery id", async () => {
    const { pool } = setup();
    const sig = await signDigest(OPERATOR_KEY, HASH);
    sig[64] = (sig[64] ?? 27) - 27;
    expect(pool.verifySignature(HASH, sig)).toBe(AUTH_MAGIC_VALUE);
  });

  it("rejects a recovery id outside {27, 28}", async () => {
    const { pool } = setup();
    const sig = await signDigest(OPERATOR_KEY, HASH);
    sig[64] = 29;
    expect(pool.verifySignature(HASH, sig)).toBe(AUTH_INVALID_VALUE);
  });

  it("follows the operator through a handoff", async () => {
    const { pool } = setup();
    const oldSig = await signDigest(OPERATOR_KEY, HASH);
    const newSig = await signDigest(OTHER_KEY, HASH);

    pool.proposeOperator(OPERATOR, OTHER);
    pool.acceptOperator(OTHER);

    expect(pool.verifySignature(HASH, oldSig)).toBe(AUTH_INVALID_VALUE);
    expect(pool.verifySignature(HASH, newSig)).toBe(AUTH_MAGIC_VALUE);
  });
});

describe("isValidSignature", () => {
  it("answers a wrong length with the failure marker instead of throwing", () => {
    const { pool } = setup();
    expect(pool.isValidSignature(HASH, new Uint8Array(64))).toBe(AUTH_INVALID_VALUE);
    expect(pool.isValidSignature(HASH, new Uint8Array(0))).toBe(AUTH_INVALID_VALUE);
  });
});
