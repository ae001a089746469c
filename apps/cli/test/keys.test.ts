import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { addressFromPrivateKey, isAddress, toHex } from "@stakepool/physics";
import { generateAndSaveKeys, loadKeys, saveKeys } from "../src/lib/keys.js";

/** Placeholder key: 31 zero bytes then `n`. */
function testKey(n: number): Uint8Array {
  const key = new Uint8Array(32);
  key[31] = n;
  return key;
}

describe("cli keys", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stakepool-keys-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and loads a key", async () => {
    const path = join(dir, "nested", "key.json");
    const saved = await saveKeys(path, testKey(7));
    expect(saved.address).toBe(addressFromPrivateKey(testKey(7)));
    expect(saved.privateKey).toBe(toHex(testKey(7)));

    const loaded = await loadKeys(path);
    expect(loaded.address).toBe(saved.address);
    expect(loaded.privateKey).toEqual(testKey(7));
  });

  it("generates a fresh key with a valid address", async () => {
    const path = join(dir, "key.json");
    const saved = await generateAndSaveKeys(path);
    expect(isAddress(saved.address)).toBe(true);
    expect((await loadKeys(path)).address).toBe(saved.address);
  });

  it("explains how to create a missing key", async () => {
    await expect(loadKeys(join(dir, "absent.json"))).rejects.toThrow(/stakepool keygen/);
  });

  it("rejects a key file whose address does not match", async () => {
    const path = join(dir, "key.json");
    await writeFile(
      path,
      JSON.stringify({ address: addressFromPrivateKey(testKey(8)), privateKey: toHex(testKey(7)) }),
    );
    await expect(loadKeys(path)).rejects.toThrow(/does not match/);
  });

  it("rejects a key file with a short private key", async () => {
    const path = join(dir, "key.json");
    await writeFile(
      path,
      JSON.stringify({ address: addressFromPrivateKey(testKey(7)), privateKey: "0x07" }),
    );
    await expect(loadKeys(path)).rejects.toThrow(/Invalid key file/);
  });

  it("writes pretty JSON", async () => {
    const path = join(dir, "key.json");
    await saveKeys(path, testKey(7));
    const raw = await readFile(path, "utf-8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(raw).toContain('\n  "address": ');
  });
});
