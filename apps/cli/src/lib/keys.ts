/**
 * Key management — load/save a secp256k1 key from ~/.stakepool/key.json.
 *
 * Key file format:
 * {
 *   "address": "0x…40 hex",
 *   "privateKey": "0x…64 hex"
 * }
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  addressFromPrivateKey,
  fromHex,
  generatePrivateKey,
  toHex,
  type Address,
} from "@stakepool/physics";

export const KeyFile = Type.Object({
  address: Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" }),
  privateKey: Type.String({ pattern: "^0x[0-9a-f]{64}$" }),
});

export interface KeyFile {
  address: Address;
  privateKey: `0x${string}`;
}

export interface LoadedKey {
  address: Address;
  privateKey: Uint8Array;
}

/** Load the key from disk. Throws if missing or inconsistent. */
export async function loadKeys(keyPath: string): Promise<LoadedKey> {
  let raw: string;
  try {
    raw = await readFile(keyPath, "utf-8");
  } catch (err) {
    throw new Error(`No key file at ${keyPath}\nRun 'stakepool keygen' to generate one.`, {
      cause: err,
    });
  }

  const data: unknown = JSON.parse(raw);
  if (!Value.Check(KeyFile, data)) {
    throw new Error(`Invalid key file at ${keyPath}: expected address and 32-byte privateKey`);
  }

  const privateKey = fromHex(data.privateKey);
  const address = addressFromPrivateKey(privateKey);
  if (address !== data.address.toLowerCase()) {
    throw new Error(`Invalid key file at ${keyPath}: address does not match privateKey`);
  }
  return { address, privateKey };
}

/** Write a key file for the given private key. */
export async function saveKeys(keyPath: string, privateKey: Uint8Array): Promise<KeyFile> {
  const keyFile: KeyFile = {
    address: addressFromPrivateKey(privateKey),
    privateKey: toHex(privateKey),
  };
  await mkdir(dirname(keyPath), { recursive: true });
  await writeFile(keyPath, JSON.stringify(keyFile, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  return keyFile;
}

/** Generate and save a new key. */
export async function generateAndSaveKeys(keyPath: string): Promise<KeyFile> {
  return saveKeys(keyPath, generatePrivateKey());
}
