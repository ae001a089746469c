/**
 * stakepool keygen / stakepool address
 *
 * Generate a secp256k1 key → write to ~/.stakepool/key.json.
 */

import { existsSync } from "node:fs";
import type { CliConfig } from "../lib/config.js";
import { generateAndSaveKeys, loadKeys } from "../lib/keys.js";

interface KeygenOptions {
  force?: boolean;
}

export async function keygenCommand(config: CliConfig, opts: KeygenOptions): Promise<void> {
  const keyPath = config.keyPath;

  if (existsSync(keyPath) && !opts.force) {
    throw new Error(`Key file already exists at ${keyPath}\nUse --force to overwrite.`);
  }

  console.log(`Generating secp256k1 key...`);
  const keyFile = await generateAndSaveKeys(keyPath);

  console.log(`  address: ${keyFile.address}`);
  console.log(`  saved:   ${keyPath}`);
}

export async function addressCommand(config: CliConfig): Promise<void> {
  const key = await loadKeys(config.keyPath);
  console.log(key.address);
}
