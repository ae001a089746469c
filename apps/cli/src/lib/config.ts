/**
 * CLI configuration — loads from ~/.stakepool/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 *
 * Multi-endpoint support:
 *   "coordinators" enables retry-with-rotation. The singular "coordinator"
 *   field always points to the first entry.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Primary coordinator URL (first entry of coordinators[]). */
  coordinator: string;
  /** All coordinator endpoints, ordered by preference. */
  coordinators: string[];
  keyPath: string;
}

const ConfigFile = Type.Object({
  coordinator: Type.Optional(Type.String()),
  coordinators: Type.Optional(Type.Array(Type.String())),
  keyPath: Type.Optional(Type.String()),
});
type ConfigFile = Static<typeof ConfigFile>;

const DEFAULT_COORDINATOR = "http://localhost:8081";

/** ~/.stakepool, or $STAKEPOOL_HOME when set. */
export function getConfigDir(): string {
  return process.env["STAKEPOOL_HOME"] ?? join(homedir(), ".stakepool");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export async function ensureConfigDir(): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Value.Check(ConfigFile, parsed)) {
    throw new Error(`Invalid config file at ${path}`);
  }
  return parsed;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  const fileConfig = await readConfigFile(getConfigPath());

  // env > config coordinators[] > config coordinator > default
  const envCoordinator = process.env["STAKEPOOL_COORDINATOR"];
  const envCoordinators = process.env["STAKEPOOL_COORDINATORS"]
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const coordinators: string[] =
    envCoordinators ??
    (envCoordinator ? [envCoordinator] : null) ??
    fileConfig.coordinators ??
    (fileConfig.coordinator ? [fileConfig.coordinator] : null) ??
    [DEFAULT_COORDINATOR];

  return {
    coordinator: coordinators[0] ?? DEFAULT_COORDINATOR,
    coordinators,
    keyPath:
      process.env["STAKEPOOL_KEY_PATH"] ?? fileConfig.keyPath ?? join(getConfigDir(), "key.json"),
  };
}

/** Save config to disk. The singular coordinator is derived, so not persisted. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await ensureConfigDir();
  const toSave: ConfigFile = {
    coordinators: config.coordinators,
    keyPath: config.keyPath,
  };
  await writeFile(getConfigPath(), JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}

/** Put a coordinator URL first, keeping the others as fallbacks. */
export function withPrimaryCoordinator(config: CliConfig, url: string): CliConfig {
  const rest = config.coordinators.filter((c) => c !== url);
  return { ...config, coordinator: url, coordinators: [url, ...rest] };
}
