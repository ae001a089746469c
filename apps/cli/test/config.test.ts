import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  getConfigPath,
  loadConfig,
  saveConfig,
  withPrimaryCoordinator,
} from "../src/lib/config.js";

const ENV_KEYS = [
  "STAKEPOOL_HOME",
  "STAKEPOOL_COORDINATOR",
  "STAKEPOOL_COORDINATORS",
  "STAKEPOOL_KEY_PATH",
] as const;

describe("cli config", () => {
  let home: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(async () => {
    for (const k of ENV_KEYS) {
      saved.set(k, process.env[k]);
      delete process.env[k];
    }
    home = await mkdtemp(join(tmpdir(), "stakepool-cli-"));
    process.env["STAKEPOOL_HOME"] = home;
  });

  afterEach(async () => {
    for (const k of ENV_KEYS) {
      const v = saved.get(k);
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
    await rm(home, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", async () => {
    const config = await loadConfig();
    expect(config).toEqual({
      coordinator: "http://localhost:8081",
      coordinators: ["http://localhost:8081"],
      keyPath: join(home, "key.json"),
    });
  });

  it("reads the singular coordinator from file", async () => {
    await writeFile(getConfigPath(), JSON.stringify({ coordinator: "http://a:1" }));
    const config = await loadConfig();
    expect(config.coordinators).toEqual(["http://a:1"]);
    expect(config.coordinator).toBe("http://a:1");
  });

  it("env overrides the file", async () => {
    await writeFile(
      getConfigPath(),
      JSON.stringify({ coordinators: ["http://a:1"], keyPath: "/tmp/file-key.json" }),
    );
    process.env["STAKEPOOL_COORDINATORS"] = "http://b:2, http://c:3";
    process.env["STAKEPOOL_KEY_PATH"] = "/tmp/env-key.json";

    const config = await loadConfig();
    expect(config.coordinators).toEqual(["http://b:2", "http://c:3"]);
    expect(config.coordinator).toBe("http://b:2");
    expect(config.keyPath).toBe("/tmp/env-key.json");
  });

  it("rejects a malformed config file", async () => {
    await writeFile(getConfigPath(), JSON.stringify({ coordinators: "http://a:1" }));
    await expect(loadConfig()).rejects.toThrow(/Invalid config file/);
  });

  it("saves coordinators and key path, not the derived primary", async () => {
    const config = withPrimaryCoordinator(await loadConfig(), "http://d:4");
    await saveConfig(config);

    const raw: unknown = JSON.parse(await readFile(getConfigPath(), "utf-8"));
    expect(raw).toEqual({
      coordinators: ["http://d:4", "http://localhost:8081"],
      keyPath: join(home, "key.json"),
    });
    expect((await loadConfig()).coordinator).toBe("http://d:4");
  });

  it("moves an existing coordinator to the front without duplicating it", () => {
    const config = {
      coordinator: "http://a:1",
      coordinators: ["http://a:1", "http://b:2"],
      keyPath: "/k",
    };
    expect(withPrimaryCoordinator(config, "http://b:2").coordinators).toEqual([
      "http://b:2",
      "http://a:1",
    ]);
  });
});
