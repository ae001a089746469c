/**
 * stakepool config [--coordinator url] [--key-path path]
 *
 * Show or update CLI configuration.
 */

import {
  getConfigPath,
  loadConfig,
  saveConfig,
  withPrimaryCoordinator,
} from "../lib/config.js";

interface ConfigOptions {
  coordinator?: string;
  keyPath?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  let config = await loadConfig();
  let changed = false;

  if (opts.coordinator) {
    config = withPrimaryCoordinator(config, opts.coordinator);
    changed = true;
  }
  if (opts.keyPath) {
    config = { ...config, keyPath: opts.keyPath };
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  coordinators: ${config.coordinators.join(", ") || "(none)"}`);
  console.log(`  keyPath:      ${config.keyPath}`);
}
