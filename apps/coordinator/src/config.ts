/**
 * Coordinator configuration.
 */

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("COORDINATOR_PORT", "3102"), 10),
  host: env("COORDINATOR_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Custody identity of the pool on the asset ledger. */
  poolAddress: env("POOL_ADDRESS", "0x0000000000000000000000000000000000005001"),
  /** Initial operator. Read lazily: only `listen` requires it. */
  operator: (): string => env("POOL_OPERATOR"),
  /** Initial operator fee in basis points (0–2000). Default: 500. */
  feeBps: parseInt(env("POOL_FEE_BPS", "500"), 10),
  /** Epoch scheduler interval (ms). 0 = disabled. Default: 60000. */
  epochSchedulerIntervalMs: parseInt(env("EPOCH_SCHEDULER_INTERVAL_MS", "60000"), 10),
  /** Expose /dev/* routes that drive the mock chain. Default: true. */
  devMode: env("DEV_MODE", "true") === "true",
} as const;
