/**
 * Epoch scheduler — keeps the pool's epoch cursor fresh.
 *
 * Calls processEpoch() every `checkIntervalMs`. The engine synchronizes
 * lazily before every state-sensitive operation anyway, so the scheduler
 * exists only so that read-only queries do not report a stale cursor.
 *
 * Design:
 *   - processEpoch() is idempotent, so overlapping or redundant ticks are safe
 *   - a tick that fails is reported and the next tick retries
 */

import type { EpochResult, StakePool } from "@stakepool/engine";

export interface SchedulerOptions {
  /** How often to call processEpoch (ms). Default: 60_000 (1 min). */
  checkIntervalMs?: number;
  /** Called when a tick advanced the cursor. */
  onProcess?: (result: EpochResult) => void;
  /** Callback for errors. */
  onError?: (error: unknown) => void;
}

export interface EpochScheduler {
  start(): void;
  stop(): void;
  /** Cursor after the last successful tick that moved it, or null. */
  lastProcessedEpoch(): bigint | null;
  /** Manually trigger a check (useful for testing). */
  tick(): EpochResult | null;
}

const DEFAULT_CHECK_INTERVAL_MS = 60_000; // 1 minute

export function createEpochScheduler(
  pool: StakePool,
  options: SchedulerOptions = {},
): EpochScheduler {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const onProcess = options.onProcess;
  const onError = options.onError ?? ((err) => console.error("[scheduler] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let _lastProcessedEpoch: bigint | null = null;

  function tick(): EpochResult | null {
    try {
      const result = pool.processEpoch();
      if (result) {
        _lastProcessedEpoch = result.epoch;
        if (onProcess) onProcess(result);
      }
      return result;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  return {
    start() {
      if (timer) return; // already running
      timer = setInterval(tick, checkIntervalMs);
      tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    lastProcessedEpoch() {
      return _lastProcessedEpoch;
    },

    tick,
  };
}
