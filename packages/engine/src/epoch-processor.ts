/**
 * Epoch processor — promote due pending deposits to locked.
 *
 * Idempotent and monotonic: for an oracle value E ≤ lastProcessedEpoch it
 * does nothing, so repeated or redundant calls converge to the same state.
 * Every epoch-sensitive operation runs this first.
 */

import type { PoolState } from "./state.js";

export interface EpochSummary {
  epoch: bigint;
  previousEpoch: bigint;
  promotedParticipants: number;
  promotedAmount: bigint;
}

/**
 * Advance the cursor to `epoch`, promoting every pending batch whose
 * lockEpoch ≤ epoch. Returns null when the cursor is already at or past it.
 */
export function processEpoch(state: PoolState, epoch: bigint): EpochSummary | null {
  if (epoch <= state.lastProcessedEpoch) return null;

  let promotedParticipants = 0;
  let promotedAmount = 0n;

  // Only active participants can hold pending balance.
  for (const who of state.roster) {
    const record = state.participants.get(who);
    if (!record || record.pendingAmount === 0n || record.lockEpoch > epoch) continue;
    state.journal.saveRecord(state, who);

    const amount = record.pendingAmount;
    record.lockedAmount += amount;
    record.pendingAmount = 0n;
    state.totalLocked += amount;
    state.totalPending -= amount;

    promotedParticipants++;
    promotedAmount += amount;
  }

  const previousEpoch = state.lastProcessedEpoch;
  state.lastProcessedEpoch = epoch;
  return { epoch, previousEpoch, promotedParticipants, promotedAmount };
}

/**
 * The epoch operations should act on. Never behind the cursor, even if
 * the oracle misbehaves and reports a smaller value.
 */
export function effectiveEpoch(state: PoolState, oracleEpoch: bigint): bigint {
  return oracleEpoch > state.lastProcessedEpoch ? oracleEpoch : state.lastProcessedEpoch;
}
