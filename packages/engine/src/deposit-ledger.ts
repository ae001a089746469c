/**
 * Deposit ledger — credit deposits as pending.
 *
 * A deposit made during epoch E targets lockEpoch = E + 1. A participant
 * has at most one pending batch: a new deposit merges into it and the
 * batch takes the later target epoch.
 */

import { activationEpoch, type Address } from "@stakepool/physics";
import type { PoolState } from "./state.js";
import { activate, getOrCreateRecord } from "./roster.js";

export interface PendingBatch {
  participant: Address;
  amount: bigint;
  /** Total pending after the merge. */
  pendingAmount: bigint;
  lockEpoch: bigint;
}

/**
 * Record `amount` as pending for `who`. Caller has already synchronized
 * the epoch, so any batch due at or before `epoch` has been promoted.
 */
export function creditDeposit(
  state: PoolState,
  who: Address,
  amount: bigint,
  epoch: bigint,
): PendingBatch {
  const record = getOrCreateRecord(state, who);
  const target = activationEpoch(epoch);

  record.pendingAmount += amount;
  record.lockEpoch = record.lockEpoch > target ? record.lockEpoch : target;
  state.totalPending += amount;
  activate(state, who, record);

  return {
    participant: who,
    amount,
    pendingAmount: record.pendingAmount,
    lockEpoch: record.lockEpoch,
  };
}
