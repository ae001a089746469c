/**
 * Withdrawal queue — request, mature release, emergency sweep.
 *
 * Requested funds leave pending/locked immediately and wait in the queue
 * until `availableEpoch`. Every function here only updates the ledger; the
 * caller performs the transfer afterwards.
 */

import { releaseEpoch, type Address } from "@stakepool/physics";
import { PoolError } from "./errors.js";
import { editRecord, settleActivity } from "./roster.js";
import type { PendingWithdrawal, PoolState } from "./state.js";

export interface WithdrawalRequest {
  withdrawal: PendingWithdrawal;
  fromPending: bigint;
  fromLocked: bigint;
}

export interface Release {
  amount: bigint;
  ids: bigint[];
}

export interface EmergencySweep {
  pending: bigint;
  locked: bigint;
  queued: bigint;
  reward: bigint;
  total: bigint;
}

export function queuedFor(state: PoolState, who: Address): readonly PendingWithdrawal[] {
  return state.withdrawals.get(who) ?? [];
}

export function queuedAmount(state: PoolState, who: Address): bigint {
  let sum = 0n;
  for (const w of queuedFor(state, who)) sum += w.amount;
  return sum;
}

/**
 * Move `amount` out of the caller's pending then locked balance into a new
 * queue record releasable at `epoch + 1`.
 */
export function requestWithdrawal(
  state: PoolState,
  who: Address,
  amount: bigint,
  epoch: bigint,
): WithdrawalRequest {
  const record = editRecord(state, who);
  const available = record ? record.pendingAmount + record.lockedAmount : 0n;
  if (!record || available < amount) {
    throw new PoolError("InsufficientBalance", "Withdrawal exceeds deposited balance", {
      requested: amount.toString(),
      available: available.toString(),
    });
  }

  const fromPending = amount < record.pendingAmount ? amount : record.pendingAmount;
  const fromLocked = amount - fromPending;

  record.pendingAmount -= fromPending;
  record.lockedAmount -= fromLocked;
  state.totalPending -= fromPending;
  state.totalLocked -= fromLocked;

  const withdrawal: PendingWithdrawal = {
    id: state.nextWithdrawalId,
    owner: who,
    amount,
    availableEpoch: releaseEpoch(epoch),
  };
  state.nextWithdrawalId += 1n;
  state.totalQueuedWithdrawal += amount;

  state.journal.saveQueue(state, who);
  const queue = state.withdrawals.get(who);
  if (queue) queue.push(withdrawal);
  else state.withdrawals.set(who, [withdrawal]);

  settleActivity(state, who, record);
  return { withdrawal, fromPending, fromLocked };
}

/**
 * Remove every record with availableEpoch ≤ epoch.
 * @throws NothingToRelease when the caller has no records
 * @throws WithdrawalNotMature when records exist but none is due
 */
export function takeMature(state: PoolState, who: Address, epoch: bigint): Release {
  const queue = state.withdrawals.get(who);
  if (!queue || queue.length === 0) {
    throw new PoolError("NothingToRelease", "No pending withdrawals");
  }

  const due: PendingWithdrawal[] = [];
  const remaining: PendingWithdrawal[] = [];
  for (const w of queue) (w.availableEpoch <= epoch ? due : remaining).push(w);

  if (due.length === 0) {
    let earliest = remaining[0]?.availableEpoch ?? epoch;
    for (const w of remaining) if (w.availableEpoch < earliest) earliest = w.availableEpoch;
    throw new PoolError("WithdrawalNotMature", "No withdrawal is mature yet", {
      current_epoch: epoch.toString(),
      available_epoch: earliest.toString(),
    });
  }

  let amount = 0n;
  for (const w of due) amount += w.amount;

  state.journal.saveQueue(state, who);
  if (remaining.length === 0) state.withdrawals.delete(who);
  else state.withdrawals.set(who, remaining);
  state.totalQueuedWithdrawal -= amount;

  return { amount, ids: due.map((w) => w.id) };
}

/** Zero pending, locked, queued and reward for `who` in one step. */
export function sweepParticipant(state: PoolState, who: Address): EmergencySweep {
  const record = editRecord(state, who);
  const queued = queuedAmount(state, who);

  const pending = record?.pendingAmount ?? 0n;
  const locked = record?.lockedAmount ?? 0n;
  const reward = record?.unclaimedReward ?? 0n;
  const total = pending + locked + queued + reward;
  if (total === 0n) {
    throw new PoolError("NothingToRelease", "Nothing to withdraw");
  }

  if (record) {
    record.pendingAmount = 0n;
    record.lockedAmount = 0n;
    record.unclaimedReward = 0n;
    state.totalPending -= pending;
    state.totalLocked -= locked;
    state.totalUnclaimedReward -= reward;
    settleActivity(state, who, record);
  }
  state.journal.saveQueue(state, who);
  state.withdrawals.delete(who);
  state.totalQueuedWithdrawal -= queued;

  return { pending, locked, queued, reward, total };
}
