/**
 * Ledger audit — recompute every aggregate from the records.
 * Returns human-readable violations; an empty list means consistent.
 */

import type { PoolState } from "./state.js";

export function audit(state: PoolState): string[] {
  const violations: string[] = [];

  let locked = 0n;
  let pending = 0n;
  let reward = 0n;
  let activeCount = 0;

  for (const [who, record] of state.participants) {
    locked += record.lockedAmount;
    pending += record.pendingAmount;
    reward += record.unclaimedReward;

    if (record.pendingAmount < 0n || record.lockedAmount < 0n || record.unclaimedReward < 0n) {
      violations.push(`${who}: negative balance`);
    }

    const shouldBeActive = record.pendingAmount > 0n || record.lockedAmount > 0n;
    if (record.active !== shouldBeActive) {
      violations.push(`${who}: active=${record.active} but balances say ${shouldBeActive}`);
    }
    if (record.active) {
      activeCount++;
      if (state.roster[record.rosterIndex] !== who) {
        violations.push(`${who}: roster[${record.rosterIndex}] is ${state.roster[record.rosterIndex] ?? "empty"}`);
      }
    } else if (record.rosterIndex !== -1) {
      violations.push(`${who}: inactive with roster index ${record.rosterIndex}`);
    }
  }

  if (activeCount !== state.roster.length) {
    violations.push(`roster length ${state.roster.length} != active participants ${activeCount}`);
  }
  if (new Set(state.roster).size !== state.roster.length) {
    violations.push("roster contains duplicates");
  }

  if (locked !== state.totalLocked) {
    violations.push(`totalLocked ${state.totalLocked} != Σ lockedAmount ${locked}`);
  }
  if (pending !== state.totalPending) {
    violations.push(`totalPending ${state.totalPending} != Σ pendingAmount ${pending}`);
  }
  if (reward !== state.totalUnclaimedReward) {
    violations.push(`totalUnclaimedReward ${state.totalUnclaimedReward} != Σ unclaimedReward ${reward}`);
  }

  let queued = 0n;
  for (const [owner, records] of state.withdrawals) {
    if (records.length === 0) violations.push(`${owner}: empty withdrawal queue kept`);
    for (const w of records) {
      if (w.owner !== owner) violations.push(`withdrawal ${w.id} filed under ${owner}`);
      if (w.amount <= 0n) violations.push(`withdrawal ${w.id} has non-positive amount`);
      queued += w.amount;
    }
  }
  if (queued !== state.totalQueuedWithdrawal) {
    violations.push(`totalQueuedWithdrawal ${state.totalQueuedWithdrawal} != Σ queue ${queued}`);
  }

  let fees = 0n;
  for (const [who, owed] of state.feeOwed) {
    if (owed <= 0n) violations.push(`${who}: non-positive fee owed kept`);
    fees += owed;
  }
  if (fees !== state.totalFeeOwed) {
    violations.push(`totalFeeOwed ${state.totalFeeOwed} != Σ feeOwed ${fees}`);
  }

  return violations;
}
