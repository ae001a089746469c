/**
 * Reward distributor — split a measured reward and credit locked holders.
 *
 * Only locked stake earns. The operator fee comes off the top; the rest is
 * allocated pro-rata by floor division and the residue stays in custody,
 * untracked. A depositor share that arrives while nothing is locked is
 * carried into the next distribution.
 *
 * The operator fee is booked as owed before any payout is attempted; a
 * refused fee transfer leaves it owed.
 */

import { allocateProRata, splitReward, type Address, type StakeEntry } from "@stakepool/physics";
import { PoolError } from "./errors.js";
import { editRecord } from "./roster.js";
import type { PoolState } from "./state.js";

export interface Distribution {
  totalReward: bigint;
  operatorFee: bigint;
  depositorReward: bigint;
  /** Previously carried reward folded into this distribution. */
  carriedIn: bigint;
  /** Depositor reward held back because nothing was locked. */
  carriedOut: bigint;
  distributed: bigint;
  dust: bigint;
  recipients: number;
}

export function distributeReward(state: PoolState, totalReward: bigint): Distribution {
  const { operatorFee, depositorReward } = splitReward(totalReward, state.feeBps);
  const carriedIn = state.carriedReward;
  const pot = depositorReward + carriedIn;

  if (state.totalLocked === 0n) {
    state.carriedReward = pot;
    return {
      totalReward,
      operatorFee,
      depositorReward,
      carriedIn: 0n,
      carriedOut: depositorReward,
      distributed: 0n,
      dust: 0n,
      recipients: 0,
    };
  }

  const entries: StakeEntry<Address>[] = [];
  for (const who of state.roster) {
    const record = state.participants.get(who);
    if (record && record.lockedAmount > 0n) entries.push({ key: who, stake: record.lockedAmount });
  }

  const allocation = allocateProRata(pot, entries, state.totalLocked);
  let recipients = 0;
  for (const { key, share } of allocation.shares) {
    if (share === 0n) continue;
    const record = editRecord(state, key);
    if (!record) continue;
    record.unclaimedReward += share;
    recipients++;
  }
  state.totalUnclaimedReward += allocation.distributed;
  state.carriedReward = 0n;

  return {
    totalReward,
    operatorFee,
    depositorReward,
    carriedIn,
    carriedOut: 0n,
    distributed: allocation.distributed,
    dust: allocation.dust,
    recipients,
  };
}

/** Zero the caller's accrued reward and return it. */
export function takeUserReward(state: PoolState, who: Address): bigint {
  const record = editRecord(state, who);
  if (!record || record.unclaimedReward === 0n) {
    throw new PoolError("NoRewards", "No unclaimed rewards");
  }
  const amount = record.unclaimedReward;
  record.unclaimedReward = 0n;
  state.totalUnclaimedReward -= amount;
  if (!record.active) state.participants.delete(who);
  return amount;
}

export function feeOwedTo(state: PoolState, who: Address): bigint {
  return state.feeOwed.get(who) ?? 0n;
}

/** Book `amount` as owed to `who`; returns the new balance owed. */
export function accrueOperatorFee(state: PoolState, who: Address, amount: bigint): bigint {
  state.journal.saveFee(state, who);
  const owed = feeOwedTo(state, who) + amount;
  state.feeOwed.set(who, owed);
  state.totalFeeOwed += amount;
  return owed;
}

/** Zero the fee owed to `who` and return it. */
export function takeOperatorFee(state: PoolState, who: Address): bigint {
  const amount = feeOwedTo(state, who);
  if (amount === 0n) {
    throw new PoolError("NoRewards", "No operator fee owed");
  }
  state.journal.saveFee(state, who);
  state.feeOwed.delete(who);
  state.totalFeeOwed -= amount;
  return amount;
}
