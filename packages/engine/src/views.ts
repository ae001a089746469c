/**
 * Read-only projections of the ledger. Values are copies; mutating them
 * never touches the pool.
 */

import { tierForBalance, type Address } from "@stakepool/physics";
import { totalLiabilities, type PendingWithdrawal, type PoolState } from "./state.js";
import { queuedAmount, queuedFor } from "./withdrawal-queue.js";

export interface ParticipantView {
  address: Address;
  lockedAmount: bigint;
  pendingAmount: bigint;
  lockEpoch: bigint;
  unclaimedReward: bigint;
  queuedWithdrawal: bigint;
  active: boolean;
  withdrawals: PendingWithdrawal[];
  /** Operator fees accrued to this address and not yet paid out. */
  feeOwed: bigint;
}

export interface PoolView {
  poolAddress: Address;
  operator: Address;
  pendingOperator: Address | null;
  feeBps: number;
  paused: boolean;
  currentEpoch: bigint;
  lastProcessedEpoch: bigint;
  totalLocked: bigint;
  totalPending: bigint;
  totalUnclaimedReward: bigint;
  totalQueuedWithdrawal: bigint;
  carriedReward: bigint;
  totalFeeOwed: bigint;
  /** Asset balance held by the pool address. */
  balance: bigint;
  /** balance − liabilities: rounding dust plus anything sent in unsolicited. */
  surplus: bigint;
  tier: number;
  depositorCount: number;
}

export function participantView(state: PoolState, who: Address): ParticipantView {
  const record = state.participants.get(who);
  return {
    address: who,
    lockedAmount: record?.lockedAmount ?? 0n,
    pendingAmount: record?.pendingAmount ?? 0n,
    lockEpoch: record?.lockEpoch ?? 0n,
    unclaimedReward: record?.unclaimedReward ?? 0n,
    queuedWithdrawal: queuedAmount(state, who),
    active: record?.active ?? false,
    withdrawals: queuedFor(state, who).map((w) => ({ ...w })),
    feeOwed: state.feeOwed.get(who) ?? 0n,
  };
}

export function poolView(state: PoolState, currentEpoch: bigint, balance: bigint): PoolView {
  const liabilities = totalLiabilities(state);
  return {
    poolAddress: state.poolAddress,
    operator: state.operator,
    pendingOperator: state.pendingOperator,
    feeBps: state.feeBps,
    paused: state.paused,
    currentEpoch,
    lastProcessedEpoch: state.lastProcessedEpoch,
    totalLocked: state.totalLocked,
    totalPending: state.totalPending,
    totalUnclaimedReward: state.totalUnclaimedReward,
    totalQueuedWithdrawal: state.totalQueuedWithdrawal,
    carriedReward: state.carriedReward,
    totalFeeOwed: state.totalFeeOwed,
    balance,
    surplus: balance > liabilities ? balance - liabilities : 0n,
    tier: tierForBalance(balance),
    depositorCount: state.roster.length,
  };
}
