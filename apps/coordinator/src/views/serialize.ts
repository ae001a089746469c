/**
 * Engine views → V1 wire objects. Amounts and epochs become decimal
 * strings; keys become snake_case.
 */

import type { ParticipantView, PoolEvent, PoolView } from "@stakepool/engine";
import type { ParticipantSnapshotV1, PoolSnapshotV1 } from "@stakepool/physics";

export function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`).replace(/^_/, "");
}

function jsonSafe(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(jsonSafe);
  return value;
}

/** Event fields minus `type`, JSON-safe. */
export function eventPayload(event: PoolEvent): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type") continue;
    out[snakeCase(key)] = jsonSafe(value);
  }
  return out;
}

export function participantToWire(view: ParticipantView): ParticipantSnapshotV1 {
  return {
    address: view.address,
    locked_amount: view.lockedAmount.toString(),
    pending_amount: view.pendingAmount.toString(),
    lock_epoch: view.lockEpoch.toString(),
    unclaimed_reward: view.unclaimedReward.toString(),
    queued_withdrawal: view.queuedWithdrawal.toString(),
    active: view.active,
    withdrawals: view.withdrawals.map((w) => ({
      id: w.id.toString(),
      owner: w.owner,
      amount: w.amount.toString(),
      available_epoch: w.availableEpoch.toString(),
    })),
    fee_owed: view.feeOwed.toString(),
  };
}

export function poolToWire(view: PoolView): PoolSnapshotV1 {
  return {
    pool_address: view.poolAddress,
    operator: view.operator,
    pending_operator: view.pendingOperator,
    fee_bps: view.feeBps,
    paused: view.paused,
    current_epoch: view.currentEpoch.toString(),
    last_processed_epoch: view.lastProcessedEpoch.toString(),
    total_locked: view.totalLocked.toString(),
    total_pending: view.totalPending.toString(),
    total_unclaimed_reward: view.totalUnclaimedReward.toString(),
    total_queued_withdrawal: view.totalQueuedWithdrawal.toString(),
    carried_reward: view.carriedReward.toString(),
    total_fee_owed: view.totalFeeOwed.toString(),
    balance: view.balance.toString(),
    surplus: view.surplus.toString(),
    tier: view.tier,
    depositor_count: view.depositorCount,
  };
}
