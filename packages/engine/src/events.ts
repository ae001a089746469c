/**
 * Pool events — one per committed mutation, published after commit.
 */

import type { Address } from "@stakepool/physics";

export type PoolEvent =
  | {
      type: "deposit";
      participant: Address;
      amount: bigint;
      lockEpoch: bigint;
      pendingAmount: bigint;
    }
  | {
      type: "withdrawal.requested";
      participant: Address;
      id: bigint;
      amount: bigint;
      fromPending: bigint;
      fromLocked: bigint;
      availableEpoch: bigint;
    }
  | { type: "withdrawal.completed"; participant: Address; amount: bigint; ids: bigint[] }
  | {
      type: "withdrawal.emergency";
      participant: Address;
      amount: bigint;
      pending: bigint;
      locked: bigint;
      queued: bigint;
      reward: bigint;
    }
  | {
      type: "epoch.processed";
      epoch: bigint;
      previousEpoch: bigint;
      promotedParticipants: number;
      promotedAmount: bigint;
    }
  | {
      type: "rewards.claimed";
      caller: Address;
      epochIds: bigint[];
      totalReward: bigint;
      operatorFee: bigint;
      depositorReward: bigint;
      distributed: bigint;
      dust: bigint;
      carried: bigint;
      recipients: number;
      feePaid: bigint;
      feeOwed: bigint;
    }
  | { type: "fee.deferred"; operator: Address; amount: bigint; reason: string }
  | { type: "fee.withdrawn"; recipient: Address; amount: bigint }
  | { type: "rewards.withdrawn"; participant: Address; amount: bigint }
  | { type: "work.submitted"; operator: Address; bytes: number }
  | { type: "fee.updated"; previousFeeBps: number; feeBps: number }
  | { type: "operator.proposed"; operator: Address; proposed: Address }
  | { type: "operator.accepted"; previousOperator: Address; operator: Address }
  | { type: "paused"; operator: Address }
  | { type: "unpaused"; operator: Address };

export type PoolEventType = PoolEvent["type"];

export type PoolEventSink = (event: PoolEvent) => void;
