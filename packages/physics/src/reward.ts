/**
 * Reward computation — operator fee and pro-rata allocation.
 *
 * operatorFee     = floor(totalReward × feeBps / 10_000)
 * depositorReward = totalReward − operatorFee
 * share(p)        = floor(depositorReward × stake(p) / totalStake)
 *
 * Per-participant floor division leaves dust < number of participants.
 * Dust is not allocated to anyone; it stays in custody.
 */

import { BPS_DENOMINATOR, MAX_FEE_BPS } from "./constants.js";

export interface RewardSplit {
  operatorFee: bigint;
  depositorReward: bigint;
}

export interface StakeEntry<K> {
  key: K;
  stake: bigint;
}

export interface Allocation<K> {
  shares: Array<{ key: K; share: bigint }>;
  /** Sum of all shares. */
  distributed: bigint;
  /** amount − distributed (floor-division residue). */
  dust: bigint;
}

/** Fee must be an integer in [0, MAX_FEE_BPS]. */
export function isValidFeeBps(feeBps: number): boolean {
  return Number.isInteger(feeBps) && feeBps >= 0 && feeBps <= MAX_FEE_BPS;
}

export function computeOperatorFee(totalReward: bigint, feeBps: number): bigint {
  if (totalReward <= 0n) return 0n;
  return (totalReward * BigInt(feeBps)) / BPS_DENOMINATOR;
}

export function splitReward(totalReward: bigint, feeBps: number): RewardSplit {
  const operatorFee = computeOperatorFee(totalReward, feeBps);
  return { operatorFee, depositorReward: totalReward - operatorFee };
}

/** floor(amount × stake / totalStake); zero when there is no stake. */
export function proRataShare(amount: bigint, stake: bigint, totalStake: bigint): bigint {
  if (totalStake <= 0n || stake <= 0n || amount <= 0n) return 0n;
  return (amount * stake) / totalStake;
}

/**
 * Allocate `amount` across entries proportionally to stake.
 * Entries with zero stake get a zero share (and are still listed).
 * `totalStake` is taken from the caller so the ledger's own aggregate is
 * the denominator, not a recomputed sum.
 */
export function allocateProRata<K>(
  amount: bigint,
  entries: readonly StakeEntry<K>[],
  totalStake: bigint,
): Allocation<K> {
  let distributed = 0n;
  const shares = entries.map((e) => {
    const share = proRataShare(amount, e.stake, totalStake);
    distributed += share;
    return { key: e.key, share };
  });
  return { shares, distributed, dust: amount - distributed };
}
