/**
 * Tier derivation.
 *
 * tier = number of TIER_THRESHOLDS the pool balance meets or exceeds (0–3).
 * The pool exists to cross these thresholds collectively.
 */

import { TIER_THRESHOLDS } from "./constants.js";

export function tierForBalance(
  balance: bigint,
  thresholds: readonly bigint[] = TIER_THRESHOLDS,
): number {
  let tier = 0;
  for (const threshold of thresholds) {
    if (balance >= threshold) tier++;
  }
  return tier;
}

/** Balance still missing to reach the next tier, or null at the top tier. */
export function amountToNextTier(
  balance: bigint,
  thresholds: readonly bigint[] = TIER_THRESHOLDS,
): bigint | null {
  for (const threshold of thresholds) {
    if (balance < threshold) return threshold - balance;
  }
  return null;
}
