/**
 * Frozen pool constants.
 *
 * FROZEN constants never change — changing one changes the meaning of
 * every stored balance and every signed action.
 * TUNABLE values live in coordinator config and are passed in at construction.
 */

// ── Frozen (never change) ──────────────────────────────────────────
export const BPS_DENOMINATOR = 10_000n;
export const MAX_FEE_BPS = 2_000; // 20% hard ceiling on the operator fee
export const SIGNATURE_LENGTH = 65; // r (32) ‖ s (32) ‖ v (1)
export const ACTION_VERSION = 1;

/** Largest value an epoch counter or epoch identifier may take (uint64). */
export const MAX_EPOCH = 2n ** 64n - 1n;

/** Largest amount the ledger will custody (uint256). */
export const MAX_AMOUNT = 2n ** 256n - 1n;

// ── Authentication markers (4-byte, returned as data, never thrown) ─
export const AUTH_MAGIC_VALUE = "0x1626ba7e";
export const AUTH_INVALID_VALUE = "0xffffffff";

// ── Identity ───────────────────────────────────────────────────────
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

// ── Tiers (pool balance, 18-decimal base units) ────────────────────
const WHOLE_TOKEN = 10n ** 18n;
export const TIER_THRESHOLDS: readonly bigint[] = [
  25_000_000n * WHOLE_TOKEN,
  50_000_000n * WHOLE_TOKEN,
  100_000_000n * WHOLE_TOKEN,
];

// ── Tunable defaults ───────────────────────────────────────────────
export const DEFAULT_FEE_BPS = 500; // 5%
export const WITHDRAWAL_DELAY_EPOCHS = 1n;
export const ACTIVATION_DELAY_EPOCHS = 1n;
