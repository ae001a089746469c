/**
 * Amount and epoch codecs.
 *
 * Amounts and epochs are bigint in memory and decimal strings on the wire;
 * JSON numbers lose precision past 2^53 and are never accepted.
 */

import { MAX_AMOUNT, MAX_EPOCH } from "./constants.js";

const DECIMAL_RE = /^(0|[1-9][0-9]*)$/;

export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_RE.test(value);
}

/**
 * Parse a decimal string into a uint256 amount.
 * @throws on malformed input or overflow
 */
export function parseAmount(value: string): bigint {
  if (!isDecimalString(value)) {
    throw new Error(`Invalid amount: must be a decimal integer string. Got: ${value}`);
  }
  const amount = BigInt(value);
  if (amount > MAX_AMOUNT) throw new Error(`Amount exceeds uint256: ${value}`);
  return amount;
}

/**
 * Parse a decimal string into a uint64 epoch.
 * @throws on malformed input or overflow
 */
export function parseEpoch(value: string): bigint {
  if (!isDecimalString(value)) {
    throw new Error(`Invalid epoch: must be a decimal integer string. Got: ${value}`);
  }
  const epoch = BigInt(value);
  if (epoch > MAX_EPOCH) throw new Error(`Epoch exceeds uint64: ${value}`);
  return epoch;
}

export function isValidEpoch(epoch: bigint): boolean {
  return epoch >= 0n && epoch <= MAX_EPOCH;
}

/**
 * Format base units as a whole-token decimal string (18 decimals by default).
 * Trailing fractional zeros are trimmed: 1500000000000000000n → "1.5".
 */
export function formatUnits(amount: bigint, decimals = 18): string {
  const base = 10n ** BigInt(decimals);
  const whole = amount / base;
  const frac = amount % base;
  if (frac === 0n) return whole.toString();
  const fracStr = frac.toString().padStart(decimals, "0").replace(/0+$/, "");
  return `${whole}.${fracStr}`;
}

/**
 * Parse a whole-token decimal ("1.5") into base units.
 * @throws on malformed input or more fractional digits than `decimals`
 */
export function parseUnits(value: string, decimals = 18): bigint {
  const match = /^([0-9]+)(?:\.([0-9]+))?$/.exec(value);
  if (!match) throw new Error(`Invalid token amount: ${value}`);
  const whole = match[1] ?? "0";
  const frac = match[2] ?? "";
  if (frac.length > decimals) {
    throw new Error(`Too many decimal places (max ${decimals}): ${value}`);
  }
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(frac.padEnd(decimals, "0") || "0");
}
