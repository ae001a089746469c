/**
 * Pool errors — one class, a closed set of codes.
 *
 * Every failure the engine can produce is a PoolError with a readonly
 * `code` discriminant. Each code belongs to exactly one category; the
 * coordinator maps categories to HTTP statuses.
 * A PoolError is always raised before any state change is kept: the
 * surrounding operation rolls back.
 */

export type PoolErrorCategory =
  | "validation"
  | "authorization"
  | "balance"
  | "external"
  | "invariant";

const CATEGORIES = {
  InvalidAmount: "validation",
  InvalidAddress: "validation",
  InvalidFee: "validation",
  FeeTooHigh: "validation",
  InvalidSignatureLength: "validation",
  EpochOutOfRange: "validation",
  Unauthorized: "authorization",
  NotPendingOperator: "authorization",
  Paused: "authorization",
  InsufficientBalance: "balance",
  NoRewards: "balance",
  NothingToRelease: "invariant",
  WithdrawalNotMature: "invariant",
  Reentrancy: "invariant",
  TransferFailed: "external",
  ClaimFailed: "external",
  SubmitFailed: "external",
  OracleFailed: "external",
} as const satisfies Record<string, PoolErrorCategory>;

export type PoolErrorCode = keyof typeof CATEGORIES;

export class PoolError extends Error {
  public readonly category: PoolErrorCategory;

  constructor(
    public readonly code: PoolErrorCode,
    message: string,
    public readonly detail: Record<string, string> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PoolError";
    this.category = CATEGORIES[code];
  }
}

export function isPoolError(error: unknown): error is PoolError {
  return error instanceof PoolError;
}

export function hasPoolErrorCode(error: unknown, code: PoolErrorCode): boolean {
  return isPoolError(error) && error.code === code;
}
