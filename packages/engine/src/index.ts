/**
 * @stakepool/engine — pooled custody with epoch-gated activation.
 *
 * StakePool is the only stateful entry point. The component modules are
 * exported for tests and tooling that want to drive the ledger directly.
 */

export {
  StakePool,
  type StakePoolOptions,
  type EpochResult,
  type ClaimResult,
} from "./pool.js";

export {
  PoolError,
  isPoolError,
  hasPoolErrorCode,
  type PoolErrorCode,
  type PoolErrorCategory,
} from "./errors.js";

export type { PoolEvent, PoolEventType, PoolEventSink } from "./events.js";
export type { ParticipantView, PoolView } from "./views.js";
export type { AuthMarker } from "./authenticator.js";
export type { PendingBatch } from "./deposit-ledger.js";
export type { EmergencySweep, Release } from "./withdrawal-queue.js";
export type { Distribution } from "./reward-distributor.js";
export type { EpochSummary } from "./epoch-processor.js";
export {
  createState,
  totalLiabilities,
  type PoolState,
  type ParticipantRecord,
  type PendingWithdrawal,
} from "./state.js";
export { audit } from "./invariants.js";
