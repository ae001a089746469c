/**
 * Event log schemas — append-only record of committed pool events.
 *
 * Every committed engine mutation lands here with amounts as decimal
 * strings. Anyone can replay the log and reconstruct the ledger.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hash32 } from "@stakepool/physics";

/** Base envelope for all logged events. */
export const EventEnvelope = Type.Object({
  /** Monotonic sequence number within the log, from 0. */
  seq: Type.Integer({ minimum: 0 }),
  /** Engine event type (deposit, withdrawal.requested, …). */
  type: Type.String(),
  /** Event timestamp (ms since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Digest of the signed action that caused it; null for unsigned triggers. */
  action_id: Type.Union([Hash32, Type.Null()]),
  /** Event-specific payload; bigints as decimal strings. */
  payload: Type.Record(Type.String(), Type.Unknown()),
});

export type EventEnvelope = Static<typeof EventEnvelope>;
