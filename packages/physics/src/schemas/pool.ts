/**
 * Pool snapshot — pool-wide read model.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressString, UintString } from "./common.js";

export const PoolSnapshotV1 = Type.Object(
  {
    pool_address: AddressString,
    operator: AddressString,
    pending_operator: Type.Union([AddressString, Type.Null()]),
    fee_bps: Type.Integer({ minimum: 0, maximum: 2000 }),
    paused: Type.Boolean(),
    current_epoch: UintString,
    last_processed_epoch: UintString,
    total_locked: UintString,
    total_pending: UintString,
    total_unclaimed_reward: UintString,
    total_queued_withdrawal: UintString,
    carried_reward: UintString,
    total_fee_owed: UintString,
    balance: UintString,
    /** balance − liabilities: rounding dust plus anything sent to the pool unsolicited. */
    surplus: UintString,
    tier: Type.Integer({ minimum: 0, maximum: 3 }),
    depositor_count: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type PoolSnapshotV1 = Static<typeof PoolSnapshotV1>;
