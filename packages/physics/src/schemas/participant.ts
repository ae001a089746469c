/**
 * Participant snapshots — per-depositor read model.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressString, UintString } from "./common.js";

export const WithdrawalRecordV1 = Type.Object(
  {
    id: UintString,
    owner: AddressString,
    amount: UintString,
    available_epoch: UintString,
  },
  { additionalProperties: false },
);

export type WithdrawalRecordV1 = Static<typeof WithdrawalRecordV1>;

export const ParticipantSnapshotV1 = Type.Object(
  {
    address: AddressString,
    locked_amount: UintString,
    pending_amount: UintString,
    lock_epoch: UintString,
    unclaimed_reward: UintString,
    queued_withdrawal: UintString,
    active: Type.Boolean(),
    withdrawals: Type.Array(WithdrawalRecordV1),
    /** Operator fee credited to this address and not yet paid out. */
    fee_owed: UintString,
  },
  { additionalProperties: false },
);

export type ParticipantSnapshotV1 = Static<typeof ParticipantSnapshotV1>;
