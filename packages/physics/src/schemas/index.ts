/**
 * Schema barrel export.
 * All V1 wire types used across the pool.
 */

export {
  AddressString,
  UintString,
  Hash32,
  HexBytes,
} from "./common.js";

export { ActionV1, ActionKind } from "./action.js";

export {
  ParticipantSnapshotV1,
  WithdrawalRecordV1,
} from "./participant.js";

export { PoolSnapshotV1 } from "./pool.js";
