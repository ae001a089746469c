/**
 * @stakepool/physics — Frozen pool primitives.
 *
 * This package contains ONLY frozen math, codecs and versioned schemas.
 * It has no business logic, no I/O, no state.
 * Everything else in the monorepo imports from here, never the reverse.
 */

// Frozen primitives
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export { fromHex, toHex, isHex, keccak256, type Hex } from "./hash.js";
export {
  isAddress,
  normalizeAddress,
  isZeroAddress,
  type Address,
} from "./address.js";
export {
  isDecimalString,
  parseAmount,
  parseEpoch,
  isValidEpoch,
  formatUnits,
  parseUnits,
} from "./units.js";

// Epoch utilities
export { activationEpoch, releaseEpoch, isDue } from "./epoch.js";

// Reward computation
export {
  isValidFeeBps,
  computeOperatorFee,
  splitReward,
  proRataShare,
  allocateProRata,
  type RewardSplit,
  type StakeEntry,
  type Allocation,
} from "./reward.js";

// Tiers
export { tierForBalance, amountToNextTier } from "./tier.js";

// secp256k1 recoverable signatures
export {
  generatePrivateKey,
  addressFromPublicKey,
  addressFromPrivateKey,
  normalizeRecoveryId,
  splitSignature,
  signDigest,
  recoverAddress,
  verifyDigestSignature,
  type SignatureParts,
} from "./signature.js";

// ActionV1 operations (construct, sign, recover, verify)
export {
  actionSigningPayload,
  actionDigest,
  computeActionId,
  signAction,
  recoverActionSigner,
  verifyAction,
  type UnsignedAction,
} from "./action.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
