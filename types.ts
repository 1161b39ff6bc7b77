/**
 * Contribution Stake Protocol - Core Types
 *
 * Escrow bookkeeping for crowd-sourced training data: who submitted what,
 * how much is still claimable, and who has already claimed.
 */

/** Checksummed EVM address */
export type Address = string;

/** 0x-prefixed keccak256 commitment of (sample, label, submissionTime, submitter) */
export type ContributionKey = string;

/** Class label, uint64 domain */
export type Label = number;

/** Unix time in whole seconds, always supplied by the caller */
export type Timestamp = number;

/**
 * The identifying tuple every lookup re-validates against the stored record
 */
export interface ContributionRef {
  label: Label;
  submissionTime: Timestamp;
  submitter: Address;
}

/**
 * Read-only view of a ledger record
 */
export interface Contribution extends ContributionRef {
  key: ContributionKey;
  initialDeposit: bigint;
  claimableAmount: bigint;
  numClaims: number;
  claimedBy: readonly Address[];
}

/**
 * Values read by Ledger.claimRefund before it drains the record
 */
export interface RefundClaim {
  claimableAmount: bigint;
  alreadyClaimed: boolean;
  numClaims: number;
}

/**
 * Values read by Ledger.claimReport; claimableAmount is debited separately
 */
export interface ReportClaim {
  key: ContributionKey;
  initialDeposit: bigint;
  claimableAmount: bigint;
  alreadyClaimed: boolean;
  numClaims: number;
}

export interface AddressStats {
  numValid: number;
}

export interface GlobalCounters {
  totalSubmitted: number;
  totalGoodDataCount: number;
}

/**
 * Claim windows in seconds since submission.
 * refundWaitTime <= ownerClaimWaitTime <= anyAddressClaimWaitTime
 */
export interface ClaimTimings {
  refundWaitTime: number;
  ownerClaimWaitTime: number;
  anyAddressClaimWaitTime: number;
}

/**
 * Which rule granted a report reward
 * - owner-sweep: owner collecting after ownerClaimWaitTime
 * - open-sweep: anyone collecting after anyAddressClaimWaitTime
 * - merit: reporter with validated contributions showing the model disagrees
 */
export type ReportTier = 'owner-sweep' | 'open-sweep' | 'merit';

export interface ReportAdjudication {
  rewardAmount: bigint;
  tier: ReportTier;
  /** true when the merit split was replaced by the claimable amount */
  clamped: boolean;
}

/**
 * A sample and its label, handed to content-aware pricing policies
 */
export interface LabeledSample<TSample> {
  sample: TSample;
  label: Label;
}
