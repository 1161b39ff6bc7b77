/**
 * Incentive Engine
 *
 * Prices new submissions and adjudicates refund and report claims.
 *
 * Owns pricing/timing state plus the per-address and global counters that
 * weight merit rewards. It never touches ledger records: the orchestrator passes
 * in what the ledger returned and applies the verdict afterwards
 * (adjudicate → Ledger.debit → transfer).
 *
 * Report tiers, checked in order:
 * - owner-sweep: owner, at least ownerClaimWaitTime after submission → whole balance
 * - open-sweep:  anyone, at least anyAddressClaimWaitTime after submission → whole balance
 * - merit:       reporter with validated contributions, model disagrees → deposit share
 */

import { EconomicError, IncentiveError, TimingError, ValidationError, describeError } from './errors';
import { CostCurve, MeritRewardSplit, RewardSplit, TimeDecayCostCurve } from './IncentivePolicies';
import {
  Address,
  AddressStats,
  ClaimTimings,
  GlobalCounters,
  LabeledSample,
  Label,
  ReportAdjudication,
  Timestamp,
} from './types';
import { ILogger, scopedLogger } from './utils/ILogger';
import { assertUint256 } from './utils/IntegerMath';
import { OwnershipGate } from './utils/OwnershipGate';
import { assertLabel, assertTimestamp, normalizeAddress, sameAddress } from './utils/addresses';

export interface IncentiveEngineConfig<TSample> {
  /** Identity allowed to call the mutating entry points */
  orchestrator: Address;
  /** Address eligible for owner sweeps */
  owner: Address;
  costWeight: bigint;
  timings: ClaimTimings;
  /** Starting point of the cost curve */
  deployedAt: Timestamp;
  costCurve?: CostCurve<TSample>;
  rewardSplit?: RewardSplit;
}

export interface RefundAdjudicationInput {
  claimant: Address;
  submissionTime: Timestamp;
  currentTime: Timestamp;
  claimableAmount: bigint;
  alreadyClaimed: boolean;
  prediction: Label;
  label: Label;
}

export interface ReportAdjudicationInput {
  reporter: Address;
  submissionTime: Timestamp;
  currentTime: Timestamp;
  originalAuthor: Address;
  initialDeposit: bigint;
  claimableAmount: bigint;
  alreadyClaimed: boolean;
  prediction: Label;
  label: Label;
}

/**
 * Reject timings that are not whole seconds or not ordered refund <= owner <= anyAddress
 */
export function validateClaimTimings(timings: ClaimTimings): ClaimTimings {
  const errors: string[] = [];
  const fields: (keyof ClaimTimings)[] = ['refundWaitTime', 'ownerClaimWaitTime', 'anyAddressClaimWaitTime'];
  for (const field of fields) {
    const value = timings[field];
    if (!Number.isSafeInteger(value) || value < 0) {
      errors.push(`${field} must be a non-negative integer number of seconds`);
    }
  }
  if (timings.refundWaitTime > timings.ownerClaimWaitTime) {
    errors.push('refundWaitTime must not exceed ownerClaimWaitTime');
  }
  if (timings.ownerClaimWaitTime > timings.anyAddressClaimWaitTime) {
    errors.push('ownerClaimWaitTime must not exceed anyAddressClaimWaitTime');
  }
  if (errors.length > 0) {
    throw new ValidationError('INVALID_CONFIG', `Invalid claim timings: ${errors.join('; ')}`, { errors });
  }
  return {
    refundWaitTime: timings.refundWaitTime,
    ownerClaimWaitTime: timings.ownerClaimWaitTime,
    anyAddressClaimWaitTime: timings.anyAddressClaimWaitTime,
  };
}

export class IncentiveEngine<TSample = unknown> {
  private logger: ILogger;
  private gate: OwnershipGate;
  private readonly owner: Address;
  private readonly costWeight: bigint;
  private readonly timings: ClaimTimings;
  private readonly costCurve: CostCurve<TSample>;
  private readonly rewardSplit: RewardSplit;
  private lastUpdateTime: Timestamp;
  private addressStats: Map<Address, AddressStats> = new Map();
  private counters: GlobalCounters = { totalSubmitted: 0, totalGoodDataCount: 0 };

  constructor(logger: ILogger, config: IncentiveEngineConfig<TSample>) {
    this.logger = scopedLogger(logger, 'IncentiveEngine');
    this.timings = validateClaimTimings(config.timings);
    this.costWeight = assertUint256(config.costWeight, 'costWeight');
    this.owner = normalizeAddress(config.owner, 'owner');
    this.lastUpdateTime = assertTimestamp(config.deployedAt, 'deployedAt');
    this.costCurve = config.costCurve ?? new TimeDecayCostCurve();
    this.rewardSplit = config.rewardSplit ?? new MeritRewardSplit();
    this.gate = new OwnershipGate(config.orchestrator, 'IncentiveEngine', this.logger);

    this.logger.info('Incentive engine configured', {
      owner: this.owner,
      costWeight: this.costWeight.toString(),
      costCurve: this.costCurve.name,
      rewardSplit: this.rewardSplit.name,
      ...this.timings,
    });
  }

  /**
   * Price of the next submission at currentTime
   */
  quoteCost(currentTime: Timestamp, contribution?: LabeledSample<TSample>): bigint {
    assertTimestamp(currentTime, 'currentTime');
    if (this.costWeight === 0n) {
      return 0n;
    }
    this.assertNoClockRegression(currentTime);
    return this.costCurve.quote({
      costWeight: this.costWeight,
      elapsedSeconds: currentTime - this.lastUpdateTime,
      contribution,
    });
  }

  /**
   * Charge a submission: the payment must cover the quote, and the quote resets from currentTime.
   * Returns the cost, which becomes the contribution's deposit; any excess belongs to the submitter.
   */
  chargeForSubmission(
    caller: Address,
    paidAmount: bigint,
    currentTime: Timestamp,
    contribution?: LabeledSample<TSample>
  ): bigint {
    this.gate.assertHolder(caller, 'chargeForSubmission');
    assertUint256(paidAmount, 'paidAmount');
    assertTimestamp(currentTime, 'currentTime');
    this.assertNoClockRegression(currentTime);

    const cost = this.quoteCost(currentTime, contribution);
    if (paidAmount < cost) {
      throw this.reject(
        new EconomicError('INSUFFICIENT_PAYMENT', "Didn't pay enough for the deposit", {
          paidAmount: paidAmount.toString(),
          cost: cost.toString(),
        })
      );
    }

    this.lastUpdateTime = currentTime;
    this.counters = { ...this.counters, totalSubmitted: this.counters.totalSubmitted + 1 };
    this.logger.debug('Submission charged', {
      cost: cost.toString(),
      paidAmount: paidAmount.toString(),
      totalSubmitted: this.counters.totalSubmitted,
    });
    return cost;
  }

  /**
   * Decide a refund claim. On success the claimant earns one validated contribution.
   */
  adjudicateRefund(caller: Address, input: RefundAdjudicationInput): bigint {
    this.gate.assertHolder(caller, 'adjudicateRefund');
    const claimant = normalizeAddress(input.claimant, 'claimant');
    assertUint256(input.claimableAmount, 'claimableAmount');
    const elapsed = this.elapsedSince(input.submissionTime, input.currentTime);
    const context = { claimant, submissionTime: input.submissionTime, currentTime: input.currentTime };

    if (input.alreadyClaimed) {
      throw this.reject(new EconomicError('ALREADY_CLAIMED', 'Deposit already claimed by submitter', context));
    }
    if (input.claimableAmount === 0n) {
      throw this.reject(new EconomicError('NOTHING_TO_CLAIM', 'There is no reward left to claim', context));
    }
    if (elapsed < this.timings.refundWaitTime) {
      throw this.reject(
        new TimingError('TOO_EARLY', 'Not enough time has passed', {
          ...context,
          elapsed,
          requiredWait: this.timings.refundWaitTime,
        })
      );
    }
    if (assertLabel(input.prediction, 'prediction') !== assertLabel(input.label)) {
      throw this.reject(
        new EconomicError('MODEL_DISAGREES', "The model doesn't agree with your contribution", {
          ...context,
          prediction: input.prediction,
          label: input.label,
        })
      );
    }

    const stats = this.getAddressStats(claimant);
    this.addressStats.set(claimant, { numValid: stats.numValid + 1 });
    this.counters = { ...this.counters, totalGoodDataCount: this.counters.totalGoodDataCount + 1 };

    this.logger.info('Refund approved', {
      claimant,
      refundAmount: input.claimableAmount.toString(),
      numValid: stats.numValid + 1,
      totalGoodDataCount: this.counters.totalGoodDataCount,
    });
    return input.claimableAmount;
  }

  /**
   * Decide a report claim and the reward it earns
   */
  adjudicateReport(caller: Address, input: ReportAdjudicationInput): ReportAdjudication {
    this.gate.assertHolder(caller, 'adjudicateReport');
    const reporter = normalizeAddress(input.reporter, 'reporter');
    const originalAuthor = normalizeAddress(input.originalAuthor, 'originalAuthor');
    assertUint256(input.initialDeposit, 'initialDeposit');
    assertUint256(input.claimableAmount, 'claimableAmount');
    const elapsed = this.elapsedSince(input.submissionTime, input.currentTime);
    const context = { reporter, originalAuthor, submissionTime: input.submissionTime, currentTime: input.currentTime };

    if (input.claimableAmount === 0n) {
      throw this.reject(new EconomicError('NOTHING_TO_CLAIM', 'There is no reward left to claim', context));
    }

    if (elapsed >= this.timings.ownerClaimWaitTime && sameAddress(reporter, this.owner)) {
      return this.approveReport({ rewardAmount: input.claimableAmount, tier: 'owner-sweep', clamped: false }, context);
    }
    if (elapsed >= this.timings.anyAddressClaimWaitTime) {
      return this.approveReport({ rewardAmount: input.claimableAmount, tier: 'open-sweep', clamped: false }, context);
    }

    if (reporter === originalAuthor) {
      throw this.reject(new EconomicError('SELF_REPORT', 'Cannot report your own contribution', context));
    }
    if (input.alreadyClaimed) {
      throw this.reject(new EconomicError('ALREADY_CLAIMED', 'Deposit already claimed by reporter', context));
    }
    if (elapsed < this.timings.refundWaitTime) {
      throw this.reject(
        new TimingError('TOO_EARLY', 'Cannot report until the refund wait time has passed', {
          ...context,
          elapsed,
          requiredWait: this.timings.refundWaitTime,
        })
      );
    }
    if (assertLabel(input.prediction, 'prediction') === assertLabel(input.label)) {
      throw this.reject(
        new EconomicError('MODEL_AGREES', 'The model should not agree with the contribution', {
          ...context,
          prediction: input.prediction,
        })
      );
    }
    const reporterNumValid = this.getAddressStats(reporter).numValid;
    if (reporterNumValid === 0) {
      throw this.reject(new EconomicError('NO_STANDING', 'The reporter has not contributed any good data', context));
    }

    const split = this.rewardSplit.split({
      initialDeposit: input.initialDeposit,
      reporterNumValid,
      totalGoodDataCount: this.counters.totalGoodDataCount,
    });
    if (split === 0n || split > input.claimableAmount) {
      this.logger.warn('Merit reward clamped to claimable amount', {
        ...context,
        split: split.toString(),
        claimableAmount: input.claimableAmount.toString(),
      });
      return this.approveReport({ rewardAmount: input.claimableAmount, tier: 'merit', clamped: true }, context);
    }
    return this.approveReport({ rewardAmount: split, tier: 'merit', clamped: false }, context);
  }

  getAddressStats(address: Address): AddressStats {
    const stats = this.addressStats.get(normalizeAddress(address, 'address'));
    return { numValid: stats?.numValid ?? 0 };
  }

  getCounters(): GlobalCounters {
    return { ...this.counters };
  }

  getTimings(): ClaimTimings {
    return { ...this.timings };
  }

  getCostWeight(): bigint {
    return this.costWeight;
  }

  getLastUpdateTime(): Timestamp {
    return this.lastUpdateTime;
  }

  getOwner(): Address {
    return this.owner;
  }

  getOrchestrator(): Address {
    return this.gate.getHolder();
  }

  transferOrchestrator(caller: Address, next: Address): void {
    this.gate.transfer(caller, next);
  }

  private approveReport(
    adjudication: ReportAdjudication,
    context: Record<string, unknown>
  ): ReportAdjudication {
    this.logger.info('Report approved', {
      ...context,
      tier: adjudication.tier,
      rewardAmount: adjudication.rewardAmount.toString(),
      clamped: adjudication.clamped,
    });
    return adjudication;
  }

  private assertNoClockRegression(currentTime: Timestamp): void {
    if (currentTime < this.lastUpdateTime) {
      throw this.reject(
        new TimingError('CLOCK_REGRESSION', 'Current time is earlier than the last recorded update', {
          currentTime,
          lastUpdateTime: this.lastUpdateTime,
        })
      );
    }
  }

  private elapsedSince(submissionTime: Timestamp, currentTime: Timestamp): number {
    assertTimestamp(submissionTime, 'submissionTime');
    assertTimestamp(currentTime, 'currentTime');
    this.assertNoClockRegression(currentTime);
    if (currentTime < submissionTime) {
      throw this.reject(
        new TimingError('CLOCK_REGRESSION', 'Current time is earlier than the submission time', {
          currentTime,
          submissionTime,
        })
      );
    }
    return currentTime - submissionTime;
  }

  private reject<E extends IncentiveError>(error: E): E {
    this.logger.warn('Request rejected', { ...error.details, ...describeError(error) });
    return error;
  }
}
