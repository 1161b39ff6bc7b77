/**
 * Collaborative Trainer Service
 *
 * Sequences the ledger, the incentive engine and the classifier for one
 * deployment, and moves value through the IValueTransfer port.
 *
 * Each call awaits its input (the payment for a submission, the prediction for
 * a claim) before touching any state, then reads, adjudicates and commits in one
 * synchronous block, and only then awaits event storage and payouts. Two calls
 * racing on the same contribution are decided by whichever commits first; the
 * ledger never records a deposit that escrow does not hold, and nothing is paid
 * before the ledger reflects it.
 */

import { SampleCodec, commitPacked } from './ContributionCommitment';
import { ContributionLedgerService } from './ContributionLedgerService';
import { IncentiveEngine } from './IncentiveEngine';
import { InvariantChecker } from './InvariantChecker';
import { ValidationError, describeError } from './errors';
import { IClassifier } from './interfaces/IClassifier';
import { DomainEvent, DomainEventType, IEventStore, NewDomainEvent } from './interfaces/IEventStore';
import { IValueTransfer } from './interfaces/IValueTransfer';
import {
  Address,
  Contribution,
  ContributionKey,
  ContributionRef,
  Label,
  LabeledSample,
  ReportTier,
  Timestamp,
} from './types';
import { ILogger, scopedLogger } from './utils/ILogger';
import { checkedSub } from './utils/IntegerMath';
import { normalizeAddress } from './utils/addresses';

export interface CollaborativeTrainerDependencies<TSample> {
  ledger: ContributionLedgerService;
  engine: IncentiveEngine<TSample>;
  classifier: IClassifier<TSample>;
  codec: SampleCodec<TSample>;
  eventStore: IEventStore;
  valueTransfer: IValueTransfer;
  invariantChecker?: InvariantChecker;
}

export interface AddContributionRequest<TSample> {
  sample: TSample;
  label: Label;
  submitter: Address;
  paidAmount: bigint;
  currentTime: Timestamp;
}

export interface AddContributionResult {
  key: ContributionKey;
  cost: bigint;
  /** Payment in excess of the cost, sent back to the submitter */
  change: bigint;
  contribution: Contribution;
}

export interface RefundRequest<TSample> {
  sample: TSample;
  label: Label;
  submissionTime: Timestamp;
  claimant: Address;
  currentTime: Timestamp;
}

export interface RefundResult {
  key: ContributionKey;
  amount: bigint;
}

export interface ReportRequest<TSample> {
  sample: TSample;
  label: Label;
  submissionTime: Timestamp;
  originalAuthor: Address;
  reporter: Address;
  currentTime: Timestamp;
}

export interface ReportResult {
  key: ContributionKey;
  amount: bigint;
  tier: ReportTier;
  clamped: boolean;
  /** Claimable amount left on the contribution */
  remaining: bigint;
}

function eventTime(seconds: Timestamp): Date {
  return new Date(seconds * 1000);
}

export class CollaborativeTrainerService<TSample> {
  private logger: ILogger;
  private readonly identity: Address;
  private ledger: ContributionLedgerService;
  private engine: IncentiveEngine<TSample>;
  private classifier: IClassifier<TSample>;
  private codec: SampleCodec<TSample>;
  private eventStore: IEventStore;
  private valueTransfer: IValueTransfer;
  private invariants: InvariantChecker;

  constructor(logger: ILogger, identity: Address, dependencies: CollaborativeTrainerDependencies<TSample>) {
    this.logger = scopedLogger(logger, 'CollaborativeTrainer');
    this.identity = normalizeAddress(identity, 'identity');
    this.ledger = dependencies.ledger;
    this.engine = dependencies.engine;
    this.classifier = dependencies.classifier;
    this.codec = dependencies.codec;
    this.eventStore = dependencies.eventStore;
    this.valueTransfer = dependencies.valueTransfer;
    this.invariants = dependencies.invariantChecker ?? new InvariantChecker(this.logger);
  }

  getIdentity(): Address {
    return this.identity;
  }

  quoteNextCost(currentTime: Timestamp, contribution?: LabeledSample<TSample>): bigint {
    return this.engine.quoteCost(currentTime, contribution);
  }

  getContribution(sample: TSample, label: Label, submissionTime: Timestamp, submitter: Address): Contribution {
    const key = commitPacked(this.codec.pack(sample), label, submissionTime, submitter);
    return this.ledger.getContribution(key, { label, submissionTime, submitter });
  }

  /**
   * Submit a labeled sample with a deposit. The deposit is the current cost;
   * anything paid above it is returned to the submitter.
   *
   * The payment is taken into escrow before anything is committed. If the
   * charge or the record is then refused, the whole payment goes back.
   */
  async addContribution(request: AddContributionRequest<TSample>): Promise<AddContributionResult> {
    const submitter = normalizeAddress(request.submitter, 'submitter');
    const encodedSample = this.codec.pack(request.sample);
    const key = commitPacked(encodedSample, request.label, request.currentTime, submitter);

    this.assertKeyAvailable(key, submitter);
    await this.valueTransfer.receive(submitter, request.paidAmount, `deposit:${key}`);

    let committed: { cost: bigint; contribution: Contribution };
    try {
      committed = this.commitSubmission(key, submitter, request);
    } catch (error) {
      await this.returnPayment(submitter, request.paidAmount, key, error);
      throw error;
    }
    const { cost, contribution } = committed;
    const change = checkedSub(request.paidAmount, cost);

    try {
      if (change > 0n) {
        await this.valueTransfer.send(submitter, change, `change:${key}`);
      }
      await this.appendEvent({
        aggregateId: key,
        aggregateType: 'contribution',
        eventType: 'ContributionAdded',
        data: {
          key,
          encodedSample,
          sampleKind: this.codec.kind,
          label: request.label,
          submissionTime: request.currentTime,
          submitter,
          deposit: cost.toString(),
        },
        metadata: { userId: submitter, timestamp: eventTime(request.currentTime) },
      });
      await this.classifier.update(request.sample, request.label);
    } catch (error) {
      this.logger.error('Contribution recorded but follow-up failed', { key, ...describeError(error) });
      throw error;
    }

    this.logger.info('Contribution added', {
      key,
      submitter,
      cost: cost.toString(),
      change: change.toString(),
    });
    return { key, cost, change, contribution };
  }

  /**
   * Recover the whole remaining deposit once the model agrees with the contribution
   */
  async refund(request: RefundRequest<TSample>): Promise<RefundResult> {
    const claimant = normalizeAddress(request.claimant, 'claimant');
    const encodedSample = this.codec.pack(request.sample);
    const key = commitPacked(encodedSample, request.label, request.submissionTime, claimant);
    const ref: ContributionRef = { label: request.label, submissionTime: request.submissionTime, submitter: claimant };

    const prediction = await this.classifier.predict(request.sample);

    const claimableAmount = this.ledger.getClaimableAmount(key, ref);
    const amount = this.engine.adjudicateRefund(this.identity, {
      claimant,
      submissionTime: request.submissionTime,
      currentTime: request.currentTime,
      claimableAmount,
      alreadyClaimed: this.ledger.hasClaimed(key, ref, claimant),
      prediction,
      label: request.label,
    });
    const claim = this.ledger.claimRefund(this.identity, key, ref, claimant);
    this.invariants.checkPayoutConservation('CollaborativeTrainerService.refund', claim.claimableAmount, 0n, amount);

    try {
      await this.appendEvent({
        aggregateId: key,
        aggregateType: 'contribution',
        eventType: 'RefundIssued',
        data: {
          key,
          encodedSample,
          label: request.label,
          submissionTime: request.submissionTime,
          submitter: claimant,
          amount: amount.toString(),
        },
        metadata: { userId: claimant, timestamp: eventTime(request.currentTime) },
      });
      await this.valueTransfer.send(claimant, amount, `refund:${key}`);
    } catch (error) {
      this.logger.error('Refund committed but payout failed', { key, claimant, ...describeError(error) });
      throw error;
    }

    this.logger.info('Refund issued', { key, claimant, amount: amount.toString() });
    return { key, amount };
  }

  /**
   * Claim (part of) a contribution's deposit: as a reporter showing the model
   * disagrees, or as a sweeper once the claim windows have passed
   */
  async report(request: ReportRequest<TSample>): Promise<ReportResult> {
    const reporter = normalizeAddress(request.reporter, 'reporter');
    const originalAuthor = normalizeAddress(request.originalAuthor, 'originalAuthor');
    const encodedSample = this.codec.pack(request.sample);
    const key = commitPacked(encodedSample, request.label, request.submissionTime, originalAuthor);
    const ref: ContributionRef = {
      label: request.label,
      submissionTime: request.submissionTime,
      submitter: originalAuthor,
    };

    const prediction = await this.classifier.predict(request.sample);

    const claimableAmount = this.ledger.getClaimableAmount(key, ref);
    const adjudication = this.engine.adjudicateReport(this.identity, {
      reporter,
      submissionTime: request.submissionTime,
      currentTime: request.currentTime,
      originalAuthor,
      initialDeposit: this.ledger.getInitialDeposit(key, ref),
      claimableAmount,
      alreadyClaimed: this.ledger.hasClaimed(key, ref, reporter),
      prediction,
      label: request.label,
    });
    const claim = this.ledger.claimReport(this.identity, key, ref, reporter);
    const remaining = this.ledger.debit(this.identity, key, adjudication.rewardAmount);
    this.invariants.checkPayoutConservation(
      'CollaborativeTrainerService.report',
      claim.claimableAmount,
      remaining,
      adjudication.rewardAmount
    );

    try {
      await this.appendEvent({
        aggregateId: key,
        aggregateType: 'contribution',
        eventType: 'ReportRewarded',
        data: {
          key,
          encodedSample,
          label: request.label,
          submissionTime: request.submissionTime,
          submitter: originalAuthor,
          reporter,
          tier: adjudication.tier,
          amount: adjudication.rewardAmount.toString(),
        },
        metadata: { userId: reporter, timestamp: eventTime(request.currentTime) },
      });
      await this.valueTransfer.send(reporter, adjudication.rewardAmount, `report:${key}`);
    } catch (error) {
      this.logger.error('Report committed but payout failed', { key, reporter, ...describeError(error) });
      throw error;
    }

    this.logger.info('Report rewarded', {
      key,
      reporter,
      tier: adjudication.tier,
      amount: adjudication.rewardAmount.toString(),
      remaining: remaining.toString(),
    });
    return {
      key,
      amount: adjudication.rewardAmount,
      tier: adjudication.tier,
      clamped: adjudication.clamped,
      remaining,
    };
  }

  /**
   * Rebuild a submitted sample from its latest ContributionAdded event
   */
  async recoverSample(key: ContributionKey): Promise<LabeledSample<TSample> | undefined> {
    const events = await this.eventStore.getEvents(key);
    const added = [...events].reverse().find(
      (e): e is DomainEvent<'ContributionAdded'> => e.eventType === 'ContributionAdded'
    );
    if (!added) {
      return undefined;
    }
    return { sample: this.codec.unpack(added.data.encodedSample), label: added.data.label };
  }

  private assertKeyAvailable(key: ContributionKey, submitter: Address): void {
    if (this.ledger.hasLiveRecord(key)) {
      const error = new ValidationError('KEY_COLLISION', 'Conflicting contribution key; the data may have already been added', {
        key,
      });
      this.logger.warn('Contribution rejected', { submitter, ...describeError(error) });
      throw error;
    }
  }

  /**
   * Charge and record in one synchronous step, after the payment has landed
   */
  private commitSubmission(
    key: ContributionKey,
    submitter: Address,
    request: AddContributionRequest<TSample>
  ): { cost: bigint; contribution: Contribution } {
    // Another submission of the same tuple may have committed while the payment was in flight
    this.assertKeyAvailable(key, submitter);
    const cost = this.engine.chargeForSubmission(this.identity, request.paidAmount, request.currentTime, {
      sample: request.sample,
      label: request.label,
    });
    const contribution = this.ledger.record(this.identity, key, request.label, request.currentTime, submitter, cost);
    return { cost, contribution };
  }

  private async returnPayment(submitter: Address, amount: bigint, key: ContributionKey, cause: unknown): Promise<void> {
    this.logger.warn('Submission refused after payment; returning it', { key, submitter, ...describeError(cause) });
    if (amount === 0n) {
      return;
    }
    try {
      await this.valueTransfer.send(submitter, amount, `return:${key}`);
    } catch (error) {
      this.logger.error('Returning a refused payment failed', { key, submitter, ...describeError(error) });
      throw error;
    }
  }

  private async appendEvent<TType extends DomainEventType>(event: NewDomainEvent<TType>): Promise<void> {
    await this.eventStore.append(event);
  }
}
