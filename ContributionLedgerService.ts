/**
 * Contribution Ledger Service
 *
 * Owns the escrow record of every contribution, keyed by its commitment.
 * Records are created on submission, drained by refunds and debited by reports;
 * they are never deleted. Only the orchestrator identity may mutate them.
 *
 * Every mutation validates first and writes the whole record last, so a
 * rejected call leaves no partial claim flag or debit behind.
 */

import { ethers } from 'ethers';
import { ArithmeticError, ValidationError } from './errors';
import { InvariantChecker } from './InvariantChecker';
import { IContributionStore, StoredContribution } from './interfaces/IContributionStore';
import { InMemoryContributionStore } from './adapters/storage/InMemoryContributionStore';
import {
  Address,
  Contribution,
  ContributionKey,
  ContributionRef,
  Label,
  RefundClaim,
  ReportClaim,
  Timestamp,
} from './types';
import { ILogger, scopedLogger } from './utils/ILogger';
import { assertUint256, checkedSub } from './utils/IntegerMath';
import { OwnershipGate } from './utils/OwnershipGate';
import { assertLabel, assertTimestamp, normalizeAddress, sameAddress } from './utils/addresses';

export interface ContributionLedgerDependencies {
  store?: IContributionStore;
  invariantChecker?: InvariantChecker;
}

function assertKey(key: ContributionKey): ContributionKey {
  if (!ethers.isHexString(key, 32)) {
    throw new ValidationError('INVALID_INPUT', 'Contribution key must be a 32-byte hex string', { key });
  }
  return key.toLowerCase();
}

function isLive(record: StoredContribution): boolean {
  return record.claimableAmount > 0n;
}

export class ContributionLedgerService {
  private logger: ILogger;
  private store: IContributionStore;
  private invariants: InvariantChecker;
  private gate: OwnershipGate;

  constructor(logger: ILogger, orchestrator: Address, dependencies: ContributionLedgerDependencies = {}) {
    this.logger = scopedLogger(logger, 'ContributionLedger');
    this.store = dependencies.store ?? new InMemoryContributionStore();
    this.invariants = dependencies.invariantChecker ?? new InvariantChecker(this.logger);
    this.gate = new OwnershipGate(orchestrator, 'ContributionLedger', this.logger);
  }

  /**
   * Create the escrow record for a new contribution.
   * Fails with KEY_COLLISION while a record with claimable value remains at the key.
   */
  record(
    caller: Address,
    key: ContributionKey,
    label: Label,
    submissionTime: Timestamp,
    submitter: Address,
    deposit: bigint
  ): Contribution {
    this.gate.assertHolder(caller, 'record');
    const normalizedKey = assertKey(key);
    const record: StoredContribution = {
      label: assertLabel(label),
      submissionTime: assertTimestamp(submissionTime, 'submissionTime'),
      submitter: normalizeAddress(submitter, 'submitter'),
      initialDeposit: assertUint256(deposit, 'deposit'),
      claimableAmount: deposit,
      numClaims: 0,
      claimedBy: new Set<Address>(),
    };

    const existing = this.store.get(normalizedKey);
    if (existing && isLive(existing)) {
      throw new ValidationError('KEY_COLLISION', 'Conflicting contribution key; the data may have already been added', {
        key: normalizedKey,
      });
    }

    this.store.set(normalizedKey, record);
    this.logger.info('Contribution recorded', {
      key: normalizedKey,
      submitter: record.submitter,
      label: record.label,
      submissionTime: record.submissionTime,
      deposit: deposit.toString(),
      replacedExhausted: existing !== undefined,
    });
    return this.toContribution(normalizedKey, record);
  }

  /**
   * Whether record() would collide at this key right now
   */
  hasLiveRecord(key: ContributionKey): boolean {
    const existing = this.store.get(assertKey(key));
    return existing !== undefined && isLive(existing);
  }

  getContribution(key: ContributionKey, ref: ContributionRef): Contribution {
    const normalizedKey = assertKey(key);
    return this.toContribution(normalizedKey, this.requireRecord(normalizedKey, ref));
  }

  getClaimableAmount(key: ContributionKey, ref: ContributionRef): bigint {
    return this.requireRecord(assertKey(key), ref).claimableAmount;
  }

  getInitialDeposit(key: ContributionKey, ref: ContributionRef): bigint {
    return this.requireRecord(assertKey(key), ref).initialDeposit;
  }

  getNumClaims(key: ContributionKey, ref: ContributionRef): number {
    return this.requireRecord(assertKey(key), ref).numClaims;
  }

  hasClaimed(key: ContributionKey, ref: ContributionRef, claimant: Address): boolean {
    const record = this.requireRecord(assertKey(key), ref);
    return record.claimedBy.has(normalizeAddress(claimant, 'claimant'));
  }

  /**
   * Drain the whole claimable balance for the submitter.
   * Returns the values as they were before the drain; adjudication decides whether they entitle a refund.
   */
  claimRefund(caller: Address, key: ContributionKey, ref: ContributionRef, claimant: Address): RefundClaim {
    this.gate.assertHolder(caller, 'claimRefund');
    const normalizedKey = assertKey(key);
    const record = this.requireRecord(normalizedKey, ref);
    const normalizedClaimant = normalizeAddress(claimant, 'claimant');
    if (normalizedClaimant !== record.submitter) {
      throw new ValidationError('MISMATCH', 'Only the submitter can claim a refund', {
        key: normalizedKey,
        claimant: normalizedClaimant,
      });
    }

    const claim: RefundClaim = {
      claimableAmount: record.claimableAmount,
      alreadyClaimed: record.claimedBy.has(normalizedClaimant),
      numClaims: record.numClaims,
    };
    this.write(normalizedKey, {
      ...record,
      claimableAmount: 0n,
      claimedBy: new Set([...record.claimedBy, normalizedClaimant]),
      numClaims: record.numClaims + 1,
    }, 'claimRefund');

    this.logger.info('Refund claim recorded', {
      key: normalizedKey,
      claimant: normalizedClaimant,
      drained: claim.claimableAmount.toString(),
    });
    return claim;
  }

  /**
   * Mark a reporter as having claimed. The balance is left for debit().
   */
  claimReport(caller: Address, key: ContributionKey, ref: ContributionRef, claimant: Address): ReportClaim {
    this.gate.assertHolder(caller, 'claimReport');
    const normalizedKey = assertKey(key);
    const record = this.requireRecord(normalizedKey, ref);
    const normalizedClaimant = normalizeAddress(claimant, 'claimant');

    const claim: ReportClaim = {
      key: normalizedKey,
      initialDeposit: record.initialDeposit,
      claimableAmount: record.claimableAmount,
      alreadyClaimed: record.claimedBy.has(normalizedClaimant),
      numClaims: record.numClaims,
    };
    this.write(normalizedKey, {
      ...record,
      claimedBy: new Set([...record.claimedBy, normalizedClaimant]),
      numClaims: record.numClaims + 1,
    }, 'claimReport');

    this.logger.info('Report claim recorded', { key: normalizedKey, claimant: normalizedClaimant });
    return claim;
  }

  /**
   * Subtract a payout from the claimable balance; returns the remaining balance
   */
  debit(caller: Address, key: ContributionKey, amount: bigint): bigint {
    this.gate.assertHolder(caller, 'debit');
    const normalizedKey = assertKey(key);
    const record = this.store.get(normalizedKey);
    if (!record) {
      throw new ValidationError('NOT_FOUND', 'Contribution not found', { key: normalizedKey });
    }
    assertUint256(amount, 'amount');
    if (amount > record.claimableAmount) {
      throw new ArithmeticError('INSUFFICIENT_BALANCE', 'Debit exceeds the claimable amount', {
        key: normalizedKey,
        amount: amount.toString(),
        claimableAmount: record.claimableAmount.toString(),
      });
    }

    const remaining = checkedSub(record.claimableAmount, amount);
    this.write(normalizedKey, { ...record, claimableAmount: remaining }, 'debit');
    this.logger.info('Contribution debited', {
      key: normalizedKey,
      amount: amount.toString(),
      remaining: remaining.toString(),
    });
    return remaining;
  }

  getOrchestrator(): Address {
    return this.gate.getHolder();
  }

  transferOrchestrator(caller: Address, next: Address): void {
    this.gate.transfer(caller, next);
  }

  /**
   * Every record ever written, for audits and reconciliation
   */
  listContributions(): Contribution[] {
    return Array.from(this.store.entries(), ([key, record]) => this.toContribution(key, record));
  }

  private requireRecord(key: ContributionKey, ref: ContributionRef): StoredContribution {
    const record = this.store.get(key);
    if (!record) {
      throw new ValidationError('NOT_FOUND', 'Contribution not found', { key });
    }

    const mismatched: string[] = [];
    if (record.label !== ref.label) {
      mismatched.push('label');
    }
    if (record.submissionTime !== ref.submissionTime) {
      mismatched.push('submissionTime');
    }
    if (!sameAddress(record.submitter, ref.submitter)) {
      mismatched.push('submitter');
    }
    if (mismatched.length > 0) {
      throw new ValidationError('MISMATCH', `Contribution does not match on ${mismatched.join(', ')}`, {
        key,
        mismatched,
      });
    }
    return record;
  }

  private write(key: ContributionKey, next: StoredContribution, location: string): void {
    this.invariants.checkEscrowBounds(`ContributionLedgerService.${location}`, next.initialDeposit, next.claimableAmount);
    this.store.set(key, next);
  }

  private toContribution(key: ContributionKey, record: StoredContribution): Contribution {
    return {
      key,
      label: record.label,
      submissionTime: record.submissionTime,
      submitter: record.submitter,
      initialDeposit: record.initialDeposit,
      claimableAmount: record.claimableAmount,
      numClaims: record.numClaims,
      claimedBy: [...record.claimedBy],
    };
  }
}
