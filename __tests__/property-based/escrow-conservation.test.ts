/**
 * Property-Based Tests for Escrow Conservation
 *
 * Whatever sequence of submissions, refunds and sweeps runs, the escrow holds
 * exactly the sum of every record's claimable amount.
 */

import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import { int64VectorCodec } from '../../ContributionCommitment';
import { InMemoryValueTransfer } from '../../adapters/transfer/InMemoryValueTransfer';
import { isIncentiveError } from '../../errors';
import { TrainerFactory } from '../../factory/TrainerFactory';
import { ALICE, BOB, CAROL, DEPLOYED_AT, ORCHESTRATOR, OWNER, STRANGER, ScriptedClassifier, TIMINGS, createMockLogger } from '../helpers/fixtures';

type Sample = readonly bigint[];

const submissionArb = fc.record({
  gap: fc.integer({ min: 0, max: 10_000 }),
  overpayment: fc.bigUintN(64),
  label: fc.integer({ min: 0, max: 3 }),
  submitter: fc.constantFrom(ALICE, BOB, CAROL),
});

async function expectRejected(attempt: Promise<unknown>): Promise<void> {
  try {
    await attempt;
  } catch (error) {
    if (!isIncentiveError(error)) {
      throw error;
    }
  }
}

describe('Escrow Conservation Invariants (Property-Based)', () => {
  it('escrow always equals the outstanding claimable amounts', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(submissionArb, { minLength: 1, maxLength: 8 }),
        fc.integer({ min: 0, max: 3 }),
        fc.bigUintN(40),
        async (submissions, prediction, costWeight) => {
          const valueTransfer = new InMemoryValueTransfer();
          const { trainer, ledger, invariantChecker } = TrainerFactory.create<Sample>({
            config: { costWeight, timings: TIMINGS, ownerAddress: OWNER },
            orchestratorAddress: ORCHESTRATOR,
            classifier: new ScriptedClassifier<Sample>(prediction),
            codec: int64VectorCodec,
            deployedAt: DEPLOYED_AT,
            logger: createMockLogger(),
            valueTransfer,
          });
          const outstanding = () => ledger.listContributions().reduce((sum, c) => sum + c.claimableAmount, 0n);

          let now = DEPLOYED_AT;
          const added: Array<{ sample: Sample; label: number; submitter: string; submissionTime: number }> = [];
          for (const [index, submission] of submissions.entries()) {
            now += submission.gap;
            const sample = [BigInt(index)];
            const cost = trainer.quoteNextCost(now);
            await trainer.addContribution({
              sample,
              label: submission.label,
              submitter: submission.submitter,
              paidAmount: cost + submission.overpayment,
              currentTime: now,
            });
            added.push({ sample, label: submission.label, submitter: submission.submitter, submissionTime: now });
            expect(await valueTransfer.getEscrowBalance()).toBe(outstanding());
          }

          now += TIMINGS.refundWaitTime;
          for (const entry of added) {
            await expectRejected(trainer.refund({ ...entry, claimant: entry.submitter, currentTime: now }));
            expect(await valueTransfer.getEscrowBalance()).toBe(outstanding());
          }

          now += TIMINGS.anyAddressClaimWaitTime;
          for (const entry of added) {
            await expectRejected(
              trainer.report({ ...entry, originalAuthor: entry.submitter, reporter: STRANGER, currentTime: now })
            );
          }

          expect(outstanding()).toBe(0n);
          expect(await valueTransfer.getEscrowBalance()).toBe(0n);
          expect(invariantChecker.getViolations()).toEqual([]);
        }
      ),
      { numRuns: 50 }
    );
  });
});
