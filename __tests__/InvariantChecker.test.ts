/**
 * Invariant Checker Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { InvariantChecker, InvariantViolation } from '../InvariantChecker';
import { createMockLogger } from './helpers/fixtures';

describe('InvariantChecker', () => {
  it('passes records inside their escrow bounds', () => {
    const checker = new InvariantChecker(createMockLogger());

    expect(checker.checkEscrowBounds('test', 10n, 0n)).toBe(true);
    expect(checker.checkEscrowBounds('test', 10n, 10n)).toBe(true);
    expect(checker.getViolations()).toEqual([]);
  });

  it('records and logs a claimable amount above the deposit', () => {
    const logger = createMockLogger();
    const checker = new InvariantChecker(logger);

    expect(checker.checkEscrowBounds('Ledger.write', 10n, 11n)).toBe(false);

    expect(checker.getViolationsBySeverity('critical')).toEqual([
      {
        invariant: 'Escrow Bounds',
        location: 'Ledger.write',
        expected: '0 <= claimableAmount <= initialDeposit',
        actual: { initialDeposit: '10', claimableAmount: '11' },
        severity: 'critical',
      },
    ]);
    expect(logger.error).toHaveBeenCalledWith('Invariant violation detected', expect.objectContaining({ invariant: 'Escrow Bounds' }));
  });

  it('checks that a payout equals the amount drained', () => {
    const checker = new InvariantChecker(createMockLogger());

    expect(checker.checkPayoutConservation('refund', 10n, 4n, 6n)).toBe(true);
    expect(checker.checkPayoutConservation('refund', 10n, 4n, 5n)).toBe(false);
    expect(checker.checkPayoutConservation('refund', 4n, 10n, 0n)).toBe(false);
    expect(checker.getViolations()).toHaveLength(2);
  });

  it('calls extra handlers and survives a failing one', () => {
    const logger = createMockLogger();
    const checker = new InvariantChecker(logger);
    const seen = jest.fn<(violation: InvariantViolation) => void>();
    checker.addHandler(() => {
      throw new Error('pager offline');
    });
    checker.addHandler(seen);

    checker.checkEscrowBounds('x', 0n, 1n);

    expect(seen).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Error in invariant violation handler', { error: 'pager offline' });
  });

  it('skips checks while disabled', () => {
    const checker = new InvariantChecker(createMockLogger());
    checker.setEnabled(false);

    expect(checker.checkEscrowBounds('x', 0n, 1n)).toBe(true);
    expect(checker.getViolations()).toEqual([]);

    checker.setEnabled(true);
    checker.checkEscrowBounds('x', 0n, 1n);
    checker.clearViolations();
    expect(checker.getViolations()).toEqual([]);
  });
});
