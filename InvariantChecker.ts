/**
 * Runtime Invariant Checker
 *
 * Checks escrow invariants at runtime and logs violations
 */

import { ILogger, scopedLogger } from './utils/ILogger';

export type InvariantSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface InvariantViolation {
  invariant: string;
  location: string;
  expected: string;
  actual: Record<string, string>;
  severity: InvariantSeverity;
}

export type InvariantViolationHandler = (violation: InvariantViolation) => void;

/**
 * Invariant Checker Service
 */
export class InvariantChecker {
  private logger: ILogger;
  private violations: InvariantViolation[] = [];
  private handlers: InvariantViolationHandler[] = [];
  private enabled: boolean = true;

  constructor(logger?: ILogger) {
    this.logger = scopedLogger(logger, 'InvariantChecker');

    // Default handler: log violations
    this.addHandler((violation) => {
      this.logger.error('Invariant violation detected', {
        invariant: violation.invariant,
        location: violation.location,
        expected: violation.expected,
        actual: violation.actual,
        severity: violation.severity,
      });
    });
  }

  /**
   * Enable or disable invariant checking
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Add a violation handler
   */
  addHandler(handler: InvariantViolationHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Check an invariant
   */
  check(
    invariant: string,
    location: string,
    condition: boolean,
    expected: string,
    actual: Record<string, string>,
    severity: InvariantSeverity = 'medium'
  ): boolean {
    if (!this.enabled || condition) {
      return true;
    }

    const violation: InvariantViolation = { invariant, location, expected, actual, severity };
    this.violations.push(violation);

    for (const handler of this.handlers) {
      try {
        handler(violation);
      } catch (error) {
        this.logger.error('Error in invariant violation handler', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return false;
  }

  /**
   * Check a record's claimable amount stays in [0, initialDeposit]
   */
  checkEscrowBounds(location: string, initialDeposit: bigint, claimableAmount: bigint): boolean {
    return this.check(
      'Escrow Bounds',
      location,
      claimableAmount >= 0n && claimableAmount <= initialDeposit,
      '0 <= claimableAmount <= initialDeposit',
      { initialDeposit: initialDeposit.toString(), claimableAmount: claimableAmount.toString() },
      'critical'
    );
  }

  /**
   * Check that the amount paid for a claim equals the amount drained from escrow
   */
  checkPayoutConservation(
    location: string,
    claimableBefore: bigint,
    claimableAfter: bigint,
    paidOut: bigint
  ): boolean {
    return this.check(
      'Payout Conservation',
      location,
      claimableAfter <= claimableBefore && claimableBefore - claimableAfter === paidOut,
      `Paid out (${paidOut}) = claimable before (${claimableBefore}) - claimable after (${claimableAfter})`,
      {
        claimableBefore: claimableBefore.toString(),
        claimableAfter: claimableAfter.toString(),
        paidOut: paidOut.toString(),
      },
      'critical'
    );
  }

  /**
   * Get all violations
   */
  getViolations(): InvariantViolation[] {
    return [...this.violations];
  }

  /**
   * Get violations by severity
   */
  getViolationsBySeverity(severity: InvariantSeverity): InvariantViolation[] {
    return this.violations.filter(v => v.severity === severity);
  }

  /**
   * Clear violations (for testing)
   */
  clearViolations(): void {
    this.violations = [];
  }
}
