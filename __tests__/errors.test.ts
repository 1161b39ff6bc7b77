/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ArithmeticError,
  EconomicError,
  PermissionError,
  TimingError,
  ValidationError,
  describeError,
  isArithmeticError,
  isEconomicError,
  isIncentiveError,
  isPermissionError,
  isTimingError,
  isValidationError,
} from '../errors';
import { ALICE } from './helpers/fixtures';

describe('errors', () => {
  const samples = [
    new ValidationError('NOT_FOUND', 'missing'),
    new PermissionError(ALICE, 'Ledger.record'),
    new TimingError('TOO_EARLY', 'wait'),
    new EconomicError('NO_STANDING', 'no standing'),
    new ArithmeticError('OVERFLOW', 'too big'),
  ];

  it('sets category, code and name per class', () => {
    expect(samples.map((e) => [e.name, e.category, e.code])).toEqual([
      ['ValidationError', 'validation', 'NOT_FOUND'],
      ['PermissionError', 'permission', 'UNAUTHORIZED'],
      ['TimingError', 'timing', 'TOO_EARLY'],
      ['EconomicError', 'economic', 'NO_STANDING'],
      ['ArithmeticError', 'arithmetic', 'OVERFLOW'],
    ]);
  });

  it('recognizes each category with exactly one guard', () => {
    const guards = [isValidationError, isPermissionError, isTimingError, isEconomicError, isArithmeticError];

    expect(samples.map((error) => guards.map((guard) => guard(error)))).toEqual([
      [true, false, false, false, false],
      [false, true, false, false, false],
      [false, false, true, false, false],
      [false, false, false, true, false],
      [false, false, false, false, true],
    ]);
    expect(samples.every(isIncentiveError)).toBe(true);
  });

  it('does not mistake plain errors for domain errors', () => {
    const plain = new Error('boom');

    expect(isIncentiveError(plain)).toBe(false);
    expect(isTimingError({ code: 'TOO_EARLY' })).toBe(false);
  });

  it('describes any thrown value for logging', () => {
    expect(describeError(new TimingError('CLOCK_REGRESSION', 'behind'))).toEqual({
      category: 'timing',
      code: 'CLOCK_REGRESSION',
      error: 'behind',
    });
    expect(describeError(new Error('boom'))).toEqual({ error: 'boom' });
    expect(describeError('text')).toEqual({ error: 'text' });
  });
});
