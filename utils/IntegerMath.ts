/**
 * IntegerMath
 * Unsigned 256-bit arithmetic helpers for deposits, costs and rewards; pure functions only.
 *
 * Every helper throws ArithmeticError instead of wrapping, so amounts can never
 * silently go negative or past UINT256_MAX.
 */

import { ArithmeticError } from '../errors';

export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * assertUint256
 * Range check for a value entering the ledger or engine from outside.
 */
export function assertUint256(value: bigint, name: string): bigint {
  if (value < 0n) {
    throw new ArithmeticError('UNDERFLOW', `${name} must not be negative`, { name, value: value.toString() });
  }
  if (value > UINT256_MAX) {
    throw new ArithmeticError('OVERFLOW', `${name} exceeds uint256`, { name, value: value.toString() });
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertUint256(assertUint256(a, 'augend') + assertUint256(b, 'addend'), 'sum');
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return assertUint256(assertUint256(a, 'minuend') - assertUint256(b, 'subtrahend'), 'difference');
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertUint256(assertUint256(a, 'multiplicand') * assertUint256(b, 'multiplier'), 'product');
}

/**
 * checkedDiv
 * Truncating division; bigint division already rounds toward zero, which is floor for unsigned operands.
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new ArithmeticError('DIVISION_BY_ZERO', 'Division by zero', { dividend: a.toString() });
  }
  return assertUint256(a, 'dividend') / assertUint256(b, 'divisor');
}

/**
 * isqrt
 * Floor square root by Newton iteration over integers.
 */
export function isqrt(value: bigint): bigint {
  assertUint256(value, 'radicand');
  if (value < 2n) {
    return value;
  }
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}
