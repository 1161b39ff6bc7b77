/**
 * Incentive Policies
 *
 * Pricing and reward-split rules the IncentiveEngine delegates to.
 *
 * Both defaults ignore the sample itself: the cost depends only on time since
 * the last submission and the merit split only on validated-contribution counts.
 * Content-aware rules can be swapped in through the same interfaces.
 */

import { LabeledSample } from './types';
import { checkedDiv, checkedMul, isqrt } from './utils/IntegerMath';

export const SECONDS_PER_HOUR = 3600n;

export interface CostQuoteInput<TSample> {
  costWeight: bigint;
  /** Seconds since the last accepted submission */
  elapsedSeconds: number;
  contribution?: LabeledSample<TSample>;
}

export interface CostCurve<TSample> {
  readonly name: string;
  quote(input: CostQuoteInput<TSample>): bigint;
}

/**
 * cost = costWeight * 3600 / isqrt(elapsed), with a divisor of 1 when no time has passed.
 * Rapid-fire submissions pay the most; the price decays as the feed goes quiet.
 */
export class TimeDecayCostCurve implements CostCurve<unknown> {
  readonly name = 'time-decay';

  quote(input: CostQuoteInput<unknown>): bigint {
    if (input.costWeight === 0n) {
      return 0n;
    }
    const elapsed = BigInt(input.elapsedSeconds);
    const divisor = elapsed === 0n ? 1n : isqrt(elapsed);
    return checkedDiv(checkedMul(input.costWeight, SECONDS_PER_HOUR), divisor);
  }
}

export interface RewardSplitInput {
  initialDeposit: bigint;
  reporterNumValid: number;
  totalGoodDataCount: number;
}

export interface RewardSplit {
  readonly name: string;
  /** Unclamped reward; the engine clamps it to the claimable amount */
  split(input: RewardSplitInput): bigint;
}

/**
 * reward = floor(initialDeposit * reporterNumValid / totalGoodDataCount)
 */
export class MeritRewardSplit implements RewardSplit {
  readonly name = 'merit';

  split(input: RewardSplitInput): bigint {
    return checkedDiv(
      checkedMul(input.initialDeposit, BigInt(input.reporterNumValid)),
      BigInt(input.totalGoodDataCount)
    );
  }
}
