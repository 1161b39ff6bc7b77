/**
 * Contribution Stake Protocol
 *
 * Deposit-backed incentives for crowd-sourced training data:
 * - ContributionLedgerService keeps escrow records keyed by content commitment
 * - IncentiveEngine prices submissions and adjudicates refunds and reports
 * - CollaborativeTrainerService sequences both around a classifier
 */

// Core Interfaces
export * from './interfaces';

// Types
export * from './types';
export * from './errors';

// Utilities
export * from './utils';

// Core services
export * from './ContributionCommitment';
export * from './ContributionLedgerService';
export * from './IncentiveEngine';
export * from './IncentivePolicies';
export * from './IncentiveConfig';
export * from './InvariantChecker';
export * from './JSONSchemaValidator';
export * from './CollaborativeTrainerService';

// Adapters
export * from './adapters';

// Factory
export * from './factory';

import { TrainerFactory, TrainerOptions } from './factory';

/**
 * Create a trainer with in-memory adapters unless others are supplied
 *
 * @example
 * const { trainer } = createTrainer({
 *   config: loadIncentiveConfigFromEnv(),
 *   orchestratorAddress: '0x1000000000000000000000000000000000000001',
 *   classifier,
 *   codec: int64VectorCodec,
 *   deployedAt: 1700000000,
 * });
 */
export function createTrainer<TSample>(options: TrainerOptions<TSample>) {
    return TrainerFactory.create(options);
}
