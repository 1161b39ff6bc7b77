/**
 * Adapters
 * Export all adapter implementations
 */

export * from './storage/InMemoryContributionStore';
export * from './events/InMemoryEventStore';
export * from './transfer/InMemoryValueTransfer';
