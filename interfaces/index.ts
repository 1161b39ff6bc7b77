/**
 * Port interfaces
 * Storage-, transport- and model-agnostic seams of the ledger and trainer
 */

export * from './IClassifier';
export * from './IContributionStore';
export * from './IEventStore';
export * from './IValueTransfer';
