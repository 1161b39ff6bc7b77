/**
 * Event Store Interface
 *
 * Storage-agnostic interface for contribution history. Samples are never kept in
 * the ledger, so these events are the only place they can be rebuilt from.
 */

import { Address, ContributionKey, Label, Timestamp } from '../types';

export interface ContributionAddedData {
    key: ContributionKey;
    encodedSample: string;
    sampleKind: string;
    label: Label;
    submissionTime: Timestamp;
    submitter: Address;
    deposit: string;
}

export interface RefundIssuedData {
    key: ContributionKey;
    encodedSample: string;
    label: Label;
    submissionTime: Timestamp;
    submitter: Address;
    amount: string;
}

export interface ReportRewardedData {
    key: ContributionKey;
    encodedSample: string;
    label: Label;
    submissionTime: Timestamp;
    submitter: Address;
    reporter: Address;
    tier: string;
    amount: string;
}

export interface DomainEventDataMap {
    ContributionAdded: ContributionAddedData;
    RefundIssued: RefundIssuedData;
    ReportRewarded: ReportRewardedData;
}

export type DomainEventType = keyof DomainEventDataMap;

export interface DomainEvent<TType extends DomainEventType = DomainEventType> {
    id: string;
    aggregateId: ContributionKey;
    aggregateType: 'contribution';
    eventType: TType;
    data: DomainEventDataMap[TType];
    metadata: {
        userId?: Address;
        timestamp: Date;
        version: number;
    };
}

export interface NewDomainEvent<TType extends DomainEventType = DomainEventType> {
    aggregateId: ContributionKey;
    aggregateType: 'contribution';
    eventType: TType;
    data: DomainEventDataMap[TType];
    metadata: {
        userId?: Address;
        timestamp: Date;
    };
}

export interface IEventStore {
    /**
     * Append event to store; the store assigns id and per-aggregate version
     */
    append<TType extends DomainEventType>(event: NewDomainEvent<TType>): Promise<DomainEvent<TType>>;

    /**
     * Get events for an aggregate
     */
    getEvents(aggregateId: ContributionKey, fromVersion?: number): Promise<DomainEvent[]>;

    /**
     * Get events by type
     */
    getEventsByType<TType extends DomainEventType>(eventType: TType, limit?: number): Promise<DomainEvent<TType>[]>;

    /**
     * Get latest version for aggregate
     */
    getLatestVersion(aggregateId: ContributionKey): Promise<number>;
}
