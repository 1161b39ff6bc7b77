/**
 * In-Memory Event Store
 *
 * Append-only implementation of IEventStore for development/testing
 */

import {
    DomainEvent,
    DomainEventType,
    IEventStore,
    NewDomainEvent,
} from '../../interfaces/IEventStore';
import { ContributionKey } from '../../types';

function isEventOfType<TType extends DomainEventType>(event: DomainEvent, eventType: TType): event is DomainEvent<TType> {
    return event.eventType === eventType;
}

export class InMemoryEventStore implements IEventStore {
    private events: DomainEvent[] = [];
    private versions: Map<ContributionKey, number> = new Map();
    private sequence = 0;

    async append<TType extends DomainEventType>(event: NewDomainEvent<TType>): Promise<DomainEvent<TType>> {
        const aggregateId = event.aggregateId.toLowerCase();
        const version = (this.versions.get(aggregateId) ?? 0) + 1;
        this.versions.set(aggregateId, version);
        this.sequence += 1;

        const stored: DomainEvent<TType> = {
            id: `evt-${this.sequence}`,
            aggregateId,
            aggregateType: event.aggregateType,
            eventType: event.eventType,
            data: event.data,
            metadata: {
                userId: event.metadata.userId,
                timestamp: event.metadata.timestamp,
                version,
            },
        };
        this.events.push(stored);
        return stored;
    }

    async getEvents(aggregateId: ContributionKey, fromVersion?: number): Promise<DomainEvent[]> {
        const id = aggregateId.toLowerCase();
        return this.events.filter(
            e => e.aggregateId === id && (fromVersion === undefined || e.metadata.version >= fromVersion)
        );
    }

    async getEventsByType<TType extends DomainEventType>(eventType: TType, limit?: number): Promise<DomainEvent<TType>[]> {
        const matching = this.events.filter((e): e is DomainEvent<TType> => isEventOfType(e, eventType));
        return limit === undefined ? matching : matching.slice(0, limit);
    }

    async getLatestVersion(aggregateId: ContributionKey): Promise<number> {
        return this.versions.get(aggregateId.toLowerCase()) ?? 0;
    }
}
