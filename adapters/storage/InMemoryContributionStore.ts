/**
 * In-Memory Contribution Store
 *
 * Map-backed implementation of IContributionStore for development/testing
 */

import { IContributionStore, StoredContribution } from '../../interfaces/IContributionStore';
import { ContributionKey } from '../../types';

export class InMemoryContributionStore implements IContributionStore {
    private records: Map<ContributionKey, StoredContribution> = new Map();

    get(key: ContributionKey): StoredContribution | undefined {
        return this.records.get(key.toLowerCase());
    }

    set(key: ContributionKey, record: StoredContribution): void {
        this.records.set(key.toLowerCase(), record);
    }

    size(): number {
        return this.records.size;
    }

    entries(): IterableIterator<[ContributionKey, StoredContribution]> {
        return this.records.entries();
    }

    clear(): void {
        this.records.clear();
    }
}
