/**
 * Contribution Store Interface
 *
 * Storage-agnostic key → record map behind the ledger. Calls are synchronous so
 * a ledger operation reads and writes a record without yielding in between.
 */

import { Address, ContributionKey, Label, Timestamp } from '../types';

export interface StoredContribution {
    readonly label: Label;
    readonly submissionTime: Timestamp;
    readonly submitter: Address;
    readonly initialDeposit: bigint;
    readonly claimableAmount: bigint;
    readonly numClaims: number;
    readonly claimedBy: ReadonlySet<Address>;
}

export interface IContributionStore {
    /**
     * Get the record at a key
     */
    get(key: ContributionKey): StoredContribution | undefined;

    /**
     * Replace the record at a key
     */
    set(key: ContributionKey, record: StoredContribution): void;

    /**
     * Number of keys ever written
     */
    size(): number;

    /**
     * Iterate every key and record, for audits
     */
    entries(): IterableIterator<[ContributionKey, StoredContribution]>;
}
