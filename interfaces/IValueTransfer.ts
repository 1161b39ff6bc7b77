/**
 * Value Transfer Interface
 *
 * Moves value between participants and the escrow the trainer holds.
 * Implementations can settle on-chain, against a payment processor, or in memory.
 */

import { Address } from '../types';

export interface ValueTransferRecord {
    direction: 'in' | 'out';
    counterparty: Address;
    amount: bigint;
    memo: string;
}

export interface IValueTransfer {
    /**
     * Take a payment into escrow
     */
    receive(from: Address, amount: bigint, memo: string): Promise<void>;

    /**
     * Pay out of escrow
     */
    send(to: Address, amount: bigint, memo: string): Promise<void>;

    /**
     * Value currently held in escrow
     */
    getEscrowBalance(): Promise<bigint>;
}
