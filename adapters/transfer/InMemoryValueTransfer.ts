/**
 * In-Memory Value Transfer
 *
 * Escrow account kept in process memory, for development/testing.
 * Tracks the escrow balance, every movement, and the net amount each address received.
 */

import { ArithmeticError } from '../../errors';
import { IValueTransfer, ValueTransferRecord } from '../../interfaces/IValueTransfer';
import { Address } from '../../types';
import { checkedAdd, checkedSub } from '../../utils/IntegerMath';

export class InMemoryValueTransfer implements IValueTransfer {
    private escrow = 0n;
    private paidOut: Map<string, bigint> = new Map();
    private history: ValueTransferRecord[] = [];

    async receive(from: Address, amount: bigint, memo: string): Promise<void> {
        this.escrow = checkedAdd(this.escrow, amount);
        this.history.push({ direction: 'in', counterparty: from, amount, memo });
    }

    async send(to: Address, amount: bigint, memo: string): Promise<void> {
        if (amount > this.escrow) {
            throw new ArithmeticError('INSUFFICIENT_BALANCE', 'Escrow cannot cover payout', {
                to,
                amount: amount.toString(),
                escrow: this.escrow.toString(),
            });
        }
        this.escrow = checkedSub(this.escrow, amount);
        const key = to.toLowerCase();
        this.paidOut.set(key, checkedAdd(this.paidOut.get(key) ?? 0n, amount));
        this.history.push({ direction: 'out', counterparty: to, amount, memo });
    }

    async getEscrowBalance(): Promise<bigint> {
        return this.escrow;
    }

    /**
     * Total sent to an address
     */
    getPaidTo(address: Address): bigint {
        return this.paidOut.get(address.toLowerCase()) ?? 0n;
    }

    getHistory(): ValueTransferRecord[] {
        return [...this.history];
    }
}
