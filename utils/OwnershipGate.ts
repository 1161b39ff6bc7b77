/**
 * Ownership Gate
 *
 * Single-holder capability check. Components call assertHolder at the top of
 * every mutating entry point; only the current holder can hand the capability on.
 */

import { ethers } from 'ethers';
import { PermissionError } from '../errors';
import { Address } from '../types';
import { ILogger } from './ILogger';
import { normalizeAddress } from './addresses';

export class OwnershipGate {
  private holder: Address;

  constructor(
    holder: Address,
    private readonly scope: string,
    private readonly logger: ILogger
  ) {
    this.holder = normalizeAddress(holder, `${scope} holder`);
  }

  getHolder(): Address {
    return this.holder;
  }

  isHolder(caller: Address): boolean {
    return ethers.isAddress(caller) && ethers.getAddress(caller) === this.holder;
  }

  assertHolder(caller: Address, operation: string): void {
    if (!this.isHolder(caller)) {
      this.logger.warn('Rejected unauthorized call', { scope: this.scope, operation, caller });
      throw new PermissionError(caller, `${this.scope}.${operation}`);
    }
  }

  transfer(caller: Address, next: Address): void {
    this.assertHolder(caller, 'transferOwnership');
    const previous = this.holder;
    this.holder = normalizeAddress(next, `${this.scope} holder`);
    this.logger.info('Ownership transferred', { scope: this.scope, previous, next: this.holder });
  }
}
