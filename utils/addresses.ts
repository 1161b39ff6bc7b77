import { ethers } from 'ethers';
import { ValidationError } from '../errors';
import { Address, Label, Timestamp } from '../types';

/**
 * Checksum an address, rejecting anything that is not a 20-byte hex address
 */
export function normalizeAddress(value: string, field: string): Address {
  if (!ethers.isAddress(value)) {
    throw new ValidationError('INVALID_INPUT', `${field} is not a valid address`, { field, value });
  }
  return ethers.getAddress(value);
}

export function assertTimestamp(value: number, field: string): Timestamp {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError('INVALID_INPUT', `${field} must be a non-negative integer number of seconds`, {
      field,
      value,
    });
  }
  return value;
}

export function assertLabel(value: number, field: string = 'label'): Label {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError('INVALID_INPUT', `${field} must be a non-negative integer`, { field, value });
  }
  return value;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
