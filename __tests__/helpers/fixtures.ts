/**
 * Shared test fixtures: addresses, a recording logger and a scripted classifier
 */

import { jest } from '@jest/globals';
import { IClassifier } from '../../interfaces/IClassifier';
import { Label } from '../../types';
import { ILogger } from '../../utils/ILogger';

// Digit-only addresses are already in checksum form
export const ORCHESTRATOR = '0x1000000000000000000000000000000000000001';
export const OWNER = '0x2000000000000000000000000000000000000002';
export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const CAROL = '0x3333333333333333333333333333333333333333';
export const STRANGER = '0x4444444444444444444444444444444444444444';

export const TIMINGS = {
  refundWaitTime: 50,
  ownerClaimWaitTime: 100,
  anyAddressClaimWaitTime: 200,
};

export const DEPLOYED_AT = 1000;

export function createMockLogger() {
  return {
    debug: jest.fn<ILogger['debug']>(),
    info: jest.fn<ILogger['info']>(),
    warn: jest.fn<ILogger['warn']>(),
    error: jest.fn<ILogger['error']>(),
  };
}

export type MockLogger = ReturnType<typeof createMockLogger>;

export function loggedMessages(fn: MockLogger['info']): string[] {
  return fn.mock.calls.map(([message]) => message);
}

/**
 * Classifier whose prediction is set by the test
 */
export class ScriptedClassifier<TSample> implements IClassifier<TSample> {
  readonly updates: Array<{ sample: TSample; label: Label }> = [];
  failUpdates = false;

  constructor(public prediction: Label) {}

  async update(sample: TSample, label: Label): Promise<void> {
    if (this.failUpdates) {
      throw new Error('model update failed');
    }
    this.updates.push({ sample, label });
  }

  async predict(): Promise<Label> {
    return this.prediction;
  }
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
