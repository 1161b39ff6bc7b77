/**
 * Incentive Configuration
 *
 * Economic parameters of a deployment, loaded from the environment and
 * validated against schemas/incentive-config.schema.json before use.
 */

import { ValidationError } from './errors';
import { validateClaimTimings } from './IncentiveEngine';
import { JSONSchemaValidator } from './JSONSchemaValidator';
import incentiveConfigSchema from './schemas/incentive-config.schema.json';
import { Address, ClaimTimings } from './types';
import { ILogger, scopedLogger } from './utils/ILogger';
import { normalizeAddress } from './utils/addresses';

export interface IncentiveConfig {
  costWeight: bigint;
  timings: ClaimTimings;
  /** Address eligible for owner sweeps */
  ownerAddress: Address;
}

/** Wire form: every value a decimal or hex string, as it arrives from env or JSON */
export interface RawIncentiveConfig {
  costWeight: string;
  refundWaitTime: string;
  ownerClaimWaitTime: string;
  anyAddressClaimWaitTime: string;
  ownerAddress: string;
}

export type EnvSource = Record<string, string | undefined>;

const DAY_SECONDS = 24 * 60 * 60;

export const DEFAULT_INCENTIVE_SETTINGS = {
  costWeight: '1000000000000000', // 1e15
  refundWaitTime: String(DAY_SECONDS),
  ownerClaimWaitTime: String(7 * DAY_SECONDS),
  anyAddressClaimWaitTime: String(14 * DAY_SECONDS),
} as const;

export const INCENTIVE_ENV_KEYS = {
  costWeight: 'INCENTIVE_COST_WEIGHT',
  refundWaitTime: 'INCENTIVE_REFUND_WAIT_SECONDS',
  ownerClaimWaitTime: 'INCENTIVE_OWNER_CLAIM_WAIT_SECONDS',
  anyAddressClaimWaitTime: 'INCENTIVE_ANY_ADDRESS_CLAIM_WAIT_SECONDS',
  ownerAddress: 'INCENTIVE_OWNER_ADDRESS',
} as const;

/**
 * Validate a raw configuration object and convert it to typed values
 */
export function parseIncentiveConfig(raw: unknown, logger?: ILogger): IncentiveConfig {
  const validator = new JSONSchemaValidator(scopedLogger(logger, 'IncentiveConfig'));
  const result = validator.validate<RawIncentiveConfig>(raw, incentiveConfigSchema, 'incentive-config');
  if (!result.valid) {
    throw new ValidationError('INVALID_CONFIG', `Invalid incentive configuration: ${result.errors.join('; ')}`, {
      errors: result.errors,
    });
  }

  const value = result.value;
  return validateIncentiveConfig({
    costWeight: BigInt(value.costWeight),
    timings: {
      refundWaitTime: Number(value.refundWaitTime),
      ownerClaimWaitTime: Number(value.ownerClaimWaitTime),
      anyAddressClaimWaitTime: Number(value.anyAddressClaimWaitTime),
    },
    ownerAddress: value.ownerAddress,
  });
}

/**
 * Check the cross-field rules the schema cannot express
 */
export function validateIncentiveConfig(config: IncentiveConfig): IncentiveConfig {
  return {
    costWeight: config.costWeight,
    timings: validateClaimTimings(config.timings),
    ownerAddress: normalizeAddress(config.ownerAddress, 'ownerAddress'),
  };
}

/**
 * Load configuration from environment variables, falling back to the defaults
 * for everything except the owner address
 */
export function loadIncentiveConfigFromEnv(env: EnvSource = process.env, logger?: ILogger): IncentiveConfig {
  const raw: Partial<RawIncentiveConfig> = {
    costWeight: env[INCENTIVE_ENV_KEYS.costWeight] ?? DEFAULT_INCENTIVE_SETTINGS.costWeight,
    refundWaitTime: env[INCENTIVE_ENV_KEYS.refundWaitTime] ?? DEFAULT_INCENTIVE_SETTINGS.refundWaitTime,
    ownerClaimWaitTime: env[INCENTIVE_ENV_KEYS.ownerClaimWaitTime] ?? DEFAULT_INCENTIVE_SETTINGS.ownerClaimWaitTime,
    anyAddressClaimWaitTime:
      env[INCENTIVE_ENV_KEYS.anyAddressClaimWaitTime] ?? DEFAULT_INCENTIVE_SETTINGS.anyAddressClaimWaitTime,
  };
  const ownerAddress = env[INCENTIVE_ENV_KEYS.ownerAddress];
  if (ownerAddress !== undefined) {
    raw.ownerAddress = ownerAddress;
  }
  return parseIncentiveConfig(raw, logger);
}
