/**
 * Incentive Configuration Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '../errors';
import { DEFAULT_INCENTIVE_SETTINGS, loadIncentiveConfigFromEnv, parseIncentiveConfig } from '../IncentiveConfig';
import { JSONSchemaValidator } from '../JSONSchemaValidator';
import { OWNER, createMockLogger, thrownBy } from './helpers/fixtures';

const RAW = {
  costWeight: '1000',
  refundWaitTime: '10',
  ownerClaimWaitTime: '20',
  anyAddressClaimWaitTime: '30',
  ownerAddress: OWNER,
};

describe('IncentiveConfig', () => {
  describe('parseIncentiveConfig', () => {
    it('converts validated strings to typed values', () => {
      expect(parseIncentiveConfig(RAW, createMockLogger())).toEqual({
        costWeight: 1000n,
        timings: { refundWaitTime: 10, ownerClaimWaitTime: 20, anyAddressClaimWaitTime: 30 },
        ownerAddress: OWNER,
      });
    });

    it('accepts a cost weight beyond the safe integer range', () => {
      const config = parseIncentiveConfig({ ...RAW, costWeight: '1' + '0'.repeat(30) }, createMockLogger());
      expect(config.costWeight).toBe(10n ** 30n);
    });

    it('reports schema failures with their paths', () => {
      const error = thrownBy(() => parseIncentiveConfig({ ...RAW, costWeight: '-5' }, createMockLogger()));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
      expect(error instanceof ValidationError && error.message).toMatch(/^Invalid incentive configuration: \/costWeight: /);
    });

    it('rejects unknown keys', () => {
      const error = thrownBy(() => parseIncentiveConfig({ ...RAW, extra: '1' }, createMockLogger()));
      expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
    });

    it('rejects timings out of order', () => {
      const error = thrownBy(() => parseIncentiveConfig({ ...RAW, refundWaitTime: '25' }, createMockLogger()));
      expect(error).toMatchObject({
        code: 'INVALID_CONFIG',
        message: 'Invalid claim timings: refundWaitTime must not exceed ownerClaimWaitTime',
      });
    });
  });

  describe('loadIncentiveConfigFromEnv', () => {
    it('falls back to the defaults', () => {
      const config = loadIncentiveConfigFromEnv({ INCENTIVE_OWNER_ADDRESS: OWNER.toLowerCase() }, createMockLogger());

      expect(config).toEqual({
        costWeight: BigInt(DEFAULT_INCENTIVE_SETTINGS.costWeight),
        timings: { refundWaitTime: 86_400, ownerClaimWaitTime: 604_800, anyAddressClaimWaitTime: 1_209_600 },
        ownerAddress: OWNER,
      });
      expect(config.costWeight).toBe(10n ** 15n);
    });

    it('reads overrides', () => {
      const config = loadIncentiveConfigFromEnv(
        {
          INCENTIVE_COST_WEIGHT: '7',
          INCENTIVE_REFUND_WAIT_SECONDS: '1',
          INCENTIVE_OWNER_CLAIM_WAIT_SECONDS: '2',
          INCENTIVE_ANY_ADDRESS_CLAIM_WAIT_SECONDS: '3',
          INCENTIVE_OWNER_ADDRESS: OWNER,
        },
        createMockLogger()
      );

      expect(config.costWeight).toBe(7n);
      expect(config.timings).toEqual({ refundWaitTime: 1, ownerClaimWaitTime: 2, anyAddressClaimWaitTime: 3 });
    });

    it('requires an owner address', () => {
      const error = thrownBy(() => loadIncentiveConfigFromEnv({}, createMockLogger()));

      expect(error).toMatchObject({
        code: 'INVALID_CONFIG',
        details: { errors: [`root: must have required property 'ownerAddress' (missingProperty="ownerAddress")`] },
      });
    });
  });
});

describe('JSONSchemaValidator', () => {
  const schema = {
    type: 'object',
    properties: { name: { type: 'string' } },
    required: ['name'],
    additionalProperties: false,
  };

  it('narrows valid data', () => {
    const result = new JSONSchemaValidator(createMockLogger()).validate<{ name: string }>({ name: 'x' }, schema);
    expect(result).toEqual({ valid: true, value: { name: 'x' }, errors: [] });
  });

  it('collects every error', () => {
    const logger = createMockLogger();
    const result = new JSONSchemaValidator(logger).validate({ other: 1 }, schema, 'named');

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'JSON schema validation failed',
      expect.objectContaining({ schemaId: 'named', errorCount: 2 })
    );
  });

  it('binds a schema id once across validators', () => {
    const first = new JSONSchemaValidator(createMockLogger());
    const second = new JSONSchemaValidator(createMockLogger());

    first.validate({ name: 'a' }, schema, 'cached-person');
    second.validate({ name: 'b' }, schema, 'cached-person');

    expect(second.getCacheStats().schemas.filter((id) => id === 'cached-person')).toEqual(['cached-person']);
  });

  it('refuses to reuse a schema id for another schema', () => {
    const validator = new JSONSchemaValidator(createMockLogger());
    validator.validate({ name: 'a' }, schema, 'rebound');

    const result = validator.validate({ name: 'a' }, { ...schema }, 'rebound');

    expect(result).toEqual({
      valid: false,
      errors: ['Schema validation error: rebound is already bound to another schema'],
    });
  });

  it('forgets bindings when cleared', () => {
    const validator = new JSONSchemaValidator(createMockLogger());
    validator.validate({ name: 'a' }, schema, 'cleared');

    validator.clearCache();

    expect(validator.getCacheStats()).toEqual({ size: 0, schemas: [] });
    expect(validator.validate({ name: 'a' }, { ...schema }, 'cleared').valid).toBe(true);
  });

  it('reports a broken schema instead of throwing', () => {
    const result = new JSONSchemaValidator(createMockLogger()).validate({}, { type: 'object', unknownKeyword: true });

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^Schema validation error: /);
  });
});
