/**
 * MarketConfig Tests
 */

import { describe, test, expect } from '@jest/globals';

import { DEFAULT_MARKET_CONFIG, createMarketConfig, marketConfigFromEnv } from '../MarketConfig';
import { MarketErrorCode, ValidationError } from '../MarketErrors';
import { captureError } from '../../__tests__/helpers/marketFixture';

describe('createMarketConfig', () => {
  test('fills in defaults', () => {
    expect(createMarketConfig({ owner: 'owner', feeRecipient: 'treasury' })).toEqual({
      engineAddress: 'market-engine',
      owner: 'owner',
      feeRecipient: 'treasury',
      initialFeeBps: 250,
      maxBatchSize: 50,
      firstListingId: 1,
      transactionLogLimit: 1000,
    });
  });

  test('result is frozen', () => {
    const config = createMarketConfig({ owner: 'owner', feeRecipient: 'treasury' });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('rejects a null owner or fee recipient', () => {
    expect(captureError(() => createMarketConfig({ owner: '', feeRecipient: 'treasury' }))).toMatchObject({
      code: MarketErrorCode.INVALID_CONFIG,
      details: { field: 'owner' },
    });
    expect(() => createMarketConfig({ owner: 'owner', feeRecipient: '  ' })).toThrow(ValidationError);
  });

  test('engine address must differ from the owner and fee recipient', () => {
    expect(() =>
      createMarketConfig({ owner: 'owner', feeRecipient: 'treasury', engineAddress: 'owner' })
    ).toThrow('engineAddress must differ');
    expect(() =>
      createMarketConfig({ owner: 'owner', feeRecipient: 'treasury', engineAddress: 'treasury' })
    ).toThrow(ValidationError);
  });

  test('rejects a fee above the cap and non-positive limits', () => {
    const base = { owner: 'owner', feeRecipient: 'treasury' };

    expect(() => createMarketConfig({ ...base, initialFeeBps: 1001 })).toThrow(ValidationError);
    expect(() => createMarketConfig({ ...base, maxBatchSize: 0 })).toThrow(ValidationError);
    expect(() => createMarketConfig({ ...base, firstListingId: 1.5 })).toThrow(ValidationError);
    expect(() => createMarketConfig({ ...base, transactionLogLimit: -1 })).toThrow(ValidationError);
  });
});

describe('marketConfigFromEnv', () => {
  test('reads MARKET_* variables', () => {
    const config = marketConfigFromEnv({
      MARKET_OWNER: 'env-owner',
      MARKET_FEE_RECIPIENT: 'env-treasury',
      MARKET_ENGINE_ADDRESS: 'env-engine',
      MARKET_FEE_BPS: '125',
      MARKET_MAX_BATCH_SIZE: '8',
    });

    expect(config).toEqual({
      ...DEFAULT_MARKET_CONFIG,
      owner: 'env-owner',
      feeRecipient: 'env-treasury',
      engineAddress: 'env-engine',
      initialFeeBps: 125,
      maxBatchSize: 8,
    });
  });

  test('overrides win over the environment', () => {
    const config = marketConfigFromEnv(
      { MARKET_OWNER: 'env-owner', MARKET_FEE_RECIPIENT: 'env-treasury', MARKET_FEE_BPS: '125' },
      { initialFeeBps: 10 }
    );

    expect(config.initialFeeBps).toBe(10);
    expect(config.owner).toBe('env-owner');
  });

  test('requires an owner and a fee recipient', () => {
    expect(() => marketConfigFromEnv({ MARKET_FEE_RECIPIENT: 'env-treasury' })).toThrow('MARKET_OWNER is not set');
    expect(() => marketConfigFromEnv({ MARKET_OWNER: 'env-owner' })).toThrow('MARKET_FEE_RECIPIENT is not set');
  });

  test('rejects non-numeric integers', () => {
    expect(
      captureError(() =>
        marketConfigFromEnv({ MARKET_OWNER: 'o', MARKET_FEE_RECIPIENT: 't', MARKET_FEE_BPS: 'lots' })
      )
    ).toMatchObject({ code: MarketErrorCode.INVALID_CONFIG, details: { name: 'MARKET_FEE_BPS' } });
  });
});
