/**
 * MarketConfig.ts
 * Engine construction settings
 *
 * Sources, lowest priority first:
 * - DEFAULT_MARKET_CONFIG
 * - environment (marketConfigFromEnv)
 * - explicit overrides passed to createMarketConfig
 */

import { PartyId, isNullParty } from '../security/Identity';
import { MarketErrors } from './MarketErrors';
import { MAX_FEE_BPS, isValidFeeBps } from '../fees/FeePolicy';

// ============================================================================
// Types
// ============================================================================

export interface MarketConfig {
  readonly engineAddress: PartyId;
  readonly owner: PartyId;
  readonly feeRecipient: PartyId;
  readonly initialFeeBps: number;
  readonly maxBatchSize: number;
  readonly firstListingId: number;
  readonly transactionLogLimit: number;
}

export type MarketConfigInput = Partial<MarketConfig> &
  Pick<MarketConfig, 'owner' | 'feeRecipient'>;

export const DEFAULT_MARKET_CONFIG = {
  engineAddress: 'market-engine',
  initialFeeBps: 250,
  maxBatchSize: 50,
  firstListingId: 1,
  transactionLogLimit: 1000,
} as const;

// ============================================================================
// Validation
// ============================================================================

function requireParty(value: PartyId, field: string): void {
  if (isNullParty(value)) {
    throw MarketErrors.invalidConfig(`${field} must not be the null identity`, { field });
  }
}

function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw MarketErrors.invalidConfig(`${field} must be a positive integer`, { field, value });
  }
}

export function validateMarketConfig(config: MarketConfig): void {
  requireParty(config.owner, 'owner');
  requireParty(config.feeRecipient, 'feeRecipient');
  requireParty(config.engineAddress, 'engineAddress');

  if (config.engineAddress === config.owner || config.engineAddress === config.feeRecipient) {
    throw MarketErrors.invalidConfig('engineAddress must differ from owner and feeRecipient', {
      engineAddress: config.engineAddress,
    });
  }

  if (!isValidFeeBps(config.initialFeeBps)) {
    throw MarketErrors.invalidConfig(`initialFeeBps must be an integer in 0..${MAX_FEE_BPS}`, {
      initialFeeBps: config.initialFeeBps,
    });
  }

  requirePositiveInteger(config.maxBatchSize, 'maxBatchSize');
  requirePositiveInteger(config.firstListingId, 'firstListingId');
  requirePositiveInteger(config.transactionLogLimit, 'transactionLogLimit');
}

// ============================================================================
// Factories
// ============================================================================

export function createMarketConfig(input: MarketConfigInput): MarketConfig {
  const config: MarketConfig = Object.freeze({ ...DEFAULT_MARKET_CONFIG, ...input });
  validateMarketConfig(config);
  return config;
}

type MarketConfigDraft = { -readonly [K in keyof MarketConfig]?: MarketConfig[K] };

function readInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw MarketErrors.invalidConfig(`${name} must be an integer`, { name, raw });
  }
  return value;
}

/**
 * Build a config from MARKET_* environment variables, with `overrides`
 * taking precedence.
 */
export function marketConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<MarketConfig> = {}
): MarketConfig {
  const fromEnv: MarketConfigDraft = {};

  if (env.MARKET_OWNER) fromEnv.owner = env.MARKET_OWNER;
  if (env.MARKET_FEE_RECIPIENT) fromEnv.feeRecipient = env.MARKET_FEE_RECIPIENT;
  if (env.MARKET_ENGINE_ADDRESS) fromEnv.engineAddress = env.MARKET_ENGINE_ADDRESS;

  const feeBps = readInteger(env, 'MARKET_FEE_BPS');
  if (feeBps !== undefined) fromEnv.initialFeeBps = feeBps;

  const maxBatchSize = readInteger(env, 'MARKET_MAX_BATCH_SIZE');
  if (maxBatchSize !== undefined) fromEnv.maxBatchSize = maxBatchSize;

  const merged: MarketConfigDraft = { ...fromEnv, ...overrides };
  const owner = merged.owner;
  const feeRecipient = merged.feeRecipient;

  if (owner === undefined) {
    throw MarketErrors.invalidConfig('MARKET_OWNER is not set', { field: 'owner' });
  }
  if (feeRecipient === undefined) {
    throw MarketErrors.invalidConfig('MARKET_FEE_RECIPIENT is not set', { field: 'feeRecipient' });
  }

  return createMarketConfig({ ...merged, owner, feeRecipient });
}
