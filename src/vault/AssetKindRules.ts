/**
 * AssetKindRules.ts
 * Per-kind quantity rule and transfer dispatch
 */

import { PartyId } from '../security/Identity';
import { AssetKind, AssetRef } from '../market/MarketTypes';
import { MarketErrors } from '../market/MarketErrors';
import { AssetContractDirectory } from './AssetContracts';

export interface AssetKindRule {
  readonly kind: AssetKind;
  /** Throws ValidationError when `amount` is not a legal quantity for this kind. */
  validateAmount(amount: number): void;
  transfer(
    directory: AssetContractDirectory,
    asset: AssetRef,
    operator: PartyId,
    from: PartyId,
    to: PartyId,
    amount: number
  ): void;
  holdingOf(directory: AssetContractDirectory, asset: AssetRef, holder: PartyId): number;
}

function requirePositiveAmount(amount: number): void {
  if (!Number.isSafeInteger(amount)) {
    throw MarketErrors.invalidAmount(amount, 'must be a safe integer');
  }
  if (amount <= 0) {
    throw MarketErrors.invalidAmount(amount, 'must be positive');
  }
}

const UNIQUE_RULE: AssetKindRule = {
  kind: AssetKind.UNIQUE,

  validateAmount(amount) {
    requirePositiveAmount(amount);
    if (amount !== 1) {
      throw MarketErrors.kindAmountMismatch(AssetKind.UNIQUE, amount, 1);
    }
  },

  transfer(directory, asset, operator, from, to) {
    directory.unique(asset.collection).transferFrom(operator, from, to, asset.itemId);
  },

  holdingOf(directory, asset, holder) {
    return directory.unique(asset.collection).ownerOf(asset.itemId) === holder ? 1 : 0;
  },
};

const FUNGIBLE_RULE: AssetKindRule = {
  kind: AssetKind.FUNGIBLE,

  validateAmount(amount) {
    requirePositiveAmount(amount);
  },

  transfer(directory, asset, operator, from, to, amount) {
    directory.fungible(asset.collection).transferFrom(operator, from, to, asset.itemId, amount);
  },

  holdingOf(directory, asset, holder) {
    return directory.fungible(asset.collection).balanceOf(holder, asset.itemId);
  },
};

export const ASSET_KIND_RULES: Readonly<Record<AssetKind, AssetKindRule>> = {
  [AssetKind.UNIQUE]: UNIQUE_RULE,
  [AssetKind.FUNGIBLE]: FUNGIBLE_RULE,
};

export function ruleFor(kind: AssetKind): AssetKindRule {
  return ASSET_KIND_RULES[kind];
}
