/**
 * Vault Tests
 * Asset contracts, per-kind rules and engine custody
 */

import { describe, test, expect, beforeEach } from '@jest/globals';

import { TransactionJournal, createTransactionJournal } from '../../ledger/TransactionJournal';
import {
  AssetContractDirectory,
  AssetContractError,
  InMemoryFungibleAsset,
  InMemoryUniqueAsset,
} from '../AssetContracts';
import { AssetCustodyVault } from '../AssetCustodyVault';
import { ruleFor } from '../AssetKindRules';
import { AssetKind } from '../../market/MarketTypes';
import { MarketErrorCode, TransferFailure, ValidationError } from '../../market/MarketErrors';
import { captureError } from '../../__tests__/helpers/marketFixture';

const VAULT = 'vault';
const PUNK = { collection: 'punks', itemId: '42' };
const RUBY = { collection: 'gems', itemId: 'ruby' };

function createTestEnvironment() {
  const journal = createTransactionJournal();
  const directory = new AssetContractDirectory();
  const punks = new InMemoryUniqueAsset('punks', journal);
  const gems = new InMemoryFungibleAsset('gems', journal);
  directory.registerUnique(punks);
  directory.registerFungible(gems);
  const vault = new AssetCustodyVault(VAULT, directory, journal);
  return { journal, directory, punks, gems, vault };
}

// ============================================================================
// Asset Contracts
// ============================================================================

describe('InMemoryUniqueAsset', () => {
  let punks: InMemoryUniqueAsset;

  beforeEach(() => {
    punks = createTestEnvironment().punks;
    punks.mint('alice', '42');
  });

  test('owner can transfer directly', () => {
    punks.transferFrom('alice', 'alice', 'bob', '42');
    expect(punks.ownerOf('42')).toBe('bob');
  });

  test('operator needs approval', () => {
    expect(() => punks.transferFrom('carol', 'alice', 'bob', '42')).toThrow(AssetContractError);

    punks.setApprovalForAll('alice', 'carol', true);
    punks.transferFrom('carol', 'alice', 'bob', '42');
    expect(punks.ownerOf('42')).toBe('bob');
  });

  test('rejects duplicate mints and transfers of foreign items', () => {
    expect(() => punks.mint('bob', '42')).toThrow('already exists');
    expect(() => punks.transferFrom('bob', 'bob', 'carol', '42')).toThrow('does not own');
    expect(() => punks.transferFrom('alice', 'alice', 'bob', '7')).toThrow('does not exist');
  });

  test('rejects transfers to the null identity', () => {
    expect(() => punks.transferFrom('alice', 'alice', '', '42')).toThrow('null identity');
  });
});

describe('InMemoryFungibleAsset', () => {
  let gems: InMemoryFungibleAsset;

  beforeEach(() => {
    gems = createTestEnvironment().gems;
    gems.mint('alice', 'ruby', 10);
  });

  test('moves quantities per item id', () => {
    gems.transferFrom('alice', 'alice', 'bob', 'ruby', 4);

    expect(gems.balanceOf('alice', 'ruby')).toBe(6);
    expect(gems.balanceOf('bob', 'ruby')).toBe(4);
    expect(gems.balanceOf('bob', 'opal')).toBe(0);
  });

  test('rejects overdrafts', () => {
    expect(() => gems.transferFrom('alice', 'alice', 'bob', 'ruby', 11)).toThrow('cannot transfer 11');
  });
});

describe('AssetContractDirectory', () => {
  test('unknown collections surface as transfer failures', () => {
    const directory = new AssetContractDirectory();

    const error = captureError(() => directory.unique('nope'));
    expect(error).toBeInstanceOf(TransferFailure);
    expect(error).toMatchObject({ code: MarketErrorCode.UNKNOWN_COLLECTION });
  });
});

// ============================================================================
// Asset Kind Rules
// ============================================================================

describe('AssetKindRules', () => {
  test('unique assets move exactly one unit', () => {
    const rule = ruleFor(AssetKind.UNIQUE);

    expect(() => rule.validateAmount(1)).not.toThrow();
    expect(captureError(() => rule.validateAmount(2))).toMatchObject({
      code: MarketErrorCode.KIND_AMOUNT_MISMATCH,
    });
    expect(captureError(() => rule.validateAmount(0))).toMatchObject({
      code: MarketErrorCode.INVALID_AMOUNT,
    });
  });

  test('fungible assets take any positive integer', () => {
    const rule = ruleFor(AssetKind.FUNGIBLE);

    expect(() => rule.validateAmount(250)).not.toThrow();
    expect(() => rule.validateAmount(0)).toThrow(ValidationError);
    expect(() => rule.validateAmount(2.5)).toThrow(ValidationError);
  });
});

// ============================================================================
// AssetCustodyVault
// ============================================================================

describe('AssetCustodyVault', () => {
  let env: ReturnType<typeof createTestEnvironment>;

  beforeEach(() => {
    env = createTestEnvironment();
    env.punks.mint('alice', '42');
    env.gems.mint('alice', 'ruby', 10);
    env.punks.setApprovalForAll('alice', VAULT, true);
    env.gems.setApprovalForAll('alice', VAULT, true);
  });

  test('holds and releases a unique item', () => {
    env.vault.holdFromSeller(PUNK, AssetKind.UNIQUE, 1, 'alice');

    expect(env.punks.ownerOf('42')).toBe(VAULT);
    expect(env.vault.custodyOf(AssetKind.UNIQUE, PUNK)).toBe(1);
    expect(env.vault.onChainHolding(AssetKind.UNIQUE, PUNK)).toBe(1);

    env.vault.releaseTo(PUNK, AssetKind.UNIQUE, 1, 'bob');

    expect(env.punks.ownerOf('42')).toBe('bob');
    expect(env.vault.custodyOf(AssetKind.UNIQUE, PUNK)).toBe(0);
    expect(env.vault.getPositions()).toEqual([]);
  });

  test('accumulates fungible custody', () => {
    env.vault.holdFromSeller(RUBY, AssetKind.FUNGIBLE, 3, 'alice');
    env.vault.holdFromSeller(RUBY, AssetKind.FUNGIBLE, 4, 'alice');

    expect(env.vault.custodyOf(AssetKind.FUNGIBLE, RUBY)).toBe(7);
    expect(env.gems.balanceOf(VAULT, 'ruby')).toBe(7);
    expect(env.vault.getPositions()).toEqual([{ kind: AssetKind.FUNGIBLE, asset: RUBY, amount: 7 }]);
  });

  test('refuses to release beyond its custody counter', () => {
    env.vault.holdFromSeller(RUBY, AssetKind.FUNGIBLE, 3, 'alice');
    env.gems.mint(VAULT, 'ruby', 5);

    const error = captureError(() => env.vault.releaseTo(RUBY, AssetKind.FUNGIBLE, 4, 'bob'));
    expect(error).toMatchObject({
      code: MarketErrorCode.INSUFFICIENT_CUSTODY,
      details: { requested: 4, held: 3 },
    });
  });

  test('wraps primitive refusals as asset transfer failures', () => {
    env.punks.setApprovalForAll('alice', VAULT, false);

    const error = captureError(() => env.vault.holdFromSeller(PUNK, AssetKind.UNIQUE, 1, 'alice'));
    expect(error).toBeInstanceOf(TransferFailure);
    expect(error).toMatchObject({ code: MarketErrorCode.ASSET_TRANSFER_FAILED });
    expect(env.vault.custodyOf(AssetKind.UNIQUE, PUNK)).toBe(0);
  });

  test('a refusing recipient leaves custody intact after rollback', () => {
    env.vault.holdFromSeller(PUNK, AssetKind.UNIQUE, 1, 'alice');
    env.punks.setReceiver('bob', () => {
      throw new Error('no thanks');
    });

    expect(() =>
      env.journal.atomically('release', () => env.vault.releaseTo(PUNK, AssetKind.UNIQUE, 1, 'bob'))
    ).toThrow(TransferFailure);

    expect(env.punks.ownerOf('42')).toBe(VAULT);
    expect(env.vault.custodyOf(AssetKind.UNIQUE, PUNK)).toBe(1);
  });

  test('restorePositions replaces the counters', () => {
    env.vault.holdFromSeller(RUBY, AssetKind.FUNGIBLE, 3, 'alice');
    env.vault.restorePositions([{ kind: AssetKind.UNIQUE, asset: PUNK, amount: 1 }]);

    expect(env.vault.custodyOf(AssetKind.FUNGIBLE, RUBY)).toBe(0);
    expect(env.vault.custodyOf(AssetKind.UNIQUE, PUNK)).toBe(1);
  });
});
