/**
 * MarketHost.ts
 * The ledger an engine runs on: one journal shared by native balances and
 * every asset contract, so one rollback covers all of them.
 */

import { TransactionJournal, createTransactionJournal } from '../ledger/TransactionJournal';
import { NativeBalances, createNativeBalances } from '../ledger/NativeBalances';
import {
  AssetContractDirectory,
  InMemoryFungibleAsset,
  InMemoryUniqueAsset,
} from '../vault/AssetContracts';
import { Logger } from '../utils/logger';

export interface MarketHost {
  readonly journal: TransactionJournal;
  readonly balances: NativeBalances;
  readonly assets: AssetContractDirectory;
}

export interface MarketHostOptions {
  readonly transactionLogLimit?: number;
  readonly logger?: Logger;
}

export function createMarketHost(options: MarketHostOptions = {}): MarketHost {
  const journal = createTransactionJournal(
    options.transactionLogLimit === undefined ? {} : { logLimit: options.transactionLogLimit },
    options.logger
  );
  return {
    journal,
    balances: createNativeBalances(journal),
    assets: new AssetContractDirectory(),
  };
}

/**
 * Create an in-memory unique collection on the host's journal and register it.
 */
export function deployUniqueCollection(host: MarketHost, collection: string): InMemoryUniqueAsset {
  const contract = new InMemoryUniqueAsset(collection, host.journal);
  host.assets.registerUnique(contract);
  return contract;
}

/**
 * Create an in-memory fungible collection on the host's journal and register it.
 */
export function deployFungibleCollection(host: MarketHost, collection: string): InMemoryFungibleAsset {
  const contract = new InMemoryFungibleAsset(collection, host.journal);
  host.assets.registerFungible(contract);
  return contract;
}
