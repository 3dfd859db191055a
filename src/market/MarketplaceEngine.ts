/**
 * MarketplaceEngine.ts
 * Entry point of the escrow marketplace
 *
 * Every mutating operation runs through execute(): the ReentrancyGuard
 * admits one operation at a time, and the TransactionJournal commits all of
 * its effects or none. Views never take the guard and never mutate.
 */

import { PartyId } from '../security/Identity';
import { ReentrancyGuard } from '../security/ReentrancyGuard';
import { AccessGuard } from '../security/AccessGuard';
import { TransactionJournal, TransactionRecord } from '../ledger/TransactionJournal';
import { NativeBalances } from '../ledger/NativeBalances';
import { AssetContractDirectory } from '../vault/AssetContracts';
import { AssetCustodyVault, CustodyPosition } from '../vault/AssetCustodyVault';
import { ListingRegistry } from '../listings/ListingRegistry';
import { FeePolicy, FeePolicyState } from '../fees/FeePolicy';
import { SettlementEngine, ListingQuote } from '../settlement/SettlementEngine';
import { BatchPurchaseCoordinator } from '../settlement/BatchPurchaseCoordinator';
import {
  MarketEventEntry,
  MarketEventListener,
  MarketEventLog,
  MarketEventQuery,
  IntegrityResult,
} from '../events/MarketEventLog';
import {
  MarketSnapshot,
  createSnapshot,
  verifySnapshot,
} from '../persistence/MarketPersistence';
import {
  InvariantResult,
  MarketStateView,
  CustodyHolding,
  listingTermProblems,
  verifyMarketInvariants,
} from '../invariants/MarketInvariants';
import { createLogger, LogContext, Logger } from '../utils/logger';
import { MarketConfig, MarketConfigInput, createMarketConfig } from './MarketConfig';
import { MarketHost, createMarketHost } from './MarketHost';
import { MarketErrorCode, MarketErrors, isMarketError } from './MarketErrors';
import {
  AssetKind,
  AssetRef,
  BatchQuote,
  BatchReceipt,
  Listing,
  ListingFilter,
  ListingId,
  SettlementReceipt,
  assetKey,
} from './MarketTypes';

// ============================================================================
// Options
// ============================================================================

export interface MarketplaceEngineOptions {
  readonly config: MarketConfigInput;
  /** Ledger to run on. A fresh in-memory host is created when omitted. */
  readonly host?: MarketHost;
  readonly logger?: Logger;
}

export interface RestoreOptions {
  readonly host?: MarketHost;
  readonly logger?: Logger;
  readonly maxBatchSize?: number;
  readonly transactionLogLimit?: number;
}

// ============================================================================
// MarketplaceEngine Implementation
// ============================================================================

export class MarketplaceEngine {
  private readonly config: MarketConfig;
  private readonly host: MarketHost;
  private readonly logger: Logger;
  private readonly guard: ReentrancyGuard;
  private readonly access: AccessGuard;
  private readonly events: MarketEventLog;
  private readonly vault: AssetCustodyVault;
  private readonly registry: ListingRegistry;
  private readonly fees: FeePolicy;
  private readonly settlement: SettlementEngine;
  private readonly batch: BatchPurchaseCoordinator;

  constructor(options: MarketplaceEngineOptions) {
    this.config = createMarketConfig(options.config);
    this.logger = options.logger ?? createLogger('market');
    this.host =
      options.host ??
      createMarketHost({ transactionLogLimit: this.config.transactionLogLimit, logger: this.logger.child('journal') });

    const journal = this.host.journal;

    this.guard = new ReentrancyGuard();
    this.access = new AccessGuard(this.config.owner);
    this.events = new MarketEventLog(journal, this.logger.child('events'));
    this.vault = new AssetCustodyVault(this.config.engineAddress, this.host.assets, journal);
    this.registry = new ListingRegistry(journal, this.vault, this.events, this.config.firstListingId);
    this.fees = new FeePolicy(
      journal,
      this.access,
      this.events,
      { feeBps: this.config.initialFeeBps, feeRecipient: this.config.feeRecipient },
      this.config.engineAddress
    );
    this.settlement = new SettlementEngine(
      this.config.engineAddress,
      this.host.balances,
      this.registry,
      this.vault,
      this.fees,
      this.events
    );
    this.batch = new BatchPurchaseCoordinator(
      this.registry,
      this.settlement,
      this.events,
      this.config.maxBatchSize
    );
  }

  // ==========================================================================
  // Mutating Entry Points
  // ==========================================================================

  create(
    asset: AssetRef,
    kind: AssetKind,
    amount: number,
    price: number,
    seller: PartyId
  ): Listing {
    return this.execute('create', { seller, asset: `${asset.collection}#${asset.itemId}`, kind, amount, price }, () =>
      this.registry.create(asset, kind, amount, price, seller)
    );
  }

  cancel(id: ListingId, caller: PartyId): Listing {
    return this.execute('cancel', { listingId: id, caller }, () => this.registry.cancel(id, caller));
  }

  settle(id: ListingId, buyer: PartyId, paidAmount: number): SettlementReceipt {
    return this.execute('settle', { listingId: id, buyer, paidAmount }, () =>
      this.settlement.settle(id, buyer, paidAmount)
    );
  }

  settleBatch(ids: readonly ListingId[], buyer: PartyId, paidAmount: number): BatchReceipt {
    return this.execute('settleBatch', { listingIds: [...ids], buyer, paidAmount }, () =>
      this.batch.settleBatch(ids, buyer, paidAmount)
    );
  }

  setFee(newFeeBps: number, caller: PartyId): void {
    this.execute('setFee', { feeBps: newFeeBps, caller }, () => this.fees.setFee(newFeeBps, caller));
  }

  setFeeRecipient(newRecipient: PartyId, caller: PartyId): void {
    this.execute('setFeeRecipient', { feeRecipient: newRecipient, caller }, () =>
      this.fees.setFeeRecipient(newRecipient, caller)
    );
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  /**
   * The engine's own identity: custodian of listed assets and collected value.
   */
  get address(): PartyId {
    return this.config.engineAddress;
  }

  getConfig(): MarketConfig {
    return this.config;
  }

  getHost(): MarketHost {
    return this.host;
  }

  get balances(): NativeBalances {
    return this.host.balances;
  }

  get assets(): AssetContractDirectory {
    return this.host.assets;
  }

  get journal(): TransactionJournal {
    return this.host.journal;
  }

  getListing(id: ListingId): Listing | null {
    return this.registry.get(id);
  }

  getListings(filter?: ListingFilter): readonly Listing[] {
    return this.registry.list(filter);
  }

  getNextListingId(): ListingId {
    return this.registry.getNextId();
  }

  getFeePolicy(): FeePolicyState {
    return this.fees.getState();
  }

  getOwner(): PartyId {
    return this.access.getOwner();
  }

  getCustody(kind: AssetKind, asset: AssetRef): number {
    return this.vault.custodyOf(kind, asset);
  }

  quote(id: ListingId): ListingQuote {
    return this.settlement.quote(id);
  }

  quoteBatch(ids: readonly ListingId[]): BatchQuote {
    return this.batch.quoteBatch(ids);
  }

  getEvents(query?: MarketEventQuery): readonly MarketEventEntry[] {
    return this.events.query(query);
  }

  onEvent(listener: MarketEventListener): () => void {
    return this.events.subscribe(listener);
  }

  verifyEventLog(): IntegrityResult {
    return this.events.verifyIntegrity();
  }

  isLocked(): boolean {
    return this.guard.locked;
  }

  getRejectedReentrantCalls(): number {
    return this.guard.getRejectedCount();
  }

  getTransactionLog(): readonly TransactionRecord[] {
    return this.host.journal.getTransactionLog();
  }

  // ==========================================================================
  // Persistence & Verification
  // ==========================================================================

  snapshot(): MarketSnapshot {
    const fees = this.fees.getState();
    return createSnapshot({
      engineAddress: this.config.engineAddress,
      owner: this.access.getOwner(),
      feeBps: fees.feeBps,
      feeRecipient: fees.feeRecipient,
      firstListingId: this.registry.getFirstId(),
      nextListingId: this.registry.getNextId(),
      listings: this.registry.list(),
    });
  }

  inspect(): MarketStateView {
    const fees = this.fees.getState();
    return {
      listings: this.registry.list(),
      firstListingId: this.registry.getFirstId(),
      nextListingId: this.registry.getNextId(),
      feeBps: fees.feeBps,
      feeRecipient: fees.feeRecipient,
      custody: this.vault.getPositions().map(position => this.toHolding(position)),
    };
  }

  verifyInvariants(): readonly InvariantResult[] {
    return verifyMarketInvariants(this.inspect());
  }

  /**
   * Rebuild an engine from a snapshot. The host must already hold the
   * escrowed assets under the snapshot's engine address.
   */
  static fromSnapshot(snapshot: MarketSnapshot, options: RestoreOptions = {}): MarketplaceEngine {
    if (!verifySnapshot(snapshot)) {
      throw MarketErrors.invalidSnapshot('checksum mismatch', { checksum: snapshot.checksum });
    }

    const engine = new MarketplaceEngine({
      config: {
        engineAddress: snapshot.engineAddress,
        owner: snapshot.owner,
        feeRecipient: snapshot.feeRecipient,
        initialFeeBps: snapshot.feeBps,
        firstListingId: snapshot.firstListingId,
        ...(options.maxBatchSize !== undefined ? { maxBatchSize: options.maxBatchSize } : {}),
        ...(options.transactionLogLimit !== undefined
          ? { transactionLogLimit: options.transactionLogLimit }
          : {}),
      },
      host: options.host,
      logger: options.logger,
    });

    engine.restore(snapshot);
    return engine;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private execute<T>(operation: string, context: LogContext, work: () => T): T {
    try {
      const result = this.guard.run(operation, () => this.host.journal.atomically(operation, work));
      this.logger.info(`${operation} committed`, context);
      return result;
    } catch (error) {
      this.logger.warn(`${operation} rejected`, {
        ...context,
        code: isMarketError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private restore(snapshot: MarketSnapshot): void {
    const seen = new Set<ListingId>();
    for (const listing of snapshot.listings) {
      if (listing.id < snapshot.firstListingId || listing.id >= snapshot.nextListingId) {
        throw MarketErrors.invalidSnapshot(`listing id ${listing.id} is outside the id range`, {
          listingId: listing.id,
        });
      }
      if (seen.has(listing.id)) {
        throw MarketErrors.invalidSnapshot(`listing id ${listing.id} appears more than once`, {
          listingId: listing.id,
        });
      }
      seen.add(listing.id);

      if (listing.seller === snapshot.engineAddress) {
        throw MarketErrors.invalidSnapshot(`listing ${listing.id} is sold by the engine itself`, {
          listingId: listing.id,
        });
      }

      const problems = listingTermProblems(listing);
      if (problems.length > 0) {
        throw MarketErrors.invalidSnapshot(`listing ${listing.id} is malformed: ${problems.join(', ')}`, {
          listingId: listing.id,
          problems,
        });
      }
    }

    const custody = new Map<string, CustodyPosition>();
    for (const listing of snapshot.listings) {
      if (!listing.active) continue;
      const key = assetKey(listing.kind, listing.asset);
      const held = custody.get(key)?.amount ?? 0;
      custody.set(key, { kind: listing.kind, asset: listing.asset, amount: held + listing.amount });
    }

    this.guard.run('restore', () =>
      this.host.journal.atomically('restore', () => {
        this.registry.restore(snapshot.listings, snapshot.nextListingId);
        this.vault.restorePositions(Array.from(custody.values()));
      })
    );

    this.logger.info('Engine restored from snapshot', {
      listings: snapshot.listings.length,
      nextListingId: snapshot.nextListingId,
    });
  }

  private toHolding(position: CustodyPosition): CustodyHolding {
    try {
      return { ...position, onChain: this.vault.onChainHolding(position.kind, position.asset) };
    } catch (error) {
      if (isMarketError(error) && error.code === MarketErrorCode.UNKNOWN_COLLECTION) {
        return { ...position, onChain: null };
      }
      throw error;
    }
  }
}

export function createMarketplaceEngine(options: MarketplaceEngineOptions): MarketplaceEngine {
  return new MarketplaceEngine(options);
}
