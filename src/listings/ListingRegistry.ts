/**
 * ListingRegistry.ts
 * Listing lifecycle: create, cancel, close as sold
 *
 * Key concepts:
 * - Ids are allocated sequentially and never reused
 * - A listing is stored only once its asset is in custody
 * - Closed listings stay in the map, inactive, with close metadata
 */

import { PartyId, isNullParty } from '../security/Identity';
import {
  AssetKind,
  AssetRef,
  Listing,
  ListingFilter,
  ListingId,
  isAssetKind,
} from '../market/MarketTypes';
import { MarketErrors } from '../market/MarketErrors';
import { TransactionJournal } from '../ledger/TransactionJournal';
import { AssetCustodyVault } from '../vault/AssetCustodyVault';
import { ruleFor } from '../vault/AssetKindRules';
import { MarketEventLog } from '../events/MarketEventLog';

// ============================================================================
// Validation
// ============================================================================

function validatePrice(price: number): void {
  if (!Number.isSafeInteger(price) || price <= 0) {
    throw MarketErrors.invalidPrice(price);
  }
}

function validateAsset(asset: AssetRef): void {
  if (asset.collection.trim().length === 0) {
    throw MarketErrors.invalidAsset('collection must not be empty', { ...asset });
  }
  if (asset.itemId.trim().length === 0) {
    throw MarketErrors.invalidAsset('item id must not be empty', { ...asset });
  }
}

// ============================================================================
// ListingRegistry Implementation
// ============================================================================

export class ListingRegistry {
  private readonly journal: TransactionJournal;
  private readonly vault: AssetCustodyVault;
  private readonly events: MarketEventLog;
  private readonly listings: Map<ListingId, Listing>;
  private readonly firstId: ListingId;
  private nextId: ListingId;

  constructor(
    journal: TransactionJournal,
    vault: AssetCustodyVault,
    events: MarketEventLog,
    firstId: ListingId = 1
  ) {
    this.journal = journal;
    this.vault = vault;
    this.events = events;
    this.listings = new Map();
    this.firstId = firstId;
    this.nextId = firstId;
  }

  /**
   * Escrow the asset and open a listing for it.
   */
  create(
    asset: AssetRef,
    kind: AssetKind,
    amount: number,
    price: number,
    seller: PartyId
  ): Listing {
    if (isNullParty(seller)) {
      throw MarketErrors.nullIdentity('seller');
    }
    if (seller === this.vault.custodian) {
      throw MarketErrors.custodianParty('seller', seller);
    }
    if (!isAssetKind(kind)) {
      throw MarketErrors.invalidAsset(`unknown asset kind '${String(kind)}'`);
    }
    validateAsset(asset);
    validatePrice(price);
    ruleFor(kind).validateAmount(amount);

    this.vault.holdFromSeller(asset, kind, amount, seller);

    const id = this.allocateId();
    const listing: Listing = {
      id,
      seller,
      asset: { collection: asset.collection, itemId: asset.itemId },
      kind,
      amount,
      price,
      active: true,
      createdAt: Date.now(),
    };
    this.store(listing);

    this.events.emit({
      type: 'Listed',
      listingId: id,
      seller,
      asset: listing.asset,
      amount,
      price,
      kind,
    });

    return listing;
  }

  /**
   * Return the escrowed asset to its seller and close the listing.
   */
  cancel(id: ListingId, caller: PartyId): Listing {
    const listing = this.require(id);

    if (listing.seller !== caller) {
      throw MarketErrors.notSeller(id, caller);
    }
    if (!listing.active) {
      throw MarketErrors.listingInactive(id);
    }

    this.vault.releaseTo(listing.asset, listing.kind, listing.amount, listing.seller);

    const closed: Listing = {
      ...listing,
      active: false,
      closedAt: Date.now(),
      closeReason: 'cancelled',
    };
    this.store(closed);

    this.events.emit({ type: 'Cancelled', listingId: id });

    return closed;
  }

  /**
   * Mark an active listing sold. The caller has already moved value and asset.
   */
  closeAsSold(id: ListingId, buyer: PartyId): Listing {
    const listing = this.requireActive(id);
    const closed: Listing = {
      ...listing,
      active: false,
      closedAt: Date.now(),
      closeReason: 'sold',
      buyer,
    };
    this.store(closed);
    return closed;
  }

  get(id: ListingId): Listing | null {
    return this.listings.get(id) ?? null;
  }

  /**
   * Throws StateError when no listing has this id.
   */
  require(id: ListingId): Listing {
    const listing = this.listings.get(id);
    if (!listing) {
      throw MarketErrors.listingNotFound(id);
    }
    return listing;
  }

  requireActive(id: ListingId): Listing {
    const listing = this.require(id);
    if (!listing.active) {
      throw MarketErrors.listingInactive(id);
    }
    return listing;
  }

  list(filter: ListingFilter = {}): readonly Listing[] {
    const results: Listing[] = [];
    for (const listing of this.listings.values()) {
      if (filter.active !== undefined && listing.active !== filter.active) continue;
      if (filter.seller !== undefined && listing.seller !== filter.seller) continue;
      if (filter.collection !== undefined && listing.asset.collection !== filter.collection) continue;
      if (filter.kind !== undefined && listing.kind !== filter.kind) continue;
      results.push(listing);
    }
    return results.sort((a, b) => a.id - b.id);
  }

  getNextId(): ListingId {
    return this.nextId;
  }

  getFirstId(): ListingId {
    return this.firstId;
  }

  /**
   * Replace the whole listing map and id counter (snapshot restore).
   */
  restore(listings: readonly Listing[], nextId: ListingId): void {
    const previousListings = new Map(this.listings);
    const previousNextId = this.nextId;

    this.listings.clear();
    for (const listing of listings) {
      this.listings.set(listing.id, listing);
    }
    this.nextId = nextId;

    this.journal.record(() => {
      this.listings.clear();
      for (const [id, listing] of previousListings) {
        this.listings.set(id, listing);
      }
      this.nextId = previousNextId;
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private allocateId(): ListingId {
    const id = this.nextId;
    this.nextId = id + 1;
    this.journal.record(() => {
      this.nextId = id;
    });
    return id;
  }

  private store(listing: Listing): void {
    const previous = this.listings.get(listing.id);
    this.listings.set(listing.id, listing);
    this.journal.record(() => {
      if (previous === undefined) {
        this.listings.delete(listing.id);
      } else {
        this.listings.set(listing.id, previous);
      }
    });
  }
}
