/**
 * MarketPersistence.ts
 * Checksummed snapshots of engine state
 *
 * A snapshot carries the persisted layout only: listings, id counter, fee
 * policy and the fixed identities. Custody counters are not stored; they are
 * re-derived from the active listings on restore.
 */

import { createHash } from 'crypto';

import { PartyId } from '../security/Identity';
import { AssetKind, Listing, ListingCloseReason, ListingId, isAssetKind } from '../market/MarketTypes';
import { MarketErrors } from '../market/MarketErrors';

// ============================================================================
// Types
// ============================================================================

export const SNAPSHOT_VERSION = 1;

export interface MarketSnapshotState {
  readonly engineAddress: PartyId;
  readonly owner: PartyId;
  readonly feeBps: number;
  readonly feeRecipient: PartyId;
  readonly firstListingId: ListingId;
  readonly nextListingId: ListingId;
  readonly listings: readonly Listing[];
}

export interface MarketSnapshot extends MarketSnapshotState {
  readonly version: number;
  readonly createdAt: number;
  readonly checksum: string;
}

// ============================================================================
// Checksums
// ============================================================================

/**
 * Rebuild a listing with a fixed key order so that the checksum does not
 * depend on how the object was assembled.
 */
function canonicalListing(listing: Listing): Listing {
  return {
    id: listing.id,
    seller: listing.seller,
    asset: { collection: listing.asset.collection, itemId: listing.asset.itemId },
    kind: listing.kind,
    amount: listing.amount,
    price: listing.price,
    active: listing.active,
    createdAt: listing.createdAt,
    ...(listing.closedAt !== undefined ? { closedAt: listing.closedAt } : {}),
    ...(listing.closeReason !== undefined ? { closeReason: listing.closeReason } : {}),
    ...(listing.buyer !== undefined ? { buyer: listing.buyer } : {}),
  };
}

function canonicalState(state: MarketSnapshotState): MarketSnapshotState {
  return {
    engineAddress: state.engineAddress,
    owner: state.owner,
    feeBps: state.feeBps,
    feeRecipient: state.feeRecipient,
    firstListingId: state.firstListingId,
    nextListingId: state.nextListingId,
    listings: [...state.listings].sort((a, b) => a.id - b.id).map(canonicalListing),
  };
}

export function computeSnapshotChecksum(state: MarketSnapshotState): string {
  return createHash('sha256').update(JSON.stringify(canonicalState(state))).digest('hex');
}

export function createSnapshot(state: MarketSnapshotState): MarketSnapshot {
  const canonical = canonicalState(state);
  return {
    version: SNAPSHOT_VERSION,
    createdAt: Date.now(),
    ...canonical,
    checksum: computeSnapshotChecksum(canonical),
  };
}

export function verifySnapshot(snapshot: MarketSnapshot): boolean {
  return snapshot.checksum === computeSnapshotChecksum(snapshot);
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeSnapshot(snapshot: MarketSnapshot): string {
  return JSON.stringify(snapshot);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string') {
    throw MarketErrors.invalidSnapshot(`${field} must be a string`, { field });
  }
  return value;
}

function readInteger(record: Record<string, unknown>, field: string): number {
  const value = record[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw MarketErrors.invalidSnapshot(`${field} must be an integer`, { field });
  }
  return value;
}

function readCloseReason(value: unknown): ListingCloseReason | undefined {
  if (value === undefined) return undefined;
  if (value === 'sold' || value === 'cancelled') return value;
  throw MarketErrors.invalidSnapshot('closeReason must be sold or cancelled', { closeReason: value });
}

function readKind(value: unknown): AssetKind {
  if (!isAssetKind(value)) {
    throw MarketErrors.invalidSnapshot('kind must be unique or fungible', { kind: value });
  }
  return value;
}

function parseListing(value: unknown, index: number): Listing {
  if (!isRecord(value)) {
    throw MarketErrors.invalidSnapshot(`listing ${index} is not an object`, { index });
  }
  const asset = value.asset;
  if (!isRecord(asset)) {
    throw MarketErrors.invalidSnapshot(`listing ${index} has no asset`, { index });
  }
  if (typeof value.active !== 'boolean') {
    throw MarketErrors.invalidSnapshot(`listing ${index} has no active flag`, { index });
  }

  const closeReason = readCloseReason(value.closeReason);
  return {
    id: readInteger(value, 'id'),
    seller: readString(value, 'seller'),
    asset: { collection: readString(asset, 'collection'), itemId: readString(asset, 'itemId') },
    kind: readKind(value.kind),
    amount: readInteger(value, 'amount'),
    price: readInteger(value, 'price'),
    active: value.active,
    createdAt: readInteger(value, 'createdAt'),
    ...(value.closedAt !== undefined ? { closedAt: readInteger(value, 'closedAt') } : {}),
    ...(closeReason !== undefined ? { closeReason } : {}),
    ...(value.buyer !== undefined ? { buyer: readString(value, 'buyer') } : {}),
  };
}

/**
 * Parse and verify a serialized snapshot. Throws ValidationError
 * (INVALID_SNAPSHOT) on malformed input or a checksum mismatch.
 */
export function parseSnapshot(json: string): MarketSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw MarketErrors.invalidSnapshot('not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isRecord(raw)) {
    throw MarketErrors.invalidSnapshot('top level must be an object');
  }

  const version = readInteger(raw, 'version');
  if (version !== SNAPSHOT_VERSION) {
    throw MarketErrors.invalidSnapshot(`unsupported version ${version}`, { version });
  }

  const rawListings = raw.listings;
  if (!Array.isArray(rawListings)) {
    throw MarketErrors.invalidSnapshot('listings must be an array');
  }

  const snapshot: MarketSnapshot = {
    version,
    createdAt: readInteger(raw, 'createdAt'),
    engineAddress: readString(raw, 'engineAddress'),
    owner: readString(raw, 'owner'),
    feeBps: readInteger(raw, 'feeBps'),
    feeRecipient: readString(raw, 'feeRecipient'),
    firstListingId: readInteger(raw, 'firstListingId'),
    nextListingId: readInteger(raw, 'nextListingId'),
    listings: rawListings.map((item: unknown, index) => parseListing(item, index)),
    checksum: readString(raw, 'checksum'),
  };

  if (!verifySnapshot(snapshot)) {
    throw MarketErrors.invalidSnapshot('checksum mismatch', { checksum: snapshot.checksum });
  }

  return snapshot;
}
