/**
 * MarketTypes.ts
 * Shared types for listings, settlements and batch purchases
 */

import { PartyId } from '../security/Identity';

// ============================================================================
// Assets
// ============================================================================

export type ListingId = number;

export enum AssetKind {
  UNIQUE = 'unique',
  FUNGIBLE = 'fungible',
}

export interface AssetRef {
  readonly collection: string;
  readonly itemId: string;
}

export function assetKey(kind: AssetKind, asset: AssetRef): string {
  return `${kind}:${asset.collection}:${asset.itemId}`;
}

export function isAssetKind(value: unknown): value is AssetKind {
  return value === AssetKind.UNIQUE || value === AssetKind.FUNGIBLE;
}

// ============================================================================
// Listings
// ============================================================================

export type ListingCloseReason = 'sold' | 'cancelled';

export interface Listing {
  readonly id: ListingId;
  readonly seller: PartyId;
  readonly asset: AssetRef;
  readonly kind: AssetKind;
  readonly amount: number;
  readonly price: number;
  readonly active: boolean;
  readonly createdAt: number;
  readonly closedAt?: number;
  readonly closeReason?: ListingCloseReason;
  readonly buyer?: PartyId;
}

export interface ListingFilter {
  readonly active?: boolean;
  readonly seller?: PartyId;
  readonly collection?: string;
  readonly kind?: AssetKind;
}

// ============================================================================
// Fees
// ============================================================================

export interface FeeSplit {
  readonly price: number;
  readonly feeBps: number;
  readonly fee: number;
  readonly sellerAmount: number;
}

// ============================================================================
// Settlement Results
// ============================================================================

export interface SettlementReceipt {
  readonly listingId: ListingId;
  readonly buyer: PartyId;
  readonly seller: PartyId;
  readonly feeRecipient: PartyId;
  readonly amountPaid: number;
  readonly fee: number;
  readonly sellerAmount: number;
  readonly asset: AssetRef;
  readonly kind: AssetKind;
  readonly amount: number;
}

export interface BatchReceipt {
  readonly buyer: PartyId;
  readonly listingIds: readonly ListingId[];
  readonly totalPaid: number;
  readonly totalFee: number;
  readonly totalSellerAmount: number;
  readonly settlements: readonly SettlementReceipt[];
}

export interface BatchQuote {
  readonly listingIds: readonly ListingId[];
  readonly total: number;
  readonly totalFee: number;
  readonly totalSellerAmount: number;
}
