/**
 * MarketInvariants.ts
 * Whole-state consistency checks for a marketplace engine
 *
 * Violations are returned as data, never thrown.
 *
 * ACTIVE_CUSTODY  - vault counter per asset equals the active listing amounts
 * CUSTODY_BACKED  - the asset contract really holds what the counter claims
 * LISTING_TERMS   - listing fields are well formed for their state
 * ID_SEQUENCE     - every id lies in [firstListingId, nextListingId)
 * FEE_BOUNDS      - fee rate within the cap, recipient set
 */

import { PartyId, isNullParty } from '../security/Identity';
import { AssetKind, Listing, ListingId, assetKey } from '../market/MarketTypes';
import { CustodyPosition } from '../vault/AssetCustodyVault';
import { isValidFeeBps } from '../fees/FeePolicy';

// ============================================================================
// Types
// ============================================================================

export const MARKET_INVARIANTS = [
  'ACTIVE_CUSTODY',
  'CUSTODY_BACKED',
  'LISTING_TERMS',
  'ID_SEQUENCE',
  'FEE_BOUNDS',
] as const;

export type MarketInvariantType = (typeof MARKET_INVARIANTS)[number];

export interface CustodyHolding extends CustodyPosition {
  /** Amount the asset contract reports for the custodian; null if unresolvable. */
  readonly onChain: number | null;
}

/**
 * Read-only view of engine state the checks run against.
 */
export interface MarketStateView {
  readonly listings: readonly Listing[];
  readonly firstListingId: ListingId;
  readonly nextListingId: ListingId;
  readonly feeBps: number;
  readonly feeRecipient: PartyId;
  readonly custody: readonly CustodyHolding[];
}

export interface InvariantViolation {
  readonly message: string;
  readonly context: Record<string, unknown>;
}

export interface InvariantResult {
  readonly invariant: MarketInvariantType;
  readonly passed: boolean;
  readonly violations: readonly InvariantViolation[];
}

// ============================================================================
// Checks
// ============================================================================

function checkActiveCustody(view: MarketStateView): InvariantViolation[] {
  const expected = new Map<string, number>();
  for (const listing of view.listings) {
    if (!listing.active) continue;
    const key = assetKey(listing.kind, listing.asset);
    expected.set(key, (expected.get(key) ?? 0) + listing.amount);
  }

  const actual = new Map<string, number>();
  for (const position of view.custody) {
    actual.set(assetKey(position.kind, position.asset), position.amount);
  }

  const violations: InvariantViolation[] = [];
  const keys = new Set([...expected.keys(), ...actual.keys()]);
  for (const key of keys) {
    const listed = expected.get(key) ?? 0;
    const held = actual.get(key) ?? 0;
    if (listed !== held) {
      violations.push({
        message: `Custody of ${key} is ${held}, active listings hold ${listed}`,
        context: { asset: key, listed, held },
      });
    }
  }
  return violations;
}

function checkCustodyBacked(view: MarketStateView): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  for (const position of view.custody) {
    const key = assetKey(position.kind, position.asset);
    if (position.onChain === null) {
      violations.push({
        message: `No asset contract resolves ${key}`,
        context: { asset: key },
      });
    } else if (position.onChain < position.amount) {
      violations.push({
        message: `Custodian holds ${position.onChain} of ${key}, counter says ${position.amount}`,
        context: { asset: key, counter: position.amount, onChain: position.onChain },
      });
    }
  }
  return violations;
}

/**
 * Problems with one listing's terms and close metadata, empty when sound.
 */
export function listingTermProblems(listing: Listing): string[] {
  const problems: string[] = [];

  if (!Number.isSafeInteger(listing.price) || listing.price <= 0) problems.push('price');
  if (!Number.isSafeInteger(listing.amount) || listing.amount <= 0) problems.push('amount');
  if (listing.kind === AssetKind.UNIQUE && listing.amount !== 1) problems.push('unique amount');

  if (listing.active) {
    if (listing.closedAt !== undefined || listing.closeReason !== undefined) {
      problems.push('active listing carries close metadata');
    }
  } else {
    if (listing.closedAt === undefined || listing.closeReason === undefined) {
      problems.push('closed listing lacks close metadata');
    }
    if (listing.closeReason === 'sold' && listing.buyer === undefined) {
      problems.push('sold listing lacks buyer');
    }
  }

  return problems;
}

function checkListingTerms(view: MarketStateView): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const listing of view.listings) {
    const problems = listingTermProblems(listing);
    if (problems.length > 0) {
      violations.push({
        message: `Listing ${listing.id} is malformed: ${problems.join(', ')}`,
        context: { listingId: listing.id, problems },
      });
    }
  }

  return violations;
}

function checkIdSequence(view: MarketStateView): InvariantViolation[] {
  return view.listings
    .filter(l => l.id < view.firstListingId || l.id >= view.nextListingId)
    .map(l => ({
      message: `Listing id ${l.id} is outside [${view.firstListingId}, ${view.nextListingId})`,
      context: { listingId: l.id, firstListingId: view.firstListingId, nextListingId: view.nextListingId },
    }));
}

function checkFeeBounds(view: MarketStateView): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  if (!isValidFeeBps(view.feeBps)) {
    violations.push({ message: `Fee ${view.feeBps} bps is out of range`, context: { feeBps: view.feeBps } });
  }
  if (isNullParty(view.feeRecipient)) {
    violations.push({ message: 'Fee recipient is the null identity', context: {} });
  }
  return violations;
}

const CHECKS: Readonly<Record<MarketInvariantType, (view: MarketStateView) => InvariantViolation[]>> = {
  ACTIVE_CUSTODY: checkActiveCustody,
  CUSTODY_BACKED: checkCustodyBacked,
  LISTING_TERMS: checkListingTerms,
  ID_SEQUENCE: checkIdSequence,
  FEE_BOUNDS: checkFeeBounds,
};

// ============================================================================
// Public API
// ============================================================================

export function verifyMarketInvariants(view: MarketStateView): readonly InvariantResult[] {
  return MARKET_INVARIANTS.map(invariant => {
    const violations = CHECKS[invariant](view);
    return { invariant, passed: violations.length === 0, violations };
  });
}

export function allInvariantsHold(results: readonly InvariantResult[]): boolean {
  return results.every(r => r.passed);
}
