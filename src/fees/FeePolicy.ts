/**
 * FeePolicy.ts
 * Marketplace fee rate, fee recipient and the price split
 *
 * - Fee is taken in basis points of the listing price, rounded down
 * - Rate is capped at MAX_FEE_BPS (10%)
 * - Only the owner may change the rate or the recipient
 */

import { PartyId, isNullParty } from '../security/Identity';
import { AccessGuard } from '../security/AccessGuard';
import { MarketErrors } from '../market/MarketErrors';
import { FeeSplit } from '../market/MarketTypes';
import { TransactionJournal } from '../ledger/TransactionJournal';
import { MarketEventLog } from '../events/MarketEventLog';

// ============================================================================
// Constants
// ============================================================================

export const MAX_FEE_BPS = 1000;
export const BPS_DENOMINATOR = 10_000;

export interface FeePolicyState {
  readonly feeBps: number;
  readonly feeRecipient: PartyId;
}

// ============================================================================
// Fee Arithmetic
// ============================================================================

export function isValidFeeBps(feeBps: number): boolean {
  return Number.isInteger(feeBps) && feeBps >= 0 && feeBps <= MAX_FEE_BPS;
}

/**
 * floor(price * feeBps / 10000), computed without ever leaving the safe
 * integer range.
 */
export function calculateFee(price: number, feeBps: number): number {
  const whole = Math.floor(price / BPS_DENOMINATOR);
  const remainder = price % BPS_DENOMINATOR;
  return whole * feeBps + Math.floor((remainder * feeBps) / BPS_DENOMINATOR);
}

export function splitPrice(price: number, feeBps: number): FeeSplit {
  const fee = calculateFee(price, feeBps);
  return { price, feeBps, fee, sellerAmount: price - fee };
}

// ============================================================================
// FeePolicy Implementation
// ============================================================================

export class FeePolicy {
  private readonly journal: TransactionJournal;
  private readonly access: AccessGuard;
  private readonly events: MarketEventLog;
  private readonly custodian: PartyId;
  private feeBps: number;
  private feeRecipient: PartyId;

  constructor(
    journal: TransactionJournal,
    access: AccessGuard,
    events: MarketEventLog,
    initial: FeePolicyState,
    custodian: PartyId
  ) {
    if (!isValidFeeBps(initial.feeBps)) {
      throw MarketErrors.feeAboveCap(initial.feeBps, MAX_FEE_BPS);
    }
    if (isNullParty(initial.feeRecipient)) {
      throw MarketErrors.nullIdentity('feeRecipient');
    }
    if (initial.feeRecipient === custodian) {
      throw MarketErrors.custodianParty('feeRecipient', custodian);
    }

    this.journal = journal;
    this.access = access;
    this.events = events;
    this.custodian = custodian;
    this.feeBps = initial.feeBps;
    this.feeRecipient = initial.feeRecipient;
  }

  getFeeBps(): number {
    return this.feeBps;
  }

  getFeeRecipient(): PartyId {
    return this.feeRecipient;
  }

  getState(): FeePolicyState {
    return { feeBps: this.feeBps, feeRecipient: this.feeRecipient };
  }

  setFee(newFeeBps: number, caller: PartyId): void {
    this.access.requireOwner(caller, 'setFee');

    if (!isValidFeeBps(newFeeBps)) {
      throw MarketErrors.feeAboveCap(newFeeBps, MAX_FEE_BPS);
    }

    const previous = this.feeBps;
    this.feeBps = newFeeBps;
    this.journal.record(() => {
      this.feeBps = previous;
    });

    this.events.emit({ type: 'FeeUpdated', feeBps: newFeeBps });
  }

  setFeeRecipient(newRecipient: PartyId, caller: PartyId): void {
    this.access.requireOwner(caller, 'setFeeRecipient');

    if (isNullParty(newRecipient)) {
      throw MarketErrors.nullIdentity('feeRecipient');
    }
    // The engine's own balance holds escrowed value only.
    if (newRecipient === this.custodian) {
      throw MarketErrors.custodianParty('feeRecipient', newRecipient);
    }

    const previous = this.feeRecipient;
    this.feeRecipient = newRecipient;
    this.journal.record(() => {
      this.feeRecipient = previous;
    });

    this.events.emit({ type: 'FeeRecipientUpdated', feeRecipient: newRecipient });
  }

  /**
   * Split `price` at the current rate.
   */
  split(price: number): FeeSplit {
    return splitPrice(price, this.feeBps);
  }
}
