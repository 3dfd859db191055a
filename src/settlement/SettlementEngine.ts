/**
 * SettlementEngine.ts
 * Single-listing purchase: payment, fee split, asset release
 *
 * Settlement order for one listing:
 * 1. Listing must exist and be active
 * 2. Payment must equal the price exactly (any other value, negative or
 *    fractional included, is a PaymentError)
 * 3. Payment is collected from the buyer into engine custody
 * 4. Fee goes to the fee recipient, the rest to the seller
 * 5. Asset is released to the buyer
 * 6. Listing is closed as sold and Bought is emitted
 *
 * Steps 4 and 5 call out to the recipients while the listing is still active.
 * That is only sound because every entry point runs under the engine's
 * ReentrancyGuard: a recipient calling back into settle or cancel from its
 * hook is rejected before it can observe the listing. Do not expose these
 * methods to callers that bypass the guard.
 */

import { PartyId, isNullParty } from '../security/Identity';
import { ListingId, Listing, SettlementReceipt, FeeSplit } from '../market/MarketTypes';
import { MarketErrors, isMarketError } from '../market/MarketErrors';
import { InsufficientBalanceError, NativeBalances } from '../ledger/NativeBalances';
import { ListingRegistry } from '../listings/ListingRegistry';
import { AssetCustodyVault } from '../vault/AssetCustodyVault';
import { FeePolicy } from '../fees/FeePolicy';
import { MarketEventLog } from '../events/MarketEventLog';

export interface ListingQuote extends FeeSplit {
  readonly listingId: ListingId;
  readonly seller: PartyId;
  readonly feeRecipient: PartyId;
}

// ============================================================================
// SettlementEngine Implementation
// ============================================================================

export class SettlementEngine {
  private readonly custodian: PartyId;
  private readonly balances: NativeBalances;
  private readonly registry: ListingRegistry;
  private readonly vault: AssetCustodyVault;
  private readonly fees: FeePolicy;
  private readonly events: MarketEventLog;

  constructor(
    custodian: PartyId,
    balances: NativeBalances,
    registry: ListingRegistry,
    vault: AssetCustodyVault,
    fees: FeePolicy,
    events: MarketEventLog
  ) {
    this.custodian = custodian;
    this.balances = balances;
    this.registry = registry;
    this.vault = vault;
    this.fees = fees;
    this.events = events;
  }

  settle(id: ListingId, buyer: PartyId, paidAmount: number): SettlementReceipt {
    this.validateBuyer(buyer);

    const listing = this.registry.requireActive(id);
    if (paidAmount !== listing.price) {
      throw MarketErrors.paymentMismatch(listing.price, paidAmount, [id]);
    }

    this.collectPayment(buyer, paidAmount);
    return this.settleListing(id, buyer, paidAmount);
  }

  /**
   * A buyer is a real party other than the engine itself.
   */
  validateBuyer(buyer: PartyId): void {
    if (isNullParty(buyer)) {
      throw MarketErrors.nullIdentity('buyer');
    }
    if (buyer === this.custodian) {
      throw MarketErrors.custodianParty('buyer', buyer);
    }
  }

  /**
   * Pull `amount` from the buyer into engine custody.
   */
  collectPayment(buyer: PartyId, amount: number): void {
    if (amount === 0) return;

    try {
      this.balances.transfer(buyer, this.custodian, amount);
    } catch (error) {
      if (error instanceof InsufficientBalanceError) {
        throw MarketErrors.insufficientFunds(buyer, error.requested, error.available);
      }
      throw error;
    }
  }

  /**
   * Settle one listing from value already held by the engine.
   */
  settleListing(id: ListingId, buyer: PartyId, paidAmount: number): SettlementReceipt {
    const listing = this.registry.requireActive(id);
    if (paidAmount !== listing.price) {
      throw MarketErrors.paymentMismatch(listing.price, paidAmount, [id]);
    }

    const split = this.fees.split(listing.price);
    const feeRecipient = this.fees.getFeeRecipient();

    this.pushPayment(feeRecipient, split.fee);
    this.pushPayment(listing.seller, split.sellerAmount);

    this.vault.releaseTo(listing.asset, listing.kind, listing.amount, buyer);

    this.registry.closeAsSold(id, buyer);
    this.events.emit({ type: 'Bought', listingId: id, buyer, amountPaid: paidAmount });

    return {
      listingId: id,
      buyer,
      seller: listing.seller,
      feeRecipient,
      amountPaid: paidAmount,
      fee: split.fee,
      sellerAmount: split.sellerAmount,
      asset: listing.asset,
      kind: listing.kind,
      amount: listing.amount,
    };
  }

  quote(id: ListingId): ListingQuote {
    const listing = this.registry.requireActive(id);
    return this.quoteListing(listing);
  }

  quoteListing(listing: Listing): ListingQuote {
    return {
      ...this.fees.split(listing.price),
      listingId: listing.id,
      seller: listing.seller,
      feeRecipient: this.fees.getFeeRecipient(),
    };
  }

  private pushPayment(to: PartyId, amount: number): void {
    if (amount === 0) return;

    try {
      this.balances.transfer(this.custodian, to, amount);
    } catch (error) {
      if (isMarketError(error) && error.category === 'transfer') {
        throw error;
      }
      throw MarketErrors.valueTransferFailed(to, amount, error);
    }
  }
}
