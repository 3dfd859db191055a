/**
 * BatchPurchaseCoordinator.ts
 * All-or-nothing purchase of several listings with one payment
 *
 * Ids are taken as given. A repeated id passes the read-only pricing pass
 * (the listing is still active then) and fails when its second settlement
 * finds it already sold, which aborts the whole batch.
 */

import { PartyId } from '../security/Identity';
import { BatchQuote, BatchReceipt, ListingId, SettlementReceipt } from '../market/MarketTypes';
import { MarketErrors } from '../market/MarketErrors';
import { ListingRegistry } from '../listings/ListingRegistry';
import { MarketEventLog } from '../events/MarketEventLog';
import { SettlementEngine } from './SettlementEngine';

export class BatchPurchaseCoordinator {
  private readonly registry: ListingRegistry;
  private readonly settlement: SettlementEngine;
  private readonly events: MarketEventLog;
  private readonly maxBatchSize: number;

  constructor(
    registry: ListingRegistry,
    settlement: SettlementEngine,
    events: MarketEventLog,
    maxBatchSize: number
  ) {
    this.registry = registry;
    this.settlement = settlement;
    this.events = events;
    this.maxBatchSize = maxBatchSize;
  }

  settleBatch(ids: readonly ListingId[], buyer: PartyId, paidAmount: number): BatchReceipt {
    // Receiver hooks run mid-batch and may hold the caller's array.
    const batch = [...ids];

    this.settlement.validateBuyer(buyer);

    const { total } = this.quoteBatch(batch);
    if (paidAmount !== total) {
      throw MarketErrors.paymentMismatch(total, paidAmount, batch);
    }

    this.settlement.collectPayment(buyer, total);

    const settlements: SettlementReceipt[] = [];
    for (const id of batch) {
      // Re-read: an earlier iteration may have sold this id.
      const listing = this.registry.require(id);
      settlements.push(this.settlement.settleListing(id, buyer, listing.price));
    }

    this.events.emit({ type: 'BatchBought', buyer, listingIds: [...batch], totalPaid: total });

    return {
      buyer,
      listingIds: batch,
      totalPaid: total,
      totalFee: settlements.reduce((sum, s) => sum + s.fee, 0),
      totalSellerAmount: settlements.reduce((sum, s) => sum + s.sellerAmount, 0),
      settlements,
    };
  }

  /**
   * Price a batch without touching state. Fails like the pricing pass of
   * settleBatch does.
   */
  quoteBatch(ids: readonly ListingId[]): BatchQuote {
    this.validateBatchShape(ids);

    let total = 0;
    let totalFee = 0;
    let totalSellerAmount = 0;

    for (const id of ids) {
      const quote = this.settlement.quoteListing(this.registry.requireActive(id));
      total += quote.price;
      totalFee += quote.fee;
      totalSellerAmount += quote.sellerAmount;
    }

    if (!Number.isSafeInteger(total)) {
      throw MarketErrors.invalidBatch('total price exceeds the safe integer range', { total });
    }

    return { listingIds: [...ids], total, totalFee, totalSellerAmount };
  }

  private validateBatchShape(ids: readonly ListingId[]): void {
    if (ids.length === 0) {
      throw MarketErrors.invalidBatch('no listing ids given');
    }
    if (ids.length > this.maxBatchSize) {
      throw MarketErrors.invalidBatch(
        `${ids.length} listings exceeds the maximum of ${this.maxBatchSize}`,
        { size: ids.length, maxBatchSize: this.maxBatchSize }
      );
    }
  }
}
