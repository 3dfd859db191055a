/**
 * BatchPurchaseCoordinator Tests
 * All-or-nothing batches, duplicate ids and batch quotes
 */

import { describe, test, expect, beforeEach } from '@jest/globals';

import {
  BUYER,
  FEE_RECIPIENT,
  MarketFixture,
  SELLER,
  captureError,
  createMarketFixture,
  fund,
  listFungible,
  listUnique,
} from '../../__tests__/helpers/marketFixture';
import {
  MarketErrorCode,
  PaymentError,
  StateError,
  TransferFailure,
  ValidationError,
} from '../../market/MarketErrors';

describe('BatchPurchaseCoordinator', () => {
  let fx: MarketFixture;

  beforeEach(() => {
    fx = createMarketFixture({ initialFeeBps: 250, maxBatchSize: 3 });
  });

  function balanceOf(party: string): number {
    return fx.host.balances.getBalance(party);
  }

  test('buys two fungible listings with one payment', () => {
    listFungible(fx, 'ruby', 10, 500_000);
    listFungible(fx, 'ruby', 10, 500_000);
    fund(fx, BUYER, 1_000_000);

    const receipt = fx.engine.settleBatch([1, 2], BUYER, 1_000_000);

    expect(receipt).toMatchObject({
      buyer: BUYER,
      listingIds: [1, 2],
      totalPaid: 1_000_000,
      totalFee: 25_000,
      totalSellerAmount: 975_000,
    });
    expect(receipt.settlements.map(s => s.listingId)).toEqual([1, 2]);
    expect(balanceOf(FEE_RECIPIENT)).toBe(25_000);
    expect(balanceOf(SELLER)).toBe(975_000);
    expect(balanceOf(BUYER)).toBe(0);
    expect(fx.gems.balanceOf(BUYER, 'ruby')).toBe(20);
    expect(fx.engine.getListings({ active: true })).toEqual([]);
  });

  test('emits Bought per listing, then BatchBought', () => {
    listUnique(fx, '1', 100);
    listUnique(fx, '2', 300);
    fund(fx, BUYER, 400);

    fx.engine.settleBatch([2, 1], BUYER, 400);

    expect(fx.engine.getEvents({ fromSequence: 3 }).map(e => e.event)).toEqual([
      { type: 'Bought', listingId: 2, buyer: BUYER, amountPaid: 300 },
      { type: 'Bought', listingId: 1, buyer: BUYER, amountPaid: 100 },
      { type: 'BatchBought', buyer: BUYER, listingIds: [2, 1], totalPaid: 400 },
    ]);
  });

  test('a duplicate id fails the whole batch', () => {
    listUnique(fx, '1', 100);
    fund(fx, BUYER, 200);

    const error = captureError(() => fx.engine.settleBatch([1, 1], BUYER, 200));

    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: MarketErrorCode.LISTING_INACTIVE });
    expect(balanceOf(BUYER)).toBe(200);
    expect(balanceOf(SELLER)).toBe(0);
    expect(fx.punks.ownerOf('1')).toBe(fx.engine.address);
    expect(fx.engine.getListing(1)?.active).toBe(true);
    expect(fx.engine.getEvents({ types: ['Bought', 'BatchBought'] })).toEqual([]);
  });

  test('a duplicate id counts twice toward the required payment', () => {
    listUnique(fx, '1', 100);
    fund(fx, BUYER, 200);

    expect(captureError(() => fx.engine.settleBatch([1, 1], BUYER, 100))).toMatchObject({
      code: MarketErrorCode.PAYMENT_MISMATCH,
      details: { expected: 200, paid: 100 },
    });
  });

  test('an inactive listing anywhere in the batch leaves everything unchanged', () => {
    listUnique(fx, '1', 100);
    listUnique(fx, '2', 100);
    fx.engine.cancel(2, SELLER);
    fund(fx, BUYER, 200);

    expect(() => fx.engine.settleBatch([1, 2], BUYER, 200)).toThrow(StateError);
    expect(balanceOf(BUYER)).toBe(200);
    expect(fx.engine.getListing(1)?.active).toBe(true);
  });

  test('an unknown id is a state error', () => {
    listUnique(fx, '1', 100);
    fund(fx, BUYER, 100);

    expect(captureError(() => fx.engine.settleBatch([1, 9], BUYER, 100))).toMatchObject({
      code: MarketErrorCode.LISTING_NOT_FOUND,
    });
  });

  test('payment must equal the total', () => {
    listUnique(fx, '1', 100);
    listUnique(fx, '2', 100);
    fund(fx, BUYER, 1_000);

    expect(() => fx.engine.settleBatch([1, 2], BUYER, 199)).toThrow(PaymentError);
    expect(() => fx.engine.settleBatch([1, 2], BUYER, 201)).toThrow(PaymentError);
    expect(balanceOf(BUYER)).toBe(1_000);
  });

  test('a negative payment is a mismatch and the engine cannot buy from itself', () => {
    listUnique(fx, '1', 100);
    fund(fx, BUYER, 100);

    expect(captureError(() => fx.engine.settleBatch([1], BUYER, -100))).toMatchObject({
      code: MarketErrorCode.PAYMENT_MISMATCH,
      details: { expected: 100, paid: -100 },
    });
    expect(captureError(() => fx.engine.settleBatch([1], fx.engine.address, 100))).toMatchObject({
      code: MarketErrorCode.CUSTODIAN_PARTY,
      details: { field: 'buyer' },
    });
    expect(fx.engine.getListing(1)?.active).toBe(true);
  });

  test('settles every id it priced even if the caller shortens the array mid-batch', () => {
    listUnique(fx, '1', 100);
    listUnique(fx, '2', 100);
    fund(fx, BUYER, 200);

    const ids = [1, 2];
    fx.punks.setReceiver(BUYER, () => {
      ids.length = 1;
    });

    const receipt = fx.engine.settleBatch(ids, BUYER, 200);

    expect(receipt.listingIds).toEqual([1, 2]);
    expect(receipt.settlements.map(s => s.listingId)).toEqual([1, 2]);
    expect(fx.engine.getListing(2)?.active).toBe(false);
    expect(fx.punks.ownerOf('2')).toBe(BUYER);
    expect(balanceOf(fx.engine.address)).toBe(0);
    expect(balanceOf(FEE_RECIPIENT)).toBe(4);
    expect(balanceOf(SELLER)).toBe(196);
    expect(fx.engine.getEvents({ types: ['BatchBought'] }).map(e => e.event)).toEqual([
      { type: 'BatchBought', buyer: BUYER, listingIds: [1, 2], totalPaid: 200 },
    ]);
  });

  test('empty and oversized batches are validation errors', () => {
    for (let i = 1; i <= 4; i++) listUnique(fx, String(i), 10);
    fund(fx, BUYER, 40);

    expect(captureError(() => fx.engine.settleBatch([], BUYER, 0))).toMatchObject({
      code: MarketErrorCode.INVALID_BATCH,
    });
    expect(() => fx.engine.settleBatch([1, 2, 3, 4], BUYER, 40)).toThrow(ValidationError);
  });

  test('a transfer failure in the second settlement rolls back the first', () => {
    listUnique(fx, '1', 100);
    listUnique(fx, '2', 100, 'carol');
    fund(fx, BUYER, 200);
    fx.host.balances.setReceiver('carol', () => {
      throw new Error('closed');
    });

    expect(() => fx.engine.settleBatch([1, 2], BUYER, 200)).toThrow(TransferFailure);

    expect(balanceOf(BUYER)).toBe(200);
    expect(balanceOf(SELLER)).toBe(0);
    expect(balanceOf(FEE_RECIPIENT)).toBe(0);
    expect(fx.punks.ownerOf('1')).toBe(fx.engine.address);
    expect(fx.engine.getListings({ active: true }).map(l => l.id)).toEqual([1, 2]);
  });

  test('quoteBatch totals prices, fees and proceeds', () => {
    listUnique(fx, '1', 1_000);
    listFungible(fx, 'ruby', 3, 39);

    expect(fx.engine.quoteBatch([1, 2])).toEqual({
      listingIds: [1, 2],
      total: 1_039,
      totalFee: 25,
      totalSellerAmount: 1_014,
    });
  });
});
