/**
 * NativeBalances.ts
 * Native value account book
 *
 * Integer balances only; no balance ever goes negative. Every mutation is
 * journaled, so a transfer made inside a transaction that later fails is
 * reversed with it.
 *
 * A party may register a receiver hook. The hook runs after the credit has
 * been applied and may throw to refuse the value, or call back into whatever
 * sent it.
 */

import { PartyId } from '../security/Identity';
import { MarketErrors } from '../market/MarketErrors';
import { TransactionJournal } from './TransactionJournal';

// ============================================================================
// Types
// ============================================================================

export interface ValueReceipt {
  readonly from: PartyId;
  readonly to: PartyId;
  readonly amount: number;
}

export type ValueReceiver = (receipt: ValueReceipt) => void;

export class InsufficientBalanceError extends Error {
  readonly party: PartyId;
  readonly requested: number;
  readonly available: number;

  constructor(party: PartyId, requested: number, available: number) {
    super(`Party ${party} has insufficient balance: requested ${requested}, available ${available}`);
    this.name = 'InsufficientBalanceError';
    this.party = party;
    this.requested = requested;
    this.available = available;
  }
}

// ============================================================================
// Validation
// ============================================================================

function validatePositiveAmount(amount: number, operation: string): void {
  if (!Number.isSafeInteger(amount)) {
    throw MarketErrors.invalidAmount(amount, `${operation} requires safe integer amounts`);
  }
  if (amount <= 0) {
    throw MarketErrors.invalidAmount(amount, `${operation} requires positive amount`);
  }
}

// ============================================================================
// NativeBalances Implementation
// ============================================================================

export class NativeBalances {
  private readonly journal: TransactionJournal;
  private readonly balances: Map<PartyId, number>;
  private readonly receivers: Map<PartyId, ValueReceiver>;

  constructor(journal: TransactionJournal) {
    this.journal = journal;
    this.balances = new Map();
    this.receivers = new Map();
  }

  getBalance(party: PartyId): number {
    return this.balances.get(party) ?? 0;
  }

  /**
   * Sum of every balance held.
   */
  getTotalSupply(): number {
    let total = 0;
    for (const amount of this.balances.values()) {
      total += amount;
    }
    return total;
  }

  /**
   * Create value out of thin air (host funding).
   */
  mint(party: PartyId, amount: number): void {
    validatePositiveAmount(amount, 'mint');
    this.adjust(party, amount);
  }

  /**
   * Move value from one party to another, then notify the recipient.
   */
  transfer(from: PartyId, to: PartyId, amount: number): void {
    validatePositiveAmount(amount, 'transfer');

    const available = this.getBalance(from);
    if (available < amount) {
      throw new InsufficientBalanceError(from, amount, available);
    }

    this.adjust(from, -amount);
    this.adjust(to, amount);

    const receiver = this.receivers.get(to);
    if (receiver) {
      receiver({ from, to, amount });
    }
  }

  /**
   * Install or clear the receiver hook for a party.
   */
  setReceiver(party: PartyId, receiver: ValueReceiver | null): void {
    if (receiver) {
      this.receivers.set(party, receiver);
    } else {
      this.receivers.delete(party);
    }
  }

  private adjust(party: PartyId, delta: number): void {
    const previous = this.balances.get(party);
    const next = (previous ?? 0) + delta;

    this.balances.set(party, next);
    this.journal.record(() => {
      if (previous === undefined) {
        this.balances.delete(party);
      } else {
        this.balances.set(party, previous);
      }
    });
  }
}

export function createNativeBalances(journal: TransactionJournal): NativeBalances {
  return new NativeBalances(journal);
}
