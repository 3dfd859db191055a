/**
 * MarketEventLog.ts
 * Append-only, hash-chained record of market events
 *
 * Entries appended inside a transaction disappear if it rolls back.
 * Subscribers hear about an entry only once the outermost transaction commits.
 */

import { createHash } from 'crypto';

import { PartyId } from '../security/Identity';
import { AssetKind, AssetRef, ListingId } from '../market/MarketTypes';
import { TransactionJournal } from '../ledger/TransactionJournal';
import { createLogger, Logger } from '../utils/logger';

// ============================================================================
// Event Types
// ============================================================================

export interface ListedEvent {
  readonly type: 'Listed';
  readonly listingId: ListingId;
  readonly seller: PartyId;
  readonly asset: AssetRef;
  readonly amount: number;
  readonly price: number;
  readonly kind: AssetKind;
}

export interface CancelledEvent {
  readonly type: 'Cancelled';
  readonly listingId: ListingId;
}

export interface BoughtEvent {
  readonly type: 'Bought';
  readonly listingId: ListingId;
  readonly buyer: PartyId;
  readonly amountPaid: number;
}

export interface BatchBoughtEvent {
  readonly type: 'BatchBought';
  readonly buyer: PartyId;
  readonly listingIds: readonly ListingId[];
  readonly totalPaid: number;
}

export interface FeeUpdatedEvent {
  readonly type: 'FeeUpdated';
  readonly feeBps: number;
}

export interface FeeRecipientUpdatedEvent {
  readonly type: 'FeeRecipientUpdated';
  readonly feeRecipient: PartyId;
}

export type MarketEvent =
  | ListedEvent
  | CancelledEvent
  | BoughtEvent
  | BatchBoughtEvent
  | FeeUpdatedEvent
  | FeeRecipientUpdatedEvent;

export type MarketEventType = MarketEvent['type'];

export interface MarketEventEntry {
  readonly sequence: number;
  readonly timestamp: number;
  readonly event: MarketEvent;
  readonly previousHash: string;
  readonly hash: string;
}

export interface MarketEventQuery {
  readonly types?: readonly MarketEventType[];
  readonly listingId?: ListingId;
  readonly fromSequence?: number;
  readonly limit?: number;
}

export interface IntegrityResult {
  readonly valid: boolean;
  readonly brokenAt?: number;
  readonly expected?: string;
  readonly actual?: string;
}

export type MarketEventListener = (entry: MarketEventEntry) => void;

export const GENESIS_HASH = 'genesis';

// ============================================================================
// Hashing
// ============================================================================

export function hashEventEntry(entry: Omit<MarketEventEntry, 'hash'>): string {
  return createHash('sha256').update(JSON.stringify(entry)).digest('hex');
}

function involvesListing(event: MarketEvent, listingId: ListingId): boolean {
  switch (event.type) {
    case 'Listed':
    case 'Cancelled':
    case 'Bought':
      return event.listingId === listingId;
    case 'BatchBought':
      return event.listingIds.includes(listingId);
    case 'FeeUpdated':
    case 'FeeRecipientUpdated':
      return false;
  }
}

// ============================================================================
// MarketEventLog Implementation
// ============================================================================

export class MarketEventLog {
  private readonly journal: TransactionJournal;
  private readonly entries: MarketEventEntry[];
  private readonly listeners: MarketEventListener[];
  private readonly logger: Logger;

  constructor(journal: TransactionJournal, logger?: Logger) {
    this.journal = journal;
    this.entries = [];
    this.listeners = [];
    this.logger = logger ?? createLogger('events');
  }

  emit(event: MarketEvent): MarketEventEntry {
    const last = this.entries[this.entries.length - 1];
    const body = {
      sequence: (last?.sequence ?? 0) + 1,
      timestamp: Date.now(),
      event,
      previousHash: last?.hash ?? GENESIS_HASH,
    };
    const entry: MarketEventEntry = { ...body, hash: hashEventEntry(body) };

    this.entries.push(entry);
    this.journal.record(() => {
      this.entries.pop();
    });
    this.journal.afterCommit(() => this.notify(entry));

    return entry;
  }

  subscribe(listener: MarketEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getEntries(): readonly MarketEventEntry[] {
    return [...this.entries];
  }

  query(params: MarketEventQuery = {}): readonly MarketEventEntry[] {
    let results = this.entries;

    if (params.types && params.types.length > 0) {
      const types = new Set(params.types);
      results = results.filter(e => types.has(e.event.type));
    }

    const { listingId, fromSequence } = params;
    if (listingId !== undefined) {
      results = results.filter(e => involvesListing(e.event, listingId));
    }

    if (fromSequence !== undefined) {
      results = results.filter(e => e.sequence >= fromSequence);
    }

    if (params.limit !== undefined) {
      results = results.slice(0, params.limit);
    }

    return [...results];
  }

  verifyIntegrity(): IntegrityResult {
    let previousHash = GENESIS_HASH;

    for (const entry of this.entries) {
      if (entry.previousHash !== previousHash) {
        return {
          valid: false,
          brokenAt: entry.sequence,
          expected: previousHash,
          actual: entry.previousHash,
        };
      }

      const expectedHash = hashEventEntry({
        sequence: entry.sequence,
        timestamp: entry.timestamp,
        event: entry.event,
        previousHash: entry.previousHash,
      });

      if (entry.hash !== expectedHash) {
        return {
          valid: false,
          brokenAt: entry.sequence,
          expected: expectedHash,
          actual: entry.hash,
        };
      }

      previousHash = entry.hash;
    }

    return { valid: true };
  }

  private notify(entry: MarketEventEntry): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(entry);
      } catch (error) {
        this.logger.error('Market event listener failed', { sequence: entry.sequence, type: entry.event.type }, error);
      }
    }
  }
}
