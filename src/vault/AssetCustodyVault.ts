/**
 * AssetCustodyVault.ts
 * Engine custody of listed assets
 *
 * Key concepts:
 * - Hold: pull the asset from the seller into the engine's own account
 * - Release: push it from the engine's account to a recipient
 * - Custody counter: how much of each asset the vault holds for listings
 *
 * Any refusal by the transfer primitive surfaces as a TransferFailure. The
 * counters are journaled with everything else, so an aborted operation
 * leaves them untouched.
 */

import { PartyId } from '../security/Identity';
import { AssetKind, AssetRef, assetKey } from '../market/MarketTypes';
import { MarketErrors, isMarketError } from '../market/MarketErrors';
import { TransactionJournal } from '../ledger/TransactionJournal';
import { AssetContractDirectory } from './AssetContracts';
import { ruleFor } from './AssetKindRules';

// ============================================================================
// Types
// ============================================================================

export interface CustodyPosition {
  readonly kind: AssetKind;
  readonly asset: AssetRef;
  readonly amount: number;
}

// ============================================================================
// AssetCustodyVault Implementation
// ============================================================================

export class AssetCustodyVault {
  readonly custodian: PartyId;
  private readonly directory: AssetContractDirectory;
  private readonly journal: TransactionJournal;
  private readonly custody: Map<string, CustodyPosition>;

  constructor(custodian: PartyId, directory: AssetContractDirectory, journal: TransactionJournal) {
    this.custodian = custodian;
    this.directory = directory;
    this.journal = journal;
    this.custody = new Map();
  }

  /**
   * Move `amount` of the asset from the seller into engine custody.
   */
  holdFromSeller(asset: AssetRef, kind: AssetKind, amount: number, seller: PartyId): void {
    const rule = ruleFor(kind);
    rule.validateAmount(amount);

    this.runPrimitive(asset, seller, this.custodian, () =>
      rule.transfer(this.directory, asset, this.custodian, seller, this.custodian, amount)
    );

    this.adjustCustody(kind, asset, amount);
  }

  /**
   * Move `amount` of the asset out of custody to `recipient`.
   */
  releaseTo(asset: AssetRef, kind: AssetKind, amount: number, recipient: PartyId): void {
    const rule = ruleFor(kind);
    rule.validateAmount(amount);

    const held = this.custodyOf(kind, asset);
    if (held < amount) {
      throw MarketErrors.insufficientCustody(asset.collection, asset.itemId, amount, held);
    }

    // Counter first: the primitive may call out to the recipient.
    this.adjustCustody(kind, asset, -amount);

    this.runPrimitive(asset, this.custodian, recipient, () =>
      rule.transfer(this.directory, asset, this.custodian, this.custodian, recipient, amount)
    );
  }

  custodyOf(kind: AssetKind, asset: AssetRef): number {
    return this.custody.get(assetKey(kind, asset))?.amount ?? 0;
  }

  /**
   * What the underlying contract reports the custodian actually holds.
   */
  onChainHolding(kind: AssetKind, asset: AssetRef): number {
    return ruleFor(kind).holdingOf(this.directory, asset, this.custodian);
  }

  getPositions(): readonly CustodyPosition[] {
    return Array.from(this.custody.values());
  }

  /**
   * Replace all custody counters (used when restoring from a snapshot).
   */
  restorePositions(positions: readonly CustodyPosition[]): void {
    const previous = new Map(this.custody);
    this.custody.clear();
    for (const position of positions) {
      const key = assetKey(position.kind, position.asset);
      const existing = this.custody.get(key)?.amount ?? 0;
      this.custody.set(key, { ...position, amount: existing + position.amount });
    }
    this.journal.record(() => {
      this.custody.clear();
      for (const [key, position] of previous) {
        this.custody.set(key, position);
      }
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private runPrimitive(asset: AssetRef, from: PartyId, to: PartyId, transfer: () => void): void {
    try {
      transfer();
    } catch (error) {
      if (isMarketError(error) && error.category === 'transfer') {
        throw error;
      }
      throw MarketErrors.assetTransferFailed(asset.collection, asset.itemId, from, to, error);
    }
  }

  private adjustCustody(kind: AssetKind, asset: AssetRef, delta: number): void {
    const key = assetKey(kind, asset);
    const previous = this.custody.get(key);
    const next = (previous?.amount ?? 0) + delta;

    if (next === 0) {
      this.custody.delete(key);
    } else {
      this.custody.set(key, { kind, asset: { ...asset }, amount: next });
    }

    this.journal.record(() => {
      if (previous === undefined) {
        this.custody.delete(key);
      } else {
        this.custody.set(key, previous);
      }
    });
  }
}
