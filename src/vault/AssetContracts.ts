/**
 * AssetContracts.ts
 * Transfer primitives for unique and fungible assets
 *
 * The vault only depends on the two contract interfaces. The in-memory
 * implementations below stand in for real asset contracts when the engine is
 * hosted in process; their state is journaled like every other ledger write.
 */

import { PartyId, isNullParty } from '../security/Identity';
import { MarketErrors } from '../market/MarketErrors';
import { TransactionJournal } from '../ledger/TransactionJournal';

// ============================================================================
// Contract Interfaces
// ============================================================================

export interface AssetReceipt {
  readonly collection: string;
  readonly itemId: string;
  readonly amount: number;
  readonly operator: PartyId;
  readonly from: PartyId;
  readonly to: PartyId;
}

/**
 * Called on the recipient after an asset lands. Throwing refuses it.
 */
export type AssetReceiver = (receipt: AssetReceipt) => void;

/**
 * Single-item, indivisible assets.
 */
export interface UniqueAssetContract {
  readonly collection: string;
  ownerOf(itemId: string): PartyId | null;
  transferFrom(operator: PartyId, from: PartyId, to: PartyId, itemId: string): void;
}

/**
 * Quantity-bearing assets, divisible per item id.
 */
export interface FungibleAssetContract {
  readonly collection: string;
  balanceOf(holder: PartyId, itemId: string): number;
  transferFrom(
    operator: PartyId,
    from: PartyId,
    to: PartyId,
    itemId: string,
    amount: number
  ): void;
}

export class AssetContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AssetContractError';
  }
}

// ============================================================================
// Shared Approval + Receiver Bookkeeping
// ============================================================================

abstract class JournaledAssetContract {
  readonly collection: string;
  protected readonly journal: TransactionJournal;
  private readonly approvals: Map<PartyId, Set<PartyId>>;
  private readonly receivers: Map<PartyId, AssetReceiver>;

  protected constructor(collection: string, journal: TransactionJournal) {
    this.collection = collection;
    this.journal = journal;
    this.approvals = new Map();
    this.receivers = new Map();
  }

  setApprovalForAll(owner: PartyId, operator: PartyId, approved: boolean): void {
    let operators = this.approvals.get(owner);
    if (!operators) {
      operators = new Set();
      this.approvals.set(owner, operators);
    }

    const wasApproved = operators.has(operator);
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }

    const set = operators;
    this.journal.record(() => {
      if (wasApproved) {
        set.add(operator);
      } else {
        set.delete(operator);
      }
    });
  }

  isApprovedForAll(owner: PartyId, operator: PartyId): boolean {
    return this.approvals.get(owner)?.has(operator) ?? false;
  }

  setReceiver(party: PartyId, receiver: AssetReceiver | null): void {
    if (receiver) {
      this.receivers.set(party, receiver);
    } else {
      this.receivers.delete(party);
    }
  }

  protected authorize(operator: PartyId, from: PartyId, to: PartyId): void {
    if (isNullParty(to)) {
      throw new AssetContractError('transfer to the null identity');
    }
    if (operator !== from && !this.isApprovedForAll(from, operator)) {
      throw new AssetContractError(`operator ${operator} is not approved by ${from}`);
    }
  }

  protected notifyReceiver(receipt: AssetReceipt): void {
    const receiver = this.receivers.get(receipt.to);
    if (receiver) {
      receiver(receipt);
    }
  }
}

// ============================================================================
// In-Memory Unique Asset
// ============================================================================

export class InMemoryUniqueAsset extends JournaledAssetContract implements UniqueAssetContract {
  private readonly owners: Map<string, PartyId>;

  constructor(collection: string, journal: TransactionJournal) {
    super(collection, journal);
    this.owners = new Map();
  }

  mint(to: PartyId, itemId: string): void {
    if (this.owners.has(itemId)) {
      throw new AssetContractError(`item ${itemId} already exists in ${this.collection}`);
    }
    if (isNullParty(to)) {
      throw new AssetContractError('mint to the null identity');
    }
    this.setOwner(itemId, to);
  }

  ownerOf(itemId: string): PartyId | null {
    return this.owners.get(itemId) ?? null;
  }

  transferFrom(operator: PartyId, from: PartyId, to: PartyId, itemId: string): void {
    const owner = this.owners.get(itemId);
    if (owner === undefined) {
      throw new AssetContractError(`item ${itemId} does not exist in ${this.collection}`);
    }
    if (owner !== from) {
      throw new AssetContractError(`${from} does not own ${this.collection}#${itemId}`);
    }
    this.authorize(operator, from, to);

    this.setOwner(itemId, to);
    this.notifyReceiver({
      collection: this.collection,
      itemId,
      amount: 1,
      operator,
      from,
      to,
    });
  }

  private setOwner(itemId: string, owner: PartyId): void {
    const previous = this.owners.get(itemId);
    this.owners.set(itemId, owner);
    this.journal.record(() => {
      if (previous === undefined) {
        this.owners.delete(itemId);
      } else {
        this.owners.set(itemId, previous);
      }
    });
  }
}

// ============================================================================
// In-Memory Fungible Asset
// ============================================================================

export class InMemoryFungibleAsset extends JournaledAssetContract implements FungibleAssetContract {
  private readonly holdings: Map<string, number>; // key: itemId|holder

  constructor(collection: string, journal: TransactionJournal) {
    super(collection, journal);
    this.holdings = new Map();
  }

  mint(to: PartyId, itemId: string, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new AssetContractError(`invalid mint amount ${amount}`);
    }
    if (isNullParty(to)) {
      throw new AssetContractError('mint to the null identity');
    }
    this.adjust(to, itemId, amount);
  }

  balanceOf(holder: PartyId, itemId: string): number {
    return this.holdings.get(this.key(itemId, holder)) ?? 0;
  }

  transferFrom(
    operator: PartyId,
    from: PartyId,
    to: PartyId,
    itemId: string,
    amount: number
  ): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new AssetContractError(`invalid transfer amount ${amount}`);
    }
    this.authorize(operator, from, to);

    const held = this.balanceOf(from, itemId);
    if (held < amount) {
      throw new AssetContractError(
        `${from} holds ${held} of ${this.collection}#${itemId}, cannot transfer ${amount}`
      );
    }

    this.adjust(from, itemId, -amount);
    this.adjust(to, itemId, amount);
    this.notifyReceiver({
      collection: this.collection,
      itemId,
      amount,
      operator,
      from,
      to,
    });
  }

  private key(itemId: string, holder: PartyId): string {
    return `${itemId}|${holder}`;
  }

  private adjust(holder: PartyId, itemId: string, delta: number): void {
    const key = this.key(itemId, holder);
    const previous = this.holdings.get(key);
    this.holdings.set(key, (previous ?? 0) + delta);
    this.journal.record(() => {
      if (previous === undefined) {
        this.holdings.delete(key);
      } else {
        this.holdings.set(key, previous);
      }
    });
  }
}

// ============================================================================
// Contract Directory
// ============================================================================

/**
 * Resolves a collection identifier to the contract implementing it.
 */
export class AssetContractDirectory {
  private readonly uniqueContracts: Map<string, UniqueAssetContract>;
  private readonly fungibleContracts: Map<string, FungibleAssetContract>;

  constructor() {
    this.uniqueContracts = new Map();
    this.fungibleContracts = new Map();
  }

  registerUnique(contract: UniqueAssetContract): void {
    this.uniqueContracts.set(contract.collection, contract);
  }

  registerFungible(contract: FungibleAssetContract): void {
    this.fungibleContracts.set(contract.collection, contract);
  }

  unique(collection: string): UniqueAssetContract {
    const contract = this.uniqueContracts.get(collection);
    if (!contract) {
      throw MarketErrors.unknownCollection(collection, 'unique');
    }
    return contract;
  }

  fungible(collection: string): FungibleAssetContract {
    const contract = this.fungibleContracts.get(collection);
    if (!contract) {
      throw MarketErrors.unknownCollection(collection, 'fungible');
    }
    return contract;
  }
}
