/**
 * MarketErrors.ts
 * Error types for the escrow marketplace
 *
 * Every error aborts the whole operation it is raised in. The category tells
 * the caller which precondition was rejected; the code narrows it down.
 */

import { PartyId } from '../security/Identity';

// ============================================================================
// Error Codes
// ============================================================================

export enum MarketErrorCode {
  // Validation errors
  INVALID_PRICE = 'INVALID_PRICE',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  KIND_AMOUNT_MISMATCH = 'KIND_AMOUNT_MISMATCH',
  INVALID_ASSET = 'INVALID_ASSET',
  NULL_IDENTITY = 'NULL_IDENTITY',
  CUSTODIAN_PARTY = 'CUSTODIAN_PARTY',
  FEE_ABOVE_CAP = 'FEE_ABOVE_CAP',
  INVALID_BATCH = 'INVALID_BATCH',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',

  // Authorization errors
  NOT_SELLER = 'NOT_SELLER',
  NOT_OWNER = 'NOT_OWNER',

  // State errors
  LISTING_NOT_FOUND = 'LISTING_NOT_FOUND',
  LISTING_INACTIVE = 'LISTING_INACTIVE',

  // Payment errors
  PAYMENT_MISMATCH = 'PAYMENT_MISMATCH',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',

  // Transfer failures
  VALUE_TRANSFER_FAILED = 'VALUE_TRANSFER_FAILED',
  ASSET_TRANSFER_FAILED = 'ASSET_TRANSFER_FAILED',
  INSUFFICIENT_CUSTODY = 'INSUFFICIENT_CUSTODY',
  UNKNOWN_COLLECTION = 'UNKNOWN_COLLECTION',

  // Concurrency
  REENTRANT_CALL = 'REENTRANT_CALL',
}

export type MarketErrorCategory =
  | 'validation'
  | 'authorization'
  | 'state'
  | 'payment'
  | 'transfer'
  | 'reentrancy';

// ============================================================================
// Base Error Class
// ============================================================================

export class MarketError extends Error {
  readonly code: MarketErrorCode;
  readonly category: MarketErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: MarketErrorCategory,
    code: MarketErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MarketError';
    this.category = category;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Categories
// ============================================================================

export class ValidationError extends MarketError {
  constructor(code: MarketErrorCode, message: string, details?: Record<string, unknown>) {
    super('validation', code, message, details);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends MarketError {
  constructor(code: MarketErrorCode, message: string, details?: Record<string, unknown>) {
    super('authorization', code, message, details);
    this.name = 'AuthorizationError';
  }
}

export class StateError extends MarketError {
  constructor(code: MarketErrorCode, message: string, details?: Record<string, unknown>) {
    super('state', code, message, details);
    this.name = 'StateError';
  }
}

export class PaymentError extends MarketError {
  constructor(code: MarketErrorCode, message: string, details?: Record<string, unknown>) {
    super('payment', code, message, details);
    this.name = 'PaymentError';
  }
}

export class TransferFailure extends MarketError {
  constructor(
    code: MarketErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super('transfer', code, message, details, cause === undefined ? undefined : { cause });
    this.name = 'TransferFailure';
  }
}

export class ReentrancyError extends MarketError {
  constructor(operation: string, activeOperation: string) {
    super(
      'reentrancy',
      MarketErrorCode.REENTRANT_CALL,
      `Reentrant call to '${operation}' rejected while '${activeOperation}' is in progress`,
      { operation, activeOperation }
    );
    this.name = 'ReentrancyError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// ============================================================================
// Error Factory
// ============================================================================

export const MarketErrors = {
  invalidPrice: (price: number) =>
    new ValidationError(
      MarketErrorCode.INVALID_PRICE,
      `Invalid price ${price}: must be a positive integer`,
      { price }
    ),

  invalidAmount: (amount: number, reason: string) =>
    new ValidationError(
      MarketErrorCode.INVALID_AMOUNT,
      `Invalid amount ${amount}: ${reason}`,
      { amount, reason }
    ),

  kindAmountMismatch: (kind: string, amount: number, expected: number) =>
    new ValidationError(
      MarketErrorCode.KIND_AMOUNT_MISMATCH,
      `A ${kind} asset must be listed with amount ${expected}, got ${amount}`,
      { kind, amount, expected }
    ),

  invalidAsset: (reason: string, details?: Record<string, unknown>) =>
    new ValidationError(MarketErrorCode.INVALID_ASSET, `Invalid asset: ${reason}`, details),

  nullIdentity: (field: string) =>
    new ValidationError(
      MarketErrorCode.NULL_IDENTITY,
      `${field} must not be the null identity`,
      { field }
    ),

  custodianParty: (field: string, custodian: PartyId) =>
    new ValidationError(
      MarketErrorCode.CUSTODIAN_PARTY,
      `${field} must not be the engine's own address ${custodian}`,
      { field, custodian }
    ),

  feeAboveCap: (feeBps: number, maxFeeBps: number) =>
    new ValidationError(
      MarketErrorCode.FEE_ABOVE_CAP,
      `Fee ${feeBps} bps is outside the allowed range 0..${maxFeeBps}`,
      { feeBps, maxFeeBps }
    ),

  invalidBatch: (reason: string, details?: Record<string, unknown>) =>
    new ValidationError(MarketErrorCode.INVALID_BATCH, `Invalid batch: ${reason}`, details),

  invalidConfig: (reason: string, details?: Record<string, unknown>) =>
    new ValidationError(
      MarketErrorCode.INVALID_CONFIG,
      `Invalid market configuration: ${reason}`,
      details
    ),

  invalidSnapshot: (reason: string, details?: Record<string, unknown>) =>
    new ValidationError(MarketErrorCode.INVALID_SNAPSHOT, `Invalid snapshot: ${reason}`, details),

  notSeller: (listingId: number, caller: PartyId) =>
    new AuthorizationError(
      MarketErrorCode.NOT_SELLER,
      `Party ${caller} is not the seller of listing ${listingId}`,
      { listingId, caller }
    ),

  notOwner: (operation: string, caller: PartyId) =>
    new AuthorizationError(
      MarketErrorCode.NOT_OWNER,
      `Operation '${operation}' is restricted to the owner; caller was ${caller}`,
      { operation, caller }
    ),

  listingNotFound: (listingId: number) =>
    new StateError(
      MarketErrorCode.LISTING_NOT_FOUND,
      `Listing ${listingId} does not exist`,
      { listingId }
    ),

  listingInactive: (listingId: number) =>
    new StateError(
      MarketErrorCode.LISTING_INACTIVE,
      `Listing ${listingId} is no longer active`,
      { listingId }
    ),

  paymentMismatch: (expected: number, paid: number, listingIds?: readonly number[]) =>
    new PaymentError(
      MarketErrorCode.PAYMENT_MISMATCH,
      `Payment of ${paid} does not match the required ${expected}`,
      { expected, paid, listingIds }
    ),

  insufficientFunds: (party: PartyId, requested: number, available: number) =>
    new PaymentError(
      MarketErrorCode.INSUFFICIENT_FUNDS,
      `Party ${party} cannot fund ${requested}: available ${available}`,
      { party, requested, available }
    ),

  valueTransferFailed: (to: PartyId, amount: number, cause: unknown) =>
    new TransferFailure(
      MarketErrorCode.VALUE_TRANSFER_FAILED,
      `Value transfer of ${amount} to ${to} failed: ${describeCause(cause)}`,
      { to, amount },
      cause
    ),

  assetTransferFailed: (
    collection: string,
    itemId: string,
    from: PartyId,
    to: PartyId,
    cause: unknown
  ) =>
    new TransferFailure(
      MarketErrorCode.ASSET_TRANSFER_FAILED,
      `Transfer of ${collection}#${itemId} from ${from} to ${to} failed: ${describeCause(cause)}`,
      { collection, itemId, from, to },
      cause
    ),

  insufficientCustody: (
    collection: string,
    itemId: string,
    requested: number,
    held: number
  ) =>
    new TransferFailure(
      MarketErrorCode.INSUFFICIENT_CUSTODY,
      `Vault holds ${held} of ${collection}#${itemId}, cannot release ${requested}`,
      { collection, itemId, requested, held }
    ),

  unknownCollection: (collection: string, kind: string) =>
    new TransferFailure(
      MarketErrorCode.UNKNOWN_COLLECTION,
      `No ${kind} asset contract is registered for collection ${collection}`,
      { collection, kind }
    ),

  reentrantCall: (operation: string, activeOperation: string) =>
    new ReentrancyError(operation, activeOperation),
};

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}
