/**
 * Escrow Market Engine
 *
 * Listings held in custody, exact-payment settlement with a capped fee,
 * all-or-nothing batch purchases and owner-controlled fee policy, on an
 * in-process journaled ledger.
 */

// ============================================================================
// Engine
// ============================================================================

export {
  MarketplaceEngine,
  MarketplaceEngineOptions,
  RestoreOptions,
  createMarketplaceEngine,
} from './market/MarketplaceEngine';

export {
  MarketConfig,
  MarketConfigInput,
  DEFAULT_MARKET_CONFIG,
  createMarketConfig,
  marketConfigFromEnv,
  validateMarketConfig,
} from './market/MarketConfig';

export {
  MarketHost,
  MarketHostOptions,
  createMarketHost,
  deployUniqueCollection,
  deployFungibleCollection,
} from './market/MarketHost';

// ============================================================================
// Types & Errors
// ============================================================================

export {
  ListingId,
  AssetKind,
  AssetRef,
  Listing,
  ListingCloseReason,
  ListingFilter,
  FeeSplit,
  SettlementReceipt,
  BatchReceipt,
  BatchQuote,
  assetKey,
  isAssetKind,
} from './market/MarketTypes';

export {
  MarketError,
  MarketErrorCode,
  MarketErrorCategory,
  ValidationError,
  AuthorizationError,
  StateError,
  PaymentError,
  TransferFailure,
  ReentrancyError,
  MarketErrors,
  isMarketError,
} from './market/MarketErrors';

// ============================================================================
// Components
// ============================================================================

export { ListingRegistry } from './listings/ListingRegistry';
export { SettlementEngine, ListingQuote } from './settlement/SettlementEngine';
export { BatchPurchaseCoordinator } from './settlement/BatchPurchaseCoordinator';
export {
  FeePolicy,
  FeePolicyState,
  MAX_FEE_BPS,
  BPS_DENOMINATOR,
  calculateFee,
  splitPrice,
  isValidFeeBps,
} from './fees/FeePolicy';
export { AssetCustodyVault, CustodyPosition } from './vault/AssetCustodyVault';
export { AssetKindRule, ASSET_KIND_RULES, ruleFor } from './vault/AssetKindRules';
export {
  AssetReceipt,
  AssetReceiver,
  UniqueAssetContract,
  FungibleAssetContract,
  AssetContractError,
  InMemoryUniqueAsset,
  InMemoryFungibleAsset,
  AssetContractDirectory,
} from './vault/AssetContracts';

// ============================================================================
// Security
// ============================================================================

export { PartyId, NULL_PARTY, isNullParty, isSameParty } from './security/Identity';
export { ReentrancyGuard } from './security/ReentrancyGuard';
export { AccessGuard, Role, AccessCheckResult } from './security/AccessGuard';

// ============================================================================
// Ledger
// ============================================================================

export {
  TransactionJournal,
  TransactionId,
  TransactionRecord,
  TransactionStatus,
  UndoAction,
  createTransactionJournal,
} from './ledger/TransactionJournal';
export {
  NativeBalances,
  ValueReceipt,
  ValueReceiver,
  InsufficientBalanceError,
  createNativeBalances,
} from './ledger/NativeBalances';

// ============================================================================
// Events, Persistence, Invariants
// ============================================================================

export {
  MarketEvent,
  MarketEventType,
  MarketEventEntry,
  MarketEventQuery,
  MarketEventListener,
  MarketEventLog,
  IntegrityResult,
  GENESIS_HASH,
} from './events/MarketEventLog';

export {
  MarketSnapshot,
  MarketSnapshotState,
  SNAPSHOT_VERSION,
  createSnapshot,
  verifySnapshot,
  serializeSnapshot,
  parseSnapshot,
  computeSnapshotChecksum,
} from './persistence/MarketPersistence';

export {
  MarketInvariantType,
  MarketStateView,
  InvariantResult,
  InvariantViolation,
  verifyMarketInvariants,
  listingTermProblems,
  allInvariantsHold,
} from './invariants/MarketInvariants';

// ============================================================================
// Logging
// ============================================================================

export { Logger, LogLevel, createLogger, setLogLevel, getLogLevel } from './utils/logger';
