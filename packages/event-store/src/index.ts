/**
 * @tidepool/event-store — Append-only record log.
 *
 * Provides:
 * - EventStore interface for append-only streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for typed, versioned record schemas
 * - The vault record definitions (14 record types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedEvent,
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Vault records
export {
  VAULT_EVENTS,
  createVaultCatalog,
  walletStream,
  assetStream,
} from "./vault-events.js";
export type {
  VaultEventType,
  AssetRegisteredPayload,
  AssetUpdatedPayload,
  WalletRegisteredPayload,
  ReferrerAssignedPayload,
  DepositRecordedPayload,
  WithdrawalRecordedPayload,
  WithdrawRequestCreatedPayload,
  WithdrawRequestUpdatedPayload,
  YieldInjectedPayload,
  SwapRecordedPayload,
  FeeShareDistributedPayload,
  RewardClaimedPayload,
  StrategyDepositRecordedPayload,
  StrategyWithdrawalRecordedPayload,
} from "./vault-events.js";
