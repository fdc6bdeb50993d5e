/**
 * @tandem/types — Shared domain types for the Tandem vault engine.
 *
 * Used across all Tandem packages:
 * - Asset pair description
 * - Positions and their serialized records
 * - Vault domain events and payloads
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards are the only runtime code
 */

// Asset types
export type { AssetRole, AssetSpec, AssetPair } from "./asset.js";

// Position types
export type { Position, PositionRecord } from "./position.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  VaultEventType,
  VaultEventPayloads,
  DepositPayload,
  WithdrawPayload,
  RebalancePayload,
  SwapPayload,
  FeeCollectedPayload,
  FeeDeferredPayload,
  EmergencyWithdrawPayload,
  RoleChangedPayload,
} from "./event.js";

// Runtime type guards
export {
  isAmountString,
  isAssetSpec,
  isAssetPair,
  isPositionRecord,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
