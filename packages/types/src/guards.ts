/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tandem domain types.
 * Used at system boundaries: configuration, restored snapshots,
 * events read back from a store.
 */

import type { AssetPair, AssetSpec } from "./asset.js";
import type { PositionRecord } from "./position.js";
import type { DomainEvent, EventMetadata } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Amount guards
// =============================================================================

const UNSIGNED_INTEGER = /^\d+$/;

/** A base-10, non-negative integer string ("0", "1500", ...). */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && UNSIGNED_INTEGER.test(value);
}

// =============================================================================
// Asset guards
// =============================================================================

export function isAssetSpec(value: unknown): value is AssetSpec {
  if (!isRecord(value)) return false;
  return (
    typeof value.symbol === "string" &&
    value.symbol.length > 0 &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isAssetPair(value: unknown): value is AssetPair {
  if (!isRecord(value)) return false;
  return (
    isAssetSpec(value.primary) &&
    isAssetSpec(value.secondary) &&
    value.primary.symbol !== value.secondary.symbol
  );
}

// =============================================================================
// Position guards
// =============================================================================

export function isPositionRecord(value: unknown): value is PositionRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.depositor === "string" &&
    value.depositor.length > 0 &&
    isAmountString(value.primaryBalance) &&
    isAmountString(value.secondaryBalance) &&
    isAmountString(value.entryValue)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "fees", "rebalance", "admin"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
