/**
 * @tandem/vault domain types.
 *
 * The vault coordinates the position ledger with three collaborators it
 * does not implement itself:
 * - AssetLedger: custody of the pooled assets
 * - Exchange: the venue rebalancing swaps are executed on
 * - EventStore: where committed operations are published
 *
 * Identities (depositor, owner, manager, treasury) are plain strings
 * supplied by the caller's identity provider.
 */

import type { Logger } from "pino";
import type { EventStore } from "@tandem/event-store";
import type { LedgerSnapshot, PositionLedger, ValuationOracle } from "@tandem/ledger";

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "REENTRANT_CALL"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_LIQUIDITY"
  | "SWAP_FAILED"
  | "TRANSFER_FAILED"
  | "INVALID_SLIPPAGE"
  | "INVALID_DEADLINE"
  | "INVALID_IDENTITY"
  | "INVALID_FEE_RATE"
  | "INVALID_SNAPSHOT";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: VaultErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Custody of the pooled assets.
 *
 * Every transfer moves exactly `amount` or fails; there are no partial
 * transfers. `balanceOf` is the pool's live custody balance.
 */
export interface AssetLedger {
  transferIn(from: string, asset: string, amount: bigint): Promise<void>;
  transferOut(to: string, asset: string, amount: bigint): Promise<void>;
  balanceOf(asset: string): Promise<bigint>;
}

/** Parameters handed to the venue with every swap. */
export interface SwapParams {
  /** The venue must fail rather than return less than this */
  readonly minAmountOut: bigint;
  /** Epoch milliseconds after which the venue must not execute */
  readonly deadline: number;
}

/**
 * The venue rebalancing swaps run on. The venue moves custody balances
 * itself; the vault only reads them back afterwards.
 */
export interface Exchange {
  swap(amountIn: bigint, assetIn: string, assetOut: string, params: SwapParams): Promise<bigint>;
}

// =============================================================================
// Roles
// =============================================================================

export type Role = "owner" | "manager" | "treasury";

export interface RoleAssignments {
  readonly owner: string;
  readonly manager: string;
  readonly treasury: string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  readonly roles: RoleAssignments;

  /** Performance fee numerator. Default 10 (with 1000 → 1%). */
  readonly feeRate?: bigint;
  readonly feeDenominator?: bigint;

  /** Bound on a single swap, 1 to MAX_SWAP_DEADLINE_MS. Default 15 minutes. */
  readonly swapDeadlineMs?: number;

  /** Accept rebalances without a minimum output. Default false. */
  readonly allowUnboundedSlippage?: boolean;

  /** Event stream the vault publishes to. Default "vault". */
  readonly streamId?: string;
}

export interface VaultDependencies {
  readonly oracle: ValuationOracle;
  readonly custody: AssetLedger;
  readonly exchange: Exchange;
  /** Defaults to a fresh InMemoryEventStore */
  readonly events?: EventStore;
  /** Defaults to a disabled logger */
  readonly logger?: Logger;
  /** Restored ledger; defaults to an empty one */
  readonly ledger?: PositionLedger;
  readonly now?: () => Date;
  readonly newId?: () => string;
}

export const DEFAULT_FEE_RATE = 10n;
export const DEFAULT_FEE_DENOMINATOR = 1000n;
export const DEFAULT_SWAP_DEADLINE_MS = 15 * 60 * 1000;
/** Longest delay a Node timer honours; anything above fires at once. */
export const MAX_SWAP_DEADLINE_MS = 2_147_483_647;
export const DEFAULT_STREAM_ID = "vault";

// =============================================================================
// Results
// =============================================================================

export interface WithdrawResult {
  readonly primaryPaid: bigint;
  readonly secondaryPaid: bigint;
  /** Performance fee charged on this withdrawal */
  readonly feeCollected: bigint;
  /** True when the treasury transfer failed and the fee was queued */
  readonly feeDeferred: boolean;
}

export interface RebalanceParams {
  /** Asset sold. Defaults to the primary asset. */
  readonly assetIn?: string;
  /** Required unless the vault allows unbounded slippage */
  readonly minAmountOut?: bigint;
  /** Overrides the configured swap deadline */
  readonly deadlineMs?: number;
}

export interface RebalanceResult {
  readonly assetIn: string;
  readonly assetOut: string;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly primaryBalance: bigint;
  readonly secondaryBalance: bigint;
  readonly totalValueLocked: bigint;
  /** The venue returned less than minAmountOut; the swap is still booked */
  readonly minAmountOutBreached: boolean;
  /**
   * False when custody could not be read back after the swap and the
   * balances were derived from the pre-swap read and the swap amounts
   */
  readonly custodyVerified: boolean;
}

/** Custody compared with the ledger's recorded TVL. */
export interface CustodyReport {
  readonly primaryBalance: bigint;
  readonly secondaryBalance: bigint;
  /** primaryBalance + convert(secondaryBalance) */
  readonly custodyValue: bigint;
  readonly totalValueLocked: bigint;
  /** custodyValue - totalValueLocked */
  readonly drift: bigint;
}

// =============================================================================
// Fees
// =============================================================================

export interface FeeQuote {
  readonly profit: bigint;
  readonly fee: bigint;
}

/** A fee whose treasury transfer failed, awaiting retry. */
export interface PendingFee {
  readonly id: string;
  readonly depositor: string;
  readonly amount: bigint;
  readonly deferredAt: string;
  readonly reason: string;
}

export type FeeOutcome =
  | { readonly status: "none" }
  | { readonly status: "collected"; readonly amount: bigint }
  | { readonly status: "deferred"; readonly amount: bigint; readonly reason: string };

export interface FeeRetryResult {
  readonly collected: bigint;
  readonly remaining: number;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface PendingFeeRecord {
  readonly id: string;
  readonly depositor: string;
  readonly amount: string;
  readonly deferredAt: string;
  readonly reason: string;
}

export interface VaultSnapshot {
  readonly version: 1;
  readonly roles: RoleAssignments;
  readonly feeRate: string;
  readonly feeDenominator: string;
  readonly ledger: LedgerSnapshot;
  readonly pendingFees: readonly PendingFeeRecord[];
  readonly savedAt: string;
}
