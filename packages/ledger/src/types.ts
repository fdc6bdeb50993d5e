/**
 * @tandem/ledger — Internal types for the position ledger.
 *
 * Rules:
 * - All types are readonly
 * - Positions are replaced, never mutated in place
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AssetPair, Position, PositionRecord } from "@tandem/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ZERO_AMOUNT"
  | "EMPTY_POSITION"
  | "INVALID_ASSET"
  | "INVALID_AMOUNT"
  | "INVALID_DEPOSITOR"
  | "STALE_PLAN"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LedgerError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

// ─── Operation Results ───────────────────────────────────────────────────

/**
 * Result of a committed deposit. One side is always zero.
 */
export interface DepositReceipt {
  readonly depositor: string;
  readonly primaryAmount: bigint;
  readonly secondaryAmount: bigint;
  /** Primary-equivalent value added to TVL */
  readonly valueAdded: bigint;
  /** True when this deposit opened the position */
  readonly opened: boolean;
}

/**
 * Everything a withdrawal needs, read from one consistent position.
 * Produced by previewWithdraw() and consumed by settleWithdraw().
 */
export interface WithdrawalPlan {
  readonly depositor: string;
  /** The exact position the plan was read from */
  readonly position: Position;
  readonly primaryBalance: bigint;
  readonly secondaryBalance: bigint;
  readonly entryValue: bigint;
  /** totalValue(primaryBalance, secondaryBalance) at plan time */
  readonly exitValue: bigint;
}

/**
 * Result of a settled withdrawal.
 */
export interface WithdrawalReceipt {
  readonly depositor: string;
  readonly primaryAmount: bigint;
  readonly secondaryAmount: bigint;
  /** Amount removed from TVL */
  readonly valueRemoved: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly pair: AssetPair;
  readonly positions: readonly PositionRecord[];
  readonly totalValueLocked: string;
  readonly createdAt: string;
}
