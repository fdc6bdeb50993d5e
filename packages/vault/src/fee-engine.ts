/**
 * Fee Engine — performance fee on realized profit.
 *
 * The fee is charged only when a position leaves the vault worth more
 * than it entered with:
 *
 *   profit = max(exitValue - entryValue, 0)
 *   fee    = profit * rate / denominator   (truncated)
 *
 * The fee is paid from pool custody in the primary asset; the
 * depositor's payout is never reduced. A failed treasury transfer does
 * not fail the withdrawal: the fee is queued and retried later.
 */

import type { Logger } from "pino";
import { formatAmount, mulDiv } from "@tandem/ledger";
import type { AssetSpec } from "@tandem/types";
import type { EventBatch } from "./event-batch.js";
import type { RoleRegistry } from "./roles.js";
import type {
  AssetLedger,
  FeeOutcome,
  FeeQuote,
  FeeRetryResult,
  PendingFee,
  PendingFeeRecord,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Fee computation
// =============================================================================

/**
 * Profit and fee for a position entering at `entryValue` and leaving at
 * `exitValue`. Flat or losing positions pay nothing.
 */
export function computeFee(
  entryValue: bigint,
  exitValue: bigint,
  rate: bigint,
  denominator: bigint,
): FeeQuote {
  assertFeeRate(rate, denominator);

  if (exitValue <= entryValue) {
    return { profit: 0n, fee: 0n };
  }

  const profit = exitValue - entryValue;
  return { profit, fee: mulDiv(profit, rate, denominator) };
}

export function assertFeeRate(rate: bigint, denominator: bigint): void {
  if (denominator <= 0n || rate < 0n || rate > denominator) {
    throw new VaultError(
      "INVALID_FEE_RATE",
      `Fee rate must satisfy 0 <= rate <= denominator and denominator > 0, got ${rate.toString()}/${denominator.toString()}`,
    );
  }
}

// =============================================================================
// Fee Engine
// =============================================================================

export interface FeeEngineOptions {
  readonly rate: bigint;
  readonly denominator: bigint;
  /** Asset fees are paid in (the primary asset) */
  readonly asset: AssetSpec;
  readonly custody: AssetLedger;
  readonly roles: RoleRegistry;
  readonly logger: Logger;
  readonly now: () => Date;
  readonly newId: () => string;
}

export class FeeEngine {
  readonly rate: bigint;
  readonly denominator: bigint;
  private readonly asset: AssetSpec;
  private readonly custody: AssetLedger;
  private readonly roles: RoleRegistry;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private queue: PendingFee[] = [];

  constructor(options: FeeEngineOptions) {
    assertFeeRate(options.rate, options.denominator);
    this.rate = options.rate;
    this.denominator = options.denominator;
    this.asset = options.asset;
    this.custody = options.custody;
    this.roles = options.roles;
    this.log = options.logger;
    this.now = options.now;
    this.newId = options.newId;
  }

  quote(entryValue: bigint, exitValue: bigint): FeeQuote {
    return computeFee(entryValue, exitValue, this.rate, this.denominator);
  }

  /**
   * Send `fee` to the treasury, or queue it when the transfer fails.
   */
  async route(fee: bigint, depositor: string, batch: EventBatch): Promise<FeeOutcome> {
    if (fee <= 0n) {
      return { status: "none" };
    }

    try {
      await this.custody.transferOut(this.roles.treasury, this.asset.symbol, fee);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.queue.push({
        id: this.newId(),
        depositor,
        amount: fee,
        deferredAt: this.now().toISOString(),
        reason,
      });
      this.log.error(
        {
          err,
          depositor,
          fee: formatAmount(fee, this.asset.decimals),
          pendingTotal: formatAmount(this.pendingTotal, this.asset.decimals),
        },
        "Treasury transfer failed; fee deferred",
      );
      batch.record("FeeDeferred", { feeAmount: fee.toString(), reason }, "fees");
      return { status: "deferred", amount: fee, reason };
    }

    batch.record("FeeCollected", { feeAmount: fee.toString() }, "fees");
    return { status: "collected", amount: fee };
  }

  /**
   * Retry queued fees oldest first, stopping at the first failure so
   * the queue keeps its order.
   */
  async retryPending(batch: EventBatch): Promise<FeeRetryResult> {
    let collected = 0n;

    while (this.queue.length > 0) {
      const [next] = this.queue;
      if (next === undefined) break;

      try {
        await this.custody.transferOut(this.roles.treasury, this.asset.symbol, next.amount);
      } catch (err) {
        this.log.warn(
          {
            err,
            pendingFeeId: next.id,
            pendingTotal: formatAmount(this.pendingTotal, this.asset.decimals),
          },
          "Deferred fee still cannot be paid",
        );
        break;
      }

      this.queue = this.queue.slice(1);
      collected += next.amount;
      batch.record("FeeCollected", { feeAmount: next.amount.toString() }, "fees");
    }

    return { collected, remaining: this.queue.length };
  }

  get pending(): readonly PendingFee[] {
    return [...this.queue];
  }

  get pendingTotal(): bigint {
    return this.queue.reduce((sum, f) => sum + f.amount, 0n);
  }

  exportPending(): readonly PendingFeeRecord[] {
    return this.queue.map((f) => ({ ...f, amount: f.amount.toString() }));
  }

  importPending(records: readonly PendingFee[]): void {
    this.queue = [...this.queue, ...records];
  }
}
