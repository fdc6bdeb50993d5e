/**
 * Rebalance Coordinator — swaps pooled assets on the exchange.
 *
 * A rebalance sells `amountIn` of one asset for the other, then
 * re-derives totalValueLocked from what custody actually holds:
 *
 *   TVL = primaryBalance + convert(secondaryBalance)
 *
 * Positions are not touched; a rebalance changes the pool's asset mix,
 * not who owns what. The swap is bounded by a minimum output and a
 * deadline, and any venue failure fails the whole rebalance.
 *
 * Once the venue returns, custody has moved and the swap is booked:
 * TVL is re-derived and Swap/Rebalance are recorded even when the
 * output is below the minimum or custody cannot be read back. Both
 * conditions are logged at error and flagged on the result.
 */

import type { Logger } from "pino";
import type { PositionLedger, ValuationOracle } from "@tandem/ledger";
import { LedgerError, requirePositive } from "@tandem/ledger";
import { assertDeadlineMs, withDeadline } from "./deadline.js";
import type { EventBatch } from "./event-batch.js";
import type {
  AssetLedger,
  CustodyReport,
  Exchange,
  RebalanceParams,
  RebalanceResult,
} from "./types.js";
import { VaultError } from "./types.js";

export interface RebalanceCoordinatorOptions {
  readonly oracle: ValuationOracle;
  readonly ledger: PositionLedger;
  readonly custody: AssetLedger;
  readonly exchange: Exchange;
  readonly swapDeadlineMs: number;
  readonly allowUnboundedSlippage: boolean;
  readonly logger: Logger;
  readonly now: () => Date;
}

export class RebalanceCoordinator {
  private readonly oracle: ValuationOracle;
  private readonly ledger: PositionLedger;
  private readonly custody: AssetLedger;
  private readonly exchange: Exchange;
  private readonly swapDeadlineMs: number;
  private readonly allowUnboundedSlippage: boolean;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: RebalanceCoordinatorOptions) {
    this.oracle = options.oracle;
    this.ledger = options.ledger;
    this.custody = options.custody;
    this.exchange = options.exchange;
    assertDeadlineMs(options.swapDeadlineMs, "swapDeadlineMs");
    this.swapDeadlineMs = options.swapDeadlineMs;
    this.allowUnboundedSlippage = options.allowUnboundedSlippage;
    this.log = options.logger;
    this.now = options.now;
  }

  async rebalance(
    amountIn: bigint,
    params: RebalanceParams,
    batch: EventBatch,
  ): Promise<RebalanceResult> {
    requirePositive(amountIn, "Rebalance amount");

    const assetIn = params.assetIn ?? this.oracle.pair.primary.symbol;
    const assetOut = this.oracle.counterpart(assetIn);
    const minAmountOut = this.resolveMinAmountOut(params.minAmountOut);

    if (params.deadlineMs !== undefined) {
      assertDeadlineMs(params.deadlineMs, "deadlineMs");
    }

    const before = await this.readCustody();
    const available = assetIn === this.oracle.pair.primary.symbol
      ? before.primaryBalance
      : before.secondaryBalance;
    if (available < amountIn) {
      throw new VaultError(
        "INSUFFICIENT_LIQUIDITY",
        `Cannot swap ${amountIn.toString()} ${assetIn}: custody holds ${available.toString()}`,
        { details: { asset: assetIn, requested: amountIn.toString(), available: available.toString() } },
      );
    }
    const valueIn = this.oracle.convertAsset(assetIn, amountIn);

    const timeoutMs = params.deadlineMs ?? this.swapDeadlineMs;
    const deadline = this.now().getTime() + timeoutMs;
    const amountOut = await this.executeSwap(amountIn, assetIn, assetOut, minAmountOut, deadline, timeoutMs);

    // The venue has settled; nothing below may fail the operation.
    const minAmountOutBreached = amountOut < minAmountOut;
    if (minAmountOutBreached) {
      this.log.error(
        { assetIn, assetOut, amountOut: amountOut.toString(), minAmountOut: minAmountOut.toString() },
        "Venue settled below the minimum output",
      );
    }

    const { report, verified } = await this.settledCustody(before, assetIn, amountIn, amountOut);
    this.ledger.resyncTotalValueLocked(report.custodyValue);

    batch.record(
      "Swap",
      {
        assetIn,
        assetOut,
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
      },
      "rebalance",
    );
    batch.record(
      "Rebalance",
      {
        primaryBalance: report.primaryBalance.toString(),
        secondaryBalance: report.secondaryBalance.toString(),
        totalValueLocked: report.custodyValue.toString(),
      },
      "rebalance",
    );

    this.log.debug(
      {
        assetIn,
        assetOut,
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
        valueIn: valueIn.toString(),
      },
      "Swap settled",
    );

    return {
      assetIn,
      assetOut,
      amountIn,
      amountOut,
      primaryBalance: report.primaryBalance,
      secondaryBalance: report.secondaryBalance,
      totalValueLocked: report.custodyValue,
      minAmountOutBreached,
      custodyVerified: verified,
    };
  }

  /**
   * Custody balances valued in primary units, against the ledger's TVL.
   */
  async readCustody(): Promise<CustodyReport> {
    const primaryBalance = await this.custody.balanceOf(this.oracle.pair.primary.symbol);
    const secondaryBalance = await this.custody.balanceOf(this.oracle.pair.secondary.symbol);
    const custodyValue = this.oracle.totalValue(primaryBalance, secondaryBalance);
    const totalValueLocked = this.ledger.totalValueLocked;

    return {
      primaryBalance,
      secondaryBalance,
      custodyValue,
      totalValueLocked,
      drift: custodyValue - totalValueLocked,
    };
  }

  /**
   * Custody after a settled swap. When it cannot be read back, the
   * balances are the pre-swap read moved by the swap amounts.
   */
  private async settledCustody(
    before: CustodyReport,
    assetIn: string,
    amountIn: bigint,
    amountOut: bigint,
  ): Promise<{ report: CustodyReport; verified: boolean }> {
    try {
      return { report: await this.readCustody(), verified: true };
    } catch (err) {
      const sellsPrimary = assetIn === this.oracle.pair.primary.symbol;
      const primaryBalance = sellsPrimary
        ? before.primaryBalance - amountIn
        : before.primaryBalance + amountOut;
      const secondaryBalance = sellsPrimary
        ? before.secondaryBalance + amountOut
        : before.secondaryBalance - amountIn;
      const custodyValue = this.oracle.totalValue(primaryBalance, secondaryBalance);
      const totalValueLocked = this.ledger.totalValueLocked;

      this.log.error(
        {
          err,
          primaryBalance: primaryBalance.toString(),
          secondaryBalance: secondaryBalance.toString(),
        },
        "Custody unreadable after swap; balances derived from swap amounts",
      );
      return {
        report: {
          primaryBalance,
          secondaryBalance,
          custodyValue,
          totalValueLocked,
          drift: custodyValue - totalValueLocked,
        },
        verified: false,
      };
    }
  }

  private resolveMinAmountOut(minAmountOut: bigint | undefined): bigint {
    if (minAmountOut !== undefined && minAmountOut < 0n) {
      throw new VaultError(
        "INVALID_SLIPPAGE",
        `minAmountOut cannot be negative, got ${minAmountOut.toString()}`,
      );
    }
    if ((minAmountOut === undefined || minAmountOut === 0n) && !this.allowUnboundedSlippage) {
      throw new VaultError(
        "INVALID_SLIPPAGE",
        "A positive minAmountOut is required to rebalance",
      );
    }
    return minAmountOut ?? 0n;
  }

  private async executeSwap(
    amountIn: bigint,
    assetIn: string,
    assetOut: string,
    minAmountOut: bigint,
    deadline: number,
    timeoutMs: number,
  ): Promise<bigint> {
    try {
      return await withDeadline(
        this.exchange.swap(amountIn, assetIn, assetOut, { minAmountOut, deadline }),
        timeoutMs,
        () => new Error(`Swap did not settle within ${String(timeoutMs)}ms`),
      );
    } catch (err) {
      if (err instanceof VaultError || err instanceof LedgerError) {
        throw err;
      }
      throw new VaultError(
        "SWAP_FAILED",
        `Swap of ${amountIn.toString()} ${assetIn} for ${assetOut} failed`,
        { cause: err, details: { assetIn, assetOut, amountIn: amountIn.toString() } },
      );
    }
  }
}
