/**
 * In-process custody and exchange for simulations and tests.
 *
 * InMemoryAssetLedger keeps the pool's balances and those of every
 * outside account. FixedRateExchange swaps at a configured price, less
 * an optional venue fee, and settles directly against the custody.
 */

import type { AssetPair } from "@tandem/types";
import { mulDiv, parseAmount, pow10, RATE_DECIMALS, requirePositive } from "@tandem/ledger";
import type { AssetLedger, Exchange, SwapParams } from "./types.js";

export type SimulationErrorCode =
  | "UNKNOWN_ASSET"
  | "INSUFFICIENT_FUNDS"
  | "VENUE_HALTED"
  | "DEADLINE_PASSED"
  | "SLIPPAGE_EXCEEDED";

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = "SimulationError";
    this.code = code;
  }
}

// =============================================================================
// Custody
// =============================================================================

export class InMemoryAssetLedger implements AssetLedger {
  readonly pair: AssetPair;
  private readonly pool = new Map<string, bigint>();
  private readonly accounts = new Map<string, Map<string, bigint>>();

  constructor(pair: AssetPair) {
    this.pair = pair;
    this.pool.set(pair.primary.symbol, 0n);
    this.pool.set(pair.secondary.symbol, 0n);
  }

  /** Credit an outside account, e.g. before it deposits. */
  fund(account: string, asset: string, amount: bigint): void {
    this.assertAsset(asset);
    requirePositive(amount, "Funding amount");
    this.credit(account, asset, amount);
  }

  accountBalance(account: string, asset: string): bigint {
    this.assertAsset(asset);
    return this.accounts.get(account)?.get(asset) ?? 0n;
  }

  async transferIn(from: string, asset: string, amount: bigint): Promise<void> {
    this.assertAsset(asset);
    requirePositive(amount, "Transfer amount");

    const held = this.accountBalance(from, asset);
    if (held < amount) {
      throw new SimulationError(
        "INSUFFICIENT_FUNDS",
        `"${from}" holds ${held.toString()} ${asset}, cannot transfer ${amount.toString()}`,
      );
    }

    this.credit(from, asset, -amount);
    this.pool.set(asset, this.poolBalance(asset) + amount);
  }

  async transferOut(to: string, asset: string, amount: bigint): Promise<void> {
    this.assertAsset(asset);
    requirePositive(amount, "Transfer amount");

    const held = this.poolBalance(asset);
    if (held < amount) {
      throw new SimulationError(
        "INSUFFICIENT_FUNDS",
        `Pool holds ${held.toString()} ${asset}, cannot transfer ${amount.toString()}`,
      );
    }

    this.pool.set(asset, held - amount);
    this.credit(to, asset, amount);
  }

  async balanceOf(asset: string): Promise<bigint> {
    this.assertAsset(asset);
    return this.poolBalance(asset);
  }

  /**
   * Apply both legs of a swap to the pool at once.
   */
  settleSwap(assetIn: string, amountIn: bigint, assetOut: string, amountOut: bigint): void {
    this.assertAsset(assetIn);
    this.assertAsset(assetOut);

    const held = this.poolBalance(assetIn);
    if (held < amountIn) {
      throw new SimulationError(
        "INSUFFICIENT_FUNDS",
        `Pool holds ${held.toString()} ${assetIn}, cannot swap ${amountIn.toString()}`,
      );
    }

    this.pool.set(assetIn, held - amountIn);
    this.pool.set(assetOut, this.poolBalance(assetOut) + amountOut);
  }

  private poolBalance(asset: string): bigint {
    return this.pool.get(asset) ?? 0n;
  }

  private credit(account: string, asset: string, delta: bigint): void {
    let balances = this.accounts.get(account);
    if (balances === undefined) {
      balances = new Map();
      this.accounts.set(account, balances);
    }
    balances.set(asset, (balances.get(asset) ?? 0n) + delta);
  }

  private assertAsset(asset: string): void {
    if (asset !== this.pair.primary.symbol && asset !== this.pair.secondary.symbol) {
      throw new SimulationError("UNKNOWN_ASSET", `Unknown asset "${asset}"`);
    }
  }
}

// =============================================================================
// Exchange
// =============================================================================

export interface FixedRateExchangeOptions {
  /** Venue fee in basis points, taken from the output. Default 0. */
  readonly feeBps?: number;
  /** Clock checked against the swap deadline (epoch ms). */
  readonly now?: () => number;
}

/**
 * Swaps at `price` whole primary units per whole secondary unit.
 */
export class FixedRateExchange implements Exchange {
  private readonly custody: InMemoryAssetLedger;
  private readonly pair: AssetPair;
  private readonly numerator: bigint;
  private readonly denominator: bigint;
  private readonly feeBps: bigint;
  private readonly now: () => number;
  private halted = false;

  constructor(
    custody: InMemoryAssetLedger,
    price: string,
    options: FixedRateExchangeOptions = {},
  ) {
    this.custody = custody;
    this.pair = custody.pair;

    const scaledPrice = parseAmount(price, RATE_DECIMALS);
    if (scaledPrice <= 0n) {
      throw new RangeError(`Price must be positive, got "${price}"`);
    }
    this.numerator = scaledPrice * pow10(this.pair.primary.decimals);
    this.denominator = pow10(RATE_DECIMALS + this.pair.secondary.decimals);

    const feeBps = options.feeBps ?? 0;
    if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > 10_000) {
      throw new RangeError(`feeBps must be an integer in [0, 10000], got ${String(feeBps)}`);
    }
    this.feeBps = BigInt(feeBps);
    this.now = options.now ?? Date.now;
  }

  /** Reject every swap until resume() is called. */
  halt(): void {
    this.halted = true;
  }

  resume(): void {
    this.halted = false;
  }

  quote(amountIn: bigint, assetIn: string): bigint {
    const gross =
      assetIn === this.pair.primary.symbol
        ? mulDiv(amountIn, this.denominator, this.numerator)
        : mulDiv(amountIn, this.numerator, this.denominator);
    return mulDiv(gross, 10_000n - this.feeBps, 10_000n);
  }

  async swap(
    amountIn: bigint,
    assetIn: string,
    assetOut: string,
    params: SwapParams,
  ): Promise<bigint> {
    if (this.halted) {
      throw new SimulationError("VENUE_HALTED", "Exchange is halted");
    }
    if (this.now() > params.deadline) {
      throw new SimulationError("DEADLINE_PASSED", "Swap deadline has passed");
    }
    if (assetIn === assetOut) {
      throw new SimulationError("UNKNOWN_ASSET", `Cannot swap ${assetIn} for itself`);
    }

    const amountOut = this.quote(amountIn, assetIn);
    if (amountOut < params.minAmountOut) {
      throw new SimulationError(
        "SLIPPAGE_EXCEEDED",
        `Swap would return ${amountOut.toString()} ${assetOut}, below the minimum ${params.minAmountOut.toString()}`,
      );
    }

    this.custody.settleSwap(assetIn, amountIn, assetOut, amountOut);
    return amountOut;
  }
}
