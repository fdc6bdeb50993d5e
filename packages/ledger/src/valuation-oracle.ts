/**
 * @tandem/ledger — Cross-asset valuation.
 *
 * Every figure the ledger aggregates is in primary-asset units, so
 * secondary amounts are converted before they are added to anything.
 *
 * The rate source is pluggable. StaticRateOracle is the fixed-rate
 * source used for simulation; production deployments supply a
 * manipulation-resistant feed behind the same PriceOracle interface.
 */

import type { AssetPair, AssetRole } from "@tandem/types";
import { formatAmount, mulDiv, parseAmount, pow10, requireNonNegative } from "./money-math.js";
import { LedgerError } from "./types.js";

/** Fixed-point precision of configured prices. */
export const RATE_DECIMALS = 18;

/**
 * A rate source: converts an amount of any known asset into its
 * primary-asset equivalent, in smallest units.
 */
export interface PriceOracle {
  convert(asset: string, amount: bigint): bigint;
}

/**
 * Fixed price: one whole secondary unit is worth `price` whole primary units.
 *
 * convert(secondary, x) = x * price * 10^primaryDecimals / 10^secondaryDecimals
 *
 * With ETH (18) / BTC (8) and price "15", 1 BTC (10^8 sat) → 15 * 10^18 wei.
 */
export class StaticRateOracle implements PriceOracle {
  private readonly _pair: AssetPair;
  private readonly _scaledPrice: bigint;
  private readonly _numerator: bigint;
  private readonly _denominator: bigint;

  constructor(pair: AssetPair, price: string) {
    this._pair = pair;
    this._scaledPrice = parseAmount(price, RATE_DECIMALS);
    if (this._scaledPrice <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Price must be positive, got "${price}"`);
    }
    this._numerator = this._scaledPrice * pow10(pair.primary.decimals);
    this._denominator = pow10(RATE_DECIMALS + pair.secondary.decimals);
  }

  /** The configured price as a decimal string. */
  get price(): string {
    return formatAmount(this._scaledPrice, RATE_DECIMALS);
  }

  convert(asset: string, amount: bigint): bigint {
    requireNonNegative(amount, "Conversion amount");

    if (asset === this._pair.primary.symbol) {
      return amount;
    }
    if (asset === this._pair.secondary.symbol) {
      return mulDiv(amount, this._numerator, this._denominator);
    }
    throw new LedgerError("INVALID_ASSET", `Unknown asset "${asset}"`, {
      details: { asset },
    });
  }
}

/**
 * Valuation over a two-asset pair.
 *
 * Pure: no state, no side effects.
 */
export class ValuationOracle {
  readonly pair: AssetPair;
  private readonly _source: PriceOracle;

  constructor(pair: AssetPair, source: PriceOracle) {
    this.pair = pair;
    this._source = source;
  }

  /**
   * Primary-asset equivalent of a secondary amount.
   */
  convert(secondaryAmount: bigint): bigint {
    return this._source.convert(this.pair.secondary.symbol, secondaryAmount);
  }

  /**
   * Primary-asset equivalent of an amount of either asset.
   */
  convertAsset(asset: string, amount: bigint): bigint {
    this.roleOf(asset);
    return this._source.convert(asset, amount);
  }

  totalValue(primaryAmount: bigint, secondaryAmount: bigint): bigint {
    requireNonNegative(primaryAmount, "Primary amount");
    return primaryAmount + this.convert(secondaryAmount);
  }

  /**
   * Which side of the pair an asset symbol is.
   * Throws INVALID_ASSET for anything else.
   */
  roleOf(asset: string): AssetRole {
    if (asset === this.pair.primary.symbol) return "primary";
    if (asset === this.pair.secondary.symbol) return "secondary";
    throw new LedgerError("INVALID_ASSET", `Unknown asset "${asset}"`, {
      details: { asset, known: [this.pair.primary.symbol, this.pair.secondary.symbol] },
    });
  }

  /** Symbol of the other asset in the pair. */
  counterpart(asset: string): string {
    return this.roleOf(asset) === "primary"
      ? this.pair.secondary.symbol
      : this.pair.primary.symbol;
  }
}
