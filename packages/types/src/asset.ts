/**
 * Asset Types
 *
 * The vault pools exactly two assets. The primary asset is the unit of
 * account: every valuation, TVL figure and fee is denominated in it.
 *
 * Rules:
 * - Amounts are bigint in the asset's smallest indivisible unit
 * - Serialized amounts are base-10 integer strings
 * - Symbols are compared exactly (no case folding)
 */

/** Which side of the pair an asset occupies. */
export type AssetRole = "primary" | "secondary";

/**
 * A tradable asset known to the vault.
 */
export interface AssetSpec {
  /** Asset symbol (e.g., "ETH", "BTC") */
  readonly symbol: string;

  /**
   * Number of decimal places of the smallest unit.
   * ETH = 18 (wei), BTC = 8 (satoshi).
   */
  readonly decimals: number;
}

/**
 * The two assets a vault holds.
 */
export interface AssetPair {
  readonly primary: AssetSpec;
  readonly secondary: AssetSpec;
}
