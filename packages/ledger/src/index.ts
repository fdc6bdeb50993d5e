/**
 * @tandem/ledger — Position ledger and valuation for a two-asset vault.
 *
 * A pure TypeScript engine with no runtime dependencies beyond
 * @tandem/types. Enforces the vault's accounting invariants:
 * - Every position's value is in primary-asset units
 * - totalValueLocked moves by exactly the value deposited or withdrawn
 * - Withdrawal is all-or-nothing per depositor
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Core engine
export { PositionLedger } from "./position-ledger.js";

// Valuation
export { ValuationOracle, StaticRateOracle, RATE_DECIMALS } from "./valuation-oracle.js";
export type { PriceOracle } from "./valuation-oracle.js";

// Integer arithmetic
export {
  parseAmount,
  formatAmount,
  parseUnits,
  pow10,
  mulDiv,
  requirePositive,
  requireNonNegative,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  DepositReceipt,
  WithdrawalPlan,
  WithdrawalReceipt,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
