/**
 * @tandem/vault — Two-asset vault engine.
 *
 * Depositors pool a primary and a secondary asset; positions are valued
 * in primary units through the ledger's ValuationOracle. A manager
 * rebalances the pool on an external exchange, and a performance fee on
 * realized profit goes to the treasury on withdrawal.
 *
 * Design rules:
 * - One mutating operation at a time; nested calls are rejected
 * - A failed operation leaves ledger and custody as they were
 * - Events are published only for committed operations
 * - All amounts are bigint smallest units
 */

// Top-level vault
export { VaultController } from "./vault-controller.js";

// Subsystems
export { FeeEngine, computeFee, assertFeeRate } from "./fee-engine.js";
export type { FeeEngineOptions } from "./fee-engine.js";
export { RebalanceCoordinator } from "./rebalance-coordinator.js";
export type { RebalanceCoordinatorOptions } from "./rebalance-coordinator.js";
export { RoleRegistry } from "./roles.js";
export type { RoleChange } from "./roles.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export { EventBatch } from "./event-batch.js";
export { withDeadline, assertDeadlineMs } from "./deadline.js";

// Simulation collaborators
export {
  InMemoryAssetLedger,
  FixedRateExchange,
  SimulationError,
} from "./simulation.js";
export type { FixedRateExchangeOptions, SimulationErrorCode } from "./simulation.js";

// Types
export type {
  VaultErrorCode,
  AssetLedger,
  SwapParams,
  Exchange,
  Role,
  RoleAssignments,
  VaultConfig,
  VaultDependencies,
  WithdrawResult,
  RebalanceParams,
  RebalanceResult,
  CustodyReport,
  FeeQuote,
  PendingFee,
  FeeOutcome,
  FeeRetryResult,
  PendingFeeRecord,
  VaultSnapshot,
} from "./types.js";

export {
  VaultError,
  DEFAULT_FEE_RATE,
  DEFAULT_FEE_DENOMINATOR,
  DEFAULT_SWAP_DEADLINE_MS,
  MAX_SWAP_DEADLINE_MS,
  DEFAULT_STREAM_ID,
} from "./types.js";
