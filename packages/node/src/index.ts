/**
 * @tandem/node — Configuration, logging and runtime wiring for a vault.
 */

export { loadConfig, ConfigSchema, assetPairOf, vaultConfigOf } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { createVaultRuntime, createSimulationRuntime } from "./runtime.js";
export type { VaultRuntime, VaultRuntimeOptions, SimulationRuntime } from "./runtime.js";
export { runSimulation } from "./simulate.js";
export type { SimulationSummary } from "./simulate.js";
