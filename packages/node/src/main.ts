/**
 * @tandem/node — Entry point.
 *
 * Loads config, builds a vault over the simulation collaborators and
 * runs the scripted session.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createSimulationRuntime } from "./runtime.js";
import { runSimulation } from "./simulate.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const runtime = createSimulationRuntime(config, logger);

  const summary = await runSimulation(runtime);
  if (!summary.integrityValid) {
    throw new Error("Event log failed its integrity check");
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Simulation failed:", err);
  process.exit(1);
});
