/**
 * @tandem/node — Vault runtime.
 *
 * Wires a VaultController from configuration. Custody and exchange
 * default to the in-process simulation collaborators; a deployment
 * passes its own implementations of AssetLedger and Exchange.
 */

import type { Logger } from "pino";
import { InMemoryEventStore } from "@tandem/event-store";
import { StaticRateOracle, ValuationOracle } from "@tandem/ledger";
import type { PriceOracle } from "@tandem/ledger";
import type { AssetPair } from "@tandem/types";
import {
  FixedRateExchange,
  InMemoryAssetLedger,
  VaultController,
} from "@tandem/vault";
import type { AssetLedger, Exchange } from "@tandem/vault";
import type { AppConfig } from "./config.js";
import { assetPairOf, vaultConfigOf } from "./config.js";

export interface VaultRuntimeOptions {
  readonly logger: Logger;
  /** Rate source; defaults to a fixed SECONDARY_PRICE */
  readonly priceSource?: PriceOracle;
  /** Custody and venue; both default to the simulation collaborators */
  readonly collaborators?: {
    readonly custody: AssetLedger;
    readonly exchange: Exchange;
  };
}

export interface VaultRuntime {
  readonly config: AppConfig;
  readonly pair: AssetPair;
  readonly vault: VaultController;
  readonly oracle: ValuationOracle;
  readonly custody: AssetLedger;
  readonly exchange: Exchange;
  readonly events: InMemoryEventStore;
  readonly logger: Logger;
}

/**
 * Runtime backed by simulation collaborators, with their concrete types
 * so callers can fund accounts and halt the venue.
 */
export interface SimulationRuntime extends VaultRuntime {
  readonly custody: InMemoryAssetLedger;
  readonly exchange: FixedRateExchange;
}

function simulationCollaborators(
  pair: AssetPair,
  price: string,
): { custody: InMemoryAssetLedger; exchange: FixedRateExchange } {
  const custody = new InMemoryAssetLedger(pair);
  return { custody, exchange: new FixedRateExchange(custody, price) };
}

export function createSimulationRuntime(config: AppConfig, logger: Logger): SimulationRuntime {
  const { custody, exchange } = simulationCollaborators(assetPairOf(config), config.SECONDARY_PRICE);
  const runtime = createVaultRuntime(config, { logger, collaborators: { custody, exchange } });
  return { ...runtime, custody, exchange };
}

export function createVaultRuntime(config: AppConfig, options: VaultRuntimeOptions): VaultRuntime {
  const pair = assetPairOf(config);
  const logger = options.logger;
  const oracle = new ValuationOracle(
    pair,
    options.priceSource ?? new StaticRateOracle(pair, config.SECONDARY_PRICE),
  );

  const { custody, exchange } =
    options.collaborators ?? simulationCollaborators(pair, config.SECONDARY_PRICE);

  const events = new InMemoryEventStore({
    onHandlerError: (err, stored) => {
      logger.error(
        { err, eventType: stored.event.type, globalPosition: stored.globalPosition },
        "Event subscriber failed",
      );
    },
  });

  const vault = new VaultController(vaultConfigOf(config), {
    oracle,
    custody,
    exchange,
    events,
    logger,
  });

  logger.info(
    {
      primary: pair.primary.symbol,
      secondary: pair.secondary.symbol,
      price: config.SECONDARY_PRICE,
      feeRate: `${config.FEE_RATE.toString()}/${config.FEE_DENOMINATOR.toString()}`,
      allowUnboundedSlippage: config.ALLOW_UNBOUNDED_SLIPPAGE,
    },
    "Vault runtime ready",
  );

  return { config, pair, vault, oracle, custody, exchange, events, logger };
}
