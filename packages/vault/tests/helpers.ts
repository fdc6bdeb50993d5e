/**
 * Shared fixtures for vault tests.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { InMemoryEventStore } from "@tandem/event-store";
import { StaticRateOracle, ValuationOracle } from "@tandem/ledger";
import type { AssetPair } from "@tandem/types";
import { FixedRateExchange, InMemoryAssetLedger } from "../src/simulation.js";
import { VaultController } from "../src/vault-controller.js";
import type { RoleAssignments, VaultConfig } from "../src/types.js";

/** Zero-decimal pair so that convert(1) = 15 exactly. */
export const PAIR: AssetPair = {
  primary: { symbol: "ETH", decimals: 0 },
  secondary: { symbol: "BTC", decimals: 0 },
};

export const ROLES: RoleAssignments = {
  owner: "owner-1",
  manager: "manager-1",
  treasury: "treasury-1",
};

export const silentLogger: Logger = pino({ enabled: false });

export function makeOracle(price = "15"): ValuationOracle {
  return new ValuationOracle(PAIR, new StaticRateOracle(PAIR, price));
}

/** Deterministic IDs: id-1, id-2, ... */
export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `id-${String(n)}`;
  };
}

export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");

export interface Harness {
  readonly vault: VaultController;
  readonly custody: InMemoryAssetLedger;
  readonly exchange: FixedRateExchange;
  readonly events: InMemoryEventStore;
}

export function makeVault(config: Partial<VaultConfig> = {}, price = "15"): Harness {
  const custody = new InMemoryAssetLedger(PAIR);
  const exchange = new FixedRateExchange(custody, price, { now: () => FIXED_NOW.getTime() });
  const events = new InMemoryEventStore({ now: () => FIXED_NOW.toISOString() });
  const vault = new VaultController(
    { roles: ROLES, ...config },
    {
      oracle: makeOracle(price),
      custody,
      exchange,
      events,
      logger: silentLogger,
      now: () => FIXED_NOW,
      newId: sequentialIds(),
    },
  );
  return { vault, custody, exchange, events };
}
