/**
 * @tandem/node — Scripted simulation session.
 *
 * Two depositors fund the vault, the manager rotates part of the pool
 * into the secondary asset and back, and both depositors exit.
 */

import { formatAmount, parseAmount } from "@tandem/ledger";
import type { RebalanceResult, WithdrawResult } from "@tandem/vault";
import type { SimulationRuntime } from "./runtime.js";

export interface SimulationSummary {
  readonly rebalances: readonly RebalanceResult[];
  readonly withdrawals: Readonly<Record<string, WithdrawResult>>;
  readonly peakValueLocked: bigint;
  readonly totalValueLocked: bigint;
  readonly eventCount: number;
  readonly integrityValid: boolean;
}

/** Accept up to 1% less than the venue's quote. */
const SLIPPAGE_TOLERANCE_BPS = 100n;

export async function runSimulation(runtime: SimulationRuntime): Promise<SimulationSummary> {
  const { vault, custody, exchange, pair, config, logger } = runtime;
  const primary = pair.primary;
  const secondary = pair.secondary;
  const manager = config.MANAGER_ID;

  const alicePrimary = parseAmount("10", primary.decimals);
  const bobSecondary = parseAmount("0.5", secondary.decimals);

  custody.fund("alice", primary.symbol, alicePrimary);
  custody.fund("bob", secondary.symbol, bobSecondary);

  await vault.depositPrimary("alice", alicePrimary);
  await vault.depositSecondary("bob", bobSecondary);
  const peakValueLocked = vault.totalValueLocked;

  logger.info(
    { totalValueLocked: formatAmount(peakValueLocked, primary.decimals) },
    "Deposits complete",
  );

  const rotateOut = await vault.rebalance(manager, parseAmount("3", primary.decimals), {
    minAmountOut: withTolerance(exchange.quote(parseAmount("3", primary.decimals), primary.symbol)),
  });
  const rotateBack = await vault.rebalance(manager, rotateOut.amountOut, {
    assetIn: secondary.symbol,
    minAmountOut: withTolerance(exchange.quote(rotateOut.amountOut, secondary.symbol)),
  });

  const withdrawals: Record<string, WithdrawResult> = {};
  for (const depositor of ["alice", "bob"]) {
    withdrawals[depositor] = await vault.withdraw(depositor);
  }

  const summary: SimulationSummary = {
    rebalances: [rotateOut, rotateBack],
    withdrawals,
    peakValueLocked,
    totalValueLocked: vault.totalValueLocked,
    eventCount: runtime.events.globalPosition(),
    integrityValid: runtime.events.verifyIntegrity().valid,
  };

  logger.info(
    {
      eventCount: summary.eventCount,
      integrityValid: summary.integrityValid,
      totalValueLocked: formatAmount(summary.totalValueLocked, primary.decimals),
    },
    "Simulation finished",
  );

  return summary;
}

function withTolerance(quote: bigint): bigint {
  return (quote * (10_000n - SLIPPAGE_TOLERANCE_BPS)) / 10_000n;
}
