/**
 * Tests for rebalancing through the VaultController.
 *
 * Covers:
 * - Swap execution and TVL re-derivation from custody
 * - Manager-only access
 * - Liquidity, slippage and amount checks
 * - Venue failures and timeouts leave everything untouched
 * - A settled swap is always booked, even below the minimum
 * - Swap deadline bounds
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { InMemoryEventStore } from "@tandem/event-store";
import { VaultController } from "../src/vault-controller.js";
import { InMemoryAssetLedger, SimulationError } from "../src/simulation.js";
import type { Exchange } from "../src/types.js";
import { MAX_SWAP_DEADLINE_MS, VaultError } from "../src/types.js";
import type { Harness } from "./helpers.js";
import { makeOracle, makeVault, PAIR, ROLES, silentLogger } from "./helpers.js";

async function seed(h: Harness): Promise<void> {
  h.custody.fund("alice", "ETH", 100n);
  h.custody.fund("bob", "BTC", 2n);
  await h.vault.depositPrimary("alice", 100n);
  await h.vault.depositSecondary("bob", 2n);
}

async function custodyState(custody: InMemoryAssetLedger): Promise<[bigint, bigint]> {
  return [await custody.balanceOf("ETH"), await custody.balanceOf("BTC")];
}

describe("rebalance", () => {
  let h: Harness;

  beforeEach(async () => {
    h = makeVault();
    await seed(h);
  });

  it("swaps primary for secondary and re-derives TVL from custody", async () => {
    const result = await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    expect(result).toEqual({
      assetIn: "ETH",
      assetOut: "BTC",
      amountIn: 30n,
      amountOut: 2n,
      primaryBalance: 70n,
      secondaryBalance: 4n,
      totalValueLocked: 130n,
      minAmountOutBreached: false,
      custodyVerified: true,
    });
    expect(await custodyState(h.custody)).toEqual([70n, 4n]);
    expect(h.vault.totalValueLocked).toBe(130n);
  });

  it("publishes Swap then Rebalance with one correlation ID", async () => {
    await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    const stored = h.events.read("vault", { fromVersion: 3 });
    expect(stored.map((s) => s.event.type)).toEqual(["Swap", "Rebalance"]);
    expect(stored[0]?.event.payload).toEqual({
      assetIn: "ETH",
      assetOut: "BTC",
      amountIn: "30",
      amountOut: "2",
    });
    expect(stored[1]?.event.payload).toEqual({
      primaryBalance: "70",
      secondaryBalance: "4",
      totalValueLocked: "130",
    });
    expect(stored[0]?.event.metadata.correlationId).toBe(stored[1]?.event.metadata.correlationId);
    expect(stored[0]?.event.metadata.actor).toBe("manager-1");
  });

  it("sells the secondary asset when asked", async () => {
    const result = await h.vault.rebalance("manager-1", 1n, { assetIn: "BTC", minAmountOut: 15n });

    expect(result.amountOut).toBe(15n);
    expect(await custodyState(h.custody)).toEqual([115n, 1n]);
    expect(h.vault.totalValueLocked).toBe(130n);
  });

  it("absorbs custody drift into TVL", async () => {
    h.custody.fund("donor", "ETH", 10n);
    await h.custody.transferIn("donor", "ETH", 10n);
    expect((await h.vault.custodyReport()).drift).toBe(10n);

    await h.vault.rebalance("manager-1", 15n, { minAmountOut: 1n });

    expect(h.vault.totalValueLocked).toBe(140n);
    expect((await h.vault.custodyReport()).drift).toBe(0n);
  });

  it("leaves positions untouched", async () => {
    await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    expect(h.vault.getPosition("alice")).toEqual({
      depositor: "alice",
      primaryBalance: 100n,
      secondaryBalance: 0n,
      entryValue: 100n,
    });
  });

  it("is manager-only", async () => {
    await expect(h.vault.rebalance("owner-1", 30n, { minAmountOut: 2n })).rejects.toMatchObject({
      code: "UNAUTHORIZED",
    });
    expect(h.events.streamVersion("vault")).toBe(2);
  });

  it("rejects a zero amount", async () => {
    await expect(h.vault.rebalance("manager-1", 0n, { minAmountOut: 1n })).rejects.toMatchObject({
      code: "ZERO_AMOUNT",
    });
  });

  it("rejects an unknown asset", async () => {
    await expect(
      h.vault.rebalance("manager-1", 1n, { assetIn: "DOGE", minAmountOut: 1n }),
    ).rejects.toMatchObject({ code: "INVALID_ASSET" });
  });

  it("fails with INSUFFICIENT_LIQUIDITY beyond custody", async () => {
    await expect(h.vault.rebalance("manager-1", 101n, { minAmountOut: 1n })).rejects.toMatchObject({
      code: "INSUFFICIENT_LIQUIDITY",
    });
    expect(await custodyState(h.custody)).toEqual([100n, 2n]);
  });

  it("requires a positive minimum output by default", async () => {
    await expect(h.vault.rebalance("manager-1", 30n)).rejects.toMatchObject({
      code: "INVALID_SLIPPAGE",
    });
    await expect(h.vault.rebalance("manager-1", 30n, { minAmountOut: 0n })).rejects.toMatchObject({
      code: "INVALID_SLIPPAGE",
    });
  });

  it("accepts no minimum when unbounded slippage is allowed", async () => {
    const open = makeVault({ allowUnboundedSlippage: true });
    await seed(open);

    const result = await open.vault.rebalance("manager-1", 30n);
    expect(result.amountOut).toBe(2n);
  });

  it("rejects a negative minimum even when unbounded slippage is allowed", async () => {
    const open = makeVault({ allowUnboundedSlippage: true });
    await seed(open);

    await expect(open.vault.rebalance("manager-1", 30n, { minAmountOut: -1n })).rejects.toMatchObject({
      code: "INVALID_SLIPPAGE",
    });
  });
});

describe("rebalance failures", () => {
  it("leaves TVL and custody identical when the venue fails", async () => {
    const h = makeVault();
    await seed(h);
    const before = await custodyState(h.custody);
    h.exchange.halt();

    const error: unknown = await h.vault
      .rebalance("manager-1", 30n, { minAmountOut: 2n })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(VaultError);
    expect(error).toMatchObject({ code: "SWAP_FAILED" });
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(SimulationError);
    expect(await custodyState(h.custody)).toEqual(before);
    expect(h.vault.totalValueLocked).toBe(130n);
    expect(h.events.streamVersion("vault")).toBe(2);
  });

  it("fails when the venue would return less than the minimum", async () => {
    const h = makeVault();
    await seed(h);

    await expect(h.vault.rebalance("manager-1", 30n, { minAmountOut: 3n })).rejects.toMatchObject({
      code: "SWAP_FAILED",
    });
    expect(await custodyState(h.custody)).toEqual([100n, 2n]);
  });

  function vaultWith(exchange: Exchange): { vault: VaultController; custody: InMemoryAssetLedger } {
    const custody = new InMemoryAssetLedger(PAIR);
    const vault = new VaultController(
      { roles: ROLES },
      { oracle: makeOracle(), custody, exchange, logger: silentLogger },
    );
    return { vault, custody };
  }

  it("treats a swap that outlives its deadline as SWAP_FAILED", async () => {
    const { vault, custody } = vaultWith({
      swap: () => new Promise<bigint>(() => undefined),
    });
    custody.fund("alice", "ETH", 100n);
    await vault.depositPrimary("alice", 100n);

    await expect(
      vault.rebalance("manager-1", 10n, { minAmountOut: 1n, deadlineMs: 5 }),
    ).rejects.toMatchObject({ code: "SWAP_FAILED" });
    expect(vault.totalValueLocked).toBe(100n);
    expect(vault.activeOperation).toBeUndefined();
  });


  it("passes the minimum and an absolute deadline to the venue", async () => {
    const calls: Array<{ minAmountOut: bigint; deadline: number }> = [];
    const custody = new InMemoryAssetLedger(PAIR);
    const vault = new VaultController(
      { roles: ROLES, swapDeadlineMs: 60_000 },
      {
        oracle: makeOracle(),
        custody,
        exchange: {
          swap: async (_amountIn, _assetIn, _assetOut, params) => {
            calls.push({ minAmountOut: params.minAmountOut, deadline: params.deadline });
            return params.minAmountOut;
          },
        },
        logger: silentLogger,
        now: () => new Date(1_000_000),
      },
    );
    custody.fund("alice", "ETH", 100n);
    await vault.depositPrimary("alice", 100n);

    await vault.rebalance("manager-1", 10n, { minAmountOut: 4n });

    expect(calls).toEqual([{ minAmountOut: 4n, deadline: 1_060_000 }]);
  });
});

describe("settled swaps", () => {
  /** Custody whose reads can be switched off mid-operation. */
  class FlakyReadLedger extends InMemoryAssetLedger {
    failReads = false;

    override async balanceOf(asset: string): Promise<bigint> {
      if (this.failReads) {
        throw new Error("custody unreachable");
      }
      return super.balanceOf(asset);
    }
  }

  function settlingVault(
    custody: InMemoryAssetLedger,
    exchange: Exchange,
  ): { vault: VaultController; events: InMemoryEventStore } {
    const events = new InMemoryEventStore();
    const vault = new VaultController(
      { roles: ROLES },
      { oracle: makeOracle(), custody, exchange, events, logger: silentLogger },
    );
    return { vault, events };
  }

  it("books a swap the venue settled below the minimum", async () => {
    const custody = new InMemoryAssetLedger(PAIR);
    const h = settlingVault(custody, {
      swap: async (amountIn, assetIn, assetOut) => {
        custody.settleSwap(assetIn, amountIn, assetOut, 1n);
        return 1n;
      },
    });
    custody.fund("alice", "ETH", 100n);
    await h.vault.depositPrimary("alice", 100n);

    const result = await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    expect(result).toMatchObject({
      amountOut: 1n,
      primaryBalance: 70n,
      secondaryBalance: 1n,
      totalValueLocked: 85n,
      minAmountOutBreached: true,
      custodyVerified: true,
    });
    expect(h.vault.totalValueLocked).toBe(85n);
    expect((await h.vault.custodyReport()).drift).toBe(0n);
    expect(h.events.read("vault").map((s) => s.event.type)).toEqual(["Deposit", "Swap", "Rebalance"]);
    expect(h.events.read("vault", { fromVersion: 2 })[0]?.event.payload).toEqual({
      assetIn: "ETH",
      assetOut: "BTC",
      amountIn: "30",
      amountOut: "1",
    });
  });

  it("books a swap a venue reports without moving custody", async () => {
    const custody = new InMemoryAssetLedger(PAIR);
    const h = settlingVault(custody, { swap: async () => 1n });
    custody.fund("alice", "ETH", 100n);
    await h.vault.depositPrimary("alice", 100n);

    const result = await h.vault.rebalance("manager-1", 10n, { minAmountOut: 2n });

    expect(result.minAmountOutBreached).toBe(true);
    expect(result.totalValueLocked).toBe(100n);
    expect(h.events.streamVersion("vault")).toBe(3);
  });

  it("derives balances from the swap when custody cannot be read back", async () => {
    const custody = new FlakyReadLedger(PAIR);
    const h = settlingVault(custody, {
      swap: async (amountIn, assetIn, assetOut) => {
        custody.settleSwap(assetIn, amountIn, assetOut, 2n);
        custody.failReads = true;
        return 2n;
      },
    });
    custody.fund("alice", "ETH", 100n);
    await h.vault.depositPrimary("alice", 100n);

    const result = await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    expect(result).toMatchObject({
      primaryBalance: 70n,
      secondaryBalance: 2n,
      totalValueLocked: 100n,
      minAmountOutBreached: false,
      custodyVerified: false,
    });
    expect(h.vault.totalValueLocked).toBe(100n);
    expect(h.events.read("vault", { fromVersion: 3 })[0]?.event.payload).toEqual({
      primaryBalance: "70",
      secondaryBalance: "2",
      totalValueLocked: "100",
    });

    custody.failReads = false;
    expect(await custodyState(custody)).toEqual([70n, 2n]);
    expect((await h.vault.custodyReport()).drift).toBe(0n);
  });
});

describe("swap deadline bounds", () => {
  const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

  function construct(swapDeadlineMs: number): VaultController {
    return new VaultController(
      { roles: ROLES, swapDeadlineMs },
      {
        oracle: makeOracle(),
        custody: new InMemoryAssetLedger(PAIR),
        exchange: { swap: async () => 1n },
        logger: silentLogger,
      },
    );
  }

  it("rejects a configured deadline a timer cannot hold", () => {
    expect(() => construct(THIRTY_DAYS_MS)).toThrow(
      expect.objectContaining({ code: "INVALID_DEADLINE" }),
    );
    expect(() => construct(MAX_SWAP_DEADLINE_MS + 1)).toThrow(VaultError);
  });

  it("rejects zero, negative, fractional and NaN deadlines", () => {
    for (const value of [0, -1, 1.5, Number.NaN]) {
      expect(() => construct(value)).toThrow(
        expect.objectContaining({ code: "INVALID_DEADLINE" }),
      );
    }
  });

  it("accepts the largest deadline a timer can hold", async () => {
    const h = makeVault({ swapDeadlineMs: MAX_SWAP_DEADLINE_MS });
    await seed(h);

    const result = await h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n });

    expect(result.amountOut).toBe(2n);
  });

  it("rejects a per-call deadline out of range before touching the venue", async () => {
    const h = makeVault();
    await seed(h);
    const swap = vi.spyOn(h.exchange, "swap");

    await expect(
      h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n, deadlineMs: THIRTY_DAYS_MS }),
    ).rejects.toMatchObject({ code: "INVALID_DEADLINE" });
    await expect(
      h.vault.rebalance("manager-1", 30n, { minAmountOut: 2n, deadlineMs: -5 }),
    ).rejects.toMatchObject({ code: "INVALID_DEADLINE" });

    expect(swap).not.toHaveBeenCalled();
    expect(await custodyState(h.custody)).toEqual([100n, 2n]);
    expect(h.events.streamVersion("vault")).toBe(2);
  });
});
