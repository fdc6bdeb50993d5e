/**
 * Tests for the performance fee.
 *
 * Covers:
 * - computeFee on profit, loss and flat exits
 * - Rate validation
 * - Treasury routing, deferral and retry
 * - No-loss and monotonicity properties
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { assertFeeRate, computeFee, FeeEngine } from "../src/fee-engine.js";
import { EventBatch } from "../src/event-batch.js";
import { RoleRegistry } from "../src/roles.js";
import { InMemoryAssetLedger } from "../src/simulation.js";
import { FIXED_NOW, PAIR, ROLES, sequentialIds, silentLogger } from "./helpers.js";

describe("computeFee", () => {
  it("charges nothing on a small profit at 10/1000", () => {
    expect(computeFee(100n, 115n, 10n, 1000n)).toEqual({ profit: 15n, fee: 0n });
  });

  it("charges rate/denominator of the profit, truncated", () => {
    expect(computeFee(100n, 1100n, 10n, 1000n)).toEqual({ profit: 1000n, fee: 10n });
    expect(computeFee(0n, 1999n, 10n, 1000n)).toEqual({ profit: 1999n, fee: 19n });
  });

  it("charges nothing on a flat or losing exit", () => {
    expect(computeFee(100n, 100n, 10n, 1000n)).toEqual({ profit: 0n, fee: 0n });
    expect(computeFee(100n, 40n, 10n, 1000n)).toEqual({ profit: 0n, fee: 0n });
  });

  it("rejects a rate above the denominator", () => {
    expect(() => computeFee(0n, 10n, 1001n, 1000n)).toThrow(
      expect.objectContaining({ code: "INVALID_FEE_RATE" }),
    );
  });

  it("rejects a negative rate and a zero denominator", () => {
    expect(() => assertFeeRate(-1n, 1000n)).toThrow(
      expect.objectContaining({ code: "INVALID_FEE_RATE" }),
    );
    expect(() => assertFeeRate(0n, 0n)).toThrow(
      expect.objectContaining({ code: "INVALID_FEE_RATE" }),
    );
  });
});

describe("computeFee properties", () => {
  const arbValue = fc.bigInt({ min: 0n, max: 10n ** 30n });

  it("is zero whenever exit <= entry", () => {
    fc.assert(
      fc.property(arbValue, arbValue, (a, b) => {
        const entry = a > b ? a : b;
        const exit = a > b ? b : a;
        expect(computeFee(entry, exit, 10n, 1000n).fee).toBe(0n);
      }),
    );
  });

  it("is non-decreasing in profit", () => {
    fc.assert(
      fc.property(
        arbValue,
        arbValue,
        arbValue,
        fc.bigInt({ min: 0n, max: 1000n }),
        (entry, p1, p2, rate) => {
          const small = p1 < p2 ? p1 : p2;
          const large = p1 < p2 ? p2 : p1;
          const low = computeFee(entry, entry + small, rate, 1000n).fee;
          const high = computeFee(entry, entry + large, rate, 1000n).fee;
          expect(high >= low).toBe(true);
        },
      ),
    );
  });

  it("never exceeds the profit", () => {
    fc.assert(
      fc.property(arbValue, arbValue, fc.bigInt({ min: 0n, max: 1000n }), (entry, exit, rate) => {
        const { profit, fee } = computeFee(entry, exit, rate, 1000n);
        expect(fee >= 0n && fee <= profit).toBe(true);
      }),
    );
  });
});

describe("FeeEngine", () => {
  let custody: InMemoryAssetLedger;
  let engine: FeeEngine;
  let batch: EventBatch;

  beforeEach(() => {
    custody = new InMemoryAssetLedger(PAIR);
    const newId = sequentialIds();
    engine = new FeeEngine({
      rate: 10n,
      denominator: 1000n,
      asset: PAIR.primary,
      custody,
      roles: new RoleRegistry(ROLES),
      logger: silentLogger,
      now: () => FIXED_NOW,
      newId,
    });
    batch = new EventBatch("alice", "corr-1", () => FIXED_NOW, newId);
  });

  async function fundPool(amount: bigint): Promise<void> {
    custody.fund("lp", "ETH", amount);
    await custody.transferIn("lp", "ETH", amount);
  }

  it("does nothing for a zero fee", async () => {
    const outcome = await engine.route(0n, "alice", batch);

    expect(outcome).toEqual({ status: "none" });
    expect(batch.size).toBe(0);
  });

  it("pays the treasury from custody and records FeeCollected", async () => {
    await fundPool(50n);

    const outcome = await engine.route(10n, "alice", batch);

    expect(outcome).toEqual({ status: "collected", amount: 10n });
    expect(custody.accountBalance("treasury-1", "ETH")).toBe(10n);
    expect(await custody.balanceOf("ETH")).toBe(40n);
    expect(batch.types).toEqual(["FeeCollected"]);
    expect(batch.events[0]?.payload).toEqual({ feeAmount: "10" });
  });

  it("defers the fee when the treasury transfer fails", async () => {
    const outcome = await engine.route(10n, "alice", batch);

    expect(outcome.status).toBe("deferred");
    expect(engine.pending).toHaveLength(1);
    expect(engine.pending[0]).toMatchObject({
      depositor: "alice",
      amount: 10n,
      deferredAt: "2026-01-01T00:00:00.000Z",
    });
    expect(engine.pendingTotal).toBe(10n);
    expect(batch.types).toEqual(["FeeDeferred"]);
  });

  it("collects deferred fees once custody can pay", async () => {
    await engine.route(10n, "alice", batch);
    await engine.route(5n, "bob", batch);
    await fundPool(12n);

    const retryBatch = new EventBatch("manager-1", "corr-2", () => FIXED_NOW, sequentialIds());
    const result = await engine.retryPending(retryBatch);

    // 10 fits, 5 does not: the queue stops at the first failure
    expect(result).toEqual({ collected: 10n, remaining: 1 });
    expect(engine.pending.map((f) => f.depositor)).toEqual(["bob"]);
    expect(custody.accountBalance("treasury-1", "ETH")).toBe(10n);
    expect(retryBatch.types).toEqual(["FeeCollected"]);
  });

  it("exports and imports pending fees as strings", async () => {
    await engine.route(7n, "alice", batch);

    const exported = engine.exportPending();
    expect(exported[0]?.amount).toBe("7");

    engine.importPending([{ id: "x", depositor: "carol", amount: 3n, deferredAt: "t", reason: "r" }]);
    expect(engine.pendingTotal).toBe(10n);
  });
});
