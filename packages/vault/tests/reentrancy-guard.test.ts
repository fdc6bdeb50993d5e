/**
 * Tests for the ReentrancyGuard.
 */

import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";
import { VaultError } from "../src/types.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ReentrancyGuard", () => {
  it("returns the operation's result", async () => {
    const guard = new ReentrancyGuard();
    await expect(guard.run("op", async () => 42)).resolves.toBe(42);
    expect(guard.activeOperation).toBeUndefined();
  });

  it("rejects a call made from inside a running operation", async () => {
    const guard = new ReentrancyGuard();
    let nested: unknown;

    await guard.run("withdraw", async () => {
      try {
        await guard.run("deposit", async () => "unreachable");
      } catch (err) {
        nested = err;
      }
    });

    expect(nested).toBeInstanceOf(VaultError);
    expect(nested).toMatchObject({
      code: "REENTRANT_CALL",
      details: { operation: "deposit", inProgress: "withdraw" },
    });
  });

  it("serializes independent callers in arrival order", async () => {
    const guard = new ReentrancyGuard();
    const gate = deferred();
    const order: string[] = [];

    const first = guard.run("first", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = guard.run("second", async () => {
      order.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(guard.activeOperation).toBe("first");

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("releases the lock when an operation throws", async () => {
    const guard = new ReentrancyGuard();

    await expect(
      guard.run("failing", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(guard.run("next", async () => "ok")).resolves.toBe("ok");
  });

  it("admits work scheduled by an operation that already finished", async () => {
    const guard = new ReentrancyGuard();
    const later = deferred();
    let followUp: Promise<string> | undefined;

    await guard.run("first", async () => {
      setTimeout(() => {
        followUp = guard.run("follow-up", async () => "done");
        later.resolve();
      }, 0);
    });

    await later.promise;
    await expect(followUp).resolves.toBe("done");
  });
});
