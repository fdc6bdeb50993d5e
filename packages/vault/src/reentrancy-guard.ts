/**
 * Reentrancy Guard — one mutating operation at a time.
 *
 * The lock is held for the full duration of an operation, external
 * calls included. Two kinds of second caller are told apart through the
 * async context the call starts in:
 * - a call made from inside a running operation (a custody callback,
 *   an event subscriber) is rejected with REENTRANT_CALL
 * - an independent caller waits its turn, in arrival order
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { VaultError } from "./types.js";

interface ActiveOperation {
  readonly name: string;
  finished: boolean;
}

export class ReentrancyGuard {
  private readonly context = new AsyncLocalStorage<ActiveOperation>();
  private tail: Promise<void> = Promise.resolve();
  private current: string | undefined;

  /** Name of the operation holding the lock, if any. */
  get activeOperation(): string | undefined {
    return this.current;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const outer = this.context.getStore();
    // Timers scheduled by a finished operation still carry its context
    if (outer !== undefined && !outer.finished) {
      throw new VaultError(
        "REENTRANT_CALL",
        `"${operation}" was called while "${outer.name}" is in progress`,
        { details: { operation, inProgress: outer.name } },
      );
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    const active: ActiveOperation = { name: operation, finished: false };
    this.current = operation;

    try {
      return await this.context.run(active, fn);
    } finally {
      active.finished = true;
      this.current = undefined;
      release();
    }
  }
}
