/**
 * @tandem/ledger — Position ledger.
 *
 * Owns the depositor → Position map and the pool's totalValueLocked.
 * No other component mutates either.
 *
 * API surface:
 * - depositPrimary() / depositSecondary() — Credit a position
 * - previewWithdraw() — Read a full withdrawal out of one position
 * - settleWithdraw() — Close the position read by previewWithdraw()
 * - getUserValue() — Value of a position in primary units
 * - resyncTotalValueLocked() — Replace TVL after a rebalance
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Every mutation is synchronous, so a reader sees the state either
 * before or after it, never in between. Withdrawal is split in two so
 * the caller can pay out between reading and closing the position.
 */

import type { Position, PositionRecord } from "@tandem/types";
import { isAssetPair, isAmountString, isPositionRecord } from "@tandem/types";
import { parseUnits, requirePositive } from "./money-math.js";
import type { ValuationOracle } from "./valuation-oracle.js";
import type {
  DepositReceipt,
  LedgerSnapshot,
  WithdrawalPlan,
  WithdrawalReceipt,
} from "./types.js";
import { LedgerError } from "./types.js";

export class PositionLedger {
  private readonly _oracle: ValuationOracle;
  private readonly _positions = new Map<string, Position>();
  private _totalValueLocked = 0n;

  constructor(oracle: ValuationOracle) {
    this._oracle = oracle;
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  /**
   * Credit `amount` of the primary asset to a depositor.
   * TVL grows by exactly `amount`.
   */
  depositPrimary(depositor: string, amount: bigint): DepositReceipt {
    return this._deposit(depositor, amount, 0n);
  }

  /**
   * Credit `amount` of the secondary asset to a depositor.
   * TVL grows by the primary-equivalent of `amount`, never the raw amount.
   */
  depositSecondary(depositor: string, amount: bigint): DepositReceipt {
    return this._deposit(depositor, 0n, amount);
  }

  /**
   * Check a deposit without applying it, so custody can be moved only
   * for a deposit the ledger will accept.
   */
  validateDeposit(depositor: string, amount: bigint): void {
    this._assertDepositor(depositor);
    requirePositive(amount, "Deposit amount");
  }

  private _deposit(depositor: string, primary: bigint, secondary: bigint): DepositReceipt {
    this.validateDeposit(depositor, primary + secondary);

    const existing = this._positions.get(depositor);
    const primaryBalance = (existing?.primaryBalance ?? 0n) + primary;
    const secondaryBalance = (existing?.secondaryBalance ?? 0n) + secondary;

    // Value everything before touching state so a failing oracle leaves
    // nothing behind. The increment is the change in the position's value,
    // which is convert(amount) whenever conversion is exact and keeps
    // sum(position values) = TVL when truncation is involved.
    const valueBefore =
      existing === undefined
        ? 0n
        : this._oracle.totalValue(existing.primaryBalance, existing.secondaryBalance);
    const valueAfter = this._oracle.totalValue(primaryBalance, secondaryBalance);
    const valueAdded = valueAfter - valueBefore;
    const entryValue = existing?.entryValue ?? valueAfter;

    this._positions.set(depositor, {
      depositor,
      primaryBalance,
      secondaryBalance,
      entryValue,
    });
    this._totalValueLocked += valueAdded;

    return {
      depositor,
      primaryAmount: primary,
      secondaryAmount: secondary,
      valueAdded,
      opened: existing === undefined,
    };
  }

  // ─── Withdrawal ──────────────────────────────────────────────────────

  /**
   * Read everything a full withdrawal pays out. Does not mutate.
   *
   * @throws LedgerError EMPTY_POSITION when the depositor holds nothing
   */
  previewWithdraw(depositor: string): WithdrawalPlan {
    const position = this._positions.get(depositor);
    if (position === undefined) {
      throw new LedgerError("EMPTY_POSITION", `No open position for "${depositor}"`, {
        details: { depositor },
      });
    }

    return {
      depositor,
      position,
      primaryBalance: position.primaryBalance,
      secondaryBalance: position.secondaryBalance,
      entryValue: position.entryValue,
      exitValue: this._oracle.totalValue(position.primaryBalance, position.secondaryBalance),
    };
  }

  /**
   * Close the position a plan was read from.
   *
   * TVL drops by the plan's exitValue: the value of the very balances
   * that were read and paid out.
   *
   * @throws LedgerError STALE_PLAN if the position changed after the plan was made
   */
  settleWithdraw(plan: WithdrawalPlan): WithdrawalReceipt {
    const current = this._positions.get(plan.depositor);
    if (current !== plan.position) {
      throw new LedgerError(
        "STALE_PLAN",
        `Position of "${plan.depositor}" changed since the withdrawal was planned`,
        { details: { depositor: plan.depositor } },
      );
    }

    // A live rate may have moved since deposit; TVL is floored at zero
    // and resynchronized from custody by the next rebalance.
    const valueRemoved =
      plan.exitValue > this._totalValueLocked ? this._totalValueLocked : plan.exitValue;

    this._positions.delete(plan.depositor);
    this._totalValueLocked -= valueRemoved;

    return {
      depositor: plan.depositor,
      primaryAmount: plan.primaryBalance,
      secondaryAmount: plan.secondaryBalance,
      valueRemoved,
    };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Value of a depositor's position in primary units; 0 when none.
   */
  getUserValue(depositor: string): bigint {
    const position = this._positions.get(depositor);
    if (position === undefined) {
      return 0n;
    }
    return this._oracle.totalValue(position.primaryBalance, position.secondaryBalance);
  }

  getPosition(depositor: string): Position | undefined {
    return this._positions.get(depositor);
  }

  hasPosition(depositor: string): boolean {
    return this._positions.has(depositor);
  }

  listPositions(): readonly Position[] {
    return [...this._positions.values()];
  }

  get positionCount(): number {
    return this._positions.size;
  }

  get totalValueLocked(): bigint {
    return this._totalValueLocked;
  }

  // ─── Rebalance Support ───────────────────────────────────────────────

  /**
   * Replace TVL with a value re-derived from custody.
   * Only the rebalance path calls this.
   */
  resyncTotalValueLocked(value: bigint): void {
    if (value < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `TVL cannot be negative, got ${value.toString()}`);
    }
    this._totalValueLocked = value;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      pair: this._oracle.pair,
      positions: this.listPositions().map(
        (p): PositionRecord => ({
          depositor: p.depositor,
          primaryBalance: p.primaryBalance.toString(),
          secondaryBalance: p.secondaryBalance.toString(),
          entryValue: p.entryValue.toString(),
        }),
      ),
      totalValueLocked: this._totalValueLocked.toString(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, validating every record.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, oracle: ValuationOracle): PositionLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }
    if (
      !isAssetPair(snapshot.pair) ||
      snapshot.pair.primary.symbol !== oracle.pair.primary.symbol ||
      snapshot.pair.secondary.symbol !== oracle.pair.secondary.symbol
    ) {
      throw new LedgerError("INVALID_SNAPSHOT", "Snapshot asset pair does not match the oracle's pair");
    }
    if (!isAmountString(snapshot.totalValueLocked)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Invalid totalValueLocked: "${String(snapshot.totalValueLocked)}"`,
      );
    }

    const ledger = new PositionLedger(oracle);

    for (const record of snapshot.positions) {
      if (!isPositionRecord(record)) {
        throw new LedgerError("INVALID_SNAPSHOT", "Malformed position record in snapshot", {
          details: { record },
        });
      }
      if (ledger._positions.has(record.depositor)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate position for "${record.depositor}"`);
      }

      const position: Position = {
        depositor: record.depositor,
        primaryBalance: parseUnits(record.primaryBalance),
        secondaryBalance: parseUnits(record.secondaryBalance),
        entryValue: parseUnits(record.entryValue),
      };
      if (position.primaryBalance === 0n && position.secondaryBalance === 0n) {
        throw new LedgerError("INVALID_SNAPSHOT", `Position of "${record.depositor}" is empty`);
      }
      ledger._positions.set(record.depositor, position);
    }

    ledger._totalValueLocked = parseUnits(snapshot.totalValueLocked);
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertDepositor(depositor: string): void {
    if (typeof depositor !== "string" || depositor.trim() === "") {
      throw new LedgerError("INVALID_DEPOSITOR", "Depositor identity must be a non-empty string");
    }
  }
}
