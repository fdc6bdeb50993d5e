/**
 * Vault Controller — the public surface of a two-asset vault.
 *
 * Coordinates:
 * - PositionLedger: who owns what, and the pool's TVL
 * - FeeEngine: performance fee on withdrawal
 * - RebalanceCoordinator: manager-directed swaps
 * - RoleRegistry: owner / manager / treasury capabilities
 *
 * Every mutating operation runs under the reentrancy guard and either
 * commits fully or leaves ledger and custody as they were. The events
 * an operation records are published to the event store only when it
 * commits.
 */

import { randomUUID } from "node:crypto";
import { pino } from "pino";
import type { Logger } from "pino";
import type { EventStore } from "@tandem/event-store";
import { InMemoryEventStore } from "@tandem/event-store";
import type {
  DepositReceipt,
  ValuationOracle,
  WithdrawalPlan,
} from "@tandem/ledger";
import { LedgerError, PositionLedger, parseUnits } from "@tandem/ledger";
import type { Position } from "@tandem/types";
import { isAmountString } from "@tandem/types";
import { EventBatch } from "./event-batch.js";
import { FeeEngine } from "./fee-engine.js";
import { RebalanceCoordinator } from "./rebalance-coordinator.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { RoleRegistry } from "./roles.js";
import type {
  AssetLedger,
  CustodyReport,
  FeeQuote,
  FeeRetryResult,
  PendingFee,
  PendingFeeRecord,
  RebalanceParams,
  RebalanceResult,
  RoleAssignments,
  VaultConfig,
  VaultDependencies,
  VaultSnapshot,
  WithdrawResult,
} from "./types.js";
import {
  DEFAULT_FEE_DENOMINATOR,
  DEFAULT_FEE_RATE,
  DEFAULT_STREAM_ID,
  DEFAULT_SWAP_DEADLINE_MS,
  VaultError,
} from "./types.js";

interface TransferLeg {
  readonly asset: string;
  readonly amount: bigint;
}

export class VaultController {
  readonly streamId: string;
  private readonly oracle: ValuationOracle;
  private readonly custody: AssetLedger;
  private readonly store: EventStore;
  private readonly ledger: PositionLedger;
  private readonly roleRegistry: RoleRegistry;
  private readonly fees: FeeEngine;
  private readonly rebalancer: RebalanceCoordinator;
  private readonly guard = new ReentrancyGuard();
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(config: VaultConfig, deps: VaultDependencies) {
    this.streamId = config.streamId ?? DEFAULT_STREAM_ID;
    this.oracle = deps.oracle;
    this.custody = deps.custody;
    this.store = deps.events ?? new InMemoryEventStore();
    this.ledger = deps.ledger ?? new PositionLedger(deps.oracle);
    this.log = (deps.logger ?? pino({ enabled: false })).child({ component: "vault" });
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.roleRegistry = new RoleRegistry(config.roles);

    this.fees = new FeeEngine({
      rate: config.feeRate ?? DEFAULT_FEE_RATE,
      denominator: config.feeDenominator ?? DEFAULT_FEE_DENOMINATOR,
      asset: deps.oracle.pair.primary,
      custody: deps.custody,
      roles: this.roleRegistry,
      logger: this.log.child({ component: "fees" }),
      now: this.now,
      newId: this.newId,
    });

    this.rebalancer = new RebalanceCoordinator({
      oracle: deps.oracle,
      ledger: this.ledger,
      custody: deps.custody,
      exchange: deps.exchange,
      swapDeadlineMs: config.swapDeadlineMs ?? DEFAULT_SWAP_DEADLINE_MS,
      allowUnboundedSlippage: config.allowUnboundedSlippage ?? false,
      logger: this.log.child({ component: "rebalance" }),
      now: this.now,
    });
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  depositPrimary(depositor: string, amount: bigint): Promise<DepositReceipt> {
    return this.deposit("depositPrimary", depositor, this.oracle.pair.primary.symbol, amount);
  }

  depositSecondary(depositor: string, amount: bigint): Promise<DepositReceipt> {
    return this.deposit("depositSecondary", depositor, this.oracle.pair.secondary.symbol, amount);
  }

  private deposit(
    operation: string,
    depositor: string,
    asset: string,
    amount: bigint,
  ): Promise<DepositReceipt> {
    return this.mutate(operation, depositor, async (batch, log) => {
      this.ledger.validateDeposit(depositor, amount);

      try {
        await this.custody.transferIn(depositor, asset, amount);
      } catch (err) {
        throw transferError(err, `Could not receive ${amount.toString()} ${asset} from "${depositor}"`);
      }

      let receipt: DepositReceipt;
      try {
        receipt =
          asset === this.oracle.pair.primary.symbol
            ? this.ledger.depositPrimary(depositor, amount)
            : this.ledger.depositSecondary(depositor, amount);
      } catch (err) {
        const unreversed = await this.reverse(
          [{ asset, amount }],
          (leg) => this.custody.transferOut(depositor, leg.asset, leg.amount),
          log,
        );
        if (unreversed.length > 0) {
          throw new VaultError(
            "TRANSFER_FAILED",
            `Deposit of "${depositor}" failed and the received funds could not be returned`,
            { cause: err, details: { depositor, asset, amount: amount.toString() } },
          );
        }
        throw err;
      }

      batch.record(
        "Deposit",
        {
          depositor,
          primaryAmount: receipt.primaryAmount.toString(),
          secondaryAmount: receipt.secondaryAmount.toString(),
        },
        "ledger",
      );
      return receipt;
    });
  }

  // ─── Withdrawal ──────────────────────────────────────────────────────

  /**
   * Pay out a depositor's entire position and close it.
   *
   * The performance fee comes out of pool custody, not the payout. If
   * the treasury transfer fails the withdrawal still commits and the fee
   * is queued for retryPendingFees().
   */
  withdraw(depositor: string): Promise<WithdrawResult> {
    return this.mutate("withdraw", depositor, async (batch, log) => {
      const plan = this.ledger.previewWithdraw(depositor);
      const quote = this.fees.quote(plan.entryValue, plan.exitValue);

      await this.payOut(plan, log);

      const receipt = this.ledger.settleWithdraw(plan);
      batch.record(
        "Withdraw",
        {
          depositor,
          primaryAmount: receipt.primaryAmount.toString(),
          secondaryAmount: receipt.secondaryAmount.toString(),
        },
        "ledger",
      );

      const outcome = await this.fees.route(quote.fee, depositor, batch);

      return {
        primaryPaid: receipt.primaryAmount,
        secondaryPaid: receipt.secondaryAmount,
        feeCollected: quote.fee,
        feeDeferred: outcome.status === "deferred",
      };
    });
  }

  private async payOut(plan: WithdrawalPlan, log: Logger): Promise<void> {
    const legs: TransferLeg[] = [
      { asset: this.oracle.pair.primary.symbol, amount: plan.primaryBalance },
      { asset: this.oracle.pair.secondary.symbol, amount: plan.secondaryBalance },
    ].filter((leg) => leg.amount > 0n);

    const paid: TransferLeg[] = [];
    for (const leg of legs) {
      try {
        await this.custody.transferOut(plan.depositor, leg.asset, leg.amount);
      } catch (err) {
        const unreversed = await this.reverse(
          paid,
          (p) => this.custody.transferIn(plan.depositor, p.asset, p.amount),
          log,
        );
        if (unreversed.length > 0) {
          throw new VaultError(
            "TRANSFER_FAILED",
            `Payout to "${plan.depositor}" failed part-way and could not be reversed`,
            {
              cause: err,
              details: {
                depositor: plan.depositor,
                unreversed: unreversed.map((p) => ({ asset: p.asset, amount: p.amount.toString() })),
              },
            },
          );
        }
        throw transferError(err, `Could not pay ${leg.amount.toString()} ${leg.asset} to "${plan.depositor}"`);
      }
      paid.push(leg);
    }
  }

  /**
   * Undo completed transfers, newest first. Returns the legs that could
   * not be undone.
   */
  private async reverse(
    legs: readonly TransferLeg[],
    undo: (leg: TransferLeg) => Promise<void>,
    log: Logger,
  ): Promise<TransferLeg[]> {
    const failed: TransferLeg[] = [];
    for (const leg of [...legs].reverse()) {
      try {
        await undo(leg);
      } catch (err) {
        log.error(
          { err, asset: leg.asset, amount: leg.amount.toString() },
          "Compensating transfer failed",
        );
        failed.push(leg);
      }
    }
    return failed;
  }

  // ─── Rebalance ───────────────────────────────────────────────────────

  /**
   * Swap pooled assets on the exchange and re-derive TVL from custody.
   * Manager only.
   */
  rebalance(caller: string, amountIn: bigint, params: RebalanceParams = {}): Promise<RebalanceResult> {
    return this.mutate("rebalance", caller, async (batch) => {
      this.roleRegistry.require(caller, "manager");
      return this.rebalancer.rebalance(amountIn, params, batch);
    });
  }

  // ─── Administration ──────────────────────────────────────────────────

  setManager(caller: string, next: string): Promise<void> {
    return this.mutate("setManager", caller, async (batch) => {
      const change = this.roleRegistry.setManager(caller, next);
      batch.record("ManagerChanged", { previous: change.previous, next: change.next }, "admin");
    });
  }

  transferOwnership(caller: string, next: string): Promise<void> {
    return this.mutate("transferOwnership", caller, async (batch) => {
      const change = this.roleRegistry.transferOwnership(caller, next);
      batch.record("OwnershipTransferred", { previous: change.previous, next: change.next }, "admin");
    });
  }

  /**
   * Sweep the pool's entire custody balance of `asset` to the owner.
   * Bypasses the ledger: positions and TVL are left as they are.
   */
  emergencyWithdraw(caller: string, asset: string): Promise<bigint> {
    return this.mutate("emergencyWithdraw", caller, async (batch, log) => {
      this.roleRegistry.require(caller, "owner");
      this.oracle.roleOf(asset);

      const amount = await this.custody.balanceOf(asset);
      if (amount === 0n) {
        return 0n;
      }

      const to = this.roleRegistry.owner;
      try {
        await this.custody.transferOut(to, asset, amount);
      } catch (err) {
        throw transferError(err, `Could not sweep ${amount.toString()} ${asset} to "${to}"`);
      }

      log.warn({ asset, amount: amount.toString(), to }, "Emergency withdrawal executed");
      batch.record("EmergencyWithdraw", { asset, amount: amount.toString(), to }, "admin");
      return amount;
    });
  }

  /**
   * Retry deferred fee transfers. Owner or manager.
   */
  retryPendingFees(caller: string): Promise<FeeRetryResult> {
    return this.mutate("retryPendingFees", caller, async (batch) => {
      this.roleRegistry.require(caller, "owner", "manager");
      return this.fees.retryPending(batch);
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getUserValue(depositor: string): bigint {
    return this.ledger.getUserValue(depositor);
  }

  getPosition(depositor: string): Position | undefined {
    return this.ledger.getPosition(depositor);
  }

  get totalValueLocked(): bigint {
    return this.ledger.totalValueLocked;
  }

  get positionCount(): number {
    return this.ledger.positionCount;
  }

  /** What a full withdrawal would charge right now. */
  quoteFee(depositor: string): FeeQuote {
    const plan = this.ledger.previewWithdraw(depositor);
    return this.fees.quote(plan.entryValue, plan.exitValue);
  }

  get pendingFees(): readonly PendingFee[] {
    return this.fees.pending;
  }

  get roles(): RoleAssignments {
    return this.roleRegistry.snapshot();
  }

  get events(): EventStore {
    return this.store;
  }

  /** Name of the operation currently holding the lock, if any. */
  get activeOperation(): string | undefined {
    return this.guard.activeOperation;
  }

  custodyReport(): Promise<CustodyReport> {
    return this.rebalancer.readCustody();
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): VaultSnapshot {
    return {
      version: 1,
      roles: this.roleRegistry.snapshot(),
      feeRate: this.fees.rate.toString(),
      feeDenominator: this.fees.denominator.toString(),
      ledger: this.ledger.snapshot(),
      pendingFees: this.fees.exportPending(),
      savedAt: this.now().toISOString(),
    };
  }

  /**
   * Restore a vault. Roles and fee terms come from the snapshot;
   * everything else from `config`.
   */
  static fromSnapshot(
    snapshot: VaultSnapshot,
    deps: Omit<VaultDependencies, "ledger">,
    config: Omit<VaultConfig, "roles" | "feeRate" | "feeDenominator"> = {},
  ): VaultController {
    if (snapshot.version !== 1) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }
    if (!isAmountString(snapshot.feeRate) || !isAmountString(snapshot.feeDenominator)) {
      throw new VaultError("INVALID_SNAPSHOT", "Snapshot fee terms are not amount strings");
    }

    let ledger: PositionLedger;
    try {
      ledger = PositionLedger.fromSnapshot(snapshot.ledger, deps.oracle);
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new VaultError("INVALID_SNAPSHOT", `Ledger snapshot rejected: ${err.message}`, { cause: err });
      }
      throw err;
    }

    const vault = new VaultController(
      {
        ...config,
        roles: snapshot.roles,
        feeRate: parseUnits(snapshot.feeRate),
        feeDenominator: parseUnits(snapshot.feeDenominator),
      },
      { ...deps, ledger },
    );
    vault.fees.importPending(snapshot.pendingFees.map(restorePendingFee));
    return vault;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async mutate<T>(
    operation: string,
    actor: string,
    body: (batch: EventBatch, log: Logger) => Promise<T>,
  ): Promise<T> {
    const batch = new EventBatch(actor, this.newId(), this.now, this.newId);
    const log = this.log.child({ operation, actor, correlationId: batch.correlationId });

    let result: T;
    try {
      result = await this.guard.run(operation, async () => {
        const value = await body(batch, log);
        this.publish(batch, log);
        return value;
      });
    } catch (err) {
      log.warn({ err }, "Operation rejected");
      throw err;
    }

    log.info({ events: batch.types }, "Operation committed");
    return result;
  }

  /**
   * Append a committed operation's events. The operation has already
   * changed ledger and custody, so a failed append or subscriber is
   * reported here rather than thrown back to the caller.
   */
  private publish(batch: EventBatch, log: Logger): void {
    if (batch.size === 0) {
      return;
    }
    try {
      this.store.append(this.streamId, batch.events);
    } catch (err) {
      log.error({ err, events: batch.types }, "Event publication failed after commit");
    }
  }
}

function transferError(err: unknown, message: string): Error {
  if (err instanceof VaultError || err instanceof LedgerError) {
    return err;
  }
  return new VaultError("TRANSFER_FAILED", message, { cause: err });
}

function restorePendingFee(record: PendingFeeRecord): PendingFee {
  if (!isAmountString(record.amount)) {
    throw new VaultError("INVALID_SNAPSHOT", `Pending fee "${record.id}" has an invalid amount`);
  }
  return { ...record, amount: parseUnits(record.amount) };
}
