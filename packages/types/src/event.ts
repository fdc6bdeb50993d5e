/**
 * Event Types
 *
 * Every committed state change of a vault is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are published only after the state change they describe commits
 * - Amounts in payloads are base-10 strings of smallest units
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that invoked the operation */
  readonly actor: string;

  /** Shared by every event emitted by one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "ledger" | "fees" | "rebalance" | "admin";

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}

// ─── Vault Events ─────────────────────────────────────────────────────────

export type VaultEventType =
  | "Deposit"
  | "Withdraw"
  | "Rebalance"
  | "Swap"
  | "FeeCollected"
  | "FeeDeferred"
  | "EmergencyWithdraw"
  | "ManagerChanged"
  | "OwnershipTransferred";

export type DepositPayload = {
  readonly depositor: string;
  readonly primaryAmount: string;
  readonly secondaryAmount: string;
};

export type WithdrawPayload = {
  readonly depositor: string;
  readonly primaryAmount: string;
  readonly secondaryAmount: string;
};

export type RebalancePayload = {
  readonly primaryBalance: string;
  readonly secondaryBalance: string;
  readonly totalValueLocked: string;
};

export type SwapPayload = {
  readonly assetIn: string;
  readonly assetOut: string;
  readonly amountIn: string;
  readonly amountOut: string;
};

export type FeeCollectedPayload = {
  readonly feeAmount: string;
};

export type FeeDeferredPayload = {
  readonly feeAmount: string;
  readonly reason: string;
};

export type EmergencyWithdrawPayload = {
  readonly asset: string;
  readonly amount: string;
  readonly to: string;
};

export type RoleChangedPayload = {
  readonly previous: string;
  readonly next: string;
};

/** Payload shape for each vault event type. */
export interface VaultEventPayloads {
  readonly Deposit: DepositPayload;
  readonly Withdraw: WithdrawPayload;
  readonly Rebalance: RebalancePayload;
  readonly Swap: SwapPayload;
  readonly FeeCollected: FeeCollectedPayload;
  readonly FeeDeferred: FeeDeferredPayload;
  readonly EmergencyWithdraw: EmergencyWithdrawPayload;
  readonly ManagerChanged: RoleChangedPayload;
  readonly OwnershipTransferred: RoleChangedPayload;
}
