/**
 * Event Batch — events of one operation, published only on commit.
 *
 * Every event recorded during an operation shares the operation's
 * actor and correlation ID. A failed operation's batch is dropped.
 */

import type {
  DomainEvent,
  EventSource,
  VaultEventPayloads,
  VaultEventType,
} from "@tandem/types";

export class EventBatch {
  readonly actor: string;
  readonly correlationId: string;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly recorded: DomainEvent[] = [];

  constructor(actor: string, correlationId: string, now: () => Date, newId: () => string) {
    this.actor = actor;
    this.correlationId = correlationId;
    this.now = now;
    this.newId = newId;
  }

  record<T extends VaultEventType>(
    type: T,
    payload: VaultEventPayloads[T],
    source: EventSource,
  ): void {
    this.recorded.push({
      type,
      metadata: {
        eventId: this.newId(),
        timestamp: this.now().toISOString(),
        actor: this.actor,
        correlationId: this.correlationId,
        source,
      },
      payload,
    });
  }

  get events(): readonly DomainEvent[] {
    return [...this.recorded];
  }

  get types(): readonly string[] {
    return this.recorded.map((e) => e.type);
  }

  get size(): number {
    return this.recorded.length;
  }
}
