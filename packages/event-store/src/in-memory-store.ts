/**
 * @tandem/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, simulations and
 * short-lived processes; all state is lost on process exit.
 *
 * Subscriptions are dispatched synchronously on append, after the
 * events are stored.
 */

import type { DomainEvent } from "@tandem/types";
import { isDomainEvent } from "@tandem/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerErrorHook,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => string;
  readonly onHandlerError?: HandlerErrorHook;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private readonly _onHandlerError: HandlerErrorHook | undefined;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date().toISOString());
    this._onHandlerError = options.onHandlerError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    events.forEach((event, i) => {
      if (!isDomainEvent(event)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${String(i)} is not a domain event with metadata and payload`,
          streamId,
        );
      }
    });

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const appendedAt = this._now();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const unhashed = {
        event,
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...unhashed,
        previousHash,
        hash: computeEventHash(unhashed, previousHash),
      };

      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    });

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(
      stream.filter((e) => e.version >= fromVersion),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion ?? "any";
    if (expected === "any") {
      return;
    }
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && expected !== currentVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    const failures: unknown[] = [];

    for (const event of events) {
      for (const handler of handlers) {
        try {
          handler(event);
        } catch (err) {
          if (this._onHandlerError === undefined) {
            failures.push(err);
          } else {
            this._onHandlerError(err, event);
          }
        }
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${String(failures.length)} event subscribers failed`);
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
