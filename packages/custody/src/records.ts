/**
 * In-memory custody record log.
 *
 * Records are appended in commit order and pushed to subscribers
 * synchronously. Emitting happens after the ledger commit, so a subscriber
 * that throws never reaches the emitter: its error goes to
 * `onHandlerError` and is kept in `handlerFailures`.
 */

import type { CustodyRecord, CustodyRecordKind } from "@strongbox/types";
import type { RecordSink } from "./ports.js";

export type RecordHandler = (record: CustodyRecord) => void;

export interface RecordSubscription {
  unsubscribe(): void;
}

export interface RecordHandlerFailure {
  readonly record: CustodyRecord;
  readonly error: unknown;
}

export interface RecordLogOptions {
  /** Called when a subscriber throws while handling a record */
  readonly onHandlerError?: ((error: unknown, record: CustodyRecord) => void) | undefined;
}

export interface RecordQuery {
  readonly kind?: CustodyRecordKind | undefined;
  readonly user?: string | undefined;
  readonly fromSequence?: number | undefined;
  readonly limit?: number | undefined;
}

export class InMemoryRecordLog implements RecordSink {
  private readonly _records: CustodyRecord[] = [];
  private readonly _handlers = new Set<RecordHandler>();
  private readonly _failures: RecordHandlerFailure[] = [];
  private readonly onHandlerError: ((error: unknown, record: CustodyRecord) => void) | undefined;

  constructor(options: RecordLogOptions = {}) {
    this.onHandlerError = options.onHandlerError;
  }

  get size(): number {
    return this._records.length;
  }

  /** Subscriber errors seen so far, oldest first. */
  get handlerFailures(): readonly RecordHandlerFailure[] {
    return this._failures;
  }

  emit(record: CustodyRecord): void {
    this._records.push(record);
    for (const handler of this._handlers) {
      try {
        handler(record);
      } catch (error) {
        this._failures.push({ record, error });
        this.onHandlerError?.(error, record);
      }
    }
  }

  subscribe(handler: RecordHandler): RecordSubscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  list(query: RecordQuery = {}): readonly CustodyRecord[] {
    const user = query.user?.toLowerCase();
    const matched = this._records.filter(
      (r) =>
        (query.kind === undefined || r.kind === query.kind) &&
        (user === undefined || r.user === user) &&
        (query.fromSequence === undefined || r.sequence >= query.fromSequence),
    );
    return query.limit === undefined ? matched : matched.slice(0, query.limit);
  }

  last(): CustodyRecord | undefined {
    return this._records[this._records.length - 1];
  }
}
