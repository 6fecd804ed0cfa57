import type { JsonObject, StateDocument, StoreBackend } from '../contracts/state';
import type { PersistencePhase } from '../lifecycle';

export interface OperationOptions {
  /** Aborts the in-flight call; the promise rejects with `CancelledError`. */
  signal?: AbortSignal;
  /** Deadline in milliseconds; the promise rejects with `TimeoutError`. */
  timeoutMs?: number;
}

/**
 * Checkpoint store contract shared by every backend driver.
 *
 * Lifecycle: `initialize()` once, any number of reads and writes, then `close()`.
 * Reads and writes outside the initialized phase reject with `InvalidStateError`.
 */
export interface StatePersistence {
  readonly backend: StoreBackend;
  readonly tableName: string;
  readonly phase: PersistencePhase;

  /** Opens the pool and ensures the table, unique key and indexes exist. Safe to repeat. */
  initialize(options?: OperationOptions): Promise<void>;

  /**
   * Inserts or overwrites the checkpoint. `createdAt` survives overwrites.
   * Resolves `false` instead of throwing when the backend write fails.
   */
  saveState(
    threadId: string,
    checkpointId: string,
    state: JsonObject,
    metadata?: JsonObject,
    options?: OperationOptions
  ): Promise<boolean>;

  /** Exact checkpoint when `checkpointId` is given, otherwise the thread's latest. */
  loadState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<StateDocument | null>;

  /** Most recent first, at most `limit` (default 10). */
  listCheckpoints(threadId: string, limit?: number, options?: OperationOptions): Promise<StateDocument[]>;

  /**
   * Deletes one checkpoint, or every checkpoint of the thread when `checkpointId`
   * is omitted. Missing rows are not an error.
   */
  deleteState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<boolean>;

  /** Waits for in-flight operations, then releases the pool. No-op when already closed. */
  close(): Promise<void>;
}
