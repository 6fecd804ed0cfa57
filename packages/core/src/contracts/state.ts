export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * One persisted checkpoint of a thread.
 *
 * `(threadId, checkpointId)` is the natural key. `state` and `metadata` are
 * opaque to the store: they are serialized on write and handed back untouched.
 */
export interface StateDocument {
  threadId: string;
  checkpointId: string;
  state: JsonObject;
  /** Absent when the writer supplied no metadata; never defaulted to `{}`. */
  metadata?: JsonObject;
  /** Write time of the first insert for this key. */
  createdAt: Date;
  /** Write time of the latest insert or update for this key. */
  updatedAt: Date;
}

export type BackendKind = 'cosmos' | 'postgres' | 'sqlserver';

export type StoreBackend = BackendKind | 'memory';
