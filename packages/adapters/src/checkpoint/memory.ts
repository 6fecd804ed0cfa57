import {
    LOGGING_DEFAULTS,
    PERSISTENCE_DEFAULTS,
    PersistenceLifecycle,
    assertTableName,
    attemptRead,
    attemptWrite,
    encodeJsonObject,
    normalizeLimit,
    toStateDocument,
    withDefaultTimeout,
    type JsonObject,
    type Logger,
    type OperationOptions,
    type PersistencePhase,
    type StateDocument,
    type StatePersistence
} from '@waypoint/core';

import { PinoLogger } from '../logger/pino';

interface StoredCheckpoint {
    threadId: string;
    checkpointId: string;
    state: string;
    metadata: string | null;
    createdAt: number;
    updatedAt: number;
    sequence: number;
}

export interface MemoryStatePersistenceOptions {
    tableName?: string;
    logger?: Logger;
    clock?: () => Date;
    operationTimeoutMs?: number;
}

/**
 * An in-memory, transient checkpoint store.
 * Useful for tests and short-lived local runs that should not touch a database.
 *
 * Payloads are kept serialized, so reads hand back fresh copies exactly as a
 * database round trip would.
 */
export class MemoryStatePersistence implements StatePersistence {
    public readonly backend = 'memory' as const;
    public readonly tableName: string;

    protected readonly threads = new Map<string, Map<string, StoredCheckpoint>>();
    private readonly lifecycle: PersistenceLifecycle;
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private readonly operationTimeoutMs?: number;
    private sequence = 0;

    constructor(options: MemoryStatePersistenceOptions = {}) {
        this.tableName = assertTableName(options.tableName ?? PERSISTENCE_DEFAULTS.TABLE_NAME);
        this.lifecycle = new PersistenceLifecycle('MemoryStatePersistence');
        this.logger = (options.logger ?? new PinoLogger({ name: LOGGING_DEFAULTS.NAME }))
            .child({ backend: this.backend, table: this.tableName });
        this.clock = options.clock ?? (() => new Date());
        this.operationTimeoutMs = options.operationTimeoutMs;
    }

    public get phase(): PersistencePhase {
        return this.lifecycle.phase;
    }

    public async initialize(): Promise<void> {
        await this.lifecycle.initialize(async () => {
            this.logger.debug('Memory checkpoint store ready');
        });
    }

    public saveState(
        threadId: string,
        checkpointId: string,
        state: JsonObject,
        metadata?: JsonObject,
        options?: OperationOptions
    ): Promise<boolean> {
        return this.lifecycle.track('saveState', () => attemptWrite({
            label: 'saveState',
            logger: this.logger,
            context: { threadId, checkpointId },
            options: withDefaultTimeout(options, this.operationTimeoutMs),
            run: async () => {
                const encodedState = encodeJsonObject(state, 'state');
                const encodedMetadata = metadata === undefined ? null : encodeJsonObject(metadata, 'metadata');
                const writtenAt = this.clock().getTime();

                const checkpoints = this.threads.get(threadId) ?? new Map<string, StoredCheckpoint>();
                const existing = checkpoints.get(checkpointId);

                checkpoints.set(checkpointId, existing
                    ? { ...existing, state: encodedState, metadata: encodedMetadata, updatedAt: writtenAt }
                    : {
                        threadId,
                        checkpointId,
                        state: encodedState,
                        metadata: encodedMetadata,
                        createdAt: writtenAt,
                        updatedAt: writtenAt,
                        sequence: ++this.sequence
                    });
                this.threads.set(threadId, checkpoints);
            }
        }));
    }

    public loadState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<StateDocument | null> {
        return this.lifecycle.track('loadState', () => attemptRead({
            label: 'loadState',
            options: withDefaultTimeout(options, this.operationTimeoutMs),
            run: async () => {
                const stored = checkpointId === undefined
                    ? this.recent(threadId, 1)[0]
                    : this.threads.get(threadId)?.get(checkpointId);
                return stored ? toDocument(stored) : null;
            }
        }));
    }

    public listCheckpoints(threadId: string, limit?: number, options?: OperationOptions): Promise<StateDocument[]> {
        return this.lifecycle.track('listCheckpoints', () => attemptRead({
            label: 'listCheckpoints',
            options: withDefaultTimeout(options, this.operationTimeoutMs),
            run: async () => this.recent(threadId, normalizeLimit(limit)).map(toDocument)
        }));
    }

    public deleteState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<boolean> {
        return this.lifecycle.track('deleteState', () => attemptWrite({
            label: 'deleteState',
            logger: this.logger,
            context: { threadId, checkpointId },
            options: withDefaultTimeout(options, this.operationTimeoutMs),
            run: async () => {
                if (checkpointId === undefined) {
                    this.threads.delete(threadId);
                    return;
                }

                const checkpoints = this.threads.get(threadId);
                checkpoints?.delete(checkpointId);
                if (checkpoints?.size === 0) this.threads.delete(threadId);
            }
        }));
    }

    public close(): Promise<void> {
        return this.lifecycle.close(async () => {
            this.threads.clear();
        });
    }

    private recent(threadId: string, limit: number): StoredCheckpoint[] {
        const checkpoints = this.threads.get(threadId);
        if (!checkpoints || limit === 0) return [];

        return [...checkpoints.values()]
            .sort((a, b) => b.createdAt - a.createdAt || b.sequence - a.sequence)
            .slice(0, limit);
    }
}

function toDocument(stored: StoredCheckpoint): StateDocument {
    return toStateDocument({
        threadId: stored.threadId,
        checkpointId: stored.checkpointId,
        state: stored.state,
        metadata: stored.metadata,
        createdAt: new Date(stored.createdAt),
        updatedAt: new Date(stored.updatedAt)
    });
}
