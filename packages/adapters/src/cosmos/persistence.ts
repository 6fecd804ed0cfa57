import {
    COSMOS_DEFAULTS,
    InvalidStateError,
    LOGGING_DEFAULTS,
    PERSISTENCE_DEFAULTS,
    PersistenceLifecycle,
    assertTableName,
    attemptRead,
    attemptWrite,
    checkpointDocumentId,
    normalizeLimit,
    parseStoredRow,
    runOperation,
    storedTimestampSchema,
    toConnectionError,
    toJsonObject,
    toStateDocument,
    withDefaultTimeout,
    type JsonObject,
    type Logger,
    type OperationOptions,
    type PersistencePhase,
    type StateDocument,
    type StatePersistence
} from '@waypoint/core';
import { z } from 'zod';

import { PinoLogger } from '../logger/pino';
import { parseCosmosConnectionString, type CosmosConnectionSettings } from './connection-string';
import {
    COSMOS_STATUS,
    createCosmosGateway,
    statusCodeOf,
    type CosmosCheckpointItem,
    type CosmosContainerStatus,
    type CosmosGateway,
    type CosmosGatewayOptions
} from './gateway';
import { cosmosQueries } from './queries';

const cosmosDocumentSchema = z.object({
    thread_id: z.string(),
    checkpoint_id: z.string(),
    state: z.unknown(),
    metadata: z.unknown(),
    created_at: storedTimestampSchema,
    updated_at: storedTimestampSchema
});

const cosmosIdSchema = z.object({ id: z.string() });

export interface CosmosStatePersistenceOptions {
    /** `AccountEndpoint=...;AccountKey=...;[Database=...;]` */
    connectionString: string;
    /** Container id. */
    tableName?: string;
    /** Used when the connection string names no database. */
    database?: string;
    /** RU/s provisioned for a newly created container. */
    throughput?: number;
    operationTimeoutMs?: number;
    logger?: Logger;
    clock?: () => Date;
    createGateway?: (options: CosmosGatewayOptions) => CosmosGateway;
}

/**
 * Cosmos DB checkpoint store. One document per checkpoint, partitioned by
 * thread, so every read and delete stays inside a single partition.
 */
export class CosmosStatePersistence implements StatePersistence {
    public readonly backend = 'cosmos' as const;
    public readonly tableName: string;
    public readonly databaseId: string;

    private readonly connection: CosmosConnectionSettings;
    private readonly lifecycle = new PersistenceLifecycle('CosmosStatePersistence');
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private gateway: CosmosGateway | null = null;

    constructor(private readonly options: CosmosStatePersistenceOptions) {
        this.tableName = assertTableName(options.tableName ?? PERSISTENCE_DEFAULTS.TABLE_NAME);
        this.connection = parseCosmosConnectionString(options.connectionString);
        this.databaseId = this.connection.database ?? options.database ?? COSMOS_DEFAULTS.DATABASE;
        this.logger = (options.logger ?? new PinoLogger({ name: LOGGING_DEFAULTS.NAME }))
            .child({ backend: this.backend, table: this.tableName, database: this.databaseId });
        this.clock = options.clock ?? (() => new Date());
    }

    public get phase(): PersistencePhase {
        return this.lifecycle.phase;
    }

    public async initialize(options?: OperationOptions): Promise<void> {
        await this.lifecycle.initialize(async () => {
            try {
                await runOperation({
                    label: 'initialize',
                    ...this.operationOptions(options),
                    run: (signal) => this.open(signal)
                });
            } catch (error) {
                throw toConnectionError(error, 'Cosmos DB initialize');
            }
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
            options: this.operationOptions(options),
            run: async (signal) => {
                const writtenAt = this.clock().toISOString();
                const item: CosmosCheckpointItem = {
                    id: checkpointDocumentId(threadId, checkpointId),
                    thread_id: threadId,
                    checkpoint_id: checkpointId,
                    state: toJsonObject(state, 'state'),
                    metadata: metadata === undefined ? null : toJsonObject(metadata, 'metadata'),
                    created_at: writtenAt,
                    updated_at: writtenAt
                };
                await this.upsert(item, signal);
            }
        }));
    }

    public loadState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<StateDocument | null> {
        return this.lifecycle.track('loadState', () => attemptRead({
            label: 'loadState',
            options: this.operationOptions(options),
            run: async (signal) => {
                const gateway = this.requireGateway();

                if (checkpointId !== undefined) {
                    const document = await gateway.readItem(checkpointDocumentId(threadId, checkpointId), threadId, signal);
                    return document === null ? null : toDocument(document);
                }

                const [latest] = await gateway.queryItems(cosmosQueries.selectLatestState(threadId), threadId, signal);
                return latest === undefined ? null : toDocument(latest);
            }
        }));
    }

    public listCheckpoints(threadId: string, limit?: number, options?: OperationOptions): Promise<StateDocument[]> {
        const bounded = normalizeLimit(limit);

        return this.lifecycle.track('listCheckpoints', () => attemptRead({
            label: 'listCheckpoints',
            options: this.operationOptions(options),
            run: async (signal) => {
                if (bounded === 0) return [];
                const documents = await this.requireGateway()
                    .queryItems(cosmosQueries.selectRecentStates(threadId, bounded), threadId, signal);
                return documents.map(toDocument);
            }
        }));
    }

    public deleteState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<boolean> {
        return this.lifecycle.track('deleteState', () => attemptWrite({
            label: 'deleteState',
            logger: this.logger,
            context: { threadId, checkpointId },
            options: this.operationOptions(options),
            run: async (signal) => {
                if (checkpointId !== undefined) {
                    await this.deleteDocument(checkpointDocumentId(threadId, checkpointId), threadId, signal);
                    return;
                }

                const rows = await this.requireGateway().queryItems(cosmosQueries.selectThreadIds(threadId), threadId, signal);
                for (const row of rows) {
                    const { id } = parseStoredRow(cosmosIdSchema, row, 'Cosmos DB');
                    await this.deleteDocument(id, threadId, signal);
                }
                this.logger.debug({ threadId, deleted: rows.length }, 'Deleted thread checkpoints');
            }
        }));
    }

    public close(): Promise<void> {
        return this.lifecycle.close(async () => {
            if (!this.gateway) return;
            await this.releaseGateway();
            this.logger.info('Cosmos DB client closed');
        });
    }

    private async open(signal: AbortSignal): Promise<void> {
        const gateway = this.gateway ?? this.connect();

        let status: CosmosContainerStatus;
        try {
            status = await gateway.ensureContainer(signal);
        } catch (error) {
            if (this.lifecycle.phase === 'uninitialized') {
                await this.releaseGateway().catch((closeError: unknown) => {
                    this.logger.warn({ err: closeError }, 'Failed to release Cosmos DB client after initialize error');
                });
            }
            throw error;
        }

        if (status.orderIndexAdded) {
            this.logger.warn('Added the checkpoint ordering index to an existing container; ordered reads may lag until it is built');
        }
        this.logger.info('Cosmos DB container ready');
    }

    private connect(): CosmosGateway {
        const createGateway = this.options.createGateway ?? createCosmosGateway;
        this.gateway = createGateway({
            endpoint: this.connection.endpoint,
            key: this.connection.key,
            databaseId: this.databaseId,
            containerId: this.tableName,
            partitionKeyPath: COSMOS_DEFAULTS.PARTITION_KEY_PATH,
            throughput: this.options.throughput ?? COSMOS_DEFAULTS.THROUGHPUT
        });
        return this.gateway;
    }

    /**
     * Create first; on conflict patch the mutable fields so `created_at` keeps
     * its first value. A document deleted between the two calls is recreated.
     */
    private async upsert(item: CosmosCheckpointItem, signal: AbortSignal): Promise<void> {
        const gateway = this.requireGateway();

        try {
            await gateway.createItem(item, signal);
            return;
        } catch (error) {
            if (statusCodeOf(error) !== COSMOS_STATUS.CONFLICT) throw error;
        }

        try {
            await gateway.patchItem(item.id, item.thread_id, {
                state: item.state,
                metadata: item.metadata,
                updated_at: item.updated_at
            }, signal);
        } catch (error) {
            if (statusCodeOf(error) !== COSMOS_STATUS.NOT_FOUND) throw error;
            await gateway.createItem(item, signal);
        }
    }

    private async deleteDocument(id: string, threadId: string, signal: AbortSignal): Promise<void> {
        try {
            await this.requireGateway().deleteItem(id, threadId, signal);
        } catch (error) {
            if (statusCodeOf(error) !== COSMOS_STATUS.NOT_FOUND) throw error;
        }
    }

    private async releaseGateway(): Promise<void> {
        const gateway = this.gateway;
        this.gateway = null;
        if (gateway) await gateway.close();
    }

    private requireGateway(): CosmosGateway {
        if (!this.gateway) {
            throw new InvalidStateError('CosmosStatePersistence has no open client');
        }
        return this.gateway;
    }

    private operationOptions(options: OperationOptions | undefined): OperationOptions {
        return withDefaultTimeout(options, this.options.operationTimeoutMs);
    }
}

function toDocument(document: unknown): StateDocument {
    const parsed = parseStoredRow(cosmosDocumentSchema, document, 'Cosmos DB');

    return toStateDocument({
        threadId: parsed.thread_id,
        checkpointId: parsed.checkpoint_id,
        state: parsed.state,
        metadata: parsed.metadata,
        createdAt: parsed.created_at,
        updatedAt: parsed.updated_at
    });
}
