import {
    InvalidStateError,
    LOGGING_DEFAULTS,
    PERSISTENCE_DEFAULTS,
    PersistenceLifecycle,
    assertTableName,
    attemptRead,
    attemptWrite,
    encodeJsonObject,
    normalizeLimit,
    parseStoredRow,
    runOperation,
    storedTimestampSchema,
    toConnectionError,
    toStateDocument,
    withDefaultTimeout,
    type DriverSettings,
    type JsonObject,
    type Logger,
    type OperationOptions,
    type PersistencePhase,
    type StateDocument,
    type StatePersistence
} from '@waypoint/core';
import { z } from 'zod';

import { PinoLogger } from '../logger/pino';
import { createPgGateway, type PostgresGateway, type PostgresGatewayOptions } from './gateway';
import { createPostgresStatements, type PostgresStatements } from './statements';

const postgresRowSchema = z.object({
    thread_id: z.string(),
    checkpoint_id: z.string(),
    state: z.unknown(),
    metadata: z.unknown(),
    created_at: storedTimestampSchema,
    updated_at: storedTimestampSchema
});

export interface PostgresStatePersistenceOptions extends DriverSettings {
    /** `postgres://` or `postgresql://` URI. */
    connectionString: string;
    /** Server-side `statement_timeout` for every pooled connection. */
    statementTimeoutMs?: number;
    logger?: Logger;
    clock?: () => Date;
    createGateway?: (options: PostgresGatewayOptions) => PostgresGateway;
}

/**
 * PostgreSQL checkpoint store: JSONB columns, native `ON CONFLICT` upsert.
 */
export class PostgresStatePersistence implements StatePersistence {
    public readonly backend = 'postgres' as const;
    public readonly tableName: string;

    private readonly statements: PostgresStatements;
    private readonly lifecycle = new PersistenceLifecycle('PostgresStatePersistence');
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private gateway: PostgresGateway | null = null;

    constructor(private readonly options: PostgresStatePersistenceOptions) {
        this.tableName = assertTableName(options.tableName ?? PERSISTENCE_DEFAULTS.TABLE_NAME);
        this.statements = createPostgresStatements(this.tableName);
        this.logger = (options.logger ?? new PinoLogger({ name: LOGGING_DEFAULTS.NAME }))
            .child({ backend: this.backend, table: this.tableName });
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
                throw toConnectionError(error, 'Postgres initialize');
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
                const statement = this.statements.upsertState({
                    threadId,
                    checkpointId,
                    state: encodeJsonObject(state, 'state'),
                    metadata: metadata === undefined ? null : encodeJsonObject(metadata, 'metadata'),
                    writtenAt: this.clock()
                });
                await this.requireGateway().execute(statement, signal);
            }
        }));
    }

    public loadState(threadId: string, checkpointId?: string, options?: OperationOptions): Promise<StateDocument | null> {
        return this.lifecycle.track('loadState', () => attemptRead({
            label: 'loadState',
            options: this.operationOptions(options),
            run: async (signal) => {
                const statement = checkpointId === undefined
                    ? this.statements.selectLatestState(threadId)
                    : this.statements.selectState(threadId, checkpointId);
                const [row] = await this.requireGateway().query(statement, signal);
                return row === undefined ? null : toDocument(row);
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
                const rows = await this.requireGateway().query(this.statements.selectRecentStates(threadId, bounded), signal);
                return rows.map(toDocument);
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
                    await this.requireGateway().execute(this.statements.deleteState(threadId, checkpointId), signal);
                    return;
                }

                const deleted = await this.requireGateway().execute(this.statements.deleteThread(threadId), signal);
                this.logger.debug({ threadId, deleted }, 'Deleted thread checkpoints');
            }
        }));
    }

    public close(): Promise<void> {
        return this.lifecycle.close(async () => {
            if (!this.gateway) return;
            await this.releaseGateway();
            this.logger.info('Postgres pool closed');
        });
    }

    private async open(signal: AbortSignal): Promise<void> {
        const gateway = this.gateway ?? this.connect();

        try {
            await gateway.execute(this.statements.ensureSchema(), signal);
        } catch (error) {
            if (this.lifecycle.phase === 'uninitialized') {
                await this.releaseGateway().catch((closeError: unknown) => {
                    this.logger.warn({ err: closeError }, 'Failed to release Postgres pool after initialize error');
                });
            }
            throw error;
        }

        this.logger.info('Postgres state table ready');
    }

    private connect(): PostgresGateway {
        const createGateway = this.options.createGateway ?? createPgGateway;
        this.gateway = createGateway({
            connectionString: this.options.connectionString,
            poolMax: this.options.poolMax ?? PERSISTENCE_DEFAULTS.POOL_MAX,
            idleTimeoutMs: PERSISTENCE_DEFAULTS.POOL_IDLE_TIMEOUT_MS,
            connectTimeoutMs: PERSISTENCE_DEFAULTS.CONNECT_TIMEOUT_MS,
            statementTimeoutMs: this.options.statementTimeoutMs,
            logger: this.logger
        });
        return this.gateway;
    }

    private async releaseGateway(): Promise<void> {
        const gateway = this.gateway;
        this.gateway = null;
        if (gateway) await gateway.close();
    }

    private requireGateway(): PostgresGateway {
        if (!this.gateway) {
            throw new InvalidStateError('PostgresStatePersistence has no open pool');
        }
        return this.gateway;
    }

    private operationOptions(options: OperationOptions | undefined): OperationOptions {
        return withDefaultTimeout(options, this.options.operationTimeoutMs);
    }
}

function toDocument(row: unknown): StateDocument {
    const parsed = parseStoredRow(postgresRowSchema, row, 'Postgres');

    return toStateDocument({
        threadId: parsed.thread_id,
        checkpointId: parsed.checkpoint_id,
        state: parsed.state,
        metadata: parsed.metadata,
        createdAt: parsed.created_at,
        updatedAt: parsed.updated_at
    });
}
