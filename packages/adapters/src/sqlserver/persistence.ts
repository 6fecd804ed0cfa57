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
import { parseSqlServerConnection, type SqlServerConnection } from './connection';
import { createMssqlGateway, type SqlServerGateway, type SqlServerGatewayOptions } from './gateway';
import { createSqlServerStatements, type SqlServerStatements } from './statements';

const sqlServerRowSchema = z.object({
    thread_id: z.string(),
    checkpoint_id: z.string(),
    state: z.string(),
    metadata: z.string().nullable(),
    created_at: storedTimestampSchema,
    updated_at: storedTimestampSchema
});

export interface SqlServerStatePersistenceOptions extends DriverSettings {
    /** `mssql://`, `mssql+<driver>://` or `sqlserver://` URI, or an ADO connection string. */
    connectionString: string;
    /** Per-request timeout enforced by the driver. */
    requestTimeoutMs?: number;
    logger?: Logger;
    clock?: () => Date;
    createGateway?: (options: SqlServerGatewayOptions) => SqlServerGateway;
}

/**
 * SQL Server checkpoint store: JSON kept in `NVARCHAR(MAX)` columns, upserts
 * through `MERGE ... WITH (HOLDLOCK)`.
 */
export class SqlServerStatePersistence implements StatePersistence {
    public readonly backend = 'sqlserver' as const;
    public readonly tableName: string;

    private readonly connection: SqlServerConnection;
    private readonly statements: SqlServerStatements;
    private readonly lifecycle = new PersistenceLifecycle('SqlServerStatePersistence');
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private gateway: SqlServerGateway | null = null;

    constructor(private readonly options: SqlServerStatePersistenceOptions) {
        this.tableName = assertTableName(options.tableName ?? PERSISTENCE_DEFAULTS.TABLE_NAME);
        this.connection = parseSqlServerConnection(options.connectionString);
        this.statements = createSqlServerStatements(this.tableName);
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
                throw toConnectionError(error, 'SQL Server initialize');
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
            this.logger.info('SQL Server pool closed');
        });
    }

    private async open(signal: AbortSignal): Promise<void> {
        try {
            const gateway = this.gateway ?? await this.connect();
            await gateway.execute(this.statements.ensureSchema(), signal);
        } catch (error) {
            if (this.lifecycle.phase === 'uninitialized') {
                await this.releaseGateway().catch((closeError: unknown) => {
                    this.logger.warn({ err: closeError }, 'Failed to release SQL Server pool after initialize error');
                });
            }
            throw error;
        }

        this.logger.info('SQL Server state table ready');
    }

    private async connect(): Promise<SqlServerGateway> {
        const createGateway = this.options.createGateway ?? createMssqlGateway;
        const gateway = createGateway({
            connection: this.connection,
            poolMax: this.options.poolMax ?? PERSISTENCE_DEFAULTS.POOL_MAX,
            idleTimeoutMs: PERSISTENCE_DEFAULTS.POOL_IDLE_TIMEOUT_MS,
            connectTimeoutMs: PERSISTENCE_DEFAULTS.CONNECT_TIMEOUT_MS,
            requestTimeoutMs: this.options.requestTimeoutMs,
            logger: this.logger
        });
        this.gateway = gateway;
        await gateway.connect();
        return gateway;
    }

    private async releaseGateway(): Promise<void> {
        const gateway = this.gateway;
        this.gateway = null;
        if (gateway) await gateway.close();
    }

    private requireGateway(): SqlServerGateway {
        if (!this.gateway) {
            throw new InvalidStateError('SqlServerStatePersistence has no open pool');
        }
        return this.gateway;
    }

    private operationOptions(options: OperationOptions | undefined): OperationOptions {
        return withDefaultTimeout(options, this.options.operationTimeoutMs);
    }
}

function toDocument(row: unknown): StateDocument {
    const parsed = parseStoredRow(sqlServerRowSchema, row, 'SQL Server');

    return toStateDocument({
        threadId: parsed.thread_id,
        checkpointId: parsed.checkpoint_id,
        state: parsed.state,
        metadata: parsed.metadata,
        createdAt: parsed.created_at,
        updatedAt: parsed.updated_at
    });
}
