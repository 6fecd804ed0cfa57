import type { Logger } from '@waypoint/core';
import sql, { type ConnectionPool, type ISqlType, type config as MssqlConfig } from 'mssql';

import type { SqlServerConnection } from './connection';
import type { SqlServerParameterType, SqlServerStatement } from './statements';

/** The slice of an `mssql` pool the driver needs. */
export interface SqlServerGateway {
    connect(): Promise<void>;
    /** Runs a statement and resolves the total affected row count. */
    execute(statement: SqlServerStatement, signal?: AbortSignal): Promise<number>;
    query(statement: SqlServerStatement, signal?: AbortSignal): Promise<unknown[]>;
    close(): Promise<void>;
}

export interface SqlServerGatewayOptions {
    connection: SqlServerConnection;
    poolMax: number;
    idleTimeoutMs: number;
    connectTimeoutMs: number;
    requestTimeoutMs?: number;
    logger: Logger;
}

const SQL_TYPES: Record<SqlServerParameterType, () => ISqlType> = {
    nvarchar: () => sql.NVarChar(255),
    nvarcharMax: () => sql.NVarChar(sql.MAX),
    datetime2: () => sql.DateTime2(3),
    int: () => sql.Int()
};

export function createMssqlGateway(options: SqlServerGatewayOptions): SqlServerGateway {
    const pool = createPool(options);

    pool.on('error', (error: Error) => {
        options.logger.warn({ err: error }, 'SQL Server pool error');
    });

    async function run(statement: SqlServerStatement, signal?: AbortSignal) {
        const request = pool.request();
        for (const [name, parameter] of Object.entries(statement.parameters)) {
            request.input(name, SQL_TYPES[parameter.type](), parameter.value);
        }

        const cancel = (): void => {
            request.cancel();
        };
        signal?.addEventListener('abort', cancel, { once: true });

        try {
            return await request.query<Record<string, unknown>>(statement.text);
        } finally {
            signal?.removeEventListener('abort', cancel);
        }
    }

    return {
        async connect() {
            await pool.connect();
        },

        async execute(statement, signal) {
            const result = await run(statement, signal);
            return result.rowsAffected.reduce((total, count) => total + count, 0);
        },

        async query(statement, signal) {
            const result = await run(statement, signal);
            return result.recordset ?? [];
        },

        async close() {
            await pool.close();
        }
    };
}

function createPool(options: SqlServerGatewayOptions): ConnectionPool {
    const { connection } = options;

    if (connection.format === 'ado') {
        return new sql.ConnectionPool(connection.connectionString);
    }

    const config: MssqlConfig = {
        ...connection.config,
        connectionTimeout: options.connectTimeoutMs,
        requestTimeout: options.requestTimeoutMs,
        pool: {
            max: options.poolMax,
            min: 0,
            idleTimeoutMillis: options.idleTimeoutMs
        }
    };
    return new sql.ConnectionPool(config);
}
