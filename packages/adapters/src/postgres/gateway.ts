import type { Logger } from '@waypoint/core';
import pg from 'pg';

import type { PostgresStatement } from './statements';

/**
 * The slice of a Postgres pool the driver needs. `signal` is accepted for
 * parity with the other gateways; `pg` cannot cancel a pooled query, so an
 * abandoned query finishes on the server and its client returns to the pool.
 */
export interface PostgresGateway {
    /** Runs a statement and resolves the affected row count. */
    execute(statement: PostgresStatement, signal?: AbortSignal): Promise<number>;
    query(statement: PostgresStatement, signal?: AbortSignal): Promise<unknown[]>;
    close(): Promise<void>;
}

export interface PostgresGatewayOptions {
    connectionString: string;
    poolMax: number;
    idleTimeoutMs: number;
    connectTimeoutMs: number;
    statementTimeoutMs?: number;
    logger: Logger;
}

export function createPgGateway(options: PostgresGatewayOptions): PostgresGateway {
    const pool = new pg.Pool({
        connectionString: options.connectionString,
        max: options.poolMax,
        idleTimeoutMillis: options.idleTimeoutMs,
        connectionTimeoutMillis: options.connectTimeoutMs,
        statement_timeout: options.statementTimeoutMs,
        application_name: 'waypoint'
    });

    // An idle client losing its connection is reported here instead of crashing the process.
    pool.on('error', (error: Error) => {
        options.logger.warn({ err: error }, 'Idle Postgres client error');
    });

    // Multi-statement text must go over the simple protocol, which takes no values.
    const valuesOf = (statement: PostgresStatement) => (statement.values.length > 0 ? statement.values : undefined);

    return {
        async execute(statement) {
            const result = await pool.query(statement.text, valuesOf(statement));
            return result.rowCount ?? 0;
        },

        async query(statement) {
            const result = await pool.query(statement.text, valuesOf(statement));
            return result.rows;
        },

        async close() {
            await pool.end();
        }
    };
}
