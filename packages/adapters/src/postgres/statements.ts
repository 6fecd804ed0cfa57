export type PostgresStatementKind =
    | 'ensureSchema'
    | 'upsertState'
    | 'selectState'
    | 'selectLatestState'
    | 'selectRecentStates'
    | 'deleteState'
    | 'deleteThread';

export type PostgresParameter = string | number | Date | null;

export interface PostgresStatement {
    kind: PostgresStatementKind;
    text: string;
    values: PostgresParameter[];
}

export interface PostgresUpsertInput {
    threadId: string;
    checkpointId: string;
    /** Serialized JSON, cast to JSONB by the statement. */
    state: string;
    metadata: string | null;
    writtenAt: Date;
}

const SELECT_COLUMNS = 'thread_id, checkpoint_id, state, metadata, created_at, updated_at';

/**
 * SQL for one checkpoint table. `tableName` must already be a validated
 * identifier; it is quoted, never parameterized.
 *
 * Positional values, in order:
 *   upsertState        [threadId, checkpointId, state, metadata, writtenAt]
 *   selectState        [threadId, checkpointId]
 *   selectLatestState  [threadId]
 *   selectRecentStates [threadId, limit]
 *   deleteState        [threadId, checkpointId]
 *   deleteThread       [threadId]
 */
export function createPostgresStatements(tableName: string) {
    const table = `"${tableName}"`;

    return {
        ensureSchema(): PostgresStatement {
            return {
                kind: 'ensureSchema',
                text: [
                    `SELECT pg_advisory_xact_lock(hashtext('waypoint.schema.${tableName}'));`,
                    `CREATE TABLE IF NOT EXISTS ${table} (`,
                    '    id BIGSERIAL PRIMARY KEY,',
                    '    thread_id VARCHAR(255) NOT NULL,',
                    '    checkpoint_id VARCHAR(255) NOT NULL,',
                    '    state JSONB NOT NULL,',
                    '    metadata JSONB,',
                    '    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),',
                    '    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),',
                    `    CONSTRAINT "uq_${tableName}_thread_checkpoint" UNIQUE (thread_id, checkpoint_id)`,
                    ');',
                    `CREATE INDEX IF NOT EXISTS "idx_${tableName}_thread_id" ON ${table} (thread_id);`,
                    `CREATE INDEX IF NOT EXISTS "idx_${tableName}_created_at" ON ${table} (created_at DESC);`
                ].join('\n'),
                values: []
            };
        },

        upsertState(input: PostgresUpsertInput): PostgresStatement {
            return {
                kind: 'upsertState',
                text: [
                    `INSERT INTO ${table} (thread_id, checkpoint_id, state, metadata, created_at, updated_at)`,
                    'VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $5)',
                    'ON CONFLICT (thread_id, checkpoint_id) DO UPDATE SET',
                    '    state = EXCLUDED.state,',
                    '    metadata = EXCLUDED.metadata,',
                    '    updated_at = EXCLUDED.updated_at'
                ].join('\n'),
                values: [input.threadId, input.checkpointId, input.state, input.metadata, input.writtenAt]
            };
        },

        selectState(threadId: string, checkpointId: string): PostgresStatement {
            return {
                kind: 'selectState',
                text: `SELECT ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = $1 AND checkpoint_id = $2`,
                values: [threadId, checkpointId]
            };
        },

        selectLatestState(threadId: string): PostgresStatement {
            return {
                kind: 'selectLatestState',
                text: `SELECT ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = $1 ORDER BY created_at DESC, id DESC LIMIT 1`,
                values: [threadId]
            };
        },

        selectRecentStates(threadId: string, limit: number): PostgresStatement {
            return {
                kind: 'selectRecentStates',
                text: `SELECT ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2`,
                values: [threadId, limit]
            };
        },

        deleteState(threadId: string, checkpointId: string): PostgresStatement {
            return {
                kind: 'deleteState',
                text: `DELETE FROM ${table} WHERE thread_id = $1 AND checkpoint_id = $2`,
                values: [threadId, checkpointId]
            };
        },

        deleteThread(threadId: string): PostgresStatement {
            return {
                kind: 'deleteThread',
                text: `DELETE FROM ${table} WHERE thread_id = $1`,
                values: [threadId]
            };
        }
    };
}

export type PostgresStatements = ReturnType<typeof createPostgresStatements>;
