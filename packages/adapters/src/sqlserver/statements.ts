export type SqlServerStatementKind =
    | 'ensureSchema'
    | 'upsertState'
    | 'selectState'
    | 'selectLatestState'
    | 'selectRecentStates'
    | 'deleteState'
    | 'deleteThread';

/** Logical parameter types; the gateway maps them onto `mssql` types. */
export type SqlServerParameterType = 'nvarchar' | 'nvarcharMax' | 'datetime2' | 'int';

export interface SqlServerParameter {
    type: SqlServerParameterType;
    value: string | number | Date | null;
}

export interface SqlServerStatement {
    kind: SqlServerStatementKind;
    text: string;
    parameters: Record<string, SqlServerParameter>;
}

export interface SqlServerUpsertInput {
    threadId: string;
    checkpointId: string;
    state: string;
    metadata: string | null;
    writtenAt: Date;
}

const SELECT_COLUMNS = 'thread_id, checkpoint_id, state, metadata, created_at, updated_at';

const nvarchar = (value: string): SqlServerParameter => ({ type: 'nvarchar', value });

export function createSqlServerStatements(tableName: string) {
    const table = `[dbo].[${tableName}]`;
    const objectName = `dbo.${tableName}`;
    const threadIndex = `idx_${tableName}_thread_id`;
    const createdIndex = `idx_${tableName}_created_at`;

    return {
        ensureSchema(): SqlServerStatement {
            return {
                kind: 'ensureSchema',
                text: [
                    'SET XACT_ABORT ON;',
                    'BEGIN TRANSACTION;',
                    `EXEC sp_getapplock @Resource = N'waypoint.schema.${tableName}', @LockMode = 'Exclusive', @LockOwner = 'Transaction', @LockTimeout = 15000;`,
                    `IF OBJECT_ID(N'${objectName}', N'U') IS NULL`,
                    'BEGIN',
                    `    CREATE TABLE ${table} (`,
                    '        id BIGINT IDENTITY(1,1) PRIMARY KEY,',
                    '        thread_id NVARCHAR(255) NOT NULL,',
                    '        checkpoint_id NVARCHAR(255) NOT NULL,',
                    '        state NVARCHAR(MAX) NOT NULL CHECK (ISJSON(state) = 1),',
                    '        metadata NVARCHAR(MAX) NULL CHECK (metadata IS NULL OR ISJSON(metadata) = 1),',
                    '        created_at DATETIME2(3) NOT NULL DEFAULT SYSUTCDATETIME(),',
                    '        updated_at DATETIME2(3) NOT NULL DEFAULT SYSUTCDATETIME(),',
                    `        CONSTRAINT [UQ_${tableName}_thread_checkpoint] UNIQUE (thread_id, checkpoint_id)`,
                    '    );',
                    'END;',
                    `IF NOT EXISTS (SELECT 1 FROM sys.indexes WHERE name = N'${threadIndex}' AND object_id = OBJECT_ID(N'${objectName}'))`,
                    `    CREATE INDEX [${threadIndex}] ON ${table} (thread_id);`,
                    `IF NOT EXISTS (SELECT 1 FROM sys.indexes WHERE name = N'${createdIndex}' AND object_id = OBJECT_ID(N'${objectName}'))`,
                    `    CREATE INDEX [${createdIndex}] ON ${table} (created_at DESC);`,
                    'COMMIT TRANSACTION;'
                ].join('\n'),
                parameters: {}
            };
        },

        upsertState(input: SqlServerUpsertInput): SqlServerStatement {
            return {
                kind: 'upsertState',
                text: [
                    `MERGE ${table} WITH (HOLDLOCK) AS target`,
                    'USING (SELECT @thread_id AS thread_id, @checkpoint_id AS checkpoint_id) AS source',
                    'ON target.thread_id = source.thread_id AND target.checkpoint_id = source.checkpoint_id',
                    'WHEN MATCHED THEN',
                    '    UPDATE SET state = @state, metadata = @metadata, updated_at = @written_at',
                    'WHEN NOT MATCHED THEN',
                    '    INSERT (thread_id, checkpoint_id, state, metadata, created_at, updated_at)',
                    '    VALUES (@thread_id, @checkpoint_id, @state, @metadata, @written_at, @written_at);'
                ].join('\n'),
                parameters: {
                    thread_id: nvarchar(input.threadId),
                    checkpoint_id: nvarchar(input.checkpointId),
                    state: { type: 'nvarcharMax', value: input.state },
                    metadata: { type: 'nvarcharMax', value: input.metadata },
                    written_at: { type: 'datetime2', value: input.writtenAt }
                }
            };
        },

        selectState(threadId: string, checkpointId: string): SqlServerStatement {
            return {
                kind: 'selectState',
                text: `SELECT ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = @thread_id AND checkpoint_id = @checkpoint_id`,
                parameters: { thread_id: nvarchar(threadId), checkpoint_id: nvarchar(checkpointId) }
            };
        },

        selectLatestState(threadId: string): SqlServerStatement {
            return {
                kind: 'selectLatestState',
                text: `SELECT TOP (1) ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = @thread_id ORDER BY created_at DESC, id DESC`,
                parameters: { thread_id: nvarchar(threadId) }
            };
        },

        selectRecentStates(threadId: string, limit: number): SqlServerStatement {
            return {
                kind: 'selectRecentStates',
                text: `SELECT TOP (@limit) ${SELECT_COLUMNS} FROM ${table} WHERE thread_id = @thread_id ORDER BY created_at DESC, id DESC`,
                parameters: { thread_id: nvarchar(threadId), limit: { type: 'int', value: limit } }
            };
        },

        deleteState(threadId: string, checkpointId: string): SqlServerStatement {
            return {
                kind: 'deleteState',
                text: `DELETE FROM ${table} WHERE thread_id = @thread_id AND checkpoint_id = @checkpoint_id`,
                parameters: { thread_id: nvarchar(threadId), checkpoint_id: nvarchar(checkpointId) }
            };
        },

        deleteThread(threadId: string): SqlServerStatement {
            return {
                kind: 'deleteThread',
                text: `DELETE FROM ${table} WHERE thread_id = @thread_id`,
                parameters: { thread_id: nvarchar(threadId) }
            };
        }
    };
}

export type SqlServerStatements = ReturnType<typeof createSqlServerStatements>;
