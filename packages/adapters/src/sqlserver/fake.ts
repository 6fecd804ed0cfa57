import type { SqlServerGateway } from './gateway';
import type { SqlServerStatement, SqlServerStatementKind } from './statements';

export interface FakeSqlServerRow {
    id: number;
    thread_id: string;
    checkpoint_id: string;
    state: unknown;
    metadata: unknown;
    created_at: unknown;
    updated_at: unknown;
}

/**
 * In-process stand-in for an `mssql` pool over one table. `NVARCHAR(MAX)`
 * columns come back as text, an identity column breaks `created_at` ties, and
 * held statements honour abort signals the way `request.cancel()` does.
 */
export class FakeSqlServerGateway implements SqlServerGateway {
    public readonly statements: SqlServerStatement[] = [];
    public readonly cancelled: SqlServerStatementKind[] = [];
    public connectCalls = 0;
    public closeCalls = 0;

    private rows: FakeSqlServerRow[] = [];
    private nextId = 1;
    private schemaReady = false;
    private connected = false;
    private connectFailure: Error | null = null;
    private readonly failures = new Map<SqlServerStatementKind, Error>();
    private readonly held = new Map<SqlServerStatementKind, Promise<void>>();

    public get isConnected(): boolean {
        return this.connected;
    }

    public failConnect(error: Error | null): void {
        this.connectFailure = error;
    }

    public failOn(kind: SqlServerStatementKind, error: Error): void {
        this.failures.set(kind, error);
    }

    public clearFailure(kind: SqlServerStatementKind): void {
        this.failures.delete(kind);
    }

    /** Statements of this kind wait until `release()` or until their signal aborts. */
    public hold(kind: SqlServerStatementKind): { release: () => void } {
        let release = (): void => {};
        this.held.set(kind, new Promise<void>((resolve) => {
            release = () => resolve();
        }));
        return {
            release: () => {
                this.held.delete(kind);
                release();
            }
        };
    }

    public seedRow(row: Omit<FakeSqlServerRow, 'id'>): void {
        this.rows.push({ id: this.nextId++, ...row });
    }

    public async connect(): Promise<void> {
        this.connectCalls += 1;
        if (this.connectFailure) throw this.connectFailure;
        this.connected = true;
    }

    public async execute(statement: SqlServerStatement, signal?: AbortSignal): Promise<number> {
        await this.enter(statement, signal);

        switch (statement.kind) {
            case 'ensureSchema':
                this.schemaReady = true;
                return 0;
            case 'upsertState':
                return this.merge(statement);
            case 'deleteState':
                return this.remove((row) => row.thread_id === text(statement, 'thread_id')
                    && row.checkpoint_id === text(statement, 'checkpoint_id'));
            case 'deleteThread':
                return this.remove((row) => row.thread_id === text(statement, 'thread_id'));
            default:
                return this.select(statement).length;
        }
    }

    public async query(statement: SqlServerStatement, signal?: AbortSignal): Promise<unknown[]> {
        await this.enter(statement, signal);
        return this.select(statement);
    }

    public async close(): Promise<void> {
        this.closeCalls += 1;
        this.connected = false;
    }

    private async enter(statement: SqlServerStatement, signal?: AbortSignal): Promise<void> {
        this.statements.push(statement);
        if (!this.connected) {
            throw new Error('Connection not yet open.');
        }

        const held = this.held.get(statement.kind);
        if (held) {
            await new Promise<void>((resolve, reject) => {
                const onAbort = (): void => {
                    this.cancelled.push(statement.kind);
                    reject(new Error('Canceled.'));
                };
                if (signal?.aborted) {
                    onAbort();
                    return;
                }
                signal?.addEventListener('abort', onAbort, { once: true });
                held.then(() => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                }, reject);
            });
        }

        const failure = this.failures.get(statement.kind);
        if (failure) throw failure;

        for (const [name, parameter] of Object.entries(statement.parameters)) {
            if (parameter.type === 'int' && !isInt32(parameter.value)) {
                throw new RangeError(`Validation failed for parameter '${name}'. Value must be between -2147483648 and 2147483647, inclusive.`);
            }
        }

        if (!this.schemaReady && statement.kind !== 'ensureSchema') {
            throw new Error(`Invalid object name '${statement.kind}'.`);
        }
    }

    private merge(statement: SqlServerStatement): number {
        const threadId = text(statement, 'thread_id');
        const checkpointId = text(statement, 'checkpoint_id');
        const state = statement.parameters.state?.value ?? null;
        const metadata = statement.parameters.metadata?.value ?? null;
        const writtenAt = statement.parameters.written_at?.value ?? null;
        const existing = this.rows.find((row) => row.thread_id === threadId && row.checkpoint_id === checkpointId);

        if (existing) {
            existing.state = state;
            existing.metadata = metadata;
            existing.updated_at = writtenAt;
            return 1;
        }

        this.rows.push({
            id: this.nextId++,
            thread_id: threadId,
            checkpoint_id: checkpointId,
            state,
            metadata,
            created_at: writtenAt,
            updated_at: writtenAt
        });
        return 1;
    }

    private remove(matches: (row: FakeSqlServerRow) => boolean): number {
        const before = this.rows.length;
        this.rows = this.rows.filter((row) => !matches(row));
        return before - this.rows.length;
    }

    private select(statement: SqlServerStatement): FakeSqlServerRow[] {
        const threadId = text(statement, 'thread_id');
        const thread = this.rows
            .filter((row) => row.thread_id === threadId)
            .sort((a, b) => timeOf(b.created_at) - timeOf(a.created_at) || b.id - a.id);

        switch (statement.kind) {
            case 'selectState':
                return thread.filter((row) => row.checkpoint_id === text(statement, 'checkpoint_id')).map(copyRow);
            case 'selectLatestState':
                return thread.slice(0, 1).map(copyRow);
            case 'selectRecentStates': {
                const limit = statement.parameters.limit?.value;
                return thread.slice(0, typeof limit === 'number' ? limit : 0).map(copyRow);
            }
            default:
                return [];
        }
    }
}

function text(statement: SqlServerStatement, name: string): string {
    const value = statement.parameters[name]?.value;
    if (typeof value !== 'string') {
        throw new Error(`Must declare the scalar variable "@${name}".`);
    }
    return value;
}

function isInt32(value: unknown): boolean {
    return typeof value === 'number' && Number.isInteger(value) && value >= -2_147_483_648 && value <= 2_147_483_647;
}

function timeOf(value: unknown): number {
    if (value instanceof Date) return value.getTime();
    if (typeof value === 'string') return Date.parse(value);
    return 0;
}

function copyRow(row: FakeSqlServerRow): FakeSqlServerRow {
    return structuredClone(row);
}
