import type { PostgresGateway } from './gateway';
import type { PostgresStatement, PostgresStatementKind } from './statements';

export interface FakePostgresRow {
    id: number;
    thread_id: string;
    checkpoint_id: string;
    state: unknown;
    metadata: unknown;
    created_at: unknown;
    updated_at: unknown;
}

interface HeldStatement {
    gate: Promise<void>;
    release: () => void;
}

/**
 * In-process stand-in for a `pg` pool. Behaves like one table: JSONB columns
 * come back parsed, a `BIGSERIAL` id breaks `created_at` ties, and statements
 * against a missing table or an ended pool fail with the messages `pg` uses.
 */
export class FakePostgresGateway implements PostgresGateway {
    public readonly statements: PostgresStatement[] = [];
    public closeCalls = 0;

    private rows: FakePostgresRow[] = [];
    private nextId = 1;
    private schemaReady = false;
    private ended = false;
    private readonly failures = new Map<PostgresStatementKind, Error>();
    private readonly held = new Map<PostgresStatementKind, HeldStatement>();

    public get closed(): boolean {
        return this.ended;
    }

    public get rowCount(): number {
        return this.rows.length;
    }

    /** Every later statement of this kind rejects with `error`. */
    public failOn(kind: PostgresStatementKind, error: Error): void {
        this.failures.set(kind, error);
    }

    public clearFailure(kind: PostgresStatementKind): void {
        this.failures.delete(kind);
    }

    /** Statements of this kind wait until `release()`; like `pg`, they ignore abort signals. */
    public hold(kind: PostgresStatementKind): { release: () => void } {
        let release = (): void => {};
        const gate = new Promise<void>((resolve) => {
            release = () => resolve();
        });
        this.held.set(kind, { gate, release });
        return {
            release: () => {
                this.held.delete(kind);
                release();
            }
        };
    }

    /** Inserts a row as-is, bypassing validation, to model data written by another client. */
    public seedRow(row: Omit<FakePostgresRow, 'id'>): void {
        this.rows.push({ id: this.nextId++, ...row });
    }

    public async execute(statement: PostgresStatement): Promise<number> {
        await this.enter(statement);

        switch (statement.kind) {
            case 'ensureSchema':
                this.schemaReady = true;
                return 0;
            case 'upsertState':
                return this.upsert(statement);
            case 'deleteState':
                return this.remove((row) => row.thread_id === stringAt(statement, 0) && row.checkpoint_id === stringAt(statement, 1));
            case 'deleteThread':
                return this.remove((row) => row.thread_id === stringAt(statement, 0));
            default:
                return (await this.select(statement)).length;
        }
    }

    public async query(statement: PostgresStatement): Promise<unknown[]> {
        await this.enter(statement);
        return this.select(statement);
    }

    public async close(): Promise<void> {
        this.closeCalls += 1;
        if (this.ended) {
            throw new Error('Called end on pool more than once');
        }
        this.ended = true;
    }

    private async enter(statement: PostgresStatement): Promise<void> {
        this.statements.push(statement);
        if (this.ended) {
            throw new Error('Cannot use a pool after calling end on the pool');
        }

        const held = this.held.get(statement.kind);
        if (held) await held.gate;

        const failure = this.failures.get(statement.kind);
        if (failure) throw failure;

        if (!this.schemaReady && statement.kind !== 'ensureSchema') {
            throw new Error('relation does not exist');
        }
    }

    private upsert(statement: PostgresStatement): number {
        const [threadId, checkpointId, state, metadata, writtenAt] = statement.values;
        const existing = this.rows.find((row) => row.thread_id === threadId && row.checkpoint_id === checkpointId);
        const parsedState = parseJsonb(state);
        const parsedMetadata = parseJsonb(metadata);

        if (existing) {
            existing.state = parsedState;
            existing.metadata = parsedMetadata;
            existing.updated_at = writtenAt;
            return 1;
        }

        this.rows.push({
            id: this.nextId++,
            thread_id: stringAt(statement, 0),
            checkpoint_id: stringAt(statement, 1),
            state: parsedState,
            metadata: parsedMetadata,
            created_at: writtenAt,
            updated_at: writtenAt
        });
        return 1;
    }

    private remove(matches: (row: FakePostgresRow) => boolean): number {
        const before = this.rows.length;
        this.rows = this.rows.filter((row) => !matches(row));
        return before - this.rows.length;
    }

    private async select(statement: PostgresStatement): Promise<FakePostgresRow[]> {
        const threadId = stringAt(statement, 0);
        const thread = this.rows
            .filter((row) => row.thread_id === threadId)
            .sort((a, b) => timeOf(b.created_at) - timeOf(a.created_at) || b.id - a.id);

        switch (statement.kind) {
            case 'selectState':
                return thread.filter((row) => row.checkpoint_id === stringAt(statement, 1)).map(copyRow);
            case 'selectLatestState':
                return thread.slice(0, 1).map(copyRow);
            case 'selectRecentStates': {
                const limit = statement.values[1];
                // pg sends numbers as text; exponent notation is not a valid bigint
                if (!/^-?\d+$/.test(String(limit))) {
                    throw new Error(`invalid input syntax for type bigint: "${String(limit)}"`);
                }
                return thread.slice(0, typeof limit === 'number' ? limit : 0).map(copyRow);
            }
            default:
                return [];
        }
    }
}

function stringAt(statement: PostgresStatement, index: number): string {
    const value = statement.values[index];
    if (typeof value !== 'string') {
        throw new Error(`Expected text parameter $${index + 1} in ${statement.kind}`);
    }
    return value;
}

function parseJsonb(value: unknown): unknown {
    return typeof value === 'string' ? JSON.parse(value) : null;
}

function timeOf(value: unknown): number {
    if (value instanceof Date) return value.getTime();
    if (typeof value === 'string') return Date.parse(value);
    return 0;
}

function copyRow(row: FakePostgresRow): FakePostgresRow {
    return structuredClone(row);
}
