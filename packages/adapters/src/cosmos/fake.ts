import {
    COSMOS_STATUS,
    type CosmosCheckpointItem,
    type CosmosCheckpointPatch,
    type CosmosContainerStatus,
    type CosmosGateway,
    type CosmosGatewayOptions,
    type CosmosQuery
} from './gateway';

export type FakeCosmosOperation = 'ensureContainer' | 'createItem' | 'patchItem' | 'readItem' | 'queryItems' | 'deleteItem';

/** Shaped like the SDK's `ErrorResponse`: the HTTP status sits in `code`. */
export class FakeCosmosError extends Error {
    constructor(public readonly code: number, message: string) {
        super(message);
        this.name = 'FakeCosmosError';
    }
}

export interface FakeCosmosCall {
    operation: FakeCosmosOperation;
    threadId?: string;
    query?: CosmosQuery;
}

/**
 * In-process stand-in for one Cosmos DB container. Documents are kept per
 * partition, queries are answered by kind, and held calls reject when their
 * abort signal fires, as the SDK does.
 */
export class FakeCosmosGateway implements CosmosGateway {
    public readonly calls: FakeCosmosCall[] = [];
    public readonly cancelled: FakeCosmosOperation[] = [];
    public containerOptions: CosmosGatewayOptions | null = null;
    public closeCalls = 0;
    /** Models a container created elsewhere without the checkpoint ordering index. */
    public orderIndexMissing = false;

    private readonly partitions = new Map<string, Map<string, unknown>>();
    private readonly failures = new Map<FakeCosmosOperation, Error>();
    private readonly held = new Map<FakeCosmosOperation, Promise<void>>();
    /** Runs once, after the next create reports a conflict and before the patch. */
    private beforePatch: (() => void) | null = null;

    /** Records the options a driver would hand to `createCosmosGateway`. */
    public static factory(gateway: FakeCosmosGateway): (options: CosmosGatewayOptions) => CosmosGateway {
        return (options) => {
            gateway.containerOptions = options;
            return gateway;
        };
    }

    public failOn(operation: FakeCosmosOperation, error: Error): void {
        this.failures.set(operation, error);
    }

    public clearFailure(operation: FakeCosmosOperation): void {
        this.failures.delete(operation);
    }

    public hold(operation: FakeCosmosOperation): { release: () => void } {
        let release = (): void => {};
        this.held.set(operation, new Promise<void>((resolve) => {
            release = () => resolve();
        }));
        return {
            release: () => {
                this.held.delete(operation);
                release();
            }
        };
    }

    /** Simulates another writer racing the driver between its create and its patch. */
    public interleaveBeforePatch(action: () => void): void {
        this.beforePatch = action;
    }

    /** Stores a raw document, bypassing validation. */
    public seedDocument(threadId: string, document: { id: string } & Record<string, unknown>): void {
        this.partition(threadId).set(document.id, structuredClone(document));
    }

    public removeDocument(threadId: string, id: string): void {
        this.partitions.get(threadId)?.delete(id);
    }

    public documentCount(threadId: string): number {
        return this.partitions.get(threadId)?.size ?? 0;
    }

    public async ensureContainer(signal?: AbortSignal): Promise<CosmosContainerStatus> {
        await this.enter({ operation: 'ensureContainer' }, signal);

        const orderIndexAdded = this.orderIndexMissing;
        this.orderIndexMissing = false;
        return { orderIndexAdded };
    }

    public async createItem(item: CosmosCheckpointItem, signal?: AbortSignal): Promise<void> {
        await this.enter({ operation: 'createItem', threadId: item.thread_id }, signal);
        assertValidId(item.id);

        const partition = this.partition(item.thread_id);
        if (partition.has(item.id)) {
            const action = this.beforePatch;
            this.beforePatch = null;
            action?.();
            throw new FakeCosmosError(COSMOS_STATUS.CONFLICT, 'Entity with the specified id already exists in the system.');
        }
        partition.set(item.id, structuredClone(item));
    }

    public async patchItem(id: string, threadId: string, patch: CosmosCheckpointPatch, signal?: AbortSignal): Promise<void> {
        await this.enter({ operation: 'patchItem', threadId }, signal);
        assertValidId(id);

        const partition = this.partition(threadId);
        const existing = partition.get(id);
        if (typeof existing !== 'object' || existing === null) {
            throw new FakeCosmosError(COSMOS_STATUS.NOT_FOUND, 'Entity with the specified id does not exist in the system.');
        }
        partition.set(id, { ...existing, ...structuredClone(patch) });
    }

    public async readItem(id: string, threadId: string, signal?: AbortSignal): Promise<unknown> {
        await this.enter({ operation: 'readItem', threadId }, signal);
        assertValidId(id);

        const document = this.partitions.get(threadId)?.get(id);
        return document === undefined ? null : structuredClone(document);
    }

    public async queryItems(query: CosmosQuery, threadId: string, signal?: AbortSignal): Promise<unknown[]> {
        await this.enter({ operation: 'queryItems', threadId, query }, signal);

        const documents = [...(this.partitions.get(threadId)?.values() ?? [])]
            .map((document) => structuredClone(document));

        switch (query.kind) {
            case 'selectThreadIds':
                return documents.map((document) => ({ id: fieldOf(document, 'id') }));
            case 'selectLatestState':
                return documents.sort(newestFirst).slice(0, 1);
            case 'selectRecentStates': {
                const limit = query.spec.parameters?.find((parameter) => parameter.name === '@limit')?.value;
                return documents.sort(newestFirst).slice(0, typeof limit === 'number' ? limit : 0);
            }
        }
    }

    public async deleteItem(id: string, threadId: string, signal?: AbortSignal): Promise<void> {
        await this.enter({ operation: 'deleteItem', threadId }, signal);
        assertValidId(id);

        if (!this.partitions.get(threadId)?.delete(id)) {
            throw new FakeCosmosError(COSMOS_STATUS.NOT_FOUND, 'Entity with the specified id does not exist in the system.');
        }
    }

    public async close(): Promise<void> {
        this.closeCalls += 1;
    }

    private partition(threadId: string): Map<string, unknown> {
        let partition = this.partitions.get(threadId);
        if (!partition) {
            partition = new Map();
            this.partitions.set(threadId, partition);
        }
        return partition;
    }

    private async enter(call: FakeCosmosCall, signal?: AbortSignal): Promise<void> {
        this.calls.push(call);

        const held = this.held.get(call.operation);
        if (held) {
            await new Promise<void>((resolve, reject) => {
                const onAbort = (): void => {
                    this.cancelled.push(call.operation);
                    reject(new Error('The operation was aborted.'));
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

        const failure = this.failures.get(call.operation);
        if (failure) throw failure;
    }
}

function assertValidId(id: string): void {
    if (/[/\\?#]/.test(id)) {
        throw new FakeCosmosError(COSMOS_STATUS.BAD_REQUEST, `The input name '${id}' is invalid. Ensure to provide a unique non-empty string less than '255' characters.`);
    }
}

function fieldOf(document: unknown, field: string): unknown {
    if (typeof document !== 'object' || document === null) return undefined;
    return Object.entries(document).find(([key]) => key === field)?.[1];
}

function newestFirst(a: unknown, b: unknown): number {
    const byCreated = compareText(String(fieldOf(b, 'created_at')), String(fieldOf(a, 'created_at')));
    return byCreated !== 0 ? byCreated : compareText(String(fieldOf(b, 'id')), String(fieldOf(a, 'id')));
}

function compareText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}
