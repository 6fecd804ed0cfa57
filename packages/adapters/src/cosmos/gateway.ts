import {
    CosmosClient,
    type CompositePath,
    type Container,
    type IndexingPolicy,
    type PatchOperation,
    type SqlQuerySpec
} from '@azure/cosmos';
import type { JsonObject } from '@waypoint/core';

/** Document layout of one checkpoint; `id` is `<threadId>_<checkpointId>`. */
export type CosmosCheckpointItem = {
    id: string;
    thread_id: string;
    checkpoint_id: string;
    state: JsonObject;
    metadata: JsonObject | null;
    created_at: string;
    updated_at: string;
};

/** Fields rewritten on conflict; `created_at` is never among them. */
export type CosmosCheckpointPatch = Pick<CosmosCheckpointItem, 'state' | 'metadata' | 'updated_at'>;

export type CosmosQueryKind = 'selectLatestState' | 'selectRecentStates' | 'selectThreadIds';

export interface CosmosQuery {
    kind: CosmosQueryKind;
    spec: SqlQuerySpec;
}

/**
 * The slice of a Cosmos DB container the driver needs. Every call scopes to one
 * partition, keyed by the thread id. Failures surface as the SDK's errors,
 * with the HTTP status in `code`.
 */
export interface CosmosContainerStatus {
    /** The container already existed without the checkpoint ordering index, which was added. */
    orderIndexAdded: boolean;
}

export interface CosmosGateway {
    ensureContainer(signal?: AbortSignal): Promise<CosmosContainerStatus>;
    createItem(item: CosmosCheckpointItem, signal?: AbortSignal): Promise<void>;
    patchItem(id: string, threadId: string, patch: CosmosCheckpointPatch, signal?: AbortSignal): Promise<void>;
    /** Resolves `null` when the document does not exist. */
    readItem(id: string, threadId: string, signal?: AbortSignal): Promise<unknown>;
    queryItems(query: CosmosQuery, threadId: string, signal?: AbortSignal): Promise<unknown[]>;
    deleteItem(id: string, threadId: string, signal?: AbortSignal): Promise<void>;
    close(): Promise<void>;
}

export interface CosmosGatewayOptions {
    endpoint: string;
    key: string;
    databaseId: string;
    containerId: string;
    partitionKeyPath: string;
    throughput: number;
}

export const COSMOS_STATUS = {
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    CONFLICT: 409
} as const;

/** HTTP status carried by a Cosmos SDK error, if any. */
export function statusCodeOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'number') return error.code;
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    return undefined;
}

/** Serves `ORDER BY c.created_at DESC, c.id DESC`, and its reverse. */
const CHECKPOINT_ORDER_INDEX: CompositePath[] = [
    { path: '/created_at', order: 'descending' },
    { path: '/id', order: 'descending' }
];

/**
 * `createIfNotExists` leaves the indexing policy of an existing container
 * untouched. Returns the policy with the checkpoint ordering index appended, or
 * `null` when it already has one.
 */
export function withCheckpointOrderIndex(policy: IndexingPolicy | undefined): IndexingPolicy | null {
    const composites = policy?.compositeIndexes ?? [];
    if (composites.some(servesCheckpointOrder)) return null;
    return { ...policy, compositeIndexes: [...composites, CHECKPOINT_ORDER_INDEX] };
}

function servesCheckpointOrder(index: CompositePath[]): boolean {
    if (index.length !== CHECKPOINT_ORDER_INDEX.length) return false;

    const matches = (flipped: boolean): boolean => index.every((entry, position) => {
        const expected = CHECKPOINT_ORDER_INDEX[position];
        if (!expected || entry.path !== expected.path) return false;
        return ((entry.order ?? 'ascending') === expected.order) !== flipped;
    });
    return matches(false) || matches(true);
}

export function createCosmosGateway(options: CosmosGatewayOptions): CosmosGateway {
    const client = new CosmosClient({ endpoint: options.endpoint, key: options.key });
    let container: Container | null = null;

    const requireContainer = (): Container => {
        if (!container) {
            throw new Error(`Cosmos DB container ${options.containerId} has not been opened`);
        }
        return container;
    };

    return {
        async ensureContainer(signal) {
            const { database } = await client.databases.createIfNotExists(
                { id: options.databaseId },
                { abortSignal: signal }
            );
            const response = await database.containers.createIfNotExists(
                {
                    id: options.containerId,
                    partitionKey: { paths: [options.partitionKeyPath] },
                    indexingPolicy: { compositeIndexes: [CHECKPOINT_ORDER_INDEX] }
                },
                { offerThroughput: options.throughput, abortSignal: signal }
            );
            container = response.container;

            const upgraded = response.resource ? withCheckpointOrderIndex(response.resource.indexingPolicy) : null;
            if (response.resource && upgraded) {
                await response.container.replace(
                    { ...response.resource, indexingPolicy: upgraded },
                    { abortSignal: signal }
                );
            }
            return { orderIndexAdded: upgraded !== null };
        },

        async createItem(item, signal) {
            await requireContainer().items.create(item, { abortSignal: signal });
        },

        async patchItem(id, threadId, patch, signal) {
            const operations: PatchOperation[] = [
                { op: 'set', path: '/state', value: patch.state },
                { op: 'set', path: '/metadata', value: patch.metadata },
                { op: 'set', path: '/updated_at', value: patch.updated_at }
            ];
            await requireContainer().item(id, threadId).patch(operations, { abortSignal: signal });
        },

        async readItem(id, threadId, signal) {
            try {
                const { resource } = await requireContainer().item(id, threadId).read({ abortSignal: signal });
                return resource ?? null;
            } catch (error) {
                if (statusCodeOf(error) === COSMOS_STATUS.NOT_FOUND) return null;
                throw error;
            }
        },

        async queryItems(query, threadId, signal) {
            const { resources } = await requireContainer().items
                .query(query.spec, { partitionKey: threadId, abortSignal: signal })
                .fetchAll();
            return resources;
        },

        async deleteItem(id, threadId, signal) {
            await requireContainer().item(id, threadId).delete({ abortSignal: signal });
        },

        async close() {
            container = null;
            client.dispose();
        }
    };
}
