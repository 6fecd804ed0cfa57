import type { CosmosQuery } from './gateway';

const SELECT_FIELDS = 'c.id, c.thread_id, c.checkpoint_id, c.state, c.metadata, c.created_at, c.updated_at';
const NEWEST_FIRST = 'ORDER BY c.created_at DESC, c.id DESC';

export const cosmosQueries = {
    selectLatestState(threadId: string): CosmosQuery {
        return {
            kind: 'selectLatestState',
            spec: {
                query: `SELECT TOP 1 ${SELECT_FIELDS} FROM c WHERE c.thread_id = @threadId ${NEWEST_FIRST}`,
                parameters: [{ name: '@threadId', value: threadId }]
            }
        };
    },

    selectRecentStates(threadId: string, limit: number): CosmosQuery {
        return {
            kind: 'selectRecentStates',
            spec: {
                query: `SELECT TOP @limit ${SELECT_FIELDS} FROM c WHERE c.thread_id = @threadId ${NEWEST_FIRST}`,
                parameters: [
                    { name: '@threadId', value: threadId },
                    { name: '@limit', value: limit }
                ]
            }
        };
    },

    selectThreadIds(threadId: string): CosmosQuery {
        return {
            kind: 'selectThreadIds',
            spec: {
                query: 'SELECT c.id FROM c WHERE c.thread_id = @threadId',
                parameters: [{ name: '@threadId', value: threadId }]
            }
        };
    }
};
