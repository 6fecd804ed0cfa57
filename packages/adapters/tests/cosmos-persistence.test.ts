import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CancelledError,
  ConfigError,
  ConnectionError,
  SerializationError
} from '@waypoint/core';
import { ManualClock, describeStatePersistenceContract } from '@waypoint/testing';
import {
  CosmosStatePersistence,
  FakeCosmosError,
  FakeCosmosGateway,
  FakeLogger,
  cosmosQueries,
  parseCosmosConnectionString,
  statusCodeOf,
  withCheckpointOrderIndex
} from '../src/index';

const CONNECTION_STRING = 'AccountEndpoint=https://localhost:8081/;AccountKey=test-secret==;';

describeStatePersistenceContract('CosmosStatePersistence', (clock) => {
  const gateway = new FakeCosmosGateway();
  return new CosmosStatePersistence({
    connectionString: CONNECTION_STRING,
    logger: new FakeLogger(),
    clock: clock.now,
    createGateway: FakeCosmosGateway.factory(gateway)
  });
});

describe('parseCosmosConnectionString', () => {
  it('reads endpoint, key and database without splitting base64 padding', () => {
    expect(parseCosmosConnectionString(
      'AccountEndpoint=https://acct.documents.azure.com:443/;AccountKey=test-secret==;Database=graphs;'
    )).toEqual({
      endpoint: 'https://acct.documents.azure.com:443/',
      key: 'test-secret==',
      database: 'graphs'
    });
  });

  it('matches keys case-insensitively', () => {
    expect(parseCosmosConnectionString('accountendpoint=https://localhost:8081/;ACCOUNTKEY=test-secret')).toEqual({
      endpoint: 'https://localhost:8081/',
      key: 'test-secret'
    });
  });

  it('requires both the endpoint and the key', () => {
    expect(() => parseCosmosConnectionString('AccountEndpoint=https://localhost:8081/;')).toThrow(
      new ConfigError('Cosmos DB connection string must contain AccountEndpoint and AccountKey')
    );
  });
});

describe('statusCodeOf', () => {
  it('reads code, then statusCode', () => {
    expect(statusCodeOf(new FakeCosmosError(409, 'conflict'))).toBe(409);
    expect(statusCodeOf({ statusCode: 429 })).toBe(429);
    expect(statusCodeOf(new Error('socket hang up'))).toBeUndefined();
  });
});

describe('cosmosQueries', () => {
  it('bounds listings with a parameterized TOP over the composite order', () => {
    expect(cosmosQueries.selectRecentStates('t1', 4).spec).toEqual({
      query: 'SELECT TOP @limit c.id, c.thread_id, c.checkpoint_id, c.state, c.metadata, c.created_at, c.updated_at '
        + 'FROM c WHERE c.thread_id = @threadId ORDER BY c.created_at DESC, c.id DESC',
      parameters: [
        { name: '@threadId', value: 't1' },
        { name: '@limit', value: 4 }
      ]
    });
  });
});

describe('withCheckpointOrderIndex', () => {
  const orderIndex = [
    { path: '/created_at', order: 'descending' as const },
    { path: '/id', order: 'descending' as const }
  ];

  it('adds the ordering index to a policy without one', () => {
    expect(withCheckpointOrderIndex(undefined)).toEqual({ compositeIndexes: [orderIndex] });
    expect(withCheckpointOrderIndex({
      automatic: true,
      compositeIndexes: [[
        { path: '/thread_id', order: 'ascending' },
        { path: '/created_at', order: 'descending' }
      ]]
    })).toEqual({
      automatic: true,
      compositeIndexes: [
        [
          { path: '/thread_id', order: 'ascending' },
          { path: '/created_at', order: 'descending' }
        ],
        orderIndex
      ]
    });
  });

  it('leaves a policy alone when an index already serves the order or its reverse', () => {
    expect(withCheckpointOrderIndex({ compositeIndexes: [orderIndex] })).toBeNull();
    expect(withCheckpointOrderIndex({
      compositeIndexes: [[
        { path: '/created_at', order: 'ascending' },
        { path: '/id', order: 'ascending' }
      ]]
    })).toBeNull();
  });

  it('does not count a mixed-direction index', () => {
    expect(withCheckpointOrderIndex({
      compositeIndexes: [[
        { path: '/created_at', order: 'descending' },
        { path: '/id', order: 'ascending' }
      ]]
    })).not.toBeNull();
  });
});

describe('CosmosStatePersistence', () => {
  let clock: ManualClock;
  let logger: FakeLogger;
  let gateway: FakeCosmosGateway;
  let store: CosmosStatePersistence;

  const createStore = (options: { connectionString?: string; database?: string; throughput?: number } = {}) =>
    new CosmosStatePersistence({
      connectionString: options.connectionString ?? CONNECTION_STRING,
      database: options.database,
      throughput: options.throughput,
      logger,
      clock: clock.now,
      createGateway: FakeCosmosGateway.factory(gateway)
    });

  beforeEach(() => {
    clock = new ManualClock();
    logger = new FakeLogger();
    gateway = new FakeCosmosGateway();
    store = createStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it('resolves the database from the connection string, then options, then the default', () => {
    expect(createStore({ connectionString: `${CONNECTION_STRING}Database=graphs;`, database: 'ignored' }).databaseId).toBe('graphs');
    expect(createStore({ database: 'custom' }).databaseId).toBe('custom');
    expect(store.databaseId).toBe('waypoint');
  });

  it('provisions the container partitioned by thread', async () => {
    store = createStore({ throughput: 1_000 });

    await store.initialize();

    expect(gateway.containerOptions).toEqual({
      endpoint: 'https://localhost:8081/',
      key: 'test-secret==',
      databaseId: 'waypoint',
      containerId: 'graph_states',
      partitionKeyPath: '/thread_id',
      throughput: 1_000
    });
    expect(logger.entries('info')[0]?.obj).toEqual({ backend: 'cosmos', table: 'graph_states', database: 'waypoint' });
  });

  it('warns when an existing container needed the ordering index', async () => {
    gateway.orderIndexMissing = true;

    await store.initialize();

    expect(logger.entries('warn').map((entry) => entry.msg)).toEqual([
      'Added the checkpoint ordering index to an existing container; ordered reads may lag until it is built'
    ]);
  });

  it('stores ids with reserved characters percent-encoded', async () => {
    await store.initialize();
    await store.saveState('org/team', 'c#1', { step: 1 });

    gateway.removeDocument('org/team', 'org%2Fteam_c%231');

    await expect(store.loadState('org/team', 'c#1')).resolves.toBeNull();
  });

  it('patches the mutable fields when the document already exists', async () => {
    await store.initialize();

    await store.saveState('t1', 'c1', { step: 1 });
    await store.saveState('t1', 'c1', { step: 2 });

    expect(gateway.calls.map((call) => call.operation)).toEqual([
      'ensureContainer',
      'createItem',
      'createItem',
      'patchItem'
    ]);
    expect(gateway.documentCount('t1')).toBe(1);
  });

  it('recreates a document removed between the conflict and the patch', async () => {
    await store.initialize();
    await store.saveState('t1', 'c1', { step: 1 });
    gateway.interleaveBeforePatch(() => gateway.removeDocument('t1', 't1_c1'));
    const later = clock.advance(60_000);

    await expect(store.saveState('t1', 'c1', { step: 2 })).resolves.toBe(true);

    const loaded = await store.loadState('t1', 'c1');
    expect(loaded?.state).toEqual({ step: 2 });
    expect(loaded?.createdAt).toEqual(later);
    expect(gateway.calls.slice(-4).map((call) => call.operation)).toEqual([
      'createItem',
      'patchItem',
      'createItem',
      'readItem'
    ]);
  });

  it('ignores documents already gone during a thread delete', async () => {
    await store.initialize();
    await store.saveState('t1', 'c1', { step: 1 });
    gateway.failOn('deleteItem', new FakeCosmosError(404, 'Entity with the specified id does not exist in the system.'));

    await expect(store.deleteState('t1')).resolves.toBe(true);
    expect(logger.entries('error')).toEqual([]);
  });

  it('logs throttled deletes and resolves false', async () => {
    await store.initialize();
    await store.saveState('t1', 'c1', { step: 1 });
    gateway.failOn('deleteItem', new FakeCosmosError(429, 'Request rate is large'));

    await expect(store.deleteState('t1', 'c1')).resolves.toBe(false);
    expect(logger.entries('error')[0]?.obj).toMatchObject({ threadId: 't1', checkpointId: 'c1', operation: 'deleteState' });
  });

  it('raises ConnectionError when a query fails', async () => {
    await store.initialize();
    gateway.failOn('queryItems', new FakeCosmosError(503, 'Service is currently unavailable'));

    await expect(store.listCheckpoints('t1')).rejects.toThrow(
      new ConnectionError('listCheckpoints failed: Service is currently unavailable')
    );
  });

  it('passes the abort signal through to the SDK', async () => {
    await store.initialize();
    const gate = gateway.hold('queryItems');
    const controller = new AbortController();

    const pending = store.loadState('t1', undefined, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(gateway.cancelled).toEqual(['queryItems']);
    gate.release();
  });

  it('raises SerializationError for documents with unreadable timestamps', async () => {
    await store.initialize();
    gateway.seedDocument('t1', {
      id: 't1_c1',
      thread_id: 't1',
      checkpoint_id: 'c1',
      state: {},
      metadata: null,
      created_at: 'yesterday',
      updated_at: 'yesterday'
    });

    await expect(store.loadState('t1', 'c1')).rejects.toBeInstanceOf(SerializationError);
  });

  it('closes the client once', async () => {
    await store.initialize();

    await store.close();
    await store.close();

    expect(gateway.closeCalls).toBe(1);
    expect(logger.entries('info').map((entry) => entry.msg)).toEqual([
      'Cosmos DB container ready',
      'Cosmos DB client closed'
    ]);
  });
});
