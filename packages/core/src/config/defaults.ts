/**
 * Default constants for the checkpoint store
 */

export const PERSISTENCE_DEFAULTS = {
  /** Table, or Cosmos DB container, used when none is configured */
  TABLE_NAME: 'graph_states' as const,

  /** Page size of listCheckpoints() when the caller passes no limit */
  LIST_LIMIT: 10 as const,

  /** Upper bound of connections held by one driver's pool */
  POOL_MAX: 10 as const,

  /** Idle pooled connections are released after this many milliseconds */
  POOL_IDLE_TIMEOUT_MS: 30_000 as const,

  /** Connection attempts give up after this many milliseconds */
  CONNECT_TIMEOUT_MS: 15_000 as const,
};

/** Upper bounds shared by every driver */
export const PERSISTENCE_LIMITS = {
  /** Longest delay a Node.js timer honours; larger deadlines are capped to it */
  MAX_TIMEOUT_MS: 2_147_483_647 as const,

  /** Largest page listCheckpoints() asks for; fits SQL Server's INT parameter */
  MAX_LIST_LIMIT: 2_147_483_647 as const,
};

export const COSMOS_DEFAULTS = {
  /** Database created when the connection string names none */
  DATABASE: 'waypoint' as const,

  /** Provisioned throughput of a newly created container, in RU/s */
  THROUGHPUT: 400 as const,

  /** Partition key path; every checkpoint of a thread shares a partition */
  PARTITION_KEY_PATH: '/thread_id' as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: 'info' as const,

  /** Logger name bound to every entry */
  NAME: 'waypoint' as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;

/** Environment variables read by `loadPersistenceDefaults()`. */
export const ENV_KEYS = {
  CONNECTION_STRING: 'DATABASE_CONNECTION_STRING',
  TABLE_NAME: 'DATABASE_TABLE_NAME',
  COSMOS_DATABASE: 'COSMOS_DATABASE_NAME',
  COSMOS_THROUGHPUT: 'COSMOS_THROUGHPUT',
  POOL_MAX: 'DATABASE_POOL_MAX',
  OPERATION_TIMEOUT_MS: 'DATABASE_OPERATION_TIMEOUT_MS',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_PRETTY: 'LOG_PRETTY',
} as const;
