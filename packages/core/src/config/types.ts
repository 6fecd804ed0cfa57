export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Process-wide fallbacks for the backend selector. Every field is optional;
 * explicit arguments to `createPersistence()` win over these.
 */
export interface PersistenceDefaults {
  connectionString?: string;
  tableName?: string;
  cosmosDatabase?: string;
  cosmosThroughput?: number;
  poolMax?: number;
  /** Deadline applied to every operation that does not carry its own. */
  operationTimeoutMs?: number;
  logLevel?: LogLevel;
  prettyLogs?: boolean;
}

/** Settings shared by the database drivers. */
export interface DriverSettings {
  tableName?: string;
  poolMax?: number;
  operationTimeoutMs?: number;
}
