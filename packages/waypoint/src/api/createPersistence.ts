import {
  CosmosStatePersistence,
  PinoLogger,
  PostgresStatePersistence,
  SqlServerStatePersistence
} from '@waypoint/adapters';
import {
  ConfigError,
  ENV_KEYS,
  LOGGING_DEFAULTS,
  PERSISTENCE_DEFAULTS,
  assertTableName,
  type BackendKind,
  type LogLevel,
  type Logger,
  type PersistenceDefaults,
  type StatePersistence
} from '@waypoint/core';

import { loadPersistenceDefaults } from '../config/env';
import { detectBackend } from './detectBackend';

export interface PersistenceOptions {
  connectionString?: string;
  tableName?       : string;
  /** Fallbacks for anything not passed explicitly; read from `process.env` when omitted. */
  defaults?        : PersistenceDefaults;
  logger?          : Logger;
  clock?           : () => Date;
}

export interface ResolvedPersistenceConfig {
  backend            : BackendKind;
  connectionString   : string;
  tableName          : string;
  cosmosDatabase?    : string;
  cosmosThroughput?  : number;
  poolMax?           : number;
  operationTimeoutMs?: number;
  logLevel           : LogLevel;
  prettyLogs         : boolean;
}

/**
 * Builds the driver that matches the connection string. The returned store is
 * not yet initialized; call `initialize()` before using it.
 */
export function createPersistence(options: PersistenceOptions = {}): StatePersistence {
  const config = resolvePersistenceConfig(options);
  const logger = options.logger ?? new PinoLogger({
    name        : LOGGING_DEFAULTS.NAME,
    level       : config.logLevel,
    prettyPrint : config.prettyLogs
  });

  logger.debug({ backend: config.backend, table: config.tableName }, 'Selected checkpoint backend');

  switch (config.backend) {
    case 'cosmos':
      return new CosmosStatePersistence({
        connectionString   : config.connectionString,
        tableName          : config.tableName,
        database           : config.cosmosDatabase,
        throughput         : config.cosmosThroughput,
        operationTimeoutMs : config.operationTimeoutMs,
        logger,
        clock              : options.clock
      });
    case 'postgres':
      return new PostgresStatePersistence({
        connectionString   : config.connectionString,
        tableName          : config.tableName,
        poolMax            : config.poolMax,
        operationTimeoutMs : config.operationTimeoutMs,
        logger,
        clock              : options.clock
      });
    case 'sqlserver':
      return new SqlServerStatePersistence({
        connectionString   : config.connectionString,
        tableName          : config.tableName,
        poolMax            : config.poolMax,
        operationTimeoutMs : config.operationTimeoutMs,
        logger,
        clock              : options.clock
      });
  }
}

function resolvePersistenceConfig(options: PersistenceOptions): ResolvedPersistenceConfig {
  const defaults = options.defaults ?? loadPersistenceDefaults(process.env);

  const connectionString = options.connectionString ?? defaults.connectionString;
  if (!connectionString) {
    throw new ConfigError(
      `No connection string provided. Pass connectionString or set ${ENV_KEYS.CONNECTION_STRING}.`
    );
  }

  return {
    backend            : detectBackend(connectionString),
    connectionString,
    tableName          : assertTableName(options.tableName ?? defaults.tableName ?? PERSISTENCE_DEFAULTS.TABLE_NAME),
    cosmosDatabase     : defaults.cosmosDatabase,
    cosmosThroughput   : defaults.cosmosThroughput,
    poolMax            : defaults.poolMax,
    operationTimeoutMs : defaults.operationTimeoutMs,
    logLevel           : defaults.logLevel ?? LOGGING_DEFAULTS.LEVEL,
    prettyLogs         : defaults.prettyLogs ?? LOGGING_DEFAULTS.PRETTY_PRINT
  };
}

export const __private = {
  resolvePersistenceConfig
};
