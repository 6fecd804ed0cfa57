export type * from '@waypoint/core';
export {
  ConfigError,
  ConnectionError,
  InvalidStateError,
  PersistenceError,
  SerializationError,
  TimeoutError,
  CancelledError,
  UnsupportedBackendError
} from '@waypoint/core';

export {
  CosmosStatePersistence,
  MemoryStatePersistence,
  PinoLogger,
  PostgresStatePersistence,
  SqlServerStatePersistence
} from '@waypoint/adapters';

export * from './api/createPersistence';
export * from './api/detectBackend';
export * from './config/env';
