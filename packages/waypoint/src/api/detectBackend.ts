import { UnsupportedBackendError, type BackendKind } from '@waypoint/core';

export const SUPPORTED_CONNECTION_FORMATS = [
  'Cosmos DB (AccountEndpoint=...;AccountKey=...)',
  'PostgreSQL (postgresql://...)',
  'SQL Server (mssql://... or sqlserver://...)'
] as const;

/**
 * Classifies a connection string by its shape. Checks run in order, so a
 * Cosmos DB string that happens to mention `sqlserver` is still Cosmos DB.
 */
export function detectBackend(connectionString: string): BackendKind {
  const normalized = connectionString.toLowerCase();

  if (normalized.includes('accountendpoint') && normalized.includes('accountkey')) {
    return 'cosmos';
  }
  if (normalized.startsWith('postgresql://') || normalized.startsWith('postgres://')) {
    return 'postgres';
  }
  if (normalized.includes('mssql') || normalized.includes('sqlserver')) {
    return 'sqlserver';
  }

  throw new UnsupportedBackendError(SUPPORTED_CONNECTION_FORMATS);
}
