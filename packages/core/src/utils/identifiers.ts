import { ConfigError } from '../errors';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

/**
 * Table names are interpolated into DDL and queries, so only plain identifiers
 * are accepted.
 */
export function assertTableName(tableName: string): string {
  if (!TABLE_NAME_PATTERN.test(tableName)) {
    throw new ConfigError(
      `Invalid table name "${tableName}": expected letters, digits and underscores, starting with a letter or underscore (max 63 characters)`
    );
  }
  return tableName;
}

const RESERVED_ID_CHARACTERS = /[%/\\?#]/g;

/**
 * Stable per-checkpoint document id for stores keyed by a single id.
 *
 * Cosmos DB refuses ids containing `/`, `\`, `?` or `#`, so those are
 * percent-encoded, along with `%` itself to keep distinct ids distinct. Ids
 * without them are left as `<threadId>_<checkpointId>`.
 */
export function checkpointDocumentId(threadId: string, checkpointId: string): string {
  return `${threadId}_${checkpointId}`.replace(
    RESERVED_ID_CHARACTERS,
    (character) => `%${character.charCodeAt(0).toString(16).toUpperCase()}`
  );
}
