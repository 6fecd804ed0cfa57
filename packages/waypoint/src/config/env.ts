import { ConfigError, ENV_KEYS, PERSISTENCE_LIMITS, type PersistenceDefaults } from '@waypoint/core';
import { z } from 'zod';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
const TRUE_VALUES = ['true', '1', 'yes'];

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const lowered = (value: unknown) => {
  const present = blankToUndefined(value);
  return typeof present === 'string' ? present.trim().toLowerCase() : present;
};

const text = z.preprocess(blankToUndefined, z.string().trim().optional());

const integer = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional());

const envSchema = z.object({
  [ENV_KEYS.CONNECTION_STRING]    : text,
  [ENV_KEYS.TABLE_NAME]           : text,
  [ENV_KEYS.COSMOS_DATABASE]      : text,
  [ENV_KEYS.COSMOS_THROUGHPUT]    : integer(400),
  [ENV_KEYS.POOL_MAX]             : integer(1),
  [ENV_KEYS.OPERATION_TIMEOUT_MS] : integer(1, PERSISTENCE_LIMITS.MAX_TIMEOUT_MS),
  [ENV_KEYS.LOG_LEVEL]            : z.preprocess(lowered, z.enum(LOG_LEVELS).optional()),
  [ENV_KEYS.LOG_PRETTY]           : z.preprocess(
    lowered,
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
      .transform((value) => TRUE_VALUES.includes(value))
      .optional()
  )
});

/**
 * Reads selector fallbacks from environment variables. Blank values count as
 * unset; anything present must parse, or the whole load fails.
 */
export function loadPersistenceDefaults(env: Record<string, string | undefined>): PersistenceDefaults {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    connectionString   : values[ENV_KEYS.CONNECTION_STRING],
    tableName          : values[ENV_KEYS.TABLE_NAME],
    cosmosDatabase     : values[ENV_KEYS.COSMOS_DATABASE],
    cosmosThroughput   : values[ENV_KEYS.COSMOS_THROUGHPUT],
    poolMax            : values[ENV_KEYS.POOL_MAX],
    operationTimeoutMs : values[ENV_KEYS.OPERATION_TIMEOUT_MS],
    logLevel           : values[ENV_KEYS.LOG_LEVEL],
    prettyLogs         : values[ENV_KEYS.LOG_PRETTY]
  };
}
