import { z } from 'zod';

import type { JsonObject, JsonValue } from '../contracts/state';
import { SerializationError, describeError } from '../errors';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Checks a value against the JSON shape. The caller's value is kept rather than
 * zod's rebuilt copy, which drops own `__proto__` keys.
 */
function assertJsonObject(value: unknown, message: string): asserts value is JsonObject {
  const parsed = jsonObjectSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerializationError(`${message}: ${formatIssues(parsed.error)}`);
  }
}

/**
 * Validates a caller payload and returns a detached copy. Rejects anything JSON
 * cannot carry back unchanged (non-finite numbers, functions, class instances).
 */
export function toJsonObject(value: unknown, field: string): JsonObject {
  assertJsonObject(value, `${field} is not a JSON object`);
  return structuredClone(value);
}

/** Serializes a caller payload for text and JSONB columns. */
export function encodeJsonObject(value: unknown, field: string): string {
  assertJsonObject(value, `${field} is not a JSON object`);
  return JSON.stringify(value);
}

/**
 * Reads a stored payload. Drivers whose client already parsed the column
 * (JSONB, Cosmos documents) pass the object; text columns pass the raw string.
 */
export function decodeJsonObject(raw: unknown, field: string): JsonObject {
  let candidate = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch (error) {
      throw new SerializationError(`Stored ${field} is not valid JSON: ${describeError(error)}`, { cause: error });
    }
  }

  assertJsonObject(candidate, `Stored ${field} is not a JSON object`);
  return candidate;
}

/** `null` and `undefined` both mean "no metadata was supplied". */
export function decodeOptionalJsonObject(raw: unknown, field: string): JsonObject | undefined {
  if (raw === null || raw === undefined) return undefined;
  return decodeJsonObject(raw, field);
}

/**
 * Validates a stored row against its backend-specific shape before any field is
 * read from it.
 */
export function parseStoredRow<S extends z.ZodTypeAny>(schema: S, row: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new SerializationError(`Malformed row from ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
