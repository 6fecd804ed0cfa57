import { z } from 'zod';

import type { StateDocument } from '../contracts/state';
import { decodeJsonObject, decodeOptionalJsonObject } from './json';

/** Timestamps arrive as `Date` from SQL drivers and as ISO-8601 text from document stores. */
export const storedTimestampSchema = z
  .union([z.date(), z.string().min(1)])
  .transform((value) => new Date(value))
  .refine((value) => !Number.isNaN(value.getTime()), { message: 'Invalid timestamp' });

interface StoredCheckpointFields {
  threadId: string;
  checkpointId: string;
  state: unknown;
  metadata: unknown;
  createdAt: Date;
  updatedAt: Date;
}

export function toStateDocument(fields: StoredCheckpointFields): StateDocument {
  const document: StateDocument = {
    threadId: fields.threadId,
    checkpointId: fields.checkpointId,
    state: decodeJsonObject(fields.state, 'state'),
    createdAt: fields.createdAt,
    updatedAt: fields.updatedAt
  };

  const metadata = decodeOptionalJsonObject(fields.metadata, 'metadata');
  if (metadata !== undefined) {
    document.metadata = metadata;
  }

  return document;
}
