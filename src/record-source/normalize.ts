import { Types } from 'mongoose';
import { FieldValue, SourceRecord } from '../analytics/table';
import { StoredDocument } from './document-store';

function toFieldValue(value: unknown): FieldValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value;
  if (value instanceof Types.ObjectId) return value.toHexString();
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
}

/**
 * Convert a raw document into a record. `_id` becomes the string `id`;
 * nested objects and other non-scalar values are left out.
 */
export function normalizeDocument(doc: StoredDocument): SourceRecord {
  const record: SourceRecord = { id: doc._id === undefined || doc._id === null ? '' : String(doc._id) };
  for (const [key, raw] of Object.entries(doc)) {
    if (key === '_id' || key === 'id') continue;
    const value = toFieldValue(raw);
    if (value !== undefined) record[key] = value;
  }
  return record;
}
