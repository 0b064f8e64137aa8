/**
 * Field readers for decoding stored documents.
 *
 * Documents come back from PostgreSQL as parsed JSON (dates as ISO
 * strings) and from the in-memory store as plain objects (dates as Date
 * instances). Every collection decodes through these readers, so both
 * stores hand out freshly built, fully typed records.
 *
 * @module store/codec
 */

import type { StoredDocument } from '../types/index.js';

export class DocumentDecodeError extends Error {
  constructor(
    public readonly collection: string,
    public readonly field: string,
    expected: string,
  ) {
    super(`Malformed ${collection} document: "${field}" is not ${expected}`);
    this.name = 'DocumentDecodeError';
  }
}

/** How a collection is named, stored, and decoded. */
export interface CollectionSchema<T extends StoredDocument> {
  /** Logical collection name. */
  name: string;
  /** PostgreSQL table holding the collection's JSONB documents. */
  table: string;
  decode(raw: unknown): T;
}

/** Copy of a plain object's own enumerable fields. */
export function asRecord(raw: unknown, collection: string): Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DocumentDecodeError(collection, '<root>', 'an object');
  }
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    record[key] = value;
  }
  return record;
}

/** Field reader bound to one raw document. */
export class FieldReader {
  private readonly record: Record<string, unknown>;

  constructor(
    raw: unknown,
    private readonly collection: string,
  ) {
    this.record = asRecord(raw, collection);
  }

  has(field: string): boolean {
    return this.record[field] !== undefined && this.record[field] !== null;
  }

  raw(field: string): unknown {
    return this.record[field];
  }

  string(field: string): string {
    const value = this.record[field];
    if (typeof value !== 'string') throw new DocumentDecodeError(this.collection, field, 'a string');
    return value;
  }

  nullableString(field: string): string | null {
    const value = this.record[field];
    if (value === undefined || value === null) return null;
    return this.string(field);
  }

  number(field: string): number {
    const value = this.record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new DocumentDecodeError(this.collection, field, 'a number');
    }
    return value;
  }

  boolean(field: string): boolean {
    const value = this.record[field];
    if (typeof value !== 'boolean') throw new DocumentDecodeError(this.collection, field, 'a boolean');
    return value;
  }

  date(field: string): Date {
    const value = this.record[field];
    const date =
      value instanceof Date
        ? new Date(value.getTime())
        : typeof value === 'string'
          ? new Date(value)
          : null;
    if (!date || Number.isNaN(date.getTime())) {
      throw new DocumentDecodeError(this.collection, field, 'a date');
    }
    return date;
  }

  nullableDate(field: string): Date | null {
    const value = this.record[field];
    if (value === undefined || value === null) return null;
    return this.date(field);
  }

  /** A string restricted to one of `values` (typically an enum's values). */
  oneOf<E extends string>(field: string, values: readonly E[]): E {
    const value = this.record[field];
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new DocumentDecodeError(this.collection, field, `one of ${values.join(', ')}`);
    }
    return match;
  }
}
