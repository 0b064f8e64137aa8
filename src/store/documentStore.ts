/**
 * Keyed document store contract.
 *
 * One store instance per collection. The only atomic primitive is the
 * per-record conditional write: `conditionalUpdate` applies `patch` only
 * when every field in `expected` still holds, and reports whether it did.
 * There are no multi-record transactions.
 *
 * @module store/documentStore
 */

import type { StoredDocument } from '../types/index.js';

/** Keys of `T` whose values are dates (optionally null). */
export type DateKeys<T> = {
  [K in keyof T]-?: T[K] extends Date | null ? (K extends string ? K : never) : never;
}[keyof T];

/** Keys of `T` whose values are strings (optionally null), excluding dates. */
export type StringKeys<T> = {
  [K in keyof T]-?: T[K] extends string | null ? (K extends string ? K : never) : never;
}[keyof T];

export type DocumentPatch<T extends StoredDocument> = Partial<Omit<T, 'id'>>;

export interface DocumentQuery<T extends StoredDocument> {
  /** Field-by-field equality. */
  equals?: DocumentPatch<T>;
  /** The field's value is one of the listed strings. */
  oneOf?: { [K in StringKeys<T>]?: ReadonlyArray<T[K]> };
  /** The date field is at or before the given instant. */
  notAfter?: { [K in DateKeys<T>]?: Date };
  /** Ascending order on a date field. */
  orderBy?: DateKeys<T>;
  limit?: number;
}

export interface DocumentStore<T extends StoredDocument> {
  /** Collection name, used in logs and errors. */
  readonly collection: string;

  /** Insert with a generated id. */
  create(data: Omit<T, 'id'>): Promise<T>;

  /** Insert under a caller-chosen id; null when the id is already taken. */
  createWithId(id: string, data: Omit<T, 'id'>): Promise<T | null>;

  get(id: string): Promise<T | null>;

  /**
   * Apply `patch` iff every field in `expected` matches the stored record.
   * Returns the updated record, or null when the record is missing or a
   * guard no longer holds.
   */
  conditionalUpdate(id: string, expected: DocumentPatch<T>, patch: DocumentPatch<T>): Promise<T | null>;

  find(query: DocumentQuery<T>): Promise<T[]>;

  /** Delete every record matching `query`; returns the number deleted. */
  deleteWhere(query: DocumentQuery<T>): Promise<number>;

  delete(id: string): Promise<boolean>;
}

// ─── Matching Helpers ────────────────────────────────────────────────────────

/** Structural equality for stored field values. */
export function fieldEquals(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a instanceof Date || b instanceof Date) return false;
  if (a === b) return true;
  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return false;
}

function readField(doc: object, key: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(doc, key)) return undefined;
  const value: unknown = Reflect.get(doc, key);
  return value;
}

/** Whether `doc` contains every field of `expected` with an equal value. */
export function matchesExpected(doc: object, expected: object): boolean {
  return Object.entries(expected).every(([key, value]) => fieldEquals(readField(doc, key), value));
}

/** In-process evaluation of a {@link DocumentQuery}. */
export function matchesQuery<T extends StoredDocument>(doc: T, query: DocumentQuery<T>): boolean {
  if (query.equals && !matchesExpected(doc, query.equals)) return false;

  if (query.oneOf) {
    for (const [key, values] of Object.entries(query.oneOf)) {
      if (!Array.isArray(values)) continue;
      const actual = readField(doc, key);
      if (!values.some((value) => value === actual)) return false;
    }
  }

  if (query.notAfter) {
    for (const [key, bound] of Object.entries(query.notAfter)) {
      if (!(bound instanceof Date)) continue;
      const actual = readField(doc, key);
      if (!(actual instanceof Date) || actual.getTime() > bound.getTime()) return false;
    }
  }

  return true;
}
