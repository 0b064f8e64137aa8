/**
 * In-memory document store for development and testing.
 *
 * Every method body runs synchronously between awaits, so each write is
 * atomic with respect to other callers in the same process, which gives
 * the same first-committer-wins behaviour as the PostgreSQL store.
 *
 * NOT for production use: state is per process and lost on restart.
 */

import { randomUUID } from 'node:crypto';
import type { StoredDocument } from '../types/index.js';
import type { CollectionSchema } from './codec.js';
import {
  matchesExpected,
  matchesQuery,
  type DocumentPatch,
  type DocumentQuery,
  type DocumentStore,
} from './documentStore.js';

export class InMemoryDocumentStore<T extends StoredDocument> implements DocumentStore<T> {
  private readonly documents = new Map<string, T>();

  constructor(private readonly schema: CollectionSchema<T>) {}

  get collection(): string {
    return this.schema.name;
  }

  async create(data: Omit<T, 'id'>): Promise<T> {
    const id = randomUUID();
    const doc = this.schema.decode({ ...data, id });
    this.documents.set(id, doc);
    return this.schema.decode(doc);
  }

  async createWithId(id: string, data: Omit<T, 'id'>): Promise<T | null> {
    if (this.documents.has(id)) return null;
    const doc = this.schema.decode({ ...data, id });
    this.documents.set(id, doc);
    return this.schema.decode(doc);
  }

  async get(id: string): Promise<T | null> {
    const doc = this.documents.get(id);
    return doc ? this.schema.decode(doc) : null;
  }

  async conditionalUpdate(
    id: string,
    expected: DocumentPatch<T>,
    patch: DocumentPatch<T>,
  ): Promise<T | null> {
    const current = this.documents.get(id);
    if (!current || !matchesExpected(current, expected)) return null;

    const updated = this.schema.decode({ ...current, ...patch, id });
    this.documents.set(id, updated);
    return this.schema.decode(updated);
  }

  async find(query: DocumentQuery<T>): Promise<T[]> {
    return this.select(query).map((doc) => this.schema.decode(doc));
  }

  async deleteWhere(query: DocumentQuery<T>): Promise<number> {
    const matches = this.select(query);
    for (const doc of matches) {
      this.documents.delete(doc.id);
    }
    return matches.length;
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }

  /** Number of stored documents. */
  size(): number {
    return this.documents.size;
  }

  // --- Internal helpers ---

  private select(query: DocumentQuery<T>): T[] {
    let matches = [...this.documents.values()].filter((doc) => matchesQuery(doc, query));

    if (query.orderBy !== undefined) {
      const field = String(query.orderBy);
      matches = matches.sort((a, b) => timeOf(a, field) - timeOf(b, field));
    }
    if (query.limit !== undefined) {
      matches = matches.slice(0, query.limit);
    }
    return matches;
  }
}

function timeOf(doc: object, field: string): number {
  const value: unknown = Reflect.get(doc, field);
  return value instanceof Date ? value.getTime() : 0;
}
