/**
 * PostgreSQL implementation of the document store.
 *
 * Each collection lives in its own table of `(id text primary key, data
 * jsonb)`. The conditional write is a single `UPDATE … WHERE data @>
 * expected`, which PostgreSQL executes atomically per row, so concurrent
 * writers on the same record resolve as first committer wins.
 *
 * Dates are written as ISO-8601 strings (their JSON form) and compared
 * with `::timestamptz` casts. JSON keys are always passed as parameters.
 *
 * @module store/pgDocumentStore
 */

import { randomUUID } from 'node:crypto';
import { query } from '../utils/db.js';
import type { StoredDocument } from '../types/index.js';
import { asRecord, type CollectionSchema } from './codec.js';
import type { DocumentPatch, DocumentQuery, DocumentStore } from './documentStore.js';
import { withStorageRetry, type RetryOptions } from './retry.js';

/** Raw row shape of every collection table. */
interface DocumentRow {
  id: string;
  data: unknown;
}

/** Operations that may be repeated after a lost reply. */
const READ_OPERATIONS = new Set(['get', 'find']);

/** Parameterised SQL fragment. */
interface SqlFilter {
  where: string;
  tail: string;
  params: unknown[];
}

export class PgDocumentStore<T extends StoredDocument> implements DocumentStore<T> {
  constructor(
    private readonly schema: CollectionSchema<T>,
    private readonly retry: RetryOptions = {},
  ) {}

  get collection(): string {
    return this.schema.name;
  }

  async create(data: Omit<T, 'id'>): Promise<T> {
    const id = randomUUID();
    const rows = await this.run(
      'create',
      `INSERT INTO ${this.schema.table} (id, data) VALUES ($1, $2::jsonb) RETURNING id, data`,
      [id, JSON.stringify(data)],
    );
    const row = rows[0];
    if (!row) throw new Error(`Insert into ${this.schema.table} returned no row`);
    return this.decodeRow(row);
  }

  async createWithId(id: string, data: Omit<T, 'id'>): Promise<T | null> {
    const rows = await this.run(
      'createWithId',
      `INSERT INTO ${this.schema.table} (id, data) VALUES ($1, $2::jsonb)
       ON CONFLICT (id) DO NOTHING RETURNING id, data`,
      [id, JSON.stringify(data)],
    );
    return rows[0] ? this.decodeRow(rows[0]) : null;
  }

  async get(id: string): Promise<T | null> {
    const rows = await this.run('get', `SELECT id, data FROM ${this.schema.table} WHERE id = $1`, [id]);
    return rows[0] ? this.decodeRow(rows[0]) : null;
  }

  async conditionalUpdate(
    id: string,
    expected: DocumentPatch<T>,
    patch: DocumentPatch<T>,
  ): Promise<T | null> {
    const rows = await this.run(
      'conditionalUpdate',
      `UPDATE ${this.schema.table} SET data = data || $3::jsonb
       WHERE id = $1 AND data @> $2::jsonb RETURNING id, data`,
      [id, JSON.stringify(expected), JSON.stringify(patch)],
    );
    return rows[0] ? this.decodeRow(rows[0]) : null;
  }

  async find(criteria: DocumentQuery<T>): Promise<T[]> {
    const filter = buildFilter(criteria);
    const rows = await this.run(
      'find',
      `SELECT id, data FROM ${this.schema.table} WHERE ${filter.where}${filter.tail}`,
      filter.params,
    );
    return rows.map((row) => this.decodeRow(row));
  }

  async deleteWhere(criteria: DocumentQuery<T>): Promise<number> {
    const filter = buildFilter(criteria);
    const sql =
      filter.tail.length > 0
        ? `DELETE FROM ${this.schema.table} WHERE id IN (
             SELECT id FROM ${this.schema.table} WHERE ${filter.where}${filter.tail}
           ) RETURNING id, data`
        : `DELETE FROM ${this.schema.table} WHERE ${filter.where} RETURNING id, data`;
    const rows = await this.run('deleteWhere', sql, filter.params);
    return rows.length;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.run(
      'delete',
      `DELETE FROM ${this.schema.table} WHERE id = $1 RETURNING id, data`,
      [id],
    );
    return rows.length > 0;
  }

  // --- Internal helpers ---

  private async run(operation: string, text: string, params: unknown[]): Promise<DocumentRow[]> {
    const result = await withStorageRetry(
      `${this.schema.name}.${operation}`,
      () => query<DocumentRow>(text, params),
      { ...this.retry, idempotent: READ_OPERATIONS.has(operation) },
    );
    return result.rows;
  }

  private decodeRow(row: DocumentRow): T {
    return this.schema.decode({ ...asRecord(row.data, this.schema.name), id: row.id });
  }
}

/**
 * Translate a {@link DocumentQuery} into a WHERE clause plus ORDER BY /
 * LIMIT tail. An empty query matches every row.
 */
export function buildFilter<T extends StoredDocument>(query: DocumentQuery<T>): SqlFilter {
  const params: unknown[] = [];
  const conditions: string[] = [];
  const param = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  if (query.equals && Object.keys(query.equals).length > 0) {
    conditions.push(`data @> ${param(JSON.stringify(query.equals))}::jsonb`);
  }

  for (const [key, values] of Object.entries(query.oneOf ?? {})) {
    if (!Array.isArray(values)) continue;
    conditions.push(`data->>${param(key)}::text = ANY(${param(values.map(String))}::text[])`);
  }

  for (const [key, bound] of Object.entries(query.notAfter ?? {})) {
    if (!(bound instanceof Date)) continue;
    conditions.push(`(data->>${param(key)}::text)::timestamptz <= ${param(bound.toISOString())}::timestamptz`);
  }

  let tail = '';
  if (query.orderBy !== undefined) {
    tail += ` ORDER BY (data->>${param(String(query.orderBy))}::text)::timestamptz ASC`;
  }
  if (query.limit !== undefined) {
    tail += ` LIMIT ${param(query.limit)}`;
  }

  return {
    where: conditions.length > 0 ? conditions.join(' AND ') : 'TRUE',
    tail,
    params,
  };
}
