/**
 * PostgreSQL store adapter over a fixed table schema per resource type
 */

import { Pool } from 'pg';
import type { EnumerateOptions, SourceAdapter } from '../interfaces';
import type { ApplyResult, Payload, RecordKey, SyncRecord } from '../types';
import { APPLY_OPERATION } from '../enums';
import { ApplyFailedError, MalformedRecordError, StoreUnavailableError, errorMessage } from '../errors';
import { createRecord, parseTimestamp } from '../utils';
import { createLogger, type Logger } from '../logger';

export interface PostgresTableSchema {
  table: string; // may be schema-qualified, e.g. "crm.users"
  keyColumn: string;
  columns: readonly string[];
  modifiedColumn?: string;
}

/**
 * The slice of pg's Pool/Client the adapter uses
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
  end?(): Promise<void>;
}

export interface PostgresStoreConfig {
  name?: string;
  connectionString?: string;
  client?: Queryable; // used instead of a pool built from connectionString
  tables: Record<string, PostgresTableSchema>;
  logger?: Logger;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function quoteIdentifier(identifier: string): string {
  const parts = identifier.split('.');
  for (const part of parts) {
    if (!IDENTIFIER.test(part)) {
      throw new Error(`Invalid SQL identifier "${identifier}"`);
    }
  }
  return parts.map(part => `"${part}"`).join('.');
}

/**
 * Reads with SELECT and writes with INSERT ... ON CONFLICT DO UPDATE, which
 * PostgreSQL applies atomically per key
 */
export class PostgresStoreAdapter implements SourceAdapter {
  readonly name: string;
  readonly atomicUpsert = true;

  private readonly client: Queryable;
  private readonly ownsClient: boolean;
  private readonly tables: Record<string, PostgresTableSchema>;
  private readonly logger: Logger;

  constructor(config: PostgresStoreConfig) {
    if (config.client) {
      this.client = config.client;
      this.ownsClient = false;
    } else if (config.connectionString) {
      this.client = new Pool({ connectionString: config.connectionString });
      this.ownsClient = true;
    } else {
      throw new Error('PostgresStoreAdapter needs a connectionString or a client');
    }

    this.name = config.name ?? 'postgres';
    this.tables = config.tables;
    this.logger = config.logger ?? createLogger('postgres-store');

    // Fail on construction rather than on first query
    for (const schema of Object.values(this.tables)) {
      for (const identifier of [schema.table, ...selectedColumns(schema)]) {
        quoteIdentifier(identifier);
      }
    }
  }

  listResourceTypes(): readonly string[] {
    return Object.keys(this.tables);
  }

  async enumerate(resourceType: string, options: EnumerateOptions = {}): Promise<Map<RecordKey, SyncRecord>> {
    const schema = this.schemaFor(resourceType);
    const columns = selectedColumns(schema);
    const sql = `SELECT ${columns.map(quoteIdentifier).join(', ')} FROM ${quoteIdentifier(schema.table)}`;

    let rows: Array<Record<string, unknown>>;
    try {
      ({ rows } = await this.client.query(sql));
    } catch (error) {
      throw new StoreUnavailableError(this.name, resourceType, errorMessage(error), error);
    }

    const records = new Map<RecordKey, SyncRecord>();
    for (const row of rows) {
      const rawKey = row[schema.keyColumn];
      if (rawKey === null || rawKey === undefined) {
        const warning = new MalformedRecordError(this.name, resourceType, `row has no "${schema.keyColumn}"`);
        this.logger.warn({ resourceType }, warning.message);
        options.onMalformed?.(warning);
        continue;
      }

      const payload: Payload = {};
      for (const column of columns) {
        payload[column] = row[column] ?? null;
      }
      const modifiedAt = schema.modifiedColumn ? parseTimestamp(row[schema.modifiedColumn]) : undefined;
      records.set(String(rawKey), createRecord(String(rawKey), payload, modifiedAt));
    }
    return records;
  }

  async apply(resourceType: string, record: SyncRecord): Promise<ApplyResult> {
    const schema = this.schemaFor(resourceType);
    const columns = selectedColumns(schema);
    const values = columns.map(column =>
      column === schema.keyColumn ? record.key : toSqlValue(record.payload[column])
    );

    const quotedKey = quoteIdentifier(schema.keyColumn);
    const updates = columns
      .filter(column => column !== schema.keyColumn)
      .map(column => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`);

    const sql =
      `INSERT INTO ${quoteIdentifier(schema.table)} (${columns.map(quoteIdentifier).join(', ')}) ` +
      `VALUES (${columns.map((_, index) => `$${index + 1}`).join(', ')}) ` +
      `ON CONFLICT (${quotedKey}) ` +
      (updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')} ` : 'DO NOTHING ') +
      'RETURNING (xmax = 0) AS inserted';

    try {
      const { rows } = await this.client.query(sql, values);
      const inserted = rows[0]?.['inserted'] === true;
      return { key: record.key, operation: inserted ? APPLY_OPERATION.CREATE : APPLY_OPERATION.UPDATE };
    } catch (error) {
      throw new ApplyFailedError(this.name, resourceType, record.key, errorMessage(error), error);
    }
  }

  async close(): Promise<void> {
    if (this.ownsClient && this.client.end) {
      await this.client.end();
    }
  }

  private schemaFor(resourceType: string): PostgresTableSchema {
    const schema = this.tables[resourceType];
    if (!schema) {
      throw new StoreUnavailableError(this.name, resourceType, 'no table mapped for this resource type');
    }
    return schema;
  }
}

/**
 * Key column first, then the declared columns and the modification column,
 * without repeats
 */
function selectedColumns(schema: PostgresTableSchema): string[] {
  const columns = [schema.keyColumn, ...schema.columns];
  if (schema.modifiedColumn) columns.push(schema.modifiedColumn);
  return [...new Set(columns)];
}

// Objects and arrays go to json/jsonb columns as JSON text
function toSqlValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return JSON.stringify(value);
  }
  return value;
}
