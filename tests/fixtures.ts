import { MemoryStoreAdapter } from '../src/adapters/memory-store';
import type { Queryable } from '../src/adapters/postgres-store';
import type { Payload, RecordKey, ScanResult, SyncRecord, Timestamp } from '../src/types';
import { partitionKeys } from '../src/intersection-scanner';
import { createRecord } from '../src/utils';
import { createLogger, type Logger } from '../src/logger';

export type Seed = Record<string, Record<RecordKey, Payload | { payload: Payload; modifiedAt: Timestamp }>>;

export function silentLogger(): Logger {
  return createLogger('test', { level: 'silent' });
}

function isTimedEntry(value: Payload): value is { payload: Payload; modifiedAt: Timestamp } {
  return typeof value['modifiedAt'] === 'number' && typeof value['payload'] === 'object' && value['payload'] !== null;
}

/**
 * Memory store declaring `resourceTypes`, seeded with `seed`. An entry is a
 * bare payload, or `{ payload, modifiedAt }` to give it a timestamp.
 */
export function memoryStore(name: string, resourceTypes: readonly string[], seed: Seed = {}): MemoryStoreAdapter {
  const store = new MemoryStoreAdapter({ name, resourceTypes });
  for (const [resourceType, entries] of Object.entries(seed)) {
    for (const [key, entry] of Object.entries(entries)) {
      if (isTimedEntry(entry)) {
        store.put(resourceType, key, entry.payload, entry.modifiedAt);
      } else {
        store.put(resourceType, key, entry);
      }
    }
  }
  return store;
}

export function recordsOf(entries: Record<RecordKey, Payload>, modifiedAt?: Timestamp): Map<RecordKey, SyncRecord> {
  return new Map(Object.entries(entries).map(([key, payload]) => [key, createRecord(key, payload, modifiedAt)]));
}

export function scanOf(
  resourceType: string,
  recordsA: Map<RecordKey, SyncRecord>,
  recordsB: Map<RecordKey, SyncRecord>
): ScanResult {
  return {
    resourceType,
    partition: partitionKeys(recordsA.keys(), recordsB.keys()),
    recordsA,
    recordsB,
  };
}

/**
 * In-process stand-in for a pg pool. Understands the SELECT and
 * INSERT ... ON CONFLICT statements the postgres adapter issues.
 */
export class FakeQueryable implements Queryable {
  readonly queries: Array<{ text: string; values: unknown[] }> = [];
  readonly tables = new Map<string, Map<string, Record<string, unknown>>>();
  private failure: Error | undefined;
  ended = false;

  seed(table: string, keyColumn: string, rows: Array<Record<string, unknown>>): void {
    const stored = this.table(table);
    for (const row of rows) {
      stored.set(String(row[keyColumn]), { ...row });
    }
  }

  failWith(error: Error | undefined): void {
    this.failure = error;
  }

  async query(text: string, values: unknown[] = []): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.queries.push({ text, values });
    if (this.failure) {
      throw this.failure;
    }

    const select = /^SELECT (.+) FROM "(\w+)"$/.exec(text);
    if (select) {
      const columns = parseColumns(select[1] ?? '');
      const rows = [...this.table(select[2] ?? '').values()].map(row =>
        Object.fromEntries(columns.map(column => [column, row[column]]))
      );
      return { rows };
    }

    const insert = /^INSERT INTO "(\w+)" \(([^)]+)\)/.exec(text);
    if (insert) {
      const columns = parseColumns(insert[2] ?? '');
      const table = this.table(insert[1] ?? '');
      const key = String(values[0]);
      const existed = table.has(key);
      table.set(key, Object.fromEntries(columns.map((column, index) => [column, values[index]])));
      return { rows: [{ inserted: !existed }] };
    }

    throw new Error(`FakeQueryable cannot run: ${text}`);
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  private table(name: string): Map<string, Record<string, unknown>> {
    let table = this.tables.get(name);
    if (!table) {
      table = new Map();
      this.tables.set(name, table);
    }
    return table;
  }
}

function parseColumns(list: string): string[] {
  return list.split(',').map(column => column.trim().replace(/^"|"$/g, ''));
}
