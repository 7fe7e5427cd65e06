/**
 * In-memory store adapter for testing and simple use cases
 */

import type { SourceAdapter } from '../interfaces';
import type { ApplyResult, Payload, RecordKey, SyncRecord, Timestamp } from '../types';
import { APPLY_OPERATION } from '../enums';
import { ApplyFailedError, StoreUnavailableError } from '../errors';
import { createRecord } from '../utils';

export interface StoredEntry {
  payload: Payload;
  modifiedAt?: Timestamp;
}

export interface MemoryStoreOptions {
  name?: string;
  resourceTypes?: readonly string[];
  atomicUpsert?: boolean;
}

/**
 * Simple in-memory implementation of SourceAdapter
 * Useful for testing, demos, and temporary storage
 */
export class MemoryStoreAdapter implements SourceAdapter {
  readonly name: string;
  readonly atomicUpsert: boolean;

  private collections = new Map<string, Map<RecordKey, StoredEntry>>();
  private readonly unavailable = new Set<string>();
  private readonly failingKeys = new Set<string>();

  constructor(options: MemoryStoreOptions = {}) {
    this.name = options.name ?? 'memory';
    this.atomicUpsert = options.atomicUpsert ?? false;
    for (const resourceType of options.resourceTypes ?? []) {
      this.collection(resourceType);
    }
  }

  listResourceTypes(): readonly string[] {
    return [...this.collections.keys()];
  }

  async enumerate(resourceType: string): Promise<Map<RecordKey, SyncRecord>> {
    if (this.unavailable.has(resourceType)) {
      throw new StoreUnavailableError(this.name, resourceType, 'store marked unavailable');
    }

    const records = new Map<RecordKey, SyncRecord>();
    for (const [key, entry] of this.collections.get(resourceType) ?? new Map<RecordKey, StoredEntry>()) {
      records.set(key, createRecord(key, structuredClone(entry.payload), entry.modifiedAt));
    }
    return records;
  }

  async apply(resourceType: string, record: SyncRecord): Promise<ApplyResult> {
    if (this.failingKeys.has(`${resourceType}/${record.key}`)) {
      throw new ApplyFailedError(this.name, resourceType, record.key, 'write rejected');
    }

    const collection = this.collection(resourceType);
    const operation = collection.has(record.key) ? APPLY_OPERATION.UPDATE : APPLY_OPERATION.CREATE;
    const entry: StoredEntry = { payload: structuredClone(record.payload) };
    if (record.modifiedAt !== undefined) {
      entry.modifiedAt = record.modifiedAt;
    }
    collection.set(record.key, entry);

    return { key: record.key, operation };
  }

  // Seed a record directly, bypassing reconciliation
  put(resourceType: string, key: RecordKey, payload: Payload, modifiedAt?: Timestamp): void {
    const entry: StoredEntry = { payload: structuredClone(payload) };
    if (modifiedAt !== undefined) {
      entry.modifiedAt = modifiedAt;
    }
    this.collection(resourceType).set(key, entry);
  }

  get(resourceType: string, key: RecordKey): Payload | undefined {
    const entry = this.collections.get(resourceType)?.get(key);
    return entry ? structuredClone(entry.payload) : undefined;
  }

  delete(resourceType: string, key: RecordKey): boolean {
    return this.collections.get(resourceType)?.delete(key) ?? false;
  }

  // Utility methods for testing and debugging
  setUnavailable(resourceType: string, unavailable = true): void {
    if (unavailable) {
      this.unavailable.add(resourceType);
    } else {
      this.unavailable.delete(resourceType);
    }
  }

  failApplyFor(resourceType: string, key: RecordKey): void {
    this.failingKeys.add(`${resourceType}/${key}`);
  }

  getRecordCount(resourceType: string): number {
    return this.collections.get(resourceType)?.size ?? 0;
  }

  clear(): void {
    for (const collection of this.collections.values()) {
      collection.clear();
    }
    this.unavailable.clear();
    this.failingKeys.clear();
  }

  // Export/import for persistence in other storage systems
  exportData(): Record<string, Record<RecordKey, StoredEntry>> {
    const data: Record<string, Record<RecordKey, StoredEntry>> = {};
    for (const [resourceType, collection] of this.collections) {
      data[resourceType] = structuredClone(Object.fromEntries(collection));
    }
    return data;
  }

  importData(data: Record<string, Record<RecordKey, StoredEntry>>): void {
    this.collections = new Map(
      Object.entries(data).map(([resourceType, entries]): [string, Map<RecordKey, StoredEntry>] => [
        resourceType,
        new Map(Object.entries(structuredClone(entries))),
      ])
    );
  }

  private collection(resourceType: string): Map<RecordKey, StoredEntry> {
    let collection = this.collections.get(resourceType);
    if (!collection) {
      collection = new Map();
      this.collections.set(resourceType, collection);
    }
    return collection;
  }
}
