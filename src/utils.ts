/**
 * Utility functions for the reconciler
 */

import { createHash } from 'node:crypto';
import type { Payload, RecordKey, SyncRecord, Timestamp } from './types';

/**
 * Generate a new timestamp
 */
export function now(): Timestamp {
  return Date.now();
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Rebuild a value with object keys sorted at every depth.
 * Undefined object members are dropped, dates become ISO strings and
 * bigints decimal strings, matching what JSON would carry.
 */
export function canonicalize(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(item => canonicalize(item));
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member !== undefined) {
        sorted[key] = canonicalize(member);
      }
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * SHA-256 of the canonical form of a payload
 */
export function fingerprint(payload: Payload): string {
  return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

/**
 * Create a record with its fingerprint
 */
export function createRecord(key: RecordKey, payload: Payload, modifiedAt?: Timestamp): SyncRecord {
  const record: SyncRecord = { key, payload, fingerprint: fingerprint(payload) };
  if (modifiedAt !== undefined) {
    record.modifiedAt = modifiedAt;
  }
  return record;
}

/**
 * Parse a timestamp-like value into epoch milliseconds.
 * Absent or unparsable values become 0.
 */
export function parseTimestamp(value: unknown): Timestamp {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isFinite(time) ? time : 0;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Fields whose values differ between two payloads, sorted.
 * A field present on only one side counts as changed.
 */
export function diffFields(a: Payload, b: Payload): string[] {
  const fields = new Set([...Object.keys(a), ...Object.keys(b)]);
  const changed: string[] = [];

  for (const field of fields) {
    const inA = a[field] !== undefined;
    const inB = b[field] !== undefined;
    if (inA !== inB || canonicalJson(a[field]) !== canonicalJson(b[field])) {
      changed.push(field);
    }
  }

  return changed.sort(compareKeys);
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function cloneRecord(record: SyncRecord): SyncRecord {
  return { ...record, payload: structuredClone(record.payload) };
}
