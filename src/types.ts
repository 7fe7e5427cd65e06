/**
 * Core types for the record reconciler
 */

import type { APPLY_OPERATION, RESOURCE_STATUS, RUN_STATUS, SIDE } from './enums';
import type { ERROR_CODE } from './errors';

// Identity of a record within one resource type and one store
export type RecordKey = string;

// Epoch milliseconds
export type Timestamp = number;

// Field -> value mapping carried by a record
export type Payload = Record<string, unknown>;

// A keyed payload with its content fingerprint
export interface SyncRecord {
  key: RecordKey;
  payload: Payload;
  fingerprint: string;
  modifiedAt?: Timestamp; // absent is treated as 0
}

// Three-way split of keys between two sides
export interface Partition {
  onlyA: RecordKey[];
  onlyB: RecordKey[];
  common: RecordKey[];
}

// Output of one intersection scan
export interface ScanResult {
  resourceType: string;
  partition: Partition;
  recordsA: Map<RecordKey, SyncRecord>;
  recordsB: Map<RecordKey, SyncRecord>;
}

// A common key whose two sides disagree
export interface Conflict {
  key: RecordKey;
  recordA: SyncRecord;
  recordB: SyncRecord;
  fieldsChanged: string[];
}

// Winner picked for a conflict; 'skip' leaves both sides untouched
export type ConflictDecision = SIDE | 'skip';

export interface ConflictResolutionContext {
  resourceType: string;
  primarySide: SIDE;
}

// What an adapter did with an applied record
export interface ApplyResult {
  key: RecordKey;
  operation: APPLY_OPERATION;
}

// One planned mutation: copy `record` from `from` into the other side
export interface PlannedAction {
  kind: 'resolve' | 'propagate';
  key: RecordKey;
  from: SIDE;
  record: SyncRecord;
}

export interface ActionCounts {
  updated: number;
  created: number;
  skipped: number;
  errors: number;
}

export interface ErrorEntry {
  resourceType: string;
  key?: RecordKey;
  code: ERROR_CODE;
  message: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  at: Timestamp;
  level: LogLevel;
  message: string;
  resourceType?: string;
  key?: RecordKey;
}

export interface ConflictSummary {
  key: RecordKey;
  fieldsChanged: string[];
}

export interface ResourceReport extends ActionCounts {
  resourceType: string;
  status: RESOURCE_STATUS;
  common: number;
  onlyA: number;
  onlyB: number;
  conflicts: number;
  conflictDetails: ConflictSummary[];
  failure?: ErrorEntry;
}

export interface BackupLocation {
  store: string;
  path: string;
}

export interface RunReport {
  status: RUN_STATUS;
  strategy: string;
  dryRun: boolean;
  startedAt: Timestamp;
  finishedAt: Timestamp;
  resources: ResourceReport[];
  totals: ActionCounts;
  errors: ErrorEntry[];
  backups: BackupLocation[];
  log: LogEntry[];
}
