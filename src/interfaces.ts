/**
 * Core interfaces for the reconciler adapters
 */

import type {
  ApplyResult,
  BackupLocation,
  Conflict,
  ConflictDecision,
  ConflictResolutionContext,
  ErrorEntry,
  Partition,
  RecordKey,
  RunReport,
  SyncRecord,
} from './types';
import { RECONCILE_EVENT, SIDE } from './enums';
import type { MalformedRecordError } from './errors';

export interface EnumerateOptions {
  // Called for each fetched item that is dropped for lacking a key or a payload
  onMalformed?: (error: MalformedRecordError) => void;
}

/**
 * Source adapter interface - implement this for any backing store
 * (REST endpoints, relational tables, filesystem trees, etc.)
 */
export interface SourceAdapter {
  // Label used in logs, reports and backup file names
  readonly name: string;

  // True when the store upserts a single key atomically, so writes from
  // concurrently processed resource types need no serialization
  readonly atomicUpsert: boolean;

  // Resource types this store knows about
  listResourceTypes(): readonly string[];

  // Fresh read of every record of a resource type; rejects with
  // StoreUnavailableError when the store cannot be read
  enumerate(resourceType: string, options?: EnumerateOptions): Promise<Map<RecordKey, SyncRecord>>;

  // Create the record when its key is absent, overwrite it otherwise
  apply(resourceType: string, record: SyncRecord): Promise<ApplyResult>;

  // Optional store-native full copy; resolves to the written path
  snapshot?(resourceTypes: readonly string[], destinationDir: string): Promise<string>;

  // Cleanup
  close?(): Promise<void>;
}

/**
 * Conflict resolution strategy interface
 */
export interface ConflictResolver {
  resolve(conflict: Conflict, context: ConflictResolutionContext): Promise<ConflictDecision>;
}

/**
 * Receives the finished report (file, HTTP sink, console printer...)
 */
export interface ReportEmitter {
  emit(report: RunReport): Promise<void>;
}

/**
 * Event types for the reconciler
 */
export interface ReconcileEvents {
  // Run events
  [RECONCILE_EVENT.RUN_STARTED]: { resourceTypes: string[]; strategy: string; dryRun: boolean };
  [RECONCILE_EVENT.RUN_COMPLETED]: { report: RunReport };

  // Resource events
  [RECONCILE_EVENT.SCAN_COMPLETED]: { resourceType: string; partition: Partition };
  [RECONCILE_EVENT.RESOURCE_FAILED]: { resourceType: string; error: ErrorEntry };
  [RECONCILE_EVENT.RECORD_DROPPED]: { resourceType: string; error: ErrorEntry };

  // Conflict events
  [RECONCILE_EVENT.CONFLICT_DETECTED]: { resourceType: string; conflict: Conflict };

  // Write events
  [RECONCILE_EVENT.RECORD_APPLIED]: {
    resourceType: string;
    key: RecordKey;
    target: SIDE;
    result: ApplyResult;
  };
  [RECONCILE_EVENT.APPLY_FAILED]: { resourceType: string; key: RecordKey; target: SIDE; error: string };

  // Safety events
  [RECONCILE_EVENT.SNAPSHOT_CREATED]: { backup: BackupLocation };
}

/**
 * Event emitter interface
 */
export interface EventEmitter {
  on<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): () => void;
  emit<K extends keyof ReconcileEvents>(event: K, data: ReconcileEvents[K]): void;
  off<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): void;
  removeAllListeners<K extends keyof ReconcileEvents>(event?: K): void;
}
