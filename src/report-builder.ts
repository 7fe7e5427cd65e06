/**
 * Report aggregation and the per-run log collector
 */

import type { Logger } from './logger';
import type {
  ActionCounts,
  BackupLocation,
  Conflict,
  ErrorEntry,
  LogEntry,
  LogLevel,
  Partition,
  RecordKey,
  ResourceReport,
  RunReport,
  Timestamp,
} from './types';
import { RESOURCE_STATUS, RUN_STATUS } from './enums';
import { now } from './utils';

export const DEFAULT_LOG_TAIL_SIZE = 10;

export type ActionOutcome = 'updated' | 'created' | 'skipped';

/**
 * Collects log entries for one run and forwards them to a structured logger
 */
export class LogCollector {
  private readonly entries: LogEntry[] = [];

  constructor(
    private readonly logger?: Logger,
    private readonly clock: () => Timestamp = now
  ) {}

  add(level: LogLevel, message: string, context: { resourceType?: string; key?: RecordKey } = {}): void {
    const entry: LogEntry = { at: this.clock(), level, message };
    if (context.resourceType !== undefined) entry.resourceType = context.resourceType;
    if (context.key !== undefined) entry.key = context.key;
    this.entries.push(entry);

    this.logger?.[level](context, message);
  }

  info(message: string, context?: { resourceType?: string; key?: RecordKey }): void {
    this.add('info', message, context);
  }

  warn(message: string, context?: { resourceType?: string; key?: RecordKey }): void {
    this.add('warn', message, context);
  }

  error(message: string, context?: { resourceType?: string; key?: RecordKey }): void {
    this.add('error', message, context);
  }

  // Most recent `size` entries, oldest first
  tail(size: number): LogEntry[] {
    if (size <= 0) return [];
    return this.entries.slice(-size);
  }

  get size(): number {
    return this.entries.length;
  }
}

export interface ReportBuilderOptions {
  resourceTypes: readonly string[];
  strategy: string;
  dryRun: boolean;
  logTailSize?: number;
  logger?: Logger;
  clock?: () => Timestamp;
}

/**
 * Aggregates counts, errors and the log tail into a RunReport
 */
export class ReportBuilder {
  readonly log: LogCollector;

  private readonly resources = new Map<string, ResourceReport>();
  private readonly errors: ErrorEntry[] = [];
  private readonly backups: BackupLocation[] = [];
  private readonly clock: () => Timestamp;
  private readonly startedAt: Timestamp;
  private readonly logTailSize: number;

  constructor(private readonly options: ReportBuilderOptions) {
    this.clock = options.clock ?? now;
    this.log = new LogCollector(options.logger, this.clock);
    this.startedAt = this.clock();
    this.logTailSize = options.logTailSize ?? DEFAULT_LOG_TAIL_SIZE;

    // Report order follows the requested order whatever order work finishes in
    for (const resourceType of options.resourceTypes) {
      this.resources.set(resourceType, emptyResource(resourceType, options.dryRun));
    }
  }

  recordScan(resourceType: string, partition: Partition, conflicts: Conflict[]): void {
    const resource = this.resource(resourceType);
    resource.common = partition.common.length;
    resource.onlyA = partition.onlyA.length;
    resource.onlyB = partition.onlyB.length;
    resource.conflicts = conflicts.length;
    resource.conflictDetails = conflicts.map(conflict => ({
      key: conflict.key,
      fieldsChanged: [...conflict.fieldsChanged],
    }));
  }

  recordAction(resourceType: string, outcome: ActionOutcome): void {
    this.resource(resourceType)[outcome] += 1;
  }

  recordError(entry: ErrorEntry): void {
    this.resource(entry.resourceType).errors += 1;
    this.errors.push(entry);
  }

  failResource(entry: ErrorEntry): void {
    const resource = this.resource(entry.resourceType);
    resource.status = RESOURCE_STATUS.FAILED;
    resource.failure = entry;
    this.recordError(entry);
  }

  addBackup(backup: BackupLocation): void {
    this.backups.push(backup);
  }

  build(): RunReport {
    const resources = [...this.resources.values()].map(resource => ({
      ...resource,
      conflictDetails: [...resource.conflictDetails],
    }));

    const totals: ActionCounts = { updated: 0, created: 0, skipped: 0, errors: 0 };
    for (const resource of resources) {
      totals.updated += resource.updated;
      totals.created += resource.created;
      totals.skipped += resource.skipped;
      totals.errors += resource.errors;
    }

    return {
      status: computeStatus(resources, totals),
      strategy: this.options.strategy,
      dryRun: this.options.dryRun,
      startedAt: this.startedAt,
      finishedAt: this.clock(),
      resources,
      totals,
      errors: [...this.errors],
      backups: [...this.backups],
      log: this.log.tail(this.logTailSize),
    };
  }

  private resource(resourceType: string): ResourceReport {
    let resource = this.resources.get(resourceType);
    if (!resource) {
      resource = emptyResource(resourceType, this.options.dryRun);
      this.resources.set(resourceType, resource);
    }
    return resource;
  }
}

function emptyResource(resourceType: string, dryRun: boolean): ResourceReport {
  return {
    resourceType,
    status: dryRun ? RESOURCE_STATUS.PLANNED : RESOURCE_STATUS.RECONCILED,
    common: 0,
    onlyA: 0,
    onlyB: 0,
    conflicts: 0,
    conflictDetails: [],
    updated: 0,
    created: 0,
    skipped: 0,
    errors: 0,
  };
}

/**
 * failed: every resource type failed; partial: any failure or error;
 * success otherwise
 */
export function computeStatus(resources: ResourceReport[], totals: ActionCounts): RUN_STATUS {
  const failed = resources.filter(resource => resource.status === RESOURCE_STATUS.FAILED).length;
  if (resources.length > 0 && failed === resources.length) {
    return RUN_STATUS.FAILED;
  }
  if (failed > 0 || totals.errors > 0) {
    return RUN_STATUS.PARTIAL;
  }
  return RUN_STATUS.SUCCESS;
}
