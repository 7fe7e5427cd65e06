/**
 * Main Reconciler class that orchestrates scan, detect and resolve
 */

import type { ConflictResolver, EventEmitter, ReconcileEvents, SourceAdapter } from './interfaces';
import type { ErrorEntry, RunReport, ScanResult, Timestamp } from './types';
import { RECONCILE_EVENT, RESOLUTION_STRATEGY, SIDE } from './enums';
import {
  ERROR_CODE,
  MalformedRecordError,
  StoreUnavailableError,
  UnknownResourceTypeError,
  errorCodeOf,
  errorMessage,
} from './errors';
import { ReconcileEventEmitter } from './event-emitter';
import { createResolver } from './conflict-resolvers';
import { scanIntersection } from './intersection-scanner';
import { detectConflicts } from './conflict-detector';
import { ResolutionEngine } from './resolution-engine';
import { DEFAULT_LOG_TAIL_SIZE, ReportBuilder } from './report-builder';
import { withSafetyGuard } from './safety-guard';
import { WriteLocks, mapConcurrent } from './async';
import { createChildLogger, createLogger, type Logger } from './logger';

export interface ReconcilerConfig {
  adapterA: SourceAdapter;
  adapterB: SourceAdapter;
  strategy?: RESOLUTION_STRATEGY;
  conflictResolver?: ConflictResolver; // takes precedence over strategy

  // Configuration options
  primarySide?: SIDE; // winner of latest_wins ties
  dryRun?: boolean; // plan only, issue no writes
  backup?: boolean; // snapshot each store before its first write
  backupDir?: string;
  logTailSize?: number; // log entries kept in the report
  concurrency?: number; // resource types processed at once
  logger?: Logger;
  clock?: () => Timestamp;
}

/**
 * Reconciles two stores over a list of resource types.
 *
 * Each resource type goes through scan, detect and resolve in turn. A
 * resource type whose scan fails is reported as failed and skipped; the
 * others carry on.
 */
export class Reconciler implements EventEmitter {
  private readonly adapterA: SourceAdapter;
  private readonly adapterB: SourceAdapter;
  private readonly resolver: ConflictResolver;
  private readonly eventEmitter: ReconcileEventEmitter;
  private readonly logger: Logger;

  // Configuration
  private readonly config: {
    strategy: string;
    primarySide: SIDE;
    dryRun: boolean;
    backup: boolean;
    backupDir: string | undefined;
    logTailSize: number;
    concurrency: number;
    clock: (() => Timestamp) | undefined;
  };

  constructor(config: ReconcilerConfig) {
    this.adapterA = config.adapterA;
    this.adapterB = config.adapterB;
    this.logger = config.logger ?? createLogger('reconciler');
    this.eventEmitter = new ReconcileEventEmitter(this.logger);

    const strategy = config.strategy ?? RESOLUTION_STRATEGY.LATEST_WINS;
    this.resolver = config.conflictResolver ?? createResolver(strategy);

    // Set defaults
    this.config = {
      strategy: config.conflictResolver ? 'custom' : strategy,
      primarySide: config.primarySide ?? SIDE.A,
      dryRun: config.dryRun ?? false,
      backup: config.backup ?? false,
      backupDir: config.backupDir,
      logTailSize: config.logTailSize ?? DEFAULT_LOG_TAIL_SIZE,
      concurrency: Math.max(1, config.concurrency ?? 1),
      clock: config.clock,
    };
  }

  /**
   * Reconcile every requested resource type and return the run report
   */
  async run(resourceTypes: readonly string[]): Promise<RunReport> {
    const requested = [...new Set(resourceTypes)];
    const report = new ReportBuilder({
      resourceTypes: requested,
      strategy: this.config.strategy,
      dryRun: this.config.dryRun,
      logTailSize: this.config.logTailSize,
      logger: this.logger,
      ...(this.config.clock ? { clock: this.config.clock } : {}),
    });

    this.emit(RECONCILE_EVENT.RUN_STARTED, {
      resourceTypes: requested,
      strategy: this.config.strategy,
      dryRun: this.config.dryRun,
    });
    report.log.info(
      `Reconciling ${requested.join(', ')} between ${this.adapterA.name} and ${this.adapterB.name} ` +
        `(strategy: ${this.config.strategy}${this.config.dryRun ? ', dry run' : ''})`
    );

    await withSafetyGuard(
      {
        enabled: this.config.backup && !this.config.dryRun,
        resourceTypes: requested,
        logger: this.logger,
        ...(this.config.backupDir ? { baseDir: this.config.backupDir } : {}),
        ...(this.config.clock ? { clock: this.config.clock } : {}),
        onSnapshot: backup => {
          report.log.info(`Snapshot of ${backup.store} written to ${backup.path}`);
          this.emit(RECONCILE_EVENT.SNAPSHOT_CREATED, { backup });
        },
      },
      async guard => {
        const engine = new ResolutionEngine({
          adapterA: this.adapterA,
          adapterB: this.adapterB,
          resolver: this.resolver,
          primarySide: this.config.primarySide,
          dryRun: this.config.dryRun,
          report,
          events: this.eventEmitter,
          guard,
          locks: new WriteLocks(),
        });

        await mapConcurrent(
          requested,
          resourceType => this.reconcileResource(resourceType, engine, report),
          this.config.concurrency
        );
      },
      backups => {
        for (const backup of backups) {
          report.addBackup(backup);
        }
      }
    );

    const result = report.build();
    this.logger.info(
      { status: result.status, totals: result.totals },
      `Reconciliation finished with status ${result.status}`
    );
    this.emit(RECONCILE_EVENT.RUN_COMPLETED, { report: result });
    return result;
  }

  /**
   * Event emitter interface
   */
  on<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): () => void {
    return this.eventEmitter.on(event, listener);
  }

  emit<K extends keyof ReconcileEvents>(event: K, data: ReconcileEvents[K]): void {
    this.eventEmitter.emit(event, data);
  }

  off<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): void {
    this.eventEmitter.off(event, listener);
  }

  removeAllListeners<K extends keyof ReconcileEvents>(event?: K): void {
    this.eventEmitter.removeAllListeners(event);
  }

  /**
   * Private helper methods
   */
  private async reconcileResource(resourceType: string, engine: ResolutionEngine, report: ReportBuilder): Promise<void> {
    const logger = createChildLogger(this.logger, { resourceType });

    const undeclared = [this.adapterA, this.adapterB].find(
      adapter => !adapter.listResourceTypes().includes(resourceType)
    );
    if (undeclared) {
      this.failResource(report, resourceType, new UnknownResourceTypeError(undeclared.name, resourceType));
      return;
    }

    let scan: ScanResult;
    try {
      scan = await scanIntersection(this.adapterA, this.adapterB, resourceType, {
        onMalformed: error => this.dropRecord(report, resourceType, error),
      });
    } catch (error) {
      this.failResource(report, resourceType, error);
      return;
    }

    const { partition } = scan;
    this.emit(RECONCILE_EVENT.SCAN_COMPLETED, { resourceType, partition });
    report.log.info(
      `Scanned ${resourceType}: ${partition.common.length} common, ` +
        `${partition.onlyA.length} only in A, ${partition.onlyB.length} only in B`,
      { resourceType }
    );

    const conflicts = detectConflicts(scan);
    report.recordScan(resourceType, partition, conflicts);
    for (const conflict of conflicts) {
      this.emit(RECONCILE_EVENT.CONFLICT_DETECTED, { resourceType, conflict });
      report.log.warn(`Conflict ${resourceType}/${conflict.key}: ${conflict.fieldsChanged.join(', ')}`, {
        resourceType,
        key: conflict.key,
      });
    }

    await engine.resolve(scan, conflicts);
    logger.debug({ conflicts: conflicts.length }, 'Resource type processed');
  }

  private dropRecord(report: ReportBuilder, resourceType: string, error: MalformedRecordError): void {
    const entry: ErrorEntry = { resourceType, code: error.code, message: error.message };

    report.recordError(entry);
    report.log.warn(entry.message, { resourceType });
    this.emit(RECONCILE_EVENT.RECORD_DROPPED, { resourceType, error: entry });
  }

  private failResource(report: ReportBuilder, resourceType: string, error: unknown): void {
    const entry: ErrorEntry = {
      resourceType,
      code: errorCodeOf(error, ERROR_CODE.STORE_UNAVAILABLE),
      message:
        error instanceof StoreUnavailableError || error instanceof UnknownResourceTypeError
          ? error.message
          : `Scan of "${resourceType}" failed: ${errorMessage(error)}`,
    };

    report.failResource(entry);
    report.log.error(entry.message, { resourceType });
    this.emit(RECONCILE_EVENT.RESOURCE_FAILED, { resourceType, error: entry });
  }
}
