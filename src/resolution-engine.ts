/**
 * Applies a strategy to conflicts and propagates exclusive records
 */

import type { ConflictResolver, SourceAdapter } from './interfaces';
import type { Conflict, ConflictDecision, PlannedAction, ScanResult } from './types';
import type { ReportBuilder } from './report-builder';
import type { ReconcileEventEmitter } from './event-emitter';
import type { SafetyGuard } from './safety-guard';
import { RECONCILE_EVENT, SIDE, otherSide } from './enums';
import { ApplyFailedError, ERROR_CODE, errorCodeOf, errorMessage } from './errors';
import { WriteLocks } from './async';
import { cloneRecord } from './utils';

export interface ResolutionEngineConfig {
  adapterA: SourceAdapter;
  adapterB: SourceAdapter;
  resolver: ConflictResolver;
  primarySide: SIDE;
  dryRun: boolean;
  report: ReportBuilder;
  events?: ReconcileEventEmitter;
  guard?: SafetyGuard;
  locks?: WriteLocks;
}

/**
 * Converges both sides of one resource type at a time.
 *
 * Conflicts are settled first, in key order; then every onlyA key is created
 * in B and every onlyB key in A, whatever the strategy. A failed write is
 * counted and logged and the batch moves on.
 */
export class ResolutionEngine {
  private readonly locks: WriteLocks;

  constructor(private readonly config: ResolutionEngineConfig) {
    this.locks = config.locks ?? new WriteLocks();
  }

  async resolve(scan: ScanResult, conflicts: Conflict[]): Promise<void> {
    const actions = await this.plan(scan, conflicts);
    await this.execute(scan.resourceType, actions);
  }

  /**
   * Decide every write for a resource type without touching either store
   */
  async plan(scan: ScanResult, conflicts: Conflict[]): Promise<PlannedAction[]> {
    const { resourceType } = scan;
    const { report } = this.config;
    const actions: PlannedAction[] = [];

    for (const conflict of conflicts) {
      let decision: ConflictDecision;
      try {
        decision = await this.config.resolver.resolve(conflict, {
          resourceType,
          primarySide: this.config.primarySide,
        });
      } catch (error) {
        const message = `Resolver failed for ${resourceType}/${conflict.key}: ${errorMessage(error)}`;
        report.recordError({ resourceType, key: conflict.key, code: errorCodeOf(error, ERROR_CODE.APPLY_FAILED), message });
        report.log.error(message, { resourceType, key: conflict.key });
        continue;
      }

      if (decision === 'skip') {
        report.recordAction(resourceType, 'skipped');
        report.log.info(`Skipped ${resourceType}/${conflict.key} (resolver chose skip)`, {
          resourceType,
          key: conflict.key,
        });
        continue;
      }

      actions.push({
        kind: 'resolve',
        key: conflict.key,
        from: decision,
        record: decision === SIDE.A ? conflict.recordA : conflict.recordB,
      });
    }

    for (const key of scan.partition.onlyA) {
      const record = scan.recordsA.get(key);
      if (record) actions.push({ kind: 'propagate', key, from: SIDE.A, record });
    }
    for (const key of scan.partition.onlyB) {
      const record = scan.recordsB.get(key);
      if (record) actions.push({ kind: 'propagate', key, from: SIDE.B, record });
    }

    return actions;
  }

  /**
   * Issue the planned writes one after another, or only log them on a dry run
   */
  async execute(resourceType: string, actions: PlannedAction[]): Promise<void> {
    for (const action of actions) {
      if (this.config.dryRun) {
        this.config.report.recordAction(resourceType, 'skipped');
        this.config.report.log.info(describe(resourceType, action, false), { resourceType, key: action.key });
        continue;
      }
      await this.applyAction(resourceType, action);
    }
  }

  private async applyAction(resourceType: string, action: PlannedAction): Promise<void> {
    const { report, events, guard } = this.config;
    const target = otherSide(action.from);
    const adapter = target === SIDE.A ? this.config.adapterA : this.config.adapterB;

    try {
      await guard?.ensureSnapshot(adapter, target);
      const result = await this.locks.run(adapter, () => adapter.apply(resourceType, cloneRecord(action.record)));

      report.recordAction(resourceType, action.kind === 'resolve' ? 'updated' : 'created');
      report.log.info(describe(resourceType, action, true), { resourceType, key: action.key });
      events?.emit(RECONCILE_EVENT.RECORD_APPLIED, { resourceType, key: action.key, target, result });
    } catch (error) {
      const failure =
        error instanceof ApplyFailedError
          ? error
          : new ApplyFailedError(adapter.name, resourceType, action.key, errorMessage(error), error);

      report.recordError({ resourceType, key: action.key, code: failure.code, message: failure.message });
      report.log.error(failure.message, { resourceType, key: action.key });
      events?.emit(RECONCILE_EVENT.APPLY_FAILED, { resourceType, key: action.key, target, error: failure.message });
    }
  }
}

function describe(resourceType: string, action: PlannedAction, applied: boolean): string {
  const target = otherSide(action.from).toUpperCase();
  if (action.kind === 'resolve') {
    const verb = applied ? 'Updated' : 'Would update';
    return `${verb} ${resourceType}/${action.key} in ${target} (${action.from.toUpperCase()} wins)`;
  }
  const verb = applied ? 'Created' : 'Would create';
  return `${verb} ${resourceType}/${action.key} in ${target}`;
}
