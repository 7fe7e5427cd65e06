/**
 * Pre-mutation snapshots of target stores
 *
 * Before the first write against a store in a run, its current state is
 * copied to a fresh temporary directory. Nothing is rolled back
 * automatically; the copy is there for an operator to recover from.
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from './logger';
import type { SourceAdapter } from './interfaces';
import type { BackupLocation, Timestamp } from './types';
import { SIDE } from './enums';
import { canonicalize, now } from './utils';
import { errorMessage } from './errors';

export const BACKUP_DIR_PREFIX = 'record-reconciler-backup-';

export interface SafetyGuardOptions {
  enabled: boolean;
  resourceTypes: readonly string[];
  baseDir?: string; // defaults to the OS temp directory
  logger?: Logger;
  clock?: () => Timestamp;
  onSnapshot?: (backup: BackupLocation) => void;
}

type SnapshotEntry = { records: Array<{ key: string; payload: unknown; modifiedAt?: number }> } | { unavailable: string };

export class SafetyGuard {
  private readonly snapshots = new Map<SourceAdapter, Promise<BackupLocation>>();
  private directory: Promise<string> | undefined;
  private released = false;

  constructor(private readonly options: SafetyGuardOptions) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Resolve once `adapter` has been snapshotted in this run. A failed
   * snapshot keeps failing, so no write reaches a store without its copy.
   */
  async ensureSnapshot(adapter: SourceAdapter, side: SIDE): Promise<void> {
    if (!this.options.enabled) return;
    if (this.released) {
      throw new Error('Safety guard already released');
    }

    let snapshot = this.snapshots.get(adapter);
    if (!snapshot) {
      snapshot = this.takeSnapshot(adapter, side);
      this.snapshots.set(adapter, snapshot);
    }
    await snapshot;
  }

  /**
   * Wait for in-flight snapshots and hand back every completed location
   */
  async release(): Promise<BackupLocation[]> {
    this.released = true;
    const settled = await Promise.allSettled(this.snapshots.values());

    const backups: BackupLocation[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        backups.push(result.value);
      }
    }
    return backups;
  }

  private async takeSnapshot(adapter: SourceAdapter, side: SIDE): Promise<BackupLocation> {
    const directory = await this.backupDirectory();
    const baseName = `${side}-${safeFileName(adapter.name)}`;

    const path = adapter.snapshot
      ? await adapter.snapshot(this.options.resourceTypes, join(directory, baseName))
      : await this.writeJsonSnapshot(adapter, join(directory, `${baseName}.json`));

    const backup: BackupLocation = { store: adapter.name, path };
    this.options.logger?.info({ store: adapter.name, path }, 'Snapshot written');
    this.options.onSnapshot?.(backup);
    return backup;
  }

  private async writeJsonSnapshot(adapter: SourceAdapter, file: string): Promise<string> {
    const resources: Record<string, SnapshotEntry> = {};

    for (const resourceType of this.options.resourceTypes) {
      try {
        const records = await adapter.enumerate(resourceType);
        resources[resourceType] = {
          records: [...records.values()].map(record => ({
            key: record.key,
            payload: canonicalize(record.payload),
            ...(record.modifiedAt !== undefined ? { modifiedAt: record.modifiedAt } : {}),
          })),
        };
      } catch (error) {
        // An unreadable resource type is never written to in this run either
        resources[resourceType] = { unavailable: errorMessage(error) };
      }
    }

    const clock = this.options.clock ?? now;
    const document = { store: adapter.name, takenAt: new Date(clock()).toISOString(), resources };
    await writeFile(file, JSON.stringify(document, null, 2), 'utf8');
    return file;
  }

  private backupDirectory(): Promise<string> {
    if (!this.directory) {
      this.directory = mkdtemp(join(this.options.baseDir ?? tmpdir(), BACKUP_DIR_PREFIX));
    }
    return this.directory;
  }
}

/**
 * Run `fn` with a guard that is released on every exit path. `onRelease`
 * receives the backup locations whether `fn` succeeded or threw.
 */
export async function withSafetyGuard<T>(
  options: SafetyGuardOptions,
  fn: (guard: SafetyGuard) => Promise<T>,
  onRelease?: (backups: BackupLocation[]) => void
): Promise<T> {
  const guard = new SafetyGuard(options);
  try {
    return await fn(guard);
  } finally {
    const backups = await guard.release();
    onRelease?.(backups);
  }
}

function safeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, '_');
}
