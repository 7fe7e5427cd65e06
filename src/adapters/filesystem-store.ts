/**
 * Filesystem store adapter: one directory tree per resource type
 */

import { cp, mkdir, readFile, stat, utimes, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';
import type { SourceAdapter } from '../interfaces';
import type { ApplyResult, RecordKey, SyncRecord } from '../types';
import { APPLY_OPERATION } from '../enums';
import { ApplyFailedError, StoreUnavailableError, errorMessage } from '../errors';
import { createRecord } from '../utils';
import { createLogger, type Logger } from '../logger';

export type FileEncoding = 'utf8' | 'base64';

export interface FilesystemStoreConfig {
  name?: string;
  root: string;
  resourceTypes: readonly string[];
  encoding?: FileEncoding; // Default: 'utf8'
  logger?: Logger;
}

/**
 * Records are files under `<root>/<resourceType>/`, keyed by their POSIX
 * path relative to that directory. The payload is `{ content }` and the
 * modification time is the file's mtime.
 */
export class FilesystemStoreAdapter implements SourceAdapter {
  readonly name: string;
  readonly atomicUpsert = false;

  private readonly root: string;
  private readonly resourceTypes: readonly string[];
  private readonly encoding: FileEncoding;
  private readonly logger: Logger;

  constructor(config: FilesystemStoreConfig) {
    this.root = resolve(config.root);
    this.name = config.name ?? this.root;
    this.resourceTypes = [...config.resourceTypes];
    this.encoding = config.encoding ?? 'utf8';
    this.logger = config.logger ?? createLogger('filesystem-store');
  }

  listResourceTypes(): readonly string[] {
    return this.resourceTypes;
  }

  async enumerate(resourceType: string): Promise<Map<RecordKey, SyncRecord>> {
    await this.assertRoot(resourceType);

    const directory = this.resourceDir(resourceType);
    const records = new Map<RecordKey, SyncRecord>();

    try {
      const info = await stat(directory);
      if (!info.isDirectory()) {
        throw new Error(`${directory} is not a directory`);
      }
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return records;
      throw new StoreUnavailableError(this.name, resourceType, errorMessage(error), error);
    }

    try {
      const files = await fg('**/*', { cwd: directory, dot: true, onlyFiles: true, followSymbolicLinks: false });
      for (const key of files.sort()) {
        const file = join(directory, ...key.split('/'));
        const [content, info] = await Promise.all([readFile(file), stat(file)]);
        records.set(key, createRecord(key, { content: content.toString(this.encoding) }, info.mtimeMs));
      }
    } catch (error) {
      throw new StoreUnavailableError(this.name, resourceType, errorMessage(error), error);
    }

    this.logger.debug({ resourceType, count: records.size }, 'Enumerated files');
    return records;
  }

  async apply(resourceType: string, record: SyncRecord): Promise<ApplyResult> {
    const content = record.payload['content'];
    if (typeof content !== 'string') {
      throw new ApplyFailedError(this.name, resourceType, record.key, 'payload has no string "content"');
    }

    const file = this.fileFor(resourceType, record.key);
    if (!file) {
      throw new ApplyFailedError(this.name, resourceType, record.key, 'key escapes the resource directory');
    }

    try {
      const exists = await stat(file).then(
        () => true,
        (error: unknown) => {
          if (hasErrorCode(error, 'ENOENT')) return false;
          throw error;
        }
      );

      await mkdir(dirname(file), { recursive: true });
      await writeFile(file, Buffer.from(content, this.encoding));

      // Keep the source's mtime so latest_wins sees the same timestamp on both sides
      if (record.modifiedAt !== undefined) {
        const seconds = record.modifiedAt / 1000;
        await utimes(file, seconds, seconds);
      }

      return { key: record.key, operation: exists ? APPLY_OPERATION.UPDATE : APPLY_OPERATION.CREATE };
    } catch (error) {
      throw new ApplyFailedError(this.name, resourceType, record.key, errorMessage(error), error);
    }
  }

  /**
   * Copy every requested resource directory under `destinationDir`
   */
  async snapshot(resourceTypes: readonly string[], destinationDir: string): Promise<string> {
    await mkdir(destinationDir, { recursive: true });

    for (const resourceType of resourceTypes) {
      const source = this.resourceDir(resourceType);
      try {
        await cp(source, join(destinationDir, resourceType), { recursive: true, preserveTimestamps: true });
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error;
      }
    }
    return destinationDir;
  }

  private async assertRoot(resourceType: string): Promise<void> {
    try {
      const info = await stat(this.root);
      if (!info.isDirectory()) {
        throw new Error(`${this.root} is not a directory`);
      }
    } catch (error) {
      throw new StoreUnavailableError(this.name, resourceType, errorMessage(error), error);
    }
  }

  private resourceDir(resourceType: string): string {
    return join(this.root, resourceType);
  }

  private fileFor(resourceType: string, key: RecordKey): string | null {
    const directory = this.resourceDir(resourceType);
    const file = resolve(directory, ...key.split('/'));
    const rel = relative(directory, file);
    if (rel === '' || isAbsolute(rel) || rel.split(sep).includes('..')) {
      return null;
    }
    return file;
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
