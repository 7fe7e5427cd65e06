/**
 * Report destinations
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { ReportEmitter } from './interfaces';
import type { RunReport } from './types';

/**
 * Writes the run report as pretty-printed JSON, creating parent directories
 */
export class JsonFileReportEmitter implements ReportEmitter {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async emit(report: RunReport): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  }
}
