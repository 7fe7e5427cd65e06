/**
 * Invocation parameters and the config-driven entry point
 */

import { z } from 'zod';
import type { ReportEmitter, SourceAdapter } from './interfaces';
import type { RunReport, Timestamp } from './types';
import { RESOLUTION_STRATEGY, RUN_STATUS, SIDE } from './enums';
import { ConfigError, errorMessage } from './errors';
import { Reconciler } from './reconciler';
import { JsonFileReportEmitter } from './report-emitter';
import { DEFAULT_LOG_TAIL_SIZE } from './report-builder';
import { FilesystemStoreAdapter, HttpStoreAdapter, PostgresStoreAdapter, type Queryable } from './adapters';
import { createLogger, type Logger } from './logger';

const SqlIdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/, 'must be a plain SQL identifier');

const ResourceListSchema = z.array(z.string().min(1)).min(1);

export const HttpStoreSchema = z.object({
  kind: z.literal('http'),
  name: z.string().min(1).optional(),
  baseUrl: z.string().url(),
  resources: ResourceListSchema,
  apiKey: z.string().min(1).optional(),
  headers: z.record(z.string(), z.string()).optional(),
  timeout: z.number().int().positive().optional(),
  keyField: z.string().min(1).optional(),
  timestampFields: z.array(z.string().min(1)).optional(),
  paths: z.record(z.string(), z.string().startsWith('/')).optional(),
  applyMethod: z.enum(['PUT', 'POST', 'PATCH']).optional(),
});

export const PostgresTableConfigSchema = z.object({
  table: SqlIdentifierSchema,
  keyColumn: SqlIdentifierSchema,
  columns: z.array(SqlIdentifierSchema).min(1),
  modifiedColumn: SqlIdentifierSchema.optional(),
});

export const PostgresStoreSchema = z.object({
  kind: z.literal('postgres'),
  name: z.string().min(1).optional(),
  connectionString: z.string().min(1),
  tables: z.record(z.string().min(1), PostgresTableConfigSchema),
});

export const FilesystemStoreSchema = z.object({
  kind: z.literal('filesystem'),
  name: z.string().min(1).optional(),
  root: z.string().min(1),
  resourceTypes: ResourceListSchema,
  encoding: z.enum(['utf8', 'base64']).optional(),
});

export const StoreConfigSchema = z.discriminatedUnion('kind', [
  HttpStoreSchema,
  PostgresStoreSchema,
  FilesystemStoreSchema,
]);

export const ReconcileConfigSchema = z.object({
  source: StoreConfigSchema,
  target: StoreConfigSchema,
  resourceTypes: ResourceListSchema,
  strategy: z.nativeEnum(RESOLUTION_STRATEGY).default(RESOLUTION_STRATEGY.LATEST_WINS),
  primarySide: z.nativeEnum(SIDE).default(SIDE.A),
  dryRun: z.boolean().default(false),
  backup: z.boolean().default(false),
  reportDestination: z.string().min(1).optional(),
  logTailSize: z.number().int().nonnegative().default(DEFAULT_LOG_TAIL_SIZE),
  concurrency: z.number().int().positive().default(1),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type ReconcileConfigInput = z.input<typeof ReconcileConfigSchema>;
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;

/**
 * Validate invocation parameters, listing every problem at once
 */
export function loadConfig(input: unknown): ReconcileConfig {
  const result = ReconcileConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export interface AdapterFactoryOptions {
  logger?: Logger;
  fetch?: typeof fetch;
  queryable?: Queryable; // replaces the pg pool of a postgres store
}

export function createAdapter(config: StoreConfig, options: AdapterFactoryOptions = {}): SourceAdapter {
  const logger = options.logger ?? createLogger(`${config.kind}-store`);

  switch (config.kind) {
    case 'http':
      return new HttpStoreAdapter({
        ...config,
        logger,
        ...(options.fetch ? { fetch: options.fetch } : {}),
      });
    case 'postgres':
      return new PostgresStoreAdapter({
        ...config,
        logger,
        ...(options.queryable ? { client: options.queryable } : {}),
      });
    case 'filesystem':
      return new FilesystemStoreAdapter({ ...config, logger });
    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown store kind: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export interface ReconcileFromConfigOptions {
  logger?: Logger;
  clock?: () => Timestamp;
  backupDir?: string;
  emitter?: ReportEmitter; // used instead of reportDestination
  source?: AdapterFactoryOptions;
  target?: AdapterFactoryOptions;
}

/**
 * Validate `input`, build both stores, run once and deliver the report
 */
export async function reconcileFromConfig(
  input: unknown,
  options: ReconcileFromConfigOptions = {}
): Promise<RunReport> {
  const config = loadConfig(input);
  const logger = options.logger ?? createLogger('reconciler');

  const adapterA = createAdapter(config.source, { logger, ...options.source });
  const adapterB = createAdapter(config.target, { logger, ...options.target });

  try {
    const reconciler = new Reconciler({
      adapterA,
      adapterB,
      strategy: config.strategy,
      primarySide: config.primarySide,
      dryRun: config.dryRun,
      backup: config.backup,
      logTailSize: config.logTailSize,
      concurrency: config.concurrency,
      logger,
      ...(options.backupDir ? { backupDir: options.backupDir } : {}),
      ...(options.clock ? { clock: options.clock } : {}),
    });

    const report = await reconciler.run(config.resourceTypes);

    const emitter =
      options.emitter ??
      (config.reportDestination ? new JsonFileReportEmitter(config.reportDestination) : undefined);
    if (emitter) {
      await emitter.emit(report);
    }
    return report;
  } finally {
    const closed = await Promise.allSettled([adapterA.close?.(), adapterB.close?.()]);
    for (const result of closed) {
      if (result.status === 'rejected') {
        logger.warn({ err: result.reason }, `Closing a store failed: ${errorMessage(result.reason)}`);
      }
    }
  }
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(report: RunReport): number {
  return report.status === RUN_STATUS.FAILED ? 1 : 0;
}
