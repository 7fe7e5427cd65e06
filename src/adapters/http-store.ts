/**
 * HTTP store adapter for REST resource collections
 */

import type { EnumerateOptions, SourceAdapter } from '../interfaces';
import type { ApplyResult, Payload, RecordKey, SyncRecord, Timestamp } from '../types';
import { APPLY_OPERATION } from '../enums';
import { ApplyFailedError, MalformedRecordError, StoreUnavailableError, errorMessage } from '../errors';
import { createRecord, isPlainObject, parseTimestamp } from '../utils';
import { createLogger, type Logger } from '../logger';

export interface HttpStoreConfig {
  name?: string;
  baseUrl: string;
  resources: readonly string[];
  apiKey?: string;
  timeout?: number;
  headers?: Record<string, string>;

  // Record layout
  keyField?: string; // Default: 'id'
  timestampFields?: readonly string[]; // first present field gives modifiedAt

  // Endpoint customization
  paths?: Record<string, string>; // Default: '/<resourceType>'
  enumerateMethod?: string; // Default: 'GET'
  applyMethod?: string; // Default: 'PUT' on '<path>/<key>'

  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * HTTP adapter that reads and writes a RESTful collection per resource type
 */
export class HttpStoreAdapter implements SourceAdapter {
  readonly name: string;
  readonly atomicUpsert = false;

  private readonly config: {
    baseUrl: string;
    resources: readonly string[];
    timeout: number;
    headers: Record<string, string>;
    keyField: string;
    timestampFields: readonly string[];
    paths: Record<string, string>;
    enumerateMethod: string;
    applyMethod: string;
    apiKey?: string;
  };
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(config: HttpStoreConfig) {
    this.name = config.name ?? config.baseUrl;
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      resources: [...config.resources],
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
      keyField: config.keyField ?? 'id',
      timestampFields: config.timestampFields ?? [],
      paths: config.paths ?? {},
      enumerateMethod: config.enumerateMethod ?? 'GET',
      applyMethod: config.applyMethod ?? 'PUT',
    };

    if (config.apiKey) {
      this.config.apiKey = config.apiKey;
    }

    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? createLogger('http-store');
  }

  listResourceTypes(): readonly string[] {
    return this.config.resources;
  }

  async enumerate(resourceType: string, options: EnumerateOptions = {}): Promise<Map<RecordKey, SyncRecord>> {
    let body: unknown;
    try {
      const response = await this.makeRequest(this.config.enumerateMethod, this.pathFor(resourceType));
      if (!response.ok) {
        throw new Error(`${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      throw new StoreUnavailableError(this.name, resourceType, errorMessage(error), error);
    }

    const items = extractItems(body, resourceType);
    if (!items) {
      throw new StoreUnavailableError(this.name, resourceType, 'response holds no record list');
    }

    const records = new Map<RecordKey, SyncRecord>();
    for (const item of items) {
      try {
        const record = this.toRecord(resourceType, item);
        if (records.has(record.key)) {
          this.logger.warn({ resourceType, key: record.key }, 'Duplicate key, keeping the last item');
        }
        records.set(record.key, record);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) throw error;
        this.logger.warn({ resourceType, err: error }, error.message);
        options.onMalformed?.(error);
      }
    }
    return records;
  }

  async apply(resourceType: string, record: SyncRecord): Promise<ApplyResult> {
    const path = `${this.pathFor(resourceType)}/${encodeURIComponent(record.key)}`;

    let response: Response;
    try {
      response = await this.makeRequest(this.config.applyMethod, path, record.payload);
    } catch (error) {
      throw new ApplyFailedError(this.name, resourceType, record.key, errorMessage(error), error);
    }

    if (!response.ok) {
      throw new ApplyFailedError(
        this.name,
        resourceType,
        record.key,
        `${response.status} ${response.statusText}`
      );
    }

    return {
      key: record.key,
      operation: response.status === 201 ? APPLY_OPERATION.CREATE : APPLY_OPERATION.UPDATE,
    };
  }

  private toRecord(resourceType: string, item: unknown): SyncRecord {
    if (!isPlainObject(item)) {
      throw new MalformedRecordError(this.name, resourceType, 'item is not an object');
    }

    const rawKey = item[this.config.keyField];
    if (typeof rawKey !== 'string' && typeof rawKey !== 'number') {
      throw new MalformedRecordError(this.name, resourceType, `item has no "${this.config.keyField}"`);
    }

    const payload: Payload = item;
    return createRecord(String(rawKey), payload, this.modifiedAt(payload));
  }

  private modifiedAt(payload: Payload): Timestamp | undefined {
    for (const field of this.config.timestampFields) {
      if (payload[field] !== undefined && payload[field] !== null) {
        return parseTimestamp(payload[field]);
      }
    }
    return undefined;
  }

  private pathFor(resourceType: string): string {
    return this.config.paths[resourceType] ?? `/${encodeURIComponent(resourceType)}`;
  }

  private async makeRequest(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `${this.config.baseUrl}${path}`;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.headers,
    };

    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const requestInit: RequestInit = {
        method,
        headers,
        signal: controller.signal,
      };

      if (body !== undefined) {
        requestInit.body = JSON.stringify(body);
      }

      return await this.fetchFn(url, requestInit);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`request timed out after ${this.config.timeout}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Record list from a response body: a bare array, or an object holding the
 * array under the resource type's name or under `data`
 */
function extractItems(body: unknown, resourceType: string): unknown[] | null {
  if (Array.isArray(body)) return body;
  if (isPlainObject(body)) {
    const named = body[resourceType];
    if (Array.isArray(named)) return named;
    const data = body['data'];
    if (Array.isArray(data)) return data;
  }
  return null;
}
