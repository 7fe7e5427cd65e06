/**
 * Error hierarchy for the reconciler
 */

export enum ERROR_CODE {
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  APPLY_FAILED = 'APPLY_FAILED',
  MALFORMED_RECORD = 'MALFORMED_RECORD',
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_RESOURCE_TYPE = 'UNKNOWN_RESOURCE_TYPE',
}

export abstract class ReconcileError extends Error {
  readonly code: ERROR_CODE;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ERROR_CODE,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * A store could not be read (connectivity or permission). Fatal for the
 * resource type being scanned, other resource types continue.
 */
export class StoreUnavailableError extends ReconcileError {
  constructor(store: string, resourceType: string, reason: string, cause?: unknown) {
    super(
      `${store} unavailable for "${resourceType}": ${reason}`,
      ERROR_CODE.STORE_UNAVAILABLE,
      { store, resourceType },
      { cause }
    );
  }
}

/**
 * A single-key write failed
 */
export class ApplyFailedError extends ReconcileError {
  constructor(store: string, resourceType: string, key: string, reason: string, cause?: unknown) {
    super(
      `Failed to apply ${resourceType}/${key} to ${store}: ${reason}`,
      ERROR_CODE.APPLY_FAILED,
      { store, resourceType, key },
      { cause }
    );
  }
}

/**
 * A fetched item had no identity key or no payload
 */
export class MalformedRecordError extends ReconcileError {
  constructor(store: string, resourceType: string, reason: string) {
    super(
      `Malformed record from ${store} in "${resourceType}": ${reason}`,
      ERROR_CODE.MALFORMED_RECORD,
      { store, resourceType }
    );
  }
}

export class ConfigError extends ReconcileError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid reconcile configuration: ${issues.join('; ')}`, ERROR_CODE.INVALID_CONFIG, {
      issues,
    });
    this.issues = issues;
  }
}

export class UnknownResourceTypeError extends ReconcileError {
  constructor(store: string, resourceType: string) {
    super(
      `${store} does not declare resource type "${resourceType}"`,
      ERROR_CODE.UNKNOWN_RESOURCE_TYPE,
      { store, resourceType }
    );
  }
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCodeOf(error: unknown, fallback: ERROR_CODE): ERROR_CODE {
  return error instanceof ReconcileError ? error.code : fallback;
}
