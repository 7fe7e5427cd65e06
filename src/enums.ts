/**
 * Enumeration for the two sides of a reconciliation
 */
export enum SIDE {
  A = 'a',
  B = 'b',
}

/**
 * Enumeration for conflict resolution strategies
 */
export enum RESOLUTION_STRATEGY {
  A_WINS = 'a_wins',
  B_WINS = 'b_wins',
  LATEST_WINS = 'latest_wins',
}

/**
 * Enumeration for reconciler event types
 */
export enum RECONCILE_EVENT {
  // Run events
  RUN_STARTED = 'run:started',
  RUN_COMPLETED = 'run:completed',

  // Resource events
  SCAN_COMPLETED = 'scan:completed',
  RESOURCE_FAILED = 'resource:failed',
  RECORD_DROPPED = 'record:dropped',

  // Conflict events
  CONFLICT_DETECTED = 'conflict:detected',

  // Write events
  RECORD_APPLIED = 'record:applied',
  APPLY_FAILED = 'apply:failed',

  // Safety events
  SNAPSHOT_CREATED = 'snapshot:created',
}

/**
 * Enumeration for what an adapter did on apply
 */
export enum APPLY_OPERATION {
  CREATE = 'create',
  UPDATE = 'update',
}

/**
 * Enumeration for per-resource outcome
 */
export enum RESOURCE_STATUS {
  RECONCILED = 'reconciled',
  PLANNED = 'planned', // dry run
  FAILED = 'failed',
}

/**
 * Enumeration for overall run outcome
 */
export enum RUN_STATUS {
  SUCCESS = 'success',
  PARTIAL = 'partial',
  FAILED = 'failed',
}

export function otherSide(side: SIDE): SIDE {
  return side === SIDE.A ? SIDE.B : SIDE.A;
}
