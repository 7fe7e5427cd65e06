/**
 * Conflict resolution strategies
 */

import type { ConflictResolver } from './interfaces';
import type { Conflict, ConflictDecision, ConflictResolutionContext } from './types';
import { RESOLUTION_STRATEGY, SIDE } from './enums';

/**
 * One side always wins (a_wins / b_wins)
 */
export class SideWinsResolver implements ConflictResolver {
  constructor(private readonly winner: SIDE) {}

  resolve(): Promise<ConflictDecision> {
    return Promise.resolve(this.winner);
  }
}

/**
 * Latest-write-wins: the side with the strictly greater modification time
 * wins. Equal times, including two missing ones, go to the primary side.
 */
export class LatestWinsResolver implements ConflictResolver {
  resolve(conflict: Conflict, context: ConflictResolutionContext): Promise<ConflictDecision> {
    const timeA = conflict.recordA.modifiedAt ?? 0;
    const timeB = conflict.recordB.modifiedAt ?? 0;

    if (timeA > timeB) return Promise.resolve(SIDE.A);
    if (timeB > timeA) return Promise.resolve(SIDE.B);
    return Promise.resolve(context.primarySide);
  }
}

/**
 * Custom conflict resolver that allows user-defined resolution logic
 */
export class CustomConflictResolver implements ConflictResolver {
  constructor(
    private readonly resolutionFn: (
      conflict: Conflict,
      context: ConflictResolutionContext
    ) => ConflictDecision | Promise<ConflictDecision>
  ) {}

  async resolve(conflict: Conflict, context: ConflictResolutionContext): Promise<ConflictDecision> {
    return await this.resolutionFn(conflict, context);
  }
}

export function createResolver(strategy: RESOLUTION_STRATEGY): ConflictResolver {
  switch (strategy) {
    case RESOLUTION_STRATEGY.A_WINS:
      return new SideWinsResolver(SIDE.A);
    case RESOLUTION_STRATEGY.B_WINS:
      return new SideWinsResolver(SIDE.B);
    case RESOLUTION_STRATEGY.LATEST_WINS:
      return new LatestWinsResolver();
  }
}
