/**
 * Three-way key partition between two stores
 */

import type { EnumerateOptions, SourceAdapter } from './interfaces';
import type { Partition, RecordKey, ScanResult, SyncRecord } from './types';
import { StoreUnavailableError, errorMessage } from './errors';
import { compareKeys } from './utils';

/**
 * Split two key sets into onlyA / onlyB / common, each sorted
 */
export function partitionKeys(keysA: Iterable<RecordKey>, keysB: Iterable<RecordKey>): Partition {
  const setA = new Set(keysA);
  const setB = new Set(keysB);

  const onlyA: RecordKey[] = [];
  const common: RecordKey[] = [];
  for (const key of setA) {
    if (setB.has(key)) {
      common.push(key);
    } else {
      onlyA.push(key);
    }
  }

  const onlyB: RecordKey[] = [];
  for (const key of setB) {
    if (!setA.has(key)) {
      onlyB.push(key);
    }
  }

  return {
    onlyA: onlyA.sort(compareKeys),
    onlyB: onlyB.sort(compareKeys),
    common: common.sort(compareKeys),
  };
}

/**
 * Enumerate both sides of a resource type and partition their keys.
 * Both reads run concurrently and must both finish; if either fails the
 * scan fails as a whole.
 */
export async function scanIntersection(
  adapterA: SourceAdapter,
  adapterB: SourceAdapter,
  resourceType: string,
  options: EnumerateOptions = {}
): Promise<ScanResult> {
  const [resultA, resultB] = await Promise.allSettled([
    adapterA.enumerate(resourceType, options),
    adapterB.enumerate(resourceType, options),
  ]);

  const recordsA = unwrap(resultA, adapterA, resourceType);
  const recordsB = unwrap(resultB, adapterB, resourceType);

  return {
    resourceType,
    partition: partitionKeys(recordsA.keys(), recordsB.keys()),
    recordsA,
    recordsB,
  };
}

function unwrap(
  result: PromiseSettledResult<Map<RecordKey, SyncRecord>>,
  adapter: SourceAdapter,
  resourceType: string
): Map<RecordKey, SyncRecord> {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  if (result.reason instanceof StoreUnavailableError) {
    throw result.reason;
  }
  throw new StoreUnavailableError(adapter.name, resourceType, errorMessage(result.reason), result.reason);
}
