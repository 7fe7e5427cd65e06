/**
 * Conflict detection over the common keys of a scan
 */

import type { Conflict, ScanResult } from './types';
import { diffFields } from './utils';

/**
 * Compare fingerprints for every common key and describe the mismatches.
 * Keys come out in the partition's sorted order.
 */
export function detectConflicts(scan: ScanResult): Conflict[] {
  const conflicts: Conflict[] = [];

  for (const key of scan.partition.common) {
    const recordA = scan.recordsA.get(key);
    const recordB = scan.recordsB.get(key);
    if (!recordA || !recordB || recordA.fingerprint === recordB.fingerprint) {
      continue;
    }

    const fieldsChanged = diffFields(recordA.payload, recordB.payload);
    // Adapter-supplied fingerprints can disagree over equal payloads
    if (fieldsChanged.length === 0) {
      continue;
    }

    conflicts.push({ key, recordA, recordB, fieldsChanged });
  }

  return conflicts;
}
