/**
 * Integrity Verifier
 *
 * Read-only pass over the whole store: recomputes every record's hash,
 * collects rows that no longer decode, lineage anomalies and dangling
 * references. Reports everything it finds; never repairs.
 */

import { checkRecordHash } from '../hashing/CanonicalHasher.js';
import type { Analysis, EntityType, TypedRecord } from '../core/types.js';
import { LineageGraph, type LineageAnomaly } from '../lineage/LineageGraph.js';
import type { DanglingReference, ScannedRecord } from '../storage/LedgerStorage.js';

/** Read side of the store the verifier needs */
export interface VerificationSource {
  scanRecords(): Iterable<ScannedRecord>;
  findDanglingReferences(): DanglingReference[];
}

export interface HashMismatch {
  entityType: EntityType;
  id: string;
  expected: string;
  actual: string;
}

export interface UnreadableRecord {
  entityType: EntityType;
  id: string;
  reason: string;
}

export interface VerificationReport {
  checkedAt: string;
  recordsChecked: number;
  countsByType: Record<EntityType, number>;
  mismatches: HashMismatch[];
  unreadable: UnreadableRecord[];
  lineageAnomalies: LineageAnomaly[];
  danglingReferences: DanglingReference[];
  ok: boolean;
}

function hashCheck(entry: TypedRecord): { expected: string; actual: string; valid: boolean } {
  switch (entry.entityType) {
    case 'snapshot':
      return checkRecordHash('snapshot', entry.record);
    case 'analysis':
      return checkRecordHash('analysis', entry.record);
    case 'outcome':
      return checkRecordHash('outcome', entry.record);
    case 'evaluation':
      return checkRecordHash('evaluation', entry.record);
    case 'proposal':
      return checkRecordHash('proposal', entry.record);
  }
}

export class IntegrityVerifier {
  private source: VerificationSource;

  constructor(source: VerificationSource) {
    this.source = source;
  }

  verify(): VerificationReport {
    const countsByType: Record<EntityType, number> = {
      snapshot: 0,
      analysis: 0,
      outcome: 0,
      evaluation: 0,
      proposal: 0
    };
    const mismatches: HashMismatch[] = [];
    const unreadable: UnreadableRecord[] = [];
    const analyses: Analysis[] = [];
    let recordsChecked = 0;

    for (const scanned of this.source.scanRecords()) {
      recordsChecked++;
      countsByType[scanned.entityType] += 1;

      if (!scanned.readable) {
        unreadable.push({ entityType: scanned.entityType, id: scanned.id, reason: scanned.error.reason });
        continue;
      }

      const check = hashCheck(scanned);
      if (!check.valid) {
        mismatches.push({ entityType: scanned.entityType, id: scanned.id, expected: check.expected, actual: check.actual });
      }
      if (scanned.entityType === 'analysis') {
        analyses.push(scanned.record);
      }
    }

    const lineageAnomalies = LineageGraph.findAnomalies(analyses);
    const danglingReferences = this.source.findDanglingReferences();

    if (mismatches.length > 0 || unreadable.length > 0) {
      console.log(`[IntegrityVerifier] ${mismatches.length} hash mismatch(es), ${unreadable.length} unreadable record(s)`);
    }

    return {
      checkedAt: new Date().toISOString(),
      recordsChecked,
      countsByType,
      mismatches,
      unreadable,
      lineageAnomalies,
      danglingReferences,
      ok: mismatches.length === 0
        && unreadable.length === 0
        && lineageAnomalies.length === 0
        && danglingReferences.length === 0
    };
  }
}
