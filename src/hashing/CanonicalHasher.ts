/**
 * Canonical Hasher
 *
 * Content fingerprints for ledger records. Values are written as canonical
 * JSON (sorted keys, no whitespace, shortest round-trip numbers) and hashed
 * with SHA-256. Structurally equal records always produce the same digest,
 * whatever order their fields were assigned in.
 */

import { createHash } from 'crypto';
import { SerializationError } from '../core/errors.js';
import type {
  EntityRecordMap,
  EntityType,
  JsonObject,
  JsonValue,
  LedgerRecord
} from '../core/types.js';

export const HASH_ALGORITHM = 'sha256';

/**
 * Serialize a value to canonical JSON.
 *
 * Object members holding `undefined` are dropped, Dates become ISO strings,
 * -0 is written as 0. Non-finite numbers, functions, symbols and bigints
 * throw SerializationError.
 */
export function canonicalize(value: unknown): string {
  return write(value, '');
}

function write(value: unknown, path: string): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(path, `non-finite number ${String(value)}`);
      }
      // JSON.stringify already yields the shortest round-trip form; -0 prints as 0
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new SerializationError(path, `unsupported type ${typeof value}`);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError(path, 'invalid date');
    }
    return JSON.stringify(value.toISOString());
  }

  if (Array.isArray(value)) {
    const items = value.map((item, index) => {
      if (item === undefined) {
        throw new SerializationError(`${path}[${index}]`, 'undefined array element');
      }
      return write(item, `${path}[${index}]`);
    });
    return `[${items.join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const members = entries.map(
    ([key, member]) => `${JSON.stringify(key)}:${write(member, path ? `${path}.${key}` : key)}`
  );
  return `{${members.join(',')}}`;
}

/**
 * SHA-256 of the canonical form, lowercase hex
 */
export function hashValue(value: unknown): string {
  return createHash(HASH_ALGORITHM).update(canonicalize(value), 'utf8').digest('hex');
}

/**
 * Parse canonical (or any) JSON back into a plain value
 */
export function parseJson(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(text);
  return parsed;
}

// ==========================================
// PER-ENTITY FIELD SETS
// ==========================================

type HashableFields = { [K in EntityType]: (record: Omit<EntityRecordMap[K], 'hash'>) => JsonObject };

/**
 * The fields each entity's hash covers. Generated ids are left out so that the
 * same content always lands on the same hash; so are the creation stamps of
 * derived records, which makes re-running an analysis or evaluation idempotent.
 */
const HASHABLE_FIELDS: HashableFields = {
  snapshot: (s) => ({
    gameId: s.gameId,
    collectedAt: s.collectedAt,
    schemaVersion: s.schemaVersion,
    sourceVersions: { ...s.sourceVersions },
    rawPayloads: { ...s.rawPayloads },
    normalizedFields: s.normalizedFields
  }),
  analysis: (a) => ({
    analysisVersion: a.analysisVersion,
    codeVersion: a.codeVersion,
    modelVersion: a.modelVersion,
    parentAnalysisId: a.parentAnalysisId,
    inputSnapshotIds: [...a.inputSnapshotIds],
    derivedFeatures: a.derivedFeatures,
    conclusions: a.conclusions,
    recommendedActions: a.recommendedActions.map((action) => ({ ...action }))
  }),
  outcome: (o) => ({
    gameId: o.gameId,
    occurredAt: o.occurredAt,
    finalScore: { home: o.finalScore.home, away: o.finalScore.away },
    winner: o.winner,
    statsSummary: o.statsSummary,
    source: o.source,
    revision: o.revision,
    supersedesOutcomeId: o.supersedesOutcomeId
  }),
  evaluation: (e) => ({
    analysisId: e.analysisId,
    gameId: e.gameId,
    outcomeId: e.outcomeId,
    metrics: {
      brierScore: e.metrics.brierScore,
      logLoss: e.metrics.logLoss,
      roi: e.metrics.roi,
      edgeRealized: e.metrics.edgeRealized
    },
    notes: e.notes
  }),
  proposal: (p) => ({
    basedOnEvaluationIds: [...p.basedOnEvaluationIds],
    proposalText: p.proposalText,
    suggestedSchemaAdditions: p.suggestedSchemaAdditions,
    suggestedModules: p.suggestedModules ? [...p.suggestedModules] : null,
    expectedImpact: p.expectedImpact,
    status: p.status
  })
};

export function hashableFields<K extends EntityType>(
  entityType: K,
  record: Omit<EntityRecordMap[K], 'hash'>
): JsonObject {
  const select: (r: Omit<EntityRecordMap[K], 'hash'>) => JsonObject = HASHABLE_FIELDS[entityType];
  return select(record);
}

export function computeRecordHash<K extends EntityType>(
  entityType: K,
  record: Omit<EntityRecordMap[K], 'hash'>
): string {
  return hashValue(hashableFields(entityType, record));
}

export interface HashCheck {
  valid: boolean;
  expected: string;
  actual: string;
}

/**
 * Recompute a record's hash and compare it with the one it carries
 */
export function checkRecordHash<K extends EntityType>(entityType: K, record: EntityRecordMap[K]): HashCheck {
  const actual = computeRecordHash(entityType, record);
  return { valid: actual === record.hash, expected: record.hash, actual };
}

export function recordId(entityType: EntityType, record: LedgerRecord): string {
  switch (entityType) {
    case 'snapshot':
      return 'snapshotId' in record ? record.snapshotId : '';
    case 'analysis':
      return 'analysisId' in record ? record.analysisId : '';
    case 'outcome':
      return 'outcomeId' in record ? record.outcomeId : '';
    case 'evaluation':
      return 'evaluationId' in record ? record.evaluationId : '';
    case 'proposal':
      return 'proposalId' in record ? record.proposalId : '';
  }
}
