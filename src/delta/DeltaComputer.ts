/**
 * Delta Computer
 *
 * Field-level diff between two snapshots of one game. Only normalized fields
 * are compared; raw provider payloads have no stable shape to diff.
 */

import { ValidationError } from '../core/errors.js';
import { canonicalize } from '../hashing/CanonicalHasher.js';
import type { JsonObject, JsonValue, Snapshot } from '../core/types.js';
import { NormalizedGameFieldsSchema, type NormalizedGameFields } from '../validation/schemas.js';

export type FieldDiff =
  | { path: string; kind: 'unchanged'; value: JsonValue }
  | { path: string; kind: 'added'; value: JsonValue }
  | { path: string; kind: 'removed'; value: JsonValue }
  | { path: string; kind: 'changed'; oldValue: JsonValue; newValue: JsonValue };

export type FieldDiffKind = FieldDiff['kind'];

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function* walk(older: JsonObject, newer: JsonObject, prefix: string): Generator<FieldDiff> {
  const keys = [...new Set([...Object.keys(older), ...Object.keys(newer)])].sort();

  for (const key of keys) {
    const path = prefix ? `${prefix}.${key}` : key;
    const inOlder = Object.prototype.hasOwnProperty.call(older, key);
    const inNewer = Object.prototype.hasOwnProperty.call(newer, key);
    const before = older[key];
    const after = newer[key];

    if (!inNewer) {
      yield { path, kind: 'removed', value: before };
    } else if (!inOlder) {
      yield { path, kind: 'added', value: after };
    } else if (isObject(before) && isObject(after)) {
      yield* walk(before, after, path);
    } else if (canonicalize(before) === canonicalize(after)) {
      yield { path, kind: 'unchanged', value: after };
    } else {
      yield { path, kind: 'changed', oldValue: before, newValue: after };
    }
  }
}

/**
 * Lazy, restartable sequence of field diffs in sorted path order. Nested
 * objects are walked; arrays compare as whole values.
 */
export class SnapshotDiff implements Iterable<FieldDiff> {
  readonly older: Snapshot;
  readonly newer: Snapshot;

  constructor(older: Snapshot, newer: Snapshot) {
    if (older.gameId !== newer.gameId) {
      throw new ValidationError('snapshot', [
        `cannot diff snapshots of different games (${older.gameId} vs ${newer.gameId})`
      ]);
    }
    this.older = older;
    this.newer = newer;
  }

  [Symbol.iterator](): Iterator<FieldDiff> {
    return walk(this.older.normalizedFields, this.newer.normalizedFields, '');
  }

  /** Everything except unchanged fields */
  changes(): FieldDiff[] {
    return [...this].filter((diff) => diff.kind !== 'unchanged');
  }

  counts(): Record<FieldDiffKind, number> {
    const counts: Record<FieldDiffKind, number> = { unchanged: 0, added: 0, removed: 0, changed: 0 };
    for (const diff of this) counts[diff.kind] += 1;
    return counts;
  }
}

export function diffSnapshots(older: Snapshot, newer: Snapshot): SnapshotDiff {
  return new SnapshotDiff(older, newer);
}

// ==========================================
// LINE MOVEMENT
// ==========================================

export interface LineMovement {
  gameId: string;
  elapsedSeconds: number;
  homeOddsChange: number | null;
  awayOddsChange: number | null;
  /** Change in the sportsbook's no-vig home probability */
  noVigShift: number | null;
  /** Change in the prediction market's mid-price */
  midShift: number | null;
}

function gameFields(snapshot: Snapshot): NormalizedGameFields | null {
  const parsed = NormalizedGameFieldsSchema.safeParse(snapshot.normalizedFields);
  return parsed.success ? parsed.data : null;
}

function shift(before: number | null | undefined, after: number | null | undefined): number | null {
  return before === null || before === undefined || after === null || after === undefined ? null : after - before;
}

/**
 * How the prices moved between two snapshots of one game. Fields that either
 * snapshot lacks come back null.
 */
export function summarizeLineMovement(older: Snapshot, newer: Snapshot): LineMovement {
  if (older.gameId !== newer.gameId) {
    throw new ValidationError('snapshot', [
      `cannot compare snapshots of different games (${older.gameId} vs ${newer.gameId})`
    ]);
  }
  const before = gameFields(older);
  const after = gameFields(newer);

  return {
    gameId: newer.gameId,
    elapsedSeconds: (Date.parse(newer.collectedAt) - Date.parse(older.collectedAt)) / 1000,
    homeOddsChange: shift(before?.sportsbook?.homeOdds, after?.sportsbook?.homeOdds),
    awayOddsChange: shift(before?.sportsbook?.awayOdds, after?.sportsbook?.awayOdds),
    noVigShift: shift(before?.sportsbook?.homeNoVigProbability, after?.sportsbook?.homeNoVigProbability),
    midShift: shift(before?.predictionMarket?.midProbability, after?.predictionMarket?.midProbability)
  };
}
