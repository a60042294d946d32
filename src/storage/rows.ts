/**
 * Row shapes and decoders
 *
 * Columns come back from SQLite as plain strings and numbers; the JSON columns
 * are parsed here and checked against the record shapes before anything leaves
 * the storage layer. A row that no longer parses raises RecordDecodeError.
 */

import { RecordDecodeError } from '../core/errors.js';
import { parseProposalStatus } from '../core/records.js';
import type {
  Analysis,
  EdgeRealization,
  EntityType,
  Evaluation,
  ImprovementProposal,
  JsonObject,
  JsonValue,
  Outcome,
  RecommendedAction,
  Snapshot
} from '../core/types.js';

export interface SnapshotRow {
  snapshot_id: string;
  game_id: string;
  collected_at: string;
  schema_version: string;
  source_versions: string;
  raw_payloads: string;
  normalized_fields: string;
  hash: string;
  recorded_at: string;
}

export interface AnalysisRow {
  analysis_id: string;
  game_id: string;
  created_at: string;
  analysis_version: string;
  code_version: string;
  model_version: string | null;
  parent_analysis_id: string | null;
  derived_features: string;
  conclusions: string;
  recommended_actions: string;
  hash: string;
  recorded_at: string;
}

export interface OutcomeRow {
  outcome_id: string;
  game_id: string;
  occurred_at: string;
  final_score: string;
  winner: string;
  stats_summary: string;
  source: string;
  revision: number;
  supersedes_outcome_id: string | null;
  hash: string;
  recorded_at: string;
}

export interface EvaluationRow {
  evaluation_id: string;
  analysis_id: string;
  game_id: string;
  outcome_id: string;
  scored_at: string;
  brier_score: number;
  log_loss: number;
  roi: number | null;
  edge_realized: string;
  notes: string;
  hash: string;
  recorded_at: string;
}

export interface ProposalRow {
  proposal_id: string;
  created_at: string;
  proposal_text: string;
  suggested_schema_additions: string | null;
  suggested_modules: string | null;
  expected_impact: string | null;
  status: string;
  hash: string;
  recorded_at: string;
}

export interface LinkRow {
  owner_id: string;
  target_id: string;
}

// ==========================================
// JSON COLUMN HELPERS
// ==========================================

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ColumnReader {
  constructor(
    private readonly entityType: EntityType,
    private readonly id: string
  ) {}

  fail(reason: string): never {
    throw new RecordDecodeError(this.entityType, this.id, reason);
  }

  json(column: string, text: string): JsonValue {
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(`${column} is not valid JSON (${reason})`);
    }
  }

  object(column: string, text: string): JsonObject {
    const value = this.json(column, text);
    return isJsonObject(value) ? value : this.fail(`${column} is not a JSON object`);
  }

  nullableObject(column: string, text: string | null): JsonObject | null {
    return text === null ? null : this.object(column, text);
  }

  stringMap(column: string, text: string): Record<string, string> {
    const value = this.object(column, text);
    const result: Record<string, string> = {};
    for (const [key, member] of Object.entries(value)) {
      if (typeof member !== 'string') return this.fail(`${column}.${key} is not a string`);
      result[key] = member;
    }
    return result;
  }

  stringList(column: string, text: string | null): string[] | null {
    if (text === null) return null;
    const value = this.json(column, text);
    if (!Array.isArray(value)) return this.fail(`${column} is not a JSON array`);
    return value.map((item, index) => (typeof item === 'string' ? item : this.fail(`${column}[${index}] is not a string`)));
  }
}

// ==========================================
// RECOMMENDED ACTIONS
// ==========================================

function hasNumber(value: JsonObject, key: string): boolean {
  return typeof value[key] === 'number';
}

function hasString(value: JsonObject, key: string): boolean {
  return typeof value[key] === 'string';
}

export function isRecommendedAction(value: unknown): value is RecommendedAction {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const candidate: JsonObject = { ...value };
  const side = candidate.side;
  if (side !== 'home' && side !== 'away') return false;
  if (!hasNumber(candidate, 'stake') || !hasNumber(candidate, 'fairProbability') || !hasString(candidate, 'rationale')) {
    return false;
  }

  if (candidate.type === 'market_position') {
    const marketId = candidate.marketId;
    return candidate.venue === 'prediction_market'
      && (candidate.contract === 'yes' || candidate.contract === 'no')
      && hasNumber(candidate, 'entryPrice')
      && hasNumber(candidate, 'delta')
      && (marketId === null || typeof marketId === 'string');
  }
  if (candidate.type === 'sportsbook_bet') {
    return candidate.venue === 'sportsbook' && hasNumber(candidate, 'americanOdds');
  }
  return false;
}

function parseEdgeRealization(value: string): EdgeRealization | null {
  switch (value) {
    case 'realized':
    case 'missed':
    case 'none':
      return value;
    default:
      return null;
  }
}

// ==========================================
// ROW DECODERS
// ==========================================

export function decodeSnapshot(row: SnapshotRow): Snapshot {
  const read: ColumnReader = new ColumnReader('snapshot', row.snapshot_id);
  const rawPayloads = read.object('raw_payloads', row.raw_payloads);
  return {
    snapshotId: row.snapshot_id,
    gameId: row.game_id,
    collectedAt: row.collected_at,
    schemaVersion: row.schema_version,
    sourceVersions: read.stringMap('source_versions', row.source_versions),
    rawPayloads,
    normalizedFields: read.object('normalized_fields', row.normalized_fields),
    hash: row.hash
  };
}

export function decodeAnalysis(row: AnalysisRow, inputSnapshotIds: string[]): Analysis {
  const read: ColumnReader = new ColumnReader('analysis', row.analysis_id);
  const actions = read.json('recommended_actions', row.recommended_actions);
  if (!Array.isArray(actions)) read.fail('recommended_actions is not a JSON array');

  const recommendedActions: RecommendedAction[] = [];
  actions.forEach((action, index) => {
    if (!isRecommendedAction(action)) read.fail(`recommended_actions[${index}] is not a recognised action`);
    recommendedActions.push(action);
  });

  if (inputSnapshotIds.length === 0) read.fail('no input snapshots are linked');

  return {
    analysisId: row.analysis_id,
    createdAt: row.created_at,
    analysisVersion: row.analysis_version,
    codeVersion: row.code_version,
    modelVersion: row.model_version,
    parentAnalysisId: row.parent_analysis_id,
    inputSnapshotIds,
    derivedFeatures: read.object('derived_features', row.derived_features),
    conclusions: read.object('conclusions', row.conclusions),
    recommendedActions,
    hash: row.hash
  };
}

export function decodeOutcome(row: OutcomeRow): Outcome {
  const read: ColumnReader = new ColumnReader('outcome', row.outcome_id);
  const score = read.object('final_score', row.final_score);
  const home = score.home;
  const away = score.away;
  if (typeof home !== 'number' || typeof away !== 'number') {
    read.fail('final_score must hold numeric home and away');
  }
  return {
    outcomeId: row.outcome_id,
    gameId: row.game_id,
    occurredAt: row.occurred_at,
    finalScore: { home, away },
    winner: row.winner,
    statsSummary: read.object('stats_summary', row.stats_summary),
    source: row.source,
    revision: row.revision,
    supersedesOutcomeId: row.supersedes_outcome_id,
    hash: row.hash
  };
}

export function decodeEvaluation(row: EvaluationRow): Evaluation {
  const read: ColumnReader = new ColumnReader('evaluation', row.evaluation_id);
  const edgeRealized = parseEdgeRealization(row.edge_realized);
  if (edgeRealized === null) read.fail(`edge_realized '${row.edge_realized}' is not recognised`);
  return {
    evaluationId: row.evaluation_id,
    analysisId: row.analysis_id,
    gameId: row.game_id,
    outcomeId: row.outcome_id,
    scoredAt: row.scored_at,
    metrics: {
      brierScore: row.brier_score,
      logLoss: row.log_loss,
      roi: row.roi,
      edgeRealized
    },
    notes: read.object('notes', row.notes),
    hash: row.hash
  };
}

export function decodeProposal(row: ProposalRow, basedOnEvaluationIds: string[]): ImprovementProposal {
  const read: ColumnReader = new ColumnReader('proposal', row.proposal_id);
  const status = parseProposalStatus(row.status);
  if (status === null) read.fail(`status '${row.status}' is not recognised`);
  return {
    proposalId: row.proposal_id,
    createdAt: row.created_at,
    basedOnEvaluationIds,
    proposalText: row.proposal_text,
    suggestedSchemaAdditions: read.nullableObject('suggested_schema_additions', row.suggested_schema_additions),
    suggestedModules: read.stringList('suggested_modules', row.suggested_modules),
    expectedImpact: read.nullableObject('expected_impact', row.expected_impact),
    status,
    hash: row.hash
  };
}
