/**
 * Record Factories
 *
 * Every ledger record is built here exactly once: id generated, timestamps
 * normalized to ISO-8601 UTC, caller input copied, hash computed, object
 * frozen. A "changed" record is always a new value with a new identity.
 */

import { v4 as uuidv4 } from 'uuid';
import { computeRecordHash } from '../hashing/CanonicalHasher.js';
import { ValidationError } from './errors.js';
import {
  ProposalStatus,
  TIE,
  type Analysis,
  type EntityType,
  type Evaluation,
  type EvaluationMetrics,
  type FinalScore,
  type ImprovementProposal,
  type JsonObject,
  type JsonValue,
  type Outcome,
  type RecommendedAction,
  type Snapshot
} from './types.js';

/**
 * Normalize a timestamp to ISO-8601 UTC with millisecond precision
 */
export function toIsoTimestamp(value: string | Date, entityType: EntityType | 'payload' = 'payload', field = 'timestamp'): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(entityType, [`${field} is not a valid timestamp: ${String(value)}`]);
  }
  return date.toISOString();
}

/**
 * Recursively freeze a value so no caller can mutate a record in place
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}

// ==========================================
// SNAPSHOT
// ==========================================

export interface SnapshotInput {
  gameId: string;
  collectedAt: string | Date;
  schemaVersion: string;
  sourceVersions: Record<string, string>;
  rawPayloads: Record<string, JsonValue>;
  normalizedFields: JsonObject;
}

export function createSnapshot(input: SnapshotInput): Snapshot {
  const issues: string[] = [];
  if (!input.gameId) issues.push('gameId is required');
  if (!input.schemaVersion) issues.push('schemaVersion is required');
  if (issues.length > 0) throw new ValidationError('snapshot', issues);

  const body: Omit<Snapshot, 'hash'> = {
    snapshotId: uuidv4(),
    gameId: input.gameId,
    collectedAt: toIsoTimestamp(input.collectedAt, 'snapshot', 'collectedAt'),
    schemaVersion: input.schemaVersion,
    sourceVersions: { ...input.sourceVersions },
    rawPayloads: structuredClone(input.rawPayloads),
    normalizedFields: structuredClone(input.normalizedFields)
  };
  return deepFreeze({ ...body, hash: computeRecordHash('snapshot', body) });
}

// ==========================================
// ANALYSIS
// ==========================================

export interface AnalysisInput {
  analysisVersion: string;
  codeVersion: string;
  modelVersion?: string | null;
  parentAnalysisId?: string | null;
  inputSnapshotIds: string[];
  derivedFeatures: JsonObject;
  conclusions: JsonObject;
  recommendedActions: RecommendedAction[];
  createdAt?: string | Date;
}

export function createAnalysis(input: AnalysisInput): Analysis {
  const issues: string[] = [];
  if (input.inputSnapshotIds.length === 0) issues.push('inputSnapshotIds must not be empty');
  if (new Set(input.inputSnapshotIds).size !== input.inputSnapshotIds.length) {
    issues.push('inputSnapshotIds must not repeat');
  }
  if (!input.analysisVersion) issues.push('analysisVersion is required');
  if (!input.codeVersion) issues.push('codeVersion is required');
  if (issues.length > 0) throw new ValidationError('analysis', issues);

  const body: Omit<Analysis, 'hash'> = {
    analysisId: uuidv4(),
    createdAt: toIsoTimestamp(input.createdAt ?? new Date(), 'analysis', 'createdAt'),
    analysisVersion: input.analysisVersion,
    codeVersion: input.codeVersion,
    modelVersion: input.modelVersion ?? null,
    parentAnalysisId: input.parentAnalysisId ?? null,
    inputSnapshotIds: [...input.inputSnapshotIds],
    derivedFeatures: structuredClone(input.derivedFeatures),
    conclusions: structuredClone(input.conclusions),
    recommendedActions: structuredClone(input.recommendedActions)
  };
  return deepFreeze({ ...body, hash: computeRecordHash('analysis', body) });
}

// ==========================================
// OUTCOME
// ==========================================

export interface OutcomeInput {
  gameId: string;
  occurredAt: string | Date;
  finalScore: FinalScore;
  winner: string;
  statsSummary?: JsonObject;
  source: string;
  revision?: number;
  supersedesOutcomeId?: string | null;
}

export function createOutcome(input: OutcomeInput): Outcome {
  const issues: string[] = [];
  const revision = input.revision ?? 1;
  if (!input.gameId) issues.push('gameId is required');
  if (!input.winner) issues.push(`winner is required (use '${TIE}' for a draw)`);
  if (!Number.isInteger(revision) || revision < 1) issues.push('revision must be a positive integer');
  if (revision === 1 && input.supersedesOutcomeId) {
    issues.push('a first revision cannot supersede another outcome');
  }
  if (revision > 1 && !input.supersedesOutcomeId) {
    issues.push('a correction must name the outcome it supersedes');
  }
  for (const side of ['home', 'away'] as const) {
    const points = input.finalScore[side];
    if (!Number.isInteger(points) || points < 0) issues.push(`finalScore.${side} must be a non-negative integer`);
  }
  if (issues.length > 0) throw new ValidationError('outcome', issues);

  const body: Omit<Outcome, 'hash'> = {
    outcomeId: uuidv4(),
    gameId: input.gameId,
    occurredAt: toIsoTimestamp(input.occurredAt, 'outcome', 'occurredAt'),
    finalScore: { home: input.finalScore.home, away: input.finalScore.away },
    winner: input.winner,
    statsSummary: structuredClone(input.statsSummary ?? {}),
    source: input.source,
    revision,
    supersedesOutcomeId: input.supersedesOutcomeId ?? null
  };
  return deepFreeze({ ...body, hash: computeRecordHash('outcome', body) });
}

// ==========================================
// EVALUATION
// ==========================================

export interface EvaluationInput {
  analysisId: string;
  gameId: string;
  outcomeId: string;
  metrics: EvaluationMetrics;
  notes?: JsonObject;
  scoredAt?: string | Date;
}

export function createEvaluation(input: EvaluationInput): Evaluation {
  const body: Omit<Evaluation, 'hash'> = {
    evaluationId: uuidv4(),
    analysisId: input.analysisId,
    gameId: input.gameId,
    outcomeId: input.outcomeId,
    scoredAt: toIsoTimestamp(input.scoredAt ?? new Date(), 'evaluation', 'scoredAt'),
    metrics: { ...input.metrics },
    notes: structuredClone(input.notes ?? {})
  };
  return deepFreeze({ ...body, hash: computeRecordHash('evaluation', body) });
}

// ==========================================
// IMPROVEMENT PROPOSAL
// ==========================================

export interface ProposalInput {
  basedOnEvaluationIds: string[];
  proposalText: string;
  suggestedSchemaAdditions?: JsonObject | null;
  suggestedModules?: string[] | null;
  expectedImpact?: JsonObject | null;
  createdAt?: string | Date;
}

export function createProposal(input: ProposalInput): ImprovementProposal {
  const issues: string[] = [];
  if (input.basedOnEvaluationIds.length === 0) issues.push('basedOnEvaluationIds must not be empty');
  if (!input.proposalText.trim()) issues.push('proposalText is required');
  if (issues.length > 0) throw new ValidationError('proposal', issues);

  const body: Omit<ImprovementProposal, 'hash'> = {
    proposalId: uuidv4(),
    createdAt: toIsoTimestamp(input.createdAt ?? new Date(), 'proposal', 'createdAt'),
    basedOnEvaluationIds: [...new Set(input.basedOnEvaluationIds)],
    proposalText: input.proposalText,
    suggestedSchemaAdditions: input.suggestedSchemaAdditions ? structuredClone(input.suggestedSchemaAdditions) : null,
    suggestedModules: input.suggestedModules ? [...input.suggestedModules] : null,
    expectedImpact: input.expectedImpact ? structuredClone(input.expectedImpact) : null,
    status: ProposalStatus.PENDING
  };
  return deepFreeze({ ...body, hash: computeRecordHash('proposal', body) });
}

/**
 * The proposal as it reads after a status transition: same identity and
 * content, new status, hash recomputed over the new status
 */
export function withProposalStatus(proposal: ImprovementProposal, status: ProposalStatus): ImprovementProposal {
  const { hash: _previous, ...rest } = proposal;
  const body: Omit<ImprovementProposal, 'hash'> = { ...rest, status };
  return deepFreeze({ ...body, hash: computeRecordHash('proposal', body) });
}

// ==========================================
// PROPOSAL STATUS
// ==========================================

/** Forward moves only; rejected and implemented are terminal */
export const PROPOSAL_TRANSITIONS: Readonly<Record<ProposalStatus, readonly ProposalStatus[]>> = {
  [ProposalStatus.PENDING]: [ProposalStatus.ACCEPTED, ProposalStatus.REJECTED, ProposalStatus.IMPLEMENTED],
  [ProposalStatus.ACCEPTED]: [ProposalStatus.IMPLEMENTED],
  [ProposalStatus.REJECTED]: [],
  [ProposalStatus.IMPLEMENTED]: []
};

export function canTransition(from: ProposalStatus, to: ProposalStatus): boolean {
  return PROPOSAL_TRANSITIONS[from].includes(to);
}

export function parseProposalStatus(value: string): ProposalStatus | null {
  switch (value) {
    case ProposalStatus.PENDING:
      return ProposalStatus.PENDING;
    case ProposalStatus.ACCEPTED:
      return ProposalStatus.ACCEPTED;
    case ProposalStatus.REJECTED:
      return ProposalStatus.REJECTED;
    case ProposalStatus.IMPLEMENTED:
      return ProposalStatus.IMPLEMENTED;
    default:
      return null;
  }
}
