/**
 * Matchledger Core Types
 *
 * Central type definitions for the append-only ledger: the five immutable
 * record kinds, their JSON payload shapes and the configuration objects
 * passed into the storage layer and services.
 */

// ==========================================
// JSON VALUES
// ==========================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ==========================================
// ENTITY KINDS
// ==========================================

export type EntityType = 'snapshot' | 'analysis' | 'outcome' | 'evaluation' | 'proposal';

export const ENTITY_TYPES: readonly EntityType[] = [
  'snapshot',
  'analysis',
  'outcome',
  'evaluation',
  'proposal'
];

export enum ProposalStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
  IMPLEMENTED = 'implemented'
}

/** Marker stored in Outcome.winner when a game ends level */
export const TIE = 'tie';

// ==========================================
// SNAPSHOT
// ==========================================

export interface Snapshot {
  readonly snapshotId: string;
  readonly gameId: string;
  readonly collectedAt: string;
  readonly schemaVersion: string;
  readonly sourceVersions: Readonly<Record<string, string>>;
  readonly rawPayloads: Readonly<Record<string, JsonValue>>;
  readonly normalizedFields: JsonObject;
  readonly hash: string;
}

// ==========================================
// ANALYSIS
// ==========================================

export type EdgeDirection = 'market_higher' | 'sportsbook_higher';
export type BetSide = 'home' | 'away';

export type ContractAction = {
  type: 'market_position';
  venue: 'prediction_market';
  side: BetSide;
  contract: 'yes' | 'no';
  /** Price paid per contract, in probability units */
  entryPrice: number;
  stake: number;
  fairProbability: number;
  delta: number;
  marketId: string | null;
  rationale: string;
};

export type SportsbookAction = {
  type: 'sportsbook_bet';
  venue: 'sportsbook';
  side: BetSide;
  americanOdds: number;
  stake: number;
  fairProbability: number;
  rationale: string;
};

export type RecommendedAction = ContractAction | SportsbookAction;

export interface Analysis {
  readonly analysisId: string;
  readonly createdAt: string;
  readonly analysisVersion: string;
  readonly codeVersion: string;
  readonly modelVersion: string | null;
  readonly parentAnalysisId: string | null;
  readonly inputSnapshotIds: readonly string[];
  readonly derivedFeatures: JsonObject;
  readonly conclusions: JsonObject;
  readonly recommendedActions: readonly RecommendedAction[];
  readonly hash: string;
}

// ==========================================
// OUTCOME
// ==========================================

export type FinalScore = {
  home: number;
  away: number;
};

export interface Outcome {
  readonly outcomeId: string;
  readonly gameId: string;
  readonly occurredAt: string;
  readonly finalScore: Readonly<FinalScore>;
  /** Winning team name, or TIE */
  readonly winner: string;
  readonly statsSummary: JsonObject;
  readonly source: string;
  /** 1 for the first report; corrections count upward */
  readonly revision: number;
  readonly supersedesOutcomeId: string | null;
  readonly hash: string;
}

// ==========================================
// EVALUATION
// ==========================================

export type EdgeRealization = 'realized' | 'missed' | 'none';

export type EvaluationMetrics = {
  brierScore: number;
  logLoss: number;
  roi: number | null;
  edgeRealized: EdgeRealization;
};

export interface Evaluation {
  readonly evaluationId: string;
  readonly analysisId: string;
  readonly gameId: string;
  readonly outcomeId: string;
  readonly scoredAt: string;
  readonly metrics: Readonly<EvaluationMetrics>;
  readonly notes: JsonObject;
  readonly hash: string;
}

// ==========================================
// IMPROVEMENT PROPOSAL
// ==========================================

export interface ImprovementProposal {
  readonly proposalId: string;
  readonly createdAt: string;
  readonly basedOnEvaluationIds: readonly string[];
  readonly proposalText: string;
  readonly suggestedSchemaAdditions: JsonObject | null;
  readonly suggestedModules: readonly string[] | null;
  readonly expectedImpact: JsonObject | null;
  readonly status: ProposalStatus;
  readonly hash: string;
}

// ==========================================
// RECORD UNION
// ==========================================

export interface EntityRecordMap {
  snapshot: Snapshot;
  analysis: Analysis;
  outcome: Outcome;
  evaluation: Evaluation;
  proposal: ImprovementProposal;
}

export type LedgerRecord = EntityRecordMap[EntityType];

export type TypedRecord = {
  [K in EntityType]: { entityType: K; record: EntityRecordMap[K] };
}[EntityType];

// ==========================================
// CONFIGURATION
// ==========================================

export interface StorageConfig {
  /** File path, or ':memory:' */
  sqlitePath: string;
  enableWAL: boolean;
}

export interface LedgerConfig {
  dataDir: string;
  storage: StorageConfig;
  schemaVersion: string;
  analysisVersion: string;
  /** null means: resolve from git at startup */
  codeVersion: string | null;
  modelVersion: string | null;
  /** Absolute probability gap that flags an edge candidate */
  edgeThreshold: number;
  batchConcurrency: number;
}

export interface TableCounts {
  snapshots: number;
  analyses: number;
  analysisSnapshots: number;
  outcomes: number;
  evaluations: number;
  proposals: number;
  proposalEvaluations: number;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface AsOfOptions {
  /** ISO timestamp; only records known at or before this instant are returned */
  asOf?: string;
}
