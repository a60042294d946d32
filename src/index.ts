/**
 * Matchledger
 *
 * Append-only, content-hashed ledger of market snapshots, the analyses
 * derived from them, real-world outcomes, evaluations and improvement
 * proposals.
 */

// Facade
export { Ledger, resolveCodeVersion, UNKNOWN_CODE_VERSION } from './core/Ledger.js';
export type { LedgerStatus } from './core/Ledger.js';
export {
  getDefaultConfig,
  validateConfig,
  mergeConfig,
  assertValidConfig,
  DEFAULT_SCHEMA_VERSION,
  DEFAULT_ANALYSIS_VERSION,
  LEDGER_FILE
} from './core/config.js';
export type { LedgerConfigOverrides, Environment } from './core/config.js';

// Types and errors
export * from './core/types.js';
export * from './core/errors.js';
export {
  createSnapshot,
  createAnalysis,
  createOutcome,
  createEvaluation,
  createProposal,
  withProposalStatus,
  canTransition,
  parseProposalStatus,
  PROPOSAL_TRANSITIONS,
  toIsoTimestamp
} from './core/records.js';
export type { SnapshotInput, AnalysisInput, OutcomeInput, EvaluationInput, ProposalInput } from './core/records.js';

// Hashing
export {
  canonicalize,
  hashValue,
  computeRecordHash,
  checkRecordHash,
  HASH_ALGORITHM
} from './hashing/CanonicalHasher.js';

// Storage and lineage
export { LedgerStorage } from './storage/LedgerStorage.js';
export type { InsertResult, ScannedRecord, DanglingReference, ProposalListOptions } from './storage/LedgerStorage.js';
export { LineageGraph } from './lineage/LineageGraph.js';
export type { LineageNode, LineageAnomaly, LineageSource } from './lineage/LineageGraph.js';

// Engines
export * from './comparison/ComparisonEngine.js';
export { normalizeGameFields, normalizeSportsbookLine, normalizeMarketQuote, findMarketForGame } from './comparison/normalizers.js';
export * from './scoring/ScoringEngine.js';
export { diffSnapshots, summarizeLineMovement, SnapshotDiff } from './delta/DeltaComputer.js';
export type { FieldDiff, LineMovement } from './delta/DeltaComputer.js';
export { IntegrityVerifier } from './integrity/IntegrityVerifier.js';
export type { VerificationReport, VerificationSource, HashMismatch, UnreadableRecord } from './integrity/IntegrityVerifier.js';

// Services
export { CollectorService } from './services/CollectorService.js';
export { OutcomeService, winnerFromScore } from './services/OutcomeService.js';
export { AnalysisService } from './services/AnalysisService.js';
export { EvaluationService } from './services/EvaluationService.js';
export { ProposalService } from './services/ProposalService.js';
export { runBatch, DEFAULT_BATCH_CONCURRENCY } from './services/BatchRunner.js';
export type { BatchReport, BatchOptions, UnitReport, UnitResult } from './services/BatchRunner.js';

// Payload schemas
export * from './validation/schemas.js';
