/**
 * Ledger Storage
 *
 * Append-only persistence for snapshots, analyses, outcomes, evaluations and
 * improvement proposals. Uses better-sqlite3 for synchronous SQLite access;
 * every write runs inside an IMMEDIATE transaction, so a record and its link
 * rows land together or not at all and concurrent writers serialize on the
 * database lock.
 *
 * Inserts are idempotent by content hash: offering a record whose hash is
 * already stored returns the stored record instead of creating a second one.
 * Reads recompute each record's hash and refuse to return content that no
 * longer matches it.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { canonicalize, checkRecordHash } from '../hashing/CanonicalHasher.js';
import { canTransition, deepFreeze, parseProposalStatus, toIsoTimestamp, withProposalStatus } from '../core/records.js';
import {
  HashMismatchError,
  ImmutabilityViolationError,
  InvalidTransitionError,
  NotFoundError,
  ReferentialError,
  UniquenessError,
  RecordDecodeError,
  ValidationError
} from '../core/errors.js';
import {
  ENTITY_TYPES,
  type Analysis,
  type AsOfOptions,
  type EntityRecordMap,
  type EntityType,
  type Evaluation,
  type ImprovementProposal,
  type ListOptions,
  type Outcome,
  ProposalStatus,
  type Snapshot,
  type StorageConfig,
  type TableCounts,
  type TypedRecord
} from '../core/types.js';
import { LineageGraph } from '../lineage/LineageGraph.js';
import { IMMUTABLE_ABORT_PREFIX, LEDGER_SCHEMA_REVISION, TABLES_SQL, TRIGGERS_SQL } from './schema.js';
import {
  decodeAnalysis,
  decodeEvaluation,
  decodeOutcome,
  decodeProposal,
  decodeSnapshot,
  type AnalysisRow,
  type EvaluationRow,
  type LinkRow,
  type OutcomeRow,
  type ProposalRow,
  type SnapshotRow
} from './rows.js';

export interface InsertResult<T> {
  record: T;
  /** false when an identical record was already stored and returned instead */
  created: boolean;
}

/** One row as read by a full scan, before any hash check */
export type ScannedRecord =
  | (TypedRecord & { readable: true; id: string })
  | { readable: false; entityType: EntityType; id: string; error: RecordDecodeError };

export interface DanglingReference {
  entityType: EntityType;
  id: string;
  field: string;
  referencedId: string;
}

export interface ProposalListOptions extends ListOptions {
  status?: ProposalStatus;
}

/** Primary table, id column and hash lookup for each entity */
const ENTITY_TABLES: Readonly<Record<EntityType, { table: string; idColumn: string }>> = {
  snapshot: { table: 'snapshots', idColumn: 'snapshot_id' },
  analysis: { table: 'analyses', idColumn: 'analysis_id' },
  outcome: { table: 'outcomes', idColumn: 'outcome_id' },
  evaluation: { table: 'evaluations', idColumn: 'evaluation_id' },
  proposal: { table: 'proposals', idColumn: 'proposal_id' }
};

function asOfBound(options: AsOfOptions): string | undefined {
  return options.asOf === undefined ? undefined : toIsoTimestamp(options.asOf, 'payload', 'asOf');
}

type RecordReaders = { [K in EntityType]: (id: string) => EntityRecordMap[K] | null };

export class LedgerStorage {
  private db: Database.Database;
  private readonly readers: RecordReaders;

  constructor(config: StorageConfig) {
    if (config.sqlitePath !== ':memory:') {
      mkdirSync(dirname(config.sqlitePath), { recursive: true });
    }
    this.db = new Database(config.sqlitePath);

    if (config.enableWAL) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');
    this.initializeSchema();

    this.readers = {
      snapshot: (id) => this.getSnapshot(id),
      analysis: (id) => this.getAnalysis(id),
      outcome: (id) => this.getOutcome(id),
      evaluation: (id) => this.getEvaluation(id),
      proposal: (id) => this.getProposal(id)
    };
  }

  private initializeSchema(): void {
    this.db.exec(TABLES_SQL);
    this.db.exec(TRIGGERS_SQL);
    this.db.prepare(`
      INSERT OR IGNORE INTO ledger_meta (key, value) VALUES ('schema_revision', ?), ('created_at', ?)
    `).run(LEDGER_SCHEMA_REVISION, new Date().toISOString());
  }

  getMeta(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM ledger_meta WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  close(): void {
    this.db.close();
  }

  /**
   * Run a unit of work inside one IMMEDIATE transaction; trigger aborts and
   * constraint failures come back out as ledger errors
   */
  private write<T>(entityType: EntityType, work: () => T): T {
    try {
      return this.db.transaction(work).immediate();
    } catch (error) {
      throw this.translateError(entityType, error);
    }
  }

  private translateError(entityType: EntityType, error: unknown): unknown {
    if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
      return error;
    }
    if (error.message.startsWith(`${IMMUTABLE_ABORT_PREFIX}:`)) {
      const [, operation, entity] = error.message.split(':');
      const reported = ENTITY_TYPES.find((type) => type === entity) ?? entityType;
      return new ImmutabilityViolationError(operation ?? 'modify', reported, 'rejected by storage trigger');
    }
    if (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
      return new UniquenessError(entityType, 'key', error.message, 'storage constraint');
    }
    if (error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      return new ReferentialError(entityType, 'reference', 'unknown', 'violates a foreign key');
    }
    return error;
  }

  private assertHash<K extends EntityType>(entityType: K, record: EntityRecordMap[K]): void {
    const check = checkRecordHash(entityType, record);
    if (!check.valid) {
      throw new ValidationError(entityType, [`hash ${check.expected} does not match content (expected ${check.actual})`]);
    }
  }

  private verified<K extends EntityType>(entityType: K, id: string, record: EntityRecordMap[K]): EntityRecordMap[K] {
    const check = checkRecordHash(entityType, record);
    if (!check.valid) {
      throw new HashMismatchError(entityType, id, check.expected, check.actual);
    }
    return deepFreeze(record);
  }

  // ==========================================
  // INSERT
  // ==========================================

  insert(entry: TypedRecord): InsertResult<EntityRecordMap[EntityType]> {
    switch (entry.entityType) {
      case 'snapshot':
        return this.insertSnapshot(entry.record);
      case 'analysis':
        return this.insertAnalysis(entry.record);
      case 'outcome':
        return this.insertOutcome(entry.record);
      case 'evaluation':
        return this.insertEvaluation(entry.record);
      case 'proposal':
        return this.insertProposal(entry.record);
    }
  }

  insertSnapshot(snapshot: Snapshot): InsertResult<Snapshot> {
    this.assertHash('snapshot', snapshot);
    return this.write('snapshot', () => {
      const existing = this.findSnapshotByHash(snapshot.hash);
      if (existing) return { record: existing, created: false };

      this.db.prepare(`
        INSERT INTO snapshots (snapshot_id, game_id, collected_at, schema_version, source_versions,
          raw_payloads, normalized_fields, hash, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        snapshot.snapshotId,
        snapshot.gameId,
        snapshot.collectedAt,
        snapshot.schemaVersion,
        canonicalize(snapshot.sourceVersions),
        canonicalize(snapshot.rawPayloads),
        canonicalize(snapshot.normalizedFields),
        snapshot.hash,
        new Date().toISOString()
      );
      return { record: snapshot, created: true };
    });
  }

  insertAnalysis(analysis: Analysis): InsertResult<Analysis> {
    this.assertHash('analysis', analysis);
    return this.write('analysis', () => {
      const existing = this.findAnalysisByHash(analysis.hash);
      if (existing) return { record: existing, created: false };

      const gameId = this.resolveAnalysisGame(analysis);

      if (analysis.parentAnalysisId !== null) {
        const parent = this.db.prepare<[string], { created_at: string }>(
          'SELECT created_at FROM analyses WHERE analysis_id = ?'
        ).get(analysis.parentAnalysisId);
        if (!parent) {
          throw new ReferentialError('analysis', 'parentAnalysisId', analysis.parentAnalysisId);
        }
        if (parent.created_at > analysis.createdAt) {
          throw new ReferentialError('analysis', 'parentAnalysisId', analysis.parentAnalysisId, 'was created after this analysis');
        }
      }

      this.db.prepare(`
        INSERT INTO analyses (analysis_id, game_id, created_at, analysis_version, code_version, model_version,
          parent_analysis_id, derived_features, conclusions, recommended_actions, hash, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        analysis.analysisId,
        gameId,
        analysis.createdAt,
        analysis.analysisVersion,
        analysis.codeVersion,
        analysis.modelVersion,
        analysis.parentAnalysisId,
        canonicalize(analysis.derivedFeatures),
        canonicalize(analysis.conclusions),
        canonicalize(analysis.recommendedActions),
        analysis.hash,
        new Date().toISOString()
      );

      const insertLink = this.db.prepare(`
        INSERT INTO analysis_snapshots (analysis_id, snapshot_id, position) VALUES (?, ?, ?)
      `);
      analysis.inputSnapshotIds.forEach((snapshotId, position) => {
        insertLink.run(analysis.analysisId, snapshotId, position);
      });

      return { record: analysis, created: true };
    });
  }

  /**
   * Every input snapshot must exist and all of them must describe one game
   */
  private resolveAnalysisGame(analysis: Analysis): string {
    const lookup = this.db.prepare<[string], { game_id: string }>('SELECT game_id FROM snapshots WHERE snapshot_id = ?');
    let gameId: string | null = null;
    for (const snapshotId of analysis.inputSnapshotIds) {
      const row = lookup.get(snapshotId);
      if (!row) {
        throw new ReferentialError('analysis', 'inputSnapshotIds', snapshotId);
      }
      if (gameId !== null && row.game_id !== gameId) {
        throw new ReferentialError('analysis', 'inputSnapshotIds', snapshotId, `belongs to game ${row.game_id}, not ${gameId}`);
      }
      gameId = row.game_id;
    }
    if (gameId === null) {
      throw new ValidationError('analysis', ['inputSnapshotIds must not be empty']);
    }
    return gameId;
  }

  insertOutcome(outcome: Outcome): InsertResult<Outcome> {
    this.assertHash('outcome', outcome);
    return this.write('outcome', () => {
      const existing = this.findOutcomeByHash(outcome.hash);
      if (existing) return { record: existing, created: false };

      const head = this.db.prepare<[string], { outcome_id: string; revision: number }>(`
        SELECT outcome_id, revision FROM outcomes WHERE game_id = ? ORDER BY revision DESC LIMIT 1
      `).get(outcome.gameId);

      if (outcome.supersedesOutcomeId === null) {
        if (head) {
          throw new UniquenessError('outcome', 'gameId', outcome.gameId, 'an outcome is already recorded; submit a correction revision');
        }
      } else {
        const superseded = this.db.prepare<[string], { game_id: string }>(
          'SELECT game_id FROM outcomes WHERE outcome_id = ?'
        ).get(outcome.supersedesOutcomeId);
        if (!superseded) {
          throw new ReferentialError('outcome', 'supersedesOutcomeId', outcome.supersedesOutcomeId);
        }
        if (superseded.game_id !== outcome.gameId) {
          throw new ReferentialError('outcome', 'supersedesOutcomeId', outcome.supersedesOutcomeId, `belongs to game ${superseded.game_id}`);
        }
        if (!head || head.outcome_id !== outcome.supersedesOutcomeId || head.revision + 1 !== outcome.revision) {
          throw new UniquenessError(
            'outcome',
            'revision',
            `${outcome.gameId}#${outcome.revision}`,
            `a correction must supersede the current head revision ${head ? head.revision : 0}`
          );
        }
      }

      this.db.prepare(`
        INSERT INTO outcomes (outcome_id, game_id, occurred_at, final_score, winner, stats_summary, source,
          revision, supersedes_outcome_id, hash, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        outcome.outcomeId,
        outcome.gameId,
        outcome.occurredAt,
        canonicalize(outcome.finalScore),
        outcome.winner,
        canonicalize(outcome.statsSummary),
        outcome.source,
        outcome.revision,
        outcome.supersedesOutcomeId,
        outcome.hash,
        new Date().toISOString()
      );
      return { record: outcome, created: true };
    });
  }

  insertEvaluation(evaluation: Evaluation): InsertResult<Evaluation> {
    this.assertHash('evaluation', evaluation);
    return this.write('evaluation', () => {
      const existing = this.findEvaluationByHash(evaluation.hash);
      if (existing) return { record: existing, created: false };

      const analysis = this.db.prepare<[string], { game_id: string }>(
        'SELECT game_id FROM analyses WHERE analysis_id = ?'
      ).get(evaluation.analysisId);
      if (!analysis) {
        throw new ReferentialError('evaluation', 'analysisId', evaluation.analysisId);
      }
      if (analysis.game_id !== evaluation.gameId) {
        throw new ReferentialError('evaluation', 'analysisId', evaluation.analysisId, `covers game ${analysis.game_id}, not ${evaluation.gameId}`);
      }

      const outcome = this.db.prepare<[string], { game_id: string }>(
        'SELECT game_id FROM outcomes WHERE outcome_id = ?'
      ).get(evaluation.outcomeId);
      if (!outcome) {
        throw new ReferentialError('evaluation', 'outcomeId', evaluation.outcomeId);
      }
      if (outcome.game_id !== evaluation.gameId) {
        throw new ReferentialError('evaluation', 'outcomeId', evaluation.outcomeId, `belongs to game ${outcome.game_id}, not ${evaluation.gameId}`);
      }

      this.db.prepare(`
        INSERT INTO evaluations (evaluation_id, analysis_id, game_id, outcome_id, scored_at, brier_score,
          log_loss, roi, edge_realized, notes, hash, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        evaluation.evaluationId,
        evaluation.analysisId,
        evaluation.gameId,
        evaluation.outcomeId,
        evaluation.scoredAt,
        evaluation.metrics.brierScore,
        evaluation.metrics.logLoss,
        evaluation.metrics.roi,
        evaluation.metrics.edgeRealized,
        canonicalize(evaluation.notes),
        evaluation.hash,
        new Date().toISOString()
      );
      return { record: evaluation, created: true };
    });
  }

  insertProposal(proposal: ImprovementProposal): InsertResult<ImprovementProposal> {
    this.assertHash('proposal', proposal);
    return this.write('proposal', () => {
      const existing = this.findProposalByContent(proposal);
      if (existing) return { record: existing, created: false };

      const lookup = this.db.prepare<[string], { evaluation_id: string }>(
        'SELECT evaluation_id FROM evaluations WHERE evaluation_id = ?'
      );
      for (const evaluationId of proposal.basedOnEvaluationIds) {
        if (!lookup.get(evaluationId)) {
          throw new ReferentialError('proposal', 'basedOnEvaluationIds', evaluationId);
        }
      }

      this.db.prepare(`
        INSERT INTO proposals (proposal_id, created_at, proposal_text, suggested_schema_additions,
          suggested_modules, expected_impact, status, hash, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        proposal.proposalId,
        proposal.createdAt,
        proposal.proposalText,
        proposal.suggestedSchemaAdditions === null ? null : canonicalize(proposal.suggestedSchemaAdditions),
        proposal.suggestedModules === null ? null : canonicalize(proposal.suggestedModules),
        proposal.expectedImpact === null ? null : canonicalize(proposal.expectedImpact),
        proposal.status,
        proposal.hash,
        new Date().toISOString()
      );

      const insertLink = this.db.prepare(`
        INSERT INTO proposal_evaluations (proposal_id, evaluation_id, position) VALUES (?, ?, ?)
      `);
      proposal.basedOnEvaluationIds.forEach((evaluationId, position) => {
        insertLink.run(proposal.proposalId, evaluationId, position);
      });

      return { record: proposal, created: true };
    });
  }

  // ==========================================
  // UPDATE / DELETE
  // ==========================================

  /**
   * The only permitted update is a forward move of a proposal's status
   */
  update(entityType: EntityType, id: string, changes: Record<string, unknown>): ImprovementProposal {
    const fields = Object.keys(changes);
    const status = changes.status;
    if (entityType === 'proposal' && fields.length === 1 && typeof status === 'string') {
      const parsed = parseProposalStatus(status);
      if (parsed !== null) return this.updateProposalStatus(id, parsed);
    }
    throw new ImmutabilityViolationError('update', entityType, `${id}: ${fields.join(', ') || 'no fields'}`);
  }

  delete(entityType: EntityType, id: string): never {
    throw new ImmutabilityViolationError('delete', entityType, id);
  }

  updateProposalStatus(proposalId: string, status: ProposalStatus): ImprovementProposal {
    return this.write('proposal', () => {
      const current = this.getProposal(proposalId);
      if (!current) {
        throw new NotFoundError('proposal', proposalId);
      }
      if (!canTransition(current.status, status)) {
        throw new InvalidTransitionError(proposalId, current.status, status);
      }

      const next = withProposalStatus(current, status);
      this.db.prepare('UPDATE proposals SET status = ?, hash = ? WHERE proposal_id = ?')
        .run(next.status, next.hash, proposalId);
      return next;
    });
  }

  // ==========================================
  // GET (verify on read)
  // ==========================================

  get<K extends EntityType>(entityType: K, id: string): EntityRecordMap[K] | null {
    const read: (recordId: string) => EntityRecordMap[K] | null = this.readers[entityType];
    return read(id);
  }

  /**
   * Like get(), but a missing record is an error
   */
  require<K extends EntityType>(entityType: K, id: string): EntityRecordMap[K] {
    const record = this.get(entityType, id);
    if (record === null) {
      throw new NotFoundError(entityType, id);
    }
    return record;
  }

  getByHash<K extends EntityType>(entityType: K, hash: string): EntityRecordMap[K] | null {
    const { table, idColumn } = ENTITY_TABLES[entityType];
    const row = this.db.prepare<[string], { id: string }>(
      `SELECT ${idColumn} AS id FROM ${table} WHERE hash = ? ORDER BY rowid LIMIT 1`
    ).get(hash);
    return row ? this.get(entityType, row.id) : null;
  }

  getSnapshot(snapshotId: string): Snapshot | null {
    const row = this.db.prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE snapshot_id = ?').get(snapshotId);
    return row ? this.verified('snapshot', snapshotId, decodeSnapshot(row)) : null;
  }

  getAnalysis(analysisId: string): Analysis | null {
    const row = this.db.prepare<[string], AnalysisRow>('SELECT * FROM analyses WHERE analysis_id = ?').get(analysisId);
    if (!row) return null;
    const links = this.loadAnalysisLinks([analysisId]);
    return this.verified('analysis', analysisId, decodeAnalysis(row, links.get(analysisId) ?? []));
  }

  getOutcome(outcomeId: string): Outcome | null {
    const row = this.db.prepare<[string], OutcomeRow>('SELECT * FROM outcomes WHERE outcome_id = ?').get(outcomeId);
    return row ? this.verified('outcome', outcomeId, decodeOutcome(row)) : null;
  }

  getEvaluation(evaluationId: string): Evaluation | null {
    const row = this.db.prepare<[string], EvaluationRow>('SELECT * FROM evaluations WHERE evaluation_id = ?').get(evaluationId);
    return row ? this.verified('evaluation', evaluationId, decodeEvaluation(row)) : null;
  }

  getProposal(proposalId: string): ImprovementProposal | null {
    const row = this.db.prepare<[string], ProposalRow>('SELECT * FROM proposals WHERE proposal_id = ?').get(proposalId);
    if (!row) return null;
    const links = this.loadProposalLinks([proposalId]);
    return this.verified('proposal', proposalId, decodeProposal(row, links.get(proposalId) ?? []));
  }

  private findSnapshotByHash(hash: string): Snapshot | null {
    return this.getByHash('snapshot', hash);
  }

  private findAnalysisByHash(hash: string): Analysis | null {
    return this.getByHash('analysis', hash);
  }

  private findOutcomeByHash(hash: string): Outcome | null {
    return this.getByHash('outcome', hash);
  }

  private findEvaluationByHash(hash: string): Evaluation | null {
    return this.getByHash('evaluation', hash);
  }

  /**
   * A stored proposal with the same content, whatever status it has reached.
   * The hash covers status, so each status is looked up in turn.
   */
  private findProposalByContent(proposal: ImprovementProposal): ImprovementProposal | null {
    for (const status of Object.values(ProposalStatus)) {
      const hash = status === proposal.status ? proposal.hash : withProposalStatus(proposal, status).hash;
      const existing = this.getByHash('proposal', hash);
      if (existing) return existing;
    }
    return null;
  }

  // ==========================================
  // LINK TABLES
  // ==========================================

  private loadLinks(sql: string, ownerIds: string[]): Map<string, string[]> {
    const links = new Map<string, string[]>();
    if (ownerIds.length === 0) return links;
    const placeholders = ownerIds.map(() => '?').join(',');
    const rows = this.db.prepare<string[], LinkRow>(sql.replace('$OWNERS', placeholders)).all(...ownerIds);
    for (const row of rows) {
      const list = links.get(row.owner_id) ?? [];
      list.push(row.target_id);
      links.set(row.owner_id, list);
    }
    return links;
  }

  private loadAnalysisLinks(analysisIds: string[]): Map<string, string[]> {
    return this.loadLinks(`
      SELECT analysis_id AS owner_id, snapshot_id AS target_id FROM analysis_snapshots
      WHERE analysis_id IN ($OWNERS) ORDER BY analysis_id, position
    `, analysisIds);
  }

  private loadProposalLinks(proposalIds: string[]): Map<string, string[]> {
    return this.loadLinks(`
      SELECT proposal_id AS owner_id, evaluation_id AS target_id FROM proposal_evaluations
      WHERE proposal_id IN ($OWNERS) ORDER BY proposal_id, position
    `, proposalIds);
  }

  private analysesFromRows(rows: AnalysisRow[]): Analysis[] {
    const links = this.loadAnalysisLinks(rows.map((row) => row.analysis_id));
    return rows.map((row) =>
      this.verified('analysis', row.analysis_id, decodeAnalysis(row, links.get(row.analysis_id) ?? []))
    );
  }

  private proposalsFromRows(rows: ProposalRow[]): ImprovementProposal[] {
    const links = this.loadProposalLinks(rows.map((row) => row.proposal_id));
    return rows.map((row) =>
      this.verified('proposal', row.proposal_id, decodeProposal(row, links.get(row.proposal_id) ?? []))
    );
  }

  // ==========================================
  // SNAPSHOT QUERIES
  // ==========================================

  /**
   * Snapshots of one game in collection order, optionally only those
   * collected at or before `asOf`
   */
  listByGame(gameId: string, options: AsOfOptions = {}): Snapshot[] {
    const asOf = asOfBound(options);
    const rows = asOf === undefined
      ? this.db.prepare<[string], SnapshotRow>(`
          SELECT * FROM snapshots WHERE game_id = ? ORDER BY collected_at, rowid
        `).all(gameId)
      : this.db.prepare<[string, string], SnapshotRow>(`
          SELECT * FROM snapshots WHERE game_id = ? AND collected_at <= ? ORDER BY collected_at, rowid
        `).all(gameId, asOf);
    return rows.map((row) => this.verified('snapshot', row.snapshot_id, decodeSnapshot(row)));
  }

  latestSnapshot(gameId: string, options: AsOfOptions = {}): Snapshot | null {
    const snapshots = this.listByGame(gameId, options);
    return snapshots.length > 0 ? snapshots[snapshots.length - 1] : null;
  }

  listGameIds(): string[] {
    const rows = this.db.prepare<[], { game_id: string }>(`
      SELECT game_id FROM snapshots GROUP BY game_id ORDER BY MIN(collected_at), game_id
    `).all();
    return rows.map((row) => row.game_id);
  }

  // ==========================================
  // ANALYSIS QUERIES
  // ==========================================

  listAnalyses(options: ListOptions & AsOfOptions = {}): Analysis[] {
    const limit = options.limit ?? -1;
    const offset = options.offset ?? 0;
    const asOf = asOfBound(options);
    const rows = asOf === undefined
      ? this.db.prepare<[number, number], AnalysisRow>(`
          SELECT * FROM analyses ORDER BY created_at, rowid LIMIT ? OFFSET ?
        `).all(limit, offset)
      : this.db.prepare<[string, number, number], AnalysisRow>(`
          SELECT * FROM analyses WHERE created_at <= ? ORDER BY created_at, rowid LIMIT ? OFFSET ?
        `).all(asOf, limit, offset);
    return this.analysesFromRows(rows);
  }

  listAnalysesForGame(gameId: string, options: AsOfOptions = {}): Analysis[] {
    const asOf = asOfBound(options);
    const rows = asOf === undefined
      ? this.db.prepare<[string], AnalysisRow>(`
          SELECT * FROM analyses WHERE game_id = ? ORDER BY created_at, rowid
        `).all(gameId)
      : this.db.prepare<[string, string], AnalysisRow>(`
          SELECT * FROM analyses WHERE game_id = ? AND created_at <= ? ORDER BY created_at, rowid
        `).all(gameId, asOf);
    return this.analysesFromRows(rows);
  }

  /**
   * Game an analysis covers, derived from its input snapshots
   */
  gameIdOfAnalysis(analysisId: string): string | null {
    const row = this.db.prepare<[string], { game_id: string }>(`
      SELECT s.game_id FROM analysis_snapshots a
      JOIN snapshots s ON s.snapshot_id = a.snapshot_id
      WHERE a.analysis_id = ? ORDER BY a.position LIMIT 1
    `).get(analysisId);
    return row?.game_id ?? null;
  }

  listChildren(analysisId: string): Analysis[] {
    const rows = this.db.prepare<[string], AnalysisRow>(`
      SELECT * FROM analyses WHERE parent_analysis_id = ? ORDER BY created_at, rowid
    `).all(analysisId);
    return this.analysesFromRows(rows);
  }

  listRoots(): Analysis[] {
    const rows = this.db.prepare<[], AnalysisRow>(`
      SELECT * FROM analyses WHERE parent_analysis_id IS NULL ORDER BY created_at, rowid
    `).all();
    return this.analysesFromRows(rows);
  }

  /**
   * Chain from the root down to the given analysis
   */
  listLineagePath(analysisId: string): Analysis[] {
    return new LineageGraph(this).lineagePath(analysisId);
  }

  // ==========================================
  // OUTCOME QUERIES
  // ==========================================

  /**
   * Current (highest) revision of a game's outcome
   */
  getOutcomeForGame(gameId: string): Outcome | null {
    const row = this.db.prepare<[string], OutcomeRow>(`
      SELECT * FROM outcomes WHERE game_id = ? ORDER BY revision DESC LIMIT 1
    `).get(gameId);
    return row ? this.verified('outcome', row.outcome_id, decodeOutcome(row)) : null;
  }

  listOutcomeRevisions(gameId: string): Outcome[] {
    const rows = this.db.prepare<[string], OutcomeRow>(`
      SELECT * FROM outcomes WHERE game_id = ? ORDER BY revision
    `).all(gameId);
    return rows.map((row) => this.verified('outcome', row.outcome_id, decodeOutcome(row)));
  }

  // ==========================================
  // EVALUATION QUERIES
  // ==========================================

  listEvaluations(options: ListOptions = {}): Evaluation[] {
    const rows = this.db.prepare<[number, number], EvaluationRow>(`
      SELECT * FROM evaluations ORDER BY scored_at, rowid LIMIT ? OFFSET ?
    `).all(options.limit ?? -1, options.offset ?? 0);
    return rows.map((row) => this.verified('evaluation', row.evaluation_id, decodeEvaluation(row)));
  }

  listEvaluationsForAnalysis(analysisId: string): Evaluation[] {
    const rows = this.db.prepare<[string], EvaluationRow>(`
      SELECT * FROM evaluations WHERE analysis_id = ? ORDER BY scored_at, rowid
    `).all(analysisId);
    return rows.map((row) => this.verified('evaluation', row.evaluation_id, decodeEvaluation(row)));
  }

  listEvaluationsForGame(gameId: string): Evaluation[] {
    const rows = this.db.prepare<[string], EvaluationRow>(`
      SELECT * FROM evaluations WHERE game_id = ? ORDER BY scored_at, rowid
    `).all(gameId);
    return rows.map((row) => this.verified('evaluation', row.evaluation_id, decodeEvaluation(row)));
  }

  // ==========================================
  // PROPOSAL QUERIES
  // ==========================================

  listProposals(options: ProposalListOptions = {}): ImprovementProposal[] {
    const limit = options.limit ?? -1;
    const offset = options.offset ?? 0;
    const rows = options.status === undefined
      ? this.db.prepare<[number, number], ProposalRow>(`
          SELECT * FROM proposals ORDER BY created_at, rowid LIMIT ? OFFSET ?
        `).all(limit, offset)
      : this.db.prepare<[string, number, number], ProposalRow>(`
          SELECT * FROM proposals WHERE status = ? ORDER BY created_at, rowid LIMIT ? OFFSET ?
        `).all(options.status, limit, offset);
    return this.proposalsFromRows(rows);
  }

  // ==========================================
  // STATS / SCANS
  // ==========================================

  getTableCounts(): TableCounts {
    const count = (table: string): number => {
      const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
      return row?.n ?? 0;
    };
    return {
      snapshots: count('snapshots'),
      analyses: count('analyses'),
      analysisSnapshots: count('analysis_snapshots'),
      outcomes: count('outcomes'),
      evaluations: count('evaluations'),
      proposals: count('proposals'),
      proposalEvaluations: count('proposal_evaluations')
    };
  }

  /**
   * Every stored record, decoded but NOT hash-checked, in insertion order
   */
  *scanRecords(): Generator<ScannedRecord> {
    for (const row of this.db.prepare<[], SnapshotRow>('SELECT * FROM snapshots ORDER BY rowid').iterate()) {
      yield this.scanned('snapshot', row.snapshot_id, () => ({ entityType: 'snapshot', record: decodeSnapshot(row) }));
    }

    const analysisRows = this.db.prepare<[], AnalysisRow>('SELECT * FROM analyses ORDER BY rowid').all();
    const analysisLinks = this.loadAnalysisLinks(analysisRows.map((row) => row.analysis_id));
    for (const row of analysisRows) {
      yield this.scanned('analysis', row.analysis_id, () => ({
        entityType: 'analysis',
        record: decodeAnalysis(row, analysisLinks.get(row.analysis_id) ?? [])
      }));
    }

    for (const row of this.db.prepare<[], OutcomeRow>('SELECT * FROM outcomes ORDER BY rowid').iterate()) {
      yield this.scanned('outcome', row.outcome_id, () => ({ entityType: 'outcome', record: decodeOutcome(row) }));
    }

    for (const row of this.db.prepare<[], EvaluationRow>('SELECT * FROM evaluations ORDER BY rowid').iterate()) {
      yield this.scanned('evaluation', row.evaluation_id, () => ({ entityType: 'evaluation', record: decodeEvaluation(row) }));
    }

    const proposalRows = this.db.prepare<[], ProposalRow>('SELECT * FROM proposals ORDER BY rowid').all();
    const proposalLinks = this.loadProposalLinks(proposalRows.map((row) => row.proposal_id));
    for (const row of proposalRows) {
      yield this.scanned('proposal', row.proposal_id, () => ({
        entityType: 'proposal',
        record: decodeProposal(row, proposalLinks.get(row.proposal_id) ?? [])
      }));
    }
  }

  private scanned(entityType: EntityType, id: string, decode: () => TypedRecord): ScannedRecord {
    try {
      return { ...decode(), readable: true, id };
    } catch (error) {
      if (error instanceof RecordDecodeError) {
        return { readable: false, entityType, id, error };
      }
      throw error;
    }
  }

  /**
   * Link rows and foreign columns whose target record is missing. Only
   * possible when rows were written around this class.
   */
  findDanglingReferences(): DanglingReference[] {
    const queries: Array<{ entityType: EntityType; field: string; sql: string }> = [
      {
        entityType: 'analysis',
        field: 'inputSnapshotIds',
        sql: `SELECT l.analysis_id AS id, l.snapshot_id AS ref FROM analysis_snapshots l
              LEFT JOIN snapshots s ON s.snapshot_id = l.snapshot_id WHERE s.snapshot_id IS NULL`
      },
      {
        entityType: 'analysis',
        field: 'parentAnalysisId',
        sql: `SELECT a.analysis_id AS id, a.parent_analysis_id AS ref FROM analyses a
              LEFT JOIN analyses p ON p.analysis_id = a.parent_analysis_id
              WHERE a.parent_analysis_id IS NOT NULL AND p.analysis_id IS NULL`
      },
      {
        entityType: 'outcome',
        field: 'supersedesOutcomeId',
        sql: `SELECT o.outcome_id AS id, o.supersedes_outcome_id AS ref FROM outcomes o
              LEFT JOIN outcomes p ON p.outcome_id = o.supersedes_outcome_id
              WHERE o.supersedes_outcome_id IS NOT NULL AND p.outcome_id IS NULL`
      },
      {
        entityType: 'evaluation',
        field: 'analysisId',
        sql: `SELECT e.evaluation_id AS id, e.analysis_id AS ref FROM evaluations e
              LEFT JOIN analyses a ON a.analysis_id = e.analysis_id WHERE a.analysis_id IS NULL`
      },
      {
        entityType: 'evaluation',
        field: 'outcomeId',
        sql: `SELECT e.evaluation_id AS id, e.outcome_id AS ref FROM evaluations e
              LEFT JOIN outcomes o ON o.outcome_id = e.outcome_id WHERE o.outcome_id IS NULL`
      },
      {
        entityType: 'proposal',
        field: 'basedOnEvaluationIds',
        sql: `SELECT l.proposal_id AS id, l.evaluation_id AS ref FROM proposal_evaluations l
              LEFT JOIN evaluations e ON e.evaluation_id = l.evaluation_id WHERE e.evaluation_id IS NULL`
      }
    ];

    return queries.flatMap(({ entityType, field, sql }) =>
      this.db.prepare<[], { id: string; ref: string }>(sql).all().map((row) => ({
        entityType,
        id: row.id,
        field,
        referencedId: row.ref
      }))
    );
  }
}
