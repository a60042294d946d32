/**
 * Ledger schema
 *
 * One table per record kind plus the two join tables. Every table is guarded by
 * BEFORE UPDATE / BEFORE DELETE triggers; the proposals table admits a single
 * kind of update, a forward status move that also rewrites the hash.
 */

import type { EntityType } from '../core/types.js';

/** Prefix of every trigger abort message, parsed back into ImmutabilityViolationError */
export const IMMUTABLE_ABORT_PREFIX = 'matchledger-immutable';

/** Bumped whenever TABLES_SQL or TRIGGERS_SQL changes shape */
export const LEDGER_SCHEMA_REVISION = '1';

export const TABLES_SQL = `
CREATE TABLE IF NOT EXISTS ledger_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS snapshots (
  snapshot_id TEXT PRIMARY KEY,
  game_id TEXT NOT NULL,
  collected_at TEXT NOT NULL,
  schema_version TEXT NOT NULL,
  source_versions TEXT NOT NULL,
  raw_payloads TEXT NOT NULL,
  normalized_fields TEXT NOT NULL,
  hash TEXT NOT NULL UNIQUE,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_snapshots_game ON snapshots(game_id, collected_at);

CREATE TABLE IF NOT EXISTS analyses (
  analysis_id TEXT PRIMARY KEY,
  game_id TEXT NOT NULL,
  created_at TEXT NOT NULL,
  analysis_version TEXT NOT NULL,
  code_version TEXT NOT NULL,
  model_version TEXT,
  parent_analysis_id TEXT REFERENCES analyses(analysis_id),
  derived_features TEXT NOT NULL,
  conclusions TEXT NOT NULL,
  recommended_actions TEXT NOT NULL,
  hash TEXT NOT NULL UNIQUE,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_analyses_parent ON analyses(parent_analysis_id);
CREATE INDEX IF NOT EXISTS idx_analyses_game ON analyses(game_id, created_at);
CREATE INDEX IF NOT EXISTS idx_analyses_created ON analyses(created_at);

CREATE TABLE IF NOT EXISTS analysis_snapshots (
  analysis_id TEXT NOT NULL REFERENCES analyses(analysis_id),
  snapshot_id TEXT NOT NULL REFERENCES snapshots(snapshot_id),
  position INTEGER NOT NULL,
  PRIMARY KEY (analysis_id, snapshot_id)
);
CREATE INDEX IF NOT EXISTS idx_analysis_snapshots_snapshot ON analysis_snapshots(snapshot_id);

CREATE TABLE IF NOT EXISTS outcomes (
  outcome_id TEXT PRIMARY KEY,
  game_id TEXT NOT NULL,
  occurred_at TEXT NOT NULL,
  final_score TEXT NOT NULL,
  winner TEXT NOT NULL,
  stats_summary TEXT NOT NULL,
  source TEXT NOT NULL,
  revision INTEGER NOT NULL,
  supersedes_outcome_id TEXT REFERENCES outcomes(outcome_id),
  hash TEXT NOT NULL UNIQUE,
  recorded_at TEXT NOT NULL,
  UNIQUE (game_id, revision)
);

CREATE TABLE IF NOT EXISTS evaluations (
  evaluation_id TEXT PRIMARY KEY,
  analysis_id TEXT NOT NULL REFERENCES analyses(analysis_id),
  game_id TEXT NOT NULL,
  outcome_id TEXT NOT NULL REFERENCES outcomes(outcome_id),
  scored_at TEXT NOT NULL,
  brier_score REAL NOT NULL,
  log_loss REAL NOT NULL,
  roi REAL,
  edge_realized TEXT NOT NULL,
  notes TEXT NOT NULL,
  hash TEXT NOT NULL UNIQUE,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_evaluations_analysis ON evaluations(analysis_id);
CREATE INDEX IF NOT EXISTS idx_evaluations_game ON evaluations(game_id);

CREATE TABLE IF NOT EXISTS proposals (
  proposal_id TEXT PRIMARY KEY,
  created_at TEXT NOT NULL,
  proposal_text TEXT NOT NULL,
  suggested_schema_additions TEXT,
  suggested_modules TEXT,
  expected_impact TEXT,
  status TEXT NOT NULL,
  hash TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_proposals_hash ON proposals(hash);
CREATE INDEX IF NOT EXISTS idx_proposals_status ON proposals(status, created_at);

CREATE TABLE IF NOT EXISTS proposal_evaluations (
  proposal_id TEXT NOT NULL REFERENCES proposals(proposal_id),
  evaluation_id TEXT NOT NULL REFERENCES evaluations(evaluation_id),
  position INTEGER NOT NULL,
  PRIMARY KEY (proposal_id, evaluation_id)
);
`;

/** Physical table behind each trigger, with the entity it reports as */
const GUARDED_TABLES: Array<{ table: string; entity: EntityType }> = [
  { table: 'snapshots', entity: 'snapshot' },
  { table: 'analyses', entity: 'analysis' },
  { table: 'analysis_snapshots', entity: 'analysis' },
  { table: 'outcomes', entity: 'outcome' },
  { table: 'evaluations', entity: 'evaluation' },
  { table: 'proposal_evaluations', entity: 'proposal' }
];

function denyTrigger(table: string, entity: EntityType, operation: 'update' | 'delete'): string {
  const event = operation.toUpperCase();
  return `
CREATE TRIGGER IF NOT EXISTS deny_${table}_${operation}
BEFORE ${event} ON ${table}
BEGIN
  SELECT RAISE(ABORT, '${IMMUTABLE_ABORT_PREFIX}:${operation}:${entity}');
END;`;
}

export const TRIGGERS_SQL = [
  ...GUARDED_TABLES.flatMap(({ table, entity }) => [
    denyTrigger(table, entity, 'update'),
    denyTrigger(table, entity, 'delete')
  ]),
  denyTrigger('proposals', 'proposal', 'delete'),
  `
CREATE TRIGGER IF NOT EXISTS deny_proposals_content_update
BEFORE UPDATE ON proposals
WHEN NEW.proposal_id IS NOT OLD.proposal_id
  OR NEW.created_at IS NOT OLD.created_at
  OR NEW.proposal_text IS NOT OLD.proposal_text
  OR NEW.suggested_schema_additions IS NOT OLD.suggested_schema_additions
  OR NEW.suggested_modules IS NOT OLD.suggested_modules
  OR NEW.expected_impact IS NOT OLD.expected_impact
  OR NEW.recorded_at IS NOT OLD.recorded_at
  OR NEW.status IS OLD.status
BEGIN
  SELECT RAISE(ABORT, '${IMMUTABLE_ABORT_PREFIX}:update:proposal');
END;`,
  `
CREATE TRIGGER IF NOT EXISTS deny_proposals_backward_status
BEFORE UPDATE OF status ON proposals
WHEN NOT (
  (OLD.status = 'pending' AND NEW.status IN ('accepted', 'rejected', 'implemented'))
  OR (OLD.status = 'accepted' AND NEW.status = 'implemented')
)
BEGIN
  SELECT RAISE(ABORT, '${IMMUTABLE_ABORT_PREFIX}:transition:proposal');
END;`
].join('\n');
