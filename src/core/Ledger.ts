/**
 * Ledger
 *
 * Facade over the store and the services that write to it. Construction
 * opens the database; `initialize()` resolves the code version stamped on
 * new analyses and must run before anything is analyzed.
 */

import { simpleGit } from 'simple-git';

import { LedgerStorage } from '../storage/LedgerStorage.js';
import { LineageGraph } from '../lineage/LineageGraph.js';
import { IntegrityVerifier, type VerificationReport } from '../integrity/IntegrityVerifier.js';
import { CollectorService } from '../services/CollectorService.js';
import { OutcomeService } from '../services/OutcomeService.js';
import { AnalysisService } from '../services/AnalysisService.js';
import { EvaluationService } from '../services/EvaluationService.js';
import { ProposalService } from '../services/ProposalService.js';
import {
  assertValidConfig,
  getDefaultConfig,
  mergeConfig,
  type Environment,
  type LedgerConfigOverrides
} from './config.js';
import { LedgerError } from './errors.js';
import type { LedgerConfig, TableCounts } from './types.js';

export const UNKNOWN_CODE_VERSION = 'unknown';

/**
 * Commit hash of the checkout at `cwd`, or 'unknown' outside a git work tree
 */
export async function resolveCodeVersion(cwd: string = process.cwd()): Promise<string> {
  try {
    const head = await simpleGit({ baseDir: cwd }).revparse(['HEAD']);
    return head.trim() || UNKNOWN_CODE_VERSION;
  } catch (error) {
    console.log(`[Ledger] No git revision available: ${error instanceof Error ? error.message : String(error)}`);
    return UNKNOWN_CODE_VERSION;
  }
}

export interface LedgerStatus {
  sqlitePath: string;
  schemaRevision: string | null;
  createdAt: string | null;
  codeVersion: string | null;
  counts: TableCounts;
  games: number;
  gamesAwaitingOutcome: number;
  pendingEvaluations: number;
}

export class Ledger {
  private config: LedgerConfig;
  private initialized = false;
  private analysisService: AnalysisService | null = null;

  readonly storage: LedgerStorage;
  readonly lineage: LineageGraph;
  readonly collector: CollectorService;
  readonly outcomes: OutcomeService;
  readonly evaluations: EvaluationService;
  readonly proposals: ProposalService;

  constructor(configOverrides: LedgerConfigOverrides = {}, env?: Environment) {
    const defaults = getDefaultConfig(configOverrides.dataDir, env);
    this.config = assertValidConfig(mergeConfig(defaults, configOverrides));

    this.storage = new LedgerStorage(this.config.storage);
    this.lineage = new LineageGraph(this.storage);
    this.collector = new CollectorService(this.storage, this.config.schemaVersion);
    this.outcomes = new OutcomeService(this.storage);
    this.evaluations = new EvaluationService(this.storage);
    this.proposals = new ProposalService(this.storage);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const codeVersion = this.config.codeVersion ?? await resolveCodeVersion();
    this.config = { ...this.config, codeVersion };
    this.analysisService = new AnalysisService(this.storage, {
      analysisVersion: this.config.analysisVersion,
      codeVersion,
      modelVersion: this.config.modelVersion,
      edgeThreshold: this.config.edgeThreshold
    });

    this.initialized = true;
  }

  get analysis(): AnalysisService {
    if (!this.analysisService) {
      throw new LedgerError('Ledger not initialized. Call initialize() first.');
    }
    return this.analysisService;
  }

  verify(): VerificationReport {
    return new IntegrityVerifier(this.storage).verify();
  }

  status(): LedgerStatus {
    return {
      sqlitePath: this.config.storage.sqlitePath,
      schemaRevision: this.storage.getMeta('schema_revision'),
      createdAt: this.storage.getMeta('created_at'),
      codeVersion: this.config.codeVersion,
      counts: this.storage.getTableCounts(),
      games: this.storage.listGameIds().length,
      gamesAwaitingOutcome: this.outcomes.gamesAwaitingOutcome().length,
      pendingEvaluations: this.evaluations.pendingAnalysisIds().length
    };
  }

  /** Concurrency for batch commands, from configuration */
  get batchConcurrency(): number {
    return this.config.batchConcurrency;
  }

  getConfig(): LedgerConfig {
    return { ...this.config, storage: { ...this.config.storage } };
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  close(): void {
    this.storage.close();
    this.analysisService = null;
    this.initialized = false;
  }
}
