/**
 * Analysis Service
 *
 * Runs the comparison over a game's snapshots and records the result. With
 * an `asOf` bound only snapshots collected by then are read, so an old
 * analysis can be reproduced exactly.
 */

import { NotFoundError } from '../core/errors.js';
import { createAnalysis, toIsoTimestamp } from '../core/records.js';
import type { Analysis } from '../core/types.js';
import { buildAnalysisDraft } from '../comparison/ComparisonEngine.js';
import { canonicalize, hashableFields } from '../hashing/CanonicalHasher.js';
import type { LedgerStorage } from '../storage/LedgerStorage.js';
import { runBatch, type BatchOptions, type BatchReport } from './BatchRunner.js';

export interface AnalysisSettings {
  analysisVersion: string;
  codeVersion: string;
  modelVersion: string | null;
  edgeThreshold: number;
}

export interface AnalyzeOptions {
  /** Explicit parent analysis id */
  parentAnalysisId?: string | null;
  /** Chain onto the game's most recent analysis when no parent is given */
  chain?: boolean;
  asOf?: string;
}

export interface AnalyzeResult {
  analysis: Analysis;
  created: boolean;
}

/**
 * Same content on everything the hash covers except the parent pointer
 */
function sameConclusions(a: Analysis, b: Analysis): boolean {
  const { parentAnalysisId: _a, ...left } = hashableFields('analysis', a);
  const { parentAnalysisId: _b, ...right } = hashableFields('analysis', b);
  return canonicalize(left) === canonicalize(right);
}

export class AnalysisService {
  private storage: LedgerStorage;
  private settings: AnalysisSettings;

  constructor(storage: LedgerStorage, settings: AnalysisSettings) {
    this.storage = storage;
    this.settings = settings;
  }

  analyzeGame(gameId: string, options: AnalyzeOptions = {}): AnalyzeResult {
    const asOf = options.asOf === undefined ? undefined : toIsoTimestamp(options.asOf, 'analysis', 'asOf');
    const snapshots = this.storage.listByGame(gameId, { asOf });
    if (snapshots.length === 0) {
      throw new NotFoundError('snapshot', asOf ? `${gameId} (as of ${asOf})` : gameId);
    }

    const draft = buildAnalysisDraft(snapshots, { edgeThreshold: this.settings.edgeThreshold });

    const parent = this.resolveParent(gameId, options);
    const analysis = createAnalysis({
      analysisVersion: this.settings.analysisVersion,
      codeVersion: this.settings.codeVersion,
      modelVersion: this.settings.modelVersion,
      parentAnalysisId: parent?.analysisId ?? null,
      inputSnapshotIds: snapshots.map((snapshot) => snapshot.snapshotId),
      ...draft
    });

    // A chained child identical to its parent apart from the pointer is not recorded
    if (parent && options.chain && !options.parentAnalysisId && sameConclusions(parent, analysis)) {
      console.log(`[AnalysisService] Latest analysis ${parent.analysisId} for ${gameId} is unchanged; nothing chained`);
      return { analysis: parent, created: false };
    }

    const result = this.storage.insertAnalysis(analysis);
    if (!result.created) {
      console.log(`[AnalysisService] Identical analysis for ${gameId} already recorded as ${result.record.analysisId}`);
    }
    return { analysis: result.record, created: result.created };
  }

  private resolveParent(gameId: string, options: AnalyzeOptions): Analysis | null {
    if (options.parentAnalysisId) return this.storage.require('analysis', options.parentAnalysisId);
    if (!options.chain) return null;
    const previous = this.storage.listAnalysesForGame(gameId);
    return previous.length > 0 ? previous[previous.length - 1] : null;
  }

  /**
   * Analyze every game with snapshots; a game that fails is reported, not fatal
   */
  analyzeAll(options: Omit<AnalyzeOptions, 'parentAnalysisId'> & BatchOptions = {}): Promise<BatchReport<Analysis>> {
    const { chain, asOf, ...batch } = options;
    return runBatch(this.storage.listGameIds(), (gameId) => {
      const { analysis, created } = this.analyzeGame(gameId, { chain, asOf });
      return created
        ? { status: 'succeeded', value: analysis, detail: String(analysis.conclusions.summary ?? '') }
        : { status: 'skipped', value: analysis, detail: 'no new snapshots since the last identical analysis' };
    }, batch);
  }
}
