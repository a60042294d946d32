/**
 * Evaluation Service
 *
 * Scores analyses once their game has a result. An analysis is pending when
 * it carries a prediction, its game has an outcome, and no evaluation against
 * the current revision of that outcome exists yet.
 */

import { IntegrityError, NotFoundError } from '../core/errors.js';
import { createEvaluation } from '../core/records.js';
import type { Evaluation } from '../core/types.js';
import { aggregateEvaluations, isScorable, scoreAnalysis, type EvaluationReport } from '../scoring/ScoringEngine.js';
import type { LedgerStorage } from '../storage/LedgerStorage.js';
import { runBatch, type BatchOptions, type BatchReport } from './BatchRunner.js';

export interface EvaluateResult {
  evaluation: Evaluation;
  created: boolean;
}

export class EvaluationService {
  private storage: LedgerStorage;

  constructor(storage: LedgerStorage) {
    this.storage = storage;
  }

  evaluateAnalysis(analysisId: string): EvaluateResult {
    const analysis = this.storage.require('analysis', analysisId);
    const gameId = this.storage.gameIdOfAnalysis(analysisId);
    if (gameId === null) {
      throw new IntegrityError(`Analysis ${analysisId} has no linked snapshots`);
    }

    const outcome = this.storage.getOutcomeForGame(gameId);
    if (!outcome) {
      throw new NotFoundError('outcome', gameId);
    }

    const { metrics, notes } = scoreAnalysis(analysis, outcome);
    const evaluation = createEvaluation({
      analysisId,
      gameId,
      outcomeId: outcome.outcomeId,
      metrics,
      notes
    });

    const result = this.storage.insertEvaluation(evaluation);
    return { evaluation: result.record, created: result.created };
  }

  /**
   * Analyses without a prediction are never pending: no outcome can score them
   */
  pendingAnalysisIds(): string[] {
    const pending: string[] = [];
    for (const analysis of this.storage.listAnalyses()) {
      if (!isScorable(analysis)) continue;
      const gameId = this.storage.gameIdOfAnalysis(analysis.analysisId);
      if (gameId === null) continue;
      const outcome = this.storage.getOutcomeForGame(gameId);
      if (!outcome) continue;
      const scored = this.storage
        .listEvaluationsForAnalysis(analysis.analysisId)
        .some((evaluation) => evaluation.outcomeId === outcome.outcomeId);
      if (!scored) pending.push(analysis.analysisId);
    }
    return pending;
  }

  evaluateAllPending(options: BatchOptions = {}): Promise<BatchReport<Evaluation>> {
    const pending = this.pendingAnalysisIds();
    console.log(`[EvaluationService] ${pending.length} analysis(es) awaiting evaluation`);
    return runBatch(pending, (analysisId) => {
      const { evaluation, created } = this.evaluateAnalysis(analysisId);
      return created
        ? { status: 'succeeded', value: evaluation, detail: `brier ${evaluation.metrics.brierScore.toFixed(4)}` }
        : { status: 'skipped', value: evaluation, detail: 'already evaluated' };
    }, options);
  }

  /**
   * Aggregate over the latest evaluation of each analysis, so a corrected
   * outcome does not count the same analysis twice
   */
  report(): EvaluationReport {
    const latest = new Map<string, Evaluation>();
    for (const evaluation of this.storage.listEvaluations()) {
      latest.set(evaluation.analysisId, evaluation);
    }
    return aggregateEvaluations([...latest.values()]);
  }
}
