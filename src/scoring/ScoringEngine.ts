/**
 * Scoring Engine
 *
 * Metrics joining an analysis to the outcome of its game. Pure functions;
 * the caller persists the resulting Evaluation.
 */

import { ValidationError } from '../core/errors.js';
import {
  TIE,
  type Analysis,
  type EdgeRealization,
  type Evaluation,
  type EvaluationMetrics,
  type JsonObject,
  type Outcome,
  type RecommendedAction
} from '../core/types.js';
import { americanToDecimal } from '../comparison/ComparisonEngine.js';

/** Probabilities are clamped to [ε, 1 - ε] before taking logs */
export const LOG_LOSS_EPSILON = 1e-9;

function assertProbability(p: number, name: string): void {
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new ValidationError('evaluation', [`${name} must be a probability in [0, 1], got ${p}`]);
  }
}

function assertBinary(actual: number): void {
  if (actual !== 0 && actual !== 1) {
    throw new ValidationError('evaluation', [`actual outcome must be 0 or 1, got ${actual}`]);
  }
}

export function brierScore(predicted: number, actual: number): number {
  assertProbability(predicted, 'predicted');
  assertBinary(actual);
  return (predicted - actual) ** 2;
}

export function logLoss(predicted: number, actual: number, epsilon: number = LOG_LOSS_EPSILON): number {
  assertProbability(predicted, 'predicted');
  assertBinary(actual);
  const p = Math.min(Math.max(predicted, epsilon), 1 - epsilon);
  return -(actual * Math.log(p) + (1 - actual) * Math.log(1 - p));
}

/**
 * 1 when the home team won, 0 otherwise (a tie is not a home win)
 */
export function actualOutcome(outcome: Outcome, homeTeam: string): 0 | 1 {
  if (outcome.winner === TIE) return 0;
  return outcome.winner === homeTeam ? 1 : 0;
}

/**
 * Whether the action's side won. null means the stake is returned (push).
 */
function actionWon(action: RecommendedAction, outcome: Outcome, homeTeam: string): boolean | null {
  const homeWon = actualOutcome(outcome, homeTeam) === 1;
  if (action.type === 'market_position') {
    // YES resolves on a home win; NO on anything else, ties included
    return action.contract === 'yes' ? homeWon : !homeWon;
  }
  if (outcome.winner === TIE) return null;
  return action.side === 'home' ? homeWon : !homeWon;
}

/**
 * (payout - stake) / stake for one action
 */
export function actionRoi(action: RecommendedAction, outcome: Outcome, homeTeam: string): number {
  if (!(action.stake > 0)) {
    throw new ValidationError('evaluation', [`stake must be positive, got ${action.stake}`]);
  }
  const won = actionWon(action, outcome, homeTeam);
  if (won === null) return 0;

  let payout = 0;
  if (won) {
    if (action.type === 'market_position') {
      if (!(action.entryPrice > 0 && action.entryPrice <= 1)) {
        throw new ValidationError('evaluation', [`entry price must be in (0, 1], got ${action.entryPrice}`]);
      }
      payout = action.stake / action.entryPrice;
    } else {
      payout = action.stake * americanToDecimal(action.americanOdds);
    }
  }
  return (payout - action.stake) / action.stake;
}

/**
 * ROI of the primary (first) recommended action; null when there is none
 */
export function roi(actions: readonly RecommendedAction[], outcome: Outcome, homeTeam: string): number | null {
  return actions.length > 0 ? actionRoi(actions[0], outcome, homeTeam) : null;
}

/**
 * Did the flagged edge point the right way? A negative delta backs the home
 * side, a positive one backs against it.
 */
export function edgeRealized(delta: number | null, edgeFlagged: boolean, actual: 0 | 1): EdgeRealization {
  if (!edgeFlagged || delta === null || delta === 0) return 'none';
  const backedHome = delta < 0;
  return backedHome === (actual === 1) ? 'realized' : 'missed';
}

// ==========================================
// ANALYSIS SCORING
// ==========================================

export interface ScoredAnalysis {
  metrics: EvaluationMetrics;
  notes: JsonObject;
}

function numberFeature(features: JsonObject, key: string): number | null {
  const value = features[key];
  return typeof value === 'number' ? value : null;
}

function stringFeature(features: JsonObject, key: string): string | null {
  const value = features[key];
  return typeof value === 'string' ? value : null;
}

/**
 * Whether the analysis made a home-win prediction; one built without any
 * usable price has nothing to score
 */
export function isScorable(analysis: Analysis): boolean {
  const features = analysis.derivedFeatures;
  return numberFeature(features, 'predictedHomeProbability') !== null && stringFeature(features, 'homeTeam') !== null;
}

/**
 * Score an analysis against the outcome of its game
 */
export function scoreAnalysis(analysis: Analysis, outcome: Outcome): ScoredAnalysis {
  const features = analysis.derivedFeatures;
  const predicted = numberFeature(features, 'predictedHomeProbability');
  const homeTeam = stringFeature(features, 'homeTeam');
  if (predicted === null || homeTeam === null) {
    throw new ValidationError('analysis', [
      `analysis ${analysis.analysisId} carries no home-win prediction to score`
    ]);
  }

  const actual = actualOutcome(outcome, homeTeam);
  const delta = numberFeature(features, 'delta');
  const flagged = analysis.conclusions.edgeFlagged === true;

  const metrics: EvaluationMetrics = {
    brierScore: brierScore(predicted, actual),
    logLoss: logLoss(predicted, actual),
    roi: roi(analysis.recommendedActions, outcome, homeTeam),
    edgeRealized: edgeRealized(delta, flagged, actual)
  };

  const notes: JsonObject = {
    predictedHomeProbability: predicted,
    actualOutcome: actual,
    homeTeam,
    winner: outcome.winner,
    finalScore: { home: outcome.finalScore.home, away: outcome.finalScore.away },
    outcomeRevision: outcome.revision,
    actionReturns: analysis.recommendedActions.map((action) => ({
      type: action.type,
      side: action.side,
      roi: actionRoi(action, outcome, homeTeam)
    }))
  };

  return { metrics, notes };
}

// ==========================================
// AGGREGATE REPORT
// ==========================================

export interface EvaluationReport {
  evaluationCount: number;
  meanBrierScore: number | null;
  meanLogLoss: number | null;
  scoredBets: number;
  meanRoi: number | null;
  totalRoi: number | null;
  edgesRealized: number;
  edgesMissed: number;
  edgeWinRate: number | null;
  interpretation: string;
}

function mean(values: readonly number[]): number | null {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
}

/** Below this mean Brier score forecasts are read as good */
export const GOOD_BRIER = 0.2;
export const FAIR_BRIER = 0.25;
/** Edge win rate that suggests the signal carries information */
export const WORKING_EDGE_RATE = 0.55;

function interpret(report: Omit<EvaluationReport, 'interpretation'>): string {
  if (report.evaluationCount === 0) return 'No evaluations yet.';
  const parts: string[] = [];

  if (report.meanBrierScore !== null) {
    const quality = report.meanBrierScore < GOOD_BRIER ? 'good' : report.meanBrierScore < FAIR_BRIER ? 'fair' : 'poor';
    parts.push(`Brier ${report.meanBrierScore.toFixed(3)} (${quality} calibration)`);
  }
  if (report.meanRoi !== null) {
    const sign = report.meanRoi >= 0 ? '+' : '';
    parts.push(`ROI ${sign}${(report.meanRoi * 100).toFixed(1)}% (${report.meanRoi > 0 ? 'profitable' : 'losing'})`);
  }
  if (report.edgeWinRate !== null) {
    const verdict = report.edgeWinRate > WORKING_EDGE_RATE ? 'edge signal working' : 'edge signal not yet proven';
    parts.push(`edge win rate ${(report.edgeWinRate * 100).toFixed(1)}% (${verdict})`);
  }
  return parts.join('; ') + '.';
}

export function aggregateEvaluations(evaluations: readonly Evaluation[]): EvaluationReport {
  const rois = evaluations.flatMap((evaluation) => (evaluation.metrics.roi === null ? [] : [evaluation.metrics.roi]));
  const realized = evaluations.filter((evaluation) => evaluation.metrics.edgeRealized === 'realized').length;
  const missed = evaluations.filter((evaluation) => evaluation.metrics.edgeRealized === 'missed').length;

  const partial: Omit<EvaluationReport, 'interpretation'> = {
    evaluationCount: evaluations.length,
    meanBrierScore: mean(evaluations.map((evaluation) => evaluation.metrics.brierScore)),
    meanLogLoss: mean(evaluations.map((evaluation) => evaluation.metrics.logLoss)),
    scoredBets: rois.length,
    meanRoi: mean(rois),
    totalRoi: rois.length > 0 ? rois.reduce((sum, value) => sum + value, 0) : null,
    edgesRealized: realized,
    edgesMissed: missed,
    edgeWinRate: realized + missed > 0 ? realized / (realized + missed) : null
  };

  return { ...partial, interpretation: interpret(partial) };
}
