/**
 * Comparison Engine
 *
 * Pure transforms from sportsbook odds and prediction-market prices to
 * comparable probabilities. Nothing here reads the clock, the environment or
 * the store, so the same snapshot inputs always produce the same analysis
 * content.
 */

import { ValidationError } from '../core/errors.js';
import type {
  ContractAction,
  EdgeDirection,
  JsonObject,
  RecommendedAction,
  Snapshot,
  SportsbookAction
} from '../core/types.js';
import { summarizeLineMovement, type LineMovement } from '../delta/DeltaComputer.js';
import { NormalizedGameFieldsSchema, parsePayload, type NormalizedGameFields } from '../validation/schemas.js';

export const DEFAULT_EDGE_THRESHOLD = 0.03;

/** Identifies the derivation recorded in derivedFeatures */
export const ANALYSIS_TYPE = 'market_vs_sportsbook_no_vig';

// ==========================================
// PROBABILITY MATH
// ==========================================

/**
 * Implied probability of an American moneyline, vig included.
 * -150 → 150 / 250 = 0.6; +130 → 100 / 230 ≈ 0.434783
 */
export function americanToProbability(odds: number): number {
  if (!Number.isFinite(odds) || Math.abs(odds) < 100) {
    throw new ValidationError('payload', [`American odds must be <= -100 or >= +100, got ${odds}`]);
  }
  return odds > 0 ? 100 / (odds + 100) : -odds / (-odds + 100);
}

/**
 * Decimal payout per unit staked (stake included)
 */
export function americanToDecimal(odds: number): number {
  americanToProbability(odds);
  return odds > 0 ? 1 + odds / 100 : 1 + 100 / -odds;
}

export interface NoVigLine {
  homeRaw: number;
  awayRaw: number;
  /** Sum of the raw implied probabilities; above 1 by the bookmaker's margin */
  overround: number;
  homeProbability: number;
  awayProbability: number;
}

/**
 * Scale a two-way market's implied probabilities so they sum to 1
 */
export function removeVig(homeRaw: number, awayRaw: number): NoVigLine {
  const overround = homeRaw + awayRaw;
  if (!(overround > 0)) {
    throw new ValidationError('payload', ['implied probabilities must sum to a positive number']);
  }
  return {
    homeRaw,
    awayRaw,
    overround,
    homeProbability: homeRaw / overround,
    awayProbability: awayRaw / overround
  };
}

export function noVigFromAmerican(homeOdds: number, awayOdds: number): NoVigLine {
  return removeVig(americanToProbability(homeOdds), americanToProbability(awayOdds));
}

/**
 * Prediction-market price in cents as a probability. A missing or zero
 * quote means no resting order on that side.
 */
export function centsToProbability(cents: number | null | undefined): number | null {
  if (cents === null || cents === undefined || cents === 0) return null;
  return cents / 100;
}

/**
 * Mid of best bid and best ask; falls back to whichever side is quoted
 */
export function midPrice(bid: number | null, ask: number | null): number | null {
  if (bid !== null && ask !== null) return (bid + ask) / 2;
  return bid ?? ask;
}

/**
 * Market probability minus fair (no-vig) probability, signed
 */
export function computeDelta(marketProbability: number, fairProbability: number): number {
  return marketProbability - fairProbability;
}

export interface EdgeSignal {
  delta: number;
  magnitude: number;
  isEdge: boolean;
  direction: EdgeDirection | null;
}

export function classifyEdge(delta: number, threshold: number = DEFAULT_EDGE_THRESHOLD): EdgeSignal {
  const magnitude = Math.abs(delta);
  return {
    delta,
    magnitude,
    isEdge: magnitude > threshold,
    direction: delta > 0 ? 'market_higher' : delta < 0 ? 'sportsbook_higher' : null
  };
}

export function isEdgeCandidate(delta: number, threshold: number = DEFAULT_EDGE_THRESHOLD): boolean {
  return classifyEdge(delta, threshold).isEdge;
}

// ==========================================
// GAME COMPARISON
// ==========================================

export interface GameComparison {
  homeTeam: string;
  awayTeam: string;
  /** Home-win probability the analysis stands behind */
  predictedHomeProbability: number | null;
  predictionSource: 'sportsbook_no_vig' | 'market_mid' | null;
  sportsbookHomeProbability: number | null;
  sportsbookVig: number | null;
  marketHomeProbability: number | null;
  edge: EdgeSignal | null;
}

export function readGameFields(snapshot: Snapshot): NormalizedGameFields {
  return parsePayload(NormalizedGameFieldsSchema, snapshot.normalizedFields, 'snapshot');
}

export function compareGame(fields: NormalizedGameFields, edgeThreshold: number = DEFAULT_EDGE_THRESHOLD): GameComparison {
  const sportsbookHome = fields.sportsbook?.homeNoVigProbability ?? null;
  const marketHome = fields.predictionMarket?.midProbability ?? null;

  let sportsbookVig: number | null = null;
  if (fields.sportsbook) {
    sportsbookVig = noVigFromAmerican(fields.sportsbook.homeOdds, fields.sportsbook.awayOdds).overround - 1;
  }

  const edge = sportsbookHome !== null && marketHome !== null
    ? classifyEdge(computeDelta(marketHome, sportsbookHome), edgeThreshold)
    : null;

  return {
    homeTeam: fields.homeTeam,
    awayTeam: fields.awayTeam,
    predictedHomeProbability: sportsbookHome ?? marketHome,
    predictionSource: sportsbookHome !== null ? 'sportsbook_no_vig' : marketHome !== null ? 'market_mid' : null,
    sportsbookHomeProbability: sportsbookHome,
    sportsbookVig,
    marketHomeProbability: marketHome,
    edge
  };
}

/**
 * Positions suggested by a flagged edge. The market's YES contract pays when
 * the home team wins: a market cheaper than fair means buy YES at the ask; a
 * market dearer than fair means buy NO at 1 - bid and back the away side at
 * the sportsbook.
 */
export function recommendActions(fields: NormalizedGameFields, comparison: GameComparison): RecommendedAction[] {
  const edge = comparison.edge;
  const line = fields.sportsbook;
  const quote = fields.predictionMarket;
  if (!edge || !edge.isEdge || !line || !quote || comparison.marketHomeProbability === null) {
    return [];
  }

  const mid = comparison.marketHomeProbability;
  const percent = (edge.magnitude * 100).toFixed(2);

  if (edge.delta < 0) {
    const contract: ContractAction = {
      type: 'market_position',
      venue: 'prediction_market',
      side: 'home',
      contract: 'yes',
      entryPrice: quote.yesAsk ?? mid,
      stake: 1,
      fairProbability: line.homeNoVigProbability,
      delta: edge.delta,
      marketId: quote.marketId,
      rationale: `${fields.homeTeam} priced ${percent}% below the no-vig sportsbook line`
    };
    const hedge: SportsbookAction = {
      type: 'sportsbook_bet',
      venue: 'sportsbook',
      side: 'away',
      americanOdds: line.awayOdds,
      stake: 1,
      fairProbability: line.awayNoVigProbability,
      rationale: `offsetting ${fields.awayTeam} moneyline`
    };
    return [contract, hedge];
  }

  const contract: ContractAction = {
    type: 'market_position',
    venue: 'prediction_market',
    side: 'away',
    contract: 'no',
    entryPrice: 1 - (quote.yesBid ?? mid),
    stake: 1,
    fairProbability: line.awayNoVigProbability,
    delta: edge.delta,
    marketId: quote.marketId,
    rationale: `${fields.homeTeam} priced ${percent}% above the no-vig sportsbook line`
  };
  const hedge: SportsbookAction = {
    type: 'sportsbook_bet',
    venue: 'sportsbook',
    side: 'home',
    americanOdds: line.homeOdds,
    stake: 1,
    fairProbability: line.homeNoVigProbability,
    rationale: `offsetting ${fields.homeTeam} moneyline`
  };
  return [contract, hedge];
}

// ==========================================
// ANALYSIS DRAFT
// ==========================================

export interface AnalysisDraftOptions {
  edgeThreshold?: number;
}

export interface AnalysisDraft {
  derivedFeatures: JsonObject;
  conclusions: JsonObject;
  recommendedActions: RecommendedAction[];
}

function summarize(comparison: GameComparison, threshold: number): string {
  const edge = comparison.edge;
  if (!edge) {
    return comparison.predictedHomeProbability === null
      ? 'No usable prices in the input snapshots.'
      : `Only one venue quoted ${comparison.homeTeam} vs ${comparison.awayTeam}; no comparison possible.`;
  }
  const percent = (edge.delta * 100).toFixed(2);
  if (!edge.isEdge) {
    return `Market within ${(threshold * 100).toFixed(1)}% of the sportsbook line (delta ${percent}%). No edge.`;
  }
  const side = edge.delta < 0 ? 'under' : 'over';
  return `Edge: market ${side}prices ${comparison.homeTeam} by ${Math.abs(edge.delta * 100).toFixed(2)}%.`;
}

function movementFeatures(movement: LineMovement | null): JsonObject | null {
  if (!movement) return null;
  return {
    elapsedSeconds: movement.elapsedSeconds,
    homeOddsChange: movement.homeOddsChange,
    awayOddsChange: movement.awayOddsChange,
    noVigShift: movement.noVigShift,
    midShift: movement.midShift
  };
}

/**
 * Derive analysis content from a game's snapshots. The latest snapshot
 * (by collectedAt) drives the comparison; the first and last bound the line
 * movement.
 */
export function buildAnalysisDraft(snapshots: readonly Snapshot[], options: AnalysisDraftOptions = {}): AnalysisDraft {
  if (snapshots.length === 0) {
    throw new ValidationError('analysis', ['at least one snapshot is required']);
  }
  const threshold = options.edgeThreshold ?? DEFAULT_EDGE_THRESHOLD;
  const ordered = [...snapshots].sort((a, b) => (a.collectedAt < b.collectedAt ? -1 : a.collectedAt > b.collectedAt ? 1 : 0));
  const first = ordered[0];
  const latest = ordered[ordered.length - 1];

  const fields = readGameFields(latest);
  const comparison = compareGame(fields, threshold);
  const movement = ordered.length > 1 ? summarizeLineMovement(first, latest) : null;
  const recommendedActions = recommendActions(fields, comparison);

  const derivedFeatures: JsonObject = {
    analysisType: ANALYSIS_TYPE,
    gameId: latest.gameId,
    homeTeam: fields.homeTeam,
    awayTeam: fields.awayTeam,
    basedOnSnapshotCollectedAt: latest.collectedAt,
    snapshotCount: ordered.length,
    predictedHomeProbability: comparison.predictedHomeProbability,
    predictionSource: comparison.predictionSource,
    sportsbookHomeProbability: comparison.sportsbookHomeProbability,
    sportsbookVig: comparison.sportsbookVig,
    marketHomeProbability: comparison.marketHomeProbability,
    delta: comparison.edge?.delta ?? null,
    edgeMagnitude: comparison.edge?.magnitude ?? null,
    edgeDirection: comparison.edge?.direction ?? null,
    edgeThreshold: threshold,
    lineMovement: movementFeatures(movement)
  };

  const conclusions: JsonObject = {
    edgeFlagged: comparison.edge?.isEdge ?? false,
    edgeCount: comparison.edge?.isEdge ? 1 : 0,
    summary: summarize(comparison, threshold)
  };

  return { derivedFeatures, conclusions, recommendedActions };
}
