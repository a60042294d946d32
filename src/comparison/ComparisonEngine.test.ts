/**
 * Comparison Engine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  americanToDecimal,
  americanToProbability,
  buildAnalysisDraft,
  centsToProbability,
  classifyEdge,
  computeDelta,
  isEdgeCandidate,
  midPrice,
  noVigFromAmerican,
  removeVig
} from './ComparisonEngine.js';
import { ValidationError } from '../core/errors.js';
import { AWAY, HOME, makeSnapshot } from '../testing/fixtures.js';

describe('americanToProbability', () => {
  it('converts favourites and underdogs', () => {
    expect(americanToProbability(-150)).toBeCloseTo(0.6, 6);
    expect(americanToProbability(130)).toBeCloseTo(0.434783, 6);
    expect(americanToProbability(100)).toBe(0.5);
  });

  it('rejects prices inside (-100, 100)', () => {
    expect(() => americanToProbability(50)).toThrow(ValidationError);
    expect(() => americanToProbability(-99)).toThrow(ValidationError);
  });
});

describe('americanToDecimal', () => {
  it('includes the stake', () => {
    expect(americanToDecimal(130)).toBeCloseTo(2.3, 10);
    expect(americanToDecimal(-150)).toBeCloseTo(1.666667, 6);
  });
});

describe('removeVig', () => {
  it('scales a -150 / +130 line to sum to one', () => {
    const line = noVigFromAmerican(-150, 130);
    expect(line.homeRaw).toBeCloseTo(0.6, 6);
    expect(line.awayRaw).toBeCloseTo(0.434783, 6);
    expect(line.homeProbability).toBeCloseTo(0.579832, 6);
    expect(line.awayProbability).toBeCloseTo(0.420168, 6);
    expect(line.homeProbability + line.awayProbability).toBeCloseTo(1, 12);
    expect(line.overround).toBeCloseTo(1.034783, 6);
  });

  it('rejects a zero total', () => {
    expect(() => removeVig(0, 0)).toThrow(ValidationError);
  });
});

describe('market prices', () => {
  it('treats missing and zero cents as no quote', () => {
    expect(centsToProbability(57)).toBe(0.57);
    expect(centsToProbability(0)).toBeNull();
    expect(centsToProbability(null)).toBeNull();
    expect(centsToProbability(undefined)).toBeNull();
  });

  it('takes the mid, or the one side quoted', () => {
    expect(midPrice(0.56, 0.58)).toBeCloseTo(0.57, 12);
    expect(midPrice(null, 0.58)).toBe(0.58);
    expect(midPrice(0.56, null)).toBe(0.56);
    expect(midPrice(null, null)).toBeNull();
  });
});

describe('edges', () => {
  it('computes a signed delta', () => {
    expect(computeDelta(0.57, 0.579832)).toBeCloseTo(-0.009832, 6);
  });

  it('flags only gaps strictly above the threshold', () => {
    expect(isEdgeCandidate(-0.009832)).toBe(false);
    expect(isEdgeCandidate(0.031)).toBe(true);
    expect(isEdgeCandidate(-0.05, 0.06)).toBe(false);
  });

  it('reports direction', () => {
    expect(classifyEdge(0.05).direction).toBe('market_higher');
    expect(classifyEdge(-0.05).direction).toBe('sportsbook_higher');
    expect(classifyEdge(0).direction).toBeNull();
  });
});

describe('buildAnalysisDraft', () => {
  it('finds no edge when the market sits near the no-vig line', () => {
    const draft = buildAnalysisDraft([makeSnapshot()]);

    expect(draft.derivedFeatures.homeTeam).toBe(HOME);
    expect(draft.derivedFeatures.awayTeam).toBe(AWAY);
    expect(draft.derivedFeatures.predictionSource).toBe('sportsbook_no_vig');
    expect(draft.derivedFeatures.predictedHomeProbability).toBeCloseTo(0.579832, 6);
    expect(draft.derivedFeatures.marketHomeProbability).toBeCloseTo(0.57, 12);
    expect(draft.derivedFeatures.delta).toBeCloseTo(-0.009832, 6);
    expect(draft.derivedFeatures.lineMovement).toBeNull();
    expect(draft.conclusions.edgeFlagged).toBe(false);
    expect(draft.conclusions.summary).toBe('Market within 3.0% of the sportsbook line (delta -0.98%). No edge.');
    expect(draft.recommendedActions).toEqual([]);
  });

  it('recommends buying YES when the market underprices the home side', () => {
    const draft = buildAnalysisDraft([makeSnapshot({ yesBid: 50, yesAsk: 52 })]);
    expect(draft.conclusions.edgeFlagged).toBe(true);
    expect(draft.derivedFeatures.edgeDirection).toBe('sportsbook_higher');

    const [contract, hedge] = draft.recommendedActions;
    expect(contract.type).toBe('market_position');
    expect(contract.side).toBe('home');
    if (contract.type === 'market_position') {
      expect(contract.contract).toBe('yes');
      expect(contract.entryPrice).toBe(0.52);
      expect(contract.marketId).toBe('GAME-HARBORS-PEAKS');
    }
    expect(hedge.type).toBe('sportsbook_bet');
    expect(hedge.side).toBe('away');
  });

  it('recommends NO at one minus the bid when the market overprices the home side', () => {
    const draft = buildAnalysisDraft([makeSnapshot({ yesBid: 64, yesAsk: 66 })]);
    const [contract] = draft.recommendedActions;
    expect(contract.type === 'market_position' && contract.contract).toBe('no');
    expect(contract.side).toBe('away');
    if (contract.type === 'market_position') {
      expect(contract.entryPrice).toBeCloseTo(0.36, 12);
    }
  });

  it('uses the latest snapshot and records line movement from the first', () => {
    const first = makeSnapshot({ collectedAt: '2024-02-29T12:00:00.000Z', homePrice: -140 });
    const latest = makeSnapshot({ collectedAt: '2024-02-29T18:00:00.000Z' });
    const draft = buildAnalysisDraft([latest, first]);

    expect(draft.derivedFeatures.basedOnSnapshotCollectedAt).toBe('2024-02-29T18:00:00.000Z');
    expect(draft.derivedFeatures.snapshotCount).toBe(2);
    expect(draft.derivedFeatures.lineMovement).toMatchObject({ elapsedSeconds: 21600, homeOddsChange: -10 });
  });

  it('needs at least one snapshot', () => {
    expect(() => buildAnalysisDraft([])).toThrow(ValidationError);
  });

  it('is deterministic for the same inputs', () => {
    const snapshot = makeSnapshot({ yesBid: 50, yesAsk: 52 });
    expect(buildAnalysisDraft([snapshot])).toEqual(buildAnalysisDraft([snapshot]));
  });
});
