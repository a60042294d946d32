/**
 * Test fixtures: provider payloads and ready-made records
 */

import { createAnalysis, createOutcome, createSnapshot } from '../core/records.js';
import type { Analysis, JsonObject, Outcome, Snapshot } from '../core/types.js';
import { normalizeGameFields } from '../comparison/normalizers.js';

export const HOME = 'Boston Harbors';
export const AWAY = 'Denver Peaks';

export function oddsEvent(homePrice = -150, awayPrice = 130): JsonObject {
  return {
    id: 'evt-1',
    sport_key: 'basketball_test',
    commence_time: '2024-03-01T00:00:00Z',
    home_team: HOME,
    away_team: AWAY,
    bookmakers: [
      {
        key: 'book-a',
        markets: [
          {
            key: 'h2h',
            outcomes: [
              { name: HOME, price: homePrice },
              { name: AWAY, price: awayPrice }
            ]
          }
        ]
      }
    ]
  };
}

export function marketPayload(yesBid: number | null = 56, yesAsk: number | null = 58): JsonObject {
  return {
    markets: [
      {
        ticker: 'GAME-HARBORS-PEAKS',
        title: 'Harbors vs Peaks winner?',
        yes_bid: yesBid,
        yes_ask: yesAsk,
        volume: 1200
      }
    ]
  };
}

export interface PayloadOptions {
  gameId?: string;
  collectedAt?: string;
  homePrice?: number;
  awayPrice?: number;
  yesBid?: number | null;
  yesAsk?: number | null;
}

export function collectorPayload(options: PayloadOptions = {}): JsonObject {
  return {
    gameId: options.gameId ?? 'game-1',
    collectedAt: options.collectedAt ?? '2024-02-29T18:00:00.000Z',
    sources: {
      sportsbook: { version: 'odds-v4', payload: oddsEvent(options.homePrice, options.awayPrice) },
      predictionMarket: { version: 'markets-v2', payload: marketPayload(options.yesBid, options.yesAsk) }
    }
  };
}

export function makeSnapshot(options: PayloadOptions = {}): Snapshot {
  const sportsbook = oddsEvent(options.homePrice, options.awayPrice);
  const predictionMarket = marketPayload(options.yesBid, options.yesAsk);
  return createSnapshot({
    gameId: options.gameId ?? 'game-1',
    collectedAt: options.collectedAt ?? '2024-02-29T18:00:00.000Z',
    schemaVersion: 'v1',
    sourceVersions: { sportsbook: 'odds-v4', predictionMarket: 'markets-v2' },
    rawPayloads: { sportsbook, predictionMarket },
    normalizedFields: normalizeGameFields({ sportsbook, predictionMarket })
  });
}

export function makeAnalysis(
  snapshots: readonly Snapshot[],
  options: { parentAnalysisId?: string | null; createdAt?: string; label?: string } = {}
): Analysis {
  return createAnalysis({
    analysisVersion: '1.0.0',
    codeVersion: 'test-rev',
    parentAnalysisId: options.parentAnalysisId ?? null,
    inputSnapshotIds: snapshots.map((snapshot) => snapshot.snapshotId),
    derivedFeatures: {
      homeTeam: HOME,
      awayTeam: AWAY,
      predictedHomeProbability: 0.7,
      delta: null,
      label: options.label ?? 'base'
    },
    conclusions: { edgeFlagged: false },
    recommendedActions: [],
    createdAt: options.createdAt ?? '2024-02-29T19:00:00.000Z'
  });
}

export function makeOutcome(options: { gameId?: string; home?: number; away?: number } = {}): Outcome {
  const home = options.home ?? 102;
  const away = options.away ?? 97;
  return createOutcome({
    gameId: options.gameId ?? 'game-1',
    occurredAt: '2024-03-01T02:30:00.000Z',
    finalScore: { home, away },
    winner: home > away ? HOME : away > home ? AWAY : 'tie',
    source: 'test-feed'
  });
}
