/**
 * Provider normalizers
 *
 * Turn verbatim provider payloads into the normalized game fields stored on a
 * snapshot. The raw payloads themselves are kept untouched alongside.
 */

import { readFileSync } from 'fs';
import { ValidationError } from '../core/errors.js';
import {
  OddsEventSchema,
  PredictionMarketPayloadSchema,
  parsePayload,
  type Market,
  type MarketQuote,
  type NormalizedGameFields,
  type OddsEvent,
  type SportsbookLine
} from '../validation/schemas.js';
import { centsToProbability, midPrice, noVigFromAmerican } from './ComparisonEngine.js';
import type { JsonValue } from '../core/types.js';

/** Moneyline market key in odds feeds */
export const MONEYLINE_MARKET = 'h2h';

// ==========================================
// SPORTSBOOK
// ==========================================

export interface BestMoneyline {
  homeOdds: number | null;
  awayOdds: number | null;
  bookmakerCount: number;
}

/**
 * Best price per side across all bookmakers. A higher American price always
 * pays more, for favourites (-110 beats -120) and underdogs alike.
 */
export function bestMoneyline(event: OddsEvent): BestMoneyline {
  let homeOdds: number | null = null;
  let awayOdds: number | null = null;

  for (const bookmaker of event.bookmakers) {
    for (const market of bookmaker.markets) {
      if (market.key !== MONEYLINE_MARKET) continue;
      for (const outcome of market.outcomes) {
        if (outcome.name === event.home_team) {
          if (homeOdds === null || outcome.price > homeOdds) homeOdds = outcome.price;
        } else if (outcome.name === event.away_team) {
          if (awayOdds === null || outcome.price > awayOdds) awayOdds = outcome.price;
        }
      }
    }
  }

  return { homeOdds, awayOdds, bookmakerCount: event.bookmakers.length };
}

export function normalizeSportsbookLine(event: OddsEvent): SportsbookLine | null {
  const best = bestMoneyline(event);
  if (best.homeOdds === null || best.awayOdds === null) return null;
  const noVig = noVigFromAmerican(best.homeOdds, best.awayOdds);
  return {
    homeOdds: best.homeOdds,
    awayOdds: best.awayOdds,
    bookmakerCount: best.bookmakerCount,
    homeNoVigProbability: noVig.homeProbability,
    awayNoVigProbability: noVig.awayProbability
  };
}

// ==========================================
// PREDICTION MARKET
// ==========================================

let cityWords: Set<string> | null = null;

/** Place-name words that never identify a team on their own */
function loadCityWords(): Set<string> {
  if (!cityWords) {
    const words: unknown = JSON.parse(readFileSync(new URL('../../data/city-words.json', import.meta.url), 'utf-8'));
    cityWords = new Set(Array.isArray(words) ? words.filter((word): word is string => typeof word === 'string') : []);
  }
  return cityWords;
}

/**
 * Search words for a team: the full name plus its nickname, unless the last
 * word is a place name ("Los Angeles Lakers" → "lakers")
 */
export function teamKeywords(teamName: string): string[] {
  const lower = teamName.toLowerCase().trim();
  const words = lower.split(/\s+/).filter(Boolean);
  const keywords = [lower];
  const nickname = words[words.length - 1];
  if (nickname && words.length > 1 && !loadCityWords().has(nickname)) {
    keywords.push(nickname);
  }
  return keywords;
}

/**
 * First market whose title names both teams
 */
export function findMarketForGame(markets: readonly Market[], homeTeam: string, awayTeam: string): Market | null {
  const homeKeys = teamKeywords(homeTeam);
  const awayKeys = teamKeywords(awayTeam);
  for (const market of markets) {
    const title = market.title.toLowerCase();
    if (homeKeys.some((key) => title.includes(key)) && awayKeys.some((key) => title.includes(key))) {
      return market;
    }
  }
  return null;
}

export function normalizeMarketQuote(market: Market): MarketQuote {
  const yesBid = centsToProbability(market.yes_bid);
  const yesAsk = centsToProbability(market.yes_ask);
  return {
    marketId: market.ticker,
    title: market.title,
    yesBid,
    yesAsk,
    volume: market.volume ?? null,
    midProbability: midPrice(yesBid, yesAsk)
  };
}

// ==========================================
// GAME FIELDS
// ==========================================

export interface ProviderPayloads {
  sportsbook?: JsonValue;
  predictionMarket?: JsonValue;
  /** Team names when no sportsbook event supplies them */
  homeTeam?: string;
  awayTeam?: string;
}

export function normalizeGameFields(payloads: ProviderPayloads): NormalizedGameFields {
  const event = payloads.sportsbook === undefined
    ? null
    : parsePayload(OddsEventSchema, payloads.sportsbook, 'snapshot');

  const homeTeam = event?.home_team ?? payloads.homeTeam;
  const awayTeam = event?.away_team ?? payloads.awayTeam;
  if (!homeTeam || !awayTeam) {
    throw new ValidationError('snapshot', ['team names are required when no sportsbook event is supplied']);
  }

  let predictionMarket: MarketQuote | null = null;
  if (payloads.predictionMarket !== undefined) {
    const { markets } = parsePayload(PredictionMarketPayloadSchema, payloads.predictionMarket, 'snapshot');
    const market = markets.length === 1 ? markets[0] : findMarketForGame(markets, homeTeam, awayTeam);
    predictionMarket = market ? normalizeMarketQuote(market) : null;
  }

  return {
    homeTeam,
    awayTeam,
    commenceTime: event?.commence_time ?? null,
    sportsbook: event ? normalizeSportsbookLine(event) : null,
    predictionMarket
  };
}
