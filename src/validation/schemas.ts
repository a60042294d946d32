/**
 * Payload schemas
 *
 * zod schemas for everything that enters the ledger from outside: collector
 * payloads, outcome reports and proposal content, plus the normalized game
 * fields the comparison engine reads back out of a snapshot.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { EntityType, JsonValue } from '../core/types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

const TimestampSchema = z.string().datetime({ offset: true });

// ==========================================
// PROVIDER PAYLOADS
// ==========================================

const AmericanOddsSchema = z.number().finite().refine((value) => Math.abs(value) >= 100, {
  message: 'American odds must be <= -100 or >= +100'
});

/** One event from a sportsbook odds feed, with per-bookmaker markets */
export const OddsEventSchema = z.object({
  id: z.string().optional(),
  sport_key: z.string().optional(),
  commence_time: TimestampSchema.optional(),
  home_team: z.string().min(1),
  away_team: z.string().min(1),
  bookmakers: z.array(z.object({
    key: z.string(),
    title: z.string().optional(),
    markets: z.array(z.object({
      key: z.string(),
      outcomes: z.array(z.object({
        name: z.string(),
        price: AmericanOddsSchema
      }))
    }))
  })).default([])
});

const CentsSchema = z.number().min(0).max(100).nullable().optional();

/** One binary contract from a prediction market; prices in cents */
export const MarketSchema = z.object({
  ticker: z.string(),
  title: z.string().default(''),
  status: z.string().optional(),
  yes_bid: CentsSchema,
  yes_ask: CentsSchema,
  no_bid: CentsSchema,
  no_ask: CentsSchema,
  volume: z.number().nullable().optional(),
  close_time: z.string().nullable().optional()
});

export const PredictionMarketPayloadSchema = z.object({
  markets: z.array(MarketSchema)
});

const SourcePayloadSchema = z.object({
  version: z.string().min(1).describe('Provider-declared payload version'),
  payload: JsonValueSchema.describe('Verbatim provider data')
});

export const CollectorPayloadSchema = z.object({
  gameId: z.string().min(1).describe('Game identifier shared by every snapshot of this game'),
  collectedAt: TimestampSchema.optional().describe('When the data was fetched; defaults to now'),
  homeTeam: z.string().min(1).optional().describe('Required when no sportsbook event is supplied'),
  awayTeam: z.string().min(1).optional(),
  sources: z.object({
    sportsbook: SourcePayloadSchema.optional(),
    predictionMarket: SourcePayloadSchema.optional()
  }).refine((sources) => sources.sportsbook !== undefined || sources.predictionMarket !== undefined, {
    message: 'at least one provider payload is required'
  })
});

// ==========================================
// NORMALIZED FIELDS
// ==========================================

export const SportsbookLineSchema = z.object({
  homeOdds: z.number(),
  awayOdds: z.number(),
  bookmakerCount: z.number().int().min(0),
  homeNoVigProbability: z.number().min(0).max(1),
  awayNoVigProbability: z.number().min(0).max(1)
});

export const MarketQuoteSchema = z.object({
  marketId: z.string(),
  title: z.string(),
  yesBid: z.number().min(0).max(1).nullable(),
  yesAsk: z.number().min(0).max(1).nullable(),
  volume: z.number().nullable(),
  midProbability: z.number().min(0).max(1).nullable()
});

export const NormalizedGameFieldsSchema = z.object({
  homeTeam: z.string(),
  awayTeam: z.string(),
  commenceTime: z.string().nullable(),
  sportsbook: SportsbookLineSchema.nullable(),
  predictionMarket: MarketQuoteSchema.nullable()
});

// ==========================================
// OUTCOMES / PROPOSALS
// ==========================================

export const OutcomePayloadSchema = z.object({
  gameId: z.string().min(1),
  occurredAt: TimestampSchema,
  homeTeam: z.string().min(1).optional().describe('Defaults to the team named in the latest snapshot'),
  awayTeam: z.string().min(1).optional(),
  finalScore: z.object({
    home: z.number().int().min(0),
    away: z.number().int().min(0)
  }),
  winner: z.string().min(1).optional().describe("Winning team, or 'tie'; derived from the score when absent"),
  statsSummary: JsonObjectSchema.default({}),
  source: z.string().min(1),
  correction: z.boolean().default(false).describe('Record as a new revision superseding the current outcome')
});

export const ProposalPayloadSchema = z.object({
  basedOnEvaluationIds: z.array(z.string().min(1)).min(1),
  proposalText: z.string().min(1),
  suggestedSchemaAdditions: JsonObjectSchema.nullable().default(null),
  suggestedModules: z.array(z.string()).nullable().default(null),
  expectedImpact: JsonObjectSchema.nullable().default(null)
});

export type OddsEvent = z.infer<typeof OddsEventSchema>;
export type Market = z.infer<typeof MarketSchema>;
export type CollectorPayload = z.infer<typeof CollectorPayloadSchema>;
export type SportsbookLine = z.infer<typeof SportsbookLineSchema>;
export type MarketQuote = z.infer<typeof MarketQuoteSchema>;
export type NormalizedGameFields = z.infer<typeof NormalizedGameFieldsSchema>;
export type OutcomePayload = z.infer<typeof OutcomePayloadSchema>;
export type ProposalPayload = z.infer<typeof ProposalPayloadSchema>;

/**
 * Parse with a schema, reporting failures as ValidationError
 */
export function parsePayload<Out>(
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  value: unknown,
  entityType: EntityType | 'payload' = 'payload'
): Out {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      entityType,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
