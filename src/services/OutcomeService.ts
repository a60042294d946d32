/**
 * Outcome Service
 *
 * Records final results reported by the external outcome source. A
 * correction never edits the earlier report: it is a new revision that
 * supersedes the current head.
 */

import { NotFoundError, ValidationError } from '../core/errors.js';
import { createOutcome } from '../core/records.js';
import { TIE, type FinalScore, type Outcome } from '../core/types.js';
import { canonicalize } from '../hashing/CanonicalHasher.js';
import type { LedgerStorage } from '../storage/LedgerStorage.js';
import { NormalizedGameFieldsSchema, OutcomePayloadSchema, parsePayload } from '../validation/schemas.js';

export interface IngestResult {
  outcome: Outcome;
  created: boolean;
}

export function winnerFromScore(score: FinalScore, homeTeam: string, awayTeam: string): string {
  if (score.home > score.away) return homeTeam;
  if (score.away > score.home) return awayTeam;
  return TIE;
}

function sameResult(a: Outcome, b: Outcome): boolean {
  return a.occurredAt === b.occurredAt
    && a.winner === b.winner
    && a.source === b.source
    && a.finalScore.home === b.finalScore.home
    && a.finalScore.away === b.finalScore.away
    && canonicalize(a.statsSummary) === canonicalize(b.statsSummary);
}

export class OutcomeService {
  private storage: LedgerStorage;

  constructor(storage: LedgerStorage) {
    this.storage = storage;
  }

  ingest(payload: unknown): IngestResult {
    const input = parsePayload(OutcomePayloadSchema, payload, 'outcome');

    let winner = input.winner;
    if (!winner) {
      const teams = this.resolveTeams(input.gameId, input.homeTeam, input.awayTeam);
      winner = winnerFromScore(input.finalScore, teams.homeTeam, teams.awayTeam);
    }

    const head = this.storage.getOutcomeForGame(input.gameId);
    if (input.correction && !head) {
      throw new NotFoundError('outcome', input.gameId);
    }

    const outcome = createOutcome({
      gameId: input.gameId,
      occurredAt: input.occurredAt,
      finalScore: input.finalScore,
      winner,
      statsSummary: input.statsSummary,
      source: input.source,
      revision: input.correction && head ? head.revision + 1 : 1,
      supersedesOutcomeId: input.correction && head ? head.outcomeId : null
    });

    // A correction identical to the head is a resend, not a new revision
    if (input.correction && head && sameResult(head, outcome)) {
      console.log(`[OutcomeService] Correction for ${input.gameId} matches revision ${head.revision}; nothing recorded`);
      return { outcome: head, created: false };
    }

    const result = this.storage.insertOutcome(outcome);
    if (!result.created) {
      console.log(`[OutcomeService] Outcome for ${input.gameId} already recorded as ${result.record.outcomeId}`);
    }
    return { outcome: result.record, created: result.created };
  }

  /**
   * Team names from the payload, else from the game's latest snapshot
   */
  private resolveTeams(gameId: string, homeTeam?: string, awayTeam?: string): { homeTeam: string; awayTeam: string } {
    if (homeTeam && awayTeam) return { homeTeam, awayTeam };

    const latest = this.storage.latestSnapshot(gameId);
    const parsed = latest ? NormalizedGameFieldsSchema.safeParse(latest.normalizedFields) : null;
    if (!parsed || !parsed.success) {
      throw new ValidationError('outcome', [
        `winner is missing and team names for ${gameId} are unknown; supply winner or homeTeam/awayTeam`
      ]);
    }
    return {
      homeTeam: homeTeam ?? parsed.data.homeTeam,
      awayTeam: awayTeam ?? parsed.data.awayTeam
    };
  }

  /**
   * Games with at least one snapshot and no recorded outcome
   */
  gamesAwaitingOutcome(): string[] {
    return this.storage.listGameIds().filter((gameId) => this.storage.getOutcomeForGame(gameId) === null);
  }

  history(gameId: string): Outcome[] {
    return this.storage.listOutcomeRevisions(gameId);
  }
}
