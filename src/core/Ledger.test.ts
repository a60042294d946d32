/**
 * Ledger Tests
 *
 * End-to-end flow through the facade: collect, analyze, record the result,
 * evaluate, propose, verify.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Ledger } from './Ledger.js';
import {
  ConfigurationError,
  InvalidTransitionError,
  LedgerError,
  NotFoundError,
  ValidationError
} from './errors.js';
import { ProposalStatus } from './types.js';
import { AWAY, HOME, collectorPayload, marketPayload } from '../testing/fixtures.js';

function outcomePayload(home: number, away: number, correction = false) {
  return {
    gameId: 'game-1',
    occurredAt: '2024-03-01T02:30:00Z',
    finalScore: { home, away },
    source: 'test-feed',
    correction
  };
}

describe('Ledger', () => {
  let ledger: Ledger;

  beforeEach(async () => {
    ledger = new Ledger({ storage: { sqlitePath: ':memory:', enableWAL: false }, codeVersion: 'test-rev' }, {});
    await ledger.initialize();
  });

  afterEach(() => {
    ledger.close();
  });

  it('rejects invalid configuration', () => {
    expect(() => new Ledger({ storage: { sqlitePath: ':memory:' }, edgeThreshold: 2 }, {})).toThrow(ConfigurationError);
  });

  it('needs initialize() before analyzing', () => {
    const fresh = new Ledger({ storage: { sqlitePath: ':memory:', enableWAL: false } }, {});
    expect(() => fresh.analysis).toThrow(LedgerError);
    fresh.close();
  });

  describe('collection', () => {
    it('records a payload once', () => {
      const first = ledger.collector.collect(collectorPayload());
      const again = ledger.collector.collect(collectorPayload());

      expect(first.created).toBe(true);
      expect(again.created).toBe(false);
      expect(again.snapshot.snapshotId).toBe(first.snapshot.snapshotId);
      expect(first.snapshot.sourceVersions).toEqual({ sportsbook: 'odds-v4', predictionMarket: 'markets-v2' });
      expect(first.snapshot.normalizedFields.homeTeam).toBe(HOME);
    });

    it('rejects a payload without any provider data', () => {
      expect(() => ledger.collector.collect({ gameId: 'game-1', sources: {} })).toThrow(ValidationError);
      expect(ledger.storage.getTableCounts().snapshots).toBe(0);
    });

    it('collects a batch, reporting bad payloads individually', async () => {
      const report = await ledger.collector.collectMany([
        collectorPayload({ gameId: 'game-1' }),
        { gameId: '' },
        collectorPayload({ gameId: 'game-2' })
      ]);
      expect(report.succeeded).toBe(2);
      expect(report.failed).toBe(1);
      expect(report.units[1].unit).toBe('payload[1]');
    });
  });

  describe('analysis', () => {
    beforeEach(() => {
      ledger.collector.collect(collectorPayload({ collectedAt: '2024-02-29T12:00:00.000Z' }));
      ledger.collector.collect(collectorPayload({ collectedAt: '2024-02-29T18:00:00.000Z' }));
    });

    it('analyzes every snapshot of the game and stamps versions', () => {
      const { analysis, created } = ledger.analysis.analyzeGame('game-1');

      expect(created).toBe(true);
      expect(analysis.inputSnapshotIds).toHaveLength(2);
      expect(analysis.codeVersion).toBe('test-rev');
      expect(analysis.analysisVersion).toBe('1.0.0');
      expect(analysis.parentAnalysisId).toBeNull();
      expect(analysis.conclusions.edgeFlagged).toBe(false);
    });

    it('is idempotent for unchanged inputs', () => {
      const first = ledger.analysis.analyzeGame('game-1');
      const second = ledger.analysis.analyzeGame('game-1');
      expect(second.created).toBe(false);
      expect(second.analysis.analysisId).toBe(first.analysis.analysisId);
    });

    it('reads only snapshots known at the asOf instant', () => {
      const { analysis } = ledger.analysis.analyzeGame('game-1', { asOf: '2024-02-29T13:00:00Z' });
      expect(analysis.inputSnapshotIds).toHaveLength(1);
      expect(analysis.derivedFeatures.basedOnSnapshotCollectedAt).toBe('2024-02-29T12:00:00.000Z');
    });

    it('chains onto the previous analysis when asked', () => {
      const root = ledger.analysis.analyzeGame('game-1', { asOf: '2024-02-29T13:00:00Z' });
      const child = ledger.analysis.analyzeGame('game-1', { chain: true });

      expect(child.analysis.parentAnalysisId).toBe(root.analysis.analysisId);
      expect(ledger.storage.listLineagePath(child.analysis.analysisId).map((a) => a.analysisId)).toEqual([
        root.analysis.analysisId,
        child.analysis.analysisId
      ]);
    });

    it('reports a game without snapshots', () => {
      expect(() => ledger.analysis.analyzeGame('game-404')).toThrow(NotFoundError);
    });

    it('analyzes all games in a batch', async () => {
      ledger.collector.collect(collectorPayload({ gameId: 'game-2' }));
      const report = await ledger.analysis.analyzeAll();
      expect(report.total).toBe(2);
      expect(report.succeeded).toBe(2);

      const rerun = await ledger.analysis.analyzeAll();
      expect(rerun.skipped).toBe(2);
    });

    it('skips a chained rerun when nothing new was collected', async () => {
      const first = await ledger.analysis.analyzeAll({ chain: true });
      expect(first.succeeded).toBe(1);

      const rerun = await ledger.analysis.analyzeAll({ chain: true });
      expect(rerun.succeeded).toBe(0);
      expect(rerun.skipped).toBe(1);
      expect(ledger.storage.getTableCounts().analyses).toBe(1);

      ledger.collector.collect(collectorPayload({ collectedAt: '2024-02-29T20:00:00.000Z', yesBid: 50, yesAsk: 52 }));
      const { analysis, created } = ledger.analysis.analyzeGame('game-1', { chain: true });
      expect(created).toBe(true);
      expect(analysis.parentAnalysisId).toBe(first.units[0].value?.analysisId);
      expect(ledger.storage.getTableCounts().analyses).toBe(2);
    });
  });

  describe('outcomes, evaluation and proposals', () => {
    beforeEach(() => {
      ledger.collector.collect(collectorPayload());
      ledger.analysis.analyzeGame('game-1');
    });

    it('derives the winner from the snapshot teams', () => {
      expect(ledger.outcomes.gamesAwaitingOutcome()).toEqual(['game-1']);
      const { outcome } = ledger.outcomes.ingest(outcomePayload(102, 97));
      expect(outcome.winner).toBe(HOME);
      expect(outcome.revision).toBe(1);
      expect(ledger.outcomes.gamesAwaitingOutcome()).toEqual([]);
    });

    it('records a tie as such', () => {
      const { outcome } = ledger.outcomes.ingest(outcomePayload(100, 100));
      expect(outcome.winner).toBe('tie');
    });

    it('records corrections as new revisions and ignores resends', () => {
      const original = ledger.outcomes.ingest(outcomePayload(97, 102)).outcome;
      expect(original.winner).toBe(AWAY);

      const corrected = ledger.outcomes.ingest(outcomePayload(102, 97, true));
      expect(corrected.created).toBe(true);
      expect(corrected.outcome.revision).toBe(2);
      expect(corrected.outcome.supersedesOutcomeId).toBe(original.outcomeId);

      const resent = ledger.outcomes.ingest(outcomePayload(102, 97, true));
      expect(resent.created).toBe(false);
      expect(ledger.outcomes.history('game-1')).toHaveLength(2);
      expect(ledger.storage.getOutcome(original.outcomeId)?.winner).toBe(AWAY);
    });

    it('refuses a correction with nothing to correct', () => {
      expect(() => ledger.outcomes.ingest(outcomePayload(1, 0, true))).toThrow(NotFoundError);
    });

    it('needs team names to derive a winner', () => {
      expect(() => ledger.outcomes.ingest({ ...outcomePayload(1, 0), gameId: 'game-unknown' })).toThrow(ValidationError);
    });

    it('evaluates pending analyses and re-evaluates after a correction', async () => {
      ledger.outcomes.ingest(outcomePayload(97, 102));
      expect(ledger.evaluations.pendingAnalysisIds()).toHaveLength(1);

      const first = await ledger.evaluations.evaluateAllPending();
      expect(first.succeeded).toBe(1);
      expect(ledger.evaluations.pendingAnalysisIds()).toEqual([]);

      ledger.outcomes.ingest(outcomePayload(102, 97, true));
      expect(ledger.evaluations.pendingAnalysisIds()).toHaveLength(1);
      const second = await ledger.evaluations.evaluateAllPending();
      expect(second.succeeded).toBe(1);

      const report = ledger.evaluations.report();
      expect(report.evaluationCount).toBe(1);
      expect(ledger.storage.getTableCounts().evaluations).toBe(2);
    });

    it('leaves analyses without a prediction out of evaluation', async () => {
      ledger.collector.collect({
        gameId: 'game-9',
        homeTeam: HOME,
        awayTeam: AWAY,
        sources: { predictionMarket: { version: 'markets-v2', payload: marketPayload(null, null) } }
      });
      const { analysis } = ledger.analysis.analyzeGame('game-9');
      expect(analysis.derivedFeatures.predictedHomeProbability).toBeNull();
      ledger.outcomes.ingest({ ...outcomePayload(102, 97), gameId: 'game-9' });

      expect(ledger.evaluations.pendingAnalysisIds()).toEqual([]);
      const report = await ledger.evaluations.evaluateAllPending();
      expect(report.total).toBe(0);
      expect(report.failed).toBe(0);
    });

    it('scores an analysis against the current outcome', () => {
      const [analysis] = ledger.storage.listAnalyses();
      expect(() => ledger.evaluations.evaluateAnalysis(analysis.analysisId)).toThrow(NotFoundError);

      ledger.outcomes.ingest(outcomePayload(102, 97));
      const { evaluation, created } = ledger.evaluations.evaluateAnalysis(analysis.analysisId);
      expect(created).toBe(true);
      expect(evaluation.gameId).toBe('game-1');
      expect(evaluation.metrics.brierScore).toBeCloseTo(0.176541, 6);

      const again = ledger.evaluations.evaluateAnalysis(analysis.analysisId);
      expect(again.created).toBe(false);
    });

    it('takes proposals through review', () => {
      ledger.outcomes.ingest(outcomePayload(102, 97));
      const [analysis] = ledger.storage.listAnalyses();
      const { evaluation } = ledger.evaluations.evaluateAnalysis(analysis.analysisId);

      const { proposal } = ledger.proposals.propose({
        basedOnEvaluationIds: [evaluation.evaluationId],
        proposalText: 'Add a rest-days feature',
        suggestedModules: ['rest-days']
      });
      expect(proposal.status).toBe(ProposalStatus.PENDING);

      expect(() => ledger.proposals.transition(proposal.proposalId, 'finished')).toThrow(ValidationError);
      expect(ledger.proposals.transition(proposal.proposalId, 'rejected').status).toBe(ProposalStatus.REJECTED);
      expect(() => ledger.proposals.transition(proposal.proposalId, 'accepted')).toThrow(InvalidTransitionError);
      expect(ledger.proposals.list(ProposalStatus.REJECTED)).toHaveLength(1);
    });

    it('does not record the same proposal twice once it has been reviewed', () => {
      ledger.outcomes.ingest(outcomePayload(102, 97));
      const [analysis] = ledger.storage.listAnalyses();
      const { evaluation } = ledger.evaluations.evaluateAnalysis(analysis.analysisId);
      const payload = { basedOnEvaluationIds: [evaluation.evaluationId], proposalText: 'Add a rest-days feature' };

      const { proposal } = ledger.proposals.propose(payload);
      ledger.proposals.transition(proposal.proposalId, 'accepted');
      const again = ledger.proposals.propose(payload);

      expect(again.created).toBe(false);
      expect(again.proposal.proposalId).toBe(proposal.proposalId);
      expect(ledger.storage.getTableCounts().proposals).toBe(1);
    });

    it('verifies clean and summarizes status', () => {
      ledger.outcomes.ingest(outcomePayload(102, 97));
      expect(ledger.verify().ok).toBe(true);

      const status = ledger.status();
      expect(status.codeVersion).toBe('test-rev');
      expect(status.schemaRevision).toBe('1');
      expect(status.counts.snapshots).toBe(1);
      expect(status.counts.analyses).toBe(1);
      expect(status.pendingEvaluations).toBe(1);
    });
  });
});
