/**
 * Record factory tests
 */

import { describe, it, expect } from 'vitest';
import {
  canTransition,
  createAnalysis,
  createOutcome,
  createProposal,
  parseProposalStatus,
  toIsoTimestamp,
  withProposalStatus
} from './records.js';
import { ValidationError } from './errors.js';
import { ProposalStatus } from './types.js';
import { makeAnalysis, makeSnapshot } from '../testing/fixtures.js';

describe('toIsoTimestamp', () => {
  it('normalizes offsets to UTC with milliseconds', () => {
    expect(toIsoTimestamp('2024-03-01T02:00:00+02:00')).toBe('2024-03-01T00:00:00.000Z');
  });

  it('rejects garbage', () => {
    expect(() => toIsoTimestamp('not a time')).toThrow(ValidationError);
  });
});

describe('record factories', () => {
  it('freezes records deeply', () => {
    const snapshot = makeSnapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.normalizedFields)).toBe(true);
  });

  it('copies caller input instead of freezing it', () => {
    const derivedFeatures = { predictedHomeProbability: 0.6, lineMovement: { midShift: 0.01 } };
    const conclusions = { edgeFlagged: false };
    const analysis = createAnalysis({
      analysisVersion: '1.0.0',
      codeVersion: 'test-rev',
      inputSnapshotIds: ['snap-1'],
      derivedFeatures,
      conclusions,
      recommendedActions: []
    });

    expect(Object.isFrozen(analysis.derivedFeatures)).toBe(true);
    expect(Object.isFrozen(derivedFeatures)).toBe(false);
    expect(Object.isFrozen(derivedFeatures.lineMovement)).toBe(false);
    expect(Object.isFrozen(conclusions)).toBe(false);

    derivedFeatures.lineMovement.midShift = 0.5;
    expect(analysis.derivedFeatures).toEqual({ predictedHomeProbability: 0.6, lineMovement: { midShift: 0.01 } });
  });

  it('excludes the creation stamp from an analysis hash', () => {
    const snapshot = makeSnapshot();
    const early = makeAnalysis([snapshot], { createdAt: '2024-02-29T19:00:00.000Z' });
    const late = makeAnalysis([snapshot], { createdAt: '2024-02-29T21:00:00.000Z' });
    expect(early.hash).toBe(late.hash);
  });

  it('rejects an analysis without snapshots', () => {
    expect(() => makeAnalysis([])).toThrow(ValidationError);
  });

  it('requires a correction to name what it supersedes', () => {
    expect(() => createOutcome({
      gameId: 'game-1',
      occurredAt: '2024-03-01T02:30:00Z',
      finalScore: { home: 1, away: 0 },
      winner: 'A',
      source: 'feed',
      revision: 2
    })).toThrow(/supersede/);
  });

  it('rejects negative or fractional scores', () => {
    expect(() => createOutcome({
      gameId: 'game-1',
      occurredAt: '2024-03-01T02:30:00Z',
      finalScore: { home: -1, away: 0.5 },
      winner: 'A',
      source: 'feed'
    })).toThrow(ValidationError);
  });
});

describe('proposal status', () => {
  const proposal = createProposal({ basedOnEvaluationIds: ['e1', 'e1', 'e2'], proposalText: 'Track injuries' });

  it('starts pending with deduplicated evaluation ids', () => {
    expect(proposal.status).toBe(ProposalStatus.PENDING);
    expect(proposal.basedOnEvaluationIds).toEqual(['e1', 'e2']);
  });

  it('keeps identity and rehashes on a status change', () => {
    const accepted = withProposalStatus(proposal, ProposalStatus.ACCEPTED);
    expect(accepted.proposalId).toBe(proposal.proposalId);
    expect(accepted.status).toBe(ProposalStatus.ACCEPTED);
    expect(accepted.hash).not.toBe(proposal.hash);
  });

  it('allows forward moves only', () => {
    expect(canTransition(ProposalStatus.PENDING, ProposalStatus.ACCEPTED)).toBe(true);
    expect(canTransition(ProposalStatus.ACCEPTED, ProposalStatus.IMPLEMENTED)).toBe(true);
    expect(canTransition(ProposalStatus.ACCEPTED, ProposalStatus.PENDING)).toBe(false);
    expect(canTransition(ProposalStatus.REJECTED, ProposalStatus.ACCEPTED)).toBe(false);
    expect(canTransition(ProposalStatus.IMPLEMENTED, ProposalStatus.REJECTED)).toBe(false);
  });

  it('parses status strings', () => {
    expect(parseProposalStatus('rejected')).toBe(ProposalStatus.REJECTED);
    expect(parseProposalStatus('done')).toBeNull();
  });
});
