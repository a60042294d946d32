/**
 * Proposal Service
 */

import { ValidationError } from '../core/errors.js';
import { createProposal, parseProposalStatus, PROPOSAL_TRANSITIONS } from '../core/records.js';
import type { ImprovementProposal, ProposalStatus } from '../core/types.js';
import type { LedgerStorage } from '../storage/LedgerStorage.js';
import { ProposalPayloadSchema, parsePayload } from '../validation/schemas.js';

export interface ProposeResult {
  proposal: ImprovementProposal;
  created: boolean;
}

export class ProposalService {
  private storage: LedgerStorage;

  constructor(storage: LedgerStorage) {
    this.storage = storage;
  }

  propose(payload: unknown): ProposeResult {
    const input = parsePayload(ProposalPayloadSchema, payload, 'proposal');
    const result = this.storage.insertProposal(createProposal(input));
    return { proposal: result.record, created: result.created };
  }

  /**
   * Move a proposal to a new status. Accepts the status as typed on a command line.
   */
  transition(proposalId: string, status: string): ImprovementProposal {
    const target = parseProposalStatus(status);
    if (target === null) {
      throw new ValidationError('proposal', [
        `unknown status '${status}'; expected one of ${Object.keys(PROPOSAL_TRANSITIONS).join(', ')}`
      ]);
    }
    const updated = this.storage.updateProposalStatus(proposalId, target);
    console.log(`[ProposalService] Proposal ${proposalId} is now ${updated.status}`);
    return updated;
  }

  list(status?: ProposalStatus): ImprovementProposal[] {
    return this.storage.listProposals({ status });
  }
}
