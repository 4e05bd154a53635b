/**
 * Access control - the administrator gate and the voting-rights gate
 */

import type { Identity, VotingRecord } from '../types.js';
import { ErrorCodes } from '../types.js';
import type { VoterLedger } from '../ledger.js';
import { AdministratorGate } from './administrator.js';
import { VotingRightsGate } from './voter.js';
import { GateError, type GateRequirements, type GateResult } from './types.js';

export class AccessControl {
  readonly administratorGate: AdministratorGate;
  readonly votingRightsGate: VotingRightsGate;

  constructor(
    administrator: Identity,
    private ledger: VoterLedger
  ) {
    this.administratorGate = new AdministratorGate(administrator);
    this.votingRightsGate = new VotingRightsGate(ledger);
  }

  get administrator(): Identity {
    return this.administratorGate.administrator;
  }

  async canAdminister(actor: Identity): Promise<GateResult> {
    return this.administratorGate.check(actor);
  }

  async canVote(actor: Identity): Promise<GateResult> {
    return this.votingRightsGate.check(actor);
  }

  /**
   * Throws NOT_AUTHORIZED unless `actor` is the administrator
   */
  async requireAdministrator(actor: Identity): Promise<void> {
    const result = await this.administratorGate.check(actor);
    if (!result.allowed) {
      throw new GateError(result.reason ?? 'Not authorized', ErrorCodes.NOT_AUTHORIZED);
    }
  }

  /**
   * Throws NO_VOTING_RIGHTS unless `actor` holds weight; returns its record
   */
  async requireVotingRights(actor: Identity): Promise<VotingRecord> {
    const result = await this.votingRightsGate.check(actor);
    if (!result.allowed) {
      throw new GateError(result.reason ?? 'Has no right to vote', ErrorCodes.NO_VOTING_RIGHTS);
    }
    return this.ledger.get(actor);
  }

  getRequirements(): { administrator: GateRequirements; voter: GateRequirements } {
    return {
      administrator: this.administratorGate.getRequirements(),
      voter: this.votingRightsGate.getRequirements(),
    };
  }
}

// Re-export types
export * from './types.js';

export { AdministratorGate } from './administrator.js';
export { VotingRightsGate } from './voter.js';
