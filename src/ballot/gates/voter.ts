/**
 * Voting Rights Gate
 * Only identities holding weight can vote or delegate
 */

import type { Identity } from '../types.js';
import type { VoterLedger } from '../ledger.js';
import type { Gate, GateResult, GateRequirements } from './types.js';

export class VotingRightsGate implements Gate {
  readonly type = 'voting-rights' as const;

  constructor(private ledger: VoterLedger) {}

  async check(actor: Identity): Promise<GateResult> {
    const record = await this.ledger.get(actor);
    const allowed = record.weight > 0;
    return {
      allowed,
      reason: allowed ? undefined : 'Has no right to vote',
    };
  }

  getRequirements(): GateRequirements {
    return {
      type: 'voting-rights',
      description: 'Voters with granted or delegated weight',
      requirements: [
        'Must have been granted voting rights by the administrator',
        'or have received delegated weight',
      ],
    };
  }
}
