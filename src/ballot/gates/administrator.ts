/**
 * Administrator Gate
 * Only the identity that created the ballot passes
 */

import type { Identity } from '../types.js';
import type { Gate, GateResult, GateRequirements } from './types.js';

export class AdministratorGate implements Gate {
  readonly type = 'administrator' as const;

  constructor(readonly administrator: Identity) {}

  async check(actor: Identity): Promise<GateResult> {
    const allowed = actor === this.administrator;
    return {
      allowed,
      reason: allowed ? undefined : 'Only the ballot administrator can do this',
    };
  }

  getRequirements(): GateRequirements {
    return {
      type: 'administrator',
      description: 'Ballot administrator only',
      requirements: ['Must be the identity that created the ballot'],
    };
  }
}
