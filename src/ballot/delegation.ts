/**
 * Delegation resolution
 *
 * Delegates are plain identity values looked up afresh on every hop.
 * The graph they form stays acyclic because a walk that reaches its own
 * starting identity is rejected before anything is written.
 */

import type { Identity } from './types.js';
import { BallotError, ErrorCodes } from './types.js';
import type { VoterLedger } from './ledger.js';

export class DelegationResolver {
  constructor(private ledger: VoterLedger) {}

  /**
   * Follow delegate pointers from `target` to the identity that has not
   * delegated further. Fails as soon as the walk reaches `start`.
   *
   * Callers guarantee `start` has rights, has not voted, and `target !== start`.
   */
  async resolve(start: Identity, target: Identity): Promise<Identity> {
    let current = target;
    let record = await this.ledger.get(current);

    while (record.delegate !== null) {
      current = record.delegate;
      if (current === start) {
        throw new DelegationError('Found loop in delegation', ErrorCodes.DELEGATION_CYCLE, 409);
      }
      record = await this.ledger.get(current);
    }

    return current;
  }

  /**
   * Full chain from `target` to its terminal delegate (inclusive)
   */
  async chain(target: Identity): Promise<Identity[]> {
    const path = [target];
    const seen = new Set(path);
    let record = await this.ledger.get(target);

    while (record.delegate !== null && !seen.has(record.delegate)) {
      path.push(record.delegate);
      seen.add(record.delegate);
      record = await this.ledger.get(record.delegate);
    }

    return path;
  }
}

export class DelegationError extends BallotError {
  constructor(
    message: string,
    code: typeof ErrorCodes.SELF_DELEGATION | typeof ErrorCodes.DELEGATION_CYCLE,
    statusCode: number
  ) {
    super(message, code, statusCode);
    this.name = 'DelegationError';
  }
}
