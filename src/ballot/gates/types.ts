/**
 * Gate System Types
 *
 * Gates decide who may administer the ballot and who may vote or delegate.
 */

import type { Identity } from '../types.js';
import { BallotError, ErrorCodes } from '../types.js';

/**
 * Result from a gate check
 */
export interface GateResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Human-readable requirements for UI
 */
export interface GateRequirements {
  type: string;
  description: string;
  /** What the caller needs to be/have */
  requirements: string[];
}

export type GateType = 'administrator' | 'voting-rights';

export interface Gate {
  readonly type: GateType;

  check(actor: Identity): Promise<GateResult>;

  getRequirements(): GateRequirements;
}

/**
 * Gate-specific error class
 */
export class GateError extends BallotError {
  constructor(
    message: string,
    code: typeof ErrorCodes.NOT_AUTHORIZED | typeof ErrorCodes.NO_VOTING_RIGHTS,
    statusCode: number = 403
  ) {
    super(message, code, statusCode);
    this.name = 'GateError';
  }
}
