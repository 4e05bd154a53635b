/**
 * Vote application and weight propagation
 */

import type {
  ConservationReport,
  DelegationReceipt,
  Identity,
  Proposal,
  VoteReceipt,
  VotingRecord,
} from './types.js';
import { BallotError, ErrorCodes } from './types.js';
import { LedgerBatch, type VoterLedger } from './ledger.js';
import { type ProposalRegistry, winningIndex } from './registry.js';
import { DelegationError, type DelegationResolver } from './delegation.js';
import type { AccessControl } from './gates/index.js';

export class TallyEngine {
  constructor(
    private registry: ProposalRegistry,
    private ledger: VoterLedger,
    private resolver: DelegationResolver,
    private access: AccessControl
  ) {}

  /**
   * Vote directly for a proposal with the actor's full accumulated weight.
   * Every precondition is checked before the batch is built.
   */
  async vote(actor: Identity, proposal: number): Promise<VoteReceipt> {
    const record = await this.access.requireVotingRights(actor);
    this.requireNotVoted(record);
    await this.requireProposal(proposal);

    const batch = new LedgerBatch();
    this.ledger.set(batch, { ...record, voted: true, vote: proposal }, record);
    this.registry.recordVote(batch, proposal, record.weight);
    await this.ledger.commit(batch);

    return { voter: actor, proposal, weight: record.weight };
  }

  /**
   * Delegate the actor's weight to `to`. The weight lands on whoever ends
   * the chain starting at `to`: on their proposal if they already voted,
   * otherwise on their own weight.
   */
  async delegate(actor: Identity, to: Identity): Promise<DelegationReceipt> {
    const record = await this.access.requireVotingRights(actor);
    this.requireNotVoted(record);

    if (to === actor) {
      throw new DelegationError('Self-delegation is disallowed', ErrorCodes.SELF_DELEGATION, 400);
    }

    const terminal = await this.resolver.resolve(actor, to);
    const delegate = await this.ledger.get(terminal);

    const batch = new LedgerBatch();
    this.ledger.set(batch, { ...record, voted: true, delegate: to }, record);

    let appliedToProposal: number | null = null;
    if (delegate.voted && delegate.vote !== null) {
      // Terminal delegate already voted; count the weight directly
      this.registry.recordVote(batch, delegate.vote, record.weight);
      appliedToProposal = delegate.vote;
    } else {
      this.ledger.set(batch, { ...delegate, weight: delegate.weight + record.weight }, delegate);
    }

    await this.ledger.commit(batch);

    return {
      voter: actor,
      delegate: to,
      terminal,
      weight: record.weight,
      appliedToProposal,
    };
  }

  async winningProposal(): Promise<number> {
    return this.registry.winner();
  }

  async winnerName(): Promise<string> {
    const winner = await this.registry.get(await this.registry.winner());
    return winner.name;
  }

  /**
   * Throws INVALID_PROPOSAL for an index outside the registry
   */
  async requireProposal(index: number): Promise<Proposal> {
    if (!(await this.registry.has(index))) {
      throw new TallyError(`Invalid proposal index: ${index}`, ErrorCodes.INVALID_PROPOSAL);
    }
    return this.registry.get(index);
  }

  /**
   * sum(voteCount) + resting weight of voters who have not voted,
   * compared against the total weight ever granted
   */
  async checkConservation(granted: number): Promise<ConservationReport> {
    const [proposals, voters] = await Promise.all([this.registry.list(), this.ledger.list()]);
    const cast = proposals.reduce((sum, p) => sum + p.voteCount, 0);
    const resting = voters
      .filter(v => !v.voted)
      .reduce((sum, v) => sum + v.weight, 0);

    return { granted, cast, resting, balanced: granted === cast + resting };
  }

  /**
   * Winner index computed from an already-loaded proposal list
   */
  winnerOf(proposals: readonly Proposal[]): number {
    return winningIndex(proposals);
  }

  private requireNotVoted(record: VotingRecord): void {
    if (record.voted) {
      throw new TallyError('Already voted', ErrorCodes.ALREADY_VOTED, 409);
    }
  }
}

export class TallyError extends BallotError {
  constructor(
    message: string,
    code: typeof ErrorCodes.ALREADY_VOTED | typeof ErrorCodes.INVALID_PROPOSAL,
    statusCode: number = 400
  ) {
    super(message, code, statusCode);
    this.name = 'TallyError';
  }
}
