/**
 * Voter ledger
 * Identity -> voting record, written in atomic batches
 */

import type {
  BallotStore,
  Identity,
  LedgerChanges,
  TallyDelta,
  VoterWrite,
  VotingRecord,
} from './types.js';
import { BallotError, ErrorCodes, emptyRecord } from './types.js';

/**
 * Changes collected during one operation and committed together
 */
export class LedgerBatch {
  private voters = new Map<Identity, VoterWrite>();
  private tallies: TallyDelta[] = [];
  private granted = 0;

  /**
   * `previous` is the record the new one was computed from; a later write
   * for the same voter keeps the first `previous`
   */
  setVoter(record: VotingRecord, previous: VotingRecord): void {
    const base = this.voters.get(record.voter)?.previous ?? previous;
    this.voters.set(record.voter, { record: { ...record }, previous: { ...base } });
  }

  addTally(proposal: number, weight: number): void {
    this.tallies.push({ proposal, weight });
  }

  grant(weight: number): void {
    this.granted += weight;
  }

  isEmpty(): boolean {
    return this.voters.size === 0 && this.tallies.length === 0 && this.granted === 0;
  }

  toChanges(): LedgerChanges {
    return {
      voters: Array.from(this.voters.values()),
      tallies: [...this.tallies],
      granted: this.granted,
    };
  }
}

export class VoterLedger {
  constructor(private store: BallotStore) {}

  /**
   * Get a voter's record; unknown identities read as the empty record
   */
  async get(voter: Identity): Promise<VotingRecord> {
    return (await this.store.getVoter(voter)) ?? emptyRecord(voter);
  }

  set(batch: LedgerBatch, record: VotingRecord, previous: VotingRecord): void {
    batch.setVoter(record, previous);
  }

  async list(): Promise<VotingRecord[]> {
    return this.store.listVoters();
  }

  async commit(batch: LedgerBatch): Promise<void> {
    if (batch.isEmpty()) return;
    await this.store.commit(batch.toChanges());
  }

  /**
   * Give a voter weight 1. Callers must have passed the administrator check.
   */
  async grantRights(voter: Identity): Promise<VotingRecord> {
    const record = await this.get(voter);
    if (record.weight !== 0) {
      throw new LedgerError('Voter already has voting rights');
    }

    const updated: VotingRecord = { ...record, weight: 1 };
    const batch = new LedgerBatch();
    this.set(batch, updated, record);
    batch.grant(1);
    await this.commit(batch);

    return updated;
  }
}

export class LedgerError extends BallotError {
  constructor(message: string) {
    super(message, ErrorCodes.ALREADY_HAS_RIGHTS, 409);
    this.name = 'LedgerError';
  }
}
