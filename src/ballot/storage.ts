/**
 * Storage implementation using SQLite
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type {
  BallotInfo,
  BallotStore,
  Identity,
  LedgerChanges,
  Proposal,
  VotingRecord,
} from './types.js';
import { BallotError, ErrorCodes, WriteConflictError, emptyRecord } from './types.js';

export class SQLiteStore implements BallotStore {
  private db: Database.Database;
  private applyChanges: Database.Transaction<(changes: LedgerChanges) => void>;
  private insertBallot: Database.Transaction<
    (info: BallotInfo, proposals: Proposal[], administrator: VotingRecord) => void
  >;

  constructor(dbPath: string) {
    // Ensure the directory exists
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initialize();

    // Compare-and-set: the update only lands while the row still holds `previous`
    const writeVoter = this.db.prepare(`
      INSERT INTO voters (voter, weight, voted, delegate, vote)
      VALUES (@voter, @weight, @voted, @delegate, @vote)
      ON CONFLICT(voter) DO UPDATE SET
        weight = excluded.weight,
        voted = excluded.voted,
        delegate = excluded.delegate,
        vote = excluded.vote
      WHERE voters.weight = @prevWeight
        AND voters.voted = @prevVoted
        AND voters.delegate IS @prevDelegate
        AND voters.vote IS @prevVote
    `);
    const addVotes = this.db.prepare('UPDATE proposals SET vote_count = vote_count + ? WHERE idx = ?');
    const addGranted = this.db.prepare('UPDATE ballot SET granted_weight = granted_weight + ?');

    this.applyChanges = this.db.transaction((changes: LedgerChanges) => {
      for (const { record, previous } of changes.voters) {
        const result = writeVoter.run({
          voter: record.voter,
          weight: record.weight,
          voted: record.voted ? 1 : 0,
          delegate: record.delegate,
          vote: record.vote,
          prevWeight: previous.weight,
          prevVoted: previous.voted ? 1 : 0,
          prevDelegate: previous.delegate,
          prevVote: previous.vote,
        });
        if (result.changes !== 1) {
          // Rolls back the whole batch
          throw new WriteConflictError(record.voter);
        }
      }
      for (const delta of changes.tallies) {
        const result = addVotes.run(delta.weight, delta.proposal);
        if (result.changes !== 1) {
          throw new Error(`Unknown proposal index ${delta.proposal}`);
        }
      }
      if (changes.granted !== 0) {
        addGranted.run(changes.granted);
      }
    });

    const hasBallot = this.db.prepare('SELECT 1 FROM ballot LIMIT 1');
    const insertBallotRow = this.db.prepare(`
      INSERT INTO ballot (id, administrator, created, proposal_count, granted_weight)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertProposal = this.db.prepare(
      'INSERT INTO proposals (idx, name, label, vote_count) VALUES (?, ?, ?, ?)'
    );
    const insertVoter = this.db.prepare(
      'INSERT INTO voters (voter, weight, voted, delegate, vote) VALUES (?, ?, ?, ?, ?)'
    );

    this.insertBallot = this.db.transaction(
      (info: BallotInfo, proposals: Proposal[], administrator: VotingRecord) => {
        if (hasBallot.get() !== undefined) {
          throw new BallotError('Ballot has already been created', ErrorCodes.BALLOT_EXISTS, 409);
        }
        insertBallotRow.run(
          info.id,
          info.administrator,
          info.created,
          info.proposalCount,
          info.grantedWeight
        );
        for (const proposal of proposals) {
          insertProposal.run(proposal.index, proposal.name, proposal.label, proposal.voteCount);
        }
        insertVoter.run(
          administrator.voter,
          administrator.weight,
          administrator.voted ? 1 : 0,
          administrator.delegate,
          administrator.vote
        );
      }
    );
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ballot (
        id TEXT PRIMARY KEY,
        administrator TEXT NOT NULL,
        created INTEGER NOT NULL,
        proposal_count INTEGER NOT NULL,
        granted_weight INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS proposals (
        idx INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        label TEXT NOT NULL,
        vote_count INTEGER NOT NULL DEFAULT 0 CHECK (vote_count >= 0)
      );

      CREATE TABLE IF NOT EXISTS voters (
        voter TEXT PRIMARY KEY,
        weight INTEGER NOT NULL DEFAULT 0 CHECK (weight >= 0),
        voted INTEGER NOT NULL DEFAULT 0,
        delegate TEXT,
        vote INTEGER,
        FOREIGN KEY (vote) REFERENCES proposals(idx)
      );

      CREATE INDEX IF NOT EXISTS idx_voters_delegate ON voters(delegate);
    `);
  }

  // Ballot operations

  async createBallot(info: BallotInfo, proposals: Proposal[], administrator: VotingRecord): Promise<void> {
    this.insertBallot.immediate(info, proposals, administrator);
  }

  async getBallot(): Promise<BallotInfo | null> {
    const stmt = this.db.prepare('SELECT * FROM ballot LIMIT 1');
    const row = stmt.get() as BallotRow | undefined;

    if (!row) return null;

    return {
      id: row.id,
      administrator: row.administrator,
      created: row.created,
      proposalCount: row.proposal_count,
      grantedWeight: row.granted_weight,
    };
  }

  // Proposal operations

  async getProposals(): Promise<Proposal[]> {
    const stmt = this.db.prepare('SELECT * FROM proposals ORDER BY idx');
    const rows = stmt.all() as ProposalRow[];

    return rows.map(row => this.rowToProposal(row));
  }

  async getProposal(index: number): Promise<Proposal | null> {
    const stmt = this.db.prepare('SELECT * FROM proposals WHERE idx = ?');
    const row = stmt.get(index) as ProposalRow | undefined;

    if (!row) return null;

    return this.rowToProposal(row);
  }

  // Voter operations

  async getVoter(voter: Identity): Promise<VotingRecord | null> {
    const stmt = this.db.prepare('SELECT * FROM voters WHERE voter = ?');
    const row = stmt.get(voter) as VoterRow | undefined;

    if (!row) return null;

    return this.rowToVoter(row);
  }

  async listVoters(): Promise<VotingRecord[]> {
    const stmt = this.db.prepare('SELECT * FROM voters ORDER BY voter');
    const rows = stmt.all() as VoterRow[];

    return rows.map(row => this.rowToVoter(row));
  }

  async commit(changes: LedgerChanges): Promise<void> {
    this.applyChanges.immediate(changes);
  }

  // Utilities

  private rowToProposal(row: ProposalRow): Proposal {
    return {
      index: row.idx,
      name: row.name,
      label: row.label,
      voteCount: row.vote_count,
    };
  }

  private rowToVoter(row: VoterRow): VotingRecord {
    return {
      voter: row.voter,
      weight: row.weight,
      voted: row.voted === 1,
      delegate: row.delegate,
      vote: row.vote,
    };
  }

  close(): void {
    this.db.close();
  }
}

/**
 * In-memory store for testing
 */
export class InMemoryStore implements BallotStore {
  private ballot: BallotInfo | null = null;
  private proposals: Proposal[] = [];
  private voters = new Map<Identity, VotingRecord>();

  async createBallot(info: BallotInfo, proposals: Proposal[], administrator: VotingRecord): Promise<void> {
    if (this.ballot) {
      throw new BallotError('Ballot has already been created', ErrorCodes.BALLOT_EXISTS, 409);
    }
    this.ballot = { ...info };
    this.proposals = proposals.map(p => ({ ...p }));
    this.voters.set(administrator.voter, { ...administrator });
  }

  async getBallot(): Promise<BallotInfo | null> {
    return this.ballot ? { ...this.ballot } : null;
  }

  async getProposals(): Promise<Proposal[]> {
    return this.proposals.map(p => ({ ...p }));
  }

  async getProposal(index: number): Promise<Proposal | null> {
    const proposal = this.proposals[index];
    return proposal ? { ...proposal } : null;
  }

  async getVoter(voter: Identity): Promise<VotingRecord | null> {
    const record = this.voters.get(voter);
    return record ? { ...record } : null;
  }

  async listVoters(): Promise<VotingRecord[]> {
    return Array.from(this.voters.values())
      .map(r => ({ ...r }))
      .sort((a, b) => (a.voter < b.voter ? -1 : a.voter > b.voter ? 1 : 0));
  }

  async commit(changes: LedgerChanges): Promise<void> {
    // Validate the whole batch before touching anything
    for (const { record, previous } of changes.voters) {
      const current = this.voters.get(record.voter) ?? emptyRecord(record.voter);
      if (!sameRecord(current, previous)) {
        throw new WriteConflictError(record.voter);
      }
    }
    for (const delta of changes.tallies) {
      if (!this.proposals[delta.proposal]) {
        throw new Error(`Unknown proposal index ${delta.proposal}`);
      }
    }

    for (const { record } of changes.voters) {
      this.voters.set(record.voter, { ...record });
    }
    for (const delta of changes.tallies) {
      const proposal = this.proposals[delta.proposal];
      if (proposal) {
        proposal.voteCount += delta.weight;
      }
    }
    if (this.ballot) {
      this.ballot.grantedWeight += changes.granted;
    }
  }

  close(): void {
    // Nothing to release
  }
}

function sameRecord(a: VotingRecord, b: VotingRecord): boolean {
  return a.weight === b.weight
    && a.voted === b.voted
    && a.delegate === b.delegate
    && a.vote === b.vote;
}

// Row types for SQLite
interface BallotRow {
  id: string;
  administrator: string;
  created: number;
  proposal_count: number;
  granted_weight: number;
}

interface ProposalRow {
  idx: number;
  name: string;
  label: string;
  vote_count: number;
}

interface VoterRow {
  voter: string;
  weight: number;
  voted: number;
  delegate: string | null;
  vote: number | null;
}
