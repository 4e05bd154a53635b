/**
 * Liquid Ballot Core Types
 * Single-round delegated voting - plurality of accumulated weight
 */

// Opaque caller reference. Over HTTP this is a hex-encoded Ed25519 public key.
export type Identity = string;

export type PublicKey = string;  // hex-encoded 32 bytes
export type PrivateKey = string; // hex-encoded 32 bytes
export type Signature = string;  // hex-encoded 64 bytes
export type Hash = string;       // hex-encoded 32 bytes

export interface KeyPair {
  publicKey: PublicKey;
  privateKey: PrivateKey;
}

// What to do with a proposal name longer than the 32-byte label
export type LabelOverflowPolicy = 'reject' | 'truncate';

export interface Proposal {
  index: number;
  name: string;
  label: string;              // 32 bytes, hex-encoded, zero-padded
  voteCount: number;
}

export interface VotingRecord {
  voter: Identity;
  weight: number;             // 0 means no right to vote
  voted: boolean;             // one-way false -> true
  delegate: Identity | null;  // immediate delegate target
  vote: number | null;        // proposal index, only for direct votes
}

// Ballot metadata, written once at construction
export interface BallotInfo {
  id: string;
  administrator: Identity;
  created: number;
  proposalCount: number;
  /** Total weight ever granted (administrator + one per successful grant) */
  grantedWeight: number;
}

export type VoterState = 'no-rights' | 'has-rights' | 'voted' | 'delegated';

export interface TallyDelta {
  proposal: number;
  weight: number;
}

/**
 * A voter row write, valid only while the stored row still equals `previous`
 * (an absent row reads as the empty record)
 */
export interface VoterWrite {
  record: VotingRecord;
  previous: VotingRecord;
}

/**
 * A batch of changes applied by the store in one atomic step
 */
export interface LedgerChanges {
  voters: VoterWrite[];
  tallies: TallyDelta[];
  granted: number;
}

export interface VoteReceipt {
  voter: Identity;
  proposal: number;
  weight: number;
}

export interface DelegationReceipt {
  voter: Identity;
  delegate: Identity;
  /** Identity at the end of the chain that received the weight */
  terminal: Identity;
  weight: number;
  /** Set when the terminal delegate had already voted */
  appliedToProposal: number | null;
}

export interface ConservationReport {
  granted: number;
  cast: number;
  resting: number;
  balanced: boolean;
}

export interface BallotResults {
  ballotId: string;
  proposals: Proposal[];
  winningProposal: number;
  winnerName: string;
  totalVotes: number;
  voters: number;
  votedCount: number;
  conservation: ConservationReport;
}

// Storage interface
export interface BallotStore {
  // Ballot
  createBallot(info: BallotInfo, proposals: Proposal[], administrator: VotingRecord): Promise<void>;
  getBallot(): Promise<BallotInfo | null>;

  // Proposals
  getProposals(): Promise<Proposal[]>;
  getProposal(index: number): Promise<Proposal | null>;

  // Voters
  getVoter(voter: Identity): Promise<VotingRecord | null>;
  listVoters(): Promise<VotingRecord[]>;

  // Atomic batch write
  commit(changes: LedgerChanges): Promise<void>;

  close(): void;
}

// Configuration
export interface BallotConfig {
  dataDir: string;
  maxProposals: number;
  labelOverflow: LabelOverflowPolicy;
}

// Error types
export class BallotError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'BallotError';
  }
}

export const ErrorCodes = {
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  ALREADY_HAS_RIGHTS: 'ALREADY_HAS_RIGHTS',
  NO_VOTING_RIGHTS: 'NO_VOTING_RIGHTS',
  ALREADY_VOTED: 'ALREADY_VOTED',
  SELF_DELEGATION: 'SELF_DELEGATION',
  DELEGATION_CYCLE: 'DELEGATION_CYCLE',
  INVALID_PROPOSAL: 'INVALID_PROPOSAL',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  BALLOT_NOT_FOUND: 'BALLOT_NOT_FOUND',
  BALLOT_EXISTS: 'BALLOT_EXISTS',
  WRITE_CONFLICT: 'WRITE_CONFLICT',
  MISSING_SIGNATURE: 'MISSING_SIGNATURE',
  INVALID_SIGNATURE: 'INVALID_SIGNATURE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Validation error (InvalidInput)
 */
export class BallotValidationError extends BallotError {
  constructor(message: string) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400);
    this.name = 'BallotValidationError';
  }
}

/**
 * Another writer changed a voter row between this operation's read and its commit
 */
export class WriteConflictError extends BallotError {
  constructor(voter: Identity) {
    super(`Voter ${voter} was changed by another writer`, ErrorCodes.WRITE_CONFLICT, 409);
    this.name = 'WriteConflictError';
  }
}

/**
 * The record an unknown identity reads as
 */
export function emptyRecord(voter: Identity): VotingRecord {
  return { voter, weight: 0, voted: false, delegate: null, vote: null };
}

export function voterState(record: VotingRecord): VoterState {
  if (record.voted) {
    return record.delegate !== null ? 'delegated' : 'voted';
  }
  return record.weight > 0 ? 'has-rights' : 'no-rights';
}
