/**
 * Liquid Ballot - delegated plurality voting
 *
 * Grant rights, delegate or vote, count the winner.
 */

export {
  LiquidBallot,
  createLiquidBallot,
  createTestBallot,
  loadConfig,
  parsePositiveInt,
  Crypto,
  ProposalRegistry,
  VoterLedger,
  DelegationResolver,
  TallyEngine,
  OperationQueue,
  AccessControl,
  SQLiteStore,
  InMemoryStore,
  BallotError,
  BallotValidationError,
  WriteConflictError,
  RegistryError,
  LedgerError,
  DelegationError,
  TallyError,
  GateError,
  ErrorCodes,
  encodeLabel,
  decodeLabel,
  winningIndex,
  LABEL_BYTES,
} from './ballot/index.js';

export type {
  Identity,
  KeyPair,
  Proposal,
  VotingRecord,
  VoterState,
  BallotInfo,
  BallotConfig,
  BallotStore,
  BallotResults,
  ConservationReport,
  VoteReceipt,
  DelegationReceipt,
  LabelOverflowPolicy,
  ErrorCode,
  HealthStatus,
  LiquidBallotOptions,
  GateResult,
  GateRequirements,
} from './ballot/index.js';
