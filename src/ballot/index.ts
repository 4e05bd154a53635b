/**
 * Liquid Ballot - single-round delegated voting
 *
 * An administrator registers proposals and grants voting rights.
 * Voters either vote or hand their weight (and whatever was handed to
 * them) to someone else. Plurality of accumulated weight wins.
 *
 * Every public operation goes through one queue, so no two operations
 * of one instance interleave. Other writers on the same store (a second
 * process on the database file) are caught at commit, and the operation
 * is re-run from fresh reads.
 */

import { v4 as uuidv4 } from 'uuid';
import { ProposalRegistry } from './registry.js';
import { VoterLedger } from './ledger.js';
import { DelegationResolver } from './delegation.js';
import { TallyEngine } from './tally.js';
import { OperationQueue } from './queue.js';
import { SQLiteStore, InMemoryStore } from './storage.js';
import { AccessControl, type GateRequirements } from './gates/index.js';
import type {
  BallotConfig,
  BallotInfo,
  BallotResults,
  BallotStore,
  ConservationReport,
  DelegationReceipt,
  Identity,
  LabelOverflowPolicy,
  Proposal,
  VoteReceipt,
  VotingRecord,
} from './types.js';
import {
  BallotError,
  BallotValidationError,
  ErrorCodes,
  WriteConflictError,
  emptyRecord,
} from './types.js';

// Re-runs of an operation whose commit lost a race with another writer
const MAX_CONFLICT_RETRIES = 3;

export interface LiquidBallotOptions {
  config: BallotConfig;
  store?: BallotStore;
}

/**
 * Main LiquidBallot class - coordinates all voting operations
 */
export class LiquidBallot {
  readonly store: BallotStore;
  readonly registry: ProposalRegistry;
  readonly ledger: VoterLedger;
  readonly resolver: DelegationResolver;

  private config: BallotConfig;
  private queue = new OperationQueue();
  private session: { access: AccessControl; tally: TallyEngine } | null = null;

  constructor(options: LiquidBallotOptions) {
    this.config = options.config;
    this.store = options.store ?? this.createStore();

    this.registry = new ProposalRegistry(this.store);
    this.ledger = new VoterLedger(this.store);
    this.resolver = new DelegationResolver(this.ledger);
  }

  // ============= Construction =============

  /**
   * Create the ballot. The caller becomes the administrator with weight 1.
   * One-time: fails with BALLOT_EXISTS once a ballot has been created.
   */
  async construct(actor: Identity, proposalNames: readonly string[]): Promise<BallotInfo> {
    return this.queue.run(async () => {
      requireIdentity(actor, 'actor');

      if (await this.store.getBallot()) {
        throw new BallotError('Ballot has already been created', ErrorCodes.BALLOT_EXISTS, 409);
      }

      const proposals = ProposalRegistry.build(proposalNames, {
        maxProposals: this.config.maxProposals,
        labelOverflow: this.config.labelOverflow,
      });

      const info: BallotInfo = {
        id: uuidv4(),
        administrator: actor,
        created: Date.now(),
        proposalCount: proposals.length,
        grantedWeight: 1,
      };

      await this.store.createBallot(info, proposals, { ...emptyRecord(actor), weight: 1 });
      this.session = null;

      return info;
    });
  }

  /**
   * Ballot metadata, or null before construction
   */
  async getInfo(): Promise<BallotInfo | null> {
    return this.queue.run(() => this.store.getBallot());
  }

  // ============= Administration =============

  /**
   * Give `voter` the right to vote (weight 1). Administrator only.
   */
  async grantRights(actor: Identity, voter: Identity): Promise<VotingRecord> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      await access.requireAdministrator(actor);
      requireIdentity(voter, 'voter');
      return retryOnConflict(() => this.ledger.grantRights(voter));
    });
  }

  async getWeight(actor: Identity, voter: Identity): Promise<number> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      await access.requireAdministrator(actor);
      return (await this.ledger.get(voter)).weight;
    });
  }

  async getVoterInfo(actor: Identity, voter: Identity): Promise<VotingRecord> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      await access.requireAdministrator(actor);
      return this.ledger.get(voter);
    });
  }

  /**
   * Delegate chain starting at `voter`, ending at its terminal delegate
   */
  async getDelegationChain(actor: Identity, voter: Identity): Promise<Identity[]> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      await access.requireAdministrator(actor);
      return this.resolver.chain(voter);
    });
  }

  // ============= Voting =============

  async delegate(actor: Identity, to: Identity): Promise<DelegationReceipt> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      requireIdentity(to, 'delegate');
      return retryOnConflict(() => tally.delegate(actor, to));
    });
  }

  async vote(actor: Identity, proposal: number): Promise<VoteReceipt> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      return retryOnConflict(() => tally.vote(actor, proposal));
    });
  }

  async hasVoted(actor: Identity): Promise<boolean> {
    return this.queue.run(async () => {
      await this.requireSession();
      return (await this.ledger.get(actor)).voted;
    });
  }

  // ============= Proposals & Results =============

  async listProposals(): Promise<Proposal[]> {
    return this.queue.run(async () => {
      await this.requireSession();
      return this.registry.list();
    });
  }

  async getProposalName(index: number): Promise<string> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      return (await tally.requireProposal(index)).name;
    });
  }

  async getProposalVote(index: number): Promise<number> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      return (await tally.requireProposal(index)).voteCount;
    });
  }

  async winningProposal(): Promise<number> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      return tally.winningProposal();
    });
  }

  async winnerName(): Promise<string> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      return tally.winnerName();
    });
  }

  async verifyConservation(): Promise<ConservationReport> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      const info = await this.requireBallot();
      return tally.checkConservation(info.grantedWeight);
    });
  }

  /**
   * Full results snapshot: proposals, winner, totals and the conservation check
   */
  async getResults(): Promise<BallotResults> {
    return this.queue.run(async () => {
      const { tally } = await this.requireSession();
      const info = await this.requireBallot();
      const [proposals, voters] = await Promise.all([this.registry.list(), this.ledger.list()]);
      const winningProposal = tally.winnerOf(proposals);
      const winner = proposals.find(p => p.index === winningProposal);

      return {
        ballotId: info.id,
        proposals,
        winningProposal,
        winnerName: winner?.name ?? '',
        totalVotes: proposals.reduce((sum, p) => sum + p.voteCount, 0),
        voters: voters.filter(v => v.weight > 0 || v.voted).length,
        votedCount: voters.filter(v => v.voted).length,
        conservation: await tally.checkConservation(info.grantedWeight),
      };
    });
  }

  // ============= Gates =============

  async getGateInfo(): Promise<{ administrator: GateRequirements; voter: GateRequirements }> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      return access.getRequirements();
    });
  }

  async isAdministrator(actor: Identity): Promise<boolean> {
    return this.queue.run(async () => {
      const { access } = await this.requireSession();
      return (await access.canAdminister(actor)).allowed;
    });
  }

  // ============= Utilities =============

  /**
   * Health check the store
   */
  async healthCheck(): Promise<HealthStatus> {
    try {
      const info = await this.queue.run(() => this.store.getBallot());
      return { healthy: true, store: true, initialized: info !== null, ballotId: info?.id ?? null };
    } catch (error) {
      return {
        healthy: false,
        store: false,
        initialized: false,
        ballotId: null,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  close(): void {
    this.store.close();
  }

  // ============= Private Methods =============

  private async requireBallot(): Promise<BallotInfo> {
    const info = await this.store.getBallot();
    if (!info) {
      throw new BallotError('Ballot has not been created', ErrorCodes.BALLOT_NOT_FOUND, 404);
    }
    return info;
  }

  // The administrator never changes, so gates built once stay valid
  private async requireSession(): Promise<{ access: AccessControl; tally: TallyEngine }> {
    if (this.session) return this.session;

    const info = await this.requireBallot();
    const access = new AccessControl(info.administrator, this.ledger);
    const tally = new TallyEngine(this.registry, this.ledger, this.resolver, access);
    this.session = { access, tally };
    return this.session;
  }

  private createStore(): BallotStore {
    const dbPath = `${this.config.dataDir}/ballot.db`;
    return new SQLiteStore(dbPath);
  }
}

/**
 * Health check status
 */
export interface HealthStatus {
  healthy: boolean;
  store: boolean;
  initialized: boolean;
  ballotId: string | null;
  error?: string;
}

async function retryOnConflict<T>(operation: () => Promise<T>): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof WriteConflictError) || attempt >= MAX_CONFLICT_RETRIES) {
        throw error;
      }
    }
  }
}

function requireIdentity(identity: Identity, field: string): void {
  if (typeof identity !== 'string' || identity.trim().length === 0) {
    throw new BallotValidationError(`${field} must be a non-empty identity`);
  }
}

/**
 * A positive integer setting; `fallback` when unset
 */
export function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  if (!/^\d+$/.test(value) || parseInt(value, 10) === 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseLabelOverflow(value: string | undefined): LabelOverflowPolicy {
  if (value === undefined || value === '') return 'reject';
  if (value === 'reject' || value === 'truncate') return value;
  throw new Error(`LABEL_OVERFLOW must be "reject" or "truncate", got "${value}"`);
}

/**
 * Configuration from the environment, with overrides
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<BallotConfig>
): BallotConfig {
  return {
    dataDir: env.DATA_DIR ?? './data',
    maxProposals: parsePositiveInt(env.MAX_PROPOSALS, 'MAX_PROPOSALS', 64),
    labelOverflow: parseLabelOverflow(env.LABEL_OVERFLOW),
    ...overrides,
  };
}

/**
 * Create a LiquidBallot backed by SQLite in the configured data directory
 */
export function createLiquidBallot(configOverrides?: Partial<BallotConfig>): LiquidBallot {
  return new LiquidBallot({ config: loadConfig(process.env, configOverrides) });
}

/**
 * Create a LiquidBallot for testing (in-memory store)
 */
export function createTestBallot(configOverrides?: Partial<BallotConfig>): LiquidBallot {
  const config: BallotConfig = {
    dataDir: './test-data',
    maxProposals: 16,
    labelOverflow: 'reject',
    ...configOverrides,
  };

  return new LiquidBallot({ config, store: new InMemoryStore() });
}

// Re-export types and utilities
export { Crypto } from './crypto.js';
export type * from './types.js';
export {
  BallotError,
  BallotValidationError,
  WriteConflictError,
  ErrorCodes,
  emptyRecord,
  voterState,
} from './types.js';
export { ProposalRegistry, RegistryError, encodeLabel, decodeLabel, winningIndex, LABEL_BYTES } from './registry.js';
export { VoterLedger, LedgerBatch, LedgerError } from './ledger.js';
export { DelegationResolver, DelegationError } from './delegation.js';
export { TallyEngine, TallyError } from './tally.js';
export { OperationQueue } from './queue.js';
export { SQLiteStore, InMemoryStore } from './storage.js';

// Gate system exports
export {
  AccessControl,
  AdministratorGate,
  VotingRightsGate,
  GateError,
  type Gate,
  type GateType,
  type GateResult,
  type GateRequirements,
} from './gates/index.js';
