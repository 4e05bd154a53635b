/**
 * Tests for the SQLite and in-memory stores
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  LiquidBallot,
  SQLiteStore,
  InMemoryStore,
  ProposalRegistry,
  WriteConflictError,
  emptyRecord,
} from '../src/ballot/index.js';
import type { BallotConfig, BallotStore, VoterWrite, VotingRecord } from '../src/ballot/index.js';

const config: BallotConfig = { dataDir: './unused', maxProposals: 8, labelOverflow: 'reject' };

async function seed(store: BallotStore): Promise<void> {
  await store.createBallot(
    { id: 'b1', administrator: 'chair', created: 1000, proposalCount: 2, grantedWeight: 1 },
    ProposalRegistry.build(['Yes', 'No'], { maxProposals: 8, labelOverflow: 'reject' }),
    { ...emptyRecord('chair'), weight: 1 }
  );
}

function fresh(record: VotingRecord): VoterWrite {
  return { record, previous: emptyRecord(record.voter) };
}

const stores: Array<[string, () => BallotStore]> = [
  ['InMemoryStore', () => new InMemoryStore()],
  ['SQLiteStore', () => new SQLiteStore(':memory:')],
];

describe.each(stores)('%s', (_name, createStore) => {
  let store: BallotStore;

  beforeEach(async () => {
    store = createStore();
    await seed(store);
  });

  afterEach(() => {
    store.close();
  });

  it('should read back the ballot and proposals', async () => {
    expect(await store.getBallot()).toEqual({
      id: 'b1',
      administrator: 'chair',
      created: 1000,
      proposalCount: 2,
      grantedWeight: 1,
    });
    expect((await store.getProposals()).map(p => p.name)).toEqual(['Yes', 'No']);
    expect(await store.getProposal(2)).toBeNull();
  });

  it('should apply a batch', async () => {
    await store.commit({
      voters: [fresh({ voter: 'alice', weight: 1, voted: true, delegate: null, vote: 1 })],
      tallies: [{ proposal: 1, weight: 1 }],
      granted: 1,
    });

    expect(await store.getVoter('alice')).toEqual({ voter: 'alice', weight: 1, voted: true, delegate: null, vote: 1 });
    expect((await store.getProposal(1))?.voteCount).toBe(1);
    expect((await store.getBallot())?.grantedWeight).toBe(2);
  });

  it('should apply nothing from a batch that fails', async () => {
    await expect(store.commit({
      voters: [fresh({ voter: 'alice', weight: 1, voted: false, delegate: null, vote: null })],
      tallies: [{ proposal: 0, weight: 1 }, { proposal: 9, weight: 1 }],
      granted: 1,
    })).rejects.toThrow();

    expect(await store.getVoter('alice')).toBeNull();
    expect((await store.getProposal(0))?.voteCount).toBe(0);
    expect((await store.getBallot())?.grantedWeight).toBe(1);
  });

  it('should return copies', async () => {
    const record = await store.getVoter('chair');
    if (record) record.weight = 99;

    expect((await store.getVoter('chair'))?.weight).toBe(1);
  });

  it('should list voters in identity order', async () => {
    await store.commit({
      voters: [
        fresh({ ...emptyRecord('zed'), weight: 1 }),
        fresh({ ...emptyRecord('amy'), weight: 1 }),
      ],
      tallies: [],
      granted: 2,
    });

    expect((await store.listVoters()).map(v => v.voter)).toEqual(['amy', 'chair', 'zed']);
  });

  it('should reject a write computed from a stale record', async () => {
    const chair = { ...emptyRecord('chair'), weight: 1 };
    await store.commit({
      voters: [{ record: { ...chair, voted: true, vote: 0 }, previous: chair }],
      tallies: [{ proposal: 0, weight: 1 }],
      granted: 0,
    });

    const stale = store.commit({
      voters: [
        fresh({ ...emptyRecord('bob'), weight: 1 }),
        { record: { ...chair, voted: true, vote: 1 }, previous: chair },
      ],
      tallies: [{ proposal: 1, weight: 1 }],
      granted: 1,
    });

    await expect(stale).rejects.toBeInstanceOf(WriteConflictError);
    await expect(stale).rejects.toMatchObject({ code: 'WRITE_CONFLICT', statusCode: 409 });
    expect(await store.getVoter('chair')).toEqual({ ...chair, voted: true, vote: 0 });
    expect(await store.getVoter('bob')).toBeNull();
    expect((await store.getProposals()).map(p => p.voteCount)).toEqual([1, 0]);
    expect((await store.getBallot())?.grantedWeight).toBe(1);
  });

  it('should reject a write over a row that appeared since it was read', async () => {
    await store.commit({ voters: [fresh({ ...emptyRecord('alice'), weight: 1 })], tallies: [], granted: 1 });

    await expect(store.commit({
      voters: [fresh({ ...emptyRecord('alice'), weight: 1 })],
      tallies: [],
      granted: 1,
    })).rejects.toMatchObject({ code: 'WRITE_CONFLICT' });
    expect((await store.getBallot())?.grantedWeight).toBe(2);
  });

  it('should leave the store unchanged when an operation fails', async () => {
    const ballot = new LiquidBallot({ config, store });
    await ballot.grantRights('chair', 'alice');
    const before = await store.listVoters();

    await expect(ballot.vote('alice', 5)).rejects.toMatchObject({ code: 'INVALID_PROPOSAL' });
    await expect(ballot.delegate('alice', 'alice')).rejects.toMatchObject({ code: 'SELF_DELEGATION' });

    expect(await store.listVoters()).toEqual(before);
    expect((await store.getProposals()).map(p => p.voteCount)).toEqual([0, 0]);
  });
});

describe('SQLiteStore on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'liquid-ballot-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should keep the ballot across reopen', async () => {
    const path = join(dir, 'nested', 'ballot.db');

    const first = new LiquidBallot({ config, store: new SQLiteStore(path) });
    await first.construct('chair', ['Yes', 'No']);
    await first.grantRights('chair', 'alice');
    await first.delegate('alice', 'chair');
    await first.vote('chair', 1);
    first.close();

    const second = new LiquidBallot({ config, store: new SQLiteStore(path) });
    expect(await second.getProposalVote(1)).toBe(2);
    expect(await second.winnerName()).toBe('No');
    expect(await second.verifyConservation()).toEqual({ granted: 2, cast: 2, resting: 0, balanced: true });
    await expect(second.construct('other', ['X'])).rejects.toMatchObject({ code: 'BALLOT_EXISTS' });
    second.close();
  });

  it('should count one vote when two instances vote for the same voter', async () => {
    const path = join(dir, 'ballot.db');
    const first = new LiquidBallot({ config, store: new SQLiteStore(path) });
    const second = new LiquidBallot({ config, store: new SQLiteStore(path) });

    try {
      await first.construct('chair', ['Yes', 'No']);
      await second.grantRights('chair', 'alice');

      const results = await Promise.allSettled([first.vote('alice', 0), second.vote('alice', 1)]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toMatchObject({ code: 'ALREADY_VOTED' });

      const counts = (await first.listProposals()).map(p => p.voteCount);
      expect(counts[0] + counts[1]).toBe(1);
      expect(await second.verifyConservation()).toEqual({ granted: 2, cast: 1, resting: 1, balanced: true });
    } finally {
      first.close();
      second.close();
    }
  });

  it('should refuse a second ballot created through another connection', async () => {
    const path = join(dir, 'ballot.db');
    const first = new LiquidBallot({ config, store: new SQLiteStore(path) });
    const second = new LiquidBallot({ config, store: new SQLiteStore(path) });

    try {
      await first.construct('chair', ['Yes', 'No']);
      await expect(second.construct('other', ['X'])).rejects.toMatchObject({ code: 'BALLOT_EXISTS' });
      expect(await second.isAdministrator('chair')).toBe(true);
    } finally {
      first.close();
      second.close();
    }
  });
});
