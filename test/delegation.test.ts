/**
 * Tests for the voter ledger and delegation walks
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  DelegationResolver,
  InMemoryStore,
  LedgerBatch,
  ProposalRegistry,
  VoterLedger,
  emptyRecord,
  voterState,
} from '../src/ballot/index.js';
import type { VotingRecord } from '../src/ballot/index.js';

function delegated(voter: string, delegate: string): VotingRecord {
  return { voter, weight: 1, voted: true, delegate, vote: null };
}

describe('VoterLedger', () => {
  let store: InMemoryStore;
  let ledger: VoterLedger;

  beforeEach(async () => {
    store = new InMemoryStore();
    await store.createBallot(
      { id: 'b1', administrator: 'chair', created: 0, proposalCount: 1, grantedWeight: 1 },
      ProposalRegistry.build(['Only'], { maxProposals: 4, labelOverflow: 'reject' }),
      { ...emptyRecord('chair'), weight: 1 }
    );
    ledger = new VoterLedger(store);
  });

  it('should read unknown identities as the empty record', async () => {
    expect(await ledger.get('stranger')).toEqual({
      voter: 'stranger',
      weight: 0,
      voted: false,
      delegate: null,
      vote: null,
    });
  });

  it('should grant weight 1 and count it as granted', async () => {
    const record = await ledger.grantRights('alice');

    expect(record.weight).toBe(1);
    expect((await ledger.get('alice')).weight).toBe(1);
    expect((await store.getBallot())?.grantedWeight).toBe(2);
  });

  it('should refuse a second grant', async () => {
    await ledger.grantRights('alice');

    await expect(ledger.grantRights('alice')).rejects.toMatchObject({
      code: 'ALREADY_HAS_RIGHTS',
      statusCode: 409,
    });
    expect((await ledger.get('alice')).weight).toBe(1);
    expect((await store.getBallot())?.grantedWeight).toBe(2);
  });

  it('should not touch the store for an empty batch', async () => {
    const before = await store.listVoters();
    await ledger.commit(new LedgerBatch());
    expect(await store.listVoters()).toEqual(before);
  });

  it('should apply nothing when a batch holds an unknown proposal', async () => {
    const batch = new LedgerBatch();
    ledger.set(batch, { ...emptyRecord('alice'), weight: 1, voted: true, vote: 7 }, emptyRecord('alice'));
    batch.addTally(7, 1);

    await expect(ledger.commit(batch)).rejects.toThrow('Unknown proposal index 7');
    expect((await ledger.get('alice')).voted).toBe(false);
  });
});

describe('voterState', () => {
  it('should name each state', () => {
    expect(voterState(emptyRecord('a'))).toBe('no-rights');
    expect(voterState({ ...emptyRecord('a'), weight: 1 })).toBe('has-rights');
    expect(voterState({ ...emptyRecord('a'), weight: 1, voted: true, vote: 0 })).toBe('voted');
    expect(voterState(delegated('a', 'b'))).toBe('delegated');
  });
});

describe('DelegationResolver', () => {
  let store: InMemoryStore;
  let resolver: DelegationResolver;

  beforeEach(async () => {
    store = new InMemoryStore();
    await store.createBallot(
      { id: 'b1', administrator: 'chair', created: 0, proposalCount: 1, grantedWeight: 1 },
      ProposalRegistry.build(['Only'], { maxProposals: 4, labelOverflow: 'reject' }),
      { ...emptyRecord('chair'), weight: 1 }
    );
    // a -> b -> c, c has not delegated
    await store.commit({
      voters: [delegated('a', 'b'), delegated('b', 'c'), { ...emptyRecord('c'), weight: 3 }].map(record => ({
        record,
        previous: emptyRecord(record.voter),
      })),
      tallies: [],
      granted: 3,
    });
    resolver = new DelegationResolver(new VoterLedger(store));
  });

  it('should return the target itself when it has not delegated', async () => {
    expect(await resolver.resolve('d', 'c')).toBe('c');
  });

  it('should follow the chain to its terminal delegate', async () => {
    expect(await resolver.resolve('d', 'a')).toBe('c');
  });

  it('should treat an unknown target as terminal', async () => {
    expect(await resolver.resolve('a', 'nobody')).toBe('nobody');
  });

  it('should reject a walk that returns to the delegator', async () => {
    await expect(resolver.resolve('c', 'a')).rejects.toMatchObject({
      code: 'DELEGATION_CYCLE',
      statusCode: 409,
      message: 'Found loop in delegation',
    });
  });

  it('should list the chain from a voter to its terminal delegate', async () => {
    expect(await resolver.chain('a')).toEqual(['a', 'b', 'c']);
    expect(await resolver.chain('c')).toEqual(['c']);
  });
});
