/**
 * Tests for the Gate System
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  AccessControl,
  AdministratorGate,
  VotingRightsGate,
  GateError,
  InMemoryStore,
  ProposalRegistry,
  VoterLedger,
  emptyRecord,
} from '../src/ballot/index.js';

describe('Gate System', () => {
  let store: InMemoryStore;
  let ledger: VoterLedger;

  beforeEach(async () => {
    store = new InMemoryStore();
    await store.createBallot(
      { id: 'b1', administrator: 'chair', created: 0, proposalCount: 2, grantedWeight: 1 },
      ProposalRegistry.build(['Yes', 'No'], { maxProposals: 4, labelOverflow: 'reject' }),
      { ...emptyRecord('chair'), weight: 1 }
    );
    ledger = new VoterLedger(store);
  });

  describe('AdministratorGate', () => {
    it('should allow only the administrator', async () => {
      const gate = new AdministratorGate('chair');

      expect(await gate.check('chair')).toEqual({ allowed: true, reason: undefined });
      expect(await gate.check('alice')).toEqual({
        allowed: false,
        reason: 'Only the ballot administrator can do this',
      });
    });

    it('should describe its requirements', () => {
      const gate = new AdministratorGate('chair');
      expect(gate.type).toBe('administrator');
      expect(gate.getRequirements().description).toBe('Ballot administrator only');
    });
  });

  describe('VotingRightsGate', () => {
    it('should allow identities with weight', async () => {
      const gate = new VotingRightsGate(ledger);
      await ledger.grantRights('alice');

      expect((await gate.check('alice')).allowed).toBe(true);
      expect((await gate.check('chair')).allowed).toBe(true);
    });

    it('should deny identities without weight', async () => {
      const gate = new VotingRightsGate(ledger);

      expect(await gate.check('eve')).toEqual({ allowed: false, reason: 'Has no right to vote' });
    });
  });

  describe('AccessControl', () => {
    let access: AccessControl;

    beforeEach(() => {
      access = new AccessControl('chair', ledger);
    });

    it('should expose the administrator', () => {
      expect(access.administrator).toBe('chair');
    });

    it('should reject non-administrators with NOT_AUTHORIZED', async () => {
      await expect(access.requireAdministrator('chair')).resolves.toBeUndefined();
      await expect(access.requireAdministrator('alice')).rejects.toBeInstanceOf(GateError);
      await expect(access.requireAdministrator('alice')).rejects.toMatchObject({
        code: 'NOT_AUTHORIZED',
        statusCode: 403,
      });
    });

    it('should return the record of a voter with rights', async () => {
      await ledger.grantRights('alice');

      const record = await access.requireVotingRights('alice');
      expect(record).toEqual({ voter: 'alice', weight: 1, voted: false, delegate: null, vote: null });
    });

    it('should reject voters without rights with NO_VOTING_RIGHTS', async () => {
      await expect(access.requireVotingRights('eve')).rejects.toMatchObject({
        code: 'NO_VOTING_RIGHTS',
        statusCode: 403,
      });
    });

    it('should report both gates', async () => {
      const requirements = access.getRequirements();

      expect(requirements.administrator.type).toBe('administrator');
      expect(requirements.voter.type).toBe('voting-rights');
      expect((await access.canVote('chair')).allowed).toBe(true);
      expect((await access.canAdminister('alice')).allowed).toBe(false);
    });
  });
});
