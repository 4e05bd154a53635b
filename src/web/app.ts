/**
 * Liquid Ballot HTTP API
 * Express app over a single ballot: construction, rights, delegation, voting and results
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { Crypto } from '../ballot/crypto.js';
import { BallotError, BallotValidationError, ErrorCodes, type Identity, type Proposal } from '../ballot/types.js';
import type { LiquidBallot } from '../ballot/index.js';
import { requireActor } from './middleware/auth.js';
import { securityHeaders, requestLogging, rateLimiter } from './middleware/security.js';

export const SERVICE_NAME = 'liquid-ballot';
export const SERVICE_VERSION = '0.1.0';

export interface AppOptions {
  /** Requests per minute per caller on mutating routes */
  rateLimitRequests: number;
  rateLimitWindowMs: number;
  enableHSTS: boolean;
  disableLogging: boolean;
}

const DEFAULT_APP_OPTIONS: AppOptions = {
  rateLimitRequests: 30,
  rateLimitWindowMs: 60000,
  enableHSTS: false,
  disableLogging: false,
};

export function createApp(ballot: LiquidBallot, options: Partial<AppOptions> = {}): Express {
  const cfg = { ...DEFAULT_APP_OPTIONS, ...options };
  const app = express();

  // ============= Middleware =============

  app.use(securityHeaders({ enableHSTS: cfg.enableHSTS, disableLogging: cfg.disableLogging }));
  app.use(cors());
  app.use(express.json());
  app.use(requestLogging(cfg.disableLogging));

  const mutationLimiter = rateLimiter(cfg.rateLimitWindowMs, cfg.rateLimitRequests);

  // ============= Health & Info =============

  app.get('/health', async (_req: Request, res: Response) => {
    const status = await ballot.healthCheck();
    res.status(status.healthy ? 200 : 503).json(status);
  });

  app.get('/api/info', async (_req: Request, res: Response) => {
    try {
      const info = await ballot.getInfo();
      res.json({
        name: SERVICE_NAME,
        version: SERVICE_VERSION,
        description: 'Delegated plurality voting',
        ballot: info,
        gates: info ? await ballot.getGateInfo() : null,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/gates', async (_req: Request, res: Response) => {
    try {
      res.json(await ballot.getGateInfo());
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============= Ballot =============

  /**
   * POST /api/ballot - Create the ballot; the signer becomes administrator
   */
  app.post('/api/ballot', mutationLimiter, async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const proposals = requireStringArray(bodyField(req, 'proposals'), 'proposals');
      const info = await ballot.construct(actor, proposals);
      res.status(201).json({ ballot: info, proposals: await ballot.listProposals() });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/proposals', async (_req: Request, res: Response) => {
    try {
      res.json(await ballot.listProposals());
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/proposals/:index', async (req: Request<{ index: string }>, res: Response) => {
    try {
      const index = parseIndex(req.params.index);
      const name = await ballot.getProposalName(index);
      const voteCount = await ballot.getProposalVote(index);
      res.json({ index, name, voteCount });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/winner', async (_req: Request, res: Response) => {
    try {
      const index = await ballot.winningProposal();
      const name = await ballot.winnerName();
      const voteCount = await ballot.getProposalVote(index);
      res.json({ index, name, voteCount });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============= Rights & Voting =============

  /**
   * POST /api/rights - Administrator grants a voter weight 1
   */
  app.post('/api/rights', mutationLimiter, async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const voter = requireIdentity(bodyField(req, 'voter'), 'voter');
      const record = await ballot.grantRights(actor, voter);
      res.status(201).json(record);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/delegate', mutationLimiter, async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const to = requireIdentity(bodyField(req, 'to'), 'to');
      res.json(await ballot.delegate(actor, to));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/vote', mutationLimiter, async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const proposal = bodyField(req, 'proposal');
      if (typeof proposal !== 'number' || !Number.isInteger(proposal)) {
        throw new BallotValidationError('proposal must be an integer index');
      }
      res.json(await ballot.vote(actor, proposal));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/me', async (req: Request, res: Response) => {
    try {
      const voter = requireActor(req);
      res.json({ voter, hasVoted: await ballot.hasVoted(voter) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============= Administrator Views =============

  app.get('/api/voters/:voter', async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const voter = requireIdentity(req.params.voter, 'voter');
      res.json(await ballot.getVoterInfo(actor, voter));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/voters/:voter/weight', async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const voter = requireIdentity(req.params.voter, 'voter');
      res.json({ voter, weight: await ballot.getWeight(actor, voter) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/voters/:voter/chain', async (req: Request, res: Response) => {
    try {
      const actor = requireActor(req);
      const voter = requireIdentity(req.params.voter, 'voter');
      res.json({ voter, chain: await ballot.getDelegationChain(actor, voter) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============= Results =============

  app.get('/api/results', async (_req: Request, res: Response) => {
    try {
      res.json(await ballot.getResults());
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/results/export/json', async (_req: Request, res: Response) => {
    try {
      const results = await ballot.getResults();
      const digest = Crypto.hashObject(results);
      res.setHeader('Content-Disposition', `attachment; filename="ballot-${results.ballotId}.json"`);
      res.json({ results, digest, exportedAt: new Date().toISOString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/results/export/csv', async (_req: Request, res: Response) => {
    try {
      const results = await ballot.getResults();
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="ballot-${results.ballotId}.csv"`);
      res.send(toCsv(results.proposals));
    } catch (error) {
      sendError(res, error);
    }
  });

  // ============= Fallbacks =============

  app.all('{*splat}', (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isMalformedBody(err)) {
      res.status(400).json({ error: 'Malformed JSON body', code: ErrorCodes.VALIDATION_ERROR });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Map an error onto the response: ballot errors keep their status and code
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof BallotError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }
  console.error('Unexpected error:', error);
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * CSV export: one row per proposal
 */
export function toCsv(proposals: readonly Proposal[]): string {
  const rows = proposals.map(p => `${p.index},${csvField(p.name)},${p.voteCount}`);
  return ['index,name,voteCount', ...rows].join('\n') + '\n';
}

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function bodyField(req: Request, field: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || !(field in body)) {
    throw new BallotValidationError(`${field} is required`);
  }
  const value: unknown = Reflect.get(body, field);
  return value;
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new BallotValidationError(`${field} must be an array of strings`);
  }
  const strings: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      throw new BallotValidationError(`${field} must be an array of strings`);
    }
    strings.push(entry);
  }
  return strings;
}

function requireIdentity(value: unknown, field: string): Identity {
  if (typeof value !== 'string' || !Crypto.isValidPublicKey(value)) {
    throw new BallotValidationError(`${field} must be a hex-encoded Ed25519 public key`);
  }
  return value.toLowerCase();
}

function parseIndex(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new BallotValidationError('index must be a non-negative integer');
  }
  return parseInt(raw, 10);
}

function isMalformedBody(err: unknown): boolean {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}
