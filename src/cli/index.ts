#!/usr/bin/env node

/**
 * Liquid Ballot CLI
 * Local ballot administration, delegation, voting and results
 */

import * as readline from 'readline';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import {
  createLiquidBallot,
  loadConfig,
  voterState,
  Crypto,
  type KeyPair,
  type LiquidBallot,
} from '../ballot/index.js';

interface CliOptions {
  command: string | undefined;
  args: string[];
  keyFile: string;
  force: boolean;
}

function parseArgs(argv: string[], dataDir: string): CliOptions {
  const positional: string[] = [];
  let keyFile = join(dataDir, 'identity.json');
  let force = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--key') {
      const value = argv[i + 1];
      if (!value) throw new Error('--key needs a file path');
      keyFile = value;
      i++;
    } else if (arg === '--force') {
      force = true;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  return { command: positional[0], args: positional.slice(1), keyFile, force };
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const options = parseArgs(process.argv.slice(2), config.dataDir);

  switch (options.command) {
    case 'keygen':
      keygen(options);
      return;
    case 'whoami':
      console.log(loadIdentity(options.keyFile).publicKey);
      return;
    case 'help':
    case undefined:
      showHelp();
      return;
  }

  const ballot = createLiquidBallot(config);
  try {
    await runCommand(ballot, options);
  } finally {
    ballot.close();
  }
}

async function runCommand(ballot: LiquidBallot, options: CliOptions): Promise<void> {
  const [first] = options.args;

  switch (options.command) {
    case 'create':
      await createBallot(ballot, options);
      break;
    case 'grant':
      await grant(ballot, options, requireArg(first, 'voter'));
      break;
    case 'delegate':
      await delegate(ballot, options, requireArg(first, 'voter'));
      break;
    case 'vote':
      await vote(ballot, options, requireArg(first, 'proposal index'));
      break;
    case 'proposals':
      await showProposals(ballot);
      break;
    case 'winner':
      await showWinner(ballot);
      break;
    case 'status':
      await showStatus(ballot, options);
      break;
    case 'voter':
      await showVoter(ballot, options, requireArg(first, 'voter'));
      break;
    case 'results':
      await showResults(ballot);
      break;
    case 'verify':
      await verify(ballot);
      break;
    case 'gates':
      await showGates(ballot);
      break;
    case 'health':
      console.log(JSON.stringify(await ballot.healthCheck(), null, 2));
      break;
    default:
      console.error(`Unknown command: ${options.command ?? ''}\n`);
      showHelp();
      process.exitCode = 1;
  }
}

function showHelp(): void {
  console.log(`Usage: liquid-ballot <command> [options]

Identity:
  keygen [--force]        Create a signing identity in DATA_DIR/identity.json
  whoami                  Print your identity (public key)

Administration:
  create [names...]       Create the ballot (prompts for names if none given)
  grant <voter>           Give a voter the right to vote
  voter <voter>           Show a voter's record and delegation chain

Voting:
  delegate <voter>        Hand your weight to another voter
  vote <index>            Vote for a proposal
  status                  Show your own voting state

Results:
  proposals               List proposals and their counts
  winner                  Show the winning proposal
  results                 Full results summary
  verify                  Check that all granted weight is accounted for

  gates                   Show who may do what
  health                  Check store health
  help                    Show this help message

Options:
  --key <file>            Use the identity in <file>

Environment:
  DATA_DIR                Data directory (default ./data)
  MAX_PROPOSALS           Proposal limit (default 64)
  LABEL_OVERFLOW          reject | truncate (default reject)
`);
}

// ============= Identity =============

function keygen(options: CliOptions): void {
  if (existsSync(options.keyFile) && !options.force) {
    throw new Error(`${options.keyFile} already exists (use --force to replace it)`);
  }
  const keyPair = Crypto.generateKeyPair();
  mkdirSync(dirname(options.keyFile), { recursive: true });
  writeFileSync(options.keyFile, JSON.stringify(keyPair, null, 2) + '\n', { mode: 0o600 });
  console.log(`Identity written to ${options.keyFile}`);
  console.log(`Public key: ${keyPair.publicKey}`);
}

function loadIdentity(keyFile: string): KeyPair {
  if (!existsSync(keyFile)) {
    throw new Error(`No identity at ${keyFile}; run "liquid-ballot keygen" first`);
  }
  const parsed: unknown = JSON.parse(readFileSync(keyFile, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`${keyFile} is not an identity file`);
  }
  const publicKey: unknown = Reflect.get(parsed, 'publicKey');
  const privateKey: unknown = Reflect.get(parsed, 'privateKey');
  if (typeof publicKey !== 'string' || typeof privateKey !== 'string' || !Crypto.isValidPublicKey(publicKey)) {
    throw new Error(`${keyFile} is not an identity file`);
  }
  return { publicKey: publicKey.toLowerCase(), privateKey };
}

// ============= Administration =============

async function createBallot(ballot: LiquidBallot, options: CliOptions): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  let names = options.args;

  if (names.length === 0) {
    console.log('Enter proposals (one per line, empty line to finish):');
    names = [];
    while (true) {
      const name = await prompt(`  Proposal ${names.length}: `);
      if (!name.trim()) break;
      names.push(name.trim());
    }
  }

  const info = await ballot.construct(actor, names);

  console.log('\nBallot created successfully!');
  console.log('----------------------------');
  console.log(`ID: ${info.id}`);
  console.log(`Administrator: ${info.administrator}`);
  for (const proposal of await ballot.listProposals()) {
    console.log(`  [${proposal.index}] ${proposal.name}`);
  }
}

async function grant(ballot: LiquidBallot, options: CliOptions, voter: string): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  const record = await ballot.grantRights(actor, voter.toLowerCase());
  console.log(`Granted voting rights to ${record.voter} (weight ${record.weight})`);
}

async function showVoter(ballot: LiquidBallot, options: CliOptions, voter: string): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  const identity = voter.toLowerCase();
  const record = await ballot.getVoterInfo(actor, identity);
  const chain = await ballot.getDelegationChain(actor, identity);

  console.log(`Voter: ${record.voter}`);
  console.log(`State: ${voterState(record)}`);
  console.log(`Weight: ${record.weight}`);
  if (record.vote !== null) console.log(`Voted for: ${record.vote}`);
  if (record.delegate !== null) console.log(`Delegated to: ${record.delegate}`);
  if (chain.length > 1) console.log(`Chain: ${chain.join(' -> ')}`);
}

// ============= Voting =============

async function delegate(ballot: LiquidBallot, options: CliOptions, to: string): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  const receipt = await ballot.delegate(actor, to.toLowerCase());

  console.log(`Delegated weight ${receipt.weight} to ${receipt.delegate}`);
  if (receipt.terminal !== receipt.delegate) {
    console.log(`Weight lands with ${receipt.terminal}`);
  }
  if (receipt.appliedToProposal !== null) {
    console.log(`Counted for proposal ${receipt.appliedToProposal}`);
  }
}

async function vote(ballot: LiquidBallot, options: CliOptions, raw: string): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  if (!/^\d+$/.test(raw)) {
    throw new Error('Proposal index must be a non-negative integer');
  }
  const receipt = await ballot.vote(actor, parseInt(raw, 10));
  const name = await ballot.getProposalName(receipt.proposal);
  console.log(`Voted for [${receipt.proposal}] ${name} with weight ${receipt.weight}`);
}

async function showStatus(ballot: LiquidBallot, options: CliOptions): Promise<void> {
  const actor = loadIdentity(options.keyFile).publicKey;
  const info = await ballot.getInfo();
  if (!info) {
    console.log('No ballot has been created');
    return;
  }

  console.log(`Ballot: ${info.id}`);
  console.log(`Identity: ${actor}`);
  console.log(`Administrator: ${(await ballot.isAdministrator(actor)) ? 'yes' : 'no'}`);
  console.log(`Has voted: ${(await ballot.hasVoted(actor)) ? 'yes' : 'no'}`);
}

// ============= Results =============

async function showProposals(ballot: LiquidBallot): Promise<void> {
  for (const proposal of await ballot.listProposals()) {
    console.log(`[${proposal.index}] ${proposal.name}: ${proposal.voteCount}`);
  }
}

async function showWinner(ballot: LiquidBallot): Promise<void> {
  const index = await ballot.winningProposal();
  const name = await ballot.winnerName();
  console.log(`Winner: [${index}] ${name} (${await ballot.getProposalVote(index)} votes)`);
}

async function showResults(ballot: LiquidBallot): Promise<void> {
  const results = await ballot.getResults();

  console.log(`Ballot: ${results.ballotId}`);
  console.log('----------------------------');
  for (const proposal of results.proposals) {
    const marker = proposal.index === results.winningProposal ? ' *' : '';
    console.log(`  [${proposal.index}] ${proposal.name}: ${proposal.voteCount}${marker}`);
  }
  console.log('----------------------------');
  console.log(`Total votes: ${results.totalVotes}`);
  console.log(`Voters: ${results.votedCount}/${results.voters} voted`);
  console.log(`Winner: ${results.winnerName}`);
}

async function verify(ballot: LiquidBallot): Promise<void> {
  const report = await ballot.verifyConservation();
  console.log(`Granted: ${report.granted}`);
  console.log(`Cast: ${report.cast}`);
  console.log(`Resting: ${report.resting}`);
  console.log(report.balanced ? 'Weight is conserved' : 'WEIGHT MISMATCH');
  if (!report.balanced) process.exitCode = 1;
}

async function showGates(ballot: LiquidBallot): Promise<void> {
  const gates = await ballot.getGateInfo();
  for (const gate of [gates.administrator, gates.voter]) {
    console.log(`${gate.type}: ${gate.description}`);
    for (const requirement of gate.requirements) {
      console.log(`  - ${requirement}`);
    }
  }
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing argument: <${name}>`);
  }
  return value;
}

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
