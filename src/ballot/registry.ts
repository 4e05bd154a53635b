/**
 * Proposal registry
 * Ordered, fixed at construction; vote counts are the only mutable field
 */

import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import type { BallotStore, LabelOverflowPolicy, Proposal } from './types.js';
import { BallotError, BallotValidationError, ErrorCodes } from './types.js';
import type { LedgerBatch } from './ledger.js';

export const LABEL_BYTES = 32;

export interface RegistryBuildOptions {
  maxProposals: number;
  labelOverflow: LabelOverflowPolicy;
}

export class ProposalRegistry {
  constructor(private store: BallotStore) {}

  /**
   * Validate and encode proposal names, preserving input order as index
   */
  static build(names: readonly string[], options: RegistryBuildOptions): Proposal[] {
    if (names.length === 0) {
      throw new BallotValidationError('At least one proposal is required');
    }

    if (names.length > options.maxProposals) {
      throw new BallotValidationError(`Maximum ${options.maxProposals} proposals allowed`);
    }

    return names.map((raw, index) => {
      const trimmed = raw.trim();
      if (trimmed.length === 0) {
        throw new BallotValidationError(`Proposal ${index} cannot be empty`);
      }
      const label = encodeLabel(trimmed, options.labelOverflow);
      return {
        index,
        name: options.labelOverflow === 'truncate' ? decodeLabel(label) : trimmed,
        label,
        voteCount: 0,
      };
    });
  }

  async count(): Promise<number> {
    const proposals = await this.store.getProposals();
    return proposals.length;
  }

  async has(index: number): Promise<boolean> {
    if (!Number.isInteger(index) || index < 0) return false;
    return (await this.store.getProposal(index)) !== null;
  }

  async get(index: number): Promise<Proposal> {
    const proposal = Number.isInteger(index) && index >= 0
      ? await this.store.getProposal(index)
      : null;
    if (!proposal) {
      throw new RegistryError(`Proposal index ${index} is out of range`);
    }
    return proposal;
  }

  async list(): Promise<Proposal[]> {
    return this.store.getProposals();
  }

  /**
   * Queue `voteCount += weight` for a proposal the caller has already validated
   */
  recordVote(batch: LedgerBatch, index: number, weight: number): void {
    batch.addTally(index, weight);
  }

  /**
   * Index of the strictly greatest vote count; ties go to the lowest index,
   * and an all-zero tally yields 0.
   */
  async winner(): Promise<number> {
    return winningIndex(await this.store.getProposals());
  }
}

export function winningIndex(proposals: readonly Proposal[]): number {
  let winningVoteCount = 0;
  let winner = 0;
  for (const proposal of proposals) {
    if (proposal.voteCount > winningVoteCount) {
      winningVoteCount = proposal.voteCount;
      winner = proposal.index;
    }
  }
  return winner;
}

/**
 * Encode a name into a 32-byte, zero-padded label (hex)
 */
export function encodeLabel(name: string, policy: LabelOverflowPolicy = 'reject'): string {
  let bytes = utf8ToBytes(name);

  if (bytes.length > LABEL_BYTES) {
    if (policy === 'reject') {
      throw new BallotValidationError(
        `Proposal name "${name}" is ${bytes.length} bytes; labels hold at most ${LABEL_BYTES}`
      );
    }
    bytes = truncateUtf8(name, LABEL_BYTES);
  }

  const label = new Uint8Array(LABEL_BYTES);
  label.set(bytes);
  return bytesToHex(label);
}

/**
 * Decode a label back into text, dropping the zero padding
 */
export function decodeLabel(label: string): string {
  const bytes = hexToBytes(label);
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  return new TextDecoder().decode(bytes.subarray(0, end));
}

// Cut at the last whole code point that fits
function truncateUtf8(text: string, maxBytes: number): Uint8Array {
  let kept = '';
  let size = 0;
  for (const char of text) {
    const charSize = utf8ToBytes(char).length;
    if (size + charSize > maxBytes) break;
    kept += char;
    size += charSize;
  }
  return utf8ToBytes(kept);
}

export class RegistryError extends BallotError {
  constructor(message: string) {
    super(message, ErrorCodes.INDEX_OUT_OF_RANGE, 400);
    this.name = 'RegistryError';
  }
}
