/**
 * Cryptographic helpers: request signing identities and result digests
 */

import { sha256 } from '@noble/hashes/sha256';
import { randomBytes, bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import { ed25519 } from '@noble/curves/ed25519';
import type { KeyPair, PublicKey, PrivateKey, Signature, Hash } from './types.js';

export class Crypto {
  /**
   * SHA-256 over the concatenation of all inputs
   */
  static hash(...inputs: (Uint8Array | string)[]): Hash {
    const parts = inputs.map(input => typeof input === 'string' ? utf8ToBytes(input) : input);
    const combined = new Uint8Array(parts.reduce((acc, bytes) => acc + bytes.length, 0));

    let offset = 0;
    for (const bytes of parts) {
      combined.set(bytes, offset);
      offset += bytes.length;
    }

    return bytesToHex(sha256(combined));
  }

  /**
   * Generate a new Ed25519 keypair
   */
  static generateKeyPair(): KeyPair {
    const privateKey = randomBytes(32);
    const publicKey = ed25519.getPublicKey(privateKey);
    return {
      privateKey: bytesToHex(privateKey),
      publicKey: bytesToHex(publicKey),
    };
  }

  static sign(message: string | Uint8Array, privateKey: PrivateKey): Signature {
    const messageBytes = typeof message === 'string' ? utf8ToBytes(message) : message;
    return bytesToHex(ed25519.sign(messageBytes, hexToBytes(privateKey)));
  }

  static verify(message: string | Uint8Array, signature: Signature, publicKey: PublicKey): boolean {
    try {
      const messageBytes = typeof message === 'string' ? utf8ToBytes(message) : message;
      return ed25519.verify(hexToBytes(signature), messageBytes, hexToBytes(publicKey));
    } catch {
      // malformed hex or point encoding
      return false;
    }
  }

  static isValidPublicKey(key: string): boolean {
    if (key.length !== 64) return false;  // 32 bytes = 64 hex chars
    return /^[0-9a-f]+$/i.test(key);
  }

  /**
   * Deterministic JSON: object keys sorted at every depth
   */
  static canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
  }

  static hashObject(value: unknown): Hash {
    return this.hash(this.canonicalJson(value));
  }
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}
