/**
 * Tests for signing identities and digests
 */

import { describe, it, expect } from '@jest/globals';
import { Crypto } from '../src/ballot/crypto.js';

describe('Crypto', () => {
  describe('Key pairs and signatures', () => {
    it('should generate 32-byte hex keys', () => {
      const keyPair = Crypto.generateKeyPair();

      expect(keyPair.publicKey).toMatch(/^[0-9a-f]{64}$/);
      expect(keyPair.privateKey).toMatch(/^[0-9a-f]{64}$/);
      expect(Crypto.isValidPublicKey(keyPair.publicKey)).toBe(true);
    });

    it('should verify its own signatures', () => {
      const keyPair = Crypto.generateKeyPair();
      const signature = Crypto.sign('POST /api/vote\n{"proposal":1}', keyPair.privateKey);

      expect(signature).toMatch(/^[0-9a-f]{128}$/);
      expect(Crypto.verify('POST /api/vote\n{"proposal":1}', signature, keyPair.publicKey)).toBe(true);
    });

    it('should reject a changed message', () => {
      const keyPair = Crypto.generateKeyPair();
      const signature = Crypto.sign('POST /api/vote\n{"proposal":1}', keyPair.privateKey);

      expect(Crypto.verify('POST /api/vote\n{"proposal":2}', signature, keyPair.publicKey)).toBe(false);
    });

    it('should reject a signature from another key', () => {
      const signer = Crypto.generateKeyPair();
      const other = Crypto.generateKeyPair();
      const signature = Crypto.sign('hello', signer.privateKey);

      expect(Crypto.verify('hello', signature, other.publicKey)).toBe(false);
    });

    it('should return false for malformed input', () => {
      const keyPair = Crypto.generateKeyPair();

      expect(Crypto.verify('hello', 'not-hex', keyPair.publicKey)).toBe(false);
      expect(Crypto.verify('hello', 'ab'.repeat(64), 'zz')).toBe(false);
    });

    it('should validate public key shape', () => {
      expect(Crypto.isValidPublicKey('ab'.repeat(32))).toBe(true);
      expect(Crypto.isValidPublicKey('AB'.repeat(32))).toBe(true);
      expect(Crypto.isValidPublicKey('ab'.repeat(31))).toBe(false);
      expect(Crypto.isValidPublicKey('zz'.repeat(32))).toBe(false);
    });
  });

  describe('Hashing', () => {
    it('should hash with SHA-256', () => {
      expect(Crypto.hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should hash concatenated inputs', () => {
      expect(Crypto.hash('a', 'bc')).toBe(Crypto.hash('abc'));
    });

    it('should sort keys at every depth in canonical JSON', () => {
      expect(Crypto.canonicalJson({ b: 1, a: { d: 2, c: [{ z: 1, y: 2 }] } }))
        .toBe('{"a":{"c":[{"y":2,"z":1}],"d":2},"b":1}');
    });

    it('should give equal digests for reordered objects', () => {
      expect(Crypto.hashObject({ b: 1, a: 2 })).toBe(Crypto.hashObject({ a: 2, b: 1 }));
      expect(Crypto.hashObject({ a: 1 })).not.toBe(Crypto.hashObject({ a: 2 }));
    });
  });
});
