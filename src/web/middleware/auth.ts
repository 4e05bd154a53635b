/**
 * Request signing
 *
 * A caller proves its identity by signing
 *   "<METHOD> <originalUrl>\n<JSON body, or {} when there is none>"
 * with its Ed25519 key, sent as X-Signature next to X-Public-Key.
 */

import type { Request } from 'express';
import { Crypto } from '../../ballot/crypto.js';
import { BallotError, ErrorCodes, type Identity } from '../../ballot/types.js';

/**
 * The exact string a client signs for a request
 */
export function signatureMessage(method: string, url: string, body: unknown): string {
  return `${method.toUpperCase()} ${url}\n${JSON.stringify(body ?? {})}`;
}

/**
 * Headers for a signed request; used by clients and tests
 */
export function signRequest(
  method: string,
  url: string,
  body: unknown,
  keyPair: { publicKey: string; privateKey: string }
): { 'X-Public-Key': string; 'X-Signature': string } {
  return {
    'X-Public-Key': keyPair.publicKey,
    'X-Signature': Crypto.sign(signatureMessage(method, url, body), keyPair.privateKey),
  };
}

/**
 * Verified caller identity of a request
 */
export function requireActor(req: Request): Identity {
  const publicKey = req.get('x-public-key');
  const signature = req.get('x-signature');

  if (!publicKey || !signature) {
    throw new BallotError(
      'X-Public-Key and X-Signature headers are required',
      ErrorCodes.MISSING_SIGNATURE,
      401
    );
  }

  const body: unknown = req.body;
  const valid = Crypto.isValidPublicKey(publicKey)
    && Crypto.verify(signatureMessage(req.method, req.originalUrl, body), signature, publicKey);

  if (!valid) {
    throw new BallotError('Invalid signature', ErrorCodes.INVALID_SIGNATURE, 401);
  }

  return publicKey.toLowerCase();
}
