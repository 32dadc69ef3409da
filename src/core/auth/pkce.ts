// src/core/auth/pkce.ts

import { randomBytes } from 'crypto';
import { generators } from 'openid-client';
import type { PKCEPair } from './types';
import { AuthError } from '../../utils/errors';

/**
 * 32 random bytes, base64url without padding (43 characters, RFC 7636 §4.1)
 */
export function generateVerifier(): string {
  return generators.codeVerifier(32);
}

/**
 * S256 challenge: base64url(SHA-256(verifier)), no padding
 */
export function deriveChallenge(verifier: string): string {
  if (!verifier) {
    throw new AuthError('PKCE verifier must not be empty');
  }
  return generators.codeChallenge(verifier);
}

/**
 * CSRF nonce for the `state` parameter: 16 random bytes, hex-encoded
 */
export function generateState(): string {
  return randomBytes(16).toString('hex');
}

export function generatePKCE(): PKCEPair {
  const verifier = generateVerifier();
  return {
    verifier,
    challenge: deriveChallenge(verifier),
    method: 'S256',
  };
}
