import { createHash, randomBytes } from 'crypto';
import type { PkceChallenge } from '../types/index.js';

export const CODE_CHALLENGE_METHOD = 'S256';

const VERIFIER_BYTES = 32;

/**
 * SHA-256 the verifier and encode the digest as unpadded base64url (RFC 7636 section 4.2)
 */
export function deriveChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/**
 * Generate a fresh verifier/challenge pair.
 * Both strings are 43 characters long.
 */
export function generatePkce(): PkceChallenge {
  const verifier = randomBytes(VERIFIER_BYTES).toString('base64url');
  return {
    verifier,
    challenge: deriveChallenge(verifier),
    method: CODE_CHALLENGE_METHOD,
  };
}

/**
 * Random hex state parameter for CSRF protection
 */
export function generateState(): string {
  return randomBytes(16).toString('hex');
}
