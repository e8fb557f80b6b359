import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CODE_CHALLENGE_METHOD, deriveChallenge, generatePkce, generateState } from '../src/auth/pkce.js';

const BASE64URL_43 = /^[A-Za-z0-9_-]{43}$/;

describe('PKCE', () => {
  it('should generate a 43 character base64url verifier and challenge', () => {
    const pkce = generatePkce();

    expect(pkce.verifier).toMatch(BASE64URL_43);
    expect(pkce.challenge).toMatch(BASE64URL_43);
    expect(pkce.method).toBe('S256');
    expect(CODE_CHALLENGE_METHOD).toBe('S256');
  });

  it('should derive the challenge from the verifier', () => {
    const pkce = generatePkce();
    expect(deriveChallenge(pkce.verifier)).toBe(pkce.challenge);
  });

  it('should match the RFC 7636 appendix B example', () => {
    expect(deriveChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk'))
      .toBe('E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM');
  });

  it('should not repeat verifiers', () => {
    const verifiers = new Set(Array.from({ length: 50 }, () => generatePkce().verifier));
    expect(verifiers.size).toBe(50);
  });

  it('should generate 32 character hex state values', () => {
    const state = generateState();
    expect(state).toMatch(/^[0-9a-f]{32}$/);
    expect(generateState()).not.toBe(state);
  });

  describe('property-based tests', () => {
    it('challenge is always 43 base64url characters', () => {
      fc.assert(
        fc.property(fc.string({ minLength: 43, maxLength: 128 }), (verifier) => {
          expect(deriveChallenge(verifier)).toMatch(BASE64URL_43);
        }),
        { numRuns: 50 }
      );
    });
  });
});
