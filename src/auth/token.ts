import type { Token } from '../types/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { isRecord } from '../utils/guards.js';

/**
 * Current time as Unix seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * A token without expires_at never expires
 */
export function isTokenExpired(token: Token, now: number = nowSeconds()): boolean {
  if (token.expires_at === undefined) {
    return false;
  }
  return now >= token.expires_at;
}

/**
 * Fraction of the token lifetime already used, or null when the token
 * carries no expiry information
 */
export function lifetimeElapsed(token: Token, now: number = nowSeconds()): number | null {
  if (token.expires_at === undefined || token.expires_in === undefined || token.expires_in <= 0) {
    return null;
  }
  const remaining = Math.max(0, token.expires_at - now);
  return (token.expires_in - remaining) / token.expires_in;
}

export function clampThreshold(threshold: number): number {
  if (Number.isNaN(threshold)) return 1;
  return Math.min(1, Math.max(0, threshold));
}

/**
 * Decide whether a token should be refreshed ahead of its hard expiry
 */
export function shouldRefresh(token: Token, threshold: number, now: number = nowSeconds()): boolean {
  if (isTokenExpired(token, now)) {
    return true;
  }
  const elapsed = lifetimeElapsed(token, now);
  if (elapsed === null) {
    return false;
  }
  return elapsed >= clampThreshold(threshold);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalSeconds(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return Math.floor(value);
  // Some servers send numeric fields as strings
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

/**
 * Convert a token endpoint response body into a Token,
 * stamping expires_at from expires_in
 */
export function tokenFromResponse(body: unknown, now: number = nowSeconds()): Token {
  if (!isRecord(body)) {
    throw new OAuthError('protocol', 'Token response is not a JSON object');
  }

  const accessToken = optionalString(body, 'access_token');
  if (!accessToken) {
    throw OAuthError.missingField('access_token');
  }

  const expiresIn = optionalSeconds(body, 'expires_in');
  const token: Token = {
    access_token: accessToken,
    token_type: optionalString(body, 'token_type') ?? 'Bearer',
  };

  const refreshToken = optionalString(body, 'refresh_token');
  if (refreshToken) token.refresh_token = refreshToken;
  if (expiresIn !== undefined) {
    token.expires_in = expiresIn;
    token.expires_at = now + expiresIn;
  }
  const scope = optionalString(body, 'scope');
  if (scope) token.scope = scope;

  return token;
}

/**
 * Parse a stored token, dropping anything that does not match the Token shape
 */
export function parseStoredToken(value: unknown): Token | null {
  if (!isRecord(value)) return null;
  const accessToken = optionalString(value, 'access_token');
  const tokenType = optionalString(value, 'token_type');
  if (!accessToken || !tokenType) return null;

  const token: Token = { access_token: accessToken, token_type: tokenType };
  const refreshToken = optionalString(value, 'refresh_token');
  if (refreshToken) token.refresh_token = refreshToken;
  const expiresIn = optionalSeconds(value, 'expires_in');
  if (expiresIn !== undefined) token.expires_in = expiresIn;
  const expiresAt = optionalSeconds(value, 'expires_at');
  if (expiresAt !== undefined) token.expires_at = expiresAt;
  const scope = optionalString(value, 'scope');
  if (scope) token.scope = scope;
  return token;
}
