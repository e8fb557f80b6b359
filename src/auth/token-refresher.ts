import type { Token } from '../types/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { OAuthClient } from './oauth-client.js';
import { RefreshLockManager } from './lock-manager.js';
import { clampThreshold, isTokenExpired, nowSeconds, shouldRefresh } from './token.js';
import logger from '../config/logger.js';

export interface TokenRefresherOptions {
  /** Enables cross-process check-then-refresh */
  lockManager?: RefreshLockManager;
  /** Clock in Unix seconds */
  now?: () => number;
}

/**
 * Decides, after the latest stored token has been read, whether a network refresh is still needed
 */
type RefreshCheck = (current: Token) => boolean;

/**
 * Coordinates token refreshes so that concurrent callers for one key share a
 * single refresh_token grant. With a lock manager the guarantee extends to
 * other processes sharing the same lock directory and token store: whoever
 * gets the lock first refreshes, everyone after it finds the new token.
 */
export class TokenRefresher {
  private client: OAuthClient;
  private lockManager: RefreshLockManager | null;
  private now: () => number;
  private inflight: Map<string, Promise<Token>> = new Map();

  constructor(client: OAuthClient, options: TokenRefresherOptions = {}) {
    this.client = client;
    this.lockManager = options.lockManager ?? null;
    this.now = options.now ?? nowSeconds;
  }

  static withFileLocking(client: OAuthClient, appName: string): TokenRefresher {
    return new TokenRefresher(client, { lockManager: RefreshLockManager.forApp(appName) });
  }

  static withLockManager(client: OAuthClient, lockManager: RefreshLockManager): TokenRefresher {
    return new TokenRefresher(client, { lockManager });
  }

  get usesFileLocking(): boolean {
    return this.lockManager !== null;
  }

  private async requireToken(key: string): Promise<Token> {
    const token = await this.client.getToken(key);
    if (!token) {
      throw OAuthError.tokenNotFound(key);
    }
    return token;
  }

  /**
   * Force a refresh. Under file locking the token read after taking the lock
   * is returned as is while it has not expired, since another process may
   * have just refreshed it.
   */
  async refreshTokenForKey(key: string): Promise<Token> {
    if (this.lockManager) {
      return this.coalesce(key, current => isTokenExpired(current, this.now()));
    }
    const observed = await this.requireToken(key);
    return this.coalesce(key, current => current.access_token === observed.access_token);
  }

  /**
   * Return the stored token, refreshing it first if it has expired
   */
  async getValidToken(key: string): Promise<Token> {
    const token = await this.requireToken(key);
    if (!isTokenExpired(token, this.now())) {
      return token;
    }
    logger.debug({ key }, 'Token expired, refreshing');
    return this.coalesce(key, current => isTokenExpired(current, this.now()));
  }

  /**
   * Like getValidToken, but refreshes once `threshold` of the token's
   * lifetime has passed. The threshold is clamped to [0, 1].
   */
  async getValidTokenWithThreshold(key: string, threshold: number): Promise<Token> {
    const limit = clampThreshold(threshold);
    const token = await this.requireToken(key);
    if (!shouldRefresh(token, limit, this.now())) {
      return token;
    }
    logger.debug({ key, threshold: limit }, 'Token past refresh threshold, refreshing');
    return this.coalesce(key, current => shouldRefresh(current, limit, this.now()));
  }

  /**
   * Resolve once no refresh for key is running in this process.
   * The outcome of that refresh belongs to its callers and is not reported here.
   */
  async waitForRefresh(key: string): Promise<void> {
    let flight = this.inflight.get(key);
    while (flight) {
      await Promise.allSettled([flight]);
      flight = this.inflight.get(key);
    }
  }

  isRefreshing(key: string): boolean {
    return this.inflight.has(key);
  }

  /**
   * Join the refresh already running for key, or start one
   */
  private coalesce(key: string, needsRefresh: RefreshCheck): Promise<Token> {
    const existing = this.inflight.get(key);
    if (existing) {
      logger.debug({ key }, 'Waiting for in-flight refresh');
      return existing;
    }

    const flight = this.runRefresh(key, needsRefresh).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, flight);
    return flight;
  }

  private async runRefresh(key: string, needsRefresh: RefreshCheck): Promise<Token> {
    if (!this.lockManager) {
      return this.refreshIfNeeded(key, needsRefresh);
    }
    return this.lockManager.withLock(key, () => this.refreshIfNeeded(key, needsRefresh));
  }

  private async refreshIfNeeded(key: string, needsRefresh: RefreshCheck): Promise<Token> {
    // Re-read: another process may have refreshed while we waited for the lock
    const current = await this.requireToken(key);
    if (!needsRefresh(current)) {
      logger.info({ key }, 'Token was already refreshed elsewhere');
      return current;
    }

    if (!current.refresh_token) {
      throw OAuthError.noRefreshToken(key);
    }

    const issued = await this.client.refreshToken(current.refresh_token);
    if (isTokenExpired(issued, this.now())) {
      throw OAuthError.tokenExpired(key);
    }
    const token: Token = {
      ...issued,
      refresh_token: issued.refresh_token ?? current.refresh_token,
    };

    await this.client.saveToken(key, token);
    logger.info({ key }, 'Token refreshed successfully');
    return token;
  }
}
