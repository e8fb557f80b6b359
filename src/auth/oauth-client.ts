import type {
  AuthFlowStart,
  CredentialStore,
  OAuthConfig,
  Session,
  Token,
} from '../types/index.js';
import type { FormTransport } from '../http/form-client.js';
import { AxiosFormTransport, errorFromResponse, isSuccessStatus, readErrorBody } from '../http/form-client.js';
import { OAuthError, errorMessage, isOAuthError } from '../errors/oauth-error.js';
import { CODE_CHALLENGE_METHOD, generatePkce, generateState } from './pkce.js';
import { CallbackServer } from './callback-server.js';
import { DevicePoller, DevicePrompt } from './device-poller.js';
import { nowSeconds, tokenFromResponse } from './token.js';
import logger from '../config/logger.js';

export const DEFAULT_CALLBACK_TIMEOUT_MS = 30000;

/**
 * Shows the authorization URL to the user (print it, open a browser, ...)
 */
export type UrlPresenter = (url: string) => void;

export interface OAuthClientOptions {
  transport?: FormTransport;
  presenter?: UrlPresenter;
  callbackTimeoutMs?: number;
  /** Namespace hint recorded on sessions */
  domain?: string;
  /** Forwarded to the device poller */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface AuthorizeOptions {
  callbackTimeoutMs?: number;
  presenter?: UrlPresenter;
  /** Loopback host for the redirect listener */
  host?: string;
  /** Fixed listener port; 0 (default) picks a free one */
  port?: number;
}

/**
 * Percent-encode per RFC 3986 unreserved rules, with space as '+'
 */
export function encodeQueryValue(value: string): string {
  let encoded = '';
  for (const byte of Buffer.from(value, 'utf8')) {
    const ch = String.fromCharCode(byte);
    if (/[A-Za-z0-9\-_.~]/.test(ch)) {
      encoded += ch;
    } else if (ch === ' ') {
      encoded += '+';
    } else {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return encoded;
}

function defaultPresenter(url: string): void {
  logger.info({ url }, 'Authorization required');
  process.stderr.write(`\nOpen this URL in your browser to authorize:\n${url}\n\n`);
}

/**
 * Runs the Authorization Code (PKCE) and Device Authorization flows
 * against one provider and exposes the token store
 */
export class OAuthClient {
  private config: OAuthConfig;
  private store: CredentialStore;
  private transport: FormTransport;
  private options: OAuthClientOptions;

  constructor(config: OAuthConfig, store: CredentialStore, options: OAuthClientOptions = {}) {
    this.config = config;
    this.store = store;
    this.transport = options.transport ?? new AxiosFormTransport();
    this.options = options;
  }

  get oauthConfig(): OAuthConfig {
    return this.config;
  }

  private async storage<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isOAuthError(error, 'storage')) throw error;
      throw OAuthError.storage(`${operation} failed: ${errorMessage(error)}`, error);
    }
  }

  private async createSession(): Promise<{ state: string; challenge: string }> {
    const pkce = generatePkce();
    const state = generateState();
    const session: Session = {
      state,
      code_verifier: pkce.verifier,
      created_at: nowSeconds(),
    };
    if (this.options.domain) session.domain = this.options.domain;

    await this.storage('save_session', () => this.store.saveSession(state, session));
    return { state, challenge: pkce.challenge };
  }

  buildAuthorizationUrl(state: string, codeChallenge: string, redirectUri: string = this.config.redirectUri): string {
    if (!this.config.authorizationEndpoint) {
      throw new OAuthError('config', 'authorization_endpoint not configured');
    }

    const params: Array<[string, string]> = [
      ['client_id', this.config.clientId],
      ['redirect_uri', redirectUri],
      ['response_type', 'code'],
      ['state', state],
      ['code_challenge', codeChallenge],
      ['code_challenge_method', CODE_CHALLENGE_METHOD],
    ];
    if (this.config.scope) {
      params.push(['scope', this.config.scope]);
    }

    const query = params.map(([key, value]) => `${key}=${encodeQueryValue(value)}`).join('&');
    const separator = this.config.authorizationEndpoint.includes('?') ? '&' : '?';
    return `${this.config.authorizationEndpoint}${separator}${query}`;
  }

  /**
   * Start a code flow for callers that receive the redirect themselves.
   * The configured redirect_uri is used.
   */
  async startAuthFlow(): Promise<AuthFlowStart> {
    const { state, challenge } = await this.createSession();
    return { url: this.buildAuthorizationUrl(state, challenge), state };
  }

  /**
   * Complete Authorization Code flow with PKCE through a local redirect listener
   */
  async authorize(options: AuthorizeOptions = {}): Promise<Token> {
    const server = new CallbackServer({ host: options.host, port: options.port });
    await server.start();

    try {
      const redirectUri = server.redirectUri;
      const { state, challenge } = await this.createSession();
      const url = this.buildAuthorizationUrl(state, challenge, redirectUri);

      const present = options.presenter ?? this.options.presenter ?? defaultPresenter;
      present(url);

      logger.info({ redirectUri }, 'Waiting for authorization callback');
      const timeoutMs = options.callbackTimeoutMs ?? this.options.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
      const callback = await server.waitForCallback(timeoutMs);

      return await this.exchangeCode(callback.code, callback.state, redirectUri);
    } finally {
      await server.close();
    }
  }

  /**
   * Exchange an authorization code for a token. The session stored under
   * `state` must exist and is deleted once the exchange succeeds.
   */
  async exchangeCode(code: string, state: string, redirectUri: string = this.config.redirectUri): Promise<Token> {
    const session = await this.storage('get_session', () => this.store.getSession(state));
    if (!session) {
      logger.warn('Authorization callback carried an unknown state');
      throw OAuthError.invalidState();
    }

    const response = await this.transport.postForm(this.config.tokenEndpoint, {
      client_id: this.config.clientId,
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
      code_verifier: session.code_verifier,
    });

    if (!isSuccessStatus(response.status) || readErrorBody(response.data)) {
      const error = errorFromResponse(response);
      logger.error({ error: error.message }, 'Authorization code exchange failed');
      throw error;
    }

    const token = tokenFromResponse(response.data);
    await this.storage('delete_session', () => this.store.deleteSession(state));
    logger.info('Authorization code exchanged for token');
    return token;
  }

  /**
   * Device Authorization flow. Nothing is persisted; save the token explicitly.
   */
  async authorizeDevice(onPrompt?: DevicePrompt): Promise<Token> {
    if (!this.config.deviceAuthorizationEndpoint) {
      throw new OAuthError('config', 'device_authorization_endpoint not configured');
    }

    const poller = new DevicePoller({
      clientId: this.config.clientId,
      deviceAuthorizationEndpoint: this.config.deviceAuthorizationEndpoint,
      tokenEndpoint: this.config.tokenEndpoint,
      scope: this.config.scope,
      transport: this.transport,
      now: this.options.now,
      sleep: this.options.sleep,
    });
    return poller.authorize(onPrompt);
  }

  /**
   * Perform a refresh_token grant. The result is not persisted.
   */
  async refreshToken(refreshToken: string): Promise<Token> {
    logger.info('Refreshing token');

    const response = await this.transport.postForm(this.config.tokenEndpoint, {
      client_id: this.config.clientId,
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });

    if (!isSuccessStatus(response.status) || readErrorBody(response.data)) {
      const error = errorFromResponse(response);
      logger.error({ error: error.message }, 'Failed to refresh token');
      throw error;
    }

    return tokenFromResponse(response.data);
  }

  async getToken(key: string): Promise<Token | null> {
    return this.storage('get_token', () => this.store.getToken(key));
  }

  async saveToken(key: string, token: Token): Promise<void> {
    await this.storage('save_token', () => this.store.saveToken(key, token));
  }

  async deleteToken(key: string): Promise<void> {
    await this.storage('delete_token', () => this.store.deleteToken(key));
  }
}
