/**
 * Token, Session and CredentialStore type definitions
 */

/**
 * PKCE verifier/challenge pair for a single authorization attempt
 */
export interface PkceChallenge {
  verifier: string;
  challenge: string;
  method: 'S256';
}

/**
 * Pending authorization attempt, keyed by its state parameter
 */
export interface Session {
  state: string;
  code_verifier: string;
  created_at: number; // Unix timestamp in seconds
  domain?: string;
}

/**
 * OAuth bearer credential as issued by the token endpoint
 */
export interface Token {
  access_token: string;
  refresh_token?: string;
  token_type: string;
  expires_in?: number;
  expires_at?: number; // Unix timestamp in seconds
  scope?: string;
}

/**
 * Response from the device authorization endpoint (RFC 8628 section 3.2)
 */
export interface DeviceAuthorization {
  device_code: string;
  user_code: string;
  verification_uri: string;
  verification_uri_complete?: string;
  expires_in: number;
  interval: number;
}

/**
 * Result of starting a code flow without a local listener
 */
export interface AuthFlowStart {
  url: string;
  state: string;
}

/**
 * Authorization code and state captured from the redirect
 */
export interface CallbackResult {
  code: string;
  state: string;
}

/**
 * Storage capability for sessions and tokens.
 * Implementations must be safe for concurrent use.
 */
export interface CredentialStore {
  saveSession(state: string, session: Session): Promise<void>;

  getSession(state: string): Promise<Session | null>;

  deleteSession(state: string): Promise<void>;

  saveToken(key: string, token: Token): Promise<void>;

  getToken(key: string): Promise<Token | null>;

  deleteToken(key: string): Promise<void>;
}
