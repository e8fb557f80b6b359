export type OAuthErrorType =
  | 'transport'
  | 'protocol'
  | 'invalid_state'
  | 'missing_field'
  | 'token_expired'
  | 'no_refresh_token'
  | 'token_not_found'
  | 'storage'
  | 'timeout'
  | 'authorization_denied'
  | 'device_code_expired'
  | 'config';

export interface OAuthErrorDetails {
  /** Server-reported `error` value */
  code?: string;
  /** Server-reported `error_description` value */
  description?: string;
  /** Name of the missing field for `missing_field` errors */
  field?: string;
  statusCode?: number;
  cause?: unknown;
}

export class OAuthError extends Error {
  readonly type: OAuthErrorType;
  readonly code?: string;
  readonly description?: string;
  readonly field?: string;
  readonly statusCode?: number;

  constructor(type: OAuthErrorType, message: string, details: OAuthErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'OAuthError';
    this.type = type;
    this.code = details.code;
    this.description = details.description;
    this.field = details.field;
    this.statusCode = details.statusCode;
  }

  static protocol(code: string, description?: string, statusCode?: number): OAuthError {
    const message = description ? `OAuth error: ${code} - ${description}` : `OAuth error: ${code}`;
    return new OAuthError('protocol', message, { code, description, statusCode });
  }

  static missingField(field: string): OAuthError {
    return new OAuthError('missing_field', `Missing required field: ${field}`, { field });
  }

  static storage(message: string, cause?: unknown): OAuthError {
    return new OAuthError('storage', `Storage error: ${message}`, { cause });
  }

  static invalidState(): OAuthError {
    return new OAuthError('invalid_state', 'Invalid state parameter (possible CSRF attack)');
  }

  static noRefreshToken(key: string): OAuthError {
    return new OAuthError('no_refresh_token', `No refresh token available for ${key}`);
  }

  static tokenExpired(key: string): OAuthError {
    return new OAuthError('token_expired', `Token for ${key} was issued already expired`);
  }

  static tokenNotFound(key: string): OAuthError {
    return new OAuthError('token_not_found', `No token found for ${key}`);
  }
}

export function isOAuthError(error: unknown, type?: OAuthErrorType): error is OAuthError {
  return error instanceof OAuthError && (type === undefined || error.type === type);
}

/**
 * Extract a human-readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
