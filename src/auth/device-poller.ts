import type { DeviceAuthorization, Token } from '../types/index.js';
import type { FormResponse, FormTransport } from '../http/form-client.js';
import { errorFromResponse, isSuccessStatus, readErrorBody } from '../http/form-client.js';
import { OAuthError } from '../errors/oauth-error.js';
import { tokenFromResponse } from './token.js';
import { isRecord } from '../utils/guards.js';
import logger from '../config/logger.js';

export const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;
export const SLOW_DOWN_INCREMENT_SECONDS = 5;

/**
 * RFC 8628 client states. SUCCESS, DENIED, EXPIRED and FATAL are terminal.
 */
export type DevicePollState = 'REQUESTING' | 'PENDING' | 'SUCCESS' | 'DENIED' | 'EXPIRED' | 'FATAL';

export type DevicePrompt = (authorization: DeviceAuthorization) => void;

export interface DevicePollerOptions {
  clientId: string;
  deviceAuthorizationEndpoint: string;
  tokenEndpoint: string;
  scope?: string;
  transport: FormTransport;
  /** Wall clock in milliseconds */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw OAuthError.missingField(field);
  }
  return value;
}

function positiveInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return Math.ceil(value);
  if (typeof value === 'string' && /^\d+$/.test(value) && Number(value) > 0) return Number(value);
  return undefined;
}

/**
 * Validate a device authorization response body
 */
export function parseDeviceAuthorization(body: unknown): DeviceAuthorization {
  if (!isRecord(body)) {
    throw new OAuthError('protocol', 'Device authorization response is not a JSON object');
  }

  const expiresIn = positiveInteger(body.expires_in);
  if (expiresIn === undefined) {
    throw OAuthError.missingField('expires_in');
  }

  const authorization: DeviceAuthorization = {
    device_code: requireString(body, 'device_code'),
    user_code: requireString(body, 'user_code'),
    // Google still sends the pre-RFC field name
    verification_uri: typeof body.verification_url === 'string' && typeof body.verification_uri !== 'string'
      ? body.verification_url
      : requireString(body, 'verification_uri'),
    expires_in: expiresIn,
    interval: positiveInteger(body.interval) ?? DEFAULT_POLL_INTERVAL_SECONDS,
  };
  if (typeof body.verification_uri_complete === 'string') {
    authorization.verification_uri_complete = body.verification_uri_complete;
  }
  return authorization;
}

/**
 * Drives one Device Authorization attempt from the device code request
 * to a token or a terminal error
 */
export class DevicePoller {
  private options: DevicePollerOptions;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;
  private currentState: DevicePollState = 'REQUESTING';
  private intervalSeconds = DEFAULT_POLL_INTERVAL_SECONDS;

  constructor(options: DevicePollerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): DevicePollState {
    return this.currentState;
  }

  /** Poll interval in seconds, including any slow_down increments */
  get interval(): number {
    return this.intervalSeconds;
  }

  private transition(next: DevicePollState): void {
    logger.debug({ from: this.currentState, to: next }, 'Device flow state change');
    this.currentState = next;
  }

  private terminal(state: DevicePollState, error: OAuthError): OAuthError {
    this.transition(state);
    return error;
  }

  /**
   * Request a device code and user code from the device authorization endpoint
   */
  async requestAuthorization(): Promise<DeviceAuthorization> {
    const { clientId, scope, deviceAuthorizationEndpoint, transport } = this.options;
    this.transition('REQUESTING');

    const params: Record<string, string> = { client_id: clientId };
    if (scope) params.scope = scope;

    logger.info({ endpoint: deviceAuthorizationEndpoint }, 'Requesting device authorization');

    let authorization: DeviceAuthorization;
    try {
      const response = await transport.postForm(deviceAuthorizationEndpoint, params);
      if (!isSuccessStatus(response.status) || readErrorBody(response.data)) {
        throw errorFromResponse(response);
      }
      authorization = parseDeviceAuthorization(response.data);
    } catch (error) {
      this.transition('FATAL');
      throw error;
    }

    this.intervalSeconds = authorization.interval;
    logger.info({ userCode: authorization.user_code, expiresIn: authorization.expires_in }, 'Device authorization issued');
    return authorization;
  }

  /**
   * Poll the token endpoint until the user approves, denies, or the code expires
   */
  async pollForToken(authorization: DeviceAuthorization): Promise<Token> {
    const { clientId, tokenEndpoint, transport } = this.options;
    const deadline = this.now() + authorization.expires_in * 1000;
    this.intervalSeconds = authorization.interval;
    this.transition('PENDING');

    const expired = () => this.terminal('EXPIRED', new OAuthError('device_code_expired', 'Device code expired'));

    for (;;) {
      // Checked on both sides of the sleep so a slow_down-inflated interval cannot overshoot the deadline
      if (this.now() >= deadline) throw expired();
      await this.sleep(this.intervalSeconds * 1000);
      if (this.now() >= deadline) throw expired();

      let response: FormResponse;
      try {
        response = await transport.postForm(tokenEndpoint, {
          client_id: clientId,
          device_code: authorization.device_code,
          grant_type: DEVICE_CODE_GRANT,
        });
      } catch (error) {
        this.transition('FATAL');
        throw error;
      }

      const errorBody = readErrorBody(response.data);
      if (isSuccessStatus(response.status) && !errorBody) {
        let token: Token;
        try {
          token = tokenFromResponse(response.data, Math.floor(this.now() / 1000));
        } catch (error) {
          this.transition('FATAL');
          throw error;
        }
        this.transition('SUCCESS');
        logger.info('Device flow completed successfully');
        return token;
      }

      if (!errorBody) {
        throw this.terminal('FATAL', errorFromResponse(response));
      }

      switch (errorBody.error) {
        case 'authorization_pending':
          continue;
        case 'slow_down':
          this.intervalSeconds += SLOW_DOWN_INCREMENT_SECONDS;
          logger.debug({ interval: this.intervalSeconds }, 'Server asked to slow down polling');
          continue;
        case 'access_denied':
          logger.error('User denied authorization');
          throw this.terminal('DENIED', new OAuthError('authorization_denied', 'Authorization denied by user', {
            code: errorBody.error,
            description: errorBody.error_description,
          }));
        case 'expired_token':
          logger.error('Device code expired');
          throw this.terminal('EXPIRED', new OAuthError('device_code_expired', 'Device code expired', {
            code: errorBody.error,
            description: errorBody.error_description,
          }));
        default:
          logger.error({ error: errorBody.error }, 'Device flow failed');
          throw this.terminal('FATAL', OAuthError.protocol(errorBody.error, errorBody.error_description, response.status));
      }
    }
  }

  /**
   * Full device flow: request codes, show them to the user, poll for the token
   */
  async authorize(onPrompt?: DevicePrompt): Promise<Token> {
    const authorization = await this.requestAuthorization();
    onPrompt?.(authorization);
    return this.pollForToken(authorization);
  }
}
