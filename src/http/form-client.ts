import axios, { AxiosInstance } from 'axios';
import { OAuthError, errorMessage } from '../errors/oauth-error.js';
import { isRecord } from '../utils/guards.js';
import logger from '../config/logger.js';

export interface FormResponse {
  status: number;
  data: unknown;
}

/**
 * Outbound HTTP capability: POST an application/x-www-form-urlencoded body
 * and hand back the status code with the decoded JSON body
 */
export interface FormTransport {
  postForm(url: string, params: Record<string, string>): Promise<FormResponse>;
}

export interface OAuthErrorBody {
  error: string;
  error_description?: string;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Extract an RFC 6749 error body. Some servers (GitHub among them) report
 * device flow errors with a 200 status, so the body is checked regardless of status.
 */
export function readErrorBody(data: unknown): OAuthErrorBody | null {
  if (!isRecord(data) || typeof data.error !== 'string') {
    return null;
  }
  return {
    error: data.error,
    error_description: typeof data.error_description === 'string' ? data.error_description : undefined,
  };
}

/**
 * Turn a failed endpoint response into an OAuthError
 */
export function errorFromResponse(response: FormResponse): OAuthError {
  const body = readErrorBody(response.data);
  if (body) {
    return OAuthError.protocol(body.error, body.error_description, response.status);
  }
  return new OAuthError('transport', `Unexpected HTTP status ${response.status}`, { statusCode: response.status });
}

/**
 * axios-backed FormTransport. HTTP error statuses resolve normally;
 * only network-level failures reject.
 */
export class AxiosFormTransport implements FormTransport {
  private client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? axios.create({ timeout: 30000 });
  }

  async postForm(url: string, params: Record<string, string>): Promise<FormResponse> {
    const body = new URLSearchParams(params).toString();

    try {
      const response = await this.client.post<unknown>(url, body, {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        validateStatus: () => true,
      });

      logger.debug({ url, status: response.status }, 'Form POST completed');
      return { status: response.status, data: response.data };
    } catch (error: unknown) {
      logger.error({ url, error: errorMessage(error) }, 'Form POST failed');
      throw new OAuthError('transport', `Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
