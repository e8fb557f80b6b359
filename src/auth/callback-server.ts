import express, { Request, Response } from 'express';
import type { Server } from 'http';
import type { CallbackResult } from '../types/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { getErrorHTML, getNotFoundHTML, getSuccessHTML } from './callback-page.js';
import logger from '../config/logger.js';

export const CALLBACK_PATH = '/callback';

const HEX_PAIR = /^[0-9a-fA-F]{2}$/;

/**
 * Percent-decode one query component: `%XX` becomes a byte, `+` a space.
 * Malformed escapes are kept as they are.
 */
export function decodeQueryComponent(component: string): string {
  const bytes: number[] = [];
  for (let i = 0; i < component.length; i++) {
    const ch = component[i];
    if (ch === '+') {
      bytes.push(0x20);
    } else if (ch === '%' && HEX_PAIR.test(component.slice(i + 1, i + 3))) {
      bytes.push(parseInt(component.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(ch, 'utf8'));
    }
  }
  return Buffer.from(bytes).toString('utf8');
}

export function parseQueryParams(query: string): Map<string, string> {
  const params = new Map<string, string>();
  for (const pair of query.split('&')) {
    if (pair.length === 0) continue;
    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? '' : pair.slice(eq + 1);
    params.set(decodeQueryComponent(key), decodeQueryComponent(value));
  }
  return params;
}

type CallbackOutcome =
  | { ok: true; result: CallbackResult }
  | { ok: false; error: OAuthError };

export interface CallbackServerOptions {
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
}

/**
 * Single-use loopback listener that captures the authorization redirect.
 * Create one per authorization attempt.
 */
export class CallbackServer {
  private app: express.Application;
  private server: Server | null = null;
  private host: string;
  private requestedPort: number;
  private boundPort: number | null = null;
  private outcome: CallbackOutcome | null = null;
  private notify: ((outcome: CallbackOutcome) => void) | null = null;
  private accepted = false;
  private waited = false;

  constructor(options: CallbackServerOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.requestedPort = options.port ?? 0;
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get(CALLBACK_PATH, this.handleCallback.bind(this));

    this.app.use((req: Request, res: Response) => {
      logger.debug({ method: req.method, path: req.path }, 'Ignoring request outside callback path');
      this.sendPage(res, 404, getNotFoundHTML());
    });
  }

  private sendPage(res: Response, status: number, html: string): void {
    res.status(status);
    res.setHeader('Content-Type', 'text/html; charset=utf-8');
    res.setHeader('Connection', 'close');
    res.send(html);
  }

  private handleCallback(req: Request, res: Response): void {
    if (this.accepted || this.outcome) {
      this.sendPage(res, 400, getErrorHTML('This authorization attempt has already completed.'));
      return;
    }

    const url = req.originalUrl;
    const queryStart = url.indexOf('?');
    if (queryStart === -1 || queryStart === url.length - 1) {
      logger.warn('Callback request without query parameters');
      this.sendPage(res, 400, getErrorHTML('Missing query parameters'));
      return;
    }

    const params = parseQueryParams(url.slice(queryStart + 1));

    const error = params.get('error');
    if (error !== undefined) {
      const description = params.get('error_description');
      logger.warn({ error, description }, 'Authorization server returned an error');
      this.sendPage(res, 400, getErrorHTML(`Authorization failed: ${error}`));
      this.settleAfter(res, { ok: false, error: OAuthError.protocol(error, description) });
      return;
    }

    const code = params.get('code');
    const state = params.get('state');
    if (code === undefined || state === undefined) {
      const field = code === undefined ? 'code' : 'state';
      this.sendPage(res, 400, getErrorHTML(`Missing required field: ${field}`));
      this.settleAfter(res, { ok: false, error: OAuthError.missingField(field) });
      return;
    }

    logger.info('Authorization callback received');
    this.sendPage(res, 200, getSuccessHTML());
    this.settleAfter(res, { ok: true, result: { code, state } });
  }

  /**
   * Record the outcome now, hand it to the waiter once the page has been written
   */
  private settleAfter(res: Response, outcome: CallbackOutcome): void {
    this.accepted = true;
    const deliver = () => {
      if (this.outcome) return;
      this.outcome = outcome;
      this.notify?.(outcome);
    };
    if (res.writableFinished) {
      deliver();
    } else {
      res.once('finish', deliver);
      res.once('close', deliver);
    }
  }

  async start(): Promise<void> {
    if (this.server) return;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.requestedPort, this.host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new OAuthError('transport', 'Callback server has no TCP address'));
          return;
        }
        this.boundPort = address.port;
        logger.debug({ redirectUri: this.redirectUri }, 'Callback server listening');
        resolve();
      });
      server.on('error', (error: Error) => {
        this.server = null;
        reject(new OAuthError('transport', `Callback server failed: ${error.message}`, { cause: error }));
      });
      this.server = server;
    });
  }

  get port(): number {
    if (this.boundPort === null) {
      throw new OAuthError('config', 'Callback server not started');
    }
    return this.boundPort;
  }

  get redirectUri(): string {
    return `http://${this.host}:${this.port}${CALLBACK_PATH}`;
  }

  /**
   * Resolve with the captured code and state, or reject on an error redirect,
   * a missing field, or when timeoutMs elapses. The server is closed either way.
   */
  async waitForCallback(timeoutMs: number): Promise<CallbackResult> {
    if (this.waited) {
      throw new OAuthError('config', 'Callback server is single use; create a new one per attempt');
    }
    this.waited = true;
    await this.start();

    let timer: NodeJS.Timeout | undefined;
    const outcome = await new Promise<CallbackOutcome>((resolve) => {
      if (this.outcome) {
        resolve(this.outcome);
        return;
      }
      this.notify = resolve;
      timer = setTimeout(() => {
        logger.warn({ timeoutMs }, 'Timed out waiting for authorization callback');
        this.outcome = {
          ok: false,
          error: new OAuthError('timeout', 'Callback not received in time'),
        };
        resolve(this.outcome);
      }, timeoutMs);
    });
    clearTimeout(timer);
    this.notify = null;

    await this.close();

    if (outcome.ok) {
      return outcome.result;
    }
    throw outcome.error;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else {
          logger.debug('Callback server stopped');
          resolve();
        }
      });
      server.closeAllConnections();
    });
  }

  getApp(): express.Application {
    return this.app;
  }
}
