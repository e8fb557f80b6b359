import { promises as fs } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { randomUUID } from 'crypto';
import type { CredentialStore, Session, Token } from '../types/index.js';
import { OAuthError, errorMessage } from '../errors/oauth-error.js';
import { parseStoredToken } from './token.js';
import { isErrnoException, isRecord } from '../utils/guards.js';
import logger from '../config/logger.js';

const DEFAULT_DOMAIN = 'default';
const SESSIONS_PREFIX = 'sessions_';
const TOKENS_PREFIX = 'tokens_';

/**
 * Platform data directory, honouring XDG_DATA_HOME
 */
export function defaultDataDir(appName: string): string {
  if (process.env.XDG_DATA_HOME) {
    return join(process.env.XDG_DATA_HOME, appName);
  }
  if (process.platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', appName);
  }
  if (process.platform === 'win32' && process.env.APPDATA) {
    return join(process.env.APPDATA, appName);
  }
  return join(homedir(), '.local', 'share', appName);
}

function sanitizeDomain(domain: string): string {
  return domain.replace(/[/\\:]/g, '_');
}

/**
 * Keys follow "<domain>:<principal>"; anything without a colon lands in the default domain
 */
export function domainOfKey(key: string): string {
  const index = key.indexOf(':');
  return index > 0 ? key.slice(0, index) : DEFAULT_DOMAIN;
}

function isSession(value: unknown): value is Session {
  return (
    isRecord(value) &&
    typeof value.state === 'string' &&
    typeof value.code_verifier === 'string' &&
    typeof value.created_at === 'number' &&
    (value.domain === undefined || typeof value.domain === 'string')
  );
}

/**
 * File-based implementation of CredentialStore.
 * Sessions and tokens live in one JSON file per domain. Every call reads
 * the file again so that tokens written by other processes are seen, and
 * every write goes through a temp file and a rename.
 */
export class FileCredentialStore implements CredentialStore {
  private basePath: string;
  private queues: Map<string, Promise<unknown>> = new Map();

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  static forApp(appName: string): FileCredentialStore {
    return new FileCredentialStore(defaultDataDir(appName));
  }

  get path(): string {
    return this.basePath;
  }

  private sessionsPath(domain: string): string {
    return join(this.basePath, `${SESSIONS_PREFIX}${sanitizeDomain(domain)}.json`);
  }

  private tokensPath(domain: string): string {
    return join(this.basePath, `${TOKENS_PREFIX}${sanitizeDomain(domain)}.json`);
  }

  /**
   * Serialize read-modify-write sequences on one file within this process
   */
  private async exclusive<T>(filePath: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(filePath) ?? Promise.resolve();
    const next = previous.then(task);
    const settled = next.catch(() => undefined);
    this.queues.set(filePath, settled);
    try {
      return await next;
    } finally {
      if (this.queues.get(filePath) === settled) {
        this.queues.delete(filePath);
      }
    }
  }

  private async readJson(filePath: string): Promise<Record<string, unknown>> {
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw OAuthError.storage(`Failed to read ${filePath}: ${errorMessage(error)}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw OAuthError.storage(`Failed to parse ${filePath}: ${errorMessage(error)}`, error);
    }
    if (!isRecord(parsed)) {
      throw OAuthError.storage(`Unexpected content in ${filePath}`);
    }
    return parsed;
  }

  private async writeJson(filePath: string, value: Record<string, unknown>): Promise<void> {
    try {
      await fs.mkdir(this.basePath, { recursive: true });
      const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(value, null, 2), { encoding: 'utf-8', mode: 0o600 });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw OAuthError.storage(`Failed to write ${filePath}: ${errorMessage(error)}`, error);
    }
  }

  private async sessionDomains(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.basePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw OAuthError.storage(`Failed to read storage directory: ${errorMessage(error)}`, error);
    }
    return entries
      .filter(name => name.startsWith(SESSIONS_PREFIX) && name.endsWith('.json'))
      .map(name => name.slice(SESSIONS_PREFIX.length, -'.json'.length));
  }

  async saveSession(state: string, session: Session): Promise<void> {
    const filePath = this.sessionsPath(session.domain ?? DEFAULT_DOMAIN);
    await this.exclusive(filePath, async () => {
      const sessions = await this.readJson(filePath);
      sessions[state] = session;
      await this.writeJson(filePath, sessions);
    });
  }

  async getSession(state: string): Promise<Session | null> {
    for (const domain of await this.sessionDomains()) {
      const sessions = await this.readJson(this.sessionsPath(domain));
      const session = sessions[state];
      if (isSession(session)) {
        return session;
      }
    }
    return null;
  }

  async deleteSession(state: string): Promise<void> {
    for (const domain of await this.sessionDomains()) {
      const filePath = this.sessionsPath(domain);
      const removed = await this.exclusive(filePath, async () => {
        const sessions = await this.readJson(filePath);
        if (!(state in sessions)) return false;
        delete sessions[state];
        await this.writeJson(filePath, sessions);
        return true;
      });
      if (removed) return;
    }
  }

  async saveToken(key: string, token: Token): Promise<void> {
    const filePath = this.tokensPath(domainOfKey(key));
    await this.exclusive(filePath, async () => {
      const tokens = await this.readJson(filePath);
      tokens[key] = token;
      await this.writeJson(filePath, tokens);
    });
    logger.debug({ key }, 'Token saved');
  }

  async getToken(key: string): Promise<Token | null> {
    const tokens = await this.readJson(this.tokensPath(domainOfKey(key)));
    if (!(key in tokens)) return null;
    const token = parseStoredToken(tokens[key]);
    if (!token) {
      throw OAuthError.storage(`Stored token for ${key} is malformed`);
    }
    return token;
  }

  async deleteToken(key: string): Promise<void> {
    const filePath = this.tokensPath(domainOfKey(key));
    await this.exclusive(filePath, async () => {
      const tokens = await this.readJson(filePath);
      if (!(key in tokens)) return;
      delete tokens[key];
      await this.writeJson(filePath, tokens);
    });
  }
}
