import type { CredentialStore, Session, Token } from '../types/index.js';

/**
 * In-memory CredentialStore, scoped to a single process.
 * Values are copied on the way in and out so callers cannot mutate stored state.
 */
export class MemoryCredentialStore implements CredentialStore {
  private sessions: Map<string, Session> = new Map();
  private tokens: Map<string, Token> = new Map();

  async saveSession(state: string, session: Session): Promise<void> {
    this.sessions.set(state, { ...session });
  }

  async getSession(state: string): Promise<Session | null> {
    const session = this.sessions.get(state);
    return session ? { ...session } : null;
  }

  async deleteSession(state: string): Promise<void> {
    this.sessions.delete(state);
  }

  async saveToken(key: string, token: Token): Promise<void> {
    this.tokens.set(key, { ...token });
  }

  async getToken(key: string): Promise<Token | null> {
    const token = this.tokens.get(key);
    return token ? { ...token } : null;
  }

  async deleteToken(key: string): Promise<void> {
    this.tokens.delete(key);
  }
}
