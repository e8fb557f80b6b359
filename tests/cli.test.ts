import { describe, it, expect, beforeEach } from 'vitest';
import { runCli } from '../src/cli/commands.js';
import { parseConfig } from '../src/config/loader.js';
import { MemoryCredentialStore } from '../src/auth/memory-store.js';
import { nowSeconds } from '../src/auth/token.js';
import type { Token } from '../src/types/index.js';
import { FakeTransport } from './helpers/fake-transport.js';

const config = parseConfig({
  storage: { type: 'memory' },
  refresh: { crossProcess: false },
  providers: {
    github: { preset: 'github', clientId: 'test-client' },
  },
});

describe('CLI', () => {
  let store: MemoryCredentialStore;
  let transport: FakeTransport;
  let out: string[];
  let err: string[];

  function run(...args: string[]): Promise<number> {
    return runCli(['node', 'tokenwarden', ...args], {
      config,
      store,
      transport,
      sleep: async () => undefined,
      io: {
        out: (text) => out.push(text),
        err: (text) => err.push(text),
      },
    });
  }

  beforeEach(() => {
    store = new MemoryCredentialStore();
    transport = new FakeTransport();
    out = [];
    err = [];
  });

  describe('token', () => {
    it('should print a valid token without refreshing', async () => {
      const token: Token = { access_token: 'at-1', refresh_token: 'rt-1', token_type: 'Bearer', expires_in: 3600, expires_at: nowSeconds() + 3600 };
      await store.saveToken('github:alice', token);

      expect(await run('token', 'github:alice')).toBe(0);
      expect(out).toEqual(['at-1\n']);
      expect(transport.calls).toHaveLength(0);
    });

    it('should refresh an expired token with the provider from the key', async () => {
      await store.saveToken('github:alice', { access_token: 'at-1', refresh_token: 'rt-1', token_type: 'Bearer', expires_in: 3600, expires_at: 1 });
      transport.reply(200, { access_token: 'at-2', expires_in: 3600 });

      expect(await run('token', 'github:alice')).toBe(0);
      expect(out).toEqual(['at-2\n']);
      expect(transport.calls[0].url).toBe('https://github.com/login/oauth/access_token');
    });

    it('should report a missing token on stderr with exit code 1', async () => {
      expect(await run('token', 'github:alice')).toBe(1);
      expect(err).toEqual(['error: No token found for github:alice\n']);
      expect(out).toEqual([]);
    });

    it('should report unknown providers', async () => {
      expect(await run('token', 'gitlab:bob')).toBe(1);
      expect(err).toEqual(['error: Provider gitlab not configured\n']);
    });

    it('should reject a threshold that is not a number', async () => {
      expect(await run('token', 'github:alice', '--threshold', 'abc')).toBe(1);
      expect(err.join('')).toContain('Threshold must be a number.');
    });
  });

  describe('refresh', () => {
    it('should force a refresh', async () => {
      await store.saveToken('github:alice', { access_token: 'at-1', refresh_token: 'rt-1', token_type: 'Bearer' });
      transport.reply(200, { access_token: 'at-3' });

      expect(await run('refresh', 'github:alice')).toBe(0);
      expect(out).toEqual(['Token github:alice refreshed (no expiry)\n']);
      expect((await store.getToken('github:alice'))?.access_token).toBe('at-3');
    });
  });

  describe('logout', () => {
    it('should delete the stored token', async () => {
      await store.saveToken('github:alice', { access_token: 'at-1', token_type: 'Bearer' });

      expect(await run('logout', 'github:alice')).toBe(0);
      expect(out).toEqual(['Removed github:alice\n']);
      expect(await store.getToken('github:alice')).toBeNull();
    });
  });

  describe('device', () => {
    it('should prompt for the user code and store the token', async () => {
      transport
        .reply(200, {
          device_code: 'dev-1',
          user_code: 'WDJB-MJHT',
          verification_uri: 'https://github.com/login/device',
          expires_in: 900,
          interval: 5,
        })
        .reply(200, { error: 'authorization_pending' })
        .reply(200, { access_token: 'device-at', token_type: 'bearer', scope: 'repo' });

      expect(await run('device', 'github')).toBe(0);
      expect(err).toEqual(['Open https://github.com/login/device and enter code: WDJB-MJHT\n']);
      expect(out).toEqual(['Logged in. Token stored as github:default\n']);
      expect(await store.getToken('github:default')).toEqual({ access_token: 'device-at', token_type: 'bearer', scope: 'repo' });
      expect(transport.calls[0].url).toBe('https://github.com/login/device/code');
    });
  });

  describe('program', () => {
    it('should print the version', async () => {
      expect(await run('--version')).toBe(0);
      expect(out).toEqual(['0.1.0\n']);
    });

    it('should fail on unknown commands', async () => {
      expect(await run('frobnicate')).toBe(1);
      expect(err.join('')).toContain("unknown command 'frobnicate'");
    });
  });
});
