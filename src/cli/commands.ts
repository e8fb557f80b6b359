import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, resolveProvider } from '../config/loader.js';
import logger from '../config/logger.js';
import type { Configuration, CredentialStore, DeviceAuthorization } from '../types/index.js';
import type { FormTransport } from '../http/form-client.js';
import { OAuthClient, UrlPresenter } from '../auth/oauth-client.js';
import { TokenRefresher } from '../auth/token-refresher.js';
import { RefreshLockManager } from '../auth/lock-manager.js';
import { MemoryCredentialStore } from '../auth/memory-store.js';
import { FileCredentialStore, defaultDataDir, domainOfKey } from '../auth/token-store.js';
import { errorMessage } from '../errors/oauth-error.js';

export const DEFAULT_CONFIG_PATH = './tokenwarden.yaml';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

/**
 * Overrides used when embedding the CLI or testing it
 */
export interface CliOptions {
  io?: CliIO;
  /** Skip reading the config file */
  config?: Configuration;
  store?: CredentialStore;
  transport?: FormTransport;
  presenter?: UrlPresenter;
  sleep?: (ms: number) => Promise<void>;
  lockDir?: string;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (value.trim() === '' || Number.isNaN(threshold)) {
    throw new InvalidArgumentError('Threshold must be a number.');
  }
  return threshold;
}

/**
 * Store, clients and refreshers built from one configuration
 */
export class CliContext {
  readonly config: Configuration;
  readonly store: CredentialStore;
  private options: CliOptions;
  private lockManager: RefreshLockManager | null;

  constructor(config: Configuration, options: CliOptions = {}) {
    this.config = config;
    this.options = options;
    this.store = options.store ?? CliContext.createStore(config);

    if (!config.refresh.crossProcess) {
      this.lockManager = null;
    } else if (options.lockDir) {
      this.lockManager = new RefreshLockManager(options.lockDir);
    } else {
      this.lockManager = RefreshLockManager.forApp(config.app.name);
    }
  }

  static createStore(config: Configuration): CredentialStore {
    if (config.storage.type === 'memory') {
      return new MemoryCredentialStore();
    }
    return new FileCredentialStore(config.storage.path ?? defaultDataDir(config.app.name));
  }

  client(provider: string): OAuthClient {
    return new OAuthClient(resolveProvider(this.config, provider), this.store, {
      transport: this.options.transport,
      presenter: this.options.presenter,
      sleep: this.options.sleep,
      callbackTimeoutMs: this.config.callback.timeoutSeconds * 1000,
      domain: provider,
    });
  }

  refresher(provider: string): TokenRefresher {
    return new TokenRefresher(this.client(provider), { lockManager: this.lockManager ?? undefined });
  }
}

/**
 * Build the command tree. Commander's own exits are turned into exceptions
 * so runCli can map them to an exit code.
 */
export function createProgram(options: CliOptions = {}): Command {
  const io = options.io ?? processIO;
  const program = new Command();

  program
    .name('tokenwarden')
    .description('Obtain, store and refresh OAuth 2.0 tokens')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  const context = (): CliContext => {
    const config = options.config ?? loadConfig(program.opts<{ config: string }>().config);
    return new CliContext(config, options);
  };

  program
    .command('login')
    .description('Authorize through the browser (Authorization Code flow with PKCE)')
    .argument('<provider>', 'Configured provider name')
    .option('-k, --key <key>', 'Key to store the token under')
    .option('-p, --port <port>', 'Local redirect listener port (0 picks a free one)', parsePort, 0)
    .action(async (provider: string, opts: { key?: string; port: number }) => {
      const ctx = context();
      const key = opts.key ?? `${provider}:default`;
      const client = ctx.client(provider);

      const token = await client.authorize({ port: opts.port });
      await client.saveToken(key, token);
      io.out(`Logged in. Token stored as ${key}\n`);
    });

  program
    .command('device')
    .description('Authorize on another device (Device Authorization flow)')
    .argument('<provider>', 'Configured provider name')
    .option('-k, --key <key>', 'Key to store the token under')
    .action(async (provider: string, opts: { key?: string }) => {
      const ctx = context();
      const key = opts.key ?? `${provider}:default`;
      const client = ctx.client(provider);

      const prompt = (authorization: DeviceAuthorization) => {
        io.err(`Open ${authorization.verification_uri} and enter code: ${authorization.user_code}\n`);
        if (authorization.verification_uri_complete) {
          io.err(`Or open ${authorization.verification_uri_complete}\n`);
        }
      };

      const token = await client.authorizeDevice(prompt);
      await client.saveToken(key, token);
      io.out(`Logged in. Token stored as ${key}\n`);
    });

  program
    .command('token')
    .description('Print a valid access token, refreshing it when needed')
    .argument('<key>', 'Token key, <provider>:<principal>')
    .option('-t, --threshold <fraction>', 'Refresh once this fraction of the lifetime has passed', parseThreshold)
    .option('--provider <name>', 'Provider to refresh with (defaults to the key prefix)')
    .action(async (key: string, opts: { threshold?: number; provider?: string }) => {
      const ctx = context();
      const refresher = ctx.refresher(opts.provider ?? domainOfKey(key));
      const token = await refresher.getValidTokenWithThreshold(key, opts.threshold ?? ctx.config.refresh.threshold);
      io.out(`${token.access_token}\n`);
    });

  program
    .command('refresh')
    .description('Refresh a stored token now')
    .argument('<key>', 'Token key, <provider>:<principal>')
    .option('--provider <name>', 'Provider to refresh with (defaults to the key prefix)')
    .action(async (key: string, opts: { provider?: string }) => {
      const ctx = context();
      const token = await ctx.refresher(opts.provider ?? domainOfKey(key)).refreshTokenForKey(key);
      const expiry = token.expires_at === undefined ? 'no expiry' : `expires at ${new Date(token.expires_at * 1000).toISOString()}`;
      io.out(`Token ${key} refreshed (${expiry})\n`);
    });

  program
    .command('logout')
    .description('Delete a stored token')
    .argument('<key>', 'Token key, <provider>:<principal>')
    .action(async (key: string) => {
      const ctx = context();
      await ctx.store.deleteToken(key);
      io.out(`Removed ${key}\n`);
    });

  return program;
}

/**
 * Parse argv and run the command. Resolves with the process exit code.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed its message
      return error.exitCode;
    }
    logger.debug({ error: errorMessage(error) }, 'Command failed');
    io.err(`error: ${errorMessage(error)}\n`);
    return 1;
  }
}
