import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import type { Configuration, OAuthConfig, ProviderConfig, StorageType } from './types.js';
import { DEFAULT_REDIRECT_URI, isPresetName, presetConfig } from './presets.js';
import { OAuthError, errorMessage } from '../errors/oauth-error.js';
import { isRecord } from '../utils/guards.js';
import logger from './logger.js';

export const DEFAULT_CONFIG: Configuration = {
  app: { name: 'tokenwarden' },
  storage: { type: 'file' },
  refresh: { threshold: 0.8, crossProcess: true },
  callback: { timeoutSeconds: 30 },
  providers: {},
};

function configError(message: string): OAuthError {
  return new OAuthError('config', `Invalid configuration: ${message}`);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw configError(`${name} must be a mapping`);
  return value;
}

function optionalString(obj: Record<string, unknown>, field: string, path: string): string | undefined {
  const value = obj[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw configError(`${path}.${field} must be a non-empty string`);
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, field: string, path: string): number | undefined {
  const value = obj[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw configError(`${path}.${field} must be a number`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, field: string, path: string): boolean | undefined {
  const value = obj[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw configError(`${path}.${field} must be a boolean`);
  }
  return value;
}

function parseProvider(name: string, value: unknown): ProviderConfig {
  const path = `providers.${name}`;
  if (!isRecord(value)) throw configError(`${path} must be a mapping`);

  const preset = value.preset;
  if (preset !== undefined && !isPresetName(preset)) {
    throw configError(`${path}.preset must be one of github, google, microsoft, gitlab, tuist`);
  }

  const clientId = optionalString(value, 'clientId', path);
  if (!clientId) throw configError(`${path}.clientId is required`);

  const provider: ProviderConfig = {
    preset,
    clientId,
    scope: optionalString(value, 'scope', path),
    tenant: optionalString(value, 'tenant', path),
    baseUrl: optionalString(value, 'baseUrl', path),
    authorizationEndpoint: optionalString(value, 'authorizationEndpoint', path),
    tokenEndpoint: optionalString(value, 'tokenEndpoint', path),
    deviceAuthorizationEndpoint: optionalString(value, 'deviceAuthorizationEndpoint', path),
    redirectUri: optionalString(value, 'redirectUri', path),
  };

  if (!provider.preset && !provider.tokenEndpoint) {
    throw configError(`${path}.tokenEndpoint is required without a preset`);
  }
  if (!provider.preset && !provider.authorizationEndpoint && !provider.deviceAuthorizationEndpoint) {
    throw configError(`${path} needs authorizationEndpoint or deviceAuthorizationEndpoint without a preset`);
  }
  return provider;
}

/**
 * Validate a parsed YAML document and fill in defaults
 */
export function parseConfig(raw: unknown): Configuration {
  if (raw === undefined || raw === null) {
    return structuredClone(DEFAULT_CONFIG);
  }
  if (!isRecord(raw)) throw configError('document must be a mapping');

  const app = section(raw, 'app');
  const storage = section(raw, 'storage');
  const refresh = section(raw, 'refresh');
  const callback = section(raw, 'callback');
  const providers = section(raw, 'providers');

  const storageType = storage.type ?? DEFAULT_CONFIG.storage.type;
  if (storageType !== 'file' && storageType !== 'memory') {
    throw configError('storage.type must be "file" or "memory"');
  }

  const threshold = optionalNumber(refresh, 'threshold', 'refresh') ?? DEFAULT_CONFIG.refresh.threshold;
  if (threshold < 0 || threshold > 1) {
    throw configError('refresh.threshold must be between 0 and 1');
  }

  const timeoutSeconds = optionalNumber(callback, 'timeoutSeconds', 'callback') ?? DEFAULT_CONFIG.callback.timeoutSeconds;
  if (timeoutSeconds <= 0) {
    throw configError('callback.timeoutSeconds must be positive');
  }

  const parsedProviders: Record<string, ProviderConfig> = {};
  for (const [name, value] of Object.entries(providers)) {
    parsedProviders[name] = parseProvider(name, value);
  }

  const type: StorageType = storageType;
  return {
    app: { name: optionalString(app, 'name', 'app') ?? DEFAULT_CONFIG.app.name },
    storage: { type, path: optionalString(storage, 'path', 'storage') },
    refresh: {
      threshold,
      crossProcess: optionalBoolean(refresh, 'crossProcess', 'refresh') ?? DEFAULT_CONFIG.refresh.crossProcess,
    },
    callback: { timeoutSeconds },
    providers: parsedProviders,
  };
}

export function loadConfig(configPath: string): Configuration {
  try {
    const fileContents = readFileSync(configPath, 'utf8');
    const config = parseConfig(yaml.load(fileContents));

    logger.info({ configPath, providers: Object.keys(config.providers) }, 'Configuration loaded successfully');
    return config;
  } catch (error) {
    logger.error({ error: errorMessage(error), configPath }, 'Failed to load configuration');
    if (error instanceof OAuthError) throw error;
    throw new OAuthError('config', `Failed to load configuration from ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Resolve a configured provider into concrete client settings.
 * Explicit endpoint fields override preset values.
 */
export function resolveProvider(config: Configuration, name: string): OAuthConfig {
  const provider = config.providers[name];
  if (!provider) {
    throw new OAuthError('config', `Provider ${name} not configured`);
  }

  const base: Partial<OAuthConfig> = provider.preset
    ? presetConfig(provider.preset, {
        clientId: provider.clientId,
        scope: provider.scope,
        tenant: provider.tenant,
        baseUrl: provider.baseUrl,
      })
    : {};

  const authorizationEndpoint = provider.authorizationEndpoint ?? base.authorizationEndpoint;
  const tokenEndpoint = provider.tokenEndpoint ?? base.tokenEndpoint;
  if (!tokenEndpoint) {
    throw new OAuthError('config', `Provider ${name} missing token endpoint`);
  }

  return {
    clientId: provider.clientId,
    authorizationEndpoint: authorizationEndpoint ?? '',
    tokenEndpoint,
    deviceAuthorizationEndpoint: provider.deviceAuthorizationEndpoint ?? base.deviceAuthorizationEndpoint,
    redirectUri: provider.redirectUri ?? base.redirectUri ?? DEFAULT_REDIRECT_URI,
    scope: provider.scope ?? base.scope,
  };
}
