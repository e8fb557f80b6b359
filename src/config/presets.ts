import type { OAuthConfig, PresetName } from './types.js';

export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8080/callback';

export interface PresetOptions {
  clientId: string;
  scope?: string;
  tenant?: string;
  baseUrl?: string;
}

export const PRESET_NAMES: readonly PresetName[] = ['github', 'google', 'microsoft', 'gitlab', 'tuist'];

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === 'string' && (PRESET_NAMES as readonly string[]).includes(value);
}

function github({ clientId, scope }: PresetOptions): OAuthConfig {
  return {
    clientId,
    authorizationEndpoint: 'https://github.com/login/oauth/authorize',
    tokenEndpoint: 'https://github.com/login/oauth/access_token',
    deviceAuthorizationEndpoint: 'https://github.com/login/device/code',
    redirectUri: DEFAULT_REDIRECT_URI,
    scope,
  };
}

function google({ clientId, scope }: PresetOptions): OAuthConfig {
  return {
    clientId,
    authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenEndpoint: 'https://oauth2.googleapis.com/token',
    deviceAuthorizationEndpoint: 'https://oauth2.googleapis.com/device/code',
    redirectUri: DEFAULT_REDIRECT_URI,
    scope,
  };
}

function microsoft({ clientId, scope, tenant = 'common' }: PresetOptions): OAuthConfig {
  const base = `https://login.microsoftonline.com/${tenant}/oauth2/v2.0`;
  return {
    clientId,
    authorizationEndpoint: `${base}/authorize`,
    tokenEndpoint: `${base}/token`,
    deviceAuthorizationEndpoint: `${base}/devicecode`,
    redirectUri: DEFAULT_REDIRECT_URI,
    scope,
  };
}

// GitLab has no device authorization endpoint
function gitlab({ clientId, scope, baseUrl = 'https://gitlab.com' }: PresetOptions): OAuthConfig {
  return {
    clientId,
    authorizationEndpoint: `${baseUrl}/oauth/authorize`,
    tokenEndpoint: `${baseUrl}/oauth/token`,
    redirectUri: DEFAULT_REDIRECT_URI,
    scope,
  };
}

function tuist({ clientId, scope, baseUrl = 'https://cloud.tuist.io' }: PresetOptions): OAuthConfig {
  return {
    clientId,
    authorizationEndpoint: `${baseUrl}/oauth/authorize`,
    tokenEndpoint: `${baseUrl}/oauth/token`,
    deviceAuthorizationEndpoint: `${baseUrl}/oauth/device/code`,
    redirectUri: DEFAULT_REDIRECT_URI,
    scope,
  };
}

const presets: Record<PresetName, (options: PresetOptions) => OAuthConfig> = {
  github,
  google,
  microsoft,
  gitlab,
  tuist,
};

export function presetConfig(name: PresetName, options: PresetOptions): OAuthConfig {
  return presets[name](options);
}
