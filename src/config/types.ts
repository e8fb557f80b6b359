// Configuration types for tokenwarden

// ============================================================================
// OAuth Client Types
// ============================================================================

/**
 * Resolved endpoints and client settings for one OAuth provider
 */
export interface OAuthConfig {
  clientId: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  redirectUri: string;
  scope?: string;
  deviceAuthorizationEndpoint?: string;
}

export type PresetName = 'github' | 'google' | 'microsoft' | 'gitlab' | 'tuist';

// ============================================================================
// Configuration File Types
// ============================================================================

export interface ProviderConfig {
  preset?: PresetName;
  clientId: string;
  scope?: string;
  /** Microsoft tenant, defaults to "common" */
  tenant?: string;
  /** Self-hosted base URL for GitLab and Tuist */
  baseUrl?: string;
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
  deviceAuthorizationEndpoint?: string;
  redirectUri?: string;
}

export type StorageType = 'file' | 'memory';

export interface Configuration {
  app: {
    name: string;
  };
  storage: {
    type: StorageType;
    path?: string;
  };
  refresh: {
    threshold: number;
    crossProcess: boolean;
  };
  callback: {
    timeoutSeconds: number;
  };
  providers: {
    [name: string]: ProviderConfig;
  };
}
