// Public API of the tokenwarden package

export * from './types/index.js';
export { OAuthError, isOAuthError, errorMessage } from './errors/oauth-error.js';
export type { OAuthErrorType, OAuthErrorDetails } from './errors/oauth-error.js';

export { generatePkce, deriveChallenge, generateState, CODE_CHALLENGE_METHOD } from './auth/pkce.js';
export {
  isTokenExpired,
  shouldRefresh,
  lifetimeElapsed,
  clampThreshold,
  tokenFromResponse,
  nowSeconds,
} from './auth/token.js';

export { MemoryCredentialStore } from './auth/memory-store.js';
export { FileCredentialStore, defaultDataDir, domainOfKey } from './auth/token-store.js';

export { AxiosFormTransport } from './http/form-client.js';
export type { FormTransport, FormResponse } from './http/form-client.js';

export { CallbackServer, CALLBACK_PATH } from './auth/callback-server.js';
export type { CallbackServerOptions } from './auth/callback-server.js';
export { DevicePoller, parseDeviceAuthorization } from './auth/device-poller.js';
export type { DevicePollState, DevicePrompt, DevicePollerOptions } from './auth/device-poller.js';
export { OAuthClient, DEFAULT_CALLBACK_TIMEOUT_MS } from './auth/oauth-client.js';
export type { OAuthClientOptions, AuthorizeOptions, UrlPresenter } from './auth/oauth-client.js';
export { TokenRefresher } from './auth/token-refresher.js';
export type { TokenRefresherOptions } from './auth/token-refresher.js';
export { RefreshLockManager, RefreshLock, sanitizeLockKey } from './auth/lock-manager.js';
export type { LockManagerOptions } from './auth/lock-manager.js';

export { loadConfig, parseConfig, resolveProvider, DEFAULT_CONFIG } from './config/loader.js';
export { presetConfig, PRESET_NAMES } from './config/presets.js';
export { logger } from './config/logger.js';
