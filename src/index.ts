// src/index.ts

export { PKCEAuthSDK, DEFAULT_CACHE_DIR } from './sdk';
export type { InitOptions } from './sdk';
export type { InitConfig, ResolvedConfig } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe, configFromEnv } from './config/ConfigValidator';
export type {
  AuthState,
  CallbackResult,
  OAuth2Config,
  PKCEPair,
  ProviderPreset,
  StateChange,
  UrlOpener,
} from './core/auth/types';
export type { TokenRecord, TokenResponse } from './core/token/types';
export type { ApiRequestConfig, ApiResponse } from './core/client/types';
export { ClientHandle } from './core/client/ClientHandle';
export { TokenCache } from './core/token/TokenCache';
export { CallbackListener, buildRedirectUri } from './core/auth/CallbackListener';
export { AuthCore } from './core/auth/AuthCore';
export { AuthCoordinator } from './core/auth/AuthCoordinator';
export { generatePKCE, generateVerifier, deriveChallenge, generateState } from './core/auth/pkce';

// Export error classes for error handling
export {
  SDKError,
  AuthError,
  AuthConfigError,
  CallbackError,
  CallbackTimeoutError,
  CallbackListenerError,
  StateMismatchError,
  CodeExchangeError,
  NotAuthenticatedError,
  TokenError,
  TokenRefreshError,
  CacheCorruptError,
  PersistenceError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
} from './utils/errors';
