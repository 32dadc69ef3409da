// src/core/auth/types.ts

export type ProviderPreset = 'spotify';

export interface OAuth2Config {
  clientId: string;
  scopes: string[];
  redirectUri: string;
  provider?: ProviderPreset;
  authorizationEndpoint?: string; // Override if not discoverable
  tokenEndpoint?: string;
  issuer?: string; // Discovery base when endpoints are not given
  authorizationParams?: Record<string, string>;
}

export interface PKCEPair {
  verifier: string;
  challenge: string;
  method: 'S256';
}

export type CallbackResult =
  | { type: 'success'; code: string; state: string }
  | { type: 'error'; error: string; errorDescription?: string };

export type AuthState =
  | 'Unauthenticated'
  | 'CacheValid'
  | 'CacheRefreshing'
  | 'CacheRefreshFailed'
  | 'FullFlowPending'
  | 'FullFlowExchanging'
  | 'Authenticated';

export interface StateChange {
  from: AuthState;
  to: AuthState;
}

/**
 * Presents the authorization URL to the user (normally: opens a browser)
 */
export type UrlOpener = (url: string) => void | Promise<void>;
