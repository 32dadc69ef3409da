// src/sdk.ts

import * as os from 'os';
import * as path from 'path';
import type { AuthState, OAuth2Config, StateChange, UrlOpener } from './core/auth/types';
import { AuthCore } from './core/auth/AuthCore';
import { AuthCoordinator } from './core/auth/AuthCoordinator';
import { CallbackListener, buildRedirectUri } from './core/auth/CallbackListener';
import { PROVIDER_PRESETS } from './core/auth/providers';
import { createBrowserOpener, createLoggingOpener } from './core/auth/browser';
import { TokenCache } from './core/token/TokenCache';
import { ClientHandle } from './core/client/ClientHandle';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { InitConfig, ResolvedConfig, validateConfig } from './config/ConfigValidator';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.pkce-loopback-auth');

export interface InitOptions {
  /**
   * Replaces the system browser launcher (headless hosts, tests)
   */
  openUrl?: UrlOpener;
}

interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  auth: AuthCore;
  cache: TokenCache;
  listener: CallbackListener;
  coordinator: AuthCoordinator;
}

export class PKCEAuthSDK {
  private core: CoreDeps;

  /**
   * Build all dependencies before assigning this.core
   */
  private constructor(config: ResolvedConfig, options: InitOptions) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);

    const oauthConfig: OAuth2Config = {
      clientId: config.clientId,
      scopes: config.scopes,
      redirectUri: buildRedirectUri(config.callbackPort),
      provider: config.provider,
      authorizationEndpoint: config.authorizationEndpoint,
      tokenEndpoint: config.tokenEndpoint,
      issuer: config.issuer,
      authorizationParams: config.authorizationParams,
    };

    const auth = new AuthCore(oauthConfig, logger);
    const cache = new TokenCache(
      {
        cacheDir: config.cacheDir ?? DEFAULT_CACHE_DIR,
        freshnessBufferSeconds: config.freshnessBufferSeconds,
      },
      logger,
      metrics
    );
    const listener = new CallbackListener(logger, metrics);
    const openUrl =
      options.openUrl ?? (config.openBrowser ? createBrowserOpener(logger) : createLoggingOpener(logger));

    const coordinator = new AuthCoordinator(
      { oauth: auth, cache, listener, openUrl, logger, metrics },
      {
        callbackPort: config.callbackPort,
        callbackTimeoutMs: config.callbackTimeoutMs,
        apiBaseUrl:
          config.api?.baseUrl ?? (config.provider ? PROVIDER_PRESETS[config.provider].apiBaseUrl : undefined),
        apiTimeout: config.api?.timeout,
      }
    );

    this.core = { logger, metrics, auth, cache, listener, coordinator };
  }

  /**
   * Initialize the PKCE auth SDK
   *
   * Validates configuration and resolves the provider's endpoints (running
   * discovery when only an issuer is given). No browser is opened here.
   *
   * @throws {z.ZodError} If configuration is invalid
   * @throws {AuthConfigError} If endpoints cannot be resolved
   *
   * @example
   * ```typescript
   * const sdk = await PKCEAuthSDK.init({
   *   clientId: process.env.PKCE_AUTH_CLIENT_ID,
   *   provider: 'spotify',
   *   scopes: ['user-read-email'],
   * });
   * const client = await sdk.authenticate();
   * const me = await client.get('/me');
   * ```
   */
  static async init(config: InitConfig, options: InitOptions = {}): Promise<PKCEAuthSDK> {
    const validatedConfig = validateConfig(config);

    const sdk = new PKCEAuthSDK(validatedConfig, options);
    await sdk.core.auth.initialize();

    sdk.core.logger.info('SDK initialized', {
      clientId: validatedConfig.clientId,
      redirectUri: sdk.core.auth.redirectUri,
      cachePath: sdk.core.cache.path,
    });

    return sdk;
  }

  /**
   * Obtain an authenticated client: cached token, then refresh, then the
   * interactive browser flow. Concurrent calls share one attempt at a time.
   *
   * @throws {CallbackError} Authorization denied, cancelled or timed out
   * @throws {StateMismatchError} Forged or stale callback
   * @throws {CodeExchangeError} Token endpoint rejected the code
   * @throws {CallbackListenerError} Callback port unavailable
   */
  async authenticate(): Promise<ClientHandle> {
    return this.core.coordinator.authenticate();
  }

  /**
   * @throws {NotAuthenticatedError} If authenticate() has not succeeded yet
   */
  getClient(): ClientHandle {
    return this.core.coordinator.getClient();
  }

  getState(): AuthState {
    return this.core.coordinator.getState();
  }

  get redirectUri(): string {
    return this.core.auth.redirectUri;
  }

  get cachePath(): string {
    return this.core.cache.path;
  }

  /**
   * Forget the in-memory session; the cache file stays
   */
  invalidate(): void {
    this.core.coordinator.invalidate();
  }

  /**
   * Forget the session and delete the token cache file
   */
  async disconnect(): Promise<void> {
    this.core.coordinator.invalidate();
    await this.core.cache.clear();
    this.core.logger.info('Disconnected, token cache removed', { cachePath: this.core.cache.path });
  }

  /**
   * Abort an interactive flow waiting for the browser redirect
   */
  cancel(reason?: string): void {
    this.core.coordinator.cancel(reason);
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    this.core.coordinator.on('stateChange', listener);
    return () => {
      this.core.coordinator.off('stateChange', listener);
    };
  }

  /**
   * Prometheus text exposition of the SDK's metrics
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  /**
   * Cancel any pending flow and release listeners
   */
  destroy(): void {
    this.core.coordinator.cancel('SDK destroyed');
    this.core.coordinator.removeAllListeners();
    this.core.logger.debug('SDK destroyed');
  }
}
