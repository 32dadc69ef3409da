// src/core/auth/AuthCore.ts

import { Issuer, BaseClient, TokenSet, errors } from 'openid-client';
import type { OAuth2Config, PKCEPair } from './types';
import type { TokenResponse } from '../token/types';
import type { Logger } from '../../observability/Logger';
import { PROVIDER_PRESETS } from './providers';
import {
  AuthConfigError,
  CodeExchangeError,
  TokenRefreshError,
  errorMessage,
} from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';

// RFC 6749 makes expires_in optional; assume the common one-hour lifetime
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;

/**
 * OAuth error code from the token endpoint (invalid_grant, ...) if any
 */
export function oauthErrorType(error: unknown): string {
  if (error instanceof errors.OPError) return error.error;
  if (error instanceof errors.RPError) return 'rp_error';
  return 'unknown';
}

/**
 * Public-client OAuth 2.0 endpoints: authorization URL, code exchange, refresh
 */
export class AuthCore {
  private client?: BaseClient;
  private discovered = false;
  private logger: Logger;

  constructor(
    private config: OAuth2Config,
    logger: Logger
  ) {
    this.logger = logger;
  }

  /**
   * Build the OAuth client (discovers endpoints when only an issuer is configured)
   */
  async initialize(): Promise<void> {
    if (this.client) return;
    this.client = await this.createOAuth2Client();
    this.logger.info('AuthCore initialized', {
      clientId: this.config.clientId,
      authorizationEndpoint: this.client.issuer.metadata.authorization_endpoint,
      tokenEndpoint: this.client.issuer.metadata.token_endpoint,
    });
  }

  get clientId(): string {
    return this.config.clientId;
  }

  get redirectUri(): string {
    return this.config.redirectUri;
  }

  /**
   * Authorization URL for one attempt
   */
  createAuthUrl(pkce: PKCEPair, state: string): string {
    const client = this.getOAuth2Client();

    const authUrl = client.authorizationUrl({
      ...this.config.authorizationParams,
      scope: this.config.scopes.join(' '),
      state,
      code_challenge: pkce.challenge,
      code_challenge_method: pkce.method,
    });

    this.logger.debug('Created auth URL', { clientId: this.config.clientId, state });
    return authUrl;
  }

  /**
   * Exchange authorization code + PKCE verifier for tokens
   */
  async exchangeCode(code: string, state: string, codeVerifier: string): Promise<TokenResponse> {
    return withOAuthSpan('exchangeCode', this.config.clientId, async () => {
      const client = this.getOAuth2Client();

      try {
        let tokenSet: TokenSet;

        if (this.discovered) {
          // OpenID Connect issuers add an id_token, which oauthCallback() rejects.
          // No nonce is sent and the id_token is not used, so post the grant directly.
          tokenSet = await client.grant({
            grant_type: 'authorization_code',
            code,
            redirect_uri: this.config.redirectUri,
            code_verifier: codeVerifier,
          });
        } else {
          tokenSet = await client.oauthCallback(
            this.config.redirectUri,
            { code, state },
            { code_verifier: codeVerifier, state }
          );
        }
        const response = this.toTokenResponse(tokenSet);

        this.logger.debug('Token exchange successful', {
          hasRefreshToken: Boolean(response.refresh_token),
          tokenType: response.token_type,
          expiresIn: response.expires_in,
          scope: response.scope,
        });

        return response;
      } catch (error) {
        this.logger.error('Token exchange failed', { error: errorMessage(error) });
        throw new CodeExchangeError('Failed to exchange authorization code', {
          cause: error,
          errorType: oauthErrorType(error),
        });
      }
    });
  }

  /**
   * Refresh access token. Keeps the old refresh token when none is reissued.
   */
  async refreshToken(refreshToken: string): Promise<TokenResponse> {
    return withOAuthSpan('refreshToken', this.config.clientId, async () => {
      const client = this.getOAuth2Client();

      try {
        const tokenSet = await client.refresh(refreshToken);
        const response = this.toTokenResponse(tokenSet);

        return {
          ...response,
          refresh_token: response.refresh_token ?? refreshToken,
        };
      } catch (error) {
        this.logger.error('Token refresh failed', { error: errorMessage(error) });
        throw new TokenRefreshError('Failed to refresh token', {
          cause: error,
          errorType: oauthErrorType(error),
        });
      }
    });
  }

  private getOAuth2Client(): BaseClient {
    if (!this.client) {
      throw new AuthConfigError('AuthCore not initialized, call initialize() first');
    }
    return this.client;
  }

  private toTokenResponse(tokenSet: TokenSet): TokenResponse {
    if (!tokenSet.access_token) {
      throw new CodeExchangeError('Token response did not include an access_token');
    }

    let expiresIn = DEFAULT_EXPIRES_IN_SECONDS;
    if (typeof tokenSet.expires_in === 'number' && Number.isFinite(tokenSet.expires_in)) {
      expiresIn = Math.round(tokenSet.expires_in);
    } else {
      this.logger.warn('Token response without expires_in, assuming default lifetime', {
        expiresIn,
      });
    }

    const response: TokenResponse = {
      access_token: tokenSet.access_token,
      token_type: tokenSet.token_type ?? 'Bearer',
      expires_in: expiresIn,
      scope: tokenSet.scope ?? this.config.scopes.join(' '),
    };
    if (tokenSet.refresh_token) {
      response.refresh_token = tokenSet.refresh_token;
    }
    return response;
  }

  private async createOAuth2Client(): Promise<BaseClient> {
    const cfg = this.config;
    let issuer: Issuer;

    if (cfg.authorizationEndpoint && cfg.tokenEndpoint) {
      issuer = this.createIssuer(cfg.authorizationEndpoint, cfg.tokenEndpoint);
    } else if (cfg.provider) {
      const preset = PROVIDER_PRESETS[cfg.provider];
      issuer = this.createIssuer(preset.authorizationEndpoint, preset.tokenEndpoint);
    } else if (cfg.issuer) {
      issuer = await this.discoverIssuer(cfg.issuer);
      this.discovered = true;
    } else {
      throw new AuthConfigError(
        'Cannot configure OAuth2 client - missing authorization and token endpoints',
        { clientId: cfg.clientId }
      );
    }

    // Public client: PKCE replaces the client secret
    return new issuer.Client({
      client_id: cfg.clientId,
      token_endpoint_auth_method: 'none',
      redirect_uris: [cfg.redirectUri],
      response_types: ['code'],
    });
  }

  private async discoverIssuer(issuerUrl: string): Promise<Issuer> {
    try {
      return await Issuer.discover(issuerUrl);
    } catch (error) {
      throw new AuthConfigError(`OAuth discovery failed for ${issuerUrl}`, {
        issuer: issuerUrl,
        cause: error,
      });
    }
  }

  private createIssuer(authorizationEndpoint: string, tokenEndpoint: string): Issuer {
    return new Issuer({
      issuer: new URL(authorizationEndpoint).origin,
      authorization_endpoint: authorizationEndpoint,
      token_endpoint: tokenEndpoint,
      token_endpoint_auth_methods_supported: ['none'],
    });
  }
}
