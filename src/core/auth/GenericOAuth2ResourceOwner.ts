// src/core/auth/GenericOAuth2ResourceOwner.ts

import { Issuer, generators, type Client } from 'openid-client';
import type { ExtraParameters, ResourceOwner } from './types';
import type { PathMap, ResponseData } from '../response/types';
import type { Logger } from '../../observability/Logger';
import { PathUserResponse } from '../response/PathUserResponse';

export interface OAuth2ResourceOwnerConfig {
  name: string;
  clientId: string;
  clientSecret: string;
  authorizationEndpoint: string;
  tokenEndpoint?: string;
  scopes: string[];
  paths?: PathMap;
}

/**
 * OAuth2 resource owner configured entirely from endpoints (no discovery)
 */
export class GenericOAuth2ResourceOwner implements ResourceOwner {
  private client: Client;

  constructor(
    private readonly config: OAuth2ResourceOwnerConfig,
    private readonly logger?: Logger
  ) {
    const issuer = new Issuer({
      issuer: config.name,
      authorization_endpoint: config.authorizationEndpoint,
      token_endpoint: config.tokenEndpoint,
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      response_types: ['code'],
    });
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Random value for the `state` parameter. The caller keeps it (session,
   * cookie) and compares it with the one returned on the check path.
   */
  static createState(): string {
    return generators.state();
  }

  /**
   * Build the provider authorization URL
   *
   * No state is added here; pass one from `createState()` in extraParameters.
   */
  getAuthorizationUrl(redirectUrl: string, extraParameters: ExtraParameters = {}): string {
    const authUrl = this.client.authorizationUrl({
      redirect_uri: redirectUrl,
      scope: this.config.scopes.length > 0 ? this.config.scopes.join(' ') : undefined,
      ...extraParameters,
    });

    this.logger?.debug('Created OAuth2 authorization URL', {
      provider: this.config.name,
      redirectUrl,
    });
    return authUrl;
  }

  /**
   * Wrap a user-information response with this owner's configured paths
   */
  createUserResponse(response: ResponseData | string): PathUserResponse {
    return new PathUserResponse(response, this.config.paths);
  }
}
