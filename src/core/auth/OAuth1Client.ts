import crypto from 'crypto';
import axios from 'axios';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { OAuthParameters, SignatureMethod } from '../signature/types';
import type { ExtraParameters } from './types';
import { buildAuthorizationHeader, signRequest } from '../signature/SignatureEngine';
import { OAuthError, SDKError, ValidationError } from '../../utils/errors';

/**
 * OAuth1 configuration for a provider
 */
export interface OAuth1Config {
  consumerKey: string;
  consumerSecret: string; // Path to the PEM private key when signatureMethod is RSA-SHA1
  privateKeyPassphrase?: string;
  requestTokenUrl: string;
  authorizeUrl: string;
  accessTokenUrl: string;
  signatureMethod?: SignatureMethod;
  version?: '1.0';
  realm?: string;
}

/**
 * OAuth1 request token response
 */
export interface OAuth1RequestToken {
  token: string;
  tokenSecret: string;
  callbackConfirmed?: boolean;
}

/**
 * OAuth1 access token response
 */
export interface OAuth1AccessToken {
  token: string;
  tokenSecret: string;
  params: Record<string, string>; // Everything else the provider returned
}

type OAuth1Step = 'request_token' | 'access_token';

/**
 * OAuth 1.0a client implementation
 *
 * Implements the three-legged flow against any RFC 5849 provider.
 * Signatures come from the SignatureEngine, so HMAC-SHA1, RSA-SHA1 and
 * PLAINTEXT are all available.
 *
 * @example
 * ```typescript
 * const oauth1 = new OAuth1Client(config, logger);
 * const { authUrl, requestToken } = await oauth1.getAuthorizationUrl(callbackUrl);
 * // ... user authorizes ...
 * const accessToken = await oauth1.getAccessToken(requestToken, verifier);
 * ```
 */
export class OAuth1Client {
  private config: OAuth1Config & { signatureMethod: SignatureMethod; version: '1.0' };
  private logger: Logger;
  private metrics?: MetricsCollector;

  constructor(config: OAuth1Config, logger: Logger, metrics?: MetricsCollector) {
    this.config = {
      ...config,
      signatureMethod: config.signatureMethod ?? 'HMAC-SHA1',
      version: config.version ?? '1.0',
    };
    this.logger = logger;
    this.metrics = metrics;
  }

  /**
   * Step 1: Get request token and authorization URL
   *
   * @param callbackUrl - OAuth callback URL
   * @param extraParameters - Appended to the authorization URL
   */
  async getAuthorizationUrl(
    callbackUrl: string,
    extraParameters: ExtraParameters = {}
  ): Promise<{
    authUrl: string;
    requestToken: OAuth1RequestToken;
  }> {
    const params = await this.requestTokenEndpoint(
      'request_token',
      this.config.requestTokenUrl,
      { oauth_callback: callbackUrl },
      ''
    );

    const requestToken: OAuth1RequestToken = {
      token: params.oauth_token ?? '',
      tokenSecret: params.oauth_token_secret ?? '',
      callbackConfirmed: params.oauth_callback_confirmed === 'true',
    };

    if (!requestToken.token || !requestToken.tokenSecret) {
      throw new OAuthError('Invalid request token response', {
        provider: 'oauth1',
        errorType: 'invalid_response',
      });
    }

    const authUrl = new URL(this.config.authorizeUrl);
    authUrl.searchParams.set('oauth_token', requestToken.token);
    for (const [key, value] of Object.entries(extraParameters)) {
      authUrl.searchParams.set(key, value);
    }

    this.logger.info('OAuth1 request token obtained', {
      tokenLength: requestToken.token.length,
      callbackConfirmed: requestToken.callbackConfirmed,
    });

    return { authUrl: authUrl.toString(), requestToken };
  }

  /**
   * Step 3: Exchange request token + verifier for access token
   */
  async getAccessToken(
    requestToken: OAuth1RequestToken,
    verifier: string
  ): Promise<OAuth1AccessToken> {
    const params = await this.requestTokenEndpoint(
      'access_token',
      this.config.accessTokenUrl,
      { oauth_token: requestToken.token, oauth_verifier: verifier },
      requestToken.tokenSecret
    );

    const { oauth_token: token, oauth_token_secret: tokenSecret, ...rest } = params;
    if (!token || !tokenSecret) {
      throw new OAuthError('Invalid access token response', {
        provider: 'oauth1',
        errorType: 'invalid_response',
      });
    }

    this.logger.info('OAuth1 access token obtained', { extraFields: Object.keys(rest) });

    return { token, tokenSecret, params: rest };
  }

  /**
   * Sign an OAuth1 request
   *
   * A query string on url is signed as request parameters and left out of
   * the base string URI; params win over a query parameter of the same name.
   *
   * @param params - Query or form parameters sent with the request
   * @returns Authorization header value
   * @throws {ValidationError} If url is not absolute
   */
  signRequest(
    method: string,
    url: string,
    params: Record<string, string>,
    token: string,
    tokenSecret: string
  ): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new ValidationError(`Invalid request URL: ${url}`, { cause: error });
    }
    const baseUrl = `${parsed.origin}${parsed.pathname}`;
    const queryParams = Object.fromEntries(parsed.searchParams);

    const oauthParams = {
      ...this.baseOAuthParameters(),
      oauth_token: token,
    };

    const signature = this.sign(
      method,
      baseUrl,
      { ...queryParams, ...params, ...oauthParams },
      tokenSecret
    );

    return buildAuthorizationHeader(
      { ...oauthParams, oauth_signature: signature },
      this.config.realm
    );
  }

  private async requestTokenEndpoint(
    step: OAuth1Step,
    url: string,
    stepParams: Record<string, string>,
    tokenSecret: string
  ): Promise<Record<string, string>> {
    const oauthParams = { ...this.baseOAuthParameters(), ...stepParams };
    const signature = this.sign('POST', url, oauthParams, tokenSecret);
    const authHeader = buildAuthorizationHeader(
      { ...oauthParams, oauth_signature: signature },
      this.config.realm
    );

    try {
      const response = await axios.post<string>(url, null, {
        headers: {
          Authorization: authHeader,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        responseType: 'text',
      });

      this.metrics?.incrementCounter('oauth1_requests_total', { step, status: 'success' });
      return Object.fromEntries(new URLSearchParams(response.data));
    } catch (error) {
      this.metrics?.incrementCounter('oauth1_requests_total', { step, status: 'failure' });
      this.logger.error(`OAuth1 ${step} request failed`, {
        error: error instanceof Error ? error.message : String(error),
        url,
      });
      throw new OAuthError(`Failed to get OAuth1 ${step.replace('_', ' ')}`, {
        provider: 'oauth1',
        cause: error,
        errorType: `${step}_failed`,
      });
    }
  }

  private sign(method: string, url: string, params: OAuthParameters, tokenSecret: string): string {
    // RSA-SHA1 takes the key passphrase where HMAC takes the token secret
    const secondSecret =
      this.config.signatureMethod === 'RSA-SHA1'
        ? (this.config.privateKeyPassphrase ?? '')
        : tokenSecret;

    try {
      return signRequest(
        method,
        url,
        params,
        this.config.consumerSecret,
        secondSecret,
        this.config.signatureMethod
      );
    } catch (error) {
      if (error instanceof SDKError) {
        this.logger.error('OAuth1 signing failed', { code: error.code, url });
      }
      throw error;
    }
  }

  private baseOAuthParameters(): Record<string, string> {
    return {
      oauth_consumer_key: this.config.consumerKey,
      oauth_nonce: this.generateNonce(),
      oauth_signature_method: this.config.signatureMethod,
      oauth_timestamp: this.getTimestamp(),
      oauth_version: this.config.version,
    };
  }

  /**
   * Generate random nonce
   */
  private generateNonce(): string {
    return crypto.randomBytes(16).toString('hex');
  }

  /**
   * Get current Unix timestamp
   */
  private getTimestamp(): string {
    return Math.floor(Date.now() / 1000).toString();
  }
}
