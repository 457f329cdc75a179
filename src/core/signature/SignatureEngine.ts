/**
 * OAuth 1.0 request signing (RFC 5849 §3.4)
 *
 * Every function here is pure: timestamp and nonce come in through the
 * parameters, so identical input always yields an identical signature.
 *
 * @example
 * ```typescript
 * const signature = signRequest('POST', 'https://api.example.com/token', {
 *   oauth_consumer_key: 'ck',
 *   oauth_timestamp: '1',
 *   oauth_nonce: 'n',
 *   oauth_version: '1.0',
 *   oauth_signature_method: 'HMAC-SHA1',
 * }, 'secret');
 * ```
 */

import crypto from 'crypto';
import fs from 'fs';
import { CryptoError, ValidationError } from '../../utils/errors';
import {
  REQUIRED_OAUTH_PARAMETERS,
  SIGNATURE_METHODS,
  type OAuthParameters,
  type SignatureMethod,
} from './types';

/**
 * Percent-encode for OAuth (RFC 3986)
 *
 * @throws {ValidationError} If str holds a lone surrogate
 */
export function percentEncode(str: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(str);
  } catch (error) {
    throw new ValidationError('String is not well-formed UTF-16', { cause: error });
  }
  return encoded
    .replace(/!/g, '%21')
    .replace(/'/g, '%27')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/\*/g, '%2A');
}

/**
 * Narrow a string-sourced method name to a SignatureMethod
 */
export function parseSignatureMethod(value: string): SignatureMethod {
  const method = SIGNATURE_METHODS.find((candidate) => candidate === value);
  if (!method) {
    throw new ValidationError(`Unknown signature method selected ${value}.`, {
      signatureMethod: value,
    });
  }
  return method;
}

// Byte-wise ordering of the UTF-8 encodings, not locale-aware
function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function encodePair(key: string, value: string): string {
  try {
    return `${percentEncode(key)}=${percentEncode(value)}`;
  } catch (error) {
    throw new ValidationError(`Parameter "${key}" cannot be percent-encoded.`, {
      parameter: key,
      cause: error,
    });
  }
}

/**
 * Build the normalized parameter string (RFC 5849 §3.4.1.3.2).
 * oauth_signature is always excluded.
 */
export function normalizeParameters(parameters: OAuthParameters): string {
  return Object.keys(parameters)
    .filter((key) => key !== 'oauth_signature')
    .sort(compareBytes)
    .map((key) => encodePair(key, parameters[key]))
    .join('&');
}

export function buildBaseString(method: string, url: string, parameters: OAuthParameters): string {
  return [
    method.toUpperCase(),
    percentEncode(url),
    percentEncode(normalizeParameters(parameters)),
  ].join('&');
}

function assertRequiredParameters(parameters: OAuthParameters): void {
  for (const parameter of REQUIRED_OAUTH_PARAMETERS) {
    if (!(parameter in parameters)) {
      throw new ValidationError(`Parameter "${parameter}" must be set.`, { parameter });
    }
  }
}

function signWithPrivateKey(baseString: string, keyPath: string, passphrase: string): Buffer {
  let pem: string;
  try {
    pem = fs.readFileSync(keyPath, 'utf8');
  } catch (error) {
    throw new CryptoError(`Unable to read private key "${keyPath}"`, { keyPath, cause: error });
  }

  try {
    const privateKey = crypto.createPrivateKey({
      key: pem,
      format: 'pem',
      passphrase: passphrase === '' ? undefined : passphrase,
    });
    return crypto.sign('sha1', Buffer.from(baseString, 'utf8'), privateKey);
  } catch (error) {
    throw new CryptoError('Failed to sign base string with RSA-SHA1', { keyPath, cause: error });
  }
}

function computeSignature(
  signatureMethod: SignatureMethod,
  baseString: string,
  clientSecret: string,
  tokenSecret: string
): Buffer {
  switch (signatureMethod) {
    case 'HMAC-SHA1': {
      const signingKey = [percentEncode(clientSecret), percentEncode(tokenSecret)].join('&');
      return crypto.createHmac('sha1', signingKey).update(baseString).digest();
    }
    case 'RSA-SHA1':
      // clientSecret is the key path, tokenSecret its passphrase
      return signWithPrivateKey(baseString, clientSecret, tokenSecret);
    case 'PLAINTEXT':
      // Base64 of the base string, not the RFC's raw "secret&secret"
      return Buffer.from(baseString, 'utf8');
    default: {
      const unreachable: never = signatureMethod;
      throw new ValidationError(`Unknown signature method selected ${String(unreachable)}.`);
    }
  }
}

/**
 * Sign the request parameters
 *
 * @param method - HTTP method
 * @param url - Request URL, without query string
 * @param parameters - Request parameters including the oauth_* set
 * @param clientSecret - Consumer secret, or the PEM key path for RSA-SHA1
 * @param tokenSecret - Token secret, or the key passphrase for RSA-SHA1
 * @param signatureMethod - Defaults to HMAC-SHA1; string input is validated
 * @returns Base64-encoded signature
 * @throws {ValidationError} Missing required parameter or unknown method
 * @throws {CryptoError} RSA key could not be loaded or used
 */
export function signRequest(
  method: string,
  url: string,
  parameters: OAuthParameters,
  clientSecret: string,
  tokenSecret: string = '',
  signatureMethod: SignatureMethod | string = 'HMAC-SHA1'
): string {
  assertRequiredParameters(parameters);
  const resolvedMethod = parseSignatureMethod(signatureMethod);
  const baseString = buildBaseString(method, url, parameters);

  return computeSignature(resolvedMethod, baseString, clientSecret, tokenSecret).toString('base64');
}

/**
 * Build OAuth Authorization header (RFC 5849 §3.5.1)
 */
export function buildAuthorizationHeader(parameters: OAuthParameters, realm?: string): string {
  const oauthParams = Object.keys(parameters)
    .filter((key) => key.startsWith('oauth_'))
    .sort(compareBytes)
    .map((key) => `${percentEncode(key)}="${percentEncode(parameters[key])}"`);

  if (realm !== undefined) {
    oauthParams.unshift(`realm="${realm}"`);
  }

  return `OAuth ${oauthParams.join(', ')}`;
}
