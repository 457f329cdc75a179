// src/core/signature/types.ts

export const SIGNATURE_METHODS = ['HMAC-SHA1', 'RSA-SHA1', 'PLAINTEXT'] as const;

export type SignatureMethod = (typeof SIGNATURE_METHODS)[number];

// Must be present before a request can be signed
export const REQUIRED_OAUTH_PARAMETERS = [
  'oauth_consumer_key',
  'oauth_timestamp',
  'oauth_nonce',
  'oauth_version',
  'oauth_signature_method',
] as const;

export type OAuthParameters = Readonly<Record<string, string>>;
