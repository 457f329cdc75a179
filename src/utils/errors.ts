// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// OAuth errors
export class OAuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

// Bad input: missing signing parameter, unknown signature method, unparseable response
export class ValidationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

// Unknown resource owner name
export class LookupError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LOOKUP_ERROR', details);
  }
}

// Private key load, parse or sign failure
export class CryptoError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CRYPTO_ERROR', details);
  }
}
