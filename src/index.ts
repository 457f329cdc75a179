// src/index.ts

export { AuthFlowSDK } from './sdk';
export type { InitConfig, AuthFlowCollaborators } from './sdk';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';

// Request signing
export {
  signRequest,
  percentEncode,
  normalizeParameters,
  buildBaseString,
  buildAuthorizationHeader,
  parseSignatureMethod,
} from './core/signature/SignatureEngine';
export { SIGNATURE_METHODS, REQUIRED_OAUTH_PARAMETERS } from './core/signature/types';
export type { SignatureMethod, OAuthParameters } from './core/signature/types';

// Authorization flow
export { AuthFlowCoordinator, DEFAULT_ROUTES } from './core/auth/AuthFlowCoordinator';
export type { AuthFlowDeps } from './core/auth/AuthFlowCoordinator';
export { ResourceOwnerRegistry } from './core/auth/ResourceOwnerRegistry';
export { GenericOAuth2ResourceOwner } from './core/auth/GenericOAuth2ResourceOwner';
export type { OAuth2ResourceOwnerConfig } from './core/auth/GenericOAuth2ResourceOwner';
export { OAuth1Client } from './core/auth/OAuth1Client';
export type { OAuth1Config, OAuth1RequestToken, OAuth1AccessToken } from './core/auth/OAuth1Client';
export type {
  ResourceOwner,
  ResourceOwnerEntry,
  Router,
  AuthenticationState,
  UriResolver,
  AuthFlowOptions,
  AuthFlowRoutes,
  ExtraParameters,
} from './core/auth/types';

// User responses
export { PathUserResponse, DEFAULT_PATHS, mergePaths } from './core/response/PathUserResponse';
export { ProfileUserResponse } from './core/response/ProfileUserResponse';
export type { UserProfile } from './core/response/ProfileUserResponse';
export { UserNormalizer, NormalizedUserSchema } from './core/response/UserNormalizer';
export type {
  UserResponse,
  NormalizedUser,
  PathMap,
  ResponseData,
  ResponseValue,
} from './core/response/types';

export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  SDKError,
  OAuthError,
  OAuthConfigError,
  ValidationError,
  LookupError,
  CryptoError,
} from './utils/errors';
