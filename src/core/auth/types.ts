// src/core/auth/types.ts

export type ExtraParameters = Record<string, string>;

/**
 * Provider definition able to build its own authorization URL
 */
export interface ResourceOwner {
  getAuthorizationUrl(redirectUrl: string, extraParameters: ExtraParameters): string;
}

export interface ResourceOwnerEntry {
  name: string;
  resourceOwner: ResourceOwner;
  checkPath: string; // Local endpoint the provider redirects back to
}

export interface Router {
  generate(routeName: string, params: Record<string, string>, absolute: boolean): string;
}

export interface AuthenticationState {
  isAuthenticatedAtLeastRemembered(): boolean;
}

export interface UriResolver {
  resolveAbsoluteFromPath(path: string): string;
}

export interface AuthFlowRoutes {
  connectService: string;
  serviceRedirect: string;
}

export interface AuthFlowOptions {
  connect: boolean;
  routes?: Partial<AuthFlowRoutes>;
}

export type RedirectTarget = 'check_path' | 'connect' | 'explicit';
