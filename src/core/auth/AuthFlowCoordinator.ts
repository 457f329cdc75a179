// src/core/auth/AuthFlowCoordinator.ts

import type {
  AuthenticationState,
  AuthFlowOptions,
  AuthFlowRoutes,
  ExtraParameters,
  RedirectTarget,
  ResourceOwner,
  Router,
  UriResolver,
} from './types';
import type { ResourceOwnerRegistry } from './ResourceOwnerRegistry';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { LookupError } from '../../utils/errors';

export const DEFAULT_ROUTES: AuthFlowRoutes = {
  connectService: 'connect_service',
  serviceRedirect: 'service_redirect',
};

export interface AuthFlowDeps {
  registry: ResourceOwnerRegistry;
  router: Router;
  authState: AuthenticationState;
  uriResolver: UriResolver;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Resolves which resource owner handles a login/connect request and
 * where the provider should send the user back to.
 *
 * Collaborator errors (router, owner, authentication state) are not caught.
 */
export class AuthFlowCoordinator {
  private readonly connect: boolean;
  private readonly routes: AuthFlowRoutes;

  constructor(
    private readonly deps: AuthFlowDeps,
    options: AuthFlowOptions
  ) {
    this.connect = options.connect;
    this.routes = { ...DEFAULT_ROUTES, ...options.routes };
  }

  listProviders(): string[] {
    return this.deps.registry.getResourceOwners();
  }

  /**
   * Build the provider authorization URL
   *
   * @param name - Resource owner name
   * @param redirectUrl - Used only in connect mode for an authenticated user
   * @param extraParameters - Forwarded to the resource owner
   * @throws {LookupError} If no resource owner is registered under name
   */
  buildAuthorizationUrl(
    name: string,
    redirectUrl?: string,
    extraParameters: ExtraParameters = {}
  ): string {
    const resourceOwner = this.getResourceOwner(name);
    const checkPath = this.deps.registry.getResourceOwnerCheckPath(name) ?? '';

    let target: RedirectTarget;
    let effectiveRedirect: string;

    if (!this.connect || !this.deps.authState.isAuthenticatedAtLeastRemembered()) {
      target = 'check_path';
      effectiveRedirect = this.generateUri(checkPath);
    } else if (redirectUrl === undefined) {
      target = 'connect';
      effectiveRedirect = this.deps.router.generate(
        this.routes.connectService,
        { service: name },
        true
      );
    } else {
      target = 'explicit';
      effectiveRedirect = redirectUrl;
    }

    const authUrl = resourceOwner.getAuthorizationUrl(effectiveRedirect, extraParameters);

    this.deps.metrics?.incrementCounter('authorization_urls_total', { provider: name, target });
    this.deps.logger?.debug('Built authorization URL', {
      provider: name,
      target,
      redirectUrl: effectiveRedirect,
    });

    return authUrl;
  }

  /**
   * Build the local URL that starts the login redirect for a provider
   *
   * @throws {LookupError} If no resource owner is registered under name
   */
  buildLoginUrl(name: string): string {
    // Only checks that the owner exists
    this.getResourceOwner(name);

    const loginUrl = this.deps.router.generate(
      this.routes.serviceRedirect,
      { service: name },
      false
    );

    this.deps.metrics?.incrementCounter('login_urls_total', { provider: name });
    return loginUrl;
  }

  private getResourceOwner(name: string): ResourceOwner {
    const resourceOwner = this.deps.registry.getResourceOwnerByName(name);
    if (!resourceOwner) {
      throw new LookupError(`No resource owner with name '${name}'.`, { name });
    }
    return resourceOwner;
  }

  /**
   * Absolute URL for a check path: URLs pass through, "/..." is resolved
   * against the current request, anything else is a route name.
   */
  private generateUri(path: string): string {
    if (!path || path.startsWith('http')) {
      return path;
    }

    if (path.startsWith('/')) {
      return this.deps.uriResolver.resolveAbsoluteFromPath(path);
    }

    return this.deps.router.generate(path, {}, true);
  }
}
