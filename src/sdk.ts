// src/sdk.ts

import type {
  AuthenticationState,
  ExtraParameters,
  ResourceOwner,
  ResourceOwnerEntry,
  Router,
  UriResolver,
} from './core/auth/types';
import type { NormalizedUser, PathMap, ResponseData } from './core/response/types';
import { AuthFlowCoordinator } from './core/auth/AuthFlowCoordinator';
import { ResourceOwnerRegistry } from './core/auth/ResourceOwnerRegistry';
import { GenericOAuth2ResourceOwner } from './core/auth/GenericOAuth2ResourceOwner';
import { PathUserResponse } from './core/response/PathUserResponse';
import { UserNormalizer } from './core/response/UserNormalizer';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import {
  validateConfig,
  type InitConfig,
  type ResourceOwnerConfig,
  type ValidatedConfig,
} from './config/ConfigValidator';
import { LookupError, OAuthConfigError } from './utils/errors';

export type { InitConfig };

/**
 * Capabilities owned by the host application
 */
export interface AuthFlowCollaborators {
  router: Router;
  authState: AuthenticationState;
  uriResolver: UriResolver;
  resourceOwners?: Record<string, ResourceOwner>; // Instances for 'custom' owners
}

interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  registry: ResourceOwnerRegistry;
  coordinator: AuthFlowCoordinator;
  normalizer: UserNormalizer;
}

export class AuthFlowSDK {
  private core: CoreDeps;
  private paths: Map<string, PathMap> = new Map();

  private constructor(config: ValidatedConfig, collaborators: AuthFlowCollaborators) {
    // Build ALL dependencies FIRST
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const owners = config.firewalls[config.firewall];

    const entries: ResourceOwnerEntry[] = Object.entries(owners).map(([name, ownerConfig]) => {
      if (ownerConfig.paths) this.paths.set(name, ownerConfig.paths);
      return {
        name,
        resourceOwner: this.createResourceOwner(name, ownerConfig, collaborators, logger),
        checkPath: ownerConfig.checkPath,
      };
    });

    const registry = new ResourceOwnerRegistry(entries);
    const coordinator = new AuthFlowCoordinator(
      {
        registry,
        router: collaborators.router,
        authState: collaborators.authState,
        uriResolver: collaborators.uriResolver,
        logger,
        metrics,
      },
      { connect: config.connect, routes: config.routes }
    );

    this.core = { logger, metrics, registry, coordinator, normalizer: new UserNormalizer() };
  }

  /**
   * Create the SDK for one firewall
   *
   * @param config - Firewalls, the firewall to bind, connect mode, logging and metrics
   * @param collaborators - Router, authentication state and URI resolver of the host app
   * @throws {z.ZodError} If the configuration is invalid
   * @throws {OAuthConfigError} If a 'custom' owner has no instance in collaborators
   *
   * @example
   * ```typescript
   * const sdk = AuthFlowSDK.create({
   *   firewall: 'main',
   *   connect: true,
   *   firewalls: {
   *     main: {
   *       github: {
   *         type: 'oauth2',
   *         checkPath: '/login/check-github',
   *         clientId: process.env.GITHUB_CLIENT_ID,
   *         clientSecret: process.env.GITHUB_CLIENT_SECRET,
   *         authorizationEndpoint: 'https://github.com/login/oauth/authorize',
   *         scopes: ['read:user'],
   *         paths: { identifier: 'id', nickname: 'login' },
   *       },
   *     },
   *   },
   * }, { router, authState, uriResolver });
   *
   * res.redirect(sdk.getAuthorizationUrl('github'));
   * ```
   */
  static create(config: InitConfig, collaborators: AuthFlowCollaborators): AuthFlowSDK {
    // Validate configuration (fail-fast with clear errors)
    const validatedConfig = validateConfig(config);

    const sdk = new AuthFlowSDK(validatedConfig, collaborators);

    sdk.core.logger.info('SDK initialized', {
      firewall: validatedConfig.firewall,
      connect: validatedConfig.connect,
      providers: sdk.listProviders(),
    });

    return sdk;
  }

  get logger(): Logger {
    return this.core.logger;
  }

  get metrics(): MetricsCollector {
    return this.core.metrics;
  }

  get registry(): ResourceOwnerRegistry {
    return this.core.registry;
  }

  listProviders(): string[] {
    return this.core.coordinator.listProviders();
  }

  getAuthorizationUrl(
    name: string,
    redirectUrl?: string,
    extraParameters?: ExtraParameters
  ): string {
    return this.core.coordinator.buildAuthorizationUrl(name, redirectUrl, extraParameters);
  }

  getLoginUrl(name: string): string {
    return this.core.coordinator.buildLoginUrl(name);
  }

  /**
   * Wrap a provider's user-information response with that provider's paths
   *
   * @throws {LookupError} If no resource owner is registered under name
   */
  createUserResponse(name: string, response: ResponseData | string): PathUserResponse {
    if (!this.core.registry.hasResourceOwnerByName(name)) {
      throw new LookupError(`No resource owner with name '${name}'.`, { name });
    }
    return new PathUserResponse(response, this.paths.get(name));
  }

  normalizeUser(name: string, response: ResponseData | string): NormalizedUser {
    return this.core.normalizer.normalize(name, this.createUserResponse(name, response));
  }

  private createResourceOwner(
    name: string,
    ownerConfig: ResourceOwnerConfig,
    collaborators: AuthFlowCollaborators,
    logger: Logger
  ): ResourceOwner {
    switch (ownerConfig.type) {
      case 'oauth2':
        return new GenericOAuth2ResourceOwner(
          {
            name,
            clientId: ownerConfig.clientId,
            clientSecret: ownerConfig.clientSecret,
            authorizationEndpoint: ownerConfig.authorizationEndpoint,
            tokenEndpoint: ownerConfig.tokenEndpoint,
            scopes: ownerConfig.scopes,
            paths: ownerConfig.paths,
          },
          logger
        );
      case 'custom': {
        const resourceOwner = collaborators.resourceOwners?.[name];
        if (!resourceOwner) {
          throw new OAuthConfigError(`Resource owner ${name} is configured as custom but was not provided`, {
            name,
          });
        }
        return resourceOwner;
      }
    }
  }
}
