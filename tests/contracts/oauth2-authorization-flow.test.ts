/**
 * Contract test: OAuth2 authorization URL flow
 *
 * Drives a GenericOAuth2ResourceOwner through the AuthFlowCoordinator:
 * - redirect target selection for login and connect
 * - authorization URL parameters
 * - user response path mapping
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuthFlowCoordinator } from '../../src/core/auth/AuthFlowCoordinator';
import { ResourceOwnerRegistry } from '../../src/core/auth/ResourceOwnerRegistry';
import { GenericOAuth2ResourceOwner } from '../../src/core/auth/GenericOAuth2ResourceOwner';

describe('OAuth2 Authorization Flow Contract', () => {
  const isAuthenticatedAtLeastRemembered = vi.fn();
  const router = {
    generate: (route: string, params: Record<string, string>, absolute: boolean) =>
      `${absolute ? 'https://app.example.com' : ''}/${route}/${params.service ?? ''}`,
  };
  const uriResolver = {
    resolveAbsoluteFromPath: (path: string) => `https://app.example.com${path}`,
  };

  const github = new GenericOAuth2ResourceOwner({
    name: 'github',
    clientId: 'test-github-client',
    clientSecret: 'test-github-secret',
    authorizationEndpoint: 'https://github.example.com/login/oauth/authorize',
    tokenEndpoint: 'https://github.example.com/login/oauth/access_token',
    scopes: ['read:user', 'user:email'],
    paths: { identifier: 'id', nickname: 'login', email: 'email', realname: 'name' },
  });

  const registry = new ResourceOwnerRegistry([
    { name: 'github', resourceOwner: github, checkPath: '/login/check-github' },
  ]);

  let coordinator: AuthFlowCoordinator;

  beforeEach(() => {
    isAuthenticatedAtLeastRemembered.mockReset();
    coordinator = new AuthFlowCoordinator(
      { registry, router, authState: { isAuthenticatedAtLeastRemembered }, uriResolver },
      { connect: true }
    );
  });

  it('should build a login authorization URL back to the check path', () => {
    isAuthenticatedAtLeastRemembered.mockReturnValue(false);

    const url = new URL(coordinator.buildAuthorizationUrl('github'));

    expect(`${url.origin}${url.pathname}`).toBe('https://github.example.com/login/oauth/authorize');
    expect(url.searchParams.get('client_id')).toBe('test-github-client');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('redirect_uri')).toBe('https://app.example.com/login/check-github');
    expect(url.searchParams.get('scope')).toBe('read:user user:email');
    expect(url.searchParams.has('state')).toBe(false);
  });

  it('should redirect an authenticated user to the connect route', () => {
    isAuthenticatedAtLeastRemembered.mockReturnValue(true);

    const url = new URL(coordinator.buildAuthorizationUrl('github'));

    expect(url.searchParams.get('redirect_uri')).toBe(
      'https://app.example.com/connect_service/github'
    );
  });

  it('should let extra parameters override defaults', () => {
    isAuthenticatedAtLeastRemembered.mockReturnValue(true);

    const url = new URL(
      coordinator.buildAuthorizationUrl('github', 'https://app.example.com/settings', {
        state: 'fixed-state',
        allow_signup: 'false',
      })
    );

    expect(url.searchParams.get('redirect_uri')).toBe('https://app.example.com/settings');
    expect(url.searchParams.get('state')).toBe('fixed-state');
    expect(url.searchParams.get('allow_signup')).toBe('false');
  });

  it('should carry a caller-kept state through to the URL', () => {
    isAuthenticatedAtLeastRemembered.mockReturnValue(false);
    const state = GenericOAuth2ResourceOwner.createState();

    const url = new URL(coordinator.buildAuthorizationUrl('github', undefined, { state }));

    expect(state).toMatch(/^[A-Za-z0-9_-]{20,}$/);
    expect(url.searchParams.get('state')).toBe(state);
  });

  it('should create a different state each time', () => {
    expect(GenericOAuth2ResourceOwner.createState()).not.toBe(
      GenericOAuth2ResourceOwner.createState()
    );
  });

  it('should omit scope when none is configured', () => {
    const owner = new GenericOAuth2ResourceOwner({
      name: 'minimal',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      authorizationEndpoint: 'https://idp.example.com/authorize',
      scopes: [],
    });

    const url = new URL(owner.getAuthorizationUrl('https://app.example.com/cb'));

    expect(url.searchParams.has('scope')).toBe(false);
  });

  it('should map the user response through the configured paths', () => {
    const response = github.createUserResponse(
      '{"id":583231,"login":"octo","name":"Octo Cat","email":null}'
    );

    expect(response.getUsername()).toBe(583231);
    expect(response.getNickname()).toBe('octo');
    expect(response.getRealName()).toBe('Octo Cat');
    expect(response.getEmail()).toBeNull();
    expect(response.getProfilePicture()).toBeUndefined();
  });
});
