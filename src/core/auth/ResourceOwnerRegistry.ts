// src/core/auth/ResourceOwnerRegistry.ts

import type { ResourceOwner, ResourceOwnerEntry } from './types';
import { OAuthConfigError } from '../../utils/errors';

/**
 * Read-only map of resource owners for one firewall.
 * Iteration follows registration order.
 */
export class ResourceOwnerRegistry {
  private readonly entries: ReadonlyMap<string, ResourceOwnerEntry>;

  constructor(entries: ReadonlyArray<ResourceOwnerEntry>) {
    const map = new Map<string, ResourceOwnerEntry>();
    for (const entry of entries) {
      if (map.has(entry.name)) {
        throw new OAuthConfigError(`Resource owner ${entry.name} registered twice`, {
          name: entry.name,
        });
      }
      map.set(entry.name, entry);
    }
    this.entries = map;
  }

  getResourceOwners(): string[] {
    return Array.from(this.entries.keys());
  }

  hasResourceOwnerByName(name: string): boolean {
    return this.entries.has(name);
  }

  getResourceOwnerByName(name: string): ResourceOwner | undefined {
    return this.entries.get(name)?.resourceOwner;
  }

  getResourceOwnerCheckPath(name: string): string | undefined {
    return this.entries.get(name)?.checkPath;
  }

  /**
   * Find the owner whose check path matches an incoming request path.
   * Any query string on the path is ignored.
   */
  getResourceOwnerByCheckPath(
    path: string
  ): { name: string; resourceOwner: ResourceOwner } | undefined {
    const [pathname] = path.split('?');
    for (const entry of this.entries.values()) {
      if (entry.checkPath === pathname) {
        return { name: entry.name, resourceOwner: entry.resourceOwner };
      }
    }
    return undefined;
  }
}
