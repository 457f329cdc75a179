// src/core/response/PathUserResponse.ts

import type { PathMap, ResponseData, ResponseValue, UserResponse } from './types';
import { ValidationError } from '../../utils/errors';

export const DEFAULT_PATHS: Readonly<PathMap> = {
  identifier: null,
  nickname: null,
  realname: null,
  email: null,
  profilepicture: null,
};

/**
 * Merge path overrides into a path map. Overrides win; every other key keeps its value.
 */
export function mergePaths(current: Readonly<PathMap>, overrides: Readonly<PathMap>): PathMap {
  return { ...current, ...overrides };
}

function isResponseData(value: unknown): value is ResponseData {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// Canonical decimal index only: no sign, padding, exponent or hex
const ARRAY_INDEX = /^(0|[1-9]\d*)$/;

function childOf(value: ResponseValue, step: string): ResponseValue | undefined {
  if (Array.isArray(value)) {
    if (!ARRAY_INDEX.test(step)) {
      return undefined;
    }
    const index = Number(step);
    return index < value.length ? value[index] : undefined;
  }
  if (isResponseData(value) && Object.prototype.hasOwnProperty.call(value, step)) {
    return value[step];
  }
  return undefined;
}

/**
 * Reads user fields from a nested response through configurable dot-paths
 *
 * @example
 * ```typescript
 * const response = new PathUserResponse({ user: { login: 'bob' } });
 * response.setPaths({ nickname: 'user.login' });
 * response.getNickname(); // 'bob'
 * ```
 */
export class PathUserResponse implements UserResponse {
  private paths: PathMap = { ...DEFAULT_PATHS };
  private response?: ResponseData;

  constructor(response?: ResponseData | string, paths?: PathMap) {
    if (response !== undefined) this.setResponse(response);
    if (paths) this.setPaths(paths);
  }

  /**
   * Load the response, either parsed or as JSON text
   *
   * @throws {ValidationError} If the text is not JSON or not a JSON object
   */
  setResponse(response: ResponseData | string): void {
    if (typeof response !== 'string') {
      this.response = response;
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response);
    } catch (error) {
      throw new ValidationError('Response is not valid JSON', { cause: error });
    }

    if (!isResponseData(parsed)) {
      throw new ValidationError('Response must be a JSON object');
    }
    this.response = parsed;
  }

  getResponse(): ResponseData | undefined {
    return this.response;
  }

  getPaths(): PathMap {
    return { ...this.paths };
  }

  setPaths(paths: PathMap): void {
    this.paths = mergePaths(this.paths, paths);
  }

  getUsername(): ResponseValue | undefined {
    return this.getValueForPath('identifier');
  }

  getNickname(): ResponseValue | undefined {
    return this.getValueForPath('nickname');
  }

  getRealName(): ResponseValue | undefined {
    return this.getValueForPath('realname');
  }

  getEmail(): ResponseValue | undefined {
    return this.getValueForPath('email');
  }

  getFirstName(): ResponseValue | undefined {
    return this.getValueForPath('first_name');
  }

  getLastName(): ResponseValue | undefined {
    return this.getValueForPath('last_name');
  }

  getProfilePicture(): ResponseValue | undefined {
    return this.getValueForPath('profilepicture');
  }

  /**
   * Value at the path configured for name, or undefined when the path is
   * unset or any step is missing
   */
  getValueForPath(name: string): ResponseValue | undefined {
    if (!this.response) {
      return undefined;
    }

    const path = Object.prototype.hasOwnProperty.call(this.paths, name) ? this.paths[name] : null;
    if (!path) {
      return undefined;
    }

    let value: ResponseValue = this.response;
    for (const step of path.split('.')) {
      const next = childOf(value, step);
      if (next === undefined) {
        return undefined;
      }
      value = next;
    }

    return value;
  }
}
