// src/core/response/UserNormalizer.ts

import { z } from 'zod';
import type { NormalizedUser, ResponseValue, UserResponse } from './types';
import { ValidationError } from '../../utils/errors';

export const NormalizedUserSchema = z.object({
  provider: z.string().min(1),
  identifier: z.string().min(1),
  nickname: z.string().optional(),
  realName: z.string().optional(),
  email: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  profilePicture: z.string().optional(),
});

// Only scalars carry a field value; numeric ids become strings
function toText(value: ResponseValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export class UserNormalizer {
  /**
   * Normalize any UserResponse variant into a NormalizedUser
   *
   * @throws {ValidationError} If the identifier is missing or the record fails the schema
   */
  normalize(provider: string, response: UserResponse): NormalizedUser {
    const candidate = {
      provider,
      identifier: toText(response.getUsername()),
      nickname: toText(response.getNickname()),
      realName: toText(response.getRealName()),
      email: toText(response.getEmail()),
      firstName: toText(response.getFirstName()),
      lastName: toText(response.getLastName()),
      profilePicture: toText(response.getProfilePicture()),
    };

    const result = NormalizedUserSchema.safeParse(candidate);
    if (!result.success) {
      throw new ValidationError(`User response validation failed for ${provider}`, {
        provider,
        issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }

    return result.data;
  }
}
