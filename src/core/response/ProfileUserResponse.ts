// src/core/response/ProfileUserResponse.ts

import type { ResponseValue, UserResponse } from './types';

export interface UserProfile {
  identifier: string;
  nickname?: string;
  realName?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  profilePicture?: string;
}

/**
 * UserResponse over a profile the provider client has already parsed
 */
export class ProfileUserResponse implements UserResponse {
  constructor(private readonly profile: UserProfile) {}

  getUsername(): ResponseValue | undefined {
    return this.profile.identifier;
  }

  getNickname(): ResponseValue | undefined {
    return this.profile.nickname;
  }

  getRealName(): ResponseValue | undefined {
    return this.profile.realName;
  }

  getEmail(): ResponseValue | undefined {
    return this.profile.email;
  }

  getFirstName(): ResponseValue | undefined {
    return this.profile.firstName;
  }

  getLastName(): ResponseValue | undefined {
    return this.profile.lastName;
  }

  getProfilePicture(): ResponseValue | undefined {
    return this.profile.profilePicture;
  }
}
