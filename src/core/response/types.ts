// src/core/response/types.ts

export type ResponseValue = string | number | boolean | null | ResponseValue[] | ResponseData;

export interface ResponseData {
  [key: string]: ResponseValue;
}

// Field name -> dot-delimited path (null = unset)
export type PathMap = Record<string, string | null>;

/**
 * User profile fields read from a provider response
 */
export interface UserResponse {
  getUsername(): ResponseValue | undefined;
  getNickname(): ResponseValue | undefined;
  getRealName(): ResponseValue | undefined;
  getEmail(): ResponseValue | undefined;
  getFirstName(): ResponseValue | undefined;
  getLastName(): ResponseValue | undefined;
  getProfilePicture(): ResponseValue | undefined;
}

export interface NormalizedUser {
  provider: string;
  identifier: string;
  nickname?: string;
  realName?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  profilePicture?: string;
}
