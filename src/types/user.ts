/**
 * User Domain Types
 *
 * Users are identified by the platform-assigned integer id.
 * Created on first interaction, never deleted, only deactivated.
 */

export type UserStatus = 'active' | 'inactive' | 'banned';

export interface User {
  userId: number;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  languageCode: string;
  status: UserStatus;
  lastSeenAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Display metadata supplied by the transport layer
 */
export interface UpsertUserParams {
  userId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  languageCode?: string | null;
}
