/**
 * UserService Database Adapter
 * Implements UserServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { UpsertUserParams, User, UserStatus } from '../types/index.js';
import { NO_ROWS } from '../lib/supabase.js';

import type { UserServiceDb } from './user.service.js';

/**
 * Database row type
 */
interface UserRow {
  user_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  language_code: string;
  status: UserStatus;
  last_seen_at: string | null;
  created_at: string;
  updated_at: string;
}

function mapRowToUser(row: UserRow): User {
  return {
    userId: row.user_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    languageCode: row.language_code,
    status: row.status,
    lastSeenAt: row.last_seen_at !== null ? new Date(row.last_seen_at) : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  return {
    /**
     * Insert or refresh a member. Fields left undefined keep their stored value;
     * status is never touched here.
     */
    async upsertUser(params: UpsertUserParams, seenAt: Date): Promise<User> {
      const row: Record<string, unknown> = {
        user_id: params.userId,
        last_seen_at: seenAt.toISOString(),
        updated_at: seenAt.toISOString(),
      };
      if (params.username !== undefined) row.username = params.username;
      if (params.firstName !== undefined) row.first_name = params.firstName;
      if (params.lastName !== undefined) row.last_name = params.lastName;
      if (params.languageCode !== undefined && params.languageCode !== null) {
        row.language_code = params.languageCode;
      }

      const { data, error } = await supabase
        .from('users')
        .upsert(row, { onConflict: 'user_id' })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to upsert user: ${error.message}`);
      }

      return mapRowToUser(data as UserRow);
    },

    async getUser(userId: number): Promise<User | null> {
      const { data, error } = await supabase
        .from('users')
        .select('*')
        .eq('user_id', userId)
        .single();

      if (error !== null) {
        if (error.code === NO_ROWS) {
          return null;
        }
        throw new Error(`Failed to get user: ${error.message}`);
      }

      return mapRowToUser(data as UserRow);
    },

    async updateUserStatus(userId: number, status: UserStatus): Promise<User> {
      const { data, error } = await supabase
        .from('users')
        .update({ status, updated_at: new Date().toISOString() })
        .eq('user_id', userId)
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to update user status: ${error.message}`);
      }

      return mapRowToUser(data as UserRow);
    },
  };
}
