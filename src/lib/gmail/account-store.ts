/**
 * Gmail Account Store
 *
 * Reads and writes the `gmail_accounts` row that holds a user's OAuth
 * tokens. The token manager and sync service depend on the interface, so
 * tests can hand them an in-memory store.
 *
 * @module lib/gmail/account-store
 */

import { createLogger } from '@/lib/utils/logger';
import type { TypedSupabaseClient } from '@/lib/supabase/server';
import type { GmailAccount } from '@/types/database';

const logger = createLogger('GmailAccountStore');

export interface StoredTokens {
  accessToken: string;
  /** ISO 8601 */
  expiresAt: string;
  /** Only present when Google rotated the refresh token */
  refreshToken?: string;
}

export interface GmailAccountStore {
  findByUserId(userId: string): Promise<GmailAccount | null>;
  saveTokens(accountId: string, tokens: StoredTokens): Promise<void>;
  markSynced(accountId: string, syncedAt: string): Promise<void>;
}

export class SupabaseGmailAccountStore implements GmailAccountStore {
  constructor(private readonly supabase: TypedSupabaseClient) {}

  async findByUserId(userId: string): Promise<GmailAccount | null> {
    const { data, error } = await this.supabase
      .from('gmail_accounts')
      .select('*')
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      logger.error('Failed to load Gmail account', { userId, error: error.message });
      throw new Error(`Failed to load Gmail account: ${error.message}`);
    }

    return data;
  }

  async saveTokens(accountId: string, tokens: StoredTokens): Promise<void> {
    const { error } = await this.supabase
      .from('gmail_accounts')
      .update({
        access_token: tokens.accessToken,
        token_expiry: tokens.expiresAt,
        ...(tokens.refreshToken ? { refresh_token: tokens.refreshToken } : {}),
      })
      .eq('id', accountId);

    if (error) {
      throw new Error(`Failed to store tokens: ${error.message}`);
    }
  }

  async markSynced(accountId: string, syncedAt: string): Promise<void> {
    const { error } = await this.supabase
      .from('gmail_accounts')
      .update({ last_sync_at: syncedAt })
      .eq('id', accountId);

    if (error) {
      // A stale last_sync_at only affects what the dashboard shows.
      logger.warn('Failed to record sync time', { accountId, error: error.message });
    }
  }
}
