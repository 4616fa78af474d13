/**
 * OAuth Token Manager for Gmail
 *
 * Hands out valid Gmail access tokens. A token within five minutes of its
 * expiry is refreshed through the Google OAuth2 client and the new token is
 * written back through the account store.
 *
 * ```typescript
 * const tokenManager = new TokenManager(new SupabaseGmailAccountStore(supabase));
 * const accessToken = await tokenManager.getValidToken(account);
 * const gmail = createGmailService(accessToken, account.id);
 * ```
 *
 * @module lib/gmail/token-manager
 */

import { google } from 'googleapis';
import { appConfig } from '@/config/app';
import { createLogger, logAuth } from '@/lib/utils/logger';
import type { GmailAccountStore } from './account-store';
import { GmailAuthError } from './errors';
import type { GmailAccount, ITokenManager, TokenRefreshResult } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Refresh tokens this long before they actually expire */
export const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/** Assumed lifetime when Google returns no expiry */
const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

/** Google error codes meaning the refresh token is no longer usable */
const NON_RETRYABLE_ERRORS = ['invalid_grant', 'invalid_client', 'unauthorized_client', 'access_denied'];

const logger = createLogger('TokenManager');

/**
 * True when the token expires within `bufferMs`. A missing or unreadable
 * expiry counts as expired.
 */
export function isTokenExpired(expiresAt: string | null, bufferMs: number = TOKEN_EXPIRY_BUFFER_MS): boolean {
  if (!expiresAt) return true;

  const expiryTime = new Date(expiresAt).getTime();
  if (Number.isNaN(expiryTime)) {
    logger.warn('Could not parse token expiry, assuming expired', { expiresAt });
    return true;
  }

  return Date.now() + bufferMs >= expiryTime;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOKEN MANAGER CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class TokenManager implements ITokenManager {
  private readonly accounts: GmailAccountStore;

  private readonly oauth2Client: InstanceType<typeof google.auth.OAuth2>;

  constructor(accounts: GmailAccountStore) {
    this.accounts = accounts;
    this.oauth2Client = new google.auth.OAuth2(
      appConfig.google.clientId,
      appConfig.google.clientSecret,
      `${appConfig.env.NEXT_PUBLIC_APP_URL}/api/auth/callback`
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PUBLIC METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Returns the stored access token, or a refreshed one when it is about to
   * expire.
   *
   * @throws GmailAuthError when a refresh is needed and fails
   */
  public async getValidToken(account: GmailAccount): Promise<string> {
    if (!this.isTokenExpired(account.token_expiry)) {
      return account.access_token;
    }

    logger.info('Token expired, refreshing', {
      accountId: account.id,
      expiredAt: account.token_expiry,
    });

    const result = await this.refreshToken(account);

    if (!result.success || !result.accessToken) {
      throw new GmailAuthError(
        result.error ?? 'Token refresh failed',
        { accountId: account.id, userId: account.user_id },
        false
      );
    }

    return result.accessToken;
  }

  /**
   * Exchanges the refresh token for a new access token and stores it.
   * Transient failures are retried with exponential backoff; revoked or
   * invalid grants are not. Never throws.
   */
  public async refreshToken(account: GmailAccount): Promise<TokenRefreshResult> {
    logAuth.tokenExpired({ accountId: account.id });

    if (!account.refresh_token) {
      logger.warn('No refresh token stored, user must sign in again', { accountId: account.id });
      return { success: false, error: 'No refresh token available' };
    }

    this.oauth2Client.setCredentials({ refresh_token: account.refresh_token });

    const { maxAttempts, baseDelayMs } = appConfig.retry;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const { credentials } = await this.oauth2Client.refreshAccessToken();

        if (!credentials.access_token) {
          throw new Error('No access token in refresh response');
        }

        const expiresAt = new Date(
          credentials.expiry_date ?? Date.now() + DEFAULT_TOKEN_LIFETIME_MS
        ).toISOString();

        try {
          await this.accounts.saveTokens(account.id, {
            accessToken: credentials.access_token,
            expiresAt,
            refreshToken: credentials.refresh_token ?? undefined,
          });
        } catch (storeError) {
          // The new token is still usable for this request.
          logger.warn('Failed to store refreshed token', {
            accountId: account.id,
            error: storeError instanceof Error ? storeError.message : String(storeError),
          });
        }

        logAuth.tokenRefreshed({ accountId: account.id });

        return { success: true, accessToken: credentials.access_token, expiresAt };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        logger.warn('Token refresh attempt failed', {
          accountId: account.id,
          attempt,
          error: lastError.message,
        });

        if (this.isNonRetryableError(lastError)) break;

        if (attempt < maxAttempts) {
          await this.delay(baseDelayMs * Math.pow(2, attempt - 1));
        }
      }
    }

    logAuth.loginError({
      accountId: account.id,
      error: lastError?.message ?? 'Unknown error',
    });

    return {
      success: false,
      error: lastError?.message ?? 'Token refresh failed after retries',
    };
  }

  public isTokenExpired(expiresAt: string | null, bufferMs: number = TOKEN_EXPIRY_BUFFER_MS): boolean {
    return isTokenExpired(expiresAt, bufferMs);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPER METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  private isNonRetryableError(error: Error): boolean {
    const message = error.message.toLowerCase();
    return NON_RETRYABLE_ERRORS.some((code) => message.includes(code));
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
