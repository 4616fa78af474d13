/**
 * Tests for TokenManager expiry checks and refresh.
 *
 * @module lib/gmail/__tests__/token-manager.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TokenManager } from '../token-manager';
import { GmailAuthError } from '../errors';
import type { GmailAccountStore } from '../account-store';
import type { GmailAccount } from '@/types/database';

// ═══════════════════════════════════════════════════════════════════════════════
// MOCKS
// ═══════════════════════════════════════════════════════════════════════════════

const { refreshAccessToken } = vi.hoisted(() => ({ refreshAccessToken: vi.fn() }));

vi.mock('googleapis', () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials() {}
        refreshAccessToken = refreshAccessToken;
      },
    },
  },
}));

const NOW = new Date('2026-01-05T09:00:00.000Z');

function createAccount(overrides: Partial<GmailAccount> = {}): GmailAccount {
  return {
    id: 'account-1',
    user_id: 'user-1',
    email: 'jane@example.com',
    display_name: 'Jane',
    access_token: 'test-access-token',
    refresh_token: 'test-refresh-token',
    token_expiry: '2026-01-05T10:00:00.000Z',
    last_sync_at: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function createStore() {
  const saveTokens = vi.fn<GmailAccountStore['saveTokens']>(async () => undefined);
  const store: GmailAccountStore = {
    findByUserId: vi.fn(async () => null),
    saveTokens,
    markSynced: vi.fn(async () => undefined),
  };
  return { store, saveTokens };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('TokenManager', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    refreshAccessToken.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('isTokenExpired', () => {
    const manager = new TokenManager(createStore().store);

    it.each([
      ['2026-01-05T10:00:00.000Z', false],
      ['2026-01-05T09:05:00.000Z', true],
      ['2026-01-05T09:05:01.000Z', false],
      ['2026-01-05T08:00:00.000Z', true],
      ['garbage', true],
      [null, true],
    ])('expiry %s → expired %s', (expiry, expected) => {
      expect(manager.isTokenExpired(expiry)).toBe(expected);
    });
  });

  describe('getValidToken', () => {
    it('returns the stored token while it is fresh', async () => {
      const manager = new TokenManager(createStore().store);

      await expect(manager.getValidToken(createAccount())).resolves.toBe('test-access-token');
      expect(refreshAccessToken).not.toHaveBeenCalled();
    });

    it('refreshes and stores an expiring token', async () => {
      refreshAccessToken.mockResolvedValue({
        credentials: { access_token: 'test-new-token', expiry_date: Date.parse('2026-01-05T10:00:00.000Z') },
      });
      const { store, saveTokens } = createStore();
      const manager = new TokenManager(store);

      const token = await manager.getValidToken(createAccount({ token_expiry: '2026-01-05T09:01:00.000Z' }));

      expect(token).toBe('test-new-token');
      expect(saveTokens).toHaveBeenCalledWith('account-1', {
        accessToken: 'test-new-token',
        expiresAt: '2026-01-05T10:00:00.000Z',
        refreshToken: undefined,
      });
    });

    it('still returns the new token when storing it fails', async () => {
      refreshAccessToken.mockResolvedValue({ credentials: { access_token: 'test-new-token' } });
      const { store, saveTokens } = createStore();
      saveTokens.mockRejectedValue(new Error('db down'));
      const manager = new TokenManager(store);

      await expect(manager.getValidToken(createAccount({ token_expiry: null }))).resolves.toBe('test-new-token');
    });

    it('throws a non-refreshable auth error when the grant is revoked', async () => {
      refreshAccessToken.mockRejectedValue(new Error('invalid_grant'));
      const manager = new TokenManager(createStore().store);

      const failure = manager.getValidToken(createAccount({ token_expiry: null }));

      await expect(failure).rejects.toBeInstanceOf(GmailAuthError);
      await expect(failure).rejects.toMatchObject({ isRefreshable: false, message: 'invalid_grant' });
      expect(refreshAccessToken).toHaveBeenCalledTimes(1);
    });

    it('fails without a refresh token', async () => {
      const manager = new TokenManager(createStore().store);

      await expect(
        manager.getValidToken(createAccount({ token_expiry: null, refresh_token: null }))
      ).rejects.toMatchObject({ message: 'No refresh token available' });
    });
  });
});
