// @vitest-environment node
/**
 * Tests for the auth routes: login URL, OAuth callback, current user and
 * logout.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { createSupabaseFake, type SupabaseFake } from '@/test-utils/supabase-fake';
import { GET as login } from '../login/route';
import { GET as callback } from '../callback/route';
import { GET as currentUser } from '../user/route';
import { POST as logout } from '../logout/route';

// ═══════════════════════════════════════════════════════════════════════════════
// MOCKS
// ═══════════════════════════════════════════════════════════════════════════════

const mockUser = { id: 'user-123', email: 'test@example.com' };

let supabase: SupabaseFake = createSupabaseFake({ user: mockUser });

vi.mock('@/lib/supabase/server', () => ({
  createServerClient: async () => supabase,
}));

const NOW = new Date('2026-01-05T09:00:00.000Z');

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('Auth API', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    supabase = createSupabaseFake({ user: mockUser });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // =========================================================================
  // GET /api/auth/login
  // =========================================================================

  describe('GET /api/auth/login', () => {
    it('asks Supabase for a Google URL with Gmail scopes and offline access', async () => {
      const response = await login(new NextRequest('http://localhost/api/auth/login'));

      expect(response.status).toBe(200);
      expect((await response.json()).data).toEqual({
        url: 'https://accounts.google.com/o/oauth2/auth?client_id=test',
      });
      expect(supabase.auth.signInWithOAuth).toHaveBeenCalledWith({
        provider: 'google',
        options: {
          scopes:
            'openid https://www.googleapis.com/auth/gmail.readonly https://www.googleapis.com/auth/userinfo.email https://www.googleapis.com/auth/userinfo.profile',
          redirectTo: 'http://localhost/api/auth/callback',
          skipBrowserRedirect: true,
          queryParams: { access_type: 'offline', prompt: 'consent' },
        },
      });
    });
  });

  // =========================================================================
  // GET /api/auth/callback
  // =========================================================================

  describe('GET /api/auth/callback', () => {
    it('stores the provider tokens and redirects to the inbox', async () => {
      supabase.auth.exchangeCodeForSession.mockResolvedValueOnce({
        data: {
          session: { provider_token: 'test-access-token', provider_refresh_token: 'test-refresh-token' },
          user: { id: 'user-123', email: 'test@example.com', user_metadata: { full_name: 'Test User' } },
        },
        error: null,
      });
      supabase.queue('gmail_accounts', { data: null, error: null });

      const response = await callback(new Request('http://localhost/api/auth/callback?code=test-code'));

      expect(response.status).toBe(307);
      expect(response.headers.get('location')).toBe('http://localhost/inbox');
      expect(supabase.auth.exchangeCodeForSession).toHaveBeenCalledWith('test-code');

      const [query] = supabase.queries('gmail_accounts');
      expect(query?.argsOf('upsert')).toEqual([
        [
          {
            user_id: 'user-123',
            email: 'test@example.com',
            display_name: 'Test User',
            access_token: 'test-access-token',
            token_expiry: '2026-01-05T10:00:00.000Z',
            refresh_token: 'test-refresh-token',
          },
          { onConflict: 'user_id' },
        ],
      ]);
    });

    it('keeps the stored refresh token when Google sends none', async () => {
      supabase.auth.exchangeCodeForSession.mockResolvedValueOnce({
        data: {
          session: { provider_token: 'test-access-token', provider_refresh_token: null },
          user: { id: 'user-123', email: 'test@example.com', user_metadata: {} },
        },
        error: null,
      });

      await callback(new Request('http://localhost/api/auth/callback?code=test-code'));

      const [args] = supabase.queries('gmail_accounts')[0]?.argsOf('upsert') ?? [];
      expect(args?.[0]).not.toHaveProperty('refresh_token');
      expect(args?.[0]).toHaveProperty('display_name', null);
    });

    it('redirects with an error when the code is missing', async () => {
      const response = await callback(new Request('http://localhost/api/auth/callback'));

      expect(response.headers.get('location')).toBe('http://localhost/?error=missing_code');
    });

    it('redirects with access_denied when the user declines consent', async () => {
      const response = await callback(new Request('http://localhost/api/auth/callback?error=access_denied'));

      expect(response.headers.get('location')).toBe('http://localhost/?error=access_denied');
      expect(supabase.auth.exchangeCodeForSession).not.toHaveBeenCalled();
    });

    it('redirects with exchange_failed when Supabase rejects the code', async () => {
      const response = await callback(new Request('http://localhost/api/auth/callback?code=stale'));

      expect(response.headers.get('location')).toBe('http://localhost/?error=exchange_failed');
    });
  });

  // =========================================================================
  // GET /api/auth/user
  // =========================================================================

  describe('GET /api/auth/user', () => {
    it('reports a connected account with a refresh token as authenticated', async () => {
      supabase.queue('gmail_accounts', {
        data: {
          email: 'test@example.com',
          refresh_token: 'test-refresh-token',
          token_expiry: '2026-01-05T08:00:00.000Z',
          last_sync_at: '2026-01-05T08:30:00.000Z',
        },
        error: null,
      });

      const response = await currentUser();

      expect((await response.json()).data).toEqual({
        id: 'user-123',
        email: 'test@example.com',
        isAuthenticated: true,
        gmailEmail: 'test@example.com',
        lastSyncAt: '2026-01-05T08:30:00.000Z',
      });
    });

    it('treats an expired token without a refresh token as signed out', async () => {
      supabase.queue('gmail_accounts', {
        data: {
          email: 'test@example.com',
          refresh_token: null,
          token_expiry: '2026-01-05T08:59:00.000Z',
          last_sync_at: null,
        },
        error: null,
      });

      const response = await currentUser();

      expect((await response.json()).data.isAuthenticated).toBe(false);
    });

    it('reports no Gmail account', async () => {
      supabase.queue('gmail_accounts', { data: null, error: null });

      const response = await currentUser();
      const { data } = await response.json();

      expect(data.isAuthenticated).toBe(false);
      expect(data.gmailEmail).toBeNull();
    });

    it('returns 401 without a session', async () => {
      supabase = createSupabaseFake({ user: null });

      expect((await currentUser()).status).toBe(401);
    });
  });

  // =========================================================================
  // POST /api/auth/logout
  // =========================================================================

  describe('POST /api/auth/logout', () => {
    it('clears the stored tokens before signing out', async () => {
      supabase.queue('gmail_accounts', { data: null, error: null });

      const response = await logout();

      expect(response.status).toBe(200);
      expect(supabase.queries('gmail_accounts')[0]?.argsOf('update')).toEqual([
        [{ access_token: '', refresh_token: null, token_expiry: null }],
      ]);
      expect(supabase.auth.signOut).toHaveBeenCalledTimes(1);
    });

    it('does not sign out when the tokens cannot be cleared', async () => {
      supabase.queue('gmail_accounts', { data: null, error: { message: 'permission denied' } });

      const response = await logout();

      expect(response.status).toBe(500);
      expect(supabase.auth.signOut).not.toHaveBeenCalled();
    });
  });
});
