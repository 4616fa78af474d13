/**
 * 🔐 OAuth Callback Handler
 *
 * Handles the redirect from Google OAuth after the user grants permissions.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FLOW
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. User clicks "Sign in with Gmail" → redirected to Google
 * 2. User grants permissions → Google redirects here with `code`
 * 3. The code is exchanged for a Supabase session
 * 4. Google's access and refresh tokens are stored in gmail_accounts
 * 5. Redirect to /inbox
 *
 * Any failure redirects to the landing page with `?error=<code>`.
 *
 * @module app/api/auth/callback/route
 */

import { NextResponse } from 'next/server';
import { createServerClient } from '@/lib/supabase/server';
import { authCallbackQuerySchema } from '@/lib/api/schemas';
import { createLogger, logAuth } from '@/lib/utils/logger';
import type { TableInsert } from '@/types/database';

const logger = createLogger('AuthCallback');

/** Google access tokens live for an hour */
const PROVIDER_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error codes that can be returned in the redirect URL.
 */
type AuthErrorCode =
  | 'access_denied'         // User declined consent at Google
  | 'missing_code'          // No authorization code in callback
  | 'exchange_failed'       // Code-to-session exchange failed
  | 'missing_gmail_token'   // Session has no Google provider token
  | 'token_storage_failed'; // gmail_accounts upsert failed

function createErrorRedirect(origin: string, code: AuthErrorCode): NextResponse {
  return NextResponse.redirect(`${origin}/?error=${code}`);
}

function readDisplayName(metadata: Record<string, unknown> | undefined): string | null {
  const name = metadata?.full_name ?? metadata?.name;
  return typeof name === 'string' && name.length > 0 ? name : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROUTE HANDLER
// ═══════════════════════════════════════════════════════════════════════════════

export async function GET(request: Request) {
  const { searchParams, origin } = new URL(request.url);
  const query = authCallbackQuerySchema.safeParse(Object.fromEntries(searchParams));

  logger.start('Processing OAuth callback', { hasCode: searchParams.has('code') });

  if (!query.success) {
    logger.error('Malformed OAuth callback query');
    return createErrorRedirect(origin, 'missing_code');
  }

  const { code, error: providerError, error_description: providerErrorDescription } = query.data;

  if (providerError) {
    logAuth.loginError({ error: providerErrorDescription ?? providerError });
    return createErrorRedirect(origin, 'access_denied');
  }

  if (!code) {
    logger.error('OAuth callback missing authorization code');
    return createErrorRedirect(origin, 'missing_code');
  }

  try {
    const supabase = await createServerClient();

    // ─────────────────────────────────────────────────────────────────────────
    // Step 1: Exchange code for session
    // ─────────────────────────────────────────────────────────────────────────

    const { data, error } = await supabase.auth.exchangeCodeForSession(code);

    if (error || !data.session || !data.user) {
      logAuth.loginError({ error: error?.message ?? 'No session returned' });
      return createErrorRedirect(origin, 'exchange_failed');
    }

    const { session, user } = data;

    if (!session.provider_token) {
      logger.error('Session has no Google provider token', { userId: user.id });
      return createErrorRedirect(origin, 'missing_gmail_token');
    }

    // ─────────────────────────────────────────────────────────────────────────
    // Step 2: Store Gmail tokens
    // ─────────────────────────────────────────────────────────────────────────

    const account: TableInsert<'gmail_accounts'> = {
      user_id: user.id,
      email: user.email ?? '',
      display_name: readDisplayName(user.user_metadata),
      access_token: session.provider_token,
      token_expiry: new Date(Date.now() + PROVIDER_TOKEN_LIFETIME_MS).toISOString(),
    };

    // Google omits the refresh token on some re-consents; keep the stored one then.
    if (session.provider_refresh_token) {
      account.refresh_token = session.provider_refresh_token;
    }

    const { error: upsertError } = await supabase
      .from('gmail_accounts')
      .upsert(account, { onConflict: 'user_id' });

    if (upsertError) {
      logger.error('Failed to store Gmail tokens', { userId: user.id, error: upsertError.message });
      return createErrorRedirect(origin, 'token_storage_failed');
    }

    logAuth.loginSuccess({ userId: user.id, hasRefreshToken: Boolean(session.provider_refresh_token) });
    return NextResponse.redirect(`${origin}/inbox`);
  } catch (error) {
    logger.error('Unexpected error in OAuth callback', {
      error: error instanceof Error ? error.message : String(error),
    });
    return createErrorRedirect(origin, 'exchange_failed');
  }
}
