/**
 * Current User API Route
 *
 * GET /api/auth/user
 *   The signed-in user and the state of their Gmail connection. A stored
 *   refresh token counts as authenticated even after the access token
 *   expires, since the next sync refreshes it.
 *   Returns: AuthUser
 *
 * @module app/api/auth/user/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, handleRouteError, requireAuth } from '@/lib/api/utils';
import { isTokenExpired } from '@/lib/gmail/token-manager';
import type { AuthUser } from '@/types/api';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:AuthUser');

export async function GET() {
  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const { data: account, error } = await supabase
      .from('gmail_accounts')
      .select('email, refresh_token, token_expiry, last_sync_at')
      .eq('user_id', user.id)
      .maybeSingle();

    if (error) {
      logger.error('Failed to load Gmail account', { userId: user.id, error: error.message });
      return apiError('Failed to load user', 500);
    }

    const isAuthenticated =
      account !== null &&
      (Boolean(account.refresh_token) || !isTokenExpired(account.token_expiry, 0));

    const authUser: AuthUser = {
      id: user.id,
      email: user.email,
      isAuthenticated,
      gmailEmail: account?.email ?? null,
      lastSyncAt: account?.last_sync_at ?? null,
    };

    return apiResponse(authUser);
  } catch (error) {
    return handleRouteError(error, 'Failed to load user');
  }
}
