/**
 * Logout API Route
 *
 * POST /api/auth/logout
 *   Forgets the stored Gmail tokens, then ends the Supabase session.
 *   Stored emails and annotations are kept.
 *
 * @module app/api/auth/logout/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, handleRouteError, requireAuth } from '@/lib/api/utils';
import { createLogger, logAuth } from '@/lib/utils/logger';

const logger = createLogger('API:AuthLogout');

export async function POST() {
  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const { error: clearError } = await supabase
      .from('gmail_accounts')
      .update({ access_token: '', refresh_token: null, token_expiry: null })
      .eq('user_id', user.id);

    if (clearError) {
      logger.error('Failed to clear Gmail tokens', { userId: user.id, error: clearError.message });
      return apiError('Failed to sign out', 500);
    }

    const { error: signOutError } = await supabase.auth.signOut();
    if (signOutError) {
      logger.error('Supabase sign-out failed', { userId: user.id, error: signOutError.message });
      return apiError('Failed to sign out', 500);
    }

    logAuth.logout({ userId: user.id });
    return apiResponse({ signedOut: true });
  } catch (error) {
    return handleRouteError(error, 'Failed to sign out');
  }
}
