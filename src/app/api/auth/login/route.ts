/**
 * 🔐 Login API Route
 *
 * GET /api/auth/login
 *   Returns the Google sign-in URL for Supabase Auth, asking for read-only
 *   Gmail access. `access_type=offline` with `prompt=consent` makes Google
 *   hand out a refresh token on every sign-in.
 *   Returns: { url }
 *
 * @module app/api/auth/login/route
 */

import { NextRequest } from 'next/server';
import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, handleRouteError } from '@/lib/api/utils';
import { appConfig } from '@/config/app';
import { createLogger, logAuth } from '@/lib/utils/logger';

const logger = createLogger('API:AuthLogin');

export async function GET(request: NextRequest) {
  const { origin } = new URL(request.url);
  logAuth.loginStart({ provider: 'google' });

  try {
    const supabase = await createServerClient();

    const { data, error } = await supabase.auth.signInWithOAuth({
      provider: 'google',
      options: {
        scopes: appConfig.google.scopes.join(' '),
        redirectTo: `${origin}/api/auth/callback`,
        skipBrowserRedirect: true,
        queryParams: {
          access_type: 'offline',
          prompt: 'consent',
        },
      },
    });

    if (error || !data.url) {
      logger.error('Failed to generate OAuth URL', { error: error?.message });
      return apiError('Failed to start Google sign-in', 500);
    }

    return apiResponse({ url: data.url });
  } catch (error) {
    return handleRouteError(error, 'Failed to start Google sign-in');
  }
}
