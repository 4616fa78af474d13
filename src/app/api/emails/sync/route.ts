/**
 * Email Sync API Route
 *
 * Fetches the user's recent, important and starred Gmail messages, runs new
 * ones through the annotation pipeline and stores the results.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENDPOINTS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * POST /api/emails/sync
 *   - Runs one fetch-and-process pass to completion
 *   - Returns: { fetched, created, updated, failed }
 *   - 401 when no Gmail account is connected or its token cannot be refreshed
 *
 * ```typescript
 * const response = await fetch('/api/emails/sync', { method: 'POST' });
 * const { data } = await response.json();
 * console.log(`${data.created} new emails`);
 * ```
 *
 * @module app/api/emails/sync/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiResponse, handleRouteError, requireAuth } from '@/lib/api/utils';
import { createEmailSyncService } from '@/services/sync';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:EmailSync');

// ═══════════════════════════════════════════════════════════════════════════════
// POST /api/emails/sync - Fetch and process new emails
// ═══════════════════════════════════════════════════════════════════════════════

export async function POST() {
  logger.start('Email sync requested');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const result = await createEmailSyncService(supabase).fetchAndProcess(user.id);

    logger.success('Email sync finished', { userId: user.id, ...result });
    return apiResponse(result);
  } catch (error) {
    return handleRouteError(error, 'Email sync failed');
  }
}
