/**
 * Keywords API Route
 *
 * GET /api/keywords
 *   Every keyword seen in the user's emails once, with its highest score,
 *   best first.
 *
 * @module app/api/keywords/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, fetchAllRows, handleRouteError, requireAuth } from '@/lib/api/utils';
import { topKeywords } from '@/services/insights';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:Keywords');

export async function GET() {
  logger.start('Fetching keywords');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const { data, error } = await fetchAllRows((from, to) =>
      supabase.from('keywords').select('word, score').eq('user_id', user.id).order('id').range(from, to)
    );

    if (error) {
      logger.error('Database query failed', { error: error.message });
      return apiError('Failed to fetch keywords', 500);
    }

    const keywords = topKeywords(data);
    logger.success('Keywords fetched', { count: keywords.length });
    return apiResponse(keywords);
  } catch (error) {
    return handleRouteError(error, 'Failed to fetch keywords');
  }
}
