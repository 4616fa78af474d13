/**
 * 📊 Statistics API Route
 *
 * GET /api/statistics
 *   Totals for the insights page: counts per category and sentiment, the
 *   priority distribution (low ≤ 3, medium ≤ 7, high above), emails
 *   awaiting a follow-up and action-item progress.
 *
 * @module app/api/statistics/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, fetchAllRows, handleRouteError, requireAuth } from '@/lib/api/utils';
import { buildStatistics } from '@/services/insights';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:Statistics');

export async function GET() {
  logger.start('Computing statistics');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const [emails, actionItems] = await Promise.all([
      fetchAllRows((from, to) =>
        supabase
          .from('emails')
          .select('category, sentiment_label, priority_score, needs_followup')
          .eq('user_id', user.id)
          .order('id')
          .range(from, to)
      ),
      fetchAllRows((from, to) =>
        supabase.from('action_items').select('completed').eq('user_id', user.id).order('id').range(from, to)
      ),
    ]);

    const queryError = emails.error ?? actionItems.error;
    if (queryError) {
      logger.error('Database query failed', { error: queryError.message });
      return apiError('Failed to compute statistics', 500);
    }

    const statistics = buildStatistics(emails.data, actionItems.data);
    logger.success('Statistics computed', { total: statistics.total });
    return apiResponse(statistics);
  } catch (error) {
    return handleRouteError(error, 'Failed to compute statistics');
  }
}
