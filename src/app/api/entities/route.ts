/**
 * Entities API Route
 *
 * GET /api/entities
 *   Distinct (text, type) pairs named across all of the user's emails.
 *
 * @module app/api/entities/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, fetchAllRows, handleRouteError, requireAuth } from '@/lib/api/utils';
import { distinctEntities } from '@/services/insights';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:Entities');

export async function GET() {
  logger.start('Fetching entities');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const { data, error } = await fetchAllRows((from, to) =>
      supabase.from('entities').select('text, type').eq('user_id', user.id).order('id').range(from, to)
    );

    if (error) {
      logger.error('Database query failed', { error: error.message });
      return apiError('Failed to fetch entities', 500);
    }

    const entities = distinctEntities(data);
    logger.success('Entities fetched', { count: entities.length });
    return apiResponse(entities);
  } catch (error) {
    return handleRouteError(error, 'Failed to fetch entities');
  }
}
