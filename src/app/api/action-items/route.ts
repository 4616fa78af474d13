/**
 * ✅ Action Items API Route
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENDPOINTS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * GET /api/action-items
 *   Query parameters:
 *   - completed: true | false (omit for both)
 *
 *   Earliest deadline first, items without a deadline last. Each item
 *   carries the subject and sender of the email it came from.
 *   Returns: ActionItemWithEmail[]
 *
 * @module app/api/action-items/route
 */

import { NextRequest } from 'next/server';
import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, handleRouteError, requireAuth, validateQuery } from '@/lib/api/utils';
import { actionItemsQuerySchema } from '@/lib/api/schemas';
import { compareActionItems } from '@/services/insights';
import type { ActionItemWithEmail } from '@/types/api';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:ActionItems');

export async function GET(request: NextRequest) {
  logger.start('Fetching action items');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const queryResult = validateQuery(request, actionItemsQuerySchema);
    if (queryResult instanceof Response) return queryResult;
    const { completed } = queryResult;

    let query = supabase.from('action_items').select('*').eq('user_id', user.id);
    if (completed !== undefined) query = query.eq('completed', completed);

    const { data: items, error } = await query;

    if (error) {
      logger.error('Database query failed', { error: error.message });
      return apiError('Failed to fetch action items', 500);
    }

    const rows = items ?? [];
    const emailIds = [...new Set(rows.map((item) => item.email_id))];

    const sources = new Map<string, { subject: string; sender_name: string }>();
    if (emailIds.length > 0) {
      const { data: emails, error: emailError } = await supabase
        .from('emails')
        .select('id, subject, sender_name')
        .eq('user_id', user.id)
        .in('id', emailIds);

      if (emailError) {
        logger.error('Failed to load source emails', { error: emailError.message });
        return apiError('Failed to fetch action items', 500);
      }

      for (const email of emails ?? []) {
        sources.set(email.id, { subject: email.subject, sender_name: email.sender_name });
      }
    }

    const result: ActionItemWithEmail[] = [...rows]
      .sort(compareActionItems)
      .map((item) => ({ ...item, email: sources.get(item.email_id) ?? null }));

    logger.success('Action items fetched', { count: result.length, completed });
    return apiResponse(result);
  } catch (error) {
    return handleRouteError(error, 'Failed to fetch action items');
  }
}
