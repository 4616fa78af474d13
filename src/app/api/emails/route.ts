/**
 * 📧 Emails API Route
 *
 * Lists the user's annotated emails for the inbox tabs.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENDPOINTS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * GET /api/emails
 *   Query parameters:
 *   - filter: all | starred | important | followup (default: all)
 *   - category: Meeting | Sales | Update | Personal | Finance | Technical | Promotional | Other
 *   - sentiment: Positive | Negative | Neutral | Urgent
 *   - page, limit: pagination (default 1, 50; limit capped at 100)
 *
 *   Newest first; the followup tab is ordered by follow-up date instead.
 *   Returns: EmailSummary[] with pagination headers
 *
 * @module app/api/emails/route
 */

import { NextRequest } from 'next/server';
import { createServerClient } from '@/lib/supabase/server';
import {
  apiError,
  getPagination,
  handleRouteError,
  paginatedResponse,
  requireAuth,
  validateQuery,
} from '@/lib/api/utils';
import { emailListQuerySchema } from '@/lib/api/schemas';
import { EMAIL_SUMMARY_SELECT } from '@/types/api';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:Emails');

// ═══════════════════════════════════════════════════════════════════════════════
// GET /api/emails - List emails
// ═══════════════════════════════════════════════════════════════════════════════

export async function GET(request: NextRequest) {
  logger.start('Fetching emails list');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const queryResult = validateQuery(request, emailListQuerySchema);
    if (queryResult instanceof Response) return queryResult;
    const { filter, category, sentiment } = queryResult;

    const pagination = getPagination(request);

    let query = supabase
      .from('emails')
      .select(EMAIL_SUMMARY_SELECT, { count: 'exact' })
      .eq('user_id', user.id);

    switch (filter) {
      case 'starred':
        query = query.eq('is_starred', true);
        break;
      case 'important':
        query = query.eq('is_important', true);
        break;
      case 'followup':
        query = query.eq('needs_followup', true);
        break;
      case 'all':
        break;
    }

    if (category) query = query.eq('category', category);
    if (sentiment) query = query.eq('sentiment_label', sentiment);

    query =
      filter === 'followup'
        ? query.order('followup_date', { ascending: true, nullsFirst: false })
        : query.order('received_at', { ascending: false });

    const { data, error, count } = await query.range(
      pagination.offset,
      pagination.offset + pagination.limit - 1
    );

    if (error) {
      logger.error('Database query failed', { error: error.message });
      return apiError('Failed to fetch emails', 500);
    }

    const emails = data ?? [];
    logger.success('Emails fetched', { count: emails.length, total: count, filter });

    return paginatedResponse(emails, pagination, count ?? 0, request.url);
  } catch (error) {
    return handleRouteError(error, 'Failed to list emails');
  }
}
