/**
 * 👥 Contacts API Route
 *
 * GET /api/contacts
 *   Contact details pulled from the user's emails, one per address,
 *   sorted by name.
 *
 * @module app/api/contacts/route
 */

import { createServerClient } from '@/lib/supabase/server';
import { apiError, apiResponse, fetchAllRows, handleRouteError, requireAuth } from '@/lib/api/utils';
import { distinctContacts } from '@/services/insights';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('API:Contacts');

export async function GET() {
  logger.start('Fetching contacts');

  try {
    const supabase = await createServerClient();

    const userResult = await requireAuth(supabase);
    if (userResult instanceof Response) return userResult;
    const user = userResult;

    const { data, error } = await fetchAllRows((from, to) =>
      supabase
        .from('contacts')
        .select('name, email, phone, company, position')
        .eq('user_id', user.id)
        .order('id')
        .range(from, to)
    );

    if (error) {
      logger.error('Database query failed', { error: error.message });
      return apiError('Failed to fetch contacts', 500);
    }

    const contacts = distinctContacts(data);
    logger.success('Contacts fetched', { count: contacts.length });
    return apiResponse(contacts);
  } catch (error) {
    return handleRouteError(error, 'Failed to fetch contacts');
  }
}
