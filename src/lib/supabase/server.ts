/**
 * Supabase Server Client
 *
 * Cookie-backed Supabase client for route handlers. Queries run as the
 * signed-in user, so row level security applies to every table.
 *
 * @module lib/supabase/server
 */

import { createServerClient as createSSRServerClient } from '@supabase/ssr';
import { cookies } from 'next/headers';
import type { SupabaseClient } from '@supabase/supabase-js';
import { appConfig } from '@/config/app';
import type { Database } from '@/types/database';
import { createLogger } from '@/lib/utils/logger';

const logger = createLogger('SupabaseServer');

/** Supabase client typed with our schema */
export type TypedSupabaseClient = SupabaseClient<Database>;

/**
 * Creates a Supabase client for server-side operations with user context.
 *
 * @example
 * ```typescript
 * import { createServerClient } from '@/lib/supabase/server';
 *
 * export async function GET() {
 *   const supabase = await createServerClient();
 *   const { data: { user } } = await supabase.auth.getUser();
 *
 *   const { data: emails } = await supabase
 *     .from('emails')
 *     .select('*')
 *     .eq('user_id', user.id);
 * }
 * ```
 */
export async function createServerClient(): Promise<TypedSupabaseClient> {
  const { url: supabaseUrl, anonKey: supabaseAnonKey } = appConfig.supabase;

  if (!supabaseUrl || !supabaseAnonKey) {
    logger.error('Missing Supabase environment variables');
    throw new Error(
      'Missing Supabase environment variables. ' +
      'Ensure NEXT_PUBLIC_SUPABASE_URL and NEXT_PUBLIC_SUPABASE_ANON_KEY are set.'
    );
  }

  const cookieStore = await cookies();

  return createSSRServerClient<Database>(supabaseUrl, supabaseAnonKey, {
    cookies: {
      getAll() {
        return cookieStore.getAll();
      },
      setAll(cookiesToSet) {
        try {
          cookiesToSet.forEach(({ name, value, options }) => {
            cookieStore.set(name, value, options);
          });
        } catch (error) {
          // Server Components cannot set cookies; the next route handler call refreshes them.
          logger.debug('Skipped cookie refresh outside a route handler', {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      },
    },
  });
}
