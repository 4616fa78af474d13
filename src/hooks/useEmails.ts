/**
 * 📧 useEmails Hook
 *
 * React hook for the inbox list: one page of annotated emails for a tab and
 * its filters, plus the "Fetch new emails" action.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════════
 * ```tsx
 * const { emails, isLoading, syncEmails, isSyncing, lastSync } = useEmails({
 *   filter: 'important',
 *   category: 'Meeting',
 * });
 * ```
 *
 * After a successful sync the current page is reloaded.
 *
 * @module hooks/useEmails
 */

'use client';

import * as React from 'react';
import { apiClient, type EmailListParams } from '@/lib/api/client';
import { createLogger } from '@/lib/utils/logger';
import type { EmailSummary, SyncSummary } from '@/types/api';

const logger = createLogger('useEmails');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface UseEmailsReturn {
  emails: EmailSummary[];
  total: number;
  hasMore: boolean;
  isLoading: boolean;
  error: Error | null;
  refetch: () => Promise<void>;
  /** Fetches and processes new Gmail messages, then reloads the list */
  syncEmails: () => Promise<void>;
  isSyncing: boolean;
  /** Counts from the last sync in this session */
  lastSync: SyncSummary | null;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ═══════════════════════════════════════════════════════════════════════════════
// HOOK IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export function useEmails(options: EmailListParams = {}): UseEmailsReturn {
  const [emails, setEmails] = React.useState<EmailSummary[]>([]);
  const [total, setTotal] = React.useState(0);
  const [hasMore, setHasMore] = React.useState(false);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<Error | null>(null);
  const [isSyncing, setIsSyncing] = React.useState(false);
  const [lastSync, setLastSync] = React.useState<SyncSummary | null>(null);

  const { filter = 'all', category, sentiment, page, limit } = options;

  const fetchEmails = React.useCallback(async () => {
    setIsLoading(true);
    setError(null);

    try {
      const result = await apiClient.listEmails({ filter, category, sentiment, page, limit });
      setEmails(result.emails);
      setTotal(result.total);
      setHasMore(result.hasMore);
      logger.debug('Emails loaded', { count: result.emails.length, filter });
    } catch (err) {
      logger.error('Failed to load emails', { error: toError(err).message });
      setError(toError(err));
    } finally {
      setIsLoading(false);
    }
  }, [filter, category, sentiment, page, limit]);

  React.useEffect(() => {
    void fetchEmails();
  }, [fetchEmails]);

  const syncEmails = React.useCallback(async () => {
    setIsSyncing(true);
    setError(null);

    try {
      const result = await apiClient.syncEmails();
      setLastSync(result);
      logger.success('Sync finished', { ...result });
      await fetchEmails();
    } catch (err) {
      logger.error('Sync failed', { error: toError(err).message });
      setError(toError(err));
    } finally {
      setIsSyncing(false);
    }
  }, [fetchEmails]);

  return { emails, total, hasMore, isLoading, error, refetch: fetchEmails, syncEmails, isSyncing, lastSync };
}
