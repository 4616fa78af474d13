/**
 * 📊 useInsights Hook
 *
 * Loads everything the insights page shows in one go: statistics, entities,
 * keywords and contacts.
 *
 * @module hooks/useInsights
 */

'use client';

import * as React from 'react';
import { apiClient } from '@/lib/api/client';
import { createLogger } from '@/lib/utils/logger';
import type { ContactSummary, EmailStatistics, EntitySummary, KeywordSummary } from '@/types/api';

const logger = createLogger('useInsights');

/** Keywords shown on the insights page */
const TOP_KEYWORD_COUNT = 20;

export interface UseInsightsReturn {
  statistics: EmailStatistics | null;
  entities: EntitySummary[];
  keywords: KeywordSummary[];
  contacts: ContactSummary[];
  isLoading: boolean;
  error: Error | null;
  refetch: () => Promise<void>;
}

export function useInsights(): UseInsightsReturn {
  const [statistics, setStatistics] = React.useState<EmailStatistics | null>(null);
  const [entities, setEntities] = React.useState<EntitySummary[]>([]);
  const [keywords, setKeywords] = React.useState<KeywordSummary[]>([]);
  const [contacts, setContacts] = React.useState<ContactSummary[]>([]);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<Error | null>(null);

  const fetchInsights = React.useCallback(async () => {
    setIsLoading(true);
    setError(null);

    try {
      const [stats, entityList, keywordList, contactList] = await Promise.all([
        apiClient.getStatistics(),
        apiClient.getEntities(),
        apiClient.getKeywords(),
        apiClient.getContacts(),
      ]);

      setStatistics(stats);
      setEntities(entityList);
      setKeywords(keywordList.slice(0, TOP_KEYWORD_COUNT));
      setContacts(contactList);
    } catch (err) {
      const failure = err instanceof Error ? err : new Error(String(err));
      logger.error('Failed to load insights', { error: failure.message });
      setError(failure);
    } finally {
      setIsLoading(false);
    }
  }, []);

  React.useEffect(() => {
    void fetchInsights();
  }, [fetchInsights]);

  return { statistics, entities, keywords, contacts, isLoading, error, refetch: fetchInsights };
}
