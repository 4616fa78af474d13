/**
 * useEmailDetail Hook
 *
 * One email with its annotations. Toggling an action item updates the view
 * right away and rolls back if the server refuses.
 *
 * @module hooks/useEmailDetail
 */

'use client';

import * as React from 'react';
import { apiClient } from '@/lib/api/client';
import { createLogger } from '@/lib/utils/logger';
import type { EmailDetail } from '@/types/api';

const logger = createLogger('useEmailDetail');

export interface UseEmailDetailReturn {
  email: EmailDetail | null;
  isLoading: boolean;
  error: Error | null;
  refetch: () => Promise<void>;
  toggleActionItem: (actionItemId: string) => Promise<void>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function withActionItem(email: EmailDetail, actionItemId: string, completed: boolean): EmailDetail {
  return {
    ...email,
    action_items: email.action_items.map((item) =>
      item.id === actionItemId ? { ...item, completed } : item
    ),
  };
}

export function useEmailDetail(id: string): UseEmailDetailReturn {
  const [email, setEmail] = React.useState<EmailDetail | null>(null);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<Error | null>(null);

  const fetchEmail = React.useCallback(async () => {
    setIsLoading(true);
    setError(null);

    try {
      setEmail(await apiClient.getEmail(id));
    } catch (err) {
      logger.error('Failed to load email', { emailId: id, error: toError(err).message });
      setError(toError(err));
    } finally {
      setIsLoading(false);
    }
  }, [id]);

  React.useEffect(() => {
    void fetchEmail();
  }, [fetchEmail]);

  const toggleActionItem = React.useCallback(
    async (actionItemId: string) => {
      const current = email?.action_items.find((item) => item.id === actionItemId);
      if (!current) return;

      const completed = !current.completed;
      setEmail((prev) => (prev ? withActionItem(prev, actionItemId, completed) : prev));

      try {
        const updated = await apiClient.updateActionItem(actionItemId, completed);
        setEmail((prev) =>
          prev
            ? {
                ...prev,
                action_items: prev.action_items.map((item) => (item.id === updated.id ? updated : item)),
              }
            : prev
        );
      } catch (err) {
        logger.error('Failed to update action item', { actionItemId, error: toError(err).message });
        setEmail((prev) => (prev ? withActionItem(prev, actionItemId, current.completed) : prev));
        setError(toError(err));
      }
    },
    [email]
  );

  return { email, isLoading, error, refetch: fetchEmail, toggleActionItem };
}
