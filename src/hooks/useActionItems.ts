/**
 * ✅ useActionItems Hook
 *
 * React hook for the action items page.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FEATURES
 * ═══════════════════════════════════════════════════════════════════════════════
 * - Fetches pending, completed or all items, earliest deadline first
 * - Optimistic toggling: the item moves at once and is restored if the
 *   update fails
 *
 * ```tsx
 * const { items, toggleComplete, stats } = useActionItems({ completed: false });
 * ```
 *
 * @module hooks/useActionItems
 */

'use client';

import * as React from 'react';
import { apiClient } from '@/lib/api/client';
import { createLogger } from '@/lib/utils/logger';
import type { ActionItemWithEmail } from '@/types/api';

const logger = createLogger('useActionItems');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface UseActionItemsOptions {
  /** Only pending (false) or completed (true) items; omit for both */
  completed?: boolean;
}

export interface ActionItemStats {
  total: number;
  completed: number;
  pending: number;
  overdue: number;
}

export interface UseActionItemsReturn {
  items: ActionItemWithEmail[];
  isLoading: boolean;
  error: Error | null;
  refetch: () => Promise<void>;
  toggleComplete: (id: string) => Promise<void>;
  stats: ActionItemStats;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isOverdue(item: ActionItemWithEmail, now: Date): boolean {
  return !item.completed && item.deadline !== null && new Date(item.deadline) < now;
}

export function calculateStats(items: ActionItemWithEmail[], now: Date = new Date()): ActionItemStats {
  const completed = items.filter((item) => item.completed).length;
  return {
    total: items.length,
    completed,
    pending: items.length - completed,
    overdue: items.filter((item) => isOverdue(item, now)).length,
  };
}

/** Whether an item still belongs in a list filtered by `completed` */
function matchesFilter(item: ActionItemWithEmail, completed: boolean | undefined): boolean {
  return completed === undefined || item.completed === completed;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HOOK IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export function useActionItems(options: UseActionItemsOptions = {}): UseActionItemsReturn {
  const { completed } = options;

  const [items, setItems] = React.useState<ActionItemWithEmail[]>([]);
  const [isLoading, setIsLoading] = React.useState(true);
  const [error, setError] = React.useState<Error | null>(null);

  const fetchItems = React.useCallback(async () => {
    setIsLoading(true);
    setError(null);

    try {
      setItems(await apiClient.listActionItems(completed));
    } catch (err) {
      logger.error('Failed to load action items', { error: toError(err).message });
      setError(toError(err));
    } finally {
      setIsLoading(false);
    }
  }, [completed]);

  React.useEffect(() => {
    void fetchItems();
  }, [fetchItems]);

  const toggleComplete = React.useCallback(
    async (id: string) => {
      const index = items.findIndex((item) => item.id === id);
      const original = items[index];
      if (!original) return;

      const toggled: ActionItemWithEmail = {
        ...original,
        completed: !original.completed,
        completed_at: original.completed ? null : new Date().toISOString(),
      };

      // Optimistic update
      setItems((prev) =>
        prev.flatMap((item) => (item.id !== id ? [item] : matchesFilter(toggled, completed) ? [toggled] : []))
      );

      try {
        const updated = await apiClient.updateActionItem(id, toggled.completed);
        setItems((prev) => prev.map((item) => (item.id === id ? { ...item, ...updated } : item)));
        logger.success('Action item toggled', { actionItemId: id, completed: updated.completed });
      } catch (err) {
        logger.error('Failed to toggle action item', { actionItemId: id, error: toError(err).message });
        setItems((prev) => {
          const without = prev.filter((item) => item.id !== id);
          without.splice(Math.min(index, without.length), 0, original);
          return without;
        });
        setError(toError(err));
      }
    },
    [items, completed]
  );

  const stats = React.useMemo(() => calculateStats(items), [items]);

  return { items, isLoading, error, refetch: fetchItems, toggleComplete, stats };
}
