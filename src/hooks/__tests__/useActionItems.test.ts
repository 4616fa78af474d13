/**
 * Tests for useActionItems Hook
 *
 * Tests fetching, optimistic toggling and rollback on failure.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { renderHook, waitFor, act } from '@testing-library/react';
import { apiClient } from '@/lib/api/client';
import type { ActionItemWithEmail } from '@/types/api';
import { calculateStats, useActionItems } from '../useActionItems';

// ═══════════════════════════════════════════════════════════════════════════════
// MOCKS
// ═══════════════════════════════════════════════════════════════════════════════

vi.mock('@/lib/api/client', () => ({
  apiClient: {
    listActionItems: vi.fn(),
    updateActionItem: vi.fn(),
  },
}));

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA
// ═══════════════════════════════════════════════════════════════════════════════

function makeItem(id: string, overrides: Partial<ActionItemWithEmail> = {}): ActionItemWithEmail {
  return {
    id,
    email_id: 'email-1',
    user_id: 'user-1',
    text: `Send report ${id}`,
    deadline: null,
    completed: false,
    completed_at: null,
    created_at: '2026-01-05T09:00:00Z',
    email: { subject: 'Quarterly review', sender_name: 'Jane Smith' },
    ...overrides,
  };
}

const pendingItems = [makeItem('1', { deadline: '2026-01-06T17:00:00Z' }), makeItem('2')];

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(apiClient.listActionItems).mockResolvedValue(pendingItems);
});

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('useActionItems', () => {
  it('loads items for the requested filter', async () => {
    const { result } = renderHook(() => useActionItems({ completed: false }));

    expect(result.current.isLoading).toBe(true);
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    expect(result.current.items.map((item) => item.id)).toEqual(['1', '2']);
    expect(apiClient.listActionItems).toHaveBeenCalledWith(false);
    expect(result.current.stats).toMatchObject({ total: 2, completed: 0, pending: 2 });
  });

  it('removes a completed item from the pending list before the server answers', async () => {
    let resolveUpdate: (value: ActionItemWithEmail) => void = () => undefined;
    vi.mocked(apiClient.updateActionItem).mockReturnValueOnce(
      new Promise((resolve) => {
        resolveUpdate = resolve;
      })
    );

    const { result } = renderHook(() => useActionItems({ completed: false }));
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    let toggle: Promise<void> = Promise.resolve();
    act(() => {
      toggle = result.current.toggleComplete('1');
    });

    expect(result.current.items.map((item) => item.id)).toEqual(['2']);
    expect(apiClient.updateActionItem).toHaveBeenCalledWith('1', true);

    await act(async () => {
      resolveUpdate(makeItem('1', { completed: true, completed_at: '2026-01-05T10:00:00Z' }));
      await toggle;
    });

    expect(result.current.items.map((item) => item.id)).toEqual(['2']);
    expect(result.current.error).toBeNull();
  });

  it('keeps a toggled item in the unfiltered list', async () => {
    vi.mocked(apiClient.updateActionItem).mockResolvedValueOnce(
      makeItem('2', { completed: true, completed_at: '2026-01-05T10:00:00Z' })
    );

    const { result } = renderHook(() => useActionItems());
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    await act(async () => {
      await result.current.toggleComplete('2');
    });

    expect(result.current.items[1]).toMatchObject({ id: '2', completed: true });
    expect(result.current.items[1]?.email).toEqual({ subject: 'Quarterly review', sender_name: 'Jane Smith' });
  });

  it('restores the item in place when the update fails', async () => {
    vi.mocked(apiClient.updateActionItem).mockRejectedValueOnce(new Error('Action item not found'));

    const { result } = renderHook(() => useActionItems({ completed: false }));
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    await act(async () => {
      await result.current.toggleComplete('1');
    });

    expect(result.current.items.map((item) => item.id)).toEqual(['1', '2']);
    expect(result.current.items[0]?.completed).toBe(false);
    expect(result.current.error?.message).toBe('Action item not found');
  });

  it('reports a failed load', async () => {
    vi.mocked(apiClient.listActionItems).mockRejectedValueOnce(new Error('Unauthorized'));

    const { result } = renderHook(() => useActionItems());
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    expect(result.current.error?.message).toBe('Unauthorized');
    expect(result.current.items).toEqual([]);
  });
});

describe('calculateStats', () => {
  it('counts overdue items that are still open', () => {
    const now = new Date('2026-01-07T00:00:00Z');
    const stats = calculateStats(
      [
        makeItem('a', { deadline: '2026-01-06T17:00:00Z' }),
        makeItem('b', { deadline: '2026-01-06T17:00:00Z', completed: true }),
        makeItem('c', { deadline: '2026-01-09T17:00:00Z' }),
        makeItem('d'),
      ],
      now
    );

    expect(stats).toEqual({ total: 4, completed: 1, pending: 3, overdue: 1 });
  });
});
