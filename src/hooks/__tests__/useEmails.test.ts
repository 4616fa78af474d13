/**
 * Tests for useEmails Hook
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { renderHook, waitFor, act } from '@testing-library/react';
import { apiClient } from '@/lib/api/client';
import type { EmailSummary } from '@/types/api';
import { useEmails } from '../useEmails';

vi.mock('@/lib/api/client', () => ({
  apiClient: {
    listEmails: vi.fn(),
    syncEmails: vi.fn(),
  },
}));

const email: EmailSummary = {
  id: 'email-1',
  gmail_id: 'gm-1',
  subject: 'Quarterly review',
  sender_name: 'Jane Smith',
  sender_email: 'jane@example.com',
  received_at: '2026-01-05T09:00:00Z',
  summary: 'Please send the report by Friday.',
  category: 'Meeting',
  sentiment_label: 'Neutral',
  sentiment_score: 0,
  priority_score: 6.2,
  is_important: false,
  is_starred: false,
  needs_followup: true,
  followup_date: '2026-01-09T00:00:00Z',
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(apiClient.listEmails).mockResolvedValue({
    emails: [email],
    total: 1,
    page: 1,
    limit: 50,
    hasMore: false,
  });
});

describe('useEmails', () => {
  it('loads the all tab by default', async () => {
    const { result } = renderHook(() => useEmails());
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    expect(result.current.emails).toEqual([email]);
    expect(result.current.total).toBe(1);
    expect(apiClient.listEmails).toHaveBeenCalledWith({
      filter: 'all',
      category: undefined,
      sentiment: undefined,
      page: undefined,
      limit: undefined,
    });
  });

  it('reloads when the filters change', async () => {
    const { result, rerender } = renderHook((props: { category?: 'Finance' }) => useEmails({ filter: 'important', ...props }), {
      initialProps: {},
    });
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    rerender({ category: 'Finance' });
    await waitFor(() => expect(apiClient.listEmails).toHaveBeenCalledTimes(2));

    expect(vi.mocked(apiClient.listEmails).mock.lastCall?.[0]).toMatchObject({
      filter: 'important',
      category: 'Finance',
    });
  });

  it('syncs, keeps the counts and reloads the list', async () => {
    vi.mocked(apiClient.syncEmails).mockResolvedValueOnce({ fetched: 5, created: 2, updated: 3, failed: 0 });

    const { result } = renderHook(() => useEmails());
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    await act(async () => {
      await result.current.syncEmails();
    });

    expect(result.current.lastSync).toEqual({ fetched: 5, created: 2, updated: 3, failed: 0 });
    expect(result.current.isSyncing).toBe(false);
    expect(apiClient.listEmails).toHaveBeenCalledTimes(2);
  });

  it('surfaces a sync failure without reloading', async () => {
    vi.mocked(apiClient.syncEmails).mockRejectedValueOnce(
      new Error('Gmail authorization required. Please sign in again.')
    );

    const { result } = renderHook(() => useEmails());
    await waitFor(() => expect(result.current.isLoading).toBe(false));

    await act(async () => {
      await result.current.syncEmails();
    });

    expect(result.current.error?.message).toBe('Gmail authorization required. Please sign in again.');
    expect(apiClient.listEmails).toHaveBeenCalledTimes(1);
  });
});
