// @vitest-environment node
/**
 * Tests for the statistics route
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSupabaseFake, type SupabaseFake } from '@/test-utils/supabase-fake';
import { GET } from '../route';

const mockUser = { id: 'user-123', email: 'test@example.com' };

let supabase: SupabaseFake = createSupabaseFake({ user: mockUser });

vi.mock('@/lib/supabase/server', () => ({
  createServerClient: async () => supabase,
}));

const workEmail = { category: 'Work', sentiment_label: 'neutral', priority_score: 5, needs_followup: false };

describe('GET /api/statistics', () => {
  beforeEach(() => {
    supabase = createSupabaseFake({ user: mockUser });
  });

  it('counts every email, not only the first page', async () => {
    supabase.queue(
      'emails',
      { data: Array.from({ length: 1000 }, () => workEmail), error: null },
      {
        data: [{ category: 'Personal', sentiment_label: 'positive', priority_score: 9, needs_followup: true }],
        error: null,
      }
    );
    supabase.queue('action_items', { data: [{ completed: true }, { completed: false }], error: null });

    const response = await GET();

    expect(response.status).toBe(200);
    expect((await response.json()).data).toEqual({
      total: 1001,
      categories: { Work: 1000, Personal: 1 },
      sentiments: { neutral: 1000, positive: 1 },
      priorityDistribution: { low: 0, medium: 1000, high: 1 },
      followupNeeded: 1,
      actionItems: { total: 2, completed: 1 },
    });
    expect(supabase.queries('emails')).toHaveLength(2);
    expect(supabase.queries('action_items')).toHaveLength(1);
  });

  it('fails with 500 when a later page errors', async () => {
    supabase.queue(
      'emails',
      { data: Array.from({ length: 1000 }, () => workEmail), error: null },
      { data: null, error: { message: 'statement timeout' } }
    );

    const response = await GET();

    expect(response.status).toBe(500);
    expect((await response.json()).error).toBe('Failed to compute statistics');
  });
});
