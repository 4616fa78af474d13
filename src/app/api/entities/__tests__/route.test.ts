// @vitest-environment node
/**
 * Tests for the entities route
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSupabaseFake, type SupabaseFake } from '@/test-utils/supabase-fake';
import { GET } from '../route';

const mockUser = { id: 'user-123', email: 'test@example.com' };

let supabase: SupabaseFake = createSupabaseFake({ user: mockUser });

vi.mock('@/lib/supabase/server', () => ({
  createServerClient: async () => supabase,
}));

describe('GET /api/entities', () => {
  beforeEach(() => {
    supabase = createSupabaseFake({ user: mockUser });
  });

  it('keeps an entity that only appears after the first page', async () => {
    supabase.queue(
      'entities',
      { data: Array.from({ length: 1000 }, () => ({ text: 'Berlin', type: 'LOC' })), error: null },
      { data: [{ text: 'Acme Corp', type: 'ORG' }], error: null }
    );

    const response = await GET();

    expect(response.status).toBe(200);
    expect((await response.json()).data).toEqual([
      { text: 'Berlin', type: 'LOC' },
      { text: 'Acme Corp', type: 'ORG' },
    ]);
  });

  it('returns 500 when the query fails', async () => {
    supabase.queue('entities', { data: null, error: { message: 'permission denied' } });

    const response = await GET();

    expect(response.status).toBe(500);
    expect((await response.json()).error).toBe('Failed to fetch entities');
  });
});
