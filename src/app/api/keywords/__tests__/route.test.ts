// @vitest-environment node
/**
 * Tests for the keywords route
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSupabaseFake, type SupabaseFake } from '@/test-utils/supabase-fake';
import { GET } from '../route';

const mockUser = { id: 'user-123', email: 'test@example.com' };

let supabase: SupabaseFake = createSupabaseFake({ user: mockUser });

vi.mock('@/lib/supabase/server', () => ({
  createServerClient: async () => supabase,
}));

describe('GET /api/keywords', () => {
  beforeEach(() => {
    supabase = createSupabaseFake({ user: mockUser });
  });

  it('reads past the first 1000 rows before ranking', async () => {
    supabase.queue(
      'keywords',
      { data: Array.from({ length: 1000 }, () => ({ word: 'report', score: 0.1 })), error: null },
      {
        data: [
          { word: 'report', score: 0.9 },
          { word: 'deadline', score: 0.5 },
        ],
        error: null,
      }
    );

    const response = await GET();

    expect(response.status).toBe(200);
    expect((await response.json()).data).toEqual([
      { word: 'report', score: 0.9 },
      { word: 'deadline', score: 0.5 },
    ]);

    const queries = supabase.queries('keywords');
    expect(queries.map((query) => query.argsOf('range'))).toEqual([[[0, 999]], [[1000, 1999]]]);
    expect(queries[0]?.argsOf('eq')).toEqual([['user_id', 'user-123']]);
  });

  it('stops after a short first page', async () => {
    supabase.queue('keywords', { data: [{ word: 'invoice', score: 0.4 }], error: null });

    const response = await GET();

    expect((await response.json()).data).toEqual([{ word: 'invoice', score: 0.4 }]);
    expect(supabase.queries('keywords')).toHaveLength(1);
  });

  it('returns 401 without a session', async () => {
    supabase = createSupabaseFake({ user: null });

    const response = await GET();

    expect(response.status).toBe(401);
    expect(supabase.queries('keywords')).toHaveLength(0);
  });
});
