// @vitest-environment node
/**
 * Tests for the paged row reader
 */

import { describe, it, expect, vi } from 'vitest';
import { fetchAllRows } from '../utils';

type Page = { data: string[] | null; error: { message: string } | null };

describe('fetchAllRows', () => {
  it('requests pages until one comes back short', async () => {
    const pages: Page[] = [
      { data: ['a', 'b'], error: null },
      { data: ['c', 'd'], error: null },
      { data: [], error: null },
    ];
    const fetchPage = vi.fn(async (_from: number, _to: number): Promise<Page> => pages.shift() ?? { data: [], error: null });

    const result = await fetchAllRows(fetchPage, 2);

    expect(result).toEqual({ data: ['a', 'b', 'c', 'd'], error: null });
    expect(fetchPage.mock.calls).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it('stops at the first error and returns it', async () => {
    const fetchPage = vi
      .fn<(from: number, to: number) => Promise<Page>>()
      .mockResolvedValueOnce({ data: ['a', 'b'], error: null })
      .mockResolvedValueOnce({ data: null, error: { message: 'statement timeout' } });

    const result = await fetchAllRows(fetchPage, 2);

    expect(result).toEqual({ data: ['a', 'b'], error: { message: 'statement timeout' } });
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('treats a null page as empty', async () => {
    const result = await fetchAllRows(async () => ({ data: null, error: null }), 2);

    expect(result).toEqual({ data: [], error: null });
  });
});
