/**
 * In-process stand-in for the Supabase client used by route tests.
 *
 * Every query builder records its calls and, when awaited, resolves to the
 * next queued result for its table (the last one repeats).
 *
 * ```typescript
 * let supabase = createSupabaseFake({ user: { id: 'user-123', email: 'test@example.com' } });
 * vi.mock('@/lib/supabase/server', () => ({ createServerClient: async () => supabase }));
 *
 * supabase.queue('emails', { data: [], error: null, count: 0 });
 * ```
 */

import { vi } from 'vitest';

export interface FakeQueryResult {
  data: unknown;
  error: { message: string; code?: string } | null;
  count?: number | null;
}

export interface RecordedCall {
  method: string;
  args: unknown[];
}

export interface FakeUser {
  id: string;
  email: string;
}

export interface FakeSessionResult {
  data: {
    session: { provider_token: string | null; provider_refresh_token: string | null } | null;
    user: { id: string; email: string; user_metadata: Record<string, unknown> } | null;
  };
  error: { message: string } | null;
}

const EMPTY_RESULT: FakeQueryResult = { data: null, error: null };

export class FakeQueryBuilder implements PromiseLike<FakeQueryResult> {
  readonly calls: RecordedCall[] = [];

  constructor(
    readonly table: string,
    private readonly next: () => FakeQueryResult
  ) {}

  private record(method: string, args: unknown[]): this {
    this.calls.push({ method, args });
    return this;
  }

  select(...args: unknown[]) { return this.record('select', args); }
  insert(...args: unknown[]) { return this.record('insert', args); }
  upsert(...args: unknown[]) { return this.record('upsert', args); }
  update(...args: unknown[]) { return this.record('update', args); }
  delete(...args: unknown[]) { return this.record('delete', args); }
  eq(...args: unknown[]) { return this.record('eq', args); }
  in(...args: unknown[]) { return this.record('in', args); }
  order(...args: unknown[]) { return this.record('order', args); }
  range(...args: unknown[]) { return this.record('range', args); }
  single() { return this.record('single', []); }
  maybeSingle() { return this.record('maybeSingle', []); }

  /** Arguments of every call to `method`, in order */
  argsOf(method: string): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  then<TResult1 = FakeQueryResult, TResult2 = never>(
    onfulfilled?: ((value: FakeQueryResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return Promise.resolve(this.next()).then(onfulfilled, onrejected);
  }
}

export function createSupabaseFake(options: { user: FakeUser | null }) {
  const results = new Map<string, FakeQueryResult[]>();
  const builders: FakeQueryBuilder[] = [];

  const nextResult = (table: string): FakeQueryResult => {
    const queued = results.get(table);
    if (!queued || queued.length === 0) return EMPTY_RESULT;
    if (queued.length === 1) return queued[0] ?? EMPTY_RESULT;
    return queued.shift() ?? EMPTY_RESULT;
  };

  return {
    auth: {
      getUser: vi.fn(async () => ({
        data: { user: options.user },
        error: options.user ? null : { message: 'Auth session missing!' },
      })),
      signOut: vi.fn(async () => ({ error: null })),
      signInWithOAuth: vi.fn(async () => ({
        data: { provider: 'google', url: 'https://accounts.google.com/o/oauth2/auth?client_id=test' },
        error: null,
      })),
      exchangeCodeForSession: vi.fn(
        async (_code: string): Promise<FakeSessionResult> => ({
          data: { session: null, user: null },
          error: { message: 'exchange not configured' },
        })
      ),
    },

    from(table: string): FakeQueryBuilder {
      const builder = new FakeQueryBuilder(table, () => nextResult(table));
      builders.push(builder);
      return builder;
    },

    /** Queues the results the next awaited queries on `table` resolve to */
    queue(table: string, ...tableResults: FakeQueryResult[]): void {
      results.set(table, [...(results.get(table) ?? []), ...tableResults]);
    },

    /** Builders created for `table`, oldest first */
    queries(table: string): FakeQueryBuilder[] {
      return builders.filter((builder) => builder.table === table);
    },
  };
}

export type SupabaseFake = ReturnType<typeof createSupabaseFake>;
