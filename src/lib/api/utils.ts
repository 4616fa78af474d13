/**
 * API Route Utilities
 *
 * Shared helpers for Next.js route handlers: the response envelope,
 * pagination, Zod validation, authentication and error mapping.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RESPONSE ENVELOPE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every route answers with `{ success, data?, error?, errors?, meta? }`.
 *
 * ```typescript
 * export async function GET(request: NextRequest) {
 *   try {
 *     const supabase = await createServerClient();
 *     const userResult = await requireAuth(supabase);
 *     if (userResult instanceof Response) return userResult;
 *
 *     const query = validateQuery(request, actionItemsQuerySchema);
 *     if (query instanceof Response) return query;
 *
 *     return apiResponse(items);
 *   } catch (error) {
 *     return handleRouteError(error, 'Failed to load action items');
 *   }
 * }
 * ```
 *
 * @module lib/api/utils
 */

import { NextResponse } from 'next/server';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { appConfig } from '@/config/app';
import { GmailAuthError, GmailRateLimitError, GmailSyncError, isGmailError } from '@/lib/gmail/errors';
import { createLogger } from '@/lib/utils/logger';
import type { TypedSupabaseClient } from '@/lib/supabase/server';

const logger = createLogger('API');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  /** Field-level validation errors, keyed by dotted path */
  errors?: Record<string, string[]>;
  meta?: {
    page?: number;
    limit?: number;
    total?: number;
    hasMore?: boolean;
  };
}

export interface PaginationParams {
  page: number;
  limit: number;
  offset: number;
}

export interface AuthenticatedUser {
  id: string;
  email: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function apiResponse<T>(
  data: T,
  status = 200,
  headers?: Record<string, string>
): NextResponse<ApiResponse<T>> {
  return NextResponse.json({ success: true, data }, { status, headers });
}

/**
 * Paginated list with `X-Total-Count`, `X-Page`, `X-Limit`,
 * `X-Total-Pages` and, given a base URL, a `Link` header.
 */
export function paginatedResponse<T>(
  data: T[],
  pagination: PaginationParams,
  total: number,
  baseUrl?: string
): NextResponse<ApiResponse<T[]>> {
  const { page, limit } = pagination;
  const totalPages = Math.ceil(total / limit);
  const hasMore = page < totalPages;

  const headers: Record<string, string> = {
    'X-Total-Count': total.toString(),
    'X-Page': page.toString(),
    'X-Limit': limit.toString(),
    'X-Total-Pages': totalPages.toString(),
  };

  if (baseUrl) {
    const links: string[] = [];
    const url = new URL(baseUrl);

    url.searchParams.set('page', '1');
    links.push(`<${url.toString()}>; rel="first"`);

    if (page > 1) {
      url.searchParams.set('page', (page - 1).toString());
      links.push(`<${url.toString()}>; rel="prev"`);
    }

    if (hasMore) {
      url.searchParams.set('page', (page + 1).toString());
      links.push(`<${url.toString()}>; rel="next"`);
    }

    url.searchParams.set('page', Math.max(1, totalPages).toString());
    links.push(`<${url.toString()}>; rel="last"`);

    headers['Link'] = links.join(', ');
  }

  return NextResponse.json(
    { success: true, data, meta: { page, limit, total, hasMore } },
    { status: 200, headers }
  );
}

export function apiError(
  message: string,
  status = 400,
  errors?: Record<string, string[]>
): NextResponse<ApiResponse<never>> {
  logger.error(`API Error: ${message}`, { status, errors });

  return NextResponse.json({ success: false, error: message, errors }, { status });
}

/**
 * Maps an unexpected error to a response. Gmail errors keep their meaning
 * (auth → 401, rate limit → 429, failed sync stage → 500, other → 502);
 * anything else is a 500.
 */
export function handleRouteError(error: unknown, fallbackMessage: string): NextResponse<ApiResponse<never>> {
  if (isGmailError(error)) {
    logger.warn('Gmail error in route', { ...error.toJSON() });

    if (error instanceof GmailAuthError) {
      return apiError('Gmail authorization required. Please sign in again.', 401);
    }
    if (error instanceof GmailRateLimitError) {
      return apiError('Gmail rate limit reached. Try again shortly.', 429);
    }
    if (error instanceof GmailSyncError) {
      return apiError(`Email sync failed during ${error.failedAt}`, 500);
    }
    return apiError(`Gmail request failed: ${error.message}`, 502);
  }

  logger.error(fallbackMessage, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return apiError('Internal server error', 500);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGINATION HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const DEFAULT_PAGE = 1;

/**
 * Reads `page` and `limit` from the query string, clamped to
 * [1, maxPageSize]. Unreadable values fall back to the defaults.
 */
export function getPagination(request: Request): PaginationParams {
  const url = new URL(request.url);
  const { defaultPageSize, maxPageSize } = appConfig.pagination;

  const rawPage = Number.parseInt(url.searchParams.get('page') ?? '', 10);
  const rawLimit = Number.parseInt(url.searchParams.get('limit') ?? '', 10);

  const page = Math.max(1, Number.isNaN(rawPage) ? DEFAULT_PAGE : rawPage);
  const limit = Math.min(Math.max(1, Number.isNaN(rawLimit) ? defaultPageSize : rawLimit), maxPageSize);

  return { page, limit, offset: (page - 1) * limit };
}

interface RowsPage<Row> {
  data: Row[] | null;
  error: { message: string } | null;
}

/**
 * Reads every row of a query by requesting `pageSize` rows at a time until
 * a short page comes back. `fetchPage` receives inclusive row bounds for
 * `.range()`; the query should be ordered so pages do not overlap.
 *
 * ```typescript
 * const { data, error } = await fetchAllRows((from, to) =>
 *   supabase.from('keywords').select('word, score').eq('user_id', userId).order('id').range(from, to)
 * );
 * ```
 */
export async function fetchAllRows<Row>(
  fetchPage: (from: number, to: number) => PromiseLike<RowsPage<Row>>,
  pageSize: number = appConfig.pagination.scanPageSize
): Promise<{ data: Row[]; error: { message: string } | null }> {
  const rows: Row[] = [];

  for (let from = 0; ; from += pageSize) {
    const { data, error } = await fetchPage(from, from + pageSize - 1);
    if (error) return { data: rows, error };

    const page = data ?? [];
    rows.push(...page);
    if (page.length < pageSize) return { data: rows, error: null };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function toFieldErrors(error: ZodError): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of error.errors) {
    const path = issue.path.join('.') || '_root';
    (fieldErrors[path] ??= []).push(issue.message);
  }
  return fieldErrors;
}

/**
 * Parses and validates a JSON body.
 *
 * @returns The parsed value, or a 400 response
 */
export async function validateBody<T>(
  request: Request,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T | NextResponse<ApiResponse<never>>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return apiError('Invalid JSON body', 400);
  }

  const result = schema.safeParse(body);
  return result.success ? result.data : apiError('Validation failed', 400, toFieldErrors(result.error));
}

/**
 * Validates query string parameters.
 *
 * @returns The parsed value, or a 400 response
 */
export function validateQuery<T>(
  request: Request,
  schema: ZodType<T, ZodTypeDef, unknown>
): T | NextResponse<ApiResponse<never>> {
  const params = Object.fromEntries(new URL(request.url).searchParams);
  const result = schema.safeParse(params);

  return result.success ? result.data : apiError('Invalid query parameters', 400, toFieldErrors(result.error));
}

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolves the session user.
 *
 * @returns The user, or a 401 response
 */
export async function requireAuth(
  supabase: TypedSupabaseClient
): Promise<AuthenticatedUser | NextResponse<ApiResponse<never>>> {
  const {
    data: { user },
    error,
  } = await supabase.auth.getUser();

  if (error || !user) {
    return apiError('Unauthorized', 401);
  }

  return { id: user.id, email: user.email ?? null };
}
