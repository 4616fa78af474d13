/**
 * 🌐 API Client
 *
 * Typed fetch wrapper the dashboard hooks use to call the route handlers.
 * Every method unwraps the `{ success, data }` envelope and throws an
 * `ApiClientError` for anything else.
 *
 * ```typescript
 * import { apiClient } from '@/lib/api/client';
 *
 * const { emails, total } = await apiClient.listEmails({ filter: 'important' });
 * await apiClient.updateActionItem(item.id, true);
 * ```
 *
 * @module lib/api/client
 */

import type { ApiResponse } from './utils';
import type { EmailFilter } from './schemas';
import type {
  ActionItemWithEmail,
  AuthUser,
  ContactSummary,
  EmailDetail,
  EmailStatistics,
  EmailSummary,
  EntitySummary,
  KeywordSummary,
  SyncSummary,
} from '@/types/api';
import type { ActionItemRow, EmailCategory, SentimentLabel } from '@/types/database';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface EmailListParams {
  filter?: EmailFilter;
  category?: EmailCategory;
  sentiment?: SentimentLabel;
  page?: number;
  limit?: number;
}

export interface EmailPage {
  emails: EmailSummary[];
  total: number;
  page: number;
  limit: number;
  hasMore: boolean;
}

export class ApiClientError extends Error {
  public readonly status: number;
  public readonly errors?: Record<string, string[]>;

  constructor(message: string, status: number, errors?: Record<string, string[]>) {
    super(message);
    this.name = 'ApiClientError';
    this.status = status;
    this.errors = errors;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

async function request<T>(path: string, init: RequestInit = {}): Promise<ApiResponse<T>> {
  const response = await fetch(path, { credentials: 'same-origin', ...init });

  let body: ApiResponse<T>;
  try {
    body = await response.json();
  } catch {
    throw new ApiClientError(`Unexpected response from ${path} (${response.status})`, response.status);
  }

  if (!response.ok || !body.success) {
    throw new ApiClientError(body.error ?? `Request to ${path} failed (${response.status})`, response.status, body.errors);
  }

  return body;
}

async function requestData<T>(path: string, init?: RequestInit): Promise<T> {
  const body = await request<T>(path, init);
  if (body.data === undefined) {
    throw new ApiClientError(`Response from ${path} has no data`, 200);
  }
  return body.data;
}

function jsonInit(method: string, payload?: unknown): RequestInit {
  return payload === undefined
    ? { method }
    : { method, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) };
}

function toQueryString(params: Record<string, string | number | boolean | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export const apiClient = {
  // ─── Auth ────────────────────────────────────────────────────────────────────

  /** The signed-in user, or null without a session */
  async getUser(): Promise<AuthUser | null> {
    try {
      return await requestData<AuthUser>('/api/auth/user');
    } catch (error) {
      if (error instanceof ApiClientError && error.status === 401) return null;
      throw error;
    }
  },

  async getLoginUrl(): Promise<string> {
    const { url } = await requestData<{ url: string }>('/api/auth/login');
    return url;
  },

  async logout(): Promise<void> {
    await request<{ signedOut: boolean }>('/api/auth/logout', jsonInit('POST'));
  },

  // ─── Emails ──────────────────────────────────────────────────────────────────

  syncEmails(): Promise<SyncSummary> {
    return requestData<SyncSummary>('/api/emails/sync', jsonInit('POST'));
  },

  async listEmails(params: EmailListParams = {}): Promise<EmailPage> {
    const path = `/api/emails${toQueryString({ ...params })}`;
    const body = await request<EmailSummary[]>(path);
    const emails = body.data ?? [];

    return {
      emails,
      total: body.meta?.total ?? emails.length,
      page: body.meta?.page ?? params.page ?? 1,
      limit: body.meta?.limit ?? params.limit ?? emails.length,
      hasMore: body.meta?.hasMore ?? false,
    };
  },

  getEmail(id: string): Promise<EmailDetail> {
    return requestData<EmailDetail>(`/api/emails/${encodeURIComponent(id)}`);
  },

  // ─── Action items ────────────────────────────────────────────────────────────

  listActionItems(completed?: boolean): Promise<ActionItemWithEmail[]> {
    return requestData<ActionItemWithEmail[]>(`/api/action-items${toQueryString({ completed })}`);
  },

  updateActionItem(id: string, completed: boolean): Promise<ActionItemRow> {
    return requestData<ActionItemRow>(
      `/api/action-items/${encodeURIComponent(id)}`,
      jsonInit('PATCH', { completed })
    );
  },

  // ─── Insights ────────────────────────────────────────────────────────────────

  getStatistics(): Promise<EmailStatistics> {
    return requestData<EmailStatistics>('/api/statistics');
  },

  getEntities(): Promise<EntitySummary[]> {
    return requestData<EntitySummary[]>('/api/entities');
  },

  getKeywords(): Promise<KeywordSummary[]> {
    return requestData<KeywordSummary[]>('/api/keywords');
  },

  getContacts(): Promise<ContactSummary[]> {
    return requestData<ContactSummary[]>('/api/contacts');
  },
};

export type ApiClient = typeof apiClient;
